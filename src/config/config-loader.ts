import { loadConfigFile } from './config-service.js'
import { appConfigSchema, type AppConfig } from './config-types.js'
import type { LogLevel } from '../shared/logger.js'

/**
 * Environment variable names
 */
export const ENV_VARS = {
  YNAB_API_KEY: 'YNAB_API_KEY',
  YNAB_OUTPUT_DIR: 'YNAB_OUTPUT_DIR',
  LOG_LEVEL: 'LOG_LEVEL',
} as const

export interface LoadConfigOptions {
  /** Config file to read instead of the default location */
  configPath?: string
  /** Values from CLI flags; they beat env and file */
  overrides?: { outputDir?: string; logLevel?: LogLevel }
  env?: NodeJS.ProcessEnv
}

export interface LoadConfigResult {
  config: AppConfig | null
  source: 'env' | 'file' | 'mixed' | null
  missing: string[]
}

/**
 * Load config from environment variables, with fallback to the config file.
 * Env vars take priority over config file values.
 */
export const loadConfigWithEnv = async (options: LoadConfigOptions = {}): Promise<LoadConfigResult> => {
  const { configPath, overrides = {}, env = process.env } = options
  const fileConfig = await loadConfigFile(configPath)

  const envToken = env[ENV_VARS.YNAB_API_KEY] || undefined
  const envOutputDir = env[ENV_VARS.YNAB_OUTPUT_DIR] || undefined
  const envLogLevel = env[ENV_VARS.LOG_LEVEL] || undefined

  const accessToken = envToken ?? fileConfig?.ynab?.accessToken
  if (!accessToken) {
    return { config: null, source: null, missing: [ENV_VARS.YNAB_API_KEY] }
  }

  const usedEnv = envToken !== undefined || envOutputDir !== undefined || envLogLevel !== undefined
  const usedFile =
    fileConfig !== null &&
    ((envToken === undefined && fileConfig.ynab?.accessToken !== undefined) ||
      (envOutputDir === undefined && fileConfig.output?.directory !== undefined) ||
      (envLogLevel === undefined && fileConfig.logLevel !== undefined))

  const source = usedEnv && usedFile ? 'mixed' : usedFile ? 'file' : 'env'

  // Validate with zod schema
  const config = appConfigSchema.parse({
    ynab: { accessToken },
    output: {
      directory: overrides.outputDir ?? envOutputDir ?? fileConfig?.output?.directory,
    },
    logLevel: overrides.logLevel ?? envLogLevel ?? fileConfig?.logLevel,
  })

  return { config, source, missing: [] }
}
