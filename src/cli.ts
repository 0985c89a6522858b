#!/usr/bin/env node
import { CommanderError } from 'commander'
import { getVersion, parseArgs, type ServeOptions } from './cli/args.js'
import { ENV_VARS, loadConfigWithEnv } from './config/config-loader.js'
import { startServer } from './server/mcp-server.js'
import { logger, setLogLevel } from './shared/logger.js'

const main = async () => {
  const version = getVersion()

  let options: ServeOptions | null
  try {
    options = parseArgs(process.argv, version)
  } catch (err) {
    // Commander already printed the usage error
    process.exit(err instanceof CommanderError ? err.exitCode : 1)
  }
  if (!options) return

  const { config, source, missing } = await loadConfigWithEnv({
    configPath: options.config,
    overrides: { outputDir: options.outputDir, logLevel: options.logLevel },
  })

  if (!config) {
    console.error(`Error: Missing required configuration: ${missing.join(', ')}`)
    console.error(`Set ${ENV_VARS.YNAB_API_KEY} to a YNAB personal access token.`)
    process.exit(1)
  }

  setLogLevel(config.logLevel)
  logger.debug(`Configuration loaded from ${source}`)

  await startServer(config, version)
}

main().catch((err: unknown) => {
  logger.error(err)
  process.exit(1)
})
