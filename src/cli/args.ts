import { Command, CommanderError, Option } from 'commander'
import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { dirname, join } from 'node:path'
import { z } from 'zod'
import { LOG_LEVELS } from '../config/config-types.js'
import type { LogLevel } from '../shared/logger.js'

const packageSchema = z.object({ version: z.string() })

export const getVersion = (): string => {
  try {
    const here = dirname(fileURLToPath(import.meta.url))
    const pkgPath = join(here, '..', '..', 'package.json')
    return packageSchema.parse(JSON.parse(readFileSync(pkgPath, 'utf-8'))).version
  } catch {
    return '0.0.0'
  }
}

export type ServeOptions = {
  config?: string
  outputDir?: string
  logLevel?: LogLevel
}

/**
 * Parse CLI arguments into serve options.
 * Returns null if --help or --version was displayed
 */
export const parseArgs = (argv: string[], version: string = getVersion()): ServeOptions | null => {
  const program = new Command()
    .name('ynab-mcp')
    .description('YNAB budgeting tools over the Model Context Protocol (stdio)')
    .version(version)
    .option('--config <path>', 'Path to config file')
    .option('-o, --output-dir <dir>', 'Directory for spilled transaction files')
    .addOption(new Option('-l, --log-level <level>', 'Log level (written to stderr)').choices(LOG_LEVELS))
    .exitOverride()

  try {
    program.parse(argv)
  } catch (err: unknown) {
    // Commander throws on --help and --version, which is expected
    if (err instanceof CommanderError && (err.code === 'commander.helpDisplayed' || err.code === 'commander.version')) {
      return null
    }
    throw err
  }

  return program.opts<ServeOptions>()
}
