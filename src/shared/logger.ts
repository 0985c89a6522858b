import { createConsola, type ConsolaInstance } from 'consola'

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug'

const LEVELS: Record<LogLevel, number> = {
  silent: -999,
  error: 0,
  warn: 1,
  info: 3,
  debug: 4,
}

/**
 * Root logger. Writes everything to stderr because stdout carries the MCP
 * protocol stream.
 */
export const logger = createConsola({
  level: LEVELS.info,
  stdout: process.stderr,
  stderr: process.stderr,
})

export type Logger = ConsolaInstance

// Tagged loggers copy the level when created
const tagged: Logger[] = []

export const setLogLevel = (level: LogLevel): void => {
  logger.level = LEVELS[level]
  for (const child of tagged) {
    child.level = LEVELS[level]
  }
}

/**
 * Creates a named logger for a module.
 *
 * @example
 * const log = createLogger('spiller')
 * log.info('Wrote 12 transactions')
 */
export const createLogger = (name: string): Logger => {
  const child = logger.withTag(name)
  tagged.push(child)
  return child
}
