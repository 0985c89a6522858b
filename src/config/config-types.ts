import { z } from 'zod'
import type { LogLevel } from '../shared/logger.js'

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const satisfies readonly LogLevel[]

export const DEFAULT_OUTPUT_DIR = '/tmp/ynab-mcp'

export const appConfigSchema = z.object({
  ynab: z.object({
    accessToken: z.string().min(1),
  }),
  output: z
    .object({
      directory: z.string().min(1).default(DEFAULT_OUTPUT_DIR),
    })
    .default({}),
  logLevel: z.enum(LOG_LEVELS).default('info'),
})

export type AppConfig = z.infer<typeof appConfigSchema>

/**
 * The optional config file. Every field may be left to the environment.
 */
export const fileConfigSchema = z.object({
  ynab: z
    .object({
      accessToken: z.string().min(1).optional(),
    })
    .optional(),
  output: z
    .object({
      directory: z.string().min(1).optional(),
    })
    .optional(),
  logLevel: z.enum(LOG_LEVELS).optional(),
})

export type FileConfig = z.infer<typeof fileConfigSchema>
