import { z } from 'zod'
import { RESPONSE_FORMATS, type ResponseFormat } from '../formatting/response-format.js'

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/

export const budgetIdField = z
  .string()
  .trim()
  .min(1)
  .describe("The budget ID. Use 'last-used' for the most recently accessed budget.")

export const idField = (description: string) => z.string().trim().min(1).describe(description)

export const isoDateField = (description: string) =>
  z.string().trim().regex(ISO_DATE, 'Date must be in YYYY-MM-DD format').describe(description)

export const responseFormatField = (fallback: ResponseFormat) =>
  z.enum(RESPONSE_FORMATS).default(fallback).describe("Output format: 'markdown' or 'json'")

export const includeHiddenField = z
  .boolean()
  .default(false)
  .describe('Show hidden category groups and categories in markdown output')

export const includeClosedField = z
  .boolean()
  .default(false)
  .describe('Show closed accounts in markdown output')

export const memoField = (description: string) => z.string().trim().max(200).describe(description)

export const amountFields = (subject: string) => ({
  amount_milliunits: z
    .number()
    .int()
    .optional()
    .describe(
      `RECOMMENDED. ${subject} in milliunits (1000 = $1.00). Mutually exclusive with amount_dollars.`
    ),
  amount_dollars: z
    .number()
    .optional()
    .describe(
      `${subject} in dollars. Mutually exclusive with amount_milliunits. Use amount_milliunits for precision.`
    ),
})

export const spillFields = {
  output_to_file: z
    .boolean()
    .default(true)
    .describe(
      'Write results to file. Recommended for large results to avoid clogging context. Set false only for small result sets.'
    ),
  output_path: z
    .string()
    .trim()
    .min(1)
    .optional()
    .describe('Custom file path for output. If not set, writes to the output directory with a timestamp.'),
  summary_only: z
    .boolean()
    .default(false)
    .describe('Return only count and total, without individual transactions.'),
}
