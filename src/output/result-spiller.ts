import { mkdir, writeFile } from 'node:fs/promises'
import { dirname, join } from 'node:path'
import { toDisplay } from '../money/amount-codec.js'
import { transformTransaction } from '../entities/entity-transformer.js'
import type { EntityDocument, TransactionRecord } from '../entities/entity-types.js'
import { toJson } from '../formatting/response-format.js'
import { LocalPersistenceError } from '../errors/tool-errors.js'
import { createLogger } from '../shared/logger.js'

const log = createLogger('spiller')

/**
 * Largest inline response, in characters of serialized JSON.
 */
export const CHARACTER_LIMIT = 25000

export interface SpillTotals {
  query?: string
  count: number
  total_milliunits: number
  total: string
}

/**
 * Everything a transaction listing produced. This is what spill files contain.
 */
export interface SpillSummary extends SpillTotals {
  transactions: EntityDocument[]
}

export interface SpillAcknowledgement extends SpillTotals {
  output_file: string
  message: string
}

export type Delivery =
  | { kind: 'inline'; text: string }
  | { kind: 'file'; acknowledgement: SpillAcknowledgement }

export interface SpillMessages {
  written: (path: string, count: number) => string
  tooLarge: (path: string, characters: number) => string
}

export interface DeliveryOptions {
  /** Always write to a file instead of answering inline */
  outputToFile: boolean
  /** Explicit file path; bypasses the output directory */
  outputPath?: string
  /** File name prefix for generated paths */
  prefix: string
  messages: SpillMessages
}

export interface ResultSpillerOptions {
  outputDir: string
  characterLimit?: number
  now?: () => Date
}

export interface ResultSpiller {
  spill: (summary: SpillSummary, prefix: string, message: (path: string) => string, outputPath?: string) => Promise<SpillAcknowledgement>
  deliver: (summary: SpillSummary, options: DeliveryOptions) => Promise<Delivery>
}

/**
 * Builds the summary of a transaction list. The total is summed from the
 * integer amounts before any display conversion.
 *
 * @example
 * summarizeTransactions([tx1, tx2], 'coffee')
 * // => { query: 'coffee', count: 2, total_milliunits: -8500, total: '-$8.50', transactions: [...] }
 */
export const summarizeTransactions = (transactions: TransactionRecord[], query?: string): SpillSummary => {
  const totalMilliunits = transactions.reduce((sum, tx) => sum + tx.amount, 0)
  return {
    ...(query !== undefined ? { query } : {}),
    count: transactions.length,
    total_milliunits: totalMilliunits,
    total: toDisplay(totalMilliunits),
    transactions: transactions.map(transformTransaction),
  }
}

/**
 * The summary without its transaction collection.
 */
export const totalsOf = (summary: SpillSummary): SpillTotals => ({
  ...(summary.query !== undefined ? { query: summary.query } : {}),
  count: summary.count,
  total_milliunits: summary.total_milliunits,
  total: summary.total,
})

const pad = (value: number): string => String(value).padStart(2, '0')

/**
 * Formats a local timestamp as YYYYMMDD_HHMMSS.
 */
export const fileTimestamp = (date: Date): string =>
  `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
  `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`

/**
 * Creates the spiller for one output directory.
 *
 * Generated file names have second resolution, so two spills with the same
 * prefix in the same second overwrite each other.
 *
 * @example
 * const spiller = createResultSpiller({ outputDir: '/tmp/ynab-mcp' })
 * const delivery = await spiller.deliver(summary, { outputToFile: false, prefix: 'transactions', messages })
 */
export const createResultSpiller = ({
  outputDir,
  characterLimit = CHARACTER_LIMIT,
  now = () => new Date(),
}: ResultSpillerOptions): ResultSpiller => {
  const resolvePath = (prefix: string, outputPath?: string): string =>
    outputPath ?? join(outputDir, `${prefix}_${fileTimestamp(now())}.json`)

  const spill = async (
    summary: SpillSummary,
    prefix: string,
    message: (path: string) => string,
    outputPath?: string
  ): Promise<SpillAcknowledgement> => {
    const path = resolvePath(prefix, outputPath)

    try {
      await mkdir(dirname(path), { recursive: true })
      await writeFile(path, toJson(summary))
    } catch (error) {
      throw new LocalPersistenceError(path, error)
    }

    log.info(`Wrote ${summary.count} transactions to ${path}`)

    return {
      ...totalsOf(summary),
      output_file: path,
      message: message(path),
    }
  }

  const deliver = async (summary: SpillSummary, options: DeliveryOptions): Promise<Delivery> => {
    const { outputToFile, outputPath, prefix, messages } = options

    if (outputToFile) {
      const acknowledgement = await spill(
        summary,
        prefix,
        (path) => messages.written(path, summary.count),
        outputPath
      )
      return { kind: 'file', acknowledgement }
    }

    const inline = toJson(summary)
    if (inline.length > characterLimit) {
      log.debug(`Inline response of ${inline.length} chars exceeds ${characterLimit}`)
      const acknowledgement = await spill(
        summary,
        prefix,
        (path) => messages.tooLarge(path, inline.length),
        outputPath
      )
      return { kind: 'file', acknowledgement }
    }

    return { kind: 'inline', text: inline }
  }

  return { spill, deliver }
}

export const deliveryText = (delivery: Delivery): string =>
  delivery.kind === 'inline' ? delivery.text : toJson(delivery.acknowledgement)
