import { toDisplay } from '../money/amount-codec.js'
import {
  MONETARY_FIELDS,
  type EntityKind,
  type EntityDocument,
  type AccountRecord,
  type CategoryRecord,
  type TransactionRecord,
  type ScheduledTransactionRecord,
  type MonthRecord,
} from './entity-types.js'

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

/**
 * Returns a copy of an entity with its monetary fields converted.
 *
 * For every monetary field of the kind that holds a number, the integer moves
 * to `<field>_milliunits` and the field becomes the display string. Missing
 * and null fields are left alone. Months also convert their nested categories.
 *
 * @example
 * transformEntity('transaction', { id: 'tx-1', amount: -12340 })
 * // => { id: 'tx-1', amount: '-$12.34', amount_milliunits: -12340 }
 */
export const transformEntity = (kind: EntityKind, entity: object): EntityDocument => {
  const document: EntityDocument = Object.fromEntries(Object.entries(entity))

  for (const field of MONETARY_FIELDS[kind]) {
    const value = document[field]
    if (typeof value === 'number') {
      document[`${field}_milliunits`] = value
      document[field] = toDisplay(value)
    }
  }

  if (kind === 'month' && Array.isArray(document.categories)) {
    document.categories = document.categories.map((category: unknown) =>
      isPlainObject(category) ? transformEntity('category', category) : category
    )
  }

  return document
}

export const transformAccount = (account: AccountRecord): EntityDocument =>
  transformEntity('account', account)

export const transformCategory = (category: CategoryRecord): EntityDocument =>
  transformEntity('category', category)

export const transformTransaction = (transaction: TransactionRecord): EntityDocument =>
  transformEntity('transaction', transaction)

export const transformScheduledTransaction = (
  transaction: ScheduledTransactionRecord
): EntityDocument => transformEntity('scheduledTransaction', transaction)

export const transformMonth = (month: MonthRecord): EntityDocument => transformEntity('month', month)
