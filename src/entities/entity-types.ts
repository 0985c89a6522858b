/**
 * Entity records as returned by the YNAB API.
 *
 * Each interface lists the fields this server reads; the runtime objects carry
 * every field YNAB sent and are serialized in full. All monetary values are
 * milliunits (1000 = $1.00).
 */

export type EntityKind = 'account' | 'category' | 'transaction' | 'scheduledTransaction' | 'month'

export interface AccountRecord {
  id: string
  name: string
  type: string
  on_budget: boolean
  closed: boolean
  note?: string | null
  balance: number
  cleared_balance: number
  uncleared_balance: number
  deleted: boolean
}

export interface CategoryRecord {
  id: string
  category_group_id: string
  category_group_name?: string
  name: string
  hidden: boolean
  note?: string | null
  budgeted: number
  activity: number
  balance: number
  goal_type?: string | null
  goal_target?: number | null
  goal_percentage_complete?: number | null
  goal_overall_left?: number | null
  deleted: boolean
}

export interface CategoryGroupRecord {
  id: string
  name: string
  hidden: boolean
  deleted: boolean
}

export interface CategoryGroupWithCategoriesRecord extends CategoryGroupRecord {
  categories: CategoryRecord[]
}

export interface TransactionRecord {
  id: string
  date: string
  amount: number
  memo?: string | null
  cleared: string
  approved: boolean
  flag_color?: string | null
  account_id: string
  account_name?: string
  payee_id?: string | null
  payee_name?: string | null
  category_id?: string | null
  category_name?: string | null
  transfer_account_id?: string | null
  deleted: boolean
}

export interface ScheduledTransactionRecord {
  id: string
  date_first: string
  date_next: string
  frequency: string
  amount: number
  memo?: string | null
  flag_color?: string | null
  account_id: string
  account_name?: string
  payee_id?: string | null
  payee_name?: string | null
  category_id?: string | null
  category_name?: string | null
  deleted: boolean
}

export interface MonthRecord {
  month: string
  note?: string | null
  income: number
  budgeted: number
  activity: number
  to_be_budgeted: number
  age_of_money?: number | null
  deleted: boolean
  categories: CategoryRecord[]
}

export interface PayeeRecord {
  id: string
  name: string
  transfer_account_id?: string | null
  deleted: boolean
}

export interface CurrencyFormatRecord {
  iso_code: string
  example_format: string
  decimal_digits: number
  currency_symbol: string
}

export interface BudgetSummaryRecord {
  id: string
  name: string
  last_modified_on?: string | null
  accounts?: AccountRecord[] | null
}

export interface BudgetDetailRecord extends BudgetSummaryRecord {
  currency_format?: CurrencyFormatRecord | null
  category_groups?: CategoryGroupRecord[] | null
  categories?: CategoryRecord[] | null
}

/**
 * Monetary fields per entity kind. Checked against the record interfaces so a
 * renamed field fails to compile.
 */
export const MONETARY_FIELDS = {
  account: ['balance', 'cleared_balance', 'uncleared_balance'],
  category: ['budgeted', 'activity', 'balance', 'goal_target', 'goal_overall_left'],
  transaction: ['amount'],
  scheduledTransaction: ['amount'],
  month: ['income', 'budgeted', 'activity', 'to_be_budgeted'],
} as const satisfies {
  account: readonly (keyof AccountRecord)[]
  category: readonly (keyof CategoryRecord)[]
  transaction: readonly (keyof TransactionRecord)[]
  scheduledTransaction: readonly (keyof ScheduledTransactionRecord)[]
  month: readonly (keyof MonthRecord)[]
}

/**
 * A transformed entity: the record's fields with each present monetary field
 * replaced by its display string and duplicated as `<field>_milliunits`.
 */
export type EntityDocument = Record<string, unknown>
