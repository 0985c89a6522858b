import * as ynab from 'ynab'
import { z } from 'zod'
import { UpstreamError } from '../errors/tool-errors.js'
import type {
  AccountRecord,
  BudgetDetailRecord,
  BudgetSummaryRecord,
  CategoryGroupWithCategoriesRecord,
  CategoryRecord,
  MonthRecord,
  PayeeRecord,
  ScheduledTransactionRecord,
  TransactionRecord,
} from '../entities/entity-types.js'

export type ClearedStatus = 'cleared' | 'uncleared' | 'reconciled'

export const CLEARED_STATUSES = ['cleared', 'uncleared', 'reconciled'] as const satisfies readonly ClearedStatus[]

export const SCHEDULE_FREQUENCIES = [
  'never',
  'daily',
  'weekly',
  'everyOtherWeek',
  'twiceAMonth',
  'every4Weeks',
  'monthly',
  'everyOtherMonth',
  'every3Months',
  'every4Months',
  'twiceAYear',
  'yearly',
  'everyOtherYear',
] as const

export type ScheduleFrequency = (typeof SCHEDULE_FREQUENCIES)[number]

/**
 * Narrows a transaction listing. Only one scope applies; account wins over
 * category, category over payee.
 */
export interface TransactionFilter {
  accountId?: string
  categoryId?: string
  payeeId?: string
  sinceDate?: string
}

export interface NewTransaction {
  account_id: string
  date: string
  amount: number
  payee_id?: string
  payee_name?: string
  category_id?: string
  memo?: string
  cleared?: ClearedStatus
  approved?: boolean
}

export type TransactionChanges = Partial<NewTransaction>

export interface NewScheduledTransaction {
  account_id: string
  date: string
  frequency: ScheduleFrequency
  amount: number
  payee_id?: string
  payee_name?: string
  category_id?: string
  memo?: string
}

/**
 * Everything the tools need from YNAB.
 */
export interface BudgetService {
  listBudgets: (includeAccounts: boolean) => Promise<BudgetSummaryRecord[]>
  getBudget: (budgetId: string) => Promise<BudgetDetailRecord>
  listAccounts: (budgetId: string) => Promise<AccountRecord[]>
  getAccount: (budgetId: string, accountId: string) => Promise<AccountRecord>
  listCategories: (budgetId: string) => Promise<CategoryGroupWithCategoriesRecord[]>
  getCategory: (budgetId: string, categoryId: string) => Promise<CategoryRecord>
  updateCategoryMonthBudget: (
    budgetId: string,
    month: string,
    categoryId: string,
    budgeted: number
  ) => Promise<CategoryRecord>
  listPayees: (budgetId: string) => Promise<PayeeRecord[]>
  listTransactions: (budgetId: string, filter?: TransactionFilter) => Promise<TransactionRecord[]>
  getTransaction: (budgetId: string, transactionId: string) => Promise<TransactionRecord>
  createTransaction: (budgetId: string, transaction: NewTransaction) => Promise<TransactionRecord>
  updateTransaction: (
    budgetId: string,
    transactionId: string,
    changes: TransactionChanges
  ) => Promise<TransactionRecord>
  getMonthBudget: (budgetId: string, month: string) => Promise<MonthRecord>
  listScheduledTransactions: (budgetId: string) => Promise<ScheduledTransactionRecord[]>
  createScheduledTransaction: (
    budgetId: string,
    transaction: NewScheduledTransaction
  ) => Promise<ScheduledTransactionRecord>
}

// YNAB error bodies look like { error: { id: '404.2', name: 'resource_not_found', detail: '...' } }
const ynabErrorBodySchema = z.object({
  error: z.object({
    id: z.string(),
    name: z.string(),
    detail: z.string().optional(),
  }),
})

const parseJson = (text: string): unknown => {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

/**
 * The reason YNAB gave for a failed request, or the HTTP status text when the
 * body is not a YNAB error (a gateway's HTML page, for instance).
 */
const errorReason = async (response: Response): Promise<string> => {
  const body = ynabErrorBodySchema.safeParse(parseJson(await response.text()))
  if (body.success) {
    return body.data.error.detail ?? body.data.error.name
  }
  return response.statusText
}

/**
 * Post-middleware turning every non-2xx response into an UpstreamError before
 * the SDK tries to read it as JSON.
 */
export const raiseUpstreamErrors = async ({ response }: { response: Response }): Promise<void> => {
  if (response.ok) return
  throw new UpstreamError(response.status, await errorReason(response))
}

/**
 * Creates the YNAB-backed budget service. Every call goes to the API; nothing
 * is cached between calls. Failed requests reject with an UpstreamError.
 *
 * @example
 * const client = createYnabClient(token)
 * const accounts = await client.listAccounts('last-used')
 */
export const createYnabClient = (accessToken: string): BudgetService => {
  const sdk = new ynab.API(accessToken)
  const api = {
    budgets: sdk.budgets.withPostMiddleware(raiseUpstreamErrors),
    accounts: sdk.accounts.withPostMiddleware(raiseUpstreamErrors),
    categories: sdk.categories.withPostMiddleware(raiseUpstreamErrors),
    payees: sdk.payees.withPostMiddleware(raiseUpstreamErrors),
    transactions: sdk.transactions.withPostMiddleware(raiseUpstreamErrors),
    months: sdk.months.withPostMiddleware(raiseUpstreamErrors),
    scheduledTransactions: sdk.scheduledTransactions.withPostMiddleware(raiseUpstreamErrors),
  }

  const listBudgets = async (includeAccounts: boolean): Promise<BudgetSummaryRecord[]> => {
    const response = await api.budgets.getBudgets(includeAccounts)
    return response.data.budgets
  }

  const getBudget = async (budgetId: string): Promise<BudgetDetailRecord> => {
    const response = await api.budgets.getBudgetById(budgetId)
    return response.data.budget
  }

  const listAccounts = async (budgetId: string): Promise<AccountRecord[]> => {
    const response = await api.accounts.getAccounts(budgetId)
    return response.data.accounts
  }

  const getAccount = async (budgetId: string, accountId: string): Promise<AccountRecord> => {
    const response = await api.accounts.getAccountById(budgetId, accountId)
    return response.data.account
  }

  const listCategories = async (budgetId: string): Promise<CategoryGroupWithCategoriesRecord[]> => {
    const response = await api.categories.getCategories(budgetId)
    return response.data.category_groups
  }

  const getCategory = async (budgetId: string, categoryId: string): Promise<CategoryRecord> => {
    const response = await api.categories.getCategoryById(budgetId, categoryId)
    return response.data.category
  }

  const updateCategoryMonthBudget = async (
    budgetId: string,
    month: string,
    categoryId: string,
    budgeted: number
  ): Promise<CategoryRecord> => {
    const response = await api.categories.updateMonthCategory(budgetId, month, categoryId, {
      category: { budgeted },
    })
    return response.data.category
  }

  const listPayees = async (budgetId: string): Promise<PayeeRecord[]> => {
    const response = await api.payees.getPayees(budgetId)
    return response.data.payees
  }

  const listTransactions = async (
    budgetId: string,
    filter: TransactionFilter = {}
  ): Promise<TransactionRecord[]> => {
    const { accountId, categoryId, payeeId, sinceDate } = filter

    if (accountId) {
      const response = await api.transactions.getTransactionsByAccount(budgetId, accountId, sinceDate)
      return response.data.transactions
    }
    if (categoryId) {
      const response = await api.transactions.getTransactionsByCategory(budgetId, categoryId, sinceDate)
      return response.data.transactions
    }
    if (payeeId) {
      const response = await api.transactions.getTransactionsByPayee(budgetId, payeeId, sinceDate)
      return response.data.transactions
    }

    const response = await api.transactions.getTransactions(budgetId, sinceDate)
    return response.data.transactions
  }

  const getTransaction = async (budgetId: string, transactionId: string): Promise<TransactionRecord> => {
    const response = await api.transactions.getTransactionById(budgetId, transactionId)
    return response.data.transaction
  }

  const createTransaction = async (
    budgetId: string,
    transaction: NewTransaction
  ): Promise<TransactionRecord> => {
    const response = await api.transactions.createTransaction(budgetId, { transaction })
    const created = response.data.transaction
    if (!created) {
      throw new Error('YNAB did not return the created transaction')
    }
    return created
  }

  const updateTransaction = async (
    budgetId: string,
    transactionId: string,
    changes: TransactionChanges
  ): Promise<TransactionRecord> => {
    const response = await api.transactions.updateTransaction(budgetId, transactionId, {
      transaction: changes,
    })
    return response.data.transaction
  }

  const getMonthBudget = async (budgetId: string, month: string): Promise<MonthRecord> => {
    const response = await api.months.getBudgetMonth(budgetId, month)
    return response.data.month
  }

  const listScheduledTransactions = async (budgetId: string): Promise<ScheduledTransactionRecord[]> => {
    const response = await api.scheduledTransactions.getScheduledTransactions(budgetId)
    return response.data.scheduled_transactions
  }

  const createScheduledTransaction = async (
    budgetId: string,
    transaction: NewScheduledTransaction
  ): Promise<ScheduledTransactionRecord> => {
    const response = await api.scheduledTransactions.createScheduledTransaction(budgetId, {
      scheduled_transaction: transaction,
    })
    return response.data.scheduled_transaction
  }

  return {
    listBudgets,
    getBudget,
    listAccounts,
    getAccount,
    listCategories,
    getCategory,
    updateCategoryMonthBudget,
    listPayees,
    listTransactions,
    getTransaction,
    createTransaction,
    updateTransaction,
    getMonthBudget,
    listScheduledTransactions,
    createScheduledTransaction,
  }
}

/**
 * Matches transactions whose payee name or memo contains the query,
 * ignoring case.
 *
 * @example
 * searchTransactions(transactions, 'coffee')
 * // matches payee 'Blue Bottle Coffee' and memo 'Office coffee run'
 */
export const searchTransactions = <T extends TransactionRecord>(transactions: T[], query: string): T[] => {
  const needle = query.toLowerCase()
  return transactions.filter(
    (tx) =>
      (tx.payee_name ?? '').toLowerCase().includes(needle) ||
      (tx.memo ?? '').toLowerCase().includes(needle)
  )
}
