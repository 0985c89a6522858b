import { vi } from 'vitest'
import type {
  AccountRecord,
  BudgetDetailRecord,
  CategoryGroupWithCategoriesRecord,
  CategoryRecord,
  MonthRecord,
  PayeeRecord,
  ScheduledTransactionRecord,
  TransactionRecord,
} from '../entities/entity-types.js'
import type { BudgetService } from '../shared/ynab-client.js'

const shortId = (prefix: string) => `${prefix}-${Math.random().toString(36).slice(2, 8)}`

/**
 * Creates a mock TransactionRecord
 */
export const createMockTransaction = (overrides: Partial<TransactionRecord> = {}): TransactionRecord => ({
  id: shortId('tx'),
  date: '2024-03-15',
  amount: -10000, // -$10.00 in milliunits
  memo: null,
  cleared: 'cleared',
  approved: true,
  flag_color: null,
  account_id: 'account-1',
  account_name: 'Test Account',
  payee_id: 'payee-1',
  payee_name: 'Test Payee',
  category_id: null,
  category_name: null,
  transfer_account_id: null,
  deleted: false,
  ...overrides,
})

/**
 * Creates a mock CategoryRecord
 */
export const createMockCategory = (overrides: Partial<CategoryRecord> = {}): CategoryRecord => ({
  id: shortId('cat'),
  category_group_id: 'group-1',
  category_group_name: 'Test Group',
  name: 'Test Category',
  hidden: false,
  note: null,
  budgeted: 0,
  activity: 0,
  balance: 0,
  goal_type: null,
  goal_target: null,
  goal_percentage_complete: null,
  goal_overall_left: null,
  deleted: false,
  ...overrides,
})

export const createMockCategoryGroup = (
  overrides: Partial<CategoryGroupWithCategoriesRecord> = {}
): CategoryGroupWithCategoriesRecord => ({
  id: shortId('group'),
  name: 'Test Group',
  hidden: false,
  deleted: false,
  categories: [],
  ...overrides,
})

export const createMockAccount = (overrides: Partial<AccountRecord> = {}): AccountRecord => ({
  id: shortId('account'),
  name: 'Checking',
  type: 'checking',
  on_budget: true,
  closed: false,
  note: null,
  balance: 0,
  cleared_balance: 0,
  uncleared_balance: 0,
  deleted: false,
  ...overrides,
})

export const createMockMonth = (overrides: Partial<MonthRecord> = {}): MonthRecord => ({
  month: '2024-03-01',
  note: null,
  income: 0,
  budgeted: 0,
  activity: 0,
  to_be_budgeted: 0,
  age_of_money: null,
  deleted: false,
  categories: [],
  ...overrides,
})

export const createMockScheduledTransaction = (
  overrides: Partial<ScheduledTransactionRecord> = {}
): ScheduledTransactionRecord => ({
  id: shortId('st'),
  date_first: '2024-01-01',
  date_next: '2024-04-01',
  frequency: 'monthly',
  amount: -10000,
  memo: null,
  flag_color: null,
  account_id: 'account-1',
  account_name: 'Test Account',
  payee_id: 'payee-1',
  payee_name: 'Test Payee',
  category_id: null,
  category_name: null,
  deleted: false,
  ...overrides,
})

export const createMockPayee = (overrides: Partial<PayeeRecord> = {}): PayeeRecord => ({
  id: shortId('payee'),
  name: 'Test Payee',
  transfer_account_id: null,
  deleted: false,
  ...overrides,
})

export const createMockBudget = (overrides: Partial<BudgetDetailRecord> = {}): BudgetDetailRecord => ({
  id: 'budget-1',
  name: 'Test Budget',
  last_modified_on: '2024-03-15T10:00:00Z',
  currency_format: null,
  accounts: [],
  category_groups: [],
  categories: [],
  ...overrides,
})

const notStubbed = (name: string) =>
  vi.fn(() => Promise.reject(new Error(`${name} was not stubbed`)))

/**
 * A BudgetService whose methods reject until a test provides them.
 */
export const createFakeBudgetService = (overrides: Partial<BudgetService> = {}): BudgetService => ({
  listBudgets: notStubbed('listBudgets'),
  getBudget: notStubbed('getBudget'),
  listAccounts: notStubbed('listAccounts'),
  getAccount: notStubbed('getAccount'),
  listCategories: notStubbed('listCategories'),
  getCategory: notStubbed('getCategory'),
  updateCategoryMonthBudget: notStubbed('updateCategoryMonthBudget'),
  listPayees: notStubbed('listPayees'),
  listTransactions: notStubbed('listTransactions'),
  getTransaction: notStubbed('getTransaction'),
  createTransaction: notStubbed('createTransaction'),
  updateTransaction: notStubbed('updateTransaction'),
  getMonthBudget: notStubbed('getMonthBudget'),
  listScheduledTransactions: notStubbed('listScheduledTransactions'),
  createScheduledTransaction: notStubbed('createScheduledTransaction'),
  ...overrides,
})
