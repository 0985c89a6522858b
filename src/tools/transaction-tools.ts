import { z } from 'zod'
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { transformTransaction } from '../entities/entity-transformer.js'
import type { TransactionRecord } from '../entities/entity-types.js'
import { toJson } from '../formatting/response-format.js'
import { amountToMilliunits, optionalAmount, requireAmount } from '../money/amount-input.js'
import {
  deliveryText,
  summarizeTransactions,
  totalsOf,
  type SpillMessages,
} from '../output/result-spiller.js'
import { ok, type Result } from '../shared/result.js'
import {
  CLEARED_STATUSES,
  searchTransactions as matchTransactions,
  type TransactionChanges,
} from '../shared/ynab-client.js'
import { READ_ONLY, WRITE, runTool, toCallToolResult, type ToolContext } from './tool-context.js'
import {
  amountFields,
  budgetIdField,
  idField,
  isoDateField,
  memoField,
  spillFields,
} from './tool-schemas.js'

interface SpillParams {
  output_to_file: boolean
  output_path?: string
  summary_only: boolean
}

const LISTING_MESSAGES: SpillMessages = {
  written: (path, count) => `Wrote ${count} transactions to ${path}`,
  tooLarge: (path, characters) => `Response too large (${characters} chars). Wrote to ${path}`,
}

const SEARCH_MESSAGES: SpillMessages = {
  written: (path, count) => `Found ${count} matching transactions. Wrote to ${path}`,
  tooLarge: (path, characters) => `Response too large (${characters} chars). Wrote to ${path}`,
}

/**
 * Answers a transaction listing: totals only, a spill file, or inline JSON.
 */
const respondWithTransactions = async (
  transactions: TransactionRecord[],
  params: SpillParams,
  context: ToolContext,
  spill: { prefix: string; messages: SpillMessages; query?: string }
): Promise<Result<string>> => {
  const summary = summarizeTransactions(transactions, spill.query)

  if (params.summary_only) {
    return ok(toJson(totalsOf(summary)))
  }

  const delivery = await context.spiller.deliver(summary, {
    outputToFile: params.output_to_file,
    outputPath: params.output_path,
    prefix: spill.prefix,
    messages: spill.messages,
  })
  return ok(deliveryText(delivery))
}

export const getTransactionsShape = {
  budget_id: budgetIdField,
  account_id: idField('Filter by account ID').optional(),
  category_id: idField('Filter by category ID').optional(),
  payee_id: idField('Filter by payee ID').optional(),
  since_date: isoDateField('Only return transactions on or after this date (YYYY-MM-DD)').optional(),
  ...spillFields,
}

export type GetTransactionsParams = z.infer<z.ZodObject<typeof getTransactionsShape>>

export const getTransactions = (params: GetTransactionsParams, context: ToolContext): Promise<Result<string>> =>
  runTool('ynab_get_transactions', async () => {
    const transactions = await context.client.listTransactions(params.budget_id, {
      accountId: params.account_id,
      categoryId: params.category_id,
      payeeId: params.payee_id,
      sinceDate: params.since_date,
    })

    return respondWithTransactions(transactions, params, context, {
      prefix: 'transactions',
      messages: LISTING_MESSAGES,
    })
  })

export const getTransactionShape = {
  budget_id: budgetIdField,
  transaction_id: idField('The transaction ID'),
}

export type GetTransactionParams = z.infer<z.ZodObject<typeof getTransactionShape>>

export const getTransaction = (params: GetTransactionParams, { client }: ToolContext): Promise<Result<string>> =>
  runTool('ynab_get_transaction', async () => {
    const transaction = await client.getTransaction(params.budget_id, params.transaction_id)
    return ok(toJson(transformTransaction(transaction)))
  })

export const createTransactionShape = {
  budget_id: budgetIdField,
  account_id: idField('The account ID for this transaction'),
  date: isoDateField('Transaction date in ISO format (YYYY-MM-DD)'),
  ...amountFields('Amount (negative = outflow, positive = inflow)'),
  payee_id: idField('The payee ID').optional(),
  payee_name: idField("Payee name (creates a new payee if it doesn't exist)").optional(),
  category_id: idField('The category ID').optional(),
  memo: memoField('Transaction memo').optional(),
  cleared: z
    .enum(CLEARED_STATUSES)
    .default('uncleared')
    .describe("Cleared status: 'cleared', 'uncleared', or 'reconciled'"),
  approved: z.boolean().default(true).describe('Whether the transaction is approved'),
}

export type CreateTransactionParams = z.infer<z.ZodObject<typeof createTransactionShape>>

export const createTransaction = (
  params: CreateTransactionParams,
  { client }: ToolContext
): Promise<Result<string>> =>
  runTool('ynab_create_transaction', async () => {
    const amount = requireAmount(params)
    if (!amount.ok) return amount

    const transaction = await client.createTransaction(params.budget_id, {
      account_id: params.account_id,
      date: params.date,
      amount: amountToMilliunits(amount.value),
      payee_id: params.payee_id,
      payee_name: params.payee_name,
      category_id: params.category_id,
      memo: params.memo,
      cleared: params.cleared,
      approved: params.approved,
    })

    return ok(toJson({ success: true, transaction: transformTransaction(transaction) }))
  })

export const updateTransactionShape = {
  budget_id: budgetIdField,
  transaction_id: idField('The transaction ID to update'),
  account_id: idField('Move to a different account').optional(),
  date: isoDateField('New date in ISO format (YYYY-MM-DD)').optional(),
  ...amountFields('New amount'),
  payee_id: idField('New payee ID').optional(),
  payee_name: idField('New payee name').optional(),
  category_id: idField('New category ID').optional(),
  memo: memoField('New memo (empty string clears it)').optional(),
  cleared: z.enum(CLEARED_STATUSES).optional().describe('New cleared status'),
  approved: z.boolean().optional().describe('New approved status'),
}

export type UpdateTransactionParams = z.infer<z.ZodObject<typeof updateTransactionShape>>

/**
 * Collects only the fields the caller set. A memo may be set to the empty
 * string; other fields are sent only when present.
 */
const transactionChanges = (params: UpdateTransactionParams, amount: number | undefined): TransactionChanges => {
  const changes: TransactionChanges = {}
  if (params.account_id) changes.account_id = params.account_id
  if (params.date) changes.date = params.date
  if (amount !== undefined) changes.amount = amount
  if (params.payee_id) changes.payee_id = params.payee_id
  if (params.payee_name) changes.payee_name = params.payee_name
  if (params.category_id) changes.category_id = params.category_id
  if (params.memo !== undefined) changes.memo = params.memo
  if (params.cleared) changes.cleared = params.cleared
  if (params.approved !== undefined) changes.approved = params.approved
  return changes
}

export const updateTransaction = (
  params: UpdateTransactionParams,
  { client }: ToolContext
): Promise<Result<string>> =>
  runTool('ynab_update_transaction', async () => {
    const amount = optionalAmount(params)
    if (!amount.ok) return amount

    const milliunits = amount.value ? amountToMilliunits(amount.value) : undefined
    const transaction = await client.updateTransaction(
      params.budget_id,
      params.transaction_id,
      transactionChanges(params, milliunits)
    )

    return ok(toJson({ success: true, transaction: transformTransaction(transaction) }))
  })

export const searchTransactionsShape = {
  budget_id: budgetIdField,
  query: z.string().trim().min(1).describe('Search query to match against payee name or memo'),
  since_date: isoDateField('Only search transactions on or after this date (YYYY-MM-DD)').optional(),
  ...spillFields,
}

export type SearchTransactionsParams = z.infer<z.ZodObject<typeof searchTransactionsShape>>

export const searchTransactions = (
  params: SearchTransactionsParams,
  context: ToolContext
): Promise<Result<string>> =>
  runTool('ynab_search_transactions', async () => {
    const transactions = await context.client.listTransactions(params.budget_id, {
      sinceDate: params.since_date,
    })

    return respondWithTransactions(matchTransactions(transactions, params.query), params, context, {
      prefix: 'search_transactions',
      messages: SEARCH_MESSAGES,
      query: params.query,
    })
  })

export const registerTransactionTools = (server: McpServer, context: ToolContext): void => {
  server.registerTool(
    'ynab_get_transactions',
    {
      title: 'Get Transactions',
      description:
        'Get transactions from a budget with optional filters. Can return large amounts of data, so results go to a file by default. Use since_date and filters to limit results.',
      inputSchema: getTransactionsShape,
      annotations: { title: 'Get Transactions', ...READ_ONLY },
    },
    async (params) => toCallToolResult(await getTransactions(params, context))
  )

  server.registerTool(
    'ynab_get_transaction',
    {
      title: 'Get Single Transaction',
      description: 'Get details for a single transaction.',
      inputSchema: getTransactionShape,
      annotations: { title: 'Get Single Transaction', ...READ_ONLY },
    },
    async (params) => toCallToolResult(await getTransaction(params, context))
  )

  server.registerTool(
    'ynab_create_transaction',
    {
      title: 'Create Transaction',
      description:
        'Create a new transaction. Provide exactly one of amount_milliunits or amount_dollars.',
      inputSchema: createTransactionShape,
      annotations: { title: 'Create Transaction', ...WRITE, idempotentHint: false },
    },
    async (params) => toCallToolResult(await createTransaction(params, context))
  )

  server.registerTool(
    'ynab_update_transaction',
    {
      title: 'Update Transaction',
      description:
        'Update an existing transaction. Only the fields provided change; give at most one of amount_milliunits or amount_dollars.',
      inputSchema: updateTransactionShape,
      annotations: { title: 'Update Transaction', ...WRITE, idempotentHint: true },
    },
    async (params) => toCallToolResult(await updateTransaction(params, context))
  )

  server.registerTool(
    'ynab_search_transactions',
    {
      title: 'Search Transactions',
      description:
        'Search transactions by payee name or memo (case-insensitive substring). Fetches transactions and filters locally; use since_date to limit scope.',
      inputSchema: searchTransactionsShape,
      annotations: { title: 'Search Transactions', ...READ_ONLY },
    },
    async (params) => toCallToolResult(await searchTransactions(params, context))
  )
}
