import { z } from 'zod'
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { transformScheduledTransaction } from '../entities/entity-transformer.js'
import { renderScheduledTransactionsMarkdown } from '../formatting/markdown.js'
import { renderResponse, toJson } from '../formatting/response-format.js'
import { amountToMilliunits, requireAmount } from '../money/amount-input.js'
import { ok, type Result } from '../shared/result.js'
import { SCHEDULE_FREQUENCIES } from '../shared/ynab-client.js'
import { READ_ONLY, WRITE, runTool, toCallToolResult, type ToolContext } from './tool-context.js'
import {
  amountFields,
  budgetIdField,
  idField,
  isoDateField,
  memoField,
  responseFormatField,
} from './tool-schemas.js'

export const getScheduledTransactionsShape = {
  budget_id: budgetIdField,
  response_format: responseFormatField('markdown'),
}

export type GetScheduledTransactionsParams = z.infer<z.ZodObject<typeof getScheduledTransactionsShape>>

export const getScheduledTransactions = (
  params: GetScheduledTransactionsParams,
  { client }: ToolContext
): Promise<Result<string>> =>
  runTool('ynab_get_scheduled_transactions', async () => {
    const transactions = await client.listScheduledTransactions(params.budget_id)

    return ok(
      renderResponse(params.response_format, {
        markdown: () => renderScheduledTransactionsMarkdown(transactions),
        json: () => transactions.map(transformScheduledTransaction),
      })
    )
  })

export const createScheduledTransactionShape = {
  budget_id: budgetIdField,
  account_id: idField('The account ID'),
  date_first: isoDateField('First occurrence date (YYYY-MM-DD)'),
  frequency: z.enum(SCHEDULE_FREQUENCIES).describe('How often the transaction repeats'),
  ...amountFields('Amount (negative = outflow, positive = inflow)'),
  payee_id: idField('The payee ID').optional(),
  payee_name: idField('Payee name').optional(),
  category_id: idField('The category ID').optional(),
  memo: memoField('Memo').optional(),
}

export type CreateScheduledTransactionParams = z.infer<z.ZodObject<typeof createScheduledTransactionShape>>

export const createScheduledTransaction = (
  params: CreateScheduledTransactionParams,
  { client }: ToolContext
): Promise<Result<string>> =>
  runTool('ynab_create_scheduled_transaction', async () => {
    const amount = requireAmount(params)
    if (!amount.ok) return amount

    const scheduled = await client.createScheduledTransaction(params.budget_id, {
      account_id: params.account_id,
      date: params.date_first,
      frequency: params.frequency,
      amount: amountToMilliunits(amount.value),
      payee_id: params.payee_id,
      payee_name: params.payee_name,
      category_id: params.category_id,
      memo: params.memo,
    })

    return ok(
      toJson({ success: true, scheduled_transaction: transformScheduledTransaction(scheduled) })
    )
  })

export const registerScheduledTransactionTools = (server: McpServer, context: ToolContext): void => {
  server.registerTool(
    'ynab_get_scheduled_transactions',
    {
      title: 'List Scheduled Transactions',
      description: 'List all scheduled (recurring) transactions in a budget.',
      inputSchema: getScheduledTransactionsShape,
      annotations: { title: 'List Scheduled Transactions', ...READ_ONLY },
    },
    async (params) => toCallToolResult(await getScheduledTransactions(params, context))
  )

  server.registerTool(
    'ynab_create_scheduled_transaction',
    {
      title: 'Create Scheduled Transaction',
      description:
        'Create a new scheduled (recurring) transaction. Provide exactly one of amount_milliunits or amount_dollars.',
      inputSchema: createScheduledTransactionShape,
      annotations: { title: 'Create Scheduled Transaction', ...WRITE, idempotentHint: false },
    },
    async (params) => toCallToolResult(await createScheduledTransaction(params, context))
  )
}
