import { z } from 'zod'
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { transformAccount } from '../entities/entity-transformer.js'
import { buildBudgetOverview } from '../entities/budget-overview.js'
import { renderBudgetsMarkdown, renderBudgetSummaryMarkdown } from '../formatting/markdown.js'
import { renderResponse } from '../formatting/response-format.js'
import { ok, type Result } from '../shared/result.js'
import { READ_ONLY, runTool, toCallToolResult, type ToolContext } from './tool-context.js'
import {
  budgetIdField,
  includeClosedField,
  includeHiddenField,
  responseFormatField,
} from './tool-schemas.js'

export const getBudgetsShape = {
  include_accounts: z.boolean().default(false).describe('Include account info in the response'),
  include_closed: includeClosedField,
  response_format: responseFormatField('markdown'),
}

export type GetBudgetsParams = z.infer<z.ZodObject<typeof getBudgetsShape>>

export const getBudgets = (params: GetBudgetsParams, { client }: ToolContext): Promise<Result<string>> =>
  runTool('ynab_get_budgets', async () => {
    const budgets = await client.listBudgets(params.include_accounts)

    return ok(
      renderResponse(params.response_format, {
        markdown: () =>
          renderBudgetsMarkdown(budgets, params.include_accounts, {
            includeClosed: params.include_closed,
          }),
        json: () =>
          budgets.map((budget) =>
            budget.accounts ? { ...budget, accounts: budget.accounts.map(transformAccount) } : budget
          ),
      })
    )
  })

export const getBudgetSummaryShape = {
  budget_id: budgetIdField,
  include_hidden: includeHiddenField,
  include_closed: includeClosedField,
  response_format: responseFormatField('markdown'),
}

export type GetBudgetSummaryParams = z.infer<z.ZodObject<typeof getBudgetSummaryShape>>

export const getBudgetSummary = (
  params: GetBudgetSummaryParams,
  { client }: ToolContext
): Promise<Result<string>> =>
  runTool('ynab_get_budget_summary', async () => {
    const budget = await client.getBudget(params.budget_id)

    return ok(
      renderResponse(params.response_format, {
        markdown: () =>
          renderBudgetSummaryMarkdown(budget, {
            includeHidden: params.include_hidden,
            includeClosed: params.include_closed,
          }),
        json: () => buildBudgetOverview(budget),
      })
    )
  })

export const registerBudgetTools = (server: McpServer, context: ToolContext): void => {
  server.registerTool(
    'ynab_get_budgets',
    {
      title: 'List YNAB Budgets',
      description: 'List all budgets the user has access to. Returns budget names and IDs; use the budget_id in other tools.',
      inputSchema: getBudgetsShape,
      annotations: { title: 'List YNAB Budgets', ...READ_ONLY },
    },
    async (params) => toCallToolResult(await getBudgets(params, context))
  )

  server.registerTool(
    'ynab_get_budget_summary',
    {
      title: 'Get Budget Summary',
      description:
        'Get a summary of a budget including accounts and category groups. Returns a curated overview, not the full budget export.',
      inputSchema: getBudgetSummaryShape,
      annotations: { title: 'Get Budget Summary', ...READ_ONLY },
    },
    async (params) => toCallToolResult(await getBudgetSummary(params, context))
  )
}
