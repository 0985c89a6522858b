import { z } from 'zod'
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { transformMonth } from '../entities/entity-transformer.js'
import { renderMonthMarkdown } from '../formatting/markdown.js'
import { renderResponse } from '../formatting/response-format.js'
import { ok, type Result } from '../shared/result.js'
import { READ_ONLY, runTool, toCallToolResult, type ToolContext } from './tool-context.js'
import { budgetIdField, includeHiddenField, isoDateField, responseFormatField } from './tool-schemas.js'

export const getMonthBudgetShape = {
  budget_id: budgetIdField,
  month: isoDateField('The budget month (YYYY-MM-DD, use first of month)'),
  include_hidden: includeHiddenField,
  response_format: responseFormatField('markdown'),
}

export type GetMonthBudgetParams = z.infer<z.ZodObject<typeof getMonthBudgetShape>>

export const getMonthBudget = (params: GetMonthBudgetParams, { client }: ToolContext): Promise<Result<string>> =>
  runTool('ynab_get_month_budget', async () => {
    const month = await client.getMonthBudget(params.budget_id, params.month)

    return ok(
      renderResponse(params.response_format, {
        markdown: () => renderMonthMarkdown(month, { includeHidden: params.include_hidden }),
        json: () => transformMonth(month),
      })
    )
  })

export const registerMonthTools = (server: McpServer, context: ToolContext): void => {
  server.registerTool(
    'ynab_get_month_budget',
    {
      title: 'Get Month Budget',
      description:
        'Get budget details for a specific month including category allocations and activity.',
      inputSchema: getMonthBudgetShape,
      annotations: { title: 'Get Month Budget', ...READ_ONLY },
    },
    async (params) => toCallToolResult(await getMonthBudget(params, context))
  )
}
