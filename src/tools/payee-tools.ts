import { z } from 'zod'
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { renderPayeesMarkdown } from '../formatting/markdown.js'
import { renderResponse } from '../formatting/response-format.js'
import { ok, type Result } from '../shared/result.js'
import { READ_ONLY, runTool, toCallToolResult, type ToolContext } from './tool-context.js'
import { budgetIdField, responseFormatField } from './tool-schemas.js'

export const getPayeesShape = {
  budget_id: budgetIdField,
  response_format: responseFormatField('markdown'),
}

export type GetPayeesParams = z.infer<z.ZodObject<typeof getPayeesShape>>

export const getPayees = (params: GetPayeesParams, { client }: ToolContext): Promise<Result<string>> =>
  runTool('ynab_get_payees', async () => {
    const payees = await client.listPayees(params.budget_id)

    return ok(
      renderResponse(params.response_format, {
        markdown: () => renderPayeesMarkdown(payees),
        json: () => payees,
      })
    )
  })

export const registerPayeeTools = (server: McpServer, context: ToolContext): void => {
  server.registerTool(
    'ynab_get_payees',
    {
      title: 'List Payees',
      description: 'List all payees in a budget.',
      inputSchema: getPayeesShape,
      annotations: { title: 'List Payees', ...READ_ONLY },
    },
    async (params) => toCallToolResult(await getPayees(params, context))
  )
}
