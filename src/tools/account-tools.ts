import { z } from 'zod'
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { transformAccount } from '../entities/entity-transformer.js'
import { renderAccountMarkdown, renderAccountsMarkdown } from '../formatting/markdown.js'
import { renderResponse } from '../formatting/response-format.js'
import { ok, type Result } from '../shared/result.js'
import { READ_ONLY, runTool, toCallToolResult, type ToolContext } from './tool-context.js'
import { budgetIdField, idField, includeClosedField, responseFormatField } from './tool-schemas.js'

export const getAccountsShape = {
  budget_id: budgetIdField,
  include_closed: includeClosedField,
  response_format: responseFormatField('markdown'),
}

export type GetAccountsParams = z.infer<z.ZodObject<typeof getAccountsShape>>

export const getAccounts = (params: GetAccountsParams, { client }: ToolContext): Promise<Result<string>> =>
  runTool('ynab_get_accounts', async () => {
    const accounts = await client.listAccounts(params.budget_id)

    return ok(
      renderResponse(params.response_format, {
        markdown: () => renderAccountsMarkdown(accounts, { includeClosed: params.include_closed }),
        json: () => accounts.map(transformAccount),
      })
    )
  })

export const getAccountShape = {
  budget_id: budgetIdField,
  account_id: idField('The account ID'),
  response_format: responseFormatField('json'),
}

export type GetAccountParams = z.infer<z.ZodObject<typeof getAccountShape>>

export const getAccount = (params: GetAccountParams, { client }: ToolContext): Promise<Result<string>> =>
  runTool('ynab_get_account', async () => {
    const account = await client.getAccount(params.budget_id, params.account_id)

    return ok(
      renderResponse(params.response_format, {
        markdown: () => renderAccountMarkdown(account),
        json: () => transformAccount(account),
      })
    )
  })

export const registerAccountTools = (server: McpServer, context: ToolContext): void => {
  server.registerTool(
    'ynab_get_accounts',
    {
      title: 'List Budget Accounts',
      description: 'List all accounts in a budget with balances.',
      inputSchema: getAccountsShape,
      annotations: { title: 'List Budget Accounts', ...READ_ONLY },
    },
    async (params) => toCallToolResult(await getAccounts(params, context))
  )

  server.registerTool(
    'ynab_get_account',
    {
      title: 'Get Single Account',
      description: 'Get details for a single account.',
      inputSchema: getAccountShape,
      annotations: { title: 'Get Single Account', ...READ_ONLY },
    },
    async (params) => toCallToolResult(await getAccount(params, context))
  )
}
