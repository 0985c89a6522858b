import { z } from 'zod'
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { transformCategory } from '../entities/entity-transformer.js'
import { renderCategoriesMarkdown, renderCategoryMarkdown } from '../formatting/markdown.js'
import { renderResponse, toJson } from '../formatting/response-format.js'
import { amountToMilliunits, requireAmount } from '../money/amount-input.js'
import { ok, type Result } from '../shared/result.js'
import { READ_ONLY, WRITE, runTool, toCallToolResult, type ToolContext } from './tool-context.js'
import {
  amountFields,
  budgetIdField,
  idField,
  includeHiddenField,
  isoDateField,
  responseFormatField,
} from './tool-schemas.js'

export const getCategoriesShape = {
  budget_id: budgetIdField,
  include_hidden: includeHiddenField,
  response_format: responseFormatField('markdown'),
}

export type GetCategoriesParams = z.infer<z.ZodObject<typeof getCategoriesShape>>

export const getCategories = (params: GetCategoriesParams, { client }: ToolContext): Promise<Result<string>> =>
  runTool('ynab_get_categories', async () => {
    const groups = await client.listCategories(params.budget_id)

    return ok(
      renderResponse(params.response_format, {
        markdown: () => renderCategoriesMarkdown(groups, { includeHidden: params.include_hidden }),
        json: () =>
          groups.map((group) => ({
            id: group.id,
            name: group.name,
            hidden: group.hidden,
            categories: group.categories.map(transformCategory),
          })),
      })
    )
  })

export const getCategoryShape = {
  budget_id: budgetIdField,
  category_id: idField('The category ID'),
  response_format: responseFormatField('json'),
}

export type GetCategoryParams = z.infer<z.ZodObject<typeof getCategoryShape>>

export const getCategory = (params: GetCategoryParams, { client }: ToolContext): Promise<Result<string>> =>
  runTool('ynab_get_category', async () => {
    const category = await client.getCategory(params.budget_id, params.category_id)

    return ok(
      renderResponse(params.response_format, {
        markdown: () => renderCategoryMarkdown(category),
        json: () => transformCategory(category),
      })
    )
  })

export const updateCategoryBudgetShape = {
  budget_id: budgetIdField,
  category_id: idField('The category ID'),
  month: isoDateField('The budget month in ISO format (YYYY-MM-DD, use first of month)'),
  ...amountFields('Budgeted amount'),
}

export type UpdateCategoryBudgetParams = z.infer<z.ZodObject<typeof updateCategoryBudgetShape>>

export const updateCategoryBudget = (
  params: UpdateCategoryBudgetParams,
  { client }: ToolContext
): Promise<Result<string>> =>
  runTool('ynab_update_category_budget', async () => {
    const amount = requireAmount(params)
    if (!amount.ok) return amount

    const category = await client.updateCategoryMonthBudget(
      params.budget_id,
      params.month,
      params.category_id,
      amountToMilliunits(amount.value)
    )

    return ok(toJson({ success: true, category: transformCategory(category) }))
  })

export const registerCategoryTools = (server: McpServer, context: ToolContext): void => {
  server.registerTool(
    'ynab_get_categories',
    {
      title: 'List Budget Categories',
      description: 'List all categories in a budget grouped by category group.',
      inputSchema: getCategoriesShape,
      annotations: { title: 'List Budget Categories', ...READ_ONLY },
    },
    async (params) => toCallToolResult(await getCategories(params, context))
  )

  server.registerTool(
    'ynab_get_category',
    {
      title: 'Get Single Category',
      description: 'Get details for a single category including goal info.',
      inputSchema: getCategoryShape,
      annotations: { title: 'Get Single Category', ...READ_ONLY },
    },
    async (params) => toCallToolResult(await getCategory(params, context))
  )

  server.registerTool(
    'ynab_update_category_budget',
    {
      title: 'Update Category Budget',
      description:
        'Update the budgeted amount for a category in a specific month. Provide exactly one of amount_milliunits or amount_dollars.',
      inputSchema: updateCategoryBudgetShape,
      annotations: { title: 'Update Category Budget', ...WRITE, idempotentHint: true },
    },
    async (params) => toCallToolResult(await updateCategoryBudget(params, context))
  )
}
