/**
 * YNAB tools exposed over MCP.
 *
 * Each module exports its input shapes, a handler per tool (usable without a
 * server) and a register function.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import type { ToolContext } from './tool-context.js'
import { registerBudgetTools } from './budget-tools.js'
import { registerAccountTools } from './account-tools.js'
import { registerCategoryTools } from './category-tools.js'
import { registerPayeeTools } from './payee-tools.js'
import { registerTransactionTools } from './transaction-tools.js'
import { registerMonthTools } from './month-tools.js'
import { registerScheduledTransactionTools } from './scheduled-transaction-tools.js'

export type { ToolContext } from './tool-context.js'

export const registerAllTools = (server: McpServer, context: ToolContext): void => {
  registerBudgetTools(server, context)
  registerAccountTools(server, context)
  registerCategoryTools(server, context)
  registerPayeeTools(server, context)
  registerTransactionTools(server, context)
  registerMonthTools(server, context)
  registerScheduledTransactionTools(server, context)
}
