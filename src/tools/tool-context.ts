import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js'
import type { BudgetService } from '../shared/ynab-client.js'
import type { ResultSpiller } from '../output/result-spiller.js'
import { describeFailure, toFailure } from '../errors/tool-errors.js'
import { fail, type Result } from '../shared/result.js'
import { createLogger } from '../shared/logger.js'

const log = createLogger('tools')

/**
 * Collaborators every tool runs against.
 */
export interface ToolContext {
  client: BudgetService
  spiller: ResultSpiller
}

export const READ_ONLY = {
  readOnlyHint: true,
  destructiveHint: false,
  idempotentHint: true,
  openWorldHint: true,
} as const

export const WRITE = {
  readOnlyHint: false,
  destructiveHint: false,
  openWorldHint: true,
} as const

/**
 * Runs a tool body. Anything it throws (YNAB errors, file system errors)
 * becomes a classified failure, so callers only ever see a result.
 */
export const runTool = async (
  name: string,
  operation: () => Promise<Result<string>>
): Promise<Result<string>> => {
  log.debug(`Running ${name}`)

  let result: Result<string>
  try {
    result = await operation()
  } catch (error) {
    result = fail(toFailure(error))
  }

  if (!result.ok) {
    log.warn(`${name} failed: ${describeFailure(result.failure)}`)
  }
  return result
}

/**
 * The text a caller receives for a tool result.
 */
export const toolText = (result: Result<string>): string =>
  result.ok ? result.value : describeFailure(result.failure)

export const toCallToolResult = (result: Result<string>): CallToolResult => ({
  content: [{ type: 'text', text: toolText(result) }],
  ...(result.ok ? {} : { isError: true }),
})
