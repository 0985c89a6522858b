import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import type { AppConfig } from '../config/config-types.js'
import { createResultSpiller } from '../output/result-spiller.js'
import { createYnabClient } from '../shared/ynab-client.js'
import { createLogger } from '../shared/logger.js'
import { registerAllTools, type ToolContext } from '../tools/index.js'

const log = createLogger('server')

export const SERVER_NAME = 'ynab-mcp'

/**
 * Builds an MCP server with every YNAB tool registered against the context.
 */
export const createServer = (context: ToolContext, version: string): McpServer => {
  const server = new McpServer({ name: SERVER_NAME, version })
  registerAllTools(server, context)
  return server
}

/**
 * Wires the YNAB client and spiller from resolved configuration.
 */
export const createToolContext = (config: AppConfig): ToolContext => ({
  client: createYnabClient(config.ynab.accessToken),
  spiller: createResultSpiller({ outputDir: config.output.directory }),
})

/**
 * Serves the tools over stdio until the client disconnects.
 */
export const startServer = async (config: AppConfig, version: string): Promise<McpServer> => {
  const server = createServer(createToolContext(config), version)
  await server.connect(new StdioServerTransport())
  log.info(`${SERVER_NAME} ${version} on stdio, spilling to ${config.output.directory}`)
  return server
}
