import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { logger } from './utils/logger.js';

/**
 * Serves one MCP session over stdin/stdout. Logging goes to stderr.
 */
export async function startStdioServer(server: McpServer): Promise<void> {
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.info('MCP server listening on stdio');
}
