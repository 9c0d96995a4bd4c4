import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { getLogger } from '../utils/logger';
import { mcpServer } from '../mcp/mcpServer';

export class TransportManager {
  async connect(transport?: Transport): Promise<void> {
    const logger = getLogger();
    try {
      const serverTransport = transport ?? new StdioServerTransport();
      logger.info(
        { transport: transport ? 'custom' : 'stdio' },
        'Connecting MCP server to transport'
      );
      await mcpServer.connect(serverTransport);
      logger.info('MCP server connected successfully and ready to accept connections');
    } catch (error) {
      logger.error({ error }, 'Failed to connect MCP server to transport');
      throw error;
    }
  }

  async close(): Promise<void> {
    await mcpServer.close();
    getLogger().info('MCP server transport closed');
  }
}
