import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { ListToolsRequestSchema, CallToolRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { zodToJsonSchema } from 'zod-to-json-schema';

import { APP_NAME, APP_VERSION, MCP_TOOL_DESCRIPTIONS } from '../config/constants';
import { generateCorrelationId, createChildLogger, withTiming } from '../utils/logger';
import { handleMcpError, ValidationError } from './errors';
import { ExtractArticleInput } from './schemas';
import { handleExtractArticle } from '../handlers/index';

export const EXTRACT_ARTICLE_TOOL = 'article.extract';

/**
 * Context passed to handlers for progress notifications
 */
export interface HandlerContext {
  progressToken?: string | number;
  sendProgress: (progress: number, total?: number, message?: string) => Promise<void>;
}

export const mcpServer = new Server(
  {
    name: APP_NAME,
    version: APP_VERSION,
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

export function listTools() {
  return {
    tools: [
      {
        name: EXTRACT_ARTICLE_TOOL,
        description: MCP_TOOL_DESCRIPTIONS.EXTRACT_ARTICLE,
        inputSchema: zodToJsonSchema(ExtractArticleInput),
      },
    ],
  };
}

mcpServer.setRequestHandler(ListToolsRequestSchema, async () => {
  const correlationId = generateCorrelationId();
  const childLogger = createChildLogger(correlationId);

  childLogger.debug('Listing available tools');
  return listTools();
});

mcpServer.setRequestHandler(CallToolRequestSchema, async request => {
  const correlationId = generateCorrelationId();
  const childLogger = createChildLogger(correlationId);

  try {
    childLogger.info({ tool: request.params.name }, 'Tool call received');

    const progressToken = request.params._meta?.progressToken;

    const context: HandlerContext = {
      progressToken,
      sendProgress: async (progress: number, total?: number, message?: string) => {
        if (progressToken) {
          await mcpServer.notification({
            method: 'notifications/progress',
            params: {
              progressToken,
              progress,
              ...(total !== undefined && { total }),
              ...(message && { message }),
            },
          });
          childLogger.debug({ progress, total, message }, 'Progress notification sent');
        }
      },
    };

    switch (request.params.name) {
      case EXTRACT_ARTICLE_TOOL:
        return await withTiming(childLogger, `tool:${EXTRACT_ARTICLE_TOOL}`, async () =>
          handleExtractArticle(request.params.arguments, childLogger, context)
        );

      default:
        throw new ValidationError(`Unknown tool: ${request.params.name}`);
    }
  } catch (error) {
    childLogger.error({ error, tool: request.params.name }, 'Tool call failed');
    throw handleMcpError(error, `Tool call: ${request.params.name}`);
  }
});
