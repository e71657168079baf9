/**
 * Tool registration on an MCP server instance.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Services } from '../core/services.ts';
import { errorMessage } from '../core/errors.ts';
import { executeSharedTool, sharedTools, type ToolContext } from '../shared/tools/registry.ts';
import { logger } from '../utils/logger.ts';

export function registerTools(server: McpServer, services: Services): void {
  const registeredNames: string[] = [];

  for (const tool of sharedTools) {
    try {
      server.registerTool(
        tool.name,
        {
          title: tool.title,
          description: tool.description,
          inputSchema: tool.inputShape,
          ...(tool.outputSchema && { outputSchema: tool.outputSchema }),
          ...(tool.annotations && { annotations: tool.annotations }),
        },
        (args, extra) => {
          const context: ToolContext = {
            services,
            sessionId: extra.sessionId,
            requestId: String(extra.requestId),
            signal: extra.signal,
          };
          return executeSharedTool(tool.name, args, context);
        },
      );
      registeredNames.push(tool.name);
    } catch (error) {
      void logger.error('tools', {
        message: 'Failed to register tool',
        toolName: tool.name,
        error: errorMessage(error),
      });
      throw error;
    }
  }

  void logger.debug('tools', {
    message: `Registered ${registeredNames.length} tools`,
    toolNames: registeredNames,
  });
}
