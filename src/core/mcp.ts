import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { SetLevelRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { serverMetadata } from '../config/metadata.ts';
import { registerTools } from '../tools/index.ts';
import { logger } from '../utils/logger.ts';
import { buildCapabilities } from './capabilities.ts';
import type { Services } from './services.ts';

/**
 * One MCP server per session; all of them share `services`. The caller attaches it to
 * the logger once its session exists.
 */
export function buildServer(services: Services): McpServer {
  const { config } = services;

  const server = new McpServer(
    { name: config.MCP_TITLE || serverMetadata.title, version: config.MCP_VERSION },
    {
      capabilities: buildCapabilities(),
      instructions: config.MCP_INSTRUCTIONS ?? serverMetadata.instructions,
    },
  );

  registerTools(server, services);

  // Required when the logging capability is advertised
  server.server.setRequestHandler(SetLevelRequestSchema, async (request) => {
    const level = request.params.level;
    logger.setLevel(level);
    void logger.info('mcp', { message: 'Log level changed', level });
    return {};
  });

  return server;
}
