/**
 * Tool registry. Each definition is stored type-erased behind `run`, which validates
 * the raw arguments against the tool's own schema before calling its typed handler.
 */

import type { ToolAnnotations } from '@modelcontextprotocol/sdk/types.js';
import type { ZodRawShape } from 'zod';
import { errorMessage } from '../../core/errors.ts';
import { logger } from '../../utils/logger.ts';
import { authStatusTool } from './auth-status.ts';
import { clearCacheTool } from './clear-cache.ts';
import { confirmPlaylistChangeTool } from './confirm-playlist-change.ts';
import { healthTool } from './health.ts';
import { playerStatusTool } from './player-status.ts';
import { previewPlaylistChangeTool } from './preview-playlist-change.ts';
import { invalid } from './results.ts';
import { searchCatalogTool } from './search-catalog.ts';
import { spotifyCatalogTool } from './spotify-catalog.ts';
import { spotifyControlTool } from './spotify-control.ts';
import { spotifyPlaylistTool } from './spotify-playlist.ts';
import { spotifyRecommendationsTool } from './spotify-recommendations.ts';
import type { SharedToolDefinition, ToolContext, ToolResult } from './types.ts';

export type { SharedToolDefinition, ToolContext, ToolResult } from './types.ts';
export { defineTool } from './types.ts';

export interface RegisteredTool {
  name: string;
  title?: string;
  description: string;
  inputShape: ZodRawShape;
  outputSchema?: ZodRawShape;
  annotations?: ToolAnnotations;
  run: (args: unknown, context: ToolContext) => Promise<ToolResult>;
}

export function toRegisteredTool<Shape extends ZodRawShape>(
  tool: SharedToolDefinition<Shape>,
): RegisteredTool {
  return {
    name: tool.name,
    title: tool.title,
    description: tool.description,
    inputShape: tool.inputSchema.shape,
    outputSchema: tool.outputSchema,
    annotations: tool.annotations,
    run: async (args, context) => {
      const parsed = tool.inputSchema.safeParse(args ?? {});
      if (!parsed.success) {
        const errors = parsed.error.errors
          .map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`)
          .join(', ');
        return invalid(tool.name, `Invalid input: ${errors}`, context);
      }
      return tool.handler(parsed.data, context);
    },
  };
}

export const sharedTools: RegisteredTool[] = [
  toRegisteredTool(healthTool),
  toRegisteredTool(authStatusTool),
  toRegisteredTool(searchCatalogTool),
  toRegisteredTool(spotifyCatalogTool),
  toRegisteredTool(playerStatusTool),
  toRegisteredTool(spotifyControlTool),
  toRegisteredTool(spotifyPlaylistTool),
  toRegisteredTool(previewPlaylistChangeTool),
  toRegisteredTool(confirmPlaylistChangeTool),
  toRegisteredTool(spotifyRecommendationsTool),
  toRegisteredTool(clearCacheTool),
];

export function getSharedTool(name: string): RegisteredTool | undefined {
  return sharedTools.find((t) => t.name === name);
}

export function getSharedToolNames(): string[] {
  return sharedTools.map((t) => t.name);
}

/**
 * Execute a tool by name. Unexpected exceptions become an `isError` result and are
 * logged; expected failures already arrive as results.
 */
export async function executeSharedTool(
  name: string,
  args: unknown,
  context: ToolContext,
): Promise<ToolResult> {
  const tool = getSharedTool(name);
  if (!tool) {
    return {
      content: [{ type: 'text', text: `Unknown tool: ${name}` }],
      isError: true,
    };
  }

  if (context.signal?.aborted) {
    return {
      content: [{ type: 'text', text: 'Operation was cancelled' }],
      isError: true,
    };
  }

  try {
    return await tool.run(args, context);
  } catch (error) {
    if (context.signal?.aborted) {
      return {
        content: [{ type: 'text', text: 'Operation was cancelled' }],
        isError: true,
      };
    }
    await logger.error('tools', {
      message: 'Tool threw',
      toolName: name,
      error: errorMessage(error),
    });
    return {
      content: [{ type: 'text', text: `Tool error: ${errorMessage(error)}` }],
      isError: true,
    };
  }
}
