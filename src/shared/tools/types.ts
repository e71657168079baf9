import type { CallToolResult, ToolAnnotations } from '@modelcontextprotocol/sdk/types.js';
import type { z, ZodObject, ZodRawShape } from 'zod';
import type { Services } from '../../core/services.ts';

export type ToolResult = CallToolResult;

export interface ToolContext {
  services: Services;
  sessionId?: string;
  requestId?: string;
  signal?: AbortSignal;
}

export interface SharedToolDefinition<Shape extends ZodRawShape> {
  name: string;
  title?: string;
  description: string;
  inputSchema: ZodObject<Shape>;
  outputSchema?: ZodRawShape;
  annotations?: ToolAnnotations;
  handler: (args: z.output<ZodObject<Shape>>, context: ToolContext) => Promise<ToolResult>;
}

/** Identity helper that lets the handler's `args` be inferred from `inputSchema`. */
export function defineTool<Shape extends ZodRawShape>(
  definition: SharedToolDefinition<Shape>,
): SharedToolDefinition<Shape> {
  return definition;
}
