import { toolsMetadata } from '../../config/metadata.ts';
import { ClearCacheInputSchema } from '../../schemas/inputs.ts';
import { ToolOutputObject } from '../../schemas/outputs.ts';
import { fromResult } from './results.ts';
import { defineTool } from './types.ts';

export const clearCacheTool = defineTool({
  name: toolsMetadata.clear_cache.name,
  title: toolsMetadata.clear_cache.title,
  description: toolsMetadata.clear_cache.description,
  inputSchema: ClearCacheInputSchema,
  outputSchema: ToolOutputObject.shape,
  annotations: {
    title: toolsMetadata.clear_cache.title,
    readOnlyHint: false,
    destructiveHint: false,
    idempotentHint: true,
    openWorldHint: false,
  },

  handler: async (_args, context) => {
    const result = await context.services.gateway.clearCache();
    return fromResult('clear_cache', result, context, () => 'Response cache cleared.');
  },
});
