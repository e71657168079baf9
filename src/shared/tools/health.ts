import { toolsMetadata } from '../../config/metadata.ts';
import type { Services } from '../../core/services.ts';
import { HealthInputSchema } from '../../schemas/inputs.ts';
import { HealthOutput } from '../../schemas/outputs.ts';
import { defineTool } from './types.ts';

/** Shared by the `health` tool and `GET /health`. */
export async function collectHealth(services: Services): Promise<HealthOutput> {
  const now = services.now();
  const [status, cache] = await Promise.all([
    services.tokens.getStatus(),
    services.cache.stats(),
  ]);
  const rateLimit = services.rateLimit.snapshot();
  const credentialsPersisted = services.tokens.credentialsPersisted;
  const degraded =
    rateLimit.consecutiveThrottles > 0 || !cache.storeHealthy || !credentialsPersisted;

  return {
    status: degraded ? 'degraded' : 'ok',
    timestamp: now,
    uptime: Math.max(0, Math.floor((now - services.startedAt) / 1000)),
    authenticated: status.authenticated,
    credentialsPersisted,
    cache: {
      entries: cache.entries,
      hits: cache.hits,
      misses: cache.misses,
      evicted: cache.evicted,
      storeErrors: cache.storeErrors,
      storeHealthy: cache.storeHealthy,
    },
    rateLimit,
    pendingPreviews: services.mutations.pendingCount,
  };
}

export const healthTool = defineTool({
  name: toolsMetadata.health.name,
  title: toolsMetadata.health.title,
  description: toolsMetadata.health.description,
  inputSchema: HealthInputSchema,
  outputSchema: HealthOutput.shape,
  annotations: {
    title: toolsMetadata.health.title,
    readOnlyHint: true,
    destructiveHint: false,
    idempotentHint: true,
    openWorldHint: false,
  },
  handler: async (_args, context) => {
    const result = await collectHealth(context.services);
    return {
      content: [{ type: 'text', text: JSON.stringify(result) }],
      structuredContent: result,
    };
  },
});
