/**
 * Search Catalog Tool - Search Spotify for tracks, albums, artists, and playlists.
 */

import { toolsMetadata } from '../../config/metadata.ts';
import { describeError, type ErrorKind } from '../../core/errors.ts';
import { SpotifySearchInputSchema } from '../../schemas/inputs.ts';
import { ToolOutputObject, type SearchItem } from '../../schemas/outputs.ts';
import { logger } from '../../utils/logger.ts';
import { fail, ok } from './results.ts';
import { defineTool } from './types.ts';

type Batch = {
  inputIndex: number;
  query: string;
  totals: Record<string, number>;
  items: SearchItem[];
  error?: string;
  code?: ErrorKind;
};

const ITEM_PREVIEW_LIMIT = 5;

function buildPreview(batch: Batch): string {
  if (batch.error) {
    return `Search for "${batch.query}" failed: ${batch.error}`;
  }
  if (batch.items.length === 0) {
    return `No results for "${batch.query}".`;
  }
  const lines = batch.items
    .slice(0, ITEM_PREVIEW_LIMIT)
    .map((it) => `- [${it.type}] ${it.name}${it.uri ? ` — ${it.uri}` : ''}`)
    .join('\n');
  const more =
    batch.items.length > ITEM_PREVIEW_LIMIT
      ? `\n… and ${batch.items.length - ITEM_PREVIEW_LIMIT} more`
      : '';
  return `Results for "${batch.query}":\n${lines}${more}`;
}

export const searchCatalogTool = defineTool({
  name: toolsMetadata.search_catalog.name,
  title: toolsMetadata.search_catalog.title,
  description: toolsMetadata.search_catalog.description,
  inputSchema: SpotifySearchInputSchema,
  outputSchema: ToolOutputObject.shape,
  annotations: {
    title: toolsMetadata.search_catalog.title,
    readOnlyHint: true,
    openWorldHint: true,
  },

  handler: async (args, context) => {
    const { gateway, loginUrl } = context.services;

    const outcomes = await Promise.all(
      args.queries.map((query) =>
        gateway.search(query, args.types, args.limit, args.offset, args.market),
      ),
    );

    const firstFailure = outcomes.find((outcome) => !outcome.ok);
    if (firstFailure && !firstFailure.ok && outcomes.every((outcome) => !outcome.ok)) {
      return fail('search', firstFailure.error, context);
    }

    const batches: Batch[] = outcomes.map((outcome, inputIndex) => {
      const query = args.queries[inputIndex] ?? '';
      if (outcome.ok) {
        return { inputIndex, query, totals: outcome.value.totals, items: outcome.value.items };
      }
      return {
        inputIndex,
        query,
        totals: {},
        items: [],
        error: describeError(outcome.error, loginUrl),
        code: outcome.error.kind,
      };
    });

    const failed = batches.filter((b) => b.error);
    if (failed.length > 0) {
      await logger.warning('search_catalog', {
        message: 'Some queries failed',
        failed: failed.map((b) => ({ query: b.query, code: b.code })),
      });
    }

    let msg: string;
    const [only] = batches;
    if (batches.length === 1 && only) {
      msg = buildPreview(only);
    } else {
      const counts = batches.map((b) => `${b.items.length}× "${b.query}"`);
      msg = `Processed ${batches.length} queries — ${counts.join(', ')}.\n\n${batches
        .map(buildPreview)
        .join('\n\n')}`;
    }

    return ok(
      'search',
      {
        queries: args.queries,
        types: args.types,
        limit: args.limit,
        offset: args.offset,
        batches,
      },
      msg,
    );
  },
});
