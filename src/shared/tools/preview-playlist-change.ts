import { toolsMetadata } from '../../config/metadata.ts';
import { PreviewPlaylistChangeInputSchema } from '../../schemas/inputs.ts';
import { ToolOutputObject } from '../../schemas/outputs.ts';
import type { MutationRequest } from '../../services/mutations/two-phase.ts';
import { fromResult, invalid } from './results.ts';
import { defineTool } from './types.ts';

export const previewPlaylistChangeTool = defineTool({
  name: toolsMetadata.preview_playlist_change.name,
  title: toolsMetadata.preview_playlist_change.title,
  description: toolsMetadata.preview_playlist_change.description,
  inputSchema: PreviewPlaylistChangeInputSchema,
  outputSchema: ToolOutputObject.shape,
  annotations: {
    title: toolsMetadata.preview_playlist_change.title,
    readOnlyHint: true,
    openWorldHint: true,
  },

  handler: async (args, context) => {
    let request: MutationRequest;
    if (args.action === 'create_playlist') {
      if (!args.name) {
        return invalid(args.action, 'name is required for create_playlist', context);
      }
      request = {
        kind: 'create_playlist',
        name: args.name,
        description: args.description,
        public: args.public,
        trackUris: args.track_uris,
      };
    } else {
      if (!args.playlist_id) {
        return invalid(args.action, 'playlist_id is required for add_tracks', context);
      }
      request = {
        kind: 'add_tracks',
        playlistId: args.playlist_id,
        trackUris: args.track_uris ?? [],
        position: args.position,
      };
    }

    const result = await context.services.mutations.preview(request);
    return fromResult(
      args.action,
      result,
      context,
      (preview) =>
        `${preview.summary}\n\nNothing has changed yet. Show this to the user; if they agree, call confirm_playlist_change with token ${preview.token} (expires ${new Date(preview.expiresAt).toISOString()}).`,
    );
  },
});
