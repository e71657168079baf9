import { toolsMetadata } from '../../config/metadata.ts';
import { ConfirmPlaylistChangeInputSchema } from '../../schemas/inputs.ts';
import { ToolOutputObject } from '../../schemas/outputs.ts';
import { fail, fromResult, ok } from './results.ts';
import { defineTool } from './types.ts';

export const confirmPlaylistChangeTool = defineTool({
  name: toolsMetadata.confirm_playlist_change.name,
  title: toolsMetadata.confirm_playlist_change.title,
  description: toolsMetadata.confirm_playlist_change.description,
  inputSchema: ConfirmPlaylistChangeInputSchema,
  outputSchema: ToolOutputObject.shape,
  annotations: {
    title: toolsMetadata.confirm_playlist_change.title,
    readOnlyHint: false,
    destructiveHint: false,
    idempotentHint: false,
    openWorldHint: true,
  },

  handler: async (args, context) => {
    const { mutations } = context.services;

    if (args.cancel) {
      if (!mutations.discard(args.token)) {
        return fail(
          'cancel',
          { kind: 'preview_not_found', message: 'Preview token is unknown, expired, or already used' },
          context,
        );
      }
      return ok('cancel', { token: args.token }, 'Preview discarded. Nothing was changed.');
    }

    const result = await mutations.confirm(args.token);
    return fromResult('confirm', result, context, (outcome) => {
      const link = outcome.playlist.url ?? outcome.playlist.uri ?? outcome.playlist.id;
      if (outcome.kind === 'create_playlist') {
        const tracks = outcome.tracksAdded > 0 ? ` with ${outcome.tracksAdded} track(s)` : '';
        return `Created playlist '${outcome.playlist.name}'${tracks}: ${link}`;
      }
      return `Added ${outcome.tracksAdded} track(s) to '${outcome.playlist.name}': ${link}`;
    });
  },
});
