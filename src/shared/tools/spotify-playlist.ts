/**
 * Spotify Playlist Tool - browse playlists and reorder items.
 * Creating playlists and adding tracks go through the preview/confirm tools.
 */

import { toolsMetadata } from '../../config/metadata.ts';
import { SpotifyPlaylistInputSchema } from '../../schemas/inputs.ts';
import { ToolOutputObject } from '../../schemas/outputs.ts';
import { bulletList, describeTrack } from '../../utils/format.ts';
import { fromResult, invalid } from './results.ts';
import { defineTool } from './types.ts';

export const spotifyPlaylistTool = defineTool({
  name: toolsMetadata.spotify_playlist.name,
  title: toolsMetadata.spotify_playlist.title,
  description: toolsMetadata.spotify_playlist.description,
  inputSchema: SpotifyPlaylistInputSchema,
  outputSchema: ToolOutputObject.shape,
  annotations: {
    title: toolsMetadata.spotify_playlist.title,
    readOnlyHint: false,
    openWorldHint: true,
  },

  handler: async (args, context) => {
    const { gateway } = context.services;
    const { action } = args;

    if (action === 'list_user') {
      const result = await gateway.listUserPlaylists(args.limit ?? 20, args.offset ?? 0);
      return fromResult(action, result, context, (page) => {
        if (page.items.length === 0) {
          return 'No playlists found.';
        }
        const list = bulletList(
          page.items,
          (p) =>
            `${p.name} — ${p.uri ?? p.id}${p.tracks_total !== undefined ? ` (${p.tracks_total} tracks)` : ''}`,
        );
        return `Playlists ${page.offset + 1}-${page.offset + page.items.length} of ${page.total}:\n${list}`;
      });
    }

    const playlistId = args.playlist_id;
    if (!playlistId) {
      return invalid(action, `playlist_id is required for ${action}`, context);
    }

    switch (action) {
      case 'get': {
        const result = await gateway.getPlaylist(playlistId);
        return fromResult(action, result, context, (p) => {
          const owner = p.owner_name ?? p.owner_id;
          return [
            `Playlist '${p.name}'${owner ? ` by ${owner}` : ''}`,
            p.tracks_total !== undefined ? `${p.tracks_total} tracks` : undefined,
            p.public === undefined ? undefined : p.public ? 'public' : 'private',
            p.uri,
          ]
            .filter(Boolean)
            .join(' · ');
        });
      }
      case 'items': {
        const offset = args.offset ?? 0;
        const result = await gateway.getPlaylistTracks(playlistId, args.limit ?? 20, offset);
        return fromResult(action, result, context, (page) =>
          page.items.length > 0
            ? `Tracks ${offset + 1}-${offset + page.items.length} of ${page.total} (play one with context_uri=spotify:playlist:${playlistId} and offset.position):\n${bulletList(
                page.items,
                (track, i) => `#${offset + i} ${describeTrack(track)}`,
              )}`
            : 'No tracks on this page.',
        );
      }
      case 'reorder_items': {
        if (args.range_start === undefined || args.insert_before === undefined) {
          return invalid(action, 'range_start and insert_before are required', context);
        }
        const result = await gateway.reorderPlaylistTracks(playlistId, {
          rangeStart: args.range_start,
          insertBefore: args.insert_before,
          rangeLength: args.range_length,
          snapshotId: args.snapshot_id,
        });
        return fromResult(
          action,
          result,
          context,
          (snapshot) =>
            `Moved ${args.range_length ?? 1} item(s) from ${args.range_start} to before ${args.insert_before}.${
              snapshot.snapshot_id ? ` New snapshot: ${snapshot.snapshot_id}` : ''
            }`,
        );
      }
    }
  },
});
