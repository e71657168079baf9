import { toolsMetadata } from '../../config/metadata.ts';
import { SpotifyCatalogInputSchema } from '../../schemas/inputs.ts';
import { ToolOutputObject } from '../../schemas/outputs.ts';
import { bulletList, describeTrack } from '../../utils/format.ts';
import { fromResult, invalid } from './results.ts';
import { defineTool } from './types.ts';

export const spotifyCatalogTool = defineTool({
  name: toolsMetadata.spotify_catalog.name,
  title: toolsMetadata.spotify_catalog.title,
  description: toolsMetadata.spotify_catalog.description,
  inputSchema: SpotifyCatalogInputSchema,
  outputSchema: ToolOutputObject.shape,
  annotations: {
    title: toolsMetadata.spotify_catalog.title,
    readOnlyHint: true,
    openWorldHint: true,
  },

  handler: async (args, context) => {
    const { gateway } = context.services;

    switch (args.action) {
      case 'tracks': {
        if (!args.ids?.length) {
          return invalid(args.action, 'ids is required for tracks', context);
        }
        const result = await gateway.getTracks(args.ids, args.market);
        return fromResult(args.action, result, context, (tracks) =>
          tracks.length > 0
            ? `Found ${tracks.length} track(s):\n${bulletList(tracks, describeTrack)}`
            : 'No tracks found for those ids.',
        );
      }
      case 'artist': {
        if (!args.artist_id) {
          return invalid(args.action, 'artist_id is required for artist', context);
        }
        const result = await gateway.getArtist(args.artist_id);
        return fromResult(args.action, result, context, (artist) => {
          const genres = artist.genres.length > 0 ? ` Genres: ${artist.genres.join(', ')}.` : '';
          const followers =
            artist.followers !== undefined ? ` Followers: ${artist.followers}.` : '';
          return `${artist.name}${artist.uri ? ` — ${artist.uri}` : ''}.${genres}${followers}`;
        });
      }
      case 'artist_top_tracks': {
        if (!args.artist_id) {
          return invalid(args.action, 'artist_id is required for artist_top_tracks', context);
        }
        const result = await gateway.getArtistTopTracks(args.artist_id, args.market);
        return fromResult(args.action, result, context, (tracks) =>
          tracks.length > 0
            ? `Top tracks:\n${bulletList(tracks, describeTrack)}`
            : 'No top tracks available in this market.',
        );
      }
    }
  },
});
