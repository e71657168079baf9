import { toolsMetadata } from '../../config/metadata.ts';
import { SpotifyRecommendationsInputSchema } from '../../schemas/inputs.ts';
import { ToolOutputObject } from '../../schemas/outputs.ts';
import type { RecommendationSeeds } from '../../services/spotify/gateway.ts';
import { MOODS } from '../../services/spotify/moods.ts';
import { bulletList, describeTrack } from '../../utils/format.ts';
import { fromResult, invalid } from './results.ts';
import { defineTool } from './types.ts';

export const spotifyRecommendationsTool = defineTool({
  name: toolsMetadata.spotify_recommendations.name,
  title: toolsMetadata.spotify_recommendations.title,
  description: toolsMetadata.spotify_recommendations.description,
  inputSchema: SpotifyRecommendationsInputSchema,
  outputSchema: ToolOutputObject.shape,
  annotations: {
    title: toolsMetadata.spotify_recommendations.title,
    readOnlyHint: true,
    openWorldHint: true,
  },

  handler: async (args, context) => {
    const { gateway } = context.services;
    const seeds: RecommendationSeeds = {
      artists: args.seed_artists,
      genres: args.seed_genres,
      tracks: args.seed_tracks,
    };
    const options = { limit: args.limit, market: args.market };

    switch (args.action) {
      case 'genres': {
        const result = await gateway.getAvailableGenres();
        return fromResult(
          args.action,
          result,
          context,
          (genres) => `${genres.length} seed genres: ${genres.join(', ')}`,
        );
      }
      case 'by_seed': {
        const result = await gateway.getRecommendations(seeds, args.tunables, options);
        return fromResult(args.action, result, context, (tracks) =>
          tracks.length > 0
            ? `Recommended ${tracks.length} track(s):\n${bulletList(tracks, describeTrack)}`
            : 'No recommendations for those seeds.',
        );
      }
      case 'by_mood': {
        if (!args.mood) {
          return invalid(
            args.action,
            `mood is required for by_mood. Available moods: ${MOODS.join(', ')}`,
            context,
          );
        }
        const result = await gateway.getRecommendationsByMood(
          args.mood,
          seeds,
          args.tunables,
          options,
        );
        return fromResult(args.action, result, context, (rec) => {
          const seedText = rec.seeds.genres?.length
            ? ` (genres: ${rec.seeds.genres.join(', ')})`
            : '';
          return rec.tracks.length > 0
            ? `${rec.tracks.length} track(s) for a ${rec.mood} mood${seedText}:\n${bulletList(rec.tracks, describeTrack)}`
            : `No recommendations for a ${rec.mood} mood${seedText}.`;
        });
      }
    }
  },
});
