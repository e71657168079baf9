import { z } from 'zod';
import { SearchTypeSchema } from './outputs.ts';

const Market = z
  .string()
  .length(2)
  .optional()
  .describe('2-letter country code (ISO 3166-1). Returns only content available in that market.');

const TrackUris = z
  .array(z.string().regex(/^spotify:track:[A-Za-z0-9]+$/, 'Expected a spotify:track: URI'))
  .max(100);

// Health / auth / cache
export const HealthInputSchema = z.object({});

export const AuthStatusInputSchema = z.object({
  include_profile: z
    .boolean()
    .optional()
    .describe('Also fetch the signed-in Spotify profile (id, display name, product).'),
});

export const ClearCacheInputSchema = z.object({});

// Search
export const SpotifySearchInputSchema = z.object({
  queries: z
    .array(z.string().min(1))
    .min(1)
    .max(20)
    .describe(
      "Search strings. Pass one or more; each runs separately. Supports field filters like 'track:', 'artist:', 'year:'.",
    ),
  types: z
    .array(SearchTypeSchema)
    .min(1)
    .describe(
      "Item categories to search across. Supported: 'album', 'artist', 'playlist', 'track'.",
    ),
  market: Market,
  limit: z.number().int().min(1).max(50).default(20).describe('Max results per item type (1-50).'),
  offset: z
    .number()
    .int()
    .min(0)
    .max(1000)
    .default(0)
    .describe('Index of first result (0-1000).'),
});
export type SpotifySearchInput = z.infer<typeof SpotifySearchInputSchema>;

// Catalog lookups
export const SpotifyCatalogInputSchema = z.object({
  action: z
    .enum(['tracks', 'artist', 'artist_top_tracks'])
    .describe('tracks: look up track ids; artist: artist details; artist_top_tracks: top tracks.'),
  ids: z.array(z.string().min(1)).max(50).optional().describe('Track ids (tracks).'),
  artist_id: z.string().optional().describe('Artist id (artist, artist_top_tracks).'),
  market: Market,
});
export type SpotifyCatalogInput = z.infer<typeof SpotifyCatalogInputSchema>;

// Status
export const SpotifyStatusInputSchema = z.object({
  include: z
    .array(z.enum(['player', 'devices', 'queue']))
    .default(['player', 'devices'])
    .describe("Which sections to fetch: 'player' (includes the current track), 'devices', 'queue'."),
});
export type SpotifyStatusInput = z.infer<typeof SpotifyStatusInputSchema>;

// Control
export const ControlActionSchema = z.enum([
  'play',
  'pause',
  'next',
  'previous',
  'seek',
  'volume',
  'shuffle',
  'repeat',
  'transfer',
  'queue',
]);
export type ControlAction = z.infer<typeof ControlActionSchema>;

export const ControlOperationSchema = z.object({
  action: ControlActionSchema.describe('Operation to perform.'),
  device_id: z
    .string()
    .optional()
    .describe(
      "Target device. Get via 'player_status' → devices[].id. Required for 'transfer'; optional for others.",
    ),
  position_ms: z
    .number()
    .int()
    .nonnegative()
    .optional()
    .describe('Seek or start playback from this position (milliseconds).'),
  volume_percent: z.number().optional().describe('Volume level 0-100 for volume action.'),
  shuffle: z.boolean().optional().describe('Shuffle on/off for shuffle action.'),
  repeat: z
    .enum(['off', 'track', 'context'])
    .optional()
    .describe('Repeat mode for repeat action.'),
  context_uri: z
    .string()
    .optional()
    .describe(
      "Playback context URI (album/artist/playlist). Mutually exclusive with 'uris'. Use with 'offset' to pick a specific track.",
    ),
  uris: z
    .array(z.string())
    .optional()
    .describe("Track URIs to play directly. Do not provide together with 'context_uri'."),
  offset: z
    .object({
      position: z.number().int().nonnegative().optional(),
      uri: z.string().optional(),
    })
    .optional()
    .describe('Start point within the context: zero-based position or an item URI.'),
  queue_uri: z.string().optional().describe('Item URI to add to the queue (track or episode).'),
  transfer_play: z
    .boolean()
    .optional()
    .describe('When transferring, start playback immediately on the new device.'),
});
export type ControlOperation = z.infer<typeof ControlOperationSchema>;

export const SpotifyControlInputSchema = z.object({
  operations: z.array(ControlOperationSchema).min(1).max(25).describe('Batch of 1-25 operations.'),
  parallel: z
    .boolean()
    .optional()
    .describe(
      'If true, run all operations concurrently. Default is sequential execution in given order.',
    ),
});
export type SpotifyControlInput = z.infer<typeof SpotifyControlInputSchema>;

// Playlist (reads and reordering; writes go through preview/confirm)
export const SpotifyPlaylistInputSchema = z.object({
  action: z
    .enum(['list_user', 'get', 'items', 'reorder_items'])
    .describe('Playlist action: list_user, get, items, reorder_items.'),
  playlist_id: z
    .string()
    .optional()
    .describe('Target playlist ID. Required for get/items/reorder_items.'),
  limit: z
    .number()
    .int()
    .min(1)
    .max(50)
    .optional()
    .describe('Pagination limit (1-50) for list_user/items.'),
  offset: z.number().int().min(0).max(100000).optional().describe('Pagination offset.'),
  range_start: z
    .number()
    .int()
    .nonnegative()
    .optional()
    .describe('Start index of the range to move (reorder_items).'),
  insert_before: z
    .number()
    .int()
    .nonnegative()
    .optional()
    .describe('Insert the range before this index (reorder_items).'),
  range_length: z
    .number()
    .int()
    .positive()
    .optional()
    .describe('Length of the range (default 1) (reorder_items).'),
  snapshot_id: z
    .string()
    .optional()
    .describe('Optional snapshot for concurrency control (reorder_items).'),
});
export type SpotifyPlaylistInput = z.infer<typeof SpotifyPlaylistInputSchema>;

// Two-phase playlist changes
export const PreviewPlaylistChangeInputSchema = z.object({
  action: z
    .enum(['create_playlist', 'add_tracks'])
    .describe('create_playlist: new playlist (optionally with tracks); add_tracks: add to an existing one.'),
  name: z.string().optional().describe('Playlist name (create_playlist).'),
  description: z.string().optional().describe('Playlist description (create_playlist).'),
  public: z
    .boolean()
    .optional()
    .describe('Whether the new playlist is public. Defaults to private (create_playlist).'),
  playlist_id: z.string().optional().describe('Target playlist ID (add_tracks).'),
  track_uris: TrackUris.optional().describe('Up to 100 spotify:track: URIs.'),
  position: z
    .number()
    .int()
    .nonnegative()
    .optional()
    .describe('Insert position; defaults to the end (add_tracks).'),
});
export type PreviewPlaylistChangeInput = z.infer<typeof PreviewPlaylistChangeInputSchema>;

export const ConfirmPlaylistChangeInputSchema = z.object({
  token: z.string().min(1).describe("Token returned by 'preview_playlist_change'."),
  cancel: z
    .boolean()
    .optional()
    .describe('Discard the preview instead of applying it.'),
});
export type ConfirmPlaylistChangeInput = z.infer<typeof ConfirmPlaylistChangeInputSchema>;

// Recommendations
export const SpotifyRecommendationsInputSchema = z.object({
  action: z
    .enum(['genres', 'by_seed', 'by_mood'])
    .describe('genres: list seed genres; by_seed: from seeds; by_mood: from a mood preset.'),
  mood: z.string().optional().describe('Mood name for by_mood, e.g. happy, calm, focus, workout.'),
  seed_artists: z.array(z.string()).max(5).optional().describe('Artist ids.'),
  seed_genres: z.array(z.string()).max(5).optional().describe('Genres from the genres action.'),
  seed_tracks: z.array(z.string()).max(5).optional().describe('Track ids.'),
  tunables: z
    .record(z.number())
    .optional()
    .describe('Audio feature targets such as target_energy, min_tempo, max_valence.'),
  limit: z.number().int().min(1).max(100).optional().describe('Number of tracks (1-100).'),
  market: Market,
});
export type SpotifyRecommendationsInput = z.infer<typeof SpotifyRecommendationsInputSchema>;
