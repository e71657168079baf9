/**
 * Domain shapes returned by the gateway (and cached), plus tool output schemas.
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Slim entities used across outputs
// ---------------------------------------------------------------------------

export const SlimTrackSchema = z.object({
  type: z.literal('track'),
  id: z.string(),
  uri: z.string().optional(),
  name: z.string(),
  artists: z.array(z.string()),
  album: z.string().optional(),
  duration_ms: z.number().optional(),
  url: z.string().optional(),
});
export type SlimTrack = z.infer<typeof SlimTrackSchema>;

export const SlimArtistSchema = z.object({
  type: z.literal('artist'),
  id: z.string(),
  uri: z.string().optional(),
  name: z.string(),
  url: z.string().optional(),
});
export type SlimArtist = z.infer<typeof SlimArtistSchema>;

export const ArtistDetailsSchema = SlimArtistSchema.extend({
  genres: z.array(z.string()),
  popularity: z.number().optional(),
  followers: z.number().optional(),
  image: z.string().optional(),
});
export type ArtistDetails = z.infer<typeof ArtistDetailsSchema>;

export const SlimAlbumSchema = z.object({
  type: z.literal('album'),
  id: z.string(),
  uri: z.string().optional(),
  name: z.string(),
  artists: z.array(z.string()),
  release_date: z.string().optional(),
  url: z.string().optional(),
});
export type SlimAlbum = z.infer<typeof SlimAlbumSchema>;

export const SlimPlaylistSchema = z.object({
  type: z.literal('playlist'),
  id: z.string(),
  uri: z.string().optional(),
  name: z.string(),
  owner: z.string().optional(),
  url: z.string().optional(),
});
export type SlimPlaylist = z.infer<typeof SlimPlaylistSchema>;

export const SlimDeviceSchema = z.object({
  id: z.string().nullable(),
  name: z.string(),
  type: z.string(),
  is_active: z.boolean(),
  volume_percent: z.number().nullable().optional(),
});
export type SlimDevice = z.infer<typeof SlimDeviceSchema>;

export const SearchItemSchema = z.discriminatedUnion('type', [
  SlimTrackSchema,
  SlimAlbumSchema,
  SlimArtistSchema,
  SlimPlaylistSchema,
]);
export type SearchItem = z.infer<typeof SearchItemSchema>;

export const SearchTypeSchema = z.enum(['album', 'artist', 'playlist', 'track']);
export type SearchType = z.infer<typeof SearchTypeSchema>;

export const SearchResultSchema = z.object({
  query: z.string(),
  totals: z.record(z.number()),
  items: z.array(SearchItemSchema),
});
export type SearchResult = z.infer<typeof SearchResultSchema>;

export const UserProfileSchema = z.object({
  id: z.string(),
  display_name: z.string().optional(),
  country: z.string().optional(),
  product: z.string().optional(),
  url: z.string().optional(),
});
export type UserProfile = z.infer<typeof UserProfileSchema>;

export const PlaylistSummarySchema = z.object({
  id: z.string(),
  name: z.string(),
  uri: z.string().optional(),
  url: z.string().optional(),
  public: z.boolean().optional(),
  owner_id: z.string().optional(),
  owner_name: z.string().optional(),
  image: z.string().optional(),
  tracks_total: z.number().optional(),
});
export type PlaylistSummary = z.infer<typeof PlaylistSummarySchema>;

export const PlaylistDetailsSchema = PlaylistSummarySchema.extend({
  description: z.string().optional(),
  snapshot_id: z.string().optional(),
});
export type PlaylistDetails = z.infer<typeof PlaylistDetailsSchema>;

const pageSchema = <T extends z.ZodTypeAny>(item: T) =>
  z.object({
    items: z.array(item),
    total: z.number(),
    limit: z.number(),
    offset: z.number(),
  });

export const PlaylistPageSchema = pageSchema(PlaylistSummarySchema);
export type PlaylistPage = z.infer<typeof PlaylistPageSchema>;

export const PlaylistTracksPageSchema = pageSchema(SlimTrackSchema);
export type PlaylistTracksPage = z.infer<typeof PlaylistTracksPageSchema>;

export const TrackListSchema = z.array(SlimTrackSchema);
export const DeviceListSchema = z.array(SlimDeviceSchema);
export const GenreListSchema = z.array(z.string());

export const PlayerStateSchema = z.object({
  is_playing: z.boolean(),
  shuffle_state: z.boolean().optional(),
  repeat_state: z.enum(['off', 'track', 'context']).optional(),
  progress_ms: z.number().optional(),
  device: SlimDeviceSchema.partial().optional(),
  context_uri: z.string().optional(),
  current_track: SlimTrackSchema.nullable(),
});
export type PlayerState = z.infer<typeof PlayerStateSchema>;

export const QueueSchema = z.object({
  current: SlimTrackSchema.nullable(),
  queue: z.array(SlimTrackSchema),
});
export type Queue = z.infer<typeof QueueSchema>;

export const SnapshotSchema = z.object({ snapshot_id: z.string().optional() });
export type Snapshot = z.infer<typeof SnapshotSchema>;

// ---------------------------------------------------------------------------
// Tool outputs
// ---------------------------------------------------------------------------

export const ErrorCodeSchema = z.enum([
  'authentication_required',
  'refresh_failed',
  'authorization_exchange_failed',
  'rate_limit_exceeded',
  'plan_restricted',
  'permission_denied',
  'not_found',
  'validation_error',
  'preview_not_found',
  'upstream_unavailable',
  'upstream_error',
]);

/** Envelope shared by every tool except `health`. */
export const ToolOutputObject = z.object({
  ok: z.boolean(),
  action: z.string(),
  _msg: z.string().optional(),
  data: z.unknown().optional(),
  error: z.string().optional(),
  code: ErrorCodeSchema.optional(),
});
export type ToolOutputObject = z.infer<typeof ToolOutputObject>;

export const SpotifyControlBatchOutput = z.object({
  _msg: z.string(),
  results: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      action: z.string(),
      ok: z.boolean(),
      note: z.string().optional(),
      device_id: z.string().optional(),
      error: z.string().optional(),
      code: ErrorCodeSchema.optional(),
    }),
  ),
  summary: z.object({ ok: z.number().int(), failed: z.number().int() }),
});
export type SpotifyControlBatchOutput = z.infer<typeof SpotifyControlBatchOutput>;

export const HealthOutput = z.object({
  status: z.enum(['ok', 'degraded']),
  timestamp: z.number(),
  uptime: z.number(),
  authenticated: z.boolean(),
  credentialsPersisted: z.boolean(),
  cache: z.object({
    entries: z.number(),
    hits: z.number(),
    misses: z.number(),
    evicted: z.number(),
    storeErrors: z.number(),
    storeHealthy: z.boolean(),
  }),
  rateLimit: z.object({
    consecutiveThrottles: z.number(),
    lastThrottledAt: z.number().nullable(),
    nextAllowedAt: z.number().nullable(),
  }),
  pendingPreviews: z.number(),
});
export type HealthOutput = z.infer<typeof HealthOutput>;
