import { z } from 'zod';

// Basic primitives
const ImageCodec = z.object({
  url: z.string().optional(),
  width: z.number().nullable().optional(),
  height: z.number().nullable().optional(),
});

const ExternalUrlsCodec = z.object({ spotify: z.string().optional() }).optional();

// Track (subset)
export const TrackCodec = z.object({
  id: z.string().nullable().optional(),
  uri: z.string().nullable().optional(),
  name: z.string().nullable().optional(),
  artists: z.array(z.object({ name: z.string().nullable().optional() })).optional(),
  album: z.object({ name: z.string().nullable().optional() }).nullable().optional(),
  duration_ms: z.number().nullable().optional(),
  popularity: z.number().nullable().optional(),
  external_urls: ExternalUrlsCodec,
});
export type TrackCodecType = z.infer<typeof TrackCodec>;

export const TracksResponseCodec = z.object({
  tracks: z.array(TrackCodec.nullable()),
});

export const ArtistTopTracksCodec = z.object({
  tracks: z.array(TrackCodec),
});

// Artists and albums
export const ArtistCodec = z.object({
  id: z.string().optional(),
  name: z.string().optional(),
  uri: z.string().optional(),
  genres: z.array(z.string()).optional(),
  popularity: z.number().nullable().optional(),
  followers: z.object({ total: z.number().nullable().optional() }).nullable().optional(),
  images: z.array(ImageCodec).nullable().optional(),
  external_urls: ExternalUrlsCodec,
});
export type ArtistCodecType = z.infer<typeof ArtistCodec>;

export const AlbumCodec = z.object({
  id: z.string().optional(),
  name: z.string().optional(),
  uri: z.string().optional(),
  release_date: z.string().nullable().optional(),
  artists: z.array(z.object({ name: z.string().nullable().optional() })).optional(),
  external_urls: ExternalUrlsCodec,
});
export type AlbumCodecType = z.infer<typeof AlbumCodec>;

// Devices
export const DeviceCodec = z.object({
  id: z.string().nullable(),
  name: z.string(),
  type: z.string(),
  is_active: z.boolean(),
  volume_percent: z.number().nullable().optional(),
});
export const DevicesResponseCodec = z.object({ devices: z.array(DeviceCodec) });
export type DevicesResponseCodecType = z.infer<typeof DevicesResponseCodec>;

// Player state (GET /me/player); the endpoint answers 204 when nothing is active
export const PlayerStateCodec = z.object({
  is_playing: z.boolean().optional(),
  shuffle_state: z.boolean().optional(),
  repeat_state: z.enum(['off', 'track', 'context']).optional(),
  progress_ms: z.number().nullable().optional(),
  device: DeviceCodec.partial().nullable().optional(),
  context: z.object({ uri: z.string().nullable().optional() }).nullable().optional(),
  item: TrackCodec.nullable().optional(),
});
export type PlayerStateCodecType = z.infer<typeof PlayerStateCodec>;

// Queue
export const QueueResponseCodec = z.object({
  currently_playing: TrackCodec.nullable().optional(),
  queue: z.array(TrackCodec).optional(),
});
export type QueueResponseCodecType = z.infer<typeof QueueResponseCodec>;

// Me
export const MeResponseCodec = z.object({
  id: z.string(),
  display_name: z.string().nullable().optional(),
  country: z.string().optional(),
  product: z.string().optional(),
  external_urls: ExternalUrlsCodec,
});
export type MeResponseCodecType = z.infer<typeof MeResponseCodec>;

// Playlists (simplified)
export const PlaylistOwnerCodec = z
  .object({
    id: z.string().optional(),
    display_name: z.string().nullable().optional(),
  })
  .optional();
export const PlaylistSimplifiedCodec = z.object({
  id: z.string().nullable().optional(),
  name: z.string().nullable().optional(),
  uri: z.string().nullable().optional(),
  external_urls: ExternalUrlsCodec,
  public: z.boolean().nullable().optional(),
  owner: PlaylistOwnerCodec,
  images: z.array(ImageCodec).nullable().optional(),
  tracks: z.object({ total: z.number().nullable().optional() }).nullable().optional(),
  snapshot_id: z.string().optional(),
});
export type PlaylistSimplifiedCodecType = z.infer<typeof PlaylistSimplifiedCodec>;

export const PlaylistListResponseCodec = z.object({
  items: z.array(PlaylistSimplifiedCodec.nullable()).optional(),
  limit: z.number().optional(),
  offset: z.number().optional(),
  total: z.number().optional(),
});
export type PlaylistListResponseCodecType = z.infer<typeof PlaylistListResponseCodec>;

export const PlaylistDetailsResponseCodec = PlaylistSimplifiedCodec.extend({
  description: z.string().nullable().optional(),
});
export type PlaylistDetailsResponseCodecType = z.infer<
  typeof PlaylistDetailsResponseCodec
>;

export const PlaylistTracksItemCodec = z.object({
  added_at: z.string().nullable().optional(),
  track: TrackCodec.nullable().optional(),
});
export const PlaylistTracksResponseCodec = z.object({
  items: z.array(PlaylistTracksItemCodec).optional(),
  limit: z.number().optional(),
  offset: z.number().optional(),
  total: z.number().optional(),
});
export type PlaylistTracksResponseCodecType = z.infer<
  typeof PlaylistTracksResponseCodec
>;

// Snapshot
export const SnapshotResponseCodec = z.object({
  snapshot_id: z.string().optional(),
});
export type SnapshotResponseCodecType = z.infer<typeof SnapshotResponseCodec>;

// Search response (items are parsed one by one so a single odd entry is skipped)
const SearchBlockCodec = z.object({
  items: z.array(z.unknown()).optional(),
  total: z.number().optional(),
});
export const SearchResponseCodec = z.object({
  tracks: SearchBlockCodec.optional(),
  artists: SearchBlockCodec.optional(),
  albums: SearchBlockCodec.optional(),
  playlists: SearchBlockCodec.optional(),
});
export type SearchResponseCodecType = z.infer<typeof SearchResponseCodec>;

// Recommendations
export const GenreSeedsResponseCodec = z.object({ genres: z.array(z.string()) });

export const RecommendationsResponseCodec = z.object({
  tracks: z.array(TrackCodec),
  seeds: z
    .array(
      z.object({
        id: z.string(),
        type: z.string(),
        initialPoolSize: z.number().optional(),
      }),
    )
    .optional(),
});
export type RecommendationsResponseCodecType = z.infer<
  typeof RecommendationsResponseCodec
>;

// Web API error body: { "error": { "status": 403, "message": "...", "reason": "PREMIUM_REQUIRED" } }
export const SpotifyErrorBodyCodec = z.object({
  error: z.object({
    status: z.number().optional(),
    message: z.string().optional(),
    reason: z.string().optional(),
  }),
});

// Spotify Accounts Token response (refresh/access token exchange)
export const SpotifyTokenResponseCodec = z.object({
  access_token: z.string().optional(),
  refresh_token: z.string().optional(),
  expires_in: z.union([z.number(), z.string()]).optional(),
  scope: z.string().optional(),
  token_type: z.string().optional(),
});
export type SpotifyTokenResponseCodecType = z.infer<typeof SpotifyTokenResponseCodec>;
