import { z, type ZodType, type ZodTypeDef } from 'zod';
import { fail, failWith, ok, type Result } from '../../core/errors.ts';
import {
  ArtistDetailsSchema,
  DeviceListSchema,
  GenreListSchema,
  PlaylistDetailsSchema,
  PlaylistPageSchema,
  PlaylistTracksPageSchema,
  SearchResultSchema,
  TrackListSchema,
  UserProfileSchema,
  type ArtistDetails,
  type PlayerState,
  type PlaylistDetails,
  type PlaylistPage,
  type PlaylistSummary,
  type PlaylistTracksPage,
  type Queue,
  type SearchItem,
  type SearchResult,
  type SearchType,
  type SlimDevice,
  type SlimTrack,
  type Snapshot,
  type UserProfile,
} from '../../schemas/outputs.ts';
import {
  AlbumCodec,
  ArtistCodec,
  ArtistTopTracksCodec,
  DevicesResponseCodec,
  GenreSeedsResponseCodec,
  MeResponseCodec,
  PlayerStateCodec,
  PlaylistDetailsResponseCodec,
  PlaylistListResponseCodec,
  PlaylistSimplifiedCodec,
  PlaylistTracksResponseCodec,
  QueueResponseCodec,
  RecommendationsResponseCodec,
  SearchResponseCodec,
  SnapshotResponseCodec,
  TrackCodec,
  TracksResponseCodec,
} from '../../types/spotify.codecs.ts';
import { toGatewayError } from '../../utils/http-result.ts';
import { logger } from '../../utils/logger.ts';
import {
  toArtistDetails,
  toPlayerState,
  toPlaylistDetails,
  toPlaylistSummary,
  toSlimAlbum,
  toSlimArtist,
  toSlimPlaylist,
  toSlimTrack,
  toUserProfile,
} from '../../utils/mappers.ts';
import { cacheKey, type CacheParams } from '../cache/cache-key.ts';
import type { CacheClass, CacheTtlTable, ResponseCache } from '../cache/response-cache.ts';
import type { RateLimitHandler, RetryPolicy } from '../rate-limit.ts';
import { isMood, isTunableKey, MOOD_TUNABLES, MOODS } from './moods.ts';
import type { HttpMethod, SpotifyRequester } from './sdk.ts';

/** Cache operation names. Playlist-scoped ones embed the id so they can be dropped as a family. */
export const CacheOps = {
  profile: 'me',
  search: 'search',
  tracks: 'tracks',
  artist: 'artist',
  artistTopTracks: 'artist_top_tracks',
  userPlaylists: 'user_playlists',
  playlist: (id: string) => `playlist:${id}`,
  playlistTracks: (id: string) => `playlist_tracks:${id}`,
  devices: 'devices',
  genres: 'genres',
  recommendations: 'recommendations',
} as const;

export const MAX_TRACKS_PER_REQUEST = 100;
const MAX_IDS_PER_LOOKUP = 50;
const MAX_SEEDS = 5;

export type RecommendationSeeds = {
  artists?: string[];
  genres?: string[];
  tracks?: string[];
};

export type Tunables = Record<string, number>;

export type RecommendationOptions = {
  limit?: number;
  market?: string;
};

export type MoodRecommendations = {
  mood: string;
  seeds: RecommendationSeeds;
  tunables: Tunables;
  tracks: SlimTrack[];
};

export type PlayOptions = {
  deviceId?: string;
  contextUri?: string;
  uris?: string[];
  offset?: { position?: number; uri?: string };
  positionMs?: number;
};

export type ReorderOptions = {
  rangeStart: number;
  insertBefore: number;
  rangeLength?: number;
  snapshotId?: string;
};

export type CreatePlaylistOptions = {
  name: string;
  description?: string;
  public?: boolean;
};

export type SpotifyGatewayDeps = {
  api: SpotifyRequester;
  cache: ResponseCache;
  rateLimit: RateLimitHandler;
  ttls: CacheTtlTable;
  random?: () => number;
};

type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

const Anything = z.unknown();

function withQuery(path: string, params: Record<string, string | number | boolean | undefined>) {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      search.set(key, String(value));
    }
  }
  const query = search.toString();
  return query ? `${path}?${query}` : path;
}

const segment = (id: string) => encodeURIComponent(id);

function checkRange(label: string, value: number, min: number, max: number): Result<number> {
  if (!Number.isInteger(value) || value < min || value > max) {
    return fail('validation_error', `${label} must be an integer between ${min} and ${max}`);
  }
  return ok(value);
}

/**
 * Every Spotify call goes through here: bearer token via the SDK auth strategy,
 * reads through the response cache, transient failures through the rate limiter,
 * payloads through zod codecs into slim shapes.
 */
export class SpotifyGateway {
  private readonly api: SpotifyRequester;
  private readonly cache: ResponseCache;
  private readonly rateLimit: RateLimitHandler;
  private readonly ttls: CacheTtlTable;
  private readonly random: () => number;

  constructor(deps: SpotifyGatewayDeps) {
    this.api = deps.api;
    this.cache = deps.cache;
    this.rateLimit = deps.rateLimit;
    this.ttls = deps.ttls;
    this.random = deps.random ?? Math.random;
  }

  // ---------------------------------------------------------------------------
  // Profile
  // ---------------------------------------------------------------------------

  getCurrentUser(): Promise<Result<UserProfile>> {
    return this.cached('profile', CacheOps.profile, {}, UserProfileSchema, async () => {
      const me = await this.read('me', MeResponseCodec);
      return me.ok ? ok(toUserProfile(me.value)) : me;
    });
  }

  // ---------------------------------------------------------------------------
  // Catalog
  // ---------------------------------------------------------------------------

  async search(
    query: string,
    types: SearchType[],
    limit = 20,
    offset = 0,
    market?: string,
  ): Promise<Result<SearchResult>> {
    if (!query.trim()) {
      return fail('validation_error', 'Search query must not be empty');
    }
    if (types.length === 0) {
      return fail('validation_error', 'At least one search type is required');
    }
    const limitOk = checkRange('limit', limit, 1, 50);
    if (!limitOk.ok) {
      return limitOk;
    }
    const offsetOk = checkRange('offset', offset, 0, 1000);
    if (!offsetOk.ok) {
      return offsetOk;
    }

    const uniqueTypes = [...new Set(types)].sort();
    const params = { q: query, types: uniqueTypes, limit, offset, market };
    return this.cached('search', CacheOps.search, params, SearchResultSchema, async () => {
      const url = withQuery('search', {
        q: query,
        type: uniqueTypes.join(','),
        limit,
        offset,
        market,
      });
      const response = await this.read(url, SearchResponseCodec);
      if (!response.ok) {
        return response;
      }
      const body = response.value;
      const totals: Record<string, number> = {};
      const items: SearchItem[] = [];

      const collect = <C>(
        type: SearchType,
        block: { items?: unknown[]; total?: number } | undefined,
        codec: Schema<C>,
        map: (value: C) => SearchItem,
      ) => {
        if (!block) {
          return;
        }
        totals[type] = block.total ?? 0;
        for (const raw of block.items ?? []) {
          const parsed = codec.safeParse(raw);
          if (parsed.success) {
            const slim = map(parsed.data);
            if (slim.id && slim.name) {
              items.push(slim);
            }
          }
        }
      };

      collect('track', body.tracks, TrackCodec, toSlimTrack);
      collect('album', body.albums, AlbumCodec, toSlimAlbum);
      collect('artist', body.artists, ArtistCodec, toSlimArtist);
      collect('playlist', body.playlists, PlaylistSimplifiedCodec, toSlimPlaylist);

      return ok({ query, totals, items });
    });
  }

  async getTracks(ids: string[], market?: string): Promise<Result<SlimTrack[]>> {
    const unique = [...new Set(ids.map((id) => id.trim()).filter(Boolean))];
    if (unique.length === 0 || unique.length > MAX_IDS_PER_LOOKUP) {
      return fail('validation_error', `Provide between 1 and ${MAX_IDS_PER_LOOKUP} track ids`);
    }
    const params = { ids: unique, market };
    return this.cached('catalog', CacheOps.tracks, params, TrackListSchema, async () => {
      const response = await this.read(
        withQuery('tracks', { ids: unique.join(','), market }),
        TracksResponseCodec,
      );
      if (!response.ok) {
        return response;
      }
      const tracks: SlimTrack[] = [];
      for (const track of response.value.tracks) {
        if (track) {
          tracks.push(toSlimTrack(track));
        }
      }
      return ok(tracks);
    });
  }

  getArtist(id: string): Promise<Result<ArtistDetails>> {
    if (!id.trim()) {
      return Promise.resolve(fail('validation_error', 'Artist id is required'));
    }
    return this.cached('catalog', CacheOps.artist, { id }, ArtistDetailsSchema, async () => {
      const response = await this.read(`artists/${segment(id)}`, ArtistCodec);
      return response.ok ? ok(toArtistDetails(response.value)) : response;
    });
  }

  getArtistTopTracks(id: string, market = 'US'): Promise<Result<SlimTrack[]>> {
    if (!id.trim()) {
      return Promise.resolve(fail('validation_error', 'Artist id is required'));
    }
    const params = { id, market };
    return this.cached('catalog', CacheOps.artistTopTracks, params, TrackListSchema, async () => {
      const response = await this.read(
        withQuery(`artists/${segment(id)}/top-tracks`, { market }),
        ArtistTopTracksCodec,
      );
      return response.ok ? ok(response.value.tracks.map(toSlimTrack)) : response;
    });
  }

  // ---------------------------------------------------------------------------
  // Playlists
  // ---------------------------------------------------------------------------

  async listUserPlaylists(limit = 20, offset = 0): Promise<Result<PlaylistPage>> {
    const limitOk = checkRange('limit', limit, 1, 50);
    if (!limitOk.ok) {
      return limitOk;
    }
    const params = { limit, offset };
    return this.cached('playlists', CacheOps.userPlaylists, params, PlaylistPageSchema, async () => {
      const response = await this.read(
        withQuery('me/playlists', { limit, offset }),
        PlaylistListResponseCodec,
      );
      if (!response.ok) {
        return response;
      }
      const items: PlaylistSummary[] = [];
      for (const playlist of response.value.items ?? []) {
        if (playlist) {
          items.push(toPlaylistSummary(playlist));
        }
      }
      return ok({
        items,
        total: response.value.total ?? items.length,
        limit: response.value.limit ?? limit,
        offset: response.value.offset ?? offset,
      });
    });
  }

  getPlaylist(id: string): Promise<Result<PlaylistDetails>> {
    if (!id.trim()) {
      return Promise.resolve(fail('validation_error', 'Playlist id is required'));
    }
    return this.cached('playlists', CacheOps.playlist(id), {}, PlaylistDetailsSchema, async () => {
      const response = await this.read(
        withQuery(`playlists/${segment(id)}`, {
          fields:
            'id,name,description,uri,external_urls,public,owner(id,display_name),images,tracks(total),snapshot_id',
        }),
        PlaylistDetailsResponseCodec,
      );
      return response.ok ? ok(toPlaylistDetails(response.value)) : response;
    });
  }

  async getPlaylistTracks(id: string, limit = 20, offset = 0): Promise<Result<PlaylistTracksPage>> {
    if (!id.trim()) {
      return fail('validation_error', 'Playlist id is required');
    }
    const limitOk = checkRange('limit', limit, 1, 100);
    if (!limitOk.ok) {
      return limitOk;
    }
    const params = { limit, offset };
    return this.cached(
      'playlistTracks',
      CacheOps.playlistTracks(id),
      params,
      PlaylistTracksPageSchema,
      async () => {
        const response = await this.read(
          withQuery(`playlists/${segment(id)}/tracks`, { limit, offset }),
          PlaylistTracksResponseCodec,
        );
        if (!response.ok) {
          return response;
        }
        const items: SlimTrack[] = [];
        for (const item of response.value.items ?? []) {
          if (item.track) {
            items.push(toSlimTrack(item.track));
          }
        }
        return ok({
          items,
          total: response.value.total ?? items.length,
          limit: response.value.limit ?? limit,
          offset: response.value.offset ?? offset,
        });
      },
    );
  }

  /** Never retried: a lost response after a 5xx could mean the playlist already exists. */
  async createPlaylist(options: CreatePlaylistOptions): Promise<Result<PlaylistDetails>> {
    if (!options.name.trim()) {
      return fail('validation_error', 'Playlist name must not be empty');
    }
    const me = await this.getCurrentUser();
    if (!me.ok) {
      return me;
    }
    const created = await this.write(
      'create_playlist',
      'POST',
      `users/${segment(me.value.id)}/playlists`,
      PlaylistDetailsResponseCodec,
      {
        name: options.name,
        description: options.description ?? '',
        public: options.public ?? false,
      },
      'never',
    );
    if (!created.ok) {
      return created;
    }
    await this.cache.invalidatePrefix(CacheOps.userPlaylists);
    const details = toPlaylistDetails(created.value);
    await logger.info('spotify_gateway', {
      message: 'Playlist created',
      playlistId: details.id,
    });
    return ok(details);
  }

  async addTracksToPlaylist(
    id: string,
    uris: string[],
    position?: number,
  ): Promise<Result<Snapshot>> {
    if (!id.trim()) {
      return fail('validation_error', 'Playlist id is required');
    }
    if (uris.length === 0 || uris.length > MAX_TRACKS_PER_REQUEST) {
      return fail(
        'validation_error',
        `Provide between 1 and ${MAX_TRACKS_PER_REQUEST} track URIs per request`,
      );
    }
    if (position !== undefined && (!Number.isInteger(position) || position < 0)) {
      return fail('validation_error', 'position must be a non-negative integer');
    }
    const added = await this.write(
      'add_tracks',
      'POST',
      `playlists/${segment(id)}/tracks`,
      SnapshotResponseCodec,
      position === undefined ? { uris } : { uris, position },
      'throttle_only',
    );
    if (!added.ok) {
      return added;
    }
    await this.invalidatePlaylist(id);
    return ok({ snapshot_id: added.value.snapshot_id });
  }

  async reorderPlaylistTracks(id: string, options: ReorderOptions): Promise<Result<Snapshot>> {
    if (!id.trim()) {
      return fail('validation_error', 'Playlist id is required');
    }
    for (const [label, value] of [
      ['range_start', options.rangeStart],
      ['insert_before', options.insertBefore],
      ['range_length', options.rangeLength ?? 1],
    ] as const) {
      if (!Number.isInteger(value) || value < 0) {
        return fail('validation_error', `${label} must be a non-negative integer`);
      }
    }
    const reordered = await this.write(
      'reorder_tracks',
      'PUT',
      `playlists/${segment(id)}/tracks`,
      SnapshotResponseCodec,
      {
        range_start: options.rangeStart,
        insert_before: options.insertBefore,
        range_length: options.rangeLength ?? 1,
        ...(options.snapshotId ? { snapshot_id: options.snapshotId } : {}),
      },
      'throttle_only',
    );
    if (!reordered.ok) {
      return reordered;
    }
    await this.invalidatePlaylist(id);
    return ok({ snapshot_id: reordered.value.snapshot_id });
  }

  async invalidatePlaylist(id: string): Promise<void> {
    await this.cache.invalidatePrefix(CacheOps.playlistTracks(id));
    await this.cache.invalidatePrefix(CacheOps.playlist(id));
    await this.cache.invalidatePrefix(CacheOps.userPlaylists);
  }

  // ---------------------------------------------------------------------------
  // Player
  // ---------------------------------------------------------------------------

  async getPlayerState(): Promise<Result<PlayerState | null>> {
    const response = await this.read('me/player', PlayerStateCodec.nullable());
    if (!response.ok) {
      return response;
    }
    return ok(response.value ? toPlayerState(response.value) : null);
  }

  listDevices(): Promise<Result<SlimDevice[]>> {
    return this.cached('devices', CacheOps.devices, {}, DeviceListSchema, async () => {
      const response = await this.read('me/player/devices', DevicesResponseCodec);
      return response.ok ? ok(response.value.devices) : response;
    });
  }

  async getQueue(): Promise<Result<Queue>> {
    const response = await this.read('me/player/queue', QueueResponseCodec.nullable());
    if (!response.ok) {
      return response;
    }
    const current = response.value?.currently_playing;
    return ok({
      current: current ? toSlimTrack(current) : null,
      queue: (response.value?.queue ?? []).map(toSlimTrack),
    });
  }

  play(options: PlayOptions = {}): Promise<Result<void>> {
    if (options.contextUri && options.uris?.length) {
      return Promise.resolve(fail('validation_error', 'Use either contextUri or uris, not both'));
    }
    const body = {
      ...(options.contextUri ? { context_uri: options.contextUri } : {}),
      ...(options.uris?.length ? { uris: options.uris } : {}),
      ...(options.offset ? { offset: options.offset } : {}),
      ...(options.positionMs !== undefined ? { position_ms: options.positionMs } : {}),
    };
    return this.control(
      'play',
      'PUT',
      withQuery('me/player/play', { device_id: options.deviceId }),
      'idempotent',
      Object.keys(body).length > 0 ? body : undefined,
    );
  }

  pause(deviceId?: string): Promise<Result<void>> {
    return this.control(
      'pause',
      'PUT',
      withQuery('me/player/pause', { device_id: deviceId }),
      'idempotent',
    );
  }

  next(deviceId?: string): Promise<Result<void>> {
    return this.control(
      'next',
      'POST',
      withQuery('me/player/next', { device_id: deviceId }),
      'throttle_only',
    );
  }

  previous(deviceId?: string): Promise<Result<void>> {
    return this.control(
      'previous',
      'POST',
      withQuery('me/player/previous', { device_id: deviceId }),
      'throttle_only',
    );
  }

  seek(positionMs: number, deviceId?: string): Promise<Result<void>> {
    if (!Number.isInteger(positionMs) || positionMs < 0) {
      return Promise.resolve(fail('validation_error', 'position_ms must be a non-negative integer'));
    }
    return this.control(
      'seek',
      'PUT',
      withQuery('me/player/seek', { position_ms: positionMs, device_id: deviceId }),
      'idempotent',
    );
  }

  setVolume(volumePercent: number, deviceId?: string): Promise<Result<void>> {
    const checked = checkRange('volume_percent', volumePercent, 0, 100);
    if (!checked.ok) {
      return Promise.resolve(checked);
    }
    return this.control(
      'volume',
      'PUT',
      withQuery('me/player/volume', { volume_percent: volumePercent, device_id: deviceId }),
      'idempotent',
    );
  }

  setShuffle(state: boolean, deviceId?: string): Promise<Result<void>> {
    return this.control(
      'shuffle',
      'PUT',
      withQuery('me/player/shuffle', { state, device_id: deviceId }),
      'idempotent',
    );
  }

  setRepeat(state: 'off' | 'track' | 'context', deviceId?: string): Promise<Result<void>> {
    return this.control(
      'repeat',
      'PUT',
      withQuery('me/player/repeat', { state, device_id: deviceId }),
      'idempotent',
    );
  }

  async transferPlayback(deviceId: string, play = false): Promise<Result<void>> {
    if (!deviceId.trim()) {
      return fail('validation_error', 'device_id is required to transfer playback');
    }
    const result = await this.control('transfer', 'PUT', 'me/player', 'idempotent', {
      device_ids: [deviceId],
      play,
    });
    if (result.ok) {
      await this.cache.invalidatePrefix(CacheOps.devices);
    }
    return result;
  }

  addToQueue(uri: string, deviceId?: string): Promise<Result<void>> {
    if (!/^spotify:(track|episode):[A-Za-z0-9]+$/.test(uri)) {
      return Promise.resolve(
        fail('validation_error', 'Queue items must be spotify:track: or spotify:episode: URIs'),
      );
    }
    return this.control(
      'queue',
      'POST',
      withQuery('me/player/queue', { uri, device_id: deviceId }),
      'throttle_only',
    );
  }

  // ---------------------------------------------------------------------------
  // Recommendations
  // ---------------------------------------------------------------------------

  getAvailableGenres(): Promise<Result<string[]>> {
    return this.cached('genres', CacheOps.genres, {}, GenreListSchema, async () => {
      const response = await this.read(
        'recommendations/available-genre-seeds',
        GenreSeedsResponseCodec,
      );
      return response.ok ? ok(response.value.genres) : response;
    });
  }

  async getRecommendations(
    seeds: RecommendationSeeds,
    tunables: Tunables = {},
    options: RecommendationOptions = {},
  ): Promise<Result<SlimTrack[]>> {
    const artists = seeds.artists ?? [];
    const genres = seeds.genres ?? [];
    const tracks = seeds.tracks ?? [];
    const seedCount = artists.length + genres.length + tracks.length;
    if (seedCount === 0 || seedCount > MAX_SEEDS) {
      return fail(
        'validation_error',
        `Recommendations need between 1 and ${MAX_SEEDS} seeds (artists, genres, tracks combined)`,
      );
    }
    for (const [key, value] of Object.entries(tunables)) {
      if (!isTunableKey(key) || !Number.isFinite(value)) {
        return fail('validation_error', `Unsupported tunable attribute: ${key}`);
      }
    }
    const limit = options.limit ?? 20;
    const limitOk = checkRange('limit', limit, 1, 100);
    if (!limitOk.ok) {
      return limitOk;
    }

    const params: CacheParams = {
      seed_artists: [...artists].sort(),
      seed_genres: [...genres].sort(),
      seed_tracks: [...tracks].sort(),
      limit,
      market: options.market,
      ...tunables,
    };
    return this.cached('recommendations', CacheOps.recommendations, params, TrackListSchema, async () => {
      const url = withQuery('recommendations', {
        seed_artists: artists.length ? artists.join(',') : undefined,
        seed_genres: genres.length ? genres.join(',') : undefined,
        seed_tracks: tracks.length ? tracks.join(',') : undefined,
        limit,
        market: options.market,
        ...tunables,
      });
      const response = await this.read(url, RecommendationsResponseCodec);
      return response.ok ? ok(response.value.tracks.map(toSlimTrack)) : response;
    });
  }

  /**
   * Mood presets fill the tunables; caller tunables override them. Without any seed,
   * up to three genres are drawn from the available genre seeds.
   */
  async getRecommendationsByMood(
    mood: string,
    seeds: RecommendationSeeds = {},
    overrides: Tunables = {},
    options: RecommendationOptions = {},
  ): Promise<Result<MoodRecommendations>> {
    const key = mood.trim().toLowerCase();
    if (!isMood(key)) {
      return fail('validation_error', `Unknown mood "${mood}". Available moods: ${MOODS.join(', ')}`);
    }
    const tunables: Tunables = { ...MOOD_TUNABLES[key], ...overrides };

    let resolved = seeds;
    const hasSeeds = Boolean(
      seeds.artists?.length || seeds.genres?.length || seeds.tracks?.length,
    );
    if (!hasSeeds) {
      const genres = await this.getAvailableGenres();
      if (!genres.ok) {
        return genres;
      }
      resolved = { genres: this.sample(genres.value, 3) };
    }

    const tracks = await this.getRecommendations(resolved, tunables, options);
    if (!tracks.ok) {
      return tracks;
    }
    return ok({ mood: key, seeds: resolved, tunables, tracks: tracks.value });
  }

  // ---------------------------------------------------------------------------
  // Cache control
  // ---------------------------------------------------------------------------

  async clearCache(): Promise<Result<void>> {
    await this.cache.clearAll();
    return ok(undefined);
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private sample(pool: string[], count: number): string[] {
    const copy = [...pool];
    const picked: string[] = [];
    while (copy.length > 0 && picked.length < count) {
      const index = Math.floor(this.random() * copy.length);
      picked.push(...copy.splice(index, 1));
    }
    return picked;
  }

  private cached<T>(
    cacheClass: CacheClass,
    operation: string,
    params: CacheParams,
    schema: Schema<T>,
    fetch: () => Promise<Result<T>>,
  ): Promise<Result<T>> {
    return this.cache.getOrFetch(cacheKey(operation, params), this.ttls[cacheClass], fetch, schema);
  }

  private read<T>(url: string, codec: Schema<T>): Promise<Result<T>> {
    const label = `GET ${url.split('?')[0]}`;
    return this.rateLimit.callWithBackoff(
      label,
      () => this.attempt(label, 'GET', url, codec),
      'idempotent',
    );
  }

  private write<T>(
    label: string,
    method: HttpMethod,
    url: string,
    codec: Schema<T>,
    body: unknown,
    policy: RetryPolicy,
  ): Promise<Result<T>> {
    return this.rateLimit.callWithBackoff(
      label,
      () => this.attempt(label, method, url, codec, body),
      policy,
    );
  }

  private async control(
    label: string,
    method: HttpMethod,
    url: string,
    policy: RetryPolicy,
    body?: unknown,
  ): Promise<Result<void>> {
    const result = await this.write(label, method, url, Anything, body, policy);
    return result.ok ? ok(undefined) : result;
  }

  private async attempt<T>(
    label: string,
    method: HttpMethod,
    url: string,
    codec: Schema<T>,
    body?: unknown,
  ): Promise<Result<T>> {
    let raw: unknown;
    try {
      raw = await this.api.makeRequest(method, url, body);
    } catch (error) {
      return failWith(toGatewayError(error, label));
    }
    const parsed = codec.safeParse(raw);
    if (!parsed.success) {
      await logger.warning('spotify_gateway', {
        message: 'Unexpected payload shape',
        call: label,
        issues: parsed.error.issues.slice(0, 3).map((i) => `${i.path.join('.')}: ${i.message}`),
      });
      return fail('upstream_error', `${label}: unexpected response payload`);
    }
    return ok(parsed.data);
  }
}
