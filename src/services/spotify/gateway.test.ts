import { describe, expect, it, vi } from 'vitest';
import type { ErrorKind } from '../../core/errors.ts';
import { MemoryKeyValueStore } from '../../shared/storage/memory.ts';
import { type CacheEntry, DEFAULT_CACHE_TTLS, ResponseCache } from '../cache/response-cache.ts';
import { RateLimitHandler } from '../rate-limit.ts';
import { SpotifyGateway } from './gateway.ts';
import { MOOD_TUNABLES } from './moods.ts';
import { SpotifyHttpError, type SpotifyRequester } from './sdk.ts';

type Routes = Record<string, (body: unknown) => unknown>;

function setup(routes: Routes, random: () => number = () => 0) {
  const makeRequest = vi.fn<SpotifyRequester['makeRequest']>(async (method, url, body) => {
    const handler = routes[`${method} ${url.split('?')[0]}`];
    if (!handler) {
      throw new SpotifyHttpError('No route', { status: 404 });
    }
    return handler(body);
  });
  const cache = new ResponseCache({
    store: new MemoryKeyValueStore<CacheEntry>(),
    now: () => 0,
  });
  const rateLimit = new RateLimitHandler({
    baseDelayMs: 1,
    maxDelayMs: 1,
    maxAttempts: 3,
    sleep: async () => undefined,
  });
  const gateway = new SpotifyGateway({
    api: { makeRequest },
    cache,
    rateLimit,
    ttls: DEFAULT_CACHE_TTLS,
    random,
  });
  const callsTo = (route: string) =>
    makeRequest.mock.calls.filter(([method, url]) => `${method} ${url.split('?')[0]}` === route);
  return { gateway, makeRequest, callsTo };
}

const httpError = (status: number, message: string, reason?: string) => () => {
  throw new SpotifyHttpError(message, { status, reason });
};

const trackJson = (id: string) => ({
  id,
  uri: `spotify:track:${id}`,
  name: `Song ${id}`,
  artists: [{ name: 'Artist' }],
});

describe('SpotifyGateway reads', () => {
  it('maps and caches track lookups', async () => {
    const { gateway, makeRequest } = setup({
      'GET tracks': () => ({ tracks: [trackJson('a'), null, trackJson('b')] }),
    });

    const first = await gateway.getTracks(['a', 'b', 'a']);
    const second = await gateway.getTracks(['a', 'b']);

    expect(first).toEqual({
      ok: true,
      value: [
        { type: 'track', id: 'a', uri: 'spotify:track:a', name: 'Song a', artists: ['Artist'] },
        { type: 'track', id: 'b', uri: 'spotify:track:b', name: 'Song b', artists: ['Artist'] },
      ],
    });
    expect(second).toEqual(first);
    expect(makeRequest).toHaveBeenCalledTimes(1);
    expect(makeRequest).toHaveBeenCalledWith('GET', 'tracks?ids=a%2Cb', undefined);
  });

  it('rejects an empty search before calling Spotify', async () => {
    const { gateway, makeRequest } = setup({});

    const result = await gateway.search('  ', ['track']);

    expect(result.ok ? undefined : result.error.kind).toBe('validation_error');
    expect(makeRequest).not.toHaveBeenCalled();
  });

  it('returns null player state when nothing is playing', async () => {
    const { gateway } = setup({ 'GET me/player': () => null });

    expect(await gateway.getPlayerState()).toEqual({ ok: true, value: null });
  });

  it('reports a payload that does not match the expected shape', async () => {
    const { gateway } = setup({ 'GET me/player/devices': () => ({ devices: 'none' }) });

    const result = await gateway.listDevices();

    expect(result).toEqual({
      ok: false,
      error: { kind: 'upstream_error', message: 'GET me/player/devices: unexpected response payload' },
    });
  });

  it('retries a throttled read and then succeeds', async () => {
    let calls = 0;
    const { gateway, callsTo } = setup({
      'GET recommendations/available-genre-seeds': () => {
        calls++;
        if (calls === 1) {
          throw new SpotifyHttpError('Too many requests', { status: 429, retryAfterMs: 1 });
        }
        return { genres: ['jazz'] };
      },
    });

    expect(await gateway.getAvailableGenres()).toEqual({ ok: true, value: ['jazz'] });
    expect(callsTo('GET recommendations/available-genre-seeds')).toHaveLength(2);
  });
});

describe('SpotifyGateway error classification', () => {
  const cases: Array<[number, string, string | undefined, ErrorKind]> = [
    [401, 'The access token expired', undefined, 'authentication_required'],
    [403, 'Player command failed: Premium required', 'PREMIUM_REQUIRED', 'plan_restricted'],
    [403, 'Insufficient client scope', undefined, 'permission_denied'],
    [404, 'Non existing id', undefined, 'not_found'],
    [400, 'Invalid id', undefined, 'validation_error'],
    [418, 'Teapot', undefined, 'upstream_error'],
  ];

  it.each(cases)('maps HTTP %i to %s', async (status, message, reason, kind) => {
    const { gateway, callsTo } = setup({ 'GET artists/x1': httpError(status, message, reason) });

    const result = await gateway.getArtist('x1');

    expect(result).toEqual({
      ok: false,
      error: { kind, message: `GET artists/x1: ${message}`, status, reason },
    });
    expect(callsTo('GET artists/x1')).toHaveLength(1);
  });

  it('retries an unavailable read up to the attempt limit', async () => {
    const { gateway, callsTo } = setup({ 'GET me': httpError(503, 'Service unavailable') });

    const result = await gateway.getCurrentUser();

    expect(result.ok ? undefined : result.error).toMatchObject({
      kind: 'upstream_unavailable',
      status: 503,
      attempts: 3,
    });
    expect(callsTo('GET me')).toHaveLength(3);
  });

  it('does not retry a failed playlist creation', async () => {
    const { gateway, callsTo } = setup({
      'GET me': () => ({ id: 'user1' }),
      'POST users/user1/playlists': httpError(502, 'Bad gateway'),
    });

    const result = await gateway.createPlaylist({ name: 'Focus' });

    expect(result.ok ? undefined : result.error.kind).toBe('upstream_unavailable');
    expect(callsTo('POST users/user1/playlists')).toHaveLength(1);
  });

  it('does not retry an unavailable track addition', async () => {
    const { gateway, callsTo } = setup({
      'POST playlists/pl1/tracks': httpError(503, 'Service unavailable'),
    });

    const result = await gateway.addTracksToPlaylist('pl1', ['spotify:track:a']);

    expect(result.ok ? undefined : result.error.kind).toBe('upstream_unavailable');
    expect(callsTo('POST playlists/pl1/tracks')).toHaveLength(1);
  });
});

describe('SpotifyGateway writes', () => {
  it('creates a private playlist for the current user', async () => {
    const { gateway, makeRequest } = setup({
      'GET me': () => ({ id: 'user1', display_name: 'Test User' }),
      'POST users/user1/playlists': () => ({
        id: 'pl9',
        name: 'Focus',
        uri: 'spotify:playlist:pl9',
        external_urls: { spotify: 'https://open.spotify.com/playlist/pl9' },
        snapshot_id: 'snap0',
      }),
    });

    const result = await gateway.createPlaylist({ name: 'Focus', description: 'Deep work' });

    expect(makeRequest).toHaveBeenLastCalledWith('POST', 'users/user1/playlists', {
      name: 'Focus',
      description: 'Deep work',
      public: false,
    });
    expect(result.ok ? result.value : undefined).toMatchObject({
      id: 'pl9',
      url: 'https://open.spotify.com/playlist/pl9',
      snapshot_id: 'snap0',
    });
  });

  it('drops cached reads of a playlist after adding tracks to it', async () => {
    const page = () => ({ items: [{ track: trackJson('a') }], total: 1, limit: 20, offset: 0 });
    const { gateway, callsTo } = setup({
      'GET playlists/pl1/tracks': page,
      'GET playlists/pl2/tracks': page,
      'POST playlists/pl1/tracks': () => ({ snapshot_id: 'snap2' }),
    });

    await gateway.getPlaylistTracks('pl1');
    await gateway.getPlaylistTracks('pl2');
    await gateway.getPlaylistTracks('pl1');
    expect(callsTo('GET playlists/pl1/tracks')).toHaveLength(1);

    const added = await gateway.addTracksToPlaylist('pl1', ['spotify:track:b'], 0);
    await gateway.getPlaylistTracks('pl1');
    await gateway.getPlaylistTracks('pl2');

    expect(added).toEqual({ ok: true, value: { snapshot_id: 'snap2' } });
    expect(callsTo('POST playlists/pl1/tracks')[0]?.[2]).toEqual({
      uris: ['spotify:track:b'],
      position: 0,
    });
    expect(callsTo('GET playlists/pl1/tracks')).toHaveLength(2);
    expect(callsTo('GET playlists/pl2/tracks')).toHaveLength(1);
  });

  it('validates controls without calling Spotify', async () => {
    const { gateway, makeRequest } = setup({});

    const volume = await gateway.setVolume(101);
    const play = await gateway.play({ contextUri: 'spotify:album:x', uris: ['spotify:track:a'] });
    const queue = await gateway.addToQueue('spotify:album:x');
    const seek = await gateway.seek(-1);

    for (const result of [volume, play, queue, seek]) {
      expect(result.ok ? undefined : result.error.kind).toBe('validation_error');
    }
    expect(makeRequest).not.toHaveBeenCalled();
  });

  it('sends playback controls with the device id in the query', async () => {
    const { gateway, makeRequest } = setup({ 'PUT me/player/volume': () => null });

    const result = await gateway.setVolume(40, 'dev1');

    expect(result).toEqual({ ok: true, value: undefined });
    expect(makeRequest).toHaveBeenCalledWith(
      'PUT',
      'me/player/volume?volume_percent=40&device_id=dev1',
      undefined,
    );
  });

  it('surfaces a premium restriction on playback', async () => {
    const { gateway } = setup({
      'PUT me/player/pause': httpError(403, 'Premium required', 'PREMIUM_REQUIRED'),
    });

    const result = await gateway.pause();

    expect(result.ok ? undefined : result.error.kind).toBe('plan_restricted');
  });
});

describe('SpotifyGateway recommendations', () => {
  it('draws genre seeds for a mood when none are given', async () => {
    const { gateway, callsTo } = setup({
      'GET recommendations/available-genre-seeds': () => ({
        genres: ['ambient', 'jazz', 'piano', 'rock'],
      }),
      'GET recommendations': () => ({ tracks: [trackJson('r1')] }),
    });

    const result = await gateway.getRecommendationsByMood('Focus', {}, { target_energy: 0.1 });

    expect(result.ok ? result.value : undefined).toMatchObject({
      mood: 'focus',
      seeds: { genres: ['ambient', 'jazz', 'piano'] },
      tunables: { ...MOOD_TUNABLES.focus, target_energy: 0.1 },
    });
    const url = new URL(`https://api.test/${callsTo('GET recommendations')[0]?.[1] ?? ''}`);
    expect(url.searchParams.get('seed_genres')).toBe('ambient,jazz,piano');
    expect(url.searchParams.get('target_instrumentalness')).toBe('0.7');
    expect(url.searchParams.get('target_energy')).toBe('0.1');
  });

  it('rejects an unknown mood', async () => {
    const { gateway, makeRequest } = setup({});

    const result = await gateway.getRecommendationsByMood('grumpy');

    expect(result.ok ? undefined : result.error.kind).toBe('validation_error');
    expect(makeRequest).not.toHaveBeenCalled();
  });

  it('rejects too many seeds and unknown tunables', async () => {
    const { gateway } = setup({});

    const seeds = await gateway.getRecommendations({
      artists: ['a1', 'a2', 'a3'],
      genres: ['jazz', 'rock'],
      tracks: ['t1'],
    });
    const tunables = await gateway.getRecommendations({ genres: ['jazz'] }, { loudest: 1 });

    expect(seeds.ok ? undefined : seeds.error.kind).toBe('validation_error');
    expect(tunables.ok ? undefined : tunables.error.message).toBe(
      'Unsupported tunable attribute: loudest',
    );
  });
});
