import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from 'vitest';
import { z } from 'zod';
import type { CredentialRecord } from '../../auth/token-manager.ts';
import { loadConfig } from '../../config/env.ts';
import { createServices, type Services } from '../../core/services.ts';
import type { CacheEntry } from '../../services/cache/response-cache.ts';
import { SpotifyHttpError, type SpotifyRequester } from '../../services/spotify/sdk.ts';
import { HealthOutput } from '../../schemas/outputs.ts';
import { MemoryKeyValueStore } from '../storage/memory.ts';
import { executeSharedTool, getSharedToolNames } from './registry.ts';
import type { ToolContext, ToolResult } from './types.ts';

const PreviewData = z.object({ data: z.object({ token: z.string() }) });
const Structured = z.object({ ok: z.boolean(), code: z.string().optional() });
const SearchData = z.object({
  data: z.object({
    batches: z.array(
      z.object({ query: z.string(), items: z.array(z.unknown()), code: z.string().optional() }),
    ),
  }),
});

const routes: Record<string, () => unknown> = {
  'GET playlists/pl1': () => ({ id: 'pl1', name: 'Road Trip', uri: 'spotify:playlist:pl1' }),
  'GET tracks': () => ({
    tracks: [{ id: 'a', uri: 'spotify:track:a', name: 'Song a', artists: [{ name: 'Artist' }] }],
  }),
  'POST playlists/pl1/tracks': () => ({ snapshot_id: 'snap1' }),
  'GET search': () => ({
    tracks: {
      items: [{ id: 'j1', uri: 'spotify:track:j1', name: 'Blue', artists: [{ name: 'Artist' }] }],
      total: 1,
    },
  }),
  'GET me/player': () => null,
};

function text(result: ToolResult): string | undefined {
  const first = result.content[0];
  return first?.type === 'text' ? first.text : undefined;
}

describe('shared tools', () => {
  let services: Services;
  let context: ToolContext;
  let makeRequest: Mock<SpotifyRequester['makeRequest']>;
  let cacheStore: MemoryKeyValueStore<CacheEntry>;
  let overrides: Record<string, () => unknown>;

  beforeEach(() => {
    overrides = {};
    cacheStore = new MemoryKeyValueStore<CacheEntry>();
    makeRequest = vi.fn<SpotifyRequester['makeRequest']>(async (method, url) => {
      const route = `${method} ${url.split('?')[0]}`;
      const handler = overrides[route] ?? routes[route];
      if (!handler) {
        throw new SpotifyHttpError('No route', { status: 404 });
      }
      return handler();
    });
    services = createServices(loadConfig({ PLAYLIST_DESCRIPTION_SUFFIX: '' }), {
      credentialStore: new MemoryKeyValueStore<CredentialRecord>(),
      cacheStore,
      requester: { makeRequest },
      sleep: async () => undefined,
    });
    context = { services };
  });

  afterEach(() => {
    services.close();
  });

  it('registers every tool once', () => {
    const names = getSharedToolNames();

    expect(new Set(names).size).toBe(names.length);
    expect(names).toEqual([
      'health',
      'auth_status',
      'search_catalog',
      'spotify_catalog',
      'player_status',
      'spotify_control',
      'spotify_playlist',
      'preview_playlist_change',
      'confirm_playlist_change',
      'spotify_recommendations',
      'clear_cache',
    ]);
  });

  it('reports an unknown tool', async () => {
    const result = await executeSharedTool('nope', {}, context);

    expect(result).toEqual({ content: [{ type: 'text', text: 'Unknown tool: nope' }], isError: true });
  });

  it('refuses to run once the request is cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await executeSharedTool('health', {}, { ...context, signal: controller.signal });

    expect(text(result)).toBe('Operation was cancelled');
    expect(makeRequest).not.toHaveBeenCalled();
  });

  it('turns schema violations into validation errors', async () => {
    const result = await executeSharedTool('spotify_control', { operations: [] }, context);

    expect(result.isError).toBe(true);
    expect(Structured.parse(result.structuredContent)).toEqual({
      ok: false,
      code: 'validation_error',
    });
    expect(text(result)).toMatch(/^Invalid request: Invalid input: operations: /);
  });

  it('points to the sign-in page when not connected', async () => {
    const result = await executeSharedTool('auth_status', {}, context);

    expect(text(result)).toBe(
      'Not connected to Spotify. Open http://127.0.0.1:3000/auth/login to sign in.',
    );
  });

  it('applies a previewed addition only after confirmation, and only once', async () => {
    const preview = await executeSharedTool(
      'preview_playlist_change',
      { action: 'add_tracks', playlist_id: 'pl1', track_uris: ['spotify:track:a'] },
      context,
    );
    expect(preview.isError).toBeUndefined();
    expect(text(preview)).toContain("Add 1 track(s) to 'Road Trip' at the end:");
    expect(makeRequest).not.toHaveBeenCalledWith('POST', expect.anything(), expect.anything());

    const { token } = PreviewData.parse(preview.structuredContent).data;
    const confirmed = await executeSharedTool('confirm_playlist_change', { token }, context);
    const replayed = await executeSharedTool('confirm_playlist_change', { token }, context);

    expect(text(confirmed)).toBe("Added 1 track(s) to 'Road Trip': pl1");
    expect(replayed.isError).toBe(true);
    expect(Structured.parse(replayed.structuredContent).code).toBe('preview_not_found');
    expect(makeRequest.mock.calls.filter(([method]) => method === 'POST')).toHaveLength(1);
  });

  it('discards a preview when asked to cancel', async () => {
    const preview = await executeSharedTool(
      'preview_playlist_change',
      { action: 'create_playlist', name: 'Focus' },
      context,
    );
    const { token } = PreviewData.parse(preview.structuredContent).data;

    const cancelled = await executeSharedTool(
      'confirm_playlist_change',
      { token, cancel: true },
      context,
    );
    const confirmed = await executeSharedTool('confirm_playlist_change', { token }, context);

    expect(text(cancelled)).toBe('Preview discarded. Nothing was changed.');
    expect(Structured.parse(confirmed.structuredContent).code).toBe('preview_not_found');
    expect(makeRequest).not.toHaveBeenCalled();
  });

  it('reports a missing playlist through the envelope', async () => {
    const result = await executeSharedTool(
      'spotify_playlist',
      { action: 'get', playlist_id: 'missing' },
      context,
    );

    expect(result.isError).toBe(true);
    expect(text(result)).toBe('Not found: GET playlists/missing: No route');
  });

  it('keeps per-query errors when only some searches fail', async () => {
    const result = await executeSharedTool(
      'search_catalog',
      { queries: ['blue', ' '], types: ['track'] },
      context,
    );

    expect(result.isError).toBeUndefined();
    const { batches } = SearchData.parse(result.structuredContent).data;
    expect(batches.map((b) => [b.query, b.items.length, b.code])).toEqual([
      ['blue', 1, undefined],
      [' ', 0, 'validation_error'],
    ]);
  });

  it('fails a search only when every query fails', async () => {
    const result = await executeSharedTool(
      'search_catalog',
      { queries: [' ', '  '], types: ['track'] },
      context,
    );

    expect(result.isError).toBe(true);
    expect(text(result)).toBe('Invalid request: Search query must not be empty');
    expect(makeRequest).not.toHaveBeenCalled();
  });

  it('fails the whole player status when one section fails', async () => {
    overrides['GET me/player/devices'] = () => {
      throw new SpotifyHttpError('Insufficient client scope', { status: 403 });
    };

    const result = await executeSharedTool(
      'player_status',
      { include: ['player', 'devices'] },
      context,
    );

    expect(result.isError).toBe(true);
    expect(Structured.parse(result.structuredContent)).toEqual({
      ok: false,
      code: 'permission_denied',
    });
  });

  it('reports ok health while nothing is wrong', async () => {
    const result = await executeSharedTool('health', {}, context);

    expect(HealthOutput.parse(result.structuredContent)).toMatchObject({
      status: 'ok',
      authenticated: false,
      credentialsPersisted: true,
      pendingPreviews: 0,
    });
  });

  it('reports degraded health while Spotify is throttling', async () => {
    overrides['GET artists/x1'] = () => {
      throw new SpotifyHttpError('Too many requests', { status: 429, retryAfterMs: 1 });
    };
    await executeSharedTool('spotify_catalog', { action: 'artist', artist_id: 'x1' }, context);

    const report = await executeSharedTool('health', {}, context);
    const health = HealthOutput.parse(report.structuredContent);

    expect(health.status).toBe('degraded');
    expect(health.rateLimit.consecutiveThrottles).toBe(4);
  });

  it('reports degraded health while the cache store is failing', async () => {
    vi.spyOn(cacheStore, 'set').mockRejectedValue(new Error('disk full'));
    await executeSharedTool('spotify_playlist', { action: 'get', playlist_id: 'pl1' }, context);

    const report = await executeSharedTool('health', {}, context);
    const health = HealthOutput.parse(report.structuredContent);

    expect(health.status).toBe('degraded');
    expect(health.cache).toMatchObject({ storeErrors: 1, storeHealthy: false });
  });
});
