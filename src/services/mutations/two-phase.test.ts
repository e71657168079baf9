import { beforeEach, describe, expect, it, vi } from 'vitest';
import { fail, ok } from '../../core/errors.ts';
import type { PlaylistDetails, SlimTrack } from '../../schemas/outputs.ts';
import { PreviewStore } from './preview-store.ts';
import {
  type PlaylistMutationGateway,
  type ResolvedMutation,
  TwoPhaseMutations,
  withDescriptionSuffix,
} from './two-phase.ts';

const SUFFIX = ' (made by gw)';

function track(id: string): SlimTrack {
  return { type: 'track', id, uri: `spotify:track:${id}`, name: `Song ${id}`, artists: ['Artist'] };
}

function fakeGateway() {
  const created: PlaylistDetails = {
    id: 'new1',
    name: 'Focus',
    uri: 'spotify:playlist:new1',
    url: 'https://open.spotify.com/playlist/new1',
    snapshot_id: 'snap0',
  };
  return {
    getPlaylist: vi.fn<PlaylistMutationGateway['getPlaylist']>(async (id) =>
      ok({ id, name: 'Road Trip', uri: `spotify:playlist:${id}` }),
    ),
    getTracks: vi.fn<PlaylistMutationGateway['getTracks']>(async (ids) => ok(ids.map(track))),
    createPlaylist: vi.fn<PlaylistMutationGateway['createPlaylist']>(async (options) =>
      ok({ ...created, name: options.name }),
    ),
    addTracksToPlaylist: vi.fn<PlaylistMutationGateway['addTracksToPlaylist']>(async () =>
      ok({ snapshot_id: 'snap1' }),
    ),
  };
}

describe('withDescriptionSuffix', () => {
  it('appends the suffix once', () => {
    expect(withDescriptionSuffix('Chill', SUFFIX)).toBe('Chill (made by gw)');
    expect(withDescriptionSuffix('Chill (made by gw)', SUFFIX)).toBe('Chill (made by gw)');
  });

  it('uses the bare suffix for an empty description', () => {
    expect(withDescriptionSuffix(undefined, SUFFIX)).toBe('(made by gw)');
    expect(withDescriptionSuffix('   ', SUFFIX)).toBe('(made by gw)');
  });

  it('leaves the description alone when no suffix is configured', () => {
    expect(withDescriptionSuffix(' Chill ', '')).toBe('Chill');
  });
});

describe('TwoPhaseMutations', () => {
  let clock: number;
  let gateway: ReturnType<typeof fakeGateway>;
  let previews: PreviewStore<ResolvedMutation>;
  let mutations: TwoPhaseMutations;

  beforeEach(() => {
    clock = 1_000_000;
    gateway = fakeGateway();
    previews = new PreviewStore<ResolvedMutation>({ ttlMs: 600_000, now: () => clock });
    mutations = new TwoPhaseMutations({ gateway, previews, descriptionSuffix: SUFFIX });
  });

  it('previews an addition without writing anything', async () => {
    const result = await mutations.preview({
      kind: 'add_tracks',
      playlistId: 'pl1',
      trackUris: ['spotify:track:a', 'spotify:track:b'],
    });

    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    expect(result.value.summary).toBe(
      "Add 2 track(s) to 'Road Trip' at the end:\n" +
        '- Song a by Artist — spotify:track:a\n' +
        '- Song b by Artist — spotify:track:b',
    );
    expect(result.value.expiresAt).toBe(clock + 600_000);
    expect(result.value.token).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(gateway.getTracks).toHaveBeenCalledWith(['a', 'b']);
    expect(gateway.addTracksToPlaylist).not.toHaveBeenCalled();
    expect(gateway.createPlaylist).not.toHaveBeenCalled();
    expect(mutations.pendingCount).toBe(1);
  });

  it('shows the track count before and after an addition', async () => {
    gateway.getPlaylist.mockResolvedValueOnce(
      ok({ id: 'pl1', name: 'Road Trip', uri: 'spotify:playlist:pl1', tracks_total: 12 }),
    );

    const result = await mutations.preview({
      kind: 'add_tracks',
      playlistId: 'pl1',
      trackUris: ['spotify:track:a', 'spotify:track:b'],
    });

    expect(result.ok ? result.value.summary : undefined).toBe(
      "Add 2 track(s) to 'Road Trip' at the end:\n" +
        '- Song a by Artist — spotify:track:a\n' +
        '- Song b by Artist — spotify:track:b\n' +
        'The playlist has 12 track(s) now and will have 14 after this change.',
    );
    expect(result.ok ? result.value.payload : undefined).toMatchObject({ currentTrackCount: 12 });
  });

  it('applies a confirmed addition exactly once', async () => {
    const preview = await mutations.preview({
      kind: 'add_tracks',
      playlistId: 'pl1',
      trackUris: ['spotify:track:a'],
      position: 0,
    });
    const token = preview.ok ? preview.value.token : '';

    const first = await mutations.confirm(token);
    const second = await mutations.confirm(token);

    expect(first).toEqual({
      ok: true,
      value: {
        kind: 'add_tracks',
        playlist: { id: 'pl1', name: 'Road Trip' },
        snapshotId: 'snap1',
        tracksAdded: 1,
      },
    });
    expect(second.ok ? undefined : second.error.kind).toBe('preview_not_found');
    expect(gateway.addTracksToPlaylist).toHaveBeenCalledTimes(1);
    expect(gateway.addTracksToPlaylist).toHaveBeenCalledWith('pl1', ['spotify:track:a'], 0);
  });

  it('lets only one of two concurrent confirms through', async () => {
    const preview = await mutations.preview({
      kind: 'add_tracks',
      playlistId: 'pl1',
      trackUris: ['spotify:track:a'],
    });
    const token = preview.ok ? preview.value.token : '';

    const results = await Promise.all([mutations.confirm(token), mutations.confirm(token)]);

    expect(results.filter((r) => r.ok)).toHaveLength(1);
    expect(results.filter((r) => !r.ok && r.error.kind === 'preview_not_found')).toHaveLength(1);
    expect(gateway.addTracksToPlaylist).toHaveBeenCalledTimes(1);
  });

  it('refuses an expired token without writing', async () => {
    const preview = await mutations.preview({
      kind: 'create_playlist',
      name: 'Focus',
    });
    const token = preview.ok ? preview.value.token : '';
    clock += 600_000;

    const result = await mutations.confirm(token);

    expect(result.ok ? undefined : result.error.kind).toBe('preview_not_found');
    expect(gateway.createPlaylist).not.toHaveBeenCalled();
    expect(mutations.pendingCount).toBe(0);
  });

  it('creates a private playlist with the suffixed description and adds its tracks', async () => {
    const preview = await mutations.preview({
      kind: 'create_playlist',
      name: '  Focus  ',
      description: 'Deep work',
      trackUris: ['spotify:track:a', 'spotify:track:b'],
    });
    expect(preview.ok ? preview.value.payload : undefined).toEqual({
      kind: 'create_playlist',
      name: 'Focus',
      description: 'Deep work (made by gw)',
      public: false,
      trackUris: ['spotify:track:a', 'spotify:track:b'],
    });

    const result = await mutations.confirm(preview.ok ? preview.value.token : '');

    expect(gateway.createPlaylist).toHaveBeenCalledWith({
      name: 'Focus',
      description: 'Deep work (made by gw)',
      public: false,
    });
    expect(gateway.addTracksToPlaylist).toHaveBeenCalledWith('new1', [
      'spotify:track:a',
      'spotify:track:b',
    ]);
    expect(result).toEqual({
      ok: true,
      value: {
        kind: 'create_playlist',
        playlist: {
          id: 'new1',
          name: 'Focus',
          uri: 'spotify:playlist:new1',
          url: 'https://open.spotify.com/playlist/new1',
        },
        snapshotId: 'snap1',
        tracksAdded: 2,
      },
    });
  });

  it('names the created playlist when adding its tracks fails', async () => {
    gateway.addTracksToPlaylist.mockResolvedValueOnce(
      fail('rate_limit_exceeded', 'slow down', { status: 429 }),
    );
    const preview = await mutations.preview({
      kind: 'create_playlist',
      name: 'Focus',
      trackUris: ['spotify:track:a'],
    });

    const result = await mutations.confirm(preview.ok ? preview.value.token : '');

    expect(result.ok ? undefined : result.error).toEqual({
      kind: 'rate_limit_exceeded',
      status: 429,
      message: 'Playlist new1 was created but adding tracks failed: slow down',
    });
  });

  it('rejects invalid requests before storing a preview', async () => {
    const notATrack = await mutations.preview({
      kind: 'add_tracks',
      playlistId: 'pl1',
      trackUris: ['spotify:album:x'],
    });
    const empty = await mutations.preview({ kind: 'add_tracks', playlistId: 'pl1', trackUris: [] });
    const tooMany = await mutations.preview({
      kind: 'add_tracks',
      playlistId: 'pl1',
      trackUris: Array.from({ length: 101 }, (_, i) => `spotify:track:t${i}`),
    });
    const unnamed = await mutations.preview({ kind: 'create_playlist', name: '   ' });

    for (const result of [notATrack, empty, tooMany, unnamed]) {
      expect(result.ok ? undefined : result.error.kind).toBe('validation_error');
    }
    expect(mutations.pendingCount).toBe(0);
    expect(gateway.getPlaylist).not.toHaveBeenCalled();
  });

  it('surfaces a missing playlist from the preview lookup', async () => {
    gateway.getPlaylist.mockResolvedValueOnce(fail('not_found', 'Not found', { status: 404 }));

    const result = await mutations.preview({
      kind: 'add_tracks',
      playlistId: 'missing',
      trackUris: ['spotify:track:a'],
    });

    expect(result.ok ? undefined : result.error.kind).toBe('not_found');
    expect(mutations.pendingCount).toBe(0);
  });

  it('looks tracks up in batches of fifty', async () => {
    const uris = Array.from({ length: 75 }, (_, i) => `spotify:track:t${i}`);

    await mutations.preview({ kind: 'add_tracks', playlistId: 'pl1', trackUris: uris });

    expect(gateway.getTracks).toHaveBeenCalledTimes(2);
    expect(gateway.getTracks.mock.calls[0]?.[0]).toHaveLength(50);
    expect(gateway.getTracks.mock.calls[1]?.[0]).toHaveLength(25);
  });

  it('discards a preview on request', async () => {
    const preview = await mutations.preview({ kind: 'create_playlist', name: 'Focus' });
    const token = preview.ok ? preview.value.token : '';

    expect(mutations.discard(token)).toBe(true);
    expect(mutations.discard(token)).toBe(false);
    const result = await mutations.confirm(token);
    expect(result.ok ? undefined : result.error.kind).toBe('preview_not_found');
  });
});
