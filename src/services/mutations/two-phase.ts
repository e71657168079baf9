import { fail, failWith, ok, type Result } from '../../core/errors.ts';
import type { PlaylistDetails, SlimTrack, Snapshot } from '../../schemas/outputs.ts';
import { bulletList, describeTrack } from '../../utils/format.ts';
import { logger } from '../../utils/logger.ts';
import { MAX_TRACKS_PER_REQUEST, type SpotifyGateway } from '../spotify/gateway.ts';
import type { PreviewStore } from './preview-store.ts';

export type MutationRequest =
  | {
      kind: 'create_playlist';
      name: string;
      description?: string;
      public?: boolean;
      trackUris?: string[];
    }
  | {
      kind: 'add_tracks';
      playlistId: string;
      trackUris: string[];
      position?: number;
    };

/** A request with every default filled in; this is exactly what confirm will send. */
export type ResolvedMutation =
  | {
      kind: 'create_playlist';
      name: string;
      description: string;
      public: boolean;
      trackUris: string[];
    }
  | {
      kind: 'add_tracks';
      playlistId: string;
      playlistName: string;
      /** Track count when the preview was made, if Spotify reported it. */
      currentTrackCount?: number;
      trackUris: string[];
      position?: number;
    };

export type PreviewOutcome = {
  token: string;
  summary: string;
  expiresAt: number;
  payload: ResolvedMutation;
};

export type ConfirmOutcome = {
  kind: ResolvedMutation['kind'];
  playlist: Pick<PlaylistDetails, 'id' | 'name' | 'uri' | 'url'>;
  snapshotId?: string;
  tracksAdded: number;
};

/** Gateway operations the protocol needs. */
export type PlaylistMutationGateway = Pick<
  SpotifyGateway,
  'getPlaylist' | 'getTracks' | 'createPlaylist' | 'addTracksToPlaylist'
>;

export type TwoPhaseDeps = {
  gateway: PlaylistMutationGateway;
  previews: PreviewStore<ResolvedMutation>;
  descriptionSuffix: string;
};

const TRACK_URI = /^spotify:track:([A-Za-z0-9]+)$/;

export function withDescriptionSuffix(description: string | undefined, suffix: string): string {
  const base = (description ?? '').trim();
  const tag = suffix.trim();
  if (!tag || base.endsWith(tag)) {
    return base;
  }
  return base ? `${base}${suffix}` : tag;
}

function validateTrackUris(uris: string[], required: boolean): Result<string[]> {
  if (required && uris.length === 0) {
    return fail('validation_error', 'At least one track URI is required');
  }
  if (uris.length > MAX_TRACKS_PER_REQUEST) {
    return fail(
      'validation_error',
      `At most ${MAX_TRACKS_PER_REQUEST} tracks can be added in one change (got ${uris.length})`,
    );
  }
  const bad = uris.filter((uri) => !TRACK_URI.test(uri));
  if (bad.length > 0) {
    return fail('validation_error', `Not Spotify track URIs: ${bad.slice(0, 5).join(', ')}`);
  }
  return ok(uris);
}

/**
 * Preview → confirm protocol for playlist writes.
 *
 * `preview` only reads from Spotify. `confirm` consumes the token before writing, so a
 * token yields at most one mutation even when confirmed twice concurrently.
 */
export class TwoPhaseMutations {
  private readonly gateway: PlaylistMutationGateway;
  private readonly previews: PreviewStore<ResolvedMutation>;
  private readonly descriptionSuffix: string;

  constructor(deps: TwoPhaseDeps) {
    this.gateway = deps.gateway;
    this.previews = deps.previews;
    this.descriptionSuffix = deps.descriptionSuffix;
  }

  async preview(request: MutationRequest): Promise<Result<PreviewOutcome>> {
    this.previews.sweep();
    const resolved = await this.resolve(request);
    if (!resolved.ok) {
      return resolved;
    }
    const { payload, tracks } = resolved.value;

    const pending = this.previews.put(payload, this.summarize(payload, tracks));
    await logger.info('two_phase', {
      message: 'Preview created',
      kind: payload.kind,
      tracks: payload.trackUris.length,
      expiresAt: pending.expiresAt,
    });
    return ok({
      token: pending.token,
      summary: pending.summary,
      expiresAt: pending.expiresAt,
      payload,
    });
  }

  async confirm(token: string): Promise<Result<ConfirmOutcome>> {
    this.previews.sweep();
    const pending = this.previews.take(token);
    if (!pending) {
      return fail('preview_not_found', 'Preview token is unknown, expired, or already used');
    }
    const payload = pending.payload;

    const outcome =
      payload.kind === 'create_playlist'
        ? await this.confirmCreate(payload)
        : await this.confirmAdd(payload);

    await logger.info('two_phase', {
      message: outcome.ok ? 'Preview confirmed' : 'Confirmed mutation failed',
      kind: payload.kind,
      ...(outcome.ok ? {} : { error: outcome.error.kind }),
    });
    return outcome;
  }

  discard(token: string): boolean {
    return this.previews.discard(token);
  }

  sweep(): number {
    return this.previews.sweep();
  }

  get pendingCount(): number {
    return this.previews.size;
  }

  private async resolve(
    request: MutationRequest,
  ): Promise<Result<{ payload: ResolvedMutation; tracks: SlimTrack[] }>> {
    if (request.kind === 'create_playlist') {
      const name = request.name.trim();
      if (!name) {
        return fail('validation_error', 'Playlist name must not be empty');
      }
      const uris = validateTrackUris(request.trackUris ?? [], false);
      if (!uris.ok) {
        return uris;
      }
      const tracks = await this.lookupTracks(uris.value);
      if (!tracks.ok) {
        return tracks;
      }
      const payload: ResolvedMutation = {
        kind: 'create_playlist',
        name,
        description: withDescriptionSuffix(request.description, this.descriptionSuffix),
        public: request.public ?? false,
        trackUris: uris.value,
      };
      return ok({ payload, tracks: tracks.value });
    }

    if (!request.playlistId.trim()) {
      return fail('validation_error', 'Playlist id is required');
    }
    const uris = validateTrackUris(request.trackUris, true);
    if (!uris.ok) {
      return uris;
    }
    if (
      request.position !== undefined &&
      (!Number.isInteger(request.position) || request.position < 0)
    ) {
      return fail('validation_error', 'position must be a non-negative integer');
    }
    const playlist = await this.gateway.getPlaylist(request.playlistId);
    if (!playlist.ok) {
      return playlist;
    }
    const tracks = await this.lookupTracks(uris.value);
    if (!tracks.ok) {
      return tracks;
    }
    const payload: ResolvedMutation = {
      kind: 'add_tracks',
      playlistId: playlist.value.id || request.playlistId,
      playlistName: playlist.value.name,
      ...(playlist.value.tracks_total !== undefined
        ? { currentTrackCount: playlist.value.tracks_total }
        : {}),
      trackUris: uris.value,
      ...(request.position !== undefined ? { position: request.position } : {}),
    };
    return ok({ payload, tracks: tracks.value });
  }

  /** Track details for the summary, fetched in lookup-sized batches. */
  private async lookupTracks(uris: string[]): Promise<Result<SlimTrack[]>> {
    const ids = uris.map((uri) => TRACK_URI.exec(uri)?.[1] ?? '').filter(Boolean);
    const found: SlimTrack[] = [];
    for (let i = 0; i < ids.length; i += 50) {
      const batch = await this.gateway.getTracks(ids.slice(i, i + 50));
      if (!batch.ok) {
        return batch;
      }
      found.push(...batch.value);
    }
    return ok(found);
  }

  private summarize(payload: ResolvedMutation, tracks: SlimTrack[]): string {
    const known = new Map<string | undefined, SlimTrack>(tracks.map((t) => [t.uri, t]));
    const list = bulletList(payload.trackUris, (uri) => {
      const track = known.get(uri);
      return track ? describeTrack(track) : `${uri} (not found in catalog)`;
    });

    if (payload.kind === 'create_playlist') {
      const header =
        `Create ${payload.public ? 'public' : 'private'} playlist '${payload.name}'` +
        (payload.description ? ` with description "${payload.description}"` : '');
      return payload.trackUris.length > 0
        ? `${header} and add ${payload.trackUris.length} track(s):\n${list}`
        : `${header} (no tracks).`;
    }

    const where =
      payload.position !== undefined ? `at position ${payload.position}` : 'at the end';
    const added = payload.trackUris.length;
    const summary = `Add ${added} track(s) to '${payload.playlistName}' ${where}:\n${list}`;
    if (payload.currentTrackCount === undefined) {
      return summary;
    }
    const before = payload.currentTrackCount;
    return `${summary}\nThe playlist has ${before} track(s) now and will have ${before + added} after this change.`;
  }

  private async confirmCreate(
    payload: Extract<ResolvedMutation, { kind: 'create_playlist' }>,
  ): Promise<Result<ConfirmOutcome>> {
    const created = await this.gateway.createPlaylist({
      name: payload.name,
      description: payload.description,
      public: payload.public,
    });
    if (!created.ok) {
      return created;
    }
    const playlist = created.value;
    const summary = { id: playlist.id, name: playlist.name, uri: playlist.uri, url: playlist.url };
    if (payload.trackUris.length === 0) {
      const outcome: ConfirmOutcome = {
        kind: 'create_playlist',
        playlist: summary,
        snapshotId: playlist.snapshot_id,
        tracksAdded: 0,
      };
      return ok(outcome);
    }

    const added = await this.gateway.addTracksToPlaylist(playlist.id, payload.trackUris);
    if (!added.ok) {
      return failWith({
        ...added.error,
        message: `Playlist ${playlist.id} was created but adding tracks failed: ${added.error.message}`,
      });
    }
    return ok(this.addedOutcome('create_playlist', summary, added.value, payload.trackUris));
  }

  private async confirmAdd(
    payload: Extract<ResolvedMutation, { kind: 'add_tracks' }>,
  ): Promise<Result<ConfirmOutcome>> {
    const added = await this.gateway.addTracksToPlaylist(
      payload.playlistId,
      payload.trackUris,
      payload.position,
    );
    if (!added.ok) {
      return added;
    }
    return ok(
      this.addedOutcome(
        'add_tracks',
        { id: payload.playlistId, name: payload.playlistName },
        added.value,
        payload.trackUris,
      ),
    );
  }

  private addedOutcome(
    kind: ResolvedMutation['kind'],
    playlist: ConfirmOutcome['playlist'],
    snapshot: Snapshot,
    uris: string[],
  ): ConfirmOutcome {
    return { kind, playlist, snapshotId: snapshot.snapshot_id, tracksAdded: uris.length };
  }
}
