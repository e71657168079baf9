/**
 * Mapper utilities to convert Spotify API responses to slim representations.
 */

import type {
  AlbumCodecType,
  ArtistCodecType,
  MeResponseCodecType,
  PlayerStateCodecType,
  PlaylistDetailsResponseCodecType,
  PlaylistSimplifiedCodecType,
  TrackCodecType,
} from '../types/spotify.codecs.ts';
import type {
  ArtistDetails,
  PlayerState,
  PlaylistDetails,
  PlaylistSummary,
  SlimAlbum,
  SlimArtist,
  SlimDevice,
  SlimPlaylist,
  SlimTrack,
  UserProfile,
} from '../schemas/outputs.ts';

type NamedRef = { name?: string | null };

function names(list: NamedRef[] | undefined): string[] {
  const out: string[] = [];
  for (const item of list ?? []) {
    if (item.name) {
      out.push(item.name);
    }
  }
  return out;
}

export function toSlimTrack(t: TrackCodecType): SlimTrack {
  return {
    type: 'track',
    id: String(t.id ?? ''),
    name: String(t.name ?? ''),
    uri: t.uri ?? undefined,
    url: t.external_urls?.spotify ?? undefined,
    artists: names(t.artists),
    album: t.album?.name ?? undefined,
    duration_ms: t.duration_ms ?? undefined,
  };
}

export function toPlaylistSummary(p: PlaylistSimplifiedCodecType): PlaylistSummary {
  return {
    id: String(p.id ?? ''),
    name: String(p.name ?? ''),
    uri: p.uri ?? undefined,
    url: p.external_urls?.spotify ?? undefined,
    public: typeof p.public === 'boolean' ? p.public : undefined,
    owner_id: p.owner?.id ?? undefined,
    owner_name: p.owner?.display_name ?? undefined,
    image: pickLargestImageUrl(p.images),
    tracks_total: p.tracks?.total ?? undefined,
  };
}

export function toPlaylistDetails(p: PlaylistDetailsResponseCodecType): PlaylistDetails {
  return {
    ...toPlaylistSummary(p),
    description: p.description ?? undefined,
    snapshot_id: p.snapshot_id,
  };
}

type Image = { url?: string; width?: number | null };

function pickLargestImageUrl(images: Image[] | null | undefined): string | undefined {
  if (!images || images.length === 0) {
    return undefined;
  }
  const sorted = [...images].sort((a, b) => (b.width ?? 0) - (a.width ?? 0));
  return sorted[0]?.url || undefined;
}

export function toSlimAlbum(a: AlbumCodecType): SlimAlbum {
  return {
    type: 'album',
    id: String(a.id ?? ''),
    name: String(a.name ?? ''),
    uri: a.uri ?? undefined,
    url: a.external_urls?.spotify ?? undefined,
    artists: names(a.artists),
    release_date: a.release_date ?? undefined,
  };
}

export function toSlimArtist(a: ArtistCodecType): SlimArtist {
  return {
    type: 'artist',
    id: String(a.id ?? ''),
    name: String(a.name ?? ''),
    uri: a.uri ?? undefined,
    url: a.external_urls?.spotify ?? undefined,
  };
}

export function toArtistDetails(a: ArtistCodecType): ArtistDetails {
  return {
    ...toSlimArtist(a),
    genres: a.genres ?? [],
    popularity: a.popularity ?? undefined,
    followers: a.followers?.total ?? undefined,
    image: pickLargestImageUrl(a.images),
  };
}

export function toSlimPlaylist(p: PlaylistSimplifiedCodecType): SlimPlaylist {
  return {
    type: 'playlist',
    id: String(p.id ?? ''),
    name: String(p.name ?? ''),
    uri: p.uri ?? undefined,
    url: p.external_urls?.spotify ?? undefined,
    owner: p.owner?.display_name ?? undefined,
  };
}

export function toUserProfile(me: MeResponseCodecType): UserProfile {
  return {
    id: me.id,
    display_name: me.display_name ?? undefined,
    country: me.country,
    product: me.product,
    url: me.external_urls?.spotify ?? undefined,
  };
}

export function toPlayerState(s: PlayerStateCodecType): PlayerState {
  const device: Partial<SlimDevice> | undefined = s.device
    ? {
        id: s.device.id,
        name: s.device.name,
        type: s.device.type,
        is_active: s.device.is_active,
        volume_percent: s.device.volume_percent,
      }
    : undefined;
  return {
    is_playing: Boolean(s.is_playing),
    shuffle_state: s.shuffle_state,
    repeat_state: s.repeat_state,
    progress_ms: s.progress_ms ?? undefined,
    device,
    context_uri: s.context?.uri ?? undefined,
    current_track: s.item ? toSlimTrack(s.item) : null,
  };
}
