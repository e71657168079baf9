export const serverMetadata = {
  title: 'Spotify Agent Gateway',
  instructions: `Use these tools to find music, read and control the player, browse playlists, get recommendations, and make playlist changes after the user approves them.

Tools
- auth_status: Check whether Spotify is connected. If not, give the user the login link from the error text.
- search_catalog: Find songs, artists, albums, or playlists. Inputs: queries[], types[album|artist|playlist|track], optional market (2-letter), limit (1-50), offset (0-1000).
- spotify_catalog: Look up tracks by id, an artist, or an artist's top tracks.
- player_status: Read the player, devices, and queue. Use this first to discover device_id before control.
- spotify_control: Batch control with operations[]. action ∈ {play,pause,next,previous,seek,volume,shuffle,repeat,transfer,queue}. Optional parallel=true runs operations concurrently.
- spotify_playlist: Browse playlists and reorder items. action ∈ {list_user,get,items,reorder_items}.
- preview_playlist_change / confirm_playlist_change: Creating a playlist or adding tracks is two steps. Call preview_playlist_change, show the summary to the user, and only after they agree call confirm_playlist_change with the token. Tokens are single-use and expire.
- spotify_recommendations: action ∈ {genres,by_seed,by_mood}. Up to 5 seeds combined.
- clear_cache: Drop cached Spotify responses.
- health: Gateway status, cache and rate limit counters.

Notes
- Never confirm a playlist change the user has not seen.
- Errors carry a code. plan_restricted means Spotify Premium is required; rate_limit_exceeded means wait and retry later.
- Prefer small limits and minimal polling unless asked to do otherwise.`,
} as const;

export const toolsMetadata = {
  health: {
    name: 'health',
    title: 'Gateway Health',
    description:
      'Report gateway status: uptime, whether Spotify is connected, cache counters, rate limit state, and pending previews.',
  },
  auth_status: {
    name: 'auth_status',
    title: 'Spotify Connection Status',
    description:
      'Check whether a Spotify account is connected, token expiry, and granted scopes. Optional include_profile=true also returns the signed-in profile.',
  },
  search_catalog: {
    name: 'search_catalog',
    title: 'Find Music (Catalog Search)',
    description:
      'Search songs, artists, albums, and playlists. Inputs: queries[], types[album|artist|playlist|track], optional market(2 letters), limit(1-50), offset(0-1000). Returns ordered items per query.',
  },
  spotify_catalog: {
    name: 'spotify_catalog',
    title: 'Catalog Lookups',
    description:
      "Look up catalog entries by id. action 'tracks' takes ids[] (1-50), 'artist' and 'artist_top_tracks' take artist_id.",
  },
  player_status: {
    name: 'player_status',
    title: 'Player Status',
    description:
      'Read the current player state (with current track), devices, and queue. Optional include[] selects any of: player, devices, queue. Use this to learn device_id before control.',
  },
  spotify_control: {
    name: 'spotify_control',
    title: 'Control Spotify Playback',
    description:
      "Control Spotify playback: play, pause, next/previous, seek, shuffle, repeat, volume, transfer, and queue. Accepts a batch of operations and returns per-operation results. Optional parallel=true runs operations concurrently.\n\nUsage notes:\n- To play a specific track from a playlist, set 'context_uri' to the playlist URI and 'offset' to { position } or { uri }.\n- Do not provide 'uris' together with 'context_uri' in the same play operation.\n- Most control actions require Spotify Premium.",
  },
  spotify_playlist: {
    name: 'spotify_playlist',
    title: 'Playlists: Browse and Reorder',
    description:
      "Browse the signed-in user's playlists, read one, list its items, and reorder items. Creating playlists and adding tracks go through 'preview_playlist_change'.",
  },
  preview_playlist_change: {
    name: 'preview_playlist_change',
    title: 'Preview Playlist Change',
    description:
      "Prepare a playlist change without applying it. action 'create_playlist' (name, optional description, public, track_uris) or 'add_tracks' (playlist_id, track_uris, optional position). Returns a summary and a single-use token for 'confirm_playlist_change'.",
  },
  confirm_playlist_change: {
    name: 'confirm_playlist_change',
    title: 'Confirm Playlist Change',
    description:
      "Apply a previewed playlist change by token after the user approves it. cancel=true discards the preview instead.",
  },
  spotify_recommendations: {
    name: 'spotify_recommendations',
    title: 'Recommendations',
    description:
      "Get track recommendations. action 'genres' lists seed genres; 'by_seed' uses seed_artists/seed_genres/seed_tracks (1-5 combined) and optional tunables; 'by_mood' uses a mood preset, with seeds optional.",
  },
  clear_cache: {
    name: 'clear_cache',
    title: 'Clear Response Cache',
    description: 'Drop every cached Spotify response. The next reads go to Spotify.',
  },
} as const;
