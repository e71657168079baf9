import { z } from 'zod';

const emptyToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const OptionalString = z.preprocess(emptyToUndefined, z.string().optional());

// Blank numeric values fall back to their default rather than coercing to 0.
const Int = (fallback: number, min = 0, max = Number.MAX_SAFE_INTEGER) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().min(min).max(max).default(fallback));

const Seconds = (fallback: number) => Int(fallback);

export const DEFAULT_SCOPES = [
  'user-library-read',
  'playlist-read-private',
  'playlist-read-collaborative',
  'playlist-modify-private',
  'playlist-modify-public',
  'user-read-playback-state',
  'user-modify-playback-state',
  'user-read-currently-playing',
  'user-read-recently-played',
  'user-top-read',
] as const;

const EnvSchema = z.object({
  PORT: Int(3000, 1, 65535),
  HOST: z.string().default('127.0.0.1'),
  ALLOWED_ORIGINS: z
    .string()
    .default('')
    .transform((v) =>
      v
        .split(',')
        .map((s) => s.trim())
        .filter(Boolean),
    ),
  MCP_TITLE: z.string().default('Spotify Agent Gateway'),
  MCP_VERSION: z.string().default('0.1.0'),
  MCP_INSTRUCTIONS: OptionalString,

  SPOTIFY_CLIENT_ID: OptionalString,
  SPOTIFY_CLIENT_SECRET: OptionalString,
  SPOTIFY_REDIRECT_URI: z.string().url().default('http://127.0.0.1:3000/auth/callback'),
  SPOTIFY_ACCOUNTS_URL: z.string().url().default('https://accounts.spotify.com'),
  OAUTH_SCOPES: z
    .string()
    .default(DEFAULT_SCOPES.join(' '))
    .transform((v) =>
      v
        .split(/[\s,]+/)
        .map((s) => s.trim())
        .filter(Boolean),
    ),

  DATA_DIR: z.string().default('.data'),
  TOKEN_REFRESH_MARGIN_SECONDS: Seconds(60),

  // Response cache TTLs per operation class (seconds)
  CACHE_TTL_SEARCH: Seconds(300),
  CACHE_TTL_CATALOG: Seconds(3600),
  CACHE_TTL_PLAYLISTS: Seconds(3600),
  CACHE_TTL_PLAYLIST_TRACKS: Seconds(3600),
  CACHE_TTL_GENRES: Seconds(86400),
  CACHE_TTL_PROFILE: Seconds(86400),
  CACHE_TTL_RECOMMENDATIONS: Seconds(3600),
  CACHE_TTL_DEVICES: Seconds(30),

  CACHE_SWEEP_INTERVAL_SECONDS: Seconds(300),

  RATE_LIMIT_BASE_DELAY_MS: Int(1000),
  RATE_LIMIT_MAX_DELAY_MS: Int(60_000),
  RATE_LIMIT_MAX_ATTEMPTS: Int(4, 1, 20),

  PREVIEW_TTL_SECONDS: Int(600, 1),
  PLAYLIST_DESCRIPTION_SUFFIX: z.string().default(' (created with Spotify Agent Gateway)'),

  LOG_LEVEL: z.enum(['debug', 'info', 'warning', 'error']).default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Config = Readonly<z.infer<typeof EnvSchema>>;

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  return Object.freeze(EnvSchema.parse(env));
}
