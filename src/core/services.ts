import { join } from 'node:path';
import { type CredentialRecord, TokenManager } from '../auth/token-manager.ts';
import type { Config } from '../config/env.ts';
import {
  type CacheEntry,
  cacheTtlsFromConfig,
  ResponseCache,
} from '../services/cache/response-cache.ts';
import { PreviewStore } from '../services/mutations/preview-store.ts';
import { type ResolvedMutation, TwoPhaseMutations } from '../services/mutations/two-phase.ts';
import { RateLimitHandler, rateLimitOptionsFromConfig } from '../services/rate-limit.ts';
import { SpotifyGateway } from '../services/spotify/gateway.ts';
import { createSpotifyOAuth, spotifyOAuthOptionsFromConfig } from '../services/spotify/oauth.ts';
import { createSpotifyClient, type SpotifyRequester } from '../services/spotify/sdk.ts';
import { FileKeyValueStore } from '../shared/storage/file.ts';
import type { KeyValueStore } from '../shared/storage/interface.ts';

export interface Services {
  config: Config;
  tokens: TokenManager;
  cache: ResponseCache;
  rateLimit: RateLimitHandler;
  gateway: SpotifyGateway;
  mutations: TwoPhaseMutations;
  /** Where a user signs in; shown in authentication errors. */
  loginUrl: string;
  startedAt: number;
  now: () => number;
  close(): void;
}

export type ServiceOverrides = {
  credentialStore?: KeyValueStore<CredentialRecord>;
  cacheStore?: KeyValueStore<CacheEntry>;
  /** Used for the accounts service and, unless `requester` is given, the Web API. */
  fetch?: typeof fetch;
  requester?: SpotifyRequester;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
};

/** Wire the whole core from configuration. Tests swap any edge via `overrides`. */
export function createServices(config: Config, overrides: ServiceOverrides = {}): Services {
  const now = overrides.now ?? (() => Date.now());

  const oauth = createSpotifyOAuth({
    ...spotifyOAuthOptionsFromConfig(config),
    fetch: overrides.fetch,
  });
  const tokens = new TokenManager({
    store:
      overrides.credentialStore ??
      new FileKeyValueStore<CredentialRecord>(join(config.DATA_DIR, 'credentials.json')),
    oauth,
    refreshMarginMs: config.TOKEN_REFRESH_MARGIN_SECONDS * 1000,
    now,
  });

  const cache = new ResponseCache({
    store:
      overrides.cacheStore ??
      new FileKeyValueStore<CacheEntry>(join(config.DATA_DIR, 'cache.json')),
    now,
    sweepIntervalMs: config.CACHE_SWEEP_INTERVAL_SECONDS * 1000,
  });
  cache.start();
  const rateLimit = new RateLimitHandler({
    ...rateLimitOptionsFromConfig(config),
    sleep: overrides.sleep,
    now,
  });

  const gateway = new SpotifyGateway({
    api: overrides.requester ?? createSpotifyClient(tokens, { fetch: overrides.fetch }),
    cache,
    rateLimit,
    ttls: cacheTtlsFromConfig(config),
    random: overrides.random,
  });

  const previews = new PreviewStore<ResolvedMutation>({
    ttlMs: config.PREVIEW_TTL_SECONDS * 1000,
    now,
  });
  previews.start();
  const mutations = new TwoPhaseMutations({
    gateway,
    previews,
    descriptionSuffix: config.PLAYLIST_DESCRIPTION_SUFFIX,
  });

  return {
    config,
    tokens,
    cache,
    rateLimit,
    gateway,
    mutations,
    loginUrl: new URL('/auth/login', config.SPOTIFY_REDIRECT_URI).toString(),
    startedAt: now(),
    now,
    close: () => {
      previews.stop();
      cache.stop();
    },
  };
}
