import type { ZodType, ZodTypeDef } from 'zod';
import { errorMessage, failWith, ok, type Result } from '../../core/errors.ts';
import type { Config } from '../../config/env.ts';
import type { KeyValueStore } from '../../shared/storage/interface.ts';
import { logger } from '../../utils/logger.ts';
import { operationPrefix } from './cache-key.ts';

export type CacheEntry = {
  payload: unknown;
  insertedAt: number; // epoch ms
  expiresAt: number; // epoch ms
};

/** TTL per operation class, in milliseconds. */
export type CacheTtlTable = {
  search: number;
  catalog: number;
  playlists: number;
  playlistTracks: number;
  genres: number;
  profile: number;
  recommendations: number;
  devices: number;
};

export type CacheClass = keyof CacheTtlTable;

export const DEFAULT_CACHE_TTLS: CacheTtlTable = {
  search: 5 * 60_000,
  catalog: 60 * 60_000,
  playlists: 60 * 60_000,
  playlistTracks: 60 * 60_000,
  genres: 24 * 60 * 60_000,
  profile: 24 * 60 * 60_000,
  recommendations: 60 * 60_000,
  devices: 30_000,
};

export function cacheTtlsFromConfig(config: Config): CacheTtlTable {
  return {
    search: config.CACHE_TTL_SEARCH * 1000,
    catalog: config.CACHE_TTL_CATALOG * 1000,
    playlists: config.CACHE_TTL_PLAYLISTS * 1000,
    playlistTracks: config.CACHE_TTL_PLAYLIST_TRACKS * 1000,
    genres: config.CACHE_TTL_GENRES * 1000,
    profile: config.CACHE_TTL_PROFILE * 1000,
    recommendations: config.CACHE_TTL_RECOMMENDATIONS * 1000,
    devices: config.CACHE_TTL_DEVICES * 1000,
  };
}

export type PayloadSchema<T> = ZodType<T, ZodTypeDef, unknown>;

export type ResponseCacheDeps = {
  store: KeyValueStore<CacheEntry>;
  now?: () => number;
  sweepIntervalMs?: number;
};

export type CacheStats = {
  entries: number;
  inFlight: number;
  hits: number;
  misses: number;
  evicted: number;
  storeErrors: number;
  /** False when the most recent store operation failed. */
  storeHealthy: boolean;
};

/**
 * Read-through cache for upstream responses.
 *
 * Only successful results are stored. Concurrent misses on one key share a single
 * fetch. Any store failure is treated as a miss; the caller still gets the upstream
 * result.
 */
export class ResponseCache {
  private readonly store: KeyValueStore<CacheEntry>;
  private readonly now: () => number;
  private readonly inFlight = new Map<string, Promise<Result<unknown>>>();
  // Bumped by every invalidation so fetches that started earlier do not repopulate.
  private epoch = 0;
  private hits = 0;
  private misses = 0;
  private evicted = 0;
  private storeErrors = 0;
  private storeHealthy = true;
  private readonly sweepIntervalMs: number;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(deps: ResponseCacheDeps) {
    this.store = deps.store;
    this.now = deps.now ?? (() => Date.now());
    this.sweepIntervalMs = deps.sweepIntervalMs ?? 5 * 60_000;
  }

  start(): void {
    if (this.timer || this.sweepIntervalMs <= 0) {
      return;
    }
    this.timer = setInterval(() => {
      void this.sweepExpired();
    }, this.sweepIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  async getOrFetch<T>(
    key: string,
    ttlMs: number,
    fetch: () => Promise<Result<T>>,
    schema: PayloadSchema<T>,
  ): Promise<Result<T>> {
    if (ttlMs <= 0) {
      return fetch();
    }

    const cached = await this.readFresh(key, ttlMs, schema);
    if (cached.hit) {
      this.hits++;
      return ok(cached.value);
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      const shared = await pending;
      if (!shared.ok) {
        return failWith(shared.error);
      }
      const decoded = schema.safeParse(shared.value);
      if (decoded.success) {
        this.hits++;
        return ok(decoded.data);
      }
    }

    this.misses++;
    const startedAt = this.epoch;
    const request = fetch();
    this.inFlight.set(key, request);
    try {
      const result = await request;
      if (result.ok && startedAt === this.epoch) {
        const insertedAt = this.now();
        await this.write(key, {
          payload: result.value,
          insertedAt,
          expiresAt: insertedAt + ttlMs,
        });
      }
      return result;
    } finally {
      if (this.inFlight.get(key) === request) {
        this.inFlight.delete(key);
      }
    }
  }

  async invalidate(key: string): Promise<void> {
    this.epoch++;
    this.inFlight.delete(key);
    try {
      await this.store.delete(key);
      this.storeHealthy = true;
    } catch (error) {
      this.noteStoreError('invalidate', key, error);
    }
  }

  /** Drop every entry of one operation family, e.g. `playlist_tracks:<id>`. */
  async invalidatePrefix(operation: string): Promise<number> {
    this.epoch++;
    const prefix = operationPrefix(operation);
    for (const key of this.inFlight.keys()) {
      if (key.startsWith(prefix)) {
        this.inFlight.delete(key);
      }
    }
    try {
      const keys = await this.store.keys(prefix);
      for (const key of keys) {
        await this.store.delete(key);
      }
      this.storeHealthy = true;
      return keys.length;
    } catch (error) {
      this.noteStoreError('invalidate_prefix', prefix, error);
      return 0;
    }
  }

  async clearAll(): Promise<void> {
    this.epoch++;
    this.inFlight.clear();
    try {
      await this.store.clear();
      this.storeHealthy = true;
      await logger.info('cache', { message: 'Response cache cleared' });
    } catch (error) {
      this.noteStoreError('clear', '*', error);
    }
  }

  /** Remove every entry past its expiry. Returns how many were removed. */
  async sweepExpired(): Promise<number> {
    const now = this.now();
    let removed = 0;
    try {
      for (const key of await this.store.keys()) {
        const entry = await this.store.get(key);
        // Entries written without an expiry are treated as expired.
        if (entry && !(entry.expiresAt > now)) {
          await this.store.delete(key);
          removed++;
        }
      }
      this.storeHealthy = true;
    } catch (error) {
      this.noteStoreError('sweep', '*', error);
    }
    this.evicted += removed;
    if (removed > 0) {
      await logger.debug('cache', { message: 'Expired cache entries removed', removed });
    }
    return removed;
  }

  async stats(): Promise<CacheStats> {
    let entries = 0;
    try {
      entries = (await this.store.keys()).length;
    } catch (error) {
      this.noteStoreError('stats', '*', error);
    }
    return {
      entries,
      inFlight: this.inFlight.size,
      hits: this.hits,
      misses: this.misses,
      evicted: this.evicted,
      storeErrors: this.storeErrors,
      storeHealthy: this.storeHealthy,
    };
  }

  private async readFresh<T>(
    key: string,
    ttlMs: number,
    schema: PayloadSchema<T>,
  ): Promise<{ hit: true; value: T } | { hit: false }> {
    let entry: CacheEntry | null;
    try {
      entry = await this.store.get(key);
      this.storeHealthy = true;
    } catch (error) {
      this.noteStoreError('read', key, error);
      return { hit: false };
    }
    if (!entry) {
      return { hit: false };
    }

    if (entry.insertedAt + ttlMs <= this.now()) {
      try {
        await this.store.delete(key);
        this.evicted++;
      } catch (error) {
        this.noteStoreError('evict', key, error);
      }
      return { hit: false };
    }

    const decoded = schema.safeParse(entry.payload);
    if (!decoded.success) {
      void logger.warning('cache', {
        message: 'Cached payload no longer matches its schema, refetching',
        key,
      });
      return { hit: false };
    }
    return { hit: true, value: decoded.data };
  }

  private async write(key: string, entry: CacheEntry): Promise<void> {
    try {
      await this.store.set(key, entry);
      this.storeHealthy = true;
    } catch (error) {
      this.noteStoreError('write', key, error);
    }
  }

  private noteStoreError(operation: string, key: string, error: unknown): void {
    this.storeErrors++;
    this.storeHealthy = false;
    void logger.warning('cache', {
      message: 'Cache store unavailable, continuing without it',
      operation,
      key,
      error: errorMessage(error),
    });
  }
}
