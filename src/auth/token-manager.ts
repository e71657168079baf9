import { z } from 'zod';
import { errorMessage, fail, ok, type Result } from '../core/errors.ts';
import { SpotifyOAuthError, type SpotifyOAuthClient } from '../services/spotify/oauth.ts';
import type { KeyValueStore } from '../shared/storage/interface.ts';
import type { SpotifyTokenResponseCodecType } from '../types/spotify.codecs.ts';
import { logger } from '../utils/logger.ts';

export const CREDENTIALS_KEY = 'credentials';

export const CredentialRecordSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1),
  expiresAt: z.number(), // epoch ms
  scopes: z.array(z.string()),
  updatedAt: z.number(),
});
export type CredentialRecord = z.infer<typeof CredentialRecordSchema>;

export type AuthStatus = {
  authenticated: boolean;
  expiresAt?: number;
  scopes: string[];
};

export type TokenManagerDeps = {
  store: KeyValueStore<CredentialRecord>;
  oauth: SpotifyOAuthClient;
  refreshMarginMs?: number;
  now?: () => number;
};

/**
 * Owns the single user's Spotify credentials.
 *
 * Concurrent callers that find the access token inside the refresh margin share one
 * refresh exchange.
 */
export class TokenManager {
  private readonly store: KeyValueStore<CredentialRecord>;
  private readonly oauth: SpotifyOAuthClient;
  private readonly refreshMarginMs: number;
  private readonly now: () => number;
  private refreshing: Promise<Result<string>> | null = null;
  // Refreshed credentials the store refused; served and re-saved until a write lands.
  private unsaved: CredentialRecord | null = null;

  constructor(deps: TokenManagerDeps) {
    this.store = deps.store;
    this.oauth = deps.oauth;
    this.refreshMarginMs = deps.refreshMarginMs ?? 60_000;
    this.now = deps.now ?? (() => Date.now());
  }

  async getValidToken(): Promise<Result<string>> {
    const loaded = await this.load();
    if (!loaded.ok) {
      return loaded;
    }
    const record = loaded.value;
    if (!record) {
      return fail('authentication_required', 'No Spotify credentials stored');
    }
    if (record.expiresAt - this.refreshMarginMs > this.now()) {
      return ok(record.accessToken);
    }
    return this.refreshShared(record);
  }

  /** Refresh regardless of the stored expiry, e.g. after the Web API answered 401. */
  async forceRefresh(): Promise<Result<string>> {
    const loaded = await this.load();
    if (!loaded.ok) {
      return loaded;
    }
    if (!loaded.value) {
      return fail('authentication_required', 'No Spotify credentials stored');
    }
    return this.refreshShared(loaded.value);
  }

  /** False while the latest refreshed credentials exist only in memory. */
  get credentialsPersisted(): boolean {
    return this.unsaved === null;
  }

  async completeAuthorization(code: string): Promise<Result<AuthStatus>> {
    let payload: SpotifyTokenResponseCodecType;
    try {
      payload = await this.oauth.exchangeCode(code);
    } catch (error) {
      await logger.error('tokens', {
        message: 'Authorization code exchange failed',
        status: error instanceof SpotifyOAuthError ? error.status : undefined,
        error: errorMessage(error),
      });
      return fail('authorization_exchange_failed', errorMessage(error), {
        status: error instanceof SpotifyOAuthError ? error.status : undefined,
      });
    }

    const record = this.toRecord(payload);
    if (!record) {
      return fail(
        'authorization_exchange_failed',
        'Spotify did not return a refresh token for the authorization code',
      );
    }
    try {
      await this.store.set(CREDENTIALS_KEY, record);
    } catch (error) {
      return fail('upstream_error', `Could not persist credentials: ${errorMessage(error)}`);
    }
    this.unsaved = null;
    await logger.info('tokens', {
      message: 'Spotify account connected',
      scopes: record.scopes,
      expiresAt: record.expiresAt,
    });
    return ok(this.statusOf(record));
  }

  async isAuthenticated(): Promise<boolean> {
    const loaded = await this.load();
    return loaded.ok && loaded.value !== null;
  }

  async getStatus(): Promise<AuthStatus> {
    const loaded = await this.load();
    if (!loaded.ok || !loaded.value) {
      return { authenticated: false, scopes: [] };
    }
    return this.statusOf(loaded.value);
  }

  async disconnect(): Promise<void> {
    this.unsaved = null;
    await this.store.delete(CREDENTIALS_KEY);
    await logger.info('tokens', { message: 'Spotify credentials cleared' });
  }

  buildAuthorizeUrl(state: string): Result<string> {
    if (!this.oauth.isConfigured()) {
      return fail(
        'validation_error',
        'SPOTIFY_CLIENT_ID and SPOTIFY_CLIENT_SECRET must be set to sign in',
      );
    }
    return ok(this.oauth.buildAuthorizeUrl(state));
  }

  private statusOf(record: CredentialRecord): AuthStatus {
    return { authenticated: true, expiresAt: record.expiresAt, scopes: [...record.scopes] };
  }

  private async load(): Promise<Result<CredentialRecord | null>> {
    if (this.unsaved) {
      const pending = this.unsaved;
      try {
        await this.store.set(CREDENTIALS_KEY, pending);
        this.unsaved = null;
      } catch (error) {
        await logger.debug('tokens', {
          message: 'Refreshed credentials still not persisted',
          error: errorMessage(error),
        });
      }
      return ok(pending);
    }

    let raw: unknown;
    try {
      raw = await this.store.get(CREDENTIALS_KEY);
    } catch (error) {
      await logger.error('tokens', {
        message: 'Credential store unreadable',
        error: errorMessage(error),
      });
      return fail('authentication_required', 'Stored credentials are unreadable, sign in again');
    }
    if (raw === null) {
      return ok(null);
    }
    const parsed = CredentialRecordSchema.safeParse(raw);
    if (!parsed.success) {
      await logger.warning('tokens', { message: 'Discarding malformed credential record' });
      try {
        await this.store.delete(CREDENTIALS_KEY);
      } catch (error) {
        await logger.error('tokens', {
          message: 'Could not remove malformed credential record',
          error: errorMessage(error),
        });
      }
      return ok(null);
    }
    return ok(parsed.data);
  }

  private refreshShared(record: CredentialRecord): Promise<Result<string>> {
    if (!this.refreshing) {
      this.refreshing = this.refresh(record).finally(() => {
        this.refreshing = null;
      });
    }
    return this.refreshing;
  }

  private async refresh(record: CredentialRecord): Promise<Result<string>> {
    if (!this.oauth.isConfigured()) {
      return fail('refresh_failed', 'Spotify client credentials are not configured');
    }

    let payload: SpotifyTokenResponseCodecType;
    try {
      payload = await this.oauth.refresh(record.refreshToken);
    } catch (error) {
      const status = error instanceof SpotifyOAuthError ? error.status : undefined;
      if (error instanceof SpotifyOAuthError && error.rejected) {
        this.unsaved = null;
        await this.store.delete(CREDENTIALS_KEY);
        await logger.error('tokens', {
          message: 'Refresh token rejected, credentials cleared',
          status,
        });
        return fail('refresh_failed', 'Spotify rejected the refresh token', { status });
      }
      await logger.warning('tokens', {
        message: 'Token endpoint unavailable, keeping credentials',
        status,
        error: errorMessage(error),
      });
      if (status === 429) {
        return fail('rate_limit_exceeded', 'Token endpoint is rate limiting', { status });
      }
      return fail('upstream_unavailable', 'Spotify token endpoint is unavailable', { status });
    }

    const next = this.toRecord(payload, record);
    if (!next) {
      return fail('upstream_error', 'Spotify refresh response was incomplete');
    }
    try {
      await this.store.set(CREDENTIALS_KEY, next);
      this.unsaved = null;
    } catch (error) {
      this.unsaved = next;
      await logger.error('tokens', {
        message: 'Failed to persist refreshed credentials',
        rotated: next.refreshToken !== record.refreshToken,
        error: errorMessage(error),
      });
    }
    await logger.debug('tokens', {
      message: 'Access token refreshed',
      rotated: next.refreshToken !== record.refreshToken,
      expiresAt: next.expiresAt,
    });
    return ok(next.accessToken);
  }

  /** Spotify may or may not reissue the refresh token; keep the old one when it doesn't. */
  private toRecord(
    payload: SpotifyTokenResponseCodecType,
    previous?: CredentialRecord,
  ): CredentialRecord | null {
    const accessToken = payload.access_token?.trim();
    const refreshToken = payload.refresh_token?.trim() || previous?.refreshToken;
    if (!accessToken || !refreshToken) {
      return null;
    }
    const expiresIn = Number(payload.expires_in ?? 3600);
    const scopes = payload.scope
      ? payload.scope
          .split(' ')
          .map((v) => v.trim())
          .filter(Boolean)
      : (previous?.scopes ?? [...this.oauth.scopes]);
    const now = this.now();
    return {
      accessToken,
      refreshToken,
      expiresAt: now + (Number.isFinite(expiresIn) ? expiresIn : 3600) * 1000,
      scopes,
      updatedAt: now,
    };
  }
}
