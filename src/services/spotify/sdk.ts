/**
 * Spotify Web API client backed by the token manager.
 */

import {
  type AccessToken,
  type IAuthStrategy,
  type IValidateResponses,
  type SdkConfiguration,
  SpotifyApi,
} from '@spotify/web-api-ts-sdk';
import type { TokenManager } from '../../auth/token-manager.ts';
import { GatewayFault } from '../../core/errors.ts';
import { SpotifyErrorBodyCodec } from '../../types/spotify.codecs.ts';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/** The slice of `SpotifyApi` the gateway uses; tests substitute a fake. */
export interface SpotifyRequester {
  makeRequest(method: HttpMethod, url: string, body?: unknown): Promise<unknown>;
}

export class SpotifyHttpError extends Error {
  readonly status: number;
  readonly reason?: string;
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    details: { status: number; reason?: string; retryAfterMs?: number },
  ) {
    super(message);
    this.name = 'SpotifyHttpError';
    this.status = details.status;
    this.reason = details.reason;
    this.retryAfterMs = details.retryAfterMs;
  }
}

export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (!header) {
    return undefined;
  }
  const seconds = Number(header.trim());
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.round(seconds * 1000);
  }
  const date = Date.parse(header);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

export const responseValidator: IValidateResponses = {
  async validateResponse(response: Response): Promise<void> {
    if (response.ok || response.status === 204) {
      return;
    }
    const body = await response.text().catch(() => '');
    let message = `${response.status} ${response.statusText}`.trim();
    let reason: string | undefined;
    try {
      const parsed = SpotifyErrorBodyCodec.safeParse(JSON.parse(body));
      if (parsed.success) {
        message = parsed.data.error.message ?? message;
        reason = parsed.data.error.reason;
      }
    } catch {
      // Not JSON; keep the raw text
      message = body ? `${message} - ${body.slice(0, 200)}` : message;
    }
    throw new SpotifyHttpError(message, {
      status: response.status,
      reason,
      retryAfterMs: parseRetryAfter(response.headers.get('retry-after')),
    });
  },
};

/**
 * Hands the SDK whatever the token manager considers valid. A failure (no credentials,
 * rejected refresh) is thrown as a `GatewayFault` so the gateway can recover its kind.
 */
class TokenManagerAuthStrategy implements IAuthStrategy {
  private readonly tokens: TokenManager;
  private current: AccessToken | null = null;

  constructor(tokens: TokenManager) {
    this.tokens = tokens;
  }

  public setConfiguration(_configuration: SdkConfiguration): void {}

  public async getOrCreateAccessToken(): Promise<AccessToken> {
    const result = await this.tokens.getValidToken();
    if (!result.ok) {
      this.current = null;
      throw new GatewayFault(result.error);
    }
    this.current = {
      access_token: result.value,
      refresh_token: '',
      token_type: 'Bearer',
      expires_in: 0,
    };
    return this.current;
  }

  public async getAccessToken(): Promise<AccessToken | null> {
    return this.current;
  }

  public removeAccessToken(): void {
    this.current = null;
  }
}

/**
 * Retries a request once after a 401 if a forced refresh succeeds. The access token
 * can be revoked before its stored expiry; a 401 means the call had no effect.
 */
export function withTokenRetry(
  api: SpotifyRequester,
  tokens: Pick<TokenManager, 'forceRefresh'>,
): SpotifyRequester {
  return {
    async makeRequest(method, url, body) {
      try {
        return await api.makeRequest(method, url, body);
      } catch (error) {
        if (!(error instanceof SpotifyHttpError) || error.status !== 401) {
          throw error;
        }
        const refreshed = await tokens.forceRefresh();
        if (!refreshed.ok) {
          throw error;
        }
        return api.makeRequest(method, url, body);
      }
    },
  };
}

export type SpotifyClientOptions = {
  fetch?: typeof fetch;
};

export function createSpotifyClient(
  tokens: TokenManager,
  options: SpotifyClientOptions = {},
): SpotifyRequester {
  const api = new SpotifyApi(new TokenManagerAuthStrategy(tokens), {
    responseValidator,
    ...(options.fetch ? { fetch: options.fetch } : {}),
  });
  return withTokenRetry(api, tokens);
}
