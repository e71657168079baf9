import type { Config } from '../../config/env.ts';
import {
  SpotifyTokenResponseCodec,
  type SpotifyTokenResponseCodecType,
} from '../../types/spotify.codecs.ts';

export class SpotifyOAuthError extends Error {
  status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SpotifyOAuthError';
    this.status = status;
  }

  /** The accounts service refused the grant itself, as opposed to being unreachable. */
  get rejected(): boolean {
    return this.status === 400 || this.status === 401;
  }
}

export type SpotifyOAuthOptions = {
  clientId?: string;
  clientSecret?: string;
  redirectUri: string;
  accountsUrl: string;
  scopes: readonly string[];
  fetch?: typeof fetch;
};

export interface SpotifyOAuthClient {
  readonly scopes: readonly string[];
  isConfigured(): boolean;
  buildAuthorizeUrl(state: string): string;
  exchangeCode(code: string, signal?: AbortSignal): Promise<SpotifyTokenResponseCodecType>;
  refresh(refreshToken: string, signal?: AbortSignal): Promise<SpotifyTokenResponseCodecType>;
}

export function spotifyOAuthOptionsFromConfig(config: Config): SpotifyOAuthOptions {
  return {
    clientId: config.SPOTIFY_CLIENT_ID,
    clientSecret: config.SPOTIFY_CLIENT_SECRET,
    redirectUri: config.SPOTIFY_REDIRECT_URI,
    accountsUrl: config.SPOTIFY_ACCOUNTS_URL,
    scopes: config.OAUTH_SCOPES,
  };
}

export function createSpotifyOAuth(options: SpotifyOAuthOptions): SpotifyOAuthClient {
  const doFetch = options.fetch ?? fetch;

  const credentials = (): { clientId: string; clientSecret: string } => {
    if (!options.clientId || !options.clientSecret) {
      throw new SpotifyOAuthError('Spotify client credentials are not configured');
    }
    return { clientId: options.clientId, clientSecret: options.clientSecret };
  };

  const requestToken = async (
    form: Record<string, string>,
    context: string,
    signal?: AbortSignal,
  ): Promise<SpotifyTokenResponseCodecType> => {
    const { clientId, clientSecret } = credentials();
    const tokenUrl = new URL('/api/token', options.accountsUrl).toString();
    const basic = Buffer.from(`${clientId}:${clientSecret}`).toString('base64');

    let response: Response;
    try {
      response = await doFetch(tokenUrl, {
        method: 'POST',
        headers: {
          accept: 'application/json',
          authorization: `Basic ${basic}`,
          'content-type': 'application/x-www-form-urlencoded',
        },
        body: new URLSearchParams(form).toString(),
        signal,
      });
    } catch (error) {
      throw new SpotifyOAuthError(`Spotify ${context} request could not be sent`, undefined, {
        cause: error,
      });
    }

    const payloadText = await response.text();

    if (!response.ok) {
      throw new SpotifyOAuthError(
        `Spotify ${context} request failed (${response.status})`,
        response.status,
        { cause: payloadText },
      );
    }

    let payloadJson: unknown = {};
    try {
      payloadJson = payloadText ? JSON.parse(payloadText) : {};
    } catch (error) {
      throw new SpotifyOAuthError(`Spotify ${context} payload is not JSON`, response.status, {
        cause: error,
      });
    }
    const parsed = SpotifyTokenResponseCodec.safeParse(payloadJson);
    if (!parsed.success || !parsed.data.access_token) {
      throw new SpotifyOAuthError(`Spotify ${context} payload invalid`, response.status, {
        cause: parsed.success ? 'missing access_token' : parsed.error,
      });
    }
    return parsed.data;
  };

  return {
    scopes: options.scopes,

    isConfigured: () => Boolean(options.clientId && options.clientSecret),

    buildAuthorizeUrl(state) {
      const { clientId } = credentials();
      const url = new URL('/authorize', options.accountsUrl);
      url.searchParams.set('response_type', 'code');
      url.searchParams.set('client_id', clientId);
      url.searchParams.set('redirect_uri', options.redirectUri);
      url.searchParams.set('scope', options.scopes.join(' '));
      url.searchParams.set('state', state);
      return url.toString();
    },

    exchangeCode(code, signal) {
      if (!code.trim()) {
        return Promise.reject(new SpotifyOAuthError('Missing authorization code', 400));
      }
      return requestToken(
        { grant_type: 'authorization_code', code, redirect_uri: options.redirectUri },
        'code exchange',
        signal,
      );
    },

    refresh(refreshToken, signal) {
      if (!refreshToken.trim()) {
        return Promise.reject(new SpotifyOAuthError('Missing Spotify refresh token', 400));
      }
      return requestToken(
        { grant_type: 'refresh_token', refresh_token: refreshToken },
        'refresh',
        signal,
      );
    },
  };
}
