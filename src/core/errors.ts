/**
 * Error taxonomy shared by every internal boundary.
 *
 * Expected failures travel as `Result` values; `GatewayFault` only exists to carry a
 * `GatewayError` through code that can only throw (the Spotify SDK auth strategy).
 */

export type ErrorKind =
  | 'authentication_required'
  | 'refresh_failed'
  | 'authorization_exchange_failed'
  | 'rate_limit_exceeded'
  | 'plan_restricted'
  | 'permission_denied'
  | 'not_found'
  | 'validation_error'
  | 'preview_not_found'
  | 'upstream_unavailable'
  | 'upstream_error';

export interface GatewayError {
  kind: ErrorKind;
  message: string;
  status?: number;
  reason?: string;
  retryAfterMs?: number;
  attempts?: number;
  cause?: GatewayError;
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: GatewayError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(
  kind: ErrorKind,
  message: string,
  extra: Omit<GatewayError, 'kind' | 'message'> = {},
): Result<T> {
  return { ok: false, error: { kind, message, ...extra } };
}

export function failWith<T = never>(error: GatewayError): Result<T> {
  return { ok: false, error };
}

export class GatewayFault extends Error {
  readonly failure: GatewayError;

  constructor(failure: GatewayError) {
    super(failure.message);
    this.name = 'GatewayFault';
    this.failure = failure;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Kinds the rate limit handler may retry. */
export function isTransient(error: GatewayError): boolean {
  return error.kind === 'rate_limit_exceeded' || error.kind === 'upstream_unavailable';
}

/**
 * User-facing text for a failure. The tool surface shows this to the agent.
 */
export function describeError(error: GatewayError, loginUrl?: string): string {
  switch (error.kind) {
    case 'authentication_required':
      return loginUrl
        ? `Not connected to Spotify. Open ${loginUrl} to sign in, then retry.`
        : 'Not connected to Spotify. Please sign in and retry.';
    case 'refresh_failed':
      return loginUrl
        ? `Spotify session expired and could not be renewed. Sign in again at ${loginUrl}.`
        : 'Spotify session expired and could not be renewed. Please sign in again.';
    case 'authorization_exchange_failed':
      return `Spotify sign-in failed: ${error.message}`;
    case 'rate_limit_exceeded':
      return 'Spotify is rate limiting requests. Please wait a moment and try again.';
    case 'plan_restricted':
      return `This action requires Spotify Premium (${error.message}).`;
    case 'permission_denied':
      return `Access denied by Spotify: ${error.message}. Check granted scopes or playlist ownership.`;
    case 'not_found':
      return `Not found: ${error.message}`;
    case 'validation_error':
      return `Invalid request: ${error.message}`;
    case 'preview_not_found':
      return 'That preview is unknown, expired, or was already confirmed. Create a new preview.';
    case 'upstream_unavailable':
      return 'Spotify is temporarily unavailable. Please try again shortly.';
    case 'upstream_error':
      return `Spotify request failed: ${error.message}`;
  }
}
