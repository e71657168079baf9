import { ZodError } from 'zod';
import { type ErrorKind, errorMessage, type GatewayError, GatewayFault } from '../core/errors.ts';
import { SpotifyHttpError } from '../services/spotify/sdk.ts';

export function isPremiumRestriction(reason?: string, message?: string): boolean {
  return reason === 'PREMIUM_REQUIRED' || /premium/i.test(message ?? '');
}

export function mapStatusToKind(status: number, reason?: string, message?: string): ErrorKind {
  if (status === 401) {
    return 'authentication_required';
  }
  if (status === 403) {
    return isPremiumRestriction(reason, message) ? 'plan_restricted' : 'permission_denied';
  }
  if (status === 404) {
    return 'not_found';
  }
  if (status === 400) {
    return 'validation_error';
  }
  if (status === 429) {
    return 'rate_limit_exceeded';
  }
  if (status >= 500) {
    return 'upstream_unavailable';
  }
  return 'upstream_error';
}

/** Classify anything thrown while talking to Spotify. */
export function toGatewayError(error: unknown, context: string): GatewayError {
  if (error instanceof GatewayFault) {
    return error.failure;
  }
  if (error instanceof SpotifyHttpError) {
    return {
      kind: mapStatusToKind(error.status, error.reason, error.message),
      message: `${context}: ${error.message}`,
      status: error.status,
      reason: error.reason,
      retryAfterMs: error.retryAfterMs,
    };
  }
  if (error instanceof ZodError || error instanceof SyntaxError) {
    return { kind: 'upstream_error', message: `${context}: unexpected response payload` };
  }
  // fetch() rejects with TypeError on DNS, connection and TLS failures
  if (error instanceof TypeError || (error instanceof Error && error.name === 'AbortError')) {
    return { kind: 'upstream_unavailable', message: `${context}: ${error.message}` };
  }
  return { kind: 'upstream_error', message: `${context}: ${errorMessage(error)}` };
}
