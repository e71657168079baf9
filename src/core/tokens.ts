import { randomBytes } from 'node:crypto';

/** URL-safe random token (base64url, no padding). 32 bytes gives 43 characters. */
export function generateOpaqueToken(bytes: number = 32): string {
  return randomBytes(bytes).toString('base64url');
}
