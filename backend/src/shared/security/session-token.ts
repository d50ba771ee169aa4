/**
 * backend/src/shared/security/session-token.ts
 *
 * Opaque bearer tokens for sessions.
 *
 * RULES:
 * - The raw token is returned once, to whoever asked for the session.
 * - Redis keys carry sha256(token) only, so a dump of the session store holds no usable token.
 */

import { createHash, randomBytes } from 'node:crypto';

const SESSION_TOKEN_BYTES = 32;

/** URL-safe base64 (no + / =), 43 characters. */
export function generateSessionToken(): string {
  return randomBytes(SESSION_TOKEN_BYTES).toString('base64url');
}

export interface TokenHasher {
  hash(rawToken: string): string;
}

export class Sha256TokenHasher implements TokenHasher {
  hash(rawToken: string): string {
    return createHash('sha256').update(rawToken).digest('hex');
  }
}
