/**
 * src/shared/session/session.store.ts
 *
 * WHY:
 * - Opaque bearer tokens backed by server-side sessions in Redis (through Cache).
 * - Sessions are instantly revocable via revoke(); no JWT revocation lists.
 * - TTL enforced at Redis level (no expired session can be read).
 *
 * RULES:
 * - Depends only on Cache + TokenHasher interfaces. Redis in prod, InMemCache in tests.
 * - No HTTP concerns here (header parsing lives in middleware).
 * - A session that fails validation is treated as missing and removed.
 */

import type { Cache } from '../cache/cache';
import { logger } from '../logger/logger';
import { generateSessionToken } from '../security/session-token';
import type { TokenHasher } from '../security/session-token';
import { SESSION_KEY_PREFIX, SessionDataSchema } from './session.types';
import type { SessionData, SessionPrincipal } from './session.types';

export type IssuedToken = {
  token: string;
  tokenHash: string;
  expiresInSeconds: number;
};

export class SessionStore {
  constructor(
    private readonly cache: Cache,
    private readonly hasher: TokenHasher,
    private readonly ttlSeconds: number,
  ) {}

  private key(tokenHash: string): string {
    return `${SESSION_KEY_PREFIX}:${tokenHash}`;
  }

  hashToken(token: string): string {
    return this.hasher.hash(token);
  }

  /**
   * Creates a session for the principal and returns the raw token.
   * The raw token is shown once to the caller; only its hash is stored.
   */
  async issue(principal: SessionPrincipal, now: Date = new Date()): Promise<IssuedToken> {
    const token = generateSessionToken();
    const tokenHash = this.hashToken(token);

    const data: SessionData = { principal, createdAt: now.toISOString() };

    await this.cache.set(this.key(tokenHash), JSON.stringify(data), {
      ttlSeconds: this.ttlSeconds,
    });

    return { token, tokenHash, expiresInSeconds: this.ttlSeconds };
  }

  /**
   * Loads session data for a raw token. Returns null if expired, unknown or corrupted.
   */
  async resolve(token: string): Promise<SessionData | null> {
    const tokenHash = this.hashToken(token);
    const raw = await this.cache.get(this.key(tokenHash));
    if (!raw) return null;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      logger.warn('session.corrupted', {
        flow: 'session',
        reason: 'invalid_json',
        message: err instanceof Error ? err.message : String(err),
      });
      await this.cache.del(this.key(tokenHash));
      return null;
    }

    const parsed = SessionDataSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn('session.corrupted', { flow: 'session', reason: 'invalid_shape' });
      await this.cache.del(this.key(tokenHash));
      return null;
    }

    return parsed.data;
  }

  async revoke(token: string): Promise<void> {
    await this.cache.del(this.key(this.hashToken(token)));
  }
}
