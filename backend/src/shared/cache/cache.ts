/**
 * src/shared/cache/cache.ts
 *
 * WHY:
 * - Two things live outside the process: bearer-token sessions and the
 *   cross-instance lock around membership view refreshes.
 * - Services depend on this interface; Redis in prod, InMemCache in tests.
 *
 * RULES:
 * - Values are strings (callers serialize).
 * - A lock is taken with setIfAbsent and released with delIfEquals. Both are atomic
 *   on the server; a get-then-del release could drop a lock another holder took
 *   after the TTL ran out.
 */

export type CacheSetOptions = {
  ttlSeconds?: number;
};

export interface Cache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, opts?: CacheSetOptions): Promise<void>;
  del(key: string): Promise<void>;

  /**
   * Stores the value only if the key does not exist (Redis SET NX).
   * Returns true when this call stored it.
   */
  setIfAbsent(key: string, value: string, opts: { ttlSeconds: number }): Promise<boolean>;

  /**
   * Deletes the key only while it still holds `expected`.
   * Returns true when this call deleted it.
   */
  delIfEquals(key: string, expected: string): Promise<boolean>;
}
