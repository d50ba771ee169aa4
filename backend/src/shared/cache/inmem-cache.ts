/**
 * src/shared/cache/inmem-cache.ts
 *
 * In-process Cache for tests. Expiry is checked on read against an injectable clock:
 *   new InMemCache(() => fakeNowMs)
 */

import type { Cache, CacheSetOptions } from './cache';

type Entry = { value: string; expiresAtMs: number | null };

export class InMemCache implements Cache {
  private readonly entries = new Map<string, Entry>();

  constructor(private readonly now: () => number = () => Date.now()) {}

  private live(key: string): Entry | null {
    const entry = this.entries.get(key);
    if (!entry) return null;

    if (entry.expiresAtMs !== null && entry.expiresAtMs <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }

  private expiry(ttlSeconds: number | undefined): number | null {
    return ttlSeconds ? this.now() + ttlSeconds * 1000 : null;
  }

  async get(key: string): Promise<string | null> {
    return this.live(key)?.value ?? null;
  }

  async set(key: string, value: string, opts?: CacheSetOptions): Promise<void> {
    this.entries.set(key, { value, expiresAtMs: this.expiry(opts?.ttlSeconds) });
  }

  async del(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async setIfAbsent(key: string, value: string, opts: { ttlSeconds: number }): Promise<boolean> {
    if (this.live(key)) return false;

    this.entries.set(key, { value, expiresAtMs: this.expiry(opts.ttlSeconds) });
    return true;
  }

  async delIfEquals(key: string, expected: string): Promise<boolean> {
    if (this.live(key)?.value !== expected) return false;

    this.entries.delete(key);
    return true;
  }
}
