import { describe, it, expect } from 'vitest';

import { InMemCache } from '../../../../src/shared/cache/inmem-cache';
import {
  Sha256TokenHasher,
  generateSessionToken,
} from '../../../../src/shared/security/session-token';
import { readBearerToken } from '../../../../src/shared/session/session.middleware';
import { SessionStore } from '../../../../src/shared/session/session.store';

function setup(now: () => number = () => Date.now()) {
  const cache = new InMemCache(now);
  const store = new SessionStore(cache, new Sha256TokenHasher(), 60);
  return { cache, store };
}

describe('SessionStore', () => {
  it('resolves an issued token to its principal; only the hash is stored', async () => {
    const { cache, store } = setup();
    const createdAt = new Date('2026-02-03T04:05:06.000Z');

    const issued = await store.issue({ kind: 'user', userId: 'user-1' }, createdAt);

    expect(await store.resolve(issued.token)).toEqual({
      principal: { kind: 'user', userId: 'user-1' },
      createdAt: '2026-02-03T04:05:06.000Z',
    });
    expect(await cache.get(`session:${issued.tokenHash}`)).not.toBeNull();
    expect(await cache.get(`session:${issued.token}`)).toBeNull();
    expect(issued.expiresInSeconds).toBe(60);
  });

  it('unknown, revoked and expired tokens resolve to null', async () => {
    let clock = 0;
    const { store } = setup(() => clock);

    expect(await store.resolve('not-a-token')).toBeNull();

    const revoked = await store.issue({ kind: 'service', serviceName: 'ops' });
    await store.revoke(revoked.token);
    expect(await store.resolve(revoked.token)).toBeNull();

    const expiring = await store.issue({ kind: 'service', serviceName: 'ops' });
    clock = 60_000;
    expect(await store.resolve(expiring.token)).toBeNull();
  });

  it('corrupted session data is treated as missing and removed', async () => {
    const { cache, store } = setup();
    const token = 'test-token';
    const key = `session:${store.hashToken(token)}`;

    await cache.set(key, JSON.stringify({ principal: { kind: 'root' }, createdAt: 'x' }));
    expect(await store.resolve(token)).toBeNull();
    expect(await cache.get(key)).toBeNull();

    await cache.set(key, '{not json');
    expect(await store.resolve(token)).toBeNull();
    expect(await cache.get(key)).toBeNull();
  });
});

describe('readBearerToken', () => {
  it.each<[string | undefined, string | null]>([
    ['Bearer abc123', 'abc123'],
    ['Bearer   padded  ', 'padded'],
    ['Bearer ', null],
    ['Basic dXNlcjpwYXNz', null],
    ['bearer abc123', null],
    [undefined, null],
  ])('%s -> %s', (header, expected) => {
    expect(readBearerToken(header)).toBe(expected);
  });
});

describe('session tokens', () => {
  it('are 43 url-safe characters and differ per call', () => {
    const a = generateSessionToken();
    const b = generateSessionToken();

    expect(a).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(a).not.toBe(b);
  });

  it('are stored under their hex sha256', () => {
    expect(new Sha256TokenHasher().hash('test-token')).toMatch(/^[0-9a-f]{64}$/);
  });
});
