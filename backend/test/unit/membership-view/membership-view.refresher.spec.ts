import { describe, it, expect, vi, afterEach } from 'vitest';

import {
  MEMBERSHIP_VIEW_LOCK_KEY,
  MembershipViewRefresher,
} from '../../../src/modules/membership-view/membership-view.refresher';
import { startMembershipViewScheduler } from '../../../src/modules/membership-view/membership-view.scheduler';
import type {
  MembershipViewRow,
  MembershipViewStore,
} from '../../../src/modules/membership-view/membership-view.types';
import { InMemCache } from '../../../src/shared/cache/inmem-cache';

/**
 * rebuild() blocks until open() is called.
 */
class GatedViewStore implements MembershipViewStore {
  rebuilds = 0;
  private release: () => void = () => undefined;
  private readonly gate = new Promise<void>((resolve) => {
    this.release = resolve;
  });

  async listForUser(): Promise<MembershipViewRow[]> {
    return [];
  }

  async rebuild(): Promise<void> {
    this.rebuilds += 1;
    await this.gate;
  }

  open(): void {
    this.release();
  }
}

class FailingViewStore implements MembershipViewStore {
  async listForUser(): Promise<MembershipViewRow[]> {
    return [];
  }

  async rebuild(): Promise<void> {
    throw new Error('refresh failed: view locked by migration');
  }
}

/**
 * rebuild() outlasts the lock TTL; meanwhile another instance takes the lock.
 */
class SlowViewStore implements MembershipViewStore {
  constructor(
    private readonly cache: InMemCache,
    private readonly advance: (ms: number) => void,
  ) {}

  async listForUser(): Promise<MembershipViewRow[]> {
    return [];
  }

  async rebuild(): Promise<void> {
    this.advance(31_000);
    await this.cache.setIfAbsent(MEMBERSHIP_VIEW_LOCK_KEY, 'other-instance', { ttlSeconds: 30 });
  }
}

describe('MembershipViewRefresher', () => {
  it('rebuilds, reports the duration and releases the lock', async () => {
    const store = new GatedViewStore();
    const cache = new InMemCache();
    let clock = 1_000;
    const refresher = new MembershipViewRefresher({
      store,
      cache,
      lockTtlSeconds: 30,
      now: () => (clock += 25),
    });
    store.open();

    const result = await refresher.refresh();

    expect(result).toEqual({ status: 'refreshed', durationMs: 25 });
    expect(store.rebuilds).toBe(1);
    expect(await cache.get(MEMBERSHIP_VIEW_LOCK_KEY)).toBeNull();
  });

  it('concurrent local calls share one rebuild', async () => {
    const store = new GatedViewStore();
    const refresher = new MembershipViewRefresher({
      store,
      cache: new InMemCache(),
      lockTtlSeconds: 30,
    });

    const first = refresher.refresh();
    const second = refresher.refresh();
    store.open();

    expect((await first).status).toBe('refreshed');
    expect(await second).toEqual({ status: 'coalesced' });
    expect(store.rebuilds).toBe(1);
  });

  it('skips when another instance holds the lock', async () => {
    const store = new GatedViewStore();
    const cache = new InMemCache();
    await cache.setIfAbsent(MEMBERSHIP_VIEW_LOCK_KEY, 'other-instance', { ttlSeconds: 30 });
    const refresher = new MembershipViewRefresher({ store, cache, lockTtlSeconds: 30 });

    expect(await refresher.refresh()).toEqual({ status: 'skipped', reason: 'locked' });
    expect(store.rebuilds).toBe(0);
    expect(await cache.get(MEMBERSHIP_VIEW_LOCK_KEY)).toBe('other-instance');
  });

  it('a lock that expired mid-rebuild stays with the instance that took it over', async () => {
    let nowMs = 0;
    const cache = new InMemCache(() => nowMs);
    const del = vi.spyOn(cache, 'del');
    const refresher = new MembershipViewRefresher({
      store: new SlowViewStore(cache, (ms) => {
        nowMs += ms;
      }),
      cache,
      lockTtlSeconds: 30,
    });

    expect((await refresher.refresh()).status).toBe('refreshed');
    expect(await cache.get(MEMBERSHIP_VIEW_LOCK_KEY)).toBe('other-instance');
    expect(del).not.toHaveBeenCalled();
  });

  it('a failed rebuild releases the lock and surfaces the error', async () => {
    const cache = new InMemCache();
    const refresher = new MembershipViewRefresher({
      store: new FailingViewStore(),
      cache,
      lockTtlSeconds: 30,
    });

    await expect(refresher.refresh()).rejects.toThrow('refresh failed: view locked by migration');
    expect(await cache.get(MEMBERSHIP_VIEW_LOCK_KEY)).toBeNull();
  });
});

describe('startMembershipViewScheduler', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('interval 0 never refreshes on its own', async () => {
    vi.useFakeTimers();
    const store = new GatedViewStore();
    store.open();
    const refresher = new MembershipViewRefresher({ store, cache: new InMemCache(), lockTtlSeconds: 30 });

    const handle = startMembershipViewScheduler({ refresher, intervalSeconds: 0 });
    await vi.advanceTimersByTimeAsync(3_600_000);
    handle.stop();

    expect(store.rebuilds).toBe(0);
  });

  it('refreshes on every interval until stopped', async () => {
    vi.useFakeTimers();
    const store = new GatedViewStore();
    store.open();
    const refresher = new MembershipViewRefresher({ store, cache: new InMemCache(), lockTtlSeconds: 30 });

    const handle = startMembershipViewScheduler({ refresher, intervalSeconds: 60 });
    await vi.advanceTimersByTimeAsync(120_000);
    handle.stop();
    await vi.advanceTimersByTimeAsync(120_000);

    expect(store.rebuilds).toBe(2);
  });
});
