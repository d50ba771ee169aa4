/**
 * backend/src/modules/membership-view/membership-view.refresher.ts
 *
 * WHY:
 * - refresh() may be called from a scheduler, an ops endpoint, or both at once,
 *   on several instances. It must never fail because of that.
 *
 * HOW IT WORKS:
 * - Local: concurrent calls share ONE in-flight rebuild ('coalesced').
 * - Cross-instance: a short Redis lock (SET NX EX) holding this refresher's id. The
 *   instance that stores it rebuilds; the others return 'skipped'. The TTL frees the
 *   lock if an instance dies mid-rebuild.
 *
 * RULES:
 * - Readers are never blocked: the store rebuilds and swaps.
 * - Real rebuild failures (DB down) propagate to the caller; contention never does.
 * - A refresher only releases a lock that still holds its own id.
 */

import { randomUUID } from 'node:crypto';

import type { Cache } from '../../shared/cache/cache';
import { logger } from '../../shared/logger/logger';
import type { MembershipViewStore, RefreshResult } from './membership-view.types';

export const MEMBERSHIP_VIEW_LOCK_KEY = 'lock:membership_view:refresh';

export class MembershipViewRefresher {
  private inFlight: Promise<RefreshResult> | null = null;
  private readonly holderId = randomUUID();

  constructor(
    private readonly deps: {
      store: MembershipViewStore;
      cache: Cache;
      lockTtlSeconds: number;
      now?: () => number;
    },
  ) {}

  private now(): number {
    return this.deps.now ? this.deps.now() : Date.now();
  }

  async refresh(): Promise<RefreshResult> {
    if (this.inFlight) {
      await this.inFlight;
      return { status: 'coalesced' };
    }

    const run = this.runExclusive();
    this.inFlight = run;
    try {
      return await run;
    } finally {
      this.inFlight = null;
    }
  }

  private async runExclusive(): Promise<RefreshResult> {
    const flow = 'membership_view.refresh';

    const acquired = await this.deps.cache.setIfAbsent(MEMBERSHIP_VIEW_LOCK_KEY, this.holderId, {
      ttlSeconds: this.deps.lockTtlSeconds,
    });
    if (!acquired) {
      logger.info('membership_view.refresh.skipped', { flow, reason: 'locked' });
      return { status: 'skipped', reason: 'locked' };
    }

    const startedAt = this.now();
    try {
      await this.deps.store.rebuild();
    } finally {
      await this.releaseLock();
    }

    const durationMs = this.now() - startedAt;
    logger.info('membership_view.refresh.done', { flow, durationMs });

    return { status: 'refreshed', durationMs };
  }

  private async releaseLock(): Promise<void> {
    // Past its TTL the lock may already belong to another instance.
    const released = await this.deps.cache.delIfEquals(MEMBERSHIP_VIEW_LOCK_KEY, this.holderId);
    if (!released) {
      logger.warn('membership_view.refresh.lock_expired', { flow: 'membership_view.refresh' });
    }
  }
}
