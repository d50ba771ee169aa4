/**
 * backend/src/modules/membership-view/membership-view.module.ts
 *
 * WHY:
 * - Encapsulates Cached Membership View wiring (store + refresher + optional timer).
 *
 * RULES:
 * - No infra creation here (DI picks the store implementation).
 * - The scheduler is started by build-app, stopped on close.
 */

import type { FastifyInstance } from 'fastify';

import type { Cache } from '../../shared/cache/cache';
import { MembershipViewController } from './membership-view.controller';
import { MembershipViewRefresher } from './membership-view.refresher';
import { registerMembershipViewRoutes } from './membership-view.routes';
import { startMembershipViewScheduler } from './membership-view.scheduler';
import type { SchedulerHandle } from './membership-view.scheduler';
import type { MembershipViewStore } from './membership-view.types';

export type MembershipViewModule = ReturnType<typeof createMembershipViewModule>;

export function createMembershipViewModule(deps: {
  store: MembershipViewStore;
  cache: Cache;
  lockTtlSeconds: number;
  refreshIntervalSeconds: number;
}) {
  const refresher = new MembershipViewRefresher({
    store: deps.store,
    cache: deps.cache,
    lockTtlSeconds: deps.lockTtlSeconds,
  });

  const controller = new MembershipViewController(deps.store, refresher);

  return {
    store: deps.store,
    refresher,
    startScheduler(): SchedulerHandle {
      return startMembershipViewScheduler({
        refresher,
        intervalSeconds: deps.refreshIntervalSeconds,
      });
    },
    registerRoutes(app: FastifyInstance) {
      registerMembershipViewRoutes(app, controller);
    },
  };
}
