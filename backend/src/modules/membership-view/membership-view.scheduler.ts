/**
 * backend/src/modules/membership-view/membership-view.scheduler.ts
 *
 * WHY:
 * - Refresh cadence is an operational setting (MEMBERSHIP_VIEW_REFRESH_INTERVAL_SECONDS).
 *   0 disables the timer; refreshes then only happen on demand.
 *
 * RULES:
 * - The timer never keeps the process alive (unref) and never throws out of a tick.
 */

import { logger } from '../../shared/logger/logger';
import type { MembershipViewRefresher } from './membership-view.refresher';

export type SchedulerHandle = {
  stop(): void;
};

export function startMembershipViewScheduler(params: {
  refresher: MembershipViewRefresher;
  intervalSeconds: number;
}): SchedulerHandle {
  if (params.intervalSeconds <= 0) {
    return { stop: () => undefined };
  }

  const tick = () => {
    void params.refresher.refresh().catch((err: unknown) => {
      logger.error('membership_view.refresh.failed', {
        flow: 'membership_view.scheduler',
        message: err instanceof Error ? err.message : String(err),
        stack: err instanceof Error ? err.stack : undefined,
      });
    });
  };

  const timer = setInterval(tick, params.intervalSeconds * 1000);
  timer.unref();

  logger.info('membership_view.scheduler.started', {
    flow: 'membership_view.scheduler',
    intervalSeconds: params.intervalSeconds,
  });

  return {
    stop: () => clearInterval(timer),
  };
}
