/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, redis) and shares them safely.
 * - Keeps modules testable: tests hand buildModules() in-memory infra instead.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (which view backend, which cache) belong HERE,
 *   not inside the classes themselves (DIP).
 */

import type { AppConfig } from './config';
import { createDb, dbOptionsFrom } from '../shared/db/db';
import { KyselyUnitOfWork } from '../shared/db/unit-of-work';
import type { UnitOfWork } from '../shared/db/unit-of-work';

import { RedisCache } from '../shared/cache/redis-cache';
import type { Cache } from '../shared/cache/cache';

import { Sha256TokenHasher } from '../shared/security/session-token';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { AuditRepo } from '../shared/audit/audit.repo';
import { SessionStore } from '../shared/session/session.store';

import { createKyselyTenancyUnitOfWork } from '../modules/_shared/tenancy.unit-of-work';
import type { TenancyUnitOfWork } from '../modules/_shared/tenancy.unit-of-work';

import { createAccessModule } from '../modules/access/access.module';
import type { AccessModule } from '../modules/access/access.module';
import { RowRepo } from '../modules/access';
import type { DataRepos, RowStore } from '../modules/access';

import { createBusinessModule } from '../modules/businesses/business.module';
import type { BusinessModule } from '../modules/businesses/business.module';

import { createMembershipModule } from '../modules/memberships/membership.module';
import type { MembershipModule } from '../modules/memberships/membership.module';
import { MembershipRepo } from '../modules/memberships';
import type { MembershipReader } from '../modules/memberships';

import { createMembershipViewModule } from '../modules/membership-view/membership-view.module';
import type { MembershipViewModule } from '../modules/membership-view/membership-view.module';
import { PostgresMembershipView } from '../modules/membership-view/dal/postgres-membership-view';
import { InMemMembershipView } from '../modules/membership-view/inmem-membership-view';
import type { MembershipViewStore } from '../modules/membership-view/membership-view.types';

/**
 * Everything that talks to Postgres or Redis, behind the interfaces modules accept.
 */
export type AppInfra = {
  cache: Cache;
  sessionStore: SessionStore;
  membershipReader: MembershipReader;
  rows: RowStore;
  dataUow: UnitOfWork<DataRepos>;
  tenancyUow: TenancyUnitOfWork;
  membershipViewStore: MembershipViewStore;
  close: () => Promise<void>;
};

export type AppDeps = AppInfra & {
  logger: Logger;

  // modules
  access: AccessModule;
  businesses: BusinessModule;
  memberships: MembershipModule;
  membershipView: MembershipViewModule;
};

export function buildModules(config: AppConfig, infra: AppInfra): AppDeps {
  const access = createAccessModule({ rows: infra.rows, dataUow: infra.dataUow });

  const businesses = createBusinessModule({ uow: infra.tenancyUow, logger });

  const memberships = createMembershipModule({
    reader: infra.membershipReader,
    uow: infra.tenancyUow,
    logger,
  });

  const membershipView = createMembershipViewModule({
    store: infra.membershipViewStore,
    cache: infra.cache,
    lockTtlSeconds: config.membershipView.lockTtlSeconds,
    refreshIntervalSeconds: config.membershipView.refreshIntervalSeconds,
  });

  return {
    ...infra,
    logger,
    access,
    businesses,
    memberships,
    membershipView,
  };
}

export async function buildDeps(config: AppConfig): Promise<AppDeps> {
  const db = createDb(dbOptionsFrom(config));

  // Redis is mandatory (dev + prod): sessions and the view refresh lock live there.
  const redis = await RedisCache.connect(config.redisUrl);

  const sessionStore = new SessionStore(redis, new Sha256TokenHasher(), config.sessionTtlSeconds);

  const membershipRepo = new MembershipRepo(db);
  const rowRepo = new RowRepo(db);

  const dataUow = new KyselyUnitOfWork<DataRepos>(db, (trx) => ({
    rows: rowRepo.withDb(trx),
    audit: new AuditRepo(trx),
  }));

  const membershipViewStore: MembershipViewStore =
    config.membershipView.backend === 'postgres'
      ? new PostgresMembershipView(db)
      : new InMemMembershipView(membershipRepo);

  return buildModules(config, {
    cache: redis,
    sessionStore,
    membershipReader: membershipRepo,
    rows: rowRepo,
    dataUow,
    tenancyUow: createKyselyTenancyUnitOfWork(db),
    membershipViewStore,
    close: async () => {
      await redis.close();
      await db.destroy();
    },
  });
}
