/**
 * src/modules/_shared/tenancy.unit-of-work.ts
 *
 * WHY:
 * - Business provisioning, soft delete and membership transitions touch businesses,
 *   business_users and audit_logs together. One transaction, one set of repos.
 *
 * RULES:
 * - Services receive UnitOfWork<TenancyRepos>; only DI knows it is Kysely.
 */

import type { AuditSink } from '../../shared/audit/audit.types';
import { AuditRepo } from '../../shared/audit/audit.repo';
import type { Db } from '../../shared/db/db';
import { KyselyUnitOfWork } from '../../shared/db/unit-of-work';
import type { UnitOfWork } from '../../shared/db/unit-of-work';
import { BusinessRepo } from '../businesses';
import type { BusinessStore } from '../businesses';
import { MembershipRepo } from '../memberships';
import type { MembershipStore } from '../memberships';
import { UserRepo } from '../users';
import type { UserStore } from '../users';

export type TenancyRepos = {
  users: UserStore;
  businesses: BusinessStore;
  memberships: MembershipStore;
  audit: AuditSink;
};

export type TenancyUnitOfWork = UnitOfWork<TenancyRepos>;

export function createKyselyTenancyUnitOfWork(db: Db): TenancyUnitOfWork {
  return new KyselyUnitOfWork<TenancyRepos>(db, (trx) => ({
    users: new UserRepo(trx),
    businesses: new BusinessRepo(trx),
    memberships: new MembershipRepo(trx),
    audit: new AuditRepo(trx),
  }));
}
