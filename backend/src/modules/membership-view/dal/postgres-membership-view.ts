/**
 * backend/src/modules/membership-view/dal/postgres-membership-view.ts
 *
 * WHY:
 * - MembershipViewStore backed by the materialized view. Postgres does the
 *   rebuild-and-swap: a concurrent refresh never blocks readers.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { UserId } from '../../identity';
import { isRole } from '../../memberships/membership.types';
import { normalizeRoles } from '../membership-view.types';
import type { MembershipViewRow, MembershipViewStore } from '../membership-view.types';
import { refreshViewConcurrentlySql, selectViewRowsForUserSql } from './membership-view.query-sql';

export class PostgresMembershipView implements MembershipViewStore {
  constructor(private readonly db: DbExecutor) {}

  async listForUser(userId: UserId): Promise<MembershipViewRow[]> {
    const rows = await selectViewRowsForUserSql(this.db, userId);

    const out: MembershipViewRow[] = [];
    for (const row of rows) {
      if (!isRole(row.role)) continue;
      out.push({
        userId: row.user_id,
        businessId: row.business_id,
        role: row.role,
        allRoles: normalizeRoles(row.all_roles),
      });
    }
    return out;
  }

  async rebuild(): Promise<void> {
    await refreshViewConcurrentlySql(this.db);
  }
}
