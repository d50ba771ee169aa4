/**
 * backend/src/modules/memberships/dal/membership.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for memberships (raw SQL access).
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 * - "Active" always means: membership status = 'active' AND business not soft-deleted.
 * - Active lists are ordered by business_id so "first membership" is the same on every read.
 */

import type { Selectable } from 'kysely';

import type { DbExecutor } from '../../../shared/db/db';
import type { BusinessUsersTable } from '../../../shared/db/tables';

export type MembershipRow = Selectable<BusinessUsersTable>;

export type ActiveMembershipRow = {
  membership_id: string;
  business_id: string;
  business_slug: string;
  user_id: string;
  role: string;
};

function activeMembershipsQuery(db: DbExecutor) {
  return db
    .selectFrom('business_users as bu')
    .innerJoin('businesses as b', 'b.id', 'bu.business_id')
    .select([
      'bu.id as membership_id',
      'bu.business_id',
      'b.slug as business_slug',
      'bu.user_id',
      'bu.role',
    ])
    .where('bu.status', '=', 'active')
    .where('b.deleted_at', 'is', null)
    .orderBy('bu.business_id');
}

export async function selectActiveMembershipsForUserSql(
  db: DbExecutor,
  userId: string,
): Promise<ActiveMembershipRow[]> {
  return activeMembershipsQuery(db).where('bu.user_id', '=', userId).execute();
}

export async function selectAllActiveMembershipsSql(db: DbExecutor): Promise<ActiveMembershipRow[]> {
  return activeMembershipsQuery(db).execute();
}

export async function selectMembershipByBusinessAndUserSql(
  db: DbExecutor,
  params: { businessId: string; userId: string },
): Promise<MembershipRow | undefined> {
  return db
    .selectFrom('business_users')
    .selectAll()
    .where('business_id', '=', params.businessId)
    .where('user_id', '=', params.userId)
    .executeTakeFirst();
}

export async function selectMembershipByIdSql(
  db: DbExecutor,
  membershipId: string,
): Promise<MembershipRow | undefined> {
  return db
    .selectFrom('business_users')
    .selectAll()
    .where('id', '=', membershipId)
    .executeTakeFirst();
}
