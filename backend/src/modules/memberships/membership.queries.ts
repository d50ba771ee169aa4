/**
 * backend/src/modules/memberships/membership.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into Membership domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 * - Unknown DB values degrade to the least privileged value, never a stronger one.
 */

import type { DbExecutor } from '../../shared/db/db';
import {
  selectActiveMembershipsForUserSql,
  selectAllActiveMembershipsSql,
  selectMembershipByBusinessAndUserSql,
  selectMembershipByIdSql,
} from './dal/membership.query-sql';
import type { ActiveMembershipRow, MembershipRow } from './dal/membership.query-sql';
import { isMembershipStatus, isRole } from './membership.types';
import type {
  Membership,
  MembershipStatus,
  Role,
  UserActiveMembership,
} from './membership.types';

function parseRole(value: string): Role {
  return isRole(value) ? value : 'client';
}

function parseStatus(value: string): MembershipStatus {
  return isMembershipStatus(value) ? value : 'inactive';
}

export function toMembership(row: MembershipRow): Membership {
  return {
    id: row.id,
    businessId: row.business_id,
    userId: row.user_id,
    role: parseRole(row.role),
    status: parseStatus(row.status),
    invitedAt: row.invited_at ?? null,
    joinedAt: row.joined_at ?? null,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toActiveMemberships(rows: ActiveMembershipRow[]): UserActiveMembership[] {
  const out: UserActiveMembership[] = [];
  for (const row of rows) {
    // A role the code does not know cannot be evaluated: drop the row (deny).
    if (!isRole(row.role)) continue;

    out.push({
      membershipId: row.membership_id,
      businessId: row.business_id,
      businessSlug: row.business_slug,
      userId: row.user_id,
      role: row.role,
    });
  }
  return out;
}

export async function getActiveMembershipsForUser(
  db: DbExecutor,
  userId: string,
): Promise<UserActiveMembership[]> {
  return toActiveMemberships(await selectActiveMembershipsForUserSql(db, userId));
}

export async function getAllActiveMemberships(db: DbExecutor): Promise<UserActiveMembership[]> {
  return toActiveMemberships(await selectAllActiveMembershipsSql(db));
}

export async function getMembershipByBusinessAndUser(
  db: DbExecutor,
  params: { businessId: string; userId: string },
): Promise<Membership | undefined> {
  const row = await selectMembershipByBusinessAndUserSql(db, params);
  if (!row) return undefined;
  return toMembership(row);
}

export async function getMembershipById(
  db: DbExecutor,
  membershipId: string,
): Promise<Membership | undefined> {
  const row = await selectMembershipByIdSql(db, membershipId);
  if (!row) return undefined;
  return toMembership(row);
}
