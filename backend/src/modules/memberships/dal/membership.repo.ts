/**
 * backend/src/modules/memberships/dal/membership.repo.ts
 *
 * WHY:
 * - Postgres implementation of MembershipStore + MembershipSnapshotSource.
 * - Reads delegate to membership.queries (row -> domain), writes live here.
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - No policies.
 * - Supports withDb() for transaction binding.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { UserId } from '../../identity';
import {
  getActiveMembershipsForUser,
  getAllActiveMemberships,
  getMembershipByBusinessAndUser,
  getMembershipById,
  toMembership,
} from '../membership.queries';
import type {
  ActiveMembership,
  BusinessId,
  Membership,
  MembershipId,
  UserActiveMembership,
} from '../membership.types';
import type {
  InsertMembershipParams,
  MembershipSnapshotSource,
  MembershipStore,
  TransitionMembershipParams,
} from './membership.store';

export class MembershipRepo implements MembershipStore, MembershipSnapshotSource {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): MembershipRepo {
    return new MembershipRepo(db);
  }

  async listActiveForUser(userId: UserId): Promise<ActiveMembership[]> {
    const rows = await getActiveMembershipsForUser(this.db, userId);
    return rows.map(({ membershipId, businessId, businessSlug, role }) => ({
      membershipId,
      businessId,
      businessSlug,
      role,
    }));
  }

  async listAllActive(): Promise<UserActiveMembership[]> {
    return getAllActiveMemberships(this.db);
  }

  async findById(membershipId: MembershipId): Promise<Membership | undefined> {
    return getMembershipById(this.db, membershipId);
  }

  async findByBusinessAndUser(params: {
    businessId: BusinessId;
    userId: UserId;
  }): Promise<Membership | undefined> {
    return getMembershipByBusinessAndUser(this.db, params);
  }

  /**
   * Unique constraint (business_id, user_id) is enforced by the DB.
   */
  async insertMembership(params: InsertMembershipParams): Promise<Membership> {
    const row = await this.db
      .insertInto('business_users')
      .values({
        business_id: params.businessId,
        user_id: params.userId,
        role: params.role,
        status: params.status,
        invited_at: params.invitedAt,
        joined_at: params.joinedAt,
      })
      .returningAll()
      .executeTakeFirstOrThrow();

    return toMembership(row);
  }

  /**
   * Guarded by WHERE status = from, so concurrent transitions cannot both win.
   * Entering 'active' stamps joined_at.
   */
  async transitionStatus(params: TransitionMembershipParams): Promise<boolean> {
    const res = await this.db
      .updateTable('business_users')
      .set(
        params.to === 'active'
          ? { status: params.to, updated_at: params.at, joined_at: params.at }
          : { status: params.to, updated_at: params.at },
      )
      .where('id', '=', params.membershipId)
      .where('status', '=', params.from)
      .executeTakeFirst();

    return Number(res?.numUpdatedRows ?? 0) > 0;
  }
}
