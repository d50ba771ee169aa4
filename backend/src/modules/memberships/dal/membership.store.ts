/**
 * backend/src/modules/memberships/dal/membership.store.ts
 *
 * WHY:
 * - The resolver and the services depend on these abstractions, not on Kysely.
 * - MembershipRepo implements them against Postgres; tests use in-memory fakes.
 *
 * RULES:
 * - Readers return ACTIVE memberships of NON-DELETED businesses only.
 * - listActiveForUser returns rows ordered by business_id; currentBusinessId relies on it.
 */

import type { UserId } from '../../identity';
import type {
  ActiveMembership,
  BusinessId,
  Membership,
  MembershipId,
  MembershipStatus,
  Role,
  UserActiveMembership,
} from '../membership.types';

export interface MembershipReader {
  listActiveForUser(userId: UserId): Promise<ActiveMembership[]>;
}

export interface MembershipSnapshotSource {
  listAllActive(): Promise<UserActiveMembership[]>;
}

export type InsertMembershipParams = {
  businessId: BusinessId;
  userId: UserId;
  role: Role;
  status: MembershipStatus;
  invitedAt: Date | null;
  joinedAt: Date | null;
};

export type TransitionMembershipParams = {
  membershipId: MembershipId;
  from: MembershipStatus;
  to: MembershipStatus;
  at: Date;
};

export interface MembershipStore extends MembershipReader {
  findById(membershipId: MembershipId): Promise<Membership | undefined>;
  findByBusinessAndUser(params: {
    businessId: BusinessId;
    userId: UserId;
  }): Promise<Membership | undefined>;
  insertMembership(params: InsertMembershipParams): Promise<Membership>;
  /**
   * Compare-and-set on status. Returns false if the row is not in `from` anymore.
   */
  transitionStatus(params: TransitionMembershipParams): Promise<boolean>;
}
