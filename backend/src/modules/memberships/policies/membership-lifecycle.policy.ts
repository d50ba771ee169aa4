/**
 * backend/src/modules/memberships/policies/membership-lifecycle.policy.ts
 *
 * WHY:
 * - Status transitions are pending -> active (accept) and active -> inactive (deactivate).
 * - Pure asserts; services call them before touching the store.
 *
 * RULES:
 * - Pure functions only.
 * - Throws module-level MembershipErrors.
 * - A membership that does not exist and one the caller may not see
 *   produce the same error.
 */

import type { UserId } from '../../identity';
import { MembershipErrors } from '../membership.errors';
import type { Membership } from '../membership.types';

export function assertMembershipExists(
  membership: Membership | undefined,
): asserts membership is Membership {
  if (!membership) {
    throw MembershipErrors.membershipNotFound();
  }
}

export function assertCanAcceptInvitation(membership: Membership, userId: UserId): void {
  if (membership.userId !== userId) {
    throw MembershipErrors.membershipNotFound();
  }
  if (membership.status !== 'pending') {
    throw MembershipErrors.membershipNotPending({ membershipId: membership.id });
  }
}

export function assertCanDeactivate(membership: Membership, actorUserId: UserId): void {
  if (membership.userId === actorUserId) {
    throw MembershipErrors.cannotDeactivateSelf({ membershipId: membership.id });
  }
  if (membership.status !== 'active') {
    throw MembershipErrors.membershipNotActive({ membershipId: membership.id });
  }
}
