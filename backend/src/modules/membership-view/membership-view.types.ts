/**
 * backend/src/modules/membership-view/membership-view.types.ts
 *
 * WHY:
 * - Denormalized projection of active memberships for display paths:
 *   one row per (user, business) with every role the user holds across
 *   their active memberships.
 *
 * RULES:
 * - NOT transactionally consistent with business_users. A revoked membership stays
 *   visible here until the next refresh.
 * - Never used for an authorization decision.
 */

import type { UserId } from '../identity';
import { ROLES, isRole } from '../memberships/membership.types';
import type { BusinessId, Role } from '../memberships/membership.types';

export type MembershipViewRow = {
  userId: UserId;
  businessId: BusinessId;
  role: Role;
  allRoles: Role[];
};

export interface MembershipViewStore {
  listForUser(userId: UserId): Promise<MembershipViewRow[]>;
  /**
   * Rebuild-and-swap. Readers keep seeing the previous snapshot until it completes.
   */
  rebuild(): Promise<void>;
}

export type RefreshResult =
  | { status: 'refreshed'; durationMs: number }
  | { status: 'coalesced' }
  | { status: 'skipped'; reason: 'locked' };

/**
 * Distinct known roles, strongest first.
 */
export function normalizeRoles(roles: Iterable<string>): Role[] {
  const known = new Set<Role>();
  for (const role of roles) {
    if (isRole(role)) known.add(role);
  }
  return Array.from(known).sort((a, b) => ROLES.indexOf(a) - ROLES.indexOf(b));
}
