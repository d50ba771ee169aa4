/**
 * backend/src/modules/memberships/membership.types.ts
 *
 * WHY:
 * - A Membership connects a User to a Business and carries the Role.
 * - A user may hold different roles in different businesses at the same time.
 * - Only ACTIVE memberships confer access.
 *
 * RULES:
 * - Keep aligned with DB CHECK constraints (business_users).
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 */

import type { UserId } from '../identity';

export const ROLES = ['owner', 'admin', 'manager', 'staff', 'client'] as const;
export type Role = (typeof ROLES)[number];

export const MEMBERSHIP_STATUSES = ['pending', 'active', 'inactive'] as const;
export type MembershipStatus = (typeof MEMBERSHIP_STATUSES)[number];

export const PERMISSIONS = ['read', 'write', 'owner_only'] as const;
export type Permission = (typeof PERMISSIONS)[number];

export type MembershipId = string;
export type BusinessId = string;

export type Membership = {
  id: MembershipId;
  businessId: BusinessId;
  userId: UserId;

  role: Role;
  status: MembershipStatus;

  invitedAt: Date | null;
  joinedAt: Date | null;

  createdAt: Date;
  updatedAt: Date;
};

/**
 * Read model used by the resolver: one row per active membership
 * in a non-deleted business.
 */
export type ActiveMembership = {
  membershipId: MembershipId;
  businessId: BusinessId;
  businessSlug: string;
  role: Role;
};

export type UserActiveMembership = ActiveMembership & { userId: UserId };

export function isRole(value: unknown): value is Role {
  return typeof value === 'string' && (ROLES as readonly string[]).includes(value);
}

export function isMembershipStatus(value: unknown): value is MembershipStatus {
  return typeof value === 'string' && (MEMBERSHIP_STATUSES as readonly string[]).includes(value);
}
