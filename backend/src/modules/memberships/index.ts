/**
 * backend/src/modules/memberships/index.ts
 *
 * WHY:
 * - Define the public surface of the memberships module.
 * - Prevent cross-module coupling via deep imports into /dal.
 */

export {
  activeBusinessIds,
  activeBusinessIdsWithRole,
  belongsToBusiness,
  checkHierarchicalAccess,
  currentBusinessId,
  hasRole,
} from './membership.resolver';
export { hierarchicalAccessAllowed, roleSatisfies } from './policies/role-hierarchy.policy';
export { MembershipRepo } from './dal/membership.repo';
export type { MembershipReader, MembershipSnapshotSource, MembershipStore } from './dal/membership.store';
export { PERMISSIONS, ROLES } from './membership.types';
export type { Membership, MembershipStatus, Permission, Role } from './membership.types';
