/**
 * backend/src/modules/memberships/policies/role-hierarchy.policy.ts
 *
 * WHY:
 * - The role hierarchy lives in one place: owner > admin > manager > staff.
 * - Pure logic (no DB / no I/O) => easy to unit test.
 *
 * RULES:
 * - Pure functions only.
 * - 'owner' satisfies every requirement, 'client' included.
 * - A held 'client' role never satisfies a requirement, not even 'client' itself
 *   (clients are scoped by ownership predicates, not by role).
 */

import type { Permission, Role } from '../membership.types';

/**
 * Roles that satisfy `required`, per required role.
 */
const SATISFIED_BY: Record<Role, readonly Role[]> = {
  owner: ['owner'],
  admin: ['owner', 'admin'],
  manager: ['owner', 'admin', 'manager'],
  staff: ['owner', 'admin', 'manager', 'staff'],
  client: ['owner'],
};

export function roleSatisfies(held: Role, required: Role): boolean {
  return SATISFIED_BY[required].includes(held);
}

/**
 * Can an actor holding `actorRole` perform `permission` against a member/resource
 * at `targetRole`?
 *
 * - owner: everything
 * - admin: everything except owner_only
 * - manager: read/write on staff and client
 * - staff: read (any target)
 * - client: nothing
 */
export function hierarchicalAccessAllowed(params: {
  actorRole: Role;
  targetRole: Role;
  permission: Permission;
}): boolean {
  const { actorRole, targetRole, permission } = params;

  switch (actorRole) {
    case 'owner':
      return true;
    case 'admin':
      return permission !== 'owner_only';
    case 'manager':
      return (
        (targetRole === 'staff' || targetRole === 'client') &&
        (permission === 'read' || permission === 'write')
      );
    case 'staff':
      return permission === 'read';
    case 'client':
      return false;
  }
}
