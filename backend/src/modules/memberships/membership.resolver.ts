/**
 * backend/src/modules/memberships/membership.resolver.ts
 *
 * WHY:
 * - The named predicates every row policy and every tenancy service composes:
 *   activeBusinessIds, activeBusinessIdsWithRole, currentBusinessId,
 *   belongsToBusiness, hasRole, checkHierarchicalAccess.
 * - All of them read the context's membership snapshot; nothing here caches across requests.
 *
 * RULES:
 * - Read-only, never throws for an absent identity (nil user => no memberships => false/empty).
 * - Role sets in activeBusinessIdsWithRole are EXACT matches; hierarchy lives in hasRole.
 * - Authorization-critical paths read Membership through the context, never through
 *   the cached membership view.
 */

import type { AccessContext } from '../access/access-context';
import type { UserId } from '../identity';
import type { ActiveMembership, BusinessId, Permission, Role } from './membership.types';
import { hierarchicalAccessAllowed, roleSatisfies } from './policies/role-hierarchy.policy';

export async function activeBusinessIds(
  ctx: AccessContext,
  userId?: UserId,
): Promise<Set<BusinessId>> {
  const memberships = await ctx.activeMembershipsOf(userId);
  return new Set(memberships.map((m) => m.businessId));
}

export async function activeBusinessIdsWithRole(
  ctx: AccessContext,
  roles: readonly Role[],
): Promise<Set<BusinessId>> {
  const memberships = await ctx.activeMembershipsOf();
  return new Set(memberships.filter((m) => roles.includes(m.role)).map((m) => m.businessId));
}

/**
 * The caller's default business.
 *
 * - Request pinned to a business slug: that business if the caller is an active member, else null.
 * - Otherwise: the first active membership in business_id order. Carries no product
 *   meaning when the caller belongs to several businesses: callers that need a
 *   specific business must pass it explicitly.
 */
export async function currentBusinessId(ctx: AccessContext): Promise<BusinessId | null> {
  const memberships = await ctx.activeMembershipsOf();

  if (ctx.businessSlug !== null) {
    const pinned = memberships.find((m) => m.businessSlug === ctx.businessSlug);
    return pinned?.businessId ?? null;
  }

  return memberships[0]?.businessId ?? null;
}

export async function belongsToBusiness(
  ctx: AccessContext,
  businessId: BusinessId,
): Promise<boolean> {
  const memberships = await ctx.activeMembershipsOf();
  return memberships.some((m) => m.businessId === businessId);
}

/**
 * The caller's role in one business, or null without an active membership there.
 */
export async function roleInBusiness(
  ctx: AccessContext,
  businessId: BusinessId,
): Promise<Role | null> {
  const memberships = await ctx.activeMembershipsOf();
  return memberships.find((m) => m.businessId === businessId)?.role ?? null;
}

export async function hasRole(
  ctx: AccessContext,
  required: Role,
  opts: { businessId?: BusinessId } = {},
): Promise<boolean> {
  const memberships = await ctx.activeMembershipsOf();
  const scoped: readonly ActiveMembership[] =
    opts.businessId === undefined
      ? memberships
      : memberships.filter((m) => m.businessId === opts.businessId);

  return scoped.some((m) => roleSatisfies(m.role, required));
}

/**
 * Evaluated against the caller's role in `businessId`, or in currentBusinessId(ctx)
 * when none is given (and so inherits its arbitrary pick).
 */
export async function checkHierarchicalAccess(
  ctx: AccessContext,
  targetRole: Role,
  permission: Permission,
  opts: { businessId?: BusinessId } = {},
): Promise<boolean> {
  const businessId = opts.businessId ?? (await currentBusinessId(ctx));
  if (businessId === null) return false;

  const actorRole = await roleInBusiness(ctx, businessId);
  if (actorRole === null) return false;

  return hierarchicalAccessAllowed({ actorRole, targetRole, permission });
}
