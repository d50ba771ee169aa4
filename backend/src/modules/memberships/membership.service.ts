/**
 * backend/src/modules/memberships/membership.service.ts
 *
 * WHY:
 * - Membership lifecycle: invite (-> pending), accept (pending -> active),
 *   deactivate (active -> inactive). No other transitions exist.
 *
 * RULES:
 * - Service owns the transaction (through the tenancy unit of work).
 * - Inviting or deactivating needs checkHierarchicalAccess in THAT business against
 *   the target role: 'write', or 'owner_only' when the target is an owner.
 * - Callers who are not members of the business get 404, never 403.
 * - Transitions are compare-and-set: a lost race answers CONFLICT.
 */

import { AuditWriter } from '../../shared/audit/audit.writer';
import type { Logger } from '../../shared/logger/logger';
import type { TenancyUnitOfWork } from '../_shared/tenancy.unit-of-work';
import { auditContextOf } from '../access/access-audit';
import type { AccessContext } from '../access/access-context';
import { AccessErrors } from '../access/access.errors';
import type { UserId } from '../identity';
import { MembershipErrors } from './membership.errors';
import { belongsToBusiness, checkHierarchicalAccess } from './membership.resolver';
import type { BusinessId, Membership, MembershipId, Permission, Role } from './membership.types';
import {
  assertCanAcceptInvitation,
  assertCanDeactivate,
  assertMembershipExists,
} from './policies/membership-lifecycle.policy';

function managePermissionFor(targetRole: Role): Permission {
  return targetRole === 'owner' ? 'owner_only' : 'write';
}

export class MembershipService {
  private readonly now: () => Date;

  constructor(
    private readonly deps: {
      uow: TenancyUnitOfWork;
      logger: Logger;
      now?: () => Date;
    },
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  private async assertCanManage(
    ctx: AccessContext,
    businessId: BusinessId,
    targetRole: Role,
  ): Promise<void> {
    const allowed = await checkHierarchicalAccess(ctx, targetRole, managePermissionFor(targetRole), {
      businessId,
    });
    if (!allowed) {
      throw MembershipErrors.insufficientRole({ businessId, targetRole });
    }
  }

  async invite(
    ctx: AccessContext,
    input: { businessId: BusinessId; userId: UserId; role: Role },
  ): Promise<Membership> {
    if (!ctx.isAuthenticatedUser) throw AccessErrors.authenticationRequired();

    if (!(await belongsToBusiness(ctx, input.businessId))) {
      throw MembershipErrors.businessNotFound({ businessId: input.businessId });
    }
    await this.assertCanManage(ctx, input.businessId, input.role);

    const invitedAt = this.now();

    const membership = await this.deps.uow.run(async (tx) => {
      const invitee = await tx.users.findById(input.userId);
      if (!invitee) throw MembershipErrors.inviteeNotFound({ userId: input.userId });

      const existing = await tx.memberships.findByBusinessAndUser({
        businessId: input.businessId,
        userId: input.userId,
      });
      if (existing) {
        throw MembershipErrors.membershipAlreadyExists({
          businessId: input.businessId,
          membershipId: existing.id,
        });
      }

      const created = await tx.memberships.insertMembership({
        businessId: input.businessId,
        userId: input.userId,
        role: input.role,
        status: 'pending',
        invitedAt,
        joinedAt: null,
      });

      await new AuditWriter(tx.audit, auditContextOf(ctx)).recordInsert(
        { tableName: 'business_users', recordId: created.id, businessId: input.businessId },
        { user_id: created.userId, role: created.role, status: created.status },
      );

      return created;
    });

    this.deps.logger.info('membership.invited', {
      flow: 'membership.invite',
      membershipId: membership.id,
      businessId: membership.businessId,
      role: membership.role,
      requestId: ctx.request.requestId,
    });

    return membership;
  }

  async accept(ctx: AccessContext, membershipId: MembershipId): Promise<Membership> {
    if (!ctx.isAuthenticatedUser) throw AccessErrors.authenticationRequired();

    const userId = ctx.userId;
    const at = this.now();

    const accepted = await this.deps.uow.run(async (tx) => {
      const membership = await tx.memberships.findById(membershipId);
      assertMembershipExists(membership);
      assertCanAcceptInvitation(membership, userId);

      const business = await tx.businesses.findById(membership.businessId);
      if (!business || business.deletedAt !== null) {
        throw MembershipErrors.membershipNotFound({ membershipId });
      }

      const moved = await tx.memberships.transitionStatus({
        membershipId,
        from: 'pending',
        to: 'active',
        at,
      });
      if (!moved) throw MembershipErrors.membershipNotPending({ membershipId });

      await new AuditWriter(tx.audit, auditContextOf(ctx)).recordUpdate(
        { tableName: 'business_users', recordId: membershipId, businessId: membership.businessId },
        { status: 'pending', joined_at: null },
        { status: 'active', joined_at: at.toISOString() },
      );

      return { ...membership, status: 'active' as const, joinedAt: at, updatedAt: at };
    });

    this.deps.logger.info('membership.accepted', {
      flow: 'membership.accept',
      membershipId,
      businessId: accepted.businessId,
      requestId: ctx.request.requestId,
    });

    return accepted;
  }

  async deactivate(
    ctx: AccessContext,
    input: { businessId: BusinessId; userId: UserId },
  ): Promise<Membership> {
    if (!ctx.isAuthenticatedUser) throw AccessErrors.authenticationRequired();

    if (!(await belongsToBusiness(ctx, input.businessId))) {
      throw MembershipErrors.businessNotFound({ businessId: input.businessId });
    }

    const actorUserId = ctx.userId;
    const at = this.now();

    const deactivated = await this.deps.uow.run(async (tx) => {
      const membership = await tx.memberships.findByBusinessAndUser(input);
      assertMembershipExists(membership);

      await this.assertCanManage(ctx, input.businessId, membership.role);
      assertCanDeactivate(membership, actorUserId);

      const moved = await tx.memberships.transitionStatus({
        membershipId: membership.id,
        from: 'active',
        to: 'inactive',
        at,
      });
      if (!moved) throw MembershipErrors.membershipNotActive({ membershipId: membership.id });

      await new AuditWriter(tx.audit, auditContextOf(ctx)).recordUpdate(
        { tableName: 'business_users', recordId: membership.id, businessId: input.businessId },
        { status: 'active' },
        { status: 'inactive' },
      );

      return { ...membership, status: 'inactive' as const, updatedAt: at };
    });

    this.deps.logger.info('membership.deactivated', {
      flow: 'membership.deactivate',
      membershipId: deactivated.id,
      businessId: input.businessId,
      requestId: ctx.request.requestId,
    });

    return deactivated;
  }
}
