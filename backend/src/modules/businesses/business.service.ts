/**
 * backend/src/modules/businesses/business.service.ts
 *
 * WHY:
 * - Business lifecycle: provisioning (signup) and soft delete.
 *
 * RULES:
 * - Service owns the transaction (through the tenancy unit of work).
 * - Authorization reads the caller's memberships from the AccessContext.
 * - A business the caller may not delete answers 404, whether it exists or not.
 */

import { AuditWriter } from '../../shared/audit/audit.writer';
import type { Logger } from '../../shared/logger/logger';
import { provisionBusinessWithOwner } from '../_shared/use-cases/provision-business-with-owner.usecase';
import type { TenancyUnitOfWork } from '../_shared/tenancy.unit-of-work';
import { auditContextOf } from '../access/access-audit';
import type { AccessContext } from '../access/access-context';
import { AccessErrors } from '../access/access.errors';
import { hasRole } from '../memberships/membership.resolver';
import type { BusinessId } from '../memberships/membership.types';
import { BusinessErrors } from './business.errors';
import type { Business } from './business.types';
import type { InsertBusinessParams } from './dal/business.store';
import { assertSlugAllowed } from './policies/business-slug.policy';

export class BusinessService {
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

  async provision(ctx: AccessContext, input: InsertBusinessParams): Promise<Business> {
    if (!ctx.isAuthenticatedUser) throw AccessErrors.authenticationRequired();
    assertSlugAllowed(input.slug);

    const ownerUserId = ctx.userId;
    const now = this.now();

    const { business } = await this.deps.uow.run(async (tx) => {
      const user = await tx.users.findById(ownerUserId);
      if (!user) throw BusinessErrors.userNotProvisioned({ userId: ownerUserId });

      const existing = await tx.businesses.findBySlug(input.slug);
      if (existing) throw BusinessErrors.slugTaken({ slug: input.slug });

      return provisionBusinessWithOwner(tx, new AuditWriter(tx.audit, auditContextOf(ctx)), {
        ...input,
        ownerUserId,
        now,
      });
    });

    this.deps.logger.info('business.provisioned', {
      flow: 'business.provision',
      businessId: business.id,
      slug: business.slug,
      userId: ownerUserId,
      requestId: ctx.request.requestId,
    });

    return business;
  }

  async softDelete(ctx: AccessContext, businessId: BusinessId): Promise<Business> {
    if (!(await hasRole(ctx, 'owner', { businessId }))) {
      throw BusinessErrors.businessNotFound({ businessId });
    }

    const at = this.now();

    const deleted = await this.deps.uow.run(async (tx) => {
      const business = await tx.businesses.softDelete({ businessId, at });
      if (!business) throw BusinessErrors.businessNotFound({ businessId });

      await new AuditWriter(tx.audit, auditContextOf(ctx)).recordUpdate(
        { tableName: 'businesses', recordId: businessId, businessId },
        { deleted_at: null },
        { deleted_at: at.toISOString() },
      );

      return business;
    });

    this.deps.logger.info('business.soft_deleted', {
      flow: 'business.soft_delete',
      businessId,
      userId: ctx.userId,
      requestId: ctx.request.requestId,
    });

    return deleted;
  }
}
