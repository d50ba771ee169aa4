/**
 * src/modules/_shared/use-cases/provision-business-with-owner.usecase.ts
 *
 * WHY:
 * - "Create a business and make a user its active owner" is needed by the signup
 *   endpoint and by the development seed. Defined once, tested once.
 *
 * WHAT IT DOES:
 * - Inserts the business (DB defaults: status trial, tier basic, subscription trialing).
 * - Inserts an ACTIVE owner membership (joined now, never invited).
 * - Records both inserts in the audit trail.
 *
 * RULES:
 * - Receives trx-bound repos (caller owns the transaction).
 * - Does NOT check slug availability or the user (caller decides the error).
 */

import { AuditWriter } from '../../../shared/audit/audit.writer';
import type { Business } from '../../businesses/business.types';
import type { InsertBusinessParams } from '../../businesses/dal/business.store';
import type { UserId } from '../../identity';
import type { Membership } from '../../memberships/membership.types';
import type { TenancyRepos } from '../tenancy.unit-of-work';

export type ProvisionBusinessParams = InsertBusinessParams & {
  ownerUserId: UserId;
  now: Date;
};

export type ProvisionBusinessResult = {
  business: Business;
  membership: Membership;
};

export async function provisionBusinessWithOwner(
  tx: TenancyRepos,
  audit: AuditWriter,
  params: ProvisionBusinessParams,
): Promise<ProvisionBusinessResult> {
  const business = await tx.businesses.insertBusiness({
    name: params.name,
    slug: params.slug,
    industry: params.industry,
    email: params.email,
  });

  const membership = await tx.memberships.insertMembership({
    businessId: business.id,
    userId: params.ownerUserId,
    role: 'owner',
    status: 'active',
    invitedAt: null,
    joinedAt: params.now,
  });

  const scoped = audit.withSink(tx.audit).withContext({ businessId: business.id });

  await scoped.recordInsert(
    { tableName: 'businesses', recordId: business.id },
    { name: business.name, slug: business.slug, industry: business.industry, email: business.email },
  );
  await scoped.recordInsert(
    { tableName: 'business_users', recordId: membership.id },
    { user_id: membership.userId, role: membership.role, status: membership.status },
  );

  return { business, membership };
}
