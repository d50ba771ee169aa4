/**
 * backend/src/modules/businesses/business.queries.ts
 *
 * WHY:
 * - Shapes DB rows into Business domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 * - Unknown DB values degrade to the most restrictive value.
 */

import type { DbExecutor } from '../../shared/db/db';
import { selectBusinessByIdSql, selectBusinessBySlugSql } from './dal/business.query-sql';
import type { BusinessRow } from './dal/business.query-sql';
import {
  isBusinessStatus,
  isIndustry,
  isSubscriptionStatus,
  isSubscriptionTier,
} from './business.types';
import type { Business } from './business.types';

export function toBusiness(row: BusinessRow): Business {
  return {
    id: row.id,
    name: row.name,
    slug: row.slug,
    industry: isIndustry(row.industry) ? row.industry : 'other',
    email: row.email,
    status: isBusinessStatus(row.status) ? row.status : 'suspended',
    subscriptionTier: isSubscriptionTier(row.subscription_tier) ? row.subscription_tier : 'basic',
    subscriptionStatus: isSubscriptionStatus(row.subscription_status)
      ? row.subscription_status
      : 'paused',
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    deletedAt: row.deleted_at ?? null,
  };
}

export async function getBusinessById(
  db: DbExecutor,
  businessId: string,
): Promise<Business | undefined> {
  const row = await selectBusinessByIdSql(db, businessId);
  if (!row) return undefined;
  return toBusiness(row);
}

export async function getBusinessBySlug(db: DbExecutor, slug: string): Promise<Business | undefined> {
  const row = await selectBusinessBySlugSql(db, slug);
  if (!row) return undefined;
  return toBusiness(row);
}
