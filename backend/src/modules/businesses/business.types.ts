/**
 * backend/src/modules/businesses/business.types.ts
 *
 * WHY:
 * - Business = tenant: the isolation boundary every scoped row points at.
 * - Soft-deleted businesses (deletedAt set) stay in the table for history but
 *   confer no access to anyone.
 *
 * RULES:
 * - Keep aligned with DB CHECK constraints (businesses).
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 */

import type { BusinessId } from '../memberships/membership.types';

export const INDUSTRIES = [
  'salons_barbershops',
  'auto_mechanics',
  'massage_therapy',
  'fitness_wellness',
  'other',
] as const;
export type Industry = (typeof INDUSTRIES)[number];

export const BUSINESS_STATUSES = ['trial', 'active', 'suspended', 'inactive', 'cancelled'] as const;
export type BusinessStatus = (typeof BUSINESS_STATUSES)[number];

export const SUBSCRIPTION_TIERS = ['basic', 'advanced', 'professional', 'enterprise'] as const;
export type SubscriptionTier = (typeof SUBSCRIPTION_TIERS)[number];

export const SUBSCRIPTION_STATUSES = [
  'active',
  'cancelled',
  'past_due',
  'trialing',
  'paused',
] as const;
export type SubscriptionStatus = (typeof SUBSCRIPTION_STATUSES)[number];

export type Business = {
  id: BusinessId;
  name: string;
  slug: string;
  industry: Industry;
  email: string;

  status: BusinessStatus;
  subscriptionTier: SubscriptionTier;
  subscriptionStatus: SubscriptionStatus;

  createdAt: Date;
  updatedAt: Date;
  deletedAt: Date | null;
};

function oneOf<T extends string>(values: readonly T[]) {
  return (value: unknown): value is T =>
    typeof value === 'string' && (values as readonly string[]).includes(value);
}

export const isIndustry = oneOf(INDUSTRIES);
export const isBusinessStatus = oneOf(BUSINESS_STATUSES);
export const isSubscriptionTier = oneOf(SUBSCRIPTION_TIERS);
export const isSubscriptionStatus = oneOf(SUBSCRIPTION_STATUSES);
