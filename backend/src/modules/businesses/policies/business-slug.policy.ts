/**
 * backend/src/modules/businesses/policies/business-slug.policy.ts
 *
 * WHY:
 * - The slug is the business's subdomain, so it must be a valid DNS label and
 *   must not shadow hosts the platform uses itself.
 *
 * RULES:
 * - Pure functions only.
 * - Throws module-level BusinessErrors.
 */

import { z } from 'zod';

import { BusinessErrors } from '../business.errors';

export const RESERVED_SLUGS = new Set(['www', 'api', 'app', 'admin', 'localhost', 'static']);

export const BusinessSlugSchema = z
  .string()
  .min(3)
  .max(63)
  .regex(/^[a-z0-9-]+$/, 'lowercase letters, digits and hyphens only')
  .refine((s) => !s.startsWith('-') && !s.endsWith('-'), 'cannot start or end with a hyphen');

export function assertSlugAllowed(slug: string): void {
  const parsed = BusinessSlugSchema.safeParse(slug);
  if (!parsed.success) {
    throw BusinessErrors.invalidSlug({ slug, issues: parsed.error.issues });
  }
  if (RESERVED_SLUGS.has(slug)) {
    throw BusinessErrors.slugReserved({ slug });
  }
}
