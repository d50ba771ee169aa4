/**
 * backend/src/modules/businesses/business.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Businesses module.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Slug shape is checked again by the slug policy (reserved names live there).
 */

import { z } from 'zod';

import { INDUSTRIES } from './business.types';
import { BusinessSlugSchema } from './policies/business-slug.policy';

export const provisionBusinessSchema = z.object({
  name: z.string().trim().min(1).max(200),
  slug: BusinessSlugSchema,
  industry: z.enum(INDUSTRIES),
  email: z.string().email(),
});

export const businessParamsSchema = z.object({
  businessId: z.string().uuid(),
});

export type ProvisionBusinessInput = z.infer<typeof provisionBusinessSchema>;
