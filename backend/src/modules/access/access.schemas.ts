/**
 * backend/src/modules/access/access.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the access endpoints.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Resource names are validated against the catalog by the service, not here.
 */

import { z } from 'zod';

import { PERMISSIONS, ROLES } from '../memberships/membership.types';

export const hasRoleQuerySchema = z.object({
  role: z.enum(ROLES),
  businessId: z.string().uuid().optional(),
});

export const hierarchicalCheckSchema = z.object({
  targetRole: z.enum(ROLES),
  permission: z.enum(PERMISSIONS),
  businessId: z.string().uuid().optional(),
});

export const resourceParamsSchema = z.object({
  resource: z.string().regex(/^[a-z_]+$/),
});

export const resourceRowParamsSchema = resourceParamsSchema.extend({
  id: z.string().uuid(),
});

export const listQuerySchema = z.object({
  businessId: z.string().uuid().optional(),
  limit: z.coerce.number().int().min(1).max(200).optional(),
});

export const rowBodySchema = z.record(z.string(), z.unknown());

export type HasRoleQuery = z.infer<typeof hasRoleQuerySchema>;
export type HierarchicalCheckInput = z.infer<typeof hierarchicalCheckSchema>;
