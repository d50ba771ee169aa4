/**
 * backend/src/modules/memberships/membership.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Memberships module.
 *
 * RULES:
 * - Use Zod for runtime validation.
 */

import { z } from 'zod';

import { ROLES } from './membership.types';

export const businessParamsSchema = z.object({
  businessId: z.string().uuid(),
});

export const memberParamsSchema = businessParamsSchema.extend({
  userId: z.string().uuid(),
});

export const membershipParamsSchema = z.object({
  membershipId: z.string().uuid(),
});

export const inviteMemberSchema = z.object({
  userId: z.string().uuid(),
  role: z.enum(ROLES),
});

export type InviteMemberInput = z.infer<typeof inviteMemberSchema>;
