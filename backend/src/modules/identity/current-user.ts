/**
 * backend/src/modules/identity/current-user.ts
 *
 * Identity Resolver.
 *
 * RULES:
 * - Pure, never throws.
 * - Anything that is not a user principal with a UUID subject resolves to NIL_USER_ID.
 */

import { z } from 'zod';

import { NIL_USER_ID } from './identity.types';
import type { Principal, UserId } from './identity.types';

const UserIdSchema = z.string().uuid();

export function resolveUserId(principal: Principal): UserId {
  if (principal.kind !== 'user') return NIL_USER_ID;

  const parsed = UserIdSchema.safeParse(principal.userId);
  if (!parsed.success) return NIL_USER_ID;

  return parsed.data.toLowerCase();
}

export function isNilUserId(userId: UserId): boolean {
  return userId === NIL_USER_ID;
}
