/**
 * backend/src/modules/memberships/membership.errors.ts
 *
 * WHY:
 * - Memberships module owns its domain semantics.
 * - Keeps shared/http/errors.ts small and stable.
 *
 * SECURITY:
 * - "Not found" must not reveal whether a membership exists in a business
 *   the caller cannot see.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const MembershipErrors = {
  membershipNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Membership not found.', meta);
  },

  businessNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Business not found', meta);
  },

  inviteeNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('User not found', meta);
  },

  membershipNotPending(meta?: AppErrorMeta) {
    return AppError.conflict('This invitation is no longer pending.', meta);
  },

  membershipNotActive(meta?: AppErrorMeta) {
    return AppError.conflict('This membership is not active.', meta);
  },

  membershipAlreadyExists(meta?: AppErrorMeta) {
    return AppError.conflict('A membership already exists for this user and business.', meta);
  },

  cannotDeactivateSelf(meta?: AppErrorMeta) {
    return AppError.forbidden('You cannot deactivate your own membership.', meta);
  },

  insufficientRole(meta?: AppErrorMeta) {
    return AppError.forbidden('Permission denied', meta);
  },
} as const;
