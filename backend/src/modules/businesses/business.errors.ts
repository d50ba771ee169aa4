/**
 * backend/src/modules/businesses/business.errors.ts
 *
 * WHY:
 * - Businesses module owns its domain semantics.
 *
 * SECURITY:
 * - A business the caller cannot manage answers like a missing one.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const BusinessErrors = {
  businessNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Business not found', meta);
  },

  invalidSlug(meta?: AppErrorMeta) {
    return AppError.validationError('Invalid business slug', meta);
  },

  slugReserved(meta?: AppErrorMeta) {
    return AppError.validationError('This business slug is reserved', meta);
  },

  slugTaken(meta?: AppErrorMeta) {
    return AppError.conflict('This business slug is already taken', meta);
  },

  userNotProvisioned(meta?: AppErrorMeta) {
    return AppError.forbidden('Your user account is not provisioned yet', meta);
  },
} as const;
