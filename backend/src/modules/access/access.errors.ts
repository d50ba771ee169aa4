/**
 * backend/src/modules/access/access.errors.ts
 *
 * WHY:
 * - Access module owns its error semantics.
 *
 * SECURITY:
 * - Denied reads/updates/deletes look exactly like missing rows (404 "Not found").
 * - Denied inserts get one generic message, whatever predicate failed.
 * - Unknown resources answer like missing rows too.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - PolicyErrors are operator-facing (schema/bootstrap time), never sent to end users
 *   for a data request.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const AccessErrors = {
  notFound(meta?: AppErrorMeta) {
    return AppError.notFound('Not found', meta);
  },

  permissionDenied(meta?: AppErrorMeta) {
    return AppError.forbidden('Permission denied', meta);
  },

  authenticationRequired(meta?: AppErrorMeta) {
    return AppError.unauthorized('Authentication required', meta);
  },

  serviceOnly(meta?: AppErrorMeta) {
    return AppError.forbidden('Permission denied', meta);
  },

  columnsNotWritable(columns: string[], meta?: AppErrorMeta) {
    return AppError.validationError(`Columns not writable: ${columns.join(', ')}`, {
      ...meta,
      columns,
    });
  },

  emptyPatch(meta?: AppErrorMeta) {
    return AppError.validationError('Nothing to update', meta);
  },
} as const;

export const PolicyErrors = {
  policyAlreadyExists(params: { table: string; name: string }) {
    return AppError.conflict(
      `policy "${params.name}" for table "${params.table}" already exists`,
      params,
    );
  },

  policyTableMismatch(params: { table: string; policyTable: string }) {
    return AppError.internal(
      `policy for table "${params.policyTable}" cannot replace policies of "${params.table}"`,
      params,
    );
  },
} as const;
