/**
 * backend/src/modules/access/access-audit.ts
 *
 * Audit context of the caller behind an AccessContext (who + request metadata).
 */

import type { AuditContext } from '../../shared/audit/audit.types';
import type { AccessContext } from './access-context';

export function auditContextOf(ctx: AccessContext): Partial<AuditContext> {
  return {
    userId: ctx.isAuthenticatedUser ? ctx.userId : null,
    requestId: ctx.request.requestId,
    ip: ctx.request.ip,
    userAgent: ctx.request.userAgent,
  };
}
