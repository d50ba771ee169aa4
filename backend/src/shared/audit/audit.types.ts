/**
 * src/shared/audit/audit.types.ts
 *
 * WHY:
 * - Central audit record types (row-level mutation trail stored in audit_logs).
 * - AuditContext groups the request-level fields that repeat on every record.
 * - AuditSink is the seam: Postgres in prod, in-memory in tests.
 *
 * RULES:
 * - Keep types explicit and safe.
 * - Row snapshots are plain objects (the sink serializes them).
 * - Never import module types here (shared must stay module-agnostic).
 */

export const AUDIT_ACTIONS = ['INSERT', 'UPDATE', 'DELETE'] as const;
export type AuditAction = (typeof AUDIT_ACTIONS)[number];

export type AuditRowSnapshot = Record<string, unknown>;

/**
 * Request-level context that is identical across every audit record
 * within a single request.
 *
 * All fields are nullable: anonymous and service callers have no user,
 * and background jobs have no request.
 */
export type AuditContext = {
  userId: string | null;
  businessId: string | null;

  requestId: string | null;
  ip: string | null;
  userAgent: string | null;
};

/**
 * Full audit record shape for persistence.
 * Used by AuditSink implementations only (low-level).
 */
export type AuditRecordInsert = AuditContext & {
  tableName: string;
  recordId: string | null;
  action: AuditAction;
  oldData: AuditRowSnapshot | null;
  newData: AuditRowSnapshot | null;
  changedFields: string[] | null;
};

export interface AuditSink {
  append(record: AuditRecordInsert): Promise<void>;
}
