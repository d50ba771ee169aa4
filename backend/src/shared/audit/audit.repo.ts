/**
 * backend/src/shared/audit/audit.repo.ts
 *
 * WHY:
 * - Append-only AuditSink backed by audit_logs.
 *
 * RULES:
 * - DAL-style component: DB concerns only.
 * - No business rules here.
 * - No AppError.
 * - Must work with both DB and transactions (DbExecutor).
 * - Row snapshots are serialized here (functions/symbols/undefined dropped by JSON).
 */

import type { DbExecutor } from '../db/db';
import type { AuditRecordInsert, AuditRowSnapshot, AuditSink } from './audit.types';

function toJsonText(input: AuditRowSnapshot | null): string | null {
  return input === null ? null : JSON.stringify(input);
}

export class AuditRepo implements AuditSink {
  constructor(private readonly db: DbExecutor) {}

  /**
   * Returns a repo bound to a different executor (e.g. a transaction).
   */
  withDb(db: DbExecutor): AuditRepo {
    return new AuditRepo(db);
  }

  async append(record: AuditRecordInsert): Promise<void> {
    await this.db
      .insertInto('audit_logs')
      .values({
        table_name: record.tableName,
        record_id: record.recordId,
        action: record.action,
        user_id: record.userId,
        business_id: record.businessId,
        old_data: toJsonText(record.oldData),
        new_data: toJsonText(record.newData),
        changed_fields: record.changedFields,
        ip_address: record.ip,
        user_agent: record.userAgent,
        request_id: record.requestId,
        // created_at has a DB default
      })
      .execute();
  }
}
