/**
 * backend/src/shared/audit/audit.writer.ts
 *
 * WHY:
 * - Binds request-level context ONCE so services don't repeat it on every audit call.
 * - withContext() returns a NEW immutable writer (no mutation), e.g. to pin businessId.
 * - Computes changed_fields for updates.
 *
 * RULES:
 * - No module types imported here (shared must stay module-agnostic).
 * - No business rules.
 * - No AppError.
 */

import type {
  AuditContext,
  AuditRecordInsert,
  AuditRowSnapshot,
  AuditSink,
} from './audit.types';

const EMPTY_CONTEXT: AuditContext = {
  userId: null,
  businessId: null,
  requestId: null,
  ip: null,
  userAgent: null,
};

/**
 * Keys whose values differ between the two snapshots, sorted.
 * Values are compared by their JSON form (Dates and nested objects included).
 */
export function computeChangedFields(
  before: AuditRowSnapshot,
  after: AuditRowSnapshot,
): string[] {
  const keys = new Set([...Object.keys(before), ...Object.keys(after)]);
  const changed: string[] = [];

  for (const key of keys) {
    if (JSON.stringify(before[key]) !== JSON.stringify(after[key])) {
      changed.push(key);
    }
  }

  return changed.sort();
}

type RecordTarget = {
  tableName: string;
  recordId: string | null;
  businessId?: string | null;
};

export class AuditWriter {
  private readonly sink: AuditSink;
  private readonly context: Readonly<AuditContext>;

  constructor(sink: AuditSink, context?: Partial<AuditContext>) {
    this.sink = sink;
    this.context = Object.freeze({ ...EMPTY_CONTEXT, ...context });
  }

  withContext(extra: Partial<AuditContext>): AuditWriter {
    return new AuditWriter(this.sink, { ...this.context, ...extra });
  }

  /**
   * Same context, different sink (e.g. the transaction-bound repo).
   */
  withSink(sink: AuditSink): AuditWriter {
    return new AuditWriter(sink, this.context);
  }

  private async append(
    target: RecordTarget,
    rest: Pick<AuditRecordInsert, 'action' | 'oldData' | 'newData' | 'changedFields'>,
  ): Promise<void> {
    await this.sink.append({
      ...this.context,
      businessId: target.businessId ?? this.context.businessId,
      tableName: target.tableName,
      recordId: target.recordId,
      ...rest,
    });
  }

  async recordInsert(target: RecordTarget, after: AuditRowSnapshot): Promise<void> {
    await this.append(target, {
      action: 'INSERT',
      oldData: null,
      newData: after,
      changedFields: null,
    });
  }

  async recordUpdate(
    target: RecordTarget,
    before: AuditRowSnapshot,
    after: AuditRowSnapshot,
  ): Promise<void> {
    await this.append(target, {
      action: 'UPDATE',
      oldData: before,
      newData: after,
      changedFields: computeChangedFields(before, after),
    });
  }

  async recordDelete(target: RecordTarget, before: AuditRowSnapshot): Promise<void> {
    await this.append(target, {
      action: 'DELETE',
      oldData: before,
      newData: null,
      changedFields: null,
    });
  }
}
