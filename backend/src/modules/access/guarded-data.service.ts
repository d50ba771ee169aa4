/**
 * backend/src/modules/access/guarded-data.service.ts
 *
 * WHY:
 * - The data-access layer for protected tables. Every row read or written goes
 *   through PolicyAuthorizer first; nothing reaches a protected table around it.
 * - Denials never reveal whether a row exists:
 *   - list omits rows, get/update/delete answer 404 "Not found";
 *   - insert answers a generic 403 "Permission denied".
 * - Writes and their audit records share one transaction.
 *
 * RULES:
 * - The store query is narrowed to the caller's scope (businesses, and the select
 *   role set where one is configured); authorization still runs on every row.
 * - list reads pages until `limit` rows are visible or the store runs out, so rows
 *   the narrowing cannot express (row conditions, left businesses) never hide
 *   visible ones behind the limit.
 * - Only catalog-declared writable columns can be set.
 */

import { AuditWriter } from '../../shared/audit/audit.writer';
import type { AuditSink } from '../../shared/audit/audit.types';
import type { UnitOfWork } from '../../shared/db/unit-of-work';
import {
  activeBusinessIds,
  activeBusinessIdsWithRole,
  currentBusinessId,
} from '../memberships/membership.resolver';
import { auditContextOf } from './access-audit';
import type { AccessContext } from './access-context';
import { AccessErrors } from './access.errors';
import type { FindManyQuery, RowStore } from './dal/row.store';
import type { PolicyAuthorizer } from './policy/policy.authorizer';
import { DEFAULT_TENANT_COLUMN } from './policy/policy.templates';
import type { Row } from './policy/policy.types';
import type { ProtectedResource, ResourceCatalog } from './protected-resources';

export type DataRepos = {
  rows: RowStore;
  audit: AuditSink;
};

export const DEFAULT_LIST_LIMIT = 50;
export const MAX_LIST_LIMIT = 200;

export type ListOptions = {
  businessId?: string;
  limit?: number;
};

function tenantColumnOf(resource: ProtectedResource): string | null {
  switch (resource.strategy.kind) {
    case 'tenant':
      return resource.strategy.tenantColumn ?? DEFAULT_TENANT_COLUMN;
    case 'owner-in-business':
      return DEFAULT_TENANT_COLUMN;
    case 'owner':
    case 'public-read':
      return null;
  }
}

function isOwnerStrategy(resource: ProtectedResource): boolean {
  return resource.strategy.kind === 'owner' || resource.strategy.kind === 'owner-in-business';
}

function businessIdOf(resource: ProtectedResource, row: Row): string | null {
  const column = tenantColumnOf(resource);
  if (column === null) return null;

  const value = row[column];
  return typeof value === 'string' ? value : null;
}

export class GuardedDataService {
  constructor(
    private readonly deps: {
      catalog: ResourceCatalog;
      authorizer: PolicyAuthorizer;
      rows: RowStore;
      uow: UnitOfWork<DataRepos>;
    },
  ) {}

  private resource(table: string): ProtectedResource {
    const resource = this.deps.catalog.find(table);
    if (!resource) throw AccessErrors.notFound({ table });
    return resource;
  }

  private assertWritable(resource: ProtectedResource, values: Row): void {
    const rejected = Object.keys(values).filter((c) => !resource.writableColumns.includes(c));
    if (rejected.length > 0) {
      throw AccessErrors.columnsNotWritable(rejected, { table: resource.table });
    }
  }

  private auditWriter(ctx: AccessContext, sink: AuditSink): AuditWriter {
    return new AuditWriter(sink, auditContextOf(ctx));
  }

  private async narrowing(
    ctx: AccessContext,
    resource: ProtectedResource,
    opts: ListOptions,
  ): Promise<Omit<FindManyQuery, 'limit' | 'offset'> | null> {
    const tenantColumn = tenantColumnOf(resource);
    const equals: Record<string, string> = {};

    if (opts.businessId !== undefined && tenantColumn !== null) {
      equals[tenantColumn] = opts.businessId;
    }

    if (ctx.isService) return { equals };

    if (resource.strategy.kind === 'tenant' && tenantColumn !== null) {
      const selectRoles = resource.strategy.roles?.select;
      const ids =
        selectRoles === undefined
          ? await activeBusinessIds(ctx)
          : await activeBusinessIdsWithRole(ctx, selectRoles);
      return { scope: { column: tenantColumn, values: Array.from(ids) }, equals };
    }

    if (isOwnerStrategy(resource)) {
      // Nil user owns nothing.
      if (!ctx.isAuthenticatedUser) return null;
      equals.user_id = ctx.userId;
    }

    return { equals };
  }

  async list(ctx: AccessContext, table: string, opts: ListOptions = {}): Promise<Row[]> {
    const resource = this.resource(table);
    const limit = Math.min(Math.max(opts.limit ?? DEFAULT_LIST_LIMIT, 1), MAX_LIST_LIMIT);

    const narrowing = await this.narrowing(ctx, resource, opts);
    if (narrowing === null) return [];

    const visible: Row[] = [];
    for (let offset = 0; ; offset += limit) {
      const page = await this.deps.rows.findMany(table, { ...narrowing, limit, offset });
      visible.push(...(await this.deps.authorizer.filterVisible(ctx, table, page)));

      if (visible.length >= limit || page.length < limit) break;
    }

    return visible.slice(0, limit);
  }

  async get(ctx: AccessContext, table: string, id: string): Promise<Row> {
    this.resource(table);

    const row = await this.deps.rows.findById(table, id);
    if (!row) throw AccessErrors.notFound({ table, id });

    const decision = await this.deps.authorizer.authorize(ctx, { table, row }, 'select');
    if (decision === 'deny') throw AccessErrors.notFound({ table, id });

    return row;
  }

  async create(ctx: AccessContext, table: string, values: Row): Promise<Row> {
    const resource = this.resource(table);
    this.assertWritable(resource, values);

    const candidate: Row = { ...values };

    if (isOwnerStrategy(resource) && candidate.user_id === undefined && ctx.isAuthenticatedUser) {
      candidate.user_id = ctx.userId;
    }

    const tenantColumn = tenantColumnOf(resource);
    if (
      resource.strategy.kind === 'tenant' &&
      tenantColumn !== null &&
      candidate[tenantColumn] === undefined &&
      resource.writableColumns.includes(tenantColumn)
    ) {
      const businessId = await currentBusinessId(ctx);
      if (businessId !== null) candidate[tenantColumn] = businessId;
    }

    const decision = await this.deps.authorizer.authorize(
      ctx,
      { table, newRow: candidate },
      'insert',
    );
    if (decision === 'deny') throw AccessErrors.permissionDenied({ table });

    return this.deps.uow.run(async (tx) => {
      const inserted = await tx.rows.insert(table, candidate);

      await this.auditWriter(ctx, tx.audit).recordInsert(
        {
          tableName: table,
          recordId: typeof inserted.id === 'string' ? inserted.id : null,
          businessId: businessIdOf(resource, inserted),
        },
        inserted,
      );

      return inserted;
    });
  }

  async update(ctx: AccessContext, table: string, id: string, patch: Row): Promise<Row> {
    const resource = this.resource(table);
    this.assertWritable(resource, patch);
    if (Object.keys(patch).length === 0) {
      throw AccessErrors.emptyPatch({ table });
    }

    return this.deps.uow.run(async (tx) => {
      const existing = await tx.rows.findById(table, id);
      if (!existing) throw AccessErrors.notFound({ table, id });

      const decision = await this.deps.authorizer.authorize(
        ctx,
        { table, row: existing, newRow: { ...existing, ...patch } },
        'update',
      );
      if (decision === 'deny') throw AccessErrors.notFound({ table, id });

      const updated = await tx.rows.update(table, id, patch);
      if (!updated) throw AccessErrors.notFound({ table, id });

      await this.auditWriter(ctx, tx.audit).recordUpdate(
        { tableName: table, recordId: id, businessId: businessIdOf(resource, updated) },
        existing,
        updated,
      );

      return updated;
    });
  }

  async remove(ctx: AccessContext, table: string, id: string): Promise<void> {
    const resource = this.resource(table);

    await this.deps.uow.run(async (tx) => {
      const existing = await tx.rows.findById(table, id);
      if (!existing) throw AccessErrors.notFound({ table, id });

      const decision = await this.deps.authorizer.authorize(ctx, { table, row: existing }, 'delete');
      if (decision === 'deny') throw AccessErrors.notFound({ table, id });

      const deleted = await tx.rows.delete(table, id);
      if (!deleted) throw AccessErrors.notFound({ table, id });

      await this.auditWriter(ctx, tx.audit).recordDelete(
        { tableName: table, recordId: id, businessId: businessIdOf(resource, deleted) },
        deleted,
      );
    });
  }
}
