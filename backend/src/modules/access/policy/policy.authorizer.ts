/**
 * backend/src/modules/access/policy/policy.authorizer.ts
 *
 * WHY:
 * - The single authorization check the data layer calls before touching a row:
 *   authorize(ctx, resource, action) -> 'allow' | 'deny'.
 * - Same evaluation rules as row-level security:
 *   - select/delete: any applicable `using` holds on the existing row;
 *   - insert: any applicable `withCheck ?? using` holds on the new row;
 *   - update: some `using` holds on the existing row AND some `withCheck ?? using`
 *     holds on the updated row.
 *
 * RULES:
 * - Fail-closed: unenforced table, no applicable policy, missing row => deny.
 * - Permissive policies are OR-ed; policies without the needed predicate do not count.
 * - Never throws for a denial; the caller decides how a denial looks (absent row, 403).
 */

import { logger } from '../../../shared/logger/logger';
import type { AccessContext } from '../access-context';
import type { PolicyRegistry } from './policy.registry';
import type {
  AccessDecision,
  CrudAction,
  Policy,
  PolicyAudience,
  ResourceRef,
  Row,
  RowPredicate,
} from './policy.types';

function audienceOf(ctx: AccessContext): PolicyAudience {
  return ctx.isService ? 'service' : 'public';
}

async function anyHolds(
  ctx: AccessContext,
  predicates: readonly RowPredicate[],
  row: Row,
): Promise<boolean> {
  for (const predicate of predicates) {
    if (await predicate(ctx, row)) return true;
  }
  return false;
}

function usingPredicates(policies: readonly Policy[]): RowPredicate[] {
  return policies.flatMap((p) => (p.using ? [p.using] : []));
}

function checkPredicates(policies: readonly Policy[]): RowPredicate[] {
  return policies.flatMap((p) => {
    const check = p.withCheck ?? p.using;
    return check ? [check] : [];
  });
}

export class PolicyAuthorizer {
  constructor(private readonly registry: PolicyRegistry) {}

  async authorize(
    ctx: AccessContext,
    resource: ResourceRef,
    action: CrudAction,
  ): Promise<AccessDecision> {
    if (!this.registry.isEnforced(resource.table)) {
      logger.warn('access.table_not_enforced', {
        flow: 'access.authorize',
        table: resource.table,
        action,
        requestId: ctx.request.requestId,
      });
      return 'deny';
    }

    const policies = this.registry.applicable(resource.table, action, audienceOf(ctx));
    const allowed = await this.evaluate(ctx, policies, resource, action);

    if (!allowed) {
      logger.debug('access.denied', {
        flow: 'access.authorize',
        table: resource.table,
        action,
        principal: ctx.principal.kind,
        userId: ctx.userId,
        requestId: ctx.request.requestId,
      });
    }

    return allowed ? 'allow' : 'deny';
  }

  /**
   * Keeps only the rows the caller may select.
   */
  async filterVisible<T extends Row>(ctx: AccessContext, table: string, rows: readonly T[]) {
    const visible: T[] = [];
    for (const row of rows) {
      if ((await this.authorize(ctx, { table, row }, 'select')) === 'allow') {
        visible.push(row);
      }
    }
    return visible;
  }

  private async evaluate(
    ctx: AccessContext,
    policies: readonly Policy[],
    resource: ResourceRef,
    action: CrudAction,
  ): Promise<boolean> {
    switch (action) {
      case 'select':
      case 'delete':
        if (!resource.row) return false;
        return anyHolds(ctx, usingPredicates(policies), resource.row);

      case 'insert':
        if (!resource.newRow) return false;
        return anyHolds(ctx, checkPredicates(policies), resource.newRow);

      case 'update':
        if (!resource.row || !resource.newRow) return false;
        return (
          (await anyHolds(ctx, usingPredicates(policies), resource.row)) &&
          (await anyHolds(ctx, checkPredicates(policies), resource.newRow))
        );
    }
  }
}
