/**
 * backend/src/modules/access/policy/policy.templates.ts
 *
 * WHY:
 * - Four canonical policy shapes cover every protected table; tables never get
 *   hand-written predicates.
 * - Templates only BUILD policies. PolicyRegistry.apply() attaches them (and enforces the table).
 *
 * RULES:
 * - Policy names derive from the table name only, so applying the same template
 *   twice collides on the name.
 * - Default role sets: insert/update {owner, admin, manager}, delete {owner, admin},
 *   select: any active member. Overridable per operation.
 */

import type { AccessContext } from '../access-context';
import {
  activeBusinessIds,
  activeBusinessIdsWithRole,
  belongsToBusiness,
} from '../../memberships/membership.resolver';
import type { Role } from '../../memberships/membership.types';
import { ALL_OPERATIONS } from './policy.types';
import type { OperationFlags, Policy, Row, RowPredicate } from './policy.types';

export const DEFAULT_TENANT_COLUMN = 'business_id';

export const DEFAULT_TENANT_ROLES = {
  insert: ['owner', 'admin', 'manager'],
  update: ['owner', 'admin', 'manager'],
  delete: ['owner', 'admin'],
} as const satisfies Record<'insert' | 'update' | 'delete', readonly Role[]>;

export type TenantRoleOverrides = {
  /** Omitted: any active member may read. */
  select?: readonly Role[];
  insert?: readonly Role[];
  update?: readonly Role[];
  delete?: readonly Role[];
};

export type TenantScopedOptions = {
  tenantColumn?: string;
  operations?: Partial<OperationFlags>;
  roles?: TenantRoleOverrides;
};

export type RowCondition = (row: Row) => boolean;

export const policyNames = {
  tenantSelect: (table: string) => `Users can view own business ${table}`,
  tenantInsert: (table: string) => `Users can insert into own business ${table}`,
  tenantUpdate: (table: string) => `Users can update own business ${table}`,
  tenantDelete: (table: string) => `Users can delete from own business ${table}`,
  ownerSelect: (table: string) => `Users can view own ${table}`,
  ownerInsert: (table: string) => `Users can insert own ${table}`,
  ownerUpdate: (table: string) => `Users can update own ${table}`,
  ownerDelete: (table: string) => `Users can delete own ${table}`,
  ownerManage: (table: string) => `Users can manage own ${table}`,
  publicRead: (table: string) => `Public can read ${table}`,
  serviceBypass: (table: string) => `Service role has full access to ${table}`,
};

function stringColumn(row: Row, column: string): string | null {
  const value = row[column];
  return typeof value === 'string' ? value : null;
}

function tenantIn(
  tenantColumn: string,
  ids: (ctx: AccessContext) => Promise<Set<string>>,
): RowPredicate {
  return async (ctx, row) => {
    const businessId = stringColumn(row, tenantColumn);
    if (businessId === null) return false;
    return (await ids(ctx)).has(businessId);
  };
}

function tenantPredicate(tenantColumn: string, roles: readonly Role[] | undefined): RowPredicate {
  if (roles === undefined) {
    return tenantIn(tenantColumn, (ctx) => activeBusinessIds(ctx));
  }
  return tenantIn(tenantColumn, (ctx) => activeBusinessIdsWithRole(ctx, roles));
}

const isOwnRow: RowPredicate = (ctx, row) => {
  const userId = stringColumn(row, 'user_id');
  // The nil sentinel never owns a row: unauthenticated callers match nothing.
  return ctx.isAuthenticatedUser && userId === ctx.userId;
};

export function tenantScopedPolicies(table: string, options: TenantScopedOptions = {}): Policy[] {
  const tenantColumn = options.tenantColumn ?? DEFAULT_TENANT_COLUMN;
  const ops: OperationFlags = { ...ALL_OPERATIONS, ...options.operations };
  const roles = options.roles ?? {};

  const policies: Policy[] = [];

  if (ops.select) {
    policies.push({
      name: policyNames.tenantSelect(table),
      table,
      command: 'select',
      appliesTo: 'public',
      using: tenantPredicate(tenantColumn, roles.select),
    });
  }

  if (ops.insert) {
    policies.push({
      name: policyNames.tenantInsert(table),
      table,
      command: 'insert',
      appliesTo: 'public',
      withCheck: tenantPredicate(tenantColumn, roles.insert ?? DEFAULT_TENANT_ROLES.insert),
    });
  }

  if (ops.update) {
    // No separate WITH CHECK: the updated row must satisfy the same predicate,
    // so a row cannot be moved into a business the caller may not write to.
    policies.push({
      name: policyNames.tenantUpdate(table),
      table,
      command: 'update',
      appliesTo: 'public',
      using: tenantPredicate(tenantColumn, roles.update ?? DEFAULT_TENANT_ROLES.update),
    });
  }

  if (ops.delete) {
    policies.push({
      name: policyNames.tenantDelete(table),
      table,
      command: 'delete',
      appliesTo: 'public',
      using: tenantPredicate(tenantColumn, roles.delete ?? DEFAULT_TENANT_ROLES.delete),
    });
  }

  return policies;
}

export function ownerScopedPolicies(table: string): Policy[] {
  return [
    {
      name: policyNames.ownerSelect(table),
      table,
      command: 'select',
      appliesTo: 'public',
      using: isOwnRow,
    },
    {
      name: policyNames.ownerInsert(table),
      table,
      command: 'insert',
      appliesTo: 'public',
      withCheck: isOwnRow,
    },
    {
      name: policyNames.ownerUpdate(table),
      table,
      command: 'update',
      appliesTo: 'public',
      using: isOwnRow,
    },
    {
      name: policyNames.ownerDelete(table),
      table,
      command: 'delete',
      appliesTo: 'public',
      using: isOwnRow,
    },
  ];
}

/**
 * Per-user rows that may optionally be attached to a business the user belongs to.
 */
export function ownerInBusinessPolicies(table: string): Policy[] {
  const ownRowInOwnBusiness: RowPredicate = async (ctx, row) => {
    if (!(await isOwnRow(ctx, row))) return false;

    const businessId = row[DEFAULT_TENANT_COLUMN];
    if (businessId === null || businessId === undefined) return true;
    if (typeof businessId !== 'string') return false;

    return belongsToBusiness(ctx, businessId);
  };

  return [
    {
      name: policyNames.ownerSelect(table),
      table,
      command: 'select',
      appliesTo: 'public',
      using: ownRowInOwnBusiness,
    },
    {
      name: policyNames.ownerManage(table),
      table,
      command: 'all',
      appliesTo: 'public',
      using: ownRowInOwnBusiness,
    },
  ];
}

export function publicReadPolicy(table: string, condition: RowCondition = () => true): Policy {
  return {
    name: policyNames.publicRead(table),
    table,
    command: 'select',
    appliesTo: 'public',
    using: (_ctx, row) => condition(row),
  };
}

export function serviceBypassPolicy(table: string): Policy {
  return {
    name: policyNames.serviceBypass(table),
    table,
    command: 'all',
    appliesTo: 'service',
    using: () => true,
  };
}
