/**
 * backend/src/modules/access/protected-resources.ts
 *
 * WHY:
 * - One declarative table decides how every protected table is scoped.
 *   Adding a table = adding an entry here (and a migration), never new predicate code.
 * - applyResourceConfig() is the only consumer: it turns entries into policies.
 *
 * RULES:
 * - `writableColumns` is the allow-list of columns the generic data API may set.
 *   Anything else (id, timestamps, deleted_at) is owned by the database or by services.
 * - Identifiers here are trusted (they reach SQL as quoted identifiers).
 */

import type { PolicyRegistry } from './policy/policy.registry';
import {
  ownerInBusinessPolicies,
  ownerScopedPolicies,
  publicReadPolicy,
  serviceBypassPolicy,
  tenantScopedPolicies,
} from './policy/policy.templates';
import type { RowCondition, TenantScopedOptions } from './policy/policy.templates';
import type { Policy } from './policy/policy.types';

export type ResourceStrategy =
  | ({ kind: 'tenant' } & TenantScopedOptions)
  | { kind: 'owner' }
  | { kind: 'owner-in-business' }
  | { kind: 'public-read'; condition?: RowCondition };

export type ProtectedResource = {
  table: string;
  strategy: ResourceStrategy;
  serviceBypass: boolean;
  writableColumns: readonly string[];
};

const BUSINESS_SCOPED_TABLES: readonly ProtectedResource[] = [
  {
    table: 'business_locations',
    strategy: { kind: 'tenant' },
    serviceBypass: true,
    writableColumns: ['business_id', 'name', 'address_line1', 'city', 'postal_code', 'is_primary'],
  },
  {
    table: 'business_modules',
    strategy: { kind: 'tenant' },
    serviceBypass: true,
    writableColumns: ['business_id', 'module_key', 'module_category', 'is_enabled', 'settings'],
  },
  {
    table: 'business_integrations',
    strategy: { kind: 'tenant' },
    serviceBypass: true,
    writableColumns: ['business_id', 'integration_type', 'name', 'is_active', 'config'],
  },
  {
    table: 'business_notifications',
    strategy: { kind: 'tenant' },
    serviceBypass: true,
    writableColumns: ['business_id', 'channel', 'event_type', 'is_enabled'],
  },
];

export const PROTECTED_RESOURCES: readonly ProtectedResource[] = [
  {
    // Provisioning and soft delete go through the businesses service.
    table: 'businesses',
    strategy: {
      kind: 'tenant',
      tenantColumn: 'id',
      operations: { insert: false, delete: false },
      roles: { update: ['owner'] },
    },
    serviceBypass: true,
    writableColumns: ['name', 'industry', 'email'],
  },
  {
    // Read-only here: invite/accept/deactivate go through the membership service,
    // which enforces the role hierarchy and the status transitions.
    table: 'business_users',
    strategy: {
      kind: 'tenant',
      operations: { insert: false, update: false, delete: false },
    },
    serviceBypass: true,
    writableColumns: [],
  },
  ...BUSINESS_SCOPED_TABLES,
  {
    table: 'user_preferences',
    strategy: { kind: 'owner' },
    serviceBypass: true,
    writableColumns: ['user_id', 'theme', 'language', 'timezone'],
  },
  {
    table: 'user_devices',
    strategy: { kind: 'owner' },
    serviceBypass: true,
    writableColumns: ['user_id', 'device_name', 'platform', 'last_seen_at'],
  },
  {
    table: 'user_saved_filters',
    strategy: { kind: 'owner-in-business' },
    serviceBypass: true,
    writableColumns: ['user_id', 'business_id', 'name', 'entity_type', 'filters'],
  },
  {
    table: 'user_dashboard_widgets',
    strategy: { kind: 'owner-in-business' },
    serviceBypass: true,
    writableColumns: ['user_id', 'business_id', 'widget_type', 'position', 'config'],
  },
  {
    table: 'questionnaire_templates',
    strategy: { kind: 'public-read', condition: (row) => row.is_active === true },
    serviceBypass: true,
    writableColumns: ['name', 'industry', 'version', 'is_active', 'questions'],
  },
  {
    // Written by the audit sink only; readable by owners and admins of the business.
    table: 'audit_logs',
    strategy: {
      kind: 'tenant',
      operations: { insert: false, update: false, delete: false },
      roles: { select: ['owner', 'admin'] },
    },
    serviceBypass: true,
    writableColumns: [],
  },
];

export function policiesForResource(resource: ProtectedResource): Policy[] {
  const { table, strategy } = resource;

  const policies: Policy[] = (() => {
    switch (strategy.kind) {
      case 'tenant':
        return tenantScopedPolicies(table, strategy);
      case 'owner':
        return ownerScopedPolicies(table);
      case 'owner-in-business':
        return ownerInBusinessPolicies(table);
      case 'public-read':
        return [publicReadPolicy(table, strategy.condition)];
    }
  })();

  if (resource.serviceBypass) {
    policies.push(serviceBypassPolicy(table));
  }

  return policies;
}

/**
 * Attaches the policies of every resource. Throws on the first duplicate policy name,
 * i.e. when a resource is already configured; use reapply for drop-and-recreate.
 */
export function applyResourceConfig(
  registry: PolicyRegistry,
  resources: readonly ProtectedResource[],
  opts: { reapply?: boolean } = {},
): void {
  for (const resource of resources) {
    const policies = policiesForResource(resource);
    if (opts.reapply) {
      registry.replaceResource(resource.table, policies);
    } else {
      registry.apply(policies);
    }
  }
}

export class ResourceCatalog {
  private readonly byTable: Map<string, ProtectedResource>;

  constructor(resources: readonly ProtectedResource[]) {
    this.byTable = new Map(resources.map((r) => [r.table, r]));
  }

  find(table: string): ProtectedResource | undefined {
    return this.byTable.get(table);
  }

  tables(): string[] {
    return Array.from(this.byTable.keys());
  }
}
