/**
 * backend/src/modules/access/policy/policy.registry.ts
 *
 * WHY:
 * - Holds the policies attached to each protected table and whether the table is enforced.
 * - Applying any policy enforces its table: from then on every access is evaluated,
 *   and a table with no matching policy denies.
 *
 * RULES:
 * - Names are unique per table; a second apply() with the same name throws
 *   PolicyErrors.policyAlreadyExists. Callers drop before recreating (replaceResource).
 * - Dropping policies does NOT un-enforce a table (no policies => deny everything).
 */

import { PolicyErrors } from '../access.errors';
import type { CrudAction, Policy, PolicyAudience } from './policy.types';

type TablePolicies = Map<string, Policy>;

export class PolicyRegistry {
  private readonly tables = new Map<string, TablePolicies>();

  /**
   * Enforce a table without attaching any policy (deny-all until policies are added).
   */
  enforce(table: string): void {
    if (!this.tables.has(table)) {
      this.tables.set(table, new Map());
    }
  }

  isEnforced(table: string): boolean {
    return this.tables.has(table);
  }

  /**
   * Attaches policies atomically: if any name collides, nothing is applied.
   */
  apply(policies: readonly Policy[]): void {
    const seen = new Set<string>();

    for (const policy of policies) {
      const key = `${policy.table}\u0000${policy.name}`;
      if (seen.has(key) || this.tables.get(policy.table)?.has(policy.name)) {
        throw PolicyErrors.policyAlreadyExists({ table: policy.table, name: policy.name });
      }
      seen.add(key);
    }

    for (const policy of policies) {
      this.enforce(policy.table);
      this.tables.get(policy.table)?.set(policy.name, policy);
    }
  }

  /**
   * Returns true if the policy existed (DROP POLICY IF EXISTS semantics).
   */
  drop(table: string, name: string): boolean {
    return this.tables.get(table)?.delete(name) ?? false;
  }

  dropAll(table: string): void {
    this.tables.get(table)?.clear();
  }

  /**
   * Drop-before-recreate for one table.
   */
  replaceResource(table: string, policies: readonly Policy[]): void {
    const foreign = policies.find((p) => p.table !== table);
    if (foreign) {
      throw PolicyErrors.policyTableMismatch({ table, policyTable: foreign.table });
    }

    this.dropAll(table);
    this.apply(policies);
  }

  policyNames(table: string): string[] {
    return Array.from(this.tables.get(table)?.keys() ?? []);
  }

  tablesEnforced(): string[] {
    return Array.from(this.tables.keys());
  }

  /**
   * Policies that govern `action` on `table` for the given audience.
   */
  applicable(table: string, action: CrudAction, audience: PolicyAudience): Policy[] {
    const policies = this.tables.get(table);
    if (!policies) return [];

    return Array.from(policies.values()).filter(
      (p) => p.appliesTo === audience && (p.command === action || p.command === 'all'),
    );
  }
}
