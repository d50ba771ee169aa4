/**
 * backend/src/modules/access/policy/policy.types.ts
 *
 * WHY:
 * - Row policies are data: a name, the table they guard, the command they cover,
 *   who they apply to, and up to two predicates.
 * - Mirrors row-security semantics:
 *   - `using` decides which EXISTING rows are visible/updatable/deletable;
 *   - `withCheck` decides which NEW rows may be written (falls back to `using`).
 */

import type { AccessContext } from '../access-context';

export const CRUD_ACTIONS = ['select', 'insert', 'update', 'delete'] as const;
export type CrudAction = (typeof CRUD_ACTIONS)[number];

export type PolicyCommand = CrudAction | 'all';

/**
 * 'public' = every end-user caller (anonymous included); 'service' = the trusted service principal.
 */
export type PolicyAudience = 'public' | 'service';

export type Row = Record<string, unknown>;

export type RowPredicate = (ctx: AccessContext, row: Row) => Promise<boolean> | boolean;

export type Policy = {
  name: string;
  table: string;
  command: PolicyCommand;
  appliesTo: PolicyAudience;
  using?: RowPredicate;
  withCheck?: RowPredicate;
};

export type ResourceRef = {
  table: string;
  /** Existing row (select/update/delete). */
  row?: Row;
  /** Candidate row (insert) or row after the patch (update). */
  newRow?: Row;
};

export type AccessDecision = 'allow' | 'deny';

export type OperationFlags = Record<CrudAction, boolean>;

export const ALL_OPERATIONS: OperationFlags = {
  select: true,
  insert: true,
  update: true,
  delete: true,
};
