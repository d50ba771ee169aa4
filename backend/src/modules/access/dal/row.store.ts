/**
 * backend/src/modules/access/dal/row.store.ts
 *
 * WHY:
 * - Generic row access for the protected tables. The store knows nothing about
 *   policies; GuardedDataService authorizes every row it returns or writes.
 *
 * RULES:
 * - `scope` / `equals` only NARROW a query (fewer rows to authorize). They are
 *   never a substitute for authorization.
 * - Every protected table has a uuid `id` primary key.
 */

import type { Row } from '../policy/policy.types';

export type FindManyQuery = {
  /** column IN (values). An empty value list matches nothing. */
  scope?: { column: string; values: readonly string[] };
  /** column = value, AND-ed. */
  equals?: Record<string, string>;
  limit: number;
  /** Rows to skip in the store's order (newest first, id as tie-break). */
  offset?: number;
};

export interface RowStore {
  findMany(table: string, query: FindManyQuery): Promise<Row[]>;
  findById(table: string, id: string): Promise<Row | undefined>;
  insert(table: string, values: Row): Promise<Row>;
  /** Returns the updated row, or undefined when no row has that id. */
  update(table: string, id: string, patch: Row): Promise<Row | undefined>;
  /** Returns the deleted row, or undefined when no row has that id. */
  delete(table: string, id: string): Promise<Row | undefined>;
}
