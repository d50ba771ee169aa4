/**
 * backend/src/modules/access/dal/row.repo.ts
 *
 * WHY:
 * - Postgres RowStore. Protected tables are not part of the typed DB interface
 *   (their shape is declared in protected-resources.ts), so queries are raw `sql`
 *   with quoted identifiers and bound values.
 *
 * RULES:
 * - Table/column names come from the resource catalog only (sql.table / sql.ref quote them).
 * - Values are always bound parameters.
 * - No transactions started here; supports withDb() for transaction binding.
 * - No AppError. No policies.
 */

import { sql } from 'kysely';
import type { RawBuilder } from 'kysely';

import type { DbExecutor } from '../../../shared/db/db';
import type { Row } from '../policy/policy.types';
import type { FindManyQuery, RowStore } from './row.store';

export class RowRepo implements RowStore {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): RowRepo {
    return new RowRepo(db);
  }

  async findMany(table: string, query: FindManyQuery): Promise<Row[]> {
    const conditions: RawBuilder<unknown>[] = [];

    if (query.scope) {
      if (query.scope.values.length === 0) return [];
      conditions.push(sql`${sql.ref(query.scope.column)} in (${sql.join(query.scope.values)})`);
    }

    for (const [column, value] of Object.entries(query.equals ?? {})) {
      conditions.push(sql`${sql.ref(column)} = ${value}`);
    }

    const where =
      conditions.length > 0 ? sql`where ${sql.join(conditions, sql` and `)}` : sql.raw('');

    const offset = query.offset ?? 0;
    const skip = offset > 0 ? sql` offset ${offset}` : sql.raw('');

    const result = await sql<Row>`select * from ${sql.table(table)} ${where} order by ${sql.ref(
      'created_at',
    )} desc, ${sql.ref('id')} desc limit ${query.limit}${skip}`.execute(this.db);

    return result.rows;
  }

  async findById(table: string, id: string): Promise<Row | undefined> {
    const result = await sql<Row>`select * from ${sql.table(table)} where ${sql.ref(
      'id',
    )} = ${id}`.execute(this.db);

    return result.rows[0];
  }

  async insert(table: string, values: Row): Promise<Row> {
    const entries = Object.entries(values);

    const result =
      entries.length === 0
        ? await sql<Row>`insert into ${sql.table(table)} default values returning *`.execute(
            this.db,
          )
        : await sql<Row>`insert into ${sql.table(table)} (${sql.join(
            entries.map(([column]) => sql.ref(column)),
          )}) values (${sql.join(entries.map(([, value]) => value))}) returning *`.execute(this.db);

    const row = result.rows[0];
    if (!row) {
      throw new Error(`insert into ${table} returned no row`);
    }
    return row;
  }

  async update(table: string, id: string, patch: Row): Promise<Row | undefined> {
    const assignments = Object.entries(patch).map(
      ([column, value]) => sql`${sql.ref(column)} = ${value}`,
    );
    assignments.push(sql`${sql.ref('updated_at')} = now()`);

    const result = await sql<Row>`update ${sql.table(table)} set ${sql.join(
      assignments,
    )} where ${sql.ref('id')} = ${id} returning *`.execute(this.db);

    return result.rows[0];
  }

  async delete(table: string, id: string): Promise<Row | undefined> {
    const result = await sql<Row>`delete from ${sql.table(table)} where ${sql.ref(
      'id',
    )} = ${id} returning *`.execute(this.db);

    return result.rows[0];
  }
}
