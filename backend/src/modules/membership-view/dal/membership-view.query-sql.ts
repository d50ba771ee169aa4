/**
 * backend/src/modules/membership-view/dal/membership-view.query-sql.ts
 *
 * WHY:
 * - DAL for the `active_user_businesses` materialized view.
 *
 * RULES:
 * - No AppError.
 * - REFRESH ... CONCURRENTLY needs the unique index on (user_id, business_id)
 *   and cannot run inside a transaction block.
 */

import { sql } from 'kysely';
import type { Selectable } from 'kysely';

import type { DbExecutor } from '../../../shared/db/db';
import type { ActiveUserBusinessesView } from '../../../shared/db/tables';

export type MembershipViewDbRow = Selectable<ActiveUserBusinessesView>;

export async function selectViewRowsForUserSql(
  db: DbExecutor,
  userId: string,
): Promise<MembershipViewDbRow[]> {
  return db
    .selectFrom('active_user_businesses')
    .selectAll()
    .where('user_id', '=', userId)
    .orderBy('business_id')
    .execute();
}

export async function refreshViewConcurrentlySql(db: DbExecutor): Promise<void> {
  await sql`refresh materialized view concurrently active_user_businesses`.execute(db);
}
