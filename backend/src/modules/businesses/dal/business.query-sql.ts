/**
 * backend/src/modules/businesses/dal/business.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for businesses (raw SQL access).
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { BusinessesTable } from '../../../shared/db/tables';

export type BusinessRow = Selectable<BusinessesTable>;

export async function selectBusinessByIdSql(
  db: DbExecutor,
  businessId: string,
): Promise<BusinessRow | undefined> {
  return db.selectFrom('businesses').selectAll().where('id', '=', businessId).executeTakeFirst();
}

export async function selectBusinessBySlugSql(
  db: DbExecutor,
  slug: string,
): Promise<BusinessRow | undefined> {
  return db.selectFrom('businesses').selectAll().where('slug', '=', slug).executeTakeFirst();
}
