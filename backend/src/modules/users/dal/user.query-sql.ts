/**
 * backend/src/modules/users/dal/user.query-sql.ts
 *
 * SQL for the user mirror. Rows come back in DB shape; the repo maps them.
 */

import type { Selectable } from 'kysely';

import type { DbExecutor } from '../../../shared/db/db';
import type { UsersTable } from '../../../shared/db/tables';
import type { UserId } from '../../identity';

export type UserRow = Selectable<UsersTable>;

export async function selectUserByIdSql(
  db: DbExecutor,
  userId: UserId,
): Promise<UserRow | undefined> {
  return db.selectFrom('users').selectAll().where('id', '=', userId).executeTakeFirst();
}

/** Mirrors an identity; a row that already exists is left as it is. */
export async function insertUserMirrorSql(
  db: DbExecutor,
  params: { id: UserId; email: string },
): Promise<void> {
  await db
    .insertInto('users')
    .values({ id: params.id, email: params.email.toLowerCase() })
    .onConflict((oc) => oc.column('id').doNothing())
    .execute();
}
