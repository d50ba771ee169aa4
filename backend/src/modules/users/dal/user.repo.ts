/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * Kysely UserStore. withDb(trx) binds it to a unit of work.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { UserId } from '../../identity';
import type { User } from '../user.types';
import { insertUserMirrorSql, selectUserByIdSql } from './user.query-sql';
import type { UserRow } from './user.query-sql';
import type { UserStore } from './user.store';

function toUser(row: UserRow): User {
  return { id: row.id, email: row.email, createdAt: row.created_at };
}

export class UserRepo implements UserStore {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): UserRepo {
    return new UserRepo(db);
  }

  async findById(userId: UserId): Promise<User | undefined> {
    const row = await selectUserByIdSql(this.db, userId);
    return row ? toUser(row) : undefined;
  }

  async ensureUser(params: { id: UserId; email: string }): Promise<void> {
    await insertUserMirrorSql(this.db, params);
  }
}
