/**
 * backend/src/modules/users/dal/user.store.ts
 *
 * Seam for services and the dev seed; UserRepo is the Postgres implementation.
 */

import type { UserId } from '../../identity';
import type { User } from '../user.types';

export interface UserStore {
  findById(userId: UserId): Promise<User | undefined>;

  /**
   * Mirrors an external identity. Existing rows are left untouched.
   */
  ensureUser(params: { id: UserId; email: string }): Promise<void>;
}
