/**
 * backend/src/modules/users/user.types.ts
 *
 * A user is the local mirror of an identity issued elsewhere: id = token subject.
 * Users are global, never business-scoped, and read-only here (the dev seed mirrors one).
 */

import type { UserId } from '../identity';

export type User = {
  id: UserId;
  email: string;
  createdAt: Date;
};
