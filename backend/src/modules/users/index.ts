/**
 * backend/src/modules/users/index.ts
 *
 * Public surface of the users module.
 */

export { UserRepo } from './dal/user.repo';
export type { UserStore } from './dal/user.store';
export type { User } from './user.types';
