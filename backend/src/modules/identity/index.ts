/**
 * backend/src/modules/identity/index.ts
 *
 * Public surface of the identity module.
 */

export { resolveUserId, isNilUserId } from './current-user';
export { NIL_USER_ID } from './identity.types';
export type { Principal, PrincipalKind, UserId } from './identity.types';
