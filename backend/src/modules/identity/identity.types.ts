/**
 * backend/src/modules/identity/identity.types.ts
 *
 * WHY:
 * - Users are external identities: this system never creates or edits them,
 *   it only reads the subject id of a verified envelope.
 * - A Principal is what the session layer verified about the caller.
 *
 * RULES:
 * - The nil sentinel is a real UUID that can never own a row or a membership,
 *   so every identity-based filter evaluated with it matches nothing.
 */

export type UserId = string;

export const NIL_USER_ID: UserId = '00000000-0000-0000-0000-000000000000';

export type Principal =
  | { kind: 'user'; userId: UserId }
  | { kind: 'service'; serviceName: string }
  | { kind: 'anonymous' };

export type PrincipalKind = Principal['kind'];
