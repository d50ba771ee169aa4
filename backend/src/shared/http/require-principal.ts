/**
 * backend/src/shared/http/require-principal.ts
 *
 * WHY:
 * - Most access decisions fail closed on their own (anonymous callers simply see nothing).
 * - Some endpoints only make sense for one kind of caller:
 *   - provisioning, invitations: an end user;
 *   - operational endpoints: the trusted service principal.
 *
 * RULES:
 * - No principal of the required kind -> 401 (anonymous) or 403 (wrong kind).
 * - Returns the narrowed identity so handlers don't re-check.
 */

import type { FastifyRequest } from 'fastify';

import { isNilUserId, resolveUserId } from '../../modules/identity';
import type { UserId } from '../../modules/identity';
import { AppError } from './errors';

export function requireUser(req: FastifyRequest): UserId {
  const principal = req.authContext.principal;

  if (principal.kind === 'service') {
    throw AppError.forbidden('Permission denied', { reason: 'user_principal_required' });
  }

  const userId = resolveUserId(principal);
  if (isNilUserId(userId)) {
    throw AppError.unauthorized('Authentication required');
  }

  return userId;
}

export function requireService(req: FastifyRequest): string {
  const principal = req.authContext.principal;

  if (principal.kind === 'anonymous') {
    throw AppError.unauthorized('Authentication required');
  }
  if (principal.kind !== 'service') {
    throw AppError.forbidden('Permission denied', { reason: 'service_principal_required' });
  }

  return principal.serviceName;
}
