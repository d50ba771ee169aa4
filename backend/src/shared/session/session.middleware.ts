/**
 * backend/src/shared/session/session.middleware.ts
 *
 * WHY:
 * - Reads `Authorization: Bearer <token>` on every request.
 * - If the token resolves to a live session, populates req.authContext with its principal.
 * - Does NOT throw if there is no session: the caller stays anonymous and every
 *   identity-based check fails closed.
 *
 * RULES:
 * - Runs AFTER requestContext and authContext hooks (needs both to exist).
 * - Best-effort: missing/malformed/unknown/expired tokens leave the request anonymous.
 * - No business logic (just token -> principal mapping).
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { SessionStore } from './session.store';
import { BEARER_PREFIX } from './session.types';

export function readBearerToken(header: string | undefined): string | null {
  if (!header || !header.startsWith(BEARER_PREFIX)) return null;

  const token = header.slice(BEARER_PREFIX.length).trim();
  return token.length > 0 ? token : null;
}

export function registerSessionMiddleware(app: FastifyInstance, sessionStore: SessionStore): void {
  app.addHook('onRequest', async (req: FastifyRequest) => {
    const token = readBearerToken(req.headers.authorization);
    if (!token) return;

    const session = await sessionStore.resolve(token);
    if (!session) return;

    req.authContext = {
      principal: session.principal,
      sessionId: sessionStore.hashToken(token),
    };
  });
}
