/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - Authentication (who is calling) and access (what they may touch) are separate.
 * - The session middleware fills this from a verified bearer token.
 * - Without a valid token the request stays anonymous: no error, just no identity.
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() sets an anonymous stub on every request.
 * 2. Session middleware overwrites it when the bearer token resolves to a session.
 * 3. The access layer turns it into a request-scoped AccessContext.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';

import type { Principal } from '../../modules/identity/identity.types';

export type AuthContext = {
  principal: Principal;
  sessionId: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

export function anonymousAuthContext(): AuthContext {
  return { principal: { kind: 'anonymous' }, sessionId: null };
}

export function registerAuthContext(app: FastifyInstance) {
  app.decorateRequest('authContext', null as unknown as AuthContext);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.authContext = anonymousAuthContext();
    done();
  });
}
