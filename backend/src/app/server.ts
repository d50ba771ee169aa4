/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOOK ORDER (onRequest, registration order matters):
 * 1. requestContext: requestId, host, business slug pinned by the subdomain
 * 2. authContext: anonymous stub
 * 3. session middleware: bearer token -> principal
 * 4. accessContext: request-scoped identity + memberships for authorization
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { registerAccessContext } from '../modules/access/access-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerErrorHandler } from '../shared/http/error-handler';
import { registerRequestContext } from '../shared/http/request-context';
import { withRequestContext } from '../shared/logger/with-context';
import { registerSessionMiddleware } from '../shared/session/session.middleware';

export async function buildServer(opts: { config: AppConfig; deps: AppDeps }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
    trustProxy: opts.config.nodeEnv === 'production',
  });

  registerRequestContext(app);
  registerAuthContext(app);
  registerSessionMiddleware(app, opts.deps.sessionStore);
  registerAccessContext(app, opts.deps.membershipReader);

  registerErrorHandler(app);

  app.addHook('onResponse', async (req, reply) => {
    withRequestContext(req).info('request', {
      method: req.method,
      url: req.url,
      statusCode: reply.statusCode,
    });
  });

  return app;
}
