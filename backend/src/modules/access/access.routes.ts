/**
 * backend/src/modules/access/access.routes.ts
 *
 * WHY:
 * - Declares access endpoints: caller introspection, role checks, guarded data API.
 *
 * SECURITY:
 * - No route here requires authentication up front: anonymous callers get the
 *   nil identity and every predicate denies (public-read tables excepted).
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { AccessController } from './access.controller';

export function registerAccessRoutes(app: FastifyInstance, controller: AccessController) {
  app.get('/api/me/access', controller.me.bind(controller));

  app.get('/api/access/has-role', controller.hasRole.bind(controller));
  app.post('/api/access/hierarchical-check', controller.hierarchicalCheck.bind(controller));

  app.get('/api/data/:resource', controller.list.bind(controller));
  app.get('/api/data/:resource/:id', controller.get.bind(controller));
  app.post('/api/data/:resource', controller.create.bind(controller));
  app.patch('/api/data/:resource/:id', controller.update.bind(controller));
  app.delete('/api/data/:resource/:id', controller.remove.bind(controller));
}
