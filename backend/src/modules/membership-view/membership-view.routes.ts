/**
 * backend/src/modules/membership-view/membership-view.routes.ts
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { MembershipViewController } from './membership-view.controller';

export function registerMembershipViewRoutes(
  app: FastifyInstance,
  controller: MembershipViewController,
) {
  app.get('/api/me/businesses/cached', controller.listMine.bind(controller));
  app.post('/api/ops/membership-view/refresh', controller.refresh.bind(controller));
}
