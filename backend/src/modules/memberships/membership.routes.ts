/**
 * backend/src/modules/memberships/membership.routes.ts
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { MembershipController } from './membership.controller';

export function registerMembershipRoutes(app: FastifyInstance, controller: MembershipController) {
  app.post('/api/businesses/:businessId/members', controller.invite.bind(controller));
  app.post(
    '/api/businesses/:businessId/members/:userId/deactivate',
    controller.deactivate.bind(controller),
  );
  app.post('/api/memberships/:membershipId/accept', controller.accept.bind(controller));
}
