/**
 * backend/src/modules/businesses/business.routes.ts
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { BusinessController } from './business.controller';

export function registerBusinessRoutes(app: FastifyInstance, controller: BusinessController) {
  app.post('/api/businesses', controller.provision.bind(controller));
  app.delete('/api/businesses/:businessId', controller.softDelete.bind(controller));
}
