/**
 * backend/src/modules/businesses/business.module.ts
 *
 * WHY:
 * - Encapsulates Businesses module wiring.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';

import type { Logger } from '../../shared/logger/logger';
import type { TenancyUnitOfWork } from '../_shared/tenancy.unit-of-work';
import { BusinessController } from './business.controller';
import { registerBusinessRoutes } from './business.routes';
import { BusinessService } from './business.service';

export type BusinessModule = ReturnType<typeof createBusinessModule>;

export function createBusinessModule(deps: { uow: TenancyUnitOfWork; logger: Logger }) {
  const businessService = new BusinessService({ uow: deps.uow, logger: deps.logger });
  const controller = new BusinessController(businessService);

  return {
    businessService,
    registerRoutes(app: FastifyInstance) {
      registerBusinessRoutes(app, controller);
    },
  };
}
