/**
 * backend/src/modules/memberships/membership.module.ts
 *
 * WHY:
 * - Encapsulates Memberships module wiring: the reader the access layer resolves
 *   memberships through, and the lifecycle service + routes.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';

import type { Logger } from '../../shared/logger/logger';
import type { TenancyUnitOfWork } from '../_shared/tenancy.unit-of-work';
import type { MembershipReader } from './dal/membership.store';
import { MembershipController } from './membership.controller';
import { registerMembershipRoutes } from './membership.routes';
import { MembershipService } from './membership.service';

export type MembershipModule = ReturnType<typeof createMembershipModule>;

export function createMembershipModule(deps: {
  reader: MembershipReader;
  uow: TenancyUnitOfWork;
  logger: Logger;
}) {
  const membershipService = new MembershipService({ uow: deps.uow, logger: deps.logger });
  const controller = new MembershipController(membershipService);

  return {
    reader: deps.reader,
    membershipService,
    registerRoutes(app: FastifyInstance) {
      registerMembershipRoutes(app, controller);
    },
  };
}
