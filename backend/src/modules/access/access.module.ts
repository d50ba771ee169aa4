/**
 * backend/src/modules/access/access.module.ts
 *
 * WHY:
 * - Encapsulates Access module wiring: policy registry (from the resource catalog),
 *   authorizer, guarded data service, controller + routes.
 *
 * RULES:
 * - No infra creation here (DI passes stores/unit of work in).
 * - The registry is built once per app; its policies never change at request time.
 */

import type { FastifyInstance } from 'fastify';

import type { UnitOfWork } from '../../shared/db/unit-of-work';
import { AccessController } from './access.controller';
import { registerAccessRoutes } from './access.routes';
import type { RowStore } from './dal/row.store';
import { GuardedDataService } from './guarded-data.service';
import type { DataRepos } from './guarded-data.service';
import { PolicyAuthorizer } from './policy/policy.authorizer';
import { PolicyRegistry } from './policy/policy.registry';
import { PROTECTED_RESOURCES, ResourceCatalog, applyResourceConfig } from './protected-resources';
import type { ProtectedResource } from './protected-resources';

export type AccessModule = ReturnType<typeof createAccessModule>;

export function createAccessModule(deps: {
  rows: RowStore;
  dataUow: UnitOfWork<DataRepos>;
  resources?: readonly ProtectedResource[];
}) {
  const resources = deps.resources ?? PROTECTED_RESOURCES;

  const registry = new PolicyRegistry();
  applyResourceConfig(registry, resources);

  const authorizer = new PolicyAuthorizer(registry);
  const catalog = new ResourceCatalog(resources);

  const dataService = new GuardedDataService({
    catalog,
    authorizer,
    rows: deps.rows,
    uow: deps.dataUow,
  });

  const controller = new AccessController(dataService);

  return {
    registry,
    authorizer,
    dataService,
    registerRoutes(app: FastifyInstance) {
      registerAccessRoutes(app, controller);
    },
  };
}
