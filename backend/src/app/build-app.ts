/**
 * backend/src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> deps -> server -> routes
 * - Makes E2E tests simple (build with in-memory infra, app.inject, close).
 *
 * RULES:
 * - No business logic here (only composition).
 * - No request handlers here (those belong in routes/modules).
 */

import type { AppConfig } from './config';
import { buildDeps, buildModules } from './di';
import type { AppInfra } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';
import { runDevSeed } from '../shared/db/seed/dev-seed';
import { logger } from '../shared/logger/logger';

export async function buildApp(config: AppConfig, opts: { infra?: AppInfra } = {}) {
  const deps = opts.infra ? buildModules(config, opts.infra) : await buildDeps(config);
  const app = await buildServer({ config, deps });

  registerRoutes(app, { config, deps });

  // DEV-only seed bootstrap (throws outside development)
  if (config.seed.enabled) {
    logger.info('seed.start', { flow: 'seed.dev', businessSlug: config.seed.businessSlug });

    await runDevSeed({
      nodeEnv: config.nodeEnv,
      uow: deps.tenancyUow,
      options: config.seed,
    });
  }

  const scheduler = deps.membershipView.startScheduler();

  const close = async () => {
    scheduler.stop();
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
