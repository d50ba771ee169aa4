/**
 * backend/src/index.ts
 *
 * Entrypoint: config -> app -> listen. Shutdown stops the view scheduler, drains
 * Fastify, then closes Redis and the pg pool (buildApp's close does all three).
 */

import { buildConfig } from './app/config';
import { buildApp } from './app/build-app';
import { logger } from './shared/logger/logger';

async function main(): Promise<void> {
  const config = buildConfig();
  const { app, close } = await buildApp(config);

  await app.listen({ port: config.port, host: '0.0.0.0' });

  logger.info('server.listening', {
    port: config.port,
    env: config.nodeEnv,
    service: config.serviceName,
    membershipViewBackend: config.membershipView.backend,
    membershipViewRefreshIntervalSeconds: config.membershipView.refreshIntervalSeconds,
  });

  let closing: Promise<void> | null = null;

  const shutdown = (signal: NodeJS.Signals) => {
    // A second signal while draining must not close the pool twice.
    if (closing) return;

    logger.info('server.shutdown', { signal });
    closing = close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error('server.shutdown_failed', {
          message: err instanceof Error ? err.message : String(err),
        });
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

void main().catch((err: unknown) => {
  logger.error('server.fatal_startup_error', {
    message: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  process.exit(1);
});
