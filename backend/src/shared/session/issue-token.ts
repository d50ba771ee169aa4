/**
 * backend/src/shared/session/issue-token.ts
 *
 * WHY:
 * - Identity is issued by an external provider in production. Locally we still need
 *   bearer tokens to exercise the API, so this script mints a session directly.
 *
 * HOW TO USE:
 * - npm run token:issue --workspace backend -- --user <uuid>
 * - npm run token:issue --workspace backend -- --service ops-cron
 *
 * RULES:
 * - Refuses to run in production.
 * - Prints the raw token once; only its hash is stored.
 */

import { buildConfig } from '../../app/config';
import { RedisCache } from '../cache/redis-cache';
import { logger } from '../logger/logger';
import { Sha256TokenHasher } from '../security/session-token';
import { parseIssueTokenArgs } from './issue-token.args';
import { SessionStore } from './session.store';

async function issueToken(): Promise<void> {
  const config = buildConfig();
  if (config.nodeEnv === 'production') {
    throw new Error('token:issue is not available in production');
  }

  const principal = parseIssueTokenArgs(process.argv.slice(2));

  const redis = await RedisCache.connect(config.redisUrl);
  try {
    const store = new SessionStore(redis, new Sha256TokenHasher(), config.sessionTtlSeconds);
    const issued = await store.issue(principal);

    logger.info('token.issued', {
      flow: 'token.issue',
      principal: principal.kind,
      expiresInSeconds: issued.expiresInSeconds,
    });

    process.stdout.write(`${issued.token}\n`);
  } finally {
    await redis.close();
  }
}

void issueToken().catch((err: unknown) => {
  logger.error('token.issue_failed', {
    flow: 'token.issue',
    message: err instanceof Error ? err.message : String(err),
  });
  process.exit(1);
});
