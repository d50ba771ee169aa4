/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - One place creates the Kysely instance over a pg pool.
 * - Table types live in ./tables.ts, next to the migrations that define them.
 *
 * RULES:
 * - Connections carry application_name = SERVICE_NAME so they can be told apart
 *   in pg_stat_activity (the refresher and the API share one database).
 */

import pg from 'pg';
import { Kysely, PostgresDialect } from 'kysely';

import type { DB } from './tables';

export type Db = Kysely<DB>;

/**
 * The only DB capability repos and query functions accept.
 * A Transaction<DB> is a Kysely<DB>, so the same code runs inside and outside a unit of work.
 */
export type DbExecutor = Kysely<DB>;

export type DbOptions = {
  databaseUrl: string;
  poolMax: number;
  applicationName: string;
};

export function createDb(opts: DbOptions): Db {
  const pool = new pg.Pool({
    connectionString: opts.databaseUrl,
    max: opts.poolMax,
    application_name: opts.applicationName,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  return new Kysely<DB>({ dialect: new PostgresDialect({ pool }) });
}

export function dbOptionsFrom(config: {
  databaseUrl: string;
  databasePoolMax: number;
  serviceName: string;
}): DbOptions {
  return {
    databaseUrl: config.databaseUrl,
    poolMax: config.databasePoolMax,
    applicationName: config.serviceName,
  };
}
