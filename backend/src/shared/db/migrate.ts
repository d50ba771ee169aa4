/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations reliably in dev/CI.
 * - TS migrations live in: src/shared/db/migrations
 * - We run this file with `tsx`, so dynamic imports of `.ts` migrations work.
 *
 * HOW TO USE:
 * - npm run db:migrate --workspace backend
 */

import 'dotenv/config';

import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { readdir } from 'node:fs/promises';

import { Migrator } from 'kysely';
import type { Migration, MigrationProvider } from 'kysely';

import { createDb, dbOptionsFrom } from './db';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

function isMigration(mod: unknown): mod is Migration {
  return typeof mod === 'object' && mod !== null && 'up' in mod && typeof mod.up === 'function';
}

/**
 * Loads TS migrations straight from the source folder (no dist/path confusion).
 */
class SourceMigrationProvider implements MigrationProvider {
  constructor(private readonly migrationsDir: string) {}

  async getMigrations(): Promise<Record<string, Migration>> {
    const files = (await readdir(this.migrationsDir)).filter((f) => f.endsWith('.ts')).sort();

    logger.info('migrations.found', { count: files.length, files });

    const migrations: Record<string, Migration> = {};

    for (const file of files) {
      const url = pathToFileURL(path.join(this.migrationsDir, file)).href;
      const mod: unknown = await import(url);

      if (!isMigration(mod)) {
        throw new Error(`Migration ${file} does not export an up() function`);
      }

      migrations[file.replace(/\.ts$/, '')] = mod;
    }

    return migrations;
  }
}

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb(dbOptionsFrom(config));

  const provider = new SourceMigrationProvider(
    path.join(process.cwd(), 'src/shared/db/migrations'),
  );
  const migrator = new Migrator({ db, provider });

  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('migrations.success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('migrations.error', { migration: r.migrationName });
  });

  await db.destroy();

  if (error) {
    logger.error('migrations.failed', { err: error });
    process.exit(1);
  }

  logger.info('migrations.up_to_date');
}

void runMigrations().catch((err: unknown) => {
  logger.error('migrations.fatal', { err });
  process.exit(1);
});
