/**
 * src/shared/db/migrations/0004_protected_resource_tables.ts
 *
 * WHY:
 * - The tables guarded by the access layer (see modules/access/protected-resources.ts).
 * - Three shapes:
 *   - business-scoped rows (business_id NOT NULL)
 *   - user-owned rows (user_id NOT NULL, no tenant)
 *   - user-owned rows optionally pinned to a business (business_id NULL allowed)
 *   plus one globally readable reference table.
 *
 * RULES:
 * - Every business-scoped table cascades from businesses and gets the standard
 *   (business_id) and (business_id, created_at) indexes.
 */

import { Kysely, sql } from 'kysely';
import type { CreateTableBuilder } from 'kysely';

function withBaseColumns<TB extends string, C extends string>(table: CreateTableBuilder<TB, C>) {
  return table
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`));
}

function withBusiness<TB extends string, C extends string>(
  table: CreateTableBuilder<TB, C>,
  opts: { nullable: boolean },
) {
  return table.addColumn('business_id', 'uuid', (col) => {
    const ref = col.references('businesses.id').onDelete('cascade');
    return opts.nullable ? ref : ref.notNull();
  });
}

function withUser<TB extends string, C extends string>(table: CreateTableBuilder<TB, C>) {
  return table.addColumn('user_id', 'uuid', (col) =>
    col.notNull().references('users.id').onDelete('cascade'),
  );
}

async function createStandardIndexes(db: Kysely<unknown>, table: string): Promise<void> {
  await sql`CREATE INDEX ${sql.raw(`${table}_business_id_idx`)} ON ${sql.table(table)} (business_id);`.execute(
    db,
  );
  await sql`CREATE INDEX ${sql.raw(`${table}_business_created_idx`)} ON ${sql.table(table)} (business_id, created_at DESC);`.execute(
    db,
  );
}

export async function up(db: Kysely<unknown>): Promise<void> {
  // ---- business-scoped ----
  await withBusiness(withBaseColumns(db.schema.createTable('business_locations')), {
    nullable: false,
  })
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('address_line1', 'text')
    .addColumn('city', 'text')
    .addColumn('postal_code', 'text')
    .addColumn('is_primary', 'boolean', (col) => col.notNull().defaultTo(false))
    .execute();

  await withBusiness(withBaseColumns(db.schema.createTable('business_modules')), {
    nullable: false,
  })
    .addColumn('module_key', 'text', (col) => col.notNull())
    .addColumn('module_category', 'text', (col) =>
      col.notNull().check(sql`module_category IN ('transform','flow','connect')`),
    )
    .addColumn('is_enabled', 'boolean', (col) => col.notNull().defaultTo(true))
    .addColumn('settings', 'jsonb', (col) => col.notNull().defaultTo(sql`'{}'::jsonb`))
    .execute();

  await withBusiness(withBaseColumns(db.schema.createTable('business_integrations')), {
    nullable: false,
  })
    .addColumn('integration_type', 'text', (col) => col.notNull())
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('is_active', 'boolean', (col) => col.notNull().defaultTo(true))
    .addColumn('config', 'jsonb', (col) => col.notNull().defaultTo(sql`'{}'::jsonb`))
    .execute();

  await withBusiness(withBaseColumns(db.schema.createTable('business_notifications')), {
    nullable: false,
  })
    .addColumn('channel', 'text', (col) => col.notNull())
    .addColumn('event_type', 'text', (col) => col.notNull())
    .addColumn('is_enabled', 'boolean', (col) => col.notNull().defaultTo(true))
    .execute();

  for (const table of [
    'business_locations',
    'business_modules',
    'business_integrations',
    'business_notifications',
  ]) {
    await createStandardIndexes(db, table);
  }

  // ---- user-owned ----
  await withUser(withBaseColumns(db.schema.createTable('user_preferences')))
    .addColumn('theme', 'text', (col) => col.notNull().defaultTo('system'))
    .addColumn('language', 'text', (col) => col.notNull().defaultTo('en-AU'))
    .addColumn('timezone', 'text', (col) => col.notNull().defaultTo('Australia/Perth'))
    .execute();

  await withUser(withBaseColumns(db.schema.createTable('user_devices')))
    .addColumn('device_name', 'text', (col) => col.notNull())
    .addColumn('platform', 'text')
    .addColumn('last_seen_at', 'timestamptz')
    .execute();

  // ---- user-owned, optionally pinned to a business ----
  await withBusiness(withUser(withBaseColumns(db.schema.createTable('user_saved_filters'))), {
    nullable: true,
  })
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('entity_type', 'text', (col) => col.notNull())
    .addColumn('filters', 'jsonb', (col) => col.notNull().defaultTo(sql`'{}'::jsonb`))
    .execute();

  await withBusiness(withUser(withBaseColumns(db.schema.createTable('user_dashboard_widgets'))), {
    nullable: true,
  })
    .addColumn('widget_type', 'text', (col) => col.notNull())
    .addColumn('position', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('config', 'jsonb', (col) => col.notNull().defaultTo(sql`'{}'::jsonb`))
    .execute();

  for (const table of ['user_preferences', 'user_devices', 'user_saved_filters', 'user_dashboard_widgets']) {
    await sql`CREATE INDEX ${sql.raw(`${table}_user_id_idx`)} ON ${sql.table(table)} (user_id);`.execute(
      db,
    );
  }

  // ---- global reference data ----
  await withBaseColumns(db.schema.createTable('questionnaire_templates'))
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('industry', 'text', (col) => col.notNull())
    .addColumn('version', 'integer', (col) => col.notNull().defaultTo(1))
    .addColumn('is_active', 'boolean', (col) => col.notNull().defaultTo(true))
    .addColumn('questions', 'jsonb', (col) => col.notNull().defaultTo(sql`'[]'::jsonb`))
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  for (const table of [
    'questionnaire_templates',
    'user_dashboard_widgets',
    'user_saved_filters',
    'user_devices',
    'user_preferences',
    'business_notifications',
    'business_integrations',
    'business_modules',
    'business_locations',
  ]) {
    await db.schema.dropTable(table).ifExists().execute();
  }
}
