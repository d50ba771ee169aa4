/**
 * src/shared/db/migrations/0002_audit_logs.ts
 *
 * WHY:
 * - Append-only trail of every authorization-relevant mutation:
 *   who, which row, before/after, from where.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('audit_logs')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('table_name', 'text', (col) => col.notNull())
    .addColumn('record_id', 'uuid')
    .addColumn('action', 'text', (col) => col.notNull())
    .addColumn('user_id', 'uuid', (col) => col.references('users.id').onDelete('set null'))
    .addColumn('business_id', 'uuid', (col) =>
      col.references('businesses.id').onDelete('set null'),
    )
    .addColumn('old_data', 'jsonb')
    .addColumn('new_data', 'jsonb')
    .addColumn('changed_fields', sql`text[]`)
    .addColumn('ip_address', 'text')
    .addColumn('user_agent', 'text')
    .addColumn('request_id', 'text')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`
    ALTER TABLE audit_logs
      ADD CONSTRAINT audit_logs_action_check CHECK (action IN ('INSERT','UPDATE','DELETE'));
  `.execute(db);

  await sql`CREATE INDEX audit_logs_business_created_idx ON audit_logs(business_id, created_at DESC);`.execute(
    db,
  );
  await sql`CREATE INDEX audit_logs_user_id_idx ON audit_logs(user_id);`.execute(db);
  await sql`CREATE INDEX audit_logs_table_record_idx ON audit_logs(table_name, record_id);`.execute(
    db,
  );
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('audit_logs').ifExists().execute();
}
