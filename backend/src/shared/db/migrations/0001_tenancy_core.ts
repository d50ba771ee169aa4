/**
 * src/shared/db/migrations/0001_tenancy_core.ts
 *
 * WHY:
 * - Users mirror the external identity provider (id + email only).
 * - Businesses are the tenant boundary; they are soft-deleted, never hard-deleted.
 * - business_users is the membership join: role + status live on the membership,
 *   never on the user.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await sql`CREATE EXTENSION IF NOT EXISTS "pgcrypto";`.execute(db);

  // ---- users (external identities) ----
  await db.schema
    .createTable('users')
    .addColumn('id', 'uuid', (col) => col.primaryKey())
    .addColumn('email', 'text', (col) => col.notNull().unique())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  // ---- businesses (tenants) ----
  await db.schema
    .createTable('businesses')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('slug', 'text', (col) => col.notNull().unique())
    .addColumn('industry', 'text', (col) => col.notNull())
    .addColumn('email', 'text', (col) => col.notNull())
    .addColumn('status', 'text', (col) => col.notNull().defaultTo('trial'))
    .addColumn('subscription_tier', 'text', (col) => col.notNull().defaultTo('basic'))
    .addColumn('subscription_status', 'text', (col) => col.notNull().defaultTo('trialing'))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('deleted_at', 'timestamptz')
    .execute();

  await sql`
    ALTER TABLE businesses
      ADD CONSTRAINT businesses_slug_check CHECK (slug ~ '^[a-z0-9-]+$'),
      ADD CONSTRAINT businesses_status_check
        CHECK (status IN ('trial','active','suspended','inactive','cancelled')),
      ADD CONSTRAINT businesses_subscription_tier_check
        CHECK (subscription_tier IN ('basic','advanced','professional','enterprise')),
      ADD CONSTRAINT businesses_subscription_status_check
        CHECK (subscription_status IN ('active','cancelled','past_due','trialing','paused')),
      ADD CONSTRAINT businesses_industry_check
        CHECK (industry IN ('salons_barbershops','auto_mechanics','massage_therapy','fitness_wellness','other'));
  `.execute(db);

  // ---- business_users (memberships) ----
  await db.schema
    .createTable('business_users')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('business_id', 'uuid', (col) =>
      col.notNull().references('businesses.id').onDelete('cascade'),
    )
    .addColumn('user_id', 'uuid', (col) => col.notNull().references('users.id').onDelete('cascade'))
    .addColumn('role', 'text', (col) => col.notNull().defaultTo('staff'))
    .addColumn('status', 'text', (col) => col.notNull().defaultTo('pending'))
    .addColumn('invited_at', 'timestamptz')
    .addColumn('joined_at', 'timestamptz')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`
    ALTER TABLE business_users
      ADD CONSTRAINT business_users_role_check
        CHECK (role IN ('owner','admin','manager','staff','client')),
      ADD CONSTRAINT business_users_status_check
        CHECK (status IN ('active','inactive','pending')),
      ADD CONSTRAINT business_users_business_user_unique UNIQUE (business_id, user_id);
  `.execute(db);

  await sql`CREATE INDEX business_users_user_status_idx ON business_users(user_id, status);`.execute(
    db,
  );
  await sql`CREATE INDEX business_users_business_id_idx ON business_users(business_id);`.execute(db);
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('business_users').ifExists().execute();
  await db.schema.dropTable('businesses').ifExists().execute();
  await db.schema.dropTable('users').ifExists().execute();
}
