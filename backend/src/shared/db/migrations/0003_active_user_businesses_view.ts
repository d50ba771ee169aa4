/**
 * src/shared/db/migrations/0003_active_user_businesses_view.ts
 *
 * WHY:
 * - Denormalized projection of active memberships for display paths.
 * - all_roles = every role the user holds across their active memberships.
 *
 * RULES:
 * - The unique index on (user_id, business_id) is what allows
 *   REFRESH MATERIALIZED VIEW CONCURRENTLY (readers are not blocked).
 * - Authorization never reads this view.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await sql`
    CREATE MATERIALIZED VIEW active_user_businesses AS
    SELECT
      bu.user_id,
      bu.business_id,
      bu.role,
      array_agg(bu.role) OVER (PARTITION BY bu.user_id) AS all_roles
    FROM business_users bu
    JOIN businesses b ON b.id = bu.business_id
    WHERE bu.status = 'active'
      AND b.deleted_at IS NULL
    WITH DATA;
  `.execute(db);

  await sql`
    CREATE UNIQUE INDEX active_user_businesses_unique
    ON active_user_businesses(user_id, business_id);
  `.execute(db);

  await sql`CREATE INDEX active_user_businesses_business_idx ON active_user_businesses(business_id);`.execute(
    db,
  );
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await sql`DROP MATERIALIZED VIEW IF EXISTS active_user_businesses;`.execute(db);
}
