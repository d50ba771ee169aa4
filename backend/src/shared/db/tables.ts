/**
 * backend/src/shared/db/tables.ts
 *
 * WHY:
 * - Kysely needs a Database interface to type queries.
 * - Maintained by hand next to the migrations: every migration that changes a
 *   table the DAL reads or writes updates this file in the same commit.
 *
 * RULES:
 * - snake_case, exactly as in Postgres.
 * - Columns with a DB default are Generated<> (optional on insert).
 * - Protected resource tables (business_locations, user_devices...) are NOT listed
 *   here: they are reached through the generic row store with validated identifiers.
 */

import type { ColumnType, Generated } from 'kysely';

export type JsonPrimitive = string | number | boolean | null;
export type JsonArray = JsonValue[];
export type JsonObject = { [key: string]: JsonValue | undefined };
export type JsonValue = JsonArray | JsonObject | JsonPrimitive;

export type Json = ColumnType<JsonValue, string, string>;

export type CreatedAt = ColumnType<Date, Date | string | undefined, never>;
export type UpdatedAt = ColumnType<Date, Date | string | undefined, Date | string>;

export interface UsersTable {
  id: string;
  email: string;
  created_at: CreatedAt;
}

export interface BusinessesTable {
  id: Generated<string>;
  name: string;
  slug: string;
  industry: string;
  email: string;
  status: Generated<string>;
  subscription_tier: Generated<string>;
  subscription_status: Generated<string>;
  created_at: CreatedAt;
  updated_at: UpdatedAt;
  deleted_at: Date | null;
}

export interface BusinessUsersTable {
  id: Generated<string>;
  business_id: string;
  user_id: string;
  role: string;
  status: string;
  invited_at: Date | null;
  joined_at: Date | null;
  created_at: CreatedAt;
  updated_at: UpdatedAt;
}

/** Materialized view (read-only). */
export interface ActiveUserBusinessesView {
  user_id: string;
  business_id: string;
  role: string;
  all_roles: string[];
}

export interface AuditLogsTable {
  id: Generated<string>;
  table_name: string;
  record_id: string | null;
  action: string;
  user_id: string | null;
  business_id: string | null;
  old_data: Json | null;
  new_data: Json | null;
  changed_fields: string[] | null;
  ip_address: string | null;
  user_agent: string | null;
  request_id: string | null;
  created_at: CreatedAt;
}

export interface DB {
  users: UsersTable;
  businesses: BusinessesTable;
  business_users: BusinessUsersTable;
  active_user_businesses: ActiveUserBusinessesView;
  audit_logs: AuditLogsTable;
}
