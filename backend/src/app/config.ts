/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 * - Tests call buildConfig(env) with an explicit record.
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string,
 *   so invalid values ('prod', 'staging') fail at startup instead of falling through.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

// z.coerce.boolean() turns "false" into true; accept the spelled-out forms only.
const BooleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),

  DATABASE_URL: z.string().min(1),
  DATABASE_POOL_MAX: z.coerce.number().int().min(1).max(100).default(10),
  REDIS_URL: z.string().min(1),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('tenantguard-backend'),

  // Session
  SESSION_TTL_SECONDS: z.coerce.number().int().min(300).max(604800).default(86400),

  // Cached membership view (display only, never authorization)
  MEMBERSHIP_VIEW_BACKEND: z.enum(['postgres', 'memory']).default('postgres'),
  MEMBERSHIP_VIEW_REFRESH_INTERVAL_SECONDS: z.coerce.number().int().min(0).default(300),
  MEMBERSHIP_VIEW_LOCK_TTL_SECONDS: z.coerce.number().int().min(1).max(3600).default(60),

  // DEV seed bootstrap (idempotent)
  SEED_ON_START: BooleanFlag,
  SEED_BUSINESS_SLUG: z.string().default('demo-salon'),
  SEED_BUSINESS_NAME: z.string().default('Demo Salon'),
  SEED_OWNER_USER_ID: z.string().uuid().default('11111111-1111-4111-8111-111111111111'),
  SEED_OWNER_EMAIL: z.string().email().default('owner@example.com'),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;
export type MembershipViewBackend = 'postgres' | 'memory';

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  databaseUrl: string;
  databasePoolMax: number;
  redisUrl: string;

  logLevel: string;
  serviceName: string;

  sessionTtlSeconds: number;

  membershipView: {
    backend: MembershipViewBackend;
    refreshIntervalSeconds: number;
    lockTtlSeconds: number;
  };

  seed: {
    enabled: boolean;
    businessSlug: string;
    businessName: string;
    ownerUserId: string;
    ownerEmail: string;
  };
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    databasePoolMax: parsed.DATABASE_POOL_MAX,
    redisUrl: parsed.REDIS_URL,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    sessionTtlSeconds: parsed.SESSION_TTL_SECONDS,

    membershipView: {
      backend: parsed.MEMBERSHIP_VIEW_BACKEND,
      refreshIntervalSeconds: parsed.MEMBERSHIP_VIEW_REFRESH_INTERVAL_SECONDS,
      lockTtlSeconds: parsed.MEMBERSHIP_VIEW_LOCK_TTL_SECONDS,
    },

    seed: {
      enabled: parsed.SEED_ON_START,
      businessSlug: parsed.SEED_BUSINESS_SLUG,
      businessName: parsed.SEED_BUSINESS_NAME,
      ownerUserId: parsed.SEED_OWNER_USER_ID,
      ownerEmail: parsed.SEED_OWNER_EMAIL,
    },
  };
}
