/**
 * src/shared/session/session.types.ts
 *
 * WHY:
 * - Defines the server-side access-token session model (the verified identity envelope).
 * - Sessions are stored in Redis (via Cache) with a TTL.
 * - A session names exactly one principal: an end user or the trusted service.
 *
 * RULES:
 * - Session data must be JSON-serializable (stored in Redis as JSON string).
 * - The raw bearer token is never stored; the key is its SHA-256 hash.
 * - Session data read back from Redis is validated, never trusted as-is.
 */

import { z } from 'zod';

export const SessionPrincipalSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('user'), userId: z.string().min(1) }),
  z.object({ kind: z.literal('service'), serviceName: z.string().min(1) }),
]);

export type SessionPrincipal = z.infer<typeof SessionPrincipalSchema>;

export const SessionDataSchema = z.object({
  principal: SessionPrincipalSchema,
  createdAt: z.string(), // ISO string (JSON-safe)
});

export type SessionData = z.infer<typeof SessionDataSchema>;

/**
 * Session prefix in Redis. Full key: `session:{sha256(token)}`.
 * Keeps session keys isolated from other cache entries.
 */
export const SESSION_KEY_PREFIX = 'session';

export const BEARER_PREFIX = 'Bearer ';
