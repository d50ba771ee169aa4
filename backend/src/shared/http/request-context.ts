/**
 * backend/src/shared/http/request-context.ts
 *
 * WHY:
 * - A caller may belong to several businesses. The request host pins the one
 *   it is working in: <business-slug>.<domain>.
 * - We also want a stable requestId for logs, audit records and tracing.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app).
 * - After registration, every request has `req.requestContext`.
 *
 * RULES:
 * - businessSlug can be null (localhost root, apex domain, missing/invalid Host header).
 *   A null slug means "no pinned business", never "all businesses".
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';

export type RequestContext = {
  requestId: string;
  host: string | null;
  businessSlug: string | null;
  ip: string | null;
  userAgent: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

const BUSINESS_SLUG_PATTERN = /^[a-z0-9-]+$/;

export function parseHost(rawHost: unknown): string | null {
  if (typeof rawHost !== 'string') return null;

  const trimmed = rawHost.trim();
  if (!trimmed) return null;

  // strip port if present (e.g., "acme.localhost:3000")
  return trimmed.split(':')[0]?.toLowerCase() ?? null;
}

/**
 * Extracts the business slug from the host.
 *
 * Supported:
 * - <slug>.localhost
 * - <slug>.<anything>.<tld> (e.g., acme-salon.tenantguard.app)
 *
 * Returns null for localhost, apex domains and slugs that cannot be a business slug.
 */
export function extractBusinessSlug(host: string | null): string | null {
  if (!host) return null;

  let candidate: string | undefined;

  if (host === 'localhost') return null;
  if (host.endsWith('.localhost')) {
    candidate = host.split('.')[0];
  } else {
    const parts = host.split('.');
    if (parts.length >= 3) candidate = parts[0];
  }

  if (!candidate || candidate === 'localhost') return null;
  return BUSINESS_SLUG_PATTERN.test(candidate) ? candidate : null;
}

export function registerRequestContext(app: FastifyInstance) {
  // We decorate the request so TypeScript + Fastify know the property exists.
  // The real value is assigned on each request in the onRequest hook.
  app.decorateRequest('requestContext', null as unknown as RequestContext);

  // IMPORTANT: Fastify hooks must either be async OR accept `done`.
  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    const host = parseHost(req.headers.host);

    req.requestContext = {
      requestId: randomUUID(),
      host,
      businessSlug: extractBusinessSlug(host),
      ip: req.ip ?? null,
      userAgent: req.headers['user-agent'] ?? null,
    };

    done();
  });
}
