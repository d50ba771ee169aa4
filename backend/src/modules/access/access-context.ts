/**
 * backend/src/modules/access/access-context.ts
 *
 * WHY:
 * - Every authorization decision is evaluated against ONE request-scoped context,
 *   never against process-wide state.
 * - The caller's identity and active memberships are resolved once per context, so
 *   every predicate evaluated during the request sees the same snapshot.
 *
 * HOW TO USE:
 * - HTTP: registerAccessContext(app, reader) after the session middleware;
 *   handlers read `req.accessContext`.
 * - Scripts/tests: new AccessContext({ principal, reader }).
 *
 * RULES:
 * - Never throws for absent identity: the nil user id has no memberships.
 * - A pinned business slug (host subdomain) narrows currentBusinessId, nothing else.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';

import { NIL_USER_ID, isNilUserId, resolveUserId } from '../identity';
import type { Principal, UserId } from '../identity';
import type { MembershipReader } from '../memberships/dal/membership.store';
import type { ActiveMembership } from '../memberships/membership.types';

export type AccessRequestMeta = {
  requestId: string | null;
  ip: string | null;
  userAgent: string | null;
};

export type AccessContextParams = {
  principal: Principal;
  reader: MembershipReader;
  businessSlug?: string | null;
  request?: Partial<AccessRequestMeta>;
};

export class AccessContext {
  readonly principal: Principal;
  readonly businessSlug: string | null;
  readonly request: AccessRequestMeta;

  private readonly reader: MembershipReader;
  private readonly membershipsByUser = new Map<UserId, Promise<readonly ActiveMembership[]>>();
  private resolvedUserId: UserId | null = null;

  constructor(params: AccessContextParams) {
    this.principal = params.principal;
    this.reader = params.reader;
    this.businessSlug = params.businessSlug ?? null;
    this.request = {
      requestId: params.request?.requestId ?? null,
      ip: params.request?.ip ?? null,
      userAgent: params.request?.userAgent ?? null,
    };
  }

  /**
   * Identity Resolver: subject of the verified envelope or the nil sentinel.
   */
  get userId(): UserId {
    if (this.resolvedUserId === null) {
      this.resolvedUserId = resolveUserId(this.principal);
    }
    return this.resolvedUserId;
  }

  get isAuthenticatedUser(): boolean {
    return !isNilUserId(this.userId);
  }

  get isService(): boolean {
    return this.principal.kind === 'service';
  }

  /**
   * Active memberships of `userId` (default: the caller), loaded once per context.
   */
  activeMembershipsOf(userId: UserId = this.userId): Promise<readonly ActiveMembership[]> {
    if (userId === NIL_USER_ID) return Promise.resolve([]);

    let pending = this.membershipsByUser.get(userId);
    if (!pending) {
      pending = this.reader.listActiveForUser(userId);
      this.membershipsByUser.set(userId, pending);
    }
    return pending;
  }
}

declare module 'fastify' {
  interface FastifyRequest {
    accessContext: AccessContext;
  }
}

export function buildRequestAccessContext(
  req: FastifyRequest,
  reader: MembershipReader,
): AccessContext {
  return new AccessContext({
    principal: req.authContext.principal,
    reader,
    businessSlug: req.requestContext.businessSlug,
    request: {
      requestId: req.requestContext.requestId,
      ip: req.requestContext.ip,
      userAgent: req.requestContext.userAgent,
    },
  });
}

/**
 * Must be registered AFTER the session middleware: the context captures the principal.
 */
export function registerAccessContext(app: FastifyInstance, reader: MembershipReader): void {
  app.decorateRequest('accessContext', null as unknown as AccessContext);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.accessContext = buildRequestAccessContext(req, reader);
    done();
  });
}
