/**
 * backend/src/modules/membership-view/membership-view.controller.ts
 *
 * WHY:
 * - Display-path read of the cached view, plus the ops refresh trigger.
 *
 * RULES:
 * - No DB access here.
 * - The cached endpoint only ever returns the caller's own rows.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { requireService } from '../../shared/http/require-principal';
import { withRequestContext } from '../../shared/logger/with-context';
import type { MembershipViewRefresher } from './membership-view.refresher';
import type { MembershipViewStore } from './membership-view.types';

export class MembershipViewController {
  constructor(
    private readonly store: MembershipViewStore,
    private readonly refresher: MembershipViewRefresher,
  ) {}

  async listMine(req: FastifyRequest, reply: FastifyReply) {
    const ctx = req.accessContext;
    const rows = ctx.isAuthenticatedUser ? await this.store.listForUser(ctx.userId) : [];

    return reply.status(200).send({ rows });
  }

  async refresh(req: FastifyRequest, reply: FastifyReply) {
    const serviceName = requireService(req);

    const result = await this.refresher.refresh();

    withRequestContext(req).info('membership_view.refresh.requested', {
      flow: 'membership_view.refresh',
      serviceName,
      status: result.status,
    });

    return reply.status(200).send(result);
  }
}
