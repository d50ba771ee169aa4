/**
 * backend/src/modules/memberships/membership.controller.ts
 *
 * WHY:
 * - Maps HTTP -> MembershipService.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Validate with Zod and throw AppError.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from '../../shared/http/errors';
import { requireUser } from '../../shared/http/require-principal';
import {
  businessParamsSchema,
  inviteMemberSchema,
  memberParamsSchema,
  membershipParamsSchema,
} from './membership.schemas';
import type { MembershipService } from './membership.service';
import type { Membership } from './membership.types';

function toResponse(membership: Membership) {
  return {
    id: membership.id,
    businessId: membership.businessId,
    userId: membership.userId,
    role: membership.role,
    status: membership.status,
    invitedAt: membership.invitedAt?.toISOString() ?? null,
    joinedAt: membership.joinedAt?.toISOString() ?? null,
  };
}

export class MembershipController {
  constructor(private readonly membershipService: MembershipService) {}

  async invite(req: FastifyRequest, reply: FastifyReply) {
    requireUser(req);

    const params = businessParamsSchema.safeParse(req.params);
    const body = inviteMemberSchema.safeParse(req.body);
    if (!params.success || !body.success) {
      throw AppError.validationError('Invalid request', {
        issues: [
          ...(params.success ? [] : params.error.issues),
          ...(body.success ? [] : body.error.issues),
        ],
      });
    }

    const membership = await this.membershipService.invite(req.accessContext, {
      businessId: params.data.businessId,
      userId: body.data.userId,
      role: body.data.role,
    });

    return reply.status(201).send({ membership: toResponse(membership) });
  }

  async accept(req: FastifyRequest, reply: FastifyReply) {
    requireUser(req);

    const params = membershipParamsSchema.safeParse(req.params);
    if (!params.success) {
      throw AppError.validationError('Invalid path', { issues: params.error.issues });
    }

    const membership = await this.membershipService.accept(
      req.accessContext,
      params.data.membershipId,
    );

    return reply.status(200).send({ membership: toResponse(membership) });
  }

  async deactivate(req: FastifyRequest, reply: FastifyReply) {
    requireUser(req);

    const params = memberParamsSchema.safeParse(req.params);
    if (!params.success) {
      throw AppError.validationError('Invalid path', { issues: params.error.issues });
    }

    const membership = await this.membershipService.deactivate(req.accessContext, params.data);

    return reply.status(200).send({ membership: toResponse(membership) });
  }
}
