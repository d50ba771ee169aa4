/**
 * backend/src/modules/access/access.controller.ts
 *
 * WHY:
 * - Maps HTTP -> resolver/service calls, always with the request's AccessContext.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Validate with Zod and throw AppError.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { ZodType, ZodTypeDef } from 'zod';

import { AppError } from '../../shared/http/errors';
import {
  checkHierarchicalAccess,
  currentBusinessId,
  hasRole,
} from '../memberships/membership.resolver';
import {
  hasRoleQuerySchema,
  hierarchicalCheckSchema,
  listQuerySchema,
  resourceParamsSchema,
  resourceRowParamsSchema,
  rowBodySchema,
} from './access.schemas';
import type { GuardedDataService } from './guarded-data.service';

function parseOrThrow<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown, what: string): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw AppError.validationError(`Invalid ${what}`, { issues: parsed.error.issues });
  }
  return parsed.data;
}

export class AccessController {
  constructor(private readonly data: GuardedDataService) {}

  async me(req: FastifyRequest, reply: FastifyReply) {
    const ctx = req.accessContext;
    const memberships = await ctx.activeMembershipsOf();

    return reply.status(200).send({
      principal: ctx.principal.kind,
      userId: ctx.userId,
      currentBusinessId: await currentBusinessId(ctx),
      memberships: memberships.map((m) => ({
        businessId: m.businessId,
        businessSlug: m.businessSlug,
        role: m.role,
      })),
    });
  }

  async hasRole(req: FastifyRequest, reply: FastifyReply) {
    const query = parseOrThrow(hasRoleQuerySchema, req.query, 'query');

    const result = await hasRole(req.accessContext, query.role, { businessId: query.businessId });

    return reply.status(200).send({ role: query.role, businessId: query.businessId ?? null, result });
  }

  async hierarchicalCheck(req: FastifyRequest, reply: FastifyReply) {
    const body = parseOrThrow(hierarchicalCheckSchema, req.body, 'request body');

    const allowed = await checkHierarchicalAccess(
      req.accessContext,
      body.targetRole,
      body.permission,
      { businessId: body.businessId },
    );

    return reply.status(200).send({ allowed });
  }

  async list(req: FastifyRequest, reply: FastifyReply) {
    const params = parseOrThrow(resourceParamsSchema, req.params, 'path');
    const query = parseOrThrow(listQuerySchema, req.query, 'query');

    const rows = await this.data.list(req.accessContext, params.resource, query);

    return reply.status(200).send({ rows });
  }

  async get(req: FastifyRequest, reply: FastifyReply) {
    const params = parseOrThrow(resourceRowParamsSchema, req.params, 'path');

    const row = await this.data.get(req.accessContext, params.resource, params.id);

    return reply.status(200).send({ row });
  }

  async create(req: FastifyRequest, reply: FastifyReply) {
    const params = parseOrThrow(resourceParamsSchema, req.params, 'path');
    const body = parseOrThrow(rowBodySchema, req.body, 'request body');

    const row = await this.data.create(req.accessContext, params.resource, body);

    return reply.status(201).send({ row });
  }

  async update(req: FastifyRequest, reply: FastifyReply) {
    const params = parseOrThrow(resourceRowParamsSchema, req.params, 'path');
    const body = parseOrThrow(rowBodySchema, req.body, 'request body');

    const row = await this.data.update(req.accessContext, params.resource, params.id, body);

    return reply.status(200).send({ row });
  }

  async remove(req: FastifyRequest, reply: FastifyReply) {
    const params = parseOrThrow(resourceRowParamsSchema, req.params, 'path');

    await this.data.remove(req.accessContext, params.resource, params.id);

    return reply.status(204).send();
  }
}
