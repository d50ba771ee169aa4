/**
 * backend/src/modules/businesses/business.controller.ts
 *
 * WHY:
 * - Maps HTTP -> BusinessService.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Validate with Zod and throw AppError.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from '../../shared/http/errors';
import { requireUser } from '../../shared/http/require-principal';
import { businessParamsSchema, provisionBusinessSchema } from './business.schemas';
import type { BusinessService } from './business.service';
import type { Business } from './business.types';

function toResponse(business: Business) {
  return {
    id: business.id,
    name: business.name,
    slug: business.slug,
    industry: business.industry,
    email: business.email,
    status: business.status,
    subscriptionTier: business.subscriptionTier,
    subscriptionStatus: business.subscriptionStatus,
    deletedAt: business.deletedAt?.toISOString() ?? null,
  };
}

export class BusinessController {
  constructor(private readonly businessService: BusinessService) {}

  async provision(req: FastifyRequest, reply: FastifyReply) {
    requireUser(req);

    const parsed = provisionBusinessSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', { issues: parsed.error.issues });
    }

    const business = await this.businessService.provision(req.accessContext, parsed.data);

    return reply.status(201).send({ business: toResponse(business) });
  }

  async softDelete(req: FastifyRequest, reply: FastifyReply) {
    requireUser(req);

    const parsed = businessParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      throw AppError.validationError('Invalid path', { issues: parsed.error.issues });
    }

    await this.businessService.softDelete(req.accessContext, parsed.data.businessId);

    return reply.status(204).send();
  }
}
