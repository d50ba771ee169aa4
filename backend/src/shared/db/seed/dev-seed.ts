/**
 * backend/src/shared/db/seed/dev-seed.ts
 *
 * DEV-ONLY seed bootstrap.
 *
 * Creates:
 * - the owner user mirror (if missing)
 * - a business owned by that user (if the slug is free)
 *
 * Idempotent: safe to run on every start.
 *
 * RULES:
 * - Refuses to run outside NODE_ENV=development (throws, never skips silently).
 * - Goes through the same provisioning use case as the signup endpoint.
 */

import { AuditWriter } from '../../audit/audit.writer';
import { logger } from '../../logger/logger';
import type { NodeEnv } from '../../../app/config';
import type { TenancyUnitOfWork } from '../../../modules/_shared/tenancy.unit-of-work';
import { provisionBusinessWithOwner } from '../../../modules/_shared/use-cases/provision-business-with-owner.usecase';
import { SeedErrors } from './seed.errors';

export type DevSeedOptions = {
  businessSlug: string;
  businessName: string;
  ownerUserId: string;
  ownerEmail: string;
};

export type DevSeedResult =
  | { status: 'created'; businessId: string }
  | { status: 'already_seeded'; businessId: string };

export function assertSeedAllowed(nodeEnv: NodeEnv): void {
  if (nodeEnv !== 'development') {
    throw SeedErrors.environmentNotAllowed(nodeEnv);
  }
}

export async function runDevSeed(opts: {
  nodeEnv: NodeEnv;
  uow: TenancyUnitOfWork;
  options: DevSeedOptions;
  now?: Date;
}): Promise<DevSeedResult> {
  assertSeedAllowed(opts.nodeEnv);

  const { options } = opts;
  const flow = 'seed.dev';

  const result = await opts.uow.run(async (tx): Promise<DevSeedResult> => {
    await tx.users.ensureUser({ id: options.ownerUserId, email: options.ownerEmail });

    const existing = await tx.businesses.findBySlug(options.businessSlug);
    if (existing) {
      return { status: 'already_seeded', businessId: existing.id };
    }

    const { business } = await provisionBusinessWithOwner(
      tx,
      new AuditWriter(tx.audit, { userId: options.ownerUserId }),
      {
        name: options.businessName,
        slug: options.businessSlug,
        industry: 'other',
        email: options.ownerEmail,
        ownerUserId: options.ownerUserId,
        now: opts.now ?? new Date(),
      },
    );

    return { status: 'created', businessId: business.id };
  });

  logger.info('seed.business', {
    flow,
    status: result.status,
    businessId: result.businessId,
    businessSlug: options.businessSlug,
  });

  return result;
}
