import { describe, it, expect } from 'vitest';

import { AppError } from '../../../../src/shared/http/errors';
import { assertSeedAllowed, runDevSeed } from '../../../../src/shared/db/seed/dev-seed';
import { expectAppError, expectAppErrorSync } from '../../../helpers/expect-app-error';
import { createInMemStores } from '../../../helpers/inmem-stores';

const OPTIONS = {
  businessSlug: 'demo-salon',
  businessName: 'Demo Salon',
  ownerUserId: '11111111-1111-4111-8111-111111111111',
  ownerEmail: 'owner@example.com',
};

describe('dev seed', () => {
  it.each(['test', 'production'] as const)('refuses to run when NODE_ENV is %s', (nodeEnv) => {
    const err = expectAppErrorSync(() => assertSeedAllowed(nodeEnv));

    expect(err).toBeInstanceOf(AppError);
    expect(err.message).toBe(
      `Dev seed refused: NODE_ENV is "${nodeEnv}", seeding is only allowed in development.`,
    );
  });

  it('runDevSeed rejects outside development before touching the store', async () => {
    const stores = createInMemStores();

    await expectAppError(
      runDevSeed({ nodeEnv: 'production', uow: stores.tenancyUow, options: OPTIONS }),
    );
    expect(stores.tenancyUow.runs).toBe(0);
  });

  it('creates the owner and business once, then reports already_seeded', async () => {
    const stores = createInMemStores();
    const now = new Date('2026-05-05T12:00:00.000Z');

    const first = await runDevSeed({ nodeEnv: 'development', uow: stores.tenancyUow, options: OPTIONS, now });
    const second = await runDevSeed({ nodeEnv: 'development', uow: stores.tenancyUow, options: OPTIONS, now });

    expect(first.status).toBe('created');
    expect(second).toEqual({ status: 'already_seeded', businessId: first.businessId });

    expect(stores.world.users.get(OPTIONS.ownerUserId)?.email).toBe('owner@example.com');
    const owners = Array.from(stores.world.memberships.values());
    expect(owners).toHaveLength(1);
    expect(owners[0]).toMatchObject({
      businessId: first.businessId,
      userId: OPTIONS.ownerUserId,
      role: 'owner',
      status: 'active',
      joinedAt: now,
    });
    expect(stores.world.audit.map((r) => r.tableName)).toEqual(['businesses', 'business_users']);
  });
});
