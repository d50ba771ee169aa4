import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { buildTestApp } from '../helpers/build-test-app';

const OWNER = 'aaaaaaaa-aaaa-4aaa-8aaa-aaaaaaaaaaa1';
const STAFF = 'aaaaaaaa-aaaa-4aaa-8aaa-aaaaaaaaaaa2';
const SALON = 'bbbbbbbb-bbbb-4bbb-8bbb-bbbbbbbbbbb1';

const ACME = {
  name: 'Acme Salon',
  slug: 'acme-salon',
  industry: 'salons_barbershops',
  email: 'hello@acme.example.com',
};

describe('/api/businesses', () => {
  let ctx: Awaited<ReturnType<typeof buildTestApp>>;

  beforeEach(async () => {
    ctx = await buildTestApp();
    ctx.world.addUser('owner@example.com', OWNER);
    ctx.world.addUser('staff@example.com', STAFF);
    ctx.world.addBusiness('salon', { id: SALON });
    ctx.world.addMembership({ businessId: SALON, userId: OWNER, role: 'owner' });
    ctx.world.addMembership({ businessId: SALON, userId: STAFF, role: 'staff' });
  });

  afterEach(async () => {
    await ctx.close();
  });

  describe('POST /api/businesses', () => {
    it('provisions a business with the caller as its active owner', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/api/businesses',
        headers: await ctx.userAuth(STAFF),
        payload: ACME,
      });

      expect(res.statusCode).toBe(201);
      const { business } = res.json<{ business: { id: string } & Record<string, unknown> }>();
      expect(business).toMatchObject({
        ...ACME,
        status: 'trial',
        subscriptionTier: 'basic',
        subscriptionStatus: 'trialing',
        deletedAt: null,
      });

      const has = await ctx.app.inject({
        method: 'GET',
        url: `/api/access/has-role?role=owner&businessId=${business.id}`,
        headers: await ctx.userAuth(STAFF),
      });
      expect(has.json()).toEqual({ role: 'owner', businessId: business.id, result: true });
    });

    it('requires an authenticated user', async () => {
      const anonymous = await ctx.app.inject({ method: 'POST', url: '/api/businesses', payload: ACME });
      const service = await ctx.app.inject({
        method: 'POST',
        url: '/api/businesses',
        headers: await ctx.serviceAuth(),
        payload: ACME,
      });

      expect(anonymous.statusCode).toBe(401);
      expect(anonymous.json()).toEqual({
        error: { code: 'UNAUTHORIZED', message: 'Authentication required' },
      });
      expect(service.statusCode).toBe(403);
      expect(service.json()).toEqual({ error: { code: 'FORBIDDEN', message: 'Permission denied' } });
    });

    it('refuses a user with no account mirror', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/api/businesses',
        headers: await ctx.userAuth('aaaaaaaa-aaaa-4aaa-8aaa-aaaaaaaaaaa9'),
        payload: ACME,
      });

      expect(res.statusCode).toBe(403);
      expect(res.json()).toEqual({
        error: { code: 'FORBIDDEN', message: 'Your user account is not provisioned yet' },
      });
    });

    it('rejects a taken slug', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/api/businesses',
        headers: await ctx.userAuth(OWNER),
        payload: { ...ACME, slug: 'salon' },
      });

      expect(res.statusCode).toBe(409);
      expect(res.json()).toEqual({
        error: { code: 'CONFLICT', message: 'This business slug is already taken' },
      });
    });

    it('rejects an invalid body', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/api/businesses',
        headers: await ctx.userAuth(OWNER),
        payload: { ...ACME, industry: 'space_travel' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: { code: 'VALIDATION_ERROR', message: 'Invalid request body' },
      });
    });
  });

  describe('DELETE /api/businesses/:businessId', () => {
    it('only an owner may soft delete; non-owners get not found', async () => {
      const denied = await ctx.app.inject({
        method: 'DELETE',
        url: `/api/businesses/${SALON}`,
        headers: await ctx.userAuth(STAFF),
      });
      expect(denied.statusCode).toBe(404);
      expect(denied.json()).toEqual({ error: { code: 'NOT_FOUND', message: 'Business not found' } });

      const deleted = await ctx.app.inject({
        method: 'DELETE',
        url: `/api/businesses/${SALON}`,
        headers: await ctx.userAuth(OWNER),
      });
      expect(deleted.statusCode).toBe(204);
    });

    it('memberships of a soft-deleted business stop granting access', async () => {
      await ctx.app.inject({
        method: 'DELETE',
        url: `/api/businesses/${SALON}`,
        headers: await ctx.userAuth(OWNER),
      });

      const res = await ctx.app.inject({
        method: 'GET',
        url: '/api/me/access',
        headers: await ctx.userAuth(STAFF),
      });

      expect(res.json<{ memberships: unknown[] }>().memberships).toEqual([]);
      expect(ctx.world.businesses.get(SALON)?.deletedAt).toBeInstanceOf(Date);
    });
  });
});
