import { describe, it, expect, beforeEach } from 'vitest';

import { GuardedDataService } from '../../../src/modules/access/guarded-data.service';
import { PolicyAuthorizer } from '../../../src/modules/access/policy/policy.authorizer';
import { PolicyRegistry } from '../../../src/modules/access/policy/policy.registry';
import {
  PROTECTED_RESOURCES,
  ResourceCatalog,
  applyResourceConfig,
} from '../../../src/modules/access/protected-resources';
import { anonymousContext, serviceContext, userContext } from '../../helpers/access-contexts';
import { expectAppError } from '../../helpers/expect-app-error';
import { createInMemStores } from '../../helpers/inmem-stores';
import type { InMemStores } from '../../helpers/inmem-stores';

describe('GuardedDataService', () => {
  let stores: InMemStores;
  let service: GuardedDataService;
  let salonId: string;
  let garageId: string;
  let owner: string;
  let staff: string;

  beforeEach(() => {
    stores = createInMemStores();
    const w = stores.world;

    const registry = new PolicyRegistry();
    applyResourceConfig(registry, PROTECTED_RESOURCES);

    service = new GuardedDataService({
      catalog: new ResourceCatalog(PROTECTED_RESOURCES),
      authorizer: new PolicyAuthorizer(registry),
      rows: stores.rows,
      uow: stores.dataUow,
    });

    salonId = w.addBusiness('salon').id;
    garageId = w.addBusiness('garage').id;
    owner = w.addUser('owner@example.com').id;
    staff = w.addUser('staff@example.com').id;
    w.addMembership({ businessId: salonId, userId: owner, role: 'owner' });
    w.addMembership({ businessId: salonId, userId: staff, role: 'staff' });
  });

  describe('list', () => {
    it('returns only rows of the caller\'s businesses, newest first', async () => {
      const w = stores.world;
      w.addRow('business_locations', { business_id: salonId, name: 'Old' });
      w.addRow('business_locations', { business_id: garageId, name: 'Elsewhere' });
      w.addRow('business_locations', { business_id: salonId, name: 'New' });

      const rows = await service.list(userContext(stores.memberships, staff), 'business_locations');

      expect(rows.map((r) => r.name)).toEqual(['New', 'Old']);
    });

    it('select role sets narrow the query, so rows in other businesses cannot crowd out visible ones', async () => {
      const w = stores.world;
      w.addMembership({ businessId: garageId, userId: staff, role: 'admin' });
      w.addRow('audit_logs', { business_id: garageId, table_name: 'business_locations' });
      for (let i = 0; i < 60; i += 1) {
        w.addRow('audit_logs', { business_id: salonId, table_name: `t${i}` });
      }

      const rows = await service.list(userContext(stores.memberships, staff), 'audit_logs');

      expect(rows.map((r) => r.table_name)).toEqual(['business_locations']);
    });

    it('keeps reading pages until enough rows pass the row condition', async () => {
      const w = stores.world;
      w.addRow('questionnaire_templates', { name: 'Intake', is_active: true });
      for (let i = 0; i < 60; i += 1) {
        w.addRow('questionnaire_templates', { name: `Draft ${i}`, is_active: false });
      }

      const rows = await service.list(anonymousContext(stores.memberships), 'questionnaire_templates');

      expect(rows.map((r) => r.name)).toEqual(['Intake']);
    });

    it('skips own rows tied to a business the caller has left', async () => {
      const w = stores.world;
      const gymId = w.addBusiness('gym').id;
      w.addMembership({ businessId: gymId, userId: staff, role: 'staff', status: 'inactive' });
      w.addRow('user_saved_filters', { user_id: staff, business_id: salonId, name: 'Mine' });
      for (let i = 0; i < 5; i += 1) {
        w.addRow('user_saved_filters', { user_id: staff, business_id: gymId, name: `Gym ${i}` });
      }

      const rows = await service.list(userContext(stores.memberships, staff), 'user_saved_filters', {
        limit: 2,
      });

      expect(rows.map((r) => r.name)).toEqual(['Mine']);
    });

    it('stops at the limit once enough rows are visible', async () => {
      const w = stores.world;
      w.addRow('questionnaire_templates', { name: 'A', is_active: true });
      w.addRow('questionnaire_templates', { name: 'Off', is_active: false });
      w.addRow('questionnaire_templates', { name: 'B', is_active: true });
      w.addRow('questionnaire_templates', { name: 'C', is_active: true });

      const rows = await service.list(anonymousContext(stores.memberships), 'questionnaire_templates', {
        limit: 2,
      });

      expect(rows.map((r) => r.name)).toEqual(['C', 'B']);
    });

    it('narrows to one business and caps the limit', async () => {
      const w = stores.world;
      for (let i = 0; i < 3; i += 1) {
        w.addRow('business_locations', { business_id: salonId, name: `L${i}` });
      }

      const rows = await service.list(userContext(stores.memberships, staff), 'business_locations', {
        businessId: salonId,
        limit: 2,
      });

      expect(rows.map((r) => r.name)).toEqual(['L2', 'L1']);
    });

    it('anonymous callers see no tenant rows and no owner rows', async () => {
      stores.world.addRow('business_locations', { business_id: salonId, name: 'Main' });
      stores.world.addRow('user_devices', { user_id: staff, device_name: 'phone' });
      const anon = anonymousContext(stores.memberships);

      expect(await service.list(anon, 'business_locations')).toEqual([]);
      expect(await service.list(anon, 'user_devices')).toEqual([]);
    });

    it('owner-scoped lists return the caller\'s rows only', async () => {
      stores.world.addRow('user_devices', { user_id: staff, device_name: 'phone' });
      stores.world.addRow('user_devices', { user_id: owner, device_name: 'laptop' });

      const rows = await service.list(userContext(stores.memberships, staff), 'user_devices');

      expect(rows.map((r) => r.device_name)).toEqual(['phone']);
    });

    it('the service principal sees every business', async () => {
      stores.world.addRow('business_locations', { business_id: salonId, name: 'A' });
      stores.world.addRow('business_locations', { business_id: garageId, name: 'B' });

      const rows = await service.list(serviceContext(stores.memberships), 'business_locations');

      expect(rows.map((r) => r.name)).toEqual(['B', 'A']);
    });

    it('unknown resources answer 404', async () => {
      const err = await expectAppError(service.list(userContext(stores.memberships, staff), 'secrets'));

      expect(err.status).toBe(404);
      expect(err.message).toBe('Not found');
    });
  });

  describe('get', () => {
    it('a row in another business is indistinguishable from a missing one', async () => {
      const foreign = stores.world.addRow('business_locations', { business_id: garageId });
      const ctx = userContext(stores.memberships, staff);

      const denied = await expectAppError(service.get(ctx, 'business_locations', String(foreign.id)));
      const missing = await expectAppError(
        service.get(ctx, 'business_locations', '9b2f4a55-0000-4000-8000-000000000000'),
      );

      expect([denied.status, denied.message]).toEqual([404, 'Not found']);
      expect([missing.status, missing.message]).toEqual([404, 'Not found']);
    });
  });

  describe('create', () => {
    it('fills business_id from the current business and audits the insert', async () => {
      const ctx = userContext(stores.memberships, owner);

      const row = await service.create(ctx, 'business_locations', { name: 'Main' });

      expect(row.business_id).toBe(salonId);
      expect(stores.world.rowsOf('business_locations')).toHaveLength(1);
      expect(stores.world.audit).toHaveLength(1);
      expect(stores.world.audit[0]).toMatchObject({
        tableName: 'business_locations',
        recordId: row.id,
        action: 'INSERT',
        userId: owner,
        businessId: salonId,
        requestId: 'req-test',
        oldData: null,
        changedFields: null,
      });
    });

    it('fills user_id for owner-scoped tables', async () => {
      const row = await service.create(userContext(stores.memberships, staff), 'user_preferences', {
        theme: 'dark',
      });

      expect(row.user_id).toBe(staff);
    });

    it('staff cannot insert: generic 403 and nothing written', async () => {
      const err = await expectAppError(
        service.create(userContext(stores.memberships, staff), 'business_locations', { name: 'X' }),
      );

      expect([err.status, err.message]).toEqual([403, 'Permission denied']);
      expect(stores.world.rowsOf('business_locations')).toEqual([]);
      expect(stores.world.audit).toEqual([]);
    });

    it('inserting into a business the caller is not in is denied', async () => {
      const err = await expectAppError(
        service.create(userContext(stores.memberships, owner), 'business_locations', {
          business_id: garageId,
          name: 'X',
        }),
      );

      expect(err.status).toBe(403);
    });

    it('rejects columns outside the writable list', async () => {
      const err = await expectAppError(
        service.create(userContext(stores.memberships, owner), 'business_locations', {
          name: 'X',
          id: 'chosen-id',
          created_at: 'yesterday',
        }),
      );

      expect([err.status, err.message]).toEqual([400, 'Columns not writable: id, created_at']);
    });
  });

  describe('update', () => {
    it('applies the patch and records the changed fields', async () => {
      const existing = stores.world.addRow('business_locations', {
        business_id: salonId,
        name: 'Main',
        city: 'Springfield',
      });

      const row = await service.update(
        userContext(stores.memberships, owner),
        'business_locations',
        String(existing.id),
        { name: 'Flagship' },
      );

      expect(row.name).toBe('Flagship');
      expect(stores.world.audit).toHaveLength(1);
      expect(stores.world.audit[0]).toMatchObject({
        action: 'UPDATE',
        recordId: existing.id,
        changedFields: ['name'],
      });
    });

    it('staff updates report zero rows (404) and change nothing', async () => {
      const existing = stores.world.addRow('business_locations', { business_id: salonId, name: 'Main' });

      const err = await expectAppError(
        service.update(userContext(stores.memberships, staff), 'business_locations', String(existing.id), {
          name: 'Hacked',
        }),
      );

      expect([err.status, err.message]).toEqual([404, 'Not found']);
      expect(stores.world.rowsOf('business_locations')[0]?.name).toBe('Main');
    });

    it('an empty patch is a validation error', async () => {
      const existing = stores.world.addRow('business_locations', { business_id: salonId });

      const err = await expectAppError(
        service.update(userContext(stores.memberships, owner), 'business_locations', String(existing.id), {}),
      );

      expect([err.status, err.message]).toEqual([400, 'Nothing to update']);
    });
  });

  describe('remove', () => {
    it('owner deletes and the delete is audited with the old row', async () => {
      const existing = stores.world.addRow('business_locations', { business_id: salonId, name: 'Main' });

      await service.remove(userContext(stores.memberships, owner), 'business_locations', String(existing.id));

      expect(stores.world.rowsOf('business_locations')).toEqual([]);
      expect(stores.world.audit[0]).toMatchObject({
        action: 'DELETE',
        oldData: { id: existing.id, business_id: salonId, name: 'Main' },
        newData: null,
      });
    });

    it('staff deletes report zero rows (404)', async () => {
      const existing = stores.world.addRow('business_locations', { business_id: salonId });

      const err = await expectAppError(
        service.remove(userContext(stores.memberships, staff), 'business_locations', String(existing.id)),
      );

      expect(err.status).toBe(404);
      expect(stores.world.rowsOf('business_locations')).toHaveLength(1);
    });
  });
});
