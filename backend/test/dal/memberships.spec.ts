import { describe, it, expect } from 'vitest';

import { MembershipRepo } from '../../src/modules/memberships/dal/membership.repo';
import { PostgresMembershipView } from '../../src/modules/membership-view/dal/postgres-membership-view';
import { createRecordingDb } from '../helpers/recording-db';

describe('MembershipRepo (compiled SQL)', () => {
  it('active memberships: active status, live business, ordered by business id', async () => {
    const { db, queries } = createRecordingDb();

    const memberships = await new MembershipRepo(db).listActiveForUser('user-1');

    expect(memberships).toEqual([]);
    expect(queries.map((q) => q.sql)).toEqual([
      'select "bu"."id" as "membership_id", "bu"."business_id", "b"."slug" as "business_slug", "bu"."user_id", "bu"."role" ' +
        'from "business_users" as "bu" inner join "businesses" as "b" on "b"."id" = "bu"."business_id" ' +
        'where "bu"."status" = $1 and "b"."deleted_at" is null and "bu"."user_id" = $2 ' +
        'order by "bu"."business_id"',
    ]);
    expect(queries.map((q) => q.parameters)).toEqual([['active', 'user-1']]);
  });

  it('transitionStatus is a compare-and-set on the current status', async () => {
    const { db, queries } = createRecordingDb();
    const at = new Date('2026-01-02T03:04:05.000Z');

    const moved = await new MembershipRepo(db).transitionStatus({
      membershipId: 'm-1',
      from: 'active',
      to: 'inactive',
      at,
    });

    // zero rows affected: somebody else moved it first
    expect(moved).toBe(false);
    expect(queries.map((q) => q.sql)).toEqual([
      'update "business_users" set "status" = $1, "updated_at" = $2 where "id" = $3 and "status" = $4',
    ]);
    expect(queries.map((q) => q.parameters)).toEqual([['inactive', at, 'm-1', 'active']]);
  });
});

describe('PostgresMembershipView (compiled SQL)', () => {
  it('rebuild refreshes the materialized view concurrently', async () => {
    const { db, queries } = createRecordingDb();

    await new PostgresMembershipView(db).rebuild();

    expect(queries.map((q) => q.sql)).toEqual([
      'refresh materialized view concurrently active_user_businesses',
    ]);
  });
});
