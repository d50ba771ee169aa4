import { describe, it, expect } from 'vitest';

import {
  hierarchicalAccessAllowed,
  roleSatisfies,
} from '../../../src/modules/memberships/policies/role-hierarchy.policy';
import { PERMISSIONS, ROLES } from '../../../src/modules/memberships/membership.types';
import type { Permission, Role } from '../../../src/modules/memberships/membership.types';

describe('roleSatisfies', () => {
  it('owner requires owner', () => {
    expect(ROLES.filter((held) => roleSatisfies(held, 'owner'))).toEqual(['owner']);
  });

  it('admin is satisfied by owner and admin', () => {
    expect(ROLES.filter((held) => roleSatisfies(held, 'admin'))).toEqual(['owner', 'admin']);
  });

  it('manager is satisfied by owner, admin and manager', () => {
    expect(ROLES.filter((held) => roleSatisfies(held, 'manager'))).toEqual([
      'owner',
      'admin',
      'manager',
    ]);
  });

  it('staff is satisfied by every role except client', () => {
    expect(ROLES.filter((held) => roleSatisfies(held, 'staff'))).toEqual([
      'owner',
      'admin',
      'manager',
      'staff',
    ]);
  });

  it('client is satisfied by owner only, not by a client', () => {
    expect(ROLES.filter((held) => roleSatisfies(held, 'client'))).toEqual(['owner']);
  });

  it('owner satisfies every required role', () => {
    expect(ROLES.filter((required) => roleSatisfies('owner', required))).toEqual([...ROLES]);
  });

  it('a held client role satisfies nothing', () => {
    expect(ROLES.filter((required) => roleSatisfies('client', required))).toEqual([]);
  });
});

describe('hierarchicalAccessAllowed', () => {
  function allowedPairs(actorRole: Role): string[] {
    const out: string[] = [];
    for (const targetRole of ROLES) {
      for (const permission of PERMISSIONS) {
        if (hierarchicalAccessAllowed({ actorRole, targetRole, permission })) {
          out.push(`${permission}:${targetRole}`);
        }
      }
    }
    return out;
  }

  it('owner may do anything to anyone', () => {
    expect(allowedPairs('owner')).toHaveLength(ROLES.length * PERMISSIONS.length);
  });

  it('admin may do anything except owner_only', () => {
    const pairs = allowedPairs('admin');
    expect(pairs).toHaveLength(ROLES.length * 2);
    expect(pairs.some((p) => p.startsWith('owner_only:'))).toBe(false);
  });

  it('manager may read and write staff and clients only', () => {
    expect(allowedPairs('manager')).toEqual([
      'read:staff',
      'write:staff',
      'read:client',
      'write:client',
    ]);
  });

  it('staff may only read', () => {
    expect(allowedPairs('staff')).toEqual(ROLES.map((r) => `read:${r}`));
  });

  it('client may do nothing', () => {
    expect(allowedPairs('client')).toEqual([]);
  });

  it.each<[Role, Role, Permission, boolean]>([
    ['manager', 'admin', 'read', false],
    ['manager', 'manager', 'write', false],
    ['admin', 'owner', 'write', true],
    ['admin', 'staff', 'owner_only', false],
    ['staff', 'client', 'write', false],
  ])('%s -> %s (%s) = %s', (actorRole, targetRole, permission, expected) => {
    expect(hierarchicalAccessAllowed({ actorRole, targetRole, permission })).toBe(expected);
  });
});
