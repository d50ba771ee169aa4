/**
 * backend/src/modules/membership-view/inmem-membership-view.ts
 *
 * WHY:
 * - In-process MembershipViewStore for deployments without the materialized view
 *   (and for tests). Same staleness contract as the Postgres one.
 *
 * HOW IT WORKS:
 * - rebuild() reads every active membership, builds a complete new snapshot off to
 *   the side, then swaps one reference. Readers see either the old or the new
 *   snapshot, never a partial one.
 */

import type { UserId } from '../identity';
import type { MembershipSnapshotSource } from '../memberships/dal/membership.store';
import type { Role } from '../memberships/membership.types';
import { normalizeRoles } from './membership-view.types';
import type { MembershipViewRow, MembershipViewStore } from './membership-view.types';

type Snapshot = ReadonlyMap<UserId, readonly MembershipViewRow[]>;

export class InMemMembershipView implements MembershipViewStore {
  private snapshot: Snapshot = new Map();

  constructor(private readonly source: MembershipSnapshotSource) {}

  listForUser(userId: UserId): Promise<MembershipViewRow[]> {
    const rows = this.snapshot.get(userId) ?? [];
    return Promise.resolve(rows.map((r) => ({ ...r, allRoles: [...r.allRoles] })));
  }

  async rebuild(): Promise<void> {
    const memberships = await this.source.listAllActive();

    const rolesByUser = new Map<UserId, Set<Role>>();
    for (const m of memberships) {
      const roles = rolesByUser.get(m.userId) ?? new Set<Role>();
      roles.add(m.role);
      rolesByUser.set(m.userId, roles);
    }

    const next = new Map<UserId, MembershipViewRow[]>();
    for (const m of memberships) {
      const allRoles = normalizeRoles(rolesByUser.get(m.userId) ?? []);
      const rows = next.get(m.userId) ?? [];
      rows.push({ userId: m.userId, businessId: m.businessId, role: m.role, allRoles });
      next.set(m.userId, rows);
    }

    for (const rows of next.values()) {
      rows.sort((a, b) => a.businessId.localeCompare(b.businessId));
    }

    this.snapshot = next;
  }
}
