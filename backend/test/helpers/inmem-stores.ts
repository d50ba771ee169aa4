/**
 * backend/test/helpers/inmem-stores.ts
 *
 * WHY:
 * - Tests never reach Postgres. These fakes implement the same store interfaces
 *   the Kysely repos implement, over one shared in-memory state (InMemWorld).
 *
 * RULES:
 * - Same observable semantics as the SQL: "active" = status active AND business not
 *   soft-deleted; active lists ordered by business_id; newest rows first in findMany.
 * - No rollback: a unit of work just hands out the shared repos.
 * - Memberships live as rows of the `business_users` table, so the membership store
 *   and the generic row store see (and write) the same data.
 */

import { randomUUID } from 'node:crypto';

import type { AuditRecordInsert, AuditSink } from '../../src/shared/audit/audit.types';
import type { UnitOfWork } from '../../src/shared/db/unit-of-work';
import type { TenancyRepos } from '../../src/modules/_shared/tenancy.unit-of-work';
import type { FindManyQuery, RowStore } from '../../src/modules/access/dal/row.store';
import type { DataRepos } from '../../src/modules/access/guarded-data.service';
import type { Row } from '../../src/modules/access/policy/policy.types';
import type { Business } from '../../src/modules/businesses/business.types';
import type {
  BusinessStore,
  InsertBusinessParams,
} from '../../src/modules/businesses/dal/business.store';
import type { UserId } from '../../src/modules/identity';
import type {
  InsertMembershipParams,
  MembershipSnapshotSource,
  MembershipStore,
  TransitionMembershipParams,
} from '../../src/modules/memberships/dal/membership.store';
import { isMembershipStatus, isRole } from '../../src/modules/memberships/membership.types';
import type {
  ActiveMembership,
  Membership,
  Role,
  UserActiveMembership,
} from '../../src/modules/memberships/membership.types';
import type { UserStore } from '../../src/modules/users/dal/user.store';
import type { User } from '../../src/modules/users/user.types';

const MEMBERSHIPS_TABLE = 'business_users';

function membershipRow(m: Membership): Row {
  return {
    id: m.id,
    business_id: m.businessId,
    user_id: m.userId,
    role: m.role,
    status: m.status,
    invited_at: m.invitedAt,
    joined_at: m.joinedAt,
    created_at: m.createdAt,
    updated_at: m.updatedAt,
  };
}

function dateOrNull(value: unknown): Date | null {
  return value instanceof Date ? value : null;
}

/** Rows the generic data API wrote with an invalid role or status are skipped. */
function membershipFromRow(row: Row): Membership | undefined {
  const { id, business_id, user_id, role, status } = row;
  if (typeof id !== 'string' || typeof business_id !== 'string' || typeof user_id !== 'string') {
    return undefined;
  }
  if (!isRole(role) || !isMembershipStatus(status)) return undefined;

  const createdAt = dateOrNull(row.created_at) ?? new Date(0);
  return {
    id,
    businessId: business_id,
    userId: user_id,
    role,
    status,
    invitedAt: dateOrNull(row.invited_at),
    joinedAt: dateOrNull(row.joined_at),
    createdAt,
    updatedAt: dateOrNull(row.updated_at) ?? createdAt,
  };
}

export class InMemWorld {
  readonly users = new Map<string, User>();
  readonly businesses = new Map<string, Business>();
  readonly audit: AuditRecordInsert[] = [];
  readonly tables = new Map<string, Row[]>();

  constructor(readonly now: () => Date = () => new Date()) {}

  addUser(email: string, id: UserId = randomUUID()): User {
    const user: User = { id, email, createdAt: this.now() };
    this.users.set(id, user);
    return user;
  }

  addBusiness(slug: string, overrides: Partial<Business> = {}): Business {
    const at = this.now();
    const business: Business = {
      id: randomUUID(),
      name: slug,
      slug,
      industry: 'other',
      email: `${slug}@example.com`,
      status: 'trial',
      subscriptionTier: 'basic',
      subscriptionStatus: 'trialing',
      createdAt: at,
      updatedAt: at,
      deletedAt: null,
      ...overrides,
    };
    this.businesses.set(business.id, business);
    return business;
  }

  addMembership(params: {
    businessId: string;
    userId: UserId;
    role: Role;
    status?: Membership['status'];
  }): Membership {
    const at = this.now();
    const status = params.status ?? 'active';
    const membership: Membership = {
      id: randomUUID(),
      businessId: params.businessId,
      userId: params.userId,
      role: params.role,
      status,
      invitedAt: status === 'pending' ? at : null,
      joinedAt: status === 'active' ? at : null,
      createdAt: at,
      updatedAt: at,
    };
    this.putMembership(membership);
    return membership;
  }

  /** Snapshot of the `business_users` rows, keyed by membership id. */
  get memberships(): Map<string, Membership> {
    const out = new Map<string, Membership>();
    for (const row of this.rowsOf(MEMBERSHIPS_TABLE)) {
      const membership = membershipFromRow(row);
      if (membership) out.set(membership.id, membership);
    }
    return out;
  }

  putMembership(membership: Membership): void {
    const rows = this.rowsOf(MEMBERSHIPS_TABLE);
    const index = rows.findIndex((r) => r.id === membership.id);
    if (index === -1) {
      rows.push(membershipRow(membership));
    } else {
      rows[index] = membershipRow(membership);
    }
  }

  rowsOf(table: string): Row[] {
    let rows = this.tables.get(table);
    if (!rows) {
      rows = [];
      this.tables.set(table, rows);
    }
    return rows;
  }

  addRow(table: string, values: Row): Row {
    const row: Row = { id: randomUUID(), ...values };
    this.rowsOf(table).push(row);
    return row;
  }
}

export class InMemUserStore implements UserStore {
  constructor(private readonly world: InMemWorld) {}

  async findById(userId: UserId): Promise<User | undefined> {
    return this.world.users.get(userId);
  }

  async ensureUser(params: { id: UserId; email: string }): Promise<void> {
    if (!this.world.users.has(params.id)) {
      this.world.addUser(params.email, params.id);
    }
  }
}

export class InMemBusinessStore implements BusinessStore {
  constructor(private readonly world: InMemWorld) {}

  async findById(businessId: string): Promise<Business | undefined> {
    return this.world.businesses.get(businessId);
  }

  async findBySlug(slug: string): Promise<Business | undefined> {
    return Array.from(this.world.businesses.values()).find((b) => b.slug === slug);
  }

  async insertBusiness(params: InsertBusinessParams): Promise<Business> {
    return this.world.addBusiness(params.slug, {
      name: params.name,
      industry: params.industry,
      email: params.email,
    });
  }

  async softDelete(params: { businessId: string; at: Date }): Promise<Business | undefined> {
    const business = this.world.businesses.get(params.businessId);
    if (!business || business.deletedAt !== null) return undefined;

    const updated: Business = { ...business, deletedAt: params.at, updatedAt: params.at };
    this.world.businesses.set(updated.id, updated);
    return updated;
  }
}

export class InMemMembershipStore implements MembershipStore, MembershipSnapshotSource {
  /** Number of listActiveForUser calls, to assert per-context memoization. */
  reads = 0;

  constructor(private readonly world: InMemWorld) {}

  private active(): UserActiveMembership[] {
    const out: UserActiveMembership[] = [];
    for (const m of this.world.memberships.values()) {
      const business = this.world.businesses.get(m.businessId);
      if (m.status !== 'active' || !business || business.deletedAt !== null) continue;
      out.push({
        membershipId: m.id,
        businessId: m.businessId,
        businessSlug: business.slug,
        userId: m.userId,
        role: m.role,
      });
    }
    return out.sort((a, b) => a.businessId.localeCompare(b.businessId));
  }

  async listActiveForUser(userId: UserId): Promise<ActiveMembership[]> {
    this.reads += 1;
    return this.active()
      .filter((m) => m.userId === userId)
      .map(({ membershipId, businessId, businessSlug, role }) => ({
        membershipId,
        businessId,
        businessSlug,
        role,
      }));
  }

  async listAllActive(): Promise<UserActiveMembership[]> {
    return this.active();
  }

  async findById(membershipId: string): Promise<Membership | undefined> {
    return this.world.memberships.get(membershipId);
  }

  async findByBusinessAndUser(params: {
    businessId: string;
    userId: UserId;
  }): Promise<Membership | undefined> {
    return Array.from(this.world.memberships.values()).find(
      (m) => m.businessId === params.businessId && m.userId === params.userId,
    );
  }

  async insertMembership(params: InsertMembershipParams): Promise<Membership> {
    const created = this.world.addMembership(params);
    const membership: Membership = {
      ...created,
      invitedAt: params.invitedAt,
      joinedAt: params.joinedAt,
    };
    this.world.putMembership(membership);
    return membership;
  }

  async transitionStatus(params: TransitionMembershipParams): Promise<boolean> {
    const membership = this.world.memberships.get(params.membershipId);
    if (!membership || membership.status !== params.from) return false;

    this.world.putMembership({
      ...membership,
      status: params.to,
      updatedAt: params.at,
      joinedAt: params.to === 'active' ? params.at : membership.joinedAt,
    });
    return true;
  }
}

export class InMemAuditSink implements AuditSink {
  constructor(private readonly world: InMemWorld) {}

  async append(record: AuditRecordInsert): Promise<void> {
    this.world.audit.push(record);
  }
}

export class InMemRowStore implements RowStore {
  constructor(private readonly world: InMemWorld) {}

  async findMany(table: string, query: FindManyQuery): Promise<Row[]> {
    const scope = query.scope;
    const equals = Object.entries(query.equals ?? {});

    return [...this.world.rowsOf(table)]
      .reverse()
      .filter((row) => {
        if (scope) {
          const value = row[scope.column];
          if (typeof value !== 'string' || !scope.values.includes(value)) return false;
        }
        return equals.every(([column, value]) => row[column] === value);
      })
      .slice(query.offset ?? 0, (query.offset ?? 0) + query.limit)
      .map((row) => ({ ...row }));
  }

  async findById(table: string, id: string): Promise<Row | undefined> {
    const row = this.world.rowsOf(table).find((r) => r.id === id);
    return row ? { ...row } : undefined;
  }

  async insert(table: string, values: Row): Promise<Row> {
    return { ...this.world.addRow(table, values) };
  }

  async update(table: string, id: string, patch: Row): Promise<Row | undefined> {
    const rows = this.world.rowsOf(table);
    const index = rows.findIndex((r) => r.id === id);
    const existing = rows[index];
    if (!existing) return undefined;

    const updated: Row = { ...existing, ...patch };
    rows[index] = updated;
    return { ...updated };
  }

  async delete(table: string, id: string): Promise<Row | undefined> {
    const rows = this.world.rowsOf(table);
    const index = rows.findIndex((r) => r.id === id);
    const existing = rows[index];
    if (!existing) return undefined;

    rows.splice(index, 1);
    return existing;
  }
}

export class InMemUnitOfWork<TRepos> implements UnitOfWork<TRepos> {
  runs = 0;

  constructor(private readonly repos: TRepos) {}

  async run<T>(work: (repos: TRepos) => Promise<T>): Promise<T> {
    this.runs += 1;
    return work(this.repos);
  }
}

export type InMemStores = {
  world: InMemWorld;
  users: InMemUserStore;
  businesses: InMemBusinessStore;
  memberships: InMemMembershipStore;
  audit: InMemAuditSink;
  rows: InMemRowStore;
  tenancyUow: InMemUnitOfWork<TenancyRepos>;
  dataUow: InMemUnitOfWork<DataRepos>;
};

export function createInMemStores(world: InMemWorld = new InMemWorld()): InMemStores {
  const users = new InMemUserStore(world);
  const businesses = new InMemBusinessStore(world);
  const memberships = new InMemMembershipStore(world);
  const audit = new InMemAuditSink(world);
  const rows = new InMemRowStore(world);

  return {
    world,
    users,
    businesses,
    memberships,
    audit,
    rows,
    tenancyUow: new InMemUnitOfWork<TenancyRepos>({ users, businesses, memberships, audit }),
    dataUow: new InMemUnitOfWork<DataRepos>({ rows, audit }),
  };
}
