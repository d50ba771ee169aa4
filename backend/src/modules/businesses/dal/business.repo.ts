/**
 * backend/src/modules/businesses/dal/business.repo.ts
 *
 * WHY:
 * - Postgres implementation of BusinessStore.
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - No policies.
 * - Supports withDb() for transaction binding.
 * - Never hard-deletes a business.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { BusinessId } from '../../memberships/membership.types';
import { getBusinessById, getBusinessBySlug, toBusiness } from '../business.queries';
import type { Business } from '../business.types';
import type { BusinessStore, InsertBusinessParams } from './business.store';

export class BusinessRepo implements BusinessStore {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): BusinessRepo {
    return new BusinessRepo(db);
  }

  async findById(businessId: BusinessId): Promise<Business | undefined> {
    return getBusinessById(this.db, businessId);
  }

  async findBySlug(slug: string): Promise<Business | undefined> {
    return getBusinessBySlug(this.db, slug);
  }

  /**
   * Unique slug enforced by DB; status/tier/subscription take their DB defaults.
   */
  async insertBusiness(params: InsertBusinessParams): Promise<Business> {
    const row = await this.db
      .insertInto('businesses')
      .values({
        name: params.name,
        slug: params.slug,
        industry: params.industry,
        email: params.email.toLowerCase(),
      })
      .returningAll()
      .executeTakeFirstOrThrow();

    return toBusiness(row);
  }

  async softDelete(params: { businessId: BusinessId; at: Date }): Promise<Business | undefined> {
    const row = await this.db
      .updateTable('businesses')
      .set({ deleted_at: params.at, updated_at: params.at })
      .where('id', '=', params.businessId)
      .where('deleted_at', 'is', null)
      .returningAll()
      .executeTakeFirst();

    return row ? toBusiness(row) : undefined;
  }
}
