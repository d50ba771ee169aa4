/**
 * backend/src/modules/businesses/dal/business.store.ts
 *
 * Seam for the businesses service; BusinessRepo is the Postgres implementation.
 */

import type { BusinessId } from '../../memberships/membership.types';
import type { Business, Industry } from '../business.types';

export type InsertBusinessParams = {
  name: string;
  slug: string;
  industry: Industry;
  email: string;
};

export interface BusinessStore {
  /** Includes soft-deleted businesses. */
  findById(businessId: BusinessId): Promise<Business | undefined>;
  /** Includes soft-deleted businesses: slugs are never reused. */
  findBySlug(slug: string): Promise<Business | undefined>;
  insertBusiness(params: InsertBusinessParams): Promise<Business>;
  /**
   * Sets deleted_at if not set yet. Returns the updated business, or undefined
   * when it was already deleted (or does not exist).
   */
  softDelete(params: { businessId: BusinessId; at: Date }): Promise<Business | undefined>;
}
