/**
 * backend/src/modules/businesses/index.ts
 *
 * Public surface of the businesses module.
 */

export { BusinessRepo } from './dal/business.repo';
export type { BusinessStore, InsertBusinessParams } from './dal/business.store';
export { INDUSTRIES } from './business.types';
export type { Business, Industry } from './business.types';
