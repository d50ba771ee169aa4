/**
 * backend/src/modules/access/index.ts
 *
 * Public surface of the access module.
 */

export { AccessContext, registerAccessContext } from './access-context';
export type { AccessContextParams, AccessRequestMeta } from './access-context';
export { PolicyRegistry } from './policy/policy.registry';
export { PolicyAuthorizer } from './policy/policy.authorizer';
export {
  ownerInBusinessPolicies,
  ownerScopedPolicies,
  publicReadPolicy,
  serviceBypassPolicy,
  tenantScopedPolicies,
} from './policy/policy.templates';
export type { AccessDecision, CrudAction, Policy, ResourceRef, Row } from './policy/policy.types';
export { PROTECTED_RESOURCES, applyResourceConfig } from './protected-resources';
export type { DataRepos } from './guarded-data.service';
export { RowRepo } from './dal/row.repo';
export type { FindManyQuery, RowStore } from './dal/row.store';
