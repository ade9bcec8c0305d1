/**
 * Tenancy Module Index
 *
 * Tenant identifiers, the tenant model, hierarchy management and
 * policy-based tenant authorization.
 */

export { TenantId } from "./TenantId";

export {
  Tenant,
  TenantType,
  TenantStatus,
  TenantQuotas,
  QuotaMode,
  BuildTenantOptions,
  DEFAULT_TENANT_QUOTAS,
  buildTenant,
  validateTenantName,
  validateQuotasAgainstParent,
  isValidDepth,
  canCreateChild,
} from "./Tenant";

export {
  TenantNode,
  TenantHierarchyService,
  TenantHierarchyServiceOptions,
  CreateSubTenantOptions,
  resolveEffectiveQuotas,
} from "./TenantHierarchy";

export {
  TenantAuthorizer,
  TenantAction,
  tenantResourceArn,
  buildTenantAdminPolicy,
  buildTenantReadonlyPolicy,
} from "./TenantAuthorizer";
