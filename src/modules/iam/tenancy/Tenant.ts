/**
 * Tenant model and pure tenant operations
 */

import { InvalidParameterError } from "../errors/IamError";
import { TenantId } from "./TenantId";

// ==================== MODEL ====================

export enum TenantStatus {
  Active = "Active",
  Suspended = "Suspended",
  Pending = "Pending",
  Deleted = "Deleted",
}

/**
 * Inherited tenants resolve quotas through their parent chain
 */
export enum QuotaMode {
  Inherited = "Inherited",
  Override = "Override",
}

export type TenantType =
  | "Root"
  | "Enterprise"
  | "Department"
  | "Team"
  | "Project"
  | { custom: string };

export interface TenantQuotas {
  maxUsers: number;
  maxRoles: number;
  maxPolicies: number;
  maxGroups: number;
  maxAccessKeys: number;
  maxSubTenants: number;
  /** Requests per minute */
  apiRateLimit: number;
}

export const DEFAULT_TENANT_QUOTAS: Readonly<TenantQuotas> = Object.freeze({
  maxUsers: 1000,
  maxRoles: 500,
  maxPolicies: 100,
  maxGroups: 100,
  maxAccessKeys: 2000,
  maxSubTenants: 10,
  apiRateLimit: 1000,
});

export interface Tenant {
  id: TenantId;
  parentId?: TenantId;
  name: string;
  organization?: string;
  tenantType: TenantType;
  /** Provider name to provider account id */
  providerAccounts: Record<string, string>;
  status: TenantStatus;
  quotas: TenantQuotas;
  quotaMode: QuotaMode;
  /** How many levels of sub-tenants may exist below this tenant */
  maxChildDepth: number;
  canCreateSubTenants: boolean;
  adminPrincipals: string[];
  metadata: Record<string, string>;
  createdAt: Date;
}

export interface BuildTenantOptions {
  organization?: string;
  parentId?: TenantId;
}

// ==================== OPERATIONS ====================

export function buildTenant(
  id: TenantId,
  name: string,
  options: BuildTenantOptions = {},
): Tenant {
  return {
    id,
    ...(options.parentId === undefined ? {} : { parentId: options.parentId }),
    name,
    ...(options.organization === undefined
      ? {}
      : { organization: options.organization }),
    tenantType: "Enterprise",
    providerAccounts: {},
    status: TenantStatus.Active,
    quotas: { ...DEFAULT_TENANT_QUOTAS },
    quotaMode: QuotaMode.Inherited,
    maxChildDepth: 3,
    canCreateSubTenants: true,
    adminPrincipals: [],
    metadata: {},
    createdAt: new Date(),
  };
}

const TENANT_NAME_PATTERN = /^[\p{L}\p{N}_-]+$/u;
const MAX_TENANT_NAME_LENGTH = 64;

export function validateTenantName(name: string): void {
  if (name === "") {
    throw new InvalidParameterError("Tenant name cannot be empty");
  }
  if ([...name].length > MAX_TENANT_NAME_LENGTH) {
    throw new InvalidParameterError(
      `Tenant name cannot exceed ${MAX_TENANT_NAME_LENGTH} characters`,
    );
  }
  if (!TENANT_NAME_PATTERN.test(name)) {
    throw new InvalidParameterError(
      "Tenant name can only contain alphanumeric characters, hyphens, and underscores",
    );
  }
}

const PARENT_BOUNDED_QUOTAS = [
  ["maxUsers", "max_users"],
  ["maxRoles", "max_roles"],
  ["maxPolicies", "max_policies"],
  ["maxGroups", "max_groups"],
  ["maxSubTenants", "max_sub_tenants"],
] as const;

/**
 * A child may not be granted more than its parent on any bounded quota
 */
export function validateQuotasAgainstParent(
  quotas: TenantQuotas,
  parent: TenantQuotas,
): void {
  for (const [key, label] of PARENT_BOUNDED_QUOTAS) {
    if (quotas[key] > parent[key]) {
      throw new InvalidParameterError(`${label} exceeds parent limit`, {
        quota: key,
        requested: quotas[key],
        limit: parent[key],
      });
    }
  }
}

export function isValidDepth(id: TenantId, maxDepth: number): boolean {
  return id.depth() <= maxDepth;
}

export function canCreateChild(tenant: Tenant): boolean {
  return tenant.canCreateSubTenants && tenant.status === TenantStatus.Active;
}
