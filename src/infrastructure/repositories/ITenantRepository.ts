import { Tenant } from "../../modules/iam/tenancy/Tenant";
import { TenantId } from "../../modules/iam/tenancy/TenantId";

/**
 * Tenant lookup and storage contract used by the tenant hierarchy service
 */
export interface ITenantRepository {
  getTenant(id: TenantId): Promise<Tenant | null>;
  createTenant(tenant: Tenant): Promise<Tenant>;
  updateTenant(tenant: Tenant): Promise<Tenant>;
  deleteTenant(id: TenantId): Promise<void>;
  listTenants(): Promise<Tenant[]>;
  /** Direct children only */
  listChildTenants(parentId: TenantId): Promise<Tenant[]>;
}
