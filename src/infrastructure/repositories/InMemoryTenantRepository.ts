import {
  ResourceAlreadyExistsError,
  ResourceNotFoundError,
} from "../../modules/iam/errors/IamError";
import { Tenant } from "../../modules/iam/tenancy/Tenant";
import { TenantId } from "../../modules/iam/tenancy/TenantId";
import { ITenantRepository } from "./ITenantRepository";

/**
 * Map-backed tenant store keyed by the tenant id string.
 * Tenants are copied on the way in and out.
 */
export class InMemoryTenantRepository implements ITenantRepository {
  private readonly tenants = new Map<string, Tenant>();

  constructor(initial: Tenant[] = []) {
    for (const tenant of initial) {
      this.tenants.set(tenant.id.toString(), copyTenant(tenant));
    }
  }

  async getTenant(id: TenantId): Promise<Tenant | null> {
    const tenant = this.tenants.get(id.toString());
    return tenant ? copyTenant(tenant) : null;
  }

  async createTenant(tenant: Tenant): Promise<Tenant> {
    const key = tenant.id.toString();
    if (this.tenants.has(key)) {
      throw new ResourceAlreadyExistsError(`Tenant: ${key}`);
    }
    this.tenants.set(key, copyTenant(tenant));
    return copyTenant(tenant);
  }

  async updateTenant(tenant: Tenant): Promise<Tenant> {
    const key = tenant.id.toString();
    if (!this.tenants.has(key)) {
      throw new ResourceNotFoundError(`Tenant: ${key}`);
    }
    this.tenants.set(key, copyTenant(tenant));
    return copyTenant(tenant);
  }

  async deleteTenant(id: TenantId): Promise<void> {
    if (!this.tenants.delete(id.toString())) {
      throw new ResourceNotFoundError(`Tenant: ${id.toString()}`);
    }
  }

  async listTenants(): Promise<Tenant[]> {
    return [...this.tenants.values()].map(copyTenant);
  }

  async listChildTenants(parentId: TenantId): Promise<Tenant[]> {
    return [...this.tenants.values()]
      .filter(
        (tenant) =>
          tenant.parentId !== undefined && tenant.parentId.equals(parentId),
      )
      .map(copyTenant);
  }
}

// TenantId is immutable and shared; everything else is copied
function copyTenant(tenant: Tenant): Tenant {
  return {
    ...tenant,
    providerAccounts: { ...tenant.providerAccounts },
    quotas: { ...tenant.quotas },
    adminPrincipals: [...tenant.adminPrincipals],
    metadata: { ...tenant.metadata },
    createdAt: new Date(tenant.createdAt.getTime()),
  };
}
