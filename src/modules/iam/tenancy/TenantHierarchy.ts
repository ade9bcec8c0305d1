/**
 * Tenant Hierarchy
 *
 * Tree view over tenants, quota inheritance and sub-tenant creation.
 */

import { ITenantRepository } from "../../../infrastructure/repositories/ITenantRepository";
import { structuredLogger } from "../../../core/logger/structuredLogger";
import { config } from "../../../shared/config";
import {
  InvalidParameterError,
  ResourceAlreadyExistsError,
  ResourceNotFoundError,
} from "../errors/IamError";
import {
  QuotaMode,
  Tenant,
  TenantQuotas,
  buildTenant,
  canCreateChild,
  isValidDepth,
  validateQuotasAgainstParent,
  validateTenantName,
} from "./Tenant";
import { TenantId } from "./TenantId";

// ==================== TREE ====================

export class TenantNode {
  readonly children: TenantNode[] = [];

  constructor(readonly tenant: Tenant) {}

  addChild(child: TenantNode): void {
    this.children.push(child);
  }

  /**
   * Ids of every tenant below this node, depth first
   */
  allDescendants(): TenantId[] {
    return this.children.flatMap((child) => [
      child.tenant.id,
      ...child.allDescendants(),
    ]);
  }

  descendantCount(): number {
    return this.children.reduce(
      (count, child) => count + child.descendantCount(),
      this.children.length,
    );
  }

  /**
   * Tree rooted at `rootId`, linked through `parentId`.
   * Undefined when `rootId` is not in `tenants`.
   */
  static buildTree(
    tenants: readonly Tenant[],
    rootId: TenantId,
  ): TenantNode | undefined {
    const root = tenants.find((tenant) => tenant.id.equals(rootId));
    if (!root) {
      return undefined;
    }
    const node = new TenantNode(root);
    TenantNode.addChildren(node, tenants, new Set([rootId.toString()]));
    return node;
  }

  /**
   * A tenant already on the tree is not attached again, so a parent
   * cycle in the store ends the walk
   */
  private static addChildren(
    node: TenantNode,
    tenants: readonly Tenant[],
    visited: Set<string>,
  ): void {
    for (const tenant of tenants) {
      const key = tenant.id.toString();
      if (tenant.parentId?.equals(node.tenant.id) && !visited.has(key)) {
        visited.add(key);
        const child = new TenantNode(tenant);
        TenantNode.addChildren(child, tenants, visited);
        node.addChild(child);
      }
    }
  }
}

// ==================== QUOTAS ====================

/**
 * Quotas in force for a tenant: its own when it overrides or is a root,
 * otherwise its parent's, resolved recursively
 */
export async function resolveEffectiveQuotas(
  repository: ITenantRepository,
  tenantId: TenantId,
): Promise<TenantQuotas> {
  const visited = new Set<string>();
  let currentId = tenantId;

  for (;;) {
    const key = currentId.toString();
    if (visited.has(key)) {
      throw new InvalidParameterError(`Tenant parent cycle at ${key}`, {
        tenantId: tenantId.toString(),
      });
    }
    visited.add(key);

    const tenant = await repository.getTenant(currentId);
    if (!tenant) {
      throw new ResourceNotFoundError(`Tenant: ${key}`);
    }
    if (tenant.quotaMode === QuotaMode.Override || !tenant.parentId) {
      return { ...tenant.quotas };
    }
    currentId = tenant.parentId;
  }
}

// ==================== SERVICE ====================

export interface CreateSubTenantOptions {
  organization?: string;
  /** Own quotas; the new tenant then uses QuotaMode.Override */
  quotas?: TenantQuotas;
  adminPrincipals?: string[];
  metadata?: Record<string, string>;
}

export interface TenantHierarchyServiceOptions {
  /** Absolute depth limit; defaults to `config.maxTenantDepth` */
  maxTenantDepth?: number;
}

const logger = structuredLogger.child({ module: "tenancy" });

export class TenantHierarchyService {
  private readonly maxTenantDepth: number;
  // Tail of the sub-tenant creation chain per parent id
  private readonly pendingCreations = new Map<string, Promise<void>>();

  constructor(
    private readonly tenantRepository: ITenantRepository,
    options: TenantHierarchyServiceOptions = {},
  ) {
    this.maxTenantDepth = options.maxTenantDepth ?? config.maxTenantDepth;
  }

  async getTenant(tenantId: TenantId): Promise<Tenant> {
    const tenant = await this.tenantRepository.getTenant(tenantId);
    if (!tenant) {
      throw new ResourceNotFoundError(`Tenant: ${tenantId.toString()}`);
    }
    return tenant;
  }

  /**
   * Create `parentId/name` under an active parent that allows sub-tenants.
   * Creations under the same parent run one at a time, so the sub-tenant
   * limit holds for concurrent callers.
   */
  async createSubTenant(
    parentId: TenantId,
    name: string,
    options: CreateSubTenantOptions = {},
  ): Promise<Tenant> {
    validateTenantName(name);
    return this.serializeForParent(parentId, () =>
      this.insertSubTenant(parentId, name, options),
    );
  }

  private async insertSubTenant(
    parentId: TenantId,
    name: string,
    options: CreateSubTenantOptions,
  ): Promise<Tenant> {

    const parent = await this.getTenant(parentId);
    if (!canCreateChild(parent)) {
      throw new InvalidParameterError(
        `Tenant ${parentId.toString()} cannot create sub-tenants`,
        { tenantId: parentId.toString(), status: parent.status },
      );
    }

    const childId = parentId.child(name);
    if (!isValidDepth(childId, this.maxTenantDepth)) {
      throw new InvalidParameterError(
        `Tenant depth ${childId.depth()} exceeds maximum ${this.maxTenantDepth}`,
        { tenantId: childId.toString() },
      );
    }
    await this.assertWithinChildDepth(parent, childId);

    if (await this.tenantRepository.getTenant(childId)) {
      throw new ResourceAlreadyExistsError(`Tenant: ${childId.toString()}`);
    }

    const parentQuotas = await resolveEffectiveQuotas(
      this.tenantRepository,
      parentId,
    );
    const siblings = await this.tenantRepository.listChildTenants(parentId);
    if (siblings.length >= parentQuotas.maxSubTenants) {
      throw new InvalidParameterError(
        `Tenant ${parentId.toString()} has reached its sub-tenant limit of ${parentQuotas.maxSubTenants}`,
        { tenantId: parentId.toString() },
      );
    }

    const tenant = buildTenant(childId, name, {
      parentId,
      organization: options.organization ?? parent.organization,
    });
    if (options.quotas) {
      validateQuotasAgainstParent(options.quotas, parentQuotas);
      tenant.quotas = { ...options.quotas };
      tenant.quotaMode = QuotaMode.Override;
    }
    if (options.adminPrincipals) {
      tenant.adminPrincipals = [...options.adminPrincipals];
    }
    if (options.metadata) {
      tenant.metadata = { ...options.metadata };
    }

    const created = await this.tenantRepository.createTenant(tenant);
    logger.info("Sub-tenant created", {
      action: "createSubTenant",
      metadata: { tenantId: childId.toString(), parentId: parentId.toString() },
    });
    return created;
  }

  /**
   * Existing ancestor tenants, root first
   */
  async getAncestors(tenantId: TenantId): Promise<Tenant[]> {
    const ancestors: Tenant[] = [];
    for (const ancestorId of tenantId.ancestors()) {
      const ancestor = await this.tenantRepository.getTenant(ancestorId);
      if (ancestor) {
        ancestors.push(ancestor);
      }
    }
    return ancestors;
  }

  async getDescendants(tenantId: TenantId): Promise<TenantId[]> {
    const tenants = await this.tenantRepository.listTenants();
    return tenants
      .filter((tenant) => tenant.id.isDescendantOf(tenantId))
      .map((tenant) => tenant.id);
  }

  async getTree(tenantId: TenantId): Promise<TenantNode> {
    const tree = TenantNode.buildTree(
      await this.tenantRepository.listTenants(),
      tenantId,
    );
    if (!tree) {
      throw new ResourceNotFoundError(`Tenant: ${tenantId.toString()}`);
    }
    return tree;
  }

  async getEffectiveQuotas(tenantId: TenantId): Promise<TenantQuotas> {
    return resolveEffectiveQuotas(this.tenantRepository, tenantId);
  }

  /**
   * Admin of the tenant itself or of any ancestor
   */
  async isTenantAdmin(principal: string, tenantId: TenantId): Promise<boolean> {
    const tenant = await this.tenantRepository.getTenant(tenantId);
    if (tenant?.adminPrincipals.includes(principal)) {
      return true;
    }
    const ancestors = await this.getAncestors(tenantId);
    return ancestors.some((ancestor) =>
      ancestor.adminPrincipals.includes(principal),
    );
  }

  private async serializeForParent<T>(
    parentId: TenantId,
    task: () => Promise<T>,
  ): Promise<T> {
    const key = parentId.toString();
    const previous = this.pendingCreations.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.pendingCreations.set(key, tail);

    try {
      return await result;
    } finally {
      if (this.pendingCreations.get(key) === tail) {
        this.pendingCreations.delete(key);
      }
    }
  }

  /**
   * Every existing ancestor bounds how many levels may sit below it
   */
  private async assertWithinChildDepth(
    parent: Tenant,
    childId: TenantId,
  ): Promise<void> {
    const chain = [...(await this.getAncestors(parent.id)), parent];
    for (const ancestor of chain) {
      const levelsBelow = childId.depth() - ancestor.id.depth();
      if (levelsBelow > ancestor.maxChildDepth) {
        throw new InvalidParameterError(
          `Tenant ${ancestor.id.toString()} allows at most ${ancestor.maxChildDepth} levels of sub-tenants`,
          { tenantId: childId.toString() },
        );
      }
    }
  }
}
