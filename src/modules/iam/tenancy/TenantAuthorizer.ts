/**
 * Tenant Authorizer
 *
 * Tenant operations are authorized with ordinary IAM policies over the
 * resource `arn:wami:tenant::<tenant-id>`. An explicit Deny always wins.
 */

import { structuredLogger } from "../../../core/logger/structuredLogger";
import {
  PolicyEvaluationEngine,
  policyEvaluationEngine,
} from "../engine/PolicyEngine";
import { PolicyDocument } from "../policy/models/types";
import { PolicyParser } from "../policy/parser/PolicyParser";
import { TenantId } from "./TenantId";

export enum TenantAction {
  Read = "tenant:Read",
  Update = "tenant:Update",
  Delete = "tenant:Delete",
  CreateSubTenant = "tenant:CreateSubTenant",
  ManageUsers = "tenant:ManageUsers",
  ManageRoles = "tenant:ManageRoles",
  ManagePolicies = "tenant:ManagePolicies",
  All = "tenant:*",
}

const TENANT_POLICY_VERSION = "2012-10-17";

export function tenantResourceArn(tenantId: TenantId | string): string {
  return `arn:wami:tenant::${tenantId.toString()}`;
}

const logger = structuredLogger.child({ module: "tenant-authorizer" });

export class TenantAuthorizer {
  constructor(
    private readonly policies: readonly PolicyDocument[],
    private readonly engine: PolicyEvaluationEngine = policyEvaluationEngine,
  ) {}

  /**
   * Build from raw policy JSON; documents that fail to parse are skipped
   */
  static fromPolicyJson(
    policyJsonList: readonly string[],
    parser: PolicyParser = new PolicyParser(),
  ): TenantAuthorizer {
    const policies: PolicyDocument[] = [];
    policyJsonList.forEach((policyJson, index) => {
      const result = parser.parse(policyJson);
      if (result.success && result.data) {
        policies.push(result.data);
      } else {
        logger.warn("Skipping malformed tenant policy", {
          metadata: { index, errors: result.errors },
        });
      }
    });
    return new TenantAuthorizer(policies);
  }

  static fromDocuments(policies: readonly PolicyDocument[]): TenantAuthorizer {
    return new TenantAuthorizer(policies);
  }

  /**
   * @param principalArn - Recorded in the decision log only; the policies
   *   are already the principal's own
   */
  checkPermission(
    principalArn: string,
    tenantId: TenantId | string,
    action: TenantAction,
  ): boolean {
    const resource = tenantResourceArn(tenantId);
    const allowed = this.engine.isActionAllowed(this.policies, action, resource);
    structuredLogger.logAuthorization(action, resource, allowed ? "ALLOW" : "DENY", {
      userId: principalArn,
      tenantId: tenantId.toString(),
    });
    return allowed;
  }
}

/**
 * Full control over the tenant and every sub-tenant
 */
export function buildTenantAdminPolicy(tenantId: TenantId | string): string {
  const resource = tenantResourceArn(tenantId);
  return JSON.stringify({
    Version: TENANT_POLICY_VERSION,
    Statement: [
      {
        Effect: "Allow",
        Action: TenantAction.All,
        Resource: [resource, `${resource}/*`],
      },
    ],
  });
}

export function buildTenantReadonlyPolicy(tenantId: TenantId | string): string {
  return JSON.stringify({
    Version: TENANT_POLICY_VERSION,
    Statement: [
      {
        Effect: "Allow",
        Action: TenantAction.Read,
        Resource: tenantResourceArn(tenantId),
      },
    ],
  });
}
