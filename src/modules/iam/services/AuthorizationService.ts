/**
 * Authorization Service
 *
 * Decides whether the caller in a WamiContext may perform an action on a
 * resource, using the managed and inline policies stored for the caller.
 *
 * Evaluation order: root bypass, managed policies in attachment order, then
 * inline policies. A Deny in any document ends evaluation with `false`.
 */

import { IPolicyRepository } from "../../../infrastructure/repositories/IPolicyRepository";
import {
  ChildLogger,
  structuredLogger,
} from "../../../core/logger/structuredLogger";
import {
  AuthorizationMode,
  MalformedPolicyMode,
  config,
} from "../../../shared/config";
import { WamiArn } from "../arn/WamiArn";
import { TenantPath } from "../arn/types";
import { wildcardMatch, matchesAnyPattern } from "../conditions/WildcardMatcher";
import { WamiContext } from "../context/WamiContext";
import {
  PolicyEvaluationEngine,
  policyEvaluationEngine,
} from "../engine/PolicyEngine";
import { AccessDeniedError, InvalidParameterError } from "../errors/IamError";
import { PolicyDocument } from "../policy/models/types";
import {
  PolicyParser,
  emptyPolicyDocument,
} from "../policy/parser/PolicyParser";

const USER_RESOURCE_TYPE = "user";

export interface AuthorizationServiceOptions {
  mode?: AuthorizationMode;
  malformedPolicyMode?: MalformedPolicyMode;
  /** Version of the empty document substituted for a malformed policy */
  defaultPolicyVersion?: string;
  engine?: PolicyEvaluationEngine;
  parser?: PolicyParser;
  logger?: ChildLogger;
}

export class AuthorizationService {
  private readonly mode: AuthorizationMode;
  private readonly malformedPolicyMode: MalformedPolicyMode;
  private readonly defaultPolicyVersion: string;
  private readonly engine: PolicyEvaluationEngine;
  private readonly parser: PolicyParser;
  private readonly logger: ChildLogger;

  constructor(
    private readonly policyRepository: IPolicyRepository,
    options: AuthorizationServiceOptions = {},
  ) {
    this.mode = options.mode ?? config.authorizationMode;
    this.malformedPolicyMode =
      options.malformedPolicyMode ?? config.malformedPolicyMode;
    this.defaultPolicyVersion =
      options.defaultPolicyVersion ?? config.defaultPolicyVersion;
    this.engine = options.engine ?? policyEvaluationEngine;
    this.parser = options.parser ?? new PolicyParser();
    this.logger =
      options.logger ?? structuredLogger.child({ module: "authorization" });
  }

  // ==================== AUTHORIZATION ====================

  /**
   * Whether the caller may perform `action` on `resourceArn`.
   *
   * `deny-overrides` (default) evaluates every document: a Deny in a later
   * document wins over an Allow in an earlier one. `first-match` is the
   * step-by-step walk where the first deciding document is final, so an
   * earlier Allow returns `true` before a later Deny is seen. Both modes
   * return `false` at the first Deny they reach.
   */
  async authorize(
    context: WamiContext,
    action: string,
    resourceArn: WamiArn | string,
  ): Promise<boolean> {
    const resource = resourceArn.toString();
    const caller = context.callerArn.toString();

    if (context.isRoot) {
      structuredLogger.logAuthorization(action, resource, "ALLOW", {
        userId: caller,
        tenantId: context.tenantPath.toString(),
        reason: "root",
      });
      return true;
    }

    const principal = this.principalOf(context.callerArn);
    const documents = await this.loadPolicies(principal);
    const allowed = this.decide(documents, action, resource);

    structuredLogger.logAuthorization(action, resource, allowed ? "ALLOW" : "DENY", {
      userId: caller,
      tenantId: context.tenantPath.toString(),
      metadata: { mode: this.mode, policyCount: documents.length },
    });
    return allowed;
  }

  /**
   * Throws AccessDeniedError unless `authorize` allows the request
   */
  async checkOrDeny(
    context: WamiContext,
    action: string,
    resourceArn: WamiArn | string,
  ): Promise<void> {
    if (!(await this.authorize(context, action, resourceArn))) {
      throw new AccessDeniedError(
        context.callerArn.toString(),
        action,
        resourceArn.toString(),
      );
    }
  }

  // ==================== TENANT ACCESS ====================

  authorizeTenantAccess(context: WamiContext, target: TenantPath): boolean {
    const allowed = context.canAccessTenant(target);
    structuredLogger.logAuthorization(
      "tenant:Access",
      target.toString(),
      allowed ? "ALLOW" : "DENY",
      {
        userId: context.callerArn.toString(),
        tenantId: context.tenantPath.toString(),
        ...(context.isRoot ? { reason: "root" } : {}),
      },
    );
    return allowed;
  }

  checkTenantAccessOrDeny(context: WamiContext, target: TenantPath): void {
    if (!this.authorizeTenantAccess(context, target)) {
      throw new AccessDeniedError(
        context.callerArn.toString(),
        "tenant:Access",
        target.toString(),
        `Tenant ${context.tenantPath.toString()} cannot access tenant ${target.toString()}`,
      );
    }
  }

  // ==================== MATCHING HELPERS ====================

  matchesAction(patterns: readonly string[], action: string): boolean {
    return matchesAnyPattern(action, patterns);
  }

  matchesResource(patterns: readonly string[], resource: string): boolean {
    return matchesAnyPattern(resource, patterns);
  }

  wildcardMatch(pattern: string, text: string): boolean {
    return wildcardMatch(pattern, text);
  }

  // ==================== INTERNALS ====================

  private principalOf(callerArn: WamiArn): string {
    if (callerArn.resourceType() !== USER_RESOURCE_TYPE) {
      throw new InvalidParameterError(
        `Caller must be a user, got resource type '${callerArn.resourceType()}'`,
        { callerArn: callerArn.toString() },
      );
    }
    return callerArn.resourceId();
  }

  /**
   * Managed policies in attachment order, then inline policies
   */
  private async loadPolicies(principal: string): Promise<PolicyDocument[]> {
    const documents: PolicyDocument[] = [];

    const attached =
      await this.policyRepository.listAttachedUserPolicies(principal);
    for (const policyArn of attached) {
      const record = await this.policyRepository.getPolicy(policyArn);
      if (record) {
        documents.push(this.parseStored(record.policyDocument, policyArn));
      }
    }

    const inlineNames = await this.policyRepository.listUserPolicies(principal);
    for (const name of inlineNames) {
      const policyJson = await this.policyRepository.getUserPolicy(
        principal,
        name,
      );
      if (policyJson !== null) {
        documents.push(this.parseStored(policyJson, `${principal}/${name}`));
      }
    }

    return documents;
  }

  private parseStored(policyJson: string, source: string): PolicyDocument {
    const result = this.parser.parse(policyJson);
    if (result.success && result.data) {
      return result.data;
    }

    if (this.malformedPolicyMode === "fail") {
      throw new InvalidParameterError(`Malformed stored policy: ${source}`, {
        source,
        errors: result.errors,
      });
    }
    this.logger.warn("Ignoring malformed stored policy", {
      action: "authorize",
      metadata: { source, errors: result.errors },
    });
    return emptyPolicyDocument(this.defaultPolicyVersion);
  }

  private decide(
    documents: readonly PolicyDocument[],
    action: string,
    resource: string,
  ): boolean {
    let allowed = false;
    for (const document of documents) {
      const decision = this.engine.evaluateDocument(document, action, resource);
      if (decision === "Deny") {
        return false;
      }
      if (decision === "Allow") {
        if (this.mode === "first-match") {
          return true;
        }
        allowed = true;
      }
    }
    return allowed;
  }
}
