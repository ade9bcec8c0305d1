/**
 * Policy Evaluation Engine
 *
 * Pure matcher over IAM policy documents. A statement matches a request when
 * one of its action patterns matches the action and one of its resource
 * patterns matches the resource. Across any set of documents an explicit
 * Deny overrides every Allow; with no matching statement the request is
 * implicitly denied.
 *
 * Conditions are carried on statements but not evaluated.
 */

import {
  EvaluationDecision,
  EvaluationResult,
  MatchedStatement,
  PolicyDocument,
  PolicyStatement,
  SimulateCustomPolicyRequest,
  SimulatePolicyResponse,
  StatementDecision,
} from "../policy/models/types";
import { PolicyParser } from "../policy/parser/PolicyParser";
import { findMatchingPattern } from "../conditions/WildcardMatcher";

const DEFAULT_SIMULATION_RESOURCES = ["*"];

export class PolicyEvaluationEngine {
  constructor(private readonly parser: PolicyParser = new PolicyParser()) {}

  // ==================== STATEMENTS ====================

  /**
   * Matched action and resource patterns, or undefined when the statement
   * does not apply to the request
   */
  matchStatement(
    statement: PolicyStatement,
    action: string,
    resource: string,
  ): MatchedStatement | undefined {
    const matchedAction = findMatchingPattern(action, statement.action);
    if (matchedAction === undefined) {
      return undefined;
    }
    const matchedResource = findMatchingPattern(resource, statement.resource);
    if (matchedResource === undefined) {
      return undefined;
    }
    return {
      ...(statement.sid === undefined ? {} : { sid: statement.sid }),
      effect: statement.effect,
      matchedAction,
      matchedResource,
    };
  }

  statementMatches(
    statement: PolicyStatement,
    action: string,
    resource: string,
  ): boolean {
    return this.matchStatement(statement, action, resource) !== undefined;
  }

  evaluateStatement(
    statement: PolicyStatement,
    action: string,
    resource: string,
  ): StatementDecision {
    return this.statementMatches(statement, action, resource)
      ? statement.effect
      : "NoMatch";
  }

  // ==================== DOCUMENTS ====================

  /**
   * Deny scan first, then allow
   */
  evaluateDocument(
    document: PolicyDocument,
    action: string,
    resource: string,
  ): StatementDecision {
    const matching = document.statement.filter((statement) =>
      this.statementMatches(statement, action, resource),
    );
    if (matching.some((statement) => statement.effect === "Deny")) {
      return "Deny";
    }
    if (matching.some((statement) => statement.effect === "Allow")) {
      return "Allow";
    }
    return "NoMatch";
  }

  /**
   * Combined decision over a policy set; a Deny anywhere wins
   */
  evaluatePolicies(
    documents: readonly PolicyDocument[],
    action: string,
    resource: string,
  ): EvaluationDecision {
    let allowed = false;
    for (const document of documents) {
      const decision = this.evaluateDocument(document, action, resource);
      if (decision === "Deny") {
        return "Deny";
      }
      if (decision === "Allow") {
        allowed = true;
      }
    }
    return allowed ? "Allow" : "ImplicitDeny";
  }

  isActionAllowed(
    documents: readonly PolicyDocument[],
    action: string,
    resource: string,
  ): boolean {
    return this.evaluatePolicies(documents, action, resource) === "Allow";
  }

  findMatchingStatements(
    documents: readonly PolicyDocument[],
    action: string,
    resource: string,
  ): MatchedStatement[] {
    const matches: MatchedStatement[] = [];
    for (const document of documents) {
      for (const statement of document.statement) {
        const match = this.matchStatement(statement, action, resource);
        if (match) {
          matches.push(match);
        }
      }
    }
    return matches;
  }

  // ==================== SIMULATION ====================

  /**
   * Evaluate every action against every resource. Any malformed policy
   * fails the whole simulation with InvalidParameterError.
   */
  simulateCustomPolicy(
    request: SimulateCustomPolicyRequest,
  ): SimulatePolicyResponse {
    const documents = request.policyInputList.map((policy) =>
      this.parser.parseOrThrow(policy),
    );
    return this.simulate(documents, request.actionNames, request.resourceArns);
  }

  /**
   * Simulation over already-parsed documents
   */
  simulate(
    documents: readonly PolicyDocument[],
    actionNames: readonly string[],
    resourceArns: readonly string[] = DEFAULT_SIMULATION_RESOURCES,
  ): SimulatePolicyResponse {
    const evaluationResults: EvaluationResult[] = [];

    for (const action of actionNames) {
      for (const resource of resourceArns) {
        evaluationResults.push({
          evalActionName: action,
          evalResourceName: resource,
          evalDecision: this.isActionAllowed(documents, action, resource)
            ? "allowed"
            : "denied",
          matchedStatements: this.findMatchingStatements(
            documents,
            action,
            resource,
          ),
          missingContextValues: [],
        });
      }
    }

    return { evaluationResults, isTruncated: false };
  }
}

// Export singleton instance
export const policyEvaluationEngine = new PolicyEvaluationEngine();
