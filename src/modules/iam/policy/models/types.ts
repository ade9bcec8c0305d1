/**
 * IAM Policy Type Definitions
 *
 * Allow/Deny statements over action and resource patterns, the decisions
 * the evaluation engine produces, and the simulation request/response shapes.
 */

// ==================== CORE POLICY TYPES ====================

/**
 * Statement effect
 */
export type PolicyEffect = "Allow" | "Deny";

/**
 * Condition block, `{ operator: { key: value } }`. Carried but not evaluated.
 */
export type PolicyCondition = Record<string, Record<string, unknown>>;

export interface PolicyStatement {
  sid?: string;
  effect: PolicyEffect;
  action: string[];
  resource: string[];
  condition?: PolicyCondition;
}

export interface PolicyDocument {
  version: string;
  statement: PolicyStatement[];
}

// ==================== DECISIONS ====================

/**
 * Outcome of a single statement against a request
 */
export type StatementDecision = "Allow" | "Deny" | "NoMatch";

/**
 * Aggregate outcome over a policy set
 */
export type EvaluationDecision = "Allow" | "Deny" | "ImplicitDeny";

/**
 * Statement that matched a request, with the patterns responsible
 */
export interface MatchedStatement {
  sid?: string;
  effect: PolicyEffect;
  matchedAction: string;
  matchedResource: string;
}

// ==================== SIMULATION ====================

export type SimulationDecision = "allowed" | "denied";

export interface ContextEntry {
  contextKeyName: string;
  contextKeyType?: string;
  contextKeyValues: string[];
}

export interface SimulateCustomPolicyRequest {
  /** Raw policy documents as JSON text */
  policyInputList: string[];
  actionNames: string[];
  /** Defaults to `["*"]` */
  resourceArns?: string[];
  contextEntries?: ContextEntry[];
}

export interface SimulatePrincipalPolicyRequest {
  /** WAMI ARN of the principal (a user) */
  policySourceArn: string;
  actionNames: string[];
  resourceArns?: string[];
  /** Extra raw policy documents evaluated with the principal's own */
  policyInputList?: string[];
  contextEntries?: ContextEntry[];
}

export interface EvaluationResult {
  evalActionName: string;
  evalResourceName: string;
  evalDecision: SimulationDecision;
  matchedStatements: MatchedStatement[];
  missingContextValues: string[];
}

export interface SimulatePolicyResponse {
  evaluationResults: EvaluationResult[];
  isTruncated: boolean;
}
