/**
 * Policy lookup contract consumed by authorization and simulation.
 * Policy documents are returned as raw JSON text; parsing is the caller's job.
 */

/**
 * Managed policy record
 */
export interface PolicyRecord {
  policyArn: string;
  policyName: string;
  /** Raw JSON policy document */
  policyDocument: string;
}

export interface IPolicyRepository {
  /** ARNs of managed policies attached to the user, in attachment order */
  listAttachedUserPolicies(principal: string): Promise<string[]>;

  getPolicy(policyArn: string): Promise<PolicyRecord | null>;

  /** Names of the user's inline policies */
  listUserPolicies(principal: string): Promise<string[]>;

  /** Raw JSON of an inline policy */
  getUserPolicy(principal: string, policyName: string): Promise<string | null>;
}
