/**
 * IAM Module - WAMI multicloud identity core
 *
 * WAMI ARNs and their provider transformers, the IAM policy evaluation
 * engine, caller authorization and the tenant hierarchy.
 */

export * from "./arn";
export * from "./policy";
export * from "./conditions";
export * from "./errors";
export * from "./tenancy";
export * from "./services";

export {
  PolicyEvaluationEngine,
  policyEvaluationEngine,
} from "./engine/PolicyEngine";

export {
  WamiContext,
  WamiContextBuilder,
  WamiContextProps,
  SessionInfo,
} from "./context/WamiContext";
