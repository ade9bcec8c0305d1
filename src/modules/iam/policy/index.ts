/**
 * Policy Module Index
 */

// Models and types
export * from "./models/types";

// Parser and validator
export {
  PolicyParser,
  ParseResult,
  ValidationError,
  RawPolicyDocument,
  RawPolicyStatement,
  policyDocumentSchema,
  policyStatementSchema,
  emptyPolicyDocument,
  parsePolicyDocument,
} from "./parser/PolicyParser";
