/**
 * Policy Parser
 *
 * Parses and validates IAM policy documents from their JSON form
 * (`Version`, `Statement`, `Effect`, `Action`, `Resource`, ...).
 * `Action` and `Resource` take a string or an array of strings, and
 * `Statement` takes a single statement object or an array.
 */

import { z } from "zod";
import { InvalidParameterError } from "../../errors/IamError";
import { PolicyDocument, PolicyStatement } from "../models/types";

// ==================== SCHEMAS ====================

const stringOrArray = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (typeof value === "string" ? [value] : value));

export const policyStatementSchema = z.object({
  Sid: z.string().optional(),
  Effect: z.enum(["Allow", "Deny"]),
  Action: stringOrArray,
  Resource: stringOrArray,
  Condition: z.record(z.record(z.unknown())).optional(),
});

// A lone statement object is wrapped so issues keep their `Statement.<n>` path
export const policyDocumentSchema = z.object({
  Version: z.string().min(1),
  Statement: z.preprocess(
    (value) =>
      value !== null && typeof value === "object" && !Array.isArray(value)
        ? [value]
        : value,
    z.array(policyStatementSchema),
  ),
});

export type RawPolicyStatement = z.input<typeof policyStatementSchema>;

export interface RawPolicyDocument {
  Version: string;
  Statement: RawPolicyStatement | RawPolicyStatement[];
}

// ==================== PARSE RESULT ====================

/**
 * Result of parsing a policy
 */
export interface ParseResult<T> {
  success: boolean;
  data?: T;
  errors: ValidationError[];
}

/**
 * Validation error structure for policy parsing
 */
export interface ValidationError {
  field: string;
  message: string;
  path: string;
  code?: string;
}

// ==================== PARSER ====================

export class PolicyParser {
  /**
   * Parse and validate a policy document
   * @param policyJson - Raw JSON text or an already-decoded value
   */
  parse(policyJson: unknown): ParseResult<PolicyDocument> {
    let raw: unknown = policyJson;

    if (typeof policyJson === "string") {
      try {
        raw = JSON.parse(policyJson);
      } catch (error) {
        return {
          success: false,
          errors: [
            {
              field: "json",
              message: `Failed to parse JSON: ${error instanceof Error ? error.message : "Unknown error"}`,
              path: "json",
            },
          ],
        };
      }
    }

    const result = policyDocumentSchema.safeParse(raw);
    if (!result.success) {
      return {
        success: false,
        errors: result.error.issues.map((issue) => ({
          field: String(issue.path[issue.path.length - 1] ?? "policy"),
          message: issue.message,
          path: issue.path.join(".") || "policy",
          code: issue.code,
        })),
      };
    }

    return {
      success: true,
      data: {
        version: result.data.Version,
        statement: result.data.Statement.map(toStatement),
      },
      errors: [],
    };
  }

  /**
   * Parse a policy document, throwing InvalidParameterError when invalid
   */
  parseOrThrow(policyJson: unknown): PolicyDocument {
    const result = this.parse(policyJson);
    if (!result.success || !result.data) {
      throw new InvalidParameterError(
        `Invalid policy document: ${formatErrors(result.errors)}`,
        { errors: result.errors },
      );
    }
    return result.data;
  }

  /**
   * Serialize a document back to its JSON form
   */
  serialize(document: PolicyDocument): string {
    const raw: RawPolicyDocument = {
      Version: document.version,
      Statement: document.statement.map((statement) => ({
        ...(statement.sid === undefined ? {} : { Sid: statement.sid }),
        Effect: statement.effect,
        Action: statement.action,
        Resource: statement.resource,
        ...(statement.condition === undefined
          ? {}
          : { Condition: statement.condition }),
      })),
    };
    return JSON.stringify(raw);
  }
}

function toStatement(
  raw: z.output<typeof policyStatementSchema>,
): PolicyStatement {
  const statement: PolicyStatement = {
    effect: raw.Effect,
    action: raw.Action,
    resource: raw.Resource,
  };
  if (raw.Sid !== undefined) {
    statement.sid = raw.Sid;
  }
  if (raw.Condition !== undefined) {
    statement.condition = raw.Condition;
  }
  return statement;
}

function formatErrors(errors: ValidationError[]): string {
  return errors.map((error) => `${error.path}: ${error.message}`).join("; ");
}

/**
 * Document with no statements; evaluates to implicit deny
 */
export function emptyPolicyDocument(version: string): PolicyDocument {
  return { version, statement: [] };
}

// Default parser instance
const defaultParser = new PolicyParser();

export function parsePolicyDocument(policyJson: unknown): PolicyDocument {
  return defaultParser.parseOrThrow(policyJson);
}
