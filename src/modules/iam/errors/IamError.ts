/**
 * IAM Errors
 *
 * Typed error classes raised by the ARN, policy, authorization and tenant modules.
 */

import { AppError, ErrorCode } from "../../../shared/errors/AppError";

export type ArnParseErrorKind =
  | ErrorCode.INVALID_FORMAT
  | ErrorCode.MISSING_COMPONENT
  | ErrorCode.INVALID_COMPONENT;

const ARN_PARSE_PREFIX: Record<ArnParseErrorKind, string> = {
  [ErrorCode.INVALID_FORMAT]: "Invalid ARN format",
  [ErrorCode.MISSING_COMPONENT]: "Missing ARN component",
  [ErrorCode.INVALID_COMPONENT]: "Invalid ARN component",
};

/**
 * ARN Parse Error
 *
 * Structural problem in a WAMI ARN string or one of its components.
 */
export class ArnParseError extends AppError {
  constructor(kind: ArnParseErrorKind, message: string) {
    super(kind, `${ARN_PARSE_PREFIX[kind]}: ${message}`);
    this.name = "ArnParseError";
  }

  static invalidFormat(message: string): ArnParseError {
    return new ArnParseError(ErrorCode.INVALID_FORMAT, message);
  }

  static missingComponent(message: string): ArnParseError {
    return new ArnParseError(ErrorCode.MISSING_COMPONENT, message);
  }

  static invalidComponent(message: string): ArnParseError {
    return new ArnParseError(ErrorCode.INVALID_COMPONENT, message);
  }
}

/**
 * Invalid Parameter Error
 */
export class InvalidParameterError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.INVALID_PARAMETER, message, true, details);
    this.name = "InvalidParameterError";
  }
}

/**
 * Resource Not Found Error
 */
export class ResourceNotFoundError extends AppError {
  constructor(public readonly resource: string) {
    super(ErrorCode.RESOURCE_NOT_FOUND, `Resource not found: ${resource}`);
    this.name = "ResourceNotFoundError";
  }
}

/**
 * Resource Already Exists Error
 */
export class ResourceAlreadyExistsError extends AppError {
  constructor(public readonly resource: string) {
    super(
      ErrorCode.RESOURCE_ALREADY_EXISTS,
      `Resource already exists: ${resource}`,
    );
    this.name = "ResourceAlreadyExistsError";
  }
}

/**
 * Access Denied Error
 *
 * Raised when an authorization check refuses the request. Distinct from
 * ResourceNotFoundError.
 */
export class AccessDeniedError extends AppError {
  constructor(
    public readonly callerArn: string,
    public readonly action: string,
    public readonly resource: string,
    message?: string,
  ) {
    super(
      ErrorCode.ACCESS_DENIED,
      message ||
        `User ${callerArn} is not authorized to perform ${action} on ${resource}`,
      true,
      { callerArn, action, resource },
    );
    this.name = "AccessDeniedError";
  }
}
