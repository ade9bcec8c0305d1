export enum ErrorCode {
  // ARN structure errors
  INVALID_FORMAT = "INVALID_FORMAT",
  MISSING_COMPONENT = "MISSING_COMPONENT",
  INVALID_COMPONENT = "INVALID_COMPONENT",

  // Validation errors
  INVALID_PARAMETER = "INVALID_PARAMETER",

  // Resource errors
  RESOURCE_NOT_FOUND = "RESOURCE_NOT_FOUND",
  RESOURCE_ALREADY_EXISTS = "RESOURCE_ALREADY_EXISTS",

  // Authorization errors
  ACCESS_DENIED = "ACCESS_DENIED",

  // System errors
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    isOperational: boolean = true,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "AppError";
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

export function isAppError(value: unknown): value is AppError {
  return value instanceof AppError;
}

export function hasErrorCode(value: unknown, code: ErrorCode): boolean {
  return isAppError(value) && value.code === code;
}

