/**
 * Errors Module Index
 */

export {
  ArnParseError,
  ArnParseErrorKind,
  InvalidParameterError,
  ResourceNotFoundError,
  ResourceAlreadyExistsError,
  AccessDeniedError,
} from "./IamError";
