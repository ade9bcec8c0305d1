/**
 * WAMI IAM core - public API
 */

export * from "./modules/iam";

export {
  IPolicyRepository,
  PolicyRecord,
} from "./infrastructure/repositories/IPolicyRepository";
export { ITenantRepository } from "./infrastructure/repositories/ITenantRepository";
export { InMemoryPolicyRepository } from "./infrastructure/repositories/InMemoryPolicyRepository";
export { InMemoryTenantRepository } from "./infrastructure/repositories/InMemoryTenantRepository";

export {
  AppError,
  ErrorCode,
  isAppError,
  hasErrorCode,
} from "./shared/errors/AppError";
export { config, Config } from "./shared/config";
export {
  structuredLogger,
  StructuredLogger,
  ChildLogger,
} from "./core/logger/structuredLogger";
