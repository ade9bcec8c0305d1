/**
 * Services Module Index
 */

export {
  AuthorizationService,
  AuthorizationServiceOptions,
} from "./AuthorizationService";

export { PolicySimulationService } from "./PolicySimulationService";
