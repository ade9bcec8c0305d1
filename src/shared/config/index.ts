import * as dotenv from "dotenv";
import { z } from "zod";

// Load environment variables
dotenv.config();

export type LogLevelName = "DEBUG" | "INFO" | "WARN" | "ERROR";
export type MalformedPolicyMode = "ignore" | "fail";
export type AuthorizationMode = "deny-overrides" | "first-match";

export interface Config {
  // Runtime
  nodeEnv: string;

  // Logging
  logLevel: LogLevelName;
  jsonLogFormat: boolean;

  // WAMI instance
  wamiInstanceId: string;
  arnSalt?: string;

  // Policies
  defaultPolicyVersion: string;
  malformedPolicyMode: MalformedPolicyMode;
  authorizationMode: AuthorizationMode;

  // Tenants
  maxTenantDepth: number;
}

const configSchema = z.object({
  nodeEnv: z.string().min(1),
  logLevel: z.enum(["DEBUG", "INFO", "WARN", "ERROR"]),
  jsonLogFormat: z.boolean(),
  wamiInstanceId: z.string().min(1),
  arnSalt: z.string().min(1).optional(),
  defaultPolicyVersion: z.string().min(1),
  malformedPolicyMode: z.enum(["ignore", "fail"]),
  authorizationMode: z.enum(["deny-overrides", "first-match"]),
  maxTenantDepth: z.number().int().min(0),
});

// Env var name for each config key, used in load-time error messages
const ENV_NAMES: Record<keyof Config, string> = {
  nodeEnv: "NODE_ENV",
  logLevel: "LOG_LEVEL",
  jsonLogFormat: "JSON_LOG_FORMAT",
  wamiInstanceId: "WAMI_INSTANCE_ID",
  arnSalt: "WAMI_ARN_SALT",
  defaultPolicyVersion: "DEFAULT_POLICY_VERSION",
  malformedPolicyMode: "MALFORMED_POLICY_MODE",
  authorizationMode: "AUTHORIZATION_MODE",
  maxTenantDepth: "MAX_TENANT_DEPTH",
};

const rawConfig = {
  nodeEnv: process.env.NODE_ENV || "development",

  logLevel: (process.env.LOG_LEVEL || "INFO").toUpperCase(),
  jsonLogFormat: process.env.JSON_LOG_FORMAT !== "false",

  wamiInstanceId: process.env.WAMI_INSTANCE_ID || "999888777",
  arnSalt: process.env.WAMI_ARN_SALT || undefined,

  defaultPolicyVersion: process.env.DEFAULT_POLICY_VERSION || "2012-10-17",
  malformedPolicyMode: process.env.MALFORMED_POLICY_MODE || "ignore",
  authorizationMode: process.env.AUTHORIZATION_MODE || "deny-overrides",

  maxTenantDepth: parseInt(process.env.MAX_TENANT_DEPTH || "5", 10),
};

function isConfigKey(key: unknown): key is keyof Config {
  return (
    typeof key === "string" &&
    Object.prototype.hasOwnProperty.call(ENV_NAMES, key)
  );
}

function loadConfig(): Readonly<Config> {
  const result = configSchema.safeParse(rawConfig);
  if (!result.success) {
    const invalid = result.error.issues.map((issue) => {
      const key = issue.path[0];
      const envName = isConfigKey(key) ? ENV_NAMES[key] : String(key);
      return `${envName} (${issue.message})`;
    });
    throw new Error(
      `Invalid environment configuration: ${invalid.join(", ")}`,
    );
  }
  return Object.freeze(result.data);
}

const config = loadConfig();

export { config };
