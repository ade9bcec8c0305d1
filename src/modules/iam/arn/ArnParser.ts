/**
 * ARN Parser
 *
 * Decodes canonical WAMI ARN strings. The native and cloud-synced layouts
 * share a `:` separator, so the tail after the instance id is classified by
 * segment count (see classifyArnTail).
 */

import { ArnParseError } from "../errors/IamError";
import {
  CloudMapping,
  Resource,
  TenantPath,
  cloudMapping,
  resource,
  serviceFromString,
} from "./types";
import { ARN_PREFIX, WAMI_MARKER, WamiArn } from "./WamiArn";

const MIN_PARTS = 7;
const TAIL_START = 6;

export type ArnTailLayout = "cloud-regional" | "cloud-legacy" | "native";

export interface ArnTail {
  layout: ArnTailLayout;
  cloudMapping?: CloudMapping;
  resourceToken: string;
}

interface TailRule {
  layout: Exclude<ArnTailLayout, "native">;
  /** Number of `:` segments the rule consumes before the resource token */
  width: number;
  applies(parts: readonly string[]): boolean;
}

function slashFree(parts: readonly string[], from: number, to: number): boolean {
  return parts.slice(from, to).every((part) => !part.includes("/"));
}

/**
 * Evaluated in order; the first rule that applies wins, otherwise native.
 *
 *   parts >= 10, parts[6..8] slash-free  ->  provider:account:region:resource
 *   parts == 9,  parts[6..7] slash-free  ->  provider:account:resource (legacy)
 */
const TAIL_RULES: readonly TailRule[] = [
  {
    layout: "cloud-regional",
    width: 3,
    applies: (parts) => parts.length >= 10 && slashFree(parts, 6, 9),
  },
  {
    layout: "cloud-legacy",
    width: 2,
    applies: (parts) => parts.length === 9 && slashFree(parts, 6, 8),
  },
];

export function classifyArnTail(parts: readonly string[]): ArnTail {
  const rule = TAIL_RULES.find((candidate) => candidate.applies(parts));
  if (!rule) {
    return {
      layout: "native",
      resourceToken: parts.slice(TAIL_START).join(":"),
    };
  }

  const [provider, accountId, region] = parts.slice(
    TAIL_START,
    TAIL_START + rule.width,
  );
  if (provider === "" || accountId === "" || region === "") {
    throw ArnParseError.invalidComponent(
      "Provider, account ID, and region cannot be empty",
    );
  }

  return {
    layout: rule.layout,
    // `global` is folded into "no region" by cloudMapping()
    cloudMapping: cloudMapping(provider, accountId, region),
    resourceToken: parts.slice(TAIL_START + rule.width).join(":"),
  };
}

function parseResourceToken(token: string): Resource {
  const slash = token.indexOf("/");
  if (slash < 0) {
    throw ArnParseError.invalidFormat(
      `Resource must be in format 'type/id', got '${token}'`,
    );
  }
  const resourceType = token.slice(0, slash);
  const resourceId = token.slice(slash + 1);
  if (resourceType === "" || resourceId === "") {
    throw ArnParseError.invalidComponent("Resource type and ID cannot be empty");
  }
  if (resourceType.includes(":")) {
    throw ArnParseError.invalidComponent(
      `Resource type cannot contain ':', got '${resourceType}'`,
    );
  }
  return resource(resourceType, resourceId);
}

export function parseArn(value: string): WamiArn {
  const parts = value.split(":");

  if (parts.length < MIN_PARTS) {
    throw ArnParseError.invalidFormat(
      `Expected at least ${MIN_PARTS} parts, got ${parts.length}`,
    );
  }
  if (parts[0] !== ARN_PREFIX) {
    throw ArnParseError.invalidFormat(
      `Expected '${ARN_PREFIX}' prefix, got '${parts[0]}'`,
    );
  }
  if (parts[1] !== WAMI_MARKER) {
    throw ArnParseError.invalidFormat(
      `Expected '${WAMI_MARKER}' namespace, got '${parts[1]}'`,
    );
  }
  if (parts[2] === "") {
    throw ArnParseError.missingComponent("Service cannot be empty");
  }
  const service = serviceFromString(parts[2]);

  const tenantPath = TenantPath.parse(parts[3]);

  if (parts[4] !== WAMI_MARKER) {
    throw ArnParseError.invalidFormat(
      `Expected '${WAMI_MARKER}' marker at position 4, got '${parts[4]}'`,
    );
  }

  const wamiInstanceId = parts[5];
  if (wamiInstanceId === "") {
    throw ArnParseError.missingComponent("WAMI instance ID cannot be empty");
  }

  const tail = classifyArnTail(parts);

  return new WamiArn({
    service,
    tenantPath,
    wamiInstanceId,
    cloudMapping: tail.cloudMapping,
    resource: parseResourceToken(tail.resourceToken),
  });
}

/**
 * Like parseArn, but returns undefined for malformed input
 */
export function tryParseArn(value: string): WamiArn | undefined {
  try {
    return parseArn(value);
  } catch (error) {
    if (error instanceof ArnParseError) {
      return undefined;
    }
    throw error;
  }
}

export function formatArn(arn: WamiArn): string {
  return arn.toString();
}
