/**
 * ARN Types
 *
 * Value types that make up a WAMI ARN: the tenant path, the owning service,
 * the optional cloud-provider mapping and the addressed resource.
 */

import { ArnParseError } from "../errors/IamError";

// ==================== TENANT PATH ====================

const U64_MAX = BigInt("18446744073709551615");
const DIGITS = /^[0-9]+$/;

export type TenantSegmentInput = string | number | bigint;

/**
 * Normalize one tenant segment to its canonical decimal form.
 * Segments are unsigned 64-bit integers.
 */
export function normalizeTenantSegment(segment: TenantSegmentInput): string {
  const text = String(segment);
  if (!DIGITS.test(text)) {
    throw ArnParseError.invalidComponent(
      `Invalid tenant path segment: '${String(segment)}' (must be an unsigned 64-bit integer)`,
    );
  }
  const value = BigInt(text);
  if (value > U64_MAX) {
    throw ArnParseError.invalidComponent(
      `Invalid tenant path segment: '${text}' (exceeds unsigned 64-bit range)`,
    );
  }
  return value.toString();
}

export function isValidTenantSegment(segment: TenantSegmentInput): boolean {
  try {
    normalizeTenantSegment(segment);
    return true;
  } catch {
    return false;
  }
}

/**
 * Hierarchical tenant path, e.g. `12345678/87654321/99999999`.
 * Never empty; immutable once constructed.
 */
export class TenantPath {
  readonly segments: readonly string[];

  private constructor(segments: string[]) {
    this.segments = Object.freeze(segments);
    Object.freeze(this);
  }

  static of(segments: readonly TenantSegmentInput[]): TenantPath {
    if (segments.length === 0) {
      throw ArnParseError.invalidComponent("Tenant path cannot be empty");
    }
    return new TenantPath(segments.map(normalizeTenantSegment));
  }

  static single(tenantId: TenantSegmentInput): TenantPath {
    return TenantPath.of([tenantId]);
  }

  /**
   * Parse a `/`-joined path such as `1/2/3`
   */
  static parse(path: string): TenantPath {
    if (path === "") {
      throw ArnParseError.invalidComponent("Tenant path cannot be empty");
    }
    return TenantPath.of(path.split("/"));
  }

  /**
   * Build from a hierarchical tenant id whose segments are numeric
   */
  static fromTenantId(tenantId: { segments(): string[] }): TenantPath {
    return TenantPath.of(tenantId.segments());
  }

  depth(): number {
    return this.segments.length;
  }

  root(): string {
    return this.segments[0];
  }

  leaf(): string {
    return this.segments[this.segments.length - 1];
  }

  parent(): TenantPath | undefined {
    if (this.segments.length <= 1) {
      return undefined;
    }
    return new TenantPath(this.segments.slice(0, -1));
  }

  child(segment: TenantSegmentInput): TenantPath {
    return new TenantPath([...this.segments, normalizeTenantSegment(segment)]);
  }

  /**
   * True when `other` is a prefix of this path (equal paths included)
   */
  startsWith(other: TenantPath): boolean {
    if (this.segments.length < other.segments.length) {
      return false;
    }
    return other.segments.every((segment, i) => this.segments[i] === segment);
  }

  isDescendantOf(other: TenantPath): boolean {
    return (
      this.segments.length > other.segments.length && this.startsWith(other)
    );
  }

  isAncestorOf(other: TenantPath): boolean {
    return other.isDescendantOf(this);
  }

  equals(other: TenantPath): boolean {
    return (
      this.segments.length === other.segments.length && this.startsWith(other)
    );
  }

  toString(): string {
    return this.segments.join("/");
  }

  toJSON(): string {
    return this.toString();
  }
}

// ==================== SERVICE ====================

export type Service =
  | { kind: "iam" }
  | { kind: "sts" }
  | { kind: "sso-admin" }
  | { kind: "custom"; name: string };

const IAM_SERVICE: Service = { kind: "iam" };
const STS_SERVICE: Service = { kind: "sts" };
const SSO_ADMIN_SERVICE: Service = { kind: "sso-admin" };

export const Services = {
  iam: IAM_SERVICE,
  sts: STS_SERVICE,
  ssoAdmin: SSO_ADMIN_SERVICE,
  custom(name: string): Service {
    return { kind: "custom", name };
  },
};

/**
 * Lossy parse of a service token: unknown tokens become `custom`
 */
export function serviceFromString(token: string): Service {
  switch (token) {
    case "iam":
      return Services.iam;
    case "sts":
      return Services.sts;
    case "sso-admin":
      return Services.ssoAdmin;
    default:
      return Services.custom(token);
  }
}

export function serviceToString(service: Service): string {
  return service.kind === "custom" ? service.name : service.kind;
}

export function servicesEqual(a: Service, b: Service): boolean {
  return serviceToString(a) === serviceToString(b) && a.kind === b.kind;
}

// ==================== CLOUD MAPPING ====================

export const GLOBAL_REGION = "global";

/**
 * Cloud-provider mapping of a synced resource. A missing region means global.
 */
export interface CloudMapping {
  readonly provider: string;
  readonly accountId: string;
  readonly region?: string;
}

export function cloudMapping(
  provider: string,
  accountId: string,
  region?: string,
): CloudMapping {
  return region === undefined || region === GLOBAL_REGION
    ? Object.freeze({ provider, accountId })
    : Object.freeze({ provider, accountId, region });
}

export function isRegional(mapping: CloudMapping): boolean {
  return mapping.region !== undefined;
}

export function regionOrGlobal(mapping: CloudMapping): string {
  return mapping.region ?? GLOBAL_REGION;
}

export function cloudMappingsEqual(
  a: CloudMapping | undefined,
  b: CloudMapping | undefined,
): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  return (
    a.provider === b.provider &&
    a.accountId === b.accountId &&
    a.region === b.region
  );
}

// ==================== RESOURCE ====================

export interface Resource {
  readonly resourceType: string;
  readonly resourceId: string;
}

export function resource(resourceType: string, resourceId: string): Resource {
  return Object.freeze({ resourceType, resourceId });
}

export function resourcePath(res: Resource): string {
  return `${res.resourceType}/${res.resourceId}`;
}
