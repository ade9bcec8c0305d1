/**
 * Opaque tenant-hash ARNs
 *
 *   arn:wami:<service>:tenant-<hash>:<resource-type><path><name>
 *
 * The hash is the first 4 bytes of sha256(accountId + salt), so provider
 * account ids never appear in the ARN. The salt is passed in explicitly;
 * callers usually take it from `config.arnSalt`.
 */

import { createHash } from "crypto";
import { InvalidParameterError } from "../errors/IamError";
import { globMatch } from "../conditions/WildcardMatcher";

const TENANT_HASH_PREFIX = "tenant-";

export class OpaqueArnBuilder {
  constructor(private readonly salt?: string) {}

  getSalt(): string | undefined {
    return this.salt;
  }

  /**
   * @param path - Resource path, either empty or `/`-delimited such as `/tenants/acme/`
   */
  buildArn(
    service: string,
    accountId: string,
    resourceType: string,
    path: string,
    name: string,
  ): string {
    const separator = path === "" ? "/" : "";
    return `arn:wami:${service}:${this.hashAccount(accountId)}:${resourceType}${separator}${path}${name}`;
  }

  hashAccount(accountId: string): string {
    const hash = createHash("sha256");
    hash.update(accountId);
    if (this.salt !== undefined) {
      hash.update(this.salt);
    }
    return `${TENANT_HASH_PREFIX}${hash.digest().subarray(0, 4).toString("hex")}`;
  }
}

/**
 * Components of an opaque tenant-hash ARN
 */
export class ParsedOpaqueArn {
  private constructor(
    readonly provider: string,
    readonly service: string,
    readonly tenantHash: string,
    readonly resourceType: string,
    /** `""` or a `/`-wrapped path such as `/tenants/acme/` */
    readonly path: string,
    readonly name: string,
  ) {}

  static fromArn(arn: string): ParsedOpaqueArn {
    const parts = arn.split(":");

    if (parts.length < 5) {
      throw new InvalidParameterError(`Invalid ARN format: ${arn}`);
    }
    if (parts[0] !== "arn") {
      throw new InvalidParameterError(`ARN must start with 'arn:', got: ${arn}`);
    }
    if (parts[1] !== "wami") {
      throw new InvalidParameterError(
        `Expected 'wami' provider, got: ${parts[1]}`,
      );
    }

    const [, provider, service, tenantHash, resourcePath] = parts;
    const segments = resourcePath.split("/");
    if (segments.length === 1) {
      throw new InvalidParameterError(
        `Missing resource name in: ${resourcePath}`,
      );
    }

    const resourceType = segments[0];
    const name = segments[segments.length - 1];
    const path =
      segments.length === 2 ? "" : `/${segments.slice(1, -1).join("/")}/`;

    return new ParsedOpaqueArn(
      provider,
      service,
      tenantHash,
      resourceType,
      path,
      name,
    );
  }

  toArn(): string {
    const separator = this.path === "" ? "/" : "";
    return `arn:${this.provider}:${this.service}:${this.tenantHash}:${this.resourceType}${separator}${this.path}${this.name}`;
  }

  /**
   * Glob match (`*` and `?`) of the full ARN
   */
  matchesPattern(pattern: string): boolean {
    return arnPatternMatch(this.toArn(), pattern);
  }

  toString(): string {
    return this.toArn();
  }
}

export function arnPatternMatch(arn: string, pattern: string): boolean {
  return globMatch(arn, pattern);
}
