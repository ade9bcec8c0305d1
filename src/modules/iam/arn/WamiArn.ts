/**
 * WAMI ARN
 *
 * Immutable resource identifier. Canonical form:
 *   arn:wami:<service>:<tenant-path>:wami:<instance-id>[:<provider>:<account>:<region|global>]:<type>/<id>
 *
 * Values come from ArnBuilder or parseArn; transformations return new values.
 */

import { InvalidParameterError } from "../errors/IamError";
import {
  CloudMapping,
  Resource,
  Service,
  TenantPath,
  cloudMapping as createCloudMapping,
  cloudMappingsEqual,
  regionOrGlobal,
  resourcePath,
  serviceToString,
} from "./types";
import { ArnBuilder } from "./ArnBuilder";
import { parseArn } from "./ArnParser";

export const ARN_PREFIX = "arn";
export const WAMI_MARKER = "wami";

export interface WamiArnProps {
  service: Service;
  tenantPath: TenantPath;
  wamiInstanceId: string;
  cloudMapping?: CloudMapping;
  resource: Resource;
}

export class WamiArn {
  readonly service: Service;
  readonly tenantPath: TenantPath;
  readonly wamiInstanceId: string;
  readonly cloudMapping?: CloudMapping;
  readonly resource: Resource;

  constructor(props: WamiArnProps) {
    assertArnProps(props);
    this.service = props.service;
    this.tenantPath = props.tenantPath;
    this.wamiInstanceId = props.wamiInstanceId;
    if (props.cloudMapping) {
      const { provider, accountId, region } = props.cloudMapping;
      this.cloudMapping = createCloudMapping(provider, accountId, region);
    }
    this.resource = props.resource;
    Object.freeze(this);
  }

  static builder(): ArnBuilder {
    return new ArnBuilder();
  }

  static parse(value: string): WamiArn {
    return parseArn(value);
  }

  /**
   * Everything before the resource segment
   */
  prefix(): string {
    const base = [
      ARN_PREFIX,
      WAMI_MARKER,
      serviceToString(this.service),
      this.tenantPath.toString(),
      WAMI_MARKER,
      this.wamiInstanceId,
    ];
    if (this.cloudMapping) {
      base.push(
        this.cloudMapping.provider,
        this.cloudMapping.accountId,
        regionOrGlobal(this.cloudMapping),
      );
    }
    return base.join(":");
  }

  toString(): string {
    return `${this.prefix()}:${resourcePath(this.resource)}`;
  }

  toJSON(): string {
    return this.toString();
  }

  equals(other: WamiArn): boolean {
    return (
      this.service.kind === other.service.kind &&
      serviceToString(this.service) === serviceToString(other.service) &&
      this.tenantPath.equals(other.tenantPath) &&
      this.wamiInstanceId === other.wamiInstanceId &&
      cloudMappingsEqual(this.cloudMapping, other.cloudMapping) &&
      this.resource.resourceType === other.resource.resourceType &&
      this.resource.resourceId === other.resource.resourceId
    );
  }

  isCloudSynced(): boolean {
    return this.cloudMapping !== undefined;
  }

  provider(): string | undefined {
    return this.cloudMapping?.provider;
  }

  region(): string | undefined {
    return this.cloudMapping?.region;
  }

  resourceType(): string {
    return this.resource.resourceType;
  }

  resourceId(): string {
    return this.resource.resourceId;
  }

  primaryTenant(): string {
    return this.tenantPath.root();
  }

  leafTenant(): string {
    return this.tenantPath.leaf();
  }

  fullTenantPath(): string {
    return this.tenantPath.toString();
  }

  matchesPrefix(prefix: string): boolean {
    return this.toString().startsWith(prefix);
  }

  /**
   * True when the resource lives in `path` or one of its sub-tenants
   */
  belongsToTenant(path: TenantPath): boolean {
    return this.tenantPath.startsWith(path);
  }

  withCloudMapping(mapping?: CloudMapping): WamiArn {
    return new WamiArn({
      service: this.service,
      tenantPath: this.tenantPath,
      wamiInstanceId: this.wamiInstanceId,
      cloudMapping: mapping,
      resource: this.resource,
    });
  }
}

function assertToken(field: string, value: string, forbidden = [":"]): void {
  if (value === "") {
    throw new InvalidParameterError(`${field} cannot be empty`, { field });
  }
  for (const char of forbidden) {
    if (value.includes(char)) {
      throw new InvalidParameterError(`${field} cannot contain '${char}'`, {
        field,
        value,
      });
    }
  }
}

/**
 * Rejects values whose canonical string would not parse back to the same ARN
 */
function assertArnProps(props: WamiArnProps): void {
  assertToken("service", serviceToString(props.service));
  assertToken("wami_instance_id", props.wamiInstanceId);

  const { cloudMapping, resource } = props;
  if (cloudMapping) {
    assertToken("cloud_provider", cloudMapping.provider, [":", "/"]);
    assertToken("cloud_account_id", cloudMapping.accountId, [":", "/"]);
    if (cloudMapping.region !== undefined) {
      assertToken("cloud_region", cloudMapping.region, [":", "/"]);
    }
  }

  assertToken("resource_type", resource.resourceType, [":", "/"]);
  if (resource.resourceId === "") {
    throw new InvalidParameterError("resource_id cannot be empty", {
      field: "resource_id",
    });
  }
}
