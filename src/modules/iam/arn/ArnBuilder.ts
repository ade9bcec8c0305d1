/**
 * ARN Builder
 *
 * Fluent, validating constructor for WamiArn.
 *
 * @example
 * const arn = WamiArn.builder()
 *   .service(Services.iam)
 *   .tenantHierarchy(["12345678", "87654321"])
 *   .wamiInstance("999888777")
 *   .cloudProviderWithRegion("aws", "223344556677", "us-east-1")
 *   .resource("user", "77557755")
 *   .build();
 */

import { ArnParseError, InvalidParameterError } from "../errors/IamError";
import {
  CloudMapping,
  Resource,
  Service,
  TenantPath,
  TenantSegmentInput,
  cloudMapping,
  resource,
  serviceFromString,
  serviceToString,
} from "./types";
import { WamiArn } from "./WamiArn";

export class ArnBuilder {
  private serviceValue?: Service;
  private tenantSegments?: readonly TenantSegmentInput[];
  private instanceId?: string;
  private mapping?: CloudMapping;
  private resourceType?: string;
  private resourceId?: string;

  service(service: Service): this {
    // Normalized so that Custom("iam") and Iam compare equal after a round trip
    this.serviceValue = serviceFromString(serviceToString(service));
    return this;
  }

  serviceName(name: string): this {
    this.serviceValue = serviceFromString(name);
    return this;
  }

  tenantPath(path: TenantPath): this {
    this.tenantSegments = path.segments;
    return this;
  }

  tenant(tenantId: TenantSegmentInput): this {
    this.tenantSegments = [tenantId];
    return this;
  }

  tenantHierarchy(segments: readonly TenantSegmentInput[]): this {
    this.tenantSegments = [...segments];
    return this;
  }

  wamiInstance(instanceId: string): this {
    this.instanceId = instanceId;
    return this;
  }

  /**
   * Map to a provider account with no region (global)
   */
  cloudProvider(provider: string, accountId: string): this {
    this.mapping = cloudMapping(provider, accountId);
    return this;
  }

  cloudProviderWithRegion(
    provider: string,
    accountId: string,
    region: string,
  ): this {
    this.mapping = cloudMapping(provider, accountId, region);
    return this;
  }

  /**
   * Set an existing mapping as is; a `global` region is folded to none
   */
  cloudMapping(mapping: CloudMapping): this {
    this.mapping = cloudMapping(mapping.provider, mapping.accountId, mapping.region);
    return this;
  }

  /**
   * Region of the current mapping; no effect before a provider is set
   */
  region(region: string): this {
    if (this.mapping) {
      this.mapping = cloudMapping(this.mapping.provider, this.mapping.accountId, region);
    }
    return this;
  }

  noCloudMapping(): this {
    this.mapping = undefined;
    return this;
  }

  resource(resourceType: string, resourceId: string): this {
    this.resourceType = resourceType;
    this.resourceId = resourceId;
    return this;
  }

  resourceObject(value: Resource): this {
    return this.resource(value.resourceType, value.resourceId);
  }

  build(): WamiArn {
    if (!this.serviceValue) {
      throw missing("service");
    }
    if (this.tenantSegments === undefined) {
      throw missing("tenant_path");
    }
    if (this.instanceId === undefined) {
      throw missing("wami_instance_id");
    }
    if (this.resourceType === undefined || this.resourceId === undefined) {
      throw missing("resource");
    }

    return new WamiArn({
      service: this.serviceValue,
      tenantPath: this.buildTenantPath(this.tenantSegments),
      wamiInstanceId: this.instanceId,
      cloudMapping: this.mapping,
      resource: resource(this.resourceType, this.resourceId),
    });
  }

  private buildTenantPath(segments: readonly TenantSegmentInput[]): TenantPath {
    if (segments.length === 0) {
      throw new InvalidParameterError("tenant_path cannot be empty", {
        field: "tenant_path",
      });
    }
    try {
      return TenantPath.of(segments);
    } catch (error) {
      if (error instanceof ArnParseError) {
        throw new InvalidParameterError(`tenant_path is invalid: ${error.message}`, {
          field: "tenant_path",
        });
      }
      throw error;
    }
  }
}

function missing(field: string): InvalidParameterError {
  return new InvalidParameterError(`${field} is required`, { field });
}
