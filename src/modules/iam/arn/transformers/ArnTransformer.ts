/**
 * ARN Transformer
 *
 * Per-provider codec between WAMI ARNs and provider-native identifiers.
 * The reverse direction is lossy: providers carry no tenant path or WAMI
 * instance id.
 */

import { InvalidParameterError } from "../../errors/IamError";
import { CloudMapping, Resource, Service, resource } from "../types";
import { WamiArn } from "../WamiArn";

export type ProviderName = "aws" | "gcp" | "azure" | "scaleway";

/**
 * Fields recoverable from a provider-native identifier
 */
export interface ProviderArnInfo {
  provider: ProviderName;
  accountId: string;
  /** Provider-side service token, e.g. `iam`, `iam.googleapis.com` */
  service: string;
  resourceType: string;
  resourceId: string;
  region?: string;
}

export interface ArnTransformer {
  readonly provider: ProviderName;
  toProviderArn(arn: WamiArn): string;
  fromProviderArn(providerArn: string): ProviderArnInfo;
  /** Map a provider-side service token back to a WAMI service */
  toWamiService(providerService: string): Service;
}

export abstract class BaseArnTransformer implements ArnTransformer {
  abstract readonly provider: ProviderName;

  abstract toProviderArn(arn: WamiArn): string;

  abstract fromProviderArn(providerArn: string): ProviderArnInfo;

  abstract toWamiService(providerService: string): Service;

  /**
   * Cloud mapping of `arn`, which must target this transformer's provider
   */
  protected requireMapping(arn: WamiArn): CloudMapping {
    const mapping = arn.cloudMapping;
    if (!mapping) {
      throw new InvalidParameterError("ARN is not cloud-synced", {
        arn: arn.toString(),
      });
    }
    if (mapping.provider !== this.provider) {
      throw new InvalidParameterError(
        `ARN provider is '${mapping.provider}', expected '${this.provider}'`,
        { arn: arn.toString() },
      );
    }
    return mapping;
  }

  /**
   * Split a `type/id` tail; the id keeps any further `/`
   */
  protected parseResourceTail(tail: string, label: string): Resource {
    const slash = tail.indexOf("/");
    const resourceType = slash < 0 ? "" : tail.slice(0, slash);
    const resourceId = slash < 0 ? "" : tail.slice(slash + 1);
    if (resourceType === "" || resourceId === "") {
      throw new InvalidParameterError(
        `Invalid ${label} resource format: expected 'type/id', got '${tail}'`,
      );
    }
    return resource(resourceType, resourceId);
  }
}
