/**
 * Provider transformer registry
 */

import { InvalidParameterError } from "../../errors/IamError";
import { Service, TenantPath } from "../types";
import { WamiArn } from "../WamiArn";
import { ArnTransformer, ProviderArnInfo, ProviderName } from "./ArnTransformer";
import { AwsArnTransformer } from "./AwsArnTransformer";
import { AzureArnTransformer } from "./AzureArnTransformer";
import { GcpArnTransformer } from "./GcpArnTransformer";
import { ScalewayArnTransformer } from "./ScalewayArnTransformer";

const TRANSFORMERS: Readonly<Record<ProviderName, ArnTransformer>> =
  Object.freeze({
    aws: new AwsArnTransformer(),
    gcp: new GcpArnTransformer(),
    azure: new AzureArnTransformer(),
    scaleway: new ScalewayArnTransformer(),
  });

function isProviderName(name: string): name is ProviderName {
  return Object.prototype.hasOwnProperty.call(TRANSFORMERS, name);
}

/**
 * Transformer for `provider`, or undefined when none is registered
 */
export function getTransformer(provider: string): ArnTransformer | undefined {
  return isProviderName(provider) ? TRANSFORMERS[provider] : undefined;
}

export function supportedProviders(): ProviderName[] {
  return Object.keys(TRANSFORMERS).filter(isProviderName);
}

/**
 * Render `arn` in the native format of its own cloud provider
 */
export function toProviderArn(arn: WamiArn): string {
  const provider = arn.provider();
  if (provider === undefined) {
    throw new InvalidParameterError("ARN is not cloud-synced", {
      arn: arn.toString(),
    });
  }
  const transformer = getTransformer(provider);
  if (!transformer) {
    throw new InvalidParameterError(
      `No ARN transformer available for provider '${provider}'`,
      { provider },
    );
  }
  return transformer.toProviderArn(arn);
}

export interface WamiScope {
  tenantPath: TenantPath;
  wamiInstanceId: string;
  /** Overrides the service derived from the provider token */
  service?: Service;
}

/**
 * Rebuild a WAMI ARN from provider info. Tenant path and instance id are not
 * recoverable from a provider identifier and must come from the caller.
 */
export function providerInfoToWamiArn(
  info: ProviderArnInfo,
  scope: WamiScope,
): WamiArn {
  const service =
    scope.service ?? TRANSFORMERS[info.provider].toWamiService(info.service);

  const builder = WamiArn.builder()
    .service(service)
    .tenantPath(scope.tenantPath)
    .wamiInstance(scope.wamiInstanceId)
    .resource(info.resourceType, info.resourceId);

  return info.region === undefined
    ? builder.cloudProvider(info.provider, info.accountId).build()
    : builder
        .cloudProviderWithRegion(info.provider, info.accountId, info.region)
        .build();
}

export {
  ArnTransformer,
  BaseArnTransformer,
  ProviderArnInfo,
  ProviderName,
} from "./ArnTransformer";
export { AwsArnTransformer } from "./AwsArnTransformer";
export { AzureArnTransformer, AZURE_RESOURCE_GROUP } from "./AzureArnTransformer";
export { GcpArnTransformer } from "./GcpArnTransformer";
export { ScalewayArnTransformer } from "./ScalewayArnTransformer";
