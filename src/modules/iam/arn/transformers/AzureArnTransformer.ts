/**
 * Azure resource-ID transformer
 *
 *   /subscriptions/<subscription>/resourceGroups/wami-resources/providers/<namespace>/<type>/<id>
 */

import { InvalidParameterError } from "../../errors/IamError";
import { Service, Services } from "../types";
import { WamiArn } from "../WamiArn";
import { BaseArnTransformer, ProviderArnInfo } from "./ArnTransformer";

export const AZURE_RESOURCE_GROUP = "wami-resources";

const AUTHORIZATION_NAMESPACE = "Microsoft.Authorization";
const DIRECTORY_NAMESPACE = "Microsoft.AzureActiveDirectory";

export class AzureArnTransformer extends BaseArnTransformer {
  readonly provider = "azure";

  toProviderArn(arn: WamiArn): string {
    const mapping = this.requireMapping(arn);
    return [
      "",
      "subscriptions",
      mapping.accountId,
      "resourceGroups",
      AZURE_RESOURCE_GROUP,
      "providers",
      this.namespace(arn.service),
      arn.resourceType(),
      arn.resourceId(),
    ].join("/");
  }

  fromProviderArn(providerArn: string): ProviderArnInfo {
    const parts = providerArn.split("/");

    if (parts.length < 9 || parts[0] !== "") {
      throw new InvalidParameterError("Invalid Azure resource ID format");
    }

    const [, subscriptions, accountId, resourceGroups, , providers] = parts;
    if (subscriptions !== "subscriptions") {
      throw new InvalidParameterError(
        `Invalid Azure resource ID: expected 'subscriptions', got '${subscriptions}'`,
      );
    }
    if (resourceGroups !== "resourceGroups" || providers !== "providers") {
      throw new InvalidParameterError(
        `Invalid Azure resource ID: expected '/resourceGroups/<group>/providers/' in '${providerArn}'`,
      );
    }

    const service = parts[6];
    const resourceType = parts[7];
    const resourceId = parts.slice(8).join("/");
    if (accountId === "" || service === "" || resourceType === "" || resourceId === "") {
      throw new InvalidParameterError(
        `Invalid Azure resource ID: empty component in '${providerArn}'`,
      );
    }

    return {
      provider: this.provider,
      accountId,
      service,
      resourceType,
      resourceId,
    };
  }

  toWamiService(providerService: string): Service {
    switch (providerService) {
      case AUTHORIZATION_NAMESPACE:
        return Services.iam;
      case DIRECTORY_NAMESPACE:
        return Services.ssoAdmin;
      default:
        return Services.custom(providerService);
    }
  }

  private namespace(service: Service): string {
    switch (service.kind) {
      case "sso-admin":
        return DIRECTORY_NAMESPACE;
      case "custom":
        return service.name;
      default:
        return AUTHORIZATION_NAMESPACE;
    }
  }
}
