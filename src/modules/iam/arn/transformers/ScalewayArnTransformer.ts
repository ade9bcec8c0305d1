/**
 * Scaleway identifier transformer
 *
 *   scw:<organization>:<service>:<type>/<id>
 */

import { InvalidParameterError } from "../../errors/IamError";
import { Service, Services } from "../types";
import { WamiArn } from "../WamiArn";
import { BaseArnTransformer, ProviderArnInfo } from "./ArnTransformer";

export class ScalewayArnTransformer extends BaseArnTransformer {
  readonly provider = "scaleway";

  toProviderArn(arn: WamiArn): string {
    const mapping = this.requireMapping(arn);
    return `scw:${mapping.accountId}:${this.serviceName(arn.service)}:${arn.resourceType()}/${arn.resourceId()}`;
  }

  fromProviderArn(providerArn: string): ProviderArnInfo {
    const parts = providerArn.split(":");

    if (parts.length < 4) {
      throw new InvalidParameterError(
        `Invalid Scaleway resource format: expected at least 4 parts, got ${parts.length}`,
      );
    }
    if (parts[0] !== "scw") {
      throw new InvalidParameterError(
        `Invalid Scaleway resource prefix: expected 'scw', got '${parts[0]}'`,
      );
    }

    const [, accountId, service] = parts;
    const { resourceType, resourceId } = this.parseResourceTail(
      parts.slice(3).join(":"),
      "Scaleway",
    );

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
      case "iam":
        return Services.iam;
      case "sso":
        return Services.ssoAdmin;
      default:
        return Services.custom(providerService);
    }
  }

  private serviceName(service: Service): string {
    switch (service.kind) {
      case "sso-admin":
        return "sso";
      case "custom":
        return service.name;
      default:
        // Scaleway has no STS; tokens live under IAM
        return "iam";
    }
  }
}
