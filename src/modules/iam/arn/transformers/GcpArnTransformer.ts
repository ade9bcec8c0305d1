/**
 * GCP resource-name transformer
 *
 *   //<service-host>/projects/<project>/<type>s/<id>
 *
 * Regions are not encoded; a regional mapping is written the same way.
 */

import { InvalidParameterError } from "../../errors/IamError";
import { Service, Services } from "../types";
import { WamiArn } from "../WamiArn";
import { BaseArnTransformer, ProviderArnInfo } from "./ArnTransformer";

const GCP_DOMAIN = ".googleapis.com";
const IAM_HOST = `iam${GCP_DOMAIN}`;
const CLOUD_IDENTITY_HOST = `cloudidentity${GCP_DOMAIN}`;

export class GcpArnTransformer extends BaseArnTransformer {
  readonly provider = "gcp";

  toProviderArn(arn: WamiArn): string {
    const mapping = this.requireMapping(arn);
    return `//${this.serviceHost(arn.service)}/projects/${mapping.accountId}/${arn.resourceType()}s/${arn.resourceId()}`;
  }

  fromProviderArn(providerArn: string): ProviderArnInfo {
    if (!providerArn.startsWith("//")) {
      throw new InvalidParameterError(
        "Invalid GCP resource name: expected '//' prefix",
      );
    }

    const parts = providerArn.slice(2).split("/");
    if (parts.length < 5) {
      throw new InvalidParameterError(
        `Invalid GCP resource name format: expected at least 5 parts, got ${parts.length}`,
      );
    }

    const [service, projects, accountId, pluralType] = parts;
    if (projects !== "projects") {
      throw new InvalidParameterError(
        `Invalid GCP resource name: expected 'projects', got '${projects}'`,
      );
    }

    const resourceType = pluralType.endsWith("s")
      ? pluralType.slice(0, -1)
      : pluralType;
    const resourceId = parts.slice(4).join("/");
    if (service === "" || accountId === "" || resourceType === "" || resourceId === "") {
      throw new InvalidParameterError(
        `Invalid GCP resource name: empty component in '${providerArn}'`,
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
    if (providerService === IAM_HOST) {
      return Services.iam;
    }
    if (providerService === CLOUD_IDENTITY_HOST) {
      return Services.ssoAdmin;
    }
    return Services.custom(
      providerService.endsWith(GCP_DOMAIN)
        ? providerService.slice(0, -GCP_DOMAIN.length)
        : providerService,
    );
  }

  private serviceHost(service: Service): string {
    switch (service.kind) {
      case "sso-admin":
        return CLOUD_IDENTITY_HOST;
      case "custom":
        // Bare names get the googleapis domain; full hosts pass through
        return service.name.includes(".")
          ? service.name
          : `${service.name}${GCP_DOMAIN}`;
      default:
        return IAM_HOST;
    }
  }
}
