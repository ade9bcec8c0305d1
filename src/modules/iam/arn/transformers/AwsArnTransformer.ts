/**
 * AWS ARN transformer
 *
 *   arn:aws:<service>:<region or empty>:<account>:<type>/<id>
 */

import { InvalidParameterError } from "../../errors/IamError";
import { Service, Services } from "../types";
import { WamiArn } from "../WamiArn";
import { BaseArnTransformer, ProviderArnInfo } from "./ArnTransformer";

const AWS_SERVICE_NAMES: Record<Exclude<Service["kind"], "custom">, string> = {
  iam: "iam",
  sts: "sts",
  "sso-admin": "sso",
};

export class AwsArnTransformer extends BaseArnTransformer {
  readonly provider = "aws";

  toProviderArn(arn: WamiArn): string {
    const mapping = this.requireMapping(arn);
    const service =
      arn.service.kind === "custom"
        ? arn.service.name
        : AWS_SERVICE_NAMES[arn.service.kind];

    return [
      "arn",
      "aws",
      service,
      mapping.region ?? "",
      mapping.accountId,
      `${arn.resourceType()}/${arn.resourceId()}`,
    ].join(":");
  }

  fromProviderArn(providerArn: string): ProviderArnInfo {
    const parts = providerArn.split(":");

    if (parts.length < 6) {
      throw new InvalidParameterError(
        `Invalid AWS ARN format: expected at least 6 parts, got ${parts.length}`,
      );
    }
    if (parts[0] !== "arn" || parts[1] !== "aws") {
      throw new InvalidParameterError(
        `Invalid AWS ARN prefix: expected 'arn:aws', got '${parts[0]}:${parts[1]}'`,
      );
    }

    const [, , service, region, accountId] = parts;
    const { resourceType, resourceId } = this.parseResourceTail(
      parts.slice(5).join(":"),
      "AWS ARN",
    );

    return {
      provider: this.provider,
      accountId,
      service,
      resourceType,
      resourceId,
      ...(region === "" ? {} : { region }),
    };
  }

  toWamiService(providerService: string): Service {
    switch (providerService) {
      case "iam":
        return Services.iam;
      case "sts":
        return Services.sts;
      case "sso":
        return Services.ssoAdmin;
      default:
        return Services.custom(providerService);
    }
  }
}
