/**
 * Provider ARN Transformer Tests
 */

import {
  AwsArnTransformer,
  AzureArnTransformer,
  GcpArnTransformer,
  ScalewayArnTransformer,
  getTransformer,
  providerInfoToWamiArn,
  supportedProviders,
  toProviderArn,
} from "../src/modules/iam/arn/transformers";
import { WamiArn } from "../src/modules/iam/arn/WamiArn";
import { Service, Services, TenantPath } from "../src/modules/iam/arn/types";
import { InvalidParameterError } from "../src/modules/iam/errors/IamError";

const TENANT_PATH = "12345678/87654321/99999999";
const INSTANCE_ID = "999888777";

function cloudArn(
  provider: string,
  accountId: string,
  options: {
    service?: Service;
    region?: string;
    resourceType?: string;
    resourceId?: string;
  } = {},
): WamiArn {
  const builder = WamiArn.builder()
    .service(options.service ?? Services.iam)
    .tenantPath(TenantPath.parse(TENANT_PATH))
    .wamiInstance(INSTANCE_ID)
    .resource(options.resourceType ?? "user", options.resourceId ?? "alice");
  return options.region === undefined
    ? builder.cloudProvider(provider, accountId).build()
    : builder.cloudProviderWithRegion(provider, accountId, options.region).build();
}

const scope = {
  tenantPath: TenantPath.parse(TENANT_PATH),
  wamiInstanceId: INSTANCE_ID,
};

describe("AwsArnTransformer", () => {
  const transformer = new AwsArnTransformer();

  it("should render a regional ARN", () => {
    const arn = cloudArn("aws", "223344556677", {
      region: "us-east-1",
      resourceId: "77557755",
    });
    expect(transformer.toProviderArn(arn)).toBe(
      "arn:aws:iam:us-east-1:223344556677:user/77557755",
    );
  });

  it("should leave the region empty for global mappings", () => {
    expect(transformer.toProviderArn(cloudArn("aws", "123456789012"))).toBe(
      "arn:aws:iam::123456789012:user/alice",
    );
  });

  it("should map service names", () => {
    expect(
      transformer.toProviderArn(
        cloudArn("aws", "1", { service: Services.ssoAdmin, resourceType: "permission-set" }),
      ),
    ).toBe("arn:aws:sso::1:permission-set/alice");
    expect(
      transformer.toProviderArn(cloudArn("aws", "1", { service: Services.custom("s3") })),
    ).toBe("arn:aws:s3::1:user/alice");
  });

  it("should parse a provider ARN", () => {
    expect(
      transformer.fromProviderArn("arn:aws:iam:us-east-1:223344556677:role/ops/admin"),
    ).toEqual({
      provider: "aws",
      accountId: "223344556677",
      service: "iam",
      resourceType: "role",
      resourceId: "ops/admin",
      region: "us-east-1",
    });
  });

  it("should omit the region when the provider ARN has none", () => {
    const info = transformer.fromProviderArn("arn:aws:iam::123456789012:user/alice");
    expect(info).toEqual({
      provider: "aws",
      accountId: "123456789012",
      service: "iam",
      resourceType: "user",
      resourceId: "alice",
    });
    expect("region" in info).toBe(false);
  });

  it("should reject a WAMI ARN", () => {
    expect(() =>
      transformer.fromProviderArn(
        "arn:wami:iam:12345678:wami:999888777:aws:223344556677:us-east-1:user/77557755",
      ),
    ).toThrow(InvalidParameterError);
  });

  it("should reject short or resource-less ARNs", () => {
    expect(() => transformer.fromProviderArn("arn:aws:iam::123")).toThrow(
      "expected at least 6 parts, got 5",
    );
    expect(() => transformer.fromProviderArn("arn:aws:iam::123:user")).toThrow(
      InvalidParameterError,
    );
  });

  it("should refuse native ARNs and other providers", () => {
    const native = WamiArn.builder()
      .service(Services.iam)
      .tenant(1)
      .wamiInstance("9")
      .resource("user", "1")
      .build();
    expect(() => transformer.toProviderArn(native)).toThrow(
      "ARN is not cloud-synced",
    );
    expect(() => transformer.toProviderArn(cloudArn("gcp", "p"))).toThrow(
      "ARN provider is 'gcp', expected 'aws'",
    );
  });

  it("should map provider services back", () => {
    expect(transformer.toWamiService("sso")).toEqual({ kind: "sso-admin" });
    expect(transformer.toWamiService("s3")).toEqual({ kind: "custom", name: "s3" });
  });
});

describe("GcpArnTransformer", () => {
  const transformer = new GcpArnTransformer();

  it("should render IAM resource names", () => {
    expect(transformer.toProviderArn(cloudArn("gcp", "my-project"))).toBe(
      "//iam.googleapis.com/projects/my-project/users/alice",
    );
  });

  it("should use Cloud Identity for SSO", () => {
    expect(
      transformer.toProviderArn(
        cloudArn("gcp", "my-project", { service: Services.ssoAdmin, resourceType: "group" }),
      ),
    ).toBe("//cloudidentity.googleapis.com/projects/my-project/groups/alice");
  });

  it("should qualify bare custom services and pass full hosts through", () => {
    expect(
      transformer.toProviderArn(
        cloudArn("gcp", "p", { service: Services.custom("storage"), resourceType: "bucket" }),
      ),
    ).toBe("//storage.googleapis.com/projects/p/buckets/alice");
    expect(
      transformer.toProviderArn(
        cloudArn("gcp", "p", { service: Services.custom("compute.googleapis.com") }),
      ),
    ).toBe("//compute.googleapis.com/projects/p/users/alice");
  });

  it("should parse a resource name and singularise the type", () => {
    expect(
      transformer.fromProviderArn(
        "//iam.googleapis.com/projects/my-project/serviceAccounts/sa-1",
      ),
    ).toEqual({
      provider: "gcp",
      accountId: "my-project",
      service: "iam.googleapis.com",
      resourceType: "serviceAccount",
      resourceId: "sa-1",
    });
  });

  it("should reject malformed resource names", () => {
    expect(() => transformer.fromProviderArn("iam.googleapis.com/projects/p/users/a")).toThrow(
      "expected '//' prefix",
    );
    expect(() => transformer.fromProviderArn("//iam.googleapis.com/projects/p/users")).toThrow(
      "expected at least 5 parts, got 4",
    );
    expect(() => transformer.fromProviderArn("//iam.googleapis.com/folders/p/users/a")).toThrow(
      "expected 'projects', got 'folders'",
    );
  });

  it("should map hosts back to services", () => {
    expect(transformer.toWamiService("iam.googleapis.com")).toEqual({ kind: "iam" });
    expect(transformer.toWamiService("cloudidentity.googleapis.com")).toEqual({
      kind: "sso-admin",
    });
    expect(transformer.toWamiService("storage.googleapis.com")).toEqual({
      kind: "custom",
      name: "storage",
    });
  });
});

describe("AzureArnTransformer", () => {
  const transformer = new AzureArnTransformer();
  const resourceId =
    "/subscriptions/sub-1/resourceGroups/wami-resources/providers/Microsoft.Authorization/user/alice";

  it("should render a resource id under the WAMI resource group", () => {
    expect(transformer.toProviderArn(cloudArn("azure", "sub-1"))).toBe(resourceId);
  });

  it("should use the directory namespace for SSO", () => {
    expect(
      transformer.toProviderArn(cloudArn("azure", "sub-1", { service: Services.ssoAdmin })),
    ).toBe(
      "/subscriptions/sub-1/resourceGroups/wami-resources/providers/Microsoft.AzureActiveDirectory/user/alice",
    );
  });

  it("should parse the namespace, type and id", () => {
    expect(transformer.fromProviderArn(resourceId)).toEqual({
      provider: "azure",
      accountId: "sub-1",
      service: "Microsoft.Authorization",
      resourceType: "user",
      resourceId: "alice",
    });
  });

  it("should reject truncated resource ids", () => {
    expect(() =>
      transformer.fromProviderArn("/subscriptions/sub-1/resourceGroups/rg"),
    ).toThrow("Invalid Azure resource ID format");
    expect(() =>
      transformer.fromProviderArn(
        "/subscriptions/sub-1/groups/rg/providers/Microsoft.Authorization/user/alice",
      ),
    ).toThrow(InvalidParameterError);
  });
});

describe("ScalewayArnTransformer", () => {
  const transformer = new ScalewayArnTransformer();

  it("should render identifiers", () => {
    expect(transformer.toProviderArn(cloudArn("scaleway", "org-1"))).toBe(
      "scw:org-1:iam:user/alice",
    );
    expect(
      transformer.toProviderArn(cloudArn("scaleway", "org-1", { service: Services.sts })),
    ).toBe("scw:org-1:iam:user/alice");
    expect(
      transformer.toProviderArn(cloudArn("scaleway", "org-1", { service: Services.ssoAdmin })),
    ).toBe("scw:org-1:sso:user/alice");
  });

  it("should parse identifiers", () => {
    expect(transformer.fromProviderArn("scw:org-1:iam:application/app-1")).toEqual({
      provider: "scaleway",
      accountId: "org-1",
      service: "iam",
      resourceType: "application",
      resourceId: "app-1",
    });
  });

  it("should reject other prefixes", () => {
    expect(() => transformer.fromProviderArn("aws:org-1:iam:user/a")).toThrow(
      "expected 'scw', got 'aws'",
    );
  });
});

describe("transformer registry", () => {
  it("should look transformers up by provider", () => {
    expect(getTransformer("aws")).toBeInstanceOf(AwsArnTransformer);
    expect(getTransformer("scaleway")?.provider).toBe("scaleway");
    expect(getTransformer("oracle")).toBeUndefined();
    expect(supportedProviders()).toEqual(["aws", "gcp", "azure", "scaleway"]);
  });

  it("should dispatch on the ARN's own provider", () => {
    expect(toProviderArn(cloudArn("scaleway", "org-1"))).toBe(
      "scw:org-1:iam:user/alice",
    );
    expect(() => toProviderArn(cloudArn("oracle", "t-1"))).toThrow(
      "No ARN transformer available for provider 'oracle'",
    );
  });

  it("should rebuild a WAMI ARN only with a caller-supplied scope", () => {
    const original = cloudArn("aws", "223344556677", { region: "us-east-1" });
    const info = new AwsArnTransformer().fromProviderArn(toProviderArn(original));
    const rebuilt = providerInfoToWamiArn(info, scope);
    expect(rebuilt.equals(original)).toBe(true);
  });

  it("should lose the region through GCP", () => {
    const original = cloudArn("gcp", "my-project", { region: "europe-west1" });
    const info = new GcpArnTransformer().fromProviderArn(toProviderArn(original));
    const rebuilt = providerInfoToWamiArn(info, scope);
    expect(rebuilt.region()).toBeUndefined();
    expect(rebuilt.equals(original.withCloudMapping({ provider: "gcp", accountId: "my-project" }))).toBe(true);
  });

  it("should let the scope override the service", () => {
    const info = new AzureArnTransformer().fromProviderArn(
      "/subscriptions/s/resourceGroups/wami-resources/providers/Contoso.Billing/invoice/7",
    );
    expect(providerInfoToWamiArn(info, scope).service).toEqual({
      kind: "custom",
      name: "Contoso.Billing",
    });
    expect(
      providerInfoToWamiArn(info, { ...scope, service: Services.iam }).service,
    ).toEqual({ kind: "iam" });
  });
});
