/**
 * ARN Builder Unit Tests
 */

import { WamiArn } from "../src/modules/iam/arn/WamiArn";
import { Services, TenantPath } from "../src/modules/iam/arn/types";
import { InvalidParameterError } from "../src/modules/iam/errors/IamError";

function baseBuilder() {
  return WamiArn.builder()
    .service(Services.iam)
    .tenantHierarchy(["12345678", "87654321", "99999999"])
    .wamiInstance("999888777")
    .resource("user", "77557755");
}

describe("ArnBuilder", () => {
  describe("build - valid ARNs", () => {
    it("should build a native ARN", () => {
      const arn = baseBuilder().build();
      expect(arn.toString()).toBe(
        "arn:wami:iam:12345678/87654321/99999999:wami:999888777:user/77557755",
      );
      expect(arn.isCloudSynced()).toBe(false);
      expect(arn.provider()).toBeUndefined();
    });

    it("should build a regional cloud ARN", () => {
      const arn = baseBuilder()
        .cloudProviderWithRegion("aws", "223344556677", "us-east-1")
        .build();
      expect(arn.toString()).toBe(
        "arn:wami:iam:12345678/87654321/99999999:wami:999888777:aws:223344556677:us-east-1:user/77557755",
      );
      expect(arn.provider()).toBe("aws");
      expect(arn.region()).toBe("us-east-1");
    });

    it("should write global for a mapping without a region", () => {
      const arn = baseBuilder().cloudProvider("gcp", "my-project").build();
      expect(arn.toString()).toBe(
        "arn:wami:iam:12345678/87654321/99999999:wami:999888777:gcp:my-project:global:user/77557755",
      );
      expect(arn.region()).toBeUndefined();
    });

    it("should clear the mapping with noCloudMapping", () => {
      const arn = baseBuilder()
        .cloudProvider("aws", "1")
        .noCloudMapping()
        .build();
      expect(arn.isCloudSynced()).toBe(false);
    });

    it("should take mapping and resource values", () => {
      const source = baseBuilder().resource("role", "ops").build();
      const arn = WamiArn.builder()
        .service(Services.iam)
        .tenantPath(source.tenantPath)
        .wamiInstance(source.wamiInstanceId)
        .cloudMapping({ provider: "aws", accountId: "223344556677" })
        .region("eu-west-1")
        .resourceObject(source.resource)
        .build();
      expect(arn.toString()).toBe(
        "arn:wami:iam:12345678/87654321/99999999:wami:999888777:aws:223344556677:eu-west-1:role/ops",
      );
    });

    it("should fold a global mapping region and ignore a region without a provider", () => {
      expect(
        baseBuilder()
          .cloudMapping({ provider: "aws", accountId: "1", region: "global" })
          .build()
          .region(),
      ).toBeUndefined();
      expect(baseBuilder().region("us-east-1").build().isCloudSynced()).toBe(false);
    });

    it("should accept a single tenant or a TenantPath", () => {
      expect(baseBuilder().tenant(5).build().fullTenantPath()).toBe("5");
      expect(
        baseBuilder().tenantPath(TenantPath.parse("1/2")).build().fullTenantPath(),
      ).toBe("1/2");
    });

    it("should normalise a custom service named like a known one", () => {
      const arn = baseBuilder().service(Services.custom("iam")).build();
      expect(arn.service).toEqual({ kind: "iam" });
      expect(arn.equals(WamiArn.parse(arn.toString()))).toBe(true);
    });

    it("should parse service names lossily", () => {
      expect(baseBuilder().serviceName("billing").build().service).toEqual({
        kind: "custom",
        name: "billing",
      });
    });

    it("should keep slashes in the resource id", () => {
      const arn = baseBuilder().resource("role", "admins/ops").build();
      expect(arn.resourceType()).toBe("role");
      expect(arn.resourceId()).toBe("admins/ops");
    });

    it("should produce frozen values", () => {
      const arn = baseBuilder().build();
      expect(Object.isFrozen(arn)).toBe(true);
    });
  });

  describe("build - missing fields", () => {
    it("should require a service", () => {
      const builder = WamiArn.builder()
        .tenant(1)
        .wamiInstance("9")
        .resource("user", "1");
      expect(() => builder.build()).toThrow(InvalidParameterError);
      expect(() => builder.build()).toThrow("service is required");
    });

    it("should require a tenant path", () => {
      expect(() =>
        WamiArn.builder()
          .service(Services.iam)
          .wamiInstance("9")
          .resource("user", "1")
          .build(),
      ).toThrow("tenant_path is required");
    });

    it("should require an instance id", () => {
      expect(() =>
        WamiArn.builder()
          .service(Services.iam)
          .tenant(1)
          .resource("user", "1")
          .build(),
      ).toThrow("wami_instance_id is required");
    });

    it("should require a resource", () => {
      expect(() =>
        WamiArn.builder()
          .service(Services.iam)
          .tenant(1)
          .wamiInstance("9")
          .build(),
      ).toThrow("resource is required");
    });
  });

  describe("build - invalid fields", () => {
    it("should reject an empty tenant hierarchy", () => {
      expect(() => baseBuilder().tenantHierarchy([]).build()).toThrow(
        "tenant_path cannot be empty",
      );
    });

    it("should reject non-numeric tenant segments", () => {
      expect(() => baseBuilder().tenantHierarchy(["t1", "t2"]).build()).toThrow(
        "tenant_path is invalid",
      );
    });

    it("should reject an empty instance id", () => {
      expect(() => baseBuilder().wamiInstance("").build()).toThrow(
        "wami_instance_id cannot be empty",
      );
    });

    it("should reject an empty service name", () => {
      expect(() => baseBuilder().serviceName("").build()).toThrow(
        "service cannot be empty",
      );
    });

    it("should reject empty resource parts", () => {
      expect(() => baseBuilder().resource("", "1").build()).toThrow(
        "resource_type cannot be empty",
      );
      expect(() => baseBuilder().resource("user", "").build()).toThrow(
        "resource_id cannot be empty",
      );
    });

    it("should reject separators that would break the canonical form", () => {
      expect(() => baseBuilder().resource("us:er", "1").build()).toThrow(
        "resource_type cannot contain ':'",
      );
      expect(() => baseBuilder().wamiInstance("9:9").build()).toThrow(
        "wami_instance_id cannot contain ':'",
      );
      expect(() =>
        baseBuilder().cloudProviderWithRegion("aws", "1", "us/east").build(),
      ).toThrow("cloud_region cannot contain '/'");
    });

    it("should reject an empty provider or account", () => {
      expect(() => baseBuilder().cloudProvider("", "1").build()).toThrow(
        "cloud_provider cannot be empty",
      );
      expect(() => baseBuilder().cloudProvider("aws", "").build()).toThrow(
        "cloud_account_id cannot be empty",
      );
    });
  });
});
