/**
 * Opaque tenant-hash ARN Tests
 */

import {
  OpaqueArnBuilder,
  ParsedOpaqueArn,
  arnPatternMatch,
} from "../src/modules/iam/arn/OpaqueArnBuilder";
import { InvalidParameterError } from "../src/modules/iam/errors/IamError";

describe("OpaqueArnBuilder", () => {
  it("should hash the account with the salt", () => {
    const builder = new OpaqueArnBuilder("test-secret");
    expect(builder.hashAccount("123456789012")).toBe("tenant-9bcb15d5");
    expect(builder.getSalt()).toBe("test-secret");
  });

  it("should hash the bare account without a salt", () => {
    expect(new OpaqueArnBuilder().hashAccount("123456789012")).toBe(
      "tenant-2a33349e",
    );
  });

  it("should build ARNs with and without a path", () => {
    const builder = new OpaqueArnBuilder("test-secret");
    expect(
      builder.buildArn("iam", "123456789012", "user", "/tenants/acme/", "alice"),
    ).toBe("arn:wami:iam:tenant-9bcb15d5:user/tenants/acme/alice");
    expect(builder.buildArn("iam", "123456789012", "user", "", "alice")).toBe(
      "arn:wami:iam:tenant-9bcb15d5:user/alice",
    );
  });
});

describe("ParsedOpaqueArn", () => {
  it("should split a nested resource path", () => {
    const parsed = ParsedOpaqueArn.fromArn(
      "arn:wami:iam:tenant-9bcb15d5:user/tenants/acme/alice",
    );
    expect(parsed.provider).toBe("wami");
    expect(parsed.service).toBe("iam");
    expect(parsed.tenantHash).toBe("tenant-9bcb15d5");
    expect(parsed.resourceType).toBe("user");
    expect(parsed.path).toBe("/tenants/acme/");
    expect(parsed.name).toBe("alice");
    expect(parsed.toArn()).toBe(
      "arn:wami:iam:tenant-9bcb15d5:user/tenants/acme/alice",
    );
  });

  it("should parse a flat resource path", () => {
    const parsed = ParsedOpaqueArn.fromArn("arn:wami:iam:tenant-1:role/admin");
    expect(parsed.path).toBe("");
    expect(parsed.toString()).toBe("arn:wami:iam:tenant-1:role/admin");
  });

  it("should reject malformed ARNs", () => {
    expect(() => ParsedOpaqueArn.fromArn("arn:wami:iam")).toThrow(
      "Invalid ARN format: arn:wami:iam",
    );
    expect(() => ParsedOpaqueArn.fromArn("urn:wami:iam:t:user/a")).toThrow(
      "ARN must start with 'arn:'",
    );
    expect(() => ParsedOpaqueArn.fromArn("arn:aws:iam:t:user/a")).toThrow(
      "Expected 'wami' provider, got: aws",
    );
    expect(() => ParsedOpaqueArn.fromArn("arn:wami:iam:t:user")).toThrow(
      InvalidParameterError,
    );
  });

  it("should match glob patterns", () => {
    const parsed = ParsedOpaqueArn.fromArn(
      "arn:wami:iam:tenant-9bcb15d5:user/tenants/acme/alice",
    );
    expect(parsed.matchesPattern("arn:wami:iam:tenant-*:user/*")).toBe(true);
    expect(
      parsed.matchesPattern("arn:wami:iam:tenant-????????:user/tenants/acme/alice"),
    ).toBe(true);
    expect(parsed.matchesPattern("arn:wami:sts:*")).toBe(false);
    expect(arnPatternMatch("arn:wami:iam:t:role/a.b", "arn:wami:iam:t:role/a.b")).toBe(true);
    expect(arnPatternMatch("arn:wami:iam:t:role/axb", "arn:wami:iam:t:role/a.b")).toBe(false);
  });
});
