/**
 * In-memory repository tests
 */

import { InMemoryPolicyRepository } from "../src/infrastructure/repositories/InMemoryPolicyRepository";
import { InMemoryTenantRepository } from "../src/infrastructure/repositories/InMemoryTenantRepository";
import { buildTenant } from "../src/modules/iam/tenancy/Tenant";
import { TenantId } from "../src/modules/iam/tenancy/TenantId";
import {
  ResourceAlreadyExistsError,
  ResourceNotFoundError,
} from "../src/modules/iam/errors/IamError";

const POLICY_ARN = "arn:wami:iam:12345678:wami:999888777:policy/readers";

describe("InMemoryPolicyRepository", () => {
  let repository: InMemoryPolicyRepository;

  beforeEach(async () => {
    repository = new InMemoryPolicyRepository();
    await repository.createPolicy({
      policyArn: POLICY_ARN,
      policyName: "readers",
      policyDocument: "{}",
    });
  });

  it("should store and return managed policies", async () => {
    expect(await repository.getPolicy(POLICY_ARN)).toEqual({
      policyArn: POLICY_ARN,
      policyName: "readers",
      policyDocument: "{}",
    });
    expect(await repository.getPolicy("arn:wami:iam:1:wami:9:policy/none")).toBeNull();
    await expect(
      repository.createPolicy({ policyArn: POLICY_ARN, policyName: "x", policyDocument: "{}" }),
    ).rejects.toThrow(ResourceAlreadyExistsError);
  });

  it("should attach idempotently in order", async () => {
    await repository.attachUserPolicy("u1", POLICY_ARN);
    await repository.attachUserPolicy("u1", "arn:wami:iam:1:wami:9:policy/b");
    await repository.attachUserPolicy("u1", POLICY_ARN);

    expect(await repository.listAttachedUserPolicies("u1")).toEqual([
      POLICY_ARN,
      "arn:wami:iam:1:wami:9:policy/b",
    ]);
    expect(await repository.listAttachedUserPolicies("u2")).toEqual([]);
  });

  it("should detach only existing attachments", async () => {
    await repository.attachUserPolicy("u1", POLICY_ARN);
    await repository.detachUserPolicy("u1", POLICY_ARN);

    expect(await repository.listAttachedUserPolicies("u1")).toEqual([]);
    await expect(repository.detachUserPolicy("u1", POLICY_ARN)).rejects.toThrow(
      ResourceNotFoundError,
    );
  });

  it("should manage inline policies per principal", async () => {
    await repository.putUserPolicy("u1", "a", "{\"a\":1}");
    await repository.putUserPolicy("u1", "b", "{}");
    await repository.putUserPolicy("u1", "a", "{\"a\":2}");

    expect(await repository.listUserPolicies("u1")).toEqual(["a", "b"]);
    expect(await repository.getUserPolicy("u1", "a")).toBe("{\"a\":2}");
    expect(await repository.getUserPolicy("u2", "a")).toBeNull();

    await repository.deleteUserPolicy("u1", "a");
    expect(await repository.listUserPolicies("u1")).toEqual(["b"]);
    await expect(repository.deleteUserPolicy("u1", "a")).rejects.toThrow(
      "Resource not found: Inline policy: a on u1",
    );
  });
});

describe("InMemoryTenantRepository", () => {
  const root = buildTenant(TenantId.root("acme"), "acme");
  const child = buildTenant(TenantId.of("acme/eng"), "eng", {
    parentId: TenantId.root("acme"),
  });
  const grandchild = buildTenant(TenantId.of("acme/eng/platform"), "platform", {
    parentId: TenantId.of("acme/eng"),
  });

  it("should list direct children only", async () => {
    const repository = new InMemoryTenantRepository([root, child, grandchild]);
    const children = await repository.listChildTenants(TenantId.root("acme"));
    expect(children.map((tenant) => tenant.id.toString())).toEqual(["acme/eng"]);
    expect(await repository.listTenants()).toHaveLength(3);
  });

  it("should not let callers mutate stored tenants", async () => {
    const original = buildTenant(TenantId.root("acme"), "acme");
    const repository = new InMemoryTenantRepository([original]);

    const fetched = await repository.getTenant(original.id);
    fetched?.adminPrincipals.push("user:intruder");
    if (fetched) {
      fetched.quotas.maxUsers = 1;
    }
    original.metadata.region = "changed-after-insert";

    const stored = await repository.getTenant(original.id);
    expect(stored?.quotas.maxUsers).toBe(1000);
    expect(stored?.adminPrincipals).toEqual([]);
    expect(stored?.metadata).toEqual({});
    const [listed] = await repository.listTenants();
    expect(listed).not.toBe(stored);
  });

  it("should enforce existence on create, update and delete", async () => {
    const repository = new InMemoryTenantRepository([root]);

    await expect(repository.createTenant(root)).rejects.toThrow(ResourceAlreadyExistsError);
    await expect(repository.updateTenant(child)).rejects.toThrow(ResourceNotFoundError);

    await repository.createTenant(child);
    await repository.deleteTenant(child.id);
    expect(await repository.getTenant(child.id)).toBeNull();
    await expect(repository.deleteTenant(child.id)).rejects.toThrow(
      "Resource not found: Tenant: acme/eng",
    );
  });
});
