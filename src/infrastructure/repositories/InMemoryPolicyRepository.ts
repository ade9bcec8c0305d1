import {
  ResourceAlreadyExistsError,
  ResourceNotFoundError,
} from "../../modules/iam/errors/IamError";
import { IPolicyRepository, PolicyRecord } from "./IPolicyRepository";

/**
 * Map-backed policy store for tests and embedding
 */
export class InMemoryPolicyRepository implements IPolicyRepository {
  private readonly policies = new Map<string, PolicyRecord>();
  private readonly attachments = new Map<string, string[]>();
  private readonly inlinePolicies = new Map<string, Map<string, string>>();

  async createPolicy(record: PolicyRecord): Promise<PolicyRecord> {
    if (this.policies.has(record.policyArn)) {
      throw new ResourceAlreadyExistsError(`Policy: ${record.policyArn}`);
    }
    const stored = { ...record };
    this.policies.set(record.policyArn, stored);
    return { ...stored };
  }

  async deletePolicy(policyArn: string): Promise<void> {
    if (!this.policies.delete(policyArn)) {
      throw new ResourceNotFoundError(`Policy: ${policyArn}`);
    }
  }

  async getPolicy(policyArn: string): Promise<PolicyRecord | null> {
    const record = this.policies.get(policyArn);
    return record ? { ...record } : null;
  }

  /**
   * Attach a managed policy; attaching twice is a no-op
   */
  async attachUserPolicy(principal: string, policyArn: string): Promise<void> {
    const attached = this.attachments.get(principal) ?? [];
    if (!attached.includes(policyArn)) {
      this.attachments.set(principal, [...attached, policyArn]);
    }
  }

  async detachUserPolicy(principal: string, policyArn: string): Promise<void> {
    const attached = this.attachments.get(principal) ?? [];
    if (!attached.includes(policyArn)) {
      throw new ResourceNotFoundError(
        `Policy attachment: ${policyArn} on ${principal}`,
      );
    }
    this.attachments.set(
      principal,
      attached.filter((arn) => arn !== policyArn),
    );
  }

  async listAttachedUserPolicies(principal: string): Promise<string[]> {
    return [...(this.attachments.get(principal) ?? [])];
  }

  async putUserPolicy(
    principal: string,
    policyName: string,
    policyDocument: string,
  ): Promise<void> {
    const inline = this.inlinePolicies.get(principal) ?? new Map<string, string>();
    inline.set(policyName, policyDocument);
    this.inlinePolicies.set(principal, inline);
  }

  async deleteUserPolicy(principal: string, policyName: string): Promise<void> {
    if (!this.inlinePolicies.get(principal)?.delete(policyName)) {
      throw new ResourceNotFoundError(
        `Inline policy: ${policyName} on ${principal}`,
      );
    }
  }

  async listUserPolicies(principal: string): Promise<string[]> {
    return [...(this.inlinePolicies.get(principal)?.keys() ?? [])];
  }

  async getUserPolicy(
    principal: string,
    policyName: string,
  ): Promise<string | null> {
    return this.inlinePolicies.get(principal)?.get(policyName) ?? null;
  }
}
