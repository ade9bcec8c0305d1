/**
 * Policy Simulation Service
 *
 * Simulates requests against the policies stored for a principal.
 */

import { IPolicyRepository } from "../../../infrastructure/repositories/IPolicyRepository";
import { structuredLogger } from "../../../core/logger/structuredLogger";
import { WamiArn } from "../arn/WamiArn";
import {
  PolicyEvaluationEngine,
  policyEvaluationEngine,
} from "../engine/PolicyEngine";
import { InvalidParameterError } from "../errors/IamError";
import {
  PolicyDocument,
  SimulatePolicyResponse,
  SimulatePrincipalPolicyRequest,
} from "../policy/models/types";
import { PolicyParser } from "../policy/parser/PolicyParser";

const logger = structuredLogger.child({ module: "policy-simulation" });

export class PolicySimulationService {
  constructor(
    private readonly policyRepository: IPolicyRepository,
    private readonly engine: PolicyEvaluationEngine = policyEvaluationEngine,
    private readonly parser: PolicyParser = new PolicyParser(),
  ) {}

  /**
   * Managed and inline policies of the source user, plus any extra
   * `policyInputList` documents, evaluated for every action and resource.
   * A malformed policy from either source fails the simulation.
   */
  async simulatePrincipalPolicy(
    request: SimulatePrincipalPolicyRequest,
  ): Promise<SimulatePolicyResponse> {
    const source = WamiArn.parse(request.policySourceArn);
    if (source.resourceType() !== "user") {
      throw new InvalidParameterError(
        `Policy source must be a user, got resource type '${source.resourceType()}'`,
        { policySourceArn: request.policySourceArn },
      );
    }

    const documents = await this.loadPrincipalPolicies(source.resourceId());
    for (const policyJson of request.policyInputList ?? []) {
      documents.push(this.parser.parseOrThrow(policyJson));
    }

    logger.debug("Simulating principal policy", {
      action: "simulatePrincipalPolicy",
      metadata: {
        policySourceArn: request.policySourceArn,
        policyCount: documents.length,
      },
    });

    return this.engine.simulate(
      documents,
      request.actionNames,
      request.resourceArns,
    );
  }

  private async loadPrincipalPolicies(
    principal: string,
  ): Promise<PolicyDocument[]> {
    const documents: PolicyDocument[] = [];

    for (const policyArn of await this.policyRepository.listAttachedUserPolicies(
      principal,
    )) {
      const record = await this.policyRepository.getPolicy(policyArn);
      if (record) {
        documents.push(this.parser.parseOrThrow(record.policyDocument));
      }
    }

    for (const name of await this.policyRepository.listUserPolicies(principal)) {
      const policyJson = await this.policyRepository.getUserPolicy(
        principal,
        name,
      );
      if (policyJson !== null) {
        documents.push(this.parser.parseOrThrow(policyJson));
      }
    }

    return documents;
  }
}
