/**
 * Policies resource client.
 */

import type { HTTPTransport } from '../transport.js';
import { compactBody, deleteResponseSchema, policyRuleSchema, policySchema } from '../types/index.js';
import type {
  AuthorizationOptions,
  DeleteResponse,
  Policy,
  PolicyRule,
  PolicyRuleInput,
  PolicyUpdateParams,
} from '../types/index.js';
import { authorizationRequestOptions, parseResponse, pathId } from './shared.js';

/**
 * Client for policy operations.
 */
export class PoliciesClient {
  private transport: HTTPTransport;

  constructor(transport: HTTPTransport) {
    this.transport = transport;
  }

  /**
   * Add a rule to a policy.
   *
   * @example
   * ```typescript
   * await client.policies.addRule(
   *   'policy_id',
   *   {
   *     name: 'Allow transfers to treasury',
   *     method: 'eth_sendTransaction',
   *     conditions: [{ field_source: 'ethereum_transaction', field: 'to', operator: 'eq', value: treasury }],
   *     action: 'ALLOW',
   *   },
   *   { authorizationContext: context }
   * );
   * ```
   */
  async addRule(
    policyId: string,
    rule: PolicyRuleInput,
    options: AuthorizationOptions = {}
  ): Promise<PolicyRule> {
    const response = await this.transport.request(
      'POST',
      `/v1/policies/${pathId('policyId', policyId)}/rules`,
      { ...authorizationRequestOptions(options), body: ruleBody(rule) }
    );

    return parseResponse(policyRuleSchema, response, 'policy rule');
  }

  /**
   * Update a policy's name, rules or owner. Rules given here replace the
   * existing ones.
   */
  async update(
    policyId: string,
    params: PolicyUpdateParams,
    options: AuthorizationOptions = {}
  ): Promise<Policy> {
    const body = compactBody({
      name: params.name,
      rules: params.rules?.map(ruleBody),
      owner_id: params.ownerId,
    });

    const response = await this.transport.request(
      'PATCH',
      `/v1/policies/${pathId('policyId', policyId)}`,
      { ...authorizationRequestOptions(options), body }
    );

    return parseResponse(policySchema, response, 'policy');
  }

  /**
   * Delete a policy.
   */
  async delete(policyId: string, options: AuthorizationOptions = {}): Promise<DeleteResponse> {
    const response = await this.transport.request(
      'DELETE',
      `/v1/policies/${pathId('policyId', policyId)}`,
      authorizationRequestOptions(options)
    );

    return parseResponse(deleteResponseSchema, response, 'policy delete');
  }
}

function ruleBody(rule: PolicyRuleInput) {
  return {
    name: rule.name,
    method: rule.method,
    conditions: rule.conditions,
    action: rule.action,
  };
}
