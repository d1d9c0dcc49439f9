/**
 * Key quorums resource client.
 */

import type { HTTPTransport } from '../transport.js';
import { compactBody, deleteResponseSchema, keyQuorumSchema } from '../types/index.js';
import type {
  AuthorizationOptions,
  DeleteResponse,
  KeyQuorum,
  KeyQuorumUpdateParams,
} from '../types/index.js';
import { authorizationRequestOptions, parseResponse, pathId } from './shared.js';

/**
 * Client for key quorum operations.
 *
 * Changing a quorum needs signatures from its current members, so these
 * calls usually take a context holding several authorization keys.
 */
export class KeyQuorumsClient {
  private transport: HTTPTransport;

  constructor(transport: HTTPTransport) {
    this.transport = transport;
  }

  /**
   * Update a key quorum's members, threshold or display name.
   *
   * @example
   * ```typescript
   * const context = AuthorizationContext.builder()
   *   .addAuthorizationPrivateKey(key1)
   *   .addAuthorizationPrivateKey(key2)
   *   .build();
   *
   * await client.keyQuorums.update(
   *   'quorum_id',
   *   { publicKeys: [pub1, pub2, pub3], authorizationThreshold: 2 },
   *   { authorizationContext: context }
   * );
   * ```
   */
  async update(
    keyQuorumId: string,
    params: KeyQuorumUpdateParams,
    options: AuthorizationOptions = {}
  ): Promise<KeyQuorum> {
    const body = compactBody({
      public_keys: params.publicKeys,
      authorization_threshold: params.authorizationThreshold,
      display_name: params.displayName,
    });

    const response = await this.transport.request(
      'PATCH',
      `/v1/key_quorums/${pathId('keyQuorumId', keyQuorumId)}`,
      { ...authorizationRequestOptions(options), body }
    );

    return parseResponse(keyQuorumSchema, response, 'key quorum');
  }

  /**
   * Delete a key quorum.
   */
  async delete(keyQuorumId: string, options: AuthorizationOptions = {}): Promise<DeleteResponse> {
    const response = await this.transport.request(
      'DELETE',
      `/v1/key_quorums/${pathId('keyQuorumId', keyQuorumId)}`,
      authorizationRequestOptions(options)
    );

    return parseResponse(deleteResponseSchema, response, 'key quorum delete');
  }
}
