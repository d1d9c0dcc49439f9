/**
 * Wallets resource client.
 */

import { v4 as uuidv4 } from 'uuid';
import type { HTTPTransport } from '../transport.js';
import { compactBody, walletRpcResponseSchema, walletSchema } from '../types/index.js';
import type {
  AuthorizationOptions,
  Wallet,
  WalletRpcParams,
  WalletRpcResponse,
  WalletUpdateParams,
} from '../types/index.js';
import { authorizationRequestOptions, parseResponse, pathId } from './shared.js';

/**
 * Client for wallet operations that require authorization signatures.
 */
export class WalletsClient {
  private transport: HTTPTransport;

  constructor(transport: HTTPTransport) {
    this.transport = transport;
  }

  /**
   * Update a wallet's policies, owner or additional signers.
   *
   * @param walletId - The wallet identifier
   * @returns The updated wallet
   * @throws SigningError if a signing strategy fails
   * @throws AuthenticationError if the signatures are rejected
   * @throws NotFoundError if the wallet does not exist
   *
   * @example
   * ```typescript
   * const wallet = await client.wallets.update(
   *   'wallet_id',
   *   { policyIds: ['policy_id'] },
   *   { authorizationContext: context }
   * );
   * ```
   */
  async update(
    walletId: string,
    params: WalletUpdateParams,
    options: AuthorizationOptions = {}
  ): Promise<Wallet> {
    const body = compactBody({
      policy_ids: params.policyIds,
      owner_id: params.ownerId,
      additional_signers: params.additionalSigners?.map((signer) =>
        compactBody({ signer_id: signer.signerId, override_policy_ids: signer.overridePolicyIds })
      ),
    });

    const response = await this.transport.request('PATCH', `/v1/wallets/${pathId('walletId', walletId)}`, {
      ...authorizationRequestOptions(options),
      body,
    });

    return parseResponse(walletSchema, response, 'wallet');
  }

  /**
   * Sign or send with a wallet through its RPC endpoint.
   *
   * An idempotency key is generated when none is given, so every RPC call
   * carries one and it is covered by the signatures.
   *
   * @param walletId - The wallet identifier
   * @returns The RPC method and its result data
   */
  async rpc(
    walletId: string,
    params: WalletRpcParams,
    options: AuthorizationOptions = {}
  ): Promise<WalletRpcResponse> {
    const body = compactBody({
      method: params.method,
      params: params.params,
      caip2: params.caip2,
      chain_type: params.chainType,
    });

    const response = await this.transport.request('POST', `/v1/wallets/${pathId('walletId', walletId)}/rpc`, {
      ...authorizationRequestOptions(options),
      idempotencyKey: options.idempotencyKey ?? uuidv4(),
      body,
    });

    return parseResponse(walletRpcResponseSchema, response, 'wallet rpc');
  }
}
