/**
 * Wallet API client.
 *
 * Provides the primary interface for calling the wallet API with
 * authorization signatures.
 */

import { AuthorizationContext } from './authorization-context.js';
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT, loadConfigFromEnv } from './config.js';
import type { ClientConfigInput, RetryConfig } from './config.js';
import { ConsoleLogger, NoopLogger } from './logging.js';
import type { Logger } from './logging.js';
import { HTTPTransport } from './transport.js';
import type { FetchFunction } from './transport.js';
import { KeyQuorumsClient, PoliciesClient, WalletsClient } from './clients/index.js';

/**
 * Options for WalletApiClient initialization.
 */
export interface WalletApiClientOptions {
  /** App id */
  appId: string;
  /** App secret */
  appSecret: string;
  /** Default context for signing mutating requests */
  authorizationContext?: AuthorizationContext;
  /** Base URL for API requests (default: https://api.privy.io) */
  baseUrl?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Configuration for retry behavior */
  retryConfig?: Partial<RetryConfig>;
  logger?: Logger;
  /** Replaces the global fetch, mainly for tests */
  fetch?: FetchFunction;
}

/**
 * Main client for the wallet API.
 *
 * Aggregates the resource clients over one transport. Mutating calls are
 * signed with the per-call context if one is given, otherwise with the
 * client's default context.
 *
 * @example
 * ```typescript
 * const context = AuthorizationContext.builder()
 *   .addAuthorizationPrivateKey(process.env.AUTHORIZATION_KEY ?? '')
 *   .build();
 *
 * const client = new WalletApiClient({
 *   appId: 'your-app-id',
 *   appSecret: 'your-app-secret',
 *   authorizationContext: context,
 * });
 *
 * await client.wallets.update('wallet_id', { policyIds: ['policy_id'] });
 *
 * // Or create from environment variables
 * const fromEnv = WalletApiClient.fromEnv();
 * ```
 */
export class WalletApiClient {
  readonly appId: string;
  readonly baseUrl: string;
  readonly timeout: number;
  readonly authorizationContext?: AuthorizationContext;

  private _transport: HTTPTransport;

  /** Client for wallet operations */
  readonly wallets: WalletsClient;
  /** Client for key quorum operations */
  readonly keyQuorums: KeyQuorumsClient;
  /** Client for policy operations */
  readonly policies: PoliciesClient;

  constructor(options: WalletApiClientOptions) {
    this.appId = options.appId;
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
    this.authorizationContext = options.authorizationContext;

    this._transport = new HTTPTransport({
      baseUrl: this.baseUrl,
      appId: options.appId,
      appSecret: options.appSecret,
      authorizationContext: options.authorizationContext,
      timeout: this.timeout,
      retryConfig: options.retryConfig,
      logger: options.logger ?? new NoopLogger(),
      fetch: options.fetch,
    });

    this.wallets = new WalletsClient(this._transport);
    this.keyQuorums = new KeyQuorumsClient(this._transport);
    this.policies = new PoliciesClient(this._transport);
  }

  /**
   * Create a client from environment variables.
   *
   * Environment variables:
   * - PRIVY_APP_ID: App id (required)
   * - PRIVY_APP_SECRET: App secret (required)
   * - PRIVY_API_BASE_URL: Base URL for API (optional)
   * - PRIVY_AUTHORIZATION_KEYS: Comma-separated authorization keys for the
   *   default context (optional)
   * - PRIVY_LOG_LEVEL: Enables a ConsoleLogger at that level (optional)
   *
   * @throws ConfigurationError if required environment variables are missing
   * @throws InvalidKeyMaterialError if an authorization key cannot be decoded
   */
  static fromEnv(
    overrides: Partial<ClientConfigInput> & Pick<WalletApiClientOptions, 'fetch' | 'logger'> = {},
    env: Record<string, string | undefined> = process.env
  ): WalletApiClient {
    const { fetch, logger, ...configOverrides } = overrides;
    const config = loadConfigFromEnv(env, configOverrides);

    let authorizationContext: AuthorizationContext | undefined;
    if (config.authorizationKeys.length > 0) {
      authorizationContext = config.authorizationKeys
        .reduce((builder, key) => builder.addAuthorizationPrivateKey(key), AuthorizationContext.builder())
        .build();
    }

    return new WalletApiClient({
      appId: config.appId,
      appSecret: config.appSecret,
      baseUrl: config.baseUrl,
      timeout: config.timeout,
      retryConfig: config.retryConfig,
      authorizationContext,
      logger:
        logger ??
        (config.logLevel !== undefined
          ? new ConsoleLogger({ level: config.logLevel, context: { sdk: 'wallet-api-authorization' } })
          : undefined),
      fetch,
    });
  }

  /**
   * Get the underlying HTTP transport (for advanced use cases).
   */
  get transport(): HTTPTransport {
    return this._transport;
  }
}
