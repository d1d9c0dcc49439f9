/**
 * Wallet API authorization SDK
 *
 * Produces the authorization signatures the wallet API requires on
 * mutating requests, from any mix of private keys, custom signing
 * functions and precomputed signatures.
 *
 * @packageDocumentation
 */

// Canonicalization
export { canonicalize, canonicalizeToBytes, JCSCanonicalizer } from './canonicalize.js';
export type { JsonValue, JsonObject } from './canonicalize.js';

// Signable payload
export {
  PAYLOAD_VERSION,
  AUTHORIZATION_HEADER_PREFIX,
  AUTHORIZATION_SIGNATURE_HEADER,
  APP_ID_HEADER,
  IDEMPOTENCY_KEY_HEADER,
  SIGNED_METHODS,
  SignablePayloadBuilder,
  buildSignablePayload,
  selectAuthorizationHeaders,
  payloadToDict,
} from './payload.js';
export type { SignablePayload, SignablePayloadInput } from './payload.js';

// Signers and signing
export { P256Signer, AUTHORIZATION_KEY_PREFIX, stripAuthorizationKeyPrefix } from './signers.js';
export type { Signer } from './signers.js';
export { signPayload, getCanonicalJson, getMessageHash, getAuthorizationSignature } from './signing.js';
export type { AuthorizationSignatureOptions } from './signing.js';

// Strategies and context
export { signWithStrategy, signatureResultSchema, USER_JWT_NOT_IMPLEMENTED_MESSAGE } from './strategies.js';
export type {
  SignatureResult,
  CustomSignFunction,
  SigningStrategy,
  SigningStrategyKind,
  PrivateKeyStrategy,
  CustomFunctionStrategy,
  PrecomputedStrategy,
  UserJwtStrategy,
} from './strategies.js';
export { AuthorizationContext, AuthorizationContextBuilder } from './authorization-context.js';

// Interceptor
export { RequestInterceptor, FetchRequestAdapter, parseJsonBody } from './interceptor.js';
export type { SignableHttpRequest, RequestInterceptorOptions } from './interceptor.js';

// Transport
export { HTTPTransport } from './transport.js';
export type { HTTPTransportOptions, RequestOptions, FetchFunction, ApiResponse } from './transport.js';

// Configuration
export {
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT,
  DEFAULT_RETRY_CONFIG,
  parseClientConfig,
  loadConfigFromEnv,
} from './config.js';
export type { RetryConfig, ClientConfig, ClientConfigInput } from './config.js';

// Logging
export { LogLevel, ConsoleLogger, NoopLogger, redactSensitive, parseLogLevel } from './logging.js';
export type { Logger } from './logging.js';

// Exceptions
export {
  WalletApiError,
  ConfigurationError,
  SigningError,
  InvalidKeyMaterialError,
  SigningFailedError,
  InvalidSignerResultError,
  NotImplementedError,
  CanonicalizationError,
  AuthenticationError,
  PermissionDeniedError,
  NotFoundError,
  ConflictError,
  RateLimitedError,
  ValidationError,
  ServerError,
} from './exceptions.js';

// Main client
export { WalletApiClient } from './client.js';
export type { WalletApiClientOptions } from './client.js';

// Resource clients
export { WalletsClient, KeyQuorumsClient, PoliciesClient } from './clients/index.js';

// Testing utilities
export { MockFetch } from './testing/index.js';
export type { MockResponse, MockCall } from './testing/index.js';

// Re-export types
export type * from './types/index.js';
