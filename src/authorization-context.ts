/**
 * Authorization context for signing API requests.
 *
 * An AuthorizationContext is an ordered, immutable list of signing
 * strategies. It is built once, usually at startup, and shared by every
 * request that needs authorization signatures.
 *
 * @example
 * ```typescript
 * const context = AuthorizationContext.builder()
 *   .addAuthorizationPrivateKey(process.env.AUTHORIZATION_KEY ?? '')
 *   .addCustomSignFunction(async (method, url, body, appId) => kms.sign({ method, url, body, appId }))
 *   .addSignature(precomputedSignature)
 *   .build();
 *
 * const signatures = await context.generateSignatures('POST', url, body, appId);
 * ```
 */

import type { JsonValue } from './canonicalize.js';
import { ConfigurationError, SigningError, SigningFailedError } from './exceptions.js';
import { buildSignablePayload } from './payload.js';
import { P256Signer } from './signers.js';
import { signWithStrategy } from './strategies.js';
import type {
  CustomSignFunction,
  SignatureResult,
  SigningStrategy,
  SigningStrategyKind,
} from './strategies.js';

/**
 * Ordered, immutable collection of signing strategies.
 */
export class AuthorizationContext {
  readonly strategies: readonly SigningStrategy[];

  private constructor(strategies: readonly SigningStrategy[]) {
    this.strategies = Object.freeze([...strategies]);
    Object.freeze(this);
  }

  /**
   * Create a new builder for constructing an AuthorizationContext.
   */
  static builder(): AuthorizationContextBuilder {
    // The builder gets the only handle on the private constructor
    return AuthorizationContextBuilder.start((strategies) => new AuthorizationContext(strategies));
  }

  /**
   * True if at least one signing strategy is configured. A context without
   * strategies means "no signing required", not an error.
   */
  get hasSigningMethods(): boolean {
    return this.strategies.length > 0;
  }

  /** Number of signatures `generateSignatures` returns. */
  get size(): number {
    return this.strategies.length;
  }

  /** Strategy kinds in signing order. */
  get kinds(): SigningStrategyKind[] {
    return this.strategies.map((strategy) => strategy.kind);
  }

  /**
   * Generate all signatures for a request, one per strategy, in the order
   * the strategies were added.
   *
   * All or nothing: if any strategy fails, no signatures are returned and
   * the error carries that strategy's 1-based `strategyIndex`.
   *
   * @param method - HTTP method (e.g., "POST")
   * @param url - Absolute request URL
   * @param body - Parsed JSON body; `undefined` signs as `{}`
   * @param appId - App id, signed as the `privy-app-id` header
   * @param headers - Live request headers; only reserved-prefix ones are signed
   * @returns Base64-encoded signatures
   * @throws CanonicalizationError if the request cannot be canonicalized
   * @throws SigningError subclasses for strategy failures
   */
  async generateSignatures(
    method: string,
    url: string,
    body: JsonValue | undefined,
    appId: string,
    headers?: Iterable<[string, string]>
  ): Promise<string[]> {
    const results = await this.generateSignatureResults(method, url, body, appId, headers);
    return results.map((result) => result.signature);
  }

  /**
   * Like `generateSignatures`, but keeps each signer's public key.
   */
  async generateSignatureResults(
    method: string,
    url: string,
    body: JsonValue | undefined,
    appId: string,
    headers?: Iterable<[string, string]>
  ): Promise<SignatureResult[]> {
    if (!this.hasSigningMethods) {
      return [];
    }

    const payload = buildSignablePayload({ method, url, body, appId, headers });

    // Sequential: results keep strategy order and a failure stops later strategies
    const results: SignatureResult[] = [];
    for (const [index, strategy] of this.strategies.entries()) {
      try {
        results.push(await signWithStrategy(strategy, { payload, appId }));
      } catch (e) {
        throw attributeToStrategy(e, index + 1, this.strategies.length);
      }
    }
    return results;
  }
}

function attributeToStrategy(error: unknown, position: number, total: number): SigningError {
  if (error instanceof SigningError) {
    return error.atStrategy(position);
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new SigningFailedError(`Strategy ${position} of ${total} failed: ${detail}`, position, {
    cause: error,
  });
}

export type ContextFactory = (strategies: readonly SigningStrategy[]) => AuthorizationContext;

/**
 * Immutable builder for AuthorizationContext.
 *
 * Every `add*` call validates its input and returns a new builder, so a
 * partially configured builder can be shared and extended safely.
 *
 * @example
 * ```typescript
 * const base = AuthorizationContext.builder().addAuthorizationPrivateKey(serverKey);
 * const withQuorum = base.addSignature(coSignerSignature).build();
 * const serverOnly = base.build();
 * ```
 */
export class AuthorizationContextBuilder {
  private readonly pending: readonly SigningStrategy[];
  private readonly finalize: ContextFactory;

  private constructor(pending: readonly SigningStrategy[], finalize: ContextFactory) {
    this.pending = pending;
    this.finalize = finalize;
  }

  /** @internal Use `AuthorizationContext.builder()`. */
  static start(finalize: ContextFactory): AuthorizationContextBuilder {
    return new AuthorizationContextBuilder([], finalize);
  }

  /** Number of strategies added so far. */
  get size(): number {
    return this.pending.length;
  }

  /**
   * Add an authorization private key.
   *
   * The key is decoded immediately and only the parsed key is kept. The
   * `wallet-auth:` label is stripped if present.
   *
   * @param privateKey - Base64-encoded PKCS#8 P-256 private key
   * @throws InvalidKeyMaterialError if the key cannot be decoded
   */
  addAuthorizationPrivateKey(privateKey: string): AuthorizationContextBuilder {
    const signer = P256Signer.fromAuthorizationKey(privateKey);
    return this.with({ kind: 'privateKey', signer });
  }

  /**
   * Add a user JWT for user-based signing.
   *
   * Accepted so contexts can be composed and validated, but signing with a
   * context that contains one fails with NotImplementedError.
   */
  addUserJwt(jwt: string): AuthorizationContextBuilder {
    if (jwt.trim().length === 0) {
      throw new ConfigurationError('User JWT must be a non-empty string');
    }
    return this.with({ kind: 'userJwt', jwt });
  }

  /**
   * Add a custom signing function.
   *
   * Use this when signing happens in a separate service (KMS, HSM) or needs
   * custom business logic. The SDK imposes no timeout on the function.
   */
  addCustomSignFunction(signFunction: CustomSignFunction): AuthorizationContextBuilder {
    if (typeof signFunction !== 'function') {
      throw new ConfigurationError('Custom sign function must be a function');
    }
    return this.with({ kind: 'customFunction', sign: signFunction });
  }

  /**
   * Add a pre-computed signature.
   *
   * The signature is returned as-is for every request; callers must
   * recompute it whenever the request changes.
   *
   * @param signature - Base64-encoded signature
   * @param signerPublicKey - Public key that produced the signature, if known
   */
  addSignature(signature: string, signerPublicKey: string | null = null): AuthorizationContextBuilder {
    if (signature.length === 0) {
      throw new ConfigurationError('Signature must be a non-empty string');
    }
    if (signature.includes(',')) {
      throw new ConfigurationError('Signature must not contain commas');
    }
    return this.with({ kind: 'precomputed', result: Object.freeze({ signature, signerPublicKey }) });
  }

  /**
   * Freeze the added strategies into an AuthorizationContext.
   */
  build(): AuthorizationContext {
    return this.finalize(this.pending);
  }

  private with(strategy: SigningStrategy): AuthorizationContextBuilder {
    return new AuthorizationContextBuilder([...this.pending, Object.freeze(strategy)], this.finalize);
  }
}
