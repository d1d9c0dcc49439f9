/**
 * Exception classes for the wallet API authorization SDK.
 *
 * Two families share one base class: errors raised while producing
 * authorization signatures, and errors mapped from HTTP responses.
 */

/**
 * Base exception for all SDK errors.
 */
export class WalletApiError extends Error {
  readonly code: string;
  readonly requestId?: string;

  constructor(code: string, message: string, requestId?: string, options?: { cause?: unknown }) {
    super(`[${code}] ${message}`, options);
    this.name = 'WalletApiError';
    this.code = code;
    this.requestId = requestId;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised when SDK configuration is invalid or missing.
 */
export class ConfigurationError extends WalletApiError {
  constructor(message: string) {
    super('CONFIGURATION_ERROR', message);
    this.name = 'ConfigurationError';
  }
}

// ---------------------------------------------------------------------------
// Signing errors
// ---------------------------------------------------------------------------

/**
 * Base for errors raised by a signing strategy.
 *
 * `strategyIndex` is the 1-based position of the strategy inside its
 * AuthorizationContext, so the second strategy of three reports 2. It is unset when the error was raised outside a
 * context (for example by a direct call to `getAuthorizationSignature`).
 */
export class SigningError extends WalletApiError {
  readonly strategyIndex?: number;

  constructor(code: string, message: string, strategyIndex?: number, options?: { cause?: unknown }) {
    super(code, message, undefined, options);
    this.name = 'SigningError';
    this.strategyIndex = strategyIndex;
  }

  /**
   * Return a copy of this error attributed to the strategy at 1-based `index`.
   */
  atStrategy(index: number): SigningError {
    return new SigningError(this.code, this.detail(), index, { cause: this.cause });
  }

  protected detail(): string {
    return this.message.replace(/^\[[A-Z_]+\] /, '');
  }
}

/**
 * Raised when an authorization key cannot be decoded or parsed.
 *
 * The message never contains the key material.
 */
export class InvalidKeyMaterialError extends SigningError {
  constructor(message: string, strategyIndex?: number, options?: { cause?: unknown }) {
    super('INVALID_KEY_MATERIAL', message, strategyIndex, options);
    this.name = 'InvalidKeyMaterialError';
  }

  override atStrategy(index: number): InvalidKeyMaterialError {
    return new InvalidKeyMaterialError(this.detail(), index, { cause: this.cause });
  }
}

/**
 * Raised when a strategy fails for a reason outside the SDK's control:
 * a custom sign function threw or rejected, or the curve implementation failed.
 */
export class SigningFailedError extends SigningError {
  constructor(message: string, strategyIndex?: number, options?: { cause?: unknown }) {
    super('SIGNING_FAILED', message, strategyIndex, options);
    this.name = 'SigningFailedError';
  }

  override atStrategy(index: number): SigningFailedError {
    return new SigningFailedError(this.detail(), index, { cause: this.cause });
  }
}

/**
 * Raised when a custom sign function returns a malformed result.
 */
export class InvalidSignerResultError extends SigningError {
  constructor(message: string, strategyIndex?: number) {
    super('INVALID_SIGNER_RESULT', message, strategyIndex);
    this.name = 'InvalidSignerResultError';
  }

  override atStrategy(index: number): InvalidSignerResultError {
    return new InvalidSignerResultError(this.detail(), index);
  }
}

/**
 * Raised by signing methods the SDK accepts but cannot execute yet.
 */
export class NotImplementedError extends SigningError {
  constructor(message: string, strategyIndex?: number) {
    super('NOT_IMPLEMENTED', message, strategyIndex);
    this.name = 'NotImplementedError';
  }

  override atStrategy(index: number): NotImplementedError {
    return new NotImplementedError(this.detail(), index);
  }
}

/**
 * Raised when a request cannot be turned into a signable payload:
 * non-finite numbers, values JSON cannot represent, a body that is not JSON,
 * or a URL that is not absolute.
 */
export class CanonicalizationError extends WalletApiError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CANONICALIZATION_ERROR', message, undefined, options);
    this.name = 'CanonicalizationError';
  }
}

// ---------------------------------------------------------------------------
// HTTP errors
// ---------------------------------------------------------------------------

/**
 * Raised on 401 responses, typically a bad app secret or a signature the
 * API could not verify.
 */
export class AuthenticationError extends WalletApiError {
  constructor(code: string, message: string, requestId?: string) {
    super(code, message, requestId);
    this.name = 'AuthenticationError';
  }
}

/**
 * Raised on 403 responses.
 */
export class PermissionDeniedError extends WalletApiError {
  constructor(code: string, message: string, requestId?: string) {
    super(code, message, requestId);
    this.name = 'PermissionDeniedError';
  }
}

/**
 * Raised when a resource is not found.
 */
export class NotFoundError extends WalletApiError {
  constructor(code: string, message: string, requestId?: string) {
    super(code, message, requestId);
    this.name = 'NotFoundError';
  }
}

/**
 * Raised on conflicts, including a reused idempotency key.
 */
export class ConflictError extends WalletApiError {
  constructor(code: string, message: string, requestId?: string) {
    super(code, message, requestId);
    this.name = 'ConflictError';
  }
}

/**
 * Raised when rate limited.
 */
export class RateLimitedError extends WalletApiError {
  readonly retryAfter: number;

  constructor(code: string, message: string, retryAfter: number, requestId?: string) {
    super(code, message, requestId);
    this.name = 'RateLimitedError';
    this.retryAfter = retryAfter;
  }
}

/**
 * Raised on other 4xx responses.
 */
export class ValidationError extends WalletApiError {
  constructor(code: string, message: string, requestId?: string) {
    super(code, message, requestId);
    this.name = 'ValidationError';
  }
}

/**
 * Raised on server errors (5xx) and network failures.
 */
export class ServerError extends WalletApiError {
  constructor(code: string, message: string, requestId?: string) {
    super(code, message, requestId);
    this.name = 'ServerError';
  }
}
