/**
 * HTTP transport for the wallet API.
 *
 * Handles HTTP communication with app authentication, authorization
 * signatures on mutating requests, automatic retry and error mapping.
 */

import { z } from 'zod';
import type { AuthorizationContext } from './authorization-context.js';
import type { JsonValue } from './canonicalize.js';
import { DEFAULT_RETRY_CONFIG, DEFAULT_TIMEOUT } from './config.js';
import type { RetryConfig } from './config.js';
import {
  WalletApiError,
  AuthenticationError,
  PermissionDeniedError,
  NotFoundError,
  ConflictError,
  RateLimitedError,
  ValidationError,
  ServerError,
} from './exceptions.js';
import { RequestInterceptor } from './interceptor.js';
import { NoopLogger } from './logging.js';
import type { Logger } from './logging.js';
import {
  APP_ID_HEADER,
  AUTHORIZATION_SIGNATURE_HEADER,
  IDEMPOTENCY_KEY_HEADER,
  SIGNED_METHODS,
} from './payload.js';

/**
 * Function used to send requests; the global `fetch` by default.
 */
export type FetchFunction = (request: Request) => Promise<Response>;

/**
 * Options for HTTPTransport initialization.
 */
export interface HTTPTransportOptions {
  /** Base URL for API requests */
  baseUrl: string;
  /** App id, sent on every request */
  appId: string;
  /** App secret for basic authentication */
  appSecret: string;
  /** Default context for signing mutating requests */
  authorizationContext?: AuthorizationContext;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Retry configuration */
  retryConfig?: Partial<RetryConfig>;
  logger?: Logger;
  fetch?: FetchFunction;
}

/**
 * Per-request options.
 */
export interface RequestOptions {
  /** JSON body (for POST/PUT/PATCH/DELETE) */
  body?: JsonValue;
  /** Query parameters; undefined values are skipped */
  query?: Record<string, string | number | boolean | undefined>;
  /** Extra headers */
  headers?: Record<string, string>;
  /** Context to sign with instead of the transport default */
  authorizationContext?: AuthorizationContext;
  /**
   * Signature header value computed by the caller. When set, the request
   * is sent with it and no context is consulted.
   */
  authorizationSignature?: string;
  /** Sent as `privy-idempotency-key`, and therefore signed */
  idempotencyKey?: string;
}

/**
 * Parsed JSON response body.
 */
export type ApiResponse = Record<string, unknown>;

const errorBodySchema = z
  .object({
    error: z
      .union([
        z.string(),
        z.object({ code: z.string().optional(), message: z.string().optional() }).passthrough(),
      ])
      .optional(),
    code: z.string().optional(),
    message: z.string().optional(),
    request_id: z.string().optional(),
  })
  .passthrough();

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * HTTP transport layer with automatic signing and retry logic.
 *
 * Handles:
 * - Basic authentication with the app id and secret
 * - Authorization signatures for POST, PUT, PATCH and DELETE requests
 * - Exponential backoff with jitter for retries
 * - Retry-After header respect for rate limiting
 * - Error response parsing into typed exceptions
 */
export class HTTPTransport {
  readonly baseUrl: string;
  readonly appId: string;
  readonly timeout: number;
  readonly retryConfig: RetryConfig;
  readonly authorizationContext?: AuthorizationContext;

  private readonly authHeader: string;
  private readonly interceptor: RequestInterceptor;
  private readonly logger: Logger;
  private readonly fetchFn: FetchFunction;

  constructor(options: HTTPTransportOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.appId = options.appId;
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
    this.retryConfig = { ...DEFAULT_RETRY_CONFIG, ...options.retryConfig };
    this.authorizationContext = options.authorizationContext;
    this.authHeader = `Basic ${Buffer.from(`${options.appId}:${options.appSecret}`).toString('base64')}`;
    this.logger = options.logger ?? new NoopLogger();
    this.interceptor = new RequestInterceptor({ appId: options.appId, logger: this.logger });
    this.fetchFn = options.fetch ?? ((request) => fetch(request));
  }

  /**
   * Build the absolute URL for an API path.
   */
  buildUrl(path: string, query?: RequestOptions['query']): string {
    let url = `${this.baseUrl}${path}`;

    if (query) {
      const searchParams = new URLSearchParams();
      for (const [key, value] of Object.entries(query)) {
        if (value !== undefined) {
          searchParams.append(key, String(value));
        }
      }
      const qs = searchParams.toString();
      if (qs.length > 0) {
        url += `?${qs}`;
      }
    }

    return url;
  }

  /**
   * Make a request with automatic retry.
   *
   * Mutating requests are signed on every attempt with the per-request
   * context, or the transport's default context. Signing errors are
   * thrown without retrying.
   *
   * @param method - HTTP method
   * @param path - API path (e.g., "/v1/wallets")
   * @returns Parsed JSON response ({} for an empty body)
   * @throws WalletApiError on signing or API errors
   */
  async request(method: string, path: string, options: RequestOptions = {}): Promise<ApiResponse> {
    const upperMethod = method.toUpperCase();
    const url = this.buildUrl(path, options.query);

    const makeRequest = async (): Promise<Response> => {
      const controller = new AbortController();
      // Signing runs before the clock starts
      const request = await this.prepareRequest(upperMethod, url, options, controller.signal);
      const timeoutId = setTimeout(() => controller.abort(), this.timeout);

      try {
        return await this.fetchFn(request);
      } finally {
        clearTimeout(timeoutId);
      }
    };

    return this.executeWithRetry(upperMethod, url, makeRequest);
  }

  /**
   * Build the outbound Request and sign it where required.
   */
  private async prepareRequest(
    method: string,
    url: string,
    options: RequestOptions,
    signal: AbortSignal
  ): Promise<Request> {
    const headers = new Headers({
      'Content-Type': 'application/json',
      Authorization: this.authHeader,
      [APP_ID_HEADER]: this.appId,
    });
    if (options.idempotencyKey !== undefined) {
      headers.set(IDEMPOTENCY_KEY_HEADER, options.idempotencyKey);
    }
    for (const [name, value] of Object.entries(options.headers ?? {})) {
      headers.set(name, value);
    }
    if (options.authorizationSignature !== undefined) {
      headers.set(AUTHORIZATION_SIGNATURE_HEADER, options.authorizationSignature);
    }

    const hasBody = options.body !== undefined && method !== 'GET' && method !== 'HEAD';
    const request = new Request(url, {
      method,
      headers,
      body: hasBody ? JSON.stringify(options.body) : null,
      signal,
    });

    if (!SIGNED_METHODS.has(method) || headers.has(AUTHORIZATION_SIGNATURE_HEADER)) {
      return request;
    }

    const context = options.authorizationContext ?? this.authorizationContext;
    if (context === undefined) {
      this.logger.debug('Skipping authorization signature, no authorization context configured', {
        method,
        url,
      });
      return request;
    }

    return this.interceptor.authorizeFetchRequest(request, context);
  }

  /**
   * Execute a request with automatic retry on retryable errors.
   */
  private async executeWithRetry(
    method: string,
    url: string,
    requestFn: () => Promise<Response>
  ): Promise<ApiResponse> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.retryConfig.maxRetries; attempt++) {
      try {
        const response = await requestFn();

        if (response.ok) {
          return await this.parseBody(response);
        }

        const error = await this.parseErrorResponse(response);

        if (response.status === 401) {
          this.logger.error('Authorization error from API', {
            method,
            url,
            status: response.status,
            code: error.code,
            requestId: error.requestId,
          });
        }

        if (!this.shouldRetry(response.status, attempt)) {
          throw error;
        }

        lastError = error;

        const retryAfter = response.headers.get('Retry-After');
        const waitTime = this.getBackoffTime(attempt, retryAfter);
        this.logger.warn('Retrying request', { method, url, status: response.status, attempt, waitTime });
        await this.sleep(waitTime * 1000);
      } catch (e) {
        if (e instanceof WalletApiError) {
          throw e;
        }

        // Network errors are retryable
        if (attempt >= this.retryConfig.maxRetries) {
          throw new ServerError('CONNECTION_ERROR', String(e));
        }

        lastError = e instanceof Error ? e : new Error(String(e));
        const waitTime = this.getBackoffTime(attempt, null);
        this.logger.warn('Retrying request after network error', {
          method,
          url,
          attempt,
          error: lastError.message,
        });
        await this.sleep(waitTime * 1000);
      }
    }

    if (lastError) {
      if (lastError instanceof WalletApiError) {
        throw lastError;
      }
      throw new ServerError('MAX_RETRIES_EXCEEDED', lastError.message);
    }

    throw new ServerError('UNKNOWN_ERROR', 'Request failed with no error details');
  }

  private shouldRetry(statusCode: number, attempt: number): boolean {
    if (attempt >= this.retryConfig.maxRetries) {
      return false;
    }

    return this.retryConfig.retryOn.includes(statusCode);
  }

  /**
   * Calculate backoff time for retry.
   *
   * Uses exponential backoff with jitter, respecting Retry-After header
   * if present.
   *
   * @param attempt - Current attempt number (0-indexed)
   * @param retryAfter - Value of Retry-After header (if present)
   * @returns Time to wait in seconds
   */
  getBackoffTime(attempt: number, retryAfter: string | null): number {
    if (retryAfter && this.retryConfig.respectRetryAfter) {
      const parsed = parseFloat(retryAfter);
      if (!isNaN(parsed)) {
        return Math.min(parsed, this.retryConfig.maxBackoff);
      }
    }

    const baseWait = Math.pow(this.retryConfig.backoffFactor, attempt);

    // Apply jitter (±jitter%)
    const jitterRange = baseWait * this.retryConfig.jitter;
    const jitter = (Math.random() * 2 - 1) * jitterRange;

    return Math.min(baseWait + jitter, this.retryConfig.maxBackoff);
  }

  private async parseBody(response: Response): Promise<ApiResponse> {
    const text = await response.text();
    if (text.trim().length === 0) {
      return {};
    }
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (e) {
      // Not retryable: the server has already processed the request
      throw new WalletApiError(
        'INVALID_RESPONSE',
        `Response body is not valid JSON (HTTP ${response.status})`,
        response.headers.get('x-request-id') ?? undefined,
        { cause: e }
      );
    }
    return isRecord(data) ? data : { data };
  }

  /**
   * Parse an error response into a typed exception.
   */
  private async parseErrorResponse(response: Response): Promise<WalletApiError> {
    let raw: unknown = {};
    try {
      raw = JSON.parse(await response.text());
    } catch {
      // Non-JSON error bodies fall back to the status line
      raw = {};
    }

    const parsed = errorBodySchema.safeParse(raw);
    const fallback: z.infer<typeof errorBodySchema> = {};
    const data = parsed.success ? parsed.data : fallback;
    const nested = typeof data.error === 'object' ? data.error : undefined;

    const code = nested?.code ?? data.code ?? 'UNKNOWN_ERROR';
    const message =
      (typeof data.error === 'string' ? data.error : undefined) ??
      nested?.message ??
      data.message ??
      `HTTP ${response.status}`;
    const requestId = data.request_id ?? response.headers.get('x-request-id') ?? undefined;

    const statusCode = response.status;

    if (statusCode === 401) {
      return new AuthenticationError(code, message, requestId);
    } else if (statusCode === 403) {
      return new PermissionDeniedError(code, message, requestId);
    } else if (statusCode === 404) {
      return new NotFoundError(code, message, requestId);
    } else if (statusCode === 409) {
      return new ConflictError(code, message, requestId);
    } else if (statusCode === 429) {
      const retryAfterStr = response.headers.get('Retry-After') ?? '60';
      const retryAfter = parseInt(retryAfterStr, 10) || 60;
      return new RateLimitedError(code, message, retryAfter, requestId);
    } else if (statusCode >= 500) {
      return new ServerError(code, message, requestId);
    } else {
      return new ValidationError(code, message, requestId);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
