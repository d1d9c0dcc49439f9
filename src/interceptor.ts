/**
 * Request interceptor: attaches authorization signatures to outbound requests.
 *
 * Reading a request body to sign it consumes the body on most transports
 * (a fetch Request body is a one-shot stream). The interceptor therefore
 * puts the exact bytes it read back on the request on every exit path,
 * including signing failures, so the signed body is also the sent body.
 */

import type { AuthorizationContext } from './authorization-context.js';
import type { JsonValue } from './canonicalize.js';
import { CanonicalizationError } from './exceptions.js';
import { NoopLogger } from './logging.js';
import type { Logger } from './logging.js';
import { APP_ID_HEADER, AUTHORIZATION_SIGNATURE_HEADER, selectAuthorizationHeaders } from './payload.js';

/**
 * The narrow view of an outbound request the interceptor needs.
 * Transports implement it over their own request type.
 */
export interface SignableHttpRequest {
  readonly method: string;
  /** Absolute URL exactly as it will be sent */
  readonly url: string;
  /** Read the full body. May consume it. */
  readBody(): Promise<Uint8Array>;
  /** Make `body` the transmittable body. */
  replaceBody(body: Uint8Array): void;
  getHeader(name: string): string | null;
  setHeader(name: string, value: string): void;
  headerEntries(): Iterable<[string, string]>;
}

/**
 * SignableHttpRequest over a WHATWG fetch Request.
 *
 * A Request cannot be given a new body in place, so `replaceBody` swaps in
 * a new Request with the same method, headers, signal and redirect mode. Read
 * the current one from `request` after signing.
 */
export class FetchRequestAdapter implements SignableHttpRequest {
  private current: Request;

  constructor(request: Request) {
    this.current = request;
  }

  get request(): Request {
    return this.current;
  }

  get method(): string {
    return this.current.method;
  }

  get url(): string {
    return this.current.url;
  }

  async readBody(): Promise<Uint8Array> {
    if (this.current.body === null) {
      return new Uint8Array(0);
    }
    return new Uint8Array(await this.current.arrayBuffer());
  }

  replaceBody(body: Uint8Array): void {
    const previous = this.current;
    const method = previous.method.toUpperCase();
    const allowsBody = method !== 'GET' && method !== 'HEAD';

    this.current = new Request(previous.url, {
      method: previous.method,
      headers: new Headers(previous.headers),
      body: allowsBody && body.length > 0 ? body : null,
      signal: previous.signal,
      redirect: previous.redirect,
    });
  }

  getHeader(name: string): string | null {
    return this.current.headers.get(name);
  }

  setHeader(name: string, value: string): void {
    this.current.headers.set(name, value);
  }

  headerEntries(): Iterable<[string, string]> {
    return this.current.headers.entries();
  }
}

/**
 * Options for RequestInterceptor.
 */
export interface RequestInterceptorOptions {
  /** App id, sent and signed as the `privy-app-id` header */
  appId: string;
  logger?: Logger;
}

/**
 * Signs outbound requests with an AuthorizationContext.
 *
 * Holds no per-request state, so one instance serves concurrent requests.
 */
export class RequestInterceptor {
  readonly appId: string;
  private readonly logger: Logger;

  constructor(options: RequestInterceptorOptions) {
    this.appId = options.appId;
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Sign `request` with every strategy in `context` and set the signature
   * header to the comma-separated signatures.
   *
   * The request body is left byte-for-byte as it was, whether signing
   * succeeds or fails. Errors propagate unchanged; nothing is retried.
   *
   * A request that already carries a signature header is passed through
   * without reading its body.
   *
   * @returns The signature header value, or null for an empty context
   */
  async authorize(request: SignableHttpRequest, context: AuthorizationContext): Promise<string | null> {
    if (!context.hasSigningMethods) {
      this.logger.debug('No signing methods configured, sending request unsigned', {
        method: request.method,
        url: request.url,
      });
      return null;
    }

    const existing = request.getHeader(AUTHORIZATION_SIGNATURE_HEADER);
    if (existing !== null) {
      this.logger.debug('Request already carries authorization signatures, leaving it untouched', {
        method: request.method,
        url: request.url,
      });
      return existing;
    }

    request.setHeader(APP_ID_HEADER, this.appId);

    const bodyBytes = await request.readBody();
    let signatures: string[];
    try {
      // Parse a copy; the original bytes go back on the request untouched
      const body = parseJsonBody(bodyBytes.slice());
      const signedHeaders = selectAuthorizationHeaders(request.headerEntries(), this.appId);

      this.logger.debug('Generating authorization signatures', {
        method: request.method,
        url: request.url,
        signedHeaders: Object.keys(signedHeaders).sort(),
        bodyKeys: describeBodyKeys(body),
        strategies: context.kinds,
      });

      signatures = await context.generateSignatures(
        request.method,
        request.url,
        body,
        this.appId,
        Object.entries(signedHeaders)
      );
    } finally {
      request.replaceBody(bodyBytes);
    }

    const headerValue = signatures.join(',');
    request.setHeader(AUTHORIZATION_SIGNATURE_HEADER, headerValue);
    this.logger.debug('Added authorization signatures', { signatureCount: signatures.length });
    return headerValue;
  }

  /**
   * Sign a fetch Request and return the Request to send.
   */
  async authorizeFetchRequest(request: Request, context: AuthorizationContext): Promise<Request> {
    const adapter = new FetchRequestAdapter(request);
    await this.authorize(adapter, context);
    return adapter.request;
  }
}

/**
 * Parse a request body for signing. An empty body signs as `{}`.
 *
 * @throws CanonicalizationError if the body is not UTF-8 JSON
 */
export function parseJsonBody(bytes: Uint8Array): JsonValue | undefined {
  if (bytes.length === 0) {
    return undefined;
  }

  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (e) {
    throw new CanonicalizationError('Request body is not valid UTF-8', { cause: e });
  }

  if (text.trim().length === 0) {
    return undefined;
  }

  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch (e) {
    throw new CanonicalizationError('Request body is not valid JSON', { cause: e });
  }
}

function describeBodyKeys(body: JsonValue | undefined): string[] | string {
  if (body === undefined) return '(empty)';
  if (body === null || typeof body !== 'object' || Array.isArray(body)) return typeof body;
  return Object.keys(body);
}
