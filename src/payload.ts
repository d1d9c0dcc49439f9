/**
 * Signable payload construction.
 *
 * Builds the structure every authorization signature is computed over:
 * the request's method, absolute URL, parsed JSON body and the headers
 * that belong to the authorization system.
 */

import { CanonicalizationError } from './exceptions.js';
import type { JsonObject, JsonValue } from './canonicalize.js';

/** Version field of the signable payload. */
export const PAYLOAD_VERSION = 1;

/** Headers starting with this prefix take part in the signature. */
export const AUTHORIZATION_HEADER_PREFIX = 'privy-';

/** Header carrying the comma-separated signature list. */
export const AUTHORIZATION_SIGNATURE_HEADER = 'privy-authorization-signature';

/** Application identifier header, always signed and always sent. */
export const APP_ID_HEADER = 'privy-app-id';

/** Idempotency key header. Carries the reserved prefix, so it is signed. */
export const IDEMPOTENCY_KEY_HEADER = 'privy-idempotency-key';

/** HTTP methods whose requests require authorization signatures. */
export const SIGNED_METHODS: ReadonlySet<string> = new Set(['POST', 'PUT', 'PATCH', 'DELETE']);

/**
 * The structure signatures are computed over.
 *
 * A pure function of (method, url, body, relevant headers): no timestamps
 * or nonces, so identical requests always canonicalize to identical bytes.
 */
export interface SignablePayload {
  version: typeof PAYLOAD_VERSION;
  method: string;
  url: string;
  body: JsonValue;
  headers: Record<string, string>;
}

/**
 * Inputs to `buildSignablePayload`.
 */
export interface SignablePayloadInput {
  method: string;
  url: string;
  /** Parsed JSON body; `undefined` means the request has no body. */
  body?: JsonValue;
  appId: string;
  /** Live request headers (a `Headers` instance works); only reserved-prefix headers are kept. */
  headers?: Iterable<[string, string]>;
}

/**
 * Select the headers that take part in the signature.
 *
 * Names are lowercased. Only names starting with the reserved prefix are
 * kept, the signature header itself is dropped, and the app id header is
 * always present with `appId` as its value.
 */
export function selectAuthorizationHeaders(
  headers: Iterable<[string, string]>,
  appId: string
): Record<string, string> {
  const selected: Record<string, string> = { [APP_ID_HEADER]: appId };

  for (const [name, value] of headers) {
    const lower = name.toLowerCase();
    if (!lower.startsWith(AUTHORIZATION_HEADER_PREFIX)) continue;
    if (lower === AUTHORIZATION_SIGNATURE_HEADER || lower === APP_ID_HEADER) continue;
    selected[lower] = value;
  }

  return selected;
}

/**
 * Build a signable payload for one request.
 *
 * @throws CanonicalizationError if the URL is not absolute
 */
export function buildSignablePayload(input: SignablePayloadInput): SignablePayload {
  if (!isAbsoluteUrl(input.url)) {
    throw new CanonicalizationError(`Request URL must be absolute, got "${input.url}"`);
  }

  const emptyBody: JsonObject = {};

  return {
    version: PAYLOAD_VERSION,
    method: input.method.toUpperCase(),
    url: input.url,
    body: input.body === undefined ? emptyBody : input.body,
    headers: selectAuthorizationHeaders(input.headers ?? [], input.appId),
  };
}

/**
 * Convert a SignablePayload to a plain object for canonicalization.
 */
export function payloadToDict(payload: SignablePayload): Record<string, unknown> {
  return {
    version: payload.version,
    method: payload.method,
    url: payload.url,
    body: payload.body,
    headers: payload.headers,
  };
}

function isAbsoluteUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}

/**
 * Builder for SignablePayload instances bound to one app id.
 */
export class SignablePayloadBuilder {
  readonly appId: string;

  constructor(appId: string) {
    this.appId = appId;
  }

  /**
   * Build a payload for a request made on behalf of this app.
   */
  build(
    method: string,
    url: string,
    body?: JsonValue,
    headers?: Iterable<[string, string]>
  ): SignablePayload {
    return buildSignablePayload({ method, url, body, appId: this.appId, headers });
  }
}
