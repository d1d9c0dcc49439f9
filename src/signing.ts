/**
 * Authorization signature generation.
 *
 * Implements the signing flow: payload -> canonicalize -> hash -> sign -> encode.
 */

import { sha256 } from '@noble/hashes/sha256';
import { canonicalize } from './canonicalize.js';
import type { JsonValue } from './canonicalize.js';
import { ConfigurationError } from './exceptions.js';
import { APP_ID_HEADER, buildSignablePayload, payloadToDict } from './payload.js';
import type { SignablePayload } from './payload.js';
import { P256Signer } from './signers.js';
import type { Signer } from './signers.js';

/**
 * Sign a SignablePayload and return the base64-encoded signature.
 *
 * The signing process:
 * 1. Canonicalize the payload using JCS (RFC 8785)
 * 2. Compute the SHA-256 hash of the canonical JSON
 * 3. Sign the hash with the provided signer
 * 4. Encode the DER signature as base64
 *
 * @param payload - The payload to sign
 * @param signer - Signer holding the authorization key
 * @returns Base64-encoded signature string
 */
export function signPayload(payload: SignablePayload, signer: Signer): string {
  const signatureBytes = signer.sign(getMessageHash(payload));
  return Buffer.from(signatureBytes).toString('base64');
}

/**
 * Get the canonical JSON representation of a payload.
 *
 * This is the exact string a verifier reconstructs; useful for debugging.
 */
export function getCanonicalJson(payload: SignablePayload): string {
  return canonicalize(payloadToDict(payload));
}

/**
 * Get the SHA-256 hash that is signed for a payload.
 */
export function getMessageHash(payload: SignablePayload): Uint8Array {
  return sha256(new TextEncoder().encode(getCanonicalJson(payload)));
}

/**
 * Options for `getAuthorizationSignature`.
 */
export interface AuthorizationSignatureOptions {
  url: string;
  body?: JsonValue;
  method: string;
  /** Authorization key, optionally prefixed with `wallet-auth:` */
  privateKey: string;
  /** App id; ignored when `headers` is given */
  appId?: string;
  /** Reserved-prefix headers to sign; must include the app id header */
  headers?: Record<string, string>;
}

/**
 * Compute one authorization signature without building a context.
 *
 * @returns Base64-encoded signature
 * @throws ConfigurationError if neither `appId` nor an app id header is given
 * @throws InvalidKeyMaterialError if the key cannot be decoded
 */
export function getAuthorizationSignature(options: AuthorizationSignatureOptions): string {
  const appId = options.headers?.[APP_ID_HEADER] ?? options.appId;
  if (appId === undefined) {
    throw new ConfigurationError(`Either appId or a ${APP_ID_HEADER} header must be provided`);
  }

  const payload = buildSignablePayload({
    method: options.method,
    url: options.url,
    body: options.body,
    appId,
    headers: Object.entries(options.headers ?? {}),
  });

  return signPayload(payload, P256Signer.fromAuthorizationKey(options.privateKey));
}
