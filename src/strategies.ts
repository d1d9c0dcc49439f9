/**
 * Signing strategies.
 *
 * Each way of producing a signature is one variant of the SigningStrategy
 * union; `signWithStrategy` dispatches on `kind`. Adding a variant means
 * extending the union and the switch, and the compiler flags any switch
 * that misses it.
 */

import { z } from 'zod';
import type { JsonValue } from './canonicalize.js';
import {
  InvalidSignerResultError,
  NotImplementedError,
  SigningError,
  SigningFailedError,
} from './exceptions.js';
import type { SignablePayload } from './payload.js';
import { signPayload } from './signing.js';
import type { P256Signer } from './signers.js';

/**
 * Result of a signature operation.
 */
export interface SignatureResult {
  /** Base64-encoded signature */
  signature: string;
  /** Public key of the signer, when known */
  signerPublicKey: string | null;
}

/**
 * Caller-supplied signing function, for keys held in a KMS, an HSM or a
 * separate signing service. It may return a promise.
 *
 * The SDK checks the shape of the result but not its cryptographic
 * validity.
 */
export type CustomSignFunction = (
  method: string,
  url: string,
  body: JsonValue,
  appId: string
) => SignatureResult | Promise<SignatureResult>;

/** Signs with an authorization private key held in process. */
export interface PrivateKeyStrategy {
  readonly kind: 'privateKey';
  readonly signer: P256Signer;
}

/** Delegates signing to a caller-supplied function. */
export interface CustomFunctionStrategy {
  readonly kind: 'customFunction';
  readonly sign: CustomSignFunction;
}

/** Passes through a signature computed out of band. */
export interface PrecomputedStrategy {
  readonly kind: 'precomputed';
  readonly result: Readonly<SignatureResult>;
}

/** Exchanges a user JWT for a short-lived signing key. Not yet supported. */
export interface UserJwtStrategy {
  readonly kind: 'userJwt';
  readonly jwt: string;
}

export type SigningStrategy =
  | PrivateKeyStrategy
  | CustomFunctionStrategy
  | PrecomputedStrategy
  | UserJwtStrategy;

export type SigningStrategyKind = SigningStrategy['kind'];

/**
 * Shape a custom sign function must return. Commas are rejected because
 * the signature header is a comma-separated list.
 */
export const signatureResultSchema = z.object({
  signature: z
    .string()
    .min(1, 'signature must be a non-empty string')
    .refine((value) => !value.includes(','), 'signature must not contain commas'),
  signerPublicKey: z.string().nullable().optional(),
});

export const USER_JWT_NOT_IMPLEMENTED_MESSAGE =
  'User JWT-based signing is not yet implemented. ' +
  'Use an authorization private key, a custom sign function or a precomputed signature instead.';

/**
 * Request details a strategy signs over.
 */
export interface SigningRequest {
  payload: SignablePayload;
  appId: string;
}

/**
 * Produce one signature with one strategy.
 *
 * Errors are thrown untagged; the AuthorizationContext attributes them to a
 * strategy index.
 */
export async function signWithStrategy(
  strategy: SigningStrategy,
  request: SigningRequest
): Promise<SignatureResult> {
  switch (strategy.kind) {
    case 'privateKey':
      return signWithPrivateKey(strategy, request.payload);
    case 'customFunction':
      return signWithCustomFunction(strategy, request);
    case 'precomputed':
      return { ...strategy.result };
    case 'userJwt':
      throw new NotImplementedError(USER_JWT_NOT_IMPLEMENTED_MESSAGE);
  }
}

function signWithPrivateKey(strategy: PrivateKeyStrategy, payload: SignablePayload): SignatureResult {
  try {
    return { signature: signPayload(payload, strategy.signer), signerPublicKey: null };
  } catch (e) {
    if (e instanceof SigningError) throw e;
    throw new SigningFailedError(`ECDSA signing failed: ${describe(e)}`, undefined, { cause: e });
  }
}

async function signWithCustomFunction(
  strategy: CustomFunctionStrategy,
  request: SigningRequest
): Promise<SignatureResult> {
  const { payload } = request;

  let raw: unknown;
  try {
    raw = await strategy.sign(payload.method, payload.url, payload.body, request.appId);
  } catch (e) {
    throw new SigningFailedError(`Custom sign function failed: ${describe(e)}`, undefined, {
      cause: e,
    });
  }

  const parsed = signatureResultSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new InvalidSignerResultError(`Custom sign function returned an invalid result: ${issues}`);
  }

  return {
    signature: parsed.data.signature,
    signerPublicKey: parsed.data.signerPublicKey ?? null,
  };
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
