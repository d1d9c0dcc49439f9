/**
 * Helpers shared by the resource clients.
 */

import type { z } from 'zod';
import { ValidationError, WalletApiError } from '../exceptions.js';
import type { ApiResponse, RequestOptions } from '../transport.js';
import type { AuthorizationOptions } from '../types/index.js';

/**
 * Validate a path identifier and encode it for use in a URL path.
 *
 * @throws ValidationError if the value is empty
 */
export function pathId(name: string, value: string): string {
  if (value.length === 0) {
    throw new ValidationError('INVALID_ARGUMENT', `Expected a non-empty value for \`${name}\``);
  }
  return encodeURIComponent(value);
}

/**
 * Map per-call authorization options onto transport request options.
 *
 * A context wins over a manual signature when both are given.
 */
export function authorizationRequestOptions(options: AuthorizationOptions): RequestOptions {
  const { authorizationContext, authorizationSignature, idempotencyKey } = options;
  return {
    authorizationContext,
    authorizationSignature: authorizationContext === undefined ? authorizationSignature : undefined,
    idempotencyKey,
  };
}

/**
 * Check a response body against its schema.
 *
 * @throws WalletApiError with code INVALID_RESPONSE on a mismatch
 */
export function parseResponse<T extends z.ZodTypeAny>(
  schema: T,
  data: ApiResponse,
  resource: string
): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || resource}: ${issue.message}`)
      .join('; ');
    throw new WalletApiError('INVALID_RESPONSE', `Unexpected ${resource} response: ${issues}`);
  }
  return result.data;
}
