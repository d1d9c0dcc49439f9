/**
 * Type definitions for wallet API resources.
 *
 * Response shapes are zod schemas so the resource clients can validate what
 * the API returns instead of trusting it. Unknown fields are kept.
 */

import { z } from 'zod';
import type { AuthorizationContext } from '../authorization-context.js';
import type { JsonObject, JsonValue } from '../canonicalize.js';

/**
 * Per-call authorization options accepted by every mutating resource method.
 */
export interface AuthorizationOptions {
  /** Context to sign with instead of the client default */
  authorizationContext?: AuthorizationContext;
  /** Signature header value computed elsewhere; comma-separated for several */
  authorizationSignature?: string;
  /** Idempotency key, sent and signed as `privy-idempotency-key` */
  idempotencyKey?: string;
}

// Wallets

export const chainTypeSchema = z.enum(['ethereum', 'solana', 'cosmos', 'stellar', 'sui', 'tron']);
export type ChainType = z.infer<typeof chainTypeSchema>;

export const additionalSignerSchema = z
  .object({
    signer_id: z.string(),
    override_policy_ids: z.array(z.string()).optional(),
  })
  .passthrough();

export const walletSchema = z
  .object({
    id: z.string(),
    address: z.string(),
    chain_type: z.string(),
    owner_id: z.string().nullable().optional(),
    policy_ids: z.array(z.string()).optional(),
    additional_signers: z.array(additionalSignerSchema).optional(),
    created_at: z.number().optional(),
  })
  .passthrough();
export type Wallet = z.infer<typeof walletSchema>;

export type WalletUpdateParams = {
  policyIds?: string[];
  ownerId?: string | null;
  additionalSigners?: { signerId: string; overridePolicyIds?: string[] }[];
};

export type WalletRpcParams = {
  /** RPC method, e.g. "eth_sendTransaction" or "signMessage" */
  method: string;
  params: JsonObject;
  /** CAIP-2 chain id, e.g. "eip155:8453" */
  caip2?: string;
  chainType?: ChainType;
};

export const walletRpcResponseSchema = z
  .object({
    method: z.string(),
    data: z.unknown(),
  })
  .passthrough();
export type WalletRpcResponse = z.infer<typeof walletRpcResponseSchema>;

// Key quorums

export const keyQuorumSchema = z
  .object({
    id: z.string(),
    display_name: z.string().nullable().optional(),
    authorization_threshold: z.number().nullable().optional(),
    authorization_keys: z
      .array(z.object({ public_key: z.string(), display_name: z.string().nullable().optional() }).passthrough())
      .optional(),
    user_ids: z.array(z.string()).optional(),
  })
  .passthrough();
export type KeyQuorum = z.infer<typeof keyQuorumSchema>;

export type KeyQuorumUpdateParams = {
  publicKeys: string[];
  /** Number of signatures required, e.g. 2 for 2-of-3 */
  authorizationThreshold?: number;
  displayName?: string;
};

// Policies

export const policyActionSchema = z.enum(['ALLOW', 'DENY']);
export type PolicyAction = z.infer<typeof policyActionSchema>;

export const policyRuleSchema = z
  .object({
    id: z.string().optional(),
    name: z.string(),
    method: z.string(),
    conditions: z.array(z.unknown()),
    action: policyActionSchema,
  })
  .passthrough();
export type PolicyRule = z.infer<typeof policyRuleSchema>;

export const policySchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    version: z.string().optional(),
    chain_type: z.string().optional(),
    rules: z.array(policyRuleSchema).optional(),
    owner_id: z.string().nullable().optional(),
    created_at: z.number().optional(),
  })
  .passthrough();
export type Policy = z.infer<typeof policySchema>;

export type PolicyRuleInput = {
  name: string;
  /** RPC method the rule applies to, or "*" */
  method: string;
  conditions: JsonObject[];
  action: PolicyAction;
};

export type PolicyUpdateParams = {
  name?: string;
  rules?: PolicyRuleInput[];
  ownerId?: string | null;
};

export const deleteResponseSchema = z
  .object({
    success: z.boolean().optional(),
  })
  .passthrough();
export type DeleteResponse = z.infer<typeof deleteResponseSchema>;

/**
 * Build a JSON object, dropping entries whose value is undefined.
 */
export function compactBody(fields: Record<string, JsonValue | undefined>): JsonObject {
  const body: JsonObject = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      body[key] = value;
    }
  }
  return body;
}
