#!/usr/bin/env -S npx tsx
/**
 * Basic usage example.
 *
 * Builds an authorization context from several signing methods, signs a
 * wallet update through the client, and prints what was sent. Runs offline
 * against MockFetch.
 *
 * Run with: npx tsx examples/basic_usage.ts
 */

import {
  AuthorizationContext,
  ConsoleLogger,
  LogLevel,
  MockFetch,
  P256Signer,
  SigningError,
  WalletApiClient,
  getAuthorizationSignature,
} from '../src/index.js';

console.log('=== Wallet API Authorization Example ===\n');

// 1. Keys. In production these come from the dashboard as "wallet-auth:<base64>".
const { signer: serverKey, publicKey } = P256Signer.generate();
const authorizationKey = `wallet-auth:${serverKey.toAuthorizationKey()}`;
console.log('1. Generated an authorization key');
console.log(`   Public key: ${publicKey.slice(0, 32)}...\n`);

// 2. A context with a private key, a remote signer and a co-signer's signature
const context = AuthorizationContext.builder()
  .addAuthorizationPrivateKey(authorizationKey)
  .addCustomSignFunction(async (method, url) => {
    // Stand-in for a KMS call
    return { signature: `kms-signature-for-${method}-${new URL(url).pathname.length}`, signerPublicKey: null };
  })
  .addSignature('co-signer-signature')
  .build();
console.log(`2. Context strategies: ${context.kinds.join(', ')}\n`);

// 3. Send a signed update through the client
const mock = new MockFetch().enqueue({
  body: { id: 'wallet_1', address: '0x0000000000000000000000000000000000000001', chain_type: 'ethereum' },
});
const client = new WalletApiClient({
  appId: 'example-app',
  appSecret: 'example-secret',
  authorizationContext: context,
  logger: new ConsoleLogger({ level: LogLevel.Debug }),
  fetch: mock.fetch,
});

const wallet = await client.wallets.update('wallet_1', { policyIds: ['policy_1'] });
const sent = mock.lastCall();
console.log(`\n3. Updated ${wallet.id}`);
console.log(`   ${sent?.method} ${sent?.url}`);
console.log(`   Body: ${sent?.body}`);
console.log(`   Signatures: ${(sent?.headers['privy-authorization-signature'] ?? '').split(',').length}\n`);

// 4. One-off signature without a context
const signature = getAuthorizationSignature({
  method: 'POST',
  url: 'https://api.privy.io/v1/wallets/wallet_1/rpc',
  body: { method: 'personal_sign', params: { message: 'hello', encoding: 'utf-8' } },
  privateKey: authorizationKey,
  appId: 'example-app',
});
console.log(`4. One-off signature: ${signature.slice(0, 24)}...\n`);

// 5. Failures name the strategy that failed
const failing = AuthorizationContext.builder()
  .addAuthorizationPrivateKey(authorizationKey)
  .addUserJwt('example-user-jwt')
  .build();
try {
  await failing.generateSignatures('POST', 'https://api.privy.io/v1/wallets/wallet_1', {}, 'example-app');
} catch (e) {
  if (e instanceof SigningError) {
    console.log(`5. Strategy ${e.strategyIndex} failed: ${e.message}`);
  } else {
    throw e;
  }
}
