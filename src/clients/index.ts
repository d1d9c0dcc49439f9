/**
 * Resource clients.
 */

export { WalletsClient } from './wallets.js';
export { KeyQuorumsClient } from './key-quorums.js';
export { PoliciesClient } from './policies.js';
