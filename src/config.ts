/**
 * Client configuration and environment loading.
 */

import { z } from 'zod';
import { ConfigurationError } from './exceptions.js';
import { LogLevel, parseLogLevel } from './logging.js';

/**
 * Default base URL for the wallet API.
 */
export const DEFAULT_BASE_URL = 'https://api.privy.io';

/**
 * Default request timeout in milliseconds.
 */
export const DEFAULT_TIMEOUT = 30000;

/**
 * Environment variable names read by `loadConfigFromEnv`.
 */
export const ENV = {
  appId: 'PRIVY_APP_ID',
  appSecret: 'PRIVY_APP_SECRET',
  baseUrl: 'PRIVY_API_BASE_URL',
  authorizationKeys: 'PRIVY_AUTHORIZATION_KEYS',
  logLevel: 'PRIVY_LOG_LEVEL',
} as const;

/**
 * Configuration for automatic retry behavior.
 */
export interface RetryConfig {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries: number;
  /** Backoff multiplier for exponential backoff (default: 2.0) */
  backoffFactor: number;
  /** HTTP status codes that trigger retry (default: [429, 500, 502, 503]) */
  retryOn: number[];
  /** Whether to respect Retry-After header (default: true) */
  respectRetryAfter: boolean;
  /** Maximum backoff time in seconds (default: 60) */
  maxBackoff: number;
  /** Jitter factor for randomization (default: 0.1 = ±10%) */
  jitter: number;
}

/**
 * Default retry configuration.
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  backoffFactor: 2.0,
  retryOn: [429, 500, 502, 503],
  respectRetryAfter: true,
  maxBackoff: 60.0,
  jitter: 0.1,
};

export const retryConfigSchema = z
  .object({
    maxRetries: z.number().int().min(0).max(10),
    backoffFactor: z.number().positive(),
    retryOn: z.array(z.number().int().min(100).max(599)),
    respectRetryAfter: z.boolean(),
    maxBackoff: z.number().nonnegative(),
    jitter: z.number().min(0).max(1),
  })
  .partial();

export const clientConfigSchema = z.object({
  appId: z.string().min(1, 'appId is required'),
  appSecret: z.string().min(1, 'appSecret is required'),
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  timeout: z.number().int().positive().default(DEFAULT_TIMEOUT),
  retryConfig: retryConfigSchema.optional(),
  authorizationKeys: z.array(z.string().min(1)).default([]),
  logLevel: z.nativeEnum(LogLevel).optional(),
});

/**
 * Validated client configuration.
 */
export type ClientConfig = z.output<typeof clientConfigSchema>;

/**
 * Client configuration before defaults are applied.
 */
export type ClientConfigInput = z.input<typeof clientConfigSchema>;

/**
 * Validate a configuration object and apply defaults.
 *
 * @throws ConfigurationError naming every invalid field
 */
export function parseClientConfig(input: ClientConfigInput): ClientConfig {
  const result = clientConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid client configuration: ${issues}`);
  }
  return result.data;
}

/**
 * Build a client configuration from environment variables.
 *
 * - PRIVY_APP_ID: app id (required)
 * - PRIVY_APP_SECRET: app secret (required)
 * - PRIVY_API_BASE_URL: base URL (optional)
 * - PRIVY_AUTHORIZATION_KEYS: comma-separated authorization keys (optional)
 * - PRIVY_LOG_LEVEL: trace, debug, info, warn or error (optional)
 *
 * @throws ConfigurationError if a required variable is missing or a value is invalid
 */
export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
  overrides: Partial<ClientConfigInput> = {}
): ClientConfig {
  const appId = env[ENV.appId];
  const appSecret = env[ENV.appSecret];

  if (!appId) {
    throw new ConfigurationError(`${ENV.appId} environment variable not set`);
  }
  if (!appSecret) {
    throw new ConfigurationError(`${ENV.appSecret} environment variable not set`);
  }

  const rawLevel = env[ENV.logLevel];
  let logLevel: LogLevel | undefined;
  if (rawLevel) {
    logLevel = parseLogLevel(rawLevel);
    if (logLevel === undefined) {
      throw new ConfigurationError(
        `Invalid ${ENV.logLevel}: ${rawLevel}. Must be one of trace, debug, info, warn, error`
      );
    }
  }

  const authorizationKeys = (env[ENV.authorizationKeys] ?? '')
    .split(',')
    .map((key) => key.trim())
    .filter((key) => key.length > 0);

  return parseClientConfig({
    appId,
    appSecret,
    baseUrl: env[ENV.baseUrl] || undefined,
    authorizationKeys,
    logLevel,
    ...overrides,
  });
}
