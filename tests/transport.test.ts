/**
 * Tests for the HTTP transport: authentication, signing, retry and
 * error mapping, against an in-process fetch stand-in.
 */

import { describe, it, expect, vi } from 'vitest';
import { sha256 } from '@noble/hashes/sha256';
import { AuthorizationContext } from '../src/authorization-context.js';
import {
  AuthenticationError,
  NotFoundError,
  RateLimitedError,
  ServerError,
  SigningFailedError,
  ValidationError,
  WalletApiError,
} from '../src/exceptions.js';
import { ConsoleLogger, LogLevel } from '../src/logging.js';
import { P256Signer } from '../src/signers.js';
import { MockFetch } from '../src/testing/index.js';
import { HTTPTransport } from '../src/transport.js';
import type { HTTPTransportOptions } from '../src/transport.js';

const BASIC_AUTH = 'Basic YXBwXzE6dGVzdC1zZWNyZXQ=';

function createTransport(mock: MockFetch, options: Partial<HTTPTransportOptions> = {}): HTTPTransport {
  return new HTTPTransport({
    baseUrl: 'https://api.example/',
    appId: 'app_1',
    appSecret: 'test-secret',
    // Zero backoff keeps retries instant
    retryConfig: { maxRetries: 2, maxBackoff: 0 },
    fetch: mock.fetch,
    ...options,
  });
}

function hashOf(text: string): Uint8Array {
  return sha256(new TextEncoder().encode(text));
}

describe('HTTPTransport', () => {
  it('authenticates every request with the app credentials', async () => {
    const mock = new MockFetch().enqueue({ body: { id: 'w1' } });
    const transport = createTransport(mock);

    const response = await transport.request('GET', '/v1/wallets/w1');

    expect(response).toEqual({ id: 'w1' });
    const call = mock.lastCall();
    expect(call?.method).toBe('GET');
    expect(call?.url).toBe('https://api.example/v1/wallets/w1');
    expect(call?.headers['authorization']).toBe(BASIC_AUTH);
    expect(call?.headers['privy-app-id']).toBe('app_1');
    expect(call?.body).toBe('');
  });

  it('never signs GET requests', async () => {
    const sign = vi.fn(() => ({ signature: 'sig', signerPublicKey: null }));
    const context = AuthorizationContext.builder().addCustomSignFunction(sign).build();
    const mock = new MockFetch();

    await createTransport(mock, { authorizationContext: context }).request('GET', '/v1/wallets');

    expect(sign).not.toHaveBeenCalled();
    expect(mock.lastCall()?.headers['privy-authorization-signature']).toBeUndefined();
  });

  it('signs mutating requests with the default context and sends the signed body', async () => {
    const { signer } = P256Signer.generate();
    const context = AuthorizationContext.builder().addAuthorizationPrivateKey(signer.toAuthorizationKey()).build();
    const mock = new MockFetch();

    await createTransport(mock, { authorizationContext: context }).request('post', '/v1/wallets/w1/transactions', {
      body: { to: '0xAAA', value: '1000' },
    });

    const call = mock.lastCall();
    expect(call?.method).toBe('POST');
    expect(call?.body).toBe('{"to":"0xAAA","value":"1000"}');
    const signature = Buffer.from(call?.headers['privy-authorization-signature'] ?? '', 'base64');
    expect(
      signer.verify(
        signature,
        hashOf(
          '{"body":{"to":"0xAAA","value":"1000"},"headers":{"privy-app-id":"app_1"},' +
            '"method":"POST","url":"https://api.example/v1/wallets/w1/transactions","version":1}'
        )
      )
    ).toBe(true);
  });

  it('prefers the per-request context over the default', async () => {
    const fallback = AuthorizationContext.builder().addSignature('default-sig').build();
    const override = AuthorizationContext.builder().addSignature('request-sig').build();
    const mock = new MockFetch();

    await createTransport(mock, { authorizationContext: fallback }).request('DELETE', '/v1/policies/p1', {
      authorizationContext: override,
    });

    expect(mock.lastCall()?.headers['privy-authorization-signature']).toBe('request-sig');
  });

  it('sends a manual signature as-is without consulting any context', async () => {
    const sign = vi.fn(() => ({ signature: 'computed', signerPublicKey: null }));
    const context = AuthorizationContext.builder().addCustomSignFunction(sign).build();
    const mock = new MockFetch();

    await createTransport(mock, { authorizationContext: context }).request('PATCH', '/v1/key_quorums/q1', {
      body: { public_keys: [] },
      authorizationSignature: 'sig1,sig2',
    });

    expect(sign).not.toHaveBeenCalled();
    expect(mock.lastCall()?.headers['privy-authorization-signature']).toBe('sig1,sig2');
  });

  it('sends mutating requests unsigned when no context is configured', async () => {
    const mock = new MockFetch();

    await createTransport(mock).request('POST', '/v1/wallets', { body: { chain_type: 'ethereum' } });

    expect(mock.lastCall()?.headers['privy-authorization-signature']).toBeUndefined();
    expect(mock.lastCall()?.body).toBe('{"chain_type":"ethereum"}');
  });

  it('signs the idempotency key header', async () => {
    const { signer } = P256Signer.generate();
    const context = AuthorizationContext.builder().addAuthorizationPrivateKey(signer.toAuthorizationKey()).build();
    const mock = new MockFetch();

    await createTransport(mock, { authorizationContext: context }).request('POST', '/v1/wallets/w1/rpc', {
      body: { method: 'personal_sign' },
      idempotencyKey: 'idem-1',
    });

    const call = mock.lastCall();
    expect(call?.headers['privy-idempotency-key']).toBe('idem-1');
    const signature = Buffer.from(call?.headers['privy-authorization-signature'] ?? '', 'base64');
    expect(
      signer.verify(
        signature,
        hashOf(
          '{"body":{"method":"personal_sign"},' +
            '"headers":{"privy-app-id":"app_1","privy-idempotency-key":"idem-1"},' +
            '"method":"POST","url":"https://api.example/v1/wallets/w1/rpc","version":1}'
        )
      )
    ).toBe(true);
  });

  it('adds query parameters, skipping undefined values', () => {
    const transport = createTransport(new MockFetch());

    expect(transport.buildUrl('/v1/wallets', { limit: 10, cursor: undefined, verbose: true })).toBe(
      'https://api.example/v1/wallets?limit=10&verbose=true'
    );
    expect(transport.buildUrl('/v1/wallets', {})).toBe('https://api.example/v1/wallets');
  });

  it('returns an empty object for an empty response body', async () => {
    const mock = new MockFetch().enqueue({ status: 204 });

    await expect(createTransport(mock).request('DELETE', '/v1/policies/p1')).resolves.toEqual({});
  });

  describe('retry', () => {
    it('retries retryable statuses and re-signs every attempt', async () => {
      let calls = 0;
      const context = AuthorizationContext.builder()
        .addCustomSignFunction(() => {
          calls += 1;
          return { signature: `sig-${calls}`, signerPublicKey: null };
        })
        .build();
      const mock = new MockFetch().enqueue({ status: 503, body: { error: 'unavailable' } }, { body: { ok: true } });

      const response = await createTransport(mock, { authorizationContext: context }).request('POST', '/v1/x', {
        body: { a: 1 },
      });

      expect(response).toEqual({ ok: true });
      expect(mock.callCount).toBe(2);
      expect(mock.getCalls().map((call) => call.headers['privy-authorization-signature'])).toEqual([
        'sig-1',
        'sig-2',
      ]);
      expect(mock.getCalls().map((call) => call.body)).toEqual(['{"a":1}', '{"a":1}']);
    });

    it('never retries or sends a request whose signing failed', async () => {
      const context = AuthorizationContext.builder()
        .addCustomSignFunction(() => {
          throw new Error('hsm locked');
        })
        .build();
      const mock = new MockFetch();

      await expect(
        createTransport(mock, { authorizationContext: context }).request('POST', '/v1/x', { body: {} })
      ).rejects.toBeInstanceOf(SigningFailedError);
      expect(mock.callCount).toBe(0);
    });

    it('retries network errors and gives up with a connection error', async () => {
      const mock = new MockFetch()
        .enqueueError(new TypeError('fetch failed'))
        .enqueueError(new TypeError('fetch failed'))
        .enqueueError(new TypeError('fetch failed'));

      const error = createTransport(mock).request('GET', '/v1/wallets');

      await expect(error).rejects.toBeInstanceOf(ServerError);
      await expect(error).rejects.toThrow('[CONNECTION_ERROR] TypeError: fetch failed');
      expect(mock.callCount).toBe(3);
    });

    it('surfaces the last retryable error once retries run out', async () => {
      const mock = new MockFetch().setDefault({
        status: 429,
        body: { error: 'Too many requests' },
        headers: { 'Retry-After': '7' },
      });

      const error = await createTransport(mock)
        .request('GET', '/v1/wallets')
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RateLimitedError);
      if (error instanceof RateLimitedError) {
        expect(error.retryAfter).toBe(7);
        expect(error.message).toBe('[UNKNOWN_ERROR] Too many requests');
      }
      expect(mock.callCount).toBe(3);
    });

    it('aborts requests that exceed the timeout', async () => {
      const hanging = (request: Request) =>
        new Promise<Response>((_resolve, reject) => {
          request.signal.addEventListener('abort', () => reject(new Error('aborted')));
        });
      const transport = createTransport(new MockFetch(), {
        fetch: hanging,
        timeout: 10,
        retryConfig: { maxRetries: 0 },
      });

      await expect(transport.request('GET', '/v1/wallets')).rejects.toThrow('[CONNECTION_ERROR] Error: aborted');
    });

    it('does not count signing time against the request timeout', async () => {
      const sign = vi.fn(async () => {
        await new Promise((resolve) => setTimeout(resolve, 50));
        return { signature: 'slow-sig', signerPublicKey: null };
      });
      const context = AuthorizationContext.builder().addCustomSignFunction(sign).build();
      const seen: string[] = [];
      const fetchFn = async (request: Request): Promise<Response> => {
        if (request.signal.aborted) {
          throw new Error('aborted');
        }
        seen.push(request.headers.get('privy-authorization-signature') ?? '');
        return new Response('{"ok":true}', { status: 200 });
      };
      const transport = createTransport(new MockFetch(), {
        fetch: fetchFn,
        timeout: 10,
        authorizationContext: context,
      });

      await expect(transport.request('POST', '/v1/x', { body: {} })).resolves.toEqual({ ok: true });
      expect(sign).toHaveBeenCalledTimes(1);
      expect(seen).toEqual(['slow-sig']);
    });

    it('does not resend an accepted request whose response is not JSON', async () => {
      const mock = new MockFetch().setDefault({ status: 200, body: 'OK', headers: { 'x-request-id': 'req_9' } });
      const context = AuthorizationContext.builder().addSignature('sig').build();

      const error = await createTransport(mock, { authorizationContext: context })
        .request('POST', '/v1/policies/p1/rules', { body: { name: 'r' } })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(WalletApiError);
      if (error instanceof WalletApiError) {
        expect(error.code).toBe('INVALID_RESPONSE');
        expect(error.message).toBe('[INVALID_RESPONSE] Response body is not valid JSON (HTTP 200)');
        expect(error.requestId).toBe('req_9');
      }
      expect(mock.callCount).toBe(1);
    });

    it('computes backoff from Retry-After or with bounded jitter', () => {
      const transport = createTransport(new MockFetch(), {
        retryConfig: { backoffFactor: 2, jitter: 0.1, maxBackoff: 60 },
      });

      expect(transport.getBackoffTime(0, '5')).toBe(5);
      expect(transport.getBackoffTime(0, '120')).toBe(60);

      const wait = transport.getBackoffTime(3, null);
      expect(wait).toBeGreaterThanOrEqual(7.2);
      expect(wait).toBeLessThanOrEqual(8.8);
    });
  });

  describe('error mapping', () => {
    it('maps status codes to typed errors', async () => {
      const mock = new MockFetch().enqueue(
        { status: 401, body: { error: 'Invalid authorization signature' } },
        { status: 404, body: { code: 'not_found', message: 'Wallet not found' }, headers: { 'x-request-id': 'req-1' } },
        { status: 400, body: 'not json' }
      );
      const transport = createTransport(mock);

      const unauthorized = await transport.request('POST', '/v1/x').catch((e: unknown) => e);
      const missing = await transport.request('GET', '/v1/x').catch((e: unknown) => e);
      const invalid = await transport.request('GET', '/v1/x').catch((e: unknown) => e);

      expect(unauthorized).toBeInstanceOf(AuthenticationError);
      expect(unauthorized instanceof Error ? unauthorized.message : '').toBe(
        '[UNKNOWN_ERROR] Invalid authorization signature'
      );

      expect(missing).toBeInstanceOf(NotFoundError);
      if (missing instanceof NotFoundError) {
        expect(missing.code).toBe('not_found');
        expect(missing.requestId).toBe('req-1');
        expect(missing.message).toBe('[not_found] Wallet not found');
      }

      expect(invalid).toBeInstanceOf(ValidationError);
      expect(invalid instanceof Error ? invalid.message : '').toBe('[UNKNOWN_ERROR] HTTP 400');
    });

    it('logs authorization failures without secrets', async () => {
      const lines: string[] = [];
      const logger = new ConsoleLogger({ level: LogLevel.Error, format: 'json', write: (line) => lines.push(line) });
      const mock = new MockFetch().enqueue({ status: 401, body: { error: 'bad signature' } });
      const context = AuthorizationContext.builder().addSignature('secret-sig').build();

      await createTransport(mock, { logger, authorizationContext: context })
        .request('POST', '/v1/x', { body: {} })
        .catch(() => undefined);

      expect(lines).toHaveLength(1);
      const entry: unknown = JSON.parse(lines[0]);
      expect(entry).toMatchObject({
        level: 'ERROR',
        message: 'Authorization error from API',
        method: 'POST',
        url: 'https://api.example/v1/x',
        status: 401,
      });
      expect(lines[0].includes('secret-sig')).toBe(false);
    });
  });
});
