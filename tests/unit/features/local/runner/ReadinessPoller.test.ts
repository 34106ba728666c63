/**
 * Tests for the HTTP readiness poller
 */

import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import { setupServer } from 'msw/node';
import { http, HttpResponse } from 'msw';
import {
  ReadinessPoller,
  parseHttpUrl,
} from '../../../../../src/features/local/runner/ReadinessPoller.js';
import {
  InvalidUrlError,
  ReadinessTimeoutError,
} from '../../../../../src/shared/utils/errors.js';
import { createTestLogger } from '../../../../helpers/fakes.js';

const HEALTH_URL = 'http://runner.test/health';

const server = setupServer();

beforeAll(() => server.listen({ onUnhandledRequest: 'error' }));
afterEach(() => server.resetHandlers());
afterAll(() => server.close());

describe('parseHttpUrl', () => {
  it('should accept http and https', () => {
    expect(parseHttpUrl('http://localhost:8080/health').port).toBe('8080');
    expect(parseHttpUrl('https://example.test').protocol).toBe('https:');
  });

  it('should reject other schemes and garbage', () => {
    expect(() => parseHttpUrl('file:///etc/passwd')).toThrow(InvalidUrlError);
    expect(() => parseHttpUrl('not a url')).toThrow(InvalidUrlError);
  });
});

describe('ReadinessPoller', () => {
  it('should keep polling through non-200 answers', async () => {
    let calls = 0;
    server.use(
      http.get(HEALTH_URL, () => {
        calls++;
        return calls <= 4
          ? new HttpResponse('starting', { status: 503 })
          : HttpResponse.json({ metadatabase: { status: 'healthy' } });
      })
    );

    await new ReadinessPoller(createTestLogger()).waitForReady(HEALTH_URL, {
      timeoutMs: 5_000,
      intervalMs: 1,
    });

    expect(calls).toBe(5);
  });

  it('should treat transport errors as not ready', async () => {
    let calls = 0;
    server.use(
      http.get(HEALTH_URL, () => {
        calls++;
        return calls === 1 ? HttpResponse.error() : new HttpResponse('ok', { status: 200 });
      })
    );

    await new ReadinessPoller(createTestLogger()).waitForReady(HEALTH_URL, {
      timeoutMs: 5_000,
      intervalMs: 1,
    });

    expect(calls).toBe(2);
  });

  it('should time out when the endpoint never answers 200', async () => {
    server.use(http.get(HEALTH_URL, () => new HttpResponse('down', { status: 500 })));

    const error = await new ReadinessPoller(createTestLogger())
      .waitForReady(HEALTH_URL, { timeoutMs: 50, intervalMs: 5 })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ReadinessTimeoutError);
    expect(error).toMatchObject({ url: HEALTH_URL, timeoutMs: 50 });
  });

  it('should reject a non-http URL without sending a request', async () => {
    let calls = 0;
    server.use(
      http.all('*', () => {
        calls++;
        return new HttpResponse(null, { status: 200 });
      })
    );

    await expect(
      new ReadinessPoller(createTestLogger()).waitForReady('file:///tmp/health')
    ).rejects.toThrow(InvalidUrlError);
    expect(calls).toBe(0);
  });
});
