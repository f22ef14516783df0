/**
 * HTTP Page Fetcher Tests
 * Pacing, backoff, Retry-After handling and failure classification
 */

import { muteConsole } from '../../../__tests__/helpers/fixtures';
import { FetchFailureKind } from '../errors';
import { HttpPageFetcher } from '../page-fetcher';
import { HttpResponseLike } from '../scraping.types';

type Reply = { status: number; body?: string; retryAfter?: string } | Error;

function response(reply: { status: number; body?: string; retryAfter?: string }, url: string): HttpResponseLike {
  return {
    status: reply.status,
    url,
    headers: {
      get: (name: string) => (name.toLowerCase() === 'retry-after' ? reply.retryAfter ?? null : null),
    },
    text: async () => reply.body ?? '',
  };
}

function createFetcher(replies: Reply[], overrides: { maxDelayMs?: number } = {}) {
  const sleeps: number[] = [];
  const requests: Array<{ url: string; init: RequestInit }> = [];
  const queue = [...replies];

  const fetcher = new HttpPageFetcher({
    requestDelayMs: 10,
    maxDelayMs: overrides.maxDelayMs ?? 1000,
    timeoutMs: 5000,
    userAgent: 'test-agent',
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    requester: async (url, init) => {
      requests.push({ url, init });
      const reply = queue.shift();
      if (!reply) {
        throw new Error('no reply queued');
      }
      if (reply instanceof Error) {
        throw reply;
      }
      return response(reply, url);
    },
  });

  return { fetcher, sleeps, requests };
}

describe('HttpPageFetcher', () => {
  beforeEach(() => {
    muteConsole('error');
    muteConsole('log');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should return the page after a paced request', async () => {
    const { fetcher, sleeps, requests } = createFetcher([{ status: 200, body: '<h1>Rule</h1>' }]);

    const outcome = await fetcher.fetch('https://regs.test/a/', 3, 100);

    expect(outcome).toEqual({
      ok: true,
      page: { url: 'https://regs.test/a/', finalUrl: 'https://regs.test/a/', statusCode: 200, html: '<h1>Rule</h1>' },
    });
    expect(sleeps).toEqual([10]);
    expect(requests).toHaveLength(1);
  });

  it('should send browser-like headers with the configured user agent', async () => {
    const { fetcher, requests } = createFetcher([{ status: 200 }]);

    await fetcher.fetch('https://regs.test/a/', 1, 100);

    expect(requests[0].init.method).toBe('GET');
    expect(requests[0].init.headers).toMatchObject({ 'User-Agent': 'test-agent' });
  });

  it('should back off and retry a server error', async () => {
    const { fetcher, sleeps } = createFetcher([{ status: 503 }, { status: 200, body: 'ok' }]);

    const outcome = await fetcher.fetch('https://regs.test/a/', 3, 100);

    expect(outcome.ok).toBe(true);
    expect(sleeps).toEqual([10, 100, 10]);
  });

  it('should double the backoff up to the cap', async () => {
    const { fetcher, sleeps } = createFetcher([{ status: 500 }, { status: 500 }, { status: 500 }], {
      maxDelayMs: 150,
    });

    const outcome = await fetcher.fetch('https://regs.test/a/', 3, 100);

    expect(outcome.ok).toBe(false);
    expect(sleeps).toEqual([10, 100, 10, 150, 10]);
  });

  it('should fail at once on a missing page', async () => {
    const { fetcher, sleeps, requests } = createFetcher([{ status: 404 }]);

    const outcome = await fetcher.fetch('https://regs.test/gone/', 3, 100);

    expect(outcome).toEqual({
      ok: false,
      failure: {
        kind: FetchFailureKind.NOT_FOUND,
        message: "HTTP 404 - NOT FOUND: Page doesn't exist",
        statusCode: 404,
        retryable: false,
      },
    });
    expect(requests).toHaveLength(1);
    expect(sleeps).toEqual([10]);
  });

  it('should wait the Retry-After hint before the next attempt', async () => {
    const { fetcher, sleeps } = createFetcher([{ status: 429, retryAfter: '7' }, { status: 200 }]);

    const outcome = await fetcher.fetch('https://regs.test/a/', 2, 100);

    expect(outcome.ok).toBe(true);
    expect(sleeps).toEqual([10, 7000, 10]);
  });

  it('should honour the hint even when no attempts remain', async () => {
    const { fetcher, sleeps } = createFetcher([{ status: 429, retryAfter: '3' }]);

    const outcome = await fetcher.fetch('https://regs.test/a/', 1, 100);

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.failure.kind).toBe(FetchFailureKind.RATE_LIMITED);
      expect(outcome.failure.retryAfterMs).toBe(3000);
    }
    expect(sleeps).toEqual([10, 3000]);
  });

  it('should retry connection errors and report the last one', async () => {
    const { fetcher, sleeps } = createFetcher([new Error('ECONNRESET'), new Error('ECONNRESET')]);

    const outcome = await fetcher.fetch('https://regs.test/a/', 2, 100);

    expect(outcome).toEqual({
      ok: false,
      failure: { kind: FetchFailureKind.NETWORK_ERROR, message: 'ECONNRESET', retryable: true },
    });
    expect(sleeps).toEqual([10, 100, 10]);
  });

  it('should treat an aborted request as a timeout', async () => {
    const abort = new Error('The operation was aborted');
    abort.name = 'AbortError';
    const { fetcher } = createFetcher([abort]);

    const outcome = await fetcher.fetch('https://regs.test/slow/', 1, 100);

    expect(outcome).toEqual({
      ok: false,
      failure: { kind: FetchFailureKind.TIMEOUT, message: 'Request timed out', retryable: true },
    });
  });

  it('should build its options from a fetch policy', async () => {
    const fetcher = HttpPageFetcher.fromPolicy(
      { maxAttempts: 4, baseDelayMs: 100, maxDelayMs: 1000, requestDelayMs: 0, timeoutMs: 5000 },
      { requester: async (url) => response({ status: 200, body: 'policy' }, url) }
    );

    const outcome = await fetcher.fetch('https://regs.test/a/', 1, 100);

    expect(outcome.ok && outcome.page.html).toBe('policy');
  });
});
