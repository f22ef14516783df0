/**
 * HTTP Page Fetcher
 * Paced requests with exponential backoff and Retry-After handling
 */

import {
  calculateRetryDelay,
  classifyFetchError,
  classifyStatus,
  FetchFailure,
  FetchFailureKind,
  FetchPolicy,
  parseRetryAfter,
} from './errors';
import { getSessionHeaders } from './headers';
import type { FetchOutcome, HttpRequester, PageFetcher } from './scraping.types';

export interface HttpPageFetcherOptions {
  requestDelayMs: number;
  maxDelayMs: number;
  timeoutMs: number;
  userAgent?: string;
  requester?: HttpRequester;
  sleep?: (ms: number) => Promise<void>;
}

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class HttpPageFetcher implements PageFetcher {
  private readonly headers: Record<string, string>;
  private readonly requester: HttpRequester;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: HttpPageFetcherOptions) {
    this.headers = getSessionHeaders(options.userAgent);
    this.requester = options.requester ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? wait;
  }

  static fromPolicy(policy: FetchPolicy, overrides: Partial<HttpPageFetcherOptions> = {}): HttpPageFetcher {
    return new HttpPageFetcher({
      requestDelayMs: policy.requestDelayMs,
      maxDelayMs: policy.maxDelayMs,
      timeoutMs: policy.timeoutMs,
      ...overrides,
    });
  }

  async fetch(url: string, maxAttempts: number, baseDelayMs: number): Promise<FetchOutcome> {
    const attempts = Math.max(1, maxAttempts);
    let lastFailure: FetchFailure | undefined;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      if (this.options.requestDelayMs > 0) {
        await this.sleep(this.options.requestDelayMs);
      }

      const outcome = await this.attempt(url);
      if (outcome.ok) {
        return outcome;
      }

      const failure = outcome.failure;
      lastFailure = failure;
      console.error(`${failure.message} for ${url} (attempt ${attempt}/${attempts})`);

      const finalAttempt = attempt >= attempts || !failure.retryable;
      const hintMs = failure.kind === FetchFailureKind.RATE_LIMITED ? failure.retryAfterMs : undefined;

      if (hintMs !== undefined) {
        console.log(`Rate limited. Waiting ${Math.round(hintMs / 1000)}s as requested by server...`);
      }

      if (finalAttempt) {
        if (hintMs !== undefined && hintMs > 0) {
          await this.sleep(hintMs);
        }
        break;
      }

      const backoffMs = calculateRetryDelay(attempt, { baseDelayMs, maxDelayMs: this.options.maxDelayMs });
      await this.sleep(Math.max(backoffMs, hintMs ?? 0));
    }

    return {
      ok: false,
      failure: lastFailure ?? classifyFetchError(new Error(`Failed to fetch ${url}`)),
    };
  }

  private async attempt(url: string): Promise<FetchOutcome> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await this.requester(url, {
        method: 'GET',
        headers: this.headers,
        redirect: 'follow',
        signal: controller.signal,
      });

      if (response.status !== 200) {
        const retryAfterMs =
          response.status === 429 ? parseRetryAfter(response.headers.get('retry-after')) : undefined;
        return { ok: false, failure: classifyStatus(response.status, retryAfterMs) };
      }

      const html = await response.text();
      return {
        ok: true,
        page: {
          url,
          finalUrl: response.url || url,
          statusCode: response.status,
          html,
        },
      };
    } catch (error) {
      return { ok: false, failure: classifyFetchError(error) };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
