/**
 * Scraping Types
 * Page fetcher contract shared by the crawler and the verifier
 */

import type { FetchFailure } from './errors';

export interface FetchedPage {
  /**
   * Requested URL
   */
  url: string;

  /**
   * URL after redirects
   */
  finalUrl: string;

  statusCode: number;
  html: string;
}

export type FetchOutcome = { ok: true; page: FetchedPage } | { ok: false; failure: FetchFailure };

/**
 * Retrieves raw markup. Retries transient failures internally and
 * resolves to a definitive outcome; it never rejects.
 */
export interface PageFetcher {
  fetch(url: string, maxAttempts: number, baseDelayMs: number): Promise<FetchOutcome>;
}

/**
 * The slice of a fetch Response the HTTP fetcher reads
 */
export interface HttpResponseLike {
  status: number;
  url: string;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
}

export type HttpRequester = (url: string, init: RequestInit) => Promise<HttpResponseLike>;
