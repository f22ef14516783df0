/**
 * Scraping Error Handling
 * Fetch failure taxonomy, retry guidance and crawl error classes
 */

export enum FetchFailureKind {
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  RATE_LIMITED = 'RATE_LIMITED',
  NOT_FOUND = 'NOT_FOUND',
  FORBIDDEN = 'FORBIDDEN',
  SERVER_ERROR = 'SERVER_ERROR',
  HTTP_ERROR = 'HTTP_ERROR',
}

export interface FetchFailure {
  kind: FetchFailureKind;
  message: string;
  statusCode?: number;
  retryable: boolean;
  retryAfterMs?: number; // server-provided delay (429 only)
}

/**
 * Retry policy applied inside the page fetcher
 */
export interface FetchPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  requestDelayMs: number;
  timeoutMs: number;
}

/**
 * Default wait when a rate-limit hint cannot be parsed
 */
export const DEFAULT_RATE_LIMIT_WAIT_MS = 60_000;

/**
 * Classify a non-200 HTTP status
 */
export function classifyStatus(statusCode: number, retryAfterMs?: number): FetchFailure {
  if (statusCode === 429) {
    return {
      kind: FetchFailureKind.RATE_LIMITED,
      message: `HTTP 429 - RATE LIMITED: Too many requests`,
      statusCode,
      retryable: true,
      retryAfterMs,
    };
  }

  if (statusCode === 404) {
    return {
      kind: FetchFailureKind.NOT_FOUND,
      message: `HTTP 404 - NOT FOUND: Page doesn't exist`,
      statusCode,
      retryable: false,
    };
  }

  if (statusCode === 401 || statusCode === 403) {
    return {
      kind: FetchFailureKind.FORBIDDEN,
      message: `HTTP ${statusCode} - FORBIDDEN: Access denied`,
      statusCode,
      retryable: false,
    };
  }

  if (statusCode >= 500) {
    return {
      kind: FetchFailureKind.SERVER_ERROR,
      message: `HTTP ${statusCode} - SERVER ERROR`,
      statusCode,
      retryable: true,
    };
  }

  return {
    kind: FetchFailureKind.HTTP_ERROR,
    message: `HTTP ${statusCode}`,
    statusCode,
    retryable: false,
  };
}

/**
 * Classify an error thrown by the HTTP client
 */
export function classifyFetchError(error: unknown): FetchFailure {
  const name = error instanceof Error ? error.name : '';
  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error && error.cause instanceof Error ? error.cause.message : '';

  if (
    name === 'AbortError' ||
    name === 'TimeoutError' ||
    message.includes('timeout') ||
    message.includes('ETIMEDOUT') ||
    cause.includes('ETIMEDOUT')
  ) {
    return {
      kind: FetchFailureKind.TIMEOUT,
      message: 'Request timed out',
      retryable: true,
    };
  }

  return {
    kind: FetchFailureKind.NETWORK_ERROR,
    message: cause ? `${message}: ${cause}` : message || 'Network connection failed',
    retryable: true,
  };
}

/**
 * Exponential backoff: base * 2^(attempt-1), never below base nor above the cap
 */
export function calculateRetryDelay(attempt: number, policy: Pick<FetchPolicy, 'baseDelayMs' | 'maxDelayMs'>): number {
  const exponentialDelay = policy.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  return Math.min(Math.max(exponentialDelay, policy.baseDelayMs), policy.maxDelayMs);
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP-date) into milliseconds
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (header === null) {
    return undefined;
  }

  const trimmed = header.trim();
  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10) * 1000;
  }

  const date = Date.parse(trimmed);
  if (!Number.isNaN(date)) {
    return Math.max(0, date - now);
  }

  return DEFAULT_RATE_LIMIT_WAIT_MS;
}

export class CrawlError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * An element the page layout promises is missing
 */
export class StructuralParseError extends CrawlError {
  constructor(
    public readonly url: string,
    public readonly element: string
  ) {
    super(`Missing expected element "${element}" on ${url}`, 'STRUCTURAL_PARSE');
  }
}

/**
 * Start-up failure that aborts the run
 */
export class CrawlSetupError extends CrawlError {
  constructor(message: string) {
    super(message, 'SETUP');
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
