/**
 * Regulations Module Types
 * Options and results of the crawl and verify commands
 */

import type { PageFetcher } from '../../lib/scraping/scraping.types';

// ============================================================================
// Options
// ============================================================================

export interface ICrawlOptions {
  /**
   * Continue after the last record of a previous run
   */
  resume?: boolean;
  workers?: number;

  /**
   * Retries per page after the first attempt
   */
  maxRetries?: number;
  outputDir?: string;

  /**
   * Replaces the HTTP fetcher, e.g. with an in-process site
   */
  fetcher?: PageFetcher;
  baseUrl?: string;
}

export interface IVerifyOptions {
  samples?: number;
  outputDir?: string;
  fetcher?: PageFetcher;
  baseUrl?: string;
  random?: () => number;
}

// ============================================================================
// Results
// ============================================================================

export interface ICrawlSummary {
  jurisdiction: string;
  rootUrl: string;
  rootFailed: boolean;
  sectionsFound: number;
  sectionsQueued: number;
  sectionsProcessed: number;

  /**
   * Excluded sections plus those finished before the resume cursor
   */
  sectionsSkipped: number;
  recordsWritten: number;
  failuresLogged: number;
  duplicatesSuppressed: number;
  excludedNodes: number;
  malformedLinks: number;
  depthLimitHits: number;
  pagesFetched: number;
  resumeCursor: number[] | null;
  outputPath: string;
  failureLogPath: string;
  elapsedMs: number;
}

// ============================================================================
// Command line
// ============================================================================

export type ICliCommand =
  | {
      command: 'crawl';
      jurisdiction: string;
      resume: boolean;
      threads?: number;
      maxRetries?: number;
      outputDir?: string;
    }
  | {
      command: 'verify';
      jurisdiction: string;
      samples?: number;
      outputDir?: string;
    }
  | { command: 'help' };
