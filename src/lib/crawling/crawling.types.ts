/**
 * Crawling Types
 * Type definitions for the resumable tree crawler
 */

import type { FetchFailure } from '../scraping/errors';
import type { MarkupDocument } from '../markup/markup-document';
import type { NodeLink } from '../markup/markup.types';

/**
 * Sibling index chosen at each depth from the root to a node
 */
export type LexPath = readonly number[];

/**
 * Traversal settings fixed for a run
 */
export interface TraversalConfig {
  /**
   * Origin the site's relative hrefs resolve against
   */
  siteBaseUrl: string;

  /**
   * Descent stops below branches whose path is this long
   */
  maxDepth: number;

  /**
   * Attempts per page, including the first
   */
  maxAttempts: number;

  /**
   * Backoff base between attempts
   */
  baseDelayMs: number;

  /**
   * Marks repealed or reserved nodes
   */
  isExcluded: (text: string) => boolean;
}

/**
 * One persisted leaf, one JSON object per line
 */
export interface CrawlRecord {
  url: string;
  state: string;
  path: string;
  title: string;
  univ_cite: boolean;
  citation: string | null;
  content: string;
  lex_path: number[];
}

export interface FailureLogEntry {
  url: string;
  lex_path: number[] | null;
  error: string;
  timestamp: string;
}

/**
 * A top-level section handed to a worker
 */
export interface CrawlJob {
  url: string;
  path: LexPath;
  resumeCursor?: LexPath;
  label: string;
}

/**
 * A page after fetch-and-classify
 */
export type ClassifiedNode =
  | {
      kind: 'branch';
      url: string;
      title: string;
      links: NodeLink[];
    }
  | {
      kind: 'leaf';
      url: string;
      title: string;
      document: MarkupDocument;
    }
  | {
      kind: 'excluded';
      url: string;
      title: string;
    }
  | {
      kind: 'failed';
      url: string;
      failure: FetchFailure;
    };

/**
 * A leaf reached by the traversal. The document is handed over as fetched;
 * content extraction belongs to the sink.
 */
export interface LeafVisit {
  url: string;
  path: LexPath;
  document: MarkupDocument;
}

/**
 * Receives what the traversal finds. Calls may overlap across workers.
 */
export interface TraversalSink {
  onLeaf(leaf: LeafVisit): Promise<void>;
  onFailure(entry: { url: string; path: LexPath | null; error: string }): Promise<void>;
}

/**
 * Guards dispatch so a URL is fetched at most once per run
 */
export interface VisitRegistry {
  /**
   * True when the URL was not yet visited; it is marked visited either way
   */
  markVisited(url: string): Promise<boolean>;
}

/**
 * Crawling statistics interface
 */
export interface CrawlingStatistics {
  /**
   * Pages fetched and classified
   */
  pagesFetched: number;

  /**
   * Leaves handed to the sink
   */
  leavesEmitted: number;

  /**
   * Nodes skipped for a repealed or reserved marker
   */
  excludedSkipped: number;

  /**
   * Links skipped for a doubled path separator
   */
  malformedSkipped: number;

  /**
   * URLs reached again through another path
   */
  duplicatesDetected: number;

  /**
   * Children and leaves pruned by the resume cursor
   */
  resumeSkipped: number;

  /**
   * Branches whose children were cut off by the depth guard
   */
  depthLimitHits: number;

  /**
   * Nodes that could not be processed
   */
  failures: number;

  /**
   * Longest path reached
   */
  depthReached: number;

  /**
   * Total crawling time in milliseconds
   */
  totalTime: number;
}
