/**
 * Verification Types
 * Type definitions for the dataset verification pass
 */

/**
 * Fuzzy content-match tuning. Empirical values; a pass means the stored
 * content probably matches the page, nothing stronger.
 */
export interface ContentMatchThresholds {
  /**
   * Stored content shorter than this fails without a fetch
   */
  minStoredLength: number;

  /**
   * Normalized content up to this length is matched as a whole
   */
  shortLimit: number;
  shortChunkSize: number;
  shortMatchRatio: number;

  /**
   * Longer content is sampled as evenly spaced chunks
   */
  chunkCount: number;
  chunkSize: number;
  chunkMatchRatio: number;
}

/**
 * A top-level section as listed on the live root page
 */
export interface SectionRef {
  name: string;
  url: string;

  /**
   * Document position on the root page; the first element of its records' lex_path
   */
  index: number;
}

export interface CompletenessResult {
  complete: boolean;
  missing: string[];
  extra: string[];
}

export interface OrderIssue {
  /**
   * Position of the later record of the pair within the section
   */
  index: number;
  previous: number[];
  current: number[];
}

export interface OrderResult {
  ordered: boolean;
  issues: OrderIssue[];
}

export interface ContentMatch {
  matched: boolean;
  detail: string;
}

export interface SpotCheckFailure {
  url: string;
  reason: string;
}

export interface SpotCheckResult {
  checked: number;
  passed: number;
  failed: number;
  failures: SpotCheckFailure[];
}

export interface SectionReport {
  section: SectionRef;
  expectedCount: number;
  recordCount: number;

  /**
   * Nodes the live walk could not fetch; their leaves are absent from the expected set
   */
  walkFailures: number;
  completeness: CompletenessResult;
  order: OrderResult;
  spotCheck: SpotCheckResult;

  /**
   * Complete and ordered; spot checks are advisory
   */
  valid: boolean;
}

export interface VerificationTotals {
  sections: number;
  complete: number;
  incomplete: number;
  ordered: number;
  unordered: number;
  missing: number;
  extra: number;
  spotChecksPassed: number;
  spotChecksFailed: number;
}

export interface VerificationReport {
  jurisdiction: string;
  rootUrl: string;
  recordsLoaded: number;
  rootFailed: boolean;
  sections: SectionReport[];
  totals: VerificationTotals;
  valid: boolean;
}
