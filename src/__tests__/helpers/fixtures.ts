/**
 * Test Fixtures
 * Reusable records and traversal settings
 */

import { CrawlRecord, TraversalConfig } from '../../lib/crawling/crawling.types';
import { createExclusionPredicate } from '../../lib/crawling/exclusion';
import { ContentMatchThresholds } from '../../lib/validation/verification.types';
import { FAKE_BASE_URL } from './fake-site';

export const testTraversalConfig: TraversalConfig = {
  siteBaseUrl: FAKE_BASE_URL,
  maxDepth: 20,
  maxAttempts: 1,
  baseDelayMs: 0,
  isExcluded: createExclusionPredicate(),
};

export const testThresholds: ContentMatchThresholds = {
  minStoredLength: 50,
  shortLimit: 500,
  shortChunkSize: 50,
  shortMatchRatio: 0.8,
  chunkCount: 20,
  chunkSize: 100,
  chunkMatchRatio: 0.6,
};

export function makeRecord(lexPath: number[], overrides: Partial<CrawlRecord> = {}): CrawlRecord {
  return {
    url: `${FAKE_BASE_URL}/rule-${lexPath.join('-')}`,
    state: 'MT',
    path: 'Test Administrative Code›Title 1',
    title: `Rule ${lexPath.join('.')}`,
    univ_cite: false,
    citation: null,
    content: `Text of rule ${lexPath.join('.')}`,
    lex_path: lexPath,
    ...overrides,
  };
}

/**
 * Silence a console method for the current test and expose its calls
 */
export function muteConsole(method: 'log' | 'warn' | 'error'): jest.SpyInstance {
  return jest.spyOn(console, method).mockImplementation(() => undefined);
}
