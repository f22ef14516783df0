/**
 * Content Spot Check
 * Re-fetches sampled records and fuzzy-matches the stored content against the live page
 */

import { CrawlRecord } from '../crawling/crawling.types';
import { ContentExtractor } from '../markup/content-extractor';
import { MarkupDocument } from '../markup/markup-document';
import { SiteLayout } from '../markup/markup.types';
import { PageFetcher } from '../scraping/scraping.types';
import { ContentMatch, ContentMatchThresholds, SpotCheckFailure, SpotCheckResult } from './verification.types';

/**
 * Whitespace removed and lowercased, so markup-induced spacing never matters
 */
export function normalizeForComparison(text: string): string {
  return text.replace(/\s+/g, '').toLowerCase();
}

/**
 * Chunk-based substring match of stored content against page text.
 * Both arguments must already be normalized.
 */
export function matchContent(stored: string, page: string, thresholds: ContentMatchThresholds): ContentMatch {
  if (stored.length <= thresholds.shortLimit) {
    if (page.includes(stored)) {
      return { matched: true, detail: 'exact match' };
    }

    const size = thresholds.shortChunkSize;
    let matchedChars = 0;
    for (let i = 0; i < stored.length - size; i += size) {
      if (page.includes(stored.slice(i, i + size))) {
        matchedChars += size;
      }
    }

    const matched = matchedChars >= stored.length * thresholds.shortMatchRatio;
    return { matched, detail: `${matchedChars}/${stored.length} chars matched` };
  }

  const { chunkCount, chunkSize } = thresholds;
  const step = chunkCount > 1 ? Math.floor((stored.length - chunkSize) / (chunkCount - 1)) : 0;
  const chunks: string[] = [];

  for (let i = 0; i < chunkCount; i++) {
    const start = i * step;
    if (start + chunkSize <= stored.length) {
      chunks.push(stored.slice(start, start + chunkSize));
    }
  }

  const found = chunks.filter((chunk) => page.includes(chunk)).length;
  const required = Math.max(1, Math.floor(chunks.length * thresholds.chunkMatchRatio));

  return {
    matched: found >= required,
    detail: `${found}/${chunks.length} chunks found, need ${required}`,
  };
}

/**
 * Up to `count` distinct items chosen with the given random source
 */
export function sampleRecords<T>(items: T[], count: number, random: () => number = Math.random): T[] {
  const pool = [...items];
  const size = Math.min(count, pool.length);

  for (let i = 0; i < size; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }

  return pool.slice(0, size);
}

export interface SpotCheckOptions {
  fetcher: PageFetcher;
  layout: SiteLayout;
  thresholds: ContentMatchThresholds;
  maxAttempts: number;
  baseDelayMs: number;
  random?: () => number;
}

export class ContentSpotChecker {
  private readonly extractor = new ContentExtractor();

  constructor(private readonly options: SpotCheckOptions) {}

  async check(records: CrawlRecord[], samples: number): Promise<SpotCheckResult> {
    const chosen = sampleRecords(records, samples, this.options.random);
    const failures: SpotCheckFailure[] = [];
    let passed = 0;

    for (const record of chosen) {
      const reason = await this.checkRecord(record);
      if (reason === null) {
        passed++;
      } else {
        failures.push({ url: record.url, reason });
      }
    }

    return { checked: chosen.length, passed, failed: failures.length, failures };
  }

  /**
   * Null when the record passes, otherwise why it failed
   */
  async checkRecord(record: CrawlRecord): Promise<string | null> {
    const { thresholds } = this.options;

    if (record.content.length < thresholds.minStoredLength) {
      return `Content too short (${record.content.length} chars)`;
    }

    const outcome = await this.options.fetcher.fetch(record.url, this.options.maxAttempts, this.options.baseDelayMs);
    if (!outcome.ok) {
      return `Failed to fetch (${outcome.failure.message})`;
    }

    const document = MarkupDocument.load(outcome.page.html, record.url, this.options.layout);
    const pageText = this.extractor.extractComparableText(document);
    if (pageText === null) {
      return 'No main-content found on page';
    }

    const match = matchContent(normalizeForComparison(record.content), normalizeForComparison(pageText), thresholds);
    return match.matched ? null : `Content mismatch (${match.detail})`;
  }
}
