/**
 * Crawl Run Context
 * State shared by every worker of one run: the visited set, the output sink
 * and the failure log, all behind one exclusion lock
 */

import pLimit from 'p-limit';
import { ContentExtractor } from '../markup/content-extractor';
import { FailureLog } from '../storage/failure-log';
import { RecordWriter } from '../storage/storage.types';
import { CrawlingStatisticsTracker } from './crawling-statistics';
import { CrawlRecord, LeafVisit, LexPath, TraversalSink, VisitRegistry } from './crawling.types';
import { VisitedSet } from './visited-set';

export interface CrawlRunContextOptions {
  jurisdiction: string;
  sink: RecordWriter<CrawlRecord>;
  failureLog: FailureLog;
}

export class CrawlRunContext implements TraversalSink, VisitRegistry {
  readonly visited = new VisitedSet();
  readonly stats = new CrawlingStatisticsTracker();
  private readonly lock = pLimit(1);
  private readonly extractor = new ContentExtractor();
  private recordsWritten = 0;

  constructor(private readonly options: CrawlRunContextOptions) {}

  markVisited(url: string): Promise<boolean> {
    return this.lock(() => this.visited.add(url));
  }

  /**
   * Extract the leaf outside the lock, write it inside
   */
  async onLeaf(leaf: LeafVisit): Promise<void> {
    const record = this.toRecord(leaf);
    await this.lock(() => this.options.sink.write(record));
    this.recordsWritten++;
  }

  async onFailure(entry: { url: string; path: LexPath | null; error: string }): Promise<void> {
    await this.lock(() =>
      this.options.failureLog.append({
        url: entry.url,
        lex_path: entry.path ? [...entry.path] : null,
        error: entry.error,
      })
    );
  }

  get written(): number {
    return this.recordsWritten;
  }

  get failuresLogged(): number {
    return this.options.failureLog.count;
  }

  get failureLogPath(): string {
    return this.options.failureLog.filePath;
  }

  get outputPath(): string {
    return this.options.sink.filePath;
  }

  close(): Promise<void> {
    return this.lock(() => this.options.sink.close());
  }

  private toRecord(leaf: LeafVisit): CrawlRecord {
    const content = this.extractor.extractLeaf(leaf.document);
    return {
      url: leaf.url,
      state: this.options.jurisdiction,
      path: content.breadcrumb,
      title: content.title,
      univ_cite: content.universalCitation,
      citation: content.citation,
      content: content.body,
      lex_path: [...leaf.path],
    };
  }
}
