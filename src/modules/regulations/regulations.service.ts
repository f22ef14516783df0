/**
 * Regulations Service
 * Crawl and verification runs for one jurisdiction
 */

import * as path from 'path';
import { env } from '../../config/env';
import {
  createExclusionPredicate,
  CrawlRecord,
  CrawlRunContext,
  CrawlRunner,
  CrawlRunResult,
  ResumeController,
  TraversalConfig,
} from '../../lib/crawling';
import { createSiteLayout } from '../../lib/markup';
import { CrawlSetupError, FetchPolicy, HttpPageFetcher, PageFetcher } from '../../lib/scraping';
import { FailureLog, failureLogPath, isFileNotFound, JsonlRecordSink, readRecords } from '../../lib/storage';
import { ContentMatchThresholds, VerificationReport, Verifier } from '../../lib/validation';
import { jurisdictionRootUrl, resolveJurisdiction } from '../jurisdictions/jurisdictions';
import { ICrawlOptions, ICrawlSummary, IVerifyOptions } from './regulations.types';

export function outputPathFor(outputDir: string, jurisdiction: string): string {
  return path.join(outputDir, `${jurisdiction}.jsonl`);
}

export function buildFetchPolicy(maxRetries: number = env.MAX_RETRIES): FetchPolicy {
  return {
    maxAttempts: maxRetries + 1,
    baseDelayMs: env.RETRY_BACKOFF_BASE,
    maxDelayMs: env.RETRY_BACKOFF_MAX,
    requestDelayMs: env.REQUEST_DELAY,
    timeoutMs: env.REQUEST_TIMEOUT,
  };
}

export function buildTraversalConfig(siteBaseUrl: string, policy: FetchPolicy): TraversalConfig {
  return {
    siteBaseUrl,
    maxDepth: env.MAX_DEPTH,
    maxAttempts: policy.maxAttempts,
    baseDelayMs: policy.baseDelayMs,
    isExcluded: createExclusionPredicate(),
  };
}

export function buildContentThresholds(): ContentMatchThresholds {
  return {
    minStoredLength: env.CONTENT_MIN_LENGTH,
    shortLimit: env.CONTENT_SHORT_LIMIT,
    shortChunkSize: env.CONTENT_SHORT_CHUNK_SIZE,
    shortMatchRatio: env.CONTENT_MATCH_SHORT_RATIO,
    chunkCount: env.CONTENT_CHUNK_COUNT,
    chunkSize: env.CONTENT_CHUNK_SIZE,
    chunkMatchRatio: env.CONTENT_MATCH_CHUNK_RATIO,
  };
}

export class RegulationsService {
  /**
   * Crawl one jurisdiction to `<outputDir>/<CODE>.jsonl`. Only an unknown
   * jurisdiction or an output file that cannot be opened rejects; node
   * failures end up in the failure log and the summary.
   */
  async crawlJurisdiction(code: string, options: ICrawlOptions = {}): Promise<ICrawlSummary> {
    const startTime = Date.now();
    const jurisdiction = resolveJurisdiction(code);
    const baseUrl = options.baseUrl ?? env.REGULATIONS_BASE_URL;
    const rootUrl = jurisdictionRootUrl(jurisdiction, baseUrl);
    const outputDir = options.outputDir ?? env.OUTPUT_DIR;
    const outputPath = outputPathFor(outputDir, jurisdiction.code);
    const workerCount = Math.max(1, options.workers ?? env.WORKER_COUNT);

    const policy = buildFetchPolicy(options.maxRetries ?? env.MAX_RETRIES);
    const config = buildTraversalConfig(baseUrl, policy);
    const fetcher = options.fetcher ?? this.createFetcher(policy);

    const resume = await ResumeController.fromOutput(outputPath, options.resume ?? false);
    const sink = await JsonlRecordSink.open<CrawlRecord>(outputPath, resume.sinkMode);
    const context = new CrawlRunContext({
      jurisdiction: jurisdiction.code,
      sink,
      failureLog: new FailureLog(failureLogPath(outputDir, jurisdiction.code)),
    });

    console.log(`Starting crawl for ${jurisdiction.code} (${jurisdiction.slug})`);
    console.log(`Base URL: ${rootUrl}`);
    console.log(`Using ${workerCount} workers, max retries ${policy.maxAttempts - 1}`);

    const runner = new CrawlRunner({
      rootUrl,
      workerCount,
      config,
      layout: createSiteLayout(env.NAVIGATION_SELECTOR),
      fetcher,
      context,
      resume,
    });

    let result: CrawlRunResult;
    try {
      result = await runner.run();
    } finally {
      await context.close();
    }

    const stats = context.stats.getStatistics();

    return {
      jurisdiction: jurisdiction.code,
      rootUrl,
      rootFailed: result.rootFailed,
      sectionsFound: result.sectionsFound,
      sectionsQueued: result.sectionsQueued,
      sectionsProcessed: result.sectionsProcessed,
      sectionsSkipped: result.sectionsExcluded + result.sectionsResumed,
      recordsWritten: context.written,
      failuresLogged: context.failuresLogged,
      duplicatesSuppressed: stats.duplicatesDetected,
      excludedNodes: stats.excludedSkipped,
      malformedLinks: stats.malformedSkipped,
      depthLimitHits: stats.depthLimitHits,
      pagesFetched: stats.pagesFetched,
      resumeCursor: resume.cursor ? [...resume.cursor] : null,
      outputPath,
      failureLogPath: context.failureLogPath,
      elapsedMs: Date.now() - startTime,
    };
  }

  /**
   * Verify `<outputDir>/<CODE>.jsonl` against the live site
   */
  async verifyJurisdiction(code: string, options: IVerifyOptions = {}): Promise<VerificationReport> {
    const jurisdiction = resolveJurisdiction(code);
    const baseUrl = options.baseUrl ?? env.REGULATIONS_BASE_URL;
    const outputPath = outputPathFor(options.outputDir ?? env.OUTPUT_DIR, jurisdiction.code);

    let records: CrawlRecord[];
    try {
      records = await readRecords(outputPath);
    } catch (error) {
      if (isFileNotFound(error)) {
        throw new CrawlSetupError(`No crawl output at ${outputPath}`);
      }
      throw error;
    }
    console.log(`Loaded ${records.length} records from ${outputPath}`);

    const policy = buildFetchPolicy();
    const verifier = new Verifier({
      rootUrl: jurisdictionRootUrl(jurisdiction, baseUrl),
      config: buildTraversalConfig(baseUrl, policy),
      layout: createSiteLayout(env.NAVIGATION_SELECTOR),
      fetcher: options.fetcher ?? this.createFetcher(policy),
      thresholds: buildContentThresholds(),
      samples: options.samples ?? env.SPOT_CHECK_SAMPLES,
      spotCheckAttempts: env.SPOT_CHECK_MAX_RETRIES + 1,
      random: options.random,
    });

    return verifier.verify(jurisdiction.code, records);
  }

  private createFetcher(policy: FetchPolicy): PageFetcher {
    return HttpPageFetcher.fromPolicy(policy, { userAgent: env.USER_AGENT });
  }
}

export const regulationsService = new RegulationsService();
