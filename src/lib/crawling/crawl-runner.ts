/**
 * Crawl Runner
 * Enumerates the top-level sections once and drains them with a fixed pool of workers
 */

import { SiteLayout } from '../markup/markup.types';
import { PageFetcher } from '../scraping/scraping.types';
import { CrawlRunContext } from './crawl-run.context';
import { CrawlingQueue } from './crawling-queue';
import { TraversalConfig } from './crawling.types';
import { ROOT_PATH } from './lex-path';
import { LinkDiscoverer } from './link-discoverer';
import { NodeClassifier } from './node-classifier';
import { ResumeController } from './resume.controller';
import { TraversalEngine } from './traversal.engine';

export interface CrawlRunnerOptions {
  rootUrl: string;
  workerCount: number;
  config: TraversalConfig;
  layout: SiteLayout;
  fetcher: PageFetcher;
  context: CrawlRunContext;
  resume: ResumeController;
}

export interface CrawlRunResult {
  /**
   * Navigation links on the root page
   */
  sectionsFound: number;
  sectionsQueued: number;
  sectionsProcessed: number;
  sectionsExcluded: number;

  /**
   * Sections finished by the run being resumed
   */
  sectionsResumed: number;
  sectionsMalformed: number;
  rootFailed: boolean;
}

export class CrawlRunner {
  private readonly queue = new CrawlingQueue();
  private readonly classifier: NodeClassifier;
  private readonly engine: TraversalEngine;
  private readonly discoverer: LinkDiscoverer;

  constructor(private readonly options: CrawlRunnerOptions) {
    const { config, layout, fetcher, context } = options;
    this.classifier = new NodeClassifier(fetcher, layout, config);
    this.discoverer = new LinkDiscoverer({ siteBaseUrl: config.siteBaseUrl, isExcluded: config.isExcluded });
    this.engine = new TraversalEngine(config, {
      classifier: this.classifier,
      registry: context,
      sink: context,
      stats: context.stats,
    });
  }

  async run(): Promise<CrawlRunResult> {
    const result: CrawlRunResult = {
      sectionsFound: 0,
      sectionsQueued: 0,
      sectionsProcessed: 0,
      sectionsExcluded: 0,
      sectionsResumed: 0,
      sectionsMalformed: 0,
      rootFailed: false,
    };

    const enqueued = await this.enqueueSections(result);
    if (!enqueued) {
      return result;
    }

    const workerCount = Math.max(1, Math.min(this.options.workerCount, this.queue.size()));
    const workers = Array.from({ length: workerCount }, (_, i) => this.work(i + 1, result));
    await Promise.all(workers);

    return result;
  }

  /**
   * Fetch the root page and queue one job per remaining section.
   * False when the root yields nothing to crawl.
   */
  private async enqueueSections(result: CrawlRunResult): Promise<boolean> {
    const { rootUrl, context, resume } = this.options;

    await context.markVisited(rootUrl);
    const root = await this.classifier.fetchAndClassify(rootUrl);

    if (root.kind === 'failed') {
      console.error(`Failed to get initial page ${rootUrl}: ${root.failure.message}`);
      result.rootFailed = true;
      context.stats.recordFailure();
      await context.onFailure({ url: rootUrl, path: ROOT_PATH, error: root.failure.message });
      return false;
    }

    context.stats.recordPageFetched(0);

    if (root.kind !== 'branch') {
      console.log(`No sections found at ${rootUrl}`);
      return false;
    }

    const sections = this.discoverer.discoverChildren(root.links);
    result.sectionsFound = sections.length;

    for (const section of sections) {
      if (resume.skipsSection(section.index)) {
        result.sectionsResumed++;
        continue;
      }

      if (section.disposition === 'excluded') {
        result.sectionsExcluded++;
        context.stats.recordExcluded();
        continue;
      }

      if (section.disposition !== 'follow') {
        console.warn(`WARNING: Skipping ${section.disposition} URL: ${section.href}`);
        result.sectionsMalformed++;
        context.stats.recordMalformed();
        continue;
      }

      const queued = this.queue.enqueue({
        url: section.url,
        path: [section.index],
        resumeCursor: resume.cursorForSection(section.index),
        label: section.text,
      });
      if (queued) {
        result.sectionsQueued++;
      } else {
        context.stats.recordDuplicate();
      }
    }

    console.log(`Found ${result.sectionsQueued} departments to scrape`);
    if (result.sectionsExcluded > 0) {
      console.log(`Skipped ${result.sectionsExcluded} RESERVED/REPEALED departments`);
    }

    return result.sectionsQueued > 0;
  }

  private async work(workerId: number, result: CrawlRunResult): Promise<void> {
    let job = this.queue.dequeue();

    while (job) {
      console.log(`[Worker ${workerId}] Department: ${job.label}`);
      await this.engine.traverse(job);
      result.sectionsProcessed++;
      console.log(`[Worker ${workerId}] Finished ${job.label} (${result.sectionsProcessed}/${result.sectionsQueued})`);
      job = this.queue.dequeue();
    }
  }
}
