/**
 * Section Walker
 * Re-derives a section's leaf URLs from the live site with the crawl's own traversal
 */

import { CrawlingStatisticsTracker } from '../crawling/crawling-statistics';
import { LeafVisit, LexPath, TraversalConfig, TraversalSink } from '../crawling/crawling.types';
import { NodeClassifier } from '../crawling/node-classifier';
import { TraversalEngine } from '../crawling/traversal.engine';
import { VisitedSet } from '../crawling/visited-set';
import { SiteLayout } from '../markup/markup.types';
import { PageFetcher } from '../scraping/scraping.types';
import { SectionRef } from './verification.types';

class LeafCollector implements TraversalSink {
  readonly urls: string[] = [];
  readonly failures: { url: string; path: LexPath | null; error: string }[] = [];

  async onLeaf(leaf: LeafVisit): Promise<void> {
    this.urls.push(leaf.url);
  }

  async onFailure(entry: { url: string; path: LexPath | null; error: string }): Promise<void> {
    this.failures.push(entry);
  }
}

export interface SectionWalk {
  urls: string[];
  failures: number;
}

export class SectionWalker {
  private readonly classifier: NodeClassifier;

  constructor(
    private readonly config: TraversalConfig,
    layout: SiteLayout,
    fetcher: PageFetcher,
    private readonly rootUrl: string
  ) {
    this.classifier = new NodeClassifier(fetcher, layout, config);
  }

  /**
   * Leaf URLs in visit order. Each walk starts from a visited set holding only
   * the jurisdiction root, as the crawl does, and never consults persisted output.
   */
  async walk(section: SectionRef): Promise<SectionWalk> {
    const collector = new LeafCollector();
    const visited = new VisitedSet();
    visited.add(this.rootUrl);

    const engine = new TraversalEngine(this.config, {
      classifier: this.classifier,
      registry: visited,
      sink: collector,
      stats: new CrawlingStatisticsTracker(),
    });

    await engine.traverse({ url: section.url, path: [section.index], label: section.name });
    return { urls: collector.urls, failures: collector.failures.length };
  }
}
