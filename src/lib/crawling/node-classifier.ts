/**
 * Node Classifier
 * Fetches a page and decides whether it is a branch or a leaf
 */

import { ContentExtractor } from '../markup/content-extractor';
import { MarkupDocument } from '../markup/markup-document';
import { MarkupRole, SiteLayout } from '../markup/markup.types';
import { PageFetcher } from '../scraping/scraping.types';
import { ClassifiedNode, TraversalConfig } from './crawling.types';

export class NodeClassifier {
  private readonly extractor = new ContentExtractor();

  constructor(
    private readonly fetcher: PageFetcher,
    private readonly layout: SiteLayout,
    private readonly config: Pick<TraversalConfig, 'maxAttempts' | 'baseDelayMs' | 'isExcluded'>
  ) {}

  /**
   * A page with a navigation region is a branch; anything else is a leaf.
   * Pages whose heading carries an exclusion marker come back as excluded.
   */
  async fetchAndClassify(url: string): Promise<ClassifiedNode> {
    const outcome = await this.fetcher.fetch(url, this.config.maxAttempts, this.config.baseDelayMs);
    if (!outcome.ok) {
      return { kind: 'failed', url, failure: outcome.failure };
    }

    const document = MarkupDocument.load(outcome.page.html, url, this.layout);
    const title = this.extractor.extractTitle(document) ?? '';

    if (title && this.config.isExcluded(title)) {
      return { kind: 'excluded', url, title };
    }

    const navigation = document.findByRole(MarkupRole.NAVIGATION);
    if (navigation) {
      return { kind: 'branch', url, title, links: document.extractLinks(navigation) };
    }

    return { kind: 'leaf', url, title, document };
  }
}
