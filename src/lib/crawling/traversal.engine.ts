/**
 * Traversal Engine
 * Depth-first walk of the navigation tree with resume pruning, exclusion,
 * cycle suppression and a depth ceiling. Uses an explicit stack; children are
 * pushed in reverse so the visit order is the document order.
 */

import { describeError } from '../scraping/errors';
import { CrawlingStatisticsTracker } from './crawling-statistics';
import { LexPath, TraversalConfig, TraversalSink, VisitRegistry } from './crawling.types';
import { childPath, formatLexPath, isBeforeCursor, isPrefixOf, isStrictPrefixOf, lexPathsEqual } from './lex-path';
import { LinkDiscoverer } from './link-discoverer';
import { NodeClassifier } from './node-classifier';
import { NodeLink } from '../markup/markup.types';

export interface TraversalJob {
  url: string;
  path: LexPath;
  resumeCursor?: LexPath;

  /**
   * Prefix for log lines, usually the section name
   */
  label?: string;
}

export interface TraversalEngineDeps {
  classifier: NodeClassifier;
  registry: VisitRegistry;
  sink: TraversalSink;
  stats: CrawlingStatisticsTracker;
}

interface Frame {
  url: string;
  path: LexPath;
  cursor: LexPath | null;
}

export class TraversalEngine {
  private readonly discoverer: LinkDiscoverer;

  constructor(
    private readonly config: TraversalConfig,
    private readonly deps: TraversalEngineDeps
  ) {
    this.discoverer = new LinkDiscoverer({
      siteBaseUrl: config.siteBaseUrl,
      isExcluded: config.isExcluded,
    });
  }

  /**
   * Walk the subtree rooted at the job's URL. Never rejects for a node
   * failure; those go to the sink and the walk carries on with the siblings.
   */
  async traverse(job: TraversalJob): Promise<void> {
    const prefix = job.label ? `[${job.label}] ` : '';
    const stack: Frame[] = [{ url: job.url, path: job.path, cursor: job.resumeCursor ?? null }];

    while (stack.length > 0) {
      const frame = stack.pop();
      if (!frame) break;

      try {
        const children = await this.visit(frame, prefix);
        for (let i = children.length - 1; i >= 0; i--) {
          stack.push(children[i]);
        }
      } catch (error) {
        const message = describeError(error);
        console.error(`${prefix}ERROR: Failed to process ${frame.url} ${formatLexPath(frame.path)}: ${message}`);
        await this.recordFailure(frame.url, frame.path, message);
      }
    }
  }

  private async visit(frame: Frame, prefix: string): Promise<Frame[]> {
    const { registry, stats, sink } = this.deps;

    if (!(await registry.markVisited(frame.url))) {
      stats.recordDuplicate();
      return [];
    }

    const node = await this.deps.classifier.fetchAndClassify(frame.url);

    switch (node.kind) {
      case 'failed':
        console.error(`${prefix}Failed to retrieve content for ${frame.url}: ${node.failure.message}`);
        await this.recordFailure(frame.url, frame.path, node.failure.message);
        return [];

      case 'excluded':
        stats.recordPageFetched(frame.path.length);
        stats.recordExcluded();
        return [];

      case 'branch':
        stats.recordPageFetched(frame.path.length);
        return this.expandBranch(frame, node.links, prefix);

      case 'leaf':
        stats.recordPageFetched(frame.path.length);
        if (frame.cursor && lexPathsEqual(frame.path, frame.cursor)) {
          stats.recordResumeSkipped();
          return [];
        }
        await sink.onLeaf({ url: frame.url, path: frame.path, document: node.document });
        stats.recordLeafEmitted();
        return [];
    }
  }

  /**
   * Children to visit next, in document order
   */
  private expandBranch(frame: Frame, links: NodeLink[], prefix: string): Frame[] {
    const { stats } = this.deps;
    const cursor = frame.cursor && isStrictPrefixOf(frame.path, frame.cursor) ? frame.cursor : null;
    const children: Frame[] = [];

    for (const child of this.discoverer.discoverChildren(links)) {
      const path = childPath(frame.path, child.index);

      if (cursor && isBeforeCursor(path, cursor)) {
        stats.recordResumeSkipped();
        continue;
      }

      if (child.disposition === 'excluded') {
        stats.recordExcluded();
        continue;
      }

      if (child.disposition !== 'follow') {
        console.warn(`${prefix}WARNING: Skipping ${child.disposition} URL: ${child.href}`);
        stats.recordMalformed();
        continue;
      }

      if (frame.path.length >= this.config.maxDepth) {
        console.warn(
          `${prefix}WARNING: Excessive path depth (${frame.path.length}) at ${frame.url}, stopping recursion`
        );
        stats.recordDepthLimit();
        break;
      }

      children.push({
        url: child.url,
        path,
        // Siblings past the cursor's branch are crawled in full
        cursor: cursor && isPrefixOf(path, cursor) ? cursor : null,
      });
    }

    return children;
  }

  private async recordFailure(url: string, path: LexPath, error: string): Promise<void> {
    this.deps.stats.recordFailure();
    await this.deps.sink.onFailure({ url, path, error });
  }
}
