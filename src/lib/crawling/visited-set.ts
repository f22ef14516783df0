/**
 * Visited Set
 * Run-wide record of URLs already dispatched for fetch
 */

import { VisitRegistry } from './crawling.types';
import { normalizeUrl } from './url-normalizer';

export class VisitedSet implements VisitRegistry {
  private visitedUrls: Set<string> = new Set();

  /**
   * Mark a URL visited. Returns false when it already was.
   */
  add(url: string): boolean {
    const normalized = normalizeUrl(url);

    if (this.visitedUrls.has(normalized)) {
      return false;
    }

    this.visitedUrls.add(normalized);
    return true;
  }

  /**
   * Unguarded registry view; callers sharing the set across workers wrap it in a lock
   */
  async markVisited(url: string): Promise<boolean> {
    return this.add(url);
  }
}
