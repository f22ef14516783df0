/**
 * Crawling Queue
 * FIFO of top-level section jobs shared by the worker pool
 */

import { CrawlJob } from './crawling.types';

export class CrawlingQueue {
  private queue: CrawlJob[] = [];
  private urlSet: Set<string> = new Set();

  /**
   * Add a job; a section already queued is ignored
   */
  enqueue(job: CrawlJob): boolean {
    if (this.urlSet.has(job.url)) {
      return false;
    }

    this.queue.push(job);
    this.urlSet.add(job.url);
    return true;
  }

  /**
   * Next job in section order, or null once drained
   */
  dequeue(): CrawlJob | null {
    const job = this.queue.shift();
    if (!job) {
      return null;
    }

    this.urlSet.delete(job.url);
    return job;
  }

  size(): number {
    return this.queue.length;
  }
}
