/**
 * Crawling Statistics Tracker
 * Counters shared by every worker of a run
 */

import { CrawlingStatistics } from './crawling.types';

export class CrawlingStatisticsTracker {
  private readonly startTime: number = Date.now();
  private pagesFetched: number = 0;
  private leavesEmitted: number = 0;
  private excludedSkipped: number = 0;
  private malformedSkipped: number = 0;
  private duplicatesDetected: number = 0;
  private resumeSkipped: number = 0;
  private depthLimitHits: number = 0;
  private failures: number = 0;
  private maxDepthReached: number = 0;

  recordPageFetched(depth: number): void {
    this.pagesFetched++;
    this.maxDepthReached = Math.max(this.maxDepthReached, depth);
  }

  recordLeafEmitted(): void {
    this.leavesEmitted++;
  }

  recordExcluded(): void {
    this.excludedSkipped++;
  }

  recordMalformed(): void {
    this.malformedSkipped++;
  }

  recordDuplicate(): void {
    this.duplicatesDetected++;
  }

  recordResumeSkipped(count: number = 1): void {
    this.resumeSkipped += count;
  }

  recordDepthLimit(): void {
    this.depthLimitHits++;
  }

  recordFailure(): void {
    this.failures++;
  }

  getStatistics(): CrawlingStatistics {
    return {
      pagesFetched: this.pagesFetched,
      leavesEmitted: this.leavesEmitted,
      excludedSkipped: this.excludedSkipped,
      malformedSkipped: this.malformedSkipped,
      duplicatesDetected: this.duplicatesDetected,
      resumeSkipped: this.resumeSkipped,
      depthLimitHits: this.depthLimitHits,
      failures: this.failures,
      depthReached: this.maxDepthReached,
      totalTime: Date.now() - this.startTime,
    };
  }
}
