/**
 * Crawling Statistics Tracker
 * Running counters for a single crawl
 */

import { CrawlingStatistics } from './crawling.types';

export class CrawlingStatisticsTracker {
  private startTime: number;
  private targetsFetched: number = 0;
  private targetsFailed: number = 0;
  private depthLimited: number = 0;
  private duplicatesSkipped: number = 0;
  private externalSkipped: number = 0;
  private unsupportedSkipped: number = 0;
  private rejectedLinks: number = 0;
  private maxDepthReached: number = 0;
  private fetchTimes: number[] = [];

  constructor() {
    this.startTime = Date.now();
  }

  /**
   * Restart the clock when the crawl actually begins
   */
  start(): void {
    this.startTime = Date.now();
  }

  /**
   * Record a successful fetch
   */
  recordFetch(depth: number, time: number): void {
    this.targetsFetched++;
    this.maxDepthReached = Math.max(this.maxDepthReached, depth);
    this.fetchTimes.push(time);
  }

  recordFailed(): void {
    this.targetsFailed++;
  }

  recordDepthLimited(): void {
    this.depthLimited++;
  }

  recordDuplicate(): void {
    this.duplicatesSkipped++;
  }

  recordExternal(): void {
    this.externalSkipped++;
  }

  recordUnsupported(): void {
    this.unsupportedSkipped++;
  }

  recordRejected(): void {
    this.rejectedLinks++;
  }

  /**
   * Targets attempted so far
   */
  attempted(): number {
    return this.targetsFetched + this.targetsFailed;
  }

  /**
   * Get final statistics
   */
  getStatistics(
    totals: { html: number; backend: number; functions: number },
    cancelled: boolean
  ): CrawlingStatistics {
    const totalTime = Date.now() - this.startTime;
    const averageFetchTime =
      this.fetchTimes.length > 0
        ? this.fetchTimes.reduce((sum, time) => sum + time, 0) / this.fetchTimes.length
        : 0;

    return {
      totalHtml: totals.html,
      totalBackend: totals.backend,
      totalFunctions: totals.functions,
      targetsFetched: this.targetsFetched,
      targetsFailed: this.targetsFailed,
      depthLimited: this.depthLimited,
      duplicatesSkipped: this.duplicatesSkipped,
      externalSkipped: this.externalSkipped,
      unsupportedSkipped: this.unsupportedSkipped,
      rejectedLinks: this.rejectedLinks,
      depthReached: this.maxDepthReached,
      totalTime,
      averageFetchTime,
      cancelled,
    };
  }
}
