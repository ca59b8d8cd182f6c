/**
 * Crawling Queue
 * FIFO frontier of crawl targets, breadth-first by discovery order
 */

import { CrawlTarget } from './crawling.types';

export class CrawlingQueue {
  private queue: CrawlTarget[] = [];
  private head: number = 0;

  /**
   * Add target to the back of the queue
   */
  enqueue(target: CrawlTarget): void {
    this.queue.push(target);
  }

  /**
   * Get next target from queue (FIFO for BFS)
   */
  dequeue(): CrawlTarget | null {
    if (this.head >= this.queue.length) {
      return null;
    }

    const target = this.queue[this.head];
    this.head++;

    // Compact once the consumed prefix dominates the array
    if (this.head > 1024 && this.head * 2 > this.queue.length) {
      this.queue = this.queue.slice(this.head);
      this.head = 0;
    }

    return target;
  }

  isEmpty(): boolean {
    return this.size() === 0;
  }

  size(): number {
    return this.queue.length - this.head;
  }

  /**
   * Drop every pending target, returning how many were dropped
   */
  clear(): number {
    const dropped = this.size();
    this.queue = [];
    this.head = 0;
    return dropped;
  }
}
