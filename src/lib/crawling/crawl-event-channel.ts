/**
 * Crawl Event Channel
 * Bounded one-way buffer between the scheduler and a slow consumer.
 * Pushing never blocks: when full, the oldest buffered event is dropped.
 */

import { CrawlEvent, CrawlEventType } from './crawl-events';

export class CrawlEventChannel implements AsyncIterable<CrawlEvent> {
  private buffer: CrawlEvent[] = [];
  private waiting: Array<(event: CrawlEvent | null) => void> = [];
  private closed: boolean = false;
  private droppedCount: number = 0;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  /**
   * Deliver an event. The channel closes itself after CRAWL_DONE.
   */
  push(event: CrawlEvent): void {
    if (this.closed) {
      return;
    }

    const consumer = this.waiting.shift();
    if (consumer) {
      consumer(event);
    } else {
      if (this.buffer.length >= this.capacity) {
        this.buffer.shift();
        this.droppedCount++;
      }
      this.buffer.push(event);
    }

    if (event.type === CrawlEventType.CRAWL_DONE) {
      this.close();
    }
  }

  /**
   * Next event, or null once the channel is closed and drained
   */
  next(): Promise<CrawlEvent | null> {
    const event = this.buffer.shift();
    if (event) {
      return Promise.resolve(event);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  close(): void {
    this.closed = true;
    for (const consumer of this.waiting.splice(0)) {
      consumer(null);
    }
  }

  /**
   * Events lost to the drop-oldest policy
   */
  get dropped(): number {
    return this.droppedCount;
  }

  size(): number {
    return this.buffer.length;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<CrawlEvent> {
    for (;;) {
      const event = await this.next();
      if (event === null) return;
      yield event;
    }
  }
}
