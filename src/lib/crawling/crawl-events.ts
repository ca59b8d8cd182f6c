/**
 * Crawl Events
 * Progress events emitted by the frontier scheduler, in resolution order
 */

import { CrawlingStatistics } from './crawling.types';
import { FetchError } from './fetch-errors';

export const CRAWL_EVENT = 'crawl:event';

export enum CrawlEventType {
  PAGE_DISCOVERED = 'page_discovered',
  ENDPOINT_DISCOVERED = 'endpoint_discovered',
  FUNCTION_DISCOVERED = 'function_discovered',
  FETCH_FAILED = 'fetch_failed',
  DEPTH_LIMIT_REACHED = 'depth_limit_reached',
  CRAWL_DONE = 'crawl_done',
}

export type CrawlEvent =
  | { type: CrawlEventType.PAGE_DISCOVERED; url: string; depth: number }
  | { type: CrawlEventType.ENDPOINT_DISCOVERED; url: string; depth: number }
  | { type: CrawlEventType.FUNCTION_DISCOVERED; name: string; sourceUrl: string }
  | { type: CrawlEventType.FETCH_FAILED; url: string; depth: number; error: FetchError }
  | { type: CrawlEventType.DEPTH_LIMIT_REACHED; url: string; depth: number }
  | { type: CrawlEventType.CRAWL_DONE; stats: CrawlingStatistics };

export type CrawlEventListener = (event: CrawlEvent) => void;
