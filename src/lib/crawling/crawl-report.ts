/**
 * Crawl Report
 * Stable JSON shape consumed by external tooling
 */

import { CrawlConfig } from './crawling.types';
import { ResultSnapshot } from './result-set';

export interface CrawlReport {
  target: string;
  html_pages: string[];
  backend_endpoints: string[];
  functions: string[];
  stats: {
    total_html: number;
    total_backend: number;
    total_functions: number;
    max_depth: number;
  };
}

/**
 * Build the report from a result snapshot. Lists keep the snapshot's sorted order.
 */
export function buildCrawlReport(config: CrawlConfig, snapshot: ResultSnapshot): CrawlReport {
  return {
    target: config.seedUrl,
    html_pages: [...snapshot.htmlPages],
    backend_endpoints: [...snapshot.backendEndpoints],
    functions: [...snapshot.functions],
    stats: {
      total_html: snapshot.htmlPages.length,
      total_backend: snapshot.backendEndpoints.length,
      total_functions: snapshot.functions.length,
      max_depth: config.maxDepth,
    },
  };
}
