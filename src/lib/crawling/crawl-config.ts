/**
 * Crawl Configuration
 * Builds the immutable CrawlConfig from caller options and environment defaults
 */

import { env } from '../../config/env';
import { CrawlConfig } from './crawling.types';
import { CrawlSetupError } from './fetch-errors';
import { normalizeUrl } from './url-normalizer';

export interface CrawlOptions {
  seedUrl: string;
  maxDepth?: number;
  concurrencyLimit?: number;
  requestTimeout?: number;
  maxBodyBytes?: number;
  userAgent?: string;
  delayBetweenRequests?: number;
  crawlTimeout?: number;
  verbose?: boolean;
}

/**
 * Validate options and freeze them into a CrawlConfig.
 * Throws CrawlSetupError for an unusable seed or numeric option.
 */
export function createCrawlConfig(options: CrawlOptions): CrawlConfig {
  const seedUrl = normalizeUrl(options.seedUrl);
  if (!seedUrl || !new URL(seedUrl).hostname) {
    throw new CrawlSetupError(`Invalid seed URL: ${options.seedUrl}`);
  }

  const config: CrawlConfig = {
    seedUrl,
    maxDepth: requireInteger('maxDepth', options.maxDepth ?? env.CRAWLER_MAX_DEPTH, 0),
    concurrencyLimit: requireInteger('concurrencyLimit', options.concurrencyLimit ?? env.CRAWLER_CONCURRENCY, 1),
    requestTimeout: requireInteger('requestTimeout', options.requestTimeout ?? env.CRAWLER_REQUEST_TIMEOUT, 1),
    maxBodyBytes: requireInteger('maxBodyBytes', options.maxBodyBytes ?? env.CRAWLER_MAX_BODY_BYTES, 1),
    userAgent: options.userAgent || env.CRAWLER_USER_AGENT,
    delayBetweenRequests: requireInteger(
      'delayBetweenRequests',
      options.delayBetweenRequests ?? env.CRAWLER_REQUEST_DELAY,
      0
    ),
    crawlTimeout: requireInteger('crawlTimeout', options.crawlTimeout ?? env.CRAWLER_CRAWL_TIMEOUT, 0),
    verbose: options.verbose ?? env.CRAWLER_VERBOSE,
  };

  return Object.freeze(config);
}

function requireInteger(name: string, value: number, min: number): number {
  if (!Number.isInteger(value) || value < min) {
    throw new CrawlSetupError(`${name} must be an integer >= ${min}, got ${value}`);
  }
  return value;
}
