import dotenv from 'dotenv';

dotenv.config();

export const env = {
  NODE_ENV: process.env.NODE_ENV || 'development',

  // Traversal
  CRAWLER_MAX_DEPTH: parseInt(process.env.CRAWLER_MAX_DEPTH || '3', 10),
  CRAWLER_CONCURRENCY: parseInt(process.env.CRAWLER_CONCURRENCY || '5', 10),
  CRAWLER_CRAWL_TIMEOUT: parseInt(process.env.CRAWLER_CRAWL_TIMEOUT || '0', 10), // 0 = no crawl-level timeout
  CRAWLER_REQUEST_DELAY: parseInt(process.env.CRAWLER_REQUEST_DELAY || '0', 10), // Per-worker pause after each fetch

  // Fetching
  CRAWLER_REQUEST_TIMEOUT: parseInt(process.env.CRAWLER_REQUEST_TIMEOUT || '10000', 10), // 10 seconds
  CRAWLER_MAX_BODY_BYTES: parseInt(process.env.CRAWLER_MAX_BODY_BYTES || String(5 * 1024 * 1024), 10), // 5 MiB
  CRAWLER_USER_AGENT: process.env.CRAWLER_USER_AGENT || 'Mozilla/5.0 (compatible; SurfaceCrawler/1.0)',

  // Reporting
  CRAWLER_EVENT_BUFFER_SIZE: parseInt(process.env.CRAWLER_EVENT_BUFFER_SIZE || '1000', 10),
  CRAWLER_VERBOSE: process.env.CRAWLER_VERBOSE === 'true', // Default false
  CRAWLER_OUTPUT_DIR: process.env.CRAWLER_OUTPUT_DIR || '.',
} as const;

export default env;
