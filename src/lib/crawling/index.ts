/**
 * Crawling System
 * Main export file for the endpoint discovery crawler
 */

export * from './crawling.types';
export * from './url-normalizer';
export * from './visited-set';
export * from './crawling-queue';
export * from './fetch-errors';
export * from './page-fetcher';
export * from './script-analyzer';
export * from './link-discoverer';
export * from './result-set';
export * from './crawling-statistics';
export * from './crawl-config';
export * from './crawl-events';
export * from './crawl-event-channel';
export * from './crawl-report';
export * from './frontier-scheduler';
