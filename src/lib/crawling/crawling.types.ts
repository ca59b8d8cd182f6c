/**
 * Crawling Types
 * Type definitions for the endpoint discovery crawler
 */

/**
 * How a link was found on the page that referenced it
 */
export enum LinkContext {
  NAVIGATION = 'navigation',             // <a href>, <iframe src>, <link href>...
  FORM_ACTION = 'form_action',           // <form action>, <button formaction>
  SCRIPT_REFERENCE = 'script_reference', // fetch('/x'), xhr.open('GET', '/x')...
  SCRIPT_SOURCE = 'script_source',       // <script src>
}

/**
 * Classification of a normalized URL
 */
export enum ResourceKind {
  HTML_PAGE = 'html_page',
  BACKEND_ENDPOINT = 'backend_endpoint',
  SCRIPT = 'script',
  EXTERNAL = 'external',
  UNSUPPORTED = 'unsupported',
}

/**
 * Resource kinds that are admitted to the frontier
 */
export type TraversableKind = ResourceKind.HTML_PAGE | ResourceKind.BACKEND_ENDPOINT | ResourceKind.SCRIPT;

export interface ExtractedLink {
  /**
   * Raw attribute or string literal value, unresolved
   */
  href: string;

  /**
   * Where the link was found
   */
  context: LinkContext;
}

export interface ExtractionResult {
  links: ExtractedLink[];
  functions: string[];
}

/**
 * A (URL, depth) pair awaiting or undergoing fetch+extract
 */
export interface CrawlTarget {
  /**
   * Normalized absolute URL, also the visited key
   */
  readonly url: string;

  /**
   * Crawl depth (0 = seed)
   */
  readonly depth: number;

  /**
   * Context of the claim that admitted this target
   */
  readonly context: LinkContext;

  /**
   * Classification decided at admission time
   */
  readonly kind: TraversableKind;

  /**
   * Page the link was discovered on
   */
  readonly parentUrl?: string;
}

export type CrawlState = 'idle' | 'running' | 'draining' | 'done';

/**
 * Immutable crawl configuration
 */
export interface CrawlConfig {
  readonly seedUrl: string;

  /**
   * Targets deeper than this are never fetched
   */
  readonly maxDepth: number;

  /**
   * Size of the fetch worker pool
   */
  readonly concurrencyLimit: number;

  /**
   * Per-request timeout in milliseconds (headers and body)
   */
  readonly requestTimeout: number;

  /**
   * Response bodies above this size are rejected
   */
  readonly maxBodyBytes: number;

  readonly userAgent: string;

  /**
   * Pause in milliseconds each worker takes after a fetch
   */
  readonly delayBetweenRequests: number;

  /**
   * Crawl-level timeout in milliseconds, 0 for none
   */
  readonly crawlTimeout: number;

  readonly verbose: boolean;
}

/**
 * Crawling statistics interface
 */
export interface CrawlingStatistics {
  totalHtml: number;
  totalBackend: number;
  totalFunctions: number;

  /**
   * Targets fetched successfully
   */
  targetsFetched: number;

  /**
   * Targets whose fetch failed
   */
  targetsFailed: number;

  /**
   * Targets dropped because they were beyond maxDepth
   */
  depthLimited: number;

  /**
   * Links that lost their Visited Set claim
   */
  duplicatesSkipped: number;

  externalSkipped: number;
  unsupportedSkipped: number;
  rejectedLinks: number;

  /**
   * Deepest depth fetched
   */
  depthReached: number;

  /**
   * Total crawling time in milliseconds
   */
  totalTime: number;

  /**
   * Average fetch time in milliseconds
   */
  averageFetchTime: number;

  /**
   * Whether the crawl was cut short by cancellation
   */
  cancelled: boolean;
}

/**
 * Live counts for progress display
 */
export interface CrawlProgress {
  state: CrawlState;
  crawled: number;
  queued: number;
  inFlight: number;
  depth: number;
  html: number;
  backend: number;
  functions: number;
}
