/**
 * Frontier Scheduler
 * Depth-bounded, breadth-first crawl over a fixed pool of fetch workers.
 *
 * The scheduler owns the Visited Set, frontier and Result Set of one crawl.
 * Workers share them by reference; every mutation happens between awaits, so
 * claims and result updates are never interleaved.
 */

import { EventEmitter } from 'events';
import {
  CrawlConfig,
  CrawlingStatistics,
  CrawlProgress,
  CrawlState,
  CrawlTarget,
  ExtractedLink,
  ExtractionResult,
  LinkContext,
  ResourceKind,
} from './crawling.types';
import { CRAWL_EVENT, CrawlEvent, CrawlEventListener, CrawlEventType } from './crawl-events';
import { buildCrawlReport, CrawlReport } from './crawl-report';
import { CrawlingQueue } from './crawling-queue';
import { CrawlingStatisticsTracker } from './crawling-statistics';
import { CrawlSetupError, FetchError, FetchErrorKind } from './fetch-errors';
import { LinkDiscoverer } from './link-discoverer';
import { HttpPageFetcher, PageFetcher } from './page-fetcher';
import { ResultSet, ResultSnapshot } from './result-set';
import { classifyUrl, isTraversable, normalizeUrl } from './url-normalizer';
import { VisitedSet } from './visited-set';

export interface FrontierSchedulerDeps {
  fetcher?: PageFetcher;
  discoverer?: LinkDiscoverer;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class FrontierScheduler extends EventEmitter {
  private readonly visited = new VisitedSet();
  private readonly frontier = new CrawlingQueue();
  private readonly results = new ResultSet();
  private readonly stats = new CrawlingStatisticsTracker();
  private readonly failures = new Map<string, FetchError>();
  private readonly fetcher: PageFetcher;
  private readonly discoverer: LinkDiscoverer;

  private crawlState: CrawlState = 'idle';
  private cancelled: boolean = false;
  private inFlight: number = 0;
  private currentDepth: number = 0;
  private idleWorkers: Array<() => void> = [];
  private fatalError: CrawlSetupError | null = null;
  private finalStatistics: CrawlingStatistics | null = null;

  constructor(private readonly config: CrawlConfig, deps: FrontierSchedulerDeps = {}) {
    super();
    this.fetcher =
      deps.fetcher ??
      new HttpPageFetcher({ userAgent: config.userAgent, maxBodyBytes: config.maxBodyBytes });
    this.discoverer = deps.discoverer ?? new LinkDiscoverer();
  }

  get state(): CrawlState {
    return this.crawlState;
  }

  /**
   * Listen to progress events. Returns the unsubscribe function.
   */
  subscribe(listener: CrawlEventListener): () => void {
    this.on(CRAWL_EVENT, listener);
    return () => {
      this.off(CRAWL_EVENT, listener);
    };
  }

  /**
   * Crawl from the seed until the frontier is exhausted or the crawl is cancelled.
   * Rejects with CrawlSetupError when the seed host cannot be resolved.
   */
  async run(signal?: AbortSignal): Promise<CrawlReport> {
    if (this.crawlState !== 'idle') {
      throw new Error('Crawl has already been started');
    }
    this.crawlState = 'running';
    this.stats.start();

    this.admitSeed();

    const onAbort = (): void => this.cancel();
    signal?.addEventListener('abort', onAbort, { once: true });
    if (signal?.aborted) {
      this.cancel();
    }

    const crawlTimer =
      this.config.crawlTimeout > 0 ? setTimeout(() => this.cancel(), this.config.crawlTimeout) : null;

    try {
      const workers = Array.from({ length: this.config.concurrencyLimit }, () => this.runWorker());
      await Promise.all(workers);
    } finally {
      if (crawlTimer) clearTimeout(crawlTimer);
      signal?.removeEventListener('abort', onAbort);
    }

    this.crawlState = 'draining';
    const abandoned = this.frontier.clear();
    if (abandoned > 0) {
      this.log(`Cancelled with ${abandoned} targets left in the frontier`);
    }
    this.results.freeze();
    this.finalStatistics = this.stats.getStatistics(this.results.counts(), this.cancelled);

    this.crawlState = 'done';
    this.log(
      `Done - ${this.finalStatistics.targetsFetched} fetched, ${this.finalStatistics.targetsFailed} failed, ` +
        `${this.finalStatistics.totalHtml} pages, ${this.finalStatistics.totalBackend} endpoints, ` +
        `${this.finalStatistics.totalFunctions} functions`
    );
    this.publish({ type: CrawlEventType.CRAWL_DONE, stats: this.finalStatistics });

    if (this.fatalError) {
      throw this.fatalError;
    }

    return buildCrawlReport(this.config, this.results.snapshot());
  }

  /**
   * Stop dispatching. In-flight fetches finish; the rest of the frontier is abandoned.
   */
  cancel(): void {
    if (this.crawlState !== 'running' || this.cancelled) {
      return;
    }
    this.cancelled = true;
    this.log('Cancellation requested');
    this.wakeIdleWorkers();
  }

  getProgress(): CrawlProgress {
    const counts = this.results.counts();
    return {
      state: this.crawlState,
      crawled: this.stats.attempted(),
      queued: this.frontier.size(),
      inFlight: this.inFlight,
      depth: this.currentDepth,
      html: counts.html,
      backend: counts.backend,
      functions: counts.functions,
    };
  }

  getResultSnapshot(): ResultSnapshot {
    return this.results.snapshot();
  }

  /**
   * Final statistics, available once the crawl is done
   */
  getStatistics(): CrawlingStatistics | null {
    return this.finalStatistics;
  }

  /**
   * Failure recorded for each target that could not be fetched or parsed
   */
  getFailures(): Map<string, FetchError> {
    return new Map(this.failures);
  }

  private admitSeed(): void {
    const seedUrl = this.config.seedUrl;
    const seedKind = classifyUrl(seedUrl, seedUrl, LinkContext.NAVIGATION);

    this.visited.tryClaim(seedUrl);
    this.frontier.enqueue({
      url: seedUrl,
      depth: 0,
      context: LinkContext.NAVIGATION,
      kind: isTraversable(seedKind) ? seedKind : ResourceKind.HTML_PAGE,
    });
  }

  private async runWorker(): Promise<void> {
    while (!this.cancelled) {
      const target = this.frontier.dequeue();

      if (!target) {
        if (this.inFlight === 0) {
          // Nothing queued and nothing that could queue more
          this.wakeIdleWorkers();
          return;
        }
        await new Promise<void>((resolve) => this.idleWorkers.push(resolve));
        continue;
      }

      if (target.depth > this.config.maxDepth) {
        this.stats.recordDepthLimited();
        this.publish({ type: CrawlEventType.DEPTH_LIMIT_REACHED, url: target.url, depth: target.depth });
        continue;
      }

      this.inFlight++;
      this.currentDepth = target.depth;
      try {
        await this.resolveTarget(target);
      } finally {
        this.inFlight--;
        this.wakeIdleWorkers();
      }

      if (this.config.delayBetweenRequests > 0 && !this.cancelled) {
        await delay(this.config.delayBetweenRequests);
      }
    }
  }

  private async resolveTarget(target: CrawlTarget): Promise<void> {
    const startTime = Date.now();
    this.log(`Fetching ${target.url} (depth ${target.depth}, ${target.kind})`);

    const outcome = await this.fetcher.fetch(target.url, this.config.requestTimeout);
    if (!outcome.ok) {
      this.recordFailure(target, outcome.error);
      return;
    }

    const { body, contentType, finalUrl } = outcome.result;
    let extraction: ExtractionResult;
    try {
      extraction = this.discoverer.extract(body, contentType, finalUrl);
    } catch (error) {
      this.recordFailure(target, {
        kind: FetchErrorKind.MALFORMED,
        message: `Unparseable body: ${error instanceof Error ? error.message : String(error)}`,
      });
      return;
    }

    this.stats.recordFetch(target.depth, Date.now() - startTime);
    this.recordTarget(target);

    for (const name of extraction.functions) {
      if (this.results.addFunction(name)) {
        this.publish({ type: CrawlEventType.FUNCTION_DISCOVERED, name, sourceUrl: target.url });
      }
    }

    this.admitLinks(extraction.links, target, finalUrl);
  }

  private recordTarget(target: CrawlTarget): void {
    switch (target.kind) {
      case ResourceKind.HTML_PAGE:
        if (this.results.addHtmlPage(target.url)) {
          this.publish({ type: CrawlEventType.PAGE_DISCOVERED, url: target.url, depth: target.depth });
        }
        break;
      case ResourceKind.BACKEND_ENDPOINT:
        if (this.results.addBackendEndpoint(target.url)) {
          this.publish({ type: CrawlEventType.ENDPOINT_DISCOVERED, url: target.url, depth: target.depth });
        }
        break;
      case ResourceKind.SCRIPT:
        // Scripts are only fetched for their functions and calls
        break;
    }
  }

  private recordFailure(target: CrawlTarget, error: FetchError): void {
    this.stats.recordFailed();
    this.failures.set(target.url, error);
    this.log(`Failed ${target.url}: ${error.message}`);

    if (target.depth === 0 && error.kind === FetchErrorKind.DNS_FAILURE) {
      this.fatalError = new CrawlSetupError(`Cannot resolve host of seed URL ${target.url}`);
    }

    this.publish({ type: CrawlEventType.FETCH_FAILED, url: target.url, depth: target.depth, error });
  }

  /**
   * Normalize, classify and claim each link; winners join the frontier at depth+1
   */
  private admitLinks(links: ExtractedLink[], parent: CrawlTarget, baseUrl: string): void {
    let admitted = 0;

    for (const link of links) {
      const url = normalizeUrl(link.href, baseUrl);
      if (!url) {
        this.stats.recordRejected();
        continue;
      }

      const kind = classifyUrl(url, this.config.seedUrl, link.context);
      if (kind === ResourceKind.EXTERNAL) {
        this.stats.recordExternal();
        continue;
      }
      if (!isTraversable(kind)) {
        this.stats.recordUnsupported();
        continue;
      }

      if (!this.visited.tryClaim(url)) {
        this.stats.recordDuplicate();
        continue;
      }

      this.frontier.enqueue({
        url,
        depth: parent.depth + 1,
        context: link.context,
        kind,
        parentUrl: parent.url,
      });
      admitted++;
    }

    if (admitted > 0) {
      this.wakeIdleWorkers();
    }
  }

  private wakeIdleWorkers(): void {
    for (const wake of this.idleWorkers.splice(0)) {
      wake();
    }
  }

  private publish(event: CrawlEvent): void {
    try {
      this.emit(CRAWL_EVENT, event);
    } catch (error) {
      console.error('Crawl: event listener failed:', error);
    }
  }

  private log(message: string): void {
    if (this.config.verbose) {
      console.log(`Crawl: ${message}`);
    }
  }
}
