/**
 * Frontier Scheduler Tests
 */

import { createCrawlConfig, CrawlOptions } from '../crawl-config';
import { CrawlEvent, CrawlEventType } from '../crawl-events';
import { CrawlSetupError, FetchErrorKind } from '../fetch-errors';
import { FrontierScheduler } from '../frontier-scheduler';
import { LinkDiscoverer } from '../link-discoverer';
import { appScript, linkedHomePage } from '../../../__tests__/helpers/fixtures';
import { createMockFetcher, MockPage } from '../../../__tests__/helpers/mocks';

const SEED = 'http://example.com/';

function createScheduler(
  site: Record<string, MockPage>,
  options: Partial<CrawlOptions> = {},
  discoverer?: LinkDiscoverer
) {
  const fetcher = createMockFetcher(site);
  const config = createCrawlConfig({
    seedUrl: SEED,
    maxDepth: 3,
    concurrencyLimit: 2,
    requestTimeout: 1000,
    ...options,
  });
  const scheduler = new FrontierScheduler(config, { fetcher, discoverer });
  return { scheduler, fetcher };
}

function collectEvents(scheduler: FrontierScheduler): CrawlEvent[] {
  const events: CrawlEvent[] = [];
  scheduler.subscribe((event) => events.push(event));
  return events;
}

describe('FrontierScheduler', () => {
  describe('run', () => {
    it('should classify everything reachable from the seed', async () => {
      const { scheduler } = createScheduler({
        'http://example.com/': { body: linkedHomePage },
        'http://example.com/about': { body: '<a href="/">home</a>' },
        'http://example.com/login.php': { body: '<p>login</p>' },
        'http://example.com/search.php': { body: '{}', contentType: 'application/json' },
        'http://example.com/static/app.js': { body: appScript, contentType: 'application/javascript' },
        'http://example.com/api/session': { body: '{}', contentType: 'application/json' },
        'http://example.com/api/items': { body: '[]', contentType: 'application/json' },
      });

      const report = await scheduler.run();

      expect(report).toEqual({
        target: 'http://example.com/',
        html_pages: ['http://example.com/', 'http://example.com/about', 'http://example.com/login.php'],
        backend_endpoints: [
          'http://example.com/api/items',
          'http://example.com/api/session',
          'http://example.com/search.php',
        ],
        functions: ['initCart', 'loadItems', 'toggleMenu', 'validateForm'],
        stats: { total_html: 3, total_backend: 3, total_functions: 4, max_depth: 3 },
      });
    });

    it('should count every skipped link by reason', async () => {
      const { scheduler } = createScheduler({
        'http://example.com/': { body: linkedHomePage },
        'http://example.com/about': { body: '<a href="/">home</a>' },
      });

      await scheduler.run();

      expect(scheduler.getStatistics()).toEqual(
        expect.objectContaining({
          externalSkipped: 1,
          unsupportedSkipped: 1,
          rejectedLinks: 1,
          duplicatesSkipped: 1,
          depthLimited: 0,
          cancelled: false,
        })
      );
    });

    it('should publish discoveries in the order they happen', async () => {
      const { scheduler } = createScheduler(
        {
          'http://example.com/': { body: '<a href="/a">a</a><script>function boot() {}</script>' },
          'http://example.com/a': { body: '<p>leaf</p>' },
        },
        { concurrencyLimit: 1 }
      );
      const events = collectEvents(scheduler);

      await scheduler.run();

      expect(events).toHaveLength(4);
      expect(events.slice(0, 3)).toEqual([
        { type: CrawlEventType.PAGE_DISCOVERED, url: 'http://example.com/', depth: 0 },
        { type: CrawlEventType.FUNCTION_DISCOVERED, name: 'boot', sourceUrl: 'http://example.com/' },
        { type: CrawlEventType.PAGE_DISCOVERED, url: 'http://example.com/a', depth: 1 },
      ]);
      expect(events[3]).toEqual({
        type: CrawlEventType.CRAWL_DONE,
        stats: expect.objectContaining({ targetsFetched: 2, cancelled: false }),
      });
    });

    it('should never exceed the concurrency limit', async () => {
      const links = ['a', 'b', 'c', 'd', 'e', 'f'].map((name) => `<a href="/${name}">${name}</a>`).join('');
      const site: Record<string, MockPage> = { 'http://example.com/': { body: links } };
      for (const name of ['a', 'b', 'c', 'd', 'e', 'f']) {
        site[`http://example.com/${name}`] = { body: '<p>leaf</p>', delayMs: 20 };
      }
      const { scheduler, fetcher } = createScheduler(site, { concurrencyLimit: 2 });

      const report = await scheduler.run();

      expect(fetcher.maxActive()).toBe(2);
      expect(report.html_pages).toHaveLength(7);
    });

    it('should stop fetching past the maximum depth', async () => {
      const { scheduler, fetcher } = createScheduler(
        {
          'http://example.com/': { body: '<a href="/a">a</a>' },
          'http://example.com/a': { body: '<a href="/b">b</a>' },
          'http://example.com/b': { body: '<a href="/c">c</a>' },
        },
        { maxDepth: 1 }
      );
      const events = collectEvents(scheduler);

      const report = await scheduler.run();

      expect(fetcher.fetch).toHaveBeenCalledTimes(2);
      expect(fetcher.callsFor('http://example.com/b')).toBe(0);
      expect(report.html_pages).toEqual(['http://example.com/', 'http://example.com/a']);
      expect(events).toContainEqual({
        type: CrawlEventType.DEPTH_LIMIT_REACHED,
        url: 'http://example.com/b',
        depth: 2,
      });
      expect(scheduler.getStatistics()?.depthLimited).toBe(1);
    });

    it('should fetch only the seed at depth zero', async () => {
      const { scheduler, fetcher } = createScheduler(
        { 'http://example.com/': { body: '<a href="/a">a</a><a href="/b">b</a>' } },
        { maxDepth: 0 }
      );

      const report = await scheduler.run();

      expect(fetcher.fetch).toHaveBeenCalledTimes(1);
      expect(report.html_pages).toEqual(['http://example.com/']);
      expect(scheduler.getStatistics()?.depthLimited).toBe(2);
    });

    it('should not fetch image sources', async () => {
      const { scheduler, fetcher } = createScheduler({
        'http://example.com/': { body: '<img src="/captcha"><link rel="alternate" href="/feed">' },
        'http://example.com/captcha': { body: 'PNG', contentType: 'image/png' },
        'http://example.com/feed': { body: '<rss></rss>', contentType: 'application/rss+xml' },
      });

      const report = await scheduler.run();

      expect(fetcher.callsFor('http://example.com/captcha')).toBe(0);
      expect(report.html_pages).toEqual(['http://example.com/', 'http://example.com/feed']);
    });

    it('should leave scripts of the deepest pages unanalyzed', async () => {
      const { scheduler, fetcher } = createScheduler(
        {
          'http://example.com/': { body: '<script src="/app.js"></script>' },
          'http://example.com/app.js': { body: 'function validateForm() {}', contentType: 'application/javascript' },
        },
        { maxDepth: 0 }
      );
      const events = collectEvents(scheduler);

      const report = await scheduler.run();

      expect(fetcher.callsFor('http://example.com/app.js')).toBe(0);
      expect(report.functions).toEqual([]);
      expect(events).toContainEqual({
        type: CrawlEventType.DEPTH_LIMIT_REACHED,
        url: 'http://example.com/app.js',
        depth: 1,
      });
    });

    it('should let the first discovery decide the classification', async () => {
      const { scheduler, fetcher } = createScheduler({
        'http://example.com/': { body: '<a href="/shop">shop</a><form action="/cart.php"></form>' },
        'http://example.com/shop': { body: '<a href="/cart.php">cart</a>' },
        'http://example.com/cart.php': { body: '<p>cart</p>' },
      });

      const report = await scheduler.run();

      expect(report.backend_endpoints).toEqual(['http://example.com/cart.php']);
      expect(report.html_pages).toEqual(['http://example.com/', 'http://example.com/shop']);
      expect(fetcher.callsFor('http://example.com/cart.php')).toBe(1);
      expect(scheduler.getStatistics()?.duplicatesSkipped).toBe(1);
    });

    it('should record an endpoint seed as an endpoint', async () => {
      const fetcher = createMockFetcher({
        'http://example.com/api/status': { body: '{}', contentType: 'application/json' },
      });
      const config = createCrawlConfig({ seedUrl: 'http://example.com/api/status', maxDepth: 1 });

      const report = await new FrontierScheduler(config, { fetcher }).run();

      expect(report.backend_endpoints).toEqual(['http://example.com/api/status']);
      expect(report.html_pages).toEqual([]);
    });

    it('should refuse to run twice', async () => {
      const { scheduler } = createScheduler({ 'http://example.com/': { body: '<p>only</p>' } });

      await scheduler.run();

      await expect(scheduler.run()).rejects.toThrow('Crawl has already been started');
    });
  });

  describe('failures', () => {
    it('should record failed targets and keep crawling', async () => {
      const { scheduler } = createScheduler({
        'http://example.com/': { body: '<a href="/gone">gone</a><a href="/ok">ok</a>' },
        'http://example.com/ok': { body: '<p>ok</p>' },
      });
      const events = collectEvents(scheduler);

      const report = await scheduler.run();

      expect(report.html_pages).toEqual(['http://example.com/', 'http://example.com/ok']);
      expect(scheduler.getFailures().get('http://example.com/gone')).toEqual({
        kind: FetchErrorKind.HTTP_STATUS,
        message: 'HTTP 404 Not Found',
        statusCode: 404,
      });
      expect(events).toContainEqual({
        type: CrawlEventType.FETCH_FAILED,
        url: 'http://example.com/gone',
        depth: 1,
        error: { kind: FetchErrorKind.HTTP_STATUS, message: 'HTTP 404 Not Found', statusCode: 404 },
      });
      expect(scheduler.getStatistics()?.targetsFailed).toBe(1);
    });

    it('should treat a body the discoverer cannot handle as malformed', async () => {
      const discoverer = new LinkDiscoverer();
      jest.spyOn(discoverer, 'extract').mockImplementation(() => {
        throw new Error('parser crashed');
      });
      const { scheduler } = createScheduler({ 'http://example.com/': { body: '<p>x</p>' } }, {}, discoverer);

      const report = await scheduler.run();

      expect(report.html_pages).toEqual([]);
      expect(scheduler.getFailures().get(SEED)).toEqual({
        kind: FetchErrorKind.MALFORMED,
        message: 'Unparseable body: parser crashed',
      });
    });

    it('should fail the crawl when the seed host cannot be resolved', async () => {
      const { scheduler } = createScheduler({
        'http://example.com/': {
          error: { kind: FetchErrorKind.DNS_FAILURE, message: 'Host could not be resolved' },
        },
      });
      const events = collectEvents(scheduler);

      await expect(scheduler.run()).rejects.toThrow(
        new CrawlSetupError('Cannot resolve host of seed URL http://example.com/')
      );
      expect(scheduler.state).toBe('done');
      expect(events[events.length - 1].type).toBe(CrawlEventType.CRAWL_DONE);
    });

    it('should finish normally when an unreachable seed is not a DNS failure', async () => {
      const { scheduler } = createScheduler({
        'http://example.com/': { error: { kind: FetchErrorKind.CONNECTION_REFUSED, message: 'Connection refused' } },
      });

      const report = await scheduler.run();

      expect(report.stats).toEqual({ total_html: 0, total_backend: 0, total_functions: 0, max_depth: 3 });
    });

    it('should survive a listener that throws', async () => {
      const consoleSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      const { scheduler } = createScheduler({ 'http://example.com/': { body: '<p>only</p>' } });
      scheduler.subscribe(() => {
        throw new Error('listener broke');
      });

      const report = await scheduler.run();

      expect(report.html_pages).toEqual(['http://example.com/']);
      expect(consoleSpy).toHaveBeenCalledWith('Crawl: event listener failed:', expect.any(Error));
      consoleSpy.mockRestore();
    });
  });

  describe('cancellation', () => {
    it('should stop dispatching once cancelled', async () => {
      const { scheduler, fetcher } = createScheduler({
        'http://example.com/': { body: '<a href="/a">a</a><a href="/b">b</a>' },
        'http://example.com/a': { body: '<p>a</p>' },
        'http://example.com/b': { body: '<p>b</p>' },
      });
      scheduler.subscribe((event) => {
        if (event.type === CrawlEventType.PAGE_DISCOVERED) {
          scheduler.cancel();
        }
      });

      const report = await scheduler.run();

      expect(fetcher.fetch).toHaveBeenCalledTimes(1);
      expect(report.html_pages).toEqual(['http://example.com/']);
      expect(scheduler.getStatistics()?.cancelled).toBe(true);
      expect(scheduler.getProgress().queued).toBe(0);
    });

    it('should not fetch anything when the signal is already aborted', async () => {
      const { scheduler, fetcher } = createScheduler({ 'http://example.com/': { body: '<p>only</p>' } });
      const controller = new AbortController();
      controller.abort();

      const report = await scheduler.run(controller.signal);

      expect(fetcher.fetch).not.toHaveBeenCalled();
      expect(report.html_pages).toEqual([]);
      expect(scheduler.getStatistics()?.cancelled).toBe(true);
    });

    it('should let in-flight fetches finish when the crawl timeout fires', async () => {
      const { scheduler, fetcher } = createScheduler(
        {
          'http://example.com/': { body: '<a href="/slow">slow</a>' },
          'http://example.com/slow': { body: '<a href="/next">next</a>', delayMs: 100 },
          'http://example.com/next': { body: '<p>next</p>' },
        },
        { crawlTimeout: 30 }
      );

      const report = await scheduler.run();

      expect(report.html_pages).toEqual(['http://example.com/', 'http://example.com/slow']);
      expect(fetcher.callsFor('http://example.com/next')).toBe(0);
      expect(scheduler.getStatistics()?.cancelled).toBe(true);
    });

    it('should ignore cancel before the crawl starts', async () => {
      const { scheduler, fetcher } = createScheduler({ 'http://example.com/': { body: '<p>only</p>' } });

      scheduler.cancel();
      await scheduler.run();

      expect(fetcher.fetch).toHaveBeenCalledTimes(1);
      expect(scheduler.getStatistics()?.cancelled).toBe(false);
    });
  });

  describe('progress', () => {
    it('should describe the crawl before and after it runs', async () => {
      const { scheduler } = createScheduler({
        'http://example.com/': { body: '<a href="/a">a</a><script>function boot() {}</script>' },
        'http://example.com/a': { body: '<p>a</p>' },
      });

      expect(scheduler.state).toBe('idle');
      expect(scheduler.getStatistics()).toBeNull();

      await scheduler.run();

      expect(scheduler.getProgress()).toEqual({
        state: 'done',
        crawled: 2,
        queued: 0,
        inFlight: 0,
        depth: 1,
        html: 2,
        backend: 0,
        functions: 1,
      });
      expect(scheduler.getResultSnapshot().functions).toEqual(['boot']);
    });
  });
});
