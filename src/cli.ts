#!/usr/bin/env node
/**
 * Command-line entry point
 * Crawls a target, streams findings to the terminal and saves the JSON report
 */

import { Command, InvalidArgumentError } from 'commander';
import { env } from './config/env';
import {
  createCrawlConfig,
  CrawlConfig,
  CrawlEventChannel,
  CrawlSetupError,
  FrontierScheduler,
} from './lib/crawling';
import { ConsoleReporter, saveReport } from './lib/reporting';

interface CliOptions {
  url: string;
  depth: number;
  concurrency: number;
  timeout: number;
  output: string;
  verbose: boolean;
}

function parseInteger(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

/**
 * Targets given without a scheme are crawled over plain http
 */
export function withScheme(url: string): string {
  const trimmed = url.trim();
  return /^[a-z][a-z\d+.-]*:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
}

export async function main(argv: string[]): Promise<number> {
  const program = new Command()
    .name('surface-crawler')
    .description('Discover web application pages, backend endpoints and JavaScript functions')
    .requiredOption('-u, --url <url>', 'Target URL to scan (e.g. http://example.com)')
    .option('-d, --depth <n>', 'Maximum crawl depth', parseInteger, env.CRAWLER_MAX_DEPTH)
    .option('-c, --concurrency <n>', 'Concurrent fetches', parseInteger, env.CRAWLER_CONCURRENCY)
    .option('-t, --timeout <ms>', 'Per-request timeout in milliseconds', parseInteger, env.CRAWLER_REQUEST_TIMEOUT)
    .option('-o, --output <dir>', 'Directory for the JSON report', env.CRAWLER_OUTPUT_DIR)
    .option('--verbose', 'Print failures and crawl diagnostics', env.CRAWLER_VERBOSE);

  program.parse(argv);
  const options = program.opts<CliOptions>();

  let config: CrawlConfig;
  try {
    config = createCrawlConfig({
      seedUrl: withScheme(options.url),
      maxDepth: options.depth,
      concurrencyLimit: options.concurrency,
      requestTimeout: options.timeout,
      verbose: options.verbose,
    });
  } catch (error) {
    if (error instanceof CrawlSetupError) {
      console.error(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }

  const scheduler = new FrontierScheduler(config);
  const channel = new CrawlEventChannel(env.CRAWLER_EVENT_BUFFER_SIZE);
  const unsubscribe = scheduler.subscribe((event) => channel.push(event));
  const reporter = new ConsoleReporter({ color: process.stdout.isTTY === true, verbose: config.verbose });
  const printing = reporter.consume(channel);

  const onInterrupt = (): void => {
    console.log('\nScan interrupted by user, finishing in-flight requests...');
    scheduler.cancel();
  };
  process.once('SIGINT', onInterrupt);

  console.log(`\nStarting security scan for: ${config.seedUrl}`);
  console.log(`Maximum crawl depth: ${config.maxDepth}`);
  console.log('Press Ctrl+C to stop early...\n');

  reporter.startProgress(() => scheduler.getProgress());
  try {
    const report = await scheduler.run().finally(() => reporter.stopProgress());
    await printing;

    const reportPath = await saveReport(report, options.output);
    reporter.printSummary(report, reportPath);
    if (channel.dropped > 0) {
      console.log(`(${channel.dropped} progress lines skipped while the terminal caught up)`);
    }
    return 0;
  } catch (error) {
    channel.close();
    await printing;
    if (error instanceof CrawlSetupError) {
      console.error(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  } finally {
    reporter.stopProgress();
    process.removeListener('SIGINT', onInterrupt);
    unsubscribe();
  }
}

if (require.main === module) {
  main(process.argv)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error('Fatal error:', error);
      process.exitCode = 1;
    });
}
