/**
 * Console Reporter
 * Prints crawl findings as they stream in, then a summary
 */

import { CrawlEvent, CrawlEventType, CrawlProgress, CrawlReport } from '../crawling';

const COLORS = {
  html: '\u001b[94m',
  backend: '\u001b[92m',
  function: '\u001b[93m',
  failure: '\u001b[91m',
  muted: '\u001b[90m',
  reset: '\u001b[0m',
} as const;

type Tone = Exclude<keyof typeof COLORS, 'reset'>;

const SPINNER_FRAMES = ['⣾', '⣽', '⣻', '⢿', '⡿', '⣟', '⣯', '⣷'];

// Carriage return, then erase to end of line
const CLEAR_LINE = '\r\u001b[K';

export const PROGRESS_INTERVAL_MS = 100;

export interface ConsoleReporterOptions {
  color?: boolean;
  /**
   * Also print failures and depth-limited targets
   */
  verbose?: boolean;
  write?: (line: string) => void;
  /**
   * Raw terminal output for the status line; no newline is added
   */
  redraw?: (text: string) => void;
}

export class ConsoleReporter {
  private readonly color: boolean;
  private readonly verbose: boolean;
  private readonly write: (line: string) => void;
  private readonly redraw: (text: string) => void;
  private progressTimer?: NodeJS.Timeout;
  private spinnerFrame: number = 0;

  constructor(options: ConsoleReporterOptions = {}) {
    this.color = options.color ?? false;
    this.verbose = options.verbose ?? false;
    this.write = options.write ?? ((line) => console.log(line));
    this.redraw =
      options.redraw ??
      ((text) => {
        process.stdout.write(text);
      });
  }

  /**
   * Line for an event, or null when the event is not shown
   */
  formatEvent(event: CrawlEvent): string | null {
    switch (event.type) {
      case CrawlEventType.PAGE_DISCOVERED:
        return this.paint('html', `• HTML page found: ${event.url}`);
      case CrawlEventType.ENDPOINT_DISCOVERED:
        return this.paint('backend', `• Backend endpoint found: ${event.url}`);
      case CrawlEventType.FUNCTION_DISCOVERED:
        return this.paint('function', `• Function found: ${event.name}`);
      case CrawlEventType.FETCH_FAILED:
        return this.verbose ? this.paint('failure', `✗ ${event.url}: ${event.error.message}`) : null;
      case CrawlEventType.DEPTH_LIMIT_REACHED:
        return this.verbose ? this.paint('muted', `↳ depth limit: ${event.url} (depth ${event.depth})`) : null;
      case CrawlEventType.CRAWL_DONE:
        return this.paint(
          'muted',
          `Scan complete: ${event.stats.targetsFetched} fetched, ${event.stats.targetsFailed} failed` +
            (event.stats.cancelled ? ' (cancelled)' : '')
        );
    }
  }

  /**
   * Print every event from the stream until it ends
   */
  async consume(events: AsyncIterable<CrawlEvent>): Promise<void> {
    for await (const event of events) {
      const line = this.formatEvent(event);
      if (line !== null) {
        if (this.progressTimer) {
          this.redraw(CLEAR_LINE);
        }
        this.write(line);
      }
    }
  }

  /**
   * `Crawled | Queued | Depth | HTML | Backend | Functions` status text
   */
  formatProgress(progress: CrawlProgress): string {
    return (
      `Crawled: ${progress.crawled} | Queued: ${progress.queued} | Depth: ${progress.depth} | ` +
      `HTML: ${progress.html} | Backend: ${progress.backend} | Functions: ${progress.functions}`
    );
  }

  /**
   * Redraw a single status line until stopProgress is called.
   * Only on color terminals; piped output gets finding lines alone.
   */
  startProgress(source: () => CrawlProgress, intervalMs: number = PROGRESS_INTERVAL_MS): void {
    if (!this.color || this.progressTimer) {
      return;
    }

    this.progressTimer = setInterval(() => {
      const frame = SPINNER_FRAMES[this.spinnerFrame];
      this.spinnerFrame = (this.spinnerFrame + 1) % SPINNER_FRAMES.length;
      this.redraw(`${CLEAR_LINE}${frame} ${this.formatProgress(source())}`);
    }, intervalMs);
  }

  stopProgress(): void {
    if (this.progressTimer) {
      clearInterval(this.progressTimer);
      this.progressTimer = undefined;
      this.redraw(CLEAR_LINE);
    }
  }

  printSummary(report: CrawlReport, reportPath?: string): void {
    this.write('');
    this.write('Scan Summary:');
    this.write(`- HTML Pages: ${report.stats.total_html}`);
    this.write(`- Backend Endpoints: ${report.stats.total_backend}`);
    this.write(`- JavaScript Functions: ${report.stats.total_functions}`);
    if (reportPath) {
      this.write(`- Report saved to: ${reportPath}`);
    }
  }

  private paint(tone: Tone, text: string): string {
    return this.color ? `${COLORS[tone]}${text}${COLORS.reset}` : text;
  }
}
