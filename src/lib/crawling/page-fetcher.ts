/**
 * Page Fetcher
 * Single bounded-timeout HTTP GET. The only part of the crawler that touches the network.
 */

import { classifyFetchError, FetchError, httpStatusError, tooLargeError } from './fetch-errors';

export interface FetchResult {
  body: string;
  contentType: string;
  statusCode: number;
  /**
   * URL after redirects
   */
  finalUrl: string;
}

export type FetchOutcome = { ok: true; result: FetchResult } | { ok: false; error: FetchError };

export interface PageFetcher {
  /**
   * Fetch a URL. Never throws: failures come back as `{ ok: false }`.
   */
  fetch(url: string, timeout: number): Promise<FetchOutcome>;
}

export interface HttpPageFetcherOptions {
  userAgent: string;
  maxBodyBytes: number;
}

class BodyTooLargeError extends Error {
  constructor(readonly limit: number) {
    super(`Response body exceeds ${limit} bytes`);
    this.name = 'BodyTooLargeError';
  }
}

export class HttpPageFetcher implements PageFetcher {
  constructor(private readonly options: HttpPageFetcherOptions) {}

  async fetch(url: string, timeout: number): Promise<FetchOutcome> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.options.userAgent,
          'Accept': 'text/html, application/xhtml+xml, application/javascript, application/json;q=0.9, */*;q=0.8',
        },
        redirect: 'follow',
        signal: controller.signal,
      });

      if (!response.ok) {
        await response.body?.cancel();
        return { ok: false, error: httpStatusError(response.status, response.statusText) };
      }

      const declaredLength = parseInt(response.headers.get('content-length') || '', 10);
      if (Number.isFinite(declaredLength) && declaredLength > this.options.maxBodyBytes) {
        await response.body?.cancel();
        return { ok: false, error: tooLargeError(this.options.maxBodyBytes) };
      }

      const body = await this.readBody(response);

      return {
        ok: true,
        result: {
          body,
          contentType: response.headers.get('content-type') || '',
          statusCode: response.status,
          finalUrl: response.url || url,
        },
      };
    } catch (error) {
      if (error instanceof BodyTooLargeError) {
        return { ok: false, error: tooLargeError(error.limit) };
      }
      return { ok: false, error: classifyFetchError(error) };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Read the body as UTF-8, stopping once it grows past maxBodyBytes
   */
  private async readBody(response: Response): Promise<string> {
    if (!response.body) {
      return '';
    }

    const reader = response.body.getReader();
    const decoder = new TextDecoder('utf-8');
    const chunks: string[] = [];
    let received = 0;

    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;

      received += value.byteLength;
      if (received > this.options.maxBodyBytes) {
        await reader.cancel();
        throw new BodyTooLargeError(this.options.maxBodyBytes);
      }
      chunks.push(decoder.decode(value, { stream: true }));
    }

    chunks.push(decoder.decode());
    return chunks.join('');
  }
}
