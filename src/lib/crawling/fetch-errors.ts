/**
 * Fetch Error Handling
 * Classification of per-target fetch failures and fatal setup errors
 */

export enum FetchErrorKind {
  TIMEOUT = 'timeout',
  CONNECTION_REFUSED = 'connection_refused',
  HTTP_STATUS = 'http_status',
  TOO_LARGE = 'too_large',
  MALFORMED = 'malformed',
  DNS_FAILURE = 'dns_failure',
  NETWORK = 'network',
}

export interface FetchError {
  kind: FetchErrorKind;
  message: string;
  statusCode?: number;
}

/**
 * Fatal error raised before or instead of a crawl (invalid seed, unusable config,
 * unresolvable seed host). Everything else is recorded per target.
 */
export class CrawlSetupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CrawlSetupError';
  }
}

const TIMEOUT_CODES = new Set([
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

const DNS_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN', 'EAI_NONAME']);

const MALFORMED_CODES = new Set([
  'UND_ERR_RES_CONTENT_LENGTH_MISMATCH',
  'UND_ERR_INFO',
  'ERR_INVALID_CHAR',
]);

/**
 * Build the error for a non-2xx response
 */
export function httpStatusError(statusCode: number, statusText?: string): FetchError {
  return {
    kind: FetchErrorKind.HTTP_STATUS,
    message: statusText ? `HTTP ${statusCode} ${statusText}` : `HTTP ${statusCode}`,
    statusCode,
  };
}

export function tooLargeError(limit: number): FetchError {
  return {
    kind: FetchErrorKind.TOO_LARGE,
    message: `Response body exceeds ${limit} bytes`,
  };
}

/**
 * Classify an error thrown by fetch() or while reading a body
 */
export function classifyFetchError(error: unknown): FetchError {
  const name = errorName(error);
  const message = errorMessage(error);
  // undici wraps the socket error in `cause`
  const code = errorCode(error) ?? errorCode(errorCause(error));

  if (name === 'AbortError' || name === 'TimeoutError' || (code && TIMEOUT_CODES.has(code))) {
    return { kind: FetchErrorKind.TIMEOUT, message: 'Request timed out' };
  }

  if (code === 'ECONNREFUSED') {
    return { kind: FetchErrorKind.CONNECTION_REFUSED, message: 'Connection refused' };
  }

  if (code && DNS_CODES.has(code)) {
    return { kind: FetchErrorKind.DNS_FAILURE, message: 'Host could not be resolved' };
  }

  // llhttp parse errors are reported as HPE_*
  if (code && (code.startsWith('HPE_') || MALFORMED_CODES.has(code))) {
    return { kind: FetchErrorKind.MALFORMED, message: `Malformed response (${code})` };
  }

  return {
    kind: FetchErrorKind.NETWORK,
    message: code ? `${message} (${code})` : message,
  };
}

function errorName(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string') {
    return error.name;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.toString();
  }
  return String(error) || 'Unknown error';
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function errorCause(error: unknown): unknown {
  return error instanceof Error ? error.cause : undefined;
}
