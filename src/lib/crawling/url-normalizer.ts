/**
 * URL Normalization Utilities
 * Functions for normalizing, scoping and classifying discovered URLs
 */

import { LinkContext, ResourceKind, TraversableKind } from './crawling.types';

const STATIC_ASSET_EXTENSIONS = new Set([
  // Images
  'png', 'jpg', 'jpeg', 'gif', 'svg', 'ico', 'webp', 'bmp', 'tif', 'tiff', 'avif',
  // Stylesheets
  'css', 'scss', 'less',
  // Fonts
  'woff', 'woff2', 'ttf', 'otf', 'eot',
  // Media
  'mp3', 'mp4', 'webm', 'ogg', 'wav', 'avi', 'mov',
  // Documents and archives
  'pdf', 'zip', 'gz', 'tar', 'rar', '7z', 'exe', 'dmg', 'doc', 'docx', 'xls', 'xlsx', 'ppt', 'pptx',
  // Source maps
  'map',
]);

const SCRIPT_EXTENSIONS = new Set(['js', 'mjs']);

const BACKEND_EXTENSIONS = new Set(['json', 'xml', 'ashx', 'asmx', 'do', 'action', 'cgi', 'svc']);

const MARKUP_EXTENSIONS = new Set(['html', 'htm', 'xhtml', 'shtml']);

// Page or endpoint depending on how the link was reached
const SERVER_SCRIPT_EXTENSIONS = new Set(['php', 'asp', 'aspx', 'jsp', 'jspx', 'cfm']);

const API_SEGMENT_PATTERN = /\/(api|rest|ws|graphql|ajax|rpc|services?)(\/|$)/;

const ACTION_QUERY_KEYS = ['action', 'method', 'api_key'];

const ALLOWED_PROTOCOLS = new Set(['http:', 'https:']);

/**
 * Normalize a link found on `baseUrl`.
 * Returns null when the link is malformed or not an http(s) URL.
 */
export function normalizeUrl(url: string, baseUrl?: string): string | null {
  const raw = url.trim();
  if (!raw || raw.startsWith('#')) {
    return null;
  }

  let urlObj: URL;
  try {
    // Resolves relative and protocol-relative links
    urlObj = baseUrl ? new URL(raw, baseUrl) : new URL(raw);
  } catch {
    return null;
  }

  if (!ALLOWED_PROTOCOLS.has(urlObj.protocol)) {
    return null;
  }

  // Remove fragment
  urlObj.hash = '';

  // Sort query parameters
  const sortedParams = Array.from(urlObj.searchParams.entries()).sort(([a], [b]) =>
    a.localeCompare(b)
  );
  urlObj.search = '';
  sortedParams.forEach(([key, value]) => {
    urlObj.searchParams.append(key, value);
  });

  // Remove trailing slash (except for root)
  const pathname = urlObj.pathname;
  if (pathname.length > 1 && pathname.endsWith('/')) {
    urlObj.pathname = pathname.slice(0, -1);
  }

  // Scheme and host are lower-cased and default ports dropped by the URL parser
  return urlObj.href;
}

/**
 * Host of a URL, port included, without a leading www.
 * Default ports are already dropped by the URL parser.
 */
export function extractDomain(url: string): string {
  try {
    const urlObj = new URL(url);
    // Remove www. prefix for comparison
    let hostname = urlObj.host.toLowerCase();
    if (hostname.startsWith('www.')) {
      hostname = hostname.substring(4);
    }
    return hostname;
  } catch {
    return '';
  }
}

/**
 * Check if two URLs are from the same site (host and port)
 */
export function isSameDomain(url1: string, url2: string): boolean {
  const domain1 = extractDomain(url1);
  return domain1 !== '' && domain1 === extractDomain(url2);
}

/**
 * Lower-cased extension of the last path segment, or '' when there is none
 */
export function getPathExtension(pathname: string): string {
  const lastSegment = pathname.slice(pathname.lastIndexOf('/') + 1);
  const dotIndex = lastSegment.lastIndexOf('.');
  if (dotIndex <= 0 || dotIndex === lastSegment.length - 1) {
    return '';
  }
  return lastSegment.slice(dotIndex + 1).toLowerCase();
}

/**
 * Classify a normalized URL relative to the crawl's seed.
 * Pure: the same (url, seedUrl, context) always yields the same kind.
 */
export function classifyUrl(url: string, seedUrl: string, context: LinkContext): ResourceKind {
  let urlObj: URL;
  try {
    urlObj = new URL(url);
  } catch {
    return ResourceKind.UNSUPPORTED;
  }

  if (!isSameDomain(url, seedUrl)) {
    return ResourceKind.EXTERNAL;
  }

  const pathname = urlObj.pathname.toLowerCase();
  const extension = getPathExtension(pathname);

  if (STATIC_ASSET_EXTENSIONS.has(extension)) {
    return ResourceKind.UNSUPPORTED;
  }

  if (SCRIPT_EXTENSIONS.has(extension)) {
    return ResourceKind.SCRIPT;
  }

  if (
    API_SEGMENT_PATTERN.test(pathname) ||
    BACKEND_EXTENSIONS.has(extension) ||
    ACTION_QUERY_KEYS.some((key) => urlObj.searchParams.has(key))
  ) {
    return ResourceKind.BACKEND_ENDPOINT;
  }

  if (MARKUP_EXTENSIONS.has(extension)) {
    return ResourceKind.HTML_PAGE;
  }

  if (extension === '' || SERVER_SCRIPT_EXTENSIONS.has(extension)) {
    return isActionContext(context) ? ResourceKind.BACKEND_ENDPOINT : ResourceKind.HTML_PAGE;
  }

  return ResourceKind.UNSUPPORTED;
}

/**
 * Whether links of this kind are fetched
 */
export function isTraversable(kind: ResourceKind): kind is TraversableKind {
  return (
    kind === ResourceKind.HTML_PAGE ||
    kind === ResourceKind.BACKEND_ENDPOINT ||
    kind === ResourceKind.SCRIPT
  );
}

function isActionContext(context: LinkContext): boolean {
  return context === LinkContext.FORM_ACTION || context === LinkContext.SCRIPT_REFERENCE;
}
