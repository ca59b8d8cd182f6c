/**
 * Link Discoverer
 * Extracts outgoing links, form endpoints and function names from fetched bodies
 */

import * as cheerio from 'cheerio';
import { ExtractedLink, ExtractionResult, LinkContext } from './crawling.types';
import { extractFunctionNames, extractScriptReferences } from './script-analyzer';
import { getPathExtension } from './url-normalizer';

/**
 * Elements and attributes followed as navigation links.
 * Media sources (img, source, video) are never followed.
 */
const NAVIGATION_SELECTORS: Array<{ selector: string; attr: string }> = [
  { selector: 'a[href]', attr: 'href' },
  { selector: 'area[href]', attr: 'href' },
  { selector: 'link[href]', attr: 'href' },
  { selector: 'iframe[src]', attr: 'src' },
  { selector: 'frame[src]', attr: 'src' },
];

export type BodyType = 'html' | 'javascript' | 'other';

/**
 * Decide how a body should be parsed from its content type
 */
export function detectBodyType(body: string, contentType: string, baseUrl: string): BodyType {
  const type = contentType.toLowerCase();

  if (type.includes('html')) {
    return 'html';
  }
  if (type.includes('javascript') || type.includes('ecmascript')) {
    return 'javascript';
  }
  if (type === '' || type.startsWith('text/plain') || type.startsWith('application/octet-stream')) {
    if (isScriptUrl(baseUrl)) {
      return 'javascript';
    }
    if (type === '' && body.trimStart().startsWith('<')) {
      return 'html';
    }
  }
  return 'other';
}

export class LinkDiscoverer {
  /**
   * Extract links and function names. Never throws; unparseable input yields
   * whatever could be recovered.
   */
  extract(body: string, contentType: string, baseUrl: string): ExtractionResult {
    switch (detectBodyType(body, contentType, baseUrl)) {
      case 'html':
        return this.extractFromHtml(body);
      case 'javascript':
        return this.extractFromScript(body);
      default:
        return { links: [], functions: [] };
    }
  }

  /**
   * Discover links from HTML, running inline scripts through the script path
   */
  extractFromHtml(html: string): ExtractionResult {
    const links: ExtractedLink[] = [];
    const functions: string[] = [];

    let $: cheerio.CheerioAPI;
    try {
      $ = cheerio.load(html);
    } catch {
      return { links, functions };
    }

    for (const { selector, attr } of NAVIGATION_SELECTORS) {
      $(selector).each((_, el) => {
        pushLink(links, $(el).attr(attr), LinkContext.NAVIGATION);
      });
    }

    $('form[action]').each((_, el) => {
      pushLink(links, $(el).attr('action'), LinkContext.FORM_ACTION);
    });

    $('[formaction]').each((_, el) => {
      pushLink(links, $(el).attr('formaction'), LinkContext.FORM_ACTION);
    });

    $('script').each((_, el) => {
      const src = $(el).attr('src');
      if (src) {
        pushLink(links, src, LinkContext.SCRIPT_SOURCE);
        return;
      }

      const inline = $(el).html();
      if (inline) {
        const scriptResult = this.extractFromScript(inline);
        links.push(...scriptResult.links);
        functions.push(...scriptResult.functions);
      }
    });

    return { links, functions: Array.from(new Set(functions)) };
  }

  /**
   * Discover function names and backend calls from JavaScript source
   */
  extractFromScript(source: string): ExtractionResult {
    return {
      links: extractScriptReferences(source).map((href) => ({
        href,
        context: LinkContext.SCRIPT_REFERENCE,
      })),
      functions: extractFunctionNames(source),
    };
  }
}

function pushLink(links: ExtractedLink[], href: string | undefined, context: LinkContext): void {
  const value = href?.trim();
  if (value) {
    links.push({ href: value, context });
  }
}

function isScriptUrl(url: string): boolean {
  try {
    const extension = getPathExtension(new URL(url).pathname);
    return extension === 'js' || extension === 'mjs';
  } catch {
    return false;
  }
}
