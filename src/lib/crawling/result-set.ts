/**
 * Result Set
 * Deduplicated collections of discovered pages, endpoints and function names
 */

export interface ResultSnapshot {
  htmlPages: string[];
  backendEndpoints: string[];
  functions: string[];
}

export class ResultSet {
  private htmlPages: Set<string> = new Set();
  private backendEndpoints: Set<string> = new Set();
  private functions: Set<string> = new Set();
  private frozen: boolean = false;

  /**
   * Each add returns true only when the value is new
   */
  addHtmlPage(url: string): boolean {
    return this.add(this.htmlPages, url);
  }

  addBackendEndpoint(url: string): boolean {
    return this.add(this.backendEndpoints, url);
  }

  addFunction(name: string): boolean {
    return this.add(this.functions, name);
  }

  /**
   * Stop accepting additions; the crawl is done
   */
  freeze(): void {
    this.frozen = true;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  counts(): { html: number; backend: number; functions: number } {
    return {
      html: this.htmlPages.size,
      backend: this.backendEndpoints.size,
      functions: this.functions.size,
    };
  }

  /**
   * Sorted copies, safe to hold while the crawl keeps running
   */
  snapshot(): ResultSnapshot {
    return {
      htmlPages: Array.from(this.htmlPages).sort(),
      backendEndpoints: Array.from(this.backendEndpoints).sort(),
      functions: Array.from(this.functions).sort(),
    };
  }

  private add(collection: Set<string>, value: string): boolean {
    if (this.frozen || collection.has(value)) {
      return false;
    }
    collection.add(value);
    return true;
  }
}
