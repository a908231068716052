import type { BrowserSession, PageHandle } from '../../src/core/browser/session';
import { ScrapingError } from '../../src/types';

export interface FakeAnchor {
  href: string | null;
  text: string;
}

export interface ListingFrame {
  height: number;
  anchors: FakeAnchor[];
}

export const LISTING_URL = 'https://www.example.com/companies';

/** `count` distinct listing cards, `/companies/co-1` onwards. */
export function anchors(count: number, from = 1): FakeAnchor[] {
  return Array.from({ length: count }, (_, i) => ({
    href: `/companies/co-${from + i}`,
    text: `Co ${from + i}\nBuilds things`,
  }));
}

/**
 * Listing page whose DOM advances one frame per scroll and then stays on the
 * last frame.
 */
export class FakeListingPage implements PageHandle<FakeAnchor> {
  scrolls = 0;
  private index = 0;

  constructor(private frames: ListingFrame[], private failOnScroll?: number) {}

  url(): string {
    return LISTING_URL;
  }

  async evaluate(script: string): Promise<unknown> {
    if (script.includes('scrollTo')) {
      this.scrolls++;
      if (this.scrolls === this.failOnScroll) throw new Error('Execution context was destroyed');
      this.index = Math.min(this.index + 1, this.frames.length - 1);
      return undefined;
    }
    return this.frames[this.index].height;
  }

  async queryAll(): Promise<FakeAnchor[]> {
    return this.frames[this.index].anchors;
  }

  async getAttribute(el: FakeAnchor, name: string): Promise<string | null> {
    return name === 'href' ? el.href : null;
  }

  async textContent(el: FakeAnchor): Promise<string> {
    return el.text;
  }

  async content(): Promise<string> {
    return '<html><body></body></html>';
  }
}

class FakeDetailPage implements PageHandle<FakeAnchor> {
  constructor(private pageUrl: string, private html: string) {}

  url(): string {
    return this.pageUrl;
  }

  async evaluate(): Promise<unknown> {
    return undefined;
  }

  async queryAll(): Promise<FakeAnchor[]> {
    return [];
  }

  async getAttribute(): Promise<string | null> {
    return null;
  }

  async textContent(): Promise<string> {
    return '';
  }

  async content(): Promise<string> {
    return this.html;
  }
}

/** Detail page behaviour keyed by absolute URL: HTML, or an error to throw on navigation. */
export type DetailPages = Record<string, string | Error>;

export class FakeSession implements BrowserSession<FakeAnchor> {
  readonly visited: string[] = [];
  readonly timeouts: number[] = [];
  closed = false;

  constructor(private listing: FakeListingPage | Error | null, private details: DetailPages = {}) {}

  async navigate(url: string, timeoutMs: number): Promise<PageHandle<FakeAnchor>> {
    this.visited.push(url);
    this.timeouts.push(timeoutMs);
    if (url === LISTING_URL && this.listing) {
      if (this.listing instanceof Error) throw this.listing;
      return this.listing;
    }
    const detail = this.details[url];
    if (detail instanceof Error) throw detail;
    if (detail === undefined) throw new ScrapingError('navigation', `No page at ${url}`, url);
    return new FakeDetailPage(url, detail);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export const timeoutError = (url: string) =>
  new ScrapingError('timeout', 'Navigation timed out after 15000ms', url);
