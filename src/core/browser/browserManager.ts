import { chromium, errors, firefox, webkit, type Browser, type BrowserType, type LaunchOptions, type Page } from 'playwright';
import { BrowserConfig } from '../../types/schema';
import { ScrapingError } from '../../types/scraping';
import { Logger } from '../../utils/logger';
import { BrowserSession, PageHandle } from './session';

type PlaywrightElement = Awaited<ReturnType<Page['$$']>>[number];


export class BrowserManager {
constructor(private cfg: Partial<BrowserConfig> = {}, private logger = new Logger()) {}


async launch(): Promise<Browser> {
const kind = this.cfg.kind ?? 'chromium';
const type: BrowserType<Browser> = kind === 'firefox' ? firefox : kind === 'webkit' ? webkit : chromium;
const opts: LaunchOptions = {
    headless: this.cfg.headless ?? true,
    slowMo: this.cfg.slowMo ?? 0,
    timeout: this.cfg.timeout ?? 30000,
  };
const browser = await type.launch(opts);
return browser;
}

/** Launches a browser with a single page. Failure here is fatal for the run. */
async openSession(): Promise<PlaywrightSession> {
  const browser = await this.launch();
  try {
    const context = await browser.newContext(
      this.cfg.userAgent !== undefined ? { userAgent: this.cfg.userAgent } : {}
    );
    const page = await context.newPage();
    this.logger.debug('Browser session opened', { kind: this.cfg.kind ?? 'chromium' });
    return new PlaywrightSession(browser, page);
  } catch (error) {
    await browser.close();
    throw error;
  }
}
}


class PlaywrightPage implements PageHandle<PlaywrightElement> {
  constructor(private page: Page) {}

  url(): string {
    return this.page.url();
  }

  evaluate(script: string): Promise<unknown> {
    return this.page.evaluate(script);
  }

  queryAll(selector: string): Promise<PlaywrightElement[]> {
    return this.page.$$(selector);
  }

  getAttribute(el: PlaywrightElement, name: string): Promise<string | null> {
    return el.getAttribute(name);
  }

  // innerText keeps the line breaks the listing cards render with.
  async textContent(el: PlaywrightElement): Promise<string> {
    try {
      return await el.innerText();
    } catch {
      return (await el.textContent()) ?? '';
    }
  }

  content(): Promise<string> {
    return this.page.content();
  }
}


export class PlaywrightSession implements BrowserSession<PlaywrightElement> {
  private handle: PlaywrightPage;

  constructor(private browser: Browser, private page: Page) {
    this.handle = new PlaywrightPage(page);
  }

  async navigate(url: string, timeoutMs: number): Promise<PageHandle<PlaywrightElement>> {
    try {
      await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        throw new ScrapingError('timeout', `Navigation timed out after ${timeoutMs}ms`, url, { cause: error });
      }
      throw new ScrapingError('navigation', `Navigation failed: ${error instanceof Error ? error.message : String(error)}`, url, { cause: error });
    }
    return this.handle;
  }

  async close(): Promise<void> {
    await this.page.close();
    await this.browser.close();
  }
}
