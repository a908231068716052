import type { DiscoveryResult, RawLink } from '../../types';
import type { RunContext } from '../automation/context';
import type { BrowserSession, PageHandle } from '../browser/session';
import { normalizeRecordUrl } from './normalize';
import { ScrollConvergence } from './pagination';

/**
 * Accumulates the detail links present in the DOM across scroll rounds.
 * The first occurrence of an identity fixes its position; a later non-blank
 * text fills a blank one.
 */
export class LinkCollector {
  private links = new Map<string, RawLink>();

  constructor(private linkSelector: string, private baseUrl: string, private recordPath: RegExp) {}

  get size(): number {
    return this.links.size;
  }

  /** Reads every matching anchor and returns the cumulative unique count. */
  async collect<TElement>(page: PageHandle<TElement>): Promise<number> {
    for (const el of await page.queryAll(this.linkSelector)) {
      const href = await page.getAttribute(el, 'href');
      if (!href) continue;
      const key = normalizeRecordUrl(href, this.baseUrl, this.recordPath);
      if (!key) continue;

      const text = (await page.textContent(el)).trim();
      const seen = this.links.get(key);
      if (!seen) this.links.set(key, { href: key, text });
      else if (!seen.text && text) seen.text = text;
    }
    return this.links.size;
  }

  values(): RawLink[] {
    return Array.from(this.links.values(), link => ({ ...link }));
  }
}

export async function discoverLinks<TElement>(
  session: BrowserSession<TElement>,
  ctx: RunContext
): Promise<DiscoveryResult> {
  const { listingUrl, linkSelector, pageTimeout, listingSettleDelay, minExpectedRecords } = ctx.config;
  const logger = ctx.logger.child({ name: 'discovery' });

  let page: PageHandle<TElement>;
  try {
    page = await session.navigate(listingUrl, pageTimeout);
  } catch (error) {
    logger.warn('Listing page unavailable', { url: listingUrl, error });
    return { links: [], converged: false, rounds: 0, reason: 'error' };
  }
  await ctx.sleep(listingSettleDelay);

  const collector = new LinkCollector(linkSelector, listingUrl, ctx.recordPath);
  const outcome = await new ScrollConvergence(collector, ctx).run(page);
  const links = collector.values();

  if (links.length < minExpectedRecords) {
    logger.warn('Fewer links than expected', { found: links.length, expected: minExpectedRecords });
  }
  logger.info('Discovery finished', { links: links.length, rounds: outcome.state.rounds, reason: outcome.reason });

  return { links, converged: outcome.converged, rounds: outcome.state.rounds, reason: outcome.reason };
}
