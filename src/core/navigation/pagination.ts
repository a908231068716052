import type { ScrollState, ScrollStopReason } from '../../types';
import type { Logger } from '../../utils/logger';
import type { RunContext } from '../automation/context';
import type { PageHandle } from '../browser/session';
import type { LinkCollector } from './flow';

const SCROLL_SCRIPT = 'window.scrollTo(0, document.body.scrollHeight)';
const HEIGHT_SCRIPT = 'document.body.scrollHeight';

export interface ScrollOutcome {
  converged: boolean;
  reason: ScrollStopReason;
  state: ScrollState;
}

/**
 * Infinite-scroll driver. Keeps scrolling to the bottom until the number of
 * distinct detail links stops growing for `scrollStabilityRounds` rounds.
 * Page height is tracked too but only logged: virtualized lists can hold a
 * steady height while still mounting new cards.
 */
export class ScrollConvergence {
  private logger: Logger;

  constructor(private collector: LinkCollector, private ctx: RunContext) {
    this.logger = ctx.logger.child({ name: 'scroll' });
  }

  async run<TElement>(page: PageHandle<TElement>): Promise<ScrollOutcome> {
    const { scrollStabilityRounds, maxScrollAttempts, scrollDelay, targetRecordUpperBound } = this.ctx.config;
    const state: ScrollState = {
      rounds: 0,
      lastHeight: 0,
      heightStableRounds: 0,
      linkSetStableRounds: 0,
      uniqueLinks: 0,
    };

    try {
      state.uniqueLinks = await this.collector.collect(page);
      state.lastHeight = await this.readHeight(page);
      this.logger.debug('Baseline collected', { links: state.uniqueLinks, height: state.lastHeight });

      for (;;) {
        await page.evaluate(SCROLL_SCRIPT);
        await this.ctx.sleep(scrollDelay);
        const height = await this.readHeight(page);
        const links = await this.collector.collect(page);

        state.rounds++;
        state.heightStableRounds = height === state.lastHeight ? state.heightStableRounds + 1 : 0;
        state.linkSetStableRounds = links === state.uniqueLinks ? state.linkSetStableRounds + 1 : 0;
        state.lastHeight = height;
        state.uniqueLinks = links;
        this.logger.debug('Scroll round', { ...state });

        if (state.linkSetStableRounds >= scrollStabilityRounds) {
          this.logger.info('Link set stable', { links, rounds: state.rounds });
          return { converged: true, reason: 'stable', state };
        }
        if (links >= targetRecordUpperBound) {
          this.logger.info('Reached record upper bound', { links, bound: targetRecordUpperBound });
          return { converged: false, reason: 'upper-bound', state };
        }
        if (state.rounds >= maxScrollAttempts) {
          this.logger.warn('Scrolling did not converge', { links, rounds: state.rounds });
          return { converged: false, reason: 'max-attempts', state };
        }
      }
    } catch (error) {
      this.logger.warn('Scrolling aborted, continuing with collected links', { error, links: this.collector.size });
      state.uniqueLinks = this.collector.size;
      return { converged: false, reason: 'error', state };
    }
  }

  private async readHeight<TElement>(page: PageHandle<TElement>): Promise<number> {
    const height = await page.evaluate(HEIGHT_SCRIPT);
    return typeof height === 'number' ? height : 0;
  }
}
