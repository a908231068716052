import { CompanyRecord, RawLink, ScrapingError } from '../../types';
import { CheckpointWriter } from '../../output/checkpoint';
import { normalizeRecordUrl } from '../navigation/normalize';
import { extractBasicInfo } from '../scraping/basic';
import { normalizeWhitespace } from '../scraping/text';
import { RunContext } from './context';

export type SkipReason = 'navigation-label' | 'rejected' | 'duplicate';

export type CaptureOutcome =
  | { kind: 'captured'; record: CompanyRecord }
  | { kind: 'skipped'; reason: SkipReason; href: string | null }
  | { kind: 'failed'; error: ScrapingError; href: string | null };

/** Turns one listing anchor into a captured record, or says why it did not. */
export function captureLink(link: RawLink, ctx: RunContext): CaptureOutcome {
  const { href, text } = link;
  const label = normalizeWhitespace(text).toLowerCase();
  if (ctx.config.navigationLabels.some(l => normalizeWhitespace(l).toLowerCase() === label)) {
    return { kind: 'skipped', reason: 'navigation-label', href };
  }
  if (!href) {
    return { kind: 'failed', error: new ScrapingError('capture', 'Link has no href'), href };
  }

  try {
    const identityKey = normalizeRecordUrl(href, ctx.config.listingUrl, ctx.recordPath);
    if (!identityKey) return { kind: 'skipped', reason: 'rejected', href };
    if (ctx.records.has(identityKey)) return { kind: 'skipped', reason: 'duplicate', href };

    const { name, categories } = extractBasicInfo(text);
    const record: CompanyRecord = {
      identityKey,
      name,
      categories,
      description: '',
      summary: '',
      founders: [],
      capturedAt: ctx.now(),
      status: 'captured',
    };
    ctx.records.add(record);
    return { kind: 'captured', record };
  } catch (error) {
    const message = `Capture failed: ${error instanceof Error ? error.message : String(error)}`;
    return { kind: 'failed', error: new ScrapingError('capture', message, href, { cause: error }), href };
  }
}

/**
 * Pass 1: every discovered link becomes a record before any detail page is
 * visited. Progress is checkpointed every `progressSaveInterval` captures.
 */
export function capturePass(links: readonly RawLink[], ctx: RunContext, checkpoint: CheckpointWriter): CaptureOutcome[] {
  const logger = ctx.logger.child({ name: 'capture' });
  const { progressSaveInterval } = ctx.config;
  const outcomes: CaptureOutcome[] = [];
  let captured = 0;

  logger.info('Pass 1: capturing basic info', { links: links.length });
  for (const link of links) {
    ctx.stats.increment('totalProcessed');
    const outcome = captureLink(link, ctx);
    outcomes.push(outcome);

    switch (outcome.kind) {
      case 'captured':
        ctx.stats.increment('successfulCaptures');
        captured++;
        if (captured % progressSaveInterval === 0) checkpoint.snapshot(ctx.records.values());
        break;
      case 'skipped':
        ctx.stats.increment('skipped');
        logger.debug('Skipped link', { href: outcome.href, reason: outcome.reason });
        break;
      case 'failed':
        ctx.stats.increment('errors');
        logger.warn('Failed to capture link', { href: outcome.href, error: outcome.error });
        break;
    }
  }

  logger.info('Pass 1 complete', { captured, total: ctx.records.size });
  return outcomes;
}
