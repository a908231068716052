import {
  CompanyRecord,
  DESCRIPTION_NOT_AVAILABLE,
  EnrichedFields,
  err,
  ok,
  Result,
  ScrapingError,
  SUMMARY_NOT_AVAILABLE,
} from '../../types';
import { ExtractorRegistry } from '../../types/extraction';
import { CheckpointWriter } from '../../output/checkpoint';
import { BrowserSession } from '../browser/session';
import { mergeCategories } from '../scraping/basic';
import { ExtractionError, extractDetailFields, parseDetailDocument } from '../scraping/extractor';
import { dedupeFounders } from '../scraping/founders';
import { normalizeWhitespace } from '../scraping/text';
import { RunContext, transitionStatus } from './context';

export interface EnrichmentError {
  error: ScrapingError;
  /** Fields extracted before the failure. */
  partial: EnrichedFields;
}

export interface EnrichmentSummary {
  enriched: number;
  failed: number;
}

/** Visits the record's detail page and runs every applicable extractor. Never throws. */
export async function enrichRecord<TElement>(
  session: BrowserSession<TElement>,
  record: CompanyRecord,
  ctx: RunContext,
  registry: ExtractorRegistry
): Promise<Result<EnrichedFields, EnrichmentError>> {
  const url = record.identityKey;
  try {
    const page = await session.navigate(url, ctx.config.companyPageTimeout);
    await ctx.sleep(ctx.config.detailSettleDelay);
    const html = await page.content();
    return ok(extractDetailFields(registry, parseDetailDocument(html, url, record.name)));
  } catch (error) {
    if (error instanceof ExtractionError) return err({ error, partial: error.partial });
    if (error instanceof ScrapingError) return err({ error, partial: {} });
    const message = `Detail page failed: ${error instanceof Error ? error.message : String(error)}`;
    return err({ error: new ScrapingError('navigation', message, url, { cause: error }), partial: {} });
  }
}

/**
 * A detail heading replaces the listing name when it is a longer form of it
 * ("Acme" -> "Acme Robotics") or a clean prefix of a noisy one
 * ("Acme Robotics San Francisco" -> "Acme Robotics").
 */
export function shouldReplaceName(current: string, detail: string): boolean {
  const cur = normalizeWhitespace(current).toLowerCase();
  const next = normalizeWhitespace(detail).toLowerCase();
  if (!next || cur === next) return false;
  if (!cur) return true;
  return (next.length > cur.length && next.includes(cur)) || (cur.length > next.length && cur.startsWith(next));
}

/** Applies extracted fields without ever replacing a non-empty value with an empty one. */
export function mergeEnrichment(record: CompanyRecord, fields: EnrichedFields): void {
  if (fields.name && shouldReplaceName(record.name, fields.name)) {
    record.name = normalizeWhitespace(fields.name);
  }
  if (fields.categories?.length) {
    record.categories = mergeCategories(record.categories, fields.categories);
  }
  if (fields.description) record.description = fields.description;
  if (fields.summary) record.summary = fields.summary;
  if (fields.founders?.length) {
    record.founders = dedupeFounders([...record.founders, ...fields.founders]);
  }
}

export function fillSentinels(record: CompanyRecord): void {
  if (!record.description) record.description = DESCRIPTION_NOT_AVAILABLE;
  if (!record.summary) record.summary = SUMMARY_NOT_AVAILABLE;
}

/**
 * Pass 2: enrich records in discovery order, `chunkSize` at a time. Each
 * record is attempted once; a failure marks it `enrichment_failed` and the
 * pass moves on. A checkpoint follows every chunk.
 */
export async function enrichPass<TElement>(
  session: BrowserSession<TElement>,
  ctx: RunContext,
  checkpoint: CheckpointWriter,
  registry: ExtractorRegistry
): Promise<EnrichmentSummary> {
  const logger = ctx.logger.child({ name: 'enrich' });
  const { chunkSize, chunkDelay } = ctx.config;
  const records = ctx.records.values().filter(r => r.status === 'captured');
  const chunks = Math.ceil(records.length / chunkSize);
  const summary: EnrichmentSummary = { enriched: 0, failed: 0 };

  logger.info('Pass 2: enriching records', { records: records.length, chunks });
  for (let start = 0; start < records.length; start += chunkSize) {
    const chunk = records.slice(start, start + chunkSize);
    logger.debug('Processing chunk', { chunk: start / chunkSize + 1, of: chunks });

    for (const record of chunk) {
      const result = await enrichRecord(session, record, ctx, registry);
      mergeEnrichment(record, result.ok ? result.value : result.error.partial);
      fillSentinels(record);
      record.enrichedAt = ctx.now();

      if (result.ok) {
        transitionStatus(record, 'enriched');
        ctx.stats.increment('successfulEnrichments');
        summary.enriched++;
      } else {
        transitionStatus(record, 'enrichment_failed');
        ctx.stats.increment('errors');
        summary.failed++;
        logger.warn('Enrichment failed', { url: record.identityKey, type: result.error.error.type, error: result.error.error });
      }
    }

    checkpoint.snapshot(ctx.records.values());
    if (start + chunkSize < records.length) await ctx.sleep(chunkDelay);
  }

  logger.info('Pass 2 complete', { ...summary });
  return summary;
}
