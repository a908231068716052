// Detail-page extraction: parse rendered HTML once, then run every applicable
// field extractor against it in registration order.

import * as cheerio from 'cheerio';
import { EnrichedFields } from '../../types/company';
import { DetailDocument, ExtractorRegistry, FieldExtractorStrategy, FieldName } from '../../types/extraction';
import { ScrapingError } from '../../types/scraping';

export class ExtractionError extends ScrapingError {
  constructor(
    readonly extractor: string,
    url: string,
    readonly partial: EnrichedFields,
    cause: unknown
  ) {
    super('extraction', `${extractor} extractor failed: ${cause instanceof Error ? cause.message : String(cause)}`, url, { cause });
    this.name = 'ExtractionError';
  }
}

const BLOCK_ELEMENTS = [
  'address', 'article', 'aside', 'blockquote', 'dd', 'div', 'dl', 'dt', 'figcaption', 'figure',
  'footer', 'form', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'header', 'li', 'main', 'nav', 'ol',
  'p', 'pre', 'section', 'table', 'td', 'th', 'tr', 'ul',
].join(', ');

/**
 * Loads the page into cheerio. Scripts and styles are dropped, `<br>` becomes
 * a space and block elements are padded with spaces, so `.text()` separates
 * blocks while inline markup such as `Acme<span>.ai</span>` stays joined.
 */
export function parseDetailDocument(html: string, url: string, companyName: string): DetailDocument {
  const $ = cheerio.load(html);
  $('script, style, noscript, template').remove();
  $('br').replaceWith(' ');
  $(BLOCK_ELEMENTS).prepend(' ').append(' ');
  return { $, url, companyName };
}

function applyExtractor<K extends FieldName>(
  fields: EnrichedFields,
  extractor: FieldExtractorStrategy<K>,
  doc: DetailDocument
): void {
  fields[extractor.field] = extractor.extract(doc);
}

/** Throws ExtractionError carrying whatever fields were produced before the failing extractor. */
export function extractDetailFields(registry: ExtractorRegistry, doc: DetailDocument): EnrichedFields {
  const fields: EnrichedFields = {};
  for (const extractor of registry.getApplicable(doc)) {
    try {
      applyExtractor(fields, extractor, doc);
    } catch (error) {
      throw new ExtractionError(extractor.name, doc.url, { ...fields }, error);
    }
  }
  return fields;
}
