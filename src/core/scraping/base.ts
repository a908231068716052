import { EnrichedFields } from '../../types/company';
import { DetailDocument, FieldExtractorStrategy, FieldName } from '../../types/extraction';
import { normalizeWhitespace } from './text';

export abstract class BaseExtractor<K extends FieldName> implements FieldExtractorStrategy<K> {
  constructor(
    readonly name: string,
    readonly field: K,
    readonly selector: string
  ) {}

  abstract extract(doc: DetailDocument): NonNullable<EnrichedFields[K]>;

  isApplicable(doc: DetailDocument): boolean {
    return !this.selector || doc.$(this.selector).length > 0;
  }

  /** Whitespace-normalized text of every match, in document order. */
  protected texts(doc: DetailDocument, selector = this.selector): string[] {
    return doc.$(selector)
      .toArray()
      .map(el => normalizeWhitespace(doc.$(el).text()))
      .filter(Boolean);
  }
}
