import type { CheerioAPI } from 'cheerio';
import { EnrichedFields } from './company';

/** A parsed detail page handed to every field extractor. */
export interface DetailDocument {
  $: CheerioAPI;
  url: string;
  companyName: string;
}

export type FieldName = keyof EnrichedFields;

// Core extractor interface
export interface FieldExtractorStrategy<K extends FieldName = FieldName> {
  name: string;
  field: K;
  selector: string;
  extract(doc: DetailDocument): NonNullable<EnrichedFields[K]>;
  isApplicable(doc: DetailDocument): boolean;
}

/** Extractors of one field, any key. */
export type AnyFieldExtractor = { [K in FieldName]: FieldExtractorStrategy<K> }[FieldName];

// Extractor registry; run order is registration order.
export class ExtractorRegistry {
  private extractors: Map<string, AnyFieldExtractor> = new Map();

  register(extractor: AnyFieldExtractor): this {
    this.extractors.set(extractor.name, extractor);
    return this;
  }

  getAll(): AnyFieldExtractor[] {
    return Array.from(this.extractors.values());
  }

  getApplicable(doc: DetailDocument): AnyFieldExtractor[] {
    return this.getAll().filter(extractor => extractor.isApplicable(doc));
  }
}
