import { DetailDocument } from '../../types/extraction';
import { BaseExtractor } from './base';
import heuristics from './heuristics.json';
import { hasKeyword, normalizeWhitespace } from './text';

export interface BasicInfo {
  name: string;
  categories: string[];
}

/**
 * Listing-card tokenization used by the capture pass: the first non-empty
 * line is the provisional name, known category keywords anywhere in the
 * card become tags.
 */
export function extractBasicInfo(text: string): BasicInfo {
  const lines = text.split(/[\n\r]+/).map(normalizeWhitespace).filter(Boolean);
  const name = lines[0] ?? '';
  const categories = heuristics.categoryKeywords.filter(k => hasKeyword(text, k));
  return { name, categories };
}

/** Ordered union; duplicates compare case-insensitively and the first spelling wins. */
export function mergeCategories(existing: readonly string[], incoming: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const c of [...existing, ...incoming]) {
    const tag = normalizeWhitespace(c);
    const key = tag.toLowerCase();
    if (!tag || seen.has(key)) continue;
    seen.add(key);
    out.push(tag);
  }
  return out;
}

export class NameExtractor extends BaseExtractor<'name'> {
  constructor() {
    super('name', 'name', 'h1');
  }

  extract(doc: DetailDocument): string {
    return this.texts(doc)[0] ?? '';
  }
}

export class CategoryExtractor extends BaseExtractor<'categories'> {
  constructor() {
    super('categories', 'categories', 'a[href*="/industry/"], a[href*="industry="]');
  }

  extract(doc: DetailDocument): string[] {
    return mergeCategories([], this.texts(doc));
  }
}
