import { DetailDocument } from '../../types/extraction';
import { BaseExtractor } from './base';
import heuristics from './heuristics.json';
import { cleanSentence, countKeywords, hasAnyKeyword, normalizeWhitespace } from './text';

const { actionVerbs, businessNouns, skipPhrases, penaltyPhrases, metaBoilerplatePrefixes } = heuristics.description;
const MAIN_SELECTORS = heuristics.summary.mainSelectors;

const MIN_META_LENGTH = 30;
const MIN_PARAGRAPH_LENGTH = 50;

export function isDescriptionParagraph(text: string): boolean {
  const lower = text.toLowerCase();
  if (skipPhrases.some(p => lower.includes(p))) return false;
  return text.length > MIN_PARAGRAPH_LENGTH && hasAnyKeyword(text, [...actionVerbs, ...businessNouns]);
}

export function scoreDescription(text: string, companyName: string): number {
  const lower = text.toLowerCase();
  let score = 0;
  const name = normalizeWhitespace(companyName).toLowerCase();
  if (name && lower.includes(name)) score += 2;
  if (hasAnyKeyword(text, actionVerbs)) score += 3;
  score += countKeywords(text, businessNouns);
  if (hasAnyKeyword(text, penaltyPhrases)) score -= 2;
  return score;
}

/**
 * Picks what the company does: meta description, then the first qualifying
 * paragraph of the main content area, then the best-scoring paragraph.
 */
export class DescriptionExtractor extends BaseExtractor<'description'> {
  constructor() {
    super('description', 'description', '');
  }

  extract(doc: DetailDocument): string {
    return this.fromMeta(doc) || this.fromMainContent(doc) || this.fromScoredParagraphs(doc);
  }

  private fromMeta(doc: DetailDocument): string {
    const content = normalizeWhitespace(doc.$('meta[name="description"]').attr('content') ?? '');
    const lower = content.toLowerCase();
    if (content.length > MIN_META_LENGTH && !metaBoilerplatePrefixes.some(p => lower.startsWith(p))) {
      return cleanSentence(content);
    }
    return '';
  }

  private fromMainContent(doc: DetailDocument): string {
    for (const selector of MAIN_SELECTORS) {
      const container = doc.$(selector).first();
      if (!container.length) continue;
      for (const p of container.find('p').toArray()) {
        const text = normalizeWhitespace(doc.$(p).text());
        if (isDescriptionParagraph(text)) return cleanSentence(text);
      }
    }
    return '';
  }

  private fromScoredParagraphs(doc: DetailDocument): string {
    let best = '';
    let bestScore = 0;
    for (const text of this.texts(doc, 'p')) {
      if (!isDescriptionParagraph(text)) continue;
      const score = scoreDescription(text, doc.companyName);
      if (score > bestScore || (score === bestScore && score > 0 && text.length > best.length)) {
        best = text;
        bestScore = score;
      }
    }
    return best ? cleanSentence(best) : '';
  }
}
