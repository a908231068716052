import * as cheerio from 'cheerio';
import { DetailDocument } from '../../types/extraction';
import { BaseExtractor } from './base';
import { DescriptionExtractor } from './description';
import heuristics from './heuristics.json';
import { cleanSentence, hasAnyKeyword, normalizeWhitespace, splitIntoSentences } from './text';

const {
  teamSelectors,
  mainSelectors,
  removeSelectors,
  navigationTexts,
  boilerplatePhrases,
  teamKeywords,
  tractionKeywords,
  uniquenessKeywords,
} = heuristics.summary;

const MIN_SECTION_LENGTH = 30;
const MIN_MAIN_LENGTH = 100;
const MIN_INSIGHT_LENGTH = 30;

/** Copy of the document without navigation chrome, breadcrumbs or bare nav labels. */
export function stripNonContent(doc: DetailDocument): DetailDocument {
  const $ = cheerio.load(doc.$.html());
  $(removeSelectors.join(', ')).remove();
  $('*').each((_, el) => {
    const node = $(el);
    if (node.children().length === 0 && navigationTexts.includes(normalizeWhitespace(node.text()))) {
      node.remove();
    }
  });
  return { ...doc, $ };
}

const isBoilerplate = (sentence: string) => hasAnyKeyword(sentence, boilerplatePhrases);

function pickInsight(sentences: readonly string[], keywords: readonly string[], used: Set<string>): string {
  for (const sentence of sentences) {
    if (sentence.length <= MIN_INSIGHT_LENGTH || used.has(sentence) || isBoilerplate(sentence)) continue;
    if (!hasAnyKeyword(sentence, keywords)) continue;
    used.add(sentence);
    return cleanSentence(sentence);
  }
  return '';
}

/**
 * Two-part free-text summary: "What They Do" from the description heuristics
 * and "Specific Insights" made of at most one team, one traction and one
 * uniqueness sentence.
 */
export class SummaryExtractor extends BaseExtractor<'summary'> {
  constructor(private readonly description = new DescriptionExtractor()) {
    super('summary', 'summary', '');
  }

  extract(doc: DetailDocument): string {
    const content = stripNonContent(doc);
    const parts: string[] = [];

    const whatTheyDo = this.description.extract(content);
    if (whatTheyDo) parts.push(`What They Do: ${whatTheyDo}`);

    const used = new Set<string>();
    const mainSentences = splitIntoSentences(this.mainContentText(content));
    const insights = [
      pickInsight(this.teamSentences(content), teamKeywords, used),
      pickInsight(mainSentences, tractionKeywords, used),
      pickInsight(mainSentences, uniquenessKeywords, used),
    ].filter(Boolean);
    if (insights.length) parts.push(`Specific Insights: ${insights.join(' ')}`);

    return parts.join(' | ');
  }

  private teamSentences(doc: DetailDocument): string[] {
    return this.texts(doc, teamSelectors.join(', '))
      .filter(text => text.length > MIN_SECTION_LENGTH)
      .flatMap(splitIntoSentences);
  }

  private mainContentText(doc: DetailDocument): string {
    const blocks = this.texts(doc, mainSelectors.join(', ')).filter(text => text.length > MIN_MAIN_LENGTH);
    if (blocks.length) return blocks.join(' ');
    return normalizeWhitespace(doc.$('body').text());
  }
}
