import heuristics from './heuristics.json';

export const normalizeWhitespace = (s: string) => s.replace(/\s+/g, ' ').trim();

const escapeRegExp = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const keywordPatterns = new Map<string, RegExp>();

function keywordPattern(keyword: string): RegExp {
  const key = keyword.toLowerCase();
  let re = keywordPatterns.get(key);
  if (!re) {
    const head = /^[a-z0-9]/.test(key) ? '(?:^|[^a-z0-9])' : '';
    const tail = /[a-z0-9]$/.test(key) ? '(?:s|es)?(?![a-z0-9])' : '';
    re = new RegExp(`${head}${escapeRegExp(key)}${tail}`);
    keywordPatterns.set(key, re);
  }
  return re;
}

/**
 * Whole-word, case-insensitive keyword test. A trailing plural `s`/`es`
 * still matches, so `platform` finds `platforms`.
 */
export function hasKeyword(text: string, keyword: string): boolean {
  return keywordPattern(keyword).test(text.toLowerCase());
}

export function hasAnyKeyword(text: string, keywords: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return keywords.some(k => keywordPattern(k).test(lower));
}

export function countKeywords(text: string, keywords: readonly string[]): number {
  const lower = text.toLowerCase();
  return keywords.filter(k => keywordPattern(k).test(lower)).length;
}

export const stripUrls = (text: string) => normalizeWhitespace(text.replace(/https?:\/\/\S+/g, ' '));

/** Collapse whitespace and make sure the sentence ends with terminal punctuation. */
export function cleanSentence(sentence: string): string {
  const s = normalizeWhitespace(sentence);
  if (s && !/[.!?]$/.test(s)) return `${s}.`;
  return s;
}

const PERIOD_MARK = '\u0000';
const ABBREVIATIONS = new RegExp(`\\b(${heuristics.sentenceAbbreviations.join('|')})\\.`, 'g');
const NAV_PATTERN = /^[A-Z][a-z]*\s*[:|>]/;
const MIN_SENTENCE_LENGTH = 20;

export function splitIntoSentences(text: string): string[] {
  const guarded = text.replace(ABBREVIATIONS, `$1${PERIOD_MARK}`);
  const out: string[] = [];

  for (const part of guarded.split(/[.!?]\s+(?=[A-Z])/)) {
    const sentence = normalizeWhitespace(part.split(PERIOD_MARK).join('.'));
    if (sentence.length <= MIN_SENTENCE_LENGTH) continue;
    const lower = sentence.toLowerCase();
    if (heuristics.sentenceNavigationPrefixes.some(p => lower.startsWith(p))) continue;
    if (NAV_PATTERN.test(sentence)) continue;
    out.push(sentence);
  }
  return out;
}

const NAME_EXCLUSIONS = new Set(heuristics.founders.nameExclusions);
const MAX_NAMES = 5;

const trimToken = (t: string) => t.replace(/^[("'“]+/, '').replace(/[),.;:!?'"”]+$/, '');

function isNameToken(token: string): boolean {
  return (
    token.length > 1 &&
    /^\p{Lu}/u.test(token) &&
    !NAME_EXCLUSIONS.has(token.toLowerCase()) &&
    !/^\d+$/.test(token) &&
    !token.startsWith('http')
  );
}

/** Pairs of consecutive capitalized tokens, e.g. "Jane Doe"; first five, in order. */
export function extractNames(text: string): string[] {
  const words = normalizeWhitespace(text).split(' ').map(trimToken);
  const names: string[] = [];

  let i = 0;
  while (i < words.length) {
    if (isNameToken(words[i]) && i + 1 < words.length && isNameToken(words[i + 1])) {
      const full = `${words[i]} ${words[i + 1]}`;
      const lower = full.toLowerCase();
      if (!heuristics.founders.nameRejectFragments.some(f => lower.includes(f)) && !names.includes(full)) {
        names.push(full);
      }
      i += 2;
    } else {
      i += 1;
    }
  }

  return names.slice(0, MAX_NAMES);
}
