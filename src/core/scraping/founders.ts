import { Founder, MAX_FOUNDERS } from '../../types/company';
import { DetailDocument } from '../../types/extraction';
import { BaseExtractor } from './base';
import heuristics from './heuristics.json';
import { extractNames, hasAnyKeyword, normalizeWhitespace, stripUrls } from './text';

const PROFILE_ANCHOR = "a[href*='linkedin.com']";
const PROFILE_HOST = 'www.linkedin.com';
const SECTION_DEPTH = 3;
const PAGE_DEPTH = 4;
const KEYWORD_WINDOW = 8;

/**
 * Canonical profile URL: https, lowercase, no query or fragment, no trailing
 * slash, `www` host. Returns '' for anything that is not a profile-network URL.
 */
export function normalizeProfileUrl(raw: string): string {
  let url = raw.trim();
  if (!url) return '';
  if (url.startsWith('//')) url = `https:${url}`;
  else if (!/^https?:\/\//i.test(url)) url = `https://${url.replace(/^\/+/, '')}`;

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return '';
  }

  const host = parsed.hostname.toLowerCase();
  if (host !== 'linkedin.com' && !host.endsWith('.linkedin.com')) return '';
  const path = parsed.pathname.replace(/\/+$/, '').toLowerCase();
  return `https://${PROFILE_HOST}${path}`;
}

export const isPersonProfile = (url: string) =>
  /\/(in|pub)\//.test(url) && !url.includes('/company/');

const isUsableName = (name: string) =>
  name.length > 1 && !name.toLowerCase().startsWith('linkedin');

/** Profile URL wins as the identity; name-only entries key on the name. */
export function dedupeFounders(founders: readonly Founder[]): Founder[] {
  const byKey = new Map<string, Founder>();
  for (const f of founders) {
    const name = normalizeWhitespace(f.name);
    const profileUrl = f.profileUrl.trim();
    const key = profileUrl || name.toLowerCase();
    if (!key) continue;
    const prev = byKey.get(key);
    if (!prev || (!prev.name && name)) byKey.set(key, { name, profileUrl });
  }
  return Array.from(byKey.values())
    .filter(f => isUsableName(f.name))
    .slice(0, MAX_FOUNDERS);
}

export class FounderExtractor extends BaseExtractor<'founders'> {
  constructor() {
    super('founders', 'founders', '');
  }

  extract(doc: DetailDocument): Founder[] {
    let founders = this.fromAnchors(doc, true);
    if (!founders.length) founders = this.fromAnchors(doc, false);
    if (!founders.length) founders = this.fromText(doc);
    return dedupeFounders(founders);
  }

  private fromAnchors(doc: DetailDocument, inSections: boolean): Founder[] {
    const anchors = inSections
      ? doc.$(heuristics.founders.sectionSelectors.join(', ')).find(PROFILE_ANCHOR)
      : doc.$(PROFILE_ANCHOR);
    const depth = inSections ? SECTION_DEPTH : PAGE_DEPTH;
    const out: Founder[] = [];
    anchors.each((_, el) => {
      const anchor = doc.$(el);
      const profileUrl = normalizeProfileUrl(anchor.attr('href') ?? '');
      if (!profileUrl || !isPersonProfile(profileUrl)) return;

      let name = normalizeWhitespace(anchor.text());
      if (!isUsableName(name)) {
        name = '';
        for (const ancestor of anchor.parents().toArray().slice(0, depth)) {
          const [first] = extractNames(stripUrls(doc.$(ancestor).text()));
          if (first) {
            name = first;
            break;
          }
        }
      }
      if (name) out.push({ name, profileUrl });
    });
    return out;
  }

  /** Name-only fallback: capitalized pairs within a few words of a founder keyword. */
  private fromText(doc: DetailDocument): Founder[] {
    const words = normalizeWhitespace(doc.$('body').text() || doc.$.root().text()).split(' ');
    const names: string[] = [];
    words.forEach((word, i) => {
      if (!hasAnyKeyword(word, heuristics.founders.keywords)) return;
      const window = words.slice(Math.max(0, i - KEYWORD_WINDOW), i + KEYWORD_WINDOW + 1).join(' ');
      for (const name of extractNames(window)) {
        if (!names.includes(name)) names.push(name);
      }
    });
    return names.slice(0, MAX_FOUNDERS).map(name => ({ name, profileUrl: '' }));
  }
}
