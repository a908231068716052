import { describe, it, expect } from 'vitest';
import { DescriptionExtractor, isDescriptionParagraph, scoreDescription } from '../../src/core/scraping/description';
import { parseDetailDocument } from '../../src/core/scraping/extractor';

const URL = 'https://www.example.com/companies/acme';
const describeHtml = (html: string) => new DescriptionExtractor().extract(parseDetailDocument(html, URL, 'Acme'));

const ACME = 'Acme builds an AI platform that automates invoicing for enterprises.';

describe('scoreDescription', () => {
  it('rewards the name, an action verb and business nouns', () => {
    expect(scoreDescription(ACME, 'Acme')).toBe(7);
  });

  it('penalizes boilerplate', () => {
    expect(scoreDescription('Acme is based in Austin and provides software for clinics nationwide.', 'Acme')).toBe(4);
  });
});

describe('isDescriptionParagraph', () => {
  it('needs length and a business signal', () => {
    expect(isDescriptionParagraph(ACME)).toBe(true);
    expect(isDescriptionParagraph('Acme builds software.')).toBe(false);
    expect(isDescriptionParagraph('Our offices in San Francisco are open to visitors on weekdays only.')).toBe(false);
  });
});

describe('DescriptionExtractor', () => {
  it('selects the only qualifying paragraph when there is no meta description', () => {
    expect(describeHtml(`<html><body><div><p>${ACME}</p></div></body></html>`)).toBe(ACME);
  });

  it('prefers the meta description', () => {
    const html = `<html><head><meta name="description" content="Acme builds invoicing software for finance teams"></head>
      <body><p>${ACME}</p></body></html>`;
    expect(describeHtml(html)).toBe('Acme builds invoicing software for finance teams.');
  });

  it('ignores directory boilerplate in the meta description', () => {
    const html = `<html><head><meta name="description" content="Companies directory: browse thousands of startups"></head>
      <body><p>${ACME}</p></body></html>`;
    expect(describeHtml(html)).toBe(ACME);
  });

  it('takes the first qualifying paragraph of the main content', () => {
    const html = `<html><body><main>
      <p>Short intro.</p>
      <p>Located in San Francisco, Acme provides payroll software to startups.</p>
      <p>Acme offers a payroll service for small businesses everywhere.</p>
    </main><p>${ACME}</p></body></html>`;
    expect(describeHtml(html)).toBe('Acme offers a payroll service for small businesses everywhere.');
  });

  it('falls back to the best scoring paragraph', () => {
    const html = `<html><body><div>
      <p>Acme is based in Austin and provides software for clinics nationwide.</p>
      <p>The team develops a scheduling tool and service for dental offices.</p>
    </div></body></html>`;
    expect(describeHtml(html)).toBe('The team develops a scheduling tool and service for dental offices.');
  });

  it('keeps inline markup attached to neighbouring punctuation', () => {
    const html = '<html><body><p>Acme builds <strong>AI</strong>-native invoicing software for <em>SMBs</em> across North America.</p></body></html>';
    expect(describeHtml(html)).toBe('Acme builds AI-native invoicing software for SMBs across North America.');
  });

  it('returns an empty string when nothing qualifies', () => {
    expect(describeHtml('<html><body><p>Welcome!</p></body></html>')).toBe('');
  });
});
