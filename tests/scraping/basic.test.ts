import { describe, it, expect } from 'vitest';
import { CategoryExtractor, extractBasicInfo, mergeCategories, NameExtractor } from '../../src/core/scraping/basic';
import { parseDetailDocument } from '../../src/core/scraping/extractor';

describe('extractBasicInfo', () => {
  it('takes the first non-empty line as the name and known keywords as categories', () => {
    const info = extractBasicInfo('\n  Acme Robotics \nSaaS platform for HR and Sales teams\nSan Francisco');
    expect(info).toEqual({ name: 'Acme Robotics', categories: ['SaaS', 'Sales', 'HR'] });
  });

  it('handles empty text', () => {
    expect(extractBasicInfo('')).toEqual({ name: '', categories: [] });
  });
});

describe('mergeCategories', () => {
  it('keeps order and drops case-insensitive duplicates', () => {
    expect(mergeCategories(['AI', 'SaaS'], ['saas', ' Robotics ', '', 'AI'])).toEqual(['AI', 'SaaS', 'Robotics']);
  });
});

describe('detail page name and categories', () => {
  const doc = parseDetailDocument(
    `<html><body>
      <h1>Acme<span>.ai</span></h1>
      <a href="/industry/fintech">Fintech</a>
      <a href="/companies?industry=B2B">B2B</a>
      <a href="/industry/fintech-2">fintech</a>
    </body></html>`,
    'https://www.example.com/companies/acme',
    'Acme'
  );

  it('keeps inline markup in the heading joined', () => {
    expect(new NameExtractor().extract(doc)).toBe('Acme.ai');
  });

  it('separates block elements and line breaks', () => {
    const heading = (html: string) =>
      new NameExtractor().extract(parseDetailDocument(`<html><body>${html}</body></html>`, 'https://www.example.com/companies/acme', 'Acme'));
    expect(heading('<h1><div>Acme</div><div>Robotics</div></h1>')).toBe('Acme Robotics');
    expect(heading('<h1>Acme<br>Robotics</h1>')).toBe('Acme Robotics');
  });

  it('reads industry tags once each', () => {
    const extractor = new CategoryExtractor();
    expect(extractor.isApplicable(doc)).toBe(true);
    expect(extractor.extract(doc)).toEqual(['Fintech', 'B2B']);
  });

  it('is not applicable without tags', () => {
    const bare = parseDetailDocument('<html><body><h1>Acme</h1></body></html>', 'https://www.example.com/companies/acme', 'Acme');
    expect(new CategoryExtractor().isApplicable(bare)).toBe(false);
  });
});
