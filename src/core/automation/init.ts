import { ExtractorRegistry } from '../../types/extraction';
import { CategoryExtractor, NameExtractor } from '../scraping/basic';
import { DescriptionExtractor } from '../scraping/description';
import { FounderExtractor } from '../scraping/founders';
import { SummaryExtractor } from '../scraping/summary';

/** Detail-page extractors in the order they run. */
export function createDefaultRegistry(): ExtractorRegistry {
  const description = new DescriptionExtractor();

  const extractors = [
    new NameExtractor(),
    new CategoryExtractor(),
    description,
    new FounderExtractor(),
    new SummaryExtractor(description),
  ];

  const registry = new ExtractorRegistry();
  extractors.forEach(extractor => {
    registry.register(extractor);
  });
  return registry;
}
