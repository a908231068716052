export * from './company';
export * from './extraction';
export * from './navigation';
export * from './schema';
export * from './scraping';
