export * from './constants';
export * from './extract';
export * from './scraper';
