// Configuration constants for Wikipedia scraping
export const WIKIPEDIA_CONFIG = {
  URLS: {
    // Parsoid HTML of a page, addressed by title
    REST_HTML: 'https://en.wikipedia.org/api/rest_v1/page/html/',
  },
  DOMAIN: 'wikipedia.org',
  DELAY_SECONDS: 1.0,
  ERRORS: {
    MISSING_SOURCE: 'No Wikipedia title or URL provided',
  },
} as const;
