// Configuration constants for Ballotpedia scraping
export const BALLOTPEDIA_CONFIG = {
  URLS: {
    BASE_URL: 'https://ballotpedia.org/',
  },
  DOMAIN: 'ballotpedia.org',
  TITLE_SUFFIX: ' - Ballotpedia',
  DELAY_SECONDS: 1.2,
  ERRORS: {
    NOT_FOUND: 'No Ballotpedia page found',
  },
} as const;
