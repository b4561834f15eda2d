import STATES from './data/states.json';

// Two-letter postal code -> full state name, 50 states plus DC
export const STATE_NAMES: Readonly<Record<string, string>> = STATES;

export function stateNameFor(stateCode: string): string {
  const code = stateCode.trim().toUpperCase();
  return STATE_NAMES[code] ?? code;
}

// Configuration constants shared by both sources
export const SCRAPING_CONFIG = {
  USER_AGENT: 'KeyRacesBot/1.0 (+election research report)',
  ACCEPT: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  ACCEPT_LANGUAGE: 'en-US,en;q=0.5',
  TIMEOUTS: {
    REQUEST: Number(process.env.REQUEST_TIMEOUT_MS) || 20000,
  },
  DEFAULTS: {
    DELAY_SECONDS: 1.0,
    MAX_PAGES: 40,
  },
  LIMITS: {
    RESEARCH_LINKS: 10,
    EXTERNAL_LINKS: 6,
    FALLBACK_LISTS: 5,
    FALLBACK_LIST_MAX_ITEMS: 6,
  },
  SEARCH_URL: 'https://www.google.com/search?q=',
} as const;
