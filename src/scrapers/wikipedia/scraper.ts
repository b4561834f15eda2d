import { errorMessage } from '../../errors';
import { mergeResearchLinks, researchQueries } from '../../extraction';
import { createRunFetcher, type Fetcher } from '../../fetcher';
import type { RaceOutcome, ScrapeOptions, SourceHint, Target } from '../../types';
import { applyExtraction, createOutcome, createRace } from '../race';
import { WIKIPEDIA_CONFIG } from './constants';
import { extractWikipediaPage } from './extract';

/** REST HTML endpoint for an explicit title, else the explicit URL. */
export function wikipediaUrlFor(hint: SourceHint | undefined): string | null {
  const title = hint?.title?.trim();
  if (title) {
    return `${WIKIPEDIA_CONFIG.URLS.REST_HTML}${encodeURIComponent(title.replace(/ /g, '_'))}`;
  }
  const url = hint?.url?.trim();
  return url || null;
}

export class WikipediaScraper {
  constructor(private readonly options: ScrapeOptions = {}) {}

  /**
   * Scrapes targets one at a time, in order. Stops early, keeping what it has,
   * once the page budget for this run is spent.
   */
  async run(targets: readonly Target[]): Promise<RaceOutcome[]> {
    const { budget, fetcher } = createRunFetcher(this.options, WIKIPEDIA_CONFIG.DELAY_SECONDS);

    console.log(`Scraping ${targets.length} races from Wikipedia...`);
    const outcomes: RaceOutcome[] = [];

    for (const [index, target] of targets.entries()) {
      if (budget.exhausted) {
        console.log(
          `Page budget of ${budget.maxPages} reached; ${targets.length - index} races not attempted`
        );
        break;
      }
      outcomes.push(await this.scrapeTarget(target, fetcher));
    }

    console.log(`\n=== Summary ===`);
    console.log(`Pages fetched: ${budget.fetched}`);
    console.log(`Races attempted: ${outcomes.length}/${targets.length}`);
    return outcomes;
  }

  private async scrapeTarget(target: Target, fetcher: Fetcher): Promise<RaceOutcome> {
    const outcome = createOutcome(createRace(target));
    const { race } = outcome;
    const url = wikipediaUrlFor(target.wikipedia);

    if (!url) {
      outcome.errors.push(WIKIPEDIA_CONFIG.ERRORS.MISSING_SOURCE);
    } else {
      console.log(`Processing race ${race.id}: ${url}`);
      try {
        const page = await fetcher.fetchPage(url);
        if (page.kind === 'absent') {
          outcome.errors.push(`Fetch failed: HTTP ${page.status}`);
        } else {
          applyExtraction(outcome, extractWikipediaPage(page.html));
          race.sources.wikipedia = page.url;
        }
      } catch (error) {
        console.warn(`Failed to fetch ${url}:`, error);
        outcome.errors.push(`Fetch failed: ${errorMessage(error)}`);
      }
    }

    race.researchLinks = mergeResearchLinks(race.researchLinks, researchQueries(race));
    return outcome;
  }
}
