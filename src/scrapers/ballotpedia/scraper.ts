import { stateNameFor } from '../../constants';
import { errorMessage } from '../../errors';
import { mergeResearchLinks, researchQueries } from '../../extraction';
import { createRunFetcher, type Fetcher, PageBudgetExhaustedError } from '../../fetcher';
import type { RaceOutcome, ScrapeOptions, Target } from '../../types';
import { applyExtraction, createOutcome, createRace } from '../race';
import { BALLOTPEDIA_CONFIG } from './constants';
import { extractBallotpediaPage } from './extract';
import { ballotpediaUrlFor, generateTitles } from './titles';

/** Page URLs to try for a target: explicit hints first, then generated titles. */
export function candidateUrls(target: Target): string[] {
  const urls: string[] = [];
  const hintUrl = target.ballotpedia?.url?.trim();
  const hintTitle = target.ballotpedia?.title?.trim();
  if (hintUrl) urls.push(hintUrl);
  if (hintTitle) urls.push(ballotpediaUrlFor(hintTitle));

  const stateName = stateNameFor(target.state);
  for (const title of generateTitles(stateName, target.office, target.cycle, target.district)) {
    urls.push(ballotpediaUrlFor(title));
  }
  return Array.from(new Set(urls));
}

export class BallotpediaScraper {
  constructor(private readonly options: ScrapeOptions = {}) {}

  /**
   * Scrapes targets one at a time, in order. For each target the candidate
   * pages are tried in turn and the first one that loads is parsed.
   */
  async run(targets: readonly Target[]): Promise<RaceOutcome[]> {
    const { budget, fetcher } = createRunFetcher(this.options, BALLOTPEDIA_CONFIG.DELAY_SECONDS);

    console.log(`Scraping ${targets.length} races from Ballotpedia...`);
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
    let found = false;

    for (const url of candidateUrls(target)) {
      try {
        const page = await fetcher.fetchPage(url);
        if (page.kind === 'absent') continue;

        console.log(`Processing race ${race.id}: ${url}`);
        race.sources.ballotpedia = page.url;
        applyExtraction(outcome, extractBallotpediaPage(page.html));
        found = true;
        break;
      } catch (error) {
        outcome.notes.push(`ballotpedia try failed: ${errorMessage(error)}`);
        if (error instanceof PageBudgetExhaustedError) break;
      }
    }

    if (!found) {
      console.log(`✗ No Ballotpedia page found for ${race.id}`);
      outcome.errors.push(BALLOTPEDIA_CONFIG.ERRORS.NOT_FOUND);
    }

    race.researchLinks = mergeResearchLinks(race.researchLinks, researchQueries(race));
    return outcome;
  }
}
