import { BallotpediaScraper } from './scrapers/ballotpedia';
import { WikipediaScraper } from './scrapers/wikipedia';
import type { RaceOutcome, ScrapeOptions, SourceKind, Target } from './types';

export class KeyRacesScraper {
  private wikipediaScraper: WikipediaScraper;
  private ballotpediaScraper: BallotpediaScraper;

  constructor(options: ScrapeOptions = {}) {
    this.wikipediaScraper = new WikipediaScraper(options);
    this.ballotpediaScraper = new BallotpediaScraper(options);
  }

  /**
   * Main method to scrape a batch of races from one source. Returns one
   * outcome per attempted target, in input order.
   */
  async scrape(targets: readonly Target[], source: SourceKind = 'wikipedia'): Promise<RaceOutcome[]> {
    switch (source) {
      case 'ballotpedia':
        return this.ballotpediaScraper.run(targets);
      case 'wikipedia':
        return this.wikipediaScraper.run(targets);
    }
  }
}

/**
 * True when an outcome is worth showing: no errors, and at least candidates
 * or a date.
 */
export function isReportable(outcome: RaceOutcome): boolean {
  if (outcome.errors.length > 0) return false;
  const { race } = outcome;
  return race.candidates.length > 0 || !!race.electionDate || !!race.primaryDate;
}

export function filterReportable(
  outcomes: readonly RaceOutcome[],
  options: { includeEmpty?: boolean } = {}
): RaceOutcome[] {
  if (options.includeEmpty) return [...outcomes];
  return outcomes.filter(isReportable);
}
