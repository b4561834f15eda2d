import { expect, test } from '@playwright/test';
import { researchQueries } from '../../../src/extraction';
import { filterReportable } from '../../../src/scraper';
import {
  BallotpediaScraper,
  ballotpediaUrlFor,
  candidateUrls,
  extractBallotpediaPage,
  stripSiteSuffix,
} from '../../../src/scrapers/ballotpedia';
import type { Target } from '../../../src/types';
import { fakeHttp } from '../../helpers/fake-http';

const FIRST_URL = 'https://ballotpedia.org/2024_United_States_Senate_election_in_California';
const SECOND_URL = 'https://ballotpedia.org/United_States_Senate_election_in_California,_2024';
const LAST_URL = 'https://ballotpedia.org/2024_elections_in_California';

const CA_PAGE = `<!DOCTYPE html>
<html><head><title>United States Senate election in California, 2024 - Ballotpedia</title></head><body>
<p>General election date: November 5, 2024</p>
<h2><span class="mw-headline" id="Candidates">Candidates</span></h2>
<ul>
  <li><b>Alex Rivera</b> (Democratic Party) <a href="https://riverafor.example.com/">Campaign website</a></li>
  <li><b>Blake Chen</b> (Republican Party)</li>
  <li><b>Casey Moore</b> (Green Party) <a href="https://ballotpedia.org/Casey_Moore">profile</a></li>
</ul>
<p>The Cook Political Report rated the race Safe D.</p>
<h2><span class="mw-headline" id="External_links">External links</span></h2>
<ul><li><a href="https://sos.ca.example.gov/elections">Secretary of State</a></li></ul>
</body></html>`;

const caSenate: Target = { cycle: 2024, office: 'SENATE', state: 'CA' };

test.describe('Ballotpedia candidate URLs', () => {
  test('should try explicit hints before generated titles', () => {
    const urls = candidateUrls({
      ...caSenate,
      ballotpedia: { url: 'https://ballotpedia.org/Custom', title: 'Custom title' },
    });
    expect(urls).toEqual(['https://ballotpedia.org/Custom', 'https://ballotpedia.org/Custom_title', FIRST_URL, SECOND_URL, LAST_URL]);
  });

  test('should not repeat a hint that matches a generated title', () => {
    const urls = candidateUrls({ ...caSenate, ballotpedia: { url: SECOND_URL } });
    expect(urls).toEqual([SECOND_URL, FIRST_URL, LAST_URL]);
  });

  test('ballotpediaUrlFor should keep apostrophes and commas readable', () => {
    expect(ballotpediaUrlFor("Pennsylvania's 7th Congressional District election, 2024")).toBe(
      "https://ballotpedia.org/Pennsylvania's_7th_Congressional_District_election,_2024"
    );
  });
});

test.describe('Ballotpedia page extraction', () => {
  test('stripSiteSuffix should drop the site name', () => {
    expect(stripSiteSuffix('Some race - Ballotpedia')).toBe('Some race');
    expect(stripSiteSuffix('Some race')).toBe('Some race');
  });

  test('should extract dates, candidates, rating and external links', () => {
    expect(extractBallotpediaPage(CA_PAGE)).toEqual({
      title: 'United States Senate election in California, 2024',
      electionDate: 'November 5, 2024',
      candidates: [
        { name: 'Alex Rivera', party: 'Democratic Party', website: 'https://riverafor.example.com/', contact: {} },
        { name: 'Blake Chen', party: 'Republican Party', contact: {} },
        { name: 'Casey Moore', party: 'Green Party', contact: {} },
      ],
      researchLinks: ['https://sos.ca.example.gov/elections'],
      notes: ['ratings: Cook: Safe D'],
    });
  });
});

test.describe('BallotpediaScraper', () => {
  test('should scrape the first page that loads', async () => {
    const http = fakeHttp({ [SECOND_URL]: CA_PAGE });
    const scraper = new BallotpediaScraper({ delaySeconds: 0, httpClient: http.client });

    const outcomes = await scraper.run([caSenate]);
    const outcome = outcomes[0];

    expect(outcomes).toHaveLength(1);
    expect(http.requested).toEqual([FIRST_URL, SECOND_URL]);
    expect(outcome?.errors).toEqual([]);
    expect(outcome?.race.candidates).toHaveLength(3);
    expect(outcome?.race.candidates.map((c) => c.party)).toEqual(['Democratic Party', 'Republican Party', 'Green Party']);
    expect(outcome?.race.electionDate).toBe('November 5, 2024');
    expect(outcome?.race.primaryDate).toBeUndefined();
    expect(outcome?.race.sources).toEqual({ ballotpedia: SECOND_URL });
    expect(outcome?.race.researchLinks).toEqual([
      'https://sos.ca.example.gov/elections',
      ...researchQueries({ state: 'CA', office: 'SENATE', cycle: 2024 }),
    ]);
  });

  test('should report a race whose pages are all missing, and the filter should drop it', async () => {
    const http = fakeHttp();
    const scraper = new BallotpediaScraper({ delaySeconds: 0, httpClient: http.client });

    const outcomes = await scraper.run([caSenate]);

    expect(http.requested).toEqual([FIRST_URL, SECOND_URL, LAST_URL]);
    expect(outcomes[0]?.errors).toEqual(['No Ballotpedia page found']);
    expect(outcomes[0]?.race.researchLinks).toHaveLength(3);
    expect(filterReportable(outcomes)).toEqual([]);
    expect(filterReportable(outcomes, { includeEmpty: true })).toEqual(outcomes);
  });

  test('should note transport failures and keep trying', async () => {
    const http = fakeHttp({ [FIRST_URL]: { error: new Error('socket hang up') } });
    const scraper = new BallotpediaScraper({ delaySeconds: 0, httpClient: http.client });

    const [outcome] = await scraper.run([caSenate]);

    expect(http.requested).toHaveLength(3);
    expect(outcome?.notes).toEqual(['ballotpedia try failed: socket hang up']);
    expect(outcome?.errors).toEqual(['No Ballotpedia page found']);
  });

  test('should stop starting races once the page budget is spent', async () => {
    const http = fakeHttp({ [FIRST_URL]: CA_PAGE, 'https://ballotpedia.org/2024_United_States_Senate_election_in_Nevada': CA_PAGE });
    const scraper = new BallotpediaScraper({ delaySeconds: 0, maxPages: 1, httpClient: http.client });

    const outcomes = await scraper.run([caSenate, { ...caSenate, state: 'NV' }]);

    expect(outcomes).toHaveLength(1);
    expect(http.requested).toEqual([FIRST_URL]);
  });
});
