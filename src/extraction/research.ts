import { SCRAPING_CONFIG } from '../constants';
import type { Race } from '../types';
import { absoluteLinks, findAllElements, findElement, isOnDomain, textOf } from './html';

type RaceLabel = Pick<Race, 'state' | 'office' | 'cycle' | 'district'>;

const query = (text: string) => `${SCRAPING_CONFIG.SEARCH_URL}${encodeURIComponent(text)}`;

/**
 * Search-engine queries a reader can follow when scraping came up short:
 * Ballotpedia, the state's election calendar and the official candidate list.
 */
export function researchQueries(race: RaceLabel): string[] {
  let label = `${race.state} ${race.office} ${race.cycle}`;
  if (race.district) {
    label += ` district ${race.district}`;
  }
  return [
    `${SCRAPING_CONFIG.SEARCH_URL}Ballotpedia+${encodeURIComponent(label)}`,
    query(`${race.state} Secretary of State elections calendar ${race.cycle}`),
    query(`${label} official candidate list`),
  ];
}

// Headings may carry an inline "[edit]" link after the label
const isExternalLinksHeading = (inner: string): boolean =>
  textOf(inner).toLowerCase().startsWith('external links');

/**
 * Outbound links listed under the "External links" heading, up to the
 * configured cap.
 */
export function extractExternalLinks(html: string, siteDomain: string): string[] {
  const heading = findAllElements(html, ['h2', 'h3'], { nested: true }).find((candidate) =>
    isExternalLinksHeading(candidate.inner)
  );
  if (!heading) return [];

  const nextSection = findElement(html, ['h2'], heading.end);
  const section = html.slice(heading.end, nextSection ? nextSection.start : html.length);

  const links = absoluteLinks(section).filter((href) => !isOnDomain(href, siteDomain));
  return Array.from(new Set(links)).slice(0, SCRAPING_CONFIG.LIMITS.EXTERNAL_LINKS);
}

/** Appends links without duplicates, keeping the total under the cap. */
export function mergeResearchLinks(existing: readonly string[], additions: readonly string[]): string[] {
  const merged = [...existing];
  for (const link of additions) {
    if (merged.length >= SCRAPING_CONFIG.LIMITS.RESEARCH_LINKS) break;
    if (!merged.includes(link)) merged.push(link);
  }
  return merged;
}
