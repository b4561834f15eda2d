import {
  attempt,
  documentTitle,
  extractExternalLinks,
  extractLabeledDates,
  extractRating,
  extractSectionCandidates,
  NO_CANDIDATES_NOTE,
  prepareMarkup,
  textOf,
} from '../../extraction';
import type { PageExtraction } from '../../types';
import { BALLOTPEDIA_CONFIG } from './constants';

export function stripSiteSuffix(title: string): string {
  const { TITLE_SUFFIX } = BALLOTPEDIA_CONFIG;
  const trimmed = title.trim();
  return (trimmed.endsWith(TITLE_SUFFIX) ? trimmed.slice(0, -TITLE_SUFFIX.length) : trimmed).trim();
}

/**
 * Extracts dates, candidates, a race rating and external research links from
 * a Ballotpedia race page. Never throws.
 */
export function extractBallotpediaPage(rawHtml: string): PageExtraction {
  const notes: string[] = [];
  const html = prepareMarkup(rawHtml);
  const { DOMAIN } = BALLOTPEDIA_CONFIG;

  const rawTitle = attempt('title', notes, () => documentTitle(html));
  const title = rawTitle ? stripSiteSuffix(rawTitle) : undefined;

  const text = textOf(html);
  const dates = attempt('dates', notes, () => extractLabeledDates(text)) ?? {};
  const candidates = attempt('candidates', notes, () => extractSectionCandidates(html, DOMAIN)) ?? [];
  if (candidates.length === 0) {
    notes.push(NO_CANDIDATES_NOTE);
  }

  const rating = attempt('ratings', notes, () => extractRating(text));
  if (rating) {
    notes.push(`ratings: ${rating}`);
  }

  const researchLinks = attempt('research links', notes, () => extractExternalLinks(html, DOMAIN)) ?? [];

  return {
    ...(title && { title }),
    ...dates,
    candidates,
    researchLinks,
    notes,
  };
}
