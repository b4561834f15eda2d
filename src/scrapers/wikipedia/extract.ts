import {
  attempt,
  documentTitle,
  extractInfoboxDates,
  extractSectionCandidates,
  extractShortListCandidates,
  findAllElements,
  findElement,
  hasClass,
  type HtmlElement,
  NO_CANDIDATES_NOTE,
  prepareMarkup,
  textOf,
} from '../../extraction';
import type { Candidate, PageExtraction } from '../../types';
import { WIKIPEDIA_CONFIG } from './constants';

const findInfobox = (html: string): HtmlElement | null => {
  const opening = /<(table|div)\b([^>]*)>/gi;
  let match: RegExpExecArray | null;
  while ((match = opening.exec(html)) !== null) {
    if (match[1] && hasClass(match[2] ?? '', 'infobox')) {
      return findElement(html, [match[1].toLowerCase()], match.index);
    }
  }
  return null;
};

/** Text of each row of the page's first infobox. */
export function infoboxRows(html: string): string[] {
  const infobox = findInfobox(html);
  if (!infobox) return [];

  const rows = findAllElements(infobox.inner, ['tr'], { nested: true });
  const blocks = rows.length > 0 ? rows : findAllElements(infobox.inner, ['p'], { nested: true });
  return blocks.map((row) => textOf(row.inner)).filter(Boolean);
}

const extractCandidates = (html: string): Candidate[] => {
  const fromSection = extractSectionCandidates(html, WIKIPEDIA_CONFIG.DOMAIN);
  if (fromSection.length > 0) return fromSection;
  return extractShortListCandidates(html, WIKIPEDIA_CONFIG.DOMAIN);
};

/**
 * Extracts what a Wikipedia election article offers. Never throws: a
 * sub-extraction that fails leaves its field unset and adds a note.
 */
export function extractWikipediaPage(rawHtml: string): PageExtraction {
  const notes: string[] = [];
  const html = prepareMarkup(rawHtml);

  const title = attempt('title', notes, () => documentTitle(html));
  const dates = attempt('dates', notes, () => extractInfoboxDates(infoboxRows(html))) ?? {};
  const candidates = attempt('candidates', notes, () => extractCandidates(html)) ?? [];

  if (candidates.length === 0) {
    notes.push(NO_CANDIDATES_NOTE);
  }

  return {
    ...(title && { title }),
    ...dates,
    candidates,
    researchLinks: [],
    notes,
  };
}
