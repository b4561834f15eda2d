import { SCRAPING_CONFIG } from '../constants';
import type { Candidate } from '../types';
import {
  absoluteLinks,
  findAllElements,
  findElement,
  type HtmlElement,
  isOnDomain,
  nextSiblingElement,
  textOf,
} from './html';

export const NO_CANDIDATES_NOTE = 'no candidates parsed; structure may differ';

const NAME_SEPARATOR = / – | - /;
const CELL_NAME_SEPARATOR = /\s{2,}|\s–\s|\s-\s/;

/** Keeps the first candidate of each name, compared case-insensitively. */
export function dedupeCandidates(candidates: readonly Candidate[]): Candidate[] {
  const seen = new Set<string>();
  const unique: Candidate[] = [];
  for (const candidate of candidates) {
    const key = candidate.name.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(candidate);
  }
  return unique;
}

/**
 * Parses one list item. The name is the first bold or linked text, else the
 * text before a dash; the party is the first parenthesized group; the website
 * is the first absolute link that leaves `siteDomain`.
 */
export function parseCandidateItem(itemHtml: string, siteDomain: string): Candidate | null {
  const text = textOf(itemHtml);
  if (!text) return null;

  const emphasis = findElement(itemHtml, ['b', 'strong']) ?? findElement(itemHtml, ['a']);
  let name = emphasis ? textOf(emphasis.inner) : '';
  if (!name) {
    name = (text.split(NAME_SEPARATOR)[0] ?? '').trim();
  }
  if (!name) return null;

  const party = text.match(/\(([^)]+)\)/)?.[1]?.trim();
  const website = absoluteLinks(itemHtml).find((href) => !isOnDomain(href, siteDomain));

  return {
    name,
    ...(party && { party }),
    ...(website && { website }),
    contact: {},
  };
}

export function parseCandidateList(listHtml: string, siteDomain: string): Candidate[] {
  const candidates: Candidate[] = [];
  for (const item of findAllElements(listHtml, ['li'])) {
    const candidate = parseCandidateItem(item.inner, siteDomain);
    if (candidate) candidates.push(candidate);
  }
  return candidates;
}

/** Table rows become candidates named by their first cell; header rows are skipped. */
export function parseCandidateTable(tableHtml: string): Candidate[] {
  const candidates: Candidate[] = [];
  for (const row of findAllElements(tableHtml, ['tr'], { nested: true })) {
    const firstCell = findElement(row.inner, ['td', 'th']);
    if (!firstCell) continue;

    const cellText = textOf(firstCell.inner);
    const lowered = cellText.toLowerCase();
    if (lowered.includes('candidate') || lowered.includes('name')) continue;

    const name = (cellText.split(CELL_NAME_SEPARATOR)[0] ?? '').trim();
    if (name) {
      candidates.push({ name, contact: {} });
    }
  }
  return candidates;
}

const parseBlock = (block: HtmlElement, siteDomain: string): Candidate[] => {
  if (block.tag === 'ul' || block.tag === 'ol') {
    return parseCandidateList(block.inner, siteDomain);
  }
  if (block.tag === 'table') {
    return parseCandidateTable(block.inner);
  }
  return [];
};

/**
 * Candidates from the list or table that directly follows the first
 * "candidate" heading that has one.
 */
export function extractSectionCandidates(html: string, siteDomain: string): Candidate[] {
  const headings = findAllElements(html, ['h2', 'h3', 'h4'], { nested: true });
  for (const heading of headings) {
    if (!textOf(heading.inner).toLowerCase().includes('candidate')) continue;

    const block = nextSiblingElement(html, heading.end);
    if (!block) continue;

    const candidates = parseBlock(block, siteDomain);
    if (candidates.length > 0) {
      return dedupeCandidates(candidates);
    }
  }
  return [];
}

/** Scans the first few short `ul` lists of the page for candidate-like items. */
export function extractShortListCandidates(html: string, siteDomain: string): Candidate[] {
  const { FALLBACK_LISTS, FALLBACK_LIST_MAX_ITEMS } = SCRAPING_CONFIG.LIMITS;
  const candidates: Candidate[] = [];

  for (const list of findAllElements(html, ['ul'], { nested: true, limit: FALLBACK_LISTS })) {
    const items = findAllElements(list.inner, ['li']);
    if (items.length === 0 || items.length > FALLBACK_LIST_MAX_ITEMS) continue;
    for (const item of items) {
      const candidate = parseCandidateItem(item.inner, siteDomain);
      if (candidate) candidates.push(candidate);
    }
  }

  return dedupeCandidates(candidates);
}
