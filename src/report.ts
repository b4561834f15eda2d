import type { Candidate, CuratedRace, Race, RaceOutcome, SourceKind } from './types';

export const REPORT_TITLE = 'Key Races Weekly Report';
export const UNKNOWN_CANDIDATES = 'Unknown (see research links)';

const SOURCE_LABELS: Record<SourceKind, string> = {
  wikipedia: 'Wikipedia',
  ballotpedia: 'Ballotpedia',
};

export const escapeHtml = (value: string): string =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#x27;');

/** "CA SENATE (2024)", with ", District 7" for House races. */
export function raceHeading(race: Race): string {
  const heading = `${race.state} ${race.office} (${race.cycle})`;
  return race.district ? `${heading}, District ${race.district}` : heading;
}

const candidateLabel = (candidate: Candidate): string =>
  candidate.party ? `${candidate.name} (${candidate.party})` : candidate.name;

const SOURCE_ORDER: readonly SourceKind[] = ['wikipedia', 'ballotpedia'];

const sourceEntries = (race: Race): Array<[string, string]> => {
  const entries: Array<[string, string]> = [];
  for (const kind of SOURCE_ORDER) {
    const url = race.sources[kind];
    if (url) entries.push([SOURCE_LABELS[kind], url]);
  }
  return entries;
};

type CuratedTextField = 'candidates' | 'rating' | 'whyItMatters' | 'keyDates' | 'lastMargin';

// Curated fields in display order
const CURATED_FIELDS: ReadonlyArray<[CuratedTextField, string]> = [
  ['candidates', 'Candidates'],
  ['rating', 'Rating'],
  ['whyItMatters', 'Why it matters'],
  ['keyDates', 'Key dates'],
  ['lastMargin', 'Last margin'],
];

const curatedSubtitle = (row: CuratedRace): string =>
  [row.jurisdiction, row.office].filter(Boolean).join(' · ');

function curatedTextBlock(row: CuratedRace): string[] {
  const lines = [`- ${row.race}`];
  const subtitle = curatedSubtitle(row);
  if (subtitle) lines.push(`  ${subtitle}`);
  for (const [key, label] of CURATED_FIELDS) {
    const value = row[key];
    if (value) lines.push(`  ${label}: ${value}`);
  }
  if (row.sources && row.sources.length > 0) {
    lines.push(`  Sources: ${row.sources.join(', ')}`);
  }
  return lines;
}

function raceTextBlock(outcome: RaceOutcome): string[] {
  const { race } = outcome;
  const lines = [`- ${raceHeading(race)}`];

  if (race.title) lines.push(`  Title: ${race.title}`);
  if (race.primaryDate) lines.push(`  Primary: ${race.primaryDate}`);
  if (race.electionDate) lines.push(`  General: ${race.electionDate}`);

  if (race.candidates.length > 0) {
    lines.push('  Candidates:');
    for (const candidate of race.candidates) {
      const website = candidate.website ? ` — ${candidate.website}` : '';
      lines.push(`    - ${candidateLabel(candidate)}${website}`);
    }
  } else {
    lines.push(`  Candidates: ${UNKNOWN_CANDIDATES}`);
  }

  for (const [label, url] of sourceEntries(race)) {
    lines.push(`  ${label}: ${url}`);
  }
  if (outcome.notes.length > 0) lines.push(`  Notes: ${outcome.notes.join('; ')}`);
  if (outcome.errors.length > 0) lines.push(`  Errors: ${outcome.errors.join('; ')}`);

  if (race.researchLinks.length > 0) {
    lines.push('  Research:');
    for (const link of race.researchLinks) {
      lines.push(`    - ${link}`);
    }
  }
  return lines;
}

/**
 * Plain-text report: a title line, the curated rows, then one block per
 * scraped race. Blocks are separated by a blank line.
 */
export function formatText(outcomes: readonly RaceOutcome[], curated: readonly CuratedRace[] = []): string {
  const lines = [REPORT_TITLE, ''];

  if (curated.length > 0) {
    lines.push('Curated Races', '');
    for (const row of curated) {
      lines.push(...curatedTextBlock(row), '');
    }
    lines.push('Scraped Races', '');
  }

  for (const outcome of outcomes) {
    lines.push(...raceTextBlock(outcome), '');
  }
  return lines.join('\n');
}

const link = (url: string, label = url): string =>
  `<a href="${escapeHtml(url)}">${escapeHtml(label)}</a>`;

function curatedHtmlBlock(row: CuratedRace): string {
  const parts = [`<section class="race curated"><h2>${escapeHtml(row.race)}</h2>`];
  const subtitle = curatedSubtitle(row);
  if (subtitle) parts.push(`<div class="meta">${escapeHtml(subtitle)}</div>`);
  for (const [key, label] of CURATED_FIELDS) {
    const value = row[key];
    if (value) {
      parts.push(`<div class="meta"><strong>${label}:</strong> ${escapeHtml(value)}</div>`);
    }
  }
  if (row.sources && row.sources.length > 0) {
    parts.push(`<div><strong>Sources:</strong><ul>`);
    for (const source of row.sources) parts.push(`<li>${link(source)}</li>`);
    parts.push('</ul></div>');
  }
  parts.push('</section>');
  return parts.join('');
}

function raceHtmlBlock(outcome: RaceOutcome): string {
  const { race } = outcome;
  const parts = [`<section class="race"><h2>${escapeHtml(raceHeading(race))}</h2>`];

  const meta: Array<[string, string | undefined]> = [
    ['Title', race.title],
    ['Primary', race.primaryDate],
    ['General', race.electionDate],
  ];
  for (const [label, value] of meta) {
    if (value) parts.push(`<div class="meta"><strong>${label}:</strong> ${escapeHtml(value)}</div>`);
  }

  if (race.candidates.length > 0) {
    parts.push('<div><strong>Candidates:</strong><ul>');
    for (const candidate of race.candidates) {
      const who = escapeHtml(candidateLabel(candidate));
      parts.push(candidate.website ? `<li>${who} — ${link(candidate.website, 'website')}</li>` : `<li>${who}</li>`);
    }
    parts.push('</ul></div>');
  } else {
    parts.push(`<div><strong>Candidates:</strong> ${UNKNOWN_CANDIDATES}</div>`);
  }

  for (const [label, url] of sourceEntries(race)) {
    parts.push(`<div><strong>${label}:</strong> ${link(url)}</div>`);
  }
  if (outcome.notes.length > 0) {
    parts.push(`<div class="notes"><strong>Notes:</strong> ${escapeHtml(outcome.notes.join('; '))}</div>`);
  }
  if (outcome.errors.length > 0) {
    parts.push(`<div class="errors"><strong>Errors:</strong> ${escapeHtml(outcome.errors.join('; '))}</div>`);
  }
  if (race.researchLinks.length > 0) {
    parts.push('<div><strong>Research:</strong><ul>');
    for (const url of race.researchLinks) parts.push(`<li>${link(url)}</li>`);
    parts.push('</ul></div>');
  }

  parts.push('</section>');
  return parts.join('');
}

export interface HtmlReportOptions {
  title?: string;
  curated?: readonly CuratedRace[];
}

/** Standalone HTML page linking style.css; every scraped value is escaped. */
export function formatHtml(outcomes: readonly RaceOutcome[], options: HtmlReportOptions = {}): string {
  const title = escapeHtml(options.title ?? REPORT_TITLE);
  const curated = options.curated ?? [];

  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    `<meta charset="utf-8"><meta name="viewport" content="width=device-width, initial-scale=1"><title>${title}</title>`,
    '<link rel="stylesheet" href="style.css">',
    '</head>',
    '<body>',
    `<h1>${title}</h1>`,
    ...curated.map(curatedHtmlBlock),
    ...outcomes.map(raceHtmlBlock),
    '</body></html>',
  ].join('');
}

const TABLE_STYLE = `  body { font-family: ui-sans-serif, system-ui, -apple-system, Segoe UI, Roboto, Arial; margin: 24px; }
  h1 { margin: 0 0 12px 0; font-size: 24px; }
  .updated { color: #555; font-size: 12px; margin-bottom: 16px; }
  table { border-collapse: collapse; width: 100%; }
  th, td { border: 1px solid #ddd; padding: 10px; vertical-align: top; }
  th { background: #f6f6f6; text-align: left; }
  .race { font-weight: 600; }
  .small { color: #666; font-size: 12px; }`;

const TABLE_COLUMNS = ['Race', 'Candidates', 'Rating', 'Why It Matters', 'Key Dates', 'Last Margin', 'Sources'];

const cell = (value: string | undefined): string => escapeHtml(value ?? '');

function curatedTableRow(row: CuratedRace): string {
  const sources = (row.sources ?? []).join(', ');
  return `<tr>
      <td class="race">${cell(row.race)}<div class="small">${cell(row.jurisdiction)} · ${cell(row.office)}</div></td>
      <td>${cell(row.candidates)}</td>
      <td>${cell(row.rating)}</td>
      <td>${cell(row.whyItMatters)}</td>
      <td>${cell(row.keyDates)}</td>
      <td>${cell(row.lastMargin)}</td>
      <td class="small">${cell(sources)}</td>
    </tr>`;
}

/** One-page table of curated races, stamped with the given date (YYYY-MM-DD). */
export function renderCuratedTable(rows: readonly CuratedRace[], updated: string): string {
  const header = TABLE_COLUMNS.map((column) => `      <th>${column}</th>`).join('\n');
  return `<!doctype html>
<meta charset="utf-8">
<title>Key Races Report</title>
<style>
${TABLE_STYLE}
</style>
<h1>Key Races Report</h1>
<div class="updated">Updated ${escapeHtml(updated)}</div>
<table>
  <thead>
    <tr>
${header}
    </tr>
  </thead>
  <tbody>
    ${rows.map(curatedTableRow).join('\n')}
  </tbody>
</table>
`;
}
