import { existsSync, mkdirSync, readdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { escapeHtml, formatHtml, REPORT_TITLE } from './report';
import type { CuratedRace, RaceOutcome } from './types';

export const DEFAULT_CSS = [
  'body{font-family:system-ui,-apple-system,Segoe UI,Roboto,Arial,sans-serif;max-width:860px;margin:2rem auto;padding:0 1rem;line-height:1.5}',
  '.race{padding:1rem 0;border-top:1px solid #eee}',
  'h1{font-size:1.75rem}',
  'h2{font-size:1.2rem;margin-bottom:.25rem}',
  '.meta{color:#444;margin:.1rem 0}',
  '.notes{color:#555}',
  '.errors{color:#a00}',
].join('');

export interface SiteOptions {
  outDir: string;
  text?: boolean;
  html?: boolean;
  json?: boolean;
  now?: Date;
}

export interface SiteResult {
  base: string;
  written: string[];
}

const pad = (value: number) => String(value).padStart(2, '0');

/** UTC stamp used in report file names, e.g. "2024-11-05_143000Z". */
export function reportTimestamp(date: Date): string {
  const day = `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `${day}_${time}Z`;
}

/** Index page listing every report-*.html in the directory, newest first. */
export function buildIndexHtml(outDir: string): string {
  const reports = existsSync(outDir)
    ? readdirSync(outDir)
        .filter((name) => name.startsWith('report-') && name.endsWith('.html'))
        .sort()
        .reverse()
    : [];
  const items =
    reports.length > 0
      ? reports.map((name) => `<li><a href="${escapeHtml(name)}">${escapeHtml(name)}</a></li>`).join('\n')
      : '<li>No reports yet</li>';

  return (
    '<!DOCTYPE html><html lang="en"><head>' +
    '<meta charset="utf-8"><meta name="viewport" content="width=device-width, initial-scale=1">' +
    '<title>Key Races Reports</title><link rel="stylesheet" href="style.css"></head><body>' +
    `<h1>Key Races Reports</h1><ul>${items}</ul></body></html>`
  );
}

/**
 * Writes one run's report files into a static site directory, then refreshes
 * index.html. style.css is only created when missing so local edits survive.
 */
export function writeSite(
  outcomes: readonly RaceOutcome[],
  reportText: string,
  curated: readonly CuratedRace[],
  options: SiteOptions
): SiteResult {
  const { outDir } = options;
  mkdirSync(outDir, { recursive: true });

  const stamp = reportTimestamp(options.now ?? new Date());
  const base = `report-${stamp}`;
  const written: string[] = [];

  const write = (name: string, content: string) => {
    const filePath = join(outDir, name);
    writeFileSync(filePath, content, 'utf-8');
    written.push(filePath);
  };

  if (options.text !== false) {
    write(`${base}.txt`, reportText);
  }
  if (options.html !== false) {
    write(`${base}.html`, formatHtml(outcomes, { title: `${REPORT_TITLE} — ${stamp}`, curated }));
  }
  if (options.json) {
    write(`${base}.json`, JSON.stringify(outcomes, null, 2));
  }

  write('index.html', buildIndexHtml(outDir));
  if (!existsSync(join(outDir, 'style.css'))) {
    write('style.css', DEFAULT_CSS);
  }

  console.log(`Report files written to ${outDir} (${base})`);
  return { base, written };
}
