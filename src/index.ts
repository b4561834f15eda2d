#!/usr/bin/env node
import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { loadConfig, loadCurated, loadTargets, type AppConfig } from './config';
import { sendReportEmail, type MailSender } from './emailer';
import { errorMessage } from './errors';
import { REPORT_TITLE, formatText, renderCuratedTable } from './report';
import { filterReportable, KeyRacesScraper } from './scraper';
import { writeSite } from './site';
import type { CuratedRace, ScrapeOptions, SourceKind, Target } from './types';

export interface CliDependencies {
  httpClient?: ScrapeOptions['httpClient'];
  mailSender?: MailSender;
  now?: Date;
}

const COMMANDS = ['report', 'table'] as const;
type Command = (typeof COMMANDS)[number];

const isCommand = (value: string): value is Command => COMMANDS.some((command) => command === value);

const isSourceKind = (value: string): value is SourceKind => value === 'wikipedia' || value === 'ballotpedia';

/** Value following `--name`, or the fallback when the flag or its value is missing. */
export function optionValue(args: readonly string[], name: string, fallback: string): string;
export function optionValue(args: readonly string[], name: string): string | undefined;
export function optionValue(args: readonly string[], name: string, fallback?: string): string | undefined {
  const index = args.indexOf(name);
  if (index === -1) return fallback;
  const value = args[index + 1];
  return value && !value.startsWith('--') ? value : fallback;
}

function printUsage() {
  console.log('\n📖 Commands:');
  console.log('  report   - Scrape target races, render the report, deliver it (default)');
  console.log('  table    - Render curated races as a standalone HTML table');
  console.log('\n🔧 report options:');
  console.log('  --config PATH            - Config file (default: config.json)');
  console.log('  --targets PATH           - Target list (default: races.targets.json)');
  console.log('  --curated PATH           - Curated races shown first (default: races.curated.json)');
  console.log('  --source NAME            - wikipedia (default) or ballotpedia');
  console.log('  --dry-run                - Print the report instead of emailing it');
  console.log('  --no-email               - Never send email');
  console.log('  --out-dir DIR            - Write a static report site to DIR');
  console.log('  --no-html, --no-text     - Skip that file type in --out-dir');
  console.log('  --write-json             - Also write JSON to --out-dir');
  console.log('  --include-empty          - Keep races with errors or no data');
  console.log('\n🔧 table options:');
  console.log('  --input PATH             - Curated races JSON (default: races.json)');
  console.log('  --output PATH            - HTML output (default: report.html)');
  console.log('\n📋 Examples:');
  console.log('  npm run dev report --dry-run');
  console.log('  npm run dev report --source ballotpedia --out-dir docs --no-email');
  console.log('  npm run dev table --input races.json --output docs/report.html');
}

async function runReport(args: readonly string[], deps: CliDependencies): Promise<number> {
  const sourceArg = optionValue(args, '--source', 'wikipedia');
  if (!isSourceKind(sourceArg)) {
    console.error(`❌ Unknown source: ${sourceArg}`);
    return 1;
  }

  let config: AppConfig;
  let targets: Target[];
  try {
    config = loadConfig(optionValue(args, '--config', 'config.json'));
    targets = loadTargets(optionValue(args, '--targets', 'races.targets.json'));
  } catch (error) {
    console.error(`❌ ${errorMessage(error)}`);
    return 1;
  }
  const curated = loadCurated(optionValue(args, '--curated', 'races.curated.json'));

  const scraper = new KeyRacesScraper({
    delaySeconds: config.behavior.requestDelaySeconds,
    maxPages: config.behavior.maxPages,
    timeoutMs: config.behavior.requestTimeoutMs,
    ...(deps.httpClient && { httpClient: deps.httpClient }),
  });

  console.log(`🚀 Scraping ${targets.length} target races from ${sourceArg}`);
  const outcomes = filterReportable(await scraper.scrape(targets, sourceArg), {
    includeEmpty: args.includes('--include-empty'),
  });
  console.log(`📋 ${outcomes.length} races in report`);

  const reportText = formatText(outcomes, curated);

  const outDir = optionValue(args, '--out-dir');
  if (outDir) {
    writeSite(outcomes, reportText, curated, {
      outDir,
      text: !args.includes('--no-text'),
      html: !args.includes('--no-html'),
      json: args.includes('--write-json'),
      ...(deps.now && { now: deps.now }),
    });
  }

  if (args.includes('--dry-run')) {
    console.log(reportText);
    return 0;
  }
  if (args.includes('--no-email')) {
    return 0;
  }
  if (config.recipients.length === 0) {
    console.log('No recipients configured. Skipping email.');
    return 0;
  }

  try {
    await sendReportEmail(config.smtp, config.recipients, REPORT_TITLE, reportText, deps.mailSender);
    console.log(`✉️  Email sent to ${config.recipients.join(', ')}`);
    return 0;
  } catch (error) {
    console.error(`❌ Failed to send email: ${errorMessage(error)}`);
    return 1;
  }
}

function runTable(args: readonly string[], deps: CliDependencies): number {
  const input = optionValue(args, '--input', 'races.json');
  const output = optionValue(args, '--output', 'report.html');

  let rows: CuratedRace[];
  try {
    rows = loadCurated(input, { strict: true });
  } catch (error) {
    console.error(`❌ ${errorMessage(error)}`);
    return 1;
  }

  const updated = (deps.now ?? new Date()).toISOString().slice(0, 10);
  mkdirSync(dirname(output), { recursive: true });
  writeFileSync(output, renderCuratedTable(rows, updated), 'utf-8');
  console.log(`Wrote ${output}`);
  return 0;
}

export async function main(argv: readonly string[] = process.argv.slice(2), deps: CliDependencies = {}): Promise<number> {
  const first = argv[0];
  const commandName = first && !first.startsWith('--') ? first : 'report';
  const args = first === commandName ? argv.slice(1) : argv;

  if (!isCommand(commandName)) {
    console.error(`❌ Unknown command: ${commandName}`);
    printUsage();
    return 1;
  }

  switch (commandName) {
    case 'report':
      return runReport(args, deps);
    case 'table':
      return runTable(args, deps);
  }
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('Error:', error);
      process.exitCode = 1;
    });
}

export { KeyRacesScraper, filterReportable } from './scraper';
export { formatHtml, formatText, renderCuratedTable } from './report';
export * from './types';
