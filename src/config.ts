import { existsSync, readFileSync } from 'node:fs';
import { z } from 'zod';
import { SCRAPING_CONFIG } from './constants';
import { ConfigError, errorMessage } from './errors';
import type { CuratedRace, Target } from './types';

const optionalText = z
  .union([z.string(), z.number()])
  .optional()
  .nullable()
  .transform((value) => (value === null || value === undefined ? undefined : String(value).trim() || undefined));

const SourceHintSchema = z
  .object({
    title: optionalText,
    url: optionalText,
  })
  .optional()
  .nullable()
  .transform((value) => value ?? undefined);

export const TargetSchema = z.object({
  id: optionalText,
  cycle: z.coerce.number().int(),
  office: z
    .string()
    .min(1)
    .transform((value) => value.trim().toUpperCase()),
  state: z
    .string()
    .min(1)
    .transform((value) => value.trim().toUpperCase()),
  district: optionalText,
  wikipedia: SourceHintSchema,
  ballotpedia: SourceHintSchema,
});

export const TargetListSchema = z.array(TargetSchema);

// Curated files written by hand often use snake_case keys
const CURATED_KEY_ALIASES = new Map([
  ['why_it_matters', 'whyItMatters'],
  ['key_dates', 'keyDates'],
  ['last_margin', 'lastMargin'],
]);

const camelizeCuratedKeys = (value: unknown): unknown => {
  if (!value || typeof value !== 'object' || Array.isArray(value)) return value;
  return Object.fromEntries(
    Object.entries(value).map(([key, item]) => [CURATED_KEY_ALIASES.get(key) ?? key, item])
  );
};

export const CuratedRaceSchema = z.preprocess(camelizeCuratedKeys, z.object({
  race: z.string().min(1),
  jurisdiction: optionalText,
  office: optionalText,
  candidates: optionalText,
  rating: optionalText,
  whyItMatters: optionalText,
  keyDates: optionalText,
  lastMargin: optionalText,
  sources: z.array(z.string()).optional(),
}));

export const CuratedListSchema = z.array(CuratedRaceSchema);

export const AppConfigSchema = z.object({
  recipients: z.array(z.string().min(1)).default([]),
  smtp: z
    .object({
      host: optionalText,
      port: z.coerce.number().int().positive().optional(),
      user: optionalText,
      password: optionalText,
      from: optionalText,
      starttls: z.boolean().default(true),
    })
    .default({}),
  behavior: z
    .object({
      requestDelaySeconds: z.coerce.number().min(0).default(SCRAPING_CONFIG.DEFAULTS.DELAY_SECONDS),
      maxPages: z.coerce.number().int().positive().default(SCRAPING_CONFIG.DEFAULTS.MAX_PAGES),
      requestTimeoutMs: z.coerce.number().int().positive().default(SCRAPING_CONFIG.TIMEOUTS.REQUEST),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type SmtpConfig = AppConfig['smtp'];

/**
 * Replaces string values of the exact form "${VAR}" with the environment
 * variable's value, recursively through arrays and objects. Unset variables
 * become undefined.
 */
export function expandEnvVars(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === 'string') {
    const match = value.match(/^\$\{([A-Za-z_][A-Za-z0-9_]*)\}$/);
    return match?.[1] ? env[match[1]] : value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => expandEnvVars(item, env));
  }
  if (value && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, expandEnvVars(item, env)])
    );
  }
  return value;
}

const readJson = (filePath: string): unknown => {
  if (!existsSync(filePath)) {
    throw new ConfigError('File not found', filePath);
  }
  try {
    return JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Invalid JSON: ${errorMessage(error)}`, filePath);
  }
};

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);

const numberFromEnv = (value: string | undefined): number | undefined => {
  if (value == null || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
};

/**
 * RECIPIENTS and the request variables replace values from the file; SMTP_*
 * variables only fill SMTP settings the file leaves out.
 */
export function applyEnvOverrides(config: AppConfig, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const recipients = env.RECIPIENTS?.split(',')
    .map((entry) => entry.trim())
    .filter(Boolean);
  const delay = numberFromEnv(env.REQUEST_DELAY_SECONDS);
  const maxPages = numberFromEnv(env.MAX_PAGES);
  const timeout = numberFromEnv(env.REQUEST_TIMEOUT_MS);
  const port = numberFromEnv(env.SMTP_PORT);

  return {
    recipients: recipients && recipients.length > 0 ? recipients : config.recipients,
    smtp: {
      ...config.smtp,
      host: config.smtp.host ?? env.SMTP_HOST,
      port: config.smtp.port ?? port,
      user: config.smtp.user ?? env.SMTP_USER,
      password: config.smtp.password ?? env.SMTP_PASSWORD,
      from: config.smtp.from ?? env.SMTP_FROM,
    },
    behavior: {
      requestDelaySeconds: delay ?? config.behavior.requestDelaySeconds,
      maxPages: maxPages ?? config.behavior.maxPages,
      requestTimeoutMs: timeout ?? config.behavior.requestTimeoutMs,
    },
  };
}

export function parseConfig(
  raw: unknown,
  filePath = '(inline)',
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  const result = AppConfigSchema.safeParse(expandEnvVars(raw ?? {}, env));
  if (!result.success) {
    throw new ConfigError('Invalid config', filePath, formatIssues(result.error));
  }
  return applyEnvOverrides(result.data, env);
}

/** Loads config.json; a missing file yields the defaults. */
export function loadConfig(filePath: string): AppConfig {
  if (!existsSync(filePath)) {
    console.warn(`Config file ${filePath} not found, using defaults`);
    return parseConfig({}, filePath);
  }
  return parseConfig(readJson(filePath), filePath);
}

export function parseTargets(raw: unknown, filePath = '(inline)'): Target[] {
  const result = TargetListSchema.safeParse(raw ?? []);
  if (!result.success) {
    throw new ConfigError('Invalid target list', filePath, formatIssues(result.error));
  }
  return result.data;
}

export function loadTargets(filePath: string): Target[] {
  return parseTargets(readJson(filePath), filePath);
}

export function parseCurated(raw: unknown, filePath = '(inline)'): CuratedRace[] {
  const result = CuratedListSchema.safeParse(raw ?? []);
  if (!result.success) {
    throw new ConfigError('Invalid curated races', filePath, formatIssues(result.error));
  }
  return result.data;
}

/**
 * Curated rows are optional for reports: a missing file means none, and an
 * unreadable or invalid one is reported and skipped. With `strict` both
 * cases throw a ConfigError instead.
 */
export function loadCurated(
  filePath: string | undefined,
  options: { strict?: boolean } = {}
): CuratedRace[] {
  if (options.strict) {
    return parseCurated(readJson(filePath ?? ''), filePath ?? '');
  }
  if (!filePath || !existsSync(filePath)) return [];
  try {
    return parseCurated(readJson(filePath), filePath);
  } catch (error) {
    console.warn(`Ignoring curated races in ${filePath}: ${errorMessage(error)}`);
    return [];
  }
}
