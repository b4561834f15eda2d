export interface RaceDates {
  primaryDate?: string;
  electionDate?: string;
}

const MONTH =
  '(?:January|February|March|April|May|June|July|August|September|October|November|December)';

// "November 5, 2024" is preferred over "November 2024"
const MONTH_DAY_YEAR = `${MONTH}\\s+\\d{1,2},\\s+\\d{4}`;
const MONTH_YEAR = `${MONTH}\\s+\\d{4}`;
const DATE_VALUE = `(${MONTH_DAY_YEAR}|${MONTH_YEAR})`;

// "Primary election date: June 4, 2024", "Primary: June 4, 2024", "General election November 5, 2024"
const LABEL_TAIL = `(?:\\s+election)?(?:\\s+(?:date|day))?\\s*:?\\s*${DATE_VALUE}`;
const PRIMARY_LABEL = new RegExp(`\\bPrimary${LABEL_TAIL}`);
const GENERAL_LABEL = new RegExp(`\\bGeneral${LABEL_TAIL}`);

const INFOBOX_PRIMARY_ROW = /\bPrimary\b.*?\bdate\b/i;
const INFOBOX_GENERAL_ROW = /\b(?:General|Election)\b.*?\bdate\b/i;

/** First date-looking value in `text`, as written. */
export function extractDate(text: string): string | undefined {
  const full = text.match(new RegExp(MONTH_DAY_YEAR));
  if (full) return full[0];
  const partial = text.match(new RegExp(MONTH_YEAR));
  return partial?.[0];
}

/**
 * Dates introduced by body-text labels such as "Primary election date:" and
 * "General election date:".
 */
export function extractLabeledDates(text: string): RaceDates {
  const primary = text.match(PRIMARY_LABEL)?.[1];
  const general = text.match(GENERAL_LABEL)?.[1];
  return {
    ...(primary && { primaryDate: primary }),
    ...(general && { electionDate: general }),
  };
}

/** Dates read from infobox rows; the first row carrying each label wins. */
export function extractInfoboxDates(rows: readonly string[]): RaceDates {
  let primaryDate: string | undefined;
  let electionDate: string | undefined;

  for (const row of rows) {
    if (!row) continue;
    if (INFOBOX_PRIMARY_ROW.test(row)) {
      primaryDate ??= extractDate(row);
    } else if (INFOBOX_GENERAL_ROW.test(row)) {
      electionDate ??= extractDate(row);
    }
  }

  return {
    ...(primaryDate && { primaryDate }),
    ...(electionDate && { electionDate }),
  };
}
