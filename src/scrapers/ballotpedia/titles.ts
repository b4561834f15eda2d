import type { Office } from '../../types';
import { BALLOTPEDIA_CONFIG } from './constants';

/** "1" -> "1st", "12" -> "12th", "22" -> "22nd". Non-numeric input is returned unchanged. */
export function ordinal(value: string): string {
  if (!/^\d+$/.test(value)) return value;
  const n = Number.parseInt(value, 10);
  const lastTwo = n % 100;
  if (lastTwo >= 11 && lastTwo <= 13) return `${n}th`;
  switch (n % 10) {
    case 1:
      return `${n}st`;
    case 2:
      return `${n}nd`;
    case 3:
      return `${n}rd`;
    default:
      return `${n}th`;
  }
}

/**
 * Likely Ballotpedia page titles for a race, most specific first. The last
 * entry is always the state's general "{cycle} elections in {state}" page.
 */
export function generateTitles(
  stateName: string,
  office: Office,
  cycle: number,
  district?: string
): string[] {
  const titles: string[] = [];

  switch (office.toUpperCase()) {
    case 'PRESIDENT':
      titles.push(`United States presidential election, ${cycle}`);
      break;
    case 'SENATE':
      titles.push(`${cycle} United States Senate election in ${stateName}`);
      titles.push(`United States Senate election in ${stateName}, ${cycle}`);
      break;
    case 'GOVERNOR':
      titles.push(`${stateName} gubernatorial election, ${cycle}`);
      titles.push(`${cycle} ${stateName} gubernatorial election`);
      break;
    case 'HOUSE':
      if (district) {
        titles.push(
          `${cycle} United States House of Representatives election in ${stateName}'s ${ordinal(district)} congressional district`
        );
      }
      titles.push(`${cycle} United States House of Representatives elections in ${stateName}`);
      break;
  }

  titles.push(`${cycle} elections in ${stateName}`);
  return titles;
}

export function ballotpediaUrlFor(title: string): string {
  return `${BALLOTPEDIA_CONFIG.URLS.BASE_URL}${encodeURI(title.trim().replace(/ /g, '_'))}`;
}
