import { errorMessage } from '../errors';

/**
 * Runs one sub-extraction. A thrown error is turned into a note so the
 * remaining fields of the page are still extracted.
 */
export function attempt<T>(field: string, notes: string[], run: () => T): T | undefined {
  try {
    return run();
  } catch (error) {
    console.warn(`Failed to extract ${field}:`, error);
    notes.push(`${field} extraction failed: ${errorMessage(error)}`);
    return undefined;
  }
}
