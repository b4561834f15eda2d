export const RATING_OUTLETS = ['Cook', 'Inside Elections', 'Sabato'] as const;

// Only these categories are recognized; "Lean Democratic" reads as "Lean D"
const RATING = String.raw`Toss[-\s]?up|(?:Lean|Likely|Safe)\s+[DRI]`;

const OUTLET_RATING = new RegExp(`(${RATING_OUTLETS.join('|')})[^.]*?(${RATING})`, 'i');
const LABELED_RATING = new RegExp(`Race\\s+ratings?:\\s*(${RATING})`, 'i');

/**
 * Finds the first race rating in flattened page text, e.g. "Cook: Lean D"
 * when an outlet is named in the same sentence, or just "Toss-up" after a
 * "Race rating:" label.
 */
export function extractRating(text: string): string | undefined {
  const outlet = text.match(OUTLET_RATING);
  if (outlet?.[1] && outlet[2]) {
    return `${outlet[1]}: ${outlet[2]}`;
  }
  return text.match(LABELED_RATING)?.[1];
}
