/**
 * Percentage rewriting: "25 Prozent" becomes "jeder Vierte", "14 Prozent" becomes "wenige".
 */

import type { Replacement } from './types.js';
import { APPROXIMATION_WORD, PERCENT_WORD, PERCENTAGE_PHRASES, PERCENTAGE_THRESHOLDS } from './constants.js';
import { PERCENTAGE_GRAMMAR, tokenize } from './NumeralTokenizer.js';
import { parseGermanNumber } from './germanNumbers.js';

export interface PercentageRewriteResult {
  text: string;
  replacements: Replacement[];
}

/**
 * Map a percentage value to a qualitative phrase.
 * 76-89 deliberately falls into "mehr als die Hälfte".
 */
export function describePercentage(value: number): string {
  if (value === 25) return PERCENTAGE_PHRASES.QUARTER;
  if (value === 50) return PERCENTAGE_PHRASES.HALF;
  if (value === 75) return PERCENTAGE_PHRASES.THREE_QUARTERS;
  if (value >= PERCENTAGE_THRESHOLDS.ALMOST_ALL_MIN) return PERCENTAGE_PHRASES.ALMOST_ALL;
  if (value > PERCENTAGE_THRESHOLDS.HALF) return PERCENTAGE_PHRASES.MORE_THAN_HALF;
  if (value <= PERCENTAGE_THRESHOLDS.FEW_MAX) return PERCENTAGE_PHRASES.FEW;
  return `${APPROXIMATION_WORD} ${Math.round(value)} ${PERCENT_WORD}`;
}

/**
 * Replace every "<zahl> Prozent" in the text, left to right.
 * Replacement offsets are recorded against both the input and the rewritten text.
 */
export function rewritePercentages(text: string): PercentageRewriteResult {
  const replacements: Replacement[] = [];
  let result = '';
  let lastEnd = 0;

  for (const token of tokenize(text, PERCENTAGE_GRAMMAR)) {
    result += text.slice(lastEnd, token.start);

    // The grammar only admits digits and a single comma, so parsing cannot fail here
    const phrase = describePercentage(parseGermanNumber(token.numeral));
    replacements.push({
      kind: 'percentage',
      pass: 1,
      start: token.start,
      end: token.end,
      outputStart: result.length,
      outputEnd: result.length + phrase.length,
      original: token.text,
      replacement: phrase,
    });

    result += phrase;
    lastEnd = token.end;
  }

  return { text: result + text.slice(lastEnd), replacements };
}
