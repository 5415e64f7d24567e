/**
 * Fixed lookup tables for German number simplification.
 * Frozen so every caller shares the same process-wide, immutable tables.
 */

/**
 * German month names (exact, case-sensitive)
 */
export const GERMAN_MONTHS: readonly string[] = Object.freeze([
  'Januar', 'Februar', 'März', 'April', 'Mai', 'Juni',
  'Juli', 'August', 'September', 'Oktober', 'November', 'Dezember',
]);

/**
 * Values in this range read as calendar years rather than counts
 */
export const YEAR_RANGE = Object.freeze({ min: 1900, max: 2100 });

/**
 * Year prefixes accepted for a four-digit year after a month name
 */
export const YEAR_PREFIXES: readonly string[] = Object.freeze(['19', '20']);

/**
 * Qualitative phrases for percentages
 */
export const PERCENTAGE_PHRASES = Object.freeze({
  QUARTER: 'jeder Vierte',
  HALF: 'die Hälfte',
  THREE_QUARTERS: 'drei von vier',
  ALMOST_ALL: 'fast alle',
  MORE_THAN_HALF: 'mehr als die Hälfte',
  FEW: 'wenige',
} as const);

/**
 * Bucket boundaries for percentage phrases
 */
export const PERCENTAGE_THRESHOLDS = Object.freeze({
  ALMOST_ALL_MIN: 90,
  HALF: 50,
  FEW_MAX: 15,
} as const);

/**
 * Word placed before every approximated value
 */
export const APPROXIMATION_WORD = 'etwa';

/**
 * Word that follows a percentage numeral
 */
export const PERCENT_WORD = 'Prozent';
