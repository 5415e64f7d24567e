/**
 * German number utilities: parsing localized numerals, rounding to
 * human-friendly magnitudes and rendering counts with thousands separators.
 */

import { NumeralParseError } from '../../types/errors.js';

const PLAIN_DECIMAL = /^(?:\d+(?:\.\d*)?|\.\d+)$/;

/**
 * Parse a German numeral ("324.620,22") into a number.
 * Dots are thousands separators and are dropped, the comma is the decimal separator.
 *
 * @throws NumeralParseError if the normalized string is not a plain decimal
 * or is too large to be represented
 */
export function parseGermanNumber(numeral: string): number {
  const normalized = numeral.trim().replace(/\./g, '').replace(/,/g, '.');
  if (!PLAIN_DECIMAL.test(normalized)) {
    throw new NumeralParseError(numeral, { normalized });
  }
  const value = parseFloat(normalized);
  if (!Number.isFinite(value)) {
    throw new NumeralParseError(numeral, { normalized, reason: 'out of range' });
  }
  return value;
}

/**
 * Same as parseGermanNumber, but returns null instead of throwing
 */
export function tryParseGermanNumber(numeral: string): number | null {
  try {
    return parseGermanNumber(numeral);
  } catch (error) {
    if (error instanceof NumeralParseError) {
      return null;
    }
    throw error;
  }
}

/**
 * Round a non-negative value to a "nice" magnitude:
 * - below 100: nearest integer
 * - below 1.000: nearest hundred
 * - below 100.000: nearest thousand
 * - otherwise: three significant digits
 */
export function roundToSignificant(value: number): number {
  if (value < 100) {
    return Math.round(value);
  }
  if (value < 1000) {
    return Math.round(value / 100) * 100;
  }
  if (value < 100000) {
    return Math.round(value / 1000) * 1000;
  }

  const exponent = toPlainDigits(value).length - 3;
  const leading = value / 10 ** exponent;
  const rounded = Number(`${Math.round(leading)}e${exponent}`);
  // Rounding up next to Number.MAX_VALUE overflows
  return Number.isFinite(rounded) ? rounded : Number(`${Math.floor(leading)}e${exponent}`);
}

/**
 * Integer digits of a value without exponent notation (String() switches to it from 1e21)
 */
function toPlainDigits(value: number): string {
  const text = String(Math.round(value));
  const match = /^(\d)(?:\.(\d+))?e\+(\d+)$/.exec(text);
  if (!match) {
    return text;
  }
  const [, head, tail = '', exponent] = match;
  return head + tail.padEnd(Number(exponent), '0');
}

/**
 * Render an integer the German way.
 * Counts from 1.000 upwards get a dot every three digits; identifiers such as years never do.
 */
export function formatGermanNumber(value: number, isCount: boolean = true): string {
  const digits = toPlainDigits(value);
  if (!isCount || value < 1000) {
    return digits;
  }
  return digits.replace(/\B(?=(\d{3})+(?!\d))/g, '.');
}
