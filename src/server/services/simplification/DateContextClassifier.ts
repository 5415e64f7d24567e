import type { NumeralClassification } from './types.js';
import { GERMAN_MONTHS, YEAR_PREFIXES, YEAR_RANGE } from './constants.js';

/**
 * Decides from the surrounding text whether a numeral is a year or part of a
 * calendar date ("1. Januar 2024", "im Jahr 2019", "seit 1998") instead of a quantity.
 *
 * All checks take the text of the current pass and the offset where the numeral starts.
 */
export class DateContextClassifier {
  private readonly dayOfMonthPattern: RegExp = /^\d+\./;
  private readonly leadingDigitsPattern: RegExp = /^\d+/;
  private readonly twoSpacesPattern: RegExp = /^\s{2}$/;

  // How far ahead to look for a month name
  private readonly lookaheadChars = 50;

  private readonly months: readonly string[];
  private readonly monthSet: ReadonlySet<string>;

  constructor(months: readonly string[] = GERMAN_MONTHS) {
    this.months = months;
    this.monthSet = new Set(months);
  }

  /**
   * True when the trimmed text before the numeral ends in "Jahr " or "Jahre ".
   * Trimming drops the trailing space, so this only holds for text that keeps one
   * after trimming; it feeds grouping and the year-range rule, never pass-through.
   */
  followsYearWord(text: string, position: number): boolean {
    const before = text.slice(0, position).trim();
    return before.endsWith('Jahr ') || before.endsWith('Jahre ');
  }

  /**
   * True when the last word of the (trimmed) preceding text contains a month name.
   * Containment, not equality: "Maibaum" counts as following "Mai".
   */
  followsMonthName(before: string): boolean {
    const words = before.split(/\s+/).filter(Boolean);
    const lastWord = words[words.length - 1];
    if (!lastWord) {
      return false;
    }
    return this.months.some((month) => lastWord.includes(month));
  }

  /**
   * Day-of-month ("  1." after two whitespace characters) or a month name among
   * the next two words, counting the numeral itself as the first word
   */
  isPartOfDate(text: string, position: number): boolean {
    if (
      position >= 2 &&
      this.twoSpacesPattern.test(text.slice(position - 2, position)) &&
      this.dayOfMonthPattern.test(text.slice(position, position + 4))
    ) {
      return true;
    }

    const nextWords = text
      .slice(position, position + this.lookaheadChars)
      .split(/\s+/)
      .filter(Boolean);
    if (nextWords.length === 0) {
      return false;
    }

    return this.monthSet.has(nextWords[0]) || (nextWords.length > 1 && this.monthSet.has(nextWords[1]));
  }

  isYear(text: string, position: number): boolean {
    const before = text.slice(0, position).trim();
    const digitsMatch = this.leadingDigitsPattern.exec(text.slice(position));
    if (!digitsMatch) {
      return false;
    }
    const digits = digitsMatch[0];

    // "im Jahr 2024"
    if (before.endsWith('Jahr')) {
      return true;
    }

    // "Januar 2024"
    if (
      digits.length === 4 &&
      YEAR_PREFIXES.some((prefix) => digits.startsWith(prefix)) &&
      this.followsMonthName(before)
    ) {
      return true;
    }

    // "seit 1998". Counts in the year window are kept too: "2018 Ereignisse" stays as written
    const value = parseInt(digits, 10);
    return value >= YEAR_RANGE.min && value <= YEAR_RANGE.max && !this.followsYearWord(text, position);
  }

  /**
   * Year wins over date component; anything else is a plain quantity
   */
  classify(text: string, position: number): NumeralClassification {
    if (this.isYear(text, position)) {
      return 'year';
    }
    if (this.isPartOfDate(text, position)) {
      return 'date-component';
    }
    return 'plain-quantity';
  }

  /**
   * Year-range values are rendered without thousands separators,
   * unless they follow "Jahr "/"Jahre "
   */
  isCount(text: string, position: number, value: number): boolean {
    const rounded = Math.round(value);
    const looksLikeYear =
      !this.followsYearWord(text, position) && rounded >= YEAR_RANGE.min && rounded <= YEAR_RANGE.max;
    return !looksLikeYear;
  }
}
