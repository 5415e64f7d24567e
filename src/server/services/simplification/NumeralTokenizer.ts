import type { NumeralToken } from './types.js';
import { PERCENT_WORD } from './constants.js';
import { escapeRegex, toGlobalRegex } from '../../utils/regexUtils.js';

/**
 * Describes which spans of a text count as tokens and where the
 * numeral and suffix sit inside a match.
 */
export interface TokenGrammar {
  readonly name: string;
  readonly pattern: RegExp;
  readonly numeralGroup: number;
  /** Group holding the unit/currency word; omitted when the grammar has none */
  readonly suffixGroup?: number;
}

/**
 * "25 Prozent", "4,57 Prozent", "38,7Prozent"
 */
export const PERCENTAGE_GRAMMAR: TokenGrammar = Object.freeze({
  name: 'percentage',
  pattern: new RegExp(`(\\d+(?:,\\d+)?)\\s*${escapeRegex(PERCENT_WORD)}`),
  numeralGroup: 1,
});

/**
 * Localized numeral with optional dot groups and decimal part,
 * followed by optional whitespace and an optional unit or currency word
 */
export const NUMERAL_GRAMMAR: TokenGrammar = Object.freeze({
  name: 'numeral',
  pattern: /(\d+(?:\.\d+)*(?:,\d+)?)\s*((?:Euro|[A-Za-zÄäÖöÜüß]+)?)/,
  numeralGroup: 1,
  suffixGroup: 2,
});

/**
 * Lazily scan a text for non-overlapping tokens, left to right.
 *
 * The returned iterable is restartable: each iteration compiles a fresh
 * global regex, so iterating twice yields the same tokens.
 */
export function tokenize(text: string, grammar: TokenGrammar): Iterable<NumeralToken> {
  return {
    *[Symbol.iterator](): Iterator<NumeralToken> {
      const regex = toGlobalRegex(grammar.pattern);
      let match: RegExpExecArray | null;

      while ((match = regex.exec(text)) !== null) {
        if (match[0].length === 0) {
          // Zero-width match, step over it
          regex.lastIndex++;
          continue;
        }

        yield {
          start: match.index,
          end: match.index + match[0].length,
          text: match[0],
          numeral: match[grammar.numeralGroup] ?? '',
          suffix: grammar.suffixGroup !== undefined ? (match[grammar.suffixGroup] ?? '') : '',
        };
      }
    },
  };
}
