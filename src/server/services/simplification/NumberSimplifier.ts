import type { Logger } from 'pino';
import type { NumberAnnotator, Replacement, SimplificationResult } from './types.js';
import { DateContextClassifier } from './DateContextClassifier.js';
import { QuantityRewriter } from './QuantityRewriter.js';
import { NUMERAL_GRAMMAR, tokenize } from './NumeralTokenizer.js';
import { rewritePercentages } from './percentages.js';
import { createChildLogger } from '../../utils/logger.js';

export interface NumberSimplifierOptions {
  /** Hooks for contextual explanations or comparisons appended to simplified quantities */
  annotators?: readonly NumberAnnotator[];
  classifier?: DateContextClassifier;
  logger?: Logger;
}

/**
 * Simplifies numbers in German text.
 *
 * Two passes over the text:
 * 1. percentages ("25 Prozent") are replaced by phrases ("jeder Vierte");
 * 2. the remaining numerals are classified and either kept (years, dates)
 *    or replaced by a rounded approximation ("etwa 325.000 Euro").
 *
 * The order is an invariant, not a detail: the numeral grammar also matches
 * "25 Prozent" and would read it as the quantity 25 with unit "Prozent".
 * Numerals inside a phrase written by pass 1 ("etwa 20 Prozent") are left alone.
 */
export class NumberSimplifier {
  private readonly classifier: DateContextClassifier;
  private readonly quantityRewriter: QuantityRewriter;
  private readonly logger: Logger;

  constructor(options: NumberSimplifierOptions = {}) {
    this.logger = options.logger ?? createChildLogger({ component: 'NumberSimplifier' });
    this.classifier = options.classifier ?? new DateContextClassifier();
    this.quantityRewriter = new QuantityRewriter({
      classifier: this.classifier,
      annotators: options.annotators,
      logger: this.logger,
    });
  }

  simplify(text: string): string {
    return this.simplifyWithDetails(text).text;
  }

  /**
   * Simplify and report every span that was rewritten or deliberately preserved
   */
  simplifyWithDetails(rawText: string): SimplificationResult {
    const percentagePass = rewritePercentages(rawText);
    const text = percentagePass.text;
    const replacements: Replacement[] = [...percentagePass.replacements];

    // Tokens and phrases are both ordered by offset
    const phrases = percentagePass.replacements;
    let phraseIndex = 0;
    let result = '';
    let lastEnd = 0;

    for (const token of tokenize(text, NUMERAL_GRAMMAR)) {
      result += text.slice(lastEnd, token.start);
      lastEnd = token.end;

      while (phraseIndex < phrases.length && phrases[phraseIndex].outputEnd <= token.start) {
        phraseIndex++;
      }
      const insidePhrase = phraseIndex < phrases.length && token.start >= phrases[phraseIndex].outputStart;
      if (insidePhrase) {
        result += token.text;
        continue;
      }

      const kind = this.classifier.classify(text, token.start);
      const replacement = kind === 'plain-quantity'
        ? this.quantityRewriter.rewrite(token, text)
        : token.text;

      replacements.push({
        kind,
        pass: 2,
        start: token.start,
        end: token.end,
        outputStart: result.length,
        outputEnd: result.length + replacement.length,
        original: token.text,
        replacement,
      });
      result += replacement;
    }

    result += text.slice(lastEnd);

    this.logger.debug(
      {
        inputLength: rawText.length,
        outputLength: result.length,
        percentages: percentagePass.replacements.length,
        quantities: replacements.filter((r) => r.kind === 'plain-quantity').length,
        preserved: replacements.filter((r) => r.kind === 'year' || r.kind === 'date-component').length,
      },
      'Simplified numbers in text'
    );

    return { text: result, replacements };
  }
}

let defaultSimplifier: NumberSimplifier | null = null;

/**
 * Simplify numbers in German text with the default configuration
 */
export function simplifyNumbers(text: string): string {
  if (!defaultSimplifier) {
    defaultSimplifier = new NumberSimplifier();
  }
  return defaultSimplifier.simplify(text);
}
