import type { Logger } from 'pino';
import type { NumberAnnotator, NumeralToken } from './types.js';
import { APPROXIMATION_WORD } from './constants.js';
import { DateContextClassifier } from './DateContextClassifier.js';
import { formatGermanNumber, parseGermanNumber, roundToSignificant } from './germanNumbers.js';
import { NumeralParseError } from '../../types/errors.js';
import { createChildLogger } from '../../utils/logger.js';

export interface QuantityRewriterOptions {
  classifier?: DateContextClassifier;
  annotators?: readonly NumberAnnotator[];
  logger?: Logger;
}

/**
 * Turns a plain quantity token ("324.620,22 Euro") into its approximation ("etwa 325.000 Euro")
 */
export class QuantityRewriter {
  private readonly classifier: DateContextClassifier;
  private readonly annotators: readonly NumberAnnotator[];
  private readonly logger: Logger;

  constructor(options: QuantityRewriterOptions = {}) {
    this.classifier = options.classifier ?? new DateContextClassifier();
    this.annotators = options.annotators ?? [];
    this.logger = options.logger ?? createChildLogger({ component: 'QuantityRewriter' });
  }

  /**
   * Render the replacement for a token found in `text`.
   * Numerals that cannot be parsed come back unchanged.
   */
  rewrite(token: NumeralToken, text: string): string {
    let value: number;
    try {
      value = parseGermanNumber(token.numeral);
    } catch (error) {
      if (!(error instanceof NumeralParseError)) {
        throw error;
      }
      this.logger.warn(
        { numeral: token.numeral, position: token.start, code: error.code },
        'Could not parse numeral, keeping original text'
      );
      return token.text;
    }

    const rounded = roundToSignificant(value);
    const isCount = this.classifier.isCount(text, token.start, value);

    let rendered = `${APPROXIMATION_WORD} ${formatGermanNumber(rounded, isCount)}`;
    if (token.suffix) {
      rendered += ` ${token.suffix}`;
    }

    if (this.annotators.length === 0) {
      return rendered;
    }

    const annotations: string[] = [];
    for (const annotator of this.annotators) {
      try {
        const annotation = annotator.annotate({ text, token, value, rounded, rendered });
        if (annotation) {
          annotations.push(annotation);
        }
      } catch (error) {
        this.logger.warn(
          { annotator: annotator.name, numeral: token.numeral, error: error instanceof Error ? error.message : String(error) },
          'Annotator failed, skipping its annotation'
        );
      }
    }

    return [rendered, ...annotations].join(' ');
  }
}
