/**
 * German number simplification
 */

export { NumberSimplifier, simplifyNumbers } from './NumberSimplifier.js';
export type { NumberSimplifierOptions } from './NumberSimplifier.js';
export { QuantityRewriter } from './QuantityRewriter.js';
export type { QuantityRewriterOptions } from './QuantityRewriter.js';
export { DateContextClassifier } from './DateContextClassifier.js';
export { describePercentage, rewritePercentages } from './percentages.js';
export type { PercentageRewriteResult } from './percentages.js';
export { NUMERAL_GRAMMAR, PERCENTAGE_GRAMMAR, tokenize } from './NumeralTokenizer.js';
export type { TokenGrammar } from './NumeralTokenizer.js';
export { formatGermanNumber, parseGermanNumber, roundToSignificant, tryParseGermanNumber } from './germanNumbers.js';
export { GERMAN_MONTHS, PERCENTAGE_PHRASES } from './constants.js';
export type * from './types.js';
