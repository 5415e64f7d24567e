/**
 * Shared types for the simplification pipeline
 */

/**
 * A span recognized by a token grammar.
 * Offsets refer to the text the grammar was run over (one pass).
 */
export interface NumeralToken {
  /** Offset of the first character of the match */
  start: number;
  /** Offset just past the last character of the match */
  end: number;
  /** Whole matched span, including whitespace and suffix */
  text: string;
  /** Localized digit string, e.g. "324.620,22" */
  numeral: string;
  /** Trailing unit or currency word, '' when absent */
  suffix: string;
}

export type NumeralClassification = 'year' | 'date-component' | 'percentage' | 'plain-quantity';

/**
 * Classifications that keep the original text
 */
export type PassThroughClassification = Extract<NumeralClassification, 'year' | 'date-component'>;

/**
 * One rewritten (or deliberately preserved) span
 */
export interface Replacement {
  kind: NumeralClassification;
  /** 1 for the percentage pass, 2 for the numeral pass */
  pass: 1 | 2;
  /** Span of the original text in the pass input */
  start: number;
  end: number;
  /** Span of the replacement in the pass output */
  outputStart: number;
  outputEnd: number;
  original: string;
  replacement: string;
}

export interface SimplificationResult {
  text: string;
  replacements: Replacement[];
}

/**
 * Data handed to annotators for each simplified quantity
 */
export interface AnnotationContext {
  /** Text of the pass the token was found in */
  text: string;
  token: NumeralToken;
  value: number;
  rounded: number;
  /** Rendered replacement before annotations, e.g. "etwa 325.000 Euro" */
  rendered: string;
}

/**
 * Extension point for contextual explanations or figurative comparisons.
 * Returns text appended after the replacement, or null to add nothing.
 */
export interface NumberAnnotator {
  readonly name: string;
  annotate(context: AnnotationContext): string | null;
}
