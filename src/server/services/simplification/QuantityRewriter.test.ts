import { describe, expect, it, vi } from 'vitest';
import pino from 'pino';
import { QuantityRewriter } from './QuantityRewriter.js';
import type { NumberAnnotator, NumeralToken } from './types.js';

function token(partial: Partial<NumeralToken> & Pick<NumeralToken, 'numeral'>): NumeralToken {
  const text = partial.text ?? partial.numeral;
  const start = partial.start ?? 0;
  return {
    start,
    end: start + text.length,
    text,
    suffix: '',
    ...partial,
  };
}

describe('QuantityRewriter', () => {
  const silentLogger = pino({ level: 'silent' });

  it('renders an approximation followed by the suffix', () => {
    const rewriter = new QuantityRewriter({ logger: silentLogger });

    const result = rewriter.rewrite(
      token({ numeral: '324.620,22', text: '324.620,22 Euro', suffix: 'Euro' }),
      '324.620,22 Euro wurden gespendet.'
    );

    expect(result).toBe('etwa 325.000 Euro');
  });

  it('renders no suffix when none was captured', () => {
    const rewriter = new QuantityRewriter({ logger: silentLogger });

    expect(rewriter.rewrite(token({ numeral: '5678', start: 7 }), 'es gab 5678')).toBe('etwa 6.000');
  });

  it('does not group values that look like years', () => {
    const rewriter = new QuantityRewriter({ logger: silentLogger });

    const result = rewriter.rewrite(
      token({ numeral: '1.899,6', text: '1.899,6 Liter', suffix: 'Liter', start: 9 }),
      'Es waren 1.899,6 Liter'
    );

    expect(result).toBe('etwa 2000 Liter');
  });

  it('keeps the original text when the numeral cannot be parsed', () => {
    const logger = pino({ level: 'silent' });
    const warn = vi.spyOn(logger, 'warn');
    const rewriter = new QuantityRewriter({ logger });

    const result = rewriter.rewrite(token({ numeral: '1,2,3', text: '1,2,3 Stück', suffix: 'Stück' }), '1,2,3 Stück');

    expect(result).toBe('1,2,3 Stück');
    expect(warn).toHaveBeenCalledWith(
      { numeral: '1,2,3', position: 0, code: 'NUMERAL_PARSE_ERROR' },
      'Could not parse numeral, keeping original text'
    );
  });

  describe('annotators', () => {
    it('appends annotations and passes the full context', () => {
      const annotate = vi.fn(() => '(Vergleich folgt)');
      const annotator: NumberAnnotator = { name: 'comparison', annotate };
      const rewriter = new QuantityRewriter({ logger: silentLogger, annotators: [annotator] });
      const menschen = token({ numeral: '1.897', text: '1.897 Menschen', suffix: 'Menschen' });

      const result = rewriter.rewrite(menschen, '1.897 Menschen nahmen teil.');

      expect(result).toBe('etwa 2.000 Menschen (Vergleich folgt)');
      expect(annotate).toHaveBeenCalledWith({
        text: '1.897 Menschen nahmen teil.',
        token: menschen,
        value: 1897,
        rounded: 2000,
        rendered: 'etwa 2.000 Menschen',
      });
    });

    it('skips null annotations', () => {
      const annotator: NumberAnnotator = { name: 'explanation', annotate: () => null };
      const rewriter = new QuantityRewriter({ logger: silentLogger, annotators: [annotator] });

      expect(rewriter.rewrite(token({ numeral: '42' }), '42')).toBe('etwa 42');
    });

    it('logs and skips an annotator that throws', () => {
      const logger = pino({ level: 'silent' });
      const warn = vi.spyOn(logger, 'warn');
      const failing: NumberAnnotator = {
        name: 'failing',
        annotate: () => {
          throw new Error('boom');
        },
      };
      const working: NumberAnnotator = { name: 'working', annotate: () => '(ok)' };
      const rewriter = new QuantityRewriter({ logger, annotators: [failing, working] });

      expect(rewriter.rewrite(token({ numeral: '42' }), '42')).toBe('etwa 42 (ok)');
      expect(warn).toHaveBeenCalledWith(
        { annotator: 'failing', numeral: '42', error: 'boom' },
        'Annotator failed, skipping its annotation'
      );
    });
  });
});
