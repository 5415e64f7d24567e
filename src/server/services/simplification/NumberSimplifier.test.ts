import { describe, expect, it } from 'vitest';
import pino from 'pino';
import { NumberSimplifier, simplifyNumbers } from './NumberSimplifier.js';
import type { NumberAnnotator } from './types.js';

describe('NumberSimplifier', () => {
  const simplifier = new NumberSimplifier({ logger: pino({ level: 'silent' }) });

  it.each([
    ['324.620,22 Euro wurden gespendet.', 'etwa 325.000 Euro wurden gespendet.'],
    ['1.897 Menschen nahmen teil.', 'etwa 2.000 Menschen nahmen teil.'],
    ['25 Prozent der Bevölkerung sind betroffen.', 'jeder Vierte der Bevölkerung sind betroffen.'],
    ['90 Prozent stimmten zu.', 'fast alle stimmten zu.'],
    ['14 Prozent lehnten ab.', 'wenige lehnten ab.'],
    ['Bei 38,7 Grad Celsius ist es sehr heiß.', 'Bei etwa 39 Grad Celsius ist es sehr heiß.'],
    ['denn die Rente steigt um 4,57 Prozent.', 'denn die Rente steigt um wenige.'],
    ['Im Jahr 2024 gab es 1.234 Ereignisse.', 'Im Jahr 2024 gab es etwa 1.000 Ereignisse.'],
    ['Am 1. Januar 2024 waren es 5.678 Teilnehmer.', 'Am 1. Januar 2024 waren es etwa 6.000 Teilnehmer.'],
  ])('simplifies "%s"', (input, expected) => {
    expect(simplifier.simplify(input)).toBe(expected);
  });

  it('keeps a bare count inside the year window as written, even though it is not a year', () => {
    expect(simplifier.simplify('Im Jahr 2025 gab es 2018 Ereignisse.')).toBe('Im Jahr 2025 gab es 2018 Ereignisse.');
  });

  it('writes very large counts in full digits', () => {
    expect(simplifier.simplify('Es gibt 1234567890123456789012 Sterne.')).toBe(
      'Es gibt etwa 1.230.000.000.000.000.000.000 Sterne.'
    );
  });

  it('keeps numerals too large to represent as written', () => {
    const input = `Es gibt ${'9'.repeat(400)} Atome.`;

    expect(simplifier.simplify(input)).toBe(input);
  });

  it('keeps year-range values ungrouped when they are simplified', () => {
    expect(simplifier.simplify('Es waren 1.899,6 Liter')).toBe('Es waren etwa 2000 Liter');
  });

  it('keeps grouped numbers that start like a year simplified as quantities', () => {
    expect(simplifier.simplify('Es kamen 1.950 Gäste.')).toBe('Es kamen etwa 2000 Gäste.');
  });

  it('does not rewrite the numeral inside a percentage phrase again', () => {
    expect(simplifier.simplify('Nur 20 Prozent sind dafür.')).toBe('Nur etwa 20 Prozent sind dafür.');
  });

  it('tells apart phrase numerals and quantities between several phrases', () => {
    expect(simplifier.simplify('Nur 20 Prozent von 300 Gästen und 30 Prozent der 1.234 Helfer.')).toBe(
      'Nur etwa 20 Prozent von etwa 300 Gästen und etwa 30 Prozent der etwa 1.000 Helfer.'
    );
  });

  it('substitutes percentages before numerals are scanned', () => {
    // Read as a quantity, "25 Prozent" would become "etwa 25 Prozent"
    expect(simplifier.simplify('25 Prozent')).toBe('jeder Vierte');
  });

  it('preserves text outside replaced spans exactly', () => {
    const input = 'Text  mit\tLeerraum: 1.234 Stück,   danach  Rest.';

    expect(simplifier.simplify(input)).toBe('Text  mit\tLeerraum: etwa 1.000 Stück,   danach  Rest.');
  });

  it('returns text without numerals unchanged', () => {
    expect(simplifier.simplify('Keine Zahlen hier.')).toBe('Keine Zahlen hier.');
    expect(simplifier.simplify('')).toBe('');
  });

  it('can run again on its own output without touching the phrases', () => {
    const once = simplifier.simplify('25 Prozent der Befragten, die Hälfte davon aus 2019.');
    const twice = simplifier.simplify(once);

    expect(once).toBe('jeder Vierte der Befragten, die Hälfte davon aus 2019.');
    expect(twice).toBe(once);
  });

  it('does not throw when re-running on approximated percentages', () => {
    const once = simplifier.simplify('Nur 20 Prozent sind dafür.');

    expect(() => simplifier.simplify(once)).not.toThrow();
    expect(simplifier.simplify(once)).toBe('Nur etwa etwa 20 Prozent sind dafür.');
  });

  describe('simplifyWithDetails', () => {
    it('reports preserved and rewritten spans with their offsets', () => {
      const result = simplifier.simplifyWithDetails('Im Jahr 2024 gab es 1.234 Ereignisse.');

      expect(result.text).toBe('Im Jahr 2024 gab es etwa 1.000 Ereignisse.');
      expect(result.replacements).toEqual([
        {
          kind: 'year',
          pass: 2,
          start: 8,
          end: 16,
          outputStart: 8,
          outputEnd: 16,
          original: '2024 gab',
          replacement: '2024 gab',
        },
        {
          kind: 'plain-quantity',
          pass: 2,
          start: 20,
          end: 36,
          outputStart: 20,
          outputEnd: 41,
          original: '1.234 Ereignisse',
          replacement: 'etwa 1.000 Ereignisse',
        },
      ]);
    });

    it('lists percentage replacements from the first pass first', () => {
      const result = simplifier.simplifyWithDetails('14 Prozent von 300 Gästen');

      expect(result.text).toBe('wenige von etwa 300 Gästen');
      expect(result.replacements.map((r) => [r.pass, r.kind, r.replacement])).toEqual([
        [1, 'percentage', 'wenige'],
        [2, 'plain-quantity', 'etwa 300 Gästen'],
      ]);
    });

    it('covers the pass output exactly once with untouched gaps and replacements', () => {
      const result = simplifier.simplifyWithDetails('Am 1. Januar 2024 waren es 5.678 Teilnehmer.');
      const numeralPass = result.replacements.filter((r) => r.pass === 2);

      let rebuilt = '';
      let lastEnd = 0;
      for (const span of numeralPass) {
        rebuilt += result.text.slice(lastEnd, span.outputStart) + span.replacement;
        lastEnd = span.outputEnd;
      }
      rebuilt += result.text.slice(lastEnd);

      expect(numeralPass.map((r) => r.kind)).toEqual(['date-component', 'year', 'plain-quantity']);
      expect(rebuilt).toBe(result.text);
    });
  });

  it('passes annotations through from the options', () => {
    const annotator: NumberAnnotator = {
      name: 'comparison',
      annotate: ({ rounded }) => (rounded >= 1000 ? '(Vergleich folgt)' : null),
    };
    const annotated = new NumberSimplifier({ logger: pino({ level: 'silent' }), annotators: [annotator] });

    expect(annotated.simplify('1.897 Menschen und 12 Hunde')).toBe('etwa 2.000 Menschen (Vergleich folgt) und etwa 12 Hunde');
  });
});

describe('simplifyNumbers', () => {
  it('uses the default configuration', () => {
    expect(simplifyNumbers('324.620,22 Euro wurden gespendet.')).toBe('etwa 325.000 Euro wurden gespendet.');
  });
});
