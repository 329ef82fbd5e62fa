// initex/tests/unit/extractor.spec.ts
//
// Unit tests for the configured facade (`createExtractor`):
//
//  - option normalization and defaults;
//  - immutable `withSymbol`;
//  - limits, hooks and modes reaching the underlying operations;
//  - species scanning with per-record skips.

import { describe, it, expect } from 'vitest';
import {
  createExtractor,
  DEFAULT_KEY_PATTERN,
  isExtractorError,
  ExtractorError,
} from '../../src';
import type { ExtractionDiagnostic, SkippedEntry } from '../../src';

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

function captureError(fn: () => unknown): ExtractorError {
  try {
    fn();
  } catch (err) {
    if (isExtractorError(err)) return err;
    throw err;
  }
  throw new Error('expected an ExtractorError to be thrown');
}

// -----------------------------------------------------------------------------
// Options
// -----------------------------------------------------------------------------

describe('createExtractor – options', () => {
  it('applies defaults', () => {
    const { options } = createExtractor();
    expect(options.symbols).toEqual({ TRUE: 1, FALSE: 0 });
    expect(options.keyPattern).toBe(DEFAULT_KEY_PATTERN);
    expect(options.nestedListKeywords).toEqual(['CONDITIONS']);
    expect(options.unterminatedFields).toBe('commit');
    expect(options.maxExpressionLength).toBeUndefined();
    expect(options.maxInputLength).toBeUndefined();
  });

  it('merges symbols over the defaults', () => {
    const extractor = createExtractor({ symbols: { GEN_9: 9 } });
    expect(extractor.evaluate('GEN_9 + TRUE')).toBe(10);
  });

  it('drops negative limits', () => {
    const { options } = createExtractor({ maxInputLength: -1, maxExpressionLength: -5 });
    expect(options.maxInputLength).toBeUndefined();
    expect(options.maxExpressionLength).toBeUndefined();
  });
});

// -----------------------------------------------------------------------------
// withSymbol
// -----------------------------------------------------------------------------

describe('createExtractor – withSymbol', () => {
  it('returns a new extractor and leaves the original unchanged', () => {
    const base = createExtractor();
    const next = base.withSymbol('GEN', 8);

    expect(next.evaluate('GEN + 1')).toBe(9);
    expect(captureError(() => base.evaluate('GEN + 1')).code).toBe('E_UNRESOLVED');
  });

  it('replaces an existing symbol', () => {
    expect(createExtractor().withSymbol('TRUE', 2).evaluate('TRUE * 3')).toBe(6);
  });

  it('accepts bigint values', () => {
    expect(createExtractor().withSymbol('BIG', 1n << 40n).evaluate('BIG >> 40')).toBe(1);
  });

  it('rejects names that are not C identifiers', () => {
    expect(() => createExtractor().withSymbol('1bad', 1)).toThrow(
      'initex: symbol name must be a C identifier, got "1bad".',
    );
  });

  it('rejects non-integer values', () => {
    expect(() => createExtractor().withSymbol('HALF', 1.5)).toThrow(
      'initex: symbol "HALF" must be an integer, got 1.5.',
    );
  });
});

// -----------------------------------------------------------------------------
// Limits, hooks & modes
// -----------------------------------------------------------------------------

describe('createExtractor – limits', () => {
  it('rejects input longer than maxInputLength', () => {
    const extractor = createExtractor({ maxInputLength: 10 });

    const err = captureError(() => extractor.scanEntries('x'.repeat(11)));
    expect(err.code).toBe('E_LIMIT');
    expect(err.message).toBe('input is longer than 10 characters');

    expect(captureError(() => extractor.decodeString('"0123456789"')).code).toBe('E_LIMIT');
    expect(extractor.decodeString('"01234567"')).toBe('01234567');
  });

  it('passes maxExpressionLength to the evaluator', () => {
    const extractor = createExtractor({ maxExpressionLength: 5 });
    expect(captureError(() => extractor.evaluate('1 + 2 + 3')).code).toBe('E_LIMIT');
    expect(extractor.evaluate('1 + 2')).toBe(3);
  });
});

describe('createExtractor – hooks & modes', () => {
  it('reports skips and diagnostics through the hooks', () => {
    const skipped: SkippedEntry[] = [];
    const diagnostics: ExtractionDiagnostic[] = [];
    const extractor = createExtractor({
      onSkip: (s) => skipped.push(s),
      onDiagnostic: (d) => diagnostics.push(d),
    });

    const entries = extractor.scanEntries('[A] = { };\n[B] = { .x = 1 };');

    expect(entries).toEqual({ B: { x: '1' } });
    expect(skipped.map((s) => `${s.key}:${s.reason}`)).toEqual(['A:empty-block']);
    expect(diagnostics.map((d) => d.field)).toEqual(['x']);
  });

  it('throws on unterminated fields in "error" mode', () => {
    const extractor = createExtractor({ unterminatedFields: 'error' });
    const err = captureError(() => extractor.extractFieldMap('.x = FOO(1,'));
    expect(err.code).toBe('E_PARSE');
    expect(err.decoder).toBe('fieldMap');
  });

  it('uses the configured key pattern', () => {
    const extractor = createExtractor({ keyPattern: /MOVE_[A-Z_]+/ });
    expect(extractor.scanEntries('[MOVE_CUT] = { .power = 50, };\n[ITEM_X] = { .price = 1, };')).toEqual({
      MOVE_CUT: { power: '50' },
    });
  });

  it('uses the configured nested-list keywords', () => {
    const extractor = createExtractor({ nestedListKeywords: ['WHEN'] });
    expect(extractor.decodeEntryList('E({A, 1, T, WHEN({X, 2})})')[0].conditions).toEqual(['X 2']);
  });

  it('passes its symbols to the learnset scanner', () => {
    const text = 'static const struct LevelUpMove sX[] = { LEVEL_UP_MOVE(P_UPDATED ? 7 : 9, MOVE_X), };';
    expect(createExtractor().withSymbol('P_UPDATED', 0).scanLevelUpLearnsets(text)).toEqual({
      sX: [{ level: 9, move: 'MOVE_X' }],
    });
  });

  it('splits lists and decodes values', () => {
    const extractor = createExtractor();
    expect(extractor.splitTopLevel('a, (b, c)')).toEqual(['a', '(b, c)']);
    expect(extractor.decodeMacroArguments('F(1, 2)')).toEqual(['1', '2']);
    expect(extractor.decodeBraceList('{ A }')).toEqual(['A']);
    expect(extractor.scanMoveArrays('static const u16 sM[] = { MOVE_CUT, };')).toEqual({
      sM: ['MOVE_CUT'],
    });
  });
});

// -----------------------------------------------------------------------------
// Species scanning
// -----------------------------------------------------------------------------

describe('createExtractor – scanSpecies', () => {
  const text = [
    '[SPECIES_NONE] = { .speciesName = _("??????????"), },',
    '[SPECIES_EMBER] =',
    '{',
    '    .baseHP = 39,',
    '    .types = MON_TYPES(TYPE_FIRE),',
    '    .speciesName = _("Ember"),',
    '},',
    '[SPECIES_BROKEN] = { .baseHP = HP_UNKNOWN, },',
    '[MOVE_CUT] = { .power = 50, },',
  ].join('\n');

  it('assembles valid records and reports invalid ones', () => {
    const skipped: SkippedEntry[] = [];
    const records = createExtractor({ onSkip: (s) => skipped.push(s) }).scanSpecies(text);

    expect(Object.keys(records)).toEqual(['SPECIES_NONE', 'SPECIES_EMBER']);
    expect(records.SPECIES_EMBER.baseStats.hp).toBe(39);
    expect(records.SPECIES_EMBER.types).toEqual(['TYPE_FIRE', 'TYPE_FIRE']);
    expect(records.SPECIES_EMBER.displayName).toBe('Ember');

    expect(skipped).toHaveLength(1);
    expect(skipped[0].key).toBe('SPECIES_BROKEN');
    expect(skipped[0].reason).toBe('invalid-record');
    expect(skipped[0].index).toBe(text.indexOf('[SPECIES_BROKEN]'));
    expect(isExtractorError(skipped[0].cause)).toBe(true);
  });

  it('applies family guards', () => {
    const records = createExtractor().scanSpecies(text, {
      familyGuards: { SPECIES_EMBER: 'P_FAMILY_FLAME' },
    });
    expect(records.SPECIES_EMBER.familyGuard).toBe('P_FAMILY_FLAME');
  });
});
