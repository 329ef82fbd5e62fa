// initex/tests/unit/decoders.spec.ts
//
// Unit tests for the value decoders: strings, macro arguments, brace lists
// and entry lists, including the E_PARSE errors each one raises.

import { describe, it, expect } from 'vitest';
import {
  decodeString,
  decodeMacroArguments,
  decodeBraceList,
  decodeEntryList,
  isExtractorError,
  ExtractorError,
} from '../../src';

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
// Strings
// -----------------------------------------------------------------------------

describe('decodeString', () => {
  it('strips a call wrapper', () => {
    expect(decodeString('_("Bulbasaur")')).toBe('Bulbasaur');
    expect(decodeString('(("x"))')).toBe('x');
  });

  it('concatenates adjacent literals and decodes escapes', () => {
    expect(decodeString('COMPOUND_STRING("Line one\\n" "line two")')).toBe('Line one\nline two');
    expect(decodeString('"tab\\there"')).toBe('tab\there');
  });

  it('decodes hexadecimal and octal escapes', () => {
    expect(decodeString('"\\x41\\102"')).toBe('AB');
  });

  it('keeps the character of an unknown escape', () => {
    expect(decodeString('"a\\qb"')).toBe('aqb');
  });

  it('returns text without literals trimmed', () => {
    expect(decodeString('  SOME_CONST  ')).toBe('SOME_CONST');
    expect(decodeString('')).toBe('');
  });

  it('rejects an unterminated literal', () => {
    const err = captureError(() => decodeString('"oops'));
    expect(err.code).toBe('E_PARSE');
    expect(err.decoder).toBe('string');
    expect(err.message).toBe('unterminated string literal');
    expect(err.fragment).toBe('"oops');
  });
});

// -----------------------------------------------------------------------------
// Macro arguments
// -----------------------------------------------------------------------------

describe('decodeMacroArguments', () => {
  it('splits the arguments of a call', () => {
    expect(decodeMacroArguments('MON_TYPES(TYPE_GRASS, TYPE_POISON)')).toEqual([
      'TYPE_GRASS',
      'TYPE_POISON',
    ]);
  });

  it('keeps nested calls whole', () => {
    expect(decodeMacroArguments('FOO(1, BAR(2, 3))')).toEqual(['1', 'BAR(2, 3)']);
  });

  it('ignores parentheses inside strings', () => {
    expect(decodeMacroArguments('F("a)", 1)')).toEqual(['"a)"', '1']);
  });

  it('treats text without parentheses as one argument', () => {
    expect(decodeMacroArguments('TYPE_FIRE')).toEqual(['TYPE_FIRE']);
    expect(decodeMacroArguments('')).toEqual([]);
  });

  it('rejects an unclosed call', () => {
    const err = captureError(() => decodeMacroArguments('FOO(1, 2'));
    expect(err.code).toBe('E_PARSE');
    expect(err.decoder).toBe('macroArguments');
    expect(err.message).toBe('unbalanced parentheses in macro call');
    expect(err.fragment).toBe('FOO(1, 2');
  });

  it('rejects unbalanced braces between the parentheses', () => {
    const err = captureError(() => decodeMacroArguments('FOO(1, {2)'));
    expect(err.message).toBe('unbalanced delimiters in macro arguments');
    expect(err.fragment).toBe('1, {2');
  });
});

// -----------------------------------------------------------------------------
// Brace lists
// -----------------------------------------------------------------------------

describe('decodeBraceList', () => {
  it('splits a braced list', () => {
    expect(decodeBraceList('{ ABILITY_OVERGROW, ABILITY_NONE, ABILITY_CHLOROPHYLL }')).toEqual([
      'ABILITY_OVERGROW',
      'ABILITY_NONE',
      'ABILITY_CHLOROPHYLL',
    ]);
  });

  it('accepts a list without braces', () => {
    expect(decodeBraceList('A, B')).toEqual(['A', 'B']);
  });

  it('returns no items for an empty list', () => {
    expect(decodeBraceList('{ }')).toEqual([]);
    expect(decodeBraceList('')).toEqual([]);
  });

  it('keeps sibling groups whole when no brace pair encloses the text', () => {
    expect(decodeBraceList('{A}, {B}')).toEqual(['{A}', '{B}']);
  });

  it('rejects an unclosed list', () => {
    const err = captureError(() => decodeBraceList('{ A, B'));
    expect(err.code).toBe('E_PARSE');
    expect(err.decoder).toBe('braceList');
    expect(err.message).toBe('unbalanced delimiters in brace list');
    expect(err.fragment).toBe('{ A, B');
  });
});

// -----------------------------------------------------------------------------
// Entry lists
// -----------------------------------------------------------------------------

describe('decodeEntryList', () => {
  it('decodes groups and flattens nested conditions in order', () => {
    const raw =
      'EVOLUTION({EVO_LEVEL, 16, SPECIES_IVYSAUR}, ' +
      '{EVO_ITEM, ITEM_LEAF_STONE, SPECIES_X, CONDITIONS({IF_TIME, TIME_DAY}, {IF_GENDER, MON_FEMALE})})';

    expect(decodeEntryList(raw)).toEqual([
      { method: 'EVO_LEVEL', parameter: '16', target: 'SPECIES_IVYSAUR', conditions: [] },
      {
        method: 'EVO_ITEM',
        parameter: 'ITEM_LEAF_STONE',
        target: 'SPECIES_X',
        conditions: ['IF_TIME TIME_DAY', 'IF_GENDER MON_FEMALE'],
      },
    ]);
  });

  it('returns no entries for NULL and empty input', () => {
    expect(decodeEntryList('EVOLUTION(NULL)')).toEqual([]);
    expect(decodeEntryList('NULL')).toEqual([]);
    expect(decodeEntryList('')).toEqual([]);
  });

  it('keeps extra parts without a keyword verbatim', () => {
    expect(decodeEntryList('{EVO_LEVEL, 16, SPECIES_X, 1}')).toEqual([
      { method: 'EVO_LEVEL', parameter: '16', target: 'SPECIES_X', conditions: ['1'] },
    ]);
  });

  it('flattens only the configured keywords', () => {
    const raw = 'E({A, 1, T, WHEN({X, 2})})';

    expect(decodeEntryList(raw, { nestedListKeywords: ['WHEN'] })[0].conditions).toEqual(['X 2']);
    expect(decodeEntryList(raw)[0].conditions).toEqual(['WHEN({X, 2})']);
  });

  it('unwraps an expanded compound literal and drops its terminator', () => {
    const raw =
      '(const struct Evolution[]) { {EVO_LEVEL, 16, SPECIES_IVYSAUR}, {EVOLUTIONS_END}, }';

    expect(decodeEntryList(raw)).toEqual([
      { method: 'EVO_LEVEL', parameter: '16', target: 'SPECIES_IVYSAUR', conditions: [] },
    ]);
    expect(decodeEntryList('(const struct Evolution[]) { {EVOLUTIONS_END}, }')).toEqual([]);
  });

  it('rejects a group with fewer than three parts', () => {
    const err = captureError(() => decodeEntryList('EVOLUTION({EVO_LEVEL, 16})'));
    expect(err.code).toBe('E_PARSE');
    expect(err.decoder).toBe('entryList');
    expect(err.message).toBe('entry needs a method, a parameter and a target');
    expect(err.fragment).toBe('{EVO_LEVEL, 16}');
  });

  it('rejects a wrapper that never closes', () => {
    const err = captureError(() => decodeEntryList('EVOLUTION({EVO_LEVEL, 16, SPECIES_X)'));
    expect(err.message).toBe('unbalanced parentheses around entry list');
  });

  it('rejects an unclosed group', () => {
    const err = captureError(() => decodeEntryList('{EVO_LEVEL, 16, SPECIES_X}, {EVO_ITEM, 1'));
    expect(err.message).toBe('unclosed brace group');
    expect(err.fragment).toBe('{EVO_ITEM, 1');
  });

  it('rejects text between groups', () => {
    const err = captureError(() => decodeEntryList('{A, 1, T} junk {B, 2, U}'));
    expect(err.message).toBe('unexpected text "junk" between groups');
    expect(err.fragment).toBe('junk');
  });
});
