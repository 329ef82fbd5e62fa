// initex/tests/unit/evaluator.spec.ts
//
// Unit tests for the integer expression evaluator:
//
//  - C operator precedence and associativity;
//  - signed 64-bit arithmetic with truncating division;
//  - symbol lookup and integer suffixes;
//  - the error codes, messages and positions of each failure kind.

import { describe, it, expect } from 'vitest';
import {
  evaluateExpression,
  evaluateExpressionBig,
  ExtractorError,
  isExtractorError,
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
// Arithmetic & precedence
// -----------------------------------------------------------------------------

describe('evaluateExpression – arithmetic & precedence', () => {
  it('applies multiplicative before additive operators', () => {
    expect(evaluateExpression('2 + 3 * 4')).toBe(14);
    expect(evaluateExpression('(2 + 3) * 4')).toBe(20);
    expect(evaluateExpression('20 - 6 / 2 - 1')).toBe(16);
  });

  it('truncates division toward zero', () => {
    expect(evaluateExpression('10 / 3')).toBe(3);
    expect(evaluateExpression('-7 / 2')).toBe(-3);
  });

  it('gives the remainder the sign of the dividend', () => {
    expect(evaluateExpression('-7 % 3')).toBe(-1);
    expect(evaluateExpression('7 % -3')).toBe(1);
  });

  it('evaluates bitwise operators and shifts', () => {
    expect(evaluateExpression('1 << 4')).toBe(16);
    expect(evaluateExpression('-16 >> 2')).toBe(-4);
    expect(evaluateExpression('5 & 3')).toBe(1);
    expect(evaluateExpression('5 | 2')).toBe(7);
    expect(evaluateExpression('6 ^ 3')).toBe(5);
    expect(evaluateExpression('0x1F & ~(1 << 3)')).toBe(23);
  });

  it('binds shifts tighter than comparisons and comparisons tighter than &', () => {
    expect(evaluateExpression('1 << 2 < 5')).toBe(1);
    expect(evaluateExpression('3 & 2 == 2')).toBe(1);
  });

  it('evaluates unary operators', () => {
    expect(evaluateExpression('-5')).toBe(-5);
    expect(evaluateExpression('+5')).toBe(5);
    expect(evaluateExpression('~0')).toBe(-1);
    expect(evaluateExpression('!5')).toBe(0);
    expect(evaluateExpression('!0')).toBe(1);
    expect(evaluateExpression('- -3')).toBe(3);
  });
});

// -----------------------------------------------------------------------------
// Comparison, logic & ternary
// -----------------------------------------------------------------------------

describe('evaluateExpression – comparison, logic & ternary', () => {
  it('yields 1 or 0 for comparisons', () => {
    expect(evaluateExpression('1 == 1')).toBe(1);
    expect(evaluateExpression('2 != 2')).toBe(0);
    expect(evaluateExpression('3 <= 3')).toBe(1);
    expect(evaluateExpression('3 >= 4')).toBe(0);
    expect(evaluateExpression('2 < 3')).toBe(1);
    expect(evaluateExpression('2 > 3')).toBe(0);
  });

  it('yields 1 or 0 for logical operators', () => {
    expect(evaluateExpression('3 > 2 && 2 > 1')).toBe(1);
    expect(evaluateExpression('0 || 0')).toBe(0);
    expect(evaluateExpression('0 || 7')).toBe(1);
    expect(evaluateExpression('4 && 0')).toBe(0);
  });

  it('selects a ternary branch by the condition', () => {
    expect(evaluateExpression('1 ? 10 : 20')).toBe(10);
    expect(evaluateExpression('0 ? 10 : 20')).toBe(20);
  });

  it('nests ternaries to the right', () => {
    expect(evaluateExpression('1 ? 2 : 0 ? 3 : 4')).toBe(2);
    expect(evaluateExpression('0 ? 2 : 0 ? 3 : 4')).toBe(4);
  });

  it('evaluates generation-gated values', () => {
    const symbols = { P_UPDATED_STATS: 9, GEN_6: 6 };
    expect(evaluateExpression('(P_UPDATED_STATS >= GEN_6) ? 45 : 40', { symbols })).toBe(45);
  });
});

// -----------------------------------------------------------------------------
// Literals & symbols
// -----------------------------------------------------------------------------

describe('evaluateExpression – literals & symbols', () => {
  it('reads hexadecimal literals in either case', () => {
    expect(evaluateExpression('0x10')).toBe(16);
    expect(evaluateExpression('0XfF')).toBe(255);
  });

  it('reads literals with a leading zero as octal', () => {
    expect(evaluateExpression('010')).toBe(8);
    expect(evaluateExpression('0777 + 0')).toBe(511);
    expect(evaluateExpression('017u')).toBe(15);
    expect(evaluateExpression('0')).toBe(0);
  });

  it('ignores C integer suffixes', () => {
    expect(evaluateExpression('10u + 5UL')).toBe(15);
    expect(evaluateExpression('3ll * 2LLU')).toBe(6);
  });

  it('resolves TRUE and FALSE by default', () => {
    expect(evaluateExpression('TRUE + TRUE')).toBe(2);
    expect(evaluateExpression('FALSE')).toBe(0);
  });

  it('replaces the default table with the given symbols', () => {
    expect(evaluateExpression('GEN_9 - GEN_3', { symbols: { GEN_9: 9, GEN_3: 3 } })).toBe(6);

    const err = captureError(() => evaluateExpression('TRUE', { symbols: { GEN_9: 9 } }));
    expect(err.code).toBe('E_UNRESOLVED');
  });

  it('accepts bigint symbol values', () => {
    expect(evaluateExpression('BIG >> 40', { symbols: { BIG: 1n << 40n } })).toBe(1);
  });

  it('evaluates empty and blank input to 0', () => {
    expect(evaluateExpression('')).toBe(0);
    expect(evaluateExpression('  \n\t ')).toBe(0);
  });
});

// -----------------------------------------------------------------------------
// 64-bit semantics
// -----------------------------------------------------------------------------

describe('evaluateExpressionBig – signed 64-bit semantics', () => {
  it('reinterprets literals wider than 63 bits as signed', () => {
    expect(evaluateExpressionBig('0xFFFFFFFFFFFFFFFF')).toBe(-1n);
    expect(evaluateExpression('0xFFFFFFFFFFFFFFFF')).toBe(-1);
  });

  it('wraps on overflow', () => {
    expect(evaluateExpressionBig('9223372036854775807 + 1')).toBe(-9223372036854775808n);
    expect(evaluateExpressionBig('1 << 63')).toBe(-9223372036854775808n);
  });

  it('returns values past the safe integer range', () => {
    expect(evaluateExpressionBig('1 << 60')).toBe(1152921504606846976n);
  });
});

// -----------------------------------------------------------------------------
// Errors
// -----------------------------------------------------------------------------

describe('evaluateExpression – errors', () => {
  it('rejects results outside the safe integer range', () => {
    const err = captureError(() => evaluateExpression('1 << 60'));
    expect(err).toBeInstanceOf(ExtractorError);
    expect(err.code).toBe('E_ARITHMETIC');
    expect(err.message).toBe('result 1152921504606846976 is outside the safe integer range');
  });

  it('rejects division and modulo by zero at the operator', () => {
    const division = captureError(() => evaluateExpression('1 / 0'));
    expect(division.code).toBe('E_ARITHMETIC');
    expect(division.message).toBe('division by zero');
    expect(division.fragment).toBe('/');
    expect(division.column).toBe(3);

    const modulo = captureError(() => evaluateExpression('5 % (2 - 2)'));
    expect(modulo.code).toBe('E_ARITHMETIC');
    expect(modulo.message).toBe('modulo by zero');
  });

  it('rejects shift counts outside 0..63', () => {
    const wide = captureError(() => evaluateExpression('1 << 64'));
    expect(wide.code).toBe('E_ARITHMETIC');
    expect(wide.message).toBe('shift count 64 is outside 0..63');
    expect(wide.fragment).toBe('<<');

    const negative = captureError(() => evaluateExpression('8 >> -1'));
    expect(negative.message).toBe('shift count -1 is outside 0..63');
  });

  it('reports a missing operand at the end of input', () => {
    const err = captureError(() => evaluateExpression('1 + '));
    expect(err.code).toBe('E_SYNTAX');
    expect(err.message).toBe('unexpected end of input');
    expect(err.fragment).toBe('1 +');
    expect(err.index).toBe(4);
  });

  it('reports trailing tokens', () => {
    const err = captureError(() => evaluateExpression('1 2'));
    expect(err.code).toBe('E_SYNTAX');
    expect(err.message).toBe('unexpected trailing number 2');
    expect(err.fragment).toBe('2');
  });

  it('reports an unclosed parenthesis', () => {
    const err = captureError(() => evaluateExpression('(1 + 2'));
    expect(err.code).toBe('E_SYNTAX');
    expect(err.message).toBe('expected ")" but found end of input');
  });

  it('reports a ternary without its colon', () => {
    const err = captureError(() => evaluateExpression('1 ? 2 3'));
    expect(err.message).toBe('expected ":" but found number 3');
  });

  it('reports characters outside the grammar with a snippet', () => {
    const err = captureError(() => evaluateExpression('1 $ 2'));
    expect(err.code).toBe('E_SYNTAX');
    expect(err.message).toBe('unexpected character "$" in expression');
    expect(err.fragment).toBe('$');
    expect(err.line).toBe(1);
    expect(err.column).toBe(3);
    expect(err.snippet).toBe('1 $ 2\n  ^ --- unexpected character "$" in expression');
  });

  it('reports malformed literals', () => {
    expect(captureError(() => evaluateExpression('12abc')).message).toBe(
      'malformed integer literal "12abc"',
    );
    expect(captureError(() => evaluateExpression('0x')).message).toBe(
      'hexadecimal literal has no digits',
    );

    const octal = captureError(() => evaluateExpression('1 + 09'));
    expect(octal.code).toBe('E_SYNTAX');
    expect(octal.message).toBe('invalid digit in octal literal "09"');
    expect(octal.fragment).toBe('09');
  });

  it('reports unknown identifiers with the known symbols as a hint', () => {
    const err = captureError(() => evaluateExpression('FOO + 1'));
    expect(err.code).toBe('E_UNRESOLVED');
    expect(err.message).toBe('unknown identifier "FOO" in expression');
    expect(err.fragment).toBe('FOO');
    expect(err.note).toBe('known symbols: TRUE, FALSE');
  });

  it('enforces maxExpressionLength', () => {
    const err = captureError(() => evaluateExpression('1 + 1', { maxExpressionLength: 3 }));
    expect(err.code).toBe('E_LIMIT');
    expect(err.message).toBe('expression is longer than 3 characters');
    expect(evaluateExpression('1 + 1', { maxExpressionLength: 5 })).toBe(2);
  });

  it('enforces maxNestingDepth', () => {
    const nested = `${'('.repeat(10)}1${')'.repeat(10)}`;
    expect(evaluateExpression(nested)).toBe(1);

    const err = captureError(() => evaluateExpression(nested, { maxNestingDepth: 8 }));
    expect(err.code).toBe('E_LIMIT');
    expect(err.message).toBe('expression nests deeper than 8 levels');
  });
});
