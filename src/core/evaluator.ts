/**
 * initex – Expression evaluator
 *
 * Evaluates restricted C integer expressions such as
 *
 *   (P_UPDATED_STATS >= GEN_6) ? 45 : 40
 *   0x1F & ~(1 << 3)
 *
 * by recursive descent over full C operator precedence. Each parse level
 * returns the value of its sub-expression directly; no tree is built.
 *
 * Arithmetic is done on signed 64-bit integers. The final value must fit
 * in a JavaScript safe integer.
 *
 * License: Apache-2.0
 */

import {
  createArithmeticError,
  createLimitError,
  createSyntaxError,
} from './errors';
import { describeToken, DEFAULT_SYMBOLS, matchesOperator } from './tokens';
import type { ExpressionToken, OperatorSymbol } from './tokens';
import { toInt64, tokenizeExpression } from './tokenizer';
import type { SymbolTable } from './tokenizer';

/////////////////////
// Public API      //
/////////////////////

export interface EvaluateOptions {
  /**
   * Identifiers the expression may reference. Defaults to TRUE/FALSE.
   */
  symbols?: SymbolTable;

  /**
   * Reject sources longer than this many characters with E_LIMIT.
   */
  maxExpressionLength?: number;

  /**
   * Maximum nesting of parentheses, ternaries and unary operators.
   * Defaults to 256.
   */
  maxNestingDepth?: number;
}

const DEFAULT_MAX_NESTING_DEPTH = 256;

/**
 * Evaluate `source` to an integer.
 *
 * Empty or blank input evaluates to 0.
 *
 * Throws ExtractorError with:
 *  - E_SYNTAX      on malformed input or trailing tokens
 *  - E_UNRESOLVED  on identifiers missing from the symbol table
 *  - E_ARITHMETIC  on division/modulo by zero, bad shift counts, or a
 *                  result outside the safe integer range
 *  - E_LIMIT       when `maxExpressionLength` is exceeded
 */
export function evaluateExpression(
  source: string,
  options: EvaluateOptions = {},
): number {
  const value = evaluateExpressionBig(source, options);

  if (
    value > BigInt(Number.MAX_SAFE_INTEGER) ||
    value < BigInt(Number.MIN_SAFE_INTEGER)
  ) {
    throw createArithmeticError({
      message: `result ${value.toString()} is outside the safe integer range`,
      source,
      index: 0,
      length: source.length,
    });
  }

  return Number(value);
}

/**
 * Same as `evaluateExpression`, but returns the full signed 64-bit result.
 */
export function evaluateExpressionBig(
  source: string,
  options: EvaluateOptions = {},
): bigint {
  const limit = options.maxExpressionLength;
  if (typeof limit === 'number' && limit >= 0 && source.length > limit) {
    throw createLimitError({
      message: `expression is longer than ${limit} characters`,
      source,
      index: limit,
      length: source.length - limit,
    });
  }

  if (source.trim() === '') return 0n;

  const tokens = tokenizeExpression(source, options.symbols ?? DEFAULT_SYMBOLS);
  const evaluator = new DirectEvaluator(
    source,
    tokens,
    options.maxNestingDepth ?? DEFAULT_MAX_NESTING_DEPTH,
  );
  return evaluator.evaluateRoot();
}

/////////////////////
// Evaluator class //
/////////////////////

class DirectEvaluator {
  private readonly src: string;
  private readonly tokens: ExpressionToken[];
  private readonly maxDepth: number;
  private index = 0;
  private depth = 0;

  constructor(source: string, tokens: ExpressionToken[], maxDepth: number) {
    this.src = source;
    this.tokens = tokens;
    this.maxDepth = maxDepth;
  }

  evaluateRoot(): bigint {
    const value = this.parseTernary();
    const tok = this.peek();
    if (tok.kind !== 'eof') {
      throw this.unexpected(tok, 'unexpected trailing');
    }
    return value;
  }

  /////////////////////////////
  // Precedence levels       //
  /////////////////////////////

  /**
   * cond ? a : b – right associative. Both branches are evaluated; the
   * condition selects which value is returned.
   */
  private parseTernary(): bigint {
    this.enter();
    const condition = this.parseLogicalOr();

    if (this.match('?')) {
      const whenTrue = this.parseTernary();
      this.expect(':');
      const whenFalse = this.parseTernary();
      this.depth--;
      return condition !== 0n ? whenTrue : whenFalse;
    }

    this.depth--;
    return condition;
  }

  private parseLogicalOr(): bigint {
    let value = this.parseLogicalAnd();
    while (this.match('||')) {
      const right = this.parseLogicalAnd();
      value = value !== 0n || right !== 0n ? 1n : 0n;
    }
    return value;
  }

  private parseLogicalAnd(): bigint {
    let value = this.parseBitwiseOr();
    while (this.match('&&')) {
      const right = this.parseBitwiseOr();
      value = value !== 0n && right !== 0n ? 1n : 0n;
    }
    return value;
  }

  private parseBitwiseOr(): bigint {
    let value = this.parseBitwiseXor();
    while (this.match('|')) {
      value = toInt64(value | this.parseBitwiseXor());
    }
    return value;
  }

  private parseBitwiseXor(): bigint {
    let value = this.parseBitwiseAnd();
    while (this.match('^')) {
      value = toInt64(value ^ this.parseBitwiseAnd());
    }
    return value;
  }

  private parseBitwiseAnd(): bigint {
    let value = this.parseEquality();
    while (this.match('&')) {
      value = toInt64(value & this.parseEquality());
    }
    return value;
  }

  private parseEquality(): bigint {
    let value = this.parseRelational();
    for (;;) {
      if (this.match('==')) {
        value = value === this.parseRelational() ? 1n : 0n;
      } else if (this.match('!=')) {
        value = value !== this.parseRelational() ? 1n : 0n;
      } else {
        return value;
      }
    }
  }

  private parseRelational(): bigint {
    let value = this.parseShift();
    for (;;) {
      if (this.match('<')) {
        value = value < this.parseShift() ? 1n : 0n;
      } else if (this.match('>')) {
        value = value > this.parseShift() ? 1n : 0n;
      } else if (this.match('<=')) {
        value = value <= this.parseShift() ? 1n : 0n;
      } else if (this.match('>=')) {
        value = value >= this.parseShift() ? 1n : 0n;
      } else {
        return value;
      }
    }
  }

  private parseShift(): bigint {
    let value = this.parseAdditive();
    for (;;) {
      const opToken = this.peek();
      if (this.match('<<')) {
        const count = this.parseAdditive();
        this.checkShiftCount(count, opToken);
        value = toInt64(value << count);
      } else if (this.match('>>')) {
        const count = this.parseAdditive();
        this.checkShiftCount(count, opToken);
        value = toInt64(value >> count);
      } else {
        return value;
      }
    }
  }

  private parseAdditive(): bigint {
    let value = this.parseMultiplicative();
    for (;;) {
      if (this.match('+')) {
        value = toInt64(value + this.parseMultiplicative());
      } else if (this.match('-')) {
        value = toInt64(value - this.parseMultiplicative());
      } else {
        return value;
      }
    }
  }

  private parseMultiplicative(): bigint {
    let value = this.parseUnary();
    for (;;) {
      const opToken = this.peek();
      if (this.match('*')) {
        value = toInt64(value * this.parseUnary());
      } else if (this.match('/')) {
        const divisor = this.parseUnary();
        this.checkDivisor(divisor, opToken, 'division');
        // BigInt division truncates toward zero, like C.
        value = toInt64(value / divisor);
      } else if (this.match('%')) {
        const divisor = this.parseUnary();
        this.checkDivisor(divisor, opToken, 'modulo');
        value = toInt64(value % divisor);
      } else {
        return value;
      }
    }
  }

  private parseUnary(): bigint {
    this.enter();
    let value: bigint;

    if (this.match('+')) value = this.parseUnary();
    else if (this.match('-')) value = toInt64(-this.parseUnary());
    else if (this.match('!')) value = this.parseUnary() === 0n ? 1n : 0n;
    else if (this.match('~')) value = toInt64(~this.parseUnary());
    else value = this.parsePrimary();

    this.depth--;
    return value;
  }

  private parsePrimary(): bigint {
    const tok = this.peek();

    if (tok.kind === 'number') {
      this.index++;
      return tok.value;
    }

    if (this.match('(')) {
      const value = this.parseTernary();
      this.expect(')');
      return value;
    }

    throw this.unexpected(tok, 'unexpected');
  }

  /////////////////////////////
  // Helpers                 //
  /////////////////////////////

  private enter(): void {
    this.depth++;
    if (this.depth > this.maxDepth) {
      const tok = this.peek();
      throw createLimitError({
        message: `expression nests deeper than ${this.maxDepth} levels`,
        source: this.src,
        index: tok.start,
        length: 1,
      });
    }
  }

  private peek(): ExpressionToken {
    return this.tokens[Math.min(this.index, this.tokens.length - 1)];
  }

  private match(symbol: OperatorSymbol): boolean {
    if (matchesOperator(this.peek(), symbol)) {
      this.index++;
      return true;
    }
    return false;
  }

  private expect(symbol: OperatorSymbol): void {
    const tok = this.peek();
    if (!this.match(symbol)) {
      throw createSyntaxError({
        message: `expected "${symbol}" but found ${describeToken(tok)}`,
        source: this.src,
        index: tok.start,
        length: Math.max(1, tok.end - tok.start),
        fragment: this.fragmentOf(tok),
      });
    }
  }

  private unexpected(tok: ExpressionToken, prefix: string) {
    return createSyntaxError({
      message: `${prefix} ${describeToken(tok)}`,
      source: this.src,
      index: tok.start,
      length: Math.max(1, tok.end - tok.start),
      fragment: this.fragmentOf(tok),
    });
  }

  private fragmentOf(tok: ExpressionToken): string {
    // At end of input the most useful fragment is the whole expression.
    return tok.kind === 'eof' ? this.src.trim() : this.src.slice(tok.start, tok.end);
  }

  private checkDivisor(
    divisor: bigint,
    opToken: ExpressionToken,
    what: 'division' | 'modulo',
  ): void {
    if (divisor === 0n) {
      throw createArithmeticError({
        message: `${what} by zero`,
        source: this.src,
        index: opToken.start,
        length: 1,
      });
    }
  }

  private checkShiftCount(count: bigint, opToken: ExpressionToken): void {
    if (count < 0n || count >= 64n) {
      throw createArithmeticError({
        message: `shift count ${count.toString()} is outside 0..63`,
        source: this.src,
        index: opToken.start,
        length: 2,
      });
    }
  }
}
