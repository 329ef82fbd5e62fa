/**
 * initex – Expression token definitions
 *
 * Canonical token shapes and operator sets for the integer expression
 * evaluator. Tokens never outlive a single `evaluateExpression` call; they
 * are exported for tests and tooling that want to inspect a token stream.
 *
 * License: Apache-2.0
 */

/////////////////////
// Operator sets   //
/////////////////////

/**
 * Two-character operators, matched before single-character ones.
 */
export const MULTI_CHAR_OPERATORS = [
  '==',
  '!=',
  '<=',
  '>=',
  '<<',
  '>>',
  '&&',
  '||',
] as const;

export const SINGLE_CHAR_OPERATORS = [
  '+',
  '-',
  '*',
  '/',
  '%',
  '&',
  '|',
  '^',
  '~',
  '!',
  '?',
  ':',
  '(',
  ')',
  '<',
  '>',
] as const;

export type MultiCharOperator = (typeof MULTI_CHAR_OPERATORS)[number];
export type SingleCharOperator = (typeof SINGLE_CHAR_OPERATORS)[number];
export type OperatorSymbol = MultiCharOperator | SingleCharOperator;

/**
 * Identifiers every symbol table starts with.
 */
export const DEFAULT_SYMBOLS: Readonly<Record<string, number>> = {
  TRUE: 1,
  FALSE: 0,
};

/////////////////////
// Token shapes    //
/////////////////////

export interface NumberToken {
  kind: 'number';
  value: bigint;
  /** 0-based start offset (inclusive). */
  start: number;
  /** 0-based end offset (exclusive). */
  end: number;
}

export interface OperatorToken {
  kind: 'operator';
  value: OperatorSymbol;
  start: number;
  end: number;
}

export interface EofToken {
  kind: 'eof';
  start: number;
  end: number;
}

export type ExpressionToken = NumberToken | OperatorToken | EofToken;

//////////////////////////////
// Type guards & utilities  //
//////////////////////////////

const MULTI_CHAR_SET: ReadonlySet<string> = new Set(MULTI_CHAR_OPERATORS);
const SINGLE_CHAR_SET: ReadonlySet<string> = new Set(SINGLE_CHAR_OPERATORS);

export function isMultiCharOperator(op: string): op is MultiCharOperator {
  return MULTI_CHAR_SET.has(op);
}

export function isSingleCharOperator(op: string): op is SingleCharOperator {
  return SINGLE_CHAR_SET.has(op);
}

/**
 * True when `token` is an operator and, if symbols are given, one of them.
 */
export function matchesOperator(
  token: ExpressionToken,
  ...symbols: OperatorSymbol[]
): boolean {
  if (token.kind !== 'operator') return false;
  return symbols.length === 0 || symbols.includes(token.value);
}

/**
 * Printable form of a token, used in error messages.
 */
export function describeToken(token: ExpressionToken): string {
  switch (token.kind) {
    case 'number':
      return `number ${token.value.toString()}`;
    case 'operator':
      return `operator "${token.value}"`;
    case 'eof':
      return 'end of input';
  }
}
