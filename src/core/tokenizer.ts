/**
 * initex – Expression tokenizer
 *
 * Turns C integer-expression text into a flat token stream:
 *
 *  - "number"   – decimal, 0-prefixed octal or 0x-hex literal (C integer suffixes ignored),
 *                 or an identifier already resolved through the symbol table
 *  - "operator" – arithmetic, bitwise, logical, comparison, ?:, parentheses
 *  - "eof"      – artificial end-of-input marker
 *
 * Whitespace produces no token. A fresh Tokenizer is built per call, so
 * tokenizing is re-entrant.
 *
 * License: Apache-2.0
 */

import {
  createSyntaxError,
  createUnresolvedError,
} from './errors';
import {
  isMultiCharOperator,
  isSingleCharOperator,
} from './tokens';
import type { ExpressionToken, NumberToken } from './tokens';

/**
 * Symbol table consulted for identifiers. Values are reinterpreted as
 * signed 64-bit integers.
 */
export type SymbolTable = Readonly<Record<string, number | bigint>>;

/**
 * Tokenize `source`. The returned list always ends with a single EOF token.
 *
 * Throws:
 *  - ExtractorError E_SYNTAX on characters outside the expression grammar
 *    and malformed literals;
 *  - ExtractorError E_UNRESOLVED on identifiers missing from `symbols`.
 */
export function tokenizeExpression(
  source: string,
  symbols: SymbolTable,
): ExpressionToken[] {
  const tokenizer = new Tokenizer(source, symbols);
  const tokens: ExpressionToken[] = [];

  for (;;) {
    const tok = tokenizer.next();
    tokens.push(tok);
    if (tok.kind === 'eof') break;
  }

  return tokens;
}

/**
 * Reinterpret an integer as a two's-complement signed 64-bit value.
 */
export function toInt64(value: bigint): bigint {
  return BigInt.asIntN(64, value);
}

/////////////////////
// Implementation  //
/////////////////////

class Tokenizer {
  private readonly src: string;
  private readonly len: number;
  private readonly symbols: SymbolTable;
  private pos = 0;

  constructor(source: string, symbols: SymbolTable) {
    this.src = source;
    this.len = source.length;
    this.symbols = symbols;
  }

  next(): ExpressionToken {
    while (this.pos < this.len && isWhitespace(this.src.charCodeAt(this.pos))) {
      this.pos++;
    }

    if (this.pos >= this.len) {
      return { kind: 'eof', start: this.len, end: this.len };
    }

    const start = this.pos;
    const ch = this.src.charCodeAt(this.pos);

    if (isDigit(ch)) {
      return this.readNumberToken();
    }

    if (isIdentifierStart(ch)) {
      return this.readIdentifierToken();
    }

    const twoChars = this.src.slice(this.pos, this.pos + 2);
    if (isMultiCharOperator(twoChars)) {
      this.pos += 2;
      return { kind: 'operator', value: twoChars, start, end: start + 2 };
    }

    const singleChar = this.src[this.pos];
    if (isSingleCharOperator(singleChar)) {
      this.pos++;
      return { kind: 'operator', value: singleChar, start, end: start + 1 };
    }

    throw createSyntaxError({
      message: `unexpected character "${singleChar}" in expression`,
      source: this.src,
      index: start,
      length: 1,
    });
  }

  ///////////////////////
  // Token readers     //
  ///////////////////////

  private readNumberToken(): NumberToken {
    const start = this.pos;
    let digits: string;

    const isHex =
      this.src.charCodeAt(this.pos) === 48 /* 0 */ &&
      (this.src.charCodeAt(this.pos + 1) | 0x20) === 120; /* x or X */

    if (isHex) {
      this.pos += 2;
      const digitsStart = this.pos;
      while (this.pos < this.len && isHexDigit(this.src.charCodeAt(this.pos))) {
        this.pos++;
      }
      digits = this.src.slice(digitsStart, this.pos);
      if (digits.length === 0) {
        throw createSyntaxError({
          message: 'hexadecimal literal has no digits',
          source: this.src,
          index: start,
          length: this.pos - start,
        });
      }
      digits = `0x${digits}`;
    } else {
      while (this.pos < this.len && isDigit(this.src.charCodeAt(this.pos))) {
        this.pos++;
      }
      digits = this.src.slice(start, this.pos);

      // A leading zero makes the literal octal.
      if (digits.length > 1 && digits.startsWith('0')) {
        if (!/^[0-7]+$/.test(digits)) {
          throw createSyntaxError({
            message: `invalid digit in octal literal "${digits}"`,
            source: this.src,
            index: start,
            length: this.pos - start,
          });
        }
        digits = `0o${digits.slice(1)}`;
      }
    }

    // u, l, ul, lu, ll, ull, llu in any case
    let suffix = 0;
    while (
      this.pos < this.len &&
      suffix < 3 &&
      isIntegerSuffix(this.src.charCodeAt(this.pos))
    ) {
      this.pos++;
      suffix++;
    }

    if (this.pos < this.len && isIdentifierPart(this.src.charCodeAt(this.pos))) {
      while (this.pos < this.len && isIdentifierPart(this.src.charCodeAt(this.pos))) {
        this.pos++;
      }
      throw createSyntaxError({
        message: `malformed integer literal "${this.src.slice(start, this.pos)}"`,
        source: this.src,
        index: start,
        length: this.pos - start,
      });
    }

    return {
      kind: 'number',
      value: toInt64(BigInt(digits)),
      start,
      end: this.pos,
    };
  }

  private readIdentifierToken(): NumberToken {
    const start = this.pos;
    this.pos++;

    while (this.pos < this.len && isIdentifierPart(this.src.charCodeAt(this.pos))) {
      this.pos++;
    }

    const name = this.src.slice(start, this.pos);

    if (!Object.hasOwn(this.symbols, name)) {
      throw createUnresolvedError({
        message: `unknown identifier "${name}" in expression`,
        source: this.src,
        index: start,
        length: name.length,
        note: `known symbols: ${Object.keys(this.symbols).join(', ')}`,
      });
    }

    return {
      kind: 'number',
      value: toInt64(BigInt(this.symbols[name])),
      start,
      end: this.pos,
    };
  }
}

////////////////////////////
// Character classification
////////////////////////////

function isWhitespace(ch: number): boolean {
  return (
    ch === 32 || // space
    ch === 9 || // tab
    ch === 10 || // \n
    ch === 13 || // \r
    ch === 11 || // \v
    ch === 12 // \f
  );
}

function isDigit(ch: number): boolean {
  return ch >= 48 && ch <= 57;
}

function isHexDigit(ch: number): boolean {
  return (
    isDigit(ch) ||
    (ch >= 65 && ch <= 70) || // A-F
    (ch >= 97 && ch <= 102) // a-f
  );
}

function isIntegerSuffix(ch: number): boolean {
  return ch === 117 || ch === 85 || ch === 108 || ch === 76; // u U l L
}

function isIdentifierStart(ch: number): boolean {
  return (
    (ch >= 65 && ch <= 90) || // A-Z
    (ch >= 97 && ch <= 122) || // a-z
    ch === 95 // _
  );
}

function isIdentifierPart(ch: number): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}
