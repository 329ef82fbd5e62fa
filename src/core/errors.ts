/**
 * initex – Error types & helpers
 *
 * This module defines the single error type (`ExtractorError`) thrown by
 * the scanner, the expression evaluator and the value decoders, plus the
 * factories used to build it consistently.
 *
 * Error codes map onto the failure kinds of the engine:
 *
 *   E_SYNTAX      malformed or unsupported token stream in an expression
 *   E_ARITHMETIC  division / modulo by zero, bad shift, overflow
 *   E_PARSE       unbalanced delimiters or missing segments in a decoder
 *   E_UNRESOLVED  expression references a name outside the symbol table
 *   E_LIMIT       input longer than a configured limit
 *
 * Common usage:
 *
 *   throw createParseError({
 *     message: 'unbalanced braces in brace list',
 *     decoder: 'braceList',
 *     source: raw,
 *     index: 0,
 *   });
 *
 * License: Apache-2.0
 */

//////////////////////
// Error code enum  //
//////////////////////

export type ExtractorErrorCode =
  | 'E_SYNTAX'
  | 'E_ARITHMETIC'
  | 'E_PARSE'
  | 'E_UNRESOLVED'
  | 'E_LIMIT';

/**
 * Names of the value decoders, used to tag `E_PARSE` errors.
 */
export type DecoderName =
  | 'string'
  | 'macroArguments'
  | 'braceList'
  | 'entryList'
  | 'fieldMap';

/**
 * Options used when constructing an ExtractorError.
 */
export interface ExtractorErrorOptions {
  code: ExtractorErrorCode;

  /**
   * Short, single-line message.
   */
  message: string;

  /**
   * The full text the failing operation was given.
   */
  source?: string;

  /**
   * 0-based offset in `source` where the problem starts.
   */
  index?: number;

  /**
   * Length of the offending span. Defaults to 1.
   */
  length?: number;

  /**
   * The offending substring. Derived from `source`/`index`/`length` when
   * omitted.
   */
  fragment?: string;

  /**
   * Decoder that raised the error (decoder errors only).
   */
  decoder?: DecoderName;

  /**
   * Hint appended in some UIs, e.g. "known symbols: TRUE, FALSE".
   */
  note?: string;

  cause?: unknown;
}

/**
 * Error thrown by every fallible operation of the engine.
 *
 * On top of `Error` it carries:
 *  - `code`     – ExtractorErrorCode
 *  - `fragment` – the substring that failed
 *  - `decoder`  – which decoder failed (E_PARSE from decoders)
 *  - `index`, `line`, `column` – position in the source, when known
 *  - `snippet`  – the source line with a caret under the fragment
 */
export class ExtractorError extends Error {
  public readonly name = 'ExtractorError';
  public readonly code: ExtractorErrorCode;
  public readonly fragment: string;
  public readonly decoder: DecoderName | null;

  /** 0-based offset in the source (if known). */
  public readonly index: number | null;

  /** 1-based line number (if known). */
  public readonly line: number | null;

  /** 1-based column number (if known). */
  public readonly column: number | null;

  /**
   * The offending line and a caret line, e.g.:
   *
   *   1 + * 2
   *       ^ --- unexpected operator "*"
   */
  public readonly snippet: string;

  public readonly note?: string;

  constructor(opts: ExtractorErrorOptions) {
    super(opts.message, opts.cause === undefined ? undefined : { cause: opts.cause });

    Object.setPrototypeOf(this, new.target.prototype);

    this.code = opts.code;
    this.decoder = opts.decoder ?? null;
    this.note = opts.note;

    const index =
      typeof opts.index === 'number' && opts.index >= 0 ? opts.index : null;
    const length = Math.max(1, opts.length ?? 1);

    let line: number | null = null;
    let column: number | null = null;
    let snippet = '';
    let fragment = opts.fragment ?? '';

    if (opts.source !== undefined && index !== null) {
      const snip = buildSnippet(opts.source, index, length, opts.message);
      line = snip.line;
      column = snip.column;
      snippet = snip.snippet;
      if (opts.fragment === undefined) {
        fragment = opts.source.slice(index, index + length);
      }
    } else if (opts.fragment === undefined && opts.source !== undefined) {
      fragment = opts.source;
    }

    this.index = index;
    this.line = line;
    this.column = column;
    this.snippet = snippet;
    this.fragment = fragment;
  }
}

export function isExtractorError(err: unknown): err is ExtractorError {
  return err instanceof ExtractorError;
}

/////////////////////////////
// Public factory helpers  //
/////////////////////////////

type FactoryOptions = Omit<ExtractorErrorOptions, 'code'>;

export function createSyntaxError(opts: FactoryOptions): ExtractorError {
  return new ExtractorError({ ...opts, code: 'E_SYNTAX' });
}

export function createArithmeticError(opts: FactoryOptions): ExtractorError {
  return new ExtractorError({ ...opts, code: 'E_ARITHMETIC' });
}

/**
 * Create a decoder / structure error. `decoder` should always be set when
 * raised from a value decoder.
 */
export function createParseError(opts: FactoryOptions): ExtractorError {
  return new ExtractorError({ ...opts, code: 'E_PARSE' });
}

export function createUnresolvedError(opts: FactoryOptions): ExtractorError {
  return new ExtractorError({ ...opts, code: 'E_UNRESOLVED' });
}

export function createLimitError(opts: FactoryOptions): ExtractorError {
  return new ExtractorError({ ...opts, code: 'E_LIMIT' });
}

/////////////////////////////
// Snippet & position util //
/////////////////////////////

interface SnippetInfo {
  line: number;
  column: number;
  snippet: string;
}

/**
 * Compute the 1-based line and column of `index` in `source`.
 * CRLF counts as a single line break.
 */
export function computeLineAndColumn(
  source: string,
  index: number,
): { line: number; column: number } {
  index = clamp(index, 0, source.length);

  let line = 1;
  let lastLineStart = 0;

  for (let i = 0; i < source.length && i < index; i++) {
    const ch = source.charCodeAt(i);
    if (ch === 10 /* \n */) {
      line++;
      lastLineStart = i + 1;
    } else if (ch === 13 /* \r */) {
      line++;
      if (i + 1 < source.length && source.charCodeAt(i + 1) === 10) {
        i++;
      }
      lastLineStart = i + 1;
    }
  }

  return { line, column: index - lastLineStart + 1 };
}

/**
 * Render the line containing `index` followed by a caret line:
 *
 *   .types = MON_TYPES(TYPE_FIRE,
 *                     ^ --- unbalanced parentheses in macro call
 */
export function buildSnippet(
  source: string,
  index: number,
  length: number,
  messageForArrow: string,
): SnippetInfo {
  const { line, column } = computeLineAndColumn(source, index);
  const lines = source.split(/\r\n|\r|\n/);
  const errorLine = lines[line - 1] ?? '';

  const startCol = clamp(column, 1, Math.max(errorLine.length, 1));
  const caretLength = Math.max(
    1,
    Math.min(length, errorLine.length - startCol + 1),
  );

  const arrowMessage =
    messageForArrow.trim().length > 0 ? ` --- ${messageForArrow}` : '';
  const caretLine = `${' '.repeat(startCol - 1)}${'^'.repeat(caretLength)}${arrowMessage}`;

  return { line, column, snippet: `${errorLine}\n${caretLine}` };
}

function clamp(n: number, min: number, max: number): number {
  if (Number.isNaN(n)) return min;
  if (n < min) return min;
  if (n > max) return max;
  return n;
}
