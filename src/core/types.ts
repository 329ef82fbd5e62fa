/**
 * initex – Core / public types
 *
 * The data model shared by the scanners, decoders and the extractor
 * facade. Nothing in this module has runtime behavior.
 *
 *   import type { FieldMap, IndexedEntryMap, EntryTuple } from 'initex';
 *
 * License: Apache-2.0
 */

export type { ExtractorErrorCode, DecoderName } from './errors';
export type { ExpressionToken, OperatorSymbol } from './tokens';
export type { SymbolTable } from './tokenizer';

/////////////////////////////
// Records                 //
/////////////////////////////

/**
 * Field name → raw, whitespace-collapsed value text of one initializer
 * block. A field appears at most once; when the source repeats it, the
 * later assignment wins.
 *
 *   { speciesName: '_("Bulbasaur")', types: 'MON_TYPES(TYPE_GRASS, TYPE_POISON)' }
 */
export type FieldMap = Record<string, string>;

/**
 * Entry key → FieldMap, in source order.
 */
export type IndexedEntryMap = Record<string, FieldMap>;

/**
 * One decoded group of an entry list such as
 * `{EVO_LEVEL, 16, SPECIES_IVYSAUR, CONDITIONS({IF_TIME, TIME_DAY})}`.
 */
export interface EntryTuple {
  method: string;
  parameter: string;
  target: string;
  /**
   * Conditions in source order. Nested groups are joined with single
   * spaces ("IF_TIME TIME_DAY"); other trailing parts are kept verbatim.
   */
  conditions: string[];
}

/////////////////////////////
// Diagnostics             //
/////////////////////////////

export interface DiagnosticLocation {
  /**
   * 0-based character offset in the scanned text.
   */
  index: number;

  /**
   * Length of the offending span.
   */
  length?: number;
}

export type SkipReason =
  | 'missing-block'
  | 'unclosed-block'
  | 'empty-block'
  | 'invalid-block'
  | 'invalid-record';

/**
 * An indexed entry the scanner dropped. Scanning continues after it.
 */
export interface SkippedEntry {
  key: string;
  reason: SkipReason;
  /**
   * Offset of the `[KEY]` header in the scanned text.
   */
  index: number;
  /**
   * The error behind an `invalid-block` or `invalid-record` skip.
   */
  cause?: unknown;
}

export type DiagnosticCode = 'unterminated-field';

/**
 * Non-fatal observation made while extracting, e.g. a field still open at
 * the end of its block.
 */
export interface ExtractionDiagnostic {
  code: DiagnosticCode;
  message: string;
  field?: string;
  location?: DiagnosticLocation;
}

/**
 * Caller-supplied observers. The library never logs on its own.
 */
export interface ExtractionHooks {
  onSkip?(entry: SkippedEntry): void;
  onDiagnostic?(diagnostic: ExtractionDiagnostic): void;
}

/**
 * What to do with a field whose value is still open at the end of its
 * block:
 *  - "commit" keeps the partial value and reports a diagnostic;
 *  - "error" throws E_PARSE.
 */
export type UnterminatedFieldMode = 'commit' | 'error';
