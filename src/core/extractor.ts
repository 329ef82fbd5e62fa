/**
 * initex – Extractor facade
 *
 * `createExtractor` bundles the scanners, the evaluator and the decoders
 * behind one configured object, so callers set the symbol table, key
 * pattern, limits and hooks once:
 *
 *   const extractor = createExtractor({
 *     keyPattern: /SPECIES_[A-Z0-9_]+/,
 *     onSkip: (skip) => console.warn(`skipped ${skip.key}: ${skip.reason}`),
 *   }).withSymbol('P_UPDATED_STATS', 1);
 *
 *   const entries = extractor.scanEntries(preprocessedText);
 *   const hp = extractor.evaluate(entries.SPECIES_BULBASAUR.baseHP);
 *
 * Extractors are immutable: `withSymbol` returns a new instance.
 *
 * License: Apache-2.0
 */

import { extractFieldMap } from './blocks';
import {
  decodeBraceList,
  decodeEntryList,
  decodeMacroArguments,
  decodeString,
  DEFAULT_NESTED_LIST_KEYWORDS,
} from './decoders';
import { DEFAULT_KEY_PATTERN, scanIndexedEntries } from './entries';
import { createLimitError } from './errors';
import { evaluateExpression } from './evaluator';
import { splitTopLevel } from './scanner';
import { DEFAULT_SYMBOLS } from './tokens';
import type { SymbolTable } from './tokenizer';
import type {
  EntryTuple,
  ExtractionHooks,
  FieldMap,
  IndexedEntryMap,
  UnterminatedFieldMode,
} from './types';
import { assembleSpeciesRecord } from '../records/species';
import type { SpeciesRecord } from '../records/species';
import { scanLevelUpLearnsets, scanMoveArrays } from '../sources/learnsets';
import type { LevelUpMove } from '../sources/learnsets';

//////////////////////
// Public interfaces //
//////////////////////

export interface ExtractorOptions extends ExtractionHooks {
  /**
   * Extra identifiers for the expression evaluator. Merged over the
   * defaults (TRUE = 1, FALSE = 0).
   */
  symbols?: SymbolTable;

  /**
   * Pattern the KEY of `[KEY] =` headers must match.
   */
  keyPattern?: RegExp | string;

  /**
   * Call names whose groups become entry-list conditions.
   */
  nestedListKeywords?: readonly string[];

  /**
   * Handling of a field still open at the end of its block.
   * Defaults to "commit".
   */
  unterminatedFields?: UnterminatedFieldMode;

  /**
   * Reject expressions longer than this with E_LIMIT.
   */
  maxExpressionLength?: number;

  /**
   * Reject any input text longer than this with E_LIMIT.
   */
  maxInputLength?: number;
}

/**
 * Extractor options with defaults applied.
 */
export interface NormalizedExtractorOptions extends ExtractionHooks {
  symbols: SymbolTable;
  keyPattern: RegExp | string;
  nestedListKeywords: readonly string[];
  unterminatedFields: UnterminatedFieldMode;
  maxExpressionLength?: number;
  maxInputLength?: number;
}

export interface ScanSpeciesOptions {
  /**
   * Defaults to `SPECIES_[A-Z0-9_]+`.
   */
  keyPattern?: RegExp | string;

  /**
   * Key → family guard, from `scanFamilyGuards`.
   */
  familyGuards?: Readonly<Record<string, string>>;
}

export interface Extractor {
  readonly options: NormalizedExtractorOptions;

  /**
   * Return a new extractor whose evaluator also resolves `name`.
   * An existing symbol of the same name is replaced.
   */
  withSymbol(name: string, value: number | bigint): Extractor;

  evaluate(source: string): number;
  splitTopLevel(text: string): string[];
  extractFieldMap(interior: string): FieldMap;
  scanEntries(text: string): IndexedEntryMap;

  decodeString(raw: string): string;
  decodeMacroArguments(raw: string): string[];
  decodeBraceList(raw: string): string[];
  decodeEntryList(raw: string): EntryTuple[];

  scanLevelUpLearnsets(text: string): Record<string, LevelUpMove[]>;
  scanMoveArrays(text: string): Record<string, string[]>;

  assembleSpecies(
    key: string,
    fields: FieldMap,
    familyGuards?: Readonly<Record<string, string>>,
  ): SpeciesRecord;

  /**
   * Scan species entries and assemble each one. A record that fails to
   * assemble is reported through `onSkip` as `invalid-record` and left out.
   */
  scanSpecies(text: string, options?: ScanSpeciesOptions): Record<string, SpeciesRecord>;
}

//////////////////////////////
// Default options & helpers //
//////////////////////////////

export const SPECIES_KEY_PATTERN = /SPECIES_[A-Z0-9_]+/;

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Offset of the last `[key] =` header; repeated keys keep the later block.
 */
function lastHeaderIndex(text: string, key: string): number {
  const escaped = key.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  const header = new RegExp(`\\[\\s*${escaped}\\s*\\]\\s*=`, 'g');
  let index = -1;
  for (const match of text.matchAll(header)) index = match.index ?? index;
  return index;
}

function normalizeOptions(opts: ExtractorOptions = {}): NormalizedExtractorOptions {
  return {
    symbols: { ...DEFAULT_SYMBOLS, ...opts.symbols },
    keyPattern: opts.keyPattern ?? DEFAULT_KEY_PATTERN,
    nestedListKeywords: [...(opts.nestedListKeywords ?? DEFAULT_NESTED_LIST_KEYWORDS)],
    unterminatedFields: opts.unterminatedFields === 'error' ? 'error' : 'commit',
    maxExpressionLength: nonNegative(opts.maxExpressionLength),
    maxInputLength: nonNegative(opts.maxInputLength),
    onSkip: opts.onSkip,
    onDiagnostic: opts.onDiagnostic,
  };
}

function nonNegative(value: number | undefined): number | undefined {
  return typeof value === 'number' && value >= 0 ? value : undefined;
}

///////////////////////////////
// Extractor implementation  //
///////////////////////////////

class ExtractorImpl implements Extractor {
  public readonly options: NormalizedExtractorOptions;

  constructor(options: NormalizedExtractorOptions) {
    this.options = options;
  }

  withSymbol(name: string, value: number | bigint): Extractor {
    if (typeof name !== 'string' || !IDENTIFIER.test(name)) {
      throw new Error(`initex: symbol name must be a C identifier, got "${String(name)}".`);
    }
    if (typeof value === 'number' && !Number.isSafeInteger(value)) {
      throw new Error(`initex: symbol "${name}" must be an integer, got ${value}.`);
    }
    if (typeof value !== 'number' && typeof value !== 'bigint') {
      throw new Error(`initex: symbol "${name}" must be a number or bigint.`);
    }

    return new ExtractorImpl({
      ...this.options,
      symbols: { ...this.options.symbols, [name]: value },
    });
  }

  evaluate(source: string): number {
    this.checkInput(source);
    return evaluateExpression(source, this.evaluateOptions());
  }

  splitTopLevel(text: string): string[] {
    this.checkInput(text);
    return splitTopLevel(text);
  }

  extractFieldMap(interior: string): FieldMap {
    this.checkInput(interior);
    return extractFieldMap(interior, {
      unterminatedFields: this.options.unterminatedFields,
      onDiagnostic: this.options.onDiagnostic,
    });
  }

  scanEntries(text: string): IndexedEntryMap {
    return this.scanWith(text, this.options.keyPattern);
  }

  decodeString(raw: string): string {
    this.checkInput(raw);
    return decodeString(raw);
  }

  decodeMacroArguments(raw: string): string[] {
    this.checkInput(raw);
    return decodeMacroArguments(raw);
  }

  decodeBraceList(raw: string): string[] {
    this.checkInput(raw);
    return decodeBraceList(raw);
  }

  decodeEntryList(raw: string): EntryTuple[] {
    this.checkInput(raw);
    return decodeEntryList(raw, { nestedListKeywords: this.options.nestedListKeywords });
  }

  scanLevelUpLearnsets(text: string): Record<string, LevelUpMove[]> {
    this.checkInput(text);
    return scanLevelUpLearnsets(text, {
      ...this.evaluateOptions(),
      onSkip: this.options.onSkip,
    });
  }

  scanMoveArrays(text: string): Record<string, string[]> {
    this.checkInput(text);
    return scanMoveArrays(text, { onSkip: this.options.onSkip });
  }

  assembleSpecies(
    key: string,
    fields: FieldMap,
    familyGuards?: Readonly<Record<string, string>>,
  ): SpeciesRecord {
    return assembleSpeciesRecord(key, fields, {
      ...this.evaluateOptions(),
      nestedListKeywords: this.options.nestedListKeywords,
      familyGuards,
    });
  }

  scanSpecies(text: string, options: ScanSpeciesOptions = {}): Record<string, SpeciesRecord> {
    const entries = this.scanWith(text, options.keyPattern ?? SPECIES_KEY_PATTERN);
    const records: Record<string, SpeciesRecord> = Object.create(null);

    for (const [key, fields] of Object.entries(entries)) {
      try {
        records[key] = this.assembleSpecies(key, fields, options.familyGuards);
      } catch (err) {
        this.options.onSkip?.({
          key,
          reason: 'invalid-record',
          index: lastHeaderIndex(text, key),
          cause: err,
        });
      }
    }

    return records;
  }

  /////////////////////
  // Internals       //
  /////////////////////

  private scanWith(text: string, keyPattern: RegExp | string): IndexedEntryMap {
    this.checkInput(text);
    return scanIndexedEntries(text, keyPattern, {
      unterminatedFields: this.options.unterminatedFields,
      onSkip: this.options.onSkip,
      onDiagnostic: this.options.onDiagnostic,
    });
  }

  private evaluateOptions() {
    return {
      symbols: this.options.symbols,
      maxExpressionLength: this.options.maxExpressionLength,
    };
  }

  private checkInput(text: string): void {
    if (typeof text !== 'string') {
      throw new Error('initex: input must be a string.');
    }

    const limit = this.options.maxInputLength;
    if (limit !== undefined && text.length > limit) {
      throw createLimitError({
        message: `input is longer than ${limit} characters`,
        index: limit,
        fragment: text.slice(limit, limit + 20),
      });
    }
  }
}

////////////////////////
// Public entry point //
////////////////////////

/**
 * Create a configured extractor.
 *
 * ```ts
 * import { createExtractor } from 'initex';
 *
 * const extractor = createExtractor({ unterminatedFields: 'error' });
 * extractor.decodeEntryList('EVOLUTION({EVO_LEVEL, 16, SPECIES_IVYSAUR})');
 * // [{ method: 'EVO_LEVEL', parameter: '16', target: 'SPECIES_IVYSAUR', conditions: [] }]
 * ```
 */
export function createExtractor(options?: ExtractorOptions): Extractor {
  return new ExtractorImpl(normalizeOptions(options));
}
