/**
 * initex – Public entry point
 *
 * This file defines the public API surface of initex:
 *  - the free functions of the engine (evaluator, splitter, block and
 *    entry scanners, value decoders) and their formatters;
 *  - the configured facade (`createExtractor`);
 *  - header and learnset scanners and the species record assembler;
 *  - validation / inspection utilities;
 *  - the Node HTTP middleware.
 *
 * Typical usage:
 *
 *   import { createExtractor, describeSkip } from 'initex';
 *
 *   const extractor = createExtractor({
 *     keyPattern: /SPECIES_[A-Z0-9_]+/,
 *     onSkip: (skip) => console.warn(describeSkip(skip)),
 *   });
 *
 *   const entries = extractor.scanEntries(preprocessedText);
 *   const types = extractor.decodeMacroArguments(entries.SPECIES_BULBASAUR.types);
 *
 * License: Apache-2.0
 */

/////////////////////////////
// Core engine             //
/////////////////////////////

export { evaluateExpression, evaluateExpressionBig } from './core/evaluator';
export type { EvaluateOptions } from './core/evaluator';

export { tokenizeExpression } from './core/tokenizer';
export { DEFAULT_SYMBOLS } from './core/tokens';

export {
  scanDepths,
  isBalanced,
  splitTopLevel,
  findMatchingClose,
  findTopLevelGroups,
  collapseWhitespace,
} from './core/scanner';
export type { Depths, GroupScan } from './core/scanner';

export { extractFieldMap } from './core/blocks';
export type { FieldMapOptions } from './core/blocks';

export {
  scanIndexedEntries,
  mergeIndexedEntries,
  DEFAULT_KEY_PATTERN,
} from './core/entries';
export type { ScanEntriesOptions } from './core/entries';

export {
  decodeString,
  decodeMacroArguments,
  decodeBraceList,
  decodeEntryList,
  DEFAULT_NESTED_LIST_KEYWORDS,
} from './core/decoders';
export type { EntryListOptions } from './core/decoders';

export {
  formatString,
  formatMacroArguments,
  formatBraceList,
  formatEntryList,
} from './core/format';

/////////////////////////////
// Extractor facade        //
/////////////////////////////

export { createExtractor, SPECIES_KEY_PATTERN } from './core/extractor';
export type {
  Extractor,
  ExtractorOptions,
  NormalizedExtractorOptions,
  ScanSpeciesOptions,
} from './core/extractor';

/////////////////////////////
// Types & errors          //
/////////////////////////////

export type {
  FieldMap,
  IndexedEntryMap,
  EntryTuple,
  DiagnosticLocation,
  SkipReason,
  SkippedEntry,
  DiagnosticCode,
  ExtractionDiagnostic,
  ExtractionHooks,
  UnterminatedFieldMode,
  ExtractorErrorCode,
  DecoderName,
  ExpressionToken,
  OperatorSymbol,
  SymbolTable,
} from './core/types';

export {
  ExtractorError,
  isExtractorError,
  createSyntaxError,
  createArithmeticError,
  createParseError,
  createUnresolvedError,
  createLimitError,
} from './core/errors';
export type { ExtractorErrorOptions } from './core/errors';

/////////////////////////////
// Sources & records       //
/////////////////////////////

export { scanDefineConstants, scanEnumConstants, scanFamilyGuards } from './sources/headers';

export { scanLevelUpLearnsets, scanMoveArrays } from './sources/learnsets';
export type { LevelUpMove, LearnsetScanOptions } from './sources/learnsets';

export { assembleSpeciesRecord } from './records/species';
export type {
  SpeciesRecord,
  BaseStats,
  StatName,
  EvYield,
  LearnsetKeys,
  AssembleOptions,
} from './records/species';

/////////////////////////////
// Utilities               //
/////////////////////////////

export {
  formatExtractorError,
  describeSkip,
  inspectFieldMap,
  inspectEntryList,
  summarizeEntries,
} from './utils/inspect';
export type {
  FormattedExtractorError,
  InspectFieldMapOptions,
  EntryMapSummary,
} from './utils/inspect';

export {
  validateFieldMap,
  validateIndexedEntries,
  validateExpression,
} from './utils/validation';
export type {
  IssueSeverity,
  ValidationIssue,
  FieldMapValidationOptions,
  FieldMapValidationResult,
  ExpressionValidationResult,
} from './utils/validation';

/////////////////////////////
// Node integration        //
/////////////////////////////

export {
  createExtractionMiddleware,
  EXTRACTION_OPERATIONS,
} from './integrations/node/extractionMiddleware';
export type {
  ExtractionOperation,
  ExtractionRequestPayload,
  ExtractionResponse,
  ExtractionMiddlewareOptions,
  ExtractionHandler,
  MiddlewareRequest,
  MiddlewareResponse,
  MiddlewareNext,
  WireSkippedEntry,
} from './integrations/node/extractionMiddleware';
