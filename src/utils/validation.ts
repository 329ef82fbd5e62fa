/**
 * initex – Utils / validation
 *
 * Checks on extracted data beyond what the scanners enforce:
 *  - a FieldMap against the set of fields a record is expected to carry;
 *  - numeric fields that must evaluate;
 *  - single expressions, reporting failures as issues instead of throwing.
 *
 * Validation never throws for bad data; every problem becomes an issue.
 *
 * License: Apache-2.0
 */

import { isExtractorError } from '../core/errors';
import type { ExtractorError } from '../core/errors';
import { createExtractor } from '../core/extractor';
import type { Extractor, ExtractorOptions } from '../core/extractor';
import { isBalanced } from '../core/scanner';
import type { DiagnosticLocation, FieldMap, IndexedEntryMap } from '../core/types';

/////////////////////////////
// Public types            //
/////////////////////////////

export type IssueSeverity = 'error' | 'warning' | 'info';

export interface ValidationIssue {
  /**
   * Machine-readable code, e.g. "VAL_MISSING_FIELD".
   */
  code: string;

  message: string;

  severity: IssueSeverity;

  /**
   * Field the issue is about, when there is one.
   */
  field?: string;

  /**
   * Hint or suggestion.
   */
  note?: string;

  location?: DiagnosticLocation;
}

export interface FieldMapValidationOptions {
  /**
   * Fields that must be present. Missing ones are errors.
   */
  requiredFields?: readonly string[];

  /**
   * Fields that may be present. When set, any other field produces a
   * VAL_UNKNOWN_FIELD warning.
   */
  knownFields?: readonly string[];

  /**
   * Fields whose value must evaluate as an integer expression.
   */
  numericFields?: readonly string[];

  /**
   * Extractor used to evaluate `numericFields`. Defaults to
   * `createExtractor(extractorOptions)`.
   */
  extractor?: Extractor;

  extractorOptions?: ExtractorOptions;
}

export interface FieldMapValidationResult {
  /**
   * `issues.every(i => i.severity !== 'error')`.
   */
  ok: boolean;
  issues: ValidationIssue[];
  stats: {
    fieldCount: number;
    missingCount: number;
    unknownCount: number;
  };
}

/////////////////////////////
// FieldMap validation     //
/////////////////////////////

/**
 * Validate one FieldMap.
 *
 *   validateFieldMap(entries.SPECIES_BULBASAUR, {
 *     requiredFields: ['baseHP', 'types'],
 *     numericFields: ['baseHP', 'catchRate'],
 *   });
 */
export function validateFieldMap(
  fields: FieldMap,
  options: FieldMapValidationOptions = {},
): FieldMapValidationResult {
  const issues: ValidationIssue[] = [];
  const names = Object.keys(fields);

  let missingCount = 0;
  for (const field of options.requiredFields ?? []) {
    if (Object.hasOwn(fields, field)) continue;
    missingCount++;
    issues.push({
      code: 'VAL_MISSING_FIELD',
      severity: 'error',
      field,
      message: `required field "${field}" is missing`,
    });
  }

  let unknownCount = 0;
  if (options.knownFields !== undefined) {
    const known = new Set([...options.knownFields, ...(options.requiredFields ?? [])]);
    for (const field of names) {
      if (known.has(field)) continue;
      unknownCount++;
      issues.push({
        code: 'VAL_UNKNOWN_FIELD',
        severity: 'warning',
        field,
        message: `field "${field}" is not expected here`,
      });
    }
  }

  for (const field of names) {
    const value = fields[field];
    if (value.trim() === '') {
      issues.push({
        code: 'VAL_EMPTY_VALUE',
        severity: 'warning',
        field,
        message: `field "${field}" has an empty value`,
      });
    } else if (!isBalanced(value)) {
      issues.push({
        code: 'VAL_UNBALANCED_VALUE',
        severity: 'error',
        field,
        message: `field "${field}" has unbalanced delimiters`,
        note: 'the block may be truncated or a closing ")" or "}" is missing',
      });
    }
  }

  const numericFields = options.numericFields ?? [];
  if (numericFields.length > 0) {
    const extractor = options.extractor ?? createExtractor(options.extractorOptions);
    for (const field of numericFields) {
      if (!Object.hasOwn(fields, field)) continue;
      const issue = expressionIssue(extractor, fields[field], 'VAL_NOT_NUMERIC');
      if (issue !== null) issues.push({ ...issue, field });
    }
  }

  return {
    ok: issues.every((i) => i.severity !== 'error'),
    issues,
    stats: { fieldCount: names.length, missingCount, unknownCount },
  };
}

/**
 * Validate every FieldMap of an IndexedEntryMap; keys with no issue are
 * left out of the result.
 */
export function validateIndexedEntries(
  entries: IndexedEntryMap,
  options: FieldMapValidationOptions = {},
): Record<string, FieldMapValidationResult> {
  const extractor = options.extractor ?? createExtractor(options.extractorOptions);
  const results: Record<string, FieldMapValidationResult> = Object.create(null);

  for (const [key, fields] of Object.entries(entries)) {
    const result = validateFieldMap(fields, { ...options, extractor });
    if (result.issues.length > 0) results[key] = result;
  }

  return results;
}

/////////////////////////////
// Expression validation   //
/////////////////////////////

export interface ExpressionValidationResult {
  ok: boolean;
  issues: ValidationIssue[];
  /**
   * Present when the expression evaluated.
   */
  value?: number;
}

/**
 * Evaluate `source` and report a failure as an issue. Errors that are not
 * ExtractorErrors are rethrown.
 */
export function validateExpression(
  source: string,
  extractorOrOptions?: Extractor | ExtractorOptions,
): ExpressionValidationResult {
  const extractor = isExtractor(extractorOrOptions)
    ? extractorOrOptions
    : createExtractor(extractorOrOptions);

  try {
    return { ok: true, issues: [], value: extractor.evaluate(source) };
  } catch (err) {
    if (!isExtractorError(err)) throw err;
    return { ok: false, issues: [issueFromError(err, err.code)] };
  }
}

/////////////////////////////
// Helpers                 //
/////////////////////////////

function isExtractor(value: Extractor | ExtractorOptions | undefined): value is Extractor {
  return value !== undefined && 'evaluate' in value && typeof value.evaluate === 'function';
}

function expressionIssue(
  extractor: Extractor,
  source: string,
  code: string,
): ValidationIssue | null {
  try {
    extractor.evaluate(source);
    return null;
  } catch (err) {
    if (!isExtractorError(err)) throw err;
    return issueFromError(err, code);
  }
}

function issueFromError(err: ExtractorError, code: string): ValidationIssue {
  return {
    code,
    severity: 'error',
    message: err.message,
    note: err.note,
    location: err.index !== null ? { index: err.index, length: err.fragment.length || 1 } : undefined,
  };
}
