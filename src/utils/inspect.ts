/**
 * initex – Utils / inspect
 *
 * Helpers for logs and debug output:
 *  - formatting ExtractorErrors with their snippet;
 *  - rendering FieldMaps and entry lists as readable text;
 *  - summarizing a scanned IndexedEntryMap.
 *
 * Nothing here extracts or evaluates; these functions only render values
 * the engine already produced.
 *
 * License: Apache-2.0
 */

import { buildSnippet, computeLineAndColumn, isExtractorError } from '../core/errors';
import type { EntryTuple, FieldMap, IndexedEntryMap, SkippedEntry } from '../core/types';

/////////////////////////////
// Error formatting        //
/////////////////////////////

export interface FormattedExtractorError {
  /**
   * Single line, e.g. `[E_PARSE] unclosed brace group (entryList) at line 1, col 11`.
   */
  summary: string;

  /**
   * Summary plus snippet and hint, when available.
   */
  detail: string;

  error: unknown;
}

/**
 * Format an ExtractorError (or any thrown value) for display.
 *
 * Errors raised without a source (decoder errors) have no snippet; pass
 * the text they came from as `source` to get one.
 */
export function formatExtractorError(
  err: unknown,
  source?: string,
): FormattedExtractorError {
  if (!isExtractorError(err)) {
    const message = err instanceof Error ? err.message : String(err);
    const summary = `Error: ${message}`;
    return { summary, detail: summary, error: err };
  }

  let line = err.line;
  let column = err.column;
  let snippet = err.snippet;

  if (snippet === '' && source !== undefined) {
    const index = err.index ?? locateFragment(source, err.fragment);
    if (index !== null) {
      const built = buildSnippet(source, index, err.fragment.length || 1, err.message);
      line = built.line;
      column = built.column;
      snippet = built.snippet;
    }
  }

  if ((line === null || column === null) && source !== undefined && err.index !== null) {
    ({ line, column } = computeLineAndColumn(source, err.index));
  }

  const origin = err.decoder !== null ? ` (${err.decoder})` : '';
  const at = line !== null && column !== null ? ` at line ${line}, col ${column}` : '';
  const summary = `[${err.code}] ${err.message}${origin}${at}`;

  let detail = summary;
  if (snippet.trim() !== '') {
    detail += `\n\n${snippet}`;
  } else if (err.fragment !== '') {
    detail += `\n\nFragment: ${err.fragment}`;
  }
  if (err.note !== undefined && err.note.trim() !== '') {
    detail += `\n\nHint: ${err.note}`;
  }

  return { summary, detail, error: err };
}

/**
 * One-line description of a skipped entry, for `onSkip` loggers.
 */
export function describeSkip(skip: SkippedEntry): string {
  const cause = isExtractorError(skip.cause) ? `: ${formatExtractorError(skip.cause).summary}` : '';
  return `skipped [${skip.key}] at offset ${skip.index} (${skip.reason})${cause}`;
}

/////////////////////////////
// Value rendering         //
/////////////////////////////

export interface InspectFieldMapOptions {
  /**
   * Values longer than this are cut with "…". Default: 60.
   */
  maxValueLength?: number;
}

/**
 * Render a FieldMap one `.field = value` per line, names aligned.
 *
 *   .baseHP  = 45
 *   .types   = MON_TYPES(TYPE_GRASS, TYPE_POISON)
 */
export function inspectFieldMap(
  fields: FieldMap,
  options: InspectFieldMapOptions = {},
): string {
  const { maxValueLength = 60 } = options;
  const names = Object.keys(fields);
  const width = Math.max(0, ...names.map((n) => n.length));

  return names
    .map((name) => {
      const value = fields[name];
      const shown =
        value.length > maxValueLength ? `${value.slice(0, maxValueLength)}…` : value;
      return `.${name.padEnd(width)} = ${shown}`;
    })
    .join('\n');
}

/**
 * Render decoded entries one per line:
 *
 *   EVO_LEVEL(16) -> SPECIES_IVYSAUR [IF_TIME TIME_DAY]
 */
export function inspectEntryList(entries: readonly EntryTuple[]): string {
  return entries
    .map((entry) => {
      const conditions =
        entry.conditions.length > 0 ? ` [${entry.conditions.join('; ')}]` : '';
      return `${entry.method}(${entry.parameter}) -> ${entry.target}${conditions}`;
    })
    .join('\n');
}

export interface EntryMapSummary {
  entryCount: number;
  fieldCount: number;
  /**
   * Field name → number of entries carrying it, most common first.
   */
  fieldFrequency: Array<{ field: string; count: number }>;
}

export function summarizeEntries(entries: IndexedEntryMap): EntryMapSummary {
  const counts = new Map<string, number>();
  let fieldCount = 0;
  let entryCount = 0;

  for (const fields of Object.values(entries)) {
    entryCount++;
    for (const field of Object.keys(fields)) {
      fieldCount++;
      counts.set(field, (counts.get(field) ?? 0) + 1);
    }
  }

  const fieldFrequency = [...counts.entries()]
    .map(([field, count]) => ({ field, count }))
    .sort((a, b) => b.count - a.count || a.field.localeCompare(b.field));

  return { entryCount, fieldCount, fieldFrequency };
}

/////////////////////////////
// Helpers                 //
/////////////////////////////

function locateFragment(source: string, fragment: string): number | null {
  if (fragment === '') return null;
  const index = source.indexOf(fragment);
  return index === -1 ? null : index;
}
