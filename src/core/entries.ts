/**
 * initex – Indexed-entry scanner
 *
 * Finds every `[KEY] = { … }` block in preprocessed text and extracts one
 * FieldMap per key:
 *
 *   [SPECIES_BULBASAUR] =
 *   {
 *       .baseHP = 45,
 *       ...
 *   },
 *
 * Blocks may be on one line or many; whatever follows the closing brace is
 * ignored. A malformed entry is skipped and reported through `onSkip`; it
 * never aborts the scan.
 *
 * License: Apache-2.0
 */

import { extractFieldMap } from './blocks';
import type { FieldMapOptions } from './blocks';
import { findMatchingClose, indexOfOutsideStrings } from './scanner';
import type {
  ExtractionHooks,
  IndexedEntryMap,
  SkipReason,
} from './types';

/**
 * Identifier pattern for keys when none is given.
 */
export const DEFAULT_KEY_PATTERN = /[A-Za-z_][A-Za-z0-9_]*/;

export interface ScanEntriesOptions extends FieldMapOptions, ExtractionHooks {}

/**
 * Scan `text` for indexed entries.
 *
 * `keyPattern` matches the KEY between the brackets, e.g.
 * `/SPECIES_[A-Z0-9_]+/`. Flags other than `i` are ignored.
 */
export function scanIndexedEntries(
  text: string,
  keyPattern: RegExp | string = DEFAULT_KEY_PATTERN,
  options: ScanEntriesOptions = {},
): IndexedEntryMap {
  const entries: IndexedEntryMap = Object.create(null);
  const header = buildHeaderPattern(keyPattern);

  const skip = (key: string, reason: SkipReason, index: number, cause?: unknown) => {
    options.onSkip?.({ key, reason, index, cause });
  };

  let match: RegExpExecArray | null;
  while ((match = header.exec(text)) !== null) {
    const key = match[1];
    const headerIndex = match.index;
    const afterHeader = match.index + match[0].length;

    const open = indexOfOutsideStrings(text, '{', afterHeader);
    if (open === -1 || !onlyGapBetween(text, afterHeader, open, header)) {
      skip(key, 'missing-block', headerIndex);
      header.lastIndex = afterHeader;
      continue;
    }

    const close = findMatchingClose(text, open);
    if (close === -1) {
      skip(key, 'unclosed-block', headerIndex);
      header.lastIndex = afterHeader;
      continue;
    }

    header.lastIndex = close + 1;

    const interior = text.slice(open + 1, close);
    if (interior.trim() === '') {
      skip(key, 'empty-block', headerIndex);
      continue;
    }

    try {
      entries[key] = extractFieldMap(interior, options);
    } catch (err) {
      skip(key, 'invalid-block', headerIndex, err);
    }
  }

  return entries;
}

/**
 * Overlay several entry maps; for a key present in more than one, the
 * later map's FieldMap replaces the earlier one.
 */
export function mergeIndexedEntries(...maps: IndexedEntryMap[]): IndexedEntryMap {
  const merged: IndexedEntryMap = Object.create(null);
  for (const map of maps) {
    for (const [key, fields] of Object.entries(map)) {
      merged[key] = fields;
    }
  }
  return merged;
}

/////////////////////
// Helpers         //
/////////////////////

function buildHeaderPattern(keyPattern: RegExp | string): RegExp {
  const source = typeof keyPattern === 'string' ? keyPattern : keyPattern.source;
  const flags =
    typeof keyPattern !== 'string' && keyPattern.flags.includes('i') ? 'gi' : 'g';
  return new RegExp(`\\[\\s*(${source})\\s*\\]\\s*=`, flags);
}

/**
 * The text between a header and its `{` may hold anything except the end
 * of a statement or another header.
 */
function onlyGapBetween(
  text: string,
  from: number,
  to: number,
  header: RegExp,
): boolean {
  const gap = text.slice(from, to);
  if (gap.includes(';')) return false;
  const probe = new RegExp(header.source, header.flags.replace('g', ''));
  return !probe.test(gap);
}
