/**
 * initex – Value decoders
 *
 * Small pure decoders over the raw value text stored in a FieldMap:
 *
 *   decodeString('_("Seed")')                          // 'Seed'
 *   decodeMacroArguments('MON_TYPES(TYPE_GRASS, TYPE_POISON)')
 *                                                      // ['TYPE_GRASS', 'TYPE_POISON']
 *   decodeBraceList('{ ABILITY_OVERGROW, ABILITY_NONE }')
 *                                                      // ['ABILITY_OVERGROW', 'ABILITY_NONE']
 *   decodeEntryList('EVOLUTION({EVO_LEVEL, 16, SPECIES_IVYSAUR})')
 *                                                      // [{ method: 'EVO_LEVEL', … }]
 *
 * Malformed input throws ExtractorError E_PARSE tagged with the decoder
 * name and the failing fragment.
 *
 * License: Apache-2.0
 */

import { createParseError } from './errors';
import type { DecoderName } from './errors';
import {
  findMatchingClose,
  findTopLevelGroups,
  indexOfOutsideStrings,
  isBalanced,
  splitTopLevel,
} from './scanner';
import type { EntryTuple } from './types';

export interface EntryListOptions {
  /**
   * Call names whose brace groups are flattened into `conditions`.
   * Defaults to `['CONDITIONS']`.
   */
  nestedListKeywords?: readonly string[];
}

export const DEFAULT_NESTED_LIST_KEYWORDS: readonly string[] = ['CONDITIONS'];

const CALL_PREFIX = /^([A-Za-z_][A-Za-z0-9_]*)?\s*\(/;

/////////////////////////////
// Strings                 //
/////////////////////////////

/**
 * Concatenate every string literal in `raw`, after stripping an optional
 * `IDENT(...)` or `(...)` wrapper. Text without any literal is returned
 * trimmed.
 */
export function decodeString(raw: string): string {
  let text = raw.trim();
  if (text === '') return '';

  for (let call = unwrapCall(text); call !== null; call = unwrapCall(text)) {
    text = call.inner.trim();
  }

  const literals = readStringLiterals(text);
  if (literals.length === 0) return text;
  return literals.join('');
}

function readStringLiterals(text: string): string[] {
  const out: string[] = [];
  let i = 0;

  while (i < text.length) {
    if (text[i] !== '"') {
      i++;
      continue;
    }

    const start = i;
    i++;
    let value = '';
    let closed = false;

    while (i < text.length) {
      const ch = text[i];
      if (ch === '"') {
        closed = true;
        i++;
        break;
      }
      if (ch === '\\') {
        const decoded = decodeEscape(text, i + 1);
        value += decoded.value;
        i = decoded.next;
        continue;
      }
      value += ch;
      i++;
    }

    if (!closed) {
      throw parseError('string', 'unterminated string literal', text.slice(start));
    }

    out.push(value);
  }

  return out;
}

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  n: '\n',
  t: '\t',
  r: '\r',
  a: '\x07',
  b: '\b',
  f: '\f',
  v: '\v',
  '\\': '\\',
  '"': '"',
  "'": "'",
  '?': '?',
};

/**
 * Decode the escape sequence whose first character (after the backslash)
 * is at `at`.
 */
function decodeEscape(text: string, at: number): { value: string; next: number } {
  const ch = text[at];

  if (ch === undefined) {
    return { value: '', next: at };
  }

  const simple = SIMPLE_ESCAPES[ch];
  if (simple !== undefined) {
    return { value: simple, next: at + 1 };
  }

  if (ch === 'x') {
    const hex = /^[0-9A-Fa-f]{1,2}/.exec(text.slice(at + 1));
    if (hex) {
      return {
        value: String.fromCharCode(parseInt(hex[0], 16)),
        next: at + 1 + hex[0].length,
      };
    }
  }

  const octal = /^[0-7]{1,3}/.exec(text.slice(at));
  if (octal) {
    return {
      value: String.fromCharCode(parseInt(octal[0], 8)),
      next: at + octal[0].length,
    };
  }

  // Unknown escape – keep the escaped character.
  return { value: ch, next: at + 1 };
}

/////////////////////////////
// Macro calls & lists     //
/////////////////////////////

/**
 * Arguments of a macro call, split at top-level commas. Text without
 * parentheses is its own single argument.
 */
export function decodeMacroArguments(raw: string): string[] {
  const text = raw.trim();
  if (text === '') return [];

  const open = indexOfOutsideStrings(text, '(');
  const close = lastIndexOutsideStrings(text, ')');

  if (open === -1 && close === -1) return [text];

  if (open === -1 || close === -1 || close < open) {
    throw parseError('macroArguments', 'unbalanced parentheses in macro call', text);
  }

  const inner = text.slice(open + 1, close);
  if (!isBalanced(inner)) {
    throw parseError('macroArguments', 'unbalanced delimiters in macro arguments', inner);
  }

  return splitTopLevel(inner);
}

/**
 * Items of a `{ a, b, c }` list. The outer braces are optional; they are
 * only stripped when they enclose the whole text.
 */
export function decodeBraceList(raw: string): string[] {
  let text = raw.trim();
  if (text === '') return [];

  if (text.startsWith('{') && findMatchingClose(text, 0) === text.length - 1) {
    text = text.slice(1, -1);
  }

  if (!isBalanced(text)) {
    throw parseError('braceList', 'unbalanced delimiters in brace list', text);
  }

  return splitTopLevel(text);
}

/////////////////////////////
// Entry lists             //
/////////////////////////////

/**
 * Decode a list of `{method, parameter, target, ...extra}` groups, usually
 * wrapped in a call such as `EVOLUTION(...)` or, once expanded, a compound
 * literal `(const struct Evolution[]) { ... }`. A lone `*_END` group ends
 * the list and is dropped.
 *
 * Extras that start with a nested-list keyword – `CONDITIONS({IF_A, 1},
 * {IF_B})` – contribute one condition per inner group, its parts joined
 * with single spaces. Other extras are kept verbatim.
 */
export function decodeEntryList(
  raw: string,
  options: EntryListOptions = {},
): EntryTuple[] {
  let text = raw.trim();
  if (text === '') return [];

  const literalBody = unwrapCompoundLiteral(text);
  if (literalBody !== null) {
    text = literalBody.trim();
  } else if (CALL_PREFIX.test(text)) {
    const call = unwrapCall(text);
    if (call === null) {
      throw parseError('entryList', 'unbalanced parentheses around entry list', text);
    }
    text = call.inner.trim();
  }

  if (text === '' || text === 'NULL') return [];

  const keywords = options.nestedListKeywords ?? DEFAULT_NESTED_LIST_KEYWORDS;
  const groups = readGroups(text, 'entryList').filter((group) => !isTerminatorGroup(group));

  return groups.map((group) => {
    const parts = splitTopLevel(group);
    if (parts.length < 3) {
      throw parseError(
        'entryList',
        'entry needs a method, a parameter and a target',
        `{${group}}`,
      );
    }

    const [method, parameter, target, ...extras] = parts;
    const conditions: string[] = [];

    for (const extra of extras) {
      if (startsWithKeywordCall(extra, keywords)) {
        conditions.push(...decodeNestedList(extra));
      } else {
        conditions.push(extra);
      }
    }

    return { method, parameter, target, conditions };
  });
}

/**
 * Body of an expanded compound literal such as
 * `(const struct Evolution[]) { {EVO_LEVEL, 16, SPECIES_B}, }`, or null.
 */
function unwrapCompoundLiteral(text: string): string | null {
  if (!text.startsWith('(')) return null;

  const castEnd = findMatchingClose(text, 0);
  if (castEnd === -1) return null;

  const rest = text.slice(castEnd + 1).trim();
  if (!rest.startsWith('{') || findMatchingClose(rest, 0) !== rest.length - 1) return null;

  return rest.slice(1, -1);
}

// `{EVOLUTIONS_END}` and the like close an expanded list.
function isTerminatorGroup(group: string): boolean {
  const parts = splitTopLevel(group);
  return parts.length === 1 && /^[A-Z0-9_]*_END$/.test(parts[0]);
}

function decodeNestedList(part: string): string[] {
  const call = unwrapCall(part);
  if (call === null) {
    throw parseError('entryList', 'unbalanced parentheses in nested list', part);
  }

  const conditions: string[] = [];
  for (const group of readGroups(call.inner, 'entryList')) {
    const parts = splitTopLevel(group);
    if (parts.length > 0) conditions.push(parts.join(' '));
  }
  return conditions;
}

function readGroups(text: string, decoder: DecoderName): string[] {
  const scan = findTopLevelGroups(text);

  if (scan.unclosedAt !== null) {
    throw parseError(decoder, 'unclosed brace group', text.slice(scan.unclosedAt));
  }

  const firstStray = scan.stray[0];
  if (firstStray !== undefined) {
    throw parseError(decoder, `unexpected text "${firstStray.text}" between groups`, firstStray.text);
  }

  return scan.groups;
}

function startsWithKeywordCall(part: string, keywords: readonly string[]): boolean {
  const match = CALL_PREFIX.exec(part);
  return match !== null && match[1] !== undefined && keywords.includes(match[1]);
}

/////////////////////////////
// Helpers                 //
/////////////////////////////

interface UnwrappedCall {
  callee: string | null;
  inner: string;
}

/**
 * Strip `IDENT(...)` or `(...)` when the opening parenthesis closes at the
 * very end of `text`; null otherwise.
 */
function unwrapCall(text: string): UnwrappedCall | null {
  const match = CALL_PREFIX.exec(text);
  if (match === null) return null;

  const open = match[0].length - 1;
  if (findMatchingClose(text, open) !== text.length - 1) return null;

  return { callee: match[1] ?? null, inner: text.slice(open + 1, -1) };
}

function lastIndexOutsideStrings(text: string, ch: string): number {
  let last = -1;
  let from = 0;
  for (;;) {
    const next = indexOfOutsideStrings(text, ch, from);
    if (next === -1) return last;
    last = next;
    from = next + 1;
  }
}

function parseError(decoder: DecoderName, message: string, fragment: string) {
  return createParseError({ message, decoder, fragment });
}
