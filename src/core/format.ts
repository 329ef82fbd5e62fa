/**
 * initex – Formatters
 *
 * The inverse of the value decoders: render decoded values back into
 * initializer text. Decoding the output again yields the same values:
 *
 *   decodeBraceList(formatBraceList(['A', 'B']))         // ['A', 'B']
 *   decodeEntryList(formatEntryList(decodeEntryList(x))) // decodeEntryList(x)
 *
 * License: Apache-2.0
 */

import type { EntryTuple } from './types';

const ESCAPES: Readonly<Record<string, string>> = {
  '\\': '\\\\',
  '"': '\\"',
  '\n': '\\n',
  '\t': '\\t',
  '\r': '\\r',
};

/**
 * Quote `value` as a single C string literal, optionally wrapped in a call
 * such as `_()` or `COMPOUND_STRING()`.
 */
export function formatString(value: string, wrapper?: string): string {
  let literal = '"';
  for (const ch of value) {
    const escape = ESCAPES[ch];
    if (escape !== undefined) {
      literal += escape;
      continue;
    }
    const code = ch.charCodeAt(0);
    // Octal, so a following digit cannot extend the escape.
    literal += code < 0x20 || code === 0x7f ? `\\${code.toString(8).padStart(3, '0')}` : ch;
  }
  literal += '"';

  return wrapper === undefined ? literal : `${wrapper}(${literal})`;
}

export function formatMacroArguments(name: string, args: readonly string[]): string {
  return `${name}(${args.join(', ')})`;
}

export function formatBraceList(items: readonly string[]): string {
  return items.length === 0 ? '{ }' : `{ ${items.join(', ')} }`;
}

/**
 * Render entries as `WRAPPER({method, parameter, target, ...conditions})`.
 * Conditions are written as trailing parts, which decode verbatim.
 */
export function formatEntryList(
  entries: readonly EntryTuple[],
  wrapper = 'EVOLUTION',
): string {
  if (entries.length === 0) return 'NULL';

  const groups = entries.map((entry) => {
    const parts = [entry.method, entry.parameter, entry.target, ...entry.conditions];
    return `{${parts.join(', ')}}`;
  });

  return `${wrapper}(${groups.join(', ')})`;
}
