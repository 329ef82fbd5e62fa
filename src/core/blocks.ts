/**
 * initex – Block-assignment extractor
 *
 * Turns the interior of one designated initializer
 *
 *   .baseHP = 45,
 *   .types = MON_TYPES(TYPE_GRASS,
 *                      TYPE_POISON),
 *   .abilities = { ABILITY_OVERGROW, ABILITY_NONE, ABILITY_CHLOROPHYLL },
 *
 * into a FieldMap of raw value text.
 *
 * License: Apache-2.0
 */

import { createParseError } from './errors';
import { breakInlineAssignments, collapseWhitespace, scanDepths, ZERO_DEPTHS } from './scanner';
import type { Depths } from './scanner';
import type {
  ExtractionHooks,
  FieldMap,
  UnterminatedFieldMode,
} from './types';

export interface FieldMapOptions extends Pick<ExtractionHooks, 'onDiagnostic'> {
  unterminatedFields?: UnterminatedFieldMode;
}

const FIELD_START = /^\.([A-Za-z_][A-Za-z0-9_]*)\s*=(?!=)(.*)$/;

interface OpenField {
  name: string;
  fragments: string[];
  depths: Depths;
  /** Offset of the line that opened the field. */
  index: number;
}

/**
 * Extract `.field = value` assignments from an initializer body (the text
 * between the outer braces).
 *
 * A value may span lines; it ends once parens and braces are balanced and
 * its last fragment ends with a comma. Only the final comma is removed.
 */
export function extractFieldMap(
  interior: string,
  options: FieldMapOptions = {},
): FieldMap {
  const fields: FieldMap = Object.create(null);
  const normalized = breakInlineAssignments(interior.replace(/\r\n?/g, '\n'));

  let open: OpenField | null = null;
  let offset = 0;

  const commit = (field: OpenField) => {
    let value = field.fragments.join(' ');
    if (value.endsWith(',')) value = value.slice(0, -1);
    fields[field.name] = collapseWhitespace(value);
  };

  for (const rawLine of normalized.split('\n')) {
    const lineOffset = offset;
    offset += rawLine.length + 1;

    const line = rawLine.trim();
    if (line === '') continue;

    let fragment: string;

    if (open === null) {
      const match = FIELD_START.exec(line);
      if (!match) continue;
      fragment = match[2].trim();
      open = { name: match[1], fragments: [], depths: { ...ZERO_DEPTHS }, index: lineOffset };
    } else {
      fragment = line;
    }

    const hasComma = fragment.endsWith(',');
    open.fragments.push(fragment);
    open.depths = scanDepths(fragment, open.depths);

    if (hasComma && open.depths.paren === 0 && open.depths.brace === 0) {
      commit(open);
      open = null;
    }
  }

  if (open !== null && open.fragments.some((f) => f !== '')) {
    if (options.unterminatedFields === 'error') {
      throw createParseError({
        message: `field "${open.name}" is not terminated before the end of its block`,
        decoder: 'fieldMap',
        source: normalized,
        index: open.index,
        length: normalized.length - open.index,
      });
    }

    commit(open);
    options.onDiagnostic?.({
      code: 'unterminated-field',
      message: `field "${open.name}" was still open at the end of its block; kept the partial value`,
      field: open.name,
      location: { index: open.index, length: normalized.length - open.index },
    });
  }

  return fields;
}
