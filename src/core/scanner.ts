/**
 * initex – Structural scanner
 *
 * String-literal-aware delimiter tracking shared by every splitter and
 * extractor. All helpers here use the same character rules:
 *
 *  - `"` toggles the in-string state unless it is escaped;
 *  - inside a string, `\` escapes the next character and every structural
 *    character is ignored;
 *  - outside strings `(`/`)` move the paren depth and `{`/`}` the brace
 *    depth.
 *
 * Nothing in this module throws. Callers check that depths return to the
 * expected baseline.
 *
 * License: Apache-2.0
 */

export interface Depths {
  paren: number;
  brace: number;
}

export const ZERO_DEPTHS: Readonly<Depths> = { paren: 0, brace: 0 };

/**
 * Incremental character classifier. `push` feeds one character and returns
 * whether it was outside any string literal.
 */
class DelimiterState {
  paren: number;
  brace: number;
  private inString = false;
  private escape = false;

  constructor(start: Readonly<Depths> = ZERO_DEPTHS) {
    this.paren = start.paren;
    this.brace = start.brace;
  }

  get atTopLevel(): boolean {
    return !this.inString && this.paren === 0 && this.brace === 0;
  }

  get insideString(): boolean {
    return this.inString;
  }

  push(ch: string): boolean {
    if (ch === '"' && !this.escape) {
      this.inString = !this.inString;
    }

    if (this.inString) {
      this.escape = ch === '\\' && !this.escape;
      return false;
    }

    this.escape = false;

    switch (ch) {
      case '(':
        this.paren++;
        break;
      case ')':
        this.paren--;
        break;
      case '{':
        this.brace++;
        break;
      case '}':
        this.brace--;
        break;
    }

    return true;
  }
}

/**
 * Scan `text` once and return the depths reached, starting from `start`.
 *
 *   scanDepths('FOO(1, {2')            // { paren: 1, brace: 1 }
 *   scanDepths('})', { paren: 1, brace: 1 }) // { paren: 0, brace: 0 }
 */
export function scanDepths(
  text: string,
  start: Readonly<Depths> = ZERO_DEPTHS,
): Depths {
  const state = new DelimiterState(start);
  for (const ch of text) {
    state.push(ch);
  }
  return { paren: state.paren, brace: state.brace };
}

/**
 * True when `text` closes every paren and brace it opens and never dips
 * below zero on the way.
 */
export function isBalanced(text: string): boolean {
  const state = new DelimiterState();
  for (const ch of text) {
    state.push(ch);
    if (state.paren < 0 || state.brace < 0) return false;
  }
  return state.paren === 0 && state.brace === 0 && !state.insideString;
}

/**
 * Split a comma-delimited list on top-level commas only.
 *
 *   splitTopLevel('a, {b, c}, d')   // ['a', '{b, c}', 'd']
 *   splitTopLevel('a, "x, y", b')   // ['a', '"x, y"', 'b']
 *
 * Pieces are trimmed; empty pieces are dropped.
 */
export function splitTopLevel(text: string): string[] {
  const parts: string[] = [];
  const state = new DelimiterState();
  let current = '';

  for (const ch of text) {
    const outside = state.push(ch);
    if (outside && ch === ',' && state.paren === 0 && state.brace === 0) {
      pushTrimmed(parts, current);
      current = '';
    } else {
      current += ch;
    }
  }

  pushTrimmed(parts, current);
  return parts;
}

function pushTrimmed(parts: string[], piece: string): void {
  const trimmed = piece.trim();
  if (trimmed !== '') parts.push(trimmed);
}

const INLINE_ASSIGNMENT = /[ \t]*\.[A-Za-z_][A-Za-z0-9_]*\s*=(?!=)/y;

/**
 * Move every `, .field =` written on one line onto a line of its own.
 * Only commas at depth zero and outside string literals qualify.
 *
 *   breakInlineAssignments('.a = 1, .b = "x, .c = y",')
 *   // '.a = 1,\n.b = "x, .c = y",'
 */
export function breakInlineAssignments(text: string): string {
  const state = new DelimiterState();
  let out = '';

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    const outside = state.push(ch);
    out += ch;

    if (!outside || ch !== ',' || state.paren !== 0 || state.brace !== 0) continue;

    INLINE_ASSIGNMENT.lastIndex = i + 1;
    const match = INLINE_ASSIGNMENT.exec(text);
    if (match === null) continue;

    const indent = /^[ \t]*/.exec(match[0]);
    const skip = indent === null ? 0 : indent[0].length;
    out += '\n';
    i += skip;
  }

  return out;
}

/**
 * Index of the delimiter closing the one at `openIndex` (`(` or `{`), or
 * -1 when it never closes.
 */
export function findMatchingClose(text: string, openIndex: number): number {
  const open = text[openIndex];
  if (open !== '(' && open !== '{') return -1;

  const state = new DelimiterState();
  for (let i = openIndex; i < text.length; i++) {
    state.push(text[i]);
    if (state.paren === 0 && state.brace === 0 && !state.insideString) {
      return i;
    }
    if (state.paren < 0 || state.brace < 0) return -1;
  }
  return -1;
}

/**
 * Index of the first `ch` at or after `from` that sits outside string
 * literals, or -1. `from` must itself be outside any string.
 */
export function indexOfOutsideStrings(
  text: string,
  ch: string,
  from = 0,
): number {
  const state = new DelimiterState();
  for (let i = from; i < text.length; i++) {
    const outside = state.push(text[i]);
    if (outside && text[i] === ch) return i;
  }
  return -1;
}

export interface GroupScan {
  /**
   * Interiors of the brace groups found at depth zero, without their
   * braces, in source order.
   */
  groups: string[];

  /**
   * Text at depth zero that is neither whitespace nor a comma, with its
   * offset. Empty for a clean `{…}, {…}` list.
   */
  stray: Array<{ text: string; index: number }>;

  /**
   * Offset of a group that never closes, or null.
   */
  unclosedAt: number | null;
}

/**
 * Locate every top-level `{…}` group in `text`.
 */
export function findTopLevelGroups(text: string): GroupScan {
  const groups: string[] = [];
  const stray: Array<{ text: string; index: number }> = [];
  const state = new DelimiterState();

  let groupStart = -1;
  let strayStart = -1;

  const flushStray = (end: number) => {
    if (strayStart !== -1) {
      stray.push({ text: text.slice(strayStart, end).trim(), index: strayStart });
      strayStart = -1;
    }
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    const wasTopLevel = state.atTopLevel;
    state.push(ch);

    if (wasTopLevel && ch === '{') {
      flushStray(i);
      groupStart = i;
      continue;
    }

    if (groupStart !== -1) {
      if (state.atTopLevel) {
        groups.push(text.slice(groupStart + 1, i));
        groupStart = -1;
      }
      continue;
    }

    if (ch === ',' || /\s/.test(ch)) {
      flushStray(i);
    } else if (strayStart === -1) {
      strayStart = i;
    }
  }

  flushStray(text.length);

  return { groups, stray, unclosedAt: groupStart === -1 ? null : groupStart };
}

/**
 * Collapse runs of whitespace outside string literals to a single space and
 * trim the result.
 */
export function collapseWhitespace(text: string): string {
  const state = new DelimiterState();
  let out = '';
  let pendingSpace = false;

  for (const ch of text) {
    const wasInString = state.insideString;
    state.push(ch);

    if (!wasInString && !state.insideString && /\s/.test(ch)) {
      pendingSpace = true;
      continue;
    }

    if (pendingSpace && out !== '') out += ' ';
    pendingSpace = false;
    out += ch;
  }

  return out;
}
