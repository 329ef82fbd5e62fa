/**
 * initex – Header scanners
 *
 * Line-oriented readers for the constant headers that accompany the
 * initializer tables: `#define` constants, enum member lists and
 * `#if P_FAMILY_X` … `#endif` regions.
 *
 * These work on raw (not preprocessed) header text.
 *
 * License: Apache-2.0
 */

const DEFINE_LINE = /^\s*#\s*define\s+([A-Za-z_][A-Za-z0-9_]*)[ \t]+(.*)$/;
const ENUM_MEMBER = /^\s*([A-Z0-9_]+)\s*(?:=\s*([^,]+))?,?/;
const ENTRY_HEADER = /^\[\s*([A-Za-z_][A-Za-z0-9_]*)\s*\]/;
const CONDITIONAL_OPEN = /^#\s*if(?:n?def)?\b/;
const PLAIN_IF = /^#\s*if\s/;
const CONDITIONAL_CLOSE = /^#\s*endif\b/;

/**
 * Object-like `#define NAME VALUE` lines whose NAME starts with `prefix`.
 * The value runs to the end of the line or the start of a comment, and is
 * trimmed. Function-like macros and empty values are ignored.
 *
 *   scanDefineConstants('#define MOVE_POUND 1 // first', 'MOVE_')
 *   // { MOVE_POUND: '1' }
 */
export function scanDefineConstants(
  text: string,
  prefix = '',
): Record<string, string> {
  const constants: Record<string, string> = Object.create(null);

  for (const line of splitLines(text)) {
    const match = DEFINE_LINE.exec(line);
    if (!match) continue;

    const [, name, rest] = match;
    if (!name.startsWith(prefix)) continue;

    const value = stripComment(rest).trim();
    if (value === '') continue;

    constants[name] = value;
  }

  return constants;
}

/**
 * Member names starting with `prefix` inside the enum that first mentions
 * the prefix, up to the line starting with `}`.
 *
 *   enum { GROWTH_MEDIUM_FAST, GROWTH_ERRATIC, ... };
 */
export function scanEnumConstants(text: string, prefix: string): string[] {
  const members: string[] = [];
  let inside = false;

  for (const raw of splitLines(text)) {
    const line = raw.trimEnd();

    if (line.includes(prefix)) inside = true;

    if (inside) {
      const match = ENUM_MEMBER.exec(line);
      if (match && match[1].startsWith(prefix)) {
        members.push(match[1]);
      }
      if (line.startsWith('}')) inside = false;
    }
  }

  return members;
}

/**
 * Map each `[KEY]` header to the innermost enclosing `#if <GUARD>` whose
 * guard starts with `guardPrefix`. Other conditionals nest without
 * changing the guard.
 *
 *   #if P_FAMILY_BULBASAUR
 *       [SPECIES_BULBASAUR] = { ... },
 *   #endif //P_FAMILY_BULBASAUR
 *
 *   // { SPECIES_BULBASAUR: 'P_FAMILY_BULBASAUR' }
 */
export function scanFamilyGuards(
  text: string,
  guardPrefix = 'P_FAMILY_',
  keyPrefix = '',
): Record<string, string> {
  const guards: Record<string, string> = Object.create(null);

  // One slot per open conditional; null for non-family conditionals.
  const stack: Array<string | null> = [];

  for (const raw of splitLines(text)) {
    const line = raw.trim();

    if (CONDITIONAL_OPEN.test(line)) {
      const condition = line.replace(CONDITIONAL_OPEN, '').trim();
      const guard = condition.split(/\s+/)[0] ?? '';
      stack.push(PLAIN_IF.test(line) && guard.startsWith(guardPrefix) ? guard : null);
      continue;
    }

    if (CONDITIONAL_CLOSE.test(line)) {
      stack.pop();
      continue;
    }

    const header = ENTRY_HEADER.exec(line);
    if (!header || !header[1].startsWith(keyPrefix)) continue;

    const guard = innermostGuard(stack);
    if (guard !== null) guards[header[1]] = guard;
  }

  return guards;
}

/////////////////////
// Helpers         //
/////////////////////

function splitLines(text: string): string[] {
  return text.split(/\r\n|\r|\n/);
}

function stripComment(value: string): string {
  const cut = [value.indexOf('//'), value.indexOf('/*')].filter((i) => i !== -1);
  return cut.length === 0 ? value : value.slice(0, Math.min(...cut));
}

function innermostGuard(stack: ReadonlyArray<string | null>): string | null {
  for (let i = stack.length - 1; i >= 0; i--) {
    const guard = stack[i];
    if (guard !== null) return guard;
  }
  return null;
}
