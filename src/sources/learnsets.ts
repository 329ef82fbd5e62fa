/**
 * initex – Learnset scanners
 *
 * Reads move tables out of preprocessed text:
 *
 *   static const struct LevelUpMove sBulbasaurLevelUpLearnset[] = {
 *       LEVEL_UP_MOVE( 1, MOVE_TACKLE),
 *       LEVEL_UP_MOVE( 3, MOVE_VINE_WHIP),
 *       LEVEL_UP_END
 *   };
 *
 *   static const u16 sBulbasaurEggMoveLearnset[] = {
 *       MOVE_SKULL_BASH,
 *       MOVE_NONE,
 *   };
 *
 * After preprocessing, `LEVEL_UP_MOVE(l, m)` usually appears expanded to
 * `{ .move = m, .level = l }`. Both forms are read.
 *
 * License: Apache-2.0
 */

import { decodeMacroArguments } from '../core/decoders';
import { evaluateExpression } from '../core/evaluator';
import type { EvaluateOptions } from '../core/evaluator';
import { findMatchingClose, splitTopLevel } from '../core/scanner';
import type { ExtractionHooks } from '../core/types';

export interface LevelUpMove {
  level: number;
  move: string;
}

export interface LearnsetScanOptions
  extends EvaluateOptions,
    Pick<ExtractionHooks, 'onSkip'> {}

const LEVEL_UP_ARRAY = /static\s+const\s+struct\s+LevelUpMove\s+([A-Za-z_][A-Za-z0-9_]*)\s*\[\s*\]\s*=\s*\{/g;
const MOVE_ARRAY = /static\s+const\s+u16\s+([A-Za-z_][A-Za-z0-9_]*)\s*\[\s*\]\s*=\s*\{/g;
const DESIGNATOR = /^\.([A-Za-z_][A-Za-z0-9_]*)\s*=\s*([\s\S]*)$/;
const LEVEL_UP_MACRO = /^LEVEL_UP_MOVE\s*\(/;

const DROPPED_MOVES: ReadonlySet<string> = new Set([
  'MOVE_NONE',
  'MOVE_UNAVAILABLE',
  'LEVEL_UP_MOVE_END',
]);

/**
 * Every `LevelUpMove` array in `text`, keyed by array name. Levels are
 * evaluated; terminator entries are dropped.
 */
export function scanLevelUpLearnsets(
  text: string,
  options: LearnsetScanOptions = {},
): Record<string, LevelUpMove[]> {
  const learnsets: Record<string, LevelUpMove[]> = Object.create(null);

  for (const { name, body } of findArrays(text, LEVEL_UP_ARRAY, options)) {
    const moves: LevelUpMove[] = [];

    for (const item of splitTopLevel(body)) {
      const pair = readLevelUpItem(item);
      if (pair === null || isDroppedMove(pair.move)) continue;

      moves.push({
        level: evaluateExpression(pair.level, options),
        move: pair.move,
      });
    }

    learnsets[name] = moves;
  }

  return learnsets;
}

/**
 * Every `u16` array in `text` (egg moves, teachable moves), keyed by array
 * name. `MOVE_NONE` and `MOVE_UNAVAILABLE` are dropped.
 */
export function scanMoveArrays(
  text: string,
  options: Pick<ExtractionHooks, 'onSkip'> = {},
): Record<string, string[]> {
  const arrays: Record<string, string[]> = Object.create(null);

  for (const { name, body } of findArrays(text, MOVE_ARRAY, options)) {
    arrays[name] = splitTopLevel(body).filter(
      (move) => move !== 'MOVE_NONE' && move !== 'MOVE_UNAVAILABLE',
    );
  }

  return arrays;
}

/////////////////////
// Helpers         //
/////////////////////

interface ArrayBody {
  name: string;
  body: string;
}

function findArrays(
  text: string,
  pattern: RegExp,
  hooks: Pick<ExtractionHooks, 'onSkip'>,
): ArrayBody[] {
  const found: ArrayBody[] = [];
  const re = new RegExp(pattern.source, pattern.flags);

  let match: RegExpExecArray | null;
  while ((match = re.exec(text)) !== null) {
    const open = match.index + match[0].length - 1;
    const close = findMatchingClose(text, open);

    if (close === -1) {
      hooks.onSkip?.({ key: match[1], reason: 'unclosed-block', index: match.index });
      continue;
    }

    found.push({ name: match[1], body: text.slice(open + 1, close) });
    re.lastIndex = close + 1;
  }

  return found;
}

/**
 * `{ .move = M, .level = L }`, `{ M, L }` or `LEVEL_UP_MOVE(L, M)`;
 * null for anything else.
 */
function readLevelUpItem(item: string): { level: string; move: string } | null {
  if (LEVEL_UP_MACRO.test(item)) {
    const [level, move] = decodeMacroArguments(item);
    return level !== undefined && move !== undefined ? { level, move } : null;
  }

  if (!item.startsWith('{') || !item.endsWith('}')) return null;

  const parts = splitTopLevel(item.slice(1, -1));
  let move: string | undefined;
  let level: string | undefined;

  for (const [position, part] of parts.entries()) {
    const designated = DESIGNATOR.exec(part);
    if (designated) {
      if (designated[1] === 'move') move = designated[2].trim();
      if (designated[1] === 'level') level = designated[2].trim();
    } else if (position === 0) {
      move = part;
    } else if (position === 1) {
      level = part;
    }
  }

  return move !== undefined && level !== undefined ? { level, move } : null;
}

function isDroppedMove(move: string): boolean {
  return DROPPED_MOVES.has(move) || /^0x/i.test(move);
}
