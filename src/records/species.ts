/**
 * initex – Species record assembler
 *
 * Turns the FieldMap of one `[SPECIES_X] = { ... }` entry into a typed
 * record, decoding each field with the matching value decoder and filling
 * in the defaults used when a field is absent.
 *
 *   const entries = scanIndexedEntries(text, /SPECIES_[A-Z0-9_]+/);
 *   const record = assembleSpeciesRecord('SPECIES_BULBASAUR', entries.SPECIES_BULBASAUR);
 *
 * Field errors are thrown as ExtractorError; the caller decides whether to
 * skip the record or abort.
 *
 * License: Apache-2.0
 */

import {
  decodeBraceList,
  decodeEntryList,
  decodeMacroArguments,
  decodeString,
} from '../core/decoders';
import type { EntryListOptions } from '../core/decoders';
import { isExtractorError } from '../core/errors';
import { evaluateExpression } from '../core/evaluator';
import type { EvaluateOptions } from '../core/evaluator';
import type { EntryTuple, FieldMap } from '../core/types';

/////////////////////
// Record types    //
/////////////////////

export interface BaseStats {
  hp: number;
  attack: number;
  defense: number;
  speed: number;
  spAttack: number;
  spDefense: number;
}

export type StatName = keyof BaseStats;

/**
 * Effort values granted on defeat. Only non-zero stats are present.
 */
export type EvYield = Partial<Record<StatName, number>>;

export interface LearnsetKeys {
  levelUp: string | null;
  egg: string | null;
  teachable: string | null;
}

export interface SpeciesRecord {
  key: string;
  familyGuard: string;
  nationalDex: string;
  displayName: string;
  category: string;
  description: string;
  height: number;
  weight: number;
  types: [string, string];
  abilities: string[];
  catchRate: number;
  expYield: number;
  growthRate: string;
  eggGroups: [string, string];
  genderRatio: string;
  eggCycles: number;
  friendship: number;
  baseStats: BaseStats;
  evYield: EvYield;
  learnsets: LearnsetKeys;
  evolutions: EntryTuple[];
  cry: string;
  /**
   * Null when the field is absent or does not evaluate.
   */
  iconPalIndex: number | null;
  /**
   * Lower-case key without its `SPECIES_` prefix, e.g. "bulbasaur".
   */
  graphicsFolder: string;
}

export interface AssembleOptions extends EvaluateOptions, EntryListOptions {
  /**
   * Key → family guard, as produced by `scanFamilyGuards`. Keys missing
   * here get `P_FAMILY_` + the key without `SPECIES_`.
   */
  familyGuards?: Readonly<Record<string, string>>;
}

/////////////////////
// Field tables    //
/////////////////////

const KEY_PREFIX = 'SPECIES_';

const BASE_STAT_FIELDS: ReadonlyArray<readonly [string, StatName]> = [
  ['baseHP', 'hp'],
  ['baseAttack', 'attack'],
  ['baseDefense', 'defense'],
  ['baseSpeed', 'speed'],
  ['baseSpAttack', 'spAttack'],
  ['baseSpDefense', 'spDefense'],
];

const EV_YIELD_FIELDS: ReadonlyArray<readonly [string, StatName]> = [
  ['evYield_HP', 'hp'],
  ['evYield_Attack', 'attack'],
  ['evYield_Defense', 'defense'],
  ['evYield_SpAttack', 'spAttack'],
  ['evYield_SpDefense', 'spDefense'],
  ['evYield_Speed', 'speed'],
];

/////////////////////
// Public API      //
/////////////////////

export function assembleSpeciesRecord(
  key: string,
  fields: FieldMap,
  options: AssembleOptions = {},
): SpeciesRecord {
  const field = (name: string): string => (Object.hasOwn(fields, name) ? fields[name] : '');
  const number = (name: string): number => evaluateExpression(field(name), options);
  const constant = (name: string, fallback: string): string => field(name).trim() || fallback;

  const baseName = key.startsWith(KEY_PREFIX) ? key.slice(KEY_PREFIX.length) : key;

  const baseStats: BaseStats = {
    hp: 0,
    attack: 0,
    defense: 0,
    speed: 0,
    spAttack: 0,
    spDefense: 0,
  };
  for (const [name, stat] of BASE_STAT_FIELDS) {
    baseStats[stat] = number(name);
  }

  const evYield: EvYield = {};
  for (const [name, stat] of EV_YIELD_FIELDS) {
    if (!Object.hasOwn(fields, name)) continue;
    const value = number(name);
    if (value !== 0) evYield[stat] = value;
  }

  const abilities = decodeBraceList(field('abilities'));

  return {
    key,
    familyGuard: options.familyGuards?.[key] ?? `P_FAMILY_${baseName}`,
    nationalDex: constant('natDexNum', `NATIONAL_DEX_${baseName}`),
    displayName: decodeString(Object.hasOwn(fields, 'speciesName') ? fields.speciesName : key),
    category: decodeString(field('categoryName')),
    description: decodeString(field('description')),
    height: number('height'),
    weight: number('weight'),
    types: ensurePair(decodeListValue(field('types')), 'TYPE_NORMAL'),
    abilities: abilities.length > 0 ? abilities : ['ABILITY_NONE'],
    catchRate: number('catchRate'),
    expYield: number('expYield'),
    growthRate: constant('growthRate', 'GROWTH_MEDIUM_FAST'),
    eggGroups: ensurePair(decodeListValue(field('eggGroups')), 'EGG_GROUP_NO_EGGS_DISCOVERED'),
    genderRatio: constant('genderRatio', 'MON_GENDERLESS'),
    eggCycles: number('eggCycles'),
    friendship: number('friendship'),
    baseStats,
    evYield,
    learnsets: {
      levelUp: field('levelUpLearnset').trim() || null,
      egg: field('eggMoveLearnset').trim() || null,
      teachable: field('teachableLearnset').trim() || null,
    },
    evolutions: decodeEntryList(field('evolutions'), options),
    cry: constant('cryId', 'CRY_NONE'),
    iconPalIndex: evaluateOrNull(field('iconPalIndex'), options),
    graphicsFolder: baseName.toLowerCase(),
  };
}

/////////////////////
// Helpers         //
/////////////////////

/**
 * `MON_TYPES(A, B)` before preprocessing, `{ A, B }` after.
 */
function decodeListValue(raw: string): string[] {
  return raw.trim().startsWith('{') ? decodeBraceList(raw) : decodeMacroArguments(raw);
}

function ensurePair(values: readonly string[], fallback: string): [string, string] {
  const [first, second] = values;
  if (first === undefined) return [fallback, fallback];
  return [first, second ?? first];
}

function evaluateOrNull(raw: string, options: EvaluateOptions): number | null {
  if (raw.trim() === '') return null;
  try {
    return evaluateExpression(raw, options);
  } catch (err) {
    if (isExtractorError(err)) return null;
    throw err;
  }
}
