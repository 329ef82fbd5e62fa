/**
 * initex/benchmarks/extraction-cases.ts
 *
 * A curated set of extraction cases for benchmarking and manual testing.
 *
 * These are intended to:
 *  - Cover expressions, entry tables and entry lists as they appear in
 *    preprocessed data tables.
 *  - Be reusable across benchmark scripts and the integration tests.
 *
 * NOTE:
 *  - This file is for local development and benchmarking only.
 *  - It is NOT part of the public API of the library.
 */

import type { ExtractionOperation } from '../src';

/**
 * Symbols every case may reference, on top of TRUE and FALSE.
 */
export const DEFAULT_CASE_SYMBOLS: Readonly<Record<string, number>> = {
  GEN_3: 3,
  GEN_5: 5,
  GEN_6: 6,
  GEN_9: 9,
  P_UPDATED_STATS: 9,
  P_UPDATED_ABILITIES: 9,
  STANDARD_FRIENDSHIP: 50,
};

export interface ExtractionCase<R = unknown> {
  /** Human-readable name for the case. */
  name: string;
  description: string;
  operation: ExtractionOperation;
  source: string;
  /**
   * Expected result, compared with deep equality.
   */
  expected: R;
  /**
   * Approximate number of iterations recommended in micro-benchmarks.
   */
  iterations?: number;
  category: 'expression' | 'table' | 'list';
}

const SPROUT_TABLE = [
  '[SPECIES_SPROUT] =',
  '{',
  '    .baseHP = 45,',
  '    .types = MON_TYPES(TYPE_GRASS, TYPE_POISON),',
  '    .abilities = { ABILITY_OVERGROW, ABILITY_NONE, ABILITY_CHLOROPHYLL },',
  '    .speciesName = _("Sprout"),',
  '},',
  '[SPECIES_EMBER] = { .baseHP = 39, .types = MON_TYPES(TYPE_FIRE), },',
].join('\n');

export const EXTRACTION_CASES: ExtractionCase[] = [
  {
    name: 'Generation-gated stat',
    category: 'expression',
    description: 'A base stat that changed in a later generation.',
    operation: 'evaluate',
    source: '(P_UPDATED_STATS >= GEN_6) ? 45 : 40',
    expected: 45,
    iterations: 100_000,
  },
  {
    name: 'Bit flags',
    category: 'expression',
    description: 'Flags combined with | and masked with &, which binds tighter.',
    operation: 'evaluate',
    source: '(1 << 0) | (1 << 3) | (1 << 5) & ~(1 << 3)',
    expected: 41,
    iterations: 100_000,
  },
  {
    name: 'Friendship arithmetic',
    category: 'expression',
    description: 'A symbol combined with integer literals and suffixes.',
    operation: 'evaluate',
    source: 'STANDARD_FRIENDSHIP * 2u - 0x0A',
    expected: 90,
    iterations: 100_000,
  },
  {
    name: 'Two-entry table',
    category: 'table',
    description: 'A multi-line entry followed by a one-line entry.',
    operation: 'entries',
    source: SPROUT_TABLE,
    expected: {
      SPECIES_SPROUT: {
        baseHP: '45',
        types: 'MON_TYPES(TYPE_GRASS, TYPE_POISON)',
        abilities: '{ ABILITY_OVERGROW, ABILITY_NONE, ABILITY_CHLOROPHYLL }',
        speciesName: '_("Sprout")',
      },
      SPECIES_EMBER: { baseHP: '39', types: 'MON_TYPES(TYPE_FIRE)' },
    },
    iterations: 20_000,
  },
  {
    name: 'Evolution list with conditions',
    category: 'list',
    description: 'A level evolution and an item evolution gated by time of day.',
    operation: 'entryList',
    source:
      'EVOLUTION({EVO_LEVEL, 16, SPECIES_SPROUTLING}, ' +
      '{EVO_ITEM, ITEM_LEAF_STONE, SPECIES_SPROUTLORD, CONDITIONS({IF_TIME, TIME_DAY})})',
    expected: [
      { method: 'EVO_LEVEL', parameter: '16', target: 'SPECIES_SPROUTLING', conditions: [] },
      {
        method: 'EVO_ITEM',
        parameter: 'ITEM_LEAF_STONE',
        target: 'SPECIES_SPROUTLORD',
        conditions: ['IF_TIME TIME_DAY'],
      },
    ],
    iterations: 50_000,
  },
  {
    name: 'Empty evolution list',
    category: 'list',
    description: 'A species without evolutions.',
    operation: 'entryList',
    source: 'EVOLUTION(NULL)',
    expected: [],
    iterations: 100_000,
  },
];
