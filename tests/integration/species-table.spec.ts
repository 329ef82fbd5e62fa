// initex/tests/integration/species-table.spec.ts
//
// End-to-end extraction over header fixtures: family guards, species
// records, learnsets, and the entries a scan skips.

import { readFileSync } from 'node:fs';
import { describe, it, expect } from 'vitest';
import { createExtractor, scanFamilyGuards, describeSkip } from '../../src';
import type { SkippedEntry } from '../../src';

// -----------------------------------------------------------------------------
// Fixtures
// -----------------------------------------------------------------------------

function readFixture(name: string): string {
  return readFileSync(new URL(`../fixtures/${name}`, import.meta.url), 'utf8');
}

const familyText = readFixture('sprout_family.h');
const learnsetText = readFixture('sprout_learnsets.h');

const symbols = {
  P_UPDATED_EXP_YIELDS: 9,
  P_UPDATED_MOVES: 1,
  GEN_5: 5,
  STANDARD_FRIENDSHIP: 50,
};

// -----------------------------------------------------------------------------
// Species
// -----------------------------------------------------------------------------

describe('species table – records', () => {
  const familyGuards = scanFamilyGuards(familyText, 'P_FAMILY_', 'SPECIES_');
  const skipped: SkippedEntry[] = [];
  const records = createExtractor({ symbols, onSkip: (s) => skipped.push(s) }).scanSpecies(
    familyText,
    { familyGuards },
  );

  it('maps every guarded key to its family', () => {
    expect(familyGuards).toEqual({
      SPECIES_SPROUT: 'P_FAMILY_SPROUT',
      SPECIES_SPROUTLING: 'P_FAMILY_SPROUT',
      SPECIES_SPROUTLORD_MEGA: 'P_FAMILY_SPROUT',
    });
  });

  it('assembles the well-formed entries in source order', () => {
    expect(Object.keys(records)).toEqual([
      'SPECIES_SPROUT',
      'SPECIES_SPROUTLING',
      'SPECIES_SPROUTLORD_MEGA',
    ]);
  });

  it('decodes a full entry', () => {
    const sprout = records.SPECIES_SPROUT;

    expect(sprout.displayName).toBe('Sprout');
    expect(sprout.category).toBe('Seed');
    expect(sprout.description).toBe('A strange seed was planted on\nits back at birth.');
    expect(sprout.baseStats).toEqual({
      hp: 45,
      attack: 49,
      defense: 49,
      speed: 45,
      spAttack: 65,
      spDefense: 65,
    });
    expect(sprout.expYield).toBe(64);
    expect(sprout.friendship).toBe(50);
    expect(sprout.evYield).toEqual({ spAttack: 1 });
    expect(sprout.abilities).toEqual(['ABILITY_OVERGROW', 'ABILITY_NONE', 'ABILITY_CHLOROPHYLL']);
    expect(sprout.iconPalIndex).toBe(4);
    expect(sprout.learnsets).toEqual({
      levelUp: 'sSproutLevelUpLearnset',
      egg: 'sSproutEggMoveLearnset',
      teachable: null,
    });
  });

  it('decodes an evolution list spread over two lines', () => {
    expect(records.SPECIES_SPROUTLING.evolutions).toEqual([
      { method: 'EVO_LEVEL', parameter: '32', target: 'SPECIES_SPROUTLORD', conditions: [] },
      {
        method: 'EVO_ITEM',
        parameter: 'ITEM_LEAF_STONE',
        target: 'SPECIES_SPROUTLORD',
        conditions: ['IF_TIME TIME_DAY'],
      },
    ]);
  });

  it('gives forms nested in other conditionals the family guard', () => {
    const mega = records.SPECIES_SPROUTLORD_MEGA;
    expect(mega.familyGuard).toBe('P_FAMILY_SPROUT');
    expect(mega.types).toEqual(['TYPE_GRASS', 'TYPE_GRASS']);
    expect(mega.graphicsFolder).toBe('sproutlord_mega');
  });

  it('reports the unclosed and the invalid entry', () => {
    expect(skipped.map((s) => [s.key, s.reason, s.index])).toEqual([
      ['SPECIES_TRUNCATED', 'unclosed-block', familyText.indexOf('[SPECIES_TRUNCATED]')],
      ['SPECIES_BROKEN', 'invalid-record', familyText.indexOf('[SPECIES_BROKEN]')],
    ]);
    expect(describeSkip(skipped[0])).toBe(
      `skipped [SPECIES_TRUNCATED] at offset ${familyText.indexOf('[SPECIES_TRUNCATED]')} (unclosed-block)`,
    );
  });
});

// -----------------------------------------------------------------------------
// Learnsets
// -----------------------------------------------------------------------------

describe('species table – learnsets', () => {
  const extractor = createExtractor({ symbols });

  it('resolves the learnset a record names', () => {
    const records = extractor.scanSpecies(familyText);
    const levelUp = extractor.scanLevelUpLearnsets(learnsetText);
    const eggMoves = extractor.scanMoveArrays(learnsetText);

    const { learnsets } = records.SPECIES_SPROUT;
    expect(learnsets.levelUp).not.toBeNull();
    expect(learnsets.egg).not.toBeNull();
    if (learnsets.levelUp === null || learnsets.egg === null) return;

    expect(levelUp[learnsets.levelUp]).toEqual([
      { level: 1, move: 'MOVE_TACKLE' },
      { level: 3, move: 'MOVE_GROWL' },
      { level: 7, move: 'MOVE_VINE_WHIP' },
    ]);
    expect(eggMoves[learnsets.egg]).toEqual(['MOVE_SKULL_BASH', 'MOVE_PETAL_DANCE']);
  });
});
