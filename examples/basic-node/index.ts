/**
 * initex/examples/basic-node/index.ts
 *
 * Minimal Node.js example showing how to:
 *  - Evaluate constant expressions against known symbols.
 *  - Scan an indexed initializer table into field maps.
 *  - Decode field values and assemble species records.
 *  - Log skipped entries and report errors.
 *
 * How to run (from repo root):
 *   npm run example:basic
 *   # or, with your own expression:
 *   npx tsx examples/basic-node/index.ts "P_UPDATED_STATS >= GEN_6 ? 65 : 60"
 */

import {
  createExtractor,
  describeSkip,
  formatExtractorError,
  inspectEntryList,
  scanDefineConstants,
  summarizeEntries,
} from '../../src';

// 1. Sample input, as it looks after preprocessing

const CONFIG_HEADER = `
#define GEN_3 3
#define GEN_6 6
#define GEN_9 9
#define P_UPDATED_STATS GEN_9
#define STANDARD_FRIENDSHIP 50
`;

const SPECIES_TABLE = `
    [SPECIES_PEBBLIT] =
    {
        .baseHP        = 40,
        .baseAttack    = P_UPDATED_STATS >= GEN_6 ? 55 : 50,
        .baseDefense   = 70,
        .baseSpeed     = 20,
        .baseSpAttack  = 30,
        .baseSpDefense = 30,
        .types = MON_TYPES(TYPE_ROCK),
        .abilities = { ABILITY_STURDY, ABILITY_NONE, ABILITY_SAND_VEIL },
        .friendship = STANDARD_FRIENDSHIP,
        .speciesName = _("Pebblit"),
        .categoryName = _("Pebble"),
        .description = COMPOUND_STRING(
            "It rolls down hills for fun and\\n"
            "sleeps wherever it stops."),
        .evolutions = EVOLUTION({EVO_LEVEL, 25, SPECIES_BOULDROT}),
    },

    [SPECIES_BOULDROT] =
    {
        .baseHP = 75,
        .baseAttack = MISSING_CONSTANT,
    },
`;

// 2. Build an extractor from the header's constants

function buildExtractor() {
  const defines = scanDefineConstants(CONFIG_HEADER);

  let extractor = createExtractor({
    onSkip: (skip) => console.warn(describeSkip(skip)),
    onDiagnostic: (diagnostic) => console.warn(`[${diagnostic.code}] ${diagnostic.message}`),
  });

  // Constants may refer to earlier ones, so resolve them in order.
  for (const [name, value] of Object.entries(defines)) {
    try {
      extractor = extractor.withSymbol(name, extractor.evaluate(value));
    } catch (err) {
      console.warn(`Skipping #define ${name}: ${formatExtractorError(err, value).summary}`);
    }
  }

  return extractor;
}

const extractor = buildExtractor();

// 3. Scan raw entries

function runScanEntries() {
  console.log('=== scanEntries() example ===');

  const entries = extractor.scanEntries(SPECIES_TABLE);
  const summary = summarizeEntries(entries);

  console.log('Keys:', Object.keys(entries).join(', '));
  console.log(`${summary.entryCount} entries, ${summary.fieldCount} fields`);
  console.log();

  const pebblit = entries.SPECIES_PEBBLIT;
  console.log('Types:', extractor.decodeMacroArguments(pebblit.types));
  console.log('Abilities:', extractor.decodeBraceList(pebblit.abilities));
  console.log('Description:', JSON.stringify(extractor.decodeString(pebblit.description)));
  console.log('Evolutions:');
  console.log(inspectEntryList(extractor.decodeEntryList(pebblit.evolutions)));
  console.log();
}

// 4. Assemble typed records

function runScanSpecies() {
  console.log('=== scanSpecies() example ===');

  const records = extractor.scanSpecies(SPECIES_TABLE);

  for (const [key, record] of Object.entries(records)) {
    console.log(`${key}: ${record.displayName} (${record.category})`);
    console.log('  base stats:', JSON.stringify(record.baseStats));
    console.log('  friendship:', record.friendship);
  }
  console.log();
}

// 5. CLI: allow evaluating an expression from the command line

function runWithCliExpression() {
  const [, , ...args] = process.argv;
  const cliExpression = args.join(' ');

  if (!cliExpression) {
    console.log('No CLI expression provided, skipping CLI example.\n');
    console.log(
      'You can try: npx tsx examples/basic-node/index.ts "P_UPDATED_STATS >= GEN_6 ? 65 : 60"',
    );
    console.log();
    return;
  }

  console.log('=== CLI expression example ===');
  console.log('Expression from CLI:', cliExpression);

  try {
    console.log('Result:', extractor.evaluate(cliExpression));
  } catch (err) {
    console.error(formatExtractorError(err, cliExpression).detail);
    process.exitCode = 1;
  }
  console.log();
}

// 6. Run the examples

function main() {
  console.log('### initex basic Node example ###');
  console.log();

  runScanEntries();
  runScanSpecies();
  runWithCliExpression();
}

main();
