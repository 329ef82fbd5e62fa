/**
 * initex/benchmarks/extraction-bench.ts
 *
 * Micro-benchmark over the shared extraction cases. Each case is checked
 * against its expected result once, then timed.
 *
 * How to run:
 *   npm run bench
 */

import { isDeepStrictEqual } from 'node:util';
import { performance } from 'node:perf_hooks';

import { createExtractor, formatExtractorError } from '../src';
import type { Extractor } from '../src';
import { DEFAULT_CASE_SYMBOLS, EXTRACTION_CASES } from './extraction-cases';
import type { ExtractionCase } from './extraction-cases';

type ResultRow = {
  name: string;
  iterations: number;
  totalMs: number;
  perOpUs: number;
};

const DEFAULT_ITERATIONS = 10_000;
const WARMUP_ITERATIONS = 1_000;

// Keeps results alive so the loops are not optimized away.
let sink = 0;

function runCase(extractor: Extractor, testCase: ExtractionCase): unknown {
  switch (testCase.operation) {
    case 'evaluate':
      return extractor.evaluate(testCase.source);
    case 'entries':
      return extractor.scanEntries(testCase.source);
    case 'species':
      return extractor.scanSpecies(testCase.source);
    case 'entryList':
      return extractor.decodeEntryList(testCase.source);
  }
}

function formatNumber(n: number): string {
  return n.toLocaleString(undefined, { maximumFractionDigits: 2 });
}

function pad(text: string, width: number): string {
  return text.length >= width ? text : text + ' '.repeat(width - text.length);
}

function runBenchmark(): void {
  console.log('=== initex extraction benchmark ===');
  console.log();

  const extractor = createExtractor({ symbols: DEFAULT_CASE_SYMBOLS });
  const results: ResultRow[] = [];

  for (const testCase of EXTRACTION_CASES) {
    const iterations = testCase.iterations ?? DEFAULT_ITERATIONS;

    let result: unknown;
    try {
      result = runCase(extractor, testCase);
    } catch (err) {
      console.error(`[${testCase.name}] ${formatExtractorError(err, testCase.source).detail}`);
      process.exitCode = 1;
      continue;
    }

    if (!isDeepStrictEqual(JSON.parse(JSON.stringify(result)), testCase.expected)) {
      console.error(`[${testCase.name}] unexpected result: ${JSON.stringify(result)}`);
      process.exitCode = 1;
      continue;
    }

    for (let i = 0; i < WARMUP_ITERATIONS; i++) {
      sink ^= runCase(extractor, testCase) === undefined ? 0 : 1;
    }

    const start = performance.now();
    for (let i = 0; i < iterations; i++) {
      sink ^= runCase(extractor, testCase) === undefined ? 0 : 1;
    }
    const totalMs = performance.now() - start;

    results.push({
      name: testCase.name,
      iterations,
      totalMs,
      perOpUs: (totalMs * 1000) / iterations,
    });
  }

  console.log('Ignore (sink):', sink);
  console.log();
  printSummary(results);
}

function printSummary(rows: ResultRow[]): void {
  console.log('=== Summary (lower is better) ===');
  console.log();

  console.log([pad('Case', 32), pad('Iterations', 12), pad('Total ms', 12), pad('µs / op', 10)].join(' | '));
  console.log(['-'.repeat(32), '-'.repeat(12), '-'.repeat(12), '-'.repeat(10)].join('-|-'));

  for (const row of rows) {
    console.log(
      [
        pad(row.name, 32),
        pad(formatNumber(row.iterations), 12),
        pad(formatNumber(row.totalMs), 12),
        pad(formatNumber(row.perOpUs), 10),
      ].join(' | '),
    );
  }
}

runBenchmark();
