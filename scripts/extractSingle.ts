#!/usr/bin/env node
/**
 * Pokémon Card Extractor – Single File Runner
 *
 * Usage:
 *   ts-node scripts/extractSingle.ts <inputFile> [outputCsv]
 *   Example: ts-node scripts/extractSingle.ts base1.json pokemon_data.csv
 *
 * The output CSV defaults to CARD_SINGLE_CSV, then "pokemon_data.csv"; the .sql file is written
 * next to it.
 */

import { loadConfig } from '../src/config';
import { processSingleFile } from '../src/pipeline/processFiles';
import { failRun, logError } from '../src/utils/jsonHelpers';

async function main() {
  const [inputFile, outputCsv = loadConfig().singleOutputCsv] = process.argv.slice(2);

  if (!inputFile) {
    logError('[extractSingle.ts]', 'Usage: extractSingle <inputFile> [outputCsv]');
    process.exitCode = 1;
    return;
  }

  await processSingleFile(inputFile, outputCsv);
}

main().catch((err) => failRun('[extractSingle.ts]', err));
