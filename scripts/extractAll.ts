#!/usr/bin/env node
/**
 * Pokémon Card Extractor – Batch Runner
 *
 * PURPOSE:
 *   Extracts Pokémon cards from every *.json card dump in a directory and writes the combined
 *   result to a CSV file plus a matching .sql file.
 *
 * USAGE:
 *   ts-node scripts/extractAll.ts [inputDir] [outputCsv]
 *   Example: ts-node scripts/extractAll.ts ./cards all_pokemon_data.csv
 *
 *   Missing arguments fall back to CARD_INPUT_DIR / CARD_OUTPUT_CSV (see src/config.ts),
 *   then to "." and "all_pokemon_data.csv".
 *
 * EXIT CODES:
 *   0 on success, including runs that found nothing to extract; 1 if writing the output failed.
 */

import { loadConfig } from '../src/config';
import { processMultipleJsonFiles } from '../src/pipeline/processFiles';
import { failRun } from '../src/utils/jsonHelpers';

async function main() {
  const config = loadConfig();
  const [inputDir = config.inputDir, outputCsv = config.outputCsv] = process.argv.slice(2);

  await processMultipleJsonFiles(inputDir, outputCsv);
}

main().catch((err) => failRun('[extractAll.ts]', err));
