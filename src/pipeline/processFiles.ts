/**
 * Pokémon Card Extractor – Batch Driver
 *
 * PURPOSE:
 *   Runs the extractor over every *.json file in a directory (or over a single file), collects
 *   the rows in order, and writes them to a CSV file and a sibling .sql file.
 *
 * CONTEXT:
 *   - Files are processed one at a time, sorted by name, so the same input directory always
 *     produces byte-identical output.
 *   - A file that fails to extract contributes no rows; the batch carries on.
 *   - Write failures (e.g. an unwritable output path) are not caught here and end the run.
 */

import fs from 'fs';
import path from 'path';

import { DEFAULT_SINGLE_CSV } from '../config';
import { extractPokemonCards } from '../extract/extractCards';
import type { ExtractedRow } from '../models/Card';
import { isNodeError, logInfo } from '../utils/jsonHelpers';
import { writeToCsv } from '../writers/csvWriter';
import { sqlPathFor, writeToSql } from '../writers/sqlWriter';

const TAG = '[processFiles]';

export interface BatchSummary {
  filesFound: number;
  filesFailed: number;
  rowCount: number;
  csvPath?: string;
  sqlPath?: string;
}

export interface WrittenOutputs {
  csvPath?: string;
  sqlPath?: string;
}

/**
 * Non-recursive list of files (or symlinks) ending in ".json", sorted by name.
 * A path that does not exist or is not a directory yields an empty list.
 * A link that turns out not to point at a readable file fails later, in the extractor.
 */
export async function findJsonFiles(inputDir: string): Promise<string[]> {
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(inputDir, { withFileTypes: true });
  } catch (err) {
    if (isNodeError(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) return [];
    throw err;
  }

  return entries
    .filter((entry) => (entry.isFile() || entry.isSymbolicLink()) && path.extname(entry.name) === '.json')
    .map((entry) => entry.name)
    .sort()
    .map((name) => path.join(inputDir, name));
}

/**
 * Writes both outputs for the collected rows. Each writer skips the write when rows is empty.
 */
export async function writeOutputs(rows: readonly ExtractedRow[], outputCsv: string): Promise<WrittenOutputs> {
  const sqlPath = sqlPathFor(outputCsv);
  const csvWritten = await writeToCsv(rows, outputCsv);
  const sqlWritten = await writeToSql(rows, sqlPath);
  return {
    csvPath: csvWritten ? outputCsv : undefined,
    sqlPath: sqlWritten ? sqlPath : undefined,
  };
}

export async function processMultipleJsonFiles(inputDir: string, outputCsv: string): Promise<BatchSummary> {
  const jsonFiles = await findJsonFiles(inputDir);

  if (jsonFiles.length === 0) {
    logInfo(TAG, `No JSON files found in ${inputDir}`);
    return { filesFound: 0, filesFailed: 0, rowCount: 0 };
  }

  logInfo(TAG, `Found ${jsonFiles.length} JSON files to process`);

  let allRows: ExtractedRow[] = [];
  let filesFailed = 0;

  for (const jsonFile of jsonFiles) {
    logInfo(TAG, `Processing: ${path.basename(jsonFile)}`);
    const result = await extractPokemonCards(jsonFile);
    if (result.ok) {
      allRows = allRows.concat(result.rows);
    } else {
      filesFailed++;
    }
  }

  const written = await writeOutputs(allRows, outputCsv);

  logInfo(TAG, `Extracted ${allRows.length} Pokemon cards`);
  if (written.csvPath && written.sqlPath) {
    logInfo(TAG, `Data written to ${written.csvPath} and ${written.sqlPath}`);
  }
  if (filesFailed > 0) {
    logInfo(TAG, `${filesFailed} of ${jsonFiles.length} files failed`);
  }

  return { filesFound: jsonFiles.length, filesFailed, rowCount: allRows.length, ...written };
}

export async function processSingleFile(
  jsonFilePath: string,
  outputCsv: string = DEFAULT_SINGLE_CSV
): Promise<BatchSummary> {
  const result = await extractPokemonCards(jsonFilePath);
  const rows = result.ok ? result.rows : [];

  const written = await writeOutputs(rows, outputCsv);
  logInfo(TAG, `Processed ${rows.length} Pokemon cards from ${jsonFilePath}`);

  return { filesFound: 1, filesFailed: result.ok ? 0 : 1, rowCount: rows.length, ...written };
}
