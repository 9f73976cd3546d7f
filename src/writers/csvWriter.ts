/**
 * Pokémon Card Extractor – CSV Writer
 *
 * Writes the aggregated rows as CSV: one header line (id, name, subtypes, level, hp, types,
 * weaknesses) then one line per row. papaparse handles quoting: fields containing a comma,
 * a double quote or a line break are quoted and embedded quotes are doubled.
 * Every line, including the last, ends with CRLF.
 */

import papaparsePkg from 'papaparse';

import { ROW_COLUMNS, type ExtractedRow } from '../models/Card';
import { logInfo, writeFileAtomic } from '../utils/jsonHelpers';

const { unparse } = papaparsePkg;

const TAG = '[csvWriter]';
const NEWLINE = '\r\n';

export function toCsv(rows: readonly ExtractedRow[]): string {
  const body = unparse([...rows], {
    columns: [...ROW_COLUMNS],
    header: true,
    newline: NEWLINE,
  });
  return body + NEWLINE;
}

/**
 * Returns false (and writes nothing) when there are no rows.
 */
export async function writeToCsv(rows: readonly ExtractedRow[], outputPath: string): Promise<boolean> {
  if (rows.length === 0) {
    logInfo(TAG, 'No data to write');
    return false;
  }

  await writeFileAtomic(outputPath, toCsv(rows));
  logInfo(TAG, `Wrote ${rows.length} rows to ${outputPath}`);
  return true;
}
