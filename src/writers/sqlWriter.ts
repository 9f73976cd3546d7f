/**
 * Pokémon Card Extractor – SQL Writer
 *
 * PURPOSE:
 *   Writes the aggregated rows as a SQL script: a CREATE TABLE for pokemon_cards followed by one
 *   INSERT per row, listing all seven columns.
 *
 * IMPLEMENTATION DETAILS:
 *   - Every value is a single-quoted literal with embedded single quotes doubled.
 *   - All columns are VARCHAR; id is the primary key and name is NOT NULL.
 */

import path from 'path';

import { ROW_COLUMNS, type ExtractedRow } from '../models/Card';
import { logInfo, writeFileAtomic } from '../utils/jsonHelpers';

const TAG = '[sqlWriter]';

export const TABLE_NAME = 'pokemon_cards';

export const SQL_PREAMBLE = `-- Pokemon Cards Table Creation
CREATE TABLE IF NOT EXISTS ${TABLE_NAME} (
    id VARCHAR(50) PRIMARY KEY,
    name VARCHAR(100) NOT NULL,
    subtypes VARCHAR(100),
    level VARCHAR(10),
    hp VARCHAR(10),
    types VARCHAR(100),
    weaknesses VARCHAR(100)
);

-- Clear existing data (optional)
-- DELETE FROM ${TABLE_NAME};

-- Insert statements
`;

export function sqlLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function toInsertStatement(row: ExtractedRow): string {
  const values = ROW_COLUMNS.map((column) => sqlLiteral(row[column]));
  return (
    `INSERT INTO ${TABLE_NAME} (${ROW_COLUMNS.join(', ')})\n` +
    `VALUES (${values.slice(0, 3).join(', ')},\n` +
    `        ${values.slice(3).join(', ')});\n`
  );
}

export function toSql(rows: readonly ExtractedRow[]): string {
  return SQL_PREAMBLE + rows.map(toInsertStatement).join('');
}

/**
 * "cards.csv" -> "cards.sql"; a path without a .csv extension gets ".sql" appended.
 */
export function sqlPathFor(csvPath: string): string {
  return path.extname(csvPath) === '.csv' ? `${csvPath.slice(0, -'.csv'.length)}.sql` : `${csvPath}.sql`;
}

/**
 * Returns false (and writes nothing) when there are no rows.
 */
export async function writeToSql(rows: readonly ExtractedRow[], outputPath: string): Promise<boolean> {
  if (rows.length === 0) {
    logInfo(TAG, 'No data to write');
    return false;
  }

  await writeFileAtomic(outputPath, toSql(rows));
  logInfo(TAG, `Wrote ${rows.length} INSERT statements to ${outputPath}`);
  return true;
}
