/**
 * Pokémon Card Extractor – Extract Rows From One JSON File
 *
 * PURPOSE:
 *   Reads one card dump (a JSON array of card records), keeps only Pokémon cards and maps each
 *   to an ExtractedRow, preserving source order.
 *
 * ERROR HANDLING:
 *   - Never throws for a bad input file. A missing file, bytes that are not UTF-8, invalid JSON,
 *     a non-array top level or any other read failure comes back as a failed ExtractResult and is logged with the file name.
 *   - The batch driver counts failures and moves on to the next file.
 */

import fs from 'fs';

import { type ExtractedRow, isPokemonCard, toExtractedRow } from '../models/Card';
import { errorMessage, isNodeError, logError } from '../utils/jsonHelpers';

const TAG = '[extractCards]';

// Invalid byte sequences throw instead of becoming U+FFFD
const utf8 = new TextDecoder('utf-8', { fatal: true });

export type ExtractFailureKind = 'missing-file' | 'invalid-json' | 'unexpected-shape' | 'unreadable';

export type ExtractResult =
  | { ok: true; file: string; rows: ExtractedRow[] }
  | { ok: false; file: string; kind: ExtractFailureKind; reason: string };

function failure(file: string, kind: ExtractFailureKind, reason: string): ExtractResult {
  logError(TAG, reason);
  return { ok: false, file, kind, reason };
}

/** Filters already-parsed card data down to Pokémon rows. */
export function extractRows(cards: readonly unknown[]): ExtractedRow[] {
  return cards.filter(isPokemonCard).map(toExtractedRow);
}

export async function extractPokemonCards(filePath: string): Promise<ExtractResult> {
  let bytes: Buffer;
  try {
    bytes = await fs.promises.readFile(filePath);
  } catch (err) {
    if (isNodeError(err) && err.code === 'ENOENT') {
      return failure(filePath, 'missing-file', `File ${filePath} not found`);
    }
    return failure(filePath, 'unreadable', `Error processing ${filePath}: ${errorMessage(err)}`);
  }

  let raw: string;
  try {
    raw = utf8.decode(bytes);
  } catch (err) {
    return failure(
      filePath,
      'unreadable',
      `Error processing ${filePath}: not valid UTF-8 (${errorMessage(err)})`
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    return failure(filePath, 'invalid-json', `Invalid JSON in file ${filePath}: ${errorMessage(err)}`);
  }

  if (!Array.isArray(data)) {
    return failure(
      filePath,
      'unexpected-shape',
      `Error processing ${filePath}: expected an array of card records`
    );
  }

  return { ok: true, file: filePath, rows: extractRows(data) };
}
