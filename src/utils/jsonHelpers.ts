/**
 * Pokémon Card Extractor – Shared Logging & Filesystem Helpers
 *
 * PURPOSE:
 *   Reusable utilities for tagged logging and file output, so the extractor, writers and
 *   scripts stay focused on card data.
 *
 * CONTEXT:
 *   - Every log line carries a tag naming the module or script that wrote it.
 *   - Output files are written all-or-nothing: content goes to a sibling temp file first and
 *     is renamed over the target only once fully written.
 */

import fs from 'fs';
import path from 'path';

import { logger } from './logger';

/**
 * Logs an info-level message with a context tag (module/script name).
 * Example: logInfo('[processFiles]', 'Found 3 JSON files to process')
 */
export function logInfo(tag: string, message: string) {
  logger.info(`${tag} ${message}`);
}

/**
 * Logs an error-level message with a context tag (module/script name).
 * Example: logError('[extractCards]', 'Invalid JSON in file base1.json')
 */
export function logError(tag: string, message: string) {
  logger.error(`${tag} ${message}`);
}

/**
 * Ensures the specified directory exists; creates it recursively if missing.
 */
export async function ensureDirExists(dirPath: string): Promise<void> {
  if (!fs.existsSync(dirPath)) {
    await fs.promises.mkdir(dirPath, { recursive: true });
    logInfo('[helper]', `Created missing directory: ${dirPath}`);
  }
}

/**
 * Writes `content` to `filePath` as UTF-8, replacing any existing file.
 * A failed write removes the temp file and rethrows; the target is left untouched.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  await ensureDirExists(path.dirname(path.resolve(filePath)));

  const tempPath = `${filePath}.${process.pid}.tmp`;
  try {
    await fs.promises.writeFile(tempPath, content, 'utf-8');
    await fs.promises.rename(tempPath, filePath);
  } catch (err) {
    if (fs.existsSync(tempPath)) await fs.promises.rm(tempPath);
    throw err;
  }
}

/**
 * Top-level failure handler for the CLI scripts. Sets the exit code rather than calling
 * process.exit so the file transport can flush the error line first.
 */
export function failRun(tag: string, err: unknown) {
  logError(tag, `Extraction failed: ${errorMessage(err)}`);
  process.exitCode = 1;
}

/**
 * Narrows a thrown value to a Node system error carrying an errno `code`.
 */
export function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/**
 * Extracts a printable message from anything thrown.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
