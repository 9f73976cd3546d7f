/**
 * Pokémon Card Extractor – Configuration
 *
 * PURPOSE:
 *   Resolves the default input/output paths and logging settings from the environment.
 *   A `.env` file at the project root is loaded with dotenv before anything reads process.env.
 *
 * CONTEXT:
 *   - CLI arguments always win over these values (see scripts/extractAll.ts).
 *   - loadConfig() takes the env as a parameter so tests can pass a plain object.
 */

import path from 'path';
import dotenv from 'dotenv';

dotenv.config();

export interface ExtractorConfig {
  inputDir: string;
  outputCsv: string;
  singleOutputCsv: string;
  logLevel: string;
  logDir: string;
  logToFile: boolean;
}

export const DEFAULT_INPUT_DIR = '.';
export const DEFAULT_BATCH_CSV = 'all_pokemon_data.csv';
export const DEFAULT_SINGLE_CSV = 'pokemon_data.csv';

const DEFAULT_LOG_DIR = path.join(__dirname, '../logs');

// Unset or blank values fall back to the default
function pick(value: string | undefined, fallback: string): string {
  return value && value.trim() !== '' ? value.trim() : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ExtractorConfig {
  return {
    inputDir: pick(env.CARD_INPUT_DIR, DEFAULT_INPUT_DIR),
    outputCsv: pick(env.CARD_OUTPUT_CSV, DEFAULT_BATCH_CSV),
    singleOutputCsv: pick(env.CARD_SINGLE_CSV, DEFAULT_SINGLE_CSV),
    logLevel: pick(env.LOG_LEVEL, 'info'),
    logDir: pick(env.LOG_DIR, DEFAULT_LOG_DIR),
    logToFile: pick(env.LOG_TO_FILE, 'true').toLowerCase() !== 'false',
  };
}
