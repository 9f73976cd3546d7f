/**
 * Pokémon Card Extractor – Winston Logger Setup
 *
 * PURPOSE:
 *   One timestamped logger for every module and script. Output goes to the terminal and,
 *   unless LOG_TO_FILE=false, to LOG_DIR/extract.log (project-root/logs by default).
 *
 * CONTEXT:
 *   - Used by the logInfo and logError helpers in jsonHelpers.ts.
 *   - The log directory is created on first import when the file transport is on.
 */

import winston from 'winston';
import path from 'path';
import fs from 'fs';

import { loadConfig } from '../config';

const { logLevel, logDir, logToFile } = loadConfig();

if (logToFile && !fs.existsSync(logDir)) {
  fs.mkdirSync(logDir, { recursive: true });
}

const consoleTransport = new winston.transports.Console();

export const logger = winston.createLogger({
  level: logLevel,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.printf(
      ({ timestamp, level, message }) => `[${timestamp}] ${level.toUpperCase()}: ${message}`
    )
  ),
  transports: logToFile
    ? [consoleTransport, new winston.transports.File({ filename: path.join(logDir, 'extract.log') })]
    : [consoleTransport],
});
