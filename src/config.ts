/**
 * Application Configuration
 *
 * Centralizes all environment variable access for the checklist printer.
 * Every variable is optional; a .env file in the working directory is loaded
 * first if present.
 *
 * Environment variables:
 * - CHECKLIST_INPUT: Path of the XML checklist (default checklist_categorized.xml)
 * - CHECKLIST_OUTPUT: Path of the generated PDF (default printable_checklist_categorized.pdf)
 * - CHECKLIST_SCHEMA: 'elements' (title/columns child elements) or 'attributes'
 *   (title root attribute, column count fixed externally). Default 'elements'
 * - CHECKLIST_COLUMNS: Fixed column count, positive integer (optional)
 * - LOG_LEVEL: debug | info | warn | error (default info)
 */

import 'dotenv/config';

import { CHECKLIST_SCHEMAS, isChecklistSchema } from './checklist/types/index.js';
import type { ChecklistSchema } from './checklist/types/index.js';
import { parsePositiveInt } from './checklist/utils/numbers.js';
import { ConfigError } from './errors.js';
import { LOG_LEVELS, isLogLevel } from './logger.js';
import type { LogLevel } from './logger.js';

export interface AppConfig {
  /** XML checklist to read */
  inputPath: string;
  /** PDF file to write */
  outputPath: string;
  /** Which XML layout the loader expects */
  schema: ChecklistSchema;
  /** Column count fixed outside the document, if any */
  fixedColumnCount: number | undefined;
  logLevel: LogLevel;
}

export type Env = Record<string, string | undefined>;

export const DEFAULT_INPUT_PATH = 'checklist_categorized.xml';
export const DEFAULT_OUTPUT_PATH = 'printable_checklist_categorized.pdf';

function optionalEnv(env: Env, key: string, fallback = ''): string {
  const value = env[key]?.trim();
  return value ? value : fallback;
}

/**
 * Builds the application config from an environment map.
 *
 * @throws ConfigError with code INVALID_ENV naming the variable at fault
 */
export function buildAppConfig(env: Env = process.env): AppConfig {
  const schema = optionalEnv(env, 'CHECKLIST_SCHEMA', 'elements');
  if (!isChecklistSchema(schema)) {
    throw new ConfigError(
      'INVALID_ENV',
      `CHECKLIST_SCHEMA must be one of ${CHECKLIST_SCHEMAS.join(', ')} (got '${schema}')`,
    );
  }

  const logLevel = optionalEnv(env, 'LOG_LEVEL', 'info').toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(
      'INVALID_ENV',
      `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')} (got '${logLevel}')`,
    );
  }

  const rawColumns = optionalEnv(env, 'CHECKLIST_COLUMNS');
  let fixedColumnCount: number | undefined;
  if (rawColumns) {
    const parsed = parsePositiveInt(rawColumns);
    if (parsed === null) {
      throw new ConfigError(
        'INVALID_ENV',
        `CHECKLIST_COLUMNS must be a positive integer (got '${rawColumns}')`,
      );
    }
    fixedColumnCount = parsed;
  }

  return {
    inputPath: optionalEnv(env, 'CHECKLIST_INPUT', DEFAULT_INPUT_PATH),
    outputPath: optionalEnv(env, 'CHECKLIST_OUTPUT', DEFAULT_OUTPUT_PATH),
    schema,
    fixedColumnCount,
    logLevel,
  };
}
