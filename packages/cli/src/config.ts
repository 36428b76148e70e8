/**
 * Configuration Loader for tally-parse
 * Loads and validates .tallyrc.json configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

// ============================================================
// TYPES
// ============================================================

export type OutputFormat = 'json' | 'yaml' | 'text';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'yaml', 'text'];

export interface ParseConfig {
  readonly caseSensitive: boolean;
  readonly format: OutputFormat;
}

/** Configuration file name */
export const CONFIG_FILE_NAME = '.tallyrc.json';

export function createDefaultConfig(): ParseConfig {
  return { caseSensitive: false, format: 'json' };
}

// ============================================================
// VALIDATION
// ============================================================

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'json' || value === 'yaml' || value === 'text';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate configuration structure and values.
 * Throws Error if configuration is invalid.
 */
function validateConfig(data: unknown): Partial<ParseConfig> {
  if (!isRecord(data)) {
    throw new Error('Invalid configuration: must be an object');
  }

  const config: { caseSensitive?: boolean; format?: OutputFormat } = {};

  for (const [key, value] of Object.entries(data)) {
    switch (key) {
      case 'caseSensitive':
        if (typeof value !== 'boolean') {
          throw new Error(
            'Invalid configuration: caseSensitive must be a boolean'
          );
        }
        config.caseSensitive = value;
        break;
      case 'format':
        if (!isOutputFormat(value)) {
          throw new Error(
            `Invalid configuration: format "${String(value)}" must be one of ${OUTPUT_FORMATS.join(', ')}`
          );
        }
        config.format = value;
        break;
      default:
        throw new Error(`Invalid configuration: unknown option ${key}`);
    }
  }

  return config;
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from .tallyrc.json in the specified directory.
 *
 * @param cwd - Directory to search for configuration file
 * @returns ParseConfig merged over defaults, or null if file not found
 * @throws Error with "Invalid configuration: {reason}" for unreadable,
 *   malformed or unknown settings
 */
export function loadConfig(cwd: string): ParseConfig | null {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    return null;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new Error(
      `Invalid configuration: failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  let parsedData: unknown;
  try {
    parsedData = JSON.parse(fileContent);
  } catch (err) {
    throw new Error(
      `Invalid configuration: invalid JSON (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return { ...createDefaultConfig(), ...validateConfig(parsedData) };
}
