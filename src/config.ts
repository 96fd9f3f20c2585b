/**
 * Configuration Loader for xpresso
 * Loads and validates .xpresso.yml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import { DEFAULT_MAX_LOOKAHEAD } from './lexer/index.js';
import { ConfigError } from './types.js';

// ============================================================
// TYPES
// ============================================================

export type OutputFormat = 'text' | 'json';

export interface XpressoConfig {
  readonly output: OutputFormat;
  readonly verbose: boolean;
  /** Bound on speculative lexer scans */
  readonly maxLookahead: number;
  /** Include whitespace and comments in verbose token dumps */
  readonly trivia: boolean;
}

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file names, in lookup order */
export const CONFIG_FILE_NAMES = ['.xpresso.yml', '.xpresso.yaml'] as const;

const KNOWN_KEYS: ReadonlySet<string> = new Set([
  'output',
  'verbose',
  'maxLookahead',
  'trivia',
]);

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

export function createDefaultConfig(): XpressoConfig {
  return {
    output: 'text',
    verbose: false,
    maxLookahead: DEFAULT_MAX_LOOKAHEAD,
    trivia: false,
  };
}

// ============================================================
// VALIDATION
// ============================================================

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'text' || value === 'json';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function readBoolean(data: Record<string, unknown>, key: string): boolean {
  const value = data[key];
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${key} must be true or false`, { key, value });
  }
  return value;
}

/**
 * Validate parsed YAML and merge it over the defaults.
 * An empty document yields the defaults.
 */
export function validateConfig(data: unknown): XpressoConfig {
  const defaults = createDefaultConfig();
  if (data === null || data === undefined) return defaults;
  if (!isRecord(data)) {
    throw new ConfigError('must be a mapping');
  }

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new ConfigError(`unknown key ${key}`, { key });
    }
  }

  let { output, verbose, maxLookahead, trivia } = defaults;

  if ('output' in data) {
    const value = data['output'];
    if (!isOutputFormat(value)) {
      throw new ConfigError(
        `output has invalid value "${String(value)}" (must be 'text' or 'json')`,
        { key: 'output', value }
      );
    }
    output = value;
  }
  if ('verbose' in data) verbose = readBoolean(data, 'verbose');
  if ('trivia' in data) trivia = readBoolean(data, 'trivia');
  if ('maxLookahead' in data) {
    const value = data['maxLookahead'];
    if (!isPositiveInteger(value)) {
      throw new ConfigError('maxLookahead must be a positive integer', {
        key: 'maxLookahead',
        value,
      });
    }
    maxLookahead = value;
  }

  return { output, verbose, maxLookahead, trivia };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/** Path of the first configuration file present in the directory */
export function findConfigFile(dir: string): string | undefined {
  for (const name of CONFIG_FILE_NAMES) {
    const path = join(dir, name);
    if (existsSync(path)) return path;
  }
  return undefined;
}

/**
 * Load configuration from .xpresso.yml (or .xpresso.yaml) in the directory.
 *
 * @returns The validated configuration, or the defaults when no file exists
 * @throws {ConfigError} When the file cannot be read, is not valid YAML,
 * or holds an unknown key or invalid value
 */
export function loadConfig(dir: string): XpressoConfig {
  const path = findConfigFile(dir);
  if (path === undefined) return createDefaultConfig();

  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `failed to read file (${err instanceof Error ? err.message : String(err)})`,
      { path }
    );
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (err) {
    throw new ConfigError(
      `invalid YAML (${err instanceof Error ? err.message : String(err)})`,
      { path }
    );
  }

  return validateConfig(parsed);
}
