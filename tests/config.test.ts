/**
 * Configuration Loader Tests
 * Tests for .xpresso.yml loading and validation.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  createDefaultConfig,
  findConfigFile,
  loadConfig,
  validateConfig,
} from '../src/config.js';
import { ConfigError } from '../src/index.js';

// ============================================================
// TEST FIXTURES
// ============================================================

let dir: string;

function writeConfig(content: string, name = '.xpresso.yml'): void {
  writeFileSync(join(dir, name), content, 'utf-8');
}

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'xpresso-config-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

// ============================================================
// DEFAULTS
// ============================================================

describe('createDefaultConfig', () => {
  it('uses text output and the default lookahead', () => {
    expect(createDefaultConfig()).toEqual({
      output: 'text',
      verbose: false,
      maxLookahead: 64,
      trivia: false,
    });
  });
});

// ============================================================
// LOADING
// ============================================================

describe('loadConfig', () => {
  it('returns the defaults when no file exists', () => {
    expect(loadConfig(dir)).toEqual(createDefaultConfig());
  });

  it('merges file values over the defaults', () => {
    writeConfig('output: json\nmaxLookahead: 8\n');

    expect(loadConfig(dir)).toEqual({
      output: 'json',
      verbose: false,
      maxLookahead: 8,
      trivia: false,
    });
  });

  it('returns the defaults for an empty file', () => {
    writeConfig('');

    expect(loadConfig(dir)).toEqual(createDefaultConfig());
  });

  it('falls back to .xpresso.yaml', () => {
    writeConfig('verbose: true\n', '.xpresso.yaml');

    expect(findConfigFile(dir)).toBe(join(dir, '.xpresso.yaml'));
    expect(loadConfig(dir).verbose).toBe(true);
  });

  it('prefers .xpresso.yml when both exist', () => {
    writeConfig('trivia: true\n');
    writeConfig('trivia: false\n', '.xpresso.yaml');

    expect(loadConfig(dir).trivia).toBe(true);
  });

  it('rejects malformed YAML', () => {
    writeConfig('output: [\n');

    expect(() => loadConfig(dir)).toThrow(ConfigError);
    expect(() => loadConfig(dir)).toThrow(
      /^Invalid configuration: invalid YAML \(/
    );
  });
});

// ============================================================
// VALIDATION
// ============================================================

describe('validateConfig', () => {
  it('rejects a document that is not a mapping', () => {
    expect(() => validateConfig(['a'])).toThrow(
      'Invalid configuration: must be a mapping'
    );
  });

  it('rejects unknown keys', () => {
    expect(() => validateConfig({ colour: 'red' })).toThrow(
      'Invalid configuration: unknown key colour'
    );
  });

  it('rejects an unsupported output format', () => {
    expect(() => validateConfig({ output: 'xml' })).toThrow(
      `Invalid configuration: output has invalid value "xml" (must be 'text' or 'json')`
    );
  });

  it('rejects non-boolean flags', () => {
    expect(() => validateConfig({ verbose: 'yes' })).toThrow(
      'Invalid configuration: verbose must be true or false'
    );
  });

  it.each([0, -3, 2.5, '10'])('rejects maxLookahead %s', (value) => {
    expect(() => validateConfig({ maxLookahead: value })).toThrow(
      'Invalid configuration: maxLookahead must be a positive integer'
    );
  });

  it('carries the offending key in the error context', () => {
    try {
      validateConfig({ trivia: 1 });
      expect.unreachable('validateConfig should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.context).toEqual({ key: 'trivia', value: 1 });
      }
    }
  });
});
