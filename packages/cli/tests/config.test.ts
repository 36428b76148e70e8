/**
 * Configuration Loader Tests
 * Tests for .tallyrc.json loading and validation.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  loadConfig,
} from '../src/config.js';

// ============================================================
// TEST FIXTURES
// ============================================================

let testDir: string;

function writeConfig(content: string): void {
  writeFileSync(join(testDir, CONFIG_FILE_NAME), content, 'utf-8');
}

beforeEach(() => {
  testDir = mkdtempSync(join(tmpdir(), 'tally-config-'));
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

// ============================================================
// LOADING
// ============================================================

describe('loadConfig', () => {
  it('returns null when no configuration file exists', () => {
    expect(loadConfig(testDir)).toBeNull();
  });

  it('merges the file over the defaults', () => {
    writeConfig(JSON.stringify({ format: 'yaml' }));
    expect(loadConfig(testDir)).toEqual({
      caseSensitive: false,
      format: 'yaml',
    });
  });

  it('reads every option', () => {
    writeConfig(JSON.stringify({ caseSensitive: true, format: 'text' }));
    expect(loadConfig(testDir)).toEqual({
      caseSensitive: true,
      format: 'text',
    });
  });

  it('defaults to json output, case-insensitive', () => {
    expect(createDefaultConfig()).toEqual({
      caseSensitive: false,
      format: 'json',
    });
  });
});

// ============================================================
// VALIDATION
// ============================================================

describe('loadConfig validation', () => {
  it('rejects malformed JSON', () => {
    writeConfig('{ format: ');
    expect(() => loadConfig(testDir)).toThrowError(
      /^Invalid configuration: invalid JSON/
    );
  });

  it('rejects a non-object document', () => {
    writeConfig('[]');
    expect(() => loadConfig(testDir)).toThrowError(
      'Invalid configuration: must be an object'
    );
  });

  it('rejects an unknown format', () => {
    writeConfig(JSON.stringify({ format: 'xml' }));
    expect(() => loadConfig(testDir)).toThrowError(
      'Invalid configuration: format "xml" must be one of json, yaml, text'
    );
  });

  it('rejects a non-boolean caseSensitive', () => {
    writeConfig(JSON.stringify({ caseSensitive: 'yes' }));
    expect(() => loadConfig(testDir)).toThrowError(
      'Invalid configuration: caseSensitive must be a boolean'
    );
  });

  it('rejects unknown options', () => {
    writeConfig(JSON.stringify({ verbose: true }));
    expect(() => loadConfig(testDir)).toThrowError(
      'Invalid configuration: unknown option verbose'
    );
  });
});
