/**
 * Configuration Loader Tests
 * Tests for .loopcheck.json / .loopcheck.yaml loading and validation.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig, createDefaultConfig } from '../../src/check/index.js';

// ============================================================
// TEST FIXTURES
// ============================================================

const FOR_CATEGORY = 'runtime/for_loop_condition';
const WHILE_CATEGORY = 'runtime/while_loop_condition';

let testDir: string;

beforeEach(() => {
  testDir = mkdtempSync(join(tmpdir(), 'loopcheck-config-'));
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

function writeConfig(fileName: string, content: string): void {
  writeFileSync(join(testDir, fileName), content, 'utf-8');
}

function writeJsonConfig(config: unknown): void {
  writeConfig('.loopcheck.json', JSON.stringify(config, null, 2));
}

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

describe('createDefaultConfig', () => {
  it('enables every loop category at warning severity', () => {
    expect(createDefaultConfig()).toEqual({
      rules: { [FOR_CATEGORY]: 'on', [WHILE_CATEGORY]: 'on' },
      severity: { [FOR_CATEGORY]: 'warning', [WHILE_CATEGORY]: 'warning' },
      minConfidence: 1,
    });
  });
});

// ============================================================
// FILE LOOKUP
// ============================================================

describe('loadConfig - file lookup', () => {
  it('returns null when no config file exists', () => {
    expect(loadConfig(testDir)).toBeNull();
  });

  it('returns null for a non-existent directory', () => {
    expect(loadConfig(join(testDir, 'missing'))).toBeNull();
  });

  it('merges JSON configuration over the defaults', () => {
    writeJsonConfig({ rules: { [FOR_CATEGORY]: 'off' } });

    expect(loadConfig(testDir)).toEqual({
      rules: { [FOR_CATEGORY]: 'off', [WHILE_CATEGORY]: 'on' },
      severity: { [FOR_CATEGORY]: 'warning', [WHILE_CATEGORY]: 'warning' },
      minConfidence: 1,
    });
  });

  it('loads YAML configuration', () => {
    writeConfig(
      '.loopcheck.yaml',
      `minConfidence: 3\nseverity:\n  ${WHILE_CATEGORY}: error\n`
    );

    const config = loadConfig(testDir);
    expect(config?.minConfidence).toBe(3);
    expect(config?.severity[WHILE_CATEGORY]).toBe('error');
    expect(config?.severity[FOR_CATEGORY]).toBe('warning');
  });

  it('loads .yml configuration', () => {
    writeConfig('.loopcheck.yml', `rules:\n  ${WHILE_CATEGORY}: warn\n`);
    expect(loadConfig(testDir)?.rules[WHILE_CATEGORY]).toBe('warn');
  });

  it('prefers JSON over YAML', () => {
    writeJsonConfig({ minConfidence: 2 });
    writeConfig('.loopcheck.yaml', 'minConfidence: 4\n');
    expect(loadConfig(testDir)?.minConfidence).toBe(2);
  });
});

// ============================================================
// INVALID CONFIGURATION
// ============================================================

describe('loadConfig - invalid configuration', () => {
  it('rejects invalid JSON', () => {
    writeConfig('.loopcheck.json', '{ "rules": ');
    expect(() => loadConfig(testDir)).toThrow(
      /^Invalid configuration: invalid JSON/
    );
  });

  it('rejects invalid YAML', () => {
    writeConfig('.loopcheck.yaml', 'rules: {on');
    expect(() => loadConfig(testDir)).toThrow(
      /^Invalid configuration: invalid YAML/
    );
  });

  it('rejects a non-object configuration', () => {
    writeJsonConfig([1, 2]);
    expect(() => loadConfig(testDir)).toThrow(
      'Invalid configuration: must be an object'
    );
  });

  it('rejects non-object rules', () => {
    writeJsonConfig({ rules: ['on'] });
    expect(() => loadConfig(testDir)).toThrow(
      'Invalid configuration: rules must be an object'
    );
  });

  it('rejects an invalid rule state', () => {
    writeJsonConfig({ rules: { [FOR_CATEGORY]: 'maybe' } });
    expect(() => loadConfig(testDir)).toThrow(
      `Invalid configuration: rule ${FOR_CATEGORY} has invalid state "maybe" (must be 'on', 'off', or 'warn')`
    );
  });

  it('rejects non-object severity', () => {
    writeJsonConfig({ severity: 'error' });
    expect(() => loadConfig(testDir)).toThrow(
      'Invalid configuration: severity must be an object'
    );
  });

  it('rejects an invalid severity', () => {
    writeJsonConfig({ severity: { [WHILE_CATEGORY]: 'fatal' } });
    expect(() => loadConfig(testDir)).toThrow(
      `Invalid configuration: rule ${WHILE_CATEGORY} has invalid severity "fatal" (must be 'error', 'warning', or 'info')`
    );
  });

  it('rejects an unknown category', () => {
    writeJsonConfig({ rules: { 'runtime/unknown': 'on' } });
    expect(() => loadConfig(testDir)).toThrow(
      'Invalid configuration: unknown rule runtime/unknown'
    );
  });

  it('rejects an out-of-range minConfidence', () => {
    writeJsonConfig({ minConfidence: 7 });
    expect(() => loadConfig(testDir)).toThrow(
      'Invalid configuration: minConfidence must be an integer from 1 to 5'
    );
  });
});
