/**
 * Configuration Loader for loopcheck
 * Loads and validates .loopcheck.json / .loopcheck.yaml configuration files.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import type { CheckConfig, Confidence, RuleState, Severity } from './types.js';
import { CATEGORIES } from './rules/index.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file names, in lookup order */
const CONFIG_FILE_NAMES = [
  '.loopcheck.json',
  '.loopcheck.yaml',
  '.loopcheck.yml',
] as const;

/** Severity for categories without an override */
const DEFAULT_SEVERITY: Severity = 'warning';

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

/**
 * Create default configuration with every category enabled.
 */
export function createDefaultConfig(): CheckConfig {
  const rules: Record<string, RuleState> = {};
  const severity: Record<string, Severity> = {};

  for (const { category } of CATEGORIES) {
    rules[category] = 'on';
    severity[category] = DEFAULT_SEVERITY;
  }

  return { rules, severity, minConfidence: 1 };
}

// ============================================================
// VALIDATION
// ============================================================

function isRuleState(value: unknown): value is RuleState {
  return value === 'on' || value === 'off' || value === 'warn';
}

function isSeverity(value: unknown): value is Severity {
  return value === 'error' || value === 'warning' || value === 'info';
}

export function isConfidence(value: unknown): value is Confidence {
  return (
    value === 1 || value === 2 || value === 3 || value === 4 || value === 5
  );
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

interface PartialConfig {
  rules: Record<string, RuleState>;
  severity: Record<string, Severity>;
  minConfidence?: Confidence;
}

/**
 * Validate configuration structure and values.
 * Throws Error if configuration is invalid.
 */
function validateConfig(data: unknown): PartialConfig {
  if (!isPlainObject(data)) {
    throw new Error('Invalid configuration: must be an object');
  }

  const rules: Record<string, RuleState> = {};
  if ('rules' in data) {
    const rawRules = data['rules'];
    if (!isPlainObject(rawRules)) {
      throw new Error('Invalid configuration: rules must be an object');
    }
    for (const [category, state] of Object.entries(rawRules)) {
      if (!isRuleState(state)) {
        throw new Error(
          `Invalid configuration: rule ${category} has invalid state "${String(state)}" (must be 'on', 'off', or 'warn')`
        );
      }
      rules[category] = state;
    }
  }

  const severity: Record<string, Severity> = {};
  if ('severity' in data) {
    const rawSeverity = data['severity'];
    if (!isPlainObject(rawSeverity)) {
      throw new Error('Invalid configuration: severity must be an object');
    }
    for (const [category, sev] of Object.entries(rawSeverity)) {
      if (!isSeverity(sev)) {
        throw new Error(
          `Invalid configuration: rule ${category} has invalid severity "${String(sev)}" (must be 'error', 'warning', or 'info')`
        );
      }
      severity[category] = sev;
    }
  }

  if ('minConfidence' in data) {
    const minConfidence = data['minConfidence'];
    if (!isConfidence(minConfidence)) {
      throw new Error(
        'Invalid configuration: minConfidence must be an integer from 1 to 5'
      );
    }
    return { rules, severity, minConfidence };
  }

  return { rules, severity };
}

/**
 * Validate that all categories in config are known.
 * Throws Error if an unknown category is found.
 */
function validateCategories(config: CheckConfig): void {
  const known = new Set(CATEGORIES.map((c) => c.category));

  for (const category of Object.keys(config.rules)) {
    if (!known.has(category)) {
      throw new Error(`Invalid configuration: unknown rule ${category}`);
    }
  }

  for (const category of Object.keys(config.severity)) {
    if (!known.has(category)) {
      throw new Error(`Invalid configuration: unknown rule ${category}`);
    }
  }
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

function parseConfigText(fileName: string, content: string): unknown {
  if (fileName.endsWith('.json')) {
    try {
      return JSON.parse(content);
    } catch (err) {
      throw new Error(
        `Invalid configuration: invalid JSON (${err instanceof Error ? err.message : String(err)})`
      );
    }
  }

  try {
    return yaml.parse(content);
  } catch (err) {
    throw new Error(
      `Invalid configuration: invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }
}

/**
 * Load configuration from the first config file found in a directory.
 *
 * @param cwd - Directory to search for configuration file
 * @returns CheckConfig merged over the defaults, or null if no file exists
 * @throws Error with "Invalid configuration: {reason}" for unreadable or invalid files
 */
export function loadConfig(cwd: string): CheckConfig | null {
  const fileName = CONFIG_FILE_NAMES.find((name) =>
    existsSync(join(cwd, name))
  );
  if (!fileName) {
    return null;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(join(cwd, fileName), 'utf-8');
  } catch (err) {
    throw new Error(
      `Invalid configuration: failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  const parsed = validateConfig(parseConfigText(fileName, fileContent));
  const defaults = createDefaultConfig();

  const config: CheckConfig = {
    rules: { ...defaults.rules, ...parsed.rules },
    severity: { ...defaults.severity, ...parsed.severity },
    minConfidence: parsed.minConfidence ?? defaults.minConfidence,
  };

  validateCategories(config);

  return config;
}
