/**
 * Source Validator
 * Runs every registered line check over a file and filters findings
 * through configuration and NOLINT suppressions.
 */

import { CleansedLines } from '../lexer/index.js';
import type {
  CheckConfig,
  Diagnostic,
  ErrorSink,
  LineCheck,
  Severity,
} from './types.js';
import { LINE_CHECKS } from './rules/index.js';
import {
  extractContextLine,
  isSuppressed,
  parseSuppressions,
} from './rules/helpers.js';

// ============================================================
// VALIDATION ORCHESTRATOR
// ============================================================

/**
 * Validate one file's text against all enabled checks.
 *
 * @param filename - Name reported in diagnostics
 * @param source - File contents
 * @param config - Configuration determining which categories are active
 * @param checks - Checks to run, the registered ones by default
 * @returns Diagnostics sorted by line number
 */
export function validateSource(
  filename: string,
  source: string,
  config: CheckConfig,
  checks: readonly LineCheck[] = LINE_CHECKS
): Diagnostic[] {
  const lines = new CleansedLines(source);
  const suppressions = parseSuppressions(lines.raw);
  const diagnostics: Diagnostic[] = [];

  for (const check of checks) {
    const report: ErrorSink = (
      file,
      lineNumber,
      category,
      confidence,
      message
    ) => {
      if (!isCategoryEnabled(category, config)) return;
      if (confidence < config.minConfidence) return;
      if (isSuppressed(suppressions, lineNumber, category)) return;

      diagnostics.push({
        filename: file,
        line: lineNumber,
        category,
        confidence,
        severity: resolveSeverity(category, check.severity, config),
        message,
        context: extractContextLine(lineNumber, lines.raw),
      });
    };

    for (let index = 0; index < lines.lineCount(); index++) {
      check.check(filename, lines, index, report);
    }
  }

  return sortDiagnostics(diagnostics);
}

// ============================================================
// HELPERS
// ============================================================

/**
 * Categories are enabled if state is 'on' or 'warn'.
 * Categories missing from the config are enabled.
 */
function isCategoryEnabled(category: string, config: CheckConfig): boolean {
  const state = config.rules[category];
  return state === undefined || state === 'on' || state === 'warn';
}

/**
 * 'warn' forces warning severity; otherwise the configured override wins
 * over the check's default.
 */
function resolveSeverity(
  category: string,
  fallback: Severity,
  config: CheckConfig
): Severity {
  if (config.rules[category] === 'warn') {
    return 'warning';
  }
  return config.severity[category] ?? fallback;
}

/**
 * Sort diagnostics by line number.
 * Stable sort preserves report order for diagnostics on the same line.
 */
function sortDiagnostics(diagnostics: Diagnostic[]): Diagnostic[] {
  return [...diagnostics].sort((a, b) => a.line - b.line);
}
