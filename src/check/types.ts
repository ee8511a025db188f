/**
 * Check Types
 * Type definitions for the loopcheck static analysis tool.
 */

import type { CleansedLines } from '../lexer/index.js';

// ============================================================
// SEVERITY AND RULE STATE
// ============================================================

/** Diagnostic severity levels */
export type Severity = 'error' | 'warning' | 'info';

/** Rule state configuration */
export type RuleState = 'on' | 'off' | 'warn';

/**
 * How likely a finding is to be a real defect, from 1 (guess) to 5 (certain).
 */
export type Confidence = 1 | 2 | 3 | 4 | 5;

// ============================================================
// DIAGNOSTIC DATA
// ============================================================

/**
 * Callback a check reports findings through.
 * lineNumber is 1-based.
 */
export type ErrorSink = (
  filename: string,
  lineNumber: number,
  category: string,
  confidence: Confidence,
  message: string
) => void;

/**
 * A single issue found during validation.
 */
export interface Diagnostic {
  /** File the issue was found in */
  readonly filename: string;
  /** 1-based line number */
  readonly line: number;
  /** Category tag (e.g., runtime/for_loop_condition) */
  readonly category: string;
  readonly confidence: Confidence;
  readonly severity: Severity;
  /** Human-readable description */
  readonly message: string;
  /** Source line containing the issue */
  readonly context: string;
}

// ============================================================
// CHECK CONFIGURATION
// ============================================================

/**
 * Configuration for check categories and severity overrides.
 */
export interface CheckConfig {
  /** Per-category enable/disable/warn state */
  readonly rules: Record<string, RuleState>;
  /** Severity overrides by category */
  readonly severity: Record<string, Severity>;
  /** Findings below this confidence are dropped */
  readonly minConfidence: Confidence;
}

// ============================================================
// LINE CHECKS
// ============================================================

/**
 * Description of one diagnostic category a check can report.
 */
export interface CategoryInfo {
  readonly category: string;
  readonly confidence: Confidence;
  readonly description: string;
}

/**
 * Line-oriented check.
 * Checks are stateless and never throw; findings go through the sink.
 */
export interface LineCheck {
  /** Unique check name (e.g., LOOP_CONDITION) */
  readonly name: string;

  /** Categories this check may report */
  readonly categories: readonly CategoryInfo[];

  /** Default severity for its findings */
  readonly severity: Severity;

  /**
   * Inspect one line, reporting zero or more findings.
   * Called once for each line index of the file.
   */
  check(
    filename: string,
    lines: CleansedLines,
    lineIndex: number,
    error: ErrorSink
  ): void;
}
