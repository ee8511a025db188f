/**
 * Shared Helper Functions
 * Common utilities used across line checks.
 */

import { search } from '../../lexer/index.js';

/**
 * Extract raw line for context display (1-indexed), trimmed.
 */
export function extractContextLine(
  line: number,
  rawLines: readonly string[]
): string {
  const sourceLine = rawLines[line - 1];
  return sourceLine ? sourceLine.trim() : '';
}

// ============================================================
// NOLINT SUPPRESSIONS
// ============================================================

/** Wildcard that suppresses every category on a line */
const ALL_CATEGORIES = '*';

/**
 * Suppressed categories keyed by 1-based line number.
 */
export type Suppressions = ReadonlyMap<number, ReadonlySet<string>>;

/**
 * Collect NOLINT and NOLINTNEXTLINE markers from raw source lines.
 *
 * `// NOLINT` suppresses everything on its line, `// NOLINT(category)`
 * only that category. NOLINTNEXTLINE applies to the following line.
 */
export function parseSuppressions(rawLines: readonly string[]): Suppressions {
  const suppressions = new Map<number, Set<string>>();

  rawLines.forEach((raw, index) => {
    const marker = search('//.*\\bNOLINT(NEXTLINE)?\\b(\\(([^)]+)\\))?', raw);
    if (!marker) {
      return;
    }

    const lineNumber = marker[1] ? index + 2 : index + 1;
    const categories = marker[3]
      ? marker[3].split(',').map((c) => c.trim())
      : [ALL_CATEGORIES];

    const existing = suppressions.get(lineNumber) ?? new Set<string>();
    for (const category of categories) {
      existing.add(category);
    }
    suppressions.set(lineNumber, existing);
  });

  return suppressions;
}

/**
 * Check whether a category is suppressed on a line.
 */
export function isSuppressed(
  suppressions: Suppressions,
  lineNumber: number,
  category: string
): boolean {
  const categories = suppressions.get(lineNumber);
  if (!categories) {
    return false;
  }
  return categories.has(ALL_CATEGORIES) || categories.has(category);
}
