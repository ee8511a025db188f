/**
 * Loop Condition Rules
 * Flags arithmetic and shift operators in for/while conditions, which
 * usually stand in for a missing comparison (`i + 10` for `i < 10`).
 */

import type { LineCheck, CategoryInfo, ErrorSink } from '../types.js';
import { closeExpression, match, type LineSource } from '../../lexer/index.js';

// ============================================================
// CATEGORIES
// ============================================================

export const FOR_LOOP_CONDITION: CategoryInfo = {
  category: 'runtime/for_loop_condition',
  confidence: 5,
  description: 'Arithmetic or shift operator in the condition of a for loop',
};

export const WHILE_LOOP_CONDITION: CategoryInfo = {
  category: 'runtime/while_loop_condition',
  confidence: 5,
  description: 'Arithmetic or shift operator in the condition of a while loop',
};

// ============================================================
// HEURISTICS
// ============================================================

export const SUSPICIOUS_OPERATORS = [
  '+',
  '-',
  '*',
  '/',
  '%',
  '<<',
  '>>',
] as const;

function containsSuspiciousOperator(text: string): boolean {
  return SUSPICIOUS_OPERATORS.some((op) => text.includes(op));
}

/**
 * Check the middle clause of a `for (init; cond; step)` header.
 * Headers with fewer than two clauses are never flagged.
 */
export function hasSuspiciousForCondition(statement: string): boolean {
  const clauses = statement.split(';');
  const condition = clauses[1];
  return condition !== undefined && containsSuspiciousOperator(condition);
}

export function hasSuspiciousWhileCondition(condition: string): boolean {
  return containsSuspiciousOperator(condition);
}

// ============================================================
// CHECKER
// ============================================================

/**
 * Text strictly between an opener and the close that precedes endPos.
 * Pieces from different lines are joined with '\n'.
 */
function spanText(
  lines: LineSource,
  startIndex: number,
  startPos: number,
  endIndex: number,
  endPos: number
): string {
  if (startIndex === endIndex) {
    return (lines.elided[startIndex] ?? '').slice(startPos + 1, endPos - 1);
  }

  const pieces = [(lines.elided[startIndex] ?? '').slice(startPos + 1)];
  for (let i = startIndex + 1; i < endIndex; i++) {
    pieces.push(lines.elided[i] ?? '');
  }
  pieces.push((lines.elided[endIndex] ?? '').slice(0, endPos - 1));
  return pieces.join('\n');
}

/**
 * Report a suspicious for/while condition starting on lines.elided[lineIndex].
 * Conditions that never close are skipped silently.
 */
export function checkLoopCondition(
  filename: string,
  lines: LineSource,
  lineIndex: number,
  error: ErrorSink
): void {
  const line = lines.elided[lineIndex] ?? '';
  const keyword = match('\\s*(for|while)\\s*\\(', line);
  if (!keyword) {
    return;
  }

  const start = line.indexOf('(');
  const close = closeExpression(lines, lineIndex, start);
  if (close.kind === 'notFound') {
    return;
  }

  const condition = spanText(
    lines,
    lineIndex,
    start,
    close.lineIndex,
    close.position
  );
  const lineNumber = close.lineIndex + 1;

  if (keyword[1] === 'for') {
    if (hasSuspiciousForCondition(condition)) {
      error(
        filename,
        lineNumber,
        FOR_LOOP_CONDITION.category,
        FOR_LOOP_CONDITION.confidence,
        'Possible incorrect condition in range-based for loop'
      );
    }
  } else if (hasSuspiciousWhileCondition(condition)) {
    error(
      filename,
      lineNumber,
      WHILE_LOOP_CONDITION.category,
      WHILE_LOOP_CONDITION.confidence,
      'Possible incorrect condition in range-based while loop'
    );
  }
}

// ============================================================
// RULE
// ============================================================

/**
 * LOOP_CONDITION: suspicious operators in loop conditions.
 */
export const LOOP_CONDITION: LineCheck = {
  name: 'LOOP_CONDITION',
  categories: [FOR_LOOP_CONDITION, WHILE_LOOP_CONDITION],
  severity: 'warning',

  check(filename, lines, lineIndex, error): void {
    checkLoopCondition(filename, lines, lineIndex, error);
  },
};
