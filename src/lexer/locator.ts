/**
 * Expression Locator
 * Drives the line scanner across line boundaries to find where an
 * opening delimiter closes.
 */

import { match } from './patterns.js';
import { isOpeningDelimiter, scanLine, type Delimiter } from './scanner.js';

// ============================================================
// TYPES
// ============================================================

/**
 * Zero-based access to the literal- and comment-elided lines of one file.
 */
export interface LineSource {
  readonly elided: readonly string[];
  lineCount(): number;
}

/**
 * Where an expression closes.
 * - found: position is just past the closing delimiter on lines.elided[lineIndex]
 * - notFound: no close before end of file; lineIndex is lineCount()
 */
export type LocateResult =
  | {
      readonly kind: 'found';
      readonly line: string;
      readonly lineIndex: number;
      readonly position: number;
    }
  | {
      readonly kind: 'notFound';
      readonly line: string;
      readonly lineIndex: number;
    };

// ============================================================
// LOCATOR
// ============================================================

function notFound(lines: LineSource, line: string): LocateResult {
  return { kind: 'notFound', line, lineIndex: lines.lineCount() };
}

/**
 * Find the position that closes the delimiter at lines.elided[lineIndex][pos].
 *
 * The character at pos must be '(', '[', '{' or '<', and not the start
 * of '<<' or '<='. Strings and comments are ignored since the lines are
 * already elided.
 */
export function closeExpression(
  lines: LineSource,
  lineIndex: number,
  pos: number
): LocateResult {
  let line = lines.elided[lineIndex] ?? '';
  const opener = line[pos] ?? '';
  if (!isOpeningDelimiter(opener) || match('<[<=]', line.slice(pos))) {
    return notFound(lines, line);
  }

  let result = scanLine(line, pos, []);
  let current = lineIndex;

  for (;;) {
    if (result.kind === 'closed') {
      return {
        kind: 'found',
        line,
        lineIndex: current,
        position: result.position,
      };
    }
    if (result.kind === 'unbalanced') {
      return notFound(lines, line);
    }

    const stack: Delimiter[] = result.stack;
    if (stack.length === 0 || current >= lines.lineCount() - 1) {
      return notFound(lines, line);
    }

    current++;
    line = lines.elided[current] ?? '';
    result = scanLine(line, 0, stack);
  }
}
