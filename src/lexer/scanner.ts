/**
 * Expression Scanner
 * Single-line delimiter matching with template angle-bracket disambiguation.
 */

import { search } from './patterns.js';

// ============================================================
// TYPES
// ============================================================

/** Opening delimiter tracked on the nesting stack */
export type Delimiter = '(' | '[' | '{' | '<';

/**
 * Outcome of scanning one line.
 * - closed: the outermost delimiter closed; position is just past the closer
 * - unbalanced: a closer with no usable opener; nothing more can match
 * - continue: end of line reached; stack carries into the next line
 */
export type ScanResult =
  | { readonly kind: 'closed'; readonly position: number }
  | { readonly kind: 'unbalanced' }
  | { readonly kind: 'continue'; readonly stack: Delimiter[] };

// ============================================================
// HELPERS
// ============================================================

const OPERATOR_BEFORE = '\\boperator\\s*$';

const CLOSER_TO_OPENER: Record<string, Delimiter> = {
  ')': '(',
  ']': '[',
  '}': '{',
};

export function isOpeningDelimiter(ch: string): ch is Delimiter {
  return ch === '(' || ch === '[' || ch === '{' || ch === '<';
}

/** True if the text before index ends with the `operator` keyword */
function followsOperatorKeyword(line: string, index: number): boolean {
  return index > 0 && search(OPERATOR_BEFORE, line.slice(0, index)) !== null;
}

/**
 * Drop pending '<' entries from the top of the stack.
 * A '<' still open when a real closer or ';' arrives was a comparison.
 */
function popPendingAngles(stack: Delimiter[]): void {
  while (stack.length > 0 && stack[stack.length - 1] === '<') {
    stack.pop();
  }
}

// ============================================================
// SCANNER
// ============================================================

/**
 * Scan a line from startPos, updating a copy of the nesting stack.
 *
 * @param line - Elided line text
 * @param startPos - Index to start scanning at
 * @param stack - Nesting stack carried in from earlier lines (not mutated)
 */
export function scanLine(
  line: string,
  startPos: number,
  stack: readonly Delimiter[]
): ScanResult {
  const pending: Delimiter[] = [...stack];

  for (let i = startPos; i < line.length; i++) {
    const ch = line[i] ?? '';
    const prev = i > 0 ? line[i - 1] : '';

    switch (ch) {
      case '(':
      case '[':
      case '{':
        pending.push(ch);
        break;

      case '<':
        if (prev === '<') {
          // Second half of '<<': the first '<' was never a template open
          if (pending[pending.length - 1] === '<') {
            pending.pop();
            if (pending.length === 0) {
              return { kind: 'unbalanced' };
            }
          }
        } else if (!followsOperatorKeyword(line, i)) {
          // Tentative start of template argument list
          pending.push('<');
        }
        break;

      case ')':
      case ']':
      case '}': {
        popPendingAngles(pending);
        const top = pending[pending.length - 1];
        if (top === undefined || top !== CLOSER_TO_OPENER[ch]) {
          return { kind: 'unbalanced' };
        }
        pending.pop();
        if (pending.length === 0) {
          return { kind: 'closed', position: i + 1 };
        }
        break;
      }

      case '>':
        // '->' and 'operator>' are operators, not template closers
        if (prev === '-' || followsOperatorKeyword(line, i)) {
          break;
        }
        if (pending[pending.length - 1] === '<') {
          pending.pop();
          if (pending.length === 0) {
            return { kind: 'closed', position: i + 1 };
          }
        }
        break;

      case ';':
        // Template argument lists cannot contain statements
        popPendingAngles(pending);
        if (pending.length === 0) {
          return { kind: 'unbalanced' };
        }
        break;

      default:
        break;
    }
  }

  return { kind: 'continue', stack: pending };
}
