/**
 * Line Cleansing
 * Produces elided lines: comments removed, string and character literals
 * collapsed to empty placeholders, so delimiters inside them stay inert.
 */

import type { LineSource } from './locator.js';

type Mode = 'code' | 'string' | 'char' | 'block-comment';

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isHexDigit(ch: string): boolean {
  return isDigit(ch) || (ch >= 'a' && ch <= 'f') || (ch >= 'A' && ch <= 'F');
}

function isNumberChar(ch: string): boolean {
  return /^[\w.']$/.test(ch);
}

/**
 * True if the quote at index separates digits of a numeric literal,
 * as in 1'000, 0xFF'FF or 0b1010'0101.
 */
function isDigitSeparator(raw: string, index: number): boolean {
  if (!isHexDigit(raw[index + 1] ?? '')) {
    return false;
  }
  let start = index;
  while (start > 0 && isNumberChar(raw[start - 1] ?? '')) {
    start--;
  }
  return start < index && isDigit(raw[start] ?? '');
}

/**
 * Split file text into lines, dropping a trailing '\r' from each.
 */
export function splitLines(source: string): string[] {
  return source.split('\n').map((line) => line.replace(/\r$/, ''));
}

/**
 * Elide every line of a file.
 * Block comments carry across lines; string and character literals do not.
 */
export function elideLines(rawLines: readonly string[]): string[] {
  const elided: string[] = [];
  let mode: Mode = 'code';

  for (const raw of rawLines) {
    let out = '';
    if (mode !== 'block-comment') {
      mode = 'code';
    }

    for (let i = 0; i < raw.length; i++) {
      const ch = raw[i] ?? '';
      const next = raw[i + 1] ?? '';

      if (mode === 'block-comment') {
        if (ch === '*' && next === '/') {
          mode = 'code';
          i++;
        }
        continue;
      }

      if (mode === 'string' || mode === 'char') {
        if (ch === '\\') {
          i++;
          continue;
        }
        if ((mode === 'string' && ch === '"') || (mode === 'char' && ch === "'")) {
          out += ch;
          mode = 'code';
        }
        continue;
      }

      if (ch === '/' && next === '/') {
        break;
      }
      if (ch === '/' && next === '*') {
        mode = 'block-comment';
        i++;
        continue;
      }
      if (ch === '"') {
        out += ch;
        mode = 'string';
        continue;
      }
      if (ch === "'") {
        if (isDigitSeparator(raw, i)) {
          continue;
        }
        out += ch;
        mode = 'char';
        continue;
      }
      out += ch;
    }

    // Unterminated literal: close the placeholder at end of line
    if (mode === 'string') {
      out += '"';
    } else if (mode === 'char') {
      out += "'";
    }

    elided.push(out.trimEnd());
  }

  return elided;
}

/**
 * Raw and elided views of one file.
 */
export class CleansedLines implements LineSource {
  readonly raw: readonly string[];
  readonly elided: readonly string[];

  constructor(source: string) {
    this.raw = splitLines(source);
    this.elided = elideLines(this.raw);
  }

  lineCount(): number {
    return this.raw.length;
  }
}
