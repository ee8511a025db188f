/**
 * Lexer Module
 * Line cleansing, delimiter scanning and expression location
 */

export { compiledPattern, match, search, patternCacheSize } from './patterns.js';
export {
  scanLine,
  isOpeningDelimiter,
  type Delimiter,
  type ScanResult,
} from './scanner.js';
export {
  closeExpression,
  type LineSource,
  type LocateResult,
} from './locator.js';
export { CleansedLines, elideLines, splitLines } from './cleanse.js';
