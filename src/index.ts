/**
 * loopcheck Module
 * Exports the delimiter scanner, expression locator and loop checks
 */

export {
  CleansedLines,
  closeExpression,
  compiledPattern,
  elideLines,
  isOpeningDelimiter,
  match,
  patternCacheSize,
  scanLine,
  search,
  splitLines,
  type Delimiter,
  type LineSource,
  type LocateResult,
  type ScanResult,
} from './lexer/index.js';
export * from './check/index.js';
