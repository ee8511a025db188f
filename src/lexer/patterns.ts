/**
 * Pattern Cache
 * Process-wide memo of compiled regular expressions keyed by pattern text.
 */

// Created empty on module load, filled on demand, never evicted.
const compiledPatterns = new Map<string, RegExp>();

/**
 * Get the compiled form of a pattern, compiling it on first use.
 * Throws SyntaxError for a malformed pattern.
 */
export function compiledPattern(pattern: string): RegExp {
  let regexp = compiledPatterns.get(pattern);
  if (!regexp) {
    regexp = new RegExp(pattern);
    compiledPatterns.set(pattern, regexp);
  }
  return regexp;
}

/**
 * Match the pattern at the start of text.
 *
 * The leftmost match is tried at index 0 first, so a search result that
 * starts anywhere else means no anchored match exists.
 */
export function match(pattern: string, text: string): RegExpExecArray | null {
  const result = compiledPattern(pattern).exec(text);
  return result && result.index === 0 ? result : null;
}

/**
 * Search for the pattern anywhere in text.
 */
export function search(pattern: string, text: string): RegExpExecArray | null {
  return compiledPattern(pattern).exec(text);
}

/** Number of distinct patterns compiled so far */
export function patternCacheSize(): number {
  return compiledPatterns.size;
}
