/**
 * CLI Shared Utilities
 * Common helpers for the loopcheck command
 */

import * as fs from 'node:fs';

/**
 * Read the package version from package.json
 *
 * Resolved relative to this module, which sits one level below the
 * package root in both src/ and dist/.
 */
export function readVersion(): string {
  const packageJsonPath = new URL('../package.json', import.meta.url);
  const packageJson = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8')) as {
    version: string;
  };
  return packageJson.version;
}

/**
 * Format a file read error for stderr output
 *
 * @param file - Path that failed to read
 * @param err - The thrown value
 * @returns Message without the "Error: " prefix
 */
export function formatReadError(file: string, err: unknown): string {
  if (err instanceof Error && 'code' in err) {
    if (err.code === 'ENOENT') {
      return `File not found: ${file}`;
    }
    if (err.code === 'EISDIR') {
      return `Path is a directory: ${file}`;
    }
  }
  return `Cannot read file: ${file}`;
}
