#!/usr/bin/env node
/**
 * CLI Check Entry Point
 *
 * Implements argument parsing for loopcheck.
 * Checks C++ source files for suspicious loop conditions.
 */

import * as fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { CheckConfig, Confidence, Diagnostic } from './check/index.js';
import {
  loadConfig,
  createDefaultConfig,
  validateSource,
  isConfidence,
} from './check/index.js';
import { formatReadError, readVersion } from './cli-shared.js';

/**
 * Parsed command-line arguments for loopcheck
 */
export type ParsedCheckArgs =
  | {
      mode: 'check';
      files: string[];
      verbose: boolean;
      format: 'text' | 'json';
      minConfidence: Confidence | null;
    }
  | { mode: 'help' | 'version' };

/** Options that consume the following argument */
const VALUE_FLAGS = new Set(['--format', '--min-confidence']);

const KNOWN_FLAGS = new Set([
  '--help',
  '-h',
  '--version',
  '-v',
  '--verbose',
  '--format',
  '--min-confidence',
]);

/**
 * Read the value following a flag, or null if the flag is absent.
 */
function flagValue(
  argv: string[],
  flag: string,
  expected: string
): string | null {
  const index = argv.indexOf(flag);
  if (index === -1) {
    return null;
  }
  const value = argv[index + 1];
  if (!value || value.startsWith('-')) {
    throw new Error(`${flag} requires argument: ${expected}`);
  }
  return value;
}

/**
 * Parse command-line arguments for loopcheck
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 */
export function parseCheckArgs(argv: string[]): ParsedCheckArgs {
  // Check for --help or --version flags in any position
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const verbose = argv.includes('--verbose');

  let format: 'text' | 'json' = 'text';
  const formatValue = flagValue(argv, '--format', 'text or json');
  if (formatValue !== null) {
    if (formatValue !== 'text' && formatValue !== 'json') {
      throw new Error(`Invalid format: ${formatValue}. Expected text or json`);
    }
    format = formatValue;
  }

  let minConfidence: Confidence | null = null;
  const confidenceValue = flagValue(argv, '--min-confidence', '1 to 5');
  if (confidenceValue !== null) {
    const parsed = Number(confidenceValue);
    if (!isConfidence(parsed)) {
      throw new Error(
        `Invalid confidence: ${confidenceValue}. Expected an integer from 1 to 5`
      );
    }
    minConfidence = parsed;
  }

  // Remaining arguments: reject unknown flags, collect files
  const files: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg) continue;

    if (arg.startsWith('-')) {
      if (!KNOWN_FLAGS.has(arg)) {
        throw new Error(`Unknown option: ${arg}`);
      }
      if (VALUE_FLAGS.has(arg)) {
        i++; // Skip the flag's value
      }
      continue;
    }

    files.push(arg);
  }

  if (files.length === 0) {
    throw new Error('Missing file argument');
  }

  return { mode: 'check', files, verbose, format, minConfidence };
}

// ============================================================
// DIAGNOSTIC FORMATTING
// ============================================================

/**
 * Format diagnostics for output
 *
 * Text format: file:line: severity: message [category] [confidence]
 * JSON format: files array with per-file errors, plus a summary
 * Verbose mode: adds the offending source line to JSON diagnostics
 */
export function formatDiagnostics(
  results: ReadonlyArray<{ file: string; diagnostics: Diagnostic[] }>,
  format: 'text' | 'json',
  verbose: boolean
): string {
  if (format === 'json') {
    return formatDiagnosticsJSON(results, verbose);
  }
  return formatDiagnosticsText(results.flatMap((r) => r.diagnostics));
}

function formatDiagnosticsText(diagnostics: Diagnostic[]): string {
  return diagnostics
    .map(
      (d) =>
        `${d.filename}:${d.line}: ${d.severity}: ${d.message} [${d.category}] [${d.confidence}]`
    )
    .join('\n');
}

function formatDiagnosticsJSON(
  results: ReadonlyArray<{ file: string; diagnostics: Diagnostic[] }>,
  verbose: boolean
): string {
  const files = results.map(({ file, diagnostics }) => ({
    file,
    errors: diagnostics.map((d) => {
      const error: Record<string, unknown> = {
        line: d.line,
        category: d.category,
        confidence: d.confidence,
        severity: d.severity,
        message: d.message,
      };
      if (verbose) {
        error['context'] = d.context;
      }
      return error;
    }),
  }));

  const all = results.flatMap((r) => r.diagnostics);
  const summary = {
    total: all.length,
    errors: all.filter((d) => d.severity === 'error').length,
    warnings: all.filter((d) => d.severity === 'warning').length,
    info: all.filter((d) => d.severity === 'info').length,
  };

  return JSON.stringify({ files, summary }, null, 2);
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================

const HELP_TEXT = `loopcheck - Flag suspicious loop conditions in C++ sources

Usage: loopcheck [options] <file...>

Options:
  --format <fmt>          Output format: text (default) or json
  --min-confidence <n>    Drop findings below confidence n (1-5)
  --verbose               Include source lines in JSON output
  -h, --help              Show this help message
  -v, --version           Show version number`;

/**
 * Main entry point for loopcheck CLI.
 * Returns the process exit code.
 */
export function main(argv: string[], cwd: string): number {
  try {
    const args = parseCheckArgs(argv);

    if (args.mode === 'help') {
      console.log(HELP_TEXT);
      return 0;
    }
    if (args.mode === 'version') {
      console.log(readVersion());
      return 0;
    }

    // At this point, args.mode must be 'check'
    // TypeScript needs explicit assertion after early returns
    if (args.mode !== 'check') {
      throw new Error('Unexpected mode');
    }

    const loaded = loadConfig(cwd) ?? createDefaultConfig();
    const config: CheckConfig =
      args.minConfidence !== null
        ? { ...loaded, minConfidence: args.minConfidence }
        : loaded;

    const results: { file: string; diagnostics: Diagnostic[] }[] = [];
    let unreadable = false;

    for (const file of args.files) {
      let source: string;
      try {
        source = fs.readFileSync(file, 'utf-8');
      } catch (err) {
        console.error(`Error: ${formatReadError(file, err)}`);
        unreadable = true;
        continue;
      }
      results.push({ file, diagnostics: validateSource(file, source, config) });
    }

    const total = results.reduce((n, r) => n + r.diagnostics.length, 0);
    if (total === 0 && args.format === 'text') {
      if (results.length > 0) {
        console.log('No issues found');
      }
    } else {
      console.log(formatDiagnostics(results, args.format, args.verbose));
    }

    if (unreadable) return 2;
    return total > 0 ? 1 : 0;
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 2;
  }
}

/**
 * Whether the script path node was started with is this module.
 * Resolves symlinks, since npm installs the binary as a link.
 */
export function isEntryPoint(
  scriptPath: string | undefined,
  moduleUrl: string
): boolean {
  if (!scriptPath || !fs.existsSync(scriptPath)) {
    return false;
  }
  const modulePath = fs.realpathSync(fileURLToPath(moduleUrl));
  return fs.realpathSync(scriptPath) === modulePath;
}

// Only run main if this file is executed directly (not imported)
if (isEntryPoint(process.argv[1], import.meta.url)) {
  process.exitCode = main(process.argv.slice(2), process.cwd());
}
