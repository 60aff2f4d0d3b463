/**
 * Chat Archiver — Shared CLI Helpers
 */

import { ConfigError } from '../config/loader.js';
import { ExitCode, printErrorResult, type ExitCodeValue } from '../utils/output.js';

// ============================================================================
// OPTION PARSING
// ============================================================================

/**
 * Commander reducer for repeatable options (`-c a -c b`).
 */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

// ============================================================================
// ERROR OUTPUT
// ============================================================================

export function exitCodeFor(error: unknown): ExitCodeValue {
  return error instanceof ConfigError ? ExitCode.USAGE_ERROR : ExitCode.GENERAL_ERROR;
}

/**
 * Print a structured error message and set process exit code.
 */
export function printError(context: string, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  printErrorResult({
    code: error instanceof ConfigError ? 'CONFIG_ERROR' : 'COMMAND_ERROR',
    message: `${context}: ${message}`,
    suggestion: error instanceof ConfigError ? 'Run with --help to see the accepted options.' : undefined,
  });
  process.exitCode = exitCodeFor(error);
}

// ============================================================================
// DID YOU MEAN
// ============================================================================

/**
 * Edit distance, computed one row at a time.
 */
function levenshtein(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);

  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      current[j] = a[i - 1] === b[j - 1]
        ? previous[j - 1]
        : 1 + Math.min(previous[j], current[j - 1], previous[j - 1]);
    }
    previous = current;
  }

  return previous[b.length];
}

/**
 * Closest candidate within `maxDistance` edits, if any.
 */
export function didYouMean(
  input: string,
  candidates: string[],
  maxDistance = 3
): string | undefined {
  let best: string | undefined;
  let bestDist = maxDistance + 1;

  for (const candidate of candidates) {
    const dist = levenshtein(input.toLowerCase(), candidate.toLowerCase());
    if (dist < bestDist) {
      bestDist = dist;
      best = candidate;
    }
  }

  return bestDist <= maxDistance ? best : undefined;
}
