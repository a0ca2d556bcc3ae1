/**
 * Slack Relay — Shared CLI Helpers
 */

import { readFileSync } from 'node:fs';
import { ExitCode, printErrorResult } from '../utils/output.js';

// ============================================================================
// INPUT
// ============================================================================

/**
 * Read command input from a file, or from stdin when no file (or "-") is given.
 */
export function readInput(file?: string): string {
  if (!file || file === '-') {
    return readFileSync(0, 'utf-8');
  }
  return readFileSync(file, 'utf-8');
}

/**
 * Truncate a string to a maximum length, appending an ellipsis if needed.
 */
export function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  return str.slice(0, maxLen - 1) + '…';
}

// ============================================================================
// ERROR OUTPUT
// ============================================================================

/**
 * Print a structured error message and set process exit code.
 */
export function printError(context: string, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  printErrorResult({
    code: 'COMMAND_ERROR',
    message: `${context}: ${message}`,
  });
  process.exitCode = ExitCode.GENERAL_ERROR;
}

// ============================================================================
// DID-YOU-MEAN
// ============================================================================

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
 * Find the closest match from a list of candidates.
 * Returns the candidate if the distance is <= maxDistance, otherwise undefined.
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
