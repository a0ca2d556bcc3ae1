/**
 * Slack Relay — Output Utilities
 *
 * Centralized output helpers that respect --json and --quiet modes.
 * Commands use these instead of raw console.log for structured output.
 */

export type OutputMode = 'human' | 'json' | 'quiet';

let currentMode: OutputMode = 'human';

export function setOutputMode(mode: OutputMode): void {
  currentMode = mode;
}

export function getOutputMode(): OutputMode {
  return currentMode;
}

// ============================================================================
// EXIT CODES
// ============================================================================

export const ExitCode = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  USAGE_ERROR: 2,
  NOT_FOUND: 3,
  UNAUTHORIZED: 4,
  SIGINT: 130,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

// ============================================================================
// STRUCTURED OUTPUT
// ============================================================================

/**
 * Print command result. JSON mode serializes `data` to stdout; quiet mode
 * prints only string results; human mode runs the formatter.
 */
export function printResult(data: unknown, formatter?: () => void): void {
  if (currentMode === 'json') {
    process.stdout.write(JSON.stringify(data, null, 2) + '\n');
    return;
  }

  if (currentMode === 'quiet') {
    if (typeof data === 'string') {
      process.stdout.write(data + '\n');
    }
    return;
  }

  formatter?.();
}

/**
 * Print a structured error. JSON mode writes an error object to stderr.
 */
export function printErrorResult(error: {
  code: string;
  message: string;
  suggestion?: string;
}): void {
  if (currentMode === 'json') {
    process.stderr.write(JSON.stringify({ error }, null, 2) + '\n');
    return;
  }

  process.stderr.write(`\n  Error: ${error.message}\n`);
  if (error.suggestion) {
    process.stderr.write(`  ${error.suggestion}\n`);
  }
  process.stderr.write('\n');
}

/**
 * Print a success message (only in human mode).
 */
export function printSuccess(message: string): void {
  if (currentMode === 'human') {
    process.stderr.write(`  ${message}\n`);
  }
}
