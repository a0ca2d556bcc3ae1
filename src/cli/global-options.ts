/**
 * Slack Relay — Global Options
 *
 * Applies global flags (--no-color, --json, --quiet, --verbose, --debug)
 * to the root Commander program. These are inherited by all subcommands.
 */

import type { Command } from 'commander';
import { loadConfig } from '../config/loader.js';
import { setLogLevel } from '../utils/logger.js';
import { setOutputMode } from '../utils/output.js';

export interface GlobalOptions {
  color?: boolean;
  json?: boolean;
  quiet?: boolean;
  verbose?: boolean;
  debug?: boolean;
}

let verboseEnabled = false;

export function isVerbose(): boolean {
  return verboseEnabled;
}

/**
 * Register global flags and a preAction hook that applies them
 * before any subcommand runs.
 */
export function applyGlobalOptions(program: Command): void {
  program
    .option('--no-color', 'Disable colored output')
    .option('--json', 'Output results as JSON')
    .option('-q, --quiet', 'Suppress non-essential output')
    .option('--verbose', 'Show detailed output')
    .option('--debug', 'Show debug-level diagnostics');

  program.hook('preAction', () => {
    const opts = program.opts<GlobalOptions>();

    // Commander turns --no-color into color=false
    if (opts.color === false) {
      process.env.NO_COLOR = '1';
    }

    if (opts.json) {
      setOutputMode('json');
      process.env.NO_COLOR = '1';
    } else if (opts.quiet) {
      setOutputMode('quiet');
    }

    // --debug wins over SLACK_RELAY_LOG_LEVEL, which wins over the config file
    if (opts.debug) {
      setLogLevel('debug');
      verboseEnabled = true;
    } else {
      if (!process.env.SLACK_RELAY_LOG_LEVEL) {
        setLogLevel(loadConfig().logging.level);
      }
      verboseEnabled = Boolean(opts.verbose);
    }
  });
}
