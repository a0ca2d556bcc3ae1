/**
 * Slack Relay — Program Definition
 *
 * Commander-based CLI. Commands work offline except `send`, which posts
 * through the Slack Web API.
 */

import { Command } from 'commander';
import { VERSION_STRING } from '../config/defaults.js';
import { registerRenderCommand } from './render.js';
import { registerAdmitCommand } from './admit.js';
import { registerSendCommand } from './send.js';
import { registerConfigCommands } from './config.js';
import { applyGlobalOptions } from './global-options.js';
import { didYouMean } from './helpers.js';
import { ExitCode } from '../utils/output.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('slack-relay')
    .description('Slack channel adapter: render agent replies as mrkdwn blocks and filter inbound events')
    .version(VERSION_STRING, '-V, --version', 'Show version information');

  // ── Global Options ────────────────────────────────────────────────────

  applyGlobalOptions(program);

  // ── Outbound ──────────────────────────────────────────────────────────

  registerRenderCommand(program);
  registerSendCommand(program);

  // ── Inbound ───────────────────────────────────────────────────────────

  registerAdmitCommand(program);

  // ── Configuration ─────────────────────────────────────────────────────

  registerConfigCommands(program);

  // ── Unknown Command Handler (did you mean?) ─────────────────────────────

  program.on('command:*', (operands: string[]) => {
    const unknown = operands[0];
    const commands = program.commands.map((c) => c.name());
    const suggestion = didYouMean(unknown, commands);

    process.stderr.write(`\n  Error: Unknown command "${unknown}".`);
    if (suggestion) {
      process.stderr.write(` Did you mean "${suggestion}"?`);
    }
    process.stderr.write(`\n  Run \`slack-relay --help\` for available commands.\n\n`);
    process.exitCode = ExitCode.USAGE_ERROR;
  });

  return program;
}
