/**
 * Slack Relay — Admit Command
 *
 * Runs the inbound admission filter on a captured Slack event payload,
 * using the configured access policy. Nothing is forwarded or reacted to.
 *
 *   slack-relay admit event.json
 *   slack-relay admit - --bot-user-id U0BOT --json < event.json
 */

import type { Command } from 'commander';
import type { ChatIngressEnvelope } from '../channels/types.js';
import { handleSlackEvent } from '../channels/slack/inbound.js';
import { loadRuntimeConfig, resolveAccessPolicy } from '../config/loader.js';
import { printError, readInput, truncate } from './helpers.js';
import { ExitCode, printErrorResult, printResult } from '../utils/output.js';

interface AdmitOptions {
  botUserId?: string;
}

export function registerAdmitCommand(program: Command): void {
  program
    .command('admit <file>')
    .description('Check whether a Slack event payload (JSON) would reach the agent')
    .option('--bot-user-id <id>', 'Bot user ID (overrides config and SLACK_BOT_USER_ID)')
    .action(async (file: string, opts: AdmitOptions) => {
      try {
        const chalk = (await import('chalk')).default;
        const payload: unknown = JSON.parse(readInput(file));
        const config = loadRuntimeConfig();
        const forwarded: ChatIngressEnvelope[] = [];

        const decision = await handleSlackEvent(payload, {
          policy: resolveAccessPolicy(config),
          botUserId: opts.botUserId ?? config.botUserId ?? '',
          onInbound: async (envelope) => {
            forwarded.push(envelope);
          },
        });

        if (!decision) {
          printErrorResult({
            code: 'NOT_AN_EVENT',
            message: 'Input is not a Slack event payload.',
            suggestion: 'Pass an event_callback body or the inner event object.',
          });
          process.exitCode = ExitCode.USAGE_ERROR;
          return;
        }

        printResult({ decision, envelope: forwarded[0] }, () => {
          if (decision.action === 'ignore') {
            process.stdout.write(`  ${chalk.yellow('Ignored')}: ${decision.reason}\n`);
            return;
          }
          process.stdout.write(
            `  ${chalk.green('Admitted')} in ${chalk.cyan(decision.chatId)} (thread ${decision.threadToken})\n`
          );
          process.stdout.write(`  Text: ${truncate(decision.text, 120)}\n`);
        });
      } catch (error) {
        printError('Admission check failed', error);
      }
    });
}
