/**
 * Slack Relay — Send Command
 *
 *   slack-relay send C0123 --text "**Deploy** finished"
 *   slack-relay send C0123 report.md --thread 1700000000.000100
 */

import type { Command } from 'commander';
import { createSlackChannel } from '../channels/slack/index.js';
import { loadRuntimeConfig } from '../config/loader.js';
import { printError, readInput } from './helpers.js';
import { ExitCode, getOutputMode, printErrorResult, printResult, printSuccess } from '../utils/output.js';

interface SendOptions {
  text?: string;
  thread?: string;
  dm?: boolean;
}

export function registerSendCommand(program: Command): void {
  program
    .command('send <channel> [file]')
    .description('Render Markdown and post it to a Slack conversation')
    .option('-t, --text <text>', 'Message text (instead of a file or stdin)')
    .option('--thread <ts>', 'Reply in this thread')
    .option('--dm', 'Conversation is a direct message (replies are never threaded)')
    .action(async (channelId: string, file: string | undefined, opts: SendOptions) => {
      const config = loadRuntimeConfig();

      if (!config.botToken) {
        printErrorResult({
          code: 'NOT_CONFIGURED',
          message: 'Slack bot token not configured.',
          suggestion: 'Set SLACK_BOT_TOKEN or add "botToken" to the config file (`slack-relay config path`).',
        });
        process.exitCode = ExitCode.UNAUTHORIZED;
        return;
      }

      const ora = (await import('ora')).default;
      const spinner = ora({
        text: `Posting to ${channelId}...`,
        stream: process.stderr,
        isSilent: getOutputMode() !== 'human',
      });

      try {
        const text = opts.text ?? readInput(file);
        const slack = createSlackChannel({ config });

        spinner.start();
        const result = await slack.deliver({
          channel: 'slack',
          conversationId: channelId,
          text,
          threadId: opts.thread,
          channelType: opts.dm ? 'im' : undefined,
        });

        if (!result.success) {
          spinner.fail('Delivery failed');
          printErrorResult({
            code: 'DELIVERY_FAILED',
            message: `Delivery failed: ${result.error ?? 'unknown error'}`,
            suggestion: result.retryable ? 'The failure looks transient; try again.' : undefined,
          });
          process.exitCode = ExitCode.GENERAL_ERROR;
          return;
        }

        spinner.stop();
        const ts = result.platformMessageId ?? '';
        printResult(ts, () => printSuccess(`Posted to ${channelId} (ts ${ts})`));
      } catch (error) {
        spinner.stop();
        printError('Send failed', error);
      }
    });
}
