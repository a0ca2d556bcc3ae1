/**
 * Slack Relay — Render Command
 *
 *   slack-relay render notes.md
 *   cat notes.md | slack-relay render --json
 */

import type { Command } from 'commander';
import { markdownToSlack } from '../channels/slack/format.js';
import { planBlocks, toSlackBlocks } from '../channels/slack/blocks.js';
import { isVerbose } from './global-options.js';
import { printError, readInput } from './helpers.js';
import { printResult } from '../utils/output.js';

export function registerRenderCommand(program: Command): void {
  program
    .command('render [file]')
    .description('Render Markdown into Slack mrkdwn blocks (reads stdin without a file)')
    .action(async (file: string | undefined) => {
      try {
        const chalk = (await import('chalk')).default;
        const text = markdownToSlack(readInput(file));
        const plan = planBlocks(text);

        printResult({ text, blocks: toSlackBlocks(plan) }, () => {
          plan.forEach((block, index) => {
            const label = block.kind === 'note' ? 'context' : 'section';
            const detail = isVerbose() ? ` · ${block.body.length} chars` : '';
            process.stdout.write(chalk.dim(`── block ${index + 1}/${plan.length} · ${label}${detail}`) + '\n');
            process.stdout.write(`${block.body}\n`);
          });
        });
      } catch (error) {
        printError('Render failed', error);
      }
    });
}
