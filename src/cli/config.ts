/**
 * Slack Relay — Config Commands
 *
 *   slack-relay config show
 *   slack-relay config path
 *   slack-relay config init
 */

import type { Command } from 'commander';
import { existsSync } from 'node:fs';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { getConfigPath, loadRuntimeConfig, redactConfig, saveConfig } from '../config/loader.js';
import { printError } from './helpers.js';
import { printResult, printSuccess } from '../utils/output.js';

export function registerConfigCommands(program: Command): void {
  const config = program
    .command('config')
    .description('Inspect and initialize the relay configuration');

  config
    .command('show')
    .description('Show the effective configuration (token masked)')
    .action(() => {
      const effective = redactConfig(loadRuntimeConfig());
      printResult(effective, () => {
        process.stdout.write(JSON.stringify(effective, null, 2) + '\n');
      });
    });

  config
    .command('path')
    .description('Print the config file location')
    .action(() => {
      const path = getConfigPath();
      printResult(path, () => process.stdout.write(path + '\n'));
    });

  config
    .command('init')
    .description('Write a config file with default settings')
    .action(() => {
      const path = getConfigPath();
      if (existsSync(path)) {
        printSuccess(`Config already exists at ${path}`);
        return;
      }

      try {
        saveConfig(DEFAULT_CONFIG);
        printSuccess(`Wrote default config to ${path}`);
      } catch (error) {
        printError('Could not write config', error);
      }
    });
}
