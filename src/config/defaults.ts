/**
 * Slack Relay — Default Configuration
 */

import { SlackConfigSchema, type SlackConfig } from './types.js';

export const DEFAULT_CONFIG: SlackConfig = SlackConfigSchema.parse({});

export const CLI_VERSION = '0.1.0';

/**
 * Full version string for --version output.
 * Example: slack-relay/0.1.0 linux-x64 node-v20.14.0
 */
export const VERSION_STRING =
  `slack-relay/${CLI_VERSION} ${process.platform}-${process.arch} node-${process.version}`;
