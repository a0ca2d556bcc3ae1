/**
 * Slack Relay — Configuration Loader
 *
 * Reads/writes config from ~/.slack-relay/config.json and resolves the
 * read-only access policy the admission filter runs against.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { SlackConfigSchema, type SlackConfig } from './types.js';
import type { AccessPolicy } from '../channels/types.js';

// ============================================================================
// PATHS
// ============================================================================

const CLI_DIR_NAME = '.slack-relay';

export function getCliDir(): string {
  return join(homedir(), CLI_DIR_NAME);
}

export function getConfigPath(): string {
  return join(getCliDir(), 'config.json');
}

export function ensureCliDir(): void {
  const dir = getCliDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
}

// ============================================================================
// LOAD / SAVE
// ============================================================================

/**
 * Load config from disk. Returns defaults if file doesn't exist.
 */
export function loadConfig(): SlackConfig {
  const configPath = getConfigPath();

  if (!existsSync(configPath)) {
    return SlackConfigSchema.parse({});
  }

  try {
    const raw = readFileSync(configPath, 'utf-8');
    const json: unknown = JSON.parse(raw);
    return SlackConfigSchema.parse(json);
  } catch (error) {
    process.stderr.write(
      `Warning: Config file corrupted (${error instanceof Error ? error.message : 'parse error'}), using defaults.\n`
    );
    return SlackConfigSchema.parse({});
  }
}

/**
 * Save config to disk. Creates directory if needed.
 */
export function saveConfig(config: SlackConfig): void {
  ensureCliDir();
  writeFileSync(getConfigPath(), JSON.stringify(config, null, 2), { mode: 0o600 });
}

/**
 * Overlay SLACK_BOT_TOKEN / SLACK_BOT_USER_ID on top of the file config.
 */
export function applyEnvOverrides(
  config: SlackConfig,
  env: NodeJS.ProcessEnv = process.env
): SlackConfig {
  return {
    ...config,
    botToken: env.SLACK_BOT_TOKEN || config.botToken,
    botUserId: env.SLACK_BOT_USER_ID || config.botUserId,
  };
}

/**
 * Load the file config with environment overrides applied.
 */
export function loadRuntimeConfig(): SlackConfig {
  return applyEnvOverrides(loadConfig());
}

// ============================================================================
// ACCESS POLICY
// ============================================================================

/**
 * Build the frozen access policy. Allow-lists become sets; nothing
 * downstream can mutate the result.
 */
export function resolveAccessPolicy(config: SlackConfig): AccessPolicy {
  return Object.freeze({
    directMessage: Object.freeze({
      enabled: config.directMessage.enabled,
      mode: config.directMessage.mode,
      allowFrom: new Set(config.directMessage.allowFrom),
    }),
    group: Object.freeze({
      mode: config.group.mode,
      allowFrom: new Set(config.group.allowFrom),
    }),
  });
}

/**
 * Copy of the config safe to print: the bot token is masked.
 */
export function redactConfig(config: SlackConfig): SlackConfig {
  if (!config.botToken) return config;
  return { ...config, botToken: `${config.botToken.slice(0, 5)}…` };
}
