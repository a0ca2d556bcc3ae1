/**
 * Slack Relay — Slack Channel Plugin
 *
 * Implements the ChannelPlugin interface on top of the Slack Web API.
 * The access policy and bot identity are resolved once at construction.
 */

import type { ChannelPlugin, ChatEgressEnvelope, ChatIngressEnvelope, DeliveryResult } from '../types.js';
import type { SlackConfig } from '../../config/types.js';
import { resolveAccessPolicy } from '../../config/loader.js';
import { createLogger } from '../../utils/logger.js';
import { createSlackWebClient, type SlackWebApi } from './client.js';
import { handleSlackEvent } from './inbound.js';
import { deliverSlackMessage } from './outbound.js';

const log = createLogger('Slack');

export interface SlackChannelOptions {
  config: SlackConfig;
  /** Web API client; built from `config.botToken` when omitted. */
  client?: SlackWebApi;
}

export function createSlackChannel(options: SlackChannelOptions): ChannelPlugin {
  const { config } = options;
  const policy = resolveAccessPolicy(config);
  const botUserId = config.botUserId ?? '';
  const client = options.client ?? (config.botToken ? createSlackWebClient(config.botToken) : undefined);
  const reaction = config.reaction.enabled ? config.reaction.name : undefined;

  let warnedMissingBotId = false;

  return {
    channel: 'slack',
    displayName: 'Slack',

    async receive(
      payload: unknown,
      onInbound: (envelope: ChatIngressEnvelope) => Promise<void>
    ) {
      if (!botUserId && !warnedMissingBotId) {
        warnedMissingBotId = true;
        log.warn('Slack bot user ID not configured; mention handling disabled');
      }
      return handleSlackEvent(payload, { policy, botUserId, reaction, api: client, onInbound });
    },

    async deliver(envelope: ChatEgressEnvelope): Promise<DeliveryResult> {
      if (!client) {
        return {
          success: false,
          error: 'Slack bot token not configured',
          retryable: false,
        };
      }

      return deliverSlackMessage(client, envelope);
    },

    getStatus(): string {
      return client ? 'ready' : 'unconfigured';
    },
  };
}
