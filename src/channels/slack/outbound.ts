/**
 * Slack Relay — Slack Outbound Message Delivery
 *
 * Renders a ChatEgressEnvelope into mrkdwn blocks and posts it.
 */

import type { ChatEgressEnvelope, DeliveryResult } from '../types.js';
import { normalizeOutbound } from '../../normalizer/outbound.js';
import { createLogger } from '../../utils/logger.js';
import { renderSlackMessage } from './blocks.js';
import type { SlackWebApi } from './client.js';

const log = createLogger('Slack:Outbound');

/** Slack error codes that will fail the same way on every retry. */
const PERMANENT_ERROR_CODES = [
  'channel_not_found',
  'not_in_channel',
  'is_archived',
  'invalid_auth',
  'not_authed',
  'account_inactive',
  'missing_scope',
  'invalid_blocks',
  'msg_too_long',
  'no_text',
];

/**
 * Deliver a ChatEgressEnvelope via chat.postMessage.
 */
export async function deliverSlackMessage(
  api: Pick<SlackWebApi, 'chat'>,
  envelope: ChatEgressEnvelope
): Promise<DeliveryResult> {
  const outbound = normalizeOutbound(envelope);

  try {
    const message = renderSlackMessage(outbound.text);

    log.debug('Sending outbound message', {
      conversationId: outbound.conversationId,
      threadTs: outbound.threadTs,
      blocks: message.blocks.length,
    });

    const response = await api.chat.postMessage({
      channel: outbound.conversationId,
      text: message.text,
      blocks: message.blocks,
      ...(outbound.threadTs ? { thread_ts: outbound.threadTs } : {}),
    });

    return {
      success: true,
      platformMessageId: response.ts || undefined,
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.warn('Outbound delivery failed', { conversationId: outbound.conversationId, error: message });

    return {
      success: false,
      error: message,
      retryable: isRetryableError(error),
    };
  }
}

// ============================================================================
// ERROR CLASSIFICATION
// ============================================================================

/**
 * Web API errors read "An API error occurred: <code>".
 * Unknown failures (network, rate limits, 5xx) are retryable.
 */
export function isRetryableError(error: unknown): boolean {
  if (!(error instanceof Error)) return true;

  const message = error.message.toLowerCase();
  return !PERMANENT_ERROR_CODES.some((code) => message.includes(code));
}
