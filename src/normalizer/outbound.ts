/**
 * Slack Relay — Outbound Message Normalizer
 *
 * Resolves where an agent reply goes. Channel and group replies stay in
 * the originating thread; direct messages are answered at top level.
 */

import type { ChatEgressEnvelope } from '../channels/types.js';

export interface NormalizedOutbound {
  conversationId: string;
  text: string;
  threadTs?: string;
}

/**
 * Normalize an outbound envelope for delivery.
 */
export function normalizeOutbound(envelope: ChatEgressEnvelope): NormalizedOutbound {
  const useThread = Boolean(envelope.threadId) && envelope.channelType !== 'im';

  return {
    conversationId: envelope.conversationId,
    text: envelope.text,
    threadTs: useThread ? envelope.threadId : undefined,
  };
}
