/**
 * Slack Relay — Slack Inbound Event Handler
 *
 * Parses Events API / Socket Mode payloads into InboundEvents, runs the
 * admission filter, and forwards admitted messages as ChatIngressEnvelopes.
 */

import { z } from 'zod';
import type {
  AccessPolicy,
  AdmissionDecision,
  ChannelType,
  ChatIngressEnvelope,
  InboundEvent,
} from '../types.js';
import { normalizeInbound } from '../../normalizer/inbound.js';
import { createLogger } from '../../utils/logger.js';
import { decide } from './admission.js';
import type { SlackWebApi } from './client.js';

const log = createLogger('Slack:Inbound');

// ============================================================================
// PAYLOAD SCHEMA
// ============================================================================

const SlackFileSchema = z.object({
  id: z.string().optional(),
  name: z.string().optional(),
  mimetype: z.string().optional(),
  url_private: z.string().optional(),
  url_private_download: z.string().optional(),
  size: z.number().optional(),
});

const SlackEventSchema = z.object({
  type: z.string(),
  subtype: z.string().optional(),
  user: z.string().optional(),
  channel: z.string().optional(),
  channel_type: z.string().optional(),
  text: z.string().optional(),
  ts: z.string().optional(),
  thread_ts: z.string().optional(),
  files: z.array(SlackFileSchema).optional(),
});

/** Either an event_callback envelope or the bare inner event. */
const SlackPayloadSchema = z.union([
  z.object({ event: SlackEventSchema }).transform((payload) => payload.event),
  SlackEventSchema,
]);

type SlackEvent = z.infer<typeof SlackEventSchema>;

// ============================================================================
// PARSING
// ============================================================================

function toChannelType(channelType: string | undefined): ChannelType {
  switch (channelType) {
    case 'im':
      return 'im';
    case 'mpim':
    case 'group':
      return 'group';
    default:
      // app_mention events carry no channel_type; they only fire in channels
      return 'channel';
  }
}

function toInboundEvent(raw: SlackEvent): InboundEvent {
  const attachments = (raw.files ?? []).map((file) => ({
    id: file.id,
    name: file.name,
    mimeType: file.mimetype,
    url: file.url_private_download || file.url_private,
    size: file.size,
  }));

  return {
    eventType: raw.type === 'app_mention' ? 'mention' : raw.type,
    senderId: raw.user ?? '',
    chatId: raw.channel ?? '',
    channelType: toChannelType(raw.channel_type),
    text: raw.text ?? '',
    subtype: raw.subtype,
    hasAttachments: attachments.length > 0,
    attachments,
    timestampToken: raw.ts ?? '',
    threadToken: raw.thread_ts,
  };
}

/**
 * Parse a raw Slack payload. Returns null if it is not an event.
 */
export function parseSlackEvent(payload: unknown): InboundEvent | null {
  const parsed = SlackPayloadSchema.safeParse(payload);
  if (!parsed.success) return null;
  return toInboundEvent(parsed.data);
}

// ============================================================================
// HANDLING
// ============================================================================

export interface InboundContext {
  policy: AccessPolicy;
  /** Bot user ID; empty disables mention handling. */
  botUserId: string;
  /** Acknowledgement reaction; omitted or without `api` means none. */
  reaction?: string;
  api?: Pick<SlackWebApi, 'reactions'>;
  onInbound: (envelope: ChatIngressEnvelope) => Promise<void>;
}

/**
 * Admit or ignore one Slack payload, forwarding admitted messages.
 */
export async function handleSlackEvent(
  payload: unknown,
  context: InboundContext
): Promise<AdmissionDecision | null> {
  const event = parseSlackEvent(payload);
  if (!event) {
    log.debug('Skipping payload that is not a Slack event');
    return null;
  }

  log.debug('Slack event', {
    type: event.eventType,
    subtype: event.subtype,
    user: event.senderId,
    channel: event.chatId,
    channelType: event.channelType,
    text: event.text.slice(0, 80),
  });

  const decision = decide(event, context.policy, context.botUserId);
  if (decision.action === 'ignore') {
    log.debug('Ignoring Slack event', { reason: decision.reason, ts: event.timestampToken });
    return decision;
  }

  if (context.reaction && context.api && event.timestampToken) {
    await acknowledge(context.api, event, context.reaction);
  }

  const envelope = normalizeInbound(event, decision);

  log.debug('Forwarding inbound message', {
    from: envelope.peerId,
    conversationId: envelope.conversationId,
    hasMedia: !!envelope.media,
  });

  await context.onInbound(envelope);
  return decision;
}

/**
 * Best-effort reaction on the triggering message.
 */
async function acknowledge(
  api: Pick<SlackWebApi, 'reactions'>,
  event: InboundEvent,
  name: string
): Promise<void> {
  try {
    await api.reactions.add({ channel: event.chatId, name, timestamp: event.timestampToken });
  } catch (error) {
    log.debug('Slack reactions.add failed', {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
