/**
 * Slack Relay — Inbound Message Normalizer
 *
 * Turns an admitted InboundEvent into the ChatIngressEnvelope handed to
 * the agent backend. Attachments are passed on as references only; the
 * backend fetches what it needs.
 */

import type { AdmitDecision, ChatIngressEnvelope, InboundAttachment, InboundEvent } from '../channels/types.js';

/** Mimetypes the agent backend can consume. */
export const SUPPORTED_MEDIA_TYPES: ReadonlySet<string> = new Set([
  'image/jpeg',
  'image/png',
  'image/gif',
  'image/webp',
  'application/pdf',
]);

/**
 * Normalize an admitted event into a ChatIngressEnvelope.
 */
export function normalizeInbound(event: InboundEvent, admitted: AdmitDecision): ChatIngressEnvelope {
  const media = extractMedia(event.attachments);

  return {
    channel: 'slack',
    platformMessageId: event.timestampToken,
    conversationId: admitted.chatId,
    threadId: admitted.threadToken,
    peerId: admitted.senderId,
    text: admitted.text,
    media: media.length > 0 ? media : undefined,
    channelType: admitted.channelType,
    isGroup: admitted.channelType !== 'im',
    timestamp: slackTsToIso(event.timestampToken),
  };
}

function extractMedia(attachments: readonly InboundAttachment[]): NonNullable<ChatIngressEnvelope['media']> {
  const media: NonNullable<ChatIngressEnvelope['media']> = [];

  for (const file of attachments) {
    if (!file.mimeType || !SUPPORTED_MEDIA_TYPES.has(file.mimeType)) continue;

    const ref = file.url || file.id;
    if (!ref) continue;

    media.push({
      kind: file.mimeType.startsWith('image/') ? 'image' : 'document',
      ref,
      mimeType: file.mimeType,
      fileName: file.name,
      size: file.size,
    });
  }

  return media;
}

/**
 * Slack `ts` values are epoch seconds with a microsecond suffix ("1700000000.000100").
 */
export function slackTsToIso(ts: string): string {
  const date = new Date(Number(ts) * 1000);
  // Finite but out-of-range values ("1e20") still give an Invalid Date
  if (!ts || Number.isNaN(date.getTime())) return new Date().toISOString();
  return date.toISOString();
}
