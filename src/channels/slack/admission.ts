/**
 * Slack Relay — Inbound Admission
 *
 * Decides whether an inbound Slack event reaches the agent. The decision
 * is a pure function of the event, the access policy and the bot's user
 * ID; it keeps no history between events.
 */

import type {
  AccessPolicy,
  AdmissionDecision,
  IgnoreDecision,
  IgnoreReason,
  InboundEvent,
} from '../types.js';

/** The only subtype that still represents a user-authored message. */
export const ATTACHMENT_SUBTYPE = 'file_share';

// ============================================================================
// MENTIONS
// ============================================================================

export function mentionToken(botId: string): string {
  return `<@${botId}>`;
}

export function mentionsBot(text: string, botId: string): boolean {
  return botId !== '' && text.includes(mentionToken(botId));
}

/**
 * Remove every mention of the bot (with one trailing space) and trim.
 */
export function stripBotMention(text: string, botId: string): string {
  if (botId === '') return text.trim();
  const token = mentionToken(botId);
  return text.split(`${token} `).join('').split(token).join('').trim();
}

// ============================================================================
// DECISION
// ============================================================================

function ignore(reason: IgnoreReason): IgnoreDecision {
  return { action: 'ignore', reason };
}

/**
 * Admit or ignore one event. Rules are checked in a fixed order and the
 * first one that rejects wins.
 */
export function decide(event: InboundEvent, policy: AccessPolicy, botId: string): AdmissionDecision {
  if (event.eventType !== 'message' && event.eventType !== 'mention') {
    return ignore('unsupported event type');
  }

  // Edits, deletions, bot posts, joins... anything but a file upload
  if (event.subtype && event.subtype !== ATTACHMENT_SUBTYPE) {
    return ignore('system/edit subtype');
  }

  if (botId !== '' && event.senderId === botId) {
    return ignore('self-authored');
  }

  // Slack sends both `message` and `app_mention` for a channel mention.
  // Only `message` carries files, so it is kept when it has any.
  const mentioned = mentionsBot(event.text, botId);
  if (event.eventType === 'message' && mentioned && !event.hasAttachments) {
    return ignore('superseded by mention event');
  }

  if (!event.senderId || !event.chatId) {
    return ignore('missing identity');
  }

  const denied = event.channelType === 'im'
    ? checkDirectMessage(event, policy)
    : checkGroup(event, policy, mentioned);
  if (denied) return ignore(denied);

  return {
    action: 'admit',
    text: stripBotMention(event.text, botId),
    threadToken: event.threadToken || event.timestampToken,
    chatId: event.chatId,
    senderId: event.senderId,
    channelType: event.channelType,
  };
}

function checkDirectMessage(event: InboundEvent, policy: AccessPolicy): IgnoreReason | null {
  const dm = policy.directMessage;
  if (!dm.enabled) return 'dm disabled';

  switch (dm.mode) {
    case 'open':
      return null;
    case 'allowlist':
      return dm.allowFrom.has(event.senderId) ? null : 'sender not allowlisted';
    default:
      return 'no matching policy';
  }
}

function checkGroup(event: InboundEvent, policy: AccessPolicy, mentioned: boolean): IgnoreReason | null {
  const group = policy.group;

  switch (group.mode) {
    case 'open':
      return null;
    case 'mention':
      return event.eventType === 'mention' || mentioned ? null : 'mention required';
    case 'allowlist':
      return group.allowFrom.has(event.chatId) ? null : 'channel not allowlisted';
    default:
      return 'no matching policy';
  }
}
