import { describe, it, expect, vi, afterEach } from 'vitest';
import { normalizeInbound, slackTsToIso } from '../inbound.js';
import type { AdmitDecision, InboundEvent } from '../../channels/types.js';

/**
 * Helper to build an admitted event and its decision.
 */
function makeAdmitted(
  eventOverrides?: Partial<InboundEvent>,
  decisionOverrides?: Partial<AdmitDecision>
): [InboundEvent, AdmitDecision] {
  const event: InboundEvent = {
    eventType: 'message',
    senderId: 'U123',
    chatId: 'C456',
    channelType: 'channel',
    text: '<@U0BOT> hello',
    hasAttachments: false,
    attachments: [],
    timestampToken: '1700000000.000100',
    ...eventOverrides,
  };
  const decision: AdmitDecision = {
    action: 'admit',
    text: 'hello',
    threadToken: '1700000000.000100',
    chatId: event.chatId,
    senderId: event.senderId,
    channelType: event.channelType,
    ...decisionOverrides,
  };
  return [event, decision];
}

describe('normalizeInbound', () => {
  it('converts an admitted event to a ChatIngressEnvelope', () => {
    const result = normalizeInbound(...makeAdmitted());

    expect(result).toEqual({
      channel: 'slack',
      platformMessageId: '1700000000.000100',
      conversationId: 'C456',
      threadId: '1700000000.000100',
      peerId: 'U123',
      text: 'hello',
      media: undefined,
      channelType: 'channel',
      isGroup: true,
      timestamp: '2023-11-14T22:13:20.000Z',
    });
  });

  it('takes the text from the decision, not the raw event', () => {
    const result = normalizeInbound(...makeAdmitted({ text: '<@U0BOT> raw' }, { text: 'stripped' }));
    expect(result.text).toBe('stripped');
  });

  it('marks direct messages as not a group', () => {
    const result = normalizeInbound(...makeAdmitted({ channelType: 'im', chatId: 'D100' }));

    expect(result.isGroup).toBe(false);
    expect(result.channelType).toBe('im');
    expect(result.conversationId).toBe('D100');
  });

  it('keeps the parent thread of a reply', () => {
    const result = normalizeInbound(...makeAdmitted({}, { threadToken: '1699999999.000001' }));
    expect(result.threadId).toBe('1699999999.000001');
  });

  it('passes supported attachments on as media references', () => {
    const [event, decision] = makeAdmitted({
      hasAttachments: true,
      attachments: [
        { id: 'F1', name: 'photo.jpg', mimeType: 'image/jpeg', url: 'https://files.slack.test/F1', size: 1024 },
        { id: 'F2', name: 'report.pdf', mimeType: 'application/pdf', url: 'https://files.slack.test/F2' },
      ],
    });

    expect(normalizeInbound(event, decision).media).toEqual([
      { kind: 'image', ref: 'https://files.slack.test/F1', mimeType: 'image/jpeg', fileName: 'photo.jpg', size: 1024 },
      { kind: 'document', ref: 'https://files.slack.test/F2', mimeType: 'application/pdf', fileName: 'report.pdf', size: undefined },
    ]);
  });

  it('drops unsupported or unknown mimetypes', () => {
    const [event, decision] = makeAdmitted({
      hasAttachments: true,
      attachments: [
        { id: 'F1', mimeType: 'application/zip', url: 'https://files.slack.test/F1' },
        { id: 'F2', url: 'https://files.slack.test/F2' },
      ],
    });

    expect(normalizeInbound(event, decision).media).toBeUndefined();
  });

  it('falls back to the file ID when there is no URL', () => {
    const [event, decision] = makeAdmitted({
      hasAttachments: true,
      attachments: [{ id: 'F9', mimeType: 'image/png' }],
    });

    expect(normalizeInbound(event, decision).media).toEqual([
      { kind: 'image', ref: 'F9', mimeType: 'image/png', fileName: undefined, size: undefined },
    ]);
  });
});

describe('slackTsToIso', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('converts epoch seconds with a microsecond suffix', () => {
    expect(slackTsToIso('1700000000.000100')).toBe('2023-11-14T22:13:20.000Z');
    expect(slackTsToIso('1700000000.5')).toBe('2023-11-14T22:13:20.500Z');
  });

  it('uses the current time for an empty or invalid ts', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-02T03:04:05.000Z'));

    expect(slackTsToIso('')).toBe('2026-01-02T03:04:05.000Z');
    expect(slackTsToIso('not-a-ts')).toBe('2026-01-02T03:04:05.000Z');
  });

  it('uses the current time for a ts outside the Date range', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-02T03:04:05.000Z'));

    expect(slackTsToIso('1e20')).toBe('2026-01-02T03:04:05.000Z');
  });
});
