/**
 * Slack Relay — Channel Types
 *
 * Platform-neutral shapes shared by the rendering pipeline, the admission
 * filter and the channel plugin: inbound events, access policy, admission
 * decisions and the envelopes exchanged with the agent backend.
 */

// ============================================================================
// CHANNEL
// ============================================================================

export type RelayChannel = 'slack';

/** Conversation kind. Slack `mpim` and private channels collapse into `group`. */
export type ChannelType = 'im' | 'channel' | 'group';

// ============================================================================
// INBOUND EVENT
// ============================================================================

export interface InboundAttachment {
  id?: string;
  name?: string;
  mimeType?: string;
  url?: string;
  size?: number;
}

/**
 * One inbound platform callback, constructed once and never mutated.
 *
 * `eventType` is `'message'` or `'mention'` for the kinds the filter
 * understands; any other platform type is carried through verbatim.
 */
export interface InboundEvent {
  readonly eventType: string;
  readonly senderId: string;
  readonly chatId: string;
  readonly channelType: ChannelType;
  readonly text: string;
  readonly subtype?: string;
  readonly hasAttachments: boolean;
  readonly attachments: readonly InboundAttachment[];
  readonly timestampToken: string;
  readonly threadToken?: string;
}

// ============================================================================
// ACCESS POLICY
// ============================================================================

export type DirectMessageMode = 'open' | 'allowlist';
export type GroupMode = 'open' | 'mention' | 'allowlist';

export interface AccessPolicy {
  readonly directMessage: {
    readonly enabled: boolean;
    readonly mode: DirectMessageMode;
    readonly allowFrom: ReadonlySet<string>;
  };
  readonly group: {
    readonly mode: GroupMode;
    readonly allowFrom: ReadonlySet<string>;
  };
}

// ============================================================================
// ADMISSION DECISION
// ============================================================================

export type IgnoreReason =
  | 'unsupported event type'
  | 'system/edit subtype'
  | 'self-authored'
  | 'superseded by mention event'
  | 'missing identity'
  | 'dm disabled'
  | 'sender not allowlisted'
  | 'mention required'
  | 'channel not allowlisted'
  | 'no matching policy';

export interface AdmitDecision {
  action: 'admit';
  /** Text with the bot mention removed and surrounding whitespace trimmed. */
  text: string;
  /** Thread to reply in: the event's thread, or the event itself. */
  threadToken: string;
  chatId: string;
  senderId: string;
  channelType: ChannelType;
}

export interface IgnoreDecision {
  action: 'ignore';
  reason: IgnoreReason;
}

export type AdmissionDecision = AdmitDecision | IgnoreDecision;

// ============================================================================
// ENVELOPES
// ============================================================================

export type MediaKind = 'image' | 'document';

/** Admitted message, forwarded to the agent backend. */
export interface ChatIngressEnvelope {
  channel: RelayChannel;
  platformMessageId: string;
  conversationId: string;
  threadId: string;
  peerId: string;
  text: string;
  media?: Array<{
    kind: MediaKind;
    ref: string;
    mimeType: string;
    fileName?: string;
    size?: number;
  }>;
  channelType: ChannelType;
  isGroup: boolean;
  timestamp: string;
}

/** Agent reply, to be rendered and posted. */
export interface ChatEgressEnvelope {
  channel: RelayChannel;
  conversationId: string;
  text: string;
  threadId?: string;
  channelType?: ChannelType;
}

/** Result of posting a message to the platform. */
export interface DeliveryResult {
  success: boolean;
  platformMessageId?: string;
  error?: string;
  retryable?: boolean;
}

// ============================================================================
// PLUGIN
// ============================================================================

/**
 * A channel plugin bridges a messaging platform to the agent backend.
 * The transport (socket, HTTP endpoint) feeds `receive` and calls `deliver`.
 */
export interface ChannelPlugin {
  /** Unique channel identifier */
  readonly channel: RelayChannel;

  /** Human-readable display name */
  readonly displayName: string;

  /**
   * Admit or ignore one raw platform payload.
   * Admitted messages are handed to `onInbound`.
   *
   * @returns the decision, or null when the payload is not an event at all
   */
  receive(
    payload: unknown,
    onInbound: (envelope: ChatIngressEnvelope) => Promise<void>
  ): Promise<AdmissionDecision | null>;

  /**
   * Render and post an outbound message.
   */
  deliver(envelope: ChatEgressEnvelope): Promise<DeliveryResult>;

  /**
   * Current plugin status, for diagnostics.
   */
  getStatus(): string;
}
