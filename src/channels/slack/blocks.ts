/**
 * Slack Relay — Block Chunking
 *
 * Splits converted mrkdwn into Block Kit sized pieces. Slack caps a section
 * text at 3000 characters and a message at 50 blocks.
 */

import type { ContextBlock, KnownBlock, SectionBlock } from '@slack/types';
import { markdownToSlack } from './format.js';

export const MAX_BLOCK_LENGTH = 3000;
export const MAX_BLOCKS = 50;

const PARAGRAPH_SEPARATOR = '\n\n';
const LINE_SEPARATOR = '\n';
const ELLIPSIS = '...';

// ============================================================================
// TYPES
// ============================================================================

export interface RenderedBlock {
  kind: 'text' | 'note';
  body: string;
}

/** Ordered blocks for one outbound message, at most MAX_BLOCKS long. */
export type ChunkPlan = readonly RenderedBlock[];

export interface SlackMessage {
  /** Full converted text, used by Slack for notifications. */
  text: string;
  blocks: KnownBlock[];
}

// ============================================================================
// GREEDY PACKING
// ============================================================================

/**
 * Accumulates segments joined by a separator until the next one would push
 * the joined length past MAX_BLOCK_LENGTH.
 */
class ChunkAccumulator {
  private parts: string[] = [];
  private length = 0;

  constructor(
    private readonly separator: string,
    private readonly out: string[]
  ) {}

  fits(segment: string): boolean {
    if (this.parts.length === 0) return segment.length <= MAX_BLOCK_LENGTH;
    return this.length + this.separator.length + segment.length <= MAX_BLOCK_LENGTH;
  }

  add(segment: string): void {
    this.length = this.parts.length === 0
      ? segment.length
      : this.length + this.separator.length + segment.length;
    this.parts.push(segment);
  }

  flush(): void {
    const chunk = this.parts.join(this.separator);
    // Blank runs between paragraphs carry nothing Slack can render
    if (chunk.trim().length > 0) {
      this.out.push(chunk);
    }
    this.parts = [];
    this.length = 0;
  }
}

/**
 * Split text longer than MAX_BLOCK_LENGTH into ordered chunks:
 * by paragraph, then by line, hard-truncating a single oversized line.
 */
export function splitIntoChunks(text: string): string[] {
  const chunks: string[] = [];
  const paragraphs = new ChunkAccumulator(PARAGRAPH_SEPARATOR, chunks);

  for (const paragraph of text.split(PARAGRAPH_SEPARATOR)) {
    if (paragraph.length <= MAX_BLOCK_LENGTH) {
      if (!paragraphs.fits(paragraph)) paragraphs.flush();
      paragraphs.add(paragraph);
      continue;
    }

    paragraphs.flush();
    const lines = new ChunkAccumulator(LINE_SEPARATOR, chunks);

    for (const line of paragraph.split(LINE_SEPARATOR)) {
      if (line.length > MAX_BLOCK_LENGTH) {
        // The remainder of the line is dropped without a note
        lines.flush();
        chunks.push(line.slice(0, truncationCut(line)) + ELLIPSIS);
        continue;
      }

      if (!lines.fits(line)) lines.flush();
      lines.add(line);
    }

    lines.flush();
  }

  paragraphs.flush();
  return chunks;
}

/** Cut point for a hard truncation, moved back so a surrogate pair stays whole. */
function truncationCut(line: string): number {
  const cut = MAX_BLOCK_LENGTH - ELLIPSIS.length;
  const last = line.charCodeAt(cut - 1);
  return last >= 0xd800 && last <= 0xdbff ? cut - 1 : cut;
}

// ============================================================================
// PLAN
// ============================================================================

/**
 * Plan the blocks for one message. Text that fits a single block is
 * returned whole. Past MAX_BLOCKS, the last slot becomes a note reporting
 * how many chunks were left out.
 */
export function planBlocks(text: string): ChunkPlan {
  if (text.length <= MAX_BLOCK_LENGTH) {
    return [{ kind: 'text', body: text }];
  }

  const chunks = splitIntoChunks(text);
  if (chunks.length <= MAX_BLOCKS) {
    return chunks.map((body): RenderedBlock => ({ kind: 'text', body }));
  }

  // The note takes the last of the MAX_BLOCKS slots, so only MAX_BLOCKS - 1
  // chunks survive and the omitted count is total - 49, not total - 50.
  const kept = chunks.slice(0, MAX_BLOCKS - 1);
  const omitted = chunks.length - kept.length;

  return [
    ...kept.map((body): RenderedBlock => ({ kind: 'text', body })),
    { kind: 'note', body: truncationNote(omitted) },
  ];
}

export function truncationNote(omitted: number): string {
  return `_Message truncated (${omitted} block${omitted === 1 ? '' : 's'} omitted)_`;
}

// ============================================================================
// BLOCK KIT
// ============================================================================

/**
 * Map planned blocks to Block Kit: text → section, note → context.
 */
export function toSlackBlocks(plan: ChunkPlan): KnownBlock[] {
  return plan.map((block): KnownBlock => {
    if (block.kind === 'note') {
      const context: ContextBlock = {
        type: 'context',
        elements: [{ type: 'mrkdwn', text: block.body }],
      };
      return context;
    }

    const section: SectionBlock = {
      type: 'section',
      text: { type: 'mrkdwn', text: block.body },
    };
    return section;
  });
}

/**
 * Render Markdown into a postable Slack message.
 */
export function renderSlackMessage(markdown: string): SlackMessage {
  const text = markdownToSlack(markdown);
  return {
    text,
    blocks: toSlackBlocks(planBlocks(text)),
  };
}
