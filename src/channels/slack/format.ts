/**
 * Slack Relay — Slack Message Formatting
 *
 * Converts generic Markdown into Slack's mrkdwn dialect.
 * Slack uses: *bold*, _italic_, ~strikethrough~, <url|label>, `code`
 *
 * Bold and italic collide once bold has been rewritten to single asterisks,
 * so every span a stage produces that later stages must not touch is parked
 * in a placeholder vault and restored verbatim at the very end.
 */

const HEADER_RE = /^#{1,6}[ \t]+(.+?)[ \t]*$/gm;
const LINK_RE = /\[([^\]]+)\]\(([^)]+)\)/g;
const STRIKE_RE = /~~([^~\n]+)~~/g;
const BOLD_STAR_RE = /\*\*([^*\n]+)\*\*/g;
const BOLD_UNDERSCORE_RE = /__([^_\n]+)__/g;
const ITALIC_STAR_RE = /(?<!\*)\*(?![*\s])([^*\n]+?)(?<![*\s])\*(?!\*)/g;
const BULLET_RE = /^([ \t]*)- /gm;

const FENCED_CODE_RE = /```[\s\S]*?```/g;
const INLINE_CODE_RE = /`[^`\n]+`/g;

// ============================================================================
// PLACEHOLDERS
// ============================================================================

/**
 * Ordered list of protected spans. Tokens contain no markup characters,
 * so no conversion stage can match inside one. The per-vault nonce keeps
 * NUL-delimited text already present in the input from being restored.
 */
class PlaceholderVault {
  private readonly spans: string[] = [];
  private readonly nonce = Math.random().toString(36).slice(2, 10);

  protect(span: string): string {
    this.spans.push(span);
    return this.tokenFor(this.spans.length - 1);
  }

  /**
   * Later spans may embed earlier tokens (a bold span around a link),
   * so restore newest first.
   */
  restore(text: string): string {
    let result = text;
    for (let i = this.spans.length - 1; i >= 0; i--) {
      result = result.split(this.tokenFor(i)).join(this.spans[i]);
    }
    return result;
  }

  private tokenFor(index: number): string {
    return `\u0000${this.nonce}:${index}\u0000`;
  }
}

// ============================================================================
// CONVERSION
// ============================================================================

/**
 * Convert Markdown to Slack mrkdwn.
 *
 * Unbalanced or overlapping markers are left as literal text.
 */
export function markdownToSlack(text: string): string {
  if (!text) return text;

  const vault = new PlaceholderVault();

  // Code is rendered natively by Slack and must come through untouched
  let result = text.replace(FENCED_CODE_RE, (code) => vault.protect(code));
  result = result.replace(INLINE_CODE_RE, (code) => vault.protect(code));

  // Headers: # Title → *Title*, protected whole so no later stage re-reads it
  result = result.replace(HEADER_RE, (_line, title: string) => vault.protect(`*${headerTitle(title, vault)}*`));

  // Links: [label](url) → <url|label>, url shielded from emphasis stages
  result = result.replace(LINK_RE, (_link, label: string, url: string) => {
    return `<${vault.protect(url)}|${label}>`;
  });

  // Strikethrough: ~~text~~ → ~text~
  result = result.replace(STRIKE_RE, '~$1~');

  // Bold: **text** or __text__ → *text*, protected from the italic stage
  result = result.replace(BOLD_STAR_RE, (_bold, inner: string) => vault.protect(`*${inner}*`));
  result = result.replace(BOLD_UNDERSCORE_RE, (_bold, inner: string) => vault.protect(`*${inner}*`));

  // Italic: remaining single *text* → _text_ (_text_ is already Slack italic)
  result = result.replace(ITALIC_STAR_RE, '_$1_');

  // Bullets: leading "- " → "* ", indentation kept
  result = result.replace(BULLET_RE, '$1* ');

  return vault.restore(result);
}

/**
 * A header title is wrapped in one bold span, so it cannot carry bold of its
 * own: inner bold markers are dropped, italics become underscores and any
 * stray asterisk is removed.
 */
function headerTitle(title: string, vault: PlaceholderVault): string {
  return title
    .replace(/\*\*|__/g, '')
    .replace(LINK_RE, (_link, label: string, url: string) => `<${vault.protect(url)}|${label}>`)
    .replace(STRIKE_RE, '~$1~')
    .replace(ITALIC_STAR_RE, '_$1_')
    .replace(/\*/g, '');
}
