// ═══════════════════════════════════════════════════════════════════════════════
// HTML RENDERING — Markdown to HTML, Escaping, Email Layout
// ═══════════════════════════════════════════════════════════════════════════════

import { unified } from 'unified';
import remarkParse from 'remark-parse';
import remarkGfm from 'remark-gfm';
import remarkRehype from 'remark-rehype';
import rehypeStringify from 'rehype-stringify';

export type Escaper = (value: string) => string;

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);
}

const markdownProcessor = unified()
  .use(remarkParse)
  .use(remarkGfm)
  .use(remarkRehype)
  .use(rehypeStringify);

/**
 * Raw HTML inside the markdown is dropped; interpolated values should be
 * escaped before they get here.
 */
export function markdownToHtml(markdown: string): string {
  return String(markdownProcessor.processSync(markdown));
}

// ─────────────────────────────────────────────────────────────────────────────────
// EMAIL LAYOUT
// ─────────────────────────────────────────────────────────────────────────────────

export interface EmailLayoutOptions {
  heading: string;
  /** Already-rendered HTML */
  content: string;
  actionUrl?: string;
  actionLabel?: string;
  unsubscribeLink?: string;
}

export function renderEmailLayout(options: EmailLayoutOptions): string {
  const lines: string[] = [];

  lines.push('<!DOCTYPE html>');
  lines.push('<html>');
  lines.push('<body style="font-family: Helvetica, Arial, sans-serif; color: #1f2933; line-height: 1.5;">');
  lines.push(`<h2>${escapeHtml(options.heading)}</h2>`);
  lines.push(options.content);

  if (options.actionUrl) {
    lines.push(
      `<p><a href="${escapeHtml(options.actionUrl)}">${escapeHtml(options.actionLabel ?? 'Open in app')}</a></p>`
    );
  }

  if (options.unsubscribeLink) {
    lines.push('<hr>');
    lines.push(
      `<p style="font-size: 12px; color: #7b8794;">` +
      `<a href="${escapeHtml(options.unsubscribeLink)}">Manage or unsubscribe from these emails</a></p>`
    );
  }

  lines.push('</body>');
  lines.push('</html>');
  return lines.join('\n');
}
