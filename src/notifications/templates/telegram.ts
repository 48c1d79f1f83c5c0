// ═══════════════════════════════════════════════════════════════════════════════
// TELEGRAM HTML — Markdown to the Bot API's Restricted Tag Set
// ═══════════════════════════════════════════════════════════════════════════════
//
// Allowed: b, i, u, s, span.tg-spoiler, code, pre, a[href].
// Any other element is unwrapped (its text survives); script and style are
// dropped together with their content.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { unified, type Plugin } from 'unified';
import remarkParse from 'remark-parse';
import remarkGfm from 'remark-gfm';
import remarkRehype from 'remark-rehype';
import rehypeParse from 'rehype-parse';
import rehypeRaw from 'rehype-raw';
import rehypeSanitize, { type Options as SanitizeSchema } from 'rehype-sanitize';
import rehypeStringify from 'rehype-stringify';
import type { Element, ElementContent, Root } from 'hast';

const TAG_ALIASES: Record<string, string> = {
  strong: 'b',
  em: 'i',
  ins: 'u',
  del: 's',
  strike: 's',
  h1: 'b',
  h2: 'b',
  h3: 'b',
  h4: 'b',
  h5: 'b',
  h6: 'b',
};

const LINK_PROTOCOLS = ['http', 'https', 'mailto', 'tg'];

export const TELEGRAM_SANITIZE_SCHEMA: SanitizeSchema = {
  tagNames: ['b', 'i', 'u', 's', 'span', 'code', 'pre', 'a'],
  attributes: {
    a: ['href'],
    span: [['className', 'tg-spoiler']],
  },
  protocols: { href: LINK_PROTOCOLS },
  strip: ['script', 'style'],
};

// ─────────────────────────────────────────────────────────────────────────────────
// ELEMENT REWRITES
// ─────────────────────────────────────────────────────────────────────────────────

function isSpoiler(node: Element): boolean {
  const className = node.properties.className;
  return Array.isArray(className) && className.includes('tg-spoiler');
}

function hasAllowedHref(node: Element): boolean {
  const href = node.properties.href;
  if (typeof href !== 'string') return false;
  const match = /^([a-z][a-z0-9+.-]*):/i.exec(href);
  return match !== null && match[1] !== undefined && LINK_PROTOCOLS.includes(match[1].toLowerCase());
}

function rewrite(node: ElementContent): ElementContent[] {
  if (node.type !== 'element') return [node];

  node.children = node.children.flatMap(rewrite);

  if (node.tagName === 'br') {
    return [{ type: 'text', value: '\n' }];
  }
  if (node.tagName === 'li') {
    node.children.unshift({ type: 'text', value: '• ' });
  }
  if (node.tagName === 'span' && !isSpoiler(node)) {
    return node.children;
  }
  if (node.tagName === 'a' && !hasAllowedHref(node)) {
    return node.children;
  }

  node.tagName = TAG_ALIASES[node.tagName] ?? node.tagName;
  return [node];
}

const telegramElements: Plugin<[], Root> = () => (tree: Root) => {
  tree.children = tree.children.flatMap(child => (child.type === 'doctype' ? [] : rewrite(child)));
};

// ─────────────────────────────────────────────────────────────────────────────────
// PIPELINES
// ─────────────────────────────────────────────────────────────────────────────────

const htmlSanitizer = unified()
  .use(rehypeParse, { fragment: true })
  .use(telegramElements)
  .use(rehypeSanitize, TELEGRAM_SANITIZE_SCHEMA)
  .use(rehypeStringify, { characterReferences: { useNamedReferences: true } });

const markdownConverter = unified()
  .use(remarkParse)
  .use(remarkGfm)
  .use(remarkRehype, { allowDangerousHtml: true })
  .use(rehypeRaw)
  .use(telegramElements)
  .use(rehypeSanitize, TELEGRAM_SANITIZE_SCHEMA)
  .use(rehypeStringify, { characterReferences: { useNamedReferences: true } });

function tidy(html: string): string {
  return html.replace(/\n{3,}/g, '\n\n').trim();
}

export function sanitizeTelegramHtml(html: string): string {
  return tidy(String(htmlSanitizer.processSync(html)));
}

export function markdownToTelegramHtml(markdown: string): string {
  return tidy(String(markdownConverter.processSync(markdown)));
}
