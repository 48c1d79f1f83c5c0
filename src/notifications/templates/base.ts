// ═══════════════════════════════════════════════════════════════════════════════
// NOTIFICATION TEMPLATE — Per-Channel Rendering Contract
// ═══════════════════════════════════════════════════════════════════════════════

import type { NotificationUser } from '../../users/types.js';
import type { Notification, NotificationContext, NotificationType } from '../types.js';
import type { TemplateCatalogEntry } from './catalog.js';
import { escapeHtml, markdownToHtml, renderEmailLayout, type Escaper } from './html.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * What every render call receives. `context` is the enriched copy; the
 * notification's own context is never mutated.
 */
export interface RenderInput {
  notification: Notification;
  recipient: NotificationUser;
  context: NotificationContext;
}

export interface EmailAttachment {
  content: string | Buffer;
  contentType: string;
}

/** Keyed by file name */
export type EmailAttachments = Record<string, EmailAttachment>;

// ─────────────────────────────────────────────────────────────────────────────────
// INTERPOLATION
// ─────────────────────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function lookup(values: Record<string, unknown>, path: string): unknown {
  let current: unknown = values;
  for (const segment of path.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[segment];
  }
  return current;
}

function stringify(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

/**
 * Replaces `{{key}}` and `{{nested.key}}` placeholders. Missing or non-scalar
 * values render as empty strings.
 */
export function interpolate(template: string, values: Record<string, unknown>, escape?: Escaper): string {
  return template.replace(/\{\{\s*([\w.]+)\s*\}\}/g, (_match, path: string) => {
    const text = stringify(lookup(values, path));
    return escape ? escape(text) : text;
  });
}

// ─────────────────────────────────────────────────────────────────────────────────
// BASE TEMPLATE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * One stateless instance per notification type. Subclasses supply the title
 * and subject; every other channel rendering has a default built from the
 * type's catalogue body.
 */
export abstract class NotificationTemplate {
  constructor(
    readonly type: NotificationType,
    protected readonly entry: TemplateCatalogEntry
  ) {}

  abstract getInAppTitle(input: RenderInput, escape?: Escaper): string;

  abstract getEmailSubject(input: RenderInput): string;

  /** Markdown */
  getInAppBody(input: RenderInput, escape?: Escaper): string {
    return interpolate(this.entry.body, input.context, escape).trim();
  }

  getEmailTextBody(input: RenderInput): string {
    const lines: string[] = [];
    lines.push(`Hi ${input.recipient.displayName},`);
    lines.push('');
    lines.push(this.getInAppBody(input));

    const actionUrl = stringify(input.context.actionUrl);
    if (actionUrl) {
      lines.push('');
      lines.push(`Open in app: ${actionUrl}`);
    }

    const unsubscribeLink = stringify(input.context.unsubscribeLink);
    if (unsubscribeLink) {
      lines.push('');
      lines.push('--');
      lines.push(`Manage or unsubscribe from these emails: ${unsubscribeLink}`);
    }

    return lines.join('\n');
  }

  getEmailHtmlBody(input: RenderInput): string {
    const actionUrl = stringify(input.context.actionUrl);
    const unsubscribeLink = stringify(input.context.unsubscribeLink);

    return renderEmailLayout({
      heading: this.getInAppTitle(input),
      content: markdownToHtml(this.getInAppBody(input, escapeHtml)),
      ...(actionUrl ? { actionUrl } : {}),
      ...(unsubscribeLink ? { unsubscribeLink } : {}),
    });
  }

  getEmailAttachments(_input: RenderInput): EmailAttachments {
    return {};
  }

  /** Markdown; the telegram channel sanitizes it after conversion */
  getTelegramBody(input: RenderInput): string {
    return `**${this.getInAppTitle(input, escapeHtml)}**\n\n${this.getInAppBody(input, escapeHtml)}`;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// CATALOGUE TEMPLATE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Renders every channel straight from the catalogue entry.
 */
export class CatalogTemplate extends NotificationTemplate {
  getInAppTitle(input: RenderInput, escape?: Escaper): string {
    return interpolate(this.entry.title, input.context, escape);
  }

  getEmailSubject(input: RenderInput): string {
    return interpolate(this.entry.subject, input.context);
  }
}
