// ═══════════════════════════════════════════════════════════════════════════════
// TEMPLATE RENDERER — Lookup + Enrichment Ahead of Every Render
// ═══════════════════════════════════════════════════════════════════════════════

import type { NotificationUser } from '../../users/types.js';
import type { Notification } from '../types.js';
import type { NotificationTemplate, RenderInput } from './base.js';
import { enrichContext } from './enrichment.js';
import type { TemplateRegistry } from './registry.js';

export interface PreparedRender {
  template: NotificationTemplate;
  input: RenderInput;
}

export interface TemplateRendererOptions {
  frontendBaseUrl: string;
  /** Recipient-scoped link placed in email and digest footers */
  unsubscribeLink?: (recipient: NotificationUser) => string | undefined;
}

export class TemplateRenderer {
  constructor(
    readonly registry: TemplateRegistry,
    private readonly options: TemplateRendererOptions
  ) {}

  /**
   * @throws TemplateLookupError when the notification's type has no template
   */
  prepare(notification: Notification, recipient: NotificationUser): PreparedRender {
    const template = this.registry.getTemplate(notification.type);
    const unsubscribeLink = this.options.unsubscribeLink?.(recipient);

    const context = enrichContext(notification.context, recipient, {
      frontendBaseUrl: this.options.frontendBaseUrl,
      ...(unsubscribeLink ? { unsubscribeLink } : {}),
    });

    return { template, input: { notification, recipient, context } };
  }

  unsubscribeLinkFor(recipient: NotificationUser): string | undefined {
    return this.options.unsubscribeLink?.(recipient);
  }

  get frontendBaseUrl(): string {
    return this.options.frontendBaseUrl;
  }
}
