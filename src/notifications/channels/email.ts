// ═══════════════════════════════════════════════════════════════════════════════
// EMAIL CHANNEL — SMTP Transport, Rendering, Outbound Log
// ═══════════════════════════════════════════════════════════════════════════════

import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import { getLogger } from '../../logging/index.js';
import {
  DeliveryError,
  PermanentDeliveryError,
  TransientDeliveryError,
  errorCode,
  errorMessage,
  isTransientError,
} from '../errors.js';
import { isChannelEnabled, isNotificationTypeEnabled } from '../preferences.js';
import type { EmailLogStore } from '../store.js';
import type { EmailAttachments } from '../templates/base.js';
import type { TemplateRenderer } from '../templates/renderer.js';
import type { NotificationUser } from '../../users/types.js';
import { BaseChannelDriver, type ChannelDriverDeps, type SendOutcome } from './base.js';
import type { DeliveryTarget } from './types.js';

const logger = getLogger({ component: 'email' });

// ─────────────────────────────────────────────────────────────────────────────────
// TRANSPORT
// ─────────────────────────────────────────────────────────────────────────────────

export interface EmailMessage {
  to: string;
  subject: string;
  text: string;
  html?: string;
  attachments?: EmailAttachments;
  headers?: Record<string, string>;
}

export interface EmailSendResult {
  messageId?: string;
}

/**
 * Throws TransientDeliveryError or PermanentDeliveryError on failure.
 */
export interface EmailTransport {
  send(message: EmailMessage): Promise<EmailSendResult>;
}

export interface SmtpTransportConfig {
  from: string;
  host: string;
  port: number;
  secure: boolean;
  user?: string;
  password?: string;
}

function responseCode(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('responseCode' in error)) return undefined;
  return typeof error.responseCode === 'number' ? error.responseCode : undefined;
}

/**
 * 5xx replies and rejected envelopes are permanent. Everything else,
 * including 4xx replies and dropped connections, is transient.
 */
export function classifySmtpError(error: unknown): DeliveryError {
  if (error instanceof DeliveryError) return error;

  const message = errorMessage(error);
  const code = responseCode(error);

  if (code !== undefined && code >= 500) {
    const reason = code === 550 || code === 553 ? 'invalid_address' : 'rejected';
    return new PermanentDeliveryError(message, reason, { cause: error });
  }
  if (code !== undefined && code >= 400) {
    return new TransientDeliveryError(message, undefined, { cause: error });
  }
  if (errorCode(error) === 'EENVELOPE') {
    return new PermanentDeliveryError(message, 'invalid_address', { cause: error });
  }
  if (!isTransientError(error)) {
    logger.debug('Unclassified SMTP error treated as transient', { code: errorCode(error) });
  }
  return new TransientDeliveryError(message, undefined, { cause: error });
}

export class SmtpEmailTransport implements EmailTransport {
  private readonly transporter: Transporter;

  constructor(private readonly config: SmtpTransportConfig) {
    this.transporter = nodemailer.createTransport({
      host: config.host,
      port: config.port,
      secure: config.secure,
      ...(config.user && config.password
        ? { auth: { user: config.user, pass: config.password } }
        : {}),
    });
  }

  async send(message: EmailMessage): Promise<EmailSendResult> {
    try {
      const info = await this.transporter.sendMail({
        from: this.config.from,
        to: message.to,
        subject: message.subject,
        text: message.text,
        ...(message.html !== undefined && { html: message.html }),
        ...(message.headers !== undefined && { headers: message.headers }),
        attachments: Object.entries(message.attachments ?? {}).map(([filename, attachment]) => ({
          filename,
          content: attachment.content,
          contentType: attachment.contentType,
        })),
      });
      return { messageId: info.messageId };
    } catch (error) {
      throw classifySmtpError(error);
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// DRIVER
// ─────────────────────────────────────────────────────────────────────────────────

export interface EmailChannelDeps extends ChannelDriverDeps {
  transport: EmailTransport;
  renderer: TemplateRenderer;
  emailLogs: EmailLogStore;
  /** Every message goes here instead when set (non-production only) */
  catchAllAddress?: string;
}

/**
 * Address a message should actually go to. Returns null when the user has
 * no verified address.
 */
export function deliverableAddress(recipient: NotificationUser, catchAllAddress?: string): string | null {
  if (!recipient.email || !recipient.emailVerified) return null;
  return catchAllAddress ?? recipient.email;
}

export class EmailChannelDriver extends BaseChannelDriver<'email'> {
  protected readonly channel = 'email';
  private readonly transport: EmailTransport;
  private readonly renderer: TemplateRenderer;
  private readonly emailLogs: EmailLogStore;
  private readonly catchAllAddress?: string;

  constructor(deps: EmailChannelDeps) {
    super(deps);
    this.transport = deps.transport;
    this.renderer = deps.renderer;
    this.emailLogs = deps.emailLogs;
    this.catchAllAddress = deps.catchAllAddress;
  }

  canDeliver({ notification, recipient, preference }: DeliveryTarget): boolean {
    return (
      isChannelEnabled(preference, 'email') &&
      isNotificationTypeEnabled(preference, notification.type) &&
      deliverableAddress(recipient) !== null
    );
  }

  protected async send({ notification, recipient }: DeliveryTarget): Promise<SendOutcome> {
    const to = deliverableAddress(recipient, this.catchAllAddress);
    if (!to) {
      throw new PermanentDeliveryError('Recipient has no verified email address', 'invalid_address');
    }

    const { template, input } = this.renderer.prepare(notification, recipient);
    const unsubscribeLink = this.renderer.unsubscribeLinkFor(recipient);

    const message: EmailMessage = {
      to,
      subject: template.getEmailSubject(input),
      text: template.getEmailTextBody(input),
      html: template.getEmailHtmlBody(input),
      attachments: template.getEmailAttachments(input),
      ...(unsubscribeLink ? { headers: { 'List-Unsubscribe': `<${unsubscribeLink}>` } } : {}),
    };

    if (to !== recipient.email) {
      logger.debug('Redirecting email to catch-all address', { notificationId: notification.id });
    }

    const result = await this.transport.send(message);

    return {
      metadata: {
        recipient: to,
        ...(result.messageId !== undefined && { messageId: result.messageId }),
      },
      afterSend: async () => {
        await this.emailLogs.record({
          userId: recipient.id,
          notificationIds: [notification.id],
          recipient: to,
          subject: message.subject,
          ...(result.messageId !== undefined && { messageId: result.messageId }),
          digest: false,
          sentAt: this.clock().toISOString(),
        });
      },
    };
  }
}
