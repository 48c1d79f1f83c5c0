// ═══════════════════════════════════════════════════════════════════════════════
// TELEGRAM CHANNEL — Bot API Transport, Rate Limit, Reachability
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { getLogger } from '../../logging/index.js';
import type { UserRepository } from '../../users/store.js';
import {
  PermanentDeliveryError,
  TransientDeliveryError,
  errorMessage,
} from '../errors.js';
import { isChannelEnabled, isNotificationTypeEnabled } from '../preferences.js';
import { markdownToTelegramHtml } from '../templates/telegram.js';
import type { TemplateRenderer } from '../templates/renderer.js';
import { BaseChannelDriver, type ChannelDriverDeps, type SendOutcome } from './base.js';
import { TokenBucket } from './rate-limiter.js';
import type { DeliveryTarget } from './types.js';

const logger = getLogger({ component: 'telegram' });

// ─────────────────────────────────────────────────────────────────────────────────
// TRANSPORT
// ─────────────────────────────────────────────────────────────────────────────────

export interface TelegramSendResult {
  messageId?: number;
}

/**
 * Sends HTML-formatted text to a chat. Throws TransientDeliveryError or
 * PermanentDeliveryError on failure.
 */
export interface TelegramTransport {
  sendMessage(chatId: string, html: string): Promise<TelegramSendResult>;
}

export interface BotApiConfig {
  botToken: string;
  apiBaseUrl: string;
  requestTimeoutMs: number;
}

const BotApiResponseSchema = z.object({
  ok: z.boolean(),
  result: z.object({ message_id: z.number() }).passthrough().optional(),
  error_code: z.number().optional(),
  description: z.string().optional(),
  parameters: z.object({ retry_after: z.number().optional() }).passthrough().optional(),
});

type BotApiResponse = z.infer<typeof BotApiResponseSchema>;

/**
 * Maps a failed Bot API reply onto the delivery error taxonomy.
 */
export function classifyBotApiFailure(status: number, body: BotApiResponse | null): Error {
  const description = body?.description ?? `HTTP ${status}`;

  if (status === 429) {
    const retryAfter = body?.parameters?.retry_after;
    return new TransientDeliveryError(description, retryAfter !== undefined ? retryAfter * 1000 : undefined);
  }
  if (status >= 500) {
    return new TransientDeliveryError(description);
  }
  if (status === 403) {
    const reason = /deactivated/i.test(description) ? 'deactivated' : 'blocked';
    return new PermanentDeliveryError(description, reason);
  }
  if (status === 400 && /chat not found/i.test(description)) {
    return new PermanentDeliveryError(description, 'invalid_address');
  }
  return new PermanentDeliveryError(description, 'rejected');
}

export class BotApiTelegramTransport implements TelegramTransport {
  constructor(
    private readonly config: BotApiConfig,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async sendMessage(chatId: string, html: string): Promise<TelegramSendResult> {
    const url = `${this.config.apiBaseUrl.replace(/\/+$/, '')}/bot${this.config.botToken}/sendMessage`;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.requestTimeoutMs);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          chat_id: chatId,
          text: html,
          parse_mode: 'HTML',
          disable_web_page_preview: true,
        }),
        signal: controller.signal,
      });
    } catch (error) {
      const message = error instanceof Error && error.name === 'AbortError'
        ? `Timeout after ${this.config.requestTimeoutMs}ms`
        : errorMessage(error);
      throw new TransientDeliveryError(message, undefined, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }

    const parsed = BotApiResponseSchema.safeParse(await response.json().catch(() => null));
    const body = parsed.success ? parsed.data : null;

    if (response.ok && body?.ok) {
      return { messageId: body.result?.message_id };
    }
    throw classifyBotApiFailure(response.status, body);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// DRIVER
// ─────────────────────────────────────────────────────────────────────────────────

export interface TelegramChannelDeps extends ChannelDriverDeps {
  transport: TelegramTransport;
  renderer: TemplateRenderer;
  users: UserRepository;
  /** Defaults to 20 messages per second with an equal burst */
  rateLimiter?: TokenBucket;
}

export class TelegramChannelDriver extends BaseChannelDriver<'telegram'> {
  protected readonly channel = 'telegram';
  private readonly transport: TelegramTransport;
  private readonly renderer: TemplateRenderer;
  private readonly users: UserRepository;
  private readonly rateLimiter: TokenBucket;

  constructor(deps: TelegramChannelDeps) {
    super(deps);
    this.transport = deps.transport;
    this.renderer = deps.renderer;
    this.users = deps.users;
    this.rateLimiter = deps.rateLimiter ?? new TokenBucket({ capacity: 20, refillRate: 20 });
  }

  canDeliver({ notification, recipient, preference }: DeliveryTarget): boolean {
    return (
      isChannelEnabled(preference, 'telegram') &&
      isNotificationTypeEnabled(preference, notification.type) &&
      recipient.telegramChatId !== undefined &&
      !recipient.telegramBlocked
    );
  }

  protected async send({ notification, recipient }: DeliveryTarget): Promise<SendOutcome> {
    const chatId = recipient.telegramChatId;
    if (!chatId || recipient.telegramBlocked) {
      throw new PermanentDeliveryError('Recipient has no reachable Telegram chat', 'invalid_address');
    }

    const { template, input } = this.renderer.prepare(notification, recipient);
    const html = markdownToTelegramHtml(template.getTelegramBody(input));

    const slot = this.rateLimiter.tryTake();
    if (!slot.allowed) {
      throw new TransientDeliveryError('Telegram send rate exceeded', slot.retryAfterMs);
    }

    const result = await this.transport.sendMessage(chatId, html);
    return {
      metadata: result.messageId !== undefined ? { messageId: result.messageId } : {},
    };
  }

  protected async onPermanentFailure(target: DeliveryTarget, error: PermanentDeliveryError): Promise<void> {
    if (error.reason !== 'blocked' && error.reason !== 'deactivated') return;

    await this.users.markTelegramUnreachable(target.recipient.id);
    logger.warn('Telegram chat unreachable, disabling further sends', {
      userId: target.recipient.id,
      reason: error.reason,
    });
  }
}
