// ═══════════════════════════════════════════════════════════════════════════════
// DIGEST BATCHER — One Email for Everything a Digest User Missed
// ═══════════════════════════════════════════════════════════════════════════════
//
// A periodic scan, not a timer. Every run checks each digest user's local time
// against their send time; inside the window the user's pending notifications
// are grouped into one email. A claim lock per (user, occurrence) keeps
// overlapping scans from sending twice, and the SENT email records written
// after the send keep later scans from picking the same notifications again.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getStore, type KeyValueStore } from '../storage/index.js';
import { getLogger } from '../logging/index.js';
import type { NotificationUser } from '../users/types.js';
import type { UserRepository } from '../users/store.js';
import { deliverableAddress, type EmailTransport } from './channels/email.js';
import { PermanentDeliveryError } from './errors.js';
import { getChannelsForNotificationType, type PreferenceService } from './preferences.js';
import type { DeliveryStore, EmailLogStore, NotificationStore } from './store.js';
import type { TemplateCatalog } from './templates/catalog.js';
import { escapeHtml, renderEmailLayout } from './templates/html.js';
import type { TemplateRenderer } from './templates/renderer.js';
import type {
  DigestFrequency,
  Notification,
  NotificationPreference,
  NotificationType,
} from './types.js';

const logger = getLogger({ component: 'digest' });

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MINUTES = 24 * 60;

const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface DigestContent {
  subject: string;
  text: string;
  html: string;
}

export interface DigestSendResult {
  messageId?: string;
  notificationIds: string[];
}

export interface DigestScanResult {
  sent: number;
  skipped: number;
  failed: number;
}

/**
 * Where `now` sits relative to the user's nearest scheduled send.
 */
export interface DigestWindow {
  /** Signed minutes from the scheduled send to now */
  offsetMinutes: number;
  /** The scheduled send instant, to the minute */
  occurrence: Date;
  /** Local weekday of the occurrence, 0 = Sunday */
  weekday: number;
}

export interface DigestBatcherDeps {
  notifications: NotificationStore;
  deliveries: DeliveryStore;
  emailLogs: EmailLogStore;
  preferences: PreferenceService;
  users: UserRepository;
  renderer: TemplateRenderer;
  catalog: TemplateCatalog;
  transport: EmailTransport;
  /** Holds the per-occurrence claim locks */
  store?: KeyValueStore;
}

export interface DigestBatcherOptions {
  windowMinutes?: number;
  catchAllAddress?: string;
  clock?: () => Date;
}

// ─────────────────────────────────────────────────────────────────────────────────
// SCHEDULING
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * How far back a digest of the given frequency looks for pending notifications.
 */
export function getLookback(frequency: DigestFrequency): number {
  switch (frequency) {
    case 'hourly':
      return HOUR_MS;
    case 'daily':
      return 24 * HOUR_MS;
    case 'weekly':
      return 7 * 24 * HOUR_MS;
    case 'immediate':
      throw new Error('Immediate delivery has no digest lookback');
  }
}

interface LocalTime {
  minutes: number;
  weekday: number;
}

function localTime(now: Date, timezone: string): LocalTime {
  let parts: Intl.DateTimeFormatPart[];
  try {
    parts = new Intl.DateTimeFormat('en-US', {
      timeZone: timezone,
      weekday: 'short',
      hour: '2-digit',
      minute: '2-digit',
      hourCycle: 'h23',
    }).formatToParts(now);
  } catch (error) {
    if (!(error instanceof RangeError)) throw error;
    logger.warn('Unknown timezone, using UTC', { timezone });
    return localTime(now, 'UTC');
  }

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find(p => p.type === type)?.value ?? '';

  return {
    minutes: Number(part('hour')) * 60 + Number(part('minute')),
    weekday: WEEKDAYS.indexOf(part('weekday')),
  };
}

/** Maps a difference onto (-period/2, period/2] */
function circularOffset(delta: number, period: number): number {
  const wrapped = ((delta % period) + period) % period;
  return wrapped > period / 2 ? wrapped - period : wrapped;
}

function parseSendTime(value: string): number {
  const [hours = 0, minutes = 0] = value.split(':').map(Number);
  return hours * 60 + minutes;
}

/**
 * Locates the scheduled send nearest to `now` in the user's timezone. Hourly
 * digests compare minute-of-hour only.
 */
export function digestWindow(
  preference: Pick<NotificationPreference, 'digestFrequency' | 'digestSendTime'>,
  timezone: string,
  now: Date
): DigestWindow {
  const minuteStart = Math.floor(now.getTime() / MINUTE_MS) * MINUTE_MS;
  const local = localTime(now, timezone);
  const sendMinutes = parseSendTime(preference.digestSendTime);

  const offsetMinutes = preference.digestFrequency === 'hourly'
    ? circularOffset(local.minutes % 60 - sendMinutes % 60, 60)
    : circularOffset(local.minutes - sendMinutes, DAY_MINUTES);

  const dayShift = Math.floor((local.minutes - offsetMinutes) / DAY_MINUTES);

  return {
    offsetMinutes,
    occurrence: new Date(minuteStart - offsetMinutes * MINUTE_MS),
    weekday: (((local.weekday + dayShift) % 7) + 7) % 7,
  };
}

export function shouldSendDigestNow(
  user: Pick<NotificationUser, 'timezone'>,
  preference: NotificationPreference,
  now: Date,
  windowMinutes = 30
): boolean {
  if (preference.digestFrequency === 'immediate') return false;

  const window = digestWindow(preference, user.timezone, now);
  if (Math.abs(window.offsetMinutes) > windowMinutes) return false;

  return preference.digestFrequency !== 'weekly' || window.weekday === preference.digestWeekday;
}

// ─────────────────────────────────────────────────────────────────────────────────
// DIGEST BATCHER
// ─────────────────────────────────────────────────────────────────────────────────

function claimKey(userId: string, occurrence: Date): string {
  return `digest:claim:${userId}:${occurrence.toISOString()}`;
}

export class DigestBatcher {
  private readonly store: KeyValueStore;
  private readonly windowMinutes: number;
  private readonly catchAllAddress?: string;
  private readonly clock: () => Date;

  constructor(
    private readonly deps: DigestBatcherDeps,
    options: DigestBatcherOptions = {}
  ) {
    this.store = deps.store ?? getStore();
    this.windowMinutes = options.windowMinutes ?? 30;
    this.catchAllAddress = options.catchAllAddress;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Unread, unarchived notifications since `since` that no email has carried
   * yet, oldest first.
   */
  async getPendingNotificationsForDigest(userId: string, since: Date): Promise<Notification[]> {
    const candidates = await this.deps.notifications.listCreatedSince(userId, since);
    const pending: Notification[] = [];

    for (const notification of candidates) {
      if (notification.readAt || notification.archivedAt) continue;
      if (await this.deps.deliveries.hasSentEmail(notification.id)) continue;
      pending.push(notification);
    }
    return pending;
  }

  shouldSendDigestNow(user: Pick<NotificationUser, 'timezone'>, preference: NotificationPreference, now: Date): boolean {
    return shouldSendDigestNow(user, preference, now, this.windowMinutes);
  }

  /**
   * @throws TemplateLookupError when an untitled notification has no template
   */
  buildDigestContent(user: NotificationUser, notifications: readonly Notification[]): DigestContent {
    const count = notifications.length;
    const subject = `${count} new notification${count === 1 ? '' : 's'}`;

    const groups = new Map<NotificationType, string[]>();
    for (const notification of notifications) {
      const titles = groups.get(notification.type) ?? [];
      titles.push(this.titleOf(notification, user));
      groups.set(notification.type, titles);
    }

    const unsubscribeLink = this.deps.renderer.unsubscribeLinkFor(user);
    const inboxUrl = `${this.deps.renderer.frontendBaseUrl}/notifications`;

    const text: string[] = [];
    text.push(`Hi ${user.displayName},`);
    text.push('');
    text.push(`You have ${subject}.`);
    for (const [type, titles] of groups) {
      text.push('');
      text.push(`${this.deps.catalog.label(type)} (${titles.length})`);
      for (const title of titles) {
        text.push(`- ${title}`);
      }
    }
    text.push('');
    text.push(`Open in app: ${inboxUrl}`);
    if (unsubscribeLink) {
      text.push('');
      text.push('--');
      text.push(`Manage or unsubscribe from these emails: ${unsubscribeLink}`);
    }

    const content: string[] = [];
    for (const [type, titles] of groups) {
      content.push(`<h3>${escapeHtml(this.deps.catalog.label(type))} (${titles.length})</h3>`);
      content.push('<ul>');
      for (const title of titles) {
        content.push(`<li>${escapeHtml(title)}</li>`);
      }
      content.push('</ul>');
    }

    const html = renderEmailLayout({
      heading: `You have ${subject}`,
      content: content.join('\n'),
      actionUrl: inboxUrl,
      ...(unsubscribeLink ? { unsubscribeLink } : {}),
    });

    return { subject, text: text.join('\n'), html };
  }

  private titleOf(notification: Notification, user: NotificationUser): string {
    if (notification.title) return notification.title;
    const { template, input } = this.deps.renderer.prepare(notification, user);
    return template.getInAppTitle(input);
  }

  /**
   * Sends one digest and marks every included notification as emailed.
   *
   * @throws PermanentDeliveryError when the user has no verified address
   */
  async sendDigestEmail(user: NotificationUser, notifications: readonly Notification[]): Promise<DigestSendResult> {
    const to = deliverableAddress(user, this.catchAllAddress);
    if (!to) {
      throw new PermanentDeliveryError('Recipient has no verified email address', 'invalid_address');
    }

    const content = this.buildDigestContent(user, notifications);
    const unsubscribeLink = this.deps.renderer.unsubscribeLinkFor(user);
    const result = await this.deps.transport.send({
      to,
      subject: content.subject,
      text: content.text,
      html: content.html,
      ...(unsubscribeLink ? { headers: { 'List-Unsubscribe': `<${unsubscribeLink}>` } } : {}),
    });

    const sentAt = this.clock();
    const timestamp = sentAt.toISOString();
    const metadata = {
      digest: true,
      recipient: to,
      ...(result.messageId !== undefined && { messageId: result.messageId }),
    };

    for (const notification of notifications) {
      const { record } = await this.deps.deliveries.findOrCreate(notification.id, user.id, 'email', sentAt);
      const { errorMessage: _previousError, retryable: _retryable, ...rest } = record;
      await this.deps.deliveries.update({
        ...rest,
        status: 'sent',
        retryCount: record.retryCount + 1,
        attemptedAt: timestamp,
        deliveredAt: timestamp,
        metadata: { ...record.metadata, ...metadata },
        updatedAt: timestamp,
      });
    }

    const notificationIds = notifications.map(n => n.id);
    await this.deps.emailLogs.record({
      userId: user.id,
      notificationIds,
      recipient: to,
      subject: content.subject,
      ...(result.messageId !== undefined && { messageId: result.messageId }),
      digest: true,
      sentAt: timestamp,
    });

    logger.info('Digest sent', { userId: user.id, count: notifications.length });
    return {
      notificationIds,
      ...(result.messageId !== undefined && { messageId: result.messageId }),
    };
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // SCAN
  // ═══════════════════════════════════════════════════════════════════════════════

  async runDigestScan(now: Date = this.clock()): Promise<DigestScanResult> {
    const result: DigestScanResult = { sent: 0, skipped: 0, failed: 0 };
    const userIds = await this.deps.preferences.listDigestUserIds();

    for (const userId of userIds) {
      try {
        const outcome = await this.scanUser(userId, now);
        result[outcome]++;
      } catch (error) {
        logger.error('Digest failed', error, { userId });
        result.failed++;
      }
    }

    logger.info('Digest scan complete', { users: userIds.length, ...result });
    return result;
  }

  private async scanUser(userId: string, now: Date): Promise<'sent' | 'skipped'> {
    const user = await this.deps.users.getUser(userId);
    if (!user) return 'skipped';

    const preference = await this.deps.preferences.getPreferences(user);
    if (!this.shouldSendDigestNow(user, preference, now)) return 'skipped';
    if (deliverableAddress(user) === null) return 'skipped';

    const lookbackMs = getLookback(preference.digestFrequency);
    const pending = (await this.getPendingNotificationsForDigest(userId, new Date(now.getTime() - lookbackMs)))
      .filter(notification => getChannelsForNotificationType(preference, notification.type).includes('email'));
    if (pending.length === 0) return 'skipped';

    const { occurrence } = digestWindow(preference, user.timezone, now);
    const lock = claimKey(userId, occurrence);
    if (!(await this.store.setIfAbsent(lock, now.toISOString(), Math.ceil(lookbackMs / 1000)))) {
      logger.debug('Digest already claimed', { userId, occurrence: occurrence.toISOString() });
      return 'skipped';
    }

    try {
      await this.sendDigestEmail(user, pending);
    } catch (error) {
      await this.store.delete(lock);
      throw error;
    }
    return 'sent';
  }
}
