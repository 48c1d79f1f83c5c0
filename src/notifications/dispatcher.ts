// ═══════════════════════════════════════════════════════════════════════════════
// DISPATCHER — Creation, Channel Selection, Delivery, Retry
// ═══════════════════════════════════════════════════════════════════════════════
//
// Flow for one notification:
//   create (validated, empty title/body)
//     → dispatch: render in-app content, resolve effective channels
//       → per channel: find-or-create DeliveryRecord → canDeliver → deliver
//         → on failure: shouldRetry && below ceiling ? enqueue `deliver` : FAILED
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../logging/index.js';
import { exponentialBackoff, formatDelay, type BackoffCalculator } from '../infrastructure/retry/backoff.js';
import type { NotificationUser } from '../users/types.js';
import type { UserRepository } from '../users/store.js';
import type { ChannelDriver, ChannelDrivers, DeliveryTarget } from './channels/types.js';
import { validateContext } from './context-schemas.js';
import {
  NotificationValidationError,
  TransientDeliveryError,
  errorMessage,
} from './errors.js';
import { getChannelsForNotificationType, type PreferenceService } from './preferences.js';
import type { JobQueue } from './queue.js';
import { generateId, type DeliveryStore, type NotificationStore } from './store.js';
import type { TemplateRenderer } from './templates/renderer.js';
import type {
  DeliveryChannel,
  DeliveryRecord,
  DeliveryStatus,
  Notification,
  NotificationPreference,
  NotificationType,
} from './types.js';

const logger = getLogger({ component: 'dispatcher' });

const CLEANUP_BATCH_SIZE = 500;
const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface NotificationEntry {
  type: string;
  userId: string;
  context: unknown;
}

export interface ChannelOutcome {
  channel: DeliveryChannel;
  deliveryId: string;
  status: DeliveryStatus;
  /** Set when another attempt was queued */
  retryInMs?: number;
  error?: string;
}

export interface DispatchResult {
  notificationId: string;
  channels: DeliveryChannel[];
  outcomes: ChannelOutcome[];
}

export interface BatchDispatchResult {
  dispatched: DispatchResult[];
  failed: Array<{ notificationId: string; error: string }>;
}

export interface CleanupResult {
  notifications: number;
  deliveries: number;
}

export interface RetrySweepResult {
  attempted: number;
  sent: number;
}

/** The part of the job queue the dispatcher schedules retries on */
export type RetryScheduler = Pick<JobQueue, 'enqueue'>;

export interface DispatcherDeps {
  notifications: NotificationStore;
  deliveries: DeliveryStore;
  preferences: PreferenceService;
  users: UserRepository;
  renderer: TemplateRenderer;
  drivers: ChannelDrivers;
  /** Without one, failed attempts are never re-queued */
  scheduler?: RetryScheduler;
}

export interface DispatcherOptions {
  /** Attempts per (notification, channel) through the retry path */
  maxRetries?: number;
  retryBackoff?: BackoffCalculator;
  /** Attempt ceiling for the failed-delivery sweep */
  sweepMaxRetries?: number;
  sweepWindowHours?: number;
  retentionDays?: number;
  clock?: () => Date;
}

interface AttemptPolicy {
  ceiling: number;
  scheduleRetry: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────────
// DISPATCHER CLASS
// ─────────────────────────────────────────────────────────────────────────────────

export class NotificationDispatcher {
  private readonly maxRetries: number;
  private readonly retryBackoff: BackoffCalculator;
  private readonly sweepMaxRetries: number;
  private readonly sweepWindowHours: number;
  private readonly retentionDays: number;
  private readonly clock: () => Date;

  constructor(
    private readonly deps: DispatcherDeps,
    options: DispatcherOptions = {}
  ) {
    this.maxRetries = options.maxRetries ?? 3;
    this.retryBackoff = options.retryBackoff ?? exponentialBackoff({
      initialDelayMs: 60_000,
      maxDelayMs: HOUR_MS,
    });
    this.sweepMaxRetries = options.sweepMaxRetries ?? 5;
    this.sweepWindowHours = options.sweepWindowHours ?? 24;
    this.retentionDays = options.retentionDays ?? 90;
    this.clock = options.clock ?? (() => new Date());
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // CREATION
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * @throws NotificationValidationError when the context fails its schema;
   * nothing is written in that case
   */
  async createNotification(type: string, userId: string, context: unknown): Promise<Notification> {
    const notification = this.buildNotification({ type, userId, context });
    await this.deps.notifications.insert(notification);

    logger.debug('Notification created', { notificationId: notification.id, type, userId });
    return notification;
  }

  /**
   * Validates every entry before writing any of them, then persists the batch
   * in one write.
   *
   * @throws NotificationValidationError naming the first failing entry
   */
  async bulkCreateNotifications(entries: readonly NotificationEntry[]): Promise<Notification[]> {
    const notifications = entries.map((entry, index) => this.buildNotification(entry, index));
    await this.deps.notifications.insertMany(notifications);

    logger.info('Notifications created', { count: notifications.length });
    return notifications;
  }

  private buildNotification(entry: NotificationEntry, index?: number): Notification {
    const result = validateContext(entry.type, entry.context);
    if (!result.ok) {
      throw new NotificationValidationError(result.error, index);
    }

    return {
      id: generateId(),
      userId: entry.userId,
      type: result.value.type,
      context: result.value.context,
      title: '',
      body: '',
      createdAt: this.clock().toISOString(),
    };
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // CHANNEL SELECTION
  // ═══════════════════════════════════════════════════════════════════════════════

  async determineDeliveryChannels(
    user: Pick<NotificationUser, 'id' | 'isGuest'>,
    type: NotificationType
  ): Promise<DeliveryChannel[]> {
    const preference = await this.deps.preferences.getPreferences(user);
    return this.effectiveChannels(preference, type);
  }

  /**
   * Digest users get in-app only; their email goes out with the next digest.
   */
  private effectiveChannels(preference: NotificationPreference, type: NotificationType): DeliveryChannel[] {
    const channels = getChannelsForNotificationType(preference, type);
    return preference.digestFrequency === 'immediate'
      ? channels
      : channels.filter(channel => channel === 'in_app');
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // DISPATCH
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * Renders and delivers one notification on each of its effective channels.
   * Channels already marked sent are left alone.
   *
   * @throws TemplateLookupError when no template is registered for the type
   */
  async dispatch(notificationOrId: Notification | string): Promise<DispatchResult> {
    const notification = typeof notificationOrId === 'string'
      ? await this.deps.notifications.get(notificationOrId)
      : notificationOrId;
    if (!notification) {
      throw new Error(`Notification not found: ${String(notificationOrId)}`);
    }

    const recipient = await this.deps.users.getUser(notification.userId);
    if (!recipient) {
      logger.warn('Recipient not found, nothing dispatched', {
        notificationId: notification.id,
        userId: notification.userId,
      });
      return { notificationId: notification.id, channels: [], outcomes: [] };
    }

    const rendered = await this.renderInApp(notification, recipient);
    const preference = await this.deps.preferences.getPreferences(recipient);
    const channels = this.effectiveChannels(preference, notification.type);
    const target: DeliveryTarget = { notification: rendered, recipient, preference };

    const outcomes: ChannelOutcome[] = [];
    for (const channel of channels) {
      outcomes.push(await this.dispatchChannel(target, channel));
    }

    logger.info('Notification dispatched', {
      notificationId: notification.id,
      type: notification.type,
      channels,
      statuses: outcomes.map(outcome => outcome.status),
    });

    return { notificationId: notification.id, channels, outcomes };
  }

  /**
   * Dispatches each id independently; one failure never stops the rest.
   */
  async dispatchBatch(notificationIds: readonly string[]): Promise<BatchDispatchResult> {
    const result: BatchDispatchResult = { dispatched: [], failed: [] };

    for (const notificationId of notificationIds) {
      try {
        result.dispatched.push(await this.dispatch(notificationId));
      } catch (error) {
        logger.error('Failed to dispatch notification', error, { notificationId });
        result.failed.push({ notificationId, error: errorMessage(error) });
      }
    }

    return result;
  }

  private async renderInApp(notification: Notification, recipient: NotificationUser): Promise<Notification> {
    let title: string;
    let body: string;
    try {
      const { template, input } = this.deps.renderer.prepare(notification, recipient);
      title = template.getInAppTitle(input);
      body = template.getInAppBody(input);
    } catch (error) {
      logger.error('Cannot render notification', error, {
        notificationId: notification.id,
        type: notification.type,
      });
      throw error;
    }

    if (title !== notification.title || body !== notification.body) {
      await this.deps.notifications.setRenderedContent(notification.id, title, body);
    }
    return { ...notification, title, body };
  }

  private async dispatchChannel(target: DeliveryTarget, channel: DeliveryChannel): Promise<ChannelOutcome> {
    const { notification } = target;
    const { record } = await this.deps.deliveries.findOrCreate(
      notification.id,
      notification.userId,
      channel,
      this.clock()
    );

    if (record.status === 'sent') {
      return { channel, deliveryId: record.id, status: 'sent' };
    }
    // Retryable failures belong to the scheduled retry; the rest are terminal.
    if (record.status === 'failed') {
      return outcomeOf(record, record.errorMessage);
    }

    return this.attemptIfDeliverable(this.deps.drivers[channel], target, record, {
      ceiling: this.maxRetries,
      scheduleRetry: true,
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // ATTEMPTS
  // ═══════════════════════════════════════════════════════════════════════════════

  private async attemptIfDeliverable(
    driver: ChannelDriver,
    target: DeliveryTarget,
    record: DeliveryRecord,
    policy: AttemptPolicy
  ): Promise<ChannelOutcome> {
    if (!driver.canDeliver(target)) {
      if (record.status !== 'skipped') {
        await this.deps.deliveries.update({
          ...record,
          status: 'skipped',
          updatedAt: this.clock().toISOString(),
        });
      }
      logger.debug('Channel not deliverable, skipped', {
        notificationId: record.notificationId,
        channel: record.channel,
      });
      return { channel: record.channel, deliveryId: record.id, status: 'skipped' };
    }

    return this.attempt(driver, target, record, policy);
  }

  private async attempt(
    driver: ChannelDriver,
    target: DeliveryTarget,
    record: DeliveryRecord,
    policy: AttemptPolicy
  ): Promise<ChannelOutcome> {
    try {
      await driver.deliver(target, record);
      return { channel: record.channel, deliveryId: record.id, status: 'sent' };
    } catch (error) {
      const failed = await this.deps.deliveries.get(record.notificationId, record.channel)
        ?? { ...record, retryCount: record.retryCount + 1 };
      const message = errorMessage(error);

      if (!driver.shouldRetry(error) || failed.retryCount >= policy.ceiling) {
        logger.error('Delivery failed, giving up', error, {
          notificationId: record.notificationId,
          channel: record.channel,
          deliveryId: record.id,
          attempts: failed.retryCount,
        });
        return { channel: record.channel, deliveryId: record.id, status: 'failed', error: message };
      }

      if (!policy.scheduleRetry || !this.deps.scheduler) {
        return { channel: record.channel, deliveryId: record.id, status: 'failed', error: message };
      }

      const delayMs = error instanceof TransientDeliveryError && error.retryAfterMs !== undefined
        ? error.retryAfterMs
        : this.retryBackoff.calculate(failed.retryCount);

      await this.deps.scheduler.enqueue('deliver', { deliveryId: record.id }, { delayMs });
      logger.warn('Delivery failed, retry scheduled', {
        notificationId: record.notificationId,
        channel: record.channel,
        deliveryId: record.id,
        attempts: failed.retryCount,
        retryIn: formatDelay(delayMs),
      });

      return { channel: record.channel, deliveryId: record.id, status: 'failed', retryInMs: delayMs, error: message };
    }
  }

  /**
   * One more attempt for an existing record. Used by retry jobs and the
   * failed-delivery sweep. Returns null when the record or its notification
   * no longer exists.
   */
  async redeliver(
    deliveryId: string,
    policy: AttemptPolicy = { ceiling: this.maxRetries, scheduleRetry: true }
  ): Promise<ChannelOutcome | null> {
    const record = await this.deps.deliveries.getById(deliveryId);
    if (!record) {
      logger.warn('Delivery record not found for retry', { deliveryId });
      return null;
    }
    if (record.status === 'sent') {
      return outcomeOf(record);
    }
    if (record.retryCount >= policy.ceiling) {
      logger.debug('Retry ceiling reached, not attempting', { deliveryId, attempts: record.retryCount });
      return outcomeOf(record, record.errorMessage);
    }

    const notification = await this.deps.notifications.get(record.notificationId);
    const recipient = notification ? await this.deps.users.getUser(notification.userId) : null;
    if (!notification || !recipient) {
      logger.warn('Notification or recipient gone, dropping retry', {
        deliveryId,
        notificationId: record.notificationId,
      });
      return null;
    }

    const preference = await this.deps.preferences.getPreferences(recipient);
    const target: DeliveryTarget = { notification, recipient, preference };
    return this.attemptIfDeliverable(this.deps.drivers[record.channel], target, record, policy);
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // MAINTENANCE
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * Re-attempts recent transient failures that still have sweep attempts left.
   */
  async retryFailedDeliveries(now: Date = this.clock()): Promise<RetrySweepResult> {
    const windowStart = now.getTime() - this.sweepWindowHours * HOUR_MS;
    const failed = await this.deps.deliveries.listFailed();

    const eligible = failed.filter(record =>
      record.retryable === true &&
      record.retryCount < this.sweepMaxRetries &&
      record.attemptedAt !== undefined &&
      new Date(record.attemptedAt).getTime() >= windowStart
    );

    const result: RetrySweepResult = { attempted: 0, sent: 0 };
    for (const record of eligible) {
      try {
        const outcome = await this.redeliver(record.id, { ceiling: this.sweepMaxRetries, scheduleRetry: false });
        if (!outcome) continue;
        result.attempted++;
        if (outcome.status === 'sent') result.sent++;
      } catch (error) {
        logger.error('Failed-delivery sweep attempt errored', error, { deliveryId: record.id });
      }
    }

    logger.info('Failed-delivery sweep complete', { candidates: failed.length, ...result });
    return result;
  }

  /**
   * Deletes notifications past the retention period together with their
   * delivery records.
   */
  async cleanupOldNotifications(now: Date = this.clock()): Promise<CleanupResult> {
    const cutoff = new Date(now.getTime() - this.retentionDays * DAY_MS);
    const result: CleanupResult = { notifications: 0, deliveries: 0 };

    for (;;) {
      const ids = await this.deps.notifications.listCreatedBefore(cutoff, CLEANUP_BATCH_SIZE);
      for (const id of ids) {
        result.deliveries += await this.deps.deliveries.deleteForNotification(id);
        await this.deps.notifications.delete(id);
        result.notifications++;
      }
      if (ids.length < CLEANUP_BATCH_SIZE) break;
    }

    logger.info('Old notifications cleaned up', { cutoff: cutoff.toISOString(), ...result });
    return result;
  }
}

function outcomeOf(record: DeliveryRecord, error?: string): ChannelOutcome {
  return {
    channel: record.channel,
    deliveryId: record.id,
    status: record.status,
    ...(error !== undefined && { error }),
  };
}
