// ═══════════════════════════════════════════════════════════════════════════════
// NOTIFY — Entry Point for Domain Code
// ═══════════════════════════════════════════════════════════════════════════════
//
// Validates and persists synchronously, then hands delivery to the worker.
// No transport I/O happens on the caller's path.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../logging/index.js';
import type { NotificationDispatcher } from './dispatcher.js';
import type { JobQueue } from './queue.js';

const logger = getLogger({ component: 'notify' });

export interface Recipient {
  userId: string;
  context: unknown;
}

/**
 * Turns a domain event into the users who should hear about it, each with the
 * context their notification renders from.
 */
export interface RecipientResolver<E> {
  resolveRecipients(event: E): Iterable<Recipient> | AsyncIterable<Recipient>;
}

export class Notifier {
  constructor(
    private readonly dispatcher: NotificationDispatcher,
    private readonly queue: Pick<JobQueue, 'enqueue'>
  ) {}

  /**
   * @returns the new notification's id
   * @throws NotificationValidationError
   */
  async notify(type: string, userId: string, context: unknown): Promise<string> {
    const notification = await this.dispatcher.createNotification(type, userId, context);
    await this.queue.enqueue('dispatch', { notificationId: notification.id });
    return notification.id;
  }

  /**
   * All-or-nothing validation; one dispatch job for the whole batch.
   *
   * @throws NotificationValidationError naming the first bad entry
   */
  async notifyMany(type: string, recipients: Iterable<Recipient>): Promise<string[]> {
    const entries = Array.from(recipients, ({ userId, context }) => ({ type, userId, context }));
    if (entries.length === 0) return [];

    const notifications = await this.dispatcher.bulkCreateNotifications(entries);
    const notificationIds = notifications.map(n => n.id);
    await this.queue.enqueue('dispatch_batch', { notificationIds });

    logger.info('Notifications queued', { type, count: notificationIds.length });
    return notificationIds;
  }

  async notifyRecipients<E>(type: string, resolver: RecipientResolver<E>, event: E): Promise<string[]> {
    const recipients: Recipient[] = [];
    for await (const recipient of resolver.resolveRecipients(event)) {
      recipients.push(recipient);
    }
    return this.notifyMany(type, recipients);
  }
}
