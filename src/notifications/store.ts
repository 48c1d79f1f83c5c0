// ═══════════════════════════════════════════════════════════════════════════════
// NOTIFICATION STORE — Notifications, Delivery Records, Outbound Email Log
// ═══════════════════════════════════════════════════════════════════════════════

import { v4 as uuidv4 } from 'uuid';
import { getStore, type KeyValueStore } from '../storage/index.js';
import {
  isDeliveryChannel,
  type DeliveryChannel,
  type DeliveryRecord,
  type EmailLog,
  type Notification,
  type NotificationListOptions,
} from './types.js';
import {
  DeliveryRecordSchema,
  EmailLogSchema,
  NotificationRecordSchema,
  parseRecord,
} from './records.js';

// ─────────────────────────────────────────────────────────────────────────────────
// CONSTANTS
// ─────────────────────────────────────────────────────────────────────────────────

const DEFAULT_LIST_LIMIT = 50;
const MAX_LIST_LIMIT = 200;
const EMAIL_LOG_TTL = 180 * 24 * 60 * 60;     // 180 days

// ─────────────────────────────────────────────────────────────────────────────────
// KEY GENERATION
// ─────────────────────────────────────────────────────────────────────────────────

function notificationKey(id: string): string {
  return `notification:${id}`;
}

function userNotificationsKey(userId: string): string {
  return `notification:user:${userId}:list`;
}

function userUnreadKey(userId: string): string {
  return `notification:user:${userId}:unread`;
}

/** Every notification id, newest first; cleanup walks it from the tail */
const ALL_NOTIFICATIONS_KEY = 'notification:all';

function deliveryKey(notificationId: string, channel: DeliveryChannel): string {
  return `delivery:${notificationId}:${channel}`;
}

function deliveryIdKey(id: string): string {
  return `delivery:id:${id}`;
}

function notificationChannelsKey(notificationId: string): string {
  return `delivery:notification:${notificationId}:channels`;
}

const FAILED_DELIVERIES_KEY = 'delivery:failed';

function emailLogKey(id: string): string {
  return `email-log:${id}`;
}

function userEmailLogKey(userId: string): string {
  return `email-log:user:${userId}`;
}

export function generateId(): string {
  return uuidv4();
}

// ─────────────────────────────────────────────────────────────────────────────────
// NOTIFICATION STORE CLASS
// ─────────────────────────────────────────────────────────────────────────────────

export class NotificationStore {
  private store: KeyValueStore;

  constructor(store?: KeyValueStore) {
    this.store = store ?? getStore();
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // CREATION
  // ═══════════════════════════════════════════════════════════════════════════════

  async insert(notification: Notification): Promise<void> {
    await this.insertMany([notification]);
  }

  /**
   * Persists all rows in a single write, then updates the per-user indexes.
   */
  async insertMany(notifications: readonly Notification[]): Promise<void> {
    if (notifications.length === 0) return;

    await this.store.mset(
      notifications.map(n => [notificationKey(n.id), JSON.stringify(n)] as const)
    );

    const byUser = new Map<string, string[]>();
    for (const n of notifications) {
      const ids = byUser.get(n.userId) ?? [];
      ids.push(n.id);
      byUser.set(n.userId, ids);
    }

    for (const [userId, ids] of byUser) {
      await this.store.lpush(userNotificationsKey(userId), ...ids);
      await this.store.sadd(userUnreadKey(userId), ...ids);
    }

    await this.store.lpush(ALL_NOTIFICATIONS_KEY, ...notifications.map(n => n.id));
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // READS
  // ═══════════════════════════════════════════════════════════════════════════════

  async get(id: string): Promise<Notification | null> {
    return parseRecord(NotificationRecordSchema, await this.store.get(notificationKey(id)));
  }

  async getMany(ids: readonly string[]): Promise<Notification[]> {
    const raw = await this.store.mget(ids.map(notificationKey));
    const notifications: Notification[] = [];
    for (const entry of raw) {
      const parsed = parseRecord(NotificationRecordSchema, entry);
      if (parsed) notifications.push(parsed);
    }
    return notifications;
  }

  /**
   * Returns the user's notification if it exists and belongs to them.
   */
  async getForUser(userId: string, id: string): Promise<Notification | null> {
    const notification = await this.get(id);
    return notification && notification.userId === userId ? notification : null;
  }

  /**
   * Newest first.
   */
  async listForUser(userId: string, options: NotificationListOptions = {}): Promise<Notification[]> {
    const limit = Math.min(options.limit ?? DEFAULT_LIST_LIMIT, MAX_LIST_LIMIT);
    const offset = options.offset ?? 0;

    const ids = await this.store.lrange(userNotificationsKey(userId), 0, -1);
    const notifications = await this.getMany(ids);

    return notifications
      .filter(n => options.includeArchived || !n.archivedAt)
      .filter(n => !options.unreadOnly || !n.readAt)
      .slice(offset, offset + limit);
  }

  /**
   * Oldest first; only notifications created at or after `since`.
   */
  async listCreatedSince(userId: string, since: Date): Promise<Notification[]> {
    const ids = await this.store.lrange(userNotificationsKey(userId), 0, -1);
    const notifications = await this.getMany(ids);
    const threshold = since.getTime();

    return notifications
      .filter(n => new Date(n.createdAt).getTime() >= threshold)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  async getUnreadCount(userId: string): Promise<number> {
    return this.store.scard(userUnreadKey(userId));
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // MUTATIONS
  // ═══════════════════════════════════════════════════════════════════════════════

  private async save(notification: Notification): Promise<void> {
    await this.store.set(notificationKey(notification.id), JSON.stringify(notification));
  }

  /**
   * Stores the in-app rendering produced at dispatch time.
   */
  async setRenderedContent(id: string, title: string, body: string): Promise<Notification | null> {
    const notification = await this.get(id);
    if (!notification) return null;

    const updated = { ...notification, title, body };
    await this.save(updated);
    return updated;
  }

  async markRead(userId: string, id: string, now: Date = new Date()): Promise<Notification | null> {
    const notification = await this.getForUser(userId, id);
    if (!notification) return null;
    if (notification.readAt) return notification;

    const updated = { ...notification, readAt: now.toISOString() };
    await this.save(updated);
    await this.store.srem(userUnreadKey(userId), id);
    return updated;
  }

  async markUnread(userId: string, id: string): Promise<Notification | null> {
    const notification = await this.getForUser(userId, id);
    if (!notification) return null;

    const { readAt: _readAt, ...rest } = notification;
    await this.save(rest);
    await this.store.sadd(userUnreadKey(userId), id);
    return rest;
  }

  async markAllRead(userId: string, now: Date = new Date()): Promise<number> {
    const unreadIds = await this.store.smembers(userUnreadKey(userId));
    let count = 0;

    for (const id of unreadIds) {
      if (await this.markRead(userId, id, now)) {
        count++;
      } else {
        await this.store.srem(userUnreadKey(userId), id);
      }
    }

    return count;
  }

  async archive(userId: string, id: string, now: Date = new Date()): Promise<Notification | null> {
    const notification = await this.getForUser(userId, id);
    if (!notification) return null;
    if (notification.archivedAt) return notification;

    const updated = { ...notification, archivedAt: now.toISOString() };
    await this.save(updated);
    return updated;
  }

  async unarchive(userId: string, id: string): Promise<Notification | null> {
    const notification = await this.getForUser(userId, id);
    if (!notification) return null;

    const { archivedAt: _archivedAt, ...rest } = notification;
    await this.save(rest);
    return rest;
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // RETENTION
  // ═══════════════════════════════════════════════════════════════════════════════

  async delete(id: string): Promise<boolean> {
    const notification = await this.get(id);
    const deleted = await this.store.delete(notificationKey(id));

    if (notification) {
      await this.store.lrem(userNotificationsKey(notification.userId), 0, id);
      await this.store.srem(userUnreadKey(notification.userId), id);
    }
    await this.store.lrem(ALL_NOTIFICATIONS_KEY, 0, id);

    return deleted;
  }

  /**
   * Ids of notifications created before `cutoff`, oldest first. Walks the
   * global index from its tail and stops at the first newer entry.
   */
  async listCreatedBefore(cutoff: Date, limit: number): Promise<string[]> {
    const expired: string[] = [];
    const total = await this.store.llen(ALL_NOTIFICATIONS_KEY);
    const threshold = cutoff.getTime();

    for (let index = total - 1; index >= 0 && expired.length < limit; index--) {
      const [id] = await this.store.lrange(ALL_NOTIFICATIONS_KEY, index, index);
      if (id === undefined) break;

      const notification = await this.get(id);
      if (notification && new Date(notification.createdAt).getTime() >= threshold) break;
      expired.push(id);
    }

    return expired;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// DELIVERY STORE CLASS
// ─────────────────────────────────────────────────────────────────────────────────

export interface FindOrCreateResult {
  record: DeliveryRecord;
  created: boolean;
}

/**
 * Delivery records keyed by (notification, channel). Creation is a SET NX on
 * that key, so two writers racing for the same pair end up sharing one record.
 */
export class DeliveryStore {
  private store: KeyValueStore;

  constructor(store?: KeyValueStore) {
    this.store = store ?? getStore();
  }

  async get(notificationId: string, channel: DeliveryChannel): Promise<DeliveryRecord | null> {
    return parseRecord(DeliveryRecordSchema, await this.store.get(deliveryKey(notificationId, channel)));
  }

  async getById(id: string): Promise<DeliveryRecord | null> {
    const pointer = await this.store.get(deliveryIdKey(id));
    if (!pointer) return null;
    return parseRecord(DeliveryRecordSchema, await this.store.get(pointer));
  }

  /**
   * Inserts the record unless one already exists for its (notification, channel).
   * Returns false on conflict; the existing record is left untouched.
   */
  async create(record: DeliveryRecord): Promise<boolean> {
    const key = deliveryKey(record.notificationId, record.channel);
    const inserted = await this.store.setIfAbsent(key, JSON.stringify(record));
    if (!inserted) return false;

    await this.store.set(deliveryIdKey(record.id), key);
    await this.store.sadd(notificationChannelsKey(record.notificationId), record.channel);
    if (record.status === 'failed') {
      await this.store.sadd(FAILED_DELIVERIES_KEY, record.id);
    }
    return true;
  }

  async findOrCreate(
    notificationId: string,
    userId: string,
    channel: DeliveryChannel,
    now: Date = new Date()
  ): Promise<FindOrCreateResult> {
    const existing = await this.get(notificationId, channel);
    if (existing) return { record: existing, created: false };

    const timestamp = now.toISOString();
    const record: DeliveryRecord = {
      id: generateId(),
      notificationId,
      userId,
      channel,
      status: 'pending',
      retryCount: 0,
      metadata: {},
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    if (await this.create(record)) {
      return { record, created: true };
    }

    // Lost the race: another writer created it between our read and insert
    const winner = await this.get(notificationId, channel);
    if (!winner) {
      throw new Error(`Delivery record for ${notificationId}/${channel} vanished after insert conflict`);
    }
    return { record: winner, created: false };
  }

  async update(record: DeliveryRecord): Promise<void> {
    await this.store.set(deliveryKey(record.notificationId, record.channel), JSON.stringify(record));

    if (record.status === 'failed') {
      await this.store.sadd(FAILED_DELIVERIES_KEY, record.id);
    } else {
      await this.store.srem(FAILED_DELIVERIES_KEY, record.id);
    }
  }

  async listForNotification(notificationId: string): Promise<DeliveryRecord[]> {
    const channels = await this.store.smembers(notificationChannelsKey(notificationId));
    const raw = await this.store.mget(
      channels.filter(isDeliveryChannel).map(channel => deliveryKey(notificationId, channel))
    );

    const records: DeliveryRecord[] = [];
    for (const entry of raw) {
      const parsed = parseRecord(DeliveryRecordSchema, entry);
      if (parsed) records.push(parsed);
    }
    return records;
  }

  async listFailed(): Promise<DeliveryRecord[]> {
    const ids = await this.store.smembers(FAILED_DELIVERIES_KEY);
    const records: DeliveryRecord[] = [];

    for (const id of ids) {
      const record = await this.getById(id);
      if (record && record.status === 'failed') {
        records.push(record);
      } else {
        await this.store.srem(FAILED_DELIVERIES_KEY, id);
      }
    }
    return records;
  }

  async hasSentEmail(notificationId: string): Promise<boolean> {
    const record = await this.get(notificationId, 'email');
    return record?.status === 'sent';
  }

  async deleteForNotification(notificationId: string): Promise<number> {
    const records = await this.listForNotification(notificationId);

    for (const record of records) {
      await this.store.delete(deliveryKey(record.notificationId, record.channel));
      await this.store.delete(deliveryIdKey(record.id));
      await this.store.srem(FAILED_DELIVERIES_KEY, record.id);
    }
    await this.store.delete(notificationChannelsKey(notificationId));

    return records.length;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// EMAIL LOG STORE CLASS
// ─────────────────────────────────────────────────────────────────────────────────

export class EmailLogStore {
  private store: KeyValueStore;

  constructor(store?: KeyValueStore) {
    this.store = store ?? getStore();
  }

  async record(entry: Omit<EmailLog, 'id'>): Promise<EmailLog> {
    const log: EmailLog = { id: generateId(), ...entry };
    await this.store.set(emailLogKey(log.id), JSON.stringify(log), EMAIL_LOG_TTL);
    await this.store.lpush(userEmailLogKey(log.userId), log.id);
    return log;
  }

  async get(id: string): Promise<EmailLog | null> {
    return parseRecord(EmailLogSchema, await this.store.get(emailLogKey(id)));
  }

  async listForUser(userId: string, limit = 50): Promise<EmailLog[]> {
    const ids = await this.store.lrange(userEmailLogKey(userId), 0, limit - 1);
    const raw = await this.store.mget(ids.map(emailLogKey));

    const logs: EmailLog[] = [];
    for (const entry of raw) {
      const parsed = parseRecord(EmailLogSchema, entry);
      if (parsed) logs.push(parsed);
    }
    return logs;
  }
}
