// ═══════════════════════════════════════════════════════════════════════════════
// USER STORE — Recipient Directory
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { getStore, type KeyValueStore } from '../storage/index.js';
import { getLogger } from '../logging/index.js';
import { DEFAULT_LANGUAGE, DEFAULT_TIMEZONE, type NotificationUser } from './types.js';

const logger = getLogger({ component: 'user-store' });

const NotificationUserSchema: z.ZodType<NotificationUser, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  displayName: z.string(),
  email: z.string().optional(),
  emailVerified: z.boolean(),
  language: z.string().default(DEFAULT_LANGUAGE),
  timezone: z.string().default(DEFAULT_TIMEZONE),
  isGuest: z.boolean().default(false),
  telegramChatId: z.string().optional(),
  telegramBlocked: z.boolean().default(false),
});

function userKey(id: string): string {
  return `user:${id}`;
}

/**
 * Read access to recipients plus the reachability flags channel drivers own.
 */
export interface UserRepository {
  getUser(id: string): Promise<NotificationUser | null>;
  saveUser(user: NotificationUser): Promise<void>;
  markTelegramUnreachable(id: string): Promise<void>;
}

export class UserStore implements UserRepository {
  private store: KeyValueStore;

  constructor(store?: KeyValueStore) {
    this.store = store ?? getStore();
  }

  async getUser(id: string): Promise<NotificationUser | null> {
    const data = await this.store.get(userKey(id));
    if (!data) return null;

    const parsed = NotificationUserSchema.safeParse(JSON.parse(data));
    if (!parsed.success) {
      logger.warn('Discarding malformed user record', { userId: id });
      return null;
    }
    return parsed.data;
  }

  async saveUser(user: NotificationUser): Promise<void> {
    await this.store.set(userKey(user.id), JSON.stringify(user));
  }

  async linkTelegram(id: string, chatId: string): Promise<NotificationUser | null> {
    const user = await this.getUser(id);
    if (!user) return null;

    const updated: NotificationUser = { ...user, telegramChatId: chatId, telegramBlocked: false };
    await this.saveUser(updated);
    return updated;
  }

  async markTelegramUnreachable(id: string): Promise<void> {
    const user = await this.getUser(id);
    if (!user || user.telegramBlocked) return;

    await this.saveUser({ ...user, telegramBlocked: true });
    logger.info('Marked Telegram chat unreachable', { userId: id });
  }
}
