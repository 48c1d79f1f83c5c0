// ═══════════════════════════════════════════════════════════════════════════════
// PREFERENCES — Resolver, Guest Preset, Persistence
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { getStore, type KeyValueStore } from '../storage/index.js';
import { getLogger } from '../logging/index.js';
import type { NotificationUser } from '../users/types.js';
import {
  DEFAULT_DIGEST_SEND_TIME,
  DEFAULT_DIGEST_WEEKDAY,
  DEFAULT_ENABLED_CHANNELS,
  DELIVERY_CHANNELS,
  type DeliveryChannel,
  type NotificationPreference,
  type NotificationType,
  type NotificationTypeSettingsMap,
  type PreferenceUpdate,
} from './types.js';
import {
  DeliveryChannelSchema,
  DigestFrequencySchema,
  NotificationTypeSchema,
  NotificationTypeSettingsSchema,
  PreferenceRecordSchema,
  TimeOfDaySchema,
  parseRecord,
} from './records.js';

const logger = getLogger({ component: 'preferences' });

// ─────────────────────────────────────────────────────────────────────────────────
// RESOLVER
// ─────────────────────────────────────────────────────────────────────────────────

export function isChannelEnabled(preference: NotificationPreference, channel: DeliveryChannel): boolean {
  if (preference.silenceAll) return false;
  return preference.enabledChannels.includes(channel);
}

/**
 * A missing override inherits the default of enabled.
 */
export function isNotificationTypeEnabled(preference: NotificationPreference, type: NotificationType): boolean {
  if (preference.silenceAll) return false;
  return preference.typeSettings[type]?.enabled ?? true;
}

/**
 * Globally enabled channels, narrowed by the type's channel override if it has one.
 * Result keeps the canonical channel order.
 */
export function getChannelsForNotificationType(
  preference: NotificationPreference,
  type: NotificationType
): DeliveryChannel[] {
  if (!isNotificationTypeEnabled(preference, type)) return [];

  const override = preference.typeSettings[type]?.channels;
  return DELIVERY_CHANNELS.filter(channel =>
    isChannelEnabled(preference, channel) && (override === undefined || override.includes(channel))
  );
}

// ─────────────────────────────────────────────────────────────────────────────────
// DEFAULTS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Types a guest-tier account starts with disabled. Copied into the preference
 * when it is created; editing this list later does not touch existing users.
 */
export const GUEST_DISABLED_TYPES: readonly NotificationType[] = [
  'event_open',
  'event_created',
  'potluck_item_created',
  'potluck_item_updated',
  'potluck_item_claimed',
  'potluck_item_unclaimed',
  'questionnaire_submitted',
  'invitation_claimed',
  'membership_granted',
  'membership_promoted',
  'membership_removed',
  'membership_request_approved',
  'membership_request_rejected',
  'org_announcement',
  'malware_detected',
];

export function buildDefaultPreference(
  user: Pick<NotificationUser, 'id' | 'isGuest'>,
  now: Date,
  guestDisabledTypes: readonly NotificationType[] = GUEST_DISABLED_TYPES
): NotificationPreference {
  const typeSettings: NotificationTypeSettingsMap = {};
  if (user.isGuest) {
    for (const type of guestDisabledTypes) {
      typeSettings[type] = { enabled: false };
    }
  }

  const timestamp = now.toISOString();
  return {
    userId: user.id,
    silenceAll: false,
    enabledChannels: [...DEFAULT_ENABLED_CHANNELS],
    digestFrequency: 'immediate',
    digestSendTime: DEFAULT_DIGEST_SEND_TIME,
    digestWeekday: DEFAULT_DIGEST_WEEKDAY,
    typeSettings,
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// UPDATE SCHEMA
// ─────────────────────────────────────────────────────────────────────────────────

export const PreferenceUpdateSchema = z
  .object({
    silenceAll: z.boolean(),
    enabledChannels: z
      .array(DeliveryChannelSchema)
      .refine(channels => new Set(channels).size === channels.length, {
        message: 'Duplicate channels are not allowed',
      }),
    digestFrequency: DigestFrequencySchema,
    digestSendTime: TimeOfDaySchema,
    digestWeekday: z.number().int().min(0).max(6),
    typeSettings: z.record(NotificationTypeSchema, NotificationTypeSettingsSchema),
  })
  .partial()
  .strict();

// ─────────────────────────────────────────────────────────────────────────────────
// PREFERENCE STORE
// ─────────────────────────────────────────────────────────────────────────────────

function preferenceKey(userId: string): string {
  return `preference:${userId}`;
}

/** Users whose digest frequency is not immediate */
const DIGEST_USERS_KEY = 'preference:digest-users';

export class PreferenceStore {
  private store: KeyValueStore;

  constructor(store?: KeyValueStore) {
    this.store = store ?? getStore();
  }

  async get(userId: string): Promise<NotificationPreference | null> {
    return parseRecord(PreferenceRecordSchema, await this.store.get(preferenceKey(userId)));
  }

  /**
   * Returns false when a preference already exists for the user.
   */
  async createIfAbsent(preference: NotificationPreference): Promise<boolean> {
    const created = await this.store.setIfAbsent(preferenceKey(preference.userId), JSON.stringify(preference));
    if (created) await this.syncDigestIndex(preference);
    return created;
  }

  async save(preference: NotificationPreference): Promise<void> {
    await this.store.set(preferenceKey(preference.userId), JSON.stringify(preference));
    await this.syncDigestIndex(preference);
  }

  async listDigestUserIds(): Promise<string[]> {
    return this.store.smembers(DIGEST_USERS_KEY);
  }

  private async syncDigestIndex(preference: NotificationPreference): Promise<void> {
    if (preference.digestFrequency === 'immediate') {
      await this.store.srem(DIGEST_USERS_KEY, preference.userId);
    } else {
      await this.store.sadd(DIGEST_USERS_KEY, preference.userId);
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// PREFERENCE SERVICE
// ─────────────────────────────────────────────────────────────────────────────────

export interface PreferenceServiceOptions {
  guestDisabledTypes?: readonly NotificationType[];
  clock?: () => Date;
}

export class PreferenceService {
  private readonly guestDisabledTypes: readonly NotificationType[];
  private readonly clock: () => Date;

  constructor(
    private readonly store: PreferenceStore,
    options: PreferenceServiceOptions = {}
  ) {
    this.guestDisabledTypes = options.guestDisabledTypes ?? GUEST_DISABLED_TYPES;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Get-or-create. The defaults, including the guest preset, are applied
   * only when the preference is first written.
   */
  async getPreferences(user: Pick<NotificationUser, 'id' | 'isGuest'>): Promise<NotificationPreference> {
    const existing = await this.store.get(user.id);
    if (existing) return existing;

    const preference = buildDefaultPreference(user, this.clock(), this.guestDisabledTypes);
    if (await this.store.createIfAbsent(preference)) {
      logger.debug('Created default notification preferences', { userId: user.id, guest: user.isGuest });
      return preference;
    }

    const winner = await this.store.get(user.id);
    if (!winner) {
      throw new Error(`Preferences for ${user.id} vanished after insert conflict`);
    }
    return winner;
  }

  async updatePreferences(
    user: Pick<NotificationUser, 'id' | 'isGuest'>,
    update: PreferenceUpdate
  ): Promise<NotificationPreference> {
    const current = await this.getPreferences(user);

    const updated: NotificationPreference = {
      ...current,
      ...(update.silenceAll !== undefined && { silenceAll: update.silenceAll }),
      ...(update.enabledChannels !== undefined && { enabledChannels: dedupeChannels(update.enabledChannels) }),
      ...(update.digestFrequency !== undefined && { digestFrequency: update.digestFrequency }),
      ...(update.digestSendTime !== undefined && { digestSendTime: update.digestSendTime }),
      ...(update.digestWeekday !== undefined && { digestWeekday: update.digestWeekday }),
      typeSettings: { ...current.typeSettings, ...update.typeSettings },
      updatedAt: this.clock().toISOString(),
    };

    await this.store.save(updated);
    logger.info('Updated notification preferences', {
      userId: user.id,
      fields: Object.keys(update),
    });
    return updated;
  }

  async enableChannel(
    user: Pick<NotificationUser, 'id' | 'isGuest'>,
    channel: DeliveryChannel
  ): Promise<NotificationPreference> {
    const current = await this.getPreferences(user);
    if (current.enabledChannels.includes(channel)) return current;
    return this.updatePreferences(user, { enabledChannels: [...current.enabledChannels, channel] });
  }

  async disableChannel(
    user: Pick<NotificationUser, 'id' | 'isGuest'>,
    channel: DeliveryChannel
  ): Promise<NotificationPreference> {
    const current = await this.getPreferences(user);
    if (!current.enabledChannels.includes(channel)) return current;
    return this.updatePreferences(user, {
      enabledChannels: current.enabledChannels.filter(c => c !== channel),
    });
  }

  async listDigestUserIds(): Promise<string[]> {
    return this.store.listDigestUserIds();
  }
}

function dedupeChannels(channels: readonly DeliveryChannel[]): DeliveryChannel[] {
  return DELIVERY_CHANNELS.filter(channel => channels.includes(channel));
}
