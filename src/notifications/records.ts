// ═══════════════════════════════════════════════════════════════════════════════
// PERSISTED RECORD SCHEMAS — Parsing What Comes Back From the Store
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import {
  DELIVERY_CHANNELS,
  DELIVERY_STATUSES,
  DIGEST_FREQUENCIES,
  NOTIFICATION_TYPES,
  type DeliveryRecord,
  type EmailLog,
  type Notification,
  type NotificationPreference,
  type NotificationTypeSettings,
  type NotificationTypeSettingsMap,
} from './types.js';

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export const NotificationTypeSchema = z.enum(NOTIFICATION_TYPES);
export const DeliveryChannelSchema = z.enum(DELIVERY_CHANNELS);
export const DigestFrequencySchema = z.enum(DIGEST_FREQUENCIES);

/** HH:mm, 24-hour clock */
export const TimeOfDaySchema = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Expected HH:mm');

export const NotificationRecordSchema: Schema<Notification> = z.object({
  id: z.string(),
  userId: z.string(),
  type: NotificationTypeSchema,
  context: z.record(z.unknown()),
  title: z.string(),
  body: z.string(),
  createdAt: z.string(),
  readAt: z.string().optional(),
  archivedAt: z.string().optional(),
});

export const DeliveryRecordSchema: Schema<DeliveryRecord> = z.object({
  id: z.string(),
  notificationId: z.string(),
  userId: z.string(),
  channel: DeliveryChannelSchema,
  status: z.enum(DELIVERY_STATUSES),
  retryCount: z.number().int().nonnegative(),
  attemptedAt: z.string().optional(),
  deliveredAt: z.string().optional(),
  errorMessage: z.string().optional(),
  retryable: z.boolean().optional(),
  metadata: z.record(z.unknown()),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const NotificationTypeSettingsSchema: Schema<NotificationTypeSettings> = z.object({
  enabled: z.boolean(),
  channels: z.array(DeliveryChannelSchema).optional(),
});

/**
 * Unknown type keys are dropped rather than rejected so that retiring a
 * notification type never invalidates stored preferences.
 */
export const TypeSettingsMapSchema: Schema<NotificationTypeSettingsMap> = z
  .record(z.unknown())
  .transform(raw => {
    const settings: NotificationTypeSettingsMap = {};
    for (const type of NOTIFICATION_TYPES) {
      const parsed = NotificationTypeSettingsSchema.safeParse(raw[type]);
      if (parsed.success) {
        settings[type] = parsed.data;
      }
    }
    return settings;
  });

export const PreferenceRecordSchema: Schema<NotificationPreference> = z.object({
  userId: z.string(),
  silenceAll: z.boolean(),
  enabledChannels: z.array(DeliveryChannelSchema),
  digestFrequency: DigestFrequencySchema,
  digestSendTime: TimeOfDaySchema,
  digestWeekday: z.number().int().min(0).max(6),
  typeSettings: TypeSettingsMapSchema,
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const EmailLogSchema: Schema<EmailLog> = z.object({
  id: z.string(),
  userId: z.string(),
  notificationIds: z.array(z.string()),
  recipient: z.string(),
  subject: z.string(),
  messageId: z.string().optional(),
  digest: z.boolean(),
  sentAt: z.string(),
});

/**
 * Parses a stored JSON document, returning null for missing or corrupt data.
 */
export function parseRecord<T>(schema: Schema<T>, raw: string | null): T | null {
  if (raw === null) return null;

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }

  const parsed = schema.safeParse(json);
  return parsed.success ? parsed.data : null;
}
