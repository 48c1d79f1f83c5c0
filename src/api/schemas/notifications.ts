// ═══════════════════════════════════════════════════════════════════════════════
// NOTIFICATION SCHEMAS — Validation for Inbox and Preference Routes
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { PreferenceUpdateSchema } from '../../notifications/preferences.js';
import { DeliveryChannelSchema } from '../../notifications/records.js';

// ─────────────────────────────────────────────────────────────────────────────────
// INBOX
// ─────────────────────────────────────────────────────────────────────────────────

const QueryBoolean = z
  .enum(['true', 'false'])
  .transform(value => value === 'true');

export const ListNotificationsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(50),
  offset: z.coerce.number().int().min(0).default(0),
  unreadOnly: QueryBoolean.default('false'),
  includeArchived: QueryBoolean.default('false'),
});

export const NotificationIdParamSchema = z.object({
  id: z.string().min(1).max(64),
});

// ─────────────────────────────────────────────────────────────────────────────────
// PREFERENCES
// ─────────────────────────────────────────────────────────────────────────────────

export const ChannelParamSchema = z.object({
  channel: DeliveryChannelSchema,
});

export { PreferenceUpdateSchema };

export const UnsubscribeRequestSchema = z.object({
  token: z.string().min(1, 'Token is required'),
  preferences: PreferenceUpdateSchema,
});

export type ListNotificationsQuery = z.infer<typeof ListNotificationsQuerySchema>;
export type UnsubscribeRequest = z.infer<typeof UnsubscribeRequestSchema>;
