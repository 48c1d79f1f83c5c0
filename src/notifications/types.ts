// ═══════════════════════════════════════════════════════════════════════════════
// NOTIFICATION TYPES — Notifications, Deliveries, Preferences, Recipients
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// NOTIFICATION TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export const NOTIFICATION_TYPES = [
  // Tickets & payments
  'ticket_created',
  'ticket_updated',
  'ticket_cancelled',
  'ticket_checked_in',
  'ticket_refunded',
  'payment_confirmation',

  // Events
  'event_open',
  'event_created',
  'event_updated',
  'event_reminder',
  'event_cancelled',
  'event_series_followed',

  // RSVPs
  'rsvp_confirmation',
  'rsvp_updated',
  'rsvp_cancelled',
  'waitlist_spot_available',

  // Potluck
  'potluck_item_created',
  'potluck_item_updated',
  'potluck_item_claimed',
  'potluck_item_unclaimed',
  'potluck_item_deleted',
  'potluck_update',

  // Questionnaires
  'questionnaire_submitted',
  'questionnaire_evaluation_result',

  // Invitations
  'invitation_received',
  'invitation_claimed',
  'invitation_revoked',
  'invitation_request_created',

  // Membership
  'membership_granted',
  'membership_promoted',
  'membership_removed',
  'membership_request_approved',
  'membership_request_rejected',
  'membership_request_created',

  // Whitelist
  'whitelist_request_created',
  'whitelist_request_approved',
  'whitelist_request_rejected',

  // Follows
  'organization_followed',
  'new_event_from_followed_org',
  'new_event_from_followed_series',

  // System
  'malware_detected',
  'org_announcement',
] as const;

export type NotificationType = typeof NOTIFICATION_TYPES[number];

export function isNotificationType(value: string): value is NotificationType {
  return (NOTIFICATION_TYPES as readonly string[]).includes(value);
}

// ─────────────────────────────────────────────────────────────────────────────────
// CHANNELS & STATUSES
// ─────────────────────────────────────────────────────────────────────────────────

export const DELIVERY_CHANNELS = ['in_app', 'email', 'telegram'] as const;

export type DeliveryChannel = typeof DELIVERY_CHANNELS[number];

export function isDeliveryChannel(value: string): value is DeliveryChannel {
  return (DELIVERY_CHANNELS as readonly string[]).includes(value);
}

export const DELIVERY_STATUSES = ['pending', 'sent', 'failed', 'skipped'] as const;

export type DeliveryStatus = typeof DELIVERY_STATUSES[number];

export const DIGEST_FREQUENCIES = ['immediate', 'hourly', 'daily', 'weekly'] as const;

export type DigestFrequency = typeof DIGEST_FREQUENCIES[number];

// ─────────────────────────────────────────────────────────────────────────────────
// NOTIFICATION MODEL
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Type-specific payload supplied by the triggering domain code. Values are
 * JSON-compatible; keys are camelCase (`eventName`, `eventStart`).
 */
export type NotificationContext = Record<string, unknown>;

export interface Notification {
  id: string;
  userId: string;
  type: NotificationType;
  context: NotificationContext;

  /** Empty until the notification is first dispatched */
  title: string;
  body: string;

  createdAt: string;
  readAt?: string;
  archivedAt?: string;
}

export interface CreateNotificationInput {
  type: NotificationType;
  userId: string;
  context: NotificationContext;
}

export interface NotificationListOptions {
  limit?: number;
  offset?: number;
  unreadOnly?: boolean;
  includeArchived?: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────────
// DELIVERY RECORD
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * One per (notification, channel). Every attempt mutates the same record.
 */
export interface DeliveryRecord {
  id: string;
  notificationId: string;
  userId: string;
  channel: DeliveryChannel;
  status: DeliveryStatus;

  /** Number of attempts made so far */
  retryCount: number;

  attemptedAt?: string;
  deliveredAt?: string;
  errorMessage?: string;

  /** Set when the last failure was classified as retryable */
  retryable?: boolean;

  metadata: Record<string, unknown>;
  createdAt: string;
  updatedAt: string;
}

// ─────────────────────────────────────────────────────────────────────────────────
// PREFERENCES
// ─────────────────────────────────────────────────────────────────────────────────

export interface NotificationTypeSettings {
  enabled: boolean;
  /** Narrows the globally enabled channels for this type */
  channels?: DeliveryChannel[];
}

export type NotificationTypeSettingsMap = Partial<Record<NotificationType, NotificationTypeSettings>>;

export interface NotificationPreference {
  userId: string;

  /** Overrides everything else when true */
  silenceAll: boolean;
  enabledChannels: DeliveryChannel[];

  digestFrequency: DigestFrequency;
  /** Local time of day in the user's timezone, HH:mm */
  digestSendTime: string;
  /** 0 = Sunday; only used for weekly digests */
  digestWeekday: number;

  typeSettings: NotificationTypeSettingsMap;

  createdAt: string;
  updatedAt: string;
}

export interface PreferenceUpdate {
  silenceAll?: boolean;
  enabledChannels?: DeliveryChannel[];
  digestFrequency?: DigestFrequency;
  digestSendTime?: string;
  digestWeekday?: number;
  typeSettings?: NotificationTypeSettingsMap;
}

export const DEFAULT_ENABLED_CHANNELS: readonly DeliveryChannel[] = ['in_app', 'email'];

export const DEFAULT_DIGEST_SEND_TIME = '09:00';

export const DEFAULT_DIGEST_WEEKDAY = 1;

// ─────────────────────────────────────────────────────────────────────────────────
// EMAIL LOG
// ─────────────────────────────────────────────────────────────────────────────────

export interface EmailLog {
  id: string;
  userId: string;
  notificationIds: string[];
  recipient: string;
  subject: string;
  messageId?: string;
  digest: boolean;
  sentAt: string;
}
