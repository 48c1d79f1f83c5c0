// ═══════════════════════════════════════════════════════════════════════════════
// USER TYPES — Notification Recipients
// ═══════════════════════════════════════════════════════════════════════════════

export interface NotificationUser {
  id: string;
  displayName: string;

  email?: string;
  emailVerified: boolean;

  /** BCP 47 tag used for dates and number formatting */
  language: string;
  /** IANA zone, e.g. "Europe/Vienna" */
  timezone: string;

  /** Guest-tier accounts receive the conservative preference preset */
  isGuest: boolean;

  telegramChatId?: string;
  /** Set once the Bot API reports the chat as blocked or deactivated */
  telegramBlocked: boolean;
}

export const DEFAULT_LANGUAGE = 'en';
export const DEFAULT_TIMEZONE = 'UTC';
