// ═══════════════════════════════════════════════════════════════════════════════
// CONTEXT ENRICHMENT — Localized Dates, Links, Recipient
// ═══════════════════════════════════════════════════════════════════════════════

import { DEFAULT_LANGUAGE, DEFAULT_TIMEZONE, type NotificationUser } from '../../users/types.js';
import type { NotificationContext } from '../types.js';

export const DATE_FIELDS = [
  'eventStart',
  'eventEnd',
  'rsvpCreatedAt',
  'ticketCreatedAt',
  'invitationExpiresAt',
  'checkedInAt',
] as const;

export interface RecipientSummary {
  id: string;
  displayName: string;
  email?: string;
  language: string;
  timezone: string;
}

export interface EnrichmentOptions {
  frontendBaseUrl: string;
  unsubscribeLink?: string;
}

// ─────────────────────────────────────────────────────────────────────────────────
// DATE FORMATTING
// ─────────────────────────────────────────────────────────────────────────────────

const FULL_FORMAT: Intl.DateTimeFormatOptions = { dateStyle: 'full', timeStyle: 'short' };
const SHORT_FORMAT: Intl.DateTimeFormatOptions = { dateStyle: 'medium' };

function createFormatter(
  language: string,
  timezone: string,
  options: Intl.DateTimeFormatOptions
): Intl.DateTimeFormat {
  try {
    return new Intl.DateTimeFormat(language, { ...options, timeZone: timezone });
  } catch (error) {
    // Unknown locale tag or zone stored on the user
    if (!(error instanceof RangeError)) throw error;
    return new Intl.DateTimeFormat(DEFAULT_LANGUAGE, { ...options, timeZone: DEFAULT_TIMEZONE });
  }
}

export function formatDateTime(date: Date, language: string, timezone: string): string {
  return createFormatter(language, timezone, FULL_FORMAT).format(date);
}

export function formatShortDate(date: Date, language: string, timezone: string): string {
  return createFormatter(language, timezone, SHORT_FORMAT).format(date);
}

function parseDate(value: unknown): Date | null {
  if (typeof value !== 'string') return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function isPresent(value: unknown): boolean {
  return typeof value === 'string' ? value.length > 0 : value !== undefined && value !== null;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ENRICHMENT
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Returns a copy of the context with render-time values added.
 *
 * A `<field>Formatted` supplied by the trigger is kept as is, since it may carry
 * a timezone chosen upstream. `<field>Short` is only derived when no formatted
 * value existed at all.
 */
export function enrichContext(
  context: NotificationContext,
  recipient: NotificationUser,
  options: EnrichmentOptions
): NotificationContext {
  const enriched: NotificationContext = { ...context };

  for (const field of DATE_FIELDS) {
    const date = parseDate(context[field]);
    if (!date) continue;

    const formattedKey = `${field}Formatted`;
    const shortKey = `${field}Short`;
    if (isPresent(enriched[formattedKey])) continue;

    enriched[formattedKey] = formatDateTime(date, recipient.language, recipient.timezone);
    if (!isPresent(enriched[shortKey])) {
      enriched[shortKey] = formatShortDate(date, recipient.language, recipient.timezone);
    }
  }

  const baseUrl = options.frontendBaseUrl.replace(/\/+$/, '');

  if (typeof context.eventId === 'string' && !isPresent(enriched.eventUrl)) {
    enriched.eventUrl = `${baseUrl}/events/${encodeURIComponent(context.eventId)}`;
  }
  if (typeof context.organizationId === 'string' && !isPresent(enriched.organizationUrl)) {
    enriched.organizationUrl = `${baseUrl}/org/${encodeURIComponent(context.organizationId)}`;
  }

  enriched.actionUrl = firstString(enriched.frontendUrl, enriched.eventUrl, enriched.organizationUrl)
    ?? `${baseUrl}/notifications`;

  if (options.unsubscribeLink) {
    enriched.unsubscribeLink = options.unsubscribeLink;
  }

  const summary: RecipientSummary = {
    id: recipient.id,
    displayName: recipient.displayName,
    language: recipient.language,
    timezone: recipient.timezone,
    ...(recipient.email !== undefined && { email: recipient.email }),
  };
  enriched.recipient = summary;

  return enriched;
}

function firstString(...values: unknown[]): string | undefined {
  for (const value of values) {
    if (typeof value === 'string' && value.length > 0) return value;
  }
  return undefined;
}
