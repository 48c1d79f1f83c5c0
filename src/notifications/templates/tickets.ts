// ═══════════════════════════════════════════════════════════════════════════════
// TICKET TEMPLATES — Calendar Attachments
// ═══════════════════════════════════════════════════════════════════════════════

import { CatalogTemplate, type EmailAttachments, type RenderInput } from './base.js';

export interface CalendarEvent {
  uid: string;
  summary: string;
  start: Date;
  end?: Date;
  location?: string;
  url?: string;
  stamp: Date;
}

function formatIcsDate(date: Date): string {
  return date.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}/, '');
}

function escapeIcsText(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\r?\n/g, '\\n');
}

/**
 * Minimal single-event iCalendar document (RFC 5545), CRLF line endings.
 */
export function buildEventIcs(event: CalendarEvent): string {
  const lines = [
    'BEGIN:VCALENDAR',
    'VERSION:2.0',
    'PRODID:-//herald//notifications//EN',
    'METHOD:PUBLISH',
    'BEGIN:VEVENT',
    `UID:${event.uid}`,
    `DTSTAMP:${formatIcsDate(event.stamp)}`,
    `DTSTART:${formatIcsDate(event.start)}`,
  ];

  if (event.end) lines.push(`DTEND:${formatIcsDate(event.end)}`);
  lines.push(`SUMMARY:${escapeIcsText(event.summary)}`);
  if (event.location) lines.push(`LOCATION:${escapeIcsText(event.location)}`);
  if (event.url) lines.push(`URL:${event.url}`);

  lines.push('END:VEVENT', 'END:VCALENDAR');
  return lines.join('\r\n') + '\r\n';
}

function optionalDate(value: unknown): Date | undefined {
  if (typeof value !== 'string') return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Attaches `event.ics` unless the trigger sets `includeIcs: false`.
 */
export class TicketCreatedTemplate extends CatalogTemplate {
  getEmailAttachments(input: RenderInput): EmailAttachments {
    const { context } = input;
    if (context.includeIcs === false) return {};

    const start = optionalDate(context.eventStart);
    const eventId = optionalString(context.eventId);
    if (!start || !eventId) return {};

    const end = optionalDate(context.eventEnd);
    const location = optionalString(context.eventLocation);
    const url = optionalString(context.eventUrl);

    const ics = buildEventIcs({
      uid: `${eventId}@herald`,
      summary: optionalString(context.eventName) ?? 'Event',
      start,
      stamp: new Date(input.notification.createdAt),
      ...(end ? { end } : {}),
      ...(location ? { location } : {}),
      ...(url ? { url } : {}),
    });

    return {
      'event.ics': { content: ics, contentType: 'text/calendar' },
    };
  }
}
