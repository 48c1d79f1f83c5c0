// ═══════════════════════════════════════════════════════════════════════════════
// TEMPLATE TESTS — Interpolation, Enrichment, Registry, Channel Rendering
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import { TemplateLookupError } from '../errors.js';
import { interpolate, CatalogTemplate } from '../templates/base.js';
import { loadTemplateCatalog } from '../templates/catalog.js';
import { enrichContext } from '../templates/enrichment.js';
import { escapeHtml, markdownToHtml } from '../templates/html.js';
import { TemplateRegistry, createDefaultTemplateRegistry } from '../templates/registry.js';
import { TemplateRenderer } from '../templates/renderer.js';
import { markdownToTelegramHtml, sanitizeTelegramHtml } from '../templates/telegram.js';
import { buildEventIcs } from '../templates/tickets.js';
import { NOTIFICATION_TYPES, type Notification, type NotificationContext, type NotificationType } from '../types.js';
import { FRONTEND, createTestUser } from '../../tests/fixtures.js';

const user = createTestUser();
const catalog = loadTemplateCatalog();
const registry = createDefaultTemplateRegistry(catalog);
const renderer = new TemplateRenderer(registry, {
  frontendBaseUrl: FRONTEND,
  unsubscribeLink: () => `${FRONTEND}/unsubscribe?token=test-token`,
});

function notification(type: NotificationType, context: NotificationContext): Notification {
  return {
    id: 'notification-1',
    userId: user.id,
    type,
    context,
    title: '',
    body: '',
    createdAt: '2025-03-10T09:00:00.000Z',
  };
}

function render(type: NotificationType, context: NotificationContext) {
  const { template, input } = renderer.prepare(notification(type, context), user);
  return {
    title: template.getInAppTitle(input),
    body: template.getInAppBody(input),
    subject: template.getEmailSubject(input),
    text: template.getEmailTextBody(input),
    html: template.getEmailHtmlBody(input),
    telegram: template.getTelegramBody(input),
    attachments: template.getEmailAttachments(input),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// INTERPOLATION
// ─────────────────────────────────────────────────────────────────────────────────

describe('interpolate', () => {
  it('should replace flat and nested placeholders', () => {
    const result = interpolate('Hi {{ name }}, see you at {{event.place}}', {
      name: 'Ada',
      event: { place: 'Main Hall' },
    });

    expect(result).toBe('Hi Ada, see you at Main Hall');
  });

  it('should render missing and non-scalar values as empty', () => {
    expect(interpolate('[{{missing}}][{{list}}][{{count}}]', { list: [1, 2], count: 3 })).toBe('[][][3]');
  });

  it('should escape values but not the template', () => {
    expect(interpolate('<b>{{name}}</b>', { name: '<Ada & Co>' }, escapeHtml)).toBe('<b>&lt;Ada &amp; Co&gt;</b>');
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// ENRICHMENT
// ─────────────────────────────────────────────────────────────────────────────────

describe('enrichContext', () => {
  it('should add localized dates and deep links', () => {
    const context = { eventId: 'evt 1', organizationId: 'org-1', eventStart: '2025-04-01T18:00:00.000Z' };

    const enriched = enrichContext(context, user, { frontendBaseUrl: `${FRONTEND}/` });

    expect(enriched.eventUrl).toBe('https://app.example.test/events/evt%201');
    expect(enriched.organizationUrl).toBe('https://app.example.test/org/org-1');
    expect(enriched.actionUrl).toBe('https://app.example.test/events/evt%201');
    expect(enriched.eventStartFormatted).toContain('April 1, 2025');
    expect(enriched.eventStartShort).toContain('Apr 1, 2025');
    expect(context).not.toHaveProperty('eventUrl');
  });

  it('should keep a formatted date supplied by the trigger', () => {
    const enriched = enrichContext(
      { eventStart: '2025-04-01T18:00:00.000Z', eventStartFormatted: 'Tuesday evening' },
      user,
      { frontendBaseUrl: FRONTEND }
    );

    expect(enriched.eventStartFormatted).toBe('Tuesday evening');
    expect(enriched).not.toHaveProperty('eventStartShort');
  });

  it('should prefer the trigger deep link for the action', () => {
    const enriched = enrichContext(
      { eventId: 'evt-1', frontendUrl: 'https://app.example.test/tickets/t-1' },
      user,
      { frontendBaseUrl: FRONTEND }
    );

    expect(enriched.actionUrl).toBe('https://app.example.test/tickets/t-1');
  });

  it('should fall back to the inbox and add the recipient', () => {
    const enriched = enrichContext({}, user, { frontendBaseUrl: FRONTEND, unsubscribeLink: 'https://u.test/x' });

    expect(enriched.actionUrl).toBe('https://app.example.test/notifications');
    expect(enriched.unsubscribeLink).toBe('https://u.test/x');
    expect(enriched.recipient).toEqual({
      id: 'user-1',
      displayName: 'Ada Tester',
      email: 'ada@example.test',
      language: 'en',
      timezone: 'UTC',
    });
  });

  it('should format in the recipient timezone', () => {
    const tokyo = createTestUser({ timezone: 'Asia/Tokyo' });

    const enriched = enrichContext({ eventStart: '2025-04-01T18:00:00.000Z' }, tokyo, { frontendBaseUrl: FRONTEND });

    expect(enriched.eventStartShort).toContain('Apr 2, 2025');
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// REGISTRY
// ─────────────────────────────────────────────────────────────────────────────────

describe('TemplateRegistry', () => {
  it('should register a template for every notification type by default', () => {
    expect(registry.registeredTypes()).toHaveLength(NOTIFICATION_TYPES.length);
  });

  it('should raise TemplateLookupError for unregistered types', () => {
    const empty = new TemplateRegistry();

    expect(() => empty.getTemplate('membership_granted')).toThrow(TemplateLookupError);
    expect(() => registry.getTemplate('not_a_type')).toThrow(
      'No template registered for notification type: not_a_type'
    );
  });

  it('should keep the last registration for a type', () => {
    const custom = new TemplateRegistry();
    const first = new CatalogTemplate('org_announcement', catalog.entry('org_announcement'));
    const second = new CatalogTemplate('org_announcement', catalog.entry('org_announcement'));

    custom.register('org_announcement', first);
    custom.register('org_announcement', second);

    expect(custom.getTemplate('org_announcement')).toBe(second);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// CHANNEL RENDERING
// ─────────────────────────────────────────────────────────────────────────────────

describe('catalogue rendering', () => {
  const membership = { organizationId: 'org-1', organizationName: 'Chess Club', role: 'member' };

  it('should render title, subject and body from the catalogue', () => {
    const output = render('membership_granted', membership);

    expect(output.title).toBe('Welcome to Chess Club');
    expect(output.subject).toBe("You're now a member of Chess Club");
    expect(output.body).toBe(
      'You are now a **member** of **Chess Club**.\n\n[Open organization](https://app.example.test/org/org-1)'
    );
  });

  it('should build the plain-text email with greeting and footer', () => {
    const lines = render('membership_granted', membership).text.split('\n');

    expect(lines[0]).toBe('Hi Ada Tester,');
    expect(lines).toContain('Open in app: https://app.example.test/org/org-1');
    expect(lines[lines.length - 1]).toBe(
      'Manage or unsubscribe from these emails: https://app.example.test/unsubscribe?token=test-token'
    );
  });

  it('should escape context values in the HTML email', () => {
    const html = render('membership_granted', { ...membership, organizationName: '<Chess & Go>' }).html;

    expect(html).toContain('<strong>&#x3C;Chess &#x26; Go></strong>');
    expect(html).not.toContain('<Chess');
  });

  it('should list event changes', () => {
    const output = render('event_updated', {
      eventId: 'evt-1',
      eventName: 'Spring Gala',
      changedFields: ['location'],
      oldValues: { location: 'Main Hall' },
      newValues: { location: 'Garden' },
    });

    expect(output.body.split('\n').slice(-3)).toEqual(['What changed:', '', '- **location**: Main Hall → Garden']);
  });

  it('should count down in reminder titles', () => {
    expect(render('event_reminder', { eventName: 'Spring Gala', daysUntil: 1 }).title)
      .toBe('Reminder: Spring Gala is tomorrow');
    expect(render('event_reminder', { eventName: 'Spring Gala', daysUntil: 1 }).subject)
      .toBe('Tomorrow: Spring Gala');
    expect(render('event_reminder', { eventName: 'Spring Gala', daysUntil: 4 }).title)
      .toBe('Reminder: Spring Gala in 4 days');
  });

  it('should title a generic potluck update from its action', () => {
    const output = render('potluck_update', {
      eventName: 'Spring Gala',
      itemName: 'Lemonade',
      action: 'unclaimed',
      changedByUsername: 'grace',
    });

    expect(output.title).toBe('Potluck item released: Lemonade');
    expect(output.body.endsWith('\n\nChanged by grace.')).toBe(true);
  });

  it('should list malware findings', () => {
    const output = render('malware_detected', { fileName: 'flyer.pdf', findings: { engine: 'Eicar-Test' } });

    expect(output.body.split('\n').slice(-3)).toEqual(['Findings:', '', '- engine: Eicar-Test']);
  });
});

describe('ticket attachments', () => {
  const ticket = {
    eventId: 'evt-1',
    eventName: 'Spring Gala',
    eventStart: '2025-04-01T18:00:00.000Z',
    eventLocation: 'Hall 1, Main St',
  };

  it('should attach a calendar entry', () => {
    const { attachments } = render('ticket_created', ticket);

    expect(Object.keys(attachments)).toEqual(['event.ics']);
    expect(attachments['event.ics']?.contentType).toBe('text/calendar');
  });

  it('should leave out the calendar entry when the trigger opts out', () => {
    expect(render('ticket_created', { ...ticket, includeIcs: false }).attachments).toEqual({});
  });

  it('should build an RFC 5545 event', () => {
    const ics = buildEventIcs({
      uid: 'evt-1@herald',
      summary: 'Spring Gala; Dinner',
      start: new Date('2025-04-01T18:00:00.000Z'),
      location: 'Hall 1, Main St',
      stamp: new Date('2025-03-10T09:00:00.000Z'),
    });

    expect(ics.split('\r\n')).toEqual([
      'BEGIN:VCALENDAR',
      'VERSION:2.0',
      'PRODID:-//herald//notifications//EN',
      'METHOD:PUBLISH',
      'BEGIN:VEVENT',
      'UID:evt-1@herald',
      'DTSTAMP:20250310T090000Z',
      'DTSTART:20250401T180000Z',
      'SUMMARY:Spring Gala\\; Dinner',
      'LOCATION:Hall 1\\, Main St',
      'END:VEVENT',
      'END:VCALENDAR',
      '',
    ]);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// HTML CONVERSION
// ─────────────────────────────────────────────────────────────────────────────────

describe('markdownToHtml', () => {
  it('should render emphasis and links', () => {
    expect(markdownToHtml('**Hi** [there](https://example.test)')).toBe(
      '<p><strong>Hi</strong> <a href="https://example.test">there</a></p>'
    );
  });
});

describe('telegram HTML', () => {
  it('should map markdown to the allowed tag set', () => {
    expect(markdownToTelegramHtml('**Hi** _there_')).toBe('<b>Hi</b> <i>there</i>');
  });

  it('should turn lists into bullet lines', () => {
    expect(markdownToTelegramHtml('- one\n- two')).toBe('• one\n• two');
  });

  it('should unwrap disallowed elements and drop scripts', () => {
    expect(sanitizeTelegramHtml('<p>Hello <strong>world</strong></p><script>alert(1)</script>'))
      .toBe('Hello <b>world</b>');
  });

  it('should keep spoilers and safe links only', () => {
    expect(sanitizeTelegramHtml('<span class="tg-spoiler">secret</span>'))
      .toBe('<span class="tg-spoiler">secret</span>');
    expect(sanitizeTelegramHtml('<a href="javascript:alert(1)">click</a>')).toBe('click');
    expect(sanitizeTelegramHtml('<a href="https://example.test">site</a>'))
      .toBe('<a href="https://example.test">site</a>');
  });
});
