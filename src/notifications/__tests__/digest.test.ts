import { describe, it, expect, beforeEach } from 'vitest';
import { digestWindow, getLookback, shouldSendDigestNow } from '../digest.js';
import { TransientDeliveryError } from '../errors.js';
import { buildDefaultPreference } from '../preferences.js';
import type { NotificationPreference } from '../types.js';
import {
  createTestEngine,
  createTestUser,
  membershipContext,
  type TestEngine,
} from '../../tests/fixtures.js';

const HOUR_MS = 60 * 60 * 1000;

function preference(overrides: Partial<NotificationPreference> = {}): NotificationPreference {
  return {
    ...buildDefaultPreference({ id: 'user-1', isGuest: false }, new Date('2025-03-01T00:00:00.000Z')),
    ...overrides,
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// SCHEDULING
// ─────────────────────────────────────────────────────────────────────────────

describe('getLookback', () => {
  it('should map each digest frequency to its window', () => {
    expect(getLookback('hourly')).toBe(HOUR_MS);
    expect(getLookback('daily')).toBe(24 * HOUR_MS);
    expect(getLookback('weekly')).toBe(7 * 24 * HOUR_MS);
  });

  it('should throw for immediate delivery', () => {
    expect(() => getLookback('immediate')).toThrow('Immediate delivery has no digest lookback');
  });
});

describe('digestWindow', () => {
  it('should measure the offset in the user timezone', () => {
    // New York is on EDT (UTC-4) from 2025-03-09
    const window = digestWindow(
      { digestFrequency: 'daily', digestSendTime: '09:00' },
      'America/New_York',
      new Date('2025-03-10T13:10:30.000Z')
    );

    expect(window.offsetMinutes).toBe(10);
    expect(window.occurrence.toISOString()).toBe('2025-03-10T13:00:00.000Z');
    expect(window.weekday).toBe(1);
  });

  it('should wrap across midnight to the next local day', () => {
    const window = digestWindow(
      { digestFrequency: 'weekly', digestSendTime: '00:00' },
      'UTC',
      new Date('2025-03-09T23:50:00.000Z')
    );

    expect(window.offsetMinutes).toBe(-10);
    expect(window.occurrence.toISOString()).toBe('2025-03-10T00:00:00.000Z');
    expect(window.weekday).toBe(1);
  });

  it('should compare minute-of-hour for hourly digests', () => {
    const window = digestWindow(
      { digestFrequency: 'hourly', digestSendTime: '09:15' },
      'UTC',
      new Date('2025-03-10T14:20:00.000Z')
    );

    expect(window.offsetMinutes).toBe(5);
    expect(window.occurrence.toISOString()).toBe('2025-03-10T14:15:00.000Z');
  });

  it('should fall back to UTC for an unknown timezone', () => {
    const window = digestWindow(
      { digestFrequency: 'daily', digestSendTime: '09:00' },
      'Mars/Olympus_Mons',
      new Date('2025-03-10T09:05:00.000Z')
    );

    expect(window.offsetMinutes).toBe(5);
  });
});

describe('shouldSendDigestNow', () => {
  const user = { timezone: 'UTC' };

  it('should send inside the window around the send time', () => {
    const daily = preference({ digestFrequency: 'daily', digestSendTime: '09:00' });

    expect(shouldSendDigestNow(user, daily, new Date('2025-03-10T08:40:00.000Z'))).toBe(true);
    expect(shouldSendDigestNow(user, daily, new Date('2025-03-10T09:30:00.000Z'))).toBe(true);
    expect(shouldSendDigestNow(user, daily, new Date('2025-03-10T10:00:00.000Z'))).toBe(false);
  });

  it('should never send for immediate users', () => {
    expect(shouldSendDigestNow(user, preference(), new Date('2025-03-10T09:00:00.000Z'))).toBe(false);
  });

  it('should require the configured weekday for weekly digests', () => {
    const weekly = preference({ digestFrequency: 'weekly', digestSendTime: '09:00', digestWeekday: 1 });

    expect(shouldSendDigestNow(user, weekly, new Date('2025-03-10T09:00:00.000Z'))).toBe(true);
    expect(shouldSendDigestNow(user, weekly, new Date('2025-03-11T09:00:00.000Z'))).toBe(false);
  });

  it('should honour a narrower window for hourly digests', () => {
    const hourly = preference({ digestFrequency: 'hourly', digestSendTime: '09:15' });

    expect(shouldSendDigestNow(user, hourly, new Date('2025-03-10T14:20:00.000Z'), 10)).toBe(true);
    expect(shouldSendDigestNow(user, hourly, new Date('2025-03-10T14:50:00.000Z'), 10)).toBe(false);
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// BATCHER
// ─────────────────────────────────────────────────────────────────────────────

describe('DigestBatcher', () => {
  let engine: TestEngine;
  const user = createTestUser();

  const ticketContext = {
    ticketId: 'ticket-1',
    ticketReference: 'TCK-001',
    eventId: 'evt-1',
    eventName: 'Spring Gala',
    eventStart: '2025-04-01T18:00:00.000Z',
    eventLocation: 'Main Hall',
    organizationId: 'org-1',
    organizationName: 'Chess Club',
    tierName: 'General',
    tierPrice: '10.00',
    quantity: 1,
    totalPrice: '10.00',
  };

  async function createAndDispatch(type: string, context: unknown): Promise<string> {
    const notification = await engine.dispatcher.createNotification(type, user.id, context);
    await engine.dispatcher.dispatch(notification.id);
    engine.clock.advance(60_000);
    return notification.id;
  }

  async function seedThree(): Promise<string[]> {
    engine.clock.set('2025-03-09T12:00:00.000Z');
    return [
      await createAndDispatch('ticket_created', ticketContext),
      await createAndDispatch('membership_granted', membershipContext),
      await createAndDispatch('membership_granted', { ...membershipContext, organizationName: 'Book Club' }),
    ];
  }

  beforeEach(async () => {
    engine = createTestEngine();
    await engine.users.saveUser(user);
    await engine.preferences.updatePreferences(user, { digestFrequency: 'daily', digestSendTime: '09:00' });
  });

  it('should deliver only in-app while notifications are pending', async () => {
    const [ticketId] = await seedThree();

    expect(engine.email.calls).toBe(0);
    const records = await engine.deliveries.listForNotification(ticketId ?? '');
    expect(records.map(r => r.channel)).toEqual(['in_app']);
  });

  it('should send one digest covering every pending notification', async () => {
    const ids = await seedThree();
    engine.clock.set('2025-03-10T09:05:00.000Z');

    const result = await engine.digest.runDigestScan();

    expect(result).toEqual({ sent: 1, skipped: 0, failed: 0 });
    expect(engine.email.sent).toHaveLength(1);

    const [message] = engine.email.sent;
    expect(message?.to).toBe('ada@example.test');
    expect(message?.subject).toBe('3 new notifications');
    expect(message?.text.split('\n').slice(0, 12)).toEqual([
      'Hi Ada Tester,',
      '',
      'You have 3 new notifications.',
      '',
      'Ticket confirmations (1)',
      '- Ticket confirmation for Spring Gala',
      '',
      'Memberships granted (2)',
      '- Welcome to Chess Club',
      '- Welcome to Book Club',
      '',
      'Open in app: https://app.example.test/notifications',
    ]);
    expect(message?.html).toContain('<h3>Memberships granted (2)</h3>');
    expect(message?.headers?.['List-Unsubscribe']).toMatch(/^<https:\/\/app\.example\.test\/unsubscribe\?token=/);

    for (const id of ids) {
      const record = await engine.deliveries.get(id, 'email');
      expect(record).toMatchObject({
        status: 'sent',
        retryCount: 1,
        deliveredAt: '2025-03-10T09:05:00.000Z',
        metadata: { digest: true, recipient: 'ada@example.test', messageId: '<msg-1@example.test>' },
      });
    }

    const logs = await engine.emailLogs.listForUser(user.id);
    expect(logs).toHaveLength(1);
    expect(logs[0]?.digest).toBe(true);
    expect(logs[0]?.notificationIds).toEqual(ids);
  });

  it('should not include the same notifications in a later digest', async () => {
    await seedThree();
    engine.clock.set('2025-03-10T09:05:00.000Z');
    await engine.digest.runDigestScan();

    const pending = await engine.digest.getPendingNotificationsForDigest(
      user.id,
      new Date('2025-03-09T00:00:00.000Z')
    );

    expect(pending).toEqual([]);
  });

  it('should send at most once per scheduled occurrence', async () => {
    await seedThree();
    engine.clock.set('2025-03-10T09:05:00.000Z');
    await engine.digest.runDigestScan();

    engine.clock.set('2025-03-10T09:06:00.000Z');
    await engine.dispatcher.createNotification('membership_granted', user.id, membershipContext);
    engine.clock.set('2025-03-10T09:10:00.000Z');
    const result = await engine.digest.runDigestScan();

    expect(result).toEqual({ sent: 0, skipped: 1, failed: 0 });
    expect(engine.email.calls).toBe(1);
  });

  it('should leave out notifications already emailed immediately', async () => {
    await engine.preferences.updatePreferences(user, { digestFrequency: 'immediate' });
    engine.clock.set('2025-03-10T08:00:00.000Z');
    const notificationId = await createAndDispatch('membership_granted', membershipContext);
    expect((await engine.deliveries.get(notificationId, 'email'))?.status).toBe('sent');

    await engine.preferences.updatePreferences(user, { digestFrequency: 'daily', digestSendTime: '09:00' });
    engine.clock.set('2025-03-10T09:05:00.000Z');

    expect(await engine.digest.runDigestScan()).toEqual({ sent: 0, skipped: 1, failed: 0 });
    expect(engine.email.calls).toBe(1);
  });

  it('should skip notifications already read', async () => {
    const [ticketId] = await seedThree();
    await engine.notifications.markRead(user.id, ticketId ?? '');
    engine.clock.set('2025-03-10T09:05:00.000Z');

    await engine.digest.runDigestScan();

    expect(engine.email.sent[0]?.subject).toBe('2 new notifications');
  });

  it('should leave out types whose email channel is disabled', async () => {
    await engine.preferences.updatePreferences(user, {
      typeSettings: { membership_granted: { enabled: true, channels: ['in_app'] } },
    });
    await seedThree();
    engine.clock.set('2025-03-10T09:05:00.000Z');

    await engine.digest.runDigestScan();

    expect(engine.email.sent[0]?.subject).toBe('1 new notification');
  });

  it('should skip users outside their send window', async () => {
    await seedThree();
    engine.clock.set('2025-03-10T11:00:00.000Z');

    expect(await engine.digest.runDigestScan()).toEqual({ sent: 0, skipped: 1, failed: 0 });
  });

  it('should skip users without a verified address', async () => {
    await seedThree();
    await engine.users.saveUser({ ...user, emailVerified: false });
    engine.clock.set('2025-03-10T09:05:00.000Z');

    expect(await engine.digest.runDigestScan()).toEqual({ sent: 0, skipped: 1, failed: 0 });
  });

  it('should release the claim when sending fails', async () => {
    await seedThree();
    engine.email.failNext(new TransientDeliveryError('Connection reset'));
    engine.clock.set('2025-03-10T09:05:00.000Z');

    expect(await engine.digest.runDigestScan()).toEqual({ sent: 0, skipped: 0, failed: 1 });

    engine.clock.set('2025-03-10T09:10:00.000Z');
    expect(await engine.digest.runDigestScan()).toEqual({ sent: 1, skipped: 0, failed: 0 });
    expect(engine.email.sent[0]?.subject).toBe('3 new notifications');
  });

  it('should run the scan from a queued job', async () => {
    await seedThree();
    engine.clock.set('2025-03-10T09:05:00.000Z');
    await engine.queue.enqueue('digest_scan', {});

    expect(await engine.worker.tick()).toEqual({ completed: 1, failed: 0 });
    expect(engine.email.calls).toBe(1);
  });
});
