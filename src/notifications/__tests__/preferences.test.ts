import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryStore } from '../../storage/index.js';
import {
  GUEST_DISABLED_TYPES,
  PreferenceService,
  PreferenceStore,
  PreferenceUpdateSchema,
  buildDefaultPreference,
  getChannelsForNotificationType,
  isChannelEnabled,
  isNotificationTypeEnabled,
} from '../preferences.js';
import type { NotificationPreference } from '../types.js';
import { TestClock } from '../../tests/fixtures.js';

const NOW = new Date('2025-03-10T09:00:00.000Z');

function preference(overrides: Partial<NotificationPreference> = {}): NotificationPreference {
  return { ...buildDefaultPreference({ id: 'user-1', isGuest: false }, NOW), ...overrides };
}

// ─────────────────────────────────────────────────────────────────────────────
// RESOLVER
// ─────────────────────────────────────────────────────────────────────────────

describe('preference resolver', () => {
  it('should enable in-app and email by default', () => {
    const p = preference();

    expect(isChannelEnabled(p, 'in_app')).toBe(true);
    expect(isChannelEnabled(p, 'email')).toBe(true);
    expect(isChannelEnabled(p, 'telegram')).toBe(false);
    expect(isNotificationTypeEnabled(p, 'event_reminder')).toBe(true);
  });

  it('should silence every channel and type', () => {
    const p = preference({ silenceAll: true });

    expect(isChannelEnabled(p, 'in_app')).toBe(false);
    expect(isNotificationTypeEnabled(p, 'event_reminder')).toBe(false);
    expect(getChannelsForNotificationType(p, 'event_reminder')).toEqual([]);
  });

  it('should narrow channels to the type override', () => {
    const p = preference({
      enabledChannels: ['in_app', 'email', 'telegram'],
      typeSettings: { event_reminder: { enabled: true, channels: ['telegram', 'in_app'] } },
    });

    expect(getChannelsForNotificationType(p, 'event_reminder')).toEqual(['in_app', 'telegram']);
    expect(getChannelsForNotificationType(p, 'event_updated')).toEqual(['in_app', 'email', 'telegram']);
  });

  it('should not resurrect a globally disabled channel through an override', () => {
    const p = preference({
      enabledChannels: ['in_app'],
      typeSettings: { event_reminder: { enabled: true, channels: ['email'] } },
    });

    expect(getChannelsForNotificationType(p, 'event_reminder')).toEqual([]);
  });

  it('should return nothing for a disabled type', () => {
    const p = preference({ typeSettings: { org_announcement: { enabled: false } } });

    expect(getChannelsForNotificationType(p, 'org_announcement')).toEqual([]);
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// DEFAULTS
// ─────────────────────────────────────────────────────────────────────────────

describe('buildDefaultPreference', () => {
  it('should start members with no type overrides', () => {
    const p = buildDefaultPreference({ id: 'user-1', isGuest: false }, NOW);

    expect(p).toEqual({
      userId: 'user-1',
      silenceAll: false,
      enabledChannels: ['in_app', 'email'],
      digestFrequency: 'immediate',
      digestSendTime: '09:00',
      digestWeekday: 1,
      typeSettings: {},
      createdAt: '2025-03-10T09:00:00.000Z',
      updatedAt: '2025-03-10T09:00:00.000Z',
    });
  });

  it('should disable the guest preset for guest accounts', () => {
    const p = buildDefaultPreference({ id: 'guest-1', isGuest: true }, NOW);

    expect(Object.keys(p.typeSettings)).toHaveLength(GUEST_DISABLED_TYPES.length);
    expect(p.typeSettings.org_announcement).toEqual({ enabled: false });
    expect(p.typeSettings.ticket_created).toBeUndefined();
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// SERVICE
// ─────────────────────────────────────────────────────────────────────────────

describe('PreferenceService', () => {
  let store: PreferenceStore;
  let clock: TestClock;
  let service: PreferenceService;
  const member = { id: 'user-1', isGuest: false };

  beforeEach(() => {
    store = new PreferenceStore(new MemoryStore());
    clock = new TestClock();
    service = new PreferenceService(store, { clock: clock.now });
  });

  it('should create the preference once', async () => {
    const first = await service.getPreferences(member);
    clock.advance(60_000);
    const second = await service.getPreferences(member);

    expect(second).toEqual(first);
    expect(second.createdAt).toBe('2025-03-10T09:00:00.000Z');
  });

  it('should keep the guest preset it was created with', async () => {
    const guestTypes = ['event_open', 'org_announcement'] as const;
    const original = new PreferenceService(store, { guestDisabledTypes: guestTypes, clock: clock.now });
    await original.getPreferences({ id: 'guest-1', isGuest: true });

    const changed = new PreferenceService(store, { guestDisabledTypes: ['event_open'], clock: clock.now });
    const p = await changed.getPreferences({ id: 'guest-1', isGuest: true });

    expect(p.typeSettings).toEqual({
      event_open: { enabled: false },
      org_announcement: { enabled: false },
    });
  });

  it('should merge type settings on update', async () => {
    await service.updatePreferences(member, { typeSettings: { event_open: { enabled: false } } });
    clock.advance(60_000);
    const updated = await service.updatePreferences(member, {
      silenceAll: true,
      typeSettings: { event_reminder: { enabled: true, channels: ['email'] } },
    });

    expect(updated.silenceAll).toBe(true);
    expect(updated.typeSettings).toEqual({
      event_open: { enabled: false },
      event_reminder: { enabled: true, channels: ['email'] },
    });
    expect(updated.updatedAt).toBe('2025-03-10T09:01:00.000Z');
    expect(await store.get('user-1')).toEqual(updated);
  });

  it('should store channels in canonical order', async () => {
    const updated = await service.updatePreferences(member, { enabledChannels: ['telegram', 'in_app'] });

    expect(updated.enabledChannels).toEqual(['in_app', 'telegram']);
  });

  it('should enable and disable single channels', async () => {
    const enabled = await service.enableChannel(member, 'telegram');
    expect(enabled.enabledChannels).toEqual(['in_app', 'email', 'telegram']);

    const disabled = await service.disableChannel(member, 'email');
    expect(disabled.enabledChannels).toEqual(['in_app', 'telegram']);
  });

  it('should track users on a digest schedule', async () => {
    await service.updatePreferences(member, { digestFrequency: 'weekly' });
    await service.updatePreferences({ id: 'user-2', isGuest: false }, { digestFrequency: 'daily' });
    expect((await service.listDigestUserIds()).sort()).toEqual(['user-1', 'user-2']);

    await service.updatePreferences(member, { digestFrequency: 'immediate' });
    expect(await service.listDigestUserIds()).toEqual(['user-2']);
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// UPDATE SCHEMA
// ─────────────────────────────────────────────────────────────────────────────

describe('PreferenceUpdateSchema', () => {
  it('should accept a partial update', () => {
    const result = PreferenceUpdateSchema.safeParse({ digestFrequency: 'daily', digestSendTime: '18:30' });

    expect(result.success).toBe(true);
  });

  it('should reject duplicate channels', () => {
    const result = PreferenceUpdateSchema.safeParse({ enabledChannels: ['email', 'email'] });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe('Duplicate channels are not allowed');
  });

  it('should reject unknown fields and malformed times', () => {
    expect(PreferenceUpdateSchema.safeParse({ quietHours: true }).success).toBe(false);
    expect(PreferenceUpdateSchema.safeParse({ digestSendTime: '24:00' }).success).toBe(false);
    expect(PreferenceUpdateSchema.safeParse({ typeSettings: { not_a_type: { enabled: false } } }).success).toBe(false);
  });
});
