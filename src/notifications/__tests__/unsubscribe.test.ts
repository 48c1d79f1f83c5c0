import { describe, it, expect, beforeEach } from 'vitest';
import { UnsubscribeTokens, confirmUnsubscribe } from '../unsubscribe.js';
import {
  TestClock,
  createTestEngine,
  createTestUser,
  type TestEngine,
} from '../../tests/fixtures.js';

describe('UnsubscribeTokens', () => {
  let clock: TestClock;
  let tokens: UnsubscribeTokens;
  const user = createTestUser();

  beforeEach(() => {
    clock = new TestClock();
    tokens = new UnsubscribeTokens({
      secret: 'test-secret',
      lifetimeSeconds: 3600,
      frontendBaseUrl: 'https://app.example.test/',
      clock: clock.now,
    });
  });

  it('should verify a token it issued', () => {
    const result = tokens.verify(tokens.issue(user));

    expect(result.ok).toBe(true);
    expect(result.value).toMatchObject({
      sub: 'user-1',
      email: 'ada@example.test',
      type: 'unsubscribe',
      exp: Math.floor(Date.parse('2025-03-10T09:00:00.000Z') / 1000) + 3600,
    });
  });

  it('should reject a token signed with another secret', () => {
    const other = new UnsubscribeTokens({
      secret: 'other-secret',
      lifetimeSeconds: 3600,
      frontendBaseUrl: 'https://app.example.test',
    });

    expect(tokens.verify(other.issue(user))).toEqual({ ok: false, error: 'invalid_signature' });
  });

  it('should reject an expired token', () => {
    const token = tokens.issue(user);
    clock.advance(3600 * 1000);

    expect(tokens.verify(token)).toEqual({ ok: false, error: 'expired' });
  });

  it('should reject malformed tokens', () => {
    expect(tokens.verify('not-a-token')).toEqual({ ok: false, error: 'malformed' });
    expect(tokens.verify('a.b.c')).toEqual({ ok: false, error: 'malformed' });
  });

  it('should build an encoded footer link', () => {
    const link = tokens.buildLink(user);

    expect(link).toMatch(/^https:\/\/app\.example\.test\/unsubscribe\?token=[\w%.-]+$/);
    expect(tokens.buildLink(createTestUser({ email: undefined }))).toBeUndefined();
  });
});

describe('confirmUnsubscribe', () => {
  let engine: TestEngine;
  const user = createTestUser();

  beforeEach(async () => {
    engine = createTestEngine();
    await engine.users.saveUser(user);
  });

  function deps() {
    return { tokens: engine.unsubscribeTokens, users: engine.users, preferences: engine.preferences };
  }

  it('should apply the requested preference change', async () => {
    const token = engine.unsubscribeTokens.issue(user);

    const result = await confirmUnsubscribe(deps(), token, { enabledChannels: ['in_app'] });

    expect(result.ok).toBe(true);
    expect((await engine.preferences.getPreferences(user)).enabledChannels).toEqual(['in_app']);
  });

  it('should refuse a token issued for a previous address', async () => {
    const token = engine.unsubscribeTokens.issue(user);
    await engine.users.saveUser({ ...user, email: 'new@example.test' });

    expect(await confirmUnsubscribe(deps(), token, { silenceAll: true }))
      .toEqual({ ok: false, error: 'email_changed' });
  });

  it('should refuse a token for an unknown user', async () => {
    const token = engine.unsubscribeTokens.issue(createTestUser({ id: 'ghost' }));

    expect(await confirmUnsubscribe(deps(), token, { silenceAll: true }))
      .toEqual({ ok: false, error: 'user_not_found' });
  });
});
