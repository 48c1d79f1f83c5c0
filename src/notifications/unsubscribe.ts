// ═══════════════════════════════════════════════════════════════════════════════
// UNSUBSCRIBE TOKENS — Signed, User-Scoped Links for Email Footers
// ═══════════════════════════════════════════════════════════════════════════════
//
// Token format: base64url(JSON payload) + "." + base64url(HMAC-SHA256(payload)).
// Verifying a token is the only unauthenticated way into a user's preferences.
//
// ═══════════════════════════════════════════════════════════════════════════════

import crypto from 'node:crypto';
import { z } from 'zod';
import { getLogger } from '../logging/index.js';
import { err, ok, type Result } from '../types/result.js';
import type { NotificationUser } from '../users/types.js';
import type { UserRepository } from '../users/store.js';
import type { PreferenceService } from './preferences.js';
import type { NotificationPreference, PreferenceUpdate } from './types.js';

const logger = getLogger({ component: 'unsubscribe' });

const HMAC_ALGORITHM = 'sha256';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

const UnsubscribeTokenPayloadSchema = z.object({
  /** User id */
  sub: z.string().min(1),
  email: z.string(),
  type: z.literal('unsubscribe'),
  /** Expiry, seconds since epoch */
  exp: z.number().int(),
  jti: z.string(),
});

export type UnsubscribeTokenPayload = z.infer<typeof UnsubscribeTokenPayloadSchema>;

export type UnsubscribeTokenError = 'malformed' | 'invalid_signature' | 'expired';

export type UnsubscribeError = UnsubscribeTokenError | 'user_not_found' | 'email_changed';

export interface UnsubscribeTokenOptions {
  secret: string;
  lifetimeSeconds: number;
  frontendBaseUrl: string;
  clock?: () => Date;
}

// ─────────────────────────────────────────────────────────────────────────────────
// SIGNING
// ─────────────────────────────────────────────────────────────────────────────────

export class UnsubscribeTokens {
  private readonly clock: () => Date;

  constructor(private readonly options: UnsubscribeTokenOptions) {
    this.clock = options.clock ?? (() => new Date());
  }

  issue(user: Pick<NotificationUser, 'id' | 'email'>): string {
    const payload: UnsubscribeTokenPayload = {
      sub: user.id,
      email: user.email ?? '',
      type: 'unsubscribe',
      exp: Math.floor(this.clock().getTime() / 1000) + this.options.lifetimeSeconds,
      jti: crypto.randomUUID(),
    };

    const encoded = Buffer.from(JSON.stringify(payload)).toString('base64url');
    return `${encoded}.${this.sign(encoded)}`;
  }

  verify(token: string): Result<UnsubscribeTokenPayload, UnsubscribeTokenError> {
    const [encoded, signature, ...rest] = token.split('.');
    if (!encoded || !signature || rest.length > 0) {
      return err('malformed');
    }

    const expected = Buffer.from(this.sign(encoded), 'base64url');
    const actual = Buffer.from(signature, 'base64url');
    if (expected.length !== actual.length || !crypto.timingSafeEqual(expected, actual)) {
      return err('invalid_signature');
    }

    let json: unknown;
    try {
      json = JSON.parse(Buffer.from(encoded, 'base64url').toString('utf8'));
    } catch {
      return err('malformed');
    }

    const parsed = UnsubscribeTokenPayloadSchema.safeParse(json);
    if (!parsed.success) {
      return err('malformed');
    }

    if (parsed.data.exp * 1000 <= this.clock().getTime()) {
      return err('expired');
    }

    return ok(parsed.data);
  }

  /**
   * Footer link for the recipient; undefined when they have no address to
   * unsubscribe.
   */
  buildLink(user: Pick<NotificationUser, 'id' | 'email'>): string | undefined {
    if (!user.email) return undefined;
    const base = this.options.frontendBaseUrl.replace(/\/+$/, '');
    return `${base}/unsubscribe?token=${encodeURIComponent(this.issue(user))}`;
  }

  private sign(encodedPayload: string): string {
    return crypto
      .createHmac(HMAC_ALGORITHM, this.options.secret)
      .update(encodedPayload)
      .digest('base64url');
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIRMATION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Verifies the token and applies the requested preference change. A token
 * issued for an address the user no longer has is refused.
 */
export async function confirmUnsubscribe(
  deps: { tokens: UnsubscribeTokens; users: UserRepository; preferences: PreferenceService },
  token: string,
  update: PreferenceUpdate
): Promise<Result<NotificationPreference, UnsubscribeError>> {
  const verified = deps.tokens.verify(token);
  if (!verified.ok) {
    logger.warn('Rejected unsubscribe token', { reason: verified.error });
    return verified;
  }

  const payload = verified.value;
  const user = await deps.users.getUser(payload.sub);
  if (!user) {
    return err('user_not_found');
  }
  if ((user.email ?? '') !== payload.email) {
    return err('email_changed');
  }

  const preference = await deps.preferences.updatePreferences(user, update);
  logger.info('Applied unsubscribe request', { userId: user.id, fields: Object.keys(update) });
  return ok(preference);
}
