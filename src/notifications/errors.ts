// ═══════════════════════════════════════════════════════════════════════════════
// NOTIFICATION ERRORS — Validation, Lookup, Delivery Failures
// ═══════════════════════════════════════════════════════════════════════════════

import type { ContextSchemaError } from './context-schemas.js';

/**
 * Context failed its type schema. Thrown synchronously to the trigger;
 * nothing has been persisted.
 */
export class NotificationValidationError extends Error {
  readonly name = 'NotificationValidationError';

  constructor(
    readonly schemaError: ContextSchemaError,
    /** Position in a bulk request, when the failure came from one */
    readonly index?: number
  ) {
    super(index === undefined ? schemaError.message : `Entry ${index}: ${schemaError.message}`);
  }
}

/**
 * No template is registered for the type. Operator-visible bug.
 */
export class TemplateLookupError extends Error {
  readonly name = 'TemplateLookupError';

  constructor(readonly notificationType: string) {
    super(`No template registered for notification type: ${notificationType}`);
  }
}

/**
 * Base for failures raised by a channel transport.
 */
export abstract class DeliveryError extends Error {
  abstract readonly transient: boolean;
}

/**
 * Network, rate-limit or 5xx failure. Worth another attempt.
 */
export class TransientDeliveryError extends DeliveryError {
  readonly name = 'TransientDeliveryError';
  readonly transient = true;

  constructor(
    message: string,
    /** Server-specified backoff, when the transport returned one */
    readonly retryAfterMs?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export type PermanentFailureReason = 'invalid_address' | 'blocked' | 'deactivated' | 'bounced' | 'rejected';

/**
 * The recipient cannot be reached on this channel. Never retried.
 */
export class PermanentDeliveryError extends DeliveryError {
  readonly name = 'PermanentDeliveryError';
  readonly transient = false;

  constructor(
    message: string,
    readonly reason: PermanentFailureReason,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'EPIPE',
  'ENETUNREACH',
  'EHOSTUNREACH',
]);

export function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Delivery errors carry their own classification; anything else is transient
 * only when it looks like a dropped connection or timeout.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof DeliveryError) return error.transient;
  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) return true;
  const code = errorCode(error);
  return code !== undefined && TRANSIENT_NETWORK_CODES.has(code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
