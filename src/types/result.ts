// ═══════════════════════════════════════════════════════════════════════════════
// RESULT PATTERN — Expected Failures as Values
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// CORE RESULT TYPE
// ─────────────────────────────────────────────────────────────────────────────────

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
  readonly error?: never;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
  readonly value?: never;
}

/**
 * Either a value or an expected failure. Used where the caller is meant to
 * branch on the outcome (context validation, token verification) instead of
 * catching.
 *
 * @example
 * ```typescript
 * const result = validateContext('event_reminder', context);
 * if (!result.ok) {
 *   return res.status(400).json(result.error);
 * }
 * ```
 */
export type Result<T, E = Error> = Ok<T> | Err<E>;

// ─────────────────────────────────────────────────────────────────────────────────
// CONSTRUCTORS & GUARDS
// ─────────────────────────────────────────────────────────────────────────────────

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}
