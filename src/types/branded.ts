/**
 * @module types/branded
 * @description Branded types for identifiers that arrive as plain strings
 * from three unrelated sources (assistant hooks, launcher tags, editor
 * terminals) and must never be confused with one another.
 *
 * A session id and a session tag are both strings on the wire, but a tag
 * is only ever a key into the correlation table while a session id is a
 * key into the session map. Branding keeps the two-hop lookup honest at
 * the compiler level.
 *
 * @example
 * ```ts
 * const id = toSessionId("sess-1");
 * const tag = toSessionTag("t1");
 * // Type error: SessionTag is not assignable to SessionId
 * store.ensureSession(tag);
 * ```
 */

/** Unique symbol for branding. Not exported; internal only. */
declare const __brand: unique symbol;

/**
 * Generic branded type utility.
 * Intersects a base type with a phantom brand field that exists only
 * at the type level, never at runtime.
 */
export type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ─── Correlation Brands ─────────────────────────────────────────────

/**
 * Opaque identifier of one assistant run, as reported by its hooks.
 */
export type SessionId = Brand<string, "SessionId">;

/**
 * Operator- or launcher-assigned label that ties an editor terminal to
 * a session before the daemon has otherwise observed the link.
 */
export type SessionTag = Brand<string, "SessionTag">;

// ─── Time Brands ────────────────────────────────────────────────────

/**
 * A Unix timestamp in seconds.
 */
export type UnixTimestamp = Brand<number, "UnixTimestamp">;

/**
 * Milliseconds from a monotonic clock. Only differences are meaningful.
 */
export type MonotonicMs = Brand<number, "MonotonicMs">;

// ─── Constructors ───────────────────────────────────────────────────

export function toSessionId(raw: string): SessionId {
  return raw as SessionId;
}

export function toSessionTag(raw: string): SessionTag {
  return raw as SessionTag;
}

export function nowUnix(): UnixTimestamp {
  return Math.floor(Date.now() / 1000) as UnixTimestamp;
}

export function nowMonotonic(): MonotonicMs {
  return performance.now() as MonotonicMs;
}
