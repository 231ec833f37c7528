/**
 * @module types/state
 * @description Derived per-session state and the terminal inventory the
 * daemon learns at runtime.
 *
 * Nothing here is persisted. A session exists from its first hook event
 * until its SessionEnd; the terminal inventory is whatever the editor
 * last reported.
 */

import type { MonotonicMs, SessionTag } from "./branded.js";

// ─── Agent State ────────────────────────────────────────────────────

/**
 * What the assistant is doing, as far as its hooks let us know.
 *
 * - `unknown`: no hook telemetry, or several sessions we cannot tell apart.
 * - `idle`: waiting for the next prompt.
 * - `running`: working on a submitted prompt or a tool call.
 * - `waiting_permission`: blocked on a permission prompt.
 * - `waiting_input`: blocked on a clarification dialog.
 * - `blocked`: a tool call was refused by the local command policy.
 * - `complete`: finished a bounded task.
 * - `settled`: stopped responding; the session is still alive.
 * - `ended`: the session went away before any other state was observed.
 */
export type AgentState =
  | "unknown"
  | "idle"
  | "running"
  | "waiting_permission"
  | "waiting_input"
  | "blocked"
  | "complete"
  | "settled"
  | "ended";

/**
 * One-way latch: `absent` until the first hook event, `active` afterwards.
 */
export type HooksMode = "absent" | "active";

// ─── Clients ────────────────────────────────────────────────────────

/** Kind a client announces in its hello. */
export type ClientKind = "logi" | "vscode" | "hooks";

/** Client kinds whose liveness is tracked and rendered. */
export type DeviceKind = Exclude<ClientKind, "hooks">;

// ─── Sessions ───────────────────────────────────────────────────────

/**
 * State derived from one session's hook events.
 * Mutated in place by the reducer.
 */
export interface SessionState {
  agentState: AgentState;
  /** Name of the most recent tool the session reported, if any. */
  lastTool: string | null;
  readonly startedAt: MonotonicMs;
}

// ─── Terminals ──────────────────────────────────────────────────────

/**
 * An editor terminal as last reported by the editor extension.
 */
export interface TerminalInfo {
  readonly index: number;
  readonly name: string;
  readonly sessionTag: SessionTag | null;
}
