/**
 * @module interfaces/session-store
 * @description ISessionStore: per-session derived state and the
 * correlation tables that tie terminals to sessions.
 *
 * Correlation is a two-hop chain learned at runtime:
 *
 *   selected terminal index → session tag → session id
 *
 * The first hop comes from the editor's terminal inventory, the second
 * from hook events that carry a tag. If any hop is missing the store
 * answers "no selection", and with several live sessions that degrades
 * the rendered agent state to `unknown`. The store never guesses which
 * of several concurrent sessions the operator means.
 */

import type { SessionId, SessionTag } from "../types/branded.js";
import type {
  AgentState,
  HooksMode,
  SessionState,
  TerminalInfo,
} from "../types/state.js";

/**
 * @interface ISessionStore
 * @description Owns sessions and correlation state. Mutated only by the
 * reducer, under the hub's state lock.
 */
export interface ISessionStore {
  // ─── Commands ───────────────────────────────────────────────────

  /**
   * @command
   * @description Returns the session for `sessionId`, inserting a fresh
   * `unknown` session first if absent. Never fails.
   */
  ensureSession(sessionId: SessionId): SessionState;

  /**
   * @command
   * @description Removes a session.
   *
   * @postcondition `lastEndedState` holds the state the session had before
   *   removal (`ended` if it was never observed).
   * @postcondition Tag mappings pointing at the session are dropped.
   * @postcondition `armed` and `lastDispatched` are cleared globally.
   */
  removeSession(sessionId: SessionId): void;

  /**
   * @command
   * @description Idempotent upsert of `tag → sessionId`. A tag re-used by a
   * later session moves to that session.
   */
  learnSessionTag(tag: SessionTag, sessionId: SessionId): void;

  /**
   * @command
   * @description Records that terminal `index` carries `tag`.
   */
  recordTerminalTag(index: number, tag: SessionTag): void;

  /**
   * @command
   * @description Sets (or clears, with `null`) the selected terminal.
   */
  selectTerminal(index: number | null): void;

  /**
   * @command
   * @description Replaces the terminal inventory with an editor snapshot and
   * rebuilds the terminal tag table from it.
   */
  applyTerminalsSnapshot(
    terminals: readonly TerminalInfo[],
    activeIndex: number | null
  ): void;

  /**
   * @command
   * @description Latches hooks mode to `active`. There is no way back.
   */
  markHooksActive(): void;

  // ─── Queries ────────────────────────────────────────────────────

  /** @query Current hooks mode latch. */
  readonly hooksMode: HooksMode;

  /**
   * @query
   * @description Resolves the selected terminal through the correlation
   * chain. `null` if any hop is missing.
   */
  selectedSessionId(): SessionId | null;

  /**
   * @query
   * @description The session the rendered state speaks for: the only live
   * session, or the selected one when there are several. `null` otherwise.
   */
  currentSession(): SessionState | null;

  /**
   * @query
   * @description Agent state to render.
   *
   * | hooks mode | live sessions | result                          |
   * |------------|---------------|---------------------------------|
   * | absent     | any           | unknown                         |
   * | active     | 0             | last ended state, else unknown  |
   * | active     | 1             | that session's state            |
   * | active     | >1            | selected session's, else unknown|
   */
  currentAgentState(): AgentState;
}
