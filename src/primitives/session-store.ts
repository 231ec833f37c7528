/**
 * @module primitives/session-store
 * @description DaemonState: the single mutable state instance of the
 * daemon, including the session store and its correlation tables.
 *
 * One instance lives for the whole process, owned by the broadcast hub
 * behind its state lock. Only the reducer mutates it.
 */

import type { ISessionStore } from "../interfaces/session-store.js";
import type {
  MonotonicMs,
  SessionId,
  SessionTag,
} from "../types/branded.js";
import { nowMonotonic } from "../types/branded.js";
import type {
  AgentState,
  HooksMode,
  SessionState,
  TerminalInfo,
} from "../types/state.js";

/**
 * DaemonState: armed prompt, page cursor, liveness flags and the
 * session store.
 *
 * @example
 * ```ts
 * const state = new DaemonState(0);
 * state.markHooksActive();
 * state.ensureSession(toSessionId("s1")).agentState = "running";
 * state.currentAgentState(); // "running"
 * ```
 */
export class DaemonState implements ISessionStore {
  /** Armed prompt id. Always a key of the config's prompts, or null. */
  armed: string | null = null;

  /** Last dispatched prompt id, for display only. */
  lastDispatched: string | null = null;

  /** Current keypad page; always below the configured page count. */
  page: number;

  readonly sessions = new Map<SessionId, SessionState>();
  readonly sessionTagMap = new Map<SessionTag, SessionId>();

  terminals: TerminalInfo[] = [];
  readonly terminalTagMap = new Map<number, SessionTag>();
  selectedTerminalIndex: number | null = null;

  /**
   * Session auto-selected on the first hook event. Informational only:
   * multi-session resolution goes through the terminal chain.
   */
  activeSessionId: SessionId | null = null;

  /** Latched state of the last session to end. Survives new arrivals. */
  lastEndedState: AgentState | null = null;

  logiConnected = false;
  vscodeConnected = false;

  private hooks: HooksMode = "absent";

  constructor(
    initialPage = 0,
    private readonly clock: () => MonotonicMs = nowMonotonic
  ) {
    this.page = initialPage;
  }

  // ─── Commands ───────────────────────────────────────────────────

  ensureSession(sessionId: SessionId): SessionState {
    let session = this.sessions.get(sessionId);
    if (!session) {
      session = {
        agentState: "unknown",
        lastTool: null,
        startedAt: this.clock(),
      };
      this.sessions.set(sessionId, session);
    }
    return session;
  }

  removeSession(sessionId: SessionId): void {
    const session = this.sessions.get(sessionId);
    if (session) {
      this.sessions.delete(sessionId);
      this.lastEndedState =
        session.agentState === "unknown" ? "ended" : session.agentState;
    }

    for (const [tag, target] of [...this.sessionTagMap]) {
      if (target === sessionId) {
        this.sessionTagMap.delete(tag);
      }
    }

    if (this.activeSessionId === sessionId) {
      this.activeSessionId = null;
      if (this.sessions.size === 1) {
        const [survivor] = this.sessions.keys();
        this.activeSessionId = survivor ?? null;
      }
    }

    // One globally armed prompt: a departing session invalidates it.
    this.armed = null;
    this.lastDispatched = null;
  }

  learnSessionTag(tag: SessionTag, sessionId: SessionId): void {
    this.sessionTagMap.set(tag, sessionId);
  }

  recordTerminalTag(index: number, tag: SessionTag): void {
    this.terminalTagMap.set(index, tag);
  }

  selectTerminal(index: number | null): void {
    this.selectedTerminalIndex = index;
  }

  applyTerminalsSnapshot(
    terminals: readonly TerminalInfo[],
    activeIndex: number | null
  ): void {
    this.terminals = [...terminals];
    this.terminalTagMap.clear();
    for (const terminal of terminals) {
      if (terminal.sessionTag !== null) {
        this.terminalTagMap.set(terminal.index, terminal.sessionTag);
      }
    }
    this.selectedTerminalIndex = activeIndex;
  }

  markHooksActive(): void {
    this.hooks = "active";
  }

  // ─── Queries ────────────────────────────────────────────────────

  get hooksMode(): HooksMode {
    return this.hooks;
  }

  selectedSessionId(): SessionId | null {
    if (this.selectedTerminalIndex === null) return null;
    const tag = this.terminalTagMap.get(this.selectedTerminalIndex);
    if (tag === undefined) return null;
    return this.sessionTagMap.get(tag) ?? null;
  }

  currentSession(): SessionState | null {
    if (this.sessions.size === 1) {
      const [only] = this.sessions.values();
      return only ?? null;
    }
    if (this.sessions.size > 1) {
      const selected = this.selectedSessionId();
      return selected === null ? null : this.sessions.get(selected) ?? null;
    }
    return null;
  }

  currentAgentState(): AgentState {
    if (this.hooks === "absent") {
      return "unknown";
    }
    if (this.sessions.size === 0) {
      return this.lastEndedState ?? "unknown";
    }
    return this.currentSession()?.agentState ?? "unknown";
  }
}
