/**
 * @module primitives/reducer
 * @description Pure state reducer: `reduce(state, config, event) → effects`.
 *
 * Every state transition of the daemon happens here. Given the same
 * state, config and event it always mutates the state the same way and
 * returns the same effect list; it touches no network, disk or clock
 * other than the session store's start timestamps.
 */

import type { DaemonState } from "./session-store.js";
import type { DaemonConfig } from "../types/config.js";
import type {
  AdjustmentKind,
  DialpadButton,
  PageDirection,
} from "../types/protocol.js";
import type { HookEvent, ReducerEvent, SideEffect } from "../types/reducer.js";
import type { AgentState } from "../types/state.js";
import { toSessionId } from "../types/branded.js";
import {
  ESCAPE_SEQUENCE,
  INTERRUPT_SEQUENCE,
  focusTerminal,
  scrollTerminal,
  sendText,
} from "../codec/commands.js";
import { effectiveCommand } from "../config/index.js";

/** Session id used for hook events that arrive without one. */
export const DEFAULT_SESSION_ID = toSessionId("_default");

/** Synthetic hook posted by the hook CLI after refusing a command. */
export const POLICY_BLOCK_HOOK = "PolicyBlock";

/** Text the Export button types; a later Enter confirms it. */
export const EXPORT_COMMAND = "/export";

const RENDER: SideEffect = { type: "BROADCAST_RENDER" };

/**
 * Apply one event to the daemon state and return the side effects to run.
 */
export function reduce(
  state: DaemonState,
  config: DaemonConfig,
  event: ReducerEvent
): SideEffect[] {
  switch (event.type) {
    case "KEYPAD_PRESS":
      // Gates are dispatched by the hub before an event is ever built.
      if (config.prompts.has(event.promptId)) {
        state.armed = event.promptId;
      }
      return [RENDER];

    case "DIALPAD_BUTTON":
      return reduceDialpad(state, config, event.button);

    case "ADJUSTMENT":
      return reduceAdjustment(event.kind, event.delta);

    case "PAGE_NAV":
      return reducePageNav(state, config, event.direction);

    case "HOOK_EVENT":
      reduceHook(state, event);
      return [RENDER];

    case "TERMINALS_SNAPSHOT":
      state.applyTerminalsSnapshot(event.terminals, event.activeIndex);
      return [RENDER];

    case "CLIENT_CONNECTED":
    case "CLIENT_DISCONNECTED": {
      const live = event.type === "CLIENT_CONNECTED";
      if (event.kind === "logi") {
        state.logiConnected = live;
      } else {
        state.vscodeConnected = live;
      }
      return [RENDER];
    }
  }
}

// ─── Dialpad ────────────────────────────────────────────────────────

function reduceDialpad(
  state: DaemonState,
  config: DaemonConfig,
  button: DialpadButton
): SideEffect[] {
  switch (button) {
    case "enter": {
      const promptId = state.armed;
      if (promptId === null) {
        // Bare confirmation keystroke, e.g. after Export.
        return [
          { type: "SEND_COMMAND", command: sendText("active_assistant", "", true) },
        ];
      }
      state.armed = null;
      state.lastDispatched = promptId;
      const prompt = config.prompts.get(promptId);
      const text = prompt
        ? effectiveCommand(prompt, config.policy.nativePrimary)
        : null;
      if (text === null) {
        return [RENDER];
      }
      return [
        { type: "SEND_COMMAND", command: sendText("active_assistant", text, true) },
        RENDER,
      ];
    }

    case "esc":
      if (state.armed !== null) {
        // Cancelling an arm is local; the terminal never sees the Esc.
        state.armed = null;
        return [RENDER];
      }
      return [
        {
          type: "SEND_COMMAND",
          command: sendText("active_assistant", ESCAPE_SEQUENCE, false),
        },
      ];

    case "ctrl_c":
      return [
        {
          type: "SEND_COMMAND",
          command: sendText("active_assistant", INTERRUPT_SEQUENCE, false),
        },
      ];

    case "export":
      return [
        {
          type: "SEND_COMMAND",
          command: sendText("active_assistant", EXPORT_COMMAND, false),
        },
      ];
  }
}

// ─── Adjustments ────────────────────────────────────────────────────

function reduceAdjustment(kind: AdjustmentKind, delta: number): SideEffect[] {
  if (kind === "dial") {
    return [
      { type: "SEND_COMMAND", command: scrollTerminal("active_assistant", delta) },
    ];
  }
  return [{ type: "SEND_COMMAND", command: focusTerminal("active", delta) }];
}

// ─── Paging ─────────────────────────────────────────────────────────

function reducePageNav(
  state: DaemonState,
  config: DaemonConfig,
  direction: PageDirection
): SideEffect[] {
  const count = config.pages.length;
  if (count === 0) {
    return [];
  }
  const step = direction === "next" ? 1 : -1;
  state.page = (((state.page + step) % count) + count) % count;
  // The armed id may not exist on the new page.
  state.armed = null;
  return [RENDER];
}

// ─── Hooks ──────────────────────────────────────────────────────────

/**
 * Agent state each recognized hook maps to. Notification is keyed by
 * matcher. Hooks and matchers not listed leave the state untouched.
 */
const HOOK_STATES: Readonly<Record<string, AgentState>> = {
  SessionStart: "idle",
  UserPromptSubmit: "running",
  PreToolUse: "running",
  PermissionRequest: "waiting_permission",
  PostToolUse: "running",
  PostToolUseFailure: "running",
  TaskCompleted: "complete",
  Stop: "settled",
  [POLICY_BLOCK_HOOK]: "blocked",
};

const NOTIFICATION_STATES: Readonly<Record<string, AgentState>> = {
  idle_prompt: "idle",
  permission_prompt: "waiting_permission",
  elicitation_dialog: "waiting_input",
};

const TOOL_HOOKS = new Set([
  "PreToolUse",
  "PermissionRequest",
  "PostToolUse",
  "PostToolUseFailure",
  POLICY_BLOCK_HOOK,
]);

function reduceHook(state: DaemonState, event: HookEvent): void {
  state.markHooksActive();

  const sessionId = event.sessionId ?? DEFAULT_SESSION_ID;

  // Ending a session that is not live must not clobber the latch.
  if (event.hook === "SessionEnd" && !state.sessions.has(sessionId)) {
    state.lastEndedState ??= "ended";
    return;
  }

  if (state.activeSessionId === null) {
    state.activeSessionId = sessionId;
  }
  if (event.sessionTag !== null) {
    state.learnSessionTag(event.sessionTag, sessionId);
  }

  const session = state.ensureSession(sessionId);

  if (event.hook === "SessionEnd") {
    // Latches whatever the session held before it ended.
    state.removeSession(sessionId);
    return;
  }

  if (event.toolName !== null && TOOL_HOOKS.has(event.hook)) {
    session.lastTool = event.toolName;
  }

  const next = lookup(
    event.hook === "Notification" ? NOTIFICATION_STATES : HOOK_STATES,
    event.hook === "Notification" ? event.matcher : event.hook
  );
  if (next !== null) {
    session.agentState = next;
  }
}

function lookup(
  table: Readonly<Record<string, AgentState>>,
  key: string | null
): AgentState | null {
  if (key === null || !Object.hasOwn(table, key)) {
    return null;
  }
  return table[key] ?? null;
}
