/**
 * @module types/reducer
 * @description Events the reducer consumes and the side effects it returns.
 *
 * Side effects are data. The reducer never performs I/O; the broadcast
 * hub executes the returned list in order, outside the state lock.
 */

import type { SessionId, SessionTag } from "./branded.js";
import type { DeviceKind, TerminalInfo } from "./state.js";
import type {
  AdjustmentKind,
  DialpadButton,
  PageDirection,
  VscodeCommand,
} from "./protocol.js";

// ─── Hardware Events ────────────────────────────────────────────────

/** A keypad slot resolving to a prompt was pressed. Gates never get here. */
export interface KeypadPressEvent {
  readonly type: "KEYPAD_PRESS";
  readonly promptId: string;
}

export interface DialpadButtonEvent {
  readonly type: "DIALPAD_BUTTON";
  readonly button: DialpadButton;
}

export interface AdjustmentEvent {
  readonly type: "ADJUSTMENT";
  readonly kind: AdjustmentKind;
  readonly delta: number;
}

export interface PageNavEvent {
  readonly type: "PAGE_NAV";
  readonly direction: PageDirection;
}

// ─── Assistant & Editor Events ──────────────────────────────────────

export interface HookEvent {
  readonly type: "HOOK_EVENT";
  readonly hook: string;
  readonly matcher: string | null;
  readonly sessionId: SessionId | null;
  readonly sessionTag: SessionTag | null;
  /** `tool_name` from the hook payload, when present. */
  readonly toolName: string | null;
}

export interface TerminalsSnapshotEvent {
  readonly type: "TERMINALS_SNAPSHOT";
  readonly terminals: readonly TerminalInfo[];
  readonly activeIndex: number | null;
}

// ─── Connectivity Events ────────────────────────────────────────────

export interface ClientConnectedEvent {
  readonly type: "CLIENT_CONNECTED";
  readonly kind: DeviceKind;
}

export interface ClientDisconnectedEvent {
  readonly type: "CLIENT_DISCONNECTED";
  readonly kind: DeviceKind;
}

export type ReducerEvent =
  | KeypadPressEvent
  | DialpadButtonEvent
  | AdjustmentEvent
  | PageNavEvent
  | HookEvent
  | TerminalsSnapshotEvent
  | ClientConnectedEvent
  | ClientDisconnectedEvent;

// ─── Side Effects ───────────────────────────────────────────────────

/** Recompute the render model and publish it to every device. */
export interface BroadcastRenderEffect {
  readonly type: "BROADCAST_RENDER";
}

/** Publish an editor command to every device. */
export interface SendCommandEffect {
  readonly type: "SEND_COMMAND";
  readonly command: VscodeCommand;
}

export type SideEffect = BroadcastRenderEffect | SendCommandEffect;
