/**
 * @module types/protocol
 * @description Wire protocol v1 between the daemon and its clients.
 *
 * Every message is one JSON object tagged by `type`. Field names are
 * snake_case on the wire and evolve additively; anything breaking bumps
 * the protocol version.
 *
 * Inbound (device → daemon): hello, keypad_press, dialpad_button_press,
 * adjustment, page_nav, hook_event, terminals_snapshot.
 *
 * Outbound (daemon → device): hello_ack, render, vscode_command, notice.
 */

import type { ArmStyle } from "./config.js";
import type { AgentState, ClientKind, HooksMode } from "./state.js";

// ─── Enumerations ───────────────────────────────────────────────────

export type DialpadButton = "ctrl_c" | "export" | "esc" | "enter";

export type AdjustmentKind = "dial" | "roller";

export type PageDirection = "prev" | "next";

export type CommandKind =
  | "send_text"
  | "focus_terminal"
  | "scroll_terminal"
  | "open_uri";

/**
 * - `active_assistant`: the extension's notion of the assistant terminal.
 * - `active`: whatever the editor reports as the active terminal.
 */
export type CommandTarget = "active_assistant" | "active";

export type FocusDirection = -1 | 0 | 1;

// ─── Inbound ────────────────────────────────────────────────────────

export interface HelloMessage {
  readonly type: "hello";
  readonly client_kind: ClientKind;
  readonly protocol_version: number;
  readonly client_version: string;
  readonly capabilities: readonly string[];
}

export interface KeypadPressMessage {
  readonly type: "keypad_press";
  readonly prompt_id: string;
}

export interface DialpadButtonPressMessage {
  readonly type: "dialpad_button_press";
  readonly button: DialpadButton;
}

export interface AdjustmentMessage {
  readonly type: "adjustment";
  readonly kind: AdjustmentKind;
  /** Signed number of detents. */
  readonly delta: number;
}

export interface PageNavMessage {
  readonly type: "page_nav";
  readonly direction: PageDirection;
}

/**
 * A normalized assistant hook notification. The same body, without
 * `type`, is accepted by `POST /hook`.
 */
export interface HookNotification {
  readonly hook: string;
  readonly matcher?: string | null;
  readonly session_id?: string | null;
  readonly session_tag?: string | null;
  /** Raw hook payload. Only `tool_name` is read by the daemon. */
  readonly payload?: unknown;
}

export interface HookEventMessage extends HookNotification {
  readonly type: "hook_event";
}

export interface WireTerminal {
  readonly index: number;
  readonly name: string;
  readonly session_tag?: string | null;
}

export interface TerminalsSnapshotMessage {
  readonly type: "terminals_snapshot";
  readonly terminals: readonly WireTerminal[];
  readonly active_index: number | null;
}

export type InboundMessage =
  | HelloMessage
  | KeypadPressMessage
  | DialpadButtonPressMessage
  | AdjustmentMessage
  | PageNavMessage
  | HookEventMessage
  | TerminalsSnapshotMessage;

// ─── Editor Commands ────────────────────────────────────────────────

export interface SendTextCommand {
  readonly kind: "send_text";
  readonly target: CommandTarget;
  readonly payload: { readonly text: string; readonly add_newline: boolean };
}

export interface FocusTerminalCommand {
  readonly kind: "focus_terminal";
  readonly target: CommandTarget;
  readonly payload: { readonly direction: FocusDirection };
}

export interface ScrollTerminalCommand {
  readonly kind: "scroll_terminal";
  readonly target: CommandTarget;
  readonly payload: { readonly delta: number; readonly unit: "lines" };
}

export interface OpenUriCommand {
  readonly kind: "open_uri";
  readonly target: CommandTarget;
  readonly payload: { readonly uri: string };
}

export type VscodeCommand =
  | SendTextCommand
  | FocusTerminalCommand
  | ScrollTerminalCommand
  | OpenUriCommand;

// ─── Render Model ───────────────────────────────────────────────────

export interface ArmedRender {
  readonly prompt_id: string;
  readonly label: string;
  /** Text Enter would dispatch right now; empty when nothing resolves. */
  readonly command: string;
  readonly style: ArmStyle;
}

export type SlotKind = "prompt" | "gate" | "empty";

export interface KeypadSlotRender {
  /** 0..=8, row-major on the 3×3 keypad. */
  readonly slot: number;
  readonly kind: SlotKind;
  readonly id: string;
  readonly label: string;
  readonly sublabel: string | null;
  readonly armed: boolean;
}

export interface ConnectionsRender {
  readonly logi: boolean;
  readonly vscode: boolean;
}

/**
 * Display-ready snapshot broadcast to every device. Derived, never stored.
 */
export interface RenderModel {
  readonly agent_state: AgentState;
  readonly armed: ArmedRender | null;
  readonly keypad: { readonly slots: readonly KeypadSlotRender[] };
  readonly page_index: number;
  readonly page_count: number;
  readonly page_name: string;
  readonly hooks_mode: HooksMode;
  readonly connections: ConnectionsRender;
  readonly last_dispatched: string | null;
  /** Auto-selected session; informational, never used to resolve ambiguity. */
  readonly active_session: string | null;
  readonly session_count: number;
  readonly last_tool: string | null;
}

// ─── Outbound ───────────────────────────────────────────────────────

export interface HelloAckMessage {
  readonly type: "hello_ack";
  readonly protocol_version: number;
  readonly daemon_version: string;
}

export interface RenderMessage extends RenderModel {
  readonly type: "render";
}

export type VscodeCommandMessage = { readonly type: "vscode_command" } & VscodeCommand;

export interface NoticeMessage {
  readonly type: "notice";
  readonly message: string;
}

export type OutboundMessage =
  | HelloAckMessage
  | RenderMessage
  | VscodeCommandMessage
  | NoticeMessage;
