/**
 * @module codec/commands
 * @description Constructors for the editor commands the daemon emits.
 */

import type {
  CommandTarget,
  FocusDirection,
  FocusTerminalCommand,
  OpenUriCommand,
  ScrollTerminalCommand,
  SendTextCommand,
} from "../types/protocol.js";

/** Escape, as sent by the un-armed Esc button. */
export const ESCAPE_SEQUENCE = "\u001b";

/** End-of-text, as sent by the Ctrl+C button. */
export const INTERRUPT_SEQUENCE = "\u0003";

export function sendText(
  target: CommandTarget,
  text: string,
  addNewline: boolean
): SendTextCommand {
  return {
    kind: "send_text",
    target,
    payload: { text, add_newline: addNewline },
  };
}

export function focusTerminal(
  target: CommandTarget,
  delta: number
): FocusTerminalCommand {
  const direction: FocusDirection = delta > 0 ? 1 : delta < 0 ? -1 : 0;
  return { kind: "focus_terminal", target, payload: { direction } };
}

export function scrollTerminal(
  target: CommandTarget,
  delta: number
): ScrollTerminalCommand {
  return { kind: "scroll_terminal", target, payload: { delta, unit: "lines" } };
}

export function openUri(target: CommandTarget, uri: string): OpenUriCommand {
  return { kind: "open_uri", target, payload: { uri } };
}
