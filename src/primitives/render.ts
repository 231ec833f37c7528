/**
 * @module primitives/render
 * @description Render projector: derives the display snapshot every
 * device receives from the daemon state and the config.
 */

import type { DaemonState } from "./session-store.js";
import type { DaemonConfig, SlotRef } from "../types/config.js";
import type {
  ArmedRender,
  KeypadSlotRender,
  RenderModel,
} from "../types/protocol.js";
import { KEYPAD_SLOT_COUNT, effectiveCommand } from "../config/index.js";

/** Label shown for a slot whose reference does not resolve. */
export const UNRESOLVED_LABEL = "???";

export const EMPTY_SLOT_ID = "_empty";
export const EMPTY_SLOT_LABEL = "—";

/**
 * Pure projection of `(state, config)`. Never fails: unresolved
 * references render a placeholder and a drifted page cursor is clamped.
 */
export function buildRenderModel(
  state: DaemonState,
  config: DaemonConfig
): RenderModel {
  const pageCount = config.pages.length;
  const pageIndex = Math.max(0, Math.min(state.page, pageCount - 1));
  const page = config.pages[pageIndex];

  const slots: KeypadSlotRender[] = [];
  for (let slot = 0; slot < KEYPAD_SLOT_COUNT; slot++) {
    slots.push(projectSlot(slot, page?.slots[slot], state.armed, config));
  }

  const current = state.currentSession();

  return {
    agent_state: state.currentAgentState(),
    armed: projectArmed(state.armed, config),
    keypad: { slots },
    page_index: pageIndex,
    page_count: pageCount,
    page_name: page?.name ?? "",
    hooks_mode: state.hooksMode,
    connections: {
      logi: state.logiConnected,
      vscode: state.vscodeConnected,
    },
    last_dispatched: state.lastDispatched,
    active_session: state.activeSessionId,
    session_count: state.sessions.size,
    last_tool: current?.lastTool ?? null,
  };
}

function projectArmed(
  armed: string | null,
  config: DaemonConfig
): ArmedRender | null {
  if (armed === null) return null;
  const prompt = config.prompts.get(armed);
  if (!prompt) return null;
  return {
    prompt_id: armed,
    label: prompt.label,
    command: effectiveCommand(prompt, config.policy.nativePrimary) ?? "",
    style: prompt.armStyle,
  };
}

function projectSlot(
  slot: number,
  ref: SlotRef | undefined,
  armed: string | null,
  config: DaemonConfig
): KeypadSlotRender {
  if (!ref || ref.kind === "empty") {
    return {
      slot,
      kind: "empty",
      id: EMPTY_SLOT_ID,
      label: EMPTY_SLOT_LABEL,
      sublabel: null,
      armed: false,
    };
  }

  const target =
    ref.kind === "prompt" ? config.prompts.get(ref.id) : config.gates.get(ref.id);

  return {
    slot,
    kind: ref.kind,
    id: ref.id,
    label: target?.label ?? UNRESOLVED_LABEL,
    sublabel: target?.sublabel ?? null,
    // Gates are never armable.
    armed: ref.kind === "prompt" && ref.id === armed,
  };
}
