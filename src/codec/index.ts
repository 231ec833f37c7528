/**
 * @module codec
 * @description Wire codec for the device protocol and the hook ingress.
 *
 * Every frame is one UTF-8 JSON object. Inbound frames are validated
 * with zod before anything downstream sees them, so the reducer only
 * ever receives well-formed events.
 */

import { z } from "zod";
import type {
  HelloAckMessage,
  HookNotification,
  InboundMessage,
  NoticeMessage,
  OutboundMessage,
  RenderMessage,
  RenderModel,
  TerminalsSnapshotMessage,
  VscodeCommand,
  VscodeCommandMessage,
} from "../types/protocol.js";
import type { HookEvent, TerminalsSnapshotEvent } from "../types/reducer.js";
import type { TerminalInfo } from "../types/state.js";
import { toSessionId, toSessionTag } from "../types/branded.js";

export * from "./commands.js";

// ─── Versions ───────────────────────────────────────────────────────

export const PROTOCOL_VERSION = 1;
export const DAEMON_VERSION = "0.1.0";

// ─── Errors ─────────────────────────────────────────────────────────

export class CodecError extends Error {
  constructor(
    message: string,
    public readonly code: "INVALID_JSON" | "INVALID_MESSAGE"
  ) {
    super(message);
    this.name = "CodecError";
  }
}

// ─── Schemas ────────────────────────────────────────────────────────

const optionalText = z.string().nullable().optional();

export const HookNotificationSchema = z.object({
  hook: z.string().min(1),
  matcher: optionalText,
  session_id: optionalText,
  session_tag: optionalText,
  payload: z.unknown().optional(),
});

const HelloSchema = z.object({
  type: z.literal("hello"),
  client_kind: z.enum(["logi", "vscode", "hooks"]),
  protocol_version: z.number().int(),
  client_version: z.string().default(""),
  capabilities: z.array(z.string()).default([]),
});

const KeypadPressSchema = z.object({
  type: z.literal("keypad_press"),
  prompt_id: z.string(),
});

const DialpadButtonPressSchema = z.object({
  type: z.literal("dialpad_button_press"),
  button: z.enum(["ctrl_c", "export", "esc", "enter"]),
});

const AdjustmentSchema = z.object({
  type: z.literal("adjustment"),
  kind: z.enum(["dial", "roller"]),
  delta: z.number().int(),
});

const PageNavSchema = z.object({
  type: z.literal("page_nav"),
  direction: z.enum(["prev", "next"]),
});

const HookEventSchema = HookNotificationSchema.extend({
  type: z.literal("hook_event"),
});

const TerminalsSnapshotSchema = z.object({
  type: z.literal("terminals_snapshot"),
  terminals: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      name: z.string(),
      session_tag: optionalText,
    })
  ),
  active_index: z.number().int().nonnegative().nullable().default(null),
});

export const InboundMessageSchema = z.discriminatedUnion("type", [
  HelloSchema,
  KeypadPressSchema,
  DialpadButtonPressSchema,
  AdjustmentSchema,
  PageNavSchema,
  HookEventSchema,
  TerminalsSnapshotSchema,
]);

// Outbound schemas are never used to parse; they document the frames
// the daemon sends and are typed against the protocol interfaces.

const renderModelShape = {
  agent_state: z.enum([
    "unknown",
    "idle",
    "running",
    "waiting_permission",
    "waiting_input",
    "blocked",
    "complete",
    "settled",
    "ended",
  ]),
  armed: z
    .object({
      prompt_id: z.string(),
      label: z.string(),
      command: z.string(),
      style: z.enum(["queue", "prefill"]),
    })
    .nullable(),
  keypad: z.object({
    slots: z.array(
      z.object({
        slot: z.number().int().min(0).max(8),
        kind: z.enum(["prompt", "gate", "empty"]),
        id: z.string(),
        label: z.string(),
        sublabel: z.string().nullable(),
        armed: z.boolean(),
      })
    ),
  }),
  page_index: z.number().int().nonnegative(),
  page_count: z.number().int().nonnegative(),
  page_name: z.string(),
  hooks_mode: z.enum(["absent", "active"]),
  connections: z.object({ logi: z.boolean(), vscode: z.boolean() }),
  last_dispatched: z.string().nullable(),
  active_session: z.string().nullable(),
  session_count: z.number().int().nonnegative(),
  last_tool: z.string().nullable(),
};

export const RenderModelSchema: z.ZodType<RenderModel> = z.object(renderModelShape);

const commandTarget = z.enum(["active_assistant", "active"]);

const VscodeCommandMessageSchema: z.ZodType<VscodeCommandMessage> = z.union([
  z.object({
    type: z.literal("vscode_command"),
    kind: z.literal("send_text"),
    target: commandTarget,
    payload: z.object({ text: z.string(), add_newline: z.boolean() }),
  }),
  z.object({
    type: z.literal("vscode_command"),
    kind: z.literal("focus_terminal"),
    target: commandTarget,
    payload: z.object({
      direction: z.union([z.literal(-1), z.literal(0), z.literal(1)]),
    }),
  }),
  z.object({
    type: z.literal("vscode_command"),
    kind: z.literal("scroll_terminal"),
    target: commandTarget,
    payload: z.object({ delta: z.number().int(), unit: z.literal("lines") }),
  }),
  z.object({
    type: z.literal("vscode_command"),
    kind: z.literal("open_uri"),
    target: commandTarget,
    payload: z.object({ uri: z.string() }),
  }),
]);

export const OutboundMessageSchema: z.ZodType<OutboundMessage> = z.union([
  z.object({
    type: z.literal("hello_ack"),
    protocol_version: z.number().int(),
    daemon_version: z.string(),
  }),
  z.object({ type: z.literal("render"), ...renderModelShape }),
  VscodeCommandMessageSchema,
  z.object({ type: z.literal("notice"), message: z.string() }),
]);

// ─── Decoding ───────────────────────────────────────────────────────

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new CodecError(`Frame is not valid JSON: ${detail}`, "INVALID_JSON");
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Decode one frame from a device connection.
 * @throws {CodecError} if the frame is not JSON or not a known message.
 */
export function decodeInbound(text: string): InboundMessage {
  const result = InboundMessageSchema.safeParse(parseJson(text));
  if (!result.success) {
    throw new CodecError(
      `Unrecognized inbound message: ${describeIssues(result.error)}`,
      "INVALID_MESSAGE"
    );
  }
  return result.data;
}

/**
 * Decode a `POST /hook` body. A `type` field, if present, is ignored.
 * @throws {CodecError}
 */
export function decodeHookNotification(body: string): HookNotification {
  const result = HookNotificationSchema.safeParse(parseJson(body));
  if (!result.success) {
    throw new CodecError(
      `Invalid hook notification: ${describeIssues(result.error)}`,
      "INVALID_MESSAGE"
    );
  }
  return result.data;
}

// ─── Event Mapping ──────────────────────────────────────────────────

function nonEmpty(value: string | null | undefined): string | null {
  return value === undefined || value === null || value === "" ? null : value;
}

/** `tool_name` from a raw hook payload, when it is a non-empty string. */
export function extractToolName(payload: unknown): string | null {
  if (typeof payload !== "object" || payload === null) return null;
  const toolName: unknown = Reflect.get(payload, "tool_name");
  return typeof toolName === "string" ? nonEmpty(toolName) : null;
}

/** `tool_input.command` from a raw hook payload, if it is a string. */
export function extractToolCommand(payload: unknown): string | null {
  if (typeof payload !== "object" || payload === null) return null;
  const toolInput: unknown = Reflect.get(payload, "tool_input");
  if (typeof toolInput !== "object" || toolInput === null) return null;
  const command: unknown = Reflect.get(toolInput, "command");
  return typeof command === "string" ? command : null;
}

/** Normalize a hook notification into a reducer event. */
export function toHookEvent(msg: HookNotification): HookEvent {
  const sessionId = nonEmpty(msg.session_id);
  const sessionTag = nonEmpty(msg.session_tag);
  return {
    type: "HOOK_EVENT",
    hook: msg.hook,
    matcher: nonEmpty(msg.matcher),
    sessionId: sessionId === null ? null : toSessionId(sessionId),
    sessionTag: sessionTag === null ? null : toSessionTag(sessionTag),
    toolName: extractToolName(msg.payload),
  };
}

export function toTerminalsSnapshotEvent(
  msg: TerminalsSnapshotMessage
): TerminalsSnapshotEvent {
  const terminals: TerminalInfo[] = msg.terminals.map((terminal) => {
    const tag = nonEmpty(terminal.session_tag);
    return {
      index: terminal.index,
      name: terminal.name,
      sessionTag: tag === null ? null : toSessionTag(tag),
    };
  });
  return {
    type: "TERMINALS_SNAPSHOT",
    terminals,
    activeIndex: msg.active_index,
  };
}

// ─── Encoding ───────────────────────────────────────────────────────

export function encodeOutbound(msg: OutboundMessage): string {
  return JSON.stringify(msg);
}

export function helloAck(): HelloAckMessage {
  return {
    type: "hello_ack",
    protocol_version: PROTOCOL_VERSION,
    daemon_version: DAEMON_VERSION,
  };
}

export function renderMessage(model: RenderModel): RenderMessage {
  return { type: "render", ...model };
}

export function commandMessage(command: VscodeCommand): VscodeCommandMessage {
  return { type: "vscode_command", ...command };
}

export function notice(message: string): NoticeMessage {
  return { type: "notice", message };
}
