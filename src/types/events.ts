/**
 * @module types/events
 * @description Event catalog emitted by the broadcast hub.
 *
 * These are observability events for embedders and tests, not protocol
 * messages. Listeners run synchronously on the emitting path, so they
 * should stay cheap.
 */

import type { UnixTimestamp } from "./branded.js";
import type { ClientKind } from "./state.js";
import type { RenderModel, VscodeCommand } from "./protocol.js";

// ─── Fan-out Events ─────────────────────────────────────────────────

/** Emitted after a render snapshot has been published on the channel. */
export interface RenderPublishedEvent {
  readonly type: "RENDER_PUBLISHED";
  readonly model: RenderModel;
  readonly receivers: number;
  readonly timestamp: UnixTimestamp;
}

/** Emitted after an editor command has been published on the channel. */
export interface CommandPublishedEvent {
  readonly type: "COMMAND_PUBLISHED";
  readonly command: VscodeCommand;
  readonly receivers: number;
  readonly timestamp: UnixTimestamp;
}

/** Emitted when a keypad press resolved to a gate and bypassed the reducer. */
export interface GateTriggeredEvent {
  readonly type: "GATE_TRIGGERED";
  readonly gateId: string;
  readonly action: string;
  readonly timestamp: UnixTimestamp;
}

/** Emitted when a subscriber's backlog overflowed and items were dropped. */
export interface SubscriberLaggedEvent {
  readonly type: "SUBSCRIBER_LAGGED";
  readonly connectionId: string;
  readonly skipped: number;
  readonly timestamp: UnixTimestamp;
}

// ─── Connection Events ──────────────────────────────────────────────

export interface ClientAttachedEvent {
  readonly type: "CLIENT_ATTACHED";
  readonly connectionId: string;
  readonly timestamp: UnixTimestamp;
}

export interface ClientIdentifiedEvent {
  readonly type: "CLIENT_IDENTIFIED";
  readonly connectionId: string;
  readonly kind: ClientKind;
  readonly clientVersion: string;
  readonly protocolVersion: number;
  readonly timestamp: UnixTimestamp;
}

export interface ClientDetachedEvent {
  readonly type: "CLIENT_DETACHED";
  readonly connectionId: string;
  readonly kind: ClientKind | null;
  readonly timestamp: UnixTimestamp;
}

/** Emitted when an inbound message could not be decoded and was dropped. */
export interface MessageRejectedEvent {
  readonly type: "MESSAGE_REJECTED";
  /** `null` for the one-shot hook ingress. */
  readonly connectionId: string | null;
  readonly reason: string;
  readonly timestamp: UnixTimestamp;
}

// ─── Union Types ────────────────────────────────────────────────────

export type FanoutEvent =
  | RenderPublishedEvent
  | CommandPublishedEvent
  | GateTriggeredEvent
  | SubscriberLaggedEvent;

export type ConnectionEvent =
  | ClientAttachedEvent
  | ClientIdentifiedEvent
  | ClientDetachedEvent
  | MessageRejectedEvent;

/** Union of all hub events. */
export type HubEvent = FanoutEvent | ConnectionEvent;

/**
 * Extract the event type string literal from a HubEvent.
 */
export type HubEventType = HubEvent["type"];

/**
 * Map from event type string to the corresponding event interface.
 */
export type HubEventMap = {
  RENDER_PUBLISHED: RenderPublishedEvent;
  COMMAND_PUBLISHED: CommandPublishedEvent;
  GATE_TRIGGERED: GateTriggeredEvent;
  SUBSCRIBER_LAGGED: SubscriberLaggedEvent;
  CLIENT_ATTACHED: ClientAttachedEvent;
  CLIENT_IDENTIFIED: ClientIdentifiedEvent;
  CLIENT_DETACHED: ClientDetachedEvent;
  MESSAGE_REJECTED: MessageRejectedEvent;
};
