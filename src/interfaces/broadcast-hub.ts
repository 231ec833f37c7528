/**
 * @module interfaces/broadcast-hub
 * @description IBroadcastHub: owner of the daemon state and the single
 * fan-out path to every connected device.
 *
 * Two ingress paths feed one pipeline:
 *   device connection ─┐
 *                      ├─► decode ─► reduce (under lock) ─► effects ─► fan-out
 *   POST /hook ────────┘
 *
 * Effects run after the lock is released. Every device sees the same
 * ordered sequence of outbound messages; nothing is customized per client
 * except the handshake acknowledgment.
 */

import type { IDaemonEmitter } from "./event-emitter.js";
import type { DaemonState } from "../primitives/session-store.js";
import type { ClientKind } from "../types/state.js";
import type {
  HookNotification,
  InboundMessage,
  OutboundMessage,
  RenderModel,
} from "../types/protocol.js";
import type { ReducerEvent, SideEffect } from "../types/reducer.js";

/**
 * A persistent bidirectional device connection, as seen by the hub.
 * Transports adapt their sockets to this shape.
 */
export interface DeviceConnection {
  readonly id: string;
  /** Send one text frame. May reject if the peer is gone. */
  send(text: string): Promise<void>;
  /** Inbound text frames; ends when the peer disconnects. */
  messages(): AsyncIterable<string>;
  /** Close the connection. Idempotent. */
  close(): void;
}

/**
 * Per-connection bookkeeping the hub keeps while a device is attached.
 */
export interface ConnectionContext {
  readonly id: string;
  /** Kind announced in the first hello; `null` until then. */
  kind: ClientKind | null;
  /** Send a message to this connection only. Never rejects. */
  reply(msg: OutboundMessage): Promise<void>;
}

/**
 * @interface IBroadcastHub
 */
export interface IBroadcastHub extends IDaemonEmitter {
  // ─── Commands ───────────────────────────────────────────────────

  /**
   * @command
   * @description Reduce one event under the state lock, then execute the
   * returned effects in order.
   * @returns The effects that were executed.
   */
  apply(event: ReducerEvent): Promise<SideEffect[]>;

  /**
   * @command
   * @description Recompute the render model and publish it to every device.
   * @postcondition Emits RENDER_PUBLISHED.
   */
  publishRender(): RenderModel;

  /**
   * @command
   * @description Route one decoded device message. Gate presses are
   * dispatched here and never reach the reducer.
   */
  handleClientMessage(msg: InboundMessage, ctx: ConnectionContext): Promise<void>;

  /**
   * @command
   * @description Feed one hook notification through the reducer.
   */
  handleHookNotification(msg: HookNotification): Promise<void>;

  /**
   * @command
   * @description Decode and apply a raw `POST /hook` body. Never rejects;
   * malformed bodies are logged and dropped.
   */
  handleHookBody(body: string): Promise<void>;

  /**
   * @command
   * @description Serve one device until it disconnects: acknowledge,
   * subscribe, relay and read. Resolves after cleanup.
   */
  attach(connection: DeviceConnection): Promise<void>;

  /**
   * @command
   * @description End every relay. Attached connections see no more
   * outbound messages.
   */
  close(): void;

  // ─── Queries ────────────────────────────────────────────────────

  /** @query Current render model, computed on demand. */
  snapshot(): RenderModel;

  /**
   * @query
   * @description Read the state under the lock.
   */
  inspect<R>(fn: (state: Readonly<DaemonState>) => R): Promise<R>;

  /** @query Number of devices currently subscribed to the fan-out. */
  readonly subscriberCount: number;
}
