/**
 * @module primitives/broadcast-hub
 * @description BroadcastHub: owns the DaemonState behind a StateLock and
 * fans every state change out to all attached devices.
 *
 * Each attached device gets two loops: a read loop feeding the reducer
 * and a relay loop draining its fan-out subscription. The reducer runs
 * under the lock; effects run after it is released.
 */

import type { Logger } from "pino";
import { DaemonEmitter } from "./base-emitter.js";
import { DaemonState } from "./session-store.js";
import { StateLock } from "./state-lock.js";
import { FanoutChannel, type Subscription } from "./fanout-channel.js";
import { reduce, POLICY_BLOCK_HOOK } from "./reducer.js";
import { buildRenderModel } from "./render.js";
import type {
  ConnectionContext,
  DeviceConnection,
  IBroadcastHub,
} from "../interfaces/broadcast-hub.js";
import type { DaemonConfig } from "../types/config.js";
import type {
  HelloMessage,
  HookNotification,
  InboundMessage,
  OutboundMessage,
  RenderModel,
  VscodeCommand,
} from "../types/protocol.js";
import type { ReducerEvent, SideEffect } from "../types/reducer.js";
import type { DeviceKind } from "../types/state.js";
import { nowUnix } from "../types/branded.js";
import {
  CodecError,
  PROTOCOL_VERSION,
  commandMessage,
  decodeHookNotification,
  decodeInbound,
  encodeOutbound,
  extractToolCommand,
  helloAck,
  notice,
  openUri,
  renderMessage,
  toHookEvent,
  toTerminalsSnapshotEvent,
} from "../codec/index.js";
import { silentLogger } from "../logger.js";

export interface BroadcastHubOptions {
  /** Per-subscriber backlog of the fan-out channel. */
  readonly capacity?: number;
  readonly logger?: Logger;
}

/**
 * BroadcastHub: the daemon's event pipeline.
 *
 * @example
 * ```ts
 * const hub = new BroadcastHub(config, { logger });
 * hub.on("RENDER_PUBLISHED", (e) => console.log(e.model.agent_state));
 * await hub.handleHookNotification({ hook: "SessionStart", session_id: "s1" });
 * ```
 */
export class BroadcastHub extends DaemonEmitter implements IBroadcastHub {
  private readonly state: DaemonState;
  private readonly lock = new StateLock();
  private readonly channel: FanoutChannel<OutboundMessage>;
  private readonly liveness = new Map<DeviceKind, number>();
  private readonly log: Logger;

  constructor(
    private readonly config: DaemonConfig,
    options: BroadcastHubOptions = {}
  ) {
    super();
    this.state = new DaemonState(config.initialPage);
    this.channel = new FanoutChannel(options.capacity);
    this.log = options.logger ?? silentLogger;
  }

  // ─── Commands ───────────────────────────────────────────────────

  async apply(event: ReducerEvent): Promise<SideEffect[]> {
    const effects = await this.lock.runExclusive(() =>
      reduce(this.state, this.config, event)
    );
    for (const effect of effects) {
      if (effect.type === "BROADCAST_RENDER") {
        this.publishRender();
      } else {
        this.publishCommand(effect.command);
      }
    }
    return effects;
  }

  publishRender(): RenderModel {
    const model = buildRenderModel(this.state, this.config);
    const receivers = this.channel.publish(renderMessage(model));
    this.emit({
      type: "RENDER_PUBLISHED",
      model,
      receivers,
      timestamp: nowUnix(),
    });
    return model;
  }

  async handleClientMessage(
    msg: InboundMessage,
    ctx: ConnectionContext
  ): Promise<void> {
    switch (msg.type) {
      case "hello":
        await this.handleHello(msg, ctx);
        return;

      case "keypad_press": {
        const gate = this.config.gates.get(msg.prompt_id);
        if (gate) {
          this.log.info({ gateId: msg.prompt_id, action: gate.action }, "gate triggered");
          this.emit({
            type: "GATE_TRIGGERED",
            gateId: msg.prompt_id,
            action: gate.action,
            timestamp: nowUnix(),
          });
          this.publishCommand(openUri("active", gate.action));
          return;
        }
        await this.apply({ type: "KEYPAD_PRESS", promptId: msg.prompt_id });
        return;
      }

      case "dialpad_button_press":
        await this.apply({ type: "DIALPAD_BUTTON", button: msg.button });
        return;

      case "adjustment":
        await this.apply({ type: "ADJUSTMENT", kind: msg.kind, delta: msg.delta });
        return;

      case "page_nav":
        await this.apply({ type: "PAGE_NAV", direction: msg.direction });
        return;

      case "hook_event":
        await this.handleHookNotification(msg);
        return;

      case "terminals_snapshot":
        await this.apply(toTerminalsSnapshotEvent(msg));
        return;
    }
  }

  async handleHookNotification(msg: HookNotification): Promise<void> {
    await this.apply(toHookEvent(msg));
    if (msg.hook === POLICY_BLOCK_HOOK) {
      const command = extractToolCommand(msg.payload);
      this.publish(
        notice(
          command === null
            ? "Blocked by local policy"
            : `Blocked by local policy: ${command}`
        )
      );
    }
  }

  async handleHookBody(body: string): Promise<void> {
    let msg: HookNotification;
    try {
      msg = decodeHookNotification(body);
    } catch (err) {
      this.reject(null, err);
      return;
    }
    await this.handleHookNotification(msg);
  }

  async attach(connection: DeviceConnection): Promise<void> {
    const ctx: ConnectionContext = {
      id: connection.id,
      kind: null,
      reply: (msg) => this.sendTo(connection, msg),
    };
    this.emit({ type: "CLIENT_ATTACHED", connectionId: ctx.id, timestamp: nowUnix() });

    // Subscribed before the ack so nothing published after it is missed.
    const subscription = this.channel.subscribe();
    await ctx.reply(helloAck());
    const relay = this.relay(connection, subscription);

    try {
      for await (const text of connection.messages()) {
        let msg: InboundMessage;
        try {
          msg = decodeInbound(text);
        } catch (err) {
          this.reject(ctx.id, err);
          continue;
        }
        await this.handleClientMessage(msg, ctx);
      }
    } catch (err) {
      this.log.warn({ connectionId: ctx.id, err }, "read loop failed; closing");
      connection.close();
    } finally {
      subscription.close();
      await relay;
      await this.detach(ctx);
    }
  }

  close(): void {
    this.channel.close();
  }

  // ─── Queries ────────────────────────────────────────────────────

  snapshot(): RenderModel {
    return buildRenderModel(this.state, this.config);
  }

  inspect<R>(fn: (state: Readonly<DaemonState>) => R): Promise<R> {
    return this.lock.runExclusive(() => fn(this.state));
  }

  get subscriberCount(): number {
    return this.channel.subscriberCount;
  }

  // ─── Internal ───────────────────────────────────────────────────

  private async handleHello(
    msg: HelloMessage,
    ctx: ConnectionContext
  ): Promise<void> {
    if (msg.protocol_version !== PROTOCOL_VERSION) {
      this.log.warn(
        { connectionId: ctx.id, protocolVersion: msg.protocol_version },
        "protocol mismatch"
      );
      this.publish(
        notice(
          `protocol mismatch: ${msg.client_kind} client speaks v${msg.protocol_version}, ` +
            `daemon speaks v${PROTOCOL_VERSION}`
        )
      );
    }

    // A connection is counted once, under the kind of its first hello.
    const firstHello = ctx.kind === null;
    if (firstHello) {
      ctx.kind = msg.client_kind;
    }
    this.log.info(
      {
        connectionId: ctx.id,
        kind: msg.client_kind,
        clientVersion: msg.client_version,
        protocolVersion: msg.protocol_version,
      },
      "client identified"
    );
    this.emit({
      type: "CLIENT_IDENTIFIED",
      connectionId: ctx.id,
      kind: msg.client_kind,
      clientVersion: msg.client_version,
      protocolVersion: msg.protocol_version,
      timestamp: nowUnix(),
    });

    const kind = ctx.kind;
    if (kind !== null && kind !== "hooks") {
      if (firstHello) {
        this.liveness.set(kind, (this.liveness.get(kind) ?? 0) + 1);
      }
      await this.apply({ type: "CLIENT_CONNECTED", kind });
    }

    this.publish(
      notice(
        `client connected: ${msg.client_kind} v${msg.client_version} ` +
          `(protocol ${msg.protocol_version})`
      )
    );
    this.publishRender();
  }

  private async detach(ctx: ConnectionContext): Promise<void> {
    const kind = ctx.kind;
    if (kind !== null && kind !== "hooks") {
      const remaining = (this.liveness.get(kind) ?? 1) - 1;
      if (remaining > 0) {
        this.liveness.set(kind, remaining);
      } else {
        this.liveness.delete(kind);
        await this.apply({ type: "CLIENT_DISCONNECTED", kind });
      }
    }
    this.emit({
      type: "CLIENT_DETACHED",
      connectionId: ctx.id,
      kind,
      timestamp: nowUnix(),
    });
  }

  private async relay(
    connection: DeviceConnection,
    subscription: Subscription<OutboundMessage>
  ): Promise<void> {
    for await (const msg of subscription) {
      const skipped = subscription.takeLagged();
      if (skipped > 0) {
        this.log.warn({ connectionId: connection.id, skipped }, "subscriber lagged");
        this.emit({
          type: "SUBSCRIBER_LAGGED",
          connectionId: connection.id,
          skipped,
          timestamp: nowUnix(),
        });
      }
      try {
        await connection.send(encodeOutbound(msg));
      } catch (err) {
        this.log.debug({ connectionId: connection.id, err }, "send failed; closing");
        connection.close();
        return;
      }
    }
  }

  private publishCommand(command: VscodeCommand): void {
    const receivers = this.publish(commandMessage(command));
    this.emit({
      type: "COMMAND_PUBLISHED",
      command,
      receivers,
      timestamp: nowUnix(),
    });
  }

  private publish(msg: OutboundMessage): number {
    return this.channel.publish(msg);
  }

  private async sendTo(
    connection: DeviceConnection,
    msg: OutboundMessage
  ): Promise<void> {
    try {
      await connection.send(encodeOutbound(msg));
    } catch (err) {
      this.log.debug({ connectionId: connection.id, err }, "send failed");
    }
  }

  private reject(connectionId: string | null, err: unknown): void {
    if (!(err instanceof CodecError)) {
      throw err;
    }
    this.log.warn({ connectionId, code: err.code, reason: err.message }, "inbound message rejected");
    this.emit({
      type: "MESSAGE_REJECTED",
      connectionId,
      reason: err.message,
      timestamp: nowUnix(),
    });
  }
}
