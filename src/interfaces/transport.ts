/**
 * @module interfaces/transport
 * @description IDeviceServer: the network front of the daemon.
 *
 * One listener serves both ingress paths: a WebSocket upgrade per device
 * and a one-shot HTTP POST per hook notification. The server holds no
 * state of its own beyond open sockets; everything is handed to the hub.
 */

import type { ListenAddress } from "../types/config.js";

/**
 * Errors that may be thrown by device server and connection operations.
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly code:
      | "ALREADY_LISTENING"
      | "NOT_LISTENING"
      | "BIND_FAILED"
      | "CONNECTION_CLOSED"
  ) {
    super(message);
    this.name = "TransportError";
  }
}

/** Route that upgrades to a device WebSocket. */
export const WEBSOCKET_PATH = "/ws";

/** Route that accepts one hook notification per request. */
export const HOOK_PATH = "/hook";

export const HEALTH_PATH = "/health";

/** Largest accepted `POST /hook` body, in bytes. */
export const MAX_HOOK_BODY_BYTES = 1024 * 1024;

/**
 * @interface IDeviceServer
 */
export interface IDeviceServer {
  // ─── Commands ───────────────────────────────────────────────────

  /**
   * @command
   * @description Bind and start serving. Port 0 picks an ephemeral port.
   * @returns The address actually bound.
   * @throws {TransportError} code=ALREADY_LISTENING if called twice.
   * @throws {TransportError} code=BIND_FAILED if the socket cannot be bound.
   */
  listen(address: ListenAddress): Promise<ListenAddress>;

  /**
   * @command
   * @description Close every device connection and stop listening.
   * Resolves once every attached connection has been cleaned up.
   * @throws {TransportError} code=NOT_LISTENING if not started.
   */
  close(): Promise<void>;

  // ─── Queries ────────────────────────────────────────────────────

  /** @query Bound address, or `null` when not listening. */
  readonly address: ListenAddress | null;

  /** @query Number of open device WebSockets. */
  readonly connectionCount: number;
}
