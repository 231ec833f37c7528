/**
 * @module transports/websocket
 * @description WebSocket + HTTP device server.
 *
 * Routes:
 * - `GET /ws`: upgrade, then the socket is attached to the hub.
 * - `POST /hook`: one hook notification; always answered `200 ok`.
 * - `GET /health`: liveness and versions.
 */

import {
  createServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from "node:http";
import type { AddressInfo } from "node:net";
import type { Duplex } from "node:stream";
import WebSocket, { WebSocketServer, type RawData } from "ws";
import type { Logger } from "pino";
import type {
  DeviceConnection,
  IBroadcastHub,
} from "../interfaces/broadcast-hub.js";
import type { IDeviceServer } from "../interfaces/transport.js";
import {
  HEALTH_PATH,
  HOOK_PATH,
  MAX_HOOK_BODY_BYTES,
  TransportError,
  WEBSOCKET_PATH,
} from "../interfaces/transport.js";
import type { ListenAddress } from "../types/config.js";
import { DAEMON_VERSION, PROTOCOL_VERSION } from "../codec/index.js";
import { silentLogger } from "../logger.js";

// ─── Connection ─────────────────────────────────────────────────────

/**
 * Adapts a `ws` socket to the hub's DeviceConnection. Text frames are
 * buffered from the moment the socket opens, so nothing sent before the
 * hub starts reading is lost. Binary frames are ignored.
 */
export class WebSocketConnection implements DeviceConnection {
  private readonly inbox: string[] = [];
  private waiter: ((text: string | null) => void) | null = null;
  private ended = false;

  constructor(
    readonly id: string,
    private readonly socket: WebSocket
  ) {
    socket.on("message", (data: RawData, isBinary: boolean) => {
      if (!isBinary) {
        this.deliver(rawToText(data));
      }
    });
    socket.on("close", () => this.end());
    socket.on("error", () => this.end());
  }

  send(text: string): Promise<void> {
    if (this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(
        new TransportError(`Connection ${this.id} is closed`, "CONNECTION_CLOSED")
      );
    }
    return new Promise((resolve, reject) => {
      this.socket.send(text, (err) => (err ? reject(err) : resolve()));
    });
  }

  async *messages(): AsyncIterable<string> {
    for (;;) {
      const text = this.inbox.shift() ?? (await this.nextFrame());
      if (text === null) return;
      yield text;
    }
  }

  close(): void {
    if (
      this.socket.readyState === WebSocket.OPEN ||
      this.socket.readyState === WebSocket.CONNECTING
    ) {
      this.socket.close(1000, "closing");
    }
    this.end();
  }

  private nextFrame(): Promise<string | null> {
    if (this.ended) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  private deliver(text: string): void {
    if (this.ended) return;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(text);
    } else {
      this.inbox.push(text);
    }
  }

  private end(): void {
    if (this.ended) return;
    this.ended = true;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(null);
    }
  }
}

function rawToText(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf8");
  }
  return data.toString("utf8");
}

// ─── Server ─────────────────────────────────────────────────────────

export interface DeviceServerOptions {
  readonly logger?: Logger;
}

/**
 * DeviceServer: Node `http` server with a `ws` upgrade route.
 *
 * @example
 * ```ts
 * const server = new DeviceServer(hub, { logger });
 * const bound = await server.listen({ host: "127.0.0.1", port: 29381 });
 * // ...
 * await server.close();
 * ```
 */
export class DeviceServer implements IDeviceServer {
  private server: Server | null = null;
  private wss: WebSocketServer | null = null;
  private bound: ListenAddress | null = null;
  private nextId = 0;
  private readonly connections = new Set<WebSocketConnection>();
  private readonly attached = new Set<Promise<void>>();
  private readonly log: Logger;

  constructor(
    private readonly hub: IBroadcastHub,
    options: DeviceServerOptions = {}
  ) {
    this.log = options.logger ?? silentLogger;
  }

  // ─── Commands ───────────────────────────────────────────────────

  async listen(address: ListenAddress): Promise<ListenAddress> {
    if (this.server) {
      throw new TransportError("Device server is already listening", "ALREADY_LISTENING");
    }

    const wss = new WebSocketServer({ noServer: true });
    wss.on("connection", (socket: WebSocket) => this.onConnection(socket));

    const server = createServer((req, res) => this.onRequest(req, res));
    server.on("upgrade", (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      if (pathOf(req) !== WEBSOCKET_PATH) {
        socket.end("HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n");
        return;
      }
      wss.handleUpgrade(req, socket, head, (ws) => {
        wss.emit("connection", ws, req);
      });
    });

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        reject(
          new TransportError(
            `Cannot bind ${address.host}:${address.port}: ${err.message}`,
            "BIND_FAILED"
          )
        );
      };
      server.once("error", onError);
      server.listen(address.port, address.host, () => {
        server.off("error", onError);
        resolve();
      });
    });

    const info = server.address();
    this.bound = isAddressInfo(info)
      ? { host: info.address, port: info.port }
      : { ...address };
    this.server = server;
    this.wss = wss;
    return this.bound;
  }

  async close(): Promise<void> {
    const server = this.server;
    const wss = this.wss;
    if (!server || !wss) {
      throw new TransportError("Device server is not listening", "NOT_LISTENING");
    }
    this.server = null;
    this.wss = null;
    this.bound = null;

    for (const connection of this.connections) {
      connection.close();
    }
    await Promise.all([...this.attached]);

    await new Promise<void>((resolve, reject) => {
      wss.close((err) => (err ? reject(err) : resolve()));
    });
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
  }

  // ─── Queries ────────────────────────────────────────────────────

  get address(): ListenAddress | null {
    return this.bound;
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  // ─── Internal ───────────────────────────────────────────────────

  private onConnection(socket: WebSocket): void {
    const connection = new WebSocketConnection(`ws-${++this.nextId}`, socket);
    this.connections.add(connection);
    this.log.debug({ connectionId: connection.id }, "device connected");

    const session: Promise<void> = this.hub
      .attach(connection)
      .catch((err: unknown) => {
        this.log.error({ connectionId: connection.id, err }, "device session failed");
      })
      .finally(() => {
        this.connections.delete(connection);
        this.attached.delete(session);
        this.log.debug({ connectionId: connection.id }, "device disconnected");
      });
    this.attached.add(session);
  }

  private onRequest(req: IncomingMessage, res: ServerResponse): void {
    const path = pathOf(req);

    if (path === HOOK_PATH && req.method === "POST") {
      this.handleHook(req, res).catch((err: unknown) => {
        this.log.debug({ err }, "hook request failed");
        reply(res, 200, "text/plain", "ok");
      });
      return;
    }

    if (path === HEALTH_PATH && req.method === "GET") {
      reply(
        res,
        200,
        "application/json",
        JSON.stringify({
          ok: true,
          protocol_version: PROTOCOL_VERSION,
          daemon_version: DAEMON_VERSION,
        })
      );
      return;
    }

    if (path === WEBSOCKET_PATH) {
      reply(res, 426, "text/plain", "upgrade required");
      return;
    }

    reply(res, 404, "text/plain", "not found");
  }

  /** Hook ingress never reports failure to its caller. */
  private async handleHook(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await readBody(req, MAX_HOOK_BODY_BYTES);
    if (body === null) {
      this.log.warn("hook body too large; dropped");
    } else {
      await this.hub.handleHookBody(body);
    }
    reply(res, 200, "text/plain", "ok");
  }
}

// ─── Helpers ────────────────────────────────────────────────────────

function pathOf(req: IncomingMessage): string {
  const url = req.url ?? "/";
  const query = url.indexOf("?");
  return query === -1 ? url : url.slice(0, query);
}

function isAddressInfo(value: string | AddressInfo | null): value is AddressInfo {
  return typeof value === "object" && value !== null;
}

function reply(
  res: ServerResponse,
  status: number,
  contentType: string,
  body: string
): void {
  if (res.headersSent) return;
  res.writeHead(status, { "content-type": contentType });
  res.end(body);
}

/** Reads the whole body, or `null` once it exceeds `limit` bytes. */
async function readBody(req: IncomingMessage, limit: number): Promise<string | null> {
  const chunks: Buffer[] = [];
  let size = 0;
  let overflow = false;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > limit) {
      overflow = true;
      continue;
    }
    chunks.push(buf);
  }
  return overflow ? null : Buffer.concat(chunks).toString("utf8");
}
