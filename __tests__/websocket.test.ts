import { describe, it, expect, beforeEach, afterEach } from "vitest";
import WebSocket from "ws";
import { BroadcastHub } from "../src/primitives/broadcast-hub.js";
import { DeviceServer } from "../src/transports/websocket.js";
import { TransportError } from "../src/interfaces/transport.js";
import type { ListenAddress } from "../src/types/config.js";
import { makeConfig } from "./helpers.js";

/** Minimal device client: collects every frame it receives. */
class TestClient {
  readonly messages: Array<Record<string, unknown>> = [];
  private readonly waiters: Array<() => void> = [];

  private constructor(readonly socket: WebSocket) {
    socket.on("message", (data: WebSocket.RawData) => {
      this.messages.push(JSON.parse(data.toString()) as Record<string, unknown>);
      for (const wake of this.waiters.splice(0)) wake();
    });
  }

  static connect(address: ListenAddress, path = "/ws"): Promise<TestClient> {
    const socket = new WebSocket(`ws://${address.host}:${address.port}${path}`);
    return new Promise((resolve, reject) => {
      socket.once("open", () => resolve(new TestClient(socket)));
      socket.once("error", reject);
    });
  }

  send(msg: object | string): void {
    this.socket.send(typeof msg === "string" ? msg : JSON.stringify(msg));
  }

  /** Resolves once a received message satisfies `predicate`. */
  async waitFor(
    predicate: (msg: Record<string, unknown>) => boolean,
    timeoutMs = 2000
  ): Promise<Record<string, unknown>> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      const found = this.messages.find(predicate);
      if (found) return found;
      if (Date.now() > deadline) throw new Error("timed out waiting for message");
      await new Promise<void>((resolve) => {
        this.waiters.push(resolve);
        setTimeout(resolve, 50);
      });
    }
  }

  close(): Promise<void> {
    if (this.socket.readyState === WebSocket.CLOSED) return Promise.resolve();
    return new Promise((resolve) => {
      this.socket.once("close", () => resolve());
      this.socket.close();
    });
  }
}

describe("DeviceServer", () => {
  let hub: BroadcastHub;
  let server: DeviceServer;
  let address: ListenAddress;
  let base: string;

  beforeEach(async () => {
    hub = new BroadcastHub(makeConfig());
    server = new DeviceServer(hub);
    address = await server.listen({ host: "127.0.0.1", port: 0 });
    base = `http://${address.host}:${address.port}`;
  });

  afterEach(async () => {
    if (server.address) await server.close();
    hub.close();
  });

  describe("listen()", () => {
    it("should bind an ephemeral port on loopback", () => {
      expect(address.host).toBe("127.0.0.1");
      expect(address.port).toBeGreaterThan(0);
      expect(server.address).toEqual(address);
    });

    it("should refuse to listen twice", async () => {
      await expect(server.listen({ host: "127.0.0.1", port: 0 })).rejects.toMatchObject({
        code: "ALREADY_LISTENING",
      });
    });

    it("should report a port that is already taken", async () => {
      const other = new DeviceServer(hub);
      await expect(other.listen(address)).rejects.toBeInstanceOf(TransportError);
      await expect(other.listen(address)).rejects.toMatchObject({ code: "BIND_FAILED" });
    });
  });

  describe("close()", () => {
    it("should refuse to close a server that is not listening", async () => {
      await server.close();
      await expect(server.close()).rejects.toMatchObject({ code: "NOT_LISTENING" });
    });
  });

  describe("GET /health", () => {
    it("should report versions", async () => {
      const res = await fetch(`${base}/health`);
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        ok: true,
        protocol_version: 1,
        daemon_version: "0.1.0",
      });
    });
  });

  describe("unknown routes", () => {
    it("should answer 404", async () => {
      const res = await fetch(`${base}/nope`);
      expect(res.status).toBe(404);
      expect(await res.text()).toBe("not found");
    });
  });

  describe("POST /hook", () => {
    it("should apply the notification and answer ok", async () => {
      const res = await fetch(`${base}/hook`, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({ hook: "UserPromptSubmit", session_id: "s1" }),
      });
      expect(res.status).toBe(200);
      expect(await res.text()).toBe("ok");
      expect(hub.snapshot().agent_state).toBe("running");
    });

    it("should answer ok to a malformed body", async () => {
      const res = await fetch(`${base}/hook`, { method: "POST", body: "{broken" });
      expect(res.status).toBe(200);
      expect(await res.text()).toBe("ok");
      expect(hub.snapshot().hooks_mode).toBe("absent");
    });
  });

  describe("GET /ws", () => {
    it("should acknowledge a device and relay renders", async () => {
      const client = await TestClient.connect(address);
      const ack = await client.waitFor((m) => m["type"] === "hello_ack");
      expect(ack).toEqual({ type: "hello_ack", protocol_version: 1, daemon_version: "0.1.0" });

      client.send({
        type: "hello",
        client_kind: "vscode",
        protocol_version: 1,
        client_version: "0.3.0",
        capabilities: ["send_text"],
      });
      const render = await client.waitFor(
        (m) =>
          m["type"] === "render" &&
          JSON.stringify(m["connections"]) === JSON.stringify({ logi: false, vscode: true })
      );
      expect(render["page_name"]).toBe("core");
      expect(server.connectionCount).toBe(1);

      await client.close();
    });

    it("should relay hook-driven renders to a connected device", async () => {
      const client = await TestClient.connect(address);
      await client.waitFor((m) => m["type"] === "hello_ack");

      await fetch(`${base}/hook`, {
        method: "POST",
        body: JSON.stringify({ hook: "Notification", matcher: "permission_prompt", session_id: "s1" }),
      });
      const render = await client.waitFor(
        (m) => m["type"] === "render" && m["agent_state"] === "waiting_permission"
      );
      expect(render["hooks_mode"]).toBe("active");

      await client.close();
    });

    it("should keep the socket open after a malformed frame", async () => {
      const client = await TestClient.connect(address);
      await client.waitFor((m) => m["type"] === "hello_ack");

      client.send("not json at all");
      client.send({ type: "page_nav", direction: "prev" });
      const render = await client.waitFor((m) => m["type"] === "render" && m["page_index"] === 2);
      expect(render["page_name"]).toBe("misc");
      expect(client.socket.readyState).toBe(WebSocket.OPEN);

      await client.close();
    });

    it("should mark a device disconnected when its socket closes", async () => {
      const client = await TestClient.connect(address);
      client.send({ type: "hello", client_kind: "logi", protocol_version: 1 });
      await client.waitFor((m) => m["type"] === "notice");
      expect(hub.snapshot().connections.logi).toBe(true);

      await client.close();
      const deadline = Date.now() + 2000;
      while (hub.snapshot().connections.logi && Date.now() < deadline) {
        await new Promise((resolve) => setTimeout(resolve, 10));
      }
      expect(hub.snapshot().connections.logi).toBe(false);
    });

    it("should reject upgrades on other paths", async () => {
      await expect(TestClient.connect(address, "/elsewhere")).rejects.toBeInstanceOf(Error);
    });
  });
});
