import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { BroadcastHub } from "../src/primitives/broadcast-hub.js";
import type {
  ConnectionContext,
  DeviceConnection,
} from "../src/interfaces/broadcast-hub.js";
import { makeConfig } from "./helpers.js";

/** In-process stand-in for a device socket. */
class FakeConnection implements DeviceConnection {
  readonly frames: string[] = [];
  closed = false;
  sendImpl: (text: string) => Promise<void> = async (text) => {
    this.frames.push(text);
  };
  private readonly inbox: string[] = [];
  private wake: (() => void) | null = null;

  constructor(readonly id: string) {}

  send(text: string): Promise<void> {
    if (this.closed) return Promise.reject(new Error("closed"));
    return this.sendImpl(text);
  }

  receive(msg: object | string): void {
    this.inbox.push(typeof msg === "string" ? msg : JSON.stringify(msg));
    this.poke();
  }

  async *messages(): AsyncIterable<string> {
    for (;;) {
      const next = this.inbox.shift();
      if (next !== undefined) {
        yield next;
        continue;
      }
      if (this.closed) return;
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }

  close(): void {
    this.closed = true;
    this.poke();
  }

  /** Parsed outbound frames. */
  get received(): Array<Record<string, unknown>> {
    return this.frames.map((f) => JSON.parse(f) as Record<string, unknown>);
  }

  get types(): unknown[] {
    return this.received.map((m) => m["type"]);
  }

  private poke(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}

const hello = (kind: string, protocolVersion = 1) => ({
  type: "hello",
  client_kind: kind,
  protocol_version: protocolVersion,
  client_version: "1.0.0",
  capabilities: [],
});

function quietContext(id = "test"): ConnectionContext {
  return { id, kind: null, reply: async () => undefined };
}

describe("BroadcastHub", () => {
  let hub: BroadcastHub;

  beforeEach(() => {
    hub = new BroadcastHub(makeConfig());
  });

  afterEach(() => {
    hub.close();
  });

  describe("attach()", () => {
    it("should acknowledge, then relay the hello's renders and notice", async () => {
      const conn = new FakeConnection("a");
      const session = hub.attach(conn);
      conn.receive(hello("logi"));

      await vi.waitFor(() => expect(conn.types).toHaveLength(4));
      expect(conn.types).toEqual(["hello_ack", "render", "notice", "render"]);
      expect(conn.received[0]).toEqual({
        type: "hello_ack",
        protocol_version: 1,
        daemon_version: "0.1.0",
      });
      expect(conn.received[2]).toEqual({
        type: "notice",
        message: "client connected: logi v1.0.0 (protocol 1)",
      });
      expect(conn.received[3]).toMatchObject({
        type: "render",
        connections: { logi: true, vscode: false },
      });

      conn.close();
      await session;
      expect(hub.subscriberCount).toBe(0);
    });

    it("should give every device the same ordered stream", async () => {
      const a = new FakeConnection("a");
      const b = new FakeConnection("b");
      const sessions = [hub.attach(a), hub.attach(b)];
      await vi.waitFor(() => expect(hub.subscriberCount).toBe(2));
      a.receive(hello("logi"));
      b.receive(hello("vscode"));
      await vi.waitFor(() => {
        expect(a.types).toHaveLength(7);
        expect(b.types).toHaveLength(7);
      });

      const [fromA, fromB] = [a.frames.length, b.frames.length];
      a.receive({ type: "keypad_press", prompt_id: "prep_pr" });
      a.receive({ type: "dialpad_button_press", button: "enter" });

      await vi.waitFor(() => {
        expect(a.frames.length).toBe(fromA + 3);
        expect(b.frames.length).toBe(fromB + 3);
      });
      expect(a.frames.slice(fromA)).toEqual(b.frames.slice(fromB));
      expect(b.received.slice(fromB).map((m) => m["type"])).toEqual([
        "render",
        "vscode_command",
        "render",
      ]);
      expect(b.received[fromB + 1]).toEqual({
        type: "vscode_command",
        kind: "send_text",
        target: "active_assistant",
        payload: { text: "/runbook:prep-pr", add_newline: true },
      });

      a.close();
      b.close();
      await Promise.all(sessions);
    });

    it("should drop a malformed frame and keep the connection open", async () => {
      const rejected = vi.fn();
      hub.on("MESSAGE_REJECTED", rejected);
      const conn = new FakeConnection("a");
      const session = hub.attach(conn);

      conn.receive("{nope");
      conn.receive({ type: "page_nav", direction: "next" });
      await vi.waitFor(() => expect(hub.snapshot().page_index).toBe(1));

      expect(rejected).toHaveBeenCalledOnce();
      expect(rejected.mock.calls[0]?.[0]).toMatchObject({
        type: "MESSAGE_REJECTED",
        connectionId: "a",
      });
      expect(String(rejected.mock.calls[0]?.[0].reason)).toMatch(/^Frame is not valid JSON/);
      expect(conn.closed).toBe(false);

      conn.close();
      await session;
    });

    it("should broadcast a protocol mismatch notice to every device", async () => {
      const a = new FakeConnection("a");
      const b = new FakeConnection("b");
      const sessions = [hub.attach(a), hub.attach(b)];
      await vi.waitFor(() => expect(hub.subscriberCount).toBe(2));

      a.receive(hello("logi", 9));
      await vi.waitFor(() => expect(a.types).toHaveLength(5));
      await vi.waitFor(() => expect(b.types).toHaveLength(5));

      expect(a.types).toEqual(["hello_ack", "notice", "render", "notice", "render"]);
      expect(b.received).toEqual(a.received);
      expect(a.received[1]).toEqual({
        type: "notice",
        message: "protocol mismatch: logi client speaks v9, daemon speaks v1",
      });

      a.close();
      b.close();
      await Promise.all(sessions);
    });

    it("should count liveness per kind until the last device leaves", async () => {
      const detached = vi.fn();
      hub.on("CLIENT_DETACHED", detached);
      const a = new FakeConnection("a");
      const b = new FakeConnection("b");
      const sessionA = hub.attach(a);
      const sessionB = hub.attach(b);
      await vi.waitFor(() => expect(hub.subscriberCount).toBe(2));
      a.receive(hello("logi"));
      b.receive(hello("logi"));
      await vi.waitFor(() => expect(b.types).toContain("notice"));
      await vi.waitFor(() => expect(a.types.filter((t) => t === "notice")).toHaveLength(2));
      expect(hub.snapshot().connections.logi).toBe(true);

      a.close();
      await sessionA;
      expect(hub.snapshot().connections.logi).toBe(true);

      b.close();
      await sessionB;
      expect(hub.snapshot().connections.logi).toBe(false);
      expect(detached).toHaveBeenCalledTimes(2);
      expect(detached.mock.calls[1]?.[0]).toMatchObject({ connectionId: "b", kind: "logi" });
    });

    it("should not track liveness for hook clients", async () => {
      const conn = new FakeConnection("h");
      const session = hub.attach(conn);
      conn.receive(hello("hooks"));
      await vi.waitFor(() => expect(conn.types).toContain("render"));
      expect(hub.snapshot().connections).toEqual({ logi: false, vscode: false });
      conn.close();
      await session;
    });

    it("should close a device whose sends fail", async () => {
      const conn = new FakeConnection("a");
      conn.sendImpl = () => Promise.reject(new Error("socket gone"));
      const session = hub.attach(conn);
      await vi.waitFor(() => expect(hub.subscriberCount).toBe(1));

      hub.publishRender();
      await session;
      expect(conn.closed).toBe(true);
      expect(hub.subscriberCount).toBe(0);
    });

    it("should close a device whose read loop fails", async () => {
      class BrokenConnection extends FakeConnection {
        override async *messages(): AsyncIterable<string> {
          yield JSON.stringify(hello("logi"));
          throw new Error("socket reset");
        }
      }
      const conn = new BrokenConnection("broken");

      await hub.attach(conn);

      expect(conn.closed).toBe(true);
      expect(hub.subscriberCount).toBe(0);
      expect(hub.snapshot().connections.logi).toBe(false);
    });

    it("should report a lagging device", async () => {
      hub = new BroadcastHub(makeConfig(), { capacity: 2 });
      const lagged = vi.fn();
      hub.on("SUBSCRIBER_LAGGED", lagged);

      const conn = new FakeConnection("slow");
      const session = hub.attach(conn);
      await vi.waitFor(() => expect(conn.types).toEqual(["hello_ack"]));
      // Let the relay reach its first wait.
      await new Promise((resolve) => setTimeout(resolve, 0));

      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      conn.sendImpl = async (text) => {
        await gate;
        conn.frames.push(text);
      };

      for (let i = 0; i < 5; i++) {
        hub.publishRender();
      }
      release();

      await vi.waitFor(() => expect(lagged).toHaveBeenCalledOnce());
      expect(lagged.mock.calls[0]?.[0]).toMatchObject({ connectionId: "slow", skipped: 2 });
      await vi.waitFor(() => expect(conn.frames).toHaveLength(4));

      conn.close();
      await session;
    });
  });

  describe("handleClientMessage()", () => {
    it("should dispatch a gate immediately without arming", async () => {
      const gate = vi.fn();
      const published = vi.fn();
      hub.on("GATE_TRIGGERED", gate);
      hub.on("COMMAND_PUBLISHED", published);

      await hub.handleClientMessage({ type: "keypad_press", prompt_id: "pr" }, quietContext());

      expect(gate.mock.calls[0]?.[0]).toMatchObject({
        gateId: "pr",
        action: "https://example.test/pr/1",
      });
      expect(published.mock.calls[0]?.[0].command).toEqual({
        kind: "open_uri",
        target: "active",
        payload: { uri: "https://example.test/pr/1" },
      });
      expect(await hub.inspect((s) => s.armed)).toBeNull();
    });

    it("should route a terminals snapshot into the session store", async () => {
      await hub.handleClientMessage(
        {
          type: "terminals_snapshot",
          terminals: [{ index: 2, name: "assistant", session_tag: "t1" }],
          active_index: 2,
        },
        quietContext()
      );
      expect(await hub.inspect((s) => s.selectedTerminalIndex)).toBe(2);
      expect(await hub.inspect((s) => [...s.terminalTagMap.entries()])).toEqual([[2, "t1"]]);
    });

    it("should route a hook event from a device", async () => {
      await hub.handleClientMessage(
        { type: "hook_event", hook: "PermissionRequest", session_id: "s1" },
        quietContext()
      );
      expect(hub.snapshot().agent_state).toBe("waiting_permission");
    });
  });

  describe("apply()", () => {
    it("should return and execute the reducer's effects", async () => {
      const renders = vi.fn();
      const commands = vi.fn();
      hub.on("RENDER_PUBLISHED", renders);
      hub.on("COMMAND_PUBLISHED", commands);

      await hub.apply({ type: "KEYPAD_PRESS", promptId: "review" });
      const effects = await hub.apply({ type: "DIALPAD_BUTTON", button: "enter" });

      expect(effects.map((e) => e.type)).toEqual(["SEND_COMMAND", "BROADCAST_RENDER"]);
      expect(renders).toHaveBeenCalledTimes(2);
      expect(commands).toHaveBeenCalledOnce();
      expect(renders.mock.calls[1]?.[0].model.last_dispatched).toBe("review");
    });
  });

  describe("handleHookBody()", () => {
    it("should apply a valid body", async () => {
      await hub.handleHookBody(JSON.stringify({ hook: "UserPromptSubmit", session_id: "s1" }));
      const model = hub.snapshot();
      expect(model.agent_state).toBe("running");
      expect(model.hooks_mode).toBe("active");
      expect(model.active_session).toBe("s1");
    });

    it("should drop a malformed body without throwing", async () => {
      const rejected = vi.fn();
      hub.on("MESSAGE_REJECTED", rejected);
      await expect(hub.handleHookBody("not json")).resolves.toBeUndefined();
      await hub.handleHookBody(JSON.stringify({ matcher: "idle_prompt" }));
      expect(rejected).toHaveBeenCalledTimes(2);
      expect(rejected.mock.calls[0]?.[0]).toMatchObject({ connectionId: null });
      expect(hub.snapshot().hooks_mode).toBe("absent");
    });
  });

  describe("handleHookNotification()", () => {
    it("should mark a policy block and announce it", async () => {
      const conn = new FakeConnection("a");
      const session = hub.attach(conn);
      await vi.waitFor(() => expect(hub.subscriberCount).toBe(1));

      await hub.handleHookNotification({
        hook: "PolicyBlock",
        session_id: "s1",
        payload: { tool_name: "Bash", tool_input: { command: "rm -rf build" } },
      });

      await vi.waitFor(() => expect(conn.types).toEqual(["hello_ack", "render", "notice"]));
      expect(conn.received[1]).toMatchObject({ agent_state: "blocked", last_tool: "Bash" });
      expect(conn.received[2]).toEqual({
        type: "notice",
        message: "Blocked by local policy: rm -rf build",
      });

      conn.close();
      await session;
    });
  });
});
