import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  OutboundMessageSchema,
  RenderModelSchema,
  commandMessage,
  helloAck,
  notice,
  openUri,
  renderMessage,
  sendText,
} from "../src/codec/index.js";
import { protocolJsonSchemas, writeProtocolSchemas } from "../src/codec/json-schema.js";
import { buildRenderModel } from "../src/primitives/render.js";
import { reduce } from "../src/primitives/reducer.js";
import { DaemonState } from "../src/primitives/session-store.js";
import { toSessionId } from "../src/types/branded.js";
import { makeConfig } from "./helpers.js";

function busyModel() {
  const config = makeConfig();
  const state = new DaemonState(0);
  reduce(state, config, {
    type: "HOOK_EVENT",
    hook: "PreToolUse",
    matcher: null,
    sessionId: toSessionId("s1"),
    sessionTag: null,
    toolName: "Bash",
  });
  reduce(state, config, { type: "KEYPAD_PRESS", promptId: "prep_pr" });
  return buildRenderModel(state, config);
}

describe("RenderModelSchema", () => {
  it("should accept projected render models", () => {
    const config = makeConfig();
    expect(RenderModelSchema.safeParse(buildRenderModel(new DaemonState(0), config)).success).toBe(
      true
    );
    expect(RenderModelSchema.safeParse(busyModel()).success).toBe(true);
  });

  it("should reject an unknown agent state", () => {
    expect(RenderModelSchema.safeParse({ ...busyModel(), agent_state: "dreaming" }).success).toBe(
      false
    );
  });
});

describe("OutboundMessageSchema", () => {
  it("should accept every message the daemon builds", () => {
    const messages = [
      helloAck(),
      renderMessage(busyModel()),
      commandMessage(sendText("active_assistant", "hi", true)),
      commandMessage(openUri("active", "https://example.test")),
      notice("client connected"),
    ];
    for (const msg of messages) {
      expect(OutboundMessageSchema.safeParse(msg).success).toBe(true);
    }
  });
});

describe("protocolJsonSchemas()", () => {
  it("should describe every render model field as required", () => {
    const schema = protocolJsonSchemas()["render-model.schema.json"];
    const keys = Object.keys(busyModel()).sort();
    expect(schema).toMatchObject({
      title: "RenderModel (protocol v1)",
      type: "object",
      additionalProperties: false,
    });
    expect(Object.keys(Reflect.get(schema, "properties") ?? {}).sort()).toEqual(keys);
    expect([...(Reflect.get(schema, "required") ?? [])].sort()).toEqual(keys);
  });

  it("should list every inbound message type", () => {
    const schema = protocolJsonSchemas()["client-to-daemon.schema.json"];
    expect(JSON.stringify(schema)).toContain('"const":"terminals_snapshot"');
    expect(schema).toMatchObject({ title: "ClientToDaemon (protocol v1)" });
  });
});

describe("writeProtocolSchemas()", () => {
  let dir: string | null = null;

  afterEach(async () => {
    if (dir !== null) await rm(dir, { recursive: true, force: true });
    dir = null;
  });

  it("should write the three schema files", async () => {
    const out = await mkdtemp(join(tmpdir(), "padlink-schema-"));
    dir = out;
    const written = await writeProtocolSchemas(out);

    expect(written).toEqual([
      join(out, "client-to-daemon.schema.json"),
      join(out, "daemon-to-client.schema.json"),
      join(out, "render-model.schema.json"),
    ]);
    const render: unknown = JSON.parse(await readFile(join(out, "render-model.schema.json"), "utf8"));
    expect(render).toEqual(protocolJsonSchemas()["render-model.schema.json"]);
  });
});
