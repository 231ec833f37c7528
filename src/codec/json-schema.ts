/**
 * @module codec/json-schema
 * @description JSON Schema export of the wire protocol, for device and
 * extension authors working outside TypeScript.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { ZodTypeAny } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import {
  InboundMessageSchema,
  OutboundMessageSchema,
  PROTOCOL_VERSION,
  RenderModelSchema,
} from "./index.js";

export type ProtocolSchemaFile =
  | "client-to-daemon.schema.json"
  | "daemon-to-client.schema.json"
  | "render-model.schema.json";

/** Every protocol schema, keyed by the file name it is written under. */
export function protocolJsonSchemas(): Record<ProtocolSchemaFile, object> {
  const convert = (schema: ZodTypeAny, title: string) => ({
    title: `${title} (protocol v${PROTOCOL_VERSION})`,
    ...zodToJsonSchema(schema, { $refStrategy: "none", target: "jsonSchema7" }),
  });
  return {
    "client-to-daemon.schema.json": convert(InboundMessageSchema, "ClientToDaemon"),
    "daemon-to-client.schema.json": convert(OutboundMessageSchema, "DaemonToClient"),
    "render-model.schema.json": convert(RenderModelSchema, "RenderModel"),
  };
}

/**
 * Write every schema into `dir`, creating it if needed.
 * @returns The paths written.
 */
export async function writeProtocolSchemas(dir: string): Promise<string[]> {
  await mkdir(dir, { recursive: true });
  const written: string[] = [];
  for (const [file, schema] of Object.entries(protocolJsonSchemas())) {
    const path = join(dir, file);
    await writeFile(path, `${JSON.stringify(schema, null, 2)}\n`, "utf8");
    written.push(path);
  }
  return written;
}
