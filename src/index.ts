/**
 * @module padlink
 * @description Coordination daemon for a macro keypad, an AI coding
 * assistant's lifecycle hooks and an editor's terminals.
 *
 * Exports the state and reducer engine, the render projector, the
 * broadcast hub, the wire codec, the config loader, the device server
 * and the hook CLI.
 */

// ─── Types ──────────────────────────────────────────────────────────
export * from "./types/index.js";

// ─── Interfaces ─────────────────────────────────────────────────────
export * from "./interfaces/index.js";

// ─── Primitives ─────────────────────────────────────────────────────
export * from "./primitives/index.js";

// ─── Wire Codec ─────────────────────────────────────────────────────
export * from "./codec/index.js";
export { protocolJsonSchemas, writeProtocolSchemas } from "./codec/json-schema.js";
export type { ProtocolSchemaFile } from "./codec/json-schema.js";

// ─── Configuration ──────────────────────────────────────────────────
export * from "./config/index.js";

// ─── Transports ─────────────────────────────────────────────────────
export * from "./transports/index.js";

// ─── Hook CLI ───────────────────────────────────────────────────────
export * from "./hooks/index.js";

// ─── Bootstrap ──────────────────────────────────────────────────────
export { createLogger, silentLogger } from "./logger.js";
export type { Logger, LoggerOptions } from "./logger.js";
export { startDaemon, parseDaemonArgs } from "./daemon.js";
export type { DaemonOptions, RunningDaemon } from "./daemon.js";
