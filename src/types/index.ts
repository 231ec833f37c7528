/**
 * @module types
 * @description Public type exports for the padlink daemon.
 */

export * from "./branded.js";
export * from "./state.js";
export * from "./config.js";
export * from "./protocol.js";
export * from "./reducer.js";
export * from "./events.js";
