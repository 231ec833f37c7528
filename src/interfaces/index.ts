/**
 * @module interfaces
 * @description Contracts and coded errors of the padlink daemon.
 */

export * from "./event-emitter.js";
export * from "./session-store.js";
export * from "./broadcast-hub.js";
export * from "./transport.js";
