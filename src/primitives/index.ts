/**
 * @module primitives
 * @description The state and reducer engine, the render projector and
 * the broadcast hub with its concurrency primitives.
 */

export { DaemonEmitter } from "./base-emitter.js";
export { DaemonState } from "./session-store.js";
export {
  reduce,
  DEFAULT_SESSION_ID,
  EXPORT_COMMAND,
  POLICY_BLOCK_HOOK,
} from "./reducer.js";
export {
  buildRenderModel,
  EMPTY_SLOT_ID,
  EMPTY_SLOT_LABEL,
  UNRESOLVED_LABEL,
} from "./render.js";
export {
  FanoutChannel,
  Subscription,
  DEFAULT_CHANNEL_CAPACITY,
} from "./fanout-channel.js";
export { StateLock } from "./state-lock.js";
export { BroadcastHub } from "./broadcast-hub.js";
export type { BroadcastHubOptions } from "./broadcast-hub.js";
