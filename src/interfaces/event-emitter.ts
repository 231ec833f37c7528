/**
 * @module interfaces/event-emitter
 * @description Typed event emitter interface for the hub's event catalog.
 *
 * The event map ensures that listeners receive correctly-typed payloads
 * without runtime type checking.
 */

import type { HubEventMap, HubEventType } from "../types/events.js";

/**
 * Listener function signature for a specific event type.
 */
export type EventListener<T extends HubEventType> = (
  event: HubEventMap[T]
) => void;

/**
 * @interface IDaemonEmitter
 * @description Typed emitter for hub events.
 * Provides compile-time safety for event names and payload types.
 */
export interface IDaemonEmitter {
  /**
   * Register a listener for a specific event type.
   * @returns A function that removes the listener.
   */
  on<T extends HubEventType>(eventType: T, listener: EventListener<T>): () => void;

  /**
   * Register a one-time listener that auto-removes after first invocation.
   */
  once<T extends HubEventType>(eventType: T, listener: EventListener<T>): void;

  /**
   * Remove a previously registered listener.
   */
  off<T extends HubEventType>(eventType: T, listener: EventListener<T>): void;

  /**
   * Emit an event, invoking all registered listeners synchronously.
   */
  emit<T extends HubEventType>(event: HubEventMap[T]): void;
}
