/**
 * @module primitives/base-emitter
 * @description Base implementation of the typed event emitter.
 * The broadcast hub extends this to publish its observability events.
 */

import type {
  IDaemonEmitter,
  EventListener,
} from "../interfaces/event-emitter.js";
import type { HubEventMap, HubEventType } from "../types/events.js";

/**
 * Typed emitter over a Map of listener Sets. Listeners run synchronously
 * in registration order; a listener added during an emit waits for the
 * next one.
 */
export class DaemonEmitter implements IDaemonEmitter {
  private readonly listeners = new Map<
    HubEventType,
    Set<EventListener<HubEventType>>
  >();

  on<T extends HubEventType>(eventType: T, listener: EventListener<T>): () => void {
    let set = this.listeners.get(eventType);
    if (!set) {
      set = new Set();
      this.listeners.set(eventType, set);
    }
    set.add(listener as EventListener<HubEventType>);
    return () => this.off(eventType, listener);
  }

  once<T extends HubEventType>(eventType: T, listener: EventListener<T>): void {
    const wrapper: EventListener<T> = (event) => {
      this.off(eventType, wrapper);
      listener(event);
    };
    this.on(eventType, wrapper);
  }

  off<T extends HubEventType>(eventType: T, listener: EventListener<T>): void {
    const set = this.listeners.get(eventType);
    if (set) {
      set.delete(listener as EventListener<HubEventType>);
      if (set.size === 0) {
        this.listeners.delete(eventType);
      }
    }
  }

  emit<T extends HubEventType>(event: HubEventMap[T]): void {
    const set = this.listeners.get(event.type);
    if (set) {
      for (const listener of [...set]) {
        listener(event);
      }
    }
  }
}
