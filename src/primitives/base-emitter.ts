/**
 * @module primitives/base-emitter
 * @description Base implementation of the typed hub event emitter.
 * The registry extends this to publish its lifecycle events.
 */

import type { IHubEmitter, EventListener } from "../interfaces/event-emitter.js";
import type { HubEventMap, HubEventType } from "../types/events.js";

/**
 * Concrete typed event emitter for hub events.
 * Uses a Map of Sets for O(1) listener registration and removal.
 */
export class HubEmitter implements IHubEmitter {
  private readonly listeners = new Map<
    HubEventType,
    Set<EventListener<HubEventType>>
  >();

  on<T extends HubEventType>(eventType: T, listener: EventListener<T>): void {
    let set = this.listeners.get(eventType);
    if (!set) {
      set = new Set();
      this.listeners.set(eventType, set);
    }
    set.add(listener as EventListener<HubEventType>);
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
