/**
 * @module interfaces/event-emitter
 * @description Contract for the registry's lifecycle channel.
 *
 * Separate from signals on purpose: hub events describe the registry
 * (a type got bound, the cache was emptied), never a game or app event,
 * and they are not subject to pause or consume.
 */

import type { HubEventMap, HubEventType } from "../types/events.js";

/** Receives the payload matching `T` from {@link HubEventMap}. */
export type EventListener<T extends HubEventType> = (
  event: HubEventMap[T]
) => void;

/**
 * @interface IHubEmitter
 * @description Typed on/once/off/emit over {@link HubEventMap}.
 * Delivery is synchronous and in registration order.
 */
export interface IHubEmitter {
  /** Registering the same listener twice for one type keeps a single entry. */
  on<T extends HubEventType>(eventType: T, listener: EventListener<T>): void;

  /** Unregistered before it runs, so it fires at most once. */
  once<T extends HubEventType>(eventType: T, listener: EventListener<T>): void;

  off<T extends HubEventType>(eventType: T, listener: EventListener<T>): void;

  /**
   * @command
   * @description Deliver `event` to the listeners of `event.type`. A
   * listener added during delivery waits for the next event.
   */
  emit<T extends HubEventType>(event: HubEventMap[T]): void;
}
