/**
 * @module types/events
 * @description Event catalog for the signal hub's lifecycle.
 *
 * These are emitted by the registry itself, not by signals, so tooling can
 * watch which signal types get bound without hooking into every lookup.
 */

import type { SignalId, UnixTimestamp } from "./branded.js";

/** Emitted when a lookup constructs and caches a new signal instance. */
export interface SignalBoundEvent {
  readonly type: "SIGNAL_BOUND";
  readonly hub: string;
  readonly signalId: SignalId;
  /** Registry size after binding. */
  readonly count: number;
  readonly timestamp: UnixTimestamp;
}

/** Emitted when the registry drops all cached instances. */
export interface HubClearedEvent {
  readonly type: "HUB_CLEARED";
  readonly hub: string;
  readonly cleared: number;
  readonly timestamp: UnixTimestamp;
}

/** Union of all hub events. */
export type HubEvent = SignalBoundEvent | HubClearedEvent;

/**
 * Extract the event type string literal from a HubEvent.
 */
export type HubEventType = HubEvent["type"];

/**
 * Map from event type string to the corresponding event interface.
 */
export type HubEventMap = {
  SIGNAL_BOUND: SignalBoundEvent;
  HUB_CLEARED: HubClearedEvent;
};
