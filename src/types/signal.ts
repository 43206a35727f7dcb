/**
 * @module types/signal
 * @description Dispatch state and listener shapes shared by the core,
 * the concrete signal container and the registry.
 */

// ─── Dispatch State ─────────────────────────────────────────────────

/**
 * Lifecycle of one dispatch.
 *
 * - `IDLE`: never dispatched, or the last dispatch ran to completion.
 * - `RUNNING`: the loop is invoking the listener at `currentIndex`.
 * - `PAUSED`: suspended after `currentIndex`; resumed by `continue()`.
 * - `CONSUMED`: aborted at `currentIndex`; stays so until the next dispatch.
 */
export type DispatchState = "IDLE" | "RUNNING" | "PAUSED" | "CONSUMED";

// ─── Listeners ──────────────────────────────────────────────────────

/**
 * Callback registered on a signal. `TArgs` is the signal's payload tuple.
 */
export type SignalListener<TArgs extends unknown[]> = (...args: TArgs) => void;

/**
 * Internal record of a registration. The same listener may appear more
 * than once; each registration is its own entry.
 */
export interface ListenerEntry<TArgs extends unknown[]> {
  readonly listener: SignalListener<TArgs>;
  readonly once: boolean;
}

// ─── Diagnostics ────────────────────────────────────────────────────

/** Which public call drove the dispatch loop. */
export type DispatchOperation = "dispatch" | "continue";

/**
 * Context handed to the dispatch observer on either side of a dispatch.
 */
export interface DispatchContext {
  readonly phase: "start" | "end";
  readonly operation: DispatchOperation;
  /**
   * First stack frame outside the library, e.g.
   * `"onPlayerHit (/game/src/combat.ts:42:7)"`. Absent when the runtime
   * gives no stack.
   */
  readonly callSite?: string;
  /** Set when a `dispatch()` discarded an unfinished PAUSED dispatch. */
  readonly overridden?: DispatchState;
  /** State the instance was left in. Only on `end`. */
  readonly outcome?: DispatchState;
}
