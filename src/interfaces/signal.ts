/**
 * @module interfaces/signal
 * @description Capability contracts for dispatchable signals.
 *
 * The dispatch core only ever sees an {@link IDispatchTarget}: something
 * that can say how many listeners it has and invoke one by index. How the
 * listeners are stored, and what arguments they receive, is the concrete
 * signal's business.
 */

import type { SignalId } from "../types/branded.js";
import type { DispatchState } from "../types/signal.js";

/**
 * Errors raised by signal lookup and dispatch.
 */
export class SignalError extends Error {
  constructor(
    message: string,
    public readonly code:
      | "NOT_CONSTRUCTIBLE"
      | "INVALID_SIGNAL_TYPE"
      | "DISPATCH_IN_PROGRESS"
      | "NOT_DISPATCHING",
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "SignalError";
  }
}

/**
 * @interface IDispatchTarget
 * @description The listener storage a dispatch core iterates over.
 */
export interface IDispatchTarget {
  /**
   * Number of registered listeners. Must be stable between reads unless a
   * registration operation occurs.
   */
  readonly listenerCount: number;

  /**
   * Invoke the listener at `index` with the payload of the dispatch in flight.
   */
  invoke(index: number): void;
}

/**
 * @interface IDispatchControl
 * @description Controls listener code may call back into during a dispatch.
 */
export interface IDispatchControl {
  /** Current dispatch state. */
  readonly state: DispatchState;

  /**
   * @command
   * @description Suspend the dispatch after the current listener returns.
   * No-op unless RUNNING.
   */
  pause(): void;

  /**
   * @command
   * @description Resume a paused dispatch at the listener after the one
   * that paused. No-op unless PAUSED.
   */
  continue(): void;

  /**
   * @command
   * @description Abort the dispatch after the current listener returns.
   * Remaining listeners are skipped and the instance stays CONSUMED.
   * No-op unless RUNNING.
   */
  consume(): void;
}

/**
 * @interface ISignal
 * @description What a registry hands out: an identified, dispatchable
 * listener container with dispatch controls.
 */
export interface ISignal extends IDispatchTarget, IDispatchControl {
  /** Stable identifier derived from the signal's class. */
  readonly id: SignalId;
}

/**
 * A signal class the registry can instantiate: no required constructor
 * arguments.
 */
export type SignalConstructor<T extends ISignal = ISignal> = new () => T;

/**
 * Runtime check of the {@link ISignal} capability contract.
 */
export function isSignal(value: unknown): value is ISignal {
  if (typeof value !== "object" || value === null) return false;
  return (
    "id" in value &&
    typeof value.id === "string" &&
    "listenerCount" in value &&
    typeof value.listenerCount === "number" &&
    "state" in value &&
    typeof value.state === "string" &&
    "invoke" in value &&
    typeof value.invoke === "function" &&
    "pause" in value &&
    typeof value.pause === "function" &&
    "continue" in value &&
    typeof value.continue === "function" &&
    "consume" in value &&
    typeof value.consume === "function"
  );
}
