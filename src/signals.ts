/**
 * @module signals
 * @description Process-wide default hub and shortcuts onto it.
 *
 * Prefer passing a {@link SignalHub} to the code that needs one; these
 * helpers exist for scripts and small tools where a single global scope
 * is all there is.
 */

import { SignalHub } from "./primitives/signal-hub.js";
import type { ISignal, SignalConstructor } from "./interfaces/signal.js";
import { setDispatchObserver } from "./diagnostics/dispatch-observer.js";

export const defaultHub = new SignalHub({ name: "default" });

/** `defaultHub.get(type)` */
export function getSignal<T extends ISignal>(type: SignalConstructor<T>): T {
  return defaultHub.get(type);
}

/** Number of signal types bound in the default hub. */
export function signalCount(): number {
  return defaultHub.count;
}

/**
 * Empty the default hub and remove the dispatch observer.
 */
export function clearSignals(): void {
  defaultHub.clear();
  setDispatchObserver(null);
}
