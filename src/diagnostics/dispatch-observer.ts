/**
 * @module diagnostics/dispatch-observer
 * @description Process-wide, nullable hook invoked around every dispatch.
 *
 * The observer is a side channel: it sees each signal and the call site
 * that drove it, and nothing it does (including throwing) changes which
 * listeners run. Call sites are only captured while an observer is
 * installed, so an idle hook costs one null check per dispatch.
 */

import type { ISignal } from "../interfaces/signal.js";
import type { DispatchContext } from "../types/signal.js";

/**
 * Callback receiving every dispatch start and end.
 */
export type DispatchObserver = (signal: ISignal, context: DispatchContext) => void;

let observer: DispatchObserver | null = null;

/**
 * Install `next` as the process-wide observer, or remove it with `null`.
 */
export function setDispatchObserver(next: DispatchObserver | null): void {
  observer = next;
}

export function getDispatchObserver(): DispatchObserver | null {
  return observer;
}

export function isObserving(): boolean {
  return observer !== null;
}

/**
 * Forward a dispatch phase to the observer, if any. Observer failures are
 * reported through `console.warn` and never reach the dispatch caller.
 */
export function notifyDispatch(signal: ISignal, context: DispatchContext): void {
  if (observer === null) return;
  try {
    observer(signal, context);
  } catch (error) {
    console.warn(`Dispatch observer failed on ${context.phase} of ${signal.id}:`, error);
  }
}

/**
 * First stack frame above `boundary`, without the leading `at `.
 * `boundary` is the public method the caller invoked.
 */
export function captureCallSite(boundary: Function): string | undefined {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, boundary);
  const frame = holder.stack?.split("\n")[1];
  return frame?.trim().replace(/^at\s+/, "");
}
