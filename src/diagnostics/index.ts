/**
 * @module diagnostics
 * @description Dispatch observation hooks.
 */

export {
  setDispatchObserver,
  getDispatchObserver,
  isObserving,
  notifyDispatch,
  captureCallSite,
} from "./dispatch-observer.js";
export type { DispatchObserver } from "./dispatch-observer.js";
export { createConsoleTracer } from "./console-tracer.js";
export type { ConsoleTracerOptions } from "./console-tracer.js";
