/**
 * @module interfaces
 * @description Public interface exports for the signal hub.
 */

export * from "./event-emitter.js";
export * from "./signal.js";
export * from "./signal-hub.js";
