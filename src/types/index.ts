/**
 * @module types
 * @description Public type exports for the signal hub.
 */

export * from "./branded.js";
export * from "./signal.js";
export * from "./events.js";
