/**
 * @module primitives
 * @description The dispatch core, the generic signal container, the
 * registry and its event emitter.
 */

export { HubEmitter } from "./base-emitter.js";
export { DispatchCore } from "./dispatch-core.js";
export { Signal } from "./signal.js";
export { SignalHub } from "./signal-hub.js";
