/**
 * @module signal-hub
 * @description Type-keyed, synchronous multicast signals.
 *
 * Exports the dispatch core, the generic Signal container, the SignalHub
 * registry, the process-wide default hub, diagnostics hooks, and every
 * public type and interface.
 *
 * @version 0.1.0
 * @license MIT
 */

// ─── Types ──────────────────────────────────────────────────────────
export * from "./types/index.js";

// ─── Interfaces ─────────────────────────────────────────────────────
export * from "./interfaces/index.js";

// ─── Primitives ─────────────────────────────────────────────────────
export * from "./primitives/index.js";

// ─── Diagnostics ────────────────────────────────────────────────────
export * from "./diagnostics/index.js";

// ─── Default Hub ────────────────────────────────────────────────────
export { defaultHub, getSignal, signalCount, clearSignals } from "./signals.js";
