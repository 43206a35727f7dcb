/**
 * @module types/branded
 * @description Branded types for compile-time safety across the signal hub.
 *
 * A raw string can never be passed where a SignalId is expected; ids are
 * only minted from a signal's class via {@link toSignalId}.
 *
 * @example
 * ```ts
 * const raw = "ScoreChanged";
 * // Type error: string is not assignable to SignalId
 * const id: SignalId = raw;
 * // Correct:
 * const id: SignalId = toSignalId(ScoreChanged.name);
 * ```
 */

/** Unique symbol for branding. Not exported — internal only. */
declare const __brand: unique symbol;

/**
 * Generic branded type utility.
 * Intersects a base type with a phantom brand field that exists only
 * at the type level, never at runtime.
 */
export type Brand<T, B extends string> = T & { readonly [__brand]: B };

/**
 * Stable identifier of a signal type, derived from its class name.
 * Used for diagnostics and equality, never for dispatch logic.
 */
export type SignalId = Brand<string, "SignalId">;

/**
 * A Unix timestamp in milliseconds.
 */
export type UnixTimestamp = Brand<number, "UnixTimestamp">;

/**
 * Mint a SignalId from a class name. Anonymous classes get `"AnonymousSignal"`.
 */
export function toSignalId(name: string): SignalId {
  return (name.length > 0 ? name : "AnonymousSignal") as SignalId;
}

/** Current wall-clock time as a branded timestamp. */
export function now(): UnixTimestamp {
  return Date.now() as UnixTimestamp;
}
