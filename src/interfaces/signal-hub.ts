/**
 * @module interfaces/signal-hub
 * @description ISignalHub — the type-keyed registry of singleton signals.
 */

import type { SignalId } from "../types/branded.js";
import type { ISignal, SignalConstructor } from "./signal.js";

/**
 * Options for a {@link ISignalHub} implementation.
 */
export interface SignalHubConfig {
  /** Name reported in hub events and diagnostics. Default: "hub" */
  name?: string;
}

/**
 * @interface ISignalHub
 * @description Produces exactly one instance per signal type, on demand.
 *
 * No concurrency control is provided: callers confine access to one
 * scheduling context.
 */
export interface ISignalHub {
  /** Name given at construction. */
  readonly name: string;

  /**
   * @query
   * @description Number of distinct signal types currently cached.
   */
  readonly count: number;

  /**
   * @command
   * @description Returns the cached instance of `type`, constructing and
   * caching it on first access.
   *
   * @postcondition Emits SIGNAL_BOUND when a new instance was created.
   * @throws {SignalError} code=NOT_CONSTRUCTIBLE if `type` needs constructor
   *   arguments or its constructor throws.
   * @throws {SignalError} code=INVALID_SIGNAL_TYPE if the instance does not
   *   satisfy the signal capability contract.
   */
  get<T extends ISignal>(type: SignalConstructor<T>): T;

  /**
   * @command
   * @description Untyped lookup for callers that only hold a class
   * reference at runtime (plugin tables, editor tooling). Same caching and
   * failure modes as {@link ISignalHub.get}.
   */
  resolve(type: unknown): ISignal;

  /**
   * @query
   * @description Whether an instance of `type` is cached.
   */
  has(type: unknown): boolean;

  /**
   * @query
   * @description Ids of the cached signals, in binding order.
   */
  ids(): SignalId[];

  /**
   * @command
   * @description Drops every cached instance. Instances keep their own
   * state; anyone still holding one should fetch a fresh one.
   *
   * @postcondition Emits HUB_CLEARED.
   */
  clear(): void;
}
