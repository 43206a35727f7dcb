/**
 * @module primitives/signal-hub
 * @description SignalHub — the type-keyed cache of singleton signals.
 *
 * Hubs are plain objects: construct one per scope (a game session, a test,
 * an editor document) and hand it to whatever needs signals. The
 * process-wide default in `signals.ts` is a convenience, not the only way in.
 */

import { HubEmitter } from "./base-emitter.js";
import type { ISignalHub, SignalHubConfig } from "../interfaces/signal-hub.js";
import type { ISignal, SignalConstructor } from "../interfaces/signal.js";
import { SignalError, isSignal } from "../interfaces/signal.js";
import { now } from "../types/branded.js";
import type { SignalId } from "../types/branded.js";

const DEFAULT_HUB_NAME = "hub";

/**
 * @example
 * ```ts
 * class PlayerDied extends Signal<[playerId: string]> {}
 *
 * const hub = new SignalHub({ name: "match" });
 * hub.get(PlayerDied).addListener((id) => scoreboard.markDead(id));
 * hub.get(PlayerDied).dispatch("p1");
 * ```
 */
export class SignalHub extends HubEmitter implements ISignalHub {
  readonly name: string;

  /** Keyed by class object: two classes sharing a name stay distinct. */
  private readonly signals = new Map<Function, ISignal>();

  constructor(config: SignalHubConfig = {}) {
    super();
    this.name = config.name ?? DEFAULT_HUB_NAME;
  }

  get count(): number {
    return this.signals.size;
  }

  get<T extends ISignal>(type: SignalConstructor<T>): T {
    const signal = this.resolve(type);
    if (!(signal instanceof type)) {
      throw new SignalError(
        `${type.name} is bound to an instance of another class`,
        "INVALID_SIGNAL_TYPE"
      );
    }
    return signal;
  }

  resolve(type: unknown): ISignal {
    if (typeof type !== "function") {
      throw new SignalError(
        `Signal type must be a class, got ${type === null ? "null" : typeof type}`,
        "NOT_CONSTRUCTIBLE"
      );
    }

    const cached = this.signals.get(type);
    if (cached !== undefined) {
      return cached;
    }
    return this.bind(type);
  }

  has(type: unknown): boolean {
    return typeof type === "function" && this.signals.has(type);
  }

  ids(): SignalId[] {
    return Array.from(this.signals.values(), (signal) => signal.id);
  }

  clear(): void {
    const cleared = this.signals.size;
    this.signals.clear();
    this.emit({
      type: "HUB_CLEARED",
      hub: this.name,
      cleared,
      timestamp: now(),
    });
  }

  toString(): string {
    return `SignalHub ${this.name}: ${this.signals.size} Signals`;
  }

  private bind(type: Function): ISignal {
    let instance: unknown;
    try {
      instance = Reflect.construct(type, []);
    } catch (error) {
      throw new SignalError(
        `Could not construct signal ${describeType(type)} without arguments`,
        "NOT_CONSTRUCTIBLE",
        { cause: error }
      );
    }

    if (!(instance instanceof type)) {
      throw new SignalError(
        `Constructor of ${describeType(type)} returned a foreign object`,
        "INVALID_SIGNAL_TYPE"
      );
    }
    if (!isSignal(instance)) {
      throw new SignalError(
        `${describeType(type)} does not implement the signal contract ` +
          `(id, listenerCount, state, invoke, pause, continue, consume)`,
        "INVALID_SIGNAL_TYPE"
      );
    }

    this.signals.set(type, instance);
    this.emit({
      type: "SIGNAL_BOUND",
      hub: this.name,
      signalId: instance.id,
      count: this.signals.size,
      timestamp: now(),
    });
    return instance;
  }
}

function describeType(type: Function): string {
  return type.name.length > 0 ? type.name : "<anonymous>";
}
