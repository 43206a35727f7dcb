/**
 * @module primitives/signal
 * @description Signal — a generic, ordered listener container driven by a
 * {@link DispatchCore}.
 *
 * One class covers every payload arity through its tuple type parameter.
 * Signal types are declared by subclassing, and the subclass is the key a
 * {@link SignalHub} looks instances up by.
 *
 * @example
 * ```ts
 * class ScoreChanged extends Signal<[score: number]> {}
 *
 * const scoreChanged = hub.get(ScoreChanged);
 * scoreChanged.addListener((score) => hud.setScore(score));
 * scoreChanged.dispatch(120);
 * ```
 */

import { DispatchCore } from "./dispatch-core.js";
import type { ISignal } from "../interfaces/signal.js";
import { SignalError } from "../interfaces/signal.js";
import { toSignalId } from "../types/branded.js";
import type { SignalId } from "../types/branded.js";
import type {
  DispatchState,
  ListenerEntry,
  SignalListener,
} from "../types/signal.js";

export class Signal<TArgs extends unknown[] = []> implements ISignal {
  readonly id: SignalId;

  private readonly entries: ListenerEntry<TArgs>[] = [];
  private readonly core: DispatchCore;
  /** Arguments of the dispatch in flight, kept for `continue()`. */
  private payload: TArgs | undefined;

  constructor() {
    this.id = toSignalId(new.target.name);
    this.core = new DispatchCore(this, this);
  }

  // ─── Queries ────────────────────────────────────────────────────

  get listenerCount(): number {
    return this.entries.length;
  }

  get state(): DispatchState {
    return this.core.state;
  }

  get currentIndex(): number {
    return this.core.currentIndex;
  }

  hasListener(listener: SignalListener<TArgs>): boolean {
    return this.entries.some((entry) => entry.listener === listener);
  }

  // ─── Registration ───────────────────────────────────────────────

  /**
   * Append `listener`. Registering the same function twice makes it run twice.
   * Appended during a dispatch, it still runs in that dispatch.
   */
  addListener(listener: SignalListener<TArgs>): void {
    this.insertEntry(this.entries.length, { listener, once: false });
  }

  /**
   * Append `listener` for a single invocation. It is unregistered right
   * before it runs.
   */
  addOnceListener(listener: SignalListener<TArgs>): void {
    this.insertEntry(this.entries.length, { listener, once: true });
  }

  /**
   * Insert `listener` at `index`, clamped to `[0, listenerCount]`; NaN
   * counts as 0. Inserted at or before the listener currently running, it
   * waits for the next dispatch.
   */
  insertListener(index: number, listener: SignalListener<TArgs>): void {
    const position = Number.isNaN(index) ? 0 : Math.trunc(index);
    const clamped = Math.max(0, Math.min(position, this.entries.length));
    this.insertEntry(clamped, { listener, once: false });
  }

  /**
   * Remove the first registration of `listener`.
   * @returns Whether a registration was removed.
   */
  removeListener(listener: SignalListener<TArgs>): boolean {
    const index = this.entries.findIndex((entry) => entry.listener === listener);
    if (index === -1) return false;
    this.removeEntry(index);
    return true;
  }

  /**
   * Remove every listener. Called mid-dispatch, the dispatch ends at the
   * next loop check.
   */
  clear(): void {
    for (let index = this.entries.length - 1; index >= 0; index--) {
      this.removeEntry(index);
    }
  }

  // ─── Dispatch ───────────────────────────────────────────────────

  /**
   * Invoke every listener with `args`, in registration order.
   *
   * @throws {SignalError} code=DISPATCH_IN_PROGRESS when called from one of
   *   this signal's own listeners.
   */
  dispatch(...args: TArgs): void {
    this.core.assertCanStart();
    this.payload = args;
    this.core.startDispatch(this.dispatch);
    this.releasePayload();
  }

  pause(): void {
    this.core.pause();
  }

  continue(): void {
    this.core.continue(this.continue);
    this.releasePayload();
  }

  consume(): void {
    this.core.consume();
  }

  /**
   * Run the listener at `index` with the current payload. Called by the
   * dispatch core; out-of-range indices are ignored.
   *
   * @throws {SignalError} code=NOT_DISPATCHING outside a dispatch.
   */
  invoke(index: number): void {
    const entry = this.entries[index];
    if (entry === undefined) return;
    const payload = this.payload;
    if (payload === undefined) {
      throw new SignalError(
        `${this.id} has no dispatch in flight to invoke listener ${index} for`,
        "NOT_DISPATCHING"
      );
    }

    if (entry.once) {
      this.removeEntry(index);
    }
    entry.listener(...payload);
  }

  toString(): string {
    return `Signal ${this.id}: ${this.entries.length} Listeners, ${this.core.describe()}`;
  }

  // ─── Internal ───────────────────────────────────────────────────

  /** Only a PAUSED dispatch, or one whose listener threw, still needs it. */
  private releasePayload(): void {
    const state = this.core.state;
    if (state === "IDLE" || state === "CONSUMED") {
      this.payload = undefined;
    }
  }

  private insertEntry(index: number, entry: ListenerEntry<TArgs>): void {
    this.entries.splice(index, 0, entry);
    this.core.onListenerInsertedAt(index);
  }

  private removeEntry(index: number): void {
    this.entries.splice(index, 1);
    this.core.onListenerRemovedAt(index);
  }
}
