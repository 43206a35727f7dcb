/**
 * @module primitives/dispatch-core
 * @description The dispatch state machine owned by every signal.
 *
 * A DispatchCore walks an {@link IDispatchTarget} one listener at a time,
 * in index order. Listener code may call back into the same signal while
 * it runs: pause, continue, consume, or add and remove listeners. The core
 * keeps `currentIndex` pointing at the right listener through all of it.
 *
 * The loop is iterative, so a dispatch over any number of listeners uses
 * one stack frame. Pausing unwinds back to whoever called `dispatch()` or
 * `continue()`; resuming is a fresh call, not a resumed frame.
 *
 * State transitions:
 *
 * | From     | Call          | To       |
 * |----------|---------------|----------|
 * | IDLE     | startDispatch | RUNNING  |
 * | RUNNING  | pause         | PAUSED   |
 * | PAUSED   | continue      | RUNNING  |
 * | RUNNING  | consume       | CONSUMED |
 * | RUNNING  | (last done)   | IDLE     |
 * | CONSUMED | startDispatch | RUNNING  |
 * | PAUSED   | startDispatch | RUNNING  |
 *
 * The last row discards the unfinished pause; the observer sees it as
 * `overridden: "PAUSED"`. While the observer runs, pause, continue and
 * consume are no-ops and starting a dispatch throws.
 */

import type {
  IDispatchControl,
  IDispatchTarget,
  ISignal,
} from "../interfaces/signal.js";
import { SignalError } from "../interfaces/signal.js";
import type {
  DispatchContext,
  DispatchOperation,
  DispatchState,
} from "../types/signal.js";
import {
  captureCallSite,
  isObserving,
  notifyDispatch,
} from "../diagnostics/dispatch-observer.js";

/**
 * DispatchCore — reentrant, single-threaded dispatch loop.
 *
 * @example
 * ```ts
 * class Chime implements IDispatchTarget {
 *   readonly core = new DispatchCore(this);
 *   readonly handlers: Array<() => void> = [];
 *   get listenerCount() { return this.handlers.length; }
 *   invoke(index: number) { this.handlers[index]?.(); }
 * }
 * ```
 */
export class DispatchCore implements IDispatchControl {
  private currentState: DispatchState = "IDLE";
  private index = 0;
  /** Number of loop frames of this core on the call stack. */
  private depth = 0;
  /** Set while the dispatch observer runs; controls are inert meanwhile. */
  private notifying = false;

  /**
   * @param target - Listener storage to iterate.
   * @param subject - Signal reported to the dispatch observer. Without one,
   *   dispatches on this core are not observed.
   */
  constructor(
    private readonly target: IDispatchTarget,
    private readonly subject: ISignal | null = null
  ) {}

  get state(): DispatchState {
    return this.currentState;
  }

  /**
   * Position being invoked or about to be invoked. Meaningful only while
   * not IDLE. A listener that removed itself at index 0 reads -1 until
   * it returns.
   */
  get currentIndex(): number {
    return this.index;
  }

  /** Whether a dispatch loop of this core is on the call stack. */
  get isDispatching(): boolean {
    return this.depth > 0;
  }

  // ─── Commands ───────────────────────────────────────────────────

  /**
   * Throws unless a new dispatch may start. Lets a signal check before it
   * swaps in the payload of the next dispatch.
   *
   * @throws {SignalError} code=DISPATCH_IN_PROGRESS from inside a listener
   *   of this same core, or from the dispatch observer.
   */
  assertCanStart(): void {
    if (this.depth > 0 || this.notifying) {
      throw new SignalError(
        `Cannot start a dispatch of ${this.label()} from inside its own dispatch`,
        "DISPATCH_IN_PROGRESS"
      );
    }
  }

  /**
   * Reset to the first listener and run the loop.
   *
   * A PAUSED or CONSUMED dispatch is discarded. So is a RUNNING one whose
   * listener threw, which is how callers recover from a failed dispatch.
   *
   * @param caller - Public method the call came through; the observer's
   *   call site is the frame above it.
   * @throws {SignalError} code=DISPATCH_IN_PROGRESS when re-entered from a
   *   listener. State is left untouched.
   */
  startDispatch(caller: Function = this.startDispatch): void {
    this.assertCanStart();
    const overridden = this.currentState === "PAUSED" ? this.currentState : undefined;
    this.index = 0;
    this.currentState = "RUNNING";
    this.drive("dispatch", caller, overridden);
  }

  pause(): void {
    if (this.currentState === "RUNNING" && !this.notifying) {
      this.currentState = "PAUSED";
    }
  }

  /**
   * Resume at the listener after the one that paused.
   */
  continue(caller: Function = this.continue): void {
    if (this.currentState !== "PAUSED" || this.notifying) return;
    this.index++;
    this.currentState = "RUNNING";
    this.drive("continue", caller);
  }

  consume(): void {
    if (this.currentState === "RUNNING" && !this.notifying) {
      this.currentState = "CONSUMED";
    }
  }

  // ─── Mutation Hooks ─────────────────────────────────────────────

  /**
   * Must be called after a listener is inserted at `index`. A listener
   * inserted at or before the current position is not run by the dispatch
   * already underway, and the current listener is not run twice.
   */
  onListenerInsertedAt(index: number): void {
    if (this.currentState === "IDLE") return;
    if (index <= this.index) {
      this.index++;
    }
  }

  /**
   * Must be called after the listener at `index` is removed. Keeps the
   * next listener from being skipped, including when the current listener
   * removes itself.
   */
  onListenerRemovedAt(index: number): void {
    if (this.currentState === "IDLE") return;
    if (index <= this.index) {
      this.index--;
    }
  }

  /** `State RUNNING, Index 2` */
  describe(): string {
    return `State ${this.currentState}, Index ${this.index}`;
  }

  // ─── Loop ───────────────────────────────────────────────────────

  private drive(
    operation: DispatchOperation,
    caller: Function,
    overridden?: DispatchState
  ): void {
    const subject = isObserving() ? this.subject : null;
    if (subject === null) {
      this.run();
      return;
    }

    const callSite = captureCallSite(caller);
    this.observe(subject, { phase: "start", operation, callSite, overridden });
    this.run();
    this.observe(subject, {
      phase: "end",
      operation,
      callSite,
      outcome: this.currentState,
    });
  }

  private observe(subject: ISignal, context: DispatchContext): void {
    this.notifying = true;
    try {
      notifyDispatch(subject, context);
    } finally {
      this.notifying = false;
    }
  }

  private run(): void {
    this.depth++;
    try {
      while (true) {
        if (this.index >= this.target.listenerCount) {
          this.finish();
          return;
        }

        this.target.invoke(this.index);

        // Paused or consumed: leave the index on the listener that did it.
        if (this.currentState !== "RUNNING") {
          return;
        }
        this.index++;
      }
    } finally {
      this.depth--;
    }
  }

  private finish(): void {
    this.currentState = "IDLE";
  }

  private label(): string {
    return this.subject?.id ?? "signal";
  }
}
