import { describe, it, expect, afterEach, vi } from "vitest";
import { Signal } from "../src/primitives/signal.js";
import { DispatchCore } from "../src/primitives/dispatch-core.js";
import {
  setDispatchObserver,
  getDispatchObserver,
  isObserving,
} from "../src/diagnostics/dispatch-observer.js";
import type { DispatchObserver } from "../src/diagnostics/dispatch-observer.js";
import { createConsoleTracer } from "../src/diagnostics/console-tracer.js";
import type { DispatchContext } from "../src/types/signal.js";

class DoorOpened extends Signal<[doorId: string]> {}

function recordContexts(): { contexts: DispatchContext[]; observer: DispatchObserver } {
  const contexts: DispatchContext[] = [];
  return {
    contexts,
    observer: (_signal, context) => {
      contexts.push(context);
    },
  };
}

describe("dispatch observer", () => {
  afterEach(() => {
    setDispatchObserver(null);
    vi.restoreAllMocks();
  });

  it("should be off by default", () => {
    expect(isObserving()).toBe(false);
    expect(getDispatchObserver()).toBeNull();
  });

  it("should see start and end of every dispatch", () => {
    const signal = new DoorOpened();
    const seen: string[] = [];
    signal.addListener(() => seen.push("listener"));
    setDispatchObserver((observed, context) => {
      seen.push(`${context.phase}:${observed.id}`);
    });

    signal.dispatch("north");
    expect(seen).toEqual(["start:DoorOpened", "listener", "end:DoorOpened"]);
  });

  it("should report operation and outcome", () => {
    const signal = new DoorOpened();
    signal.addListener(() => signal.pause());
    signal.addListener(() => {});
    const { contexts, observer } = recordContexts();
    setDispatchObserver(observer);

    signal.dispatch("north");
    signal.continue();

    expect(contexts.map((c) => [c.phase, c.operation, c.outcome])).toEqual([
      ["start", "dispatch", undefined],
      ["end", "dispatch", "PAUSED"],
      ["start", "continue", undefined],
      ["end", "continue", "IDLE"],
    ]);
  });

  it("should flag a dispatch that discards a pause", () => {
    const signal = new DoorOpened();
    signal.addListener(() => signal.pause());
    signal.dispatch("north");

    const { contexts, observer } = recordContexts();
    setDispatchObserver(observer);
    signal.dispatch("south");
    expect(contexts[0].overridden).toBe("PAUSED");
  });

  it("should capture the caller's frame as the call site", () => {
    const signal = new DoorOpened();
    const { contexts, observer } = recordContexts();
    setDispatchObserver(observer);

    signal.dispatch("north");
    expect(contexts[0].callSite).toContain("dispatch-observer.test");
  });

  it("should not alter dispatch when the observer throws", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const signal = new DoorOpened();
    const listener = vi.fn();
    signal.addListener(listener);
    setDispatchObserver(() => {
      throw new Error("tracer broke");
    });

    signal.dispatch("north");
    expect(listener).toHaveBeenCalledWith("north");
    expect(signal.state).toBe("IDLE");
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it("should ignore consume() and pause() called by the observer", () => {
    const signal = new DoorOpened();
    const calls: string[] = [];
    signal.addListener((door) => calls.push(`0:${door}`));
    signal.addListener((door) => calls.push(`1:${door}`));
    setDispatchObserver((observed) => {
      observed.consume();
      observed.pause();
    });

    signal.dispatch("north");
    expect(calls).toEqual(["0:north", "1:north"]);
    expect(signal.state).toBe("IDLE");
  });

  it("should reject a dispatch started by the observer and keep the outer payload", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const signal = new DoorOpened();
    const calls: string[] = [];
    signal.addListener((door) => calls.push(door));
    setDispatchObserver((_observed, context) => {
      if (context.phase === "start") signal.dispatch("hijack");
    });

    signal.dispatch("north");
    expect(calls).toEqual(["north"]);
    expect(signal.state).toBe("IDLE");
    expect(warn).toHaveBeenCalledOnce();
  });

  it("should not resume a paused dispatch from the observer", () => {
    const signal = new DoorOpened();
    const calls: string[] = [];
    signal.addListener(() => signal.pause());
    signal.addListener((door) => calls.push(door));
    setDispatchObserver((observed, context) => {
      if (context.phase === "end") observed.continue();
    });

    signal.dispatch("north");
    expect(calls).toEqual([]);
    expect(signal.state).toBe("PAUSED");
  });

  it("should stop observing once removed", () => {
    const observer = vi.fn();
    setDispatchObserver(observer);
    setDispatchObserver(null);
    new DoorOpened().dispatch("north");
    expect(observer).not.toHaveBeenCalled();
  });

  it("should ignore cores without a subject", () => {
    const observer = vi.fn();
    setDispatchObserver(observer);
    const core = new DispatchCore({ listenerCount: 0, invoke: () => {} });
    core.startDispatch();
    expect(observer).not.toHaveBeenCalled();
    expect(core.state).toBe("IDLE");
  });
});

describe("createConsoleTracer()", () => {
  afterEach(() => {
    setDispatchObserver(null);
  });

  it("should log one line per dispatch start", () => {
    const lines: string[] = [];
    const signal = new DoorOpened();
    signal.addListener(() => {});
    signal.addListener(() => {});
    setDispatchObserver(createConsoleTracer({ log: (line) => lines.push(line) }));

    signal.dispatch("north");
    expect(lines).toHaveLength(1);
    expect(lines[0].startsWith("[signals] dispatch DoorOpened (2 listeners) at ")).toBe(true);
  });

  it("should log end phases and discarded pauses when asked", () => {
    const lines: string[] = [];
    const signal = new DoorOpened();
    signal.addListener(() => signal.pause());
    signal.dispatch("north");

    setDispatchObserver(
      createConsoleTracer({
        log: (line) => lines.push(line),
        includeEnd: true,
        prefix: "[doors]",
      })
    );
    signal.dispatch("south");

    expect(lines).toHaveLength(2);
    expect(lines[0].endsWith(" [discarded PAUSED dispatch]")).toBe(true);
    expect(lines[1]).toBe("[doors] dispatch DoorOpened -> PAUSED");
  });

  it("should default to console.debug", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    setDispatchObserver(createConsoleTracer());
    new DoorOpened().dispatch("north");
    expect(debug).toHaveBeenCalledOnce();
    debug.mockRestore();
  });
});
