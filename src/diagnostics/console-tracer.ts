/**
 * @module diagnostics/console-tracer
 * @description Ready-made dispatch observer that prints one line per phase.
 */

import type { DispatchObserver } from "./dispatch-observer.js";

/**
 * Options for {@link createConsoleTracer}.
 */
export interface ConsoleTracerOptions {
  /** Line sink. Default: `console.debug` */
  log?: (line: string) => void;
  /** Also print `end` phases. Default: false */
  includeEnd?: boolean;
  /** Prefix for every line. Default: "[signals]" */
  prefix?: string;
}

/**
 * @example
 * ```ts
 * setDispatchObserver(createConsoleTracer({ includeEnd: true }));
 * // [signals] dispatch ScoreChanged (2 listeners) at onHit (/game/src/combat.ts:42:7)
 * // [signals] dispatch ScoreChanged -> IDLE
 * ```
 */
export function createConsoleTracer(
  options: ConsoleTracerOptions = {}
): DispatchObserver {
  const log = options.log ?? ((line: string) => console.debug(line));
  const includeEnd = options.includeEnd ?? false;
  const prefix = options.prefix ?? "[signals]";

  return (signal, context) => {
    if (context.phase === "end") {
      if (includeEnd) {
        log(`${prefix} ${context.operation} ${signal.id} -> ${context.outcome ?? signal.state}`);
      }
      return;
    }

    let line = `${prefix} ${context.operation} ${signal.id} (${signal.listenerCount} listeners)`;
    if (context.callSite !== undefined) line += ` at ${context.callSite}`;
    if (context.overridden !== undefined) line += ` [discarded ${context.overridden} dispatch]`;
    log(line);
  };
}
