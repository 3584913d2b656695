/**
 * Guarded Enumeration
 *
 * Two ways to enumerate without risking an unbounded wait:
 *
 * - {@link enumerateBelow} checks the cardinality first and lists the values
 *   only when it is below a ceiling.
 * - {@link enumerateWithDeadline} lists the values in chunks, yielding to the
 *   event loop between chunks, and gives up when a timer fires first.
 *
 * Both report their outcome as a tagged value; neither throws for "too big"
 * or "too slow".
 */

import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import { toCardinality, type Cardinality, type CardinalityLike } from "./cardinality.js";
import { configuredCeiling, configuredChunk } from "./config.js";
import type { Countable } from "./enumerable.js";
import { log } from "./log.js";

// ============================================================================
// Size-Bounded
// ============================================================================

export interface Enumerated<A> {
  readonly _tag: "Enumerated";
  readonly cardinality: Cardinality;
  readonly values: readonly A[];
}

export interface Rejected {
  readonly _tag: "Rejected";
  readonly cardinality: Cardinality;
}

export type BoundedEnumeration<A> = Enumerated<A> | Rejected;

/**
 * Enumerate only when the cardinality is strictly below `ceiling`; otherwise
 * return the cardinality without touching a single value.
 *
 * ```typescript
 * enumerateBelow(boolean, 2);   // { _tag: "Rejected", cardinality: 2n }
 * enumerateBelow(boolean, 100); // { _tag: "Enumerated", cardinality: 2n, values: [false, true] }
 * ```
 *
 * Accepts large instances too: this is the checked way to list one.
 *
 * @param ceiling - defaults to the `limits.ceiling` configuration value
 */
export function enumerateBelow<A>(E: Countable<A>, ceiling?: CardinalityLike): BoundedEnumeration<A> {
  const limit = ceiling === undefined ? configuredCeiling() : toCardinality(ceiling);
  const size = E.cardinality();

  if (size < limit) {
    return { _tag: "Enumerated", cardinality: size, values: Array.from(E.values()) };
  }

  log.debug(`${E.typeName}: cardinality ${size} is not below ${limit}; not enumerating`);
  return { _tag: "Rejected", cardinality: size };
}

export function isEnumerated<A>(result: BoundedEnumeration<A>): result is Enumerated<A> {
  return result._tag === "Enumerated";
}

// ============================================================================
// Deadline-Bounded
// ============================================================================

export interface Completed<A> {
  readonly _tag: "Completed";
  readonly values: readonly A[];
  readonly elapsedMs: number;
}

export interface DeadlineExceeded {
  readonly _tag: "DeadlineExceeded";
  readonly deadlineMs: number;
  /** How many values had been built when waiting stopped. They are discarded. */
  readonly produced: number;
}

export type DeadlineEnumeration<A> = Completed<A> | DeadlineExceeded;

export interface DeadlineOptions {
  /** Stop waiting early; the outcome is `DeadlineExceeded`. */
  readonly signal?: AbortSignal;
  /** Values built between deadline checks. Defaults to `deadline.chunk`. */
  readonly chunk?: number;
}

/**
 * Build the values in chunks into `sink`, yielding to the event loop after
 * each chunk. Returns `false` if `stop` was raised before the end.
 */
async function materialize<A>(
  source: Iterable<A>,
  sink: A[],
  chunk: number,
  stop: AbortSignal,
): Promise<boolean> {
  const iterator = source[Symbol.iterator]();
  for (;;) {
    for (let i = 0; i < chunk; i++) {
      const step = iterator.next();
      if (step.done) return true;
      sink.push(step.value);
    }
    await yieldToEventLoop();
    if (stop.aborted) {
      iterator.return?.();
      return false;
    }
  }
}

/**
 * Enumerate, but give up after `maxDurationMs` milliseconds.
 *
 * The deadline is cooperative: values are built in chunks and the timer can
 * only win between chunks. When it does, the worker is told to stop at its
 * next chunk boundary and everything it built is dropped.
 *
 * ```typescript
 * const result = await enumerateWithDeadline(powerSet(uint8), 50);
 * if (result._tag === "DeadlineExceeded") { ... }
 * ```
 *
 * Errors thrown while building values reject the returned promise.
 */
export async function enumerateWithDeadline<A>(
  E: Countable<A>,
  maxDurationMs: number,
  options: DeadlineOptions = {},
): Promise<DeadlineEnumeration<A>> {
  const chunk = options.chunk ?? configuredChunk();
  if (!Number.isInteger(chunk) || chunk <= 0) {
    throw new RangeError(`${E.typeName}: chunk must be a positive integer, got ${chunk}`);
  }
  const started = performance.now();
  const collected: A[] = [];

  const exceeded = (): DeadlineExceeded => {
    log.debug(
      `${E.typeName}: deadline of ${maxDurationMs}ms exceeded after ${collected.length} values`,
    );
    return { _tag: "DeadlineExceeded", deadlineMs: maxDurationMs, produced: collected.length };
  };

  if (options.signal?.aborted) return exceeded();

  const stop = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const expired = new Promise<"expired">((resolve) => {
    timer = setTimeout(() => resolve("expired"), Math.max(0, maxDurationMs));
    onAbort = () => resolve("expired");
    options.signal?.addEventListener("abort", onAbort, { once: true });
  });

  try {
    const outcome = await Promise.race([
      materialize(E.values(), collected, chunk, stop.signal),
      expired,
    ]);
    if (outcome === "expired" || outcome === false) return exceeded();

    const elapsedMs = performance.now() - started;
    log.debug(`${E.typeName}: enumerated ${collected.length} values in ${elapsedMs.toFixed(1)}ms`);
    return { _tag: "Completed", values: collected, elapsedMs };
  } finally {
    clearTimeout(timer);
    if (onAbort) options.signal?.removeEventListener("abort", onAbort);
    stop.abort();
  }
}
