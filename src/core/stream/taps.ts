/**
 * Tap descriptors: the closed set of ways a pipeline can originate elements.
 *
 * Variant semantics:
 * - iterable: a fresh iterator per materialization, so every run restarts
 * - iterator: one iterator shared by every run, exhausted exactly once
 * - thunk: called once per demand unit until it returns `undefined`
 * - future: at most one element, then completion; rejection fails the stream
 * - tick: periodic; a tick finding no demand is dropped, never queued
 * - publisher: an external producer, subscribed to on materialization
 *
 * The publisher variant is wired by the materializer; all others are driven
 * through {@link TapLogic}.
 *
 * @module taps
 */

import { toStreamError } from "./errors";
import type { TapEmitter, TapLogic } from "./stages/tap-stage";
import type { Publisher } from "./types";

export type TapDescriptor<T> =
  | { kind: "iterable"; iterable: Iterable<T> }
  | { kind: "iterator"; iterator: Iterator<T> }
  | { kind: "thunk"; thunk: () => T | undefined }
  | { kind: "future"; future: PromiseLike<T> }
  | { kind: "tick"; initialDelayMs: number; intervalMs: number; tick: () => T }
  | { kind: "publisher"; publisher: Publisher<T> };

export type TapKind = TapDescriptor<unknown>["kind"];

export type LogicTapDescriptor<T> = Exclude<TapDescriptor<T>, { kind: "publisher" }>;

export function createTapLogic<T>(tap: LogicTapDescriptor<T>): TapLogic<T> {
  switch (tap.kind) {
    case "iterable":
      return iteratorLogic(tap.iterable[Symbol.iterator](), true);
    case "iterator":
      return iteratorLogic(tap.iterator, false);
    case "thunk":
      return thunkLogic(tap.thunk);
    case "future":
      return futureLogic(tap.future);
    case "tick":
      return tickLogic(tap.initialDelayMs, tap.intervalMs, tap.tick);
  }
}

/**
 * Pull from a synchronous iterator. `owned` iterators are closed through
 * `return()` when the run is cancelled; shared ones are left to other runs.
 */
function iteratorLogic<T>(iterator: Iterator<T>, owned: boolean): TapLogic<T> {
  let exhausted = false;

  return {
    produce(emitter, n) {
      for (let i = 0; i < n && !emitter.isClosed; i++) {
        let next: IteratorResult<T>;
        try {
          next = iterator.next();
        } catch (error) {
          emitter.fail(toStreamError(error, emitter.stageName));
          return;
        }

        if (next.done) {
          exhausted = true;
          emitter.complete();
          return;
        }
        emitter.emit(next.value);
      }
    },
    cancel() {
      if (owned && !exhausted) {
        exhausted = true;
        iterator.return?.();
      }
    },
  };
}

function thunkLogic<T>(thunk: () => T | undefined): TapLogic<T> {
  return {
    produce(emitter, n) {
      for (let i = 0; i < n && !emitter.isClosed; i++) {
        let value: T | undefined;
        try {
          value = thunk();
        } catch (error) {
          emitter.fail(toStreamError(error, emitter.stageName));
          return;
        }

        if (value === undefined) {
          emitter.complete();
          return;
        }
        emitter.emit(value);
      }
    },
    cancel() {},
  };
}

function futureLogic<T>(future: PromiseLike<T>): TapLogic<T> {
  let resolved: { value: T } | null = null;

  const deliver = (emitter: TapEmitter<T>) => {
    if (resolved === null || emitter.isClosed || emitter.demand === 0) return;
    emitter.emit(resolved.value);
    emitter.complete();
  };

  return {
    start(emitter) {
      void Promise.resolve(future).then(
        (value) =>
          emitter.post(() => {
            resolved = { value };
            deliver(emitter);
          }),
        (reason: unknown) => emitter.post(() => emitter.fail(reason)),
      );
    },
    produce(emitter) {
      deliver(emitter);
    },
    cancel() {
      resolved = null;
    },
  };
}

function tickLogic<T>(initialDelayMs: number, intervalMs: number, tick: () => T): TapLogic<T> {
  let delay: NodeJS.Timeout | null = null;
  let interval: NodeJS.Timeout | null = null;

  const fire = (emitter: TapEmitter<T>) => {
    emitter.post(() => {
      // No demand at tick time: the tick is dropped
      if (emitter.isClosed || emitter.demand === 0) return;
      emitter.emit(tick());
    });
  };

  return {
    start(emitter) {
      delay = setTimeout(() => {
        delay = null;
        fire(emitter);
        interval = setInterval(() => fire(emitter), intervalMs);
      }, initialDelayMs);
    },
    produce() {},
    cancel() {
      if (delay !== null) clearTimeout(delay);
      if (interval !== null) clearInterval(interval);
      delay = null;
      interval = null;
    },
  };
}
