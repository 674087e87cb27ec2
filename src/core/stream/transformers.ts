/**
 * Built-in stage descriptors.
 *
 * These are deliberately few; further operators plug in through
 * {@link stage} with their own {@link Transformer}.
 *
 * @module transformers
 */

import { CompositionError } from "./errors";
import type { StageDescriptor, Transformer } from "./types";

export interface StageOptions {
  /** Input buffer for this stage; capped by the materializer's maximumInputBufferSize */
  inputBufferSize?: number;
}

export interface ConfiguredStageDescriptor<In, Out> extends StageDescriptor<In, Out> {
  readonly inputBufferSize?: number;
}

/**
 * Describe a stage from a transformer factory. The factory runs once per
 * materialization, so transformers may keep per-run state.
 *
 * @example
 * ```typescript
 * const runningTotal = stage("runningTotal", "scan", () => {
 *   let total = 0;
 *   return { onNext: (n: number) => [(total += n)] };
 * });
 * ```
 */
export function stage<In, Out>(
  name: string,
  kind: string,
  createTransformer: () => Transformer<In, Out>,
  options: StageOptions = {},
): ConfiguredStageDescriptor<In, Out> {
  return Object.freeze({ name, kind, createTransformer, inputBufferSize: options.inputBufferSize });
}

export function mapStage<In, Out>(fn: (element: In) => Out, name = "map"): ConfiguredStageDescriptor<In, Out> {
  return stage<In, Out>(name, "map", () => ({ onNext: (element) => [fn(element)] }));
}

export function filterStage<T>(predicate: (element: T) => boolean, name = "filter"): ConfiguredStageDescriptor<T, T> {
  return stage<T, T>(name, "filter", () => ({ onNext: (element) => (predicate(element) ? [element] : []) }));
}

export function mapConcatStage<In, Out>(
  fn: (element: In) => Iterable<Out>,
  name = "mapConcat",
): ConfiguredStageDescriptor<In, Out> {
  return stage<In, Out>(name, "mapConcat", () => ({ onNext: (element) => fn(element) }));
}

/**
 * Pass the first `count` elements, then cancel upstream and complete.
 *
 * @throws CompositionError when `count` is not a non-negative integer
 */
export function takeStage<T>(count: number, name = "take"): ConfiguredStageDescriptor<T, T> {
  if (!Number.isInteger(count) || count < 0) {
    throw new CompositionError(`take expects a non-negative integer, got ${count}`);
  }
  return stage<T, T>(name, "take", () => {
    let taken = 0;
    return {
      onNext: (element) => {
        taken++;
        return [element];
      },
      isComplete: () => taken >= count,
    };
  });
}
