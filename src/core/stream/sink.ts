/**
 * Sink descriptions: the consuming end of a graph and the value it
 * materializes to.
 *
 * @module sink
 */

import type { MaterializationContext, SinkBinding } from "./materializer";
import type { SinkLogic } from "./stages/sink-stage";
import type { Publisher, Subscriber } from "./types";

export type SinkWiring<In, M> = (upstream: Publisher<In>, context: MaterializationContext) => SinkBinding<M>;

/**
 * Immutable description of a consumer accepting `In` and materializing `M`.
 *
 * @example
 * ```typescript
 * const total = Sink.fold(0, (sum, n: number) => sum + n);
 * const handle = Source.from([1, 2, 3]).connect(total).run(materializer);
 * await handle.result; // 6
 * ```
 */
export class Sink<In, M> {
  private constructor(
    /** Stage names from upstream to this sink, for diagnostics */
    readonly stages: readonly string[],
    private readonly wiring: SinkWiring<In, M>,
  ) {}

  /**
   * Sink backed by custom per-run logic. `createLogic` runs once per
   * materialization.
   */
  static fromLogic<In, M>(name: string, createLogic: () => SinkLogic<In, M>): Sink<In, M> {
    return new Sink<In, M>([name], (upstream, context) => context.attachSink(name, createLogic, upstream));
  }

  static collect<T>(): Sink<T, T[]> {
    return Sink.fromLogic<T, T[]>("collect", () => {
      const elements: T[] = [];
      return {
        onNext: (element) => {
          elements.push(element);
        },
        onComplete: () => elements,
      };
    });
  }

  static fold<T, A>(zero: A, fn: (accumulator: A, element: T) => A): Sink<T, A> {
    return Sink.fromLogic<T, A>("fold", () => {
      let accumulator = zero;
      return {
        onNext: (element) => {
          accumulator = fn(accumulator, element);
        },
        onComplete: () => accumulator,
      };
    });
  }

  static foreach<T>(fn: (element: T) => void): Sink<T, void> {
    return Sink.fromLogic<T, void>("foreach", () => ({
      onNext: fn,
      onComplete: () => undefined,
    }));
  }

  static ignore<T = unknown>(): Sink<T, void> {
    return Sink.fromLogic<T, void>("ignore", () => ({
      onNext: () => undefined,
      onComplete: () => undefined,
    }));
  }

  /**
   * Hand the stream to an external subscriber. The result resolves once the
   * stream terminated either way; errors are reported to `subscriber` only.
   */
  static fromSubscriber<T>(subscriber: Subscriber<T>): Sink<T, void> {
    return new Sink<T, void>(["subscriber"], (upstream, context) => context.attachSubscriber(subscriber, upstream));
  }

  /**
   * Sink that runs `prefix` in front of `sink`.
   * @internal
   */
  static withPrefix<In, Mid, M>(
    stages: readonly string[],
    prefix: (upstream: Publisher<In>, context: MaterializationContext) => Publisher<Mid>,
    sink: Sink<Mid, M>,
  ): Sink<In, M> {
    return new Sink<In, M>([...stages, ...sink.stages], (upstream, context) =>
      sink.attach(prefix(upstream, context), context),
    );
  }

  /** @internal */
  attach(upstream: Publisher<In>, context: MaterializationContext): SinkBinding<M> {
    return this.wiring(upstream, context);
  }
}
