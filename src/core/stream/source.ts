/**
 * Source descriptions and closed graphs.
 *
 * A Source is a tap plus any stages appended to it. Connecting a sink closes
 * the graph into a {@link RunnableFlow}, whose only remaining operation is
 * `run`. Constructors and combinators are pure: nothing happens until a
 * materializer runs the graph.
 *
 * @example
 * ```typescript
 * const materializer = new FlowMaterializer();
 * const handle = Source.from([1, 2, 3, 4])
 *   .filter((n) => n % 2 === 0)
 *   .map((n) => n * 10)
 *   .connect(Sink.collect())
 *   .run(materializer);
 *
 * await handle.result; // [20, 40]
 * ```
 *
 * @module source
 */

import { FlowClosedError, InvalidSettingsError } from "./errors";
import { Flow } from "./flow";
import type { CompletionHandle, FlowMaterializer, MaterializationContext, SinkBinding } from "./materializer";
import { Sink } from "./sink";
import type { TapDescriptor } from "./taps";
import type { StageOptions } from "./transformers";
import type { Publisher, Subscriber, Transformer } from "./types";

export type SourceWiring<Out> = (context: MaterializationContext) => Publisher<Out>;

export class Source<Out> {
  private constructor(
    readonly stages: readonly string[],
    private readonly wiring: SourceWiring<Out>,
  ) {}

  static fromTap<T>(tap: TapDescriptor<T>): Source<T> {
    return new Source<T>([tap.kind], (context) => context.attachTap(tap));
  }

  /** Elements of `iterable`; every run iterates it afresh. */
  static from<T>(iterable: Iterable<T>): Source<T> {
    return Source.fromTap<T>({ kind: "iterable", iterable });
  }

  /** Elements of one shared iterator; the first run to pull an element consumes it. */
  static fromIterator<T>(iterator: Iterator<T>): Source<T> {
    return Source.fromTap<T>({ kind: "iterator", iterator });
  }

  /** Calls `thunk` once per requested element until it returns `undefined`. */
  static fromThunk<T>(thunk: () => T | undefined): Source<T> {
    return Source.fromTap<T>({ kind: "thunk", thunk });
  }

  static fromFuture<T>(future: PromiseLike<T>): Source<T> {
    return Source.fromTap<T>({ kind: "future", future });
  }

  /**
   * Emit `tick()` after `initialDelayMs` and then every `intervalMs`. Ticks that
   * find no demand are dropped. Never completes on its own.
   *
   * @throws InvalidSettingsError for a negative delay or a non-positive interval
   */
  static tick<T>(initialDelayMs: number, intervalMs: number, tick: () => T): Source<T> {
    if (!(initialDelayMs >= 0) || !(intervalMs > 0)) {
      throw new InvalidSettingsError(
        `Tick needs initialDelayMs >= 0 and intervalMs > 0, got ${initialDelayMs} and ${intervalMs}`,
      );
    }
    return Source.fromTap<T>({ kind: "tick", initialDelayMs, intervalMs, tick });
  }

  static fromPublisher<T>(publisher: Publisher<T>): Source<T> {
    return Source.fromTap<T>({ kind: "publisher", publisher });
  }

  /**
   * Append a flow, or close the graph with a sink.
   */
  connect<Next>(flow: Flow<Out, Next>): Source<Next>;
  connect<M>(sink: Sink<Out, M>): RunnableFlow<M>;
  connect<Next, M>(next: Flow<Out, Next> | Sink<Out, M>): Source<Next> | RunnableFlow<M> {
    if (next instanceof Sink) {
      return new RunnableFlow<M>([...this.stages, ...next.stages], (context) =>
        next.attach(this.attach(context), context),
      );
    }
    return new Source<Next>([...this.stages, ...next.stages], (context) => next.attach(this.attach(context), context));
  }

  transform<Next>(name: string, createTransformer: () => Transformer<Out, Next>, options?: StageOptions): Source<Next> {
    return this.connect(Flow.create<Out>().transform(name, createTransformer, options));
  }

  map<Next>(fn: (element: Out) => Next): Source<Next> {
    return this.connect(Flow.create<Out>().map(fn));
  }

  filter(predicate: (element: Out) => boolean): Source<Out> {
    return this.connect(Flow.create<Out>().filter(predicate));
  }

  mapConcat<Next>(fn: (element: Out) => Iterable<Next>): Source<Next> {
    return this.connect(Flow.create<Out>().mapConcat(fn));
  }

  take(count: number): Source<Out> {
    return this.connect(Flow.create<Out>().take(count));
  }

  /**
   * Materialize and expose the last stage as a single-subscriber publisher.
   * A second subscriber is rejected with SubscriberRejectedError.
   */
  toPublisher(materializer: FlowMaterializer): Publisher<Out> {
    return materializer.toPublisher(this);
  }

  /**
   * Materialize behind a fan-out stage accepting any number of subscribers.
   * Subscribers falling more than `maximumBufferSize` elements behind are dropped.
   *
   * @throws InvalidSettingsError for invalid buffer sizes
   */
  toFanoutPublisher(
    initialBufferSize: number,
    maximumBufferSize: number,
    materializer: FlowMaterializer,
  ): Publisher<Out> {
    return materializer.toFanoutPublisher(this, initialBufferSize, maximumBufferSize);
  }

  publishTo(subscriber: Subscriber<Out>, materializer: FlowMaterializer): CompletionHandle<void> {
    return this.connect(Sink.fromSubscriber(subscriber)).run(materializer);
  }

  /** Run the graph for its side effects, discarding every element. */
  consume(materializer: FlowMaterializer): CompletionHandle<void> {
    return this.connect(Sink.ignore<Out>()).run(materializer);
  }

  /** @internal */
  attach(context: MaterializationContext): Publisher<Out> {
    return this.wiring(context);
  }
}

/**
 * A closed graph. It can be run any number of times; every run is isolated.
 *
 * @template M - Value the sink materializes to
 */
export class RunnableFlow<M> {
  /** @internal */
  constructor(
    readonly stages: readonly string[],
    private readonly wiring: (context: MaterializationContext) => SinkBinding<M>,
  ) {}

  run(materializer: FlowMaterializer): CompletionHandle<M> {
    return materializer.materialize(this);
  }

  /**
   * A closed graph has no open port.
   *
   * @throws FlowClosedError always
   */
  connect(..._next: unknown[]): never {
    throw new FlowClosedError();
  }

  /** @internal */
  attach(context: MaterializationContext): SinkBinding<M> {
    return this.wiring(context);
  }
}
