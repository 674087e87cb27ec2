/**
 * Flow descriptions: open-ended chains of processing stages with one input
 * and one output.
 *
 * A Flow is a value. Combinators return new flows and never touch their
 * receiver, so a flow can be shared between any number of graphs.
 *
 * @module flow
 */

import type { MaterializationContext } from "./materializer";
import { Sink } from "./sink";
import {
  type ConfiguredStageDescriptor,
  filterStage,
  mapConcatStage,
  mapStage,
  stage,
  type StageOptions,
  takeStage,
} from "./transformers";
import type { Publisher, Transformer } from "./types";

export type FlowWiring<In, Out> = (upstream: Publisher<In>, context: MaterializationContext) => Publisher<Out>;

export class Flow<In, Out> {
  private constructor(
    readonly stages: readonly string[],
    private readonly wiring: FlowWiring<In, Out>,
  ) {}

  /** The empty flow: passes elements through without adding a stage. */
  static create<T>(): Flow<T, T> {
    return new Flow<T, T>([], (upstream) => upstream);
  }

  static fromStage<In, Out>(descriptor: ConfiguredStageDescriptor<In, Out>): Flow<In, Out> {
    return new Flow<In, Out>([descriptor.name], (upstream, context) => context.attachStage(descriptor, upstream));
  }

  /**
   * Append a flow, or close the output side with a sink.
   */
  connect<Next>(flow: Flow<Out, Next>): Flow<In, Next>;
  connect<M>(sink: Sink<Out, M>): Sink<In, M>;
  connect<Next, M>(next: Flow<Out, Next> | Sink<Out, M>): Flow<In, Next> | Sink<In, M> {
    if (next instanceof Sink) {
      return Sink.withPrefix(this.stages, (upstream, context) => this.attach(upstream, context), next);
    }
    return new Flow<In, Next>([...this.stages, ...next.stages], (upstream, context) =>
      next.attach(this.attach(upstream, context), context),
    );
  }

  transform<Next>(
    name: string,
    createTransformer: () => Transformer<Out, Next>,
    options?: StageOptions,
  ): Flow<In, Next> {
    return this.connect(Flow.fromStage(stage<Out, Next>(name, "transform", createTransformer, options)));
  }

  map<Next>(fn: (element: Out) => Next): Flow<In, Next> {
    return this.connect(Flow.fromStage(mapStage(fn)));
  }

  filter(predicate: (element: Out) => boolean): Flow<In, Out> {
    return this.connect(Flow.fromStage(filterStage(predicate)));
  }

  mapConcat<Next>(fn: (element: Out) => Iterable<Next>): Flow<In, Next> {
    return this.connect(Flow.fromStage(mapConcatStage(fn)));
  }

  take(count: number): Flow<In, Out> {
    return this.connect(Flow.fromStage(takeStage<Out>(count)));
  }

  /** @internal */
  attach(upstream: Publisher<In>, context: MaterializationContext): Publisher<Out> {
    return this.wiring(upstream, context);
  }
}
