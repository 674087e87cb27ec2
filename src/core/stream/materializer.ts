/**
 * Turns graph descriptions into running stage networks.
 *
 * Every call creates a fresh {@link MaterializationContext}; the graph's wiring
 * walks tap -> stages -> sink in declaration order and asks the context for one
 * live stage per descriptor, subscribing each to its predecessor. Nothing is
 * shared between two materializations except what a tap itself shares (a
 * `fromIterator` source, for instance).
 *
 * @module materializer
 */

import { createLogger } from "../logging/logger";
import { toStreamError } from "./errors";
import { resolveScheduler, type Scheduler } from "./mailbox";
import {
  type MaterializerSettings,
  type MaterializerSettingsInput,
  parseFanoutBounds,
  parseMaterializerSettings,
  type FanoutBounds,
} from "./settings";
import type { RunnableFlow, Source } from "./source";
import { FanoutStage } from "./stages/fanout-stage";
import { type SinkLogic, SinkStage } from "./stages/sink-stage";
import type { StageContext } from "./stages/stage";
import { type TapLogic, TapStage } from "./stages/tap-stage";
import { TransformerStage } from "./stages/transformer-stage";
import { createTapLogic, type TapDescriptor } from "./taps";
import type { ConfiguredStageDescriptor } from "./transformers";
import type { Publisher, StageSnapshot, Subscriber, Subscription, Transformer } from "./types";

/**
 * Handle to one running materialization of a {@link RunnableFlow}.
 *
 * @template M - Value produced by the sink
 */
export interface CompletionHandle<M> {
  readonly id: string;
  /** Settles with the sink's value, or rejects with the stream's error */
  readonly result: Promise<M>;
  /** Cancel the stream from the sink end */
  cancel(): void;
  /** Current state of every live stage, in declaration order */
  stageStates(): StageSnapshot[];
}

/**
 * What attaching a sink yields to the materializer.
 */
export interface SinkBinding<M> {
  result: Promise<M>;
  cancel(): void;
}

interface Snapshotting {
  snapshot(): StageSnapshot;
}

/**
 * Resources and bookkeeping for a single materialization.
 */
export class MaterializationContext {
  private readonly stages: Snapshotting[] = [];

  constructor(
    readonly id: string,
    private readonly settings: MaterializerSettings,
    private readonly scheduler: Scheduler,
  ) {}

  attachTap<T>(tap: TapDescriptor<T>): Publisher<T> {
    const name = this.nextName(tap.kind);
    const context = this.stageContext(this.settings.initialInputBufferSize);

    if (tap.kind === "publisher") {
      const stage = new TransformerStage<T, T>(name, context, { onNext: (element) => [element] });
      this.stages.push(stage);
      tap.publisher.subscribe(stage);
      return stage;
    }

    let logic: TapLogic<T>;
    try {
      logic = createTapLogic(tap);
    } catch (error) {
      throw toStreamError(error, name);
    }

    const stage = new TapStage<T>(name, context, logic);
    this.stages.push(stage);
    return stage;
  }

  attachStage<In, Out>(descriptor: ConfiguredStageDescriptor<In, Out>, upstream: Publisher<In>): Publisher<Out> {
    const name = this.nextName(descriptor.name);
    const bufferSize = Math.min(
      descriptor.inputBufferSize ?? this.settings.initialInputBufferSize,
      this.settings.maximumInputBufferSize,
    );

    let transformer: Transformer<In, Out>;
    try {
      transformer = descriptor.createTransformer();
    } catch (error) {
      throw toStreamError(error, name);
    }

    const stage = new TransformerStage<In, Out>(name, this.stageContext(bufferSize), transformer);
    this.stages.push(stage);
    upstream.subscribe(stage);
    return stage;
  }

  attachFanout<T>(upstream: Publisher<T>, bounds: FanoutBounds): Publisher<T> {
    const stage = new FanoutStage<T>(
      this.nextName("fanout"),
      this.stageContext(this.settings.initialInputBufferSize),
      bounds,
    );
    this.stages.push(stage);
    upstream.subscribe(stage);
    return stage;
  }

  attachSink<In, M>(name: string, createLogic: () => SinkLogic<In, M>, upstream: Publisher<In>): SinkBinding<M> {
    const stageName = this.nextName(name);

    let logic: SinkLogic<In, M>;
    try {
      logic = createLogic();
    } catch (error) {
      throw toStreamError(error, stageName);
    }

    const stage = new SinkStage<In, M>(stageName, this.stageContext(this.settings.initialInputBufferSize), logic);
    this.stages.push(stage);
    upstream.subscribe(stage);
    return { result: stage.result, cancel: () => stage.cancel() };
  }

  attachSubscriber<In>(subscriber: Subscriber<In>, upstream: Publisher<In>): SinkBinding<void> {
    const observed = new ObservedSubscriber(subscriber);
    upstream.subscribe(observed);
    return { result: observed.terminated, cancel: () => observed.cancel() };
  }

  snapshots(): StageSnapshot[] {
    return this.stages.map((stage) => stage.snapshot());
  }

  private nextName(name: string): string {
    return `${this.stages.length}-${name}`;
  }

  private stageContext(inputBufferSize: number): StageContext {
    return {
      materializationId: this.id,
      scheduler: this.scheduler,
      throughput: this.settings.throughput,
      inputBufferSize,
    };
  }
}

/**
 * Forwards every signal to an external subscriber and records termination.
 * `terminated` resolves for completion, error and cancellation alike, whether
 * the run's handle or the subscriber itself cancels: the error itself belongs
 * to the external subscriber.
 */
class ObservedSubscriber<T> implements Subscriber<T> {
  readonly terminated: Promise<void>;
  private readonly settle: () => void;
  private subscription: Subscription | null = null;
  private cancelled = false;

  constructor(private readonly target: Subscriber<T>) {
    let settle: () => void = () => undefined;
    this.terminated = new Promise<void>((resolve) => {
      settle = resolve;
    });
    this.settle = settle;
  }

  onSubscribe(subscription: Subscription): void {
    this.subscription = subscription;
    this.target.onSubscribe({
      request: (n) => subscription.request(n),
      cancel: () => this.cancel(),
    });
    if (this.cancelled) subscription.cancel();
  }

  onNext(element: T): void {
    this.target.onNext(element);
  }

  onError(cause: unknown): void {
    this.settle();
    this.target.onError(cause);
  }

  onComplete(): void {
    this.settle();
    this.target.onComplete();
  }

  cancel(): void {
    this.cancelled = true;
    this.subscription?.cancel();
    this.settle();
  }
}

export class FlowMaterializer {
  readonly settings: MaterializerSettings;
  private readonly scheduler: Scheduler;
  private readonly logger = createLogger("materializer");
  private runs = 0;

  /**
   * @param settings - Buffer sizes, throughput and scheduler kind; validated on construction
   * @param scheduler - Overrides the scheduler named in `settings`
   * @throws InvalidSettingsError when `settings` do not validate
   */
  constructor(settings: MaterializerSettingsInput = {}, scheduler?: Scheduler) {
    this.settings = parseMaterializerSettings(settings);
    this.scheduler = scheduler ?? resolveScheduler(this.settings.scheduler);
  }

  materialize<M>(runnable: RunnableFlow<M>): CompletionHandle<M> {
    const context = this.createContext();
    const binding = runnable.attach(context);
    this.logMaterialized(context);

    return {
      id: context.id,
      result: binding.result,
      cancel: () => binding.cancel(),
      stageStates: () => context.snapshots(),
    };
  }

  toPublisher<T>(source: Source<T>): Publisher<T> {
    const context = this.createContext();
    const publisher = source.attach(context);
    this.logMaterialized(context);
    return publisher;
  }

  /**
   * Buffer sizes default to the materializer's fan-out settings.
   *
   * @throws InvalidSettingsError when the bounds are not positive integers with initial <= maximum
   */
  toFanoutPublisher<T>(
    source: Source<T>,
    initialBufferSize = this.settings.initialFanOutBufferSize,
    maximumBufferSize = this.settings.maximumFanOutBufferSize,
  ): Publisher<T> {
    const bounds = parseFanoutBounds(initialBufferSize, maximumBufferSize);
    const context = this.createContext();
    const publisher = context.attachFanout(source.attach(context), bounds);
    this.logMaterialized(context);
    return publisher;
  }

  private createContext(): MaterializationContext {
    this.runs++;
    return new MaterializationContext(`flow-${this.runs}`, this.settings, this.scheduler);
  }

  private logMaterialized(context: MaterializationContext): void {
    this.logger.debug({
      event: "flow_materialized",
      materializationId: context.id,
      stages: context.snapshots().map((snapshot) => snapshot.name),
    });
  }
}
