/**
 * Live stage running a {@link Transformer} between one upstream and one downstream edge.
 *
 * Backpressure rule: upstream demand is issued only while downstream has
 * unfulfilled demand, and never beyond the stage's input buffer headroom
 * (`inputBufferSize - buffered - outstanding`). Requests are batched to at
 * least half the buffer unless the stage would otherwise stall.
 *
 * @module stages/transformer-stage
 */

import { CANCELLED_SUBSCRIPTION, DemandChannel, type DemandHandler } from "../demand-channel";
import { SubscriberRejectedError, toStreamError } from "../errors";
import { ElementQueue } from "../queue";
import {
  type Publisher,
  StageState,
  type StreamSignal,
  type Subscriber,
  type Subscription,
  type Transformer,
} from "../types";
import { LiveStage, type StageContext, UpstreamConnection } from "./stage";

type TransformerMessage<In> =
  | StreamSignal<In>
  | { type: "subscribed" }
  | { type: "attached" }
  | { type: "demand" }
  | { type: "cancel" };

export class TransformerStage<In, Out>
  extends LiveStage<TransformerMessage<In>>
  implements Subscriber<In>, Publisher<Out>
{
  private readonly upstream: UpstreamConnection;
  private downstream: DemandChannel<Out> | null = null;
  private readonly inputBuffer = new ElementQueue<In>();
  private readonly outputBuffer = new ElementQueue<Out>();
  private upstreamFinished = false;
  private transformerDone = false;
  private terminationEmitted = false;
  private pendingFailure: { cause: unknown } | null = null;

  private readonly demandHandler: DemandHandler<Out> = {
    onDemand: () => this.mailbox.enqueue({ type: "demand" }),
    onCancel: () => this.mailbox.prepend({ type: "cancel" }),
  };

  constructor(
    name: string,
    context: StageContext,
    private readonly transformer: Transformer<In, Out>,
  ) {
    super(name, context);
    this.upstream = new UpstreamConnection(name);
  }

  // Upstream side

  onSubscribe(subscription: Subscription): void {
    // Attached right away so that a cancel handled first still reaches upstream
    if (!this.upstream.attach(subscription)) {
      subscription.cancel();
      return;
    }
    this.mailbox.enqueue({ type: "subscribed" });
  }

  onNext(element: In): void {
    this.mailbox.enqueue({ type: "next", element });
  }

  onError(cause: unknown): void {
    this.mailbox.enqueue({ type: "error", cause });
  }

  onComplete(): void {
    this.mailbox.enqueue({ type: "complete" });
  }

  // Downstream side

  subscribe(subscriber: Subscriber<Out>): void {
    if (this.downstream !== null) {
      this.logger.warn({ event: "subscriber_rejected" });
      subscriber.onSubscribe(CANCELLED_SUBSCRIPTION);
      subscriber.onError(new SubscriberRejectedError(this.name));
      return;
    }

    const channel = new DemandChannel(subscriber, this.demandHandler, this.name);
    this.downstream = channel;
    channel.open();
    this.mailbox.enqueue({ type: "attached" });
  }

  protected handle(message: TransformerMessage<In>): void {
    switch (message.type) {
      case "subscribed":
        this.pump();
        break;
      case "next":
        if (this.upstream.onElement() && !this.transformerDone) {
          this.inputBuffer.push(message.element);
        }
        this.pump();
        break;
      case "complete":
        this.upstream.onTerminal();
        this.upstreamFinished = true;
        this.pump();
        break;
      case "error":
        this.upstream.onTerminal();
        this.fail(message.cause);
        break;
      case "attached":
        if (this.pendingFailure !== null) {
          this.fail(this.pendingFailure.cause);
          return;
        }
        this.pump();
        break;
      case "demand":
        this.pump();
        break;
      case "cancel":
        this.upstream.cancel();
        this.terminate(StageState.CANCELLED);
        break;
    }
  }

  protected onHandlerFailure(error: unknown): void {
    this.fail(toStreamError(error, this.name));
  }

  protected override release(): void {
    this.inputBuffer.clear();
    this.outputBuffer.clear();
    this.transformer.cleanup?.();
  }

  private fail(cause: unknown): void {
    this.upstream.cancel();
    if (this.downstream === null) {
      // Delivered once a subscriber attaches
      this.pendingFailure = { cause };
      return;
    }
    this.downstream.fail(cause);
    this.terminate(StageState.FAILED, cause);
  }

  private pump(): void {
    const out = this.downstream;
    if (out === null || this.isTerminated || this.pendingFailure !== null) return;

    if (!this.transformerDone && this.transformer.isComplete?.()) {
      this.finishConsuming();
    }

    while (!this.isTerminated && !out.isCancelled) {
      if (!this.outputBuffer.isEmpty) {
        if (out.demand === 0) break;
        out.emit(this.outputBuffer.shift());
        continue;
      }

      if (!this.inputBuffer.isEmpty) {
        this.process(this.inputBuffer.shift());
        continue;
      }

      if (this.upstreamFinished || this.transformerDone) {
        if (!this.terminationEmitted) {
          this.terminationEmitted = true;
          this.transition(StageState.COMPLETING);
          if (!this.runTransformer(() => this.transformer.onTermination?.() ?? [])) return;
          continue;
        }
        out.complete();
        this.terminate(StageState.COMPLETED);
        return;
      }
      break;
    }

    if (this.isTerminated) return;
    this.requestUpstream(out);
    this.settleState();
  }

  private process(element: In): void {
    this.transition(StageState.PROCESSING);
    if (!this.runTransformer(() => this.transformer.onNext(element))) return;
    if (!this.transformerDone && this.transformer.isComplete?.()) {
      this.finishConsuming();
    }
  }

  /** Collect transformer output into the output buffer; false if the transformer threw. */
  private runTransformer(produce: () => Iterable<Out>): boolean {
    try {
      for (const output of produce()) {
        this.outputBuffer.push(output);
      }
      return true;
    } catch (error) {
      this.fail(toStreamError(error, this.name));
      return false;
    }
  }

  private finishConsuming(): void {
    this.transformerDone = true;
    this.inputBuffer.clear();
    this.upstream.cancel();
  }

  private requestUpstream(out: DemandChannel<Out>): void {
    if (this.upstream.isClosed || this.transformerDone || out.isClosed || out.demand === 0) return;

    const size = this.context.inputBufferSize;
    const inFlight = this.inputBuffer.size + this.upstream.outstanding;
    const headroom = size - inFlight;
    if (headroom <= 0) return;

    const batch = Math.max(1, Math.floor(size / 2));
    if (headroom < batch && inFlight > 0) return;

    this.upstream.request(headroom);
  }

  private settleState(): void {
    if (this.upstreamFinished || this.transformerDone) {
      this.transition(StageState.COMPLETING);
    } else if (this.upstream.outstanding > 0 && this.inputBuffer.isEmpty) {
      this.transition(StageState.DEMANDING);
    } else {
      this.transition(StageState.IDLE);
    }
  }
}
