/**
 * Live stage at the tail of a pipeline, feeding a {@link SinkLogic} and
 * settling the run's result promise.
 *
 * Demand policy: request `inputBufferSize` elements up front and top up once
 * at least half of them were consumed.
 *
 * @module stages/sink-stage
 */

import { StreamCancelledError, toStreamError } from "../errors";
import { StageState, type StreamSignal, type Subscriber, type Subscription } from "../types";
import { LiveStage, type StageContext, UpstreamConnection } from "./stage";

/**
 * Per-run consumer logic created from a sink descriptor.
 *
 * @template In - Element type consumed
 * @template M - Value the run resolves to
 */
export interface SinkLogic<In, M> {
  onNext(element: In): void;
  /** Produce the run's result once upstream completed. */
  onComplete(): M;
}

type SinkMessage<In> = StreamSignal<In> | { type: "subscribed" } | { type: "cancel" };

export class SinkStage<In, M> extends LiveStage<SinkMessage<In>> implements Subscriber<In> {
  private readonly upstream: UpstreamConnection;
  readonly result: Promise<M>;
  private readonly resolveResult: (value: M) => void;
  private readonly rejectResult: (reason: unknown) => void;

  constructor(
    name: string,
    context: StageContext,
    private readonly logic: SinkLogic<In, M>,
  ) {
    super(name, context);
    this.upstream = new UpstreamConnection(name);

    let resolveResult: (value: M) => void = () => undefined;
    let rejectResult: (reason: unknown) => void = () => undefined;
    this.result = new Promise<M>((resolve, reject) => {
      resolveResult = resolve;
      rejectResult = reject;
    });
    this.resolveResult = resolveResult;
    this.rejectResult = rejectResult;
  }

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

  /** Stop consuming; the result rejects with StreamCancelledError. */
  cancel(): void {
    this.mailbox.prepend({ type: "cancel" });
  }

  protected handle(message: SinkMessage<In>): void {
    switch (message.type) {
      case "subscribed":
        this.requestMore();
        break;
      case "next":
        if (!this.upstream.onElement()) return;
        this.transition(StageState.PROCESSING);
        this.logic.onNext(message.element);
        this.requestMore();
        break;
      case "complete": {
        this.upstream.onTerminal();
        this.transition(StageState.COMPLETING);
        const value = this.logic.onComplete();
        this.terminate(StageState.COMPLETED);
        this.resolveResult(value);
        break;
      }
      case "error":
        this.upstream.onTerminal();
        this.terminate(StageState.FAILED, message.cause);
        this.rejectResult(message.cause);
        break;
      case "cancel":
        this.upstream.cancel();
        this.terminate(StageState.CANCELLED);
        this.rejectResult(new StreamCancelledError(this.name));
        break;
    }
  }

  protected onHandlerFailure(error: unknown): void {
    const failure = toStreamError(error, this.name);
    this.upstream.cancel();
    this.terminate(StageState.FAILED, failure);
    this.rejectResult(failure);
  }

  private requestMore(): void {
    const size = this.context.inputBufferSize;
    const outstanding = this.upstream.outstanding;
    if (outstanding <= size / 2) {
      this.upstream.request(size - outstanding);
    }
    this.transition(StageState.DEMANDING);
  }
}
