/**
 * Live stage at the head of a pipeline, driving a {@link TapLogic}.
 *
 * The stage converts downstream demand into `produce` calls. Synchronous taps
 * get at most `throughput` elements per turn and are re-invoked on the next
 * turn while demand remains, so an infinite tap under unbounded demand still
 * yields the event loop.
 *
 * @module stages/tap-stage
 */

import { CANCELLED_SUBSCRIPTION, DemandChannel, type DemandHandler } from "../demand-channel";
import { SubscriberRejectedError, toStreamError } from "../errors";
import { type Publisher, StageState, type Subscriber } from "../types";
import { LiveStage, type StageContext } from "./stage";

/**
 * Producer-side operations a tap may use. Only valid on the stage's own turn;
 * callbacks from timers or promises must go through `post`.
 */
export interface TapEmitter<T> {
  readonly stageName: string;
  /** Outstanding downstream demand */
  readonly demand: number;
  readonly isClosed: boolean;
  emit(element: T): void;
  complete(): void;
  fail(cause: unknown): void;
  /** Run `task` on the stage's turn. Ignored once the stage terminated. */
  post(task: () => void): void;
}

/**
 * Behaviour of one tap variant.
 */
export interface TapLogic<T> {
  /** Called once a subscriber is attached, before any demand. */
  start?(emitter: TapEmitter<T>): void;
  /** Produce at most `n` elements now. Producing fewer means "more later, asynchronously". */
  produce(emitter: TapEmitter<T>, n: number): void;
  /** Release resources; called on cancellation and after the tap terminated. */
  cancel(): void;
}

type TapMessage =
  | { type: "attached" }
  | { type: "demand" }
  | { type: "cancel" }
  | { type: "task"; run: () => void };

export class TapStage<T> extends LiveStage<TapMessage> implements Publisher<T> {
  private downstream: DemandChannel<T> | null = null;
  private readonly emitter: TapEmitter<T>;

  private readonly demandHandler: DemandHandler<T> = {
    onDemand: () => this.mailbox.enqueue({ type: "demand" }),
    onCancel: () => this.mailbox.prepend({ type: "cancel" }),
  };

  constructor(
    name: string,
    context: StageContext,
    private readonly logic: TapLogic<T>,
  ) {
    super(name, context);
    this.emitter = this.createEmitter();
  }

  subscribe(subscriber: Subscriber<T>): void {
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

  protected handle(message: TapMessage): void {
    switch (message.type) {
      case "attached":
        this.logic.start?.(this.emitter);
        this.pump();
        break;
      case "demand":
        this.pump();
        break;
      case "cancel":
        this.terminate(StageState.CANCELLED);
        break;
      case "task":
        message.run();
        this.settleState();
        break;
    }
  }

  protected onHandlerFailure(error: unknown): void {
    this.emitter.fail(toStreamError(error, this.name));
  }

  protected override release(): void {
    this.logic.cancel();
  }

  private pump(): void {
    const channel = this.downstream;
    if (channel === null || channel.isClosed || this.isTerminated) return;

    const batch = Math.min(channel.demand, this.context.throughput);
    if (batch > 0) {
      this.transition(StageState.PROCESSING);
      const before = channel.deliveredCount;
      this.logic.produce(this.emitter, batch);
      const produced = channel.deliveredCount - before;

      if (produced === batch && !channel.isClosed && channel.demand > 0) {
        this.mailbox.enqueue({ type: "demand" });
      }
    }
    this.settleState();
  }

  private settleState(): void {
    const channel = this.downstream;
    if (channel === null || this.isTerminated) return;
    this.transition(channel.demand > 0 ? StageState.DEMANDING : StageState.IDLE);
  }

  private createEmitter(): TapEmitter<T> {
    const stage = this;
    return {
      stageName: this.name,
      get demand() {
        return stage.downstream?.demand ?? 0;
      },
      get isClosed() {
        return stage.isTerminated || (stage.downstream?.isClosed ?? false);
      },
      emit(element) {
        stage.downstream?.emit(element);
      },
      complete() {
        stage.downstream?.complete();
        stage.terminate(StageState.COMPLETED);
      },
      fail(cause) {
        stage.downstream?.fail(cause);
        stage.terminate(StageState.FAILED, cause);
      },
      post(task) {
        stage.mailbox.enqueue({ type: "task", run: task });
      },
    };
  }
}
