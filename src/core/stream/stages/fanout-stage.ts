/**
 * Live stage that delivers one upstream to any number of subscribers.
 *
 * All subscribers read from one shared buffer through their own cursor; the
 * stage's mailbox is the single arbitration point for that buffer.
 *
 * Buffer policy (drop slow subscriber):
 * - upstream demand follows the subscriber with the most unfulfilled demand,
 *   bounded by the current buffer size
 * - the buffer size starts at `initialBufferSize` and doubles, up to
 *   `maximumBufferSize`, while the slowest subscriber's backlog fills it
 * - a subscriber whose backlog exceeds `maximumBufferSize` is removed with
 *   `SlowSubscriberError`; the others keep receiving
 * - late subscribers only see elements produced after they attached
 * - once every subscriber is gone, upstream is cancelled
 *
 * @module stages/fanout-stage
 */

import { DemandChannel, type DemandHandler } from "../demand-channel";
import { SlowSubscriberError, toStreamError } from "../errors";
import { ElementQueue } from "../queue";
import type { FanoutBounds } from "../settings";
import { type Publisher, StageState, type StreamSignal, type Subscriber, type Subscription } from "../types";
import { LiveStage, type StageContext, UpstreamConnection } from "./stage";

type FanoutMessage<T> =
  | StreamSignal<T>
  | { type: "subscribed" }
  | { type: "attached"; channel: DemandChannel<T> }
  | { type: "demand" }
  | { type: "cancel"; channel: DemandChannel<T> };

interface Cursor<T> {
  channel: DemandChannel<T>;
  /** Sequence number of the next element this subscriber receives */
  position: number;
}

export class FanoutStage<T> extends LiveStage<FanoutMessage<T>> implements Subscriber<T>, Publisher<T> {
  private readonly upstream: UpstreamConnection;
  private readonly buffer = new ElementQueue<T>();
  /** Sequence number of the buffer's first element */
  private bufferStart = 0;
  private bufferSize: number;
  private readonly cursors = new Map<DemandChannel<T>, Cursor<T>>();
  private readonly pendingAttach = new Set<DemandChannel<T>>();
  private everSubscribed = false;
  private upstreamFinished = false;
  private failure: { cause: unknown } | null = null;

  private readonly demandHandler: DemandHandler<T> = {
    onDemand: () => this.mailbox.enqueue({ type: "demand" }),
    onCancel: (channel) => this.mailbox.prepend({ type: "cancel", channel }),
  };

  constructor(
    name: string,
    context: StageContext,
    private readonly bounds: FanoutBounds,
  ) {
    super(name, context);
    this.upstream = new UpstreamConnection(name);
    this.bufferSize = bounds.initialBufferSize;
  }

  /** Current upstream request bound; grows towards `maximumBufferSize`. */
  get currentBufferSize(): number {
    return this.bufferSize;
  }

  get subscriberCount(): number {
    return this.cursors.size + this.pendingAttach.size;
  }

  private get sequence(): number {
    return this.bufferStart + this.buffer.size;
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

  onNext(element: T): void {
    this.mailbox.enqueue({ type: "next", element });
  }

  onError(cause: unknown): void {
    this.mailbox.enqueue({ type: "error", cause });
  }

  onComplete(): void {
    this.mailbox.enqueue({ type: "complete" });
  }

  // Downstream side

  subscribe(subscriber: Subscriber<T>): void {
    const channel = new DemandChannel(subscriber, this.demandHandler, this.name);
    channel.open();

    if (this.isTerminated) {
      this.signalLate(channel);
      return;
    }
    this.pendingAttach.add(channel);
    this.mailbox.enqueue({ type: "attached", channel });
  }

  protected handle(message: FanoutMessage<T>): void {
    switch (message.type) {
      case "subscribed":
        break;
      case "next":
        if (this.upstream.onElement()) {
          this.buffer.push(message.element);
        }
        break;
      case "complete":
        this.upstream.onTerminal();
        this.upstreamFinished = true;
        break;
      case "error":
        this.upstream.onTerminal();
        this.failAll(message.cause);
        return;
      case "attached":
        this.pendingAttach.delete(message.channel);
        if (!message.channel.isClosed) {
          this.everSubscribed = true;
          this.cursors.set(message.channel, { channel: message.channel, position: this.sequence });
          this.logger.debug({ event: "subscriber_attached", subscribers: this.cursors.size });
        }
        break;
      case "demand":
        break;
      case "cancel":
        this.pendingAttach.delete(message.channel);
        if (this.cursors.delete(message.channel)) {
          this.logger.debug({ event: "subscriber_cancelled", subscribers: this.cursors.size });
        }
        break;
    }
    this.pump();
  }

  protected onHandlerFailure(error: unknown): void {
    this.upstream.cancel();
    this.failAll(toStreamError(error, this.name));
  }

  protected override release(): void {
    this.buffer.clear();
    for (const channel of this.pendingAttach) {
      this.signalLate(channel);
    }
    this.pendingAttach.clear();
  }

  private signalLate(channel: DemandChannel<T>): void {
    if (this.failure !== null) {
      channel.fail(this.failure.cause);
    } else {
      channel.complete();
    }
  }

  private failAll(cause: unknown): void {
    this.failure = { cause };
    for (const { channel } of this.cursors.values()) {
      channel.fail(cause);
    }
    this.cursors.clear();
    this.terminate(StageState.FAILED, cause);
  }

  private pump(): void {
    if (this.isTerminated) return;

    for (const cursor of [...this.cursors.values()]) {
      this.deliver(cursor);
    }
    this.dropSlowSubscribers();
    this.completeDrainedSubscribers();
    this.compact();

    if (this.cursors.size === 0 && this.pendingAttach.size === 0 && (this.upstreamFinished || this.everSubscribed)) {
      if (this.upstreamFinished) {
        this.terminate(StageState.COMPLETED);
      } else {
        this.upstream.cancel();
        this.terminate(StageState.CANCELLED);
      }
      return;
    }

    this.growBuffer();
    this.requestUpstream();
    this.transition(
      this.upstreamFinished
        ? StageState.COMPLETING
        : this.upstream.outstanding > 0
          ? StageState.DEMANDING
          : StageState.IDLE,
    );
  }

  private deliver(cursor: Cursor<T>): void {
    const { channel } = cursor;
    while (!channel.isClosed && channel.demand > 0 && cursor.position < this.sequence) {
      const element = this.buffer.at(cursor.position - this.bufferStart);
      cursor.position++;
      try {
        channel.emit(element);
      } catch (error) {
        this.logger.warn({ event: "subscriber_failed", err: error });
      }
    }
    if (channel.isClosed) {
      this.cursors.delete(channel);
    }
  }

  private dropSlowSubscribers(): void {
    const maximum = this.bounds.maximumBufferSize;
    for (const cursor of [...this.cursors.values()]) {
      const backlog = this.sequence - cursor.position;
      if (backlog > maximum) {
        this.cursors.delete(cursor.channel);
        this.logger.warn({ event: "subscriber_dropped", backlog, maximumBufferSize: maximum });
        cursor.channel.fail(new SlowSubscriberError(this.name, backlog, maximum));
      }
    }
  }

  private completeDrainedSubscribers(): void {
    if (!this.upstreamFinished) return;
    for (const cursor of [...this.cursors.values()]) {
      if (cursor.position === this.sequence) {
        this.cursors.delete(cursor.channel);
        cursor.channel.complete();
      }
    }
  }

  /** Drop elements every remaining subscriber has already received. */
  private compact(): void {
    let lowest = this.sequence;
    for (const cursor of this.cursors.values()) {
      lowest = Math.min(lowest, cursor.position);
    }
    this.buffer.drop(lowest - this.bufferStart);
    this.bufferStart = lowest;
  }

  private growBuffer(): void {
    const maximum = this.bounds.maximumBufferSize;
    if (this.bufferSize >= maximum) return;

    let slowestBacklog = 0;
    for (const cursor of this.cursors.values()) {
      slowestBacklog = Math.max(slowestBacklog, this.sequence - cursor.position);
    }
    if (slowestBacklog >= this.bufferSize) {
      this.bufferSize = Math.min(maximum, this.bufferSize * 2);
      this.logger.debug({ event: "fanout_buffer_grown", bufferSize: this.bufferSize });
    }
  }

  private requestUpstream(): void {
    if (this.upstream.isClosed) return;

    let wanted = 0;
    for (const cursor of this.cursors.values()) {
      const backlog = this.sequence - cursor.position;
      wanted = Math.max(wanted, cursor.channel.demand - backlog);
    }
    if (wanted <= 0) return;

    this.upstream.request(Math.min(wanted, this.bufferSize) - this.upstream.outstanding);
  }
}
