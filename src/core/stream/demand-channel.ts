/**
 * Demand channel: the unit of backpressure between one producer and one consumer.
 *
 * The consumer side is the {@link Subscription} handed to `onSubscribe`. The
 * producer side (`emit`, `complete`, `fail`) is used by the stage that owns the
 * channel. The channel enforces the edge's invariants itself:
 * - outstanding demand never drops below zero; emitting without demand throws
 * - at most one terminal signal, and no element after it
 * - after cancellation neither elements nor demand pass in either direction
 *
 * @module demand-channel
 */

import { InvalidDemandError, ProtocolViolationError } from "./errors";
import type { Subscriber, Subscription, TerminalSignal } from "./types";

/** Saturation point for accumulated demand; reaching it means "unbounded". */
export const MAX_DEMAND = Number.MAX_SAFE_INTEGER;

/**
 * Producer-side callbacks. Invoked synchronously from `request` / `cancel`, so
 * implementations should only enqueue work.
 */
export interface DemandHandler<T> {
  onDemand(channel: DemandChannel<T>, n: number): void;
  onCancel(channel: DemandChannel<T>): void;
}

export class DemandChannel<T> implements Subscription {
  private outstanding = 0;
  private terminal: TerminalSignal | null = null;
  private cancelled = false;
  private delivered = 0;

  constructor(
    private readonly subscriber: Subscriber<T>,
    private readonly producer: DemandHandler<T>,
    /** Name of the producing stage, used in protocol errors */
    readonly producerName: string,
  ) {}

  /** Hand the subscription to the consumer. Must precede any other signal. */
  open(): void {
    this.subscriber.onSubscribe(this);
  }

  // Consumer side

  request(n: number): void {
    if (this.isClosed) return;

    if (!Number.isInteger(n) || n <= 0) {
      this.cancelled = true;
      this.producer.onCancel(this);
      this.signalTerminal({ type: "error", cause: new InvalidDemandError(n) });
      return;
    }

    this.outstanding = Math.min(MAX_DEMAND, this.outstanding + n);
    this.producer.onDemand(this, n);
  }

  cancel(): void {
    if (this.isClosed) return;
    this.cancelled = true;
    this.producer.onCancel(this);
  }

  // Producer side

  /** Outstanding demand not yet fulfilled. */
  get demand(): number {
    return this.outstanding;
  }

  /** Elements delivered over the lifetime of the channel. */
  get deliveredCount(): number {
    return this.delivered;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  get isTerminated(): boolean {
    return this.terminal !== null;
  }

  /** True once the channel will carry no more traffic. */
  get isClosed(): boolean {
    return this.cancelled || this.terminal !== null;
  }

  /**
   * Deliver one element. Returns false when the channel is already closed and
   * the element was discarded.
   *
   * @throws ProtocolViolationError when there is no outstanding demand
   */
  emit(element: T): boolean {
    if (this.isClosed) return false;

    if (this.outstanding <= 0) {
      throw new ProtocolViolationError(`Stage "${this.producerName}" emitted an element without demand`, this.producerName);
    }

    this.outstanding--;
    this.delivered++;

    try {
      this.subscriber.onNext(element);
    } catch (error) {
      // A subscriber that throws is considered cancelled
      this.cancel();
      throw error;
    }
    return true;
  }

  complete(): void {
    if (this.isClosed) return;
    this.signalTerminal({ type: "complete" });
  }

  fail(cause: unknown): void {
    if (this.isClosed) return;
    this.signalTerminal({ type: "error", cause });
  }

  private signalTerminal(signal: TerminalSignal): void {
    if (this.terminal !== null) return;
    this.terminal = signal;
    this.outstanding = 0;

    if (signal.type === "complete") {
      this.subscriber.onComplete();
    } else {
      this.subscriber.onError(signal.cause);
    }
  }
}

/**
 * Inert subscription handed to subscribers that are rejected outright.
 */
export const CANCELLED_SUBSCRIPTION: Subscription = {
  request() {},
  cancel() {},
};
