/**
 * Test helpers for stream materialization integration tests.
 *
 * This module provides utilities for:
 * - Letting scheduled stage turns run
 * - Recording what a subscriber was signalled
 * - Publishers that break the demand protocol on purpose
 */

import type { Publisher, Subscriber, Subscription } from "../../types";

/**
 * Let `rounds` macrotask turns pass so that mailboxes scheduled with
 * setImmediate get to drain.
 */
export async function flush(rounds = 10): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

/**
 * Poll until `predicate` holds, yielding a macrotask between checks.
 *
 * @throws Error when the predicate still fails after `maxRounds` turns
 */
export async function waitFor(predicate: () => boolean, maxRounds = 1000): Promise<void> {
  for (let i = 0; i < maxRounds; i++) {
    if (predicate()) return;
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
  throw new Error(`Condition not met after ${maxRounds} rounds`);
}

/**
 * Subscriber that records every signal and requests on the test's behalf.
 *
 * @template T - Element type received
 */
export class RecordingSubscriber<T> implements Subscriber<T> {
  readonly elements: T[] = [];
  subscription: Subscription | null = null;
  error: unknown = undefined;
  completed = false;
  subscribeCount = 0;
  /** Resolves on the first terminal signal */
  readonly done: Promise<void>;
  private settle: () => void = () => undefined;

  /**
   * @param initialDemand - Requested from inside `onSubscribe`; 0 requests nothing
   */
  constructor(private readonly initialDemand = 0) {
    this.done = new Promise<void>((resolve) => {
      this.settle = resolve;
    });
  }

  get isTerminated(): boolean {
    return this.completed || this.error !== undefined;
  }

  onSubscribe(subscription: Subscription): void {
    this.subscribeCount++;
    this.subscription = subscription;
    if (this.initialDemand > 0) {
      subscription.request(this.initialDemand);
    }
  }

  onNext(element: T): void {
    this.elements.push(element);
  }

  onError(cause: unknown): void {
    this.error = cause;
    this.settle();
  }

  onComplete(): void {
    this.completed = true;
    this.settle();
  }

  request(n: number): void {
    this.subscription?.request(n);
  }

  cancel(): void {
    this.subscription?.cancel();
  }
}

/**
 * Publisher that pushes `elements` right after `onSubscribe`, without waiting
 * for demand.
 */
export function unsolicitedPublisher<T>(elements: T[]): Publisher<T> {
  return {
    subscribe(subscriber) {
      subscriber.onSubscribe({ request() {}, cancel() {} });
      for (const element of elements) {
        subscriber.onNext(element);
      }
    },
  };
}

/**
 * Well-behaved publisher over an array: emits only what was requested and
 * records every request it receives.
 */
export function arrayPublisher<T>(elements: T[]): Publisher<T> & { requests: number[]; cancelled: boolean } {
  const requests: number[] = [];
  let cancelled = false;

  return {
    requests,
    get cancelled() {
      return cancelled;
    },
    subscribe(subscriber) {
      let index = 0;
      let done = false;
      subscriber.onSubscribe({
        request(n) {
          requests.push(n);
          for (let i = 0; i < n && !done && index < elements.length; i++) {
            const element = elements[index++];
            if (element !== undefined) subscriber.onNext(element);
          }
          if (!done && index >= elements.length) {
            done = true;
            subscriber.onComplete();
          }
        },
        cancel() {
          cancelled = true;
          done = true;
        },
      });
    },
  };
}
