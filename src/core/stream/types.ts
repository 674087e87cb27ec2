/**
 * Core contracts for demand-driven stream materialization.
 *
 * Stages, taps and sinks talk to each other exclusively through these types:
 * 1. Publisher / Subscriber / Subscription - the producer/consumer handshake
 * 2. StreamSignal - tagged form of the subscriber callbacks, used by mailboxes
 * 3. Transformer - the per-run logic a stage descriptor instantiates
 *
 * A producer may call `onNext` only up to the demand its consumer has issued
 * through `Subscription.request`, and signals at most one of `onComplete` /
 * `onError` per subscription.
 */

/**
 * Handle a consumer uses to pull elements from its producer.
 */
export interface Subscription {
  /** Authorize the producer to send up to `n` more elements. `n` must be a positive integer. */
  request(n: number): void;
  /** Withdraw interest. No acknowledgement is sent back. */
  cancel(): void;
}

/**
 * Consumer side of one edge.
 *
 * @template T - Element type received
 */
export interface Subscriber<T> {
  onSubscribe(subscription: Subscription): void;
  onNext(element: T): void;
  onError(cause: unknown): void;
  onComplete(): void;
}

/**
 * Producer side of one or more edges.
 *
 * @template T - Element type emitted
 */
export interface Publisher<T> {
  subscribe(subscriber: Subscriber<T>): void;
}

/**
 * Tagged representation of what a producer can tell its consumer.
 *
 * @example
 * ```typescript
 * const signals: StreamSignal<number>[] = [
 *   { type: "next", element: 1 },
 *   { type: "complete" },
 * ];
 * ```
 */
export type StreamSignal<T> =
  | { type: "next"; element: T }
  | { type: "complete" }
  | { type: "error"; cause: unknown };

/**
 * Terminal subset of {@link StreamSignal}.
 */
export type TerminalSignal = Exclude<StreamSignal<never>, { type: "next" }>;

/**
 * Per-run stage logic created from a stage descriptor.
 *
 * A transformer receives one element at a time and may emit zero or more
 * outputs for it. It is never called concurrently.
 *
 * @template In - Element type accepted
 * @template Out - Element type produced
 *
 * @example
 * ```typescript
 * const duplicate: Transformer<number, number> = {
 *   onNext: (n) => [n, n],
 * };
 * ```
 */
export interface Transformer<In, Out> {
  /** Handle one upstream element; the returned elements are emitted in order. */
  onNext(element: In): Iterable<Out>;
  /** Elements to emit after upstream completed and all input was processed. */
  onTermination?(): Iterable<Out>;
  /** When true the stage stops consuming: upstream is cancelled and downstream completes. */
  isComplete?(): boolean;
  /** Release resources. Called once when the stage reaches any terminal state. */
  cleanup?(): void;
}

/**
 * Stateless, shareable description of one transformation stage.
 * `createTransformer` runs once per materialization.
 */
export interface StageDescriptor<In, Out> {
  readonly name: string;
  readonly kind: string;
  createTransformer(): Transformer<In, Out>;
}

/**
 * Lifecycle of a live stage.
 *
 * idle -> demanding -> processing -> idle/demanding
 *      -> completing -> completed
 *      -> failed
 *      -> cancelled
 */
export enum StageState {
  IDLE = "idle",
  DEMANDING = "demanding",
  PROCESSING = "processing",
  COMPLETING = "completing",
  COMPLETED = "completed",
  FAILED = "failed",
  CANCELLED = "cancelled",
}

export function isTerminalState(state: StageState): boolean {
  return state === StageState.COMPLETED || state === StageState.FAILED || state === StageState.CANCELLED;
}

/**
 * Point-in-time view of a live stage, for observability and tests.
 */
export interface StageSnapshot {
  name: string;
  state: StageState;
}
