/**
 * Shared machinery for live stages.
 *
 * A live stage is one logical task: it owns a mailbox, handles one message at
 * a time, and only talks to its neighbours through demand channels. Subclasses
 * implement `handle` and decide when to `terminate`.
 *
 * @module stages/stage
 */

import { createLogger, type Logger } from "../../logging/logger";
import { ProtocolViolationError } from "../errors";
import { Mailbox, type Scheduler } from "../mailbox";
import { isTerminalState, type StageSnapshot, StageState, type Subscription } from "../types";

/**
 * Per-stage resources handed out by the materialization that creates it.
 */
export interface StageContext {
  materializationId: string;
  scheduler: Scheduler;
  /** Messages handled per scheduled turn */
  throughput: number;
  /** Elements the stage may request ahead of downstream use */
  inputBufferSize: number;
}

export abstract class LiveStage<M> {
  private current: StageState = StageState.IDLE;
  protected readonly logger: Logger;
  protected readonly mailbox: Mailbox<M>;

  constructor(
    readonly name: string,
    protected readonly context: StageContext,
  ) {
    this.logger = createLogger("stage", { materializationId: context.materializationId, stage: name });
    this.mailbox = new Mailbox<M>({
      scheduler: context.scheduler,
      throughput: context.throughput,
      handle: (message) => this.handle(message),
      onFailure: (error) => this.onHandlerFailure(error),
    });
  }

  get state(): StageState {
    return this.current;
  }

  get isTerminated(): boolean {
    return isTerminalState(this.current);
  }

  snapshot(): StageSnapshot {
    return { name: this.name, state: this.current };
  }

  protected abstract handle(message: M): void;

  /** Something threw while handling a message: the stage must fail. */
  protected abstract onHandlerFailure(error: unknown): void;

  /** Release stage-specific resources; runs once on termination. */
  protected release(): void {}

  protected transition(next: StageState): void {
    if (this.isTerminated || this.current === next) return;
    this.logger.trace({ event: "stage_state_changed", from: this.current, to: next });
    this.current = next;
  }

  protected terminate(final: StageState.COMPLETED | StageState.FAILED | StageState.CANCELLED, cause?: unknown): void {
    if (this.isTerminated) return;
    this.transition(final);
    this.mailbox.close();

    try {
      this.release();
    } catch (error) {
      this.logger.error({ event: "stage_release_failed", err: error });
    }

    if (final === StageState.FAILED) {
      this.logger.warn({ event: "stage_failed", err: cause });
    } else {
      this.logger.debug({ event: `stage_${final}` });
    }
  }
}

/**
 * Consumer-side bookkeeping for a stage's single upstream subscription.
 */
export class UpstreamConnection {
  private subscription: Subscription | null = null;
  private requested = 0;
  private closed = false;

  constructor(private readonly stageName: string) {}

  /** Requested but not yet delivered. */
  get outstanding(): number {
    return this.requested;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Accept a subscription. Returns false when one is already attached; the
   * caller must cancel the surplus subscription.
   */
  attach(subscription: Subscription): boolean {
    if (this.subscription !== null) return false;
    this.subscription = subscription;
    if (this.closed) subscription.cancel();
    return true;
  }

  request(n: number): void {
    if (this.closed || this.subscription === null || n <= 0) return;
    this.requested += n;
    this.subscription.request(n);
  }

  /**
   * Account for one delivered element. Returns false when the element arrived
   * after cancellation and must be dropped.
   *
   * @throws ProtocolViolationError when the element was never requested
   */
  onElement(): boolean {
    if (this.closed) return false;
    if (this.requested <= 0) {
      throw new ProtocolViolationError(`Stage "${this.stageName}" received an element it did not request`, this.stageName);
    }
    this.requested--;
    return true;
  }

  /** Upstream delivered its terminal signal. */
  onTerminal(): void {
    this.closed = true;
    this.requested = 0;
  }

  cancel(): void {
    if (this.closed) return;
    this.closed = true;
    this.requested = 0;
    this.subscription?.cancel();
  }
}
