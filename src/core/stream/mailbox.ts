/**
 * Scheduling substrate for live stages.
 *
 * Every stage owns one Mailbox. Messages are handled strictly one at a time in
 * arrival order, on turns handed out by a Scheduler, so a stage behaves like a
 * single logical task and never shares mutable state with its neighbours.
 *
 * @module mailbox
 */

/**
 * Runs tasks asynchronously relative to the caller.
 */
export interface Scheduler {
  schedule(task: () => void): void;
}

/** Macrotask scheduling: lets timers and I/O interleave with stream work. */
export const immediateScheduler: Scheduler = {
  schedule(task) {
    setImmediate(task);
  },
};

/** Microtask scheduling: lowest latency, but starves timers while work remains. */
export const microtaskScheduler: Scheduler = {
  schedule(task) {
    queueMicrotask(task);
  },
};

export function resolveScheduler(kind: "immediate" | "microtask"): Scheduler {
  return kind === "microtask" ? microtaskScheduler : immediateScheduler;
}

export interface MailboxOptions<M> {
  scheduler: Scheduler;
  /** Maximum messages handled per turn */
  throughput: number;
  handle: (message: M) => void;
  /** Called when `handle` throws; the mailbox keeps running afterwards */
  onFailure: (error: unknown) => void;
}

export class Mailbox<M> {
  private queue: M[] = [];
  private scheduled = false;
  private closed = false;

  constructor(private readonly options: MailboxOptions<M>) {}

  get size(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  enqueue(message: M): void {
    if (this.closed) return;
    this.queue.push(message);
    this.scheduleRun();
  }

  /** Enqueue ahead of pending messages; used for cancellation. */
  prepend(message: M): void {
    if (this.closed) return;
    this.queue.unshift(message);
    this.scheduleRun();
  }

  /** Drop pending messages and refuse new ones. */
  close(): void {
    this.closed = true;
    this.queue = [];
  }

  private scheduleRun(): void {
    if (this.scheduled) return;
    this.scheduled = true;
    this.options.scheduler.schedule(this.run);
  }

  private readonly run = (): void => {
    this.scheduled = false;
    let processed = 0;

    while (!this.closed && processed < this.options.throughput) {
      const message = this.queue.shift();
      if (message === undefined) break;
      processed++;

      try {
        this.options.handle(message);
      } catch (error) {
        this.options.onFailure(error);
      }
    }

    if (!this.closed && this.queue.length > 0) {
      this.scheduleRun();
    }
  };
}
