/**
 * Error taxonomy for stream materialization.
 *
 * - Composition errors: detected while building or wiring a graph, reported
 *   synchronously (FlowClosedError, SubscriberRejectedError, InvalidSettingsError)
 * - Stage failures: user code threw while a stage was running (StageFailureError)
 * - Protocol errors: a participant broke the demand contract
 *   (ProtocolViolationError, InvalidDemandError)
 * - Fan-out drops: a subscriber fell too far behind (SlowSubscriberError)
 * - Caller cancellation: StreamCancelledError
 *
 * Every class carries a stable `code` for programmatic handling.
 *
 * @module errors
 */

export type StreamErrorCode =
  | "COMPOSITION_ERROR"
  | "FLOW_CLOSED"
  | "SUBSCRIBER_REJECTED"
  | "INVALID_SETTINGS"
  | "STAGE_FAILURE"
  | "PROTOCOL_VIOLATION"
  | "INVALID_DEMAND"
  | "SLOW_SUBSCRIBER"
  | "CANCELLED"
  | "STREAM_ERROR";

export interface StreamErrorOptions {
  /** Name of the stage where the error occurred */
  stageName?: string;
  /** Original error that caused this error */
  cause?: unknown;
}

/**
 * Base class for every error raised by the stream core.
 */
export class StreamError extends Error {
  readonly code: StreamErrorCode;
  readonly stageName?: string;

  constructor(code: StreamErrorCode, message: string, options: StreamErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.stageName = options.stageName;
  }
}

/**
 * Raised synchronously while composing or wiring a graph.
 */
export class CompositionError extends StreamError {
  constructor(message: string, code: StreamErrorCode = "COMPOSITION_ERROR", options?: StreamErrorOptions) {
    super(code, message, options);
  }
}

export class FlowClosedError extends CompositionError {
  constructor() {
    super("Runnable flow is already closed and cannot be extended", "FLOW_CLOSED");
  }
}

export class SubscriberRejectedError extends CompositionError {
  constructor(stageName: string) {
    super(`Publisher of stage "${stageName}" only supports one subscriber`, "SUBSCRIBER_REJECTED", { stageName });
  }
}

export class InvalidSettingsError extends CompositionError {
  constructor(message: string, cause?: unknown) {
    super(message, "INVALID_SETTINGS", { cause });
  }
}

/**
 * User code (transformer, thunk, sink callback) threw while the stream was running.
 */
export class StageFailureError extends StreamError {
  constructor(stageName: string, cause: unknown) {
    super("STAGE_FAILURE", `Stage "${stageName}" failed: ${describeCause(cause)}`, { stageName, cause });
  }
}

export class ProtocolViolationError extends StreamError {
  constructor(message: string, stageName?: string) {
    super("PROTOCOL_VIOLATION", message, { stageName });
  }
}

export class InvalidDemandError extends StreamError {
  constructor(requested: number) {
    super("INVALID_DEMAND", `Demand must be a positive integer, got ${requested}`);
  }
}

export class SlowSubscriberError extends StreamError {
  constructor(stageName: string, backlog: number, maximumBufferSize: number) {
    super(
      "SLOW_SUBSCRIBER",
      `Subscriber dropped: backlog of ${backlog} exceeds maximum buffer size ${maximumBufferSize}`,
      { stageName },
    );
  }
}

/**
 * Result of a materialization that was cancelled through its completion handle.
 */
export class StreamCancelledError extends StreamError {
  constructor(stageName: string) {
    super("CANCELLED", `Stream was cancelled at stage "${stageName}"`, { stageName });
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Normalize anything thrown by user code into a StreamError.
 * StreamErrors pass through untouched; everything else is wrapped as a stage failure.
 *
 * @example
 * ```typescript
 * toStreamError(new Error("boom"), "parse").message; // 'Stage "parse" failed: boom'
 * ```
 */
export function toStreamError(cause: unknown, stageName: string): StreamError {
  if (cause instanceof StreamError) {
    return cause;
  }
  return new StageFailureError(stageName, cause);
}

/**
 * Extract an error code from an error object.
 * Prefers an explicit `code` property, falls back to well known message patterns.
 */
export function extractErrorCode(error: unknown): string {
  if (error instanceof Error) {
    if ("code" in error && (typeof error.code === "string" || typeof error.code === "number")) {
      return String(error.code);
    }

    const knownErrors = ["ETIMEDOUT", "ECONNRESET", "ECONNREFUSED", "RATE_LIMIT"];
    const matchedCode = knownErrors.find((code) => error.message.includes(code));
    if (matchedCode) {
      return matchedCode;
    }
  }

  return "STREAM_ERROR";
}

/**
 * Check whether a failed materialization is worth running again.
 * Composition and protocol errors never are; transient I/O failures are.
 */
export function isRetryableError(error: unknown): boolean {
  const root = error instanceof StageFailureError ? error.cause : error;

  if (root instanceof CompositionError || root instanceof ProtocolViolationError) {
    return false;
  }

  if (root instanceof Error) {
    const retryableMessages = ["ECONNRESET", "ETIMEDOUT", "ECONNREFUSED", "fetch failed", "rate limit"];
    return retryableMessages.some((msg) => root.message.toLowerCase().includes(msg.toLowerCase()));
  }
  return false;
}
