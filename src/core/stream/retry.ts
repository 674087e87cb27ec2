import { setTimeout as sleep } from "node:timers/promises";
import { createLogger } from "../logging/logger";
import { extractErrorCode, InvalidSettingsError, isRetryableError } from "./errors";
import type { FlowMaterializer } from "./materializer";
import type { RunnableFlow } from "./source";

const logger = createLogger("retry");

export interface RetryOptions {
  /** Total runs allowed, including the first */
  maxAttempts: number;
  /** Base delay; attempt `n` waits `backoffMs * n` before the next run */
  backoffMs?: number;
  /** Defaults to {@link isRetryableError} */
  shouldRetry?: (error: unknown) => boolean;
}

export interface RetryMetadata {
  attempts: number;
  succeeded: boolean;
  totalDurationMs: number;
  /** Failure of every unsuccessful attempt, oldest first */
  errors: unknown[];
}

export type RetryOutcome<M> =
  | { success: true; result: M; metadata: RetryMetadata }
  | { success: false; error: unknown; metadata: RetryMetadata };

/**
 * Run a closed graph, materializing it again after each retryable failure.
 *
 * Every attempt is a fresh, isolated materialization. Taps that share state
 * across runs (`Source.fromIterator`) resume where the failed run stopped.
 *
 * @example
 * ```typescript
 * const outcome = await runWithRetry(graph, materializer, { maxAttempts: 3, backoffMs: 200 });
 * if (outcome.success) {
 *   console.log(outcome.result, outcome.metadata.attempts);
 * }
 * ```
 */
export async function runWithRetry<M>(
  runnable: RunnableFlow<M>,
  materializer: FlowMaterializer,
  options: RetryOptions,
): Promise<RetryOutcome<M>> {
  const { maxAttempts, backoffMs = 1000, shouldRetry = isRetryableError } = options;
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new InvalidSettingsError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
  }
  if (!(backoffMs >= 0)) {
    throw new InvalidSettingsError(`backoffMs must not be negative, got ${backoffMs}`);
  }

  const startTime = performance.now();
  const errors: unknown[] = [];

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const handle = runnable.run(materializer);
    try {
      const result = await handle.result;
      return {
        success: true,
        result,
        metadata: { attempts: attempt, succeeded: true, totalDurationMs: performance.now() - startTime, errors },
      };
    } catch (error) {
      errors.push(error);

      if (attempt >= maxAttempts || !shouldRetry(error)) {
        logger.error({
          event: "run_failed",
          materializationId: handle.id,
          attempt,
          maxAttempts,
          errorCode: extractErrorCode(error),
          err: error,
        });
        return {
          success: false,
          error,
          metadata: { attempts: attempt, succeeded: false, totalDurationMs: performance.now() - startTime, errors },
        };
      }

      logger.warn({
        event: "run_retry",
        materializationId: handle.id,
        attempt,
        maxAttempts,
        backoffMs,
        errorCode: extractErrorCode(error),
      });
      await sleep(backoffMs * attempt);
    }
  }

  // maxAttempts >= 1, so the loop always returns
  throw new InvalidSettingsError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
}
