/**
 * Composable stream graphs with demand-driven materialization.
 *
 * Graphs are described with immutable Source / Flow / Sink values and run by
 * a FlowMaterializer, which turns every descriptor into a live stage with its
 * own mailbox and connects neighbours through demand channels.
 *
 * @module stream
 */

// Graph description
export { Flow } from "./flow";
export { Sink } from "./sink";
export { RunnableFlow, Source } from "./source";
export type { TapDescriptor, TapKind } from "./taps";
export type { ConfiguredStageDescriptor, StageOptions } from "./transformers";
export { filterStage, mapConcatStage, mapStage, stage, takeStage } from "./transformers";
// Materialization
export type { CompletionHandle } from "./materializer";
export { FlowMaterializer } from "./materializer";
export type { Scheduler } from "./mailbox";
export { immediateScheduler, microtaskScheduler } from "./mailbox";
export type { FanoutBounds, MaterializerSettings, MaterializerSettingsInput } from "./settings";
export { materializerSettingsSchema, parseMaterializerSettings } from "./settings";
export type { SinkLogic } from "./stages/sink-stage";
// Retry
export type { RetryMetadata, RetryOptions, RetryOutcome } from "./retry";
export { runWithRetry } from "./retry";
// Errors
export type { StreamErrorCode } from "./errors";
export {
  CompositionError,
  extractErrorCode,
  FlowClosedError,
  InvalidDemandError,
  InvalidSettingsError,
  isRetryableError,
  ProtocolViolationError,
  SlowSubscriberError,
  StageFailureError,
  StreamCancelledError,
  StreamError,
  SubscriberRejectedError,
  toStreamError,
} from "./errors";
// Contracts
export type {
  Publisher,
  StageDescriptor,
  StageSnapshot,
  StreamSignal,
  Subscriber,
  Subscription,
  TerminalSignal,
  Transformer,
} from "./types";
export { isTerminalState, StageState } from "./types";
