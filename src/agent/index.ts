/**
 * @fileoverview Agent module public exports.
 *
 * @module orga-runtime/agent
 */

export {
  ReasoningLoopRunner,
  type LoopRunnerEvents,
  type LoopRunnerOptions,
  type RunOptions,
} from './loop-runner.js';

export {
  ReasoningPhase,
  PolicyCheckPhase,
  ToolDispatchingPhase,
  ObservingPhase,
  budgetExceeded,
  loopState,
  observationText,
  type Phase,
  type PhaseListener,
  type RunContext,
  type Terminated,
} from './phases.js';

export { backoffDelay, withInferenceRetry, type InferenceRetryOptions } from './inference-retry.js';
