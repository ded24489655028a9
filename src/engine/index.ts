/**
 * Engine module exports.
 */

export {
  ResultAggregator,
  collectAggregator,
  countAggregator,
  foldAggregator,
  reduceAggregator,
  type CollectedResults,
  type OutcomeCounts,
  type ReducedResults,
} from "./aggregator.js";
export { OutcomeChannel } from "./channel.js";
export { BoundedDispatcher, type LaunchFn } from "./dispatcher.js";
export { ScatterGatherEngine, type EngineDependencies, type RunOverrides } from "./engine.js";
export { effectiveParallelism, estimateElapsed, formatRunSummary, type LatencyEstimateInput } from "./estimate.js";
export { invokeWorkUnit, isRetryableByDefault, nextRetryDelay, type InvokeOptions } from "./invoker.js";
export {
  createRunId,
  scatterGather,
  validateRunOptions,
  type RunHandle,
  type ScatterGatherOptions,
} from "./orchestrator.js";
export { RunRegistry, type ActiveRunSnapshot, type RunEntry } from "./run-registry.js";
export { WorkerPool, inlineExecutor, type WorkerPoolStats } from "./worker-pool.js";
