/**
 * scatter-gather-engine public API.
 */

export * from "./engine/index.js";
export {
  DEFAULT_CONFIG,
  ENGINE_CONFIG_SCHEMA,
  assertConcurrencyLimit,
  loadConfigFile,
  mergeConfig,
  validateConfig,
  type EngineConfig,
} from "./config.js";
export * from "./errors.js";
export { emitEvent, safeHandler, type EngineEventMap, type EngineEventName, type EventSink } from "./events.js";
export { TrajectoryLogger, readTrajectory } from "./trajectory.js";
export * from "./types.js";
