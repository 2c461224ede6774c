export * from "./config";
export { ConsoleDisplay, formatStatus } from "./display";
export type { ConsoleDisplayOptions } from "./display";
export { runReplay } from "./replay";
export type { ReplayOptions, ReplayResult } from "./replay";

export { Engine, createIdmEngine, DEFAULT_DT_S, COLLISION_RADIUS, DEFAULT_INTERVAL_TICKS } from "./traffic/engine";
export type { EngineOptions, IdmEngineOptions } from "./traffic/engine";
export { TopologyError } from "./traffic/errors";
export { IdmKinematics, IdmVehicle, DEFAULT_IDM_PARAMS, WAIT_SPEED_THRESHOLD } from "./traffic/kinematics";
export type { IdmParams } from "./traffic/kinematics";
export { Road } from "./traffic/road";
export type { KinematicsModel, RoadSignal } from "./traffic/road";
export { RoadNetwork } from "./traffic/roadNetwork";
export type { CollisionHit } from "./traffic/roadNetwork";
export { createRng, normalizeSeed, randomInt, DEFAULT_SEED } from "./traffic/rng";
export type { RandomFn } from "./traffic/rng";
export { SignalController } from "./traffic/signalController";
export type { SignalMode } from "./traffic/signalController";
export { VehicleGenerator, normalizePaths, pickWeightedPath } from "./traffic/vehicleGenerator";
export type * from "./traffic/types";

export { GeneticOptimizer, deriveTrafficSeed, scoreRun } from "./optimizer/geneticOptimizer";
export type {
  Candidate,
  EngineFactory,
  GenerationRecord,
  OptimizationResult,
  OptimizerProgress,
  OptimizerRunOptions
} from "./optimizer/geneticOptimizer";
export { optimizeAndSave } from "./optimizer/optimizeAndSave";
export { loadBestConfig, loadBestConfigForScenario, parseBestConfig, saveBestConfig } from "./optimizer/resultStore";
export type { BestConfigDocument } from "./optimizer/resultStore";

export {
  SCENARIOS,
  SCENARIO_IDS,
  UnknownScenarioError,
  buildScenario,
  getDefaultConfig,
  getMinimumScoringTime,
  getPhasesPerSignal,
  getScenario,
  getSolutionLength,
  makeEngineFactory,
  sliceConfig
} from "./scenarios";
export type { ScenarioDefinition } from "./scenarios";
