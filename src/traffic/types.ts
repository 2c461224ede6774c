import type { Vector2 } from "three";

export type RoadId = number;

export type PointTuple = readonly [number, number];

export interface RoadEndpoints {
  start: PointTuple;
  end: PointTuple;
}

/** Road id → ids of roads whose vehicle paths cross it. Keys arrive as strings from JSON. */
export type ConflictTable = Readonly<Record<string, readonly RoadId[]>>;

/**
 * Minimal contract between the engine and whatever moves vehicles along a road.
 * `progress` is the distance travelled on the current road, `roadIndex` the cursor into `path`.
 */
export interface TrafficVehicle {
  readonly id: number;
  readonly path: readonly RoadId[];
  progress: number;
  roadIndex: number;
  readonly position: Vector2;
  getWaitTime(time: number): number;
}

/** A route entry: one path, or several alternative paths sharing the weight. */
export type WeightedPathInput = readonly [
  weight: number,
  roads: readonly RoadId[] | ReadonlyArray<readonly RoadId[]>
];

export interface WeightedPath {
  weight: number;
  path: readonly RoadId[];
}

export type SignalGroupsInput = ReadonlyArray<RoadId | readonly RoadId[]>;

/** Durations per group, or one boolean mask per phase. Anything else falls back to round robin. */
export type SignalCycle = ReadonlyArray<number | readonly boolean[]>;

export interface SignalTiming {
  slowDistance: number;
  slowFactor: number;
  stopDistance: number;
}

/** What the optimizer and replay need from a running simulation. */
export interface SimulationRun {
  readonly dt: number;
  readonly time: number;
  readonly collisionDetected: boolean;
  readonly generatedCount: number;
  readonly onMapCount: number;
  readonly completedCount: number;
  readonly averageWaitTime: number;
  readonly completed: boolean;
  readonly stopRequested: boolean;
  step(dt?: number): void;
}

export interface EngineDisplay {
  readonly closed: boolean;
  update(run: SimulationRun): void;
}
