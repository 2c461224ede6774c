import { TopologyError } from "./errors";
import type { KinematicsModel, Road } from "./road";
import type { RandomFn } from "./rng";
import type { RoadId, TrafficVehicle, WeightedPath, WeightedPathInput } from "./types";

const SECONDS_PER_MINUTE = 60;

/**
 * Flattens `(weight, path)` and `(weight, [path, path, ...])` entries into one list.
 * Every alternative of a nested entry keeps the full weight.
 */
export function normalizePaths(paths: readonly WeightedPathInput[]): WeightedPath[] {
  const normalized: WeightedPath[] = [];
  for (const [weight, roads] of paths) {
    if (isNestedRoutes(roads)) {
      for (const route of roads) {
        normalized.push({ weight, path: [...route] });
      }
    } else {
      normalized.push({ weight, path: [...roads] });
    }
  }
  return normalized;
}

function isNestedRoutes(
  roads: readonly RoadId[] | ReadonlyArray<readonly RoadId[]>
): roads is ReadonlyArray<readonly RoadId[]> {
  return roads.length > 0 && Array.isArray(roads[0]);
}

export function pickWeightedPath(paths: readonly WeightedPath[], rng: RandomFn): WeightedPath {
  if (paths.length === 1) {
    return paths[0];
  }
  let total = 0;
  for (const entry of paths) {
    total += Math.max(0, entry.weight);
  }
  const roll = rng() * (total > 0 ? total : paths.length);
  let running = 0;
  for (const entry of paths) {
    running += total > 0 ? Math.max(0, entry.weight) : 1;
    if (roll < running) {
      return entry;
    }
  }
  return paths[paths.length - 1];
}

export interface VehicleGeneratorOptions<V extends TrafficVehicle> {
  /** Vehicles per minute. */
  rate: number;
  paths: readonly WeightedPathInput[];
  roads: ReadonlyArray<Road<V>>;
  kinematics: KinematicsModel<V>;
  rng: RandomFn;
}

export class VehicleGenerator<V extends TrafficVehicle = TrafficVehicle> {
  readonly rate: number;
  readonly paths: readonly WeightedPath[];
  readonly inboundRoads: ReadonlySet<RoadId>;
  readonly outboundRoads: ReadonlySet<RoadId>;
  private readonly roads: ReadonlyArray<Road<V>>;
  private readonly kinematics: KinematicsModel<V>;
  private readonly rng: RandomFn;
  private readonly interval: number;
  private lastAddedTime = 0;
  private nextPath: readonly RoadId[];

  constructor(options: VehicleGeneratorOptions<V>) {
    this.rate = Number(options.rate);
    this.roads = options.roads;
    this.kinematics = options.kinematics;
    this.rng = options.rng;
    this.paths = normalizePaths(options.paths);
    if (this.paths.length === 0) {
      throw new TopologyError("Vehicle generator needs at least one path.");
    }

    const inbound = new Set<RoadId>();
    const outbound = new Set<RoadId>();
    for (const { path } of this.paths) {
      if (path.length === 0) {
        throw new TopologyError("Vehicle generator path is empty.");
      }
      for (const roadId of path) {
        if (!Number.isInteger(roadId) || roadId < 0 || roadId >= this.roads.length) {
          throw new TopologyError(`Generator path references unknown road ${roadId}.`, roadId);
        }
      }
      inbound.add(path[0]);
      if (path.length > 1) {
        outbound.add(path[path.length - 1]);
      }
    }
    this.inboundRoads = inbound;
    this.outboundRoads = outbound;
    this.interval =
      Number.isFinite(this.rate) && this.rate > 0 ? SECONDS_PER_MINUTE / this.rate : Number.POSITIVE_INFINITY;
    this.nextPath = pickWeightedPath(this.paths, this.rng).path;
  }

  /** Places the pending vehicle on its inbound road when due; returns that road's id. */
  update(time: number, generatedSoFar: number): RoadId | null {
    if (time - this.lastAddedTime < this.interval) {
      return null;
    }
    const road = this.roads[this.nextPath[0]];
    if (!this.kinematics.hasEntryClearance(road)) {
      return null;
    }
    const vehicle = this.kinematics.createVehicle(generatedSoFar, this.nextPath, time);
    road.pointAt(0, vehicle.position);
    road.vehicles.push(vehicle);
    this.lastAddedTime = time;
    this.nextPath = pickWeightedPath(this.paths, this.rng).path;
    return road.id;
  }
}
