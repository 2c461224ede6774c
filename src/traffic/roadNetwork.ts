import { createDebugLog } from "../debug";
import { TopologyError } from "./errors";
import { Road } from "./road";
import type { ConflictTable, PointTuple, RoadEndpoints, RoadId, TrafficVehicle } from "./types";

const debugLog = createDebugLog("network");

export interface CollisionHit {
  roadId: RoadId;
  otherRoadId: RoadId;
  vehicleId: number;
  otherVehicleId: number;
}

export class RoadNetwork<V extends TrafficVehicle = TrafficVehicle> {
  readonly roads: Road<V>[] = [];
  private readonly conflicts = new Map<RoadId, Set<RoadId>>();

  get size(): number {
    return this.roads.length;
  }

  addRoad(start: PointTuple, end: PointTuple): Road<V> {
    const road = new Road<V>(this.roads.length, start, end);
    this.roads.push(road);
    return road;
  }

  addRoads(roads: ReadonlyArray<RoadEndpoints | readonly [PointTuple, PointTuple]>): Road<V>[] {
    return roads.map((entry) =>
      "start" in entry ? this.addRoad(entry.start, entry.end) : this.addRoad(entry[0], entry[1])
    );
  }

  getRoad(id: RoadId): Road<V> {
    this.assertRoad(id, "road lookup");
    return this.roads[id];
  }

  assertRoad(id: RoadId, context: string): void {
    if (!Number.isInteger(id) || id < 0 || id >= this.roads.length) {
      throw new TopologyError(
        `Invalid road reference ${String(id)} in ${context} (network has ${this.roads.length} roads).`,
        Number.isFinite(id) ? id : null
      );
    }
  }

  /**
   * Registers conflict sets and stores them symmetrized. Entries merge with earlier ones.
   * Returns the number of reverse edges that were missing from the input.
   */
  addIntersections(table: ConflictTable): number {
    const pairs: Array<[RoadId, RoadId]> = [];
    for (const [key, others] of Object.entries(table)) {
      const roadId = Number(key);
      this.assertRoad(roadId, "intersections");
      for (const other of others) {
        this.assertRoad(other, `intersections of road ${roadId}`);
        if (other !== roadId) {
          pairs.push([roadId, other]);
        }
      }
    }

    const declared = new Set(pairs.map(([a, b]) => `${a}:${b}`));
    let missingReverse = 0;
    for (const [a, b] of pairs) {
      if (!declared.has(`${b}:${a}`)) {
        missingReverse += 1;
        debugLog(`conflict ${a}→${b} declared without ${b}→${a}; storing both`);
      }
      this.linkConflict(a, b);
      this.linkConflict(b, a);
    }
    return missingReverse;
  }

  conflictsOf(id: RoadId): ReadonlySet<RoadId> {
    return this.conflicts.get(id) ?? new Set<RoadId>();
  }

  /** Conflict graph restricted to non-empty roads; roads left with no partner are omitted. */
  activeConflicts(nonEmpty: ReadonlySet<RoadId>): Map<RoadId, RoadId[]> {
    const active = new Map<RoadId, RoadId[]>();
    for (const roadId of nonEmpty) {
      const conflicting = this.conflicts.get(roadId);
      if (!conflicting) {
        continue;
      }
      const busy = Array.from(conflicting).filter((other) => nonEmpty.has(other));
      if (busy.length) {
        active.set(roadId, busy);
      }
    }
    return active;
  }

  /** First pair of vehicles on conflicting roads closer than `radius`, or null. */
  findCollision(nonEmpty: ReadonlySet<RoadId>, radius: number): CollisionHit | null {
    for (const [roadId, others] of this.activeConflicts(nonEmpty)) {
      const vehicles = this.roads[roadId].vehicles;
      for (const otherRoadId of others) {
        const otherVehicles = this.roads[otherRoadId].vehicles;
        for (const vehicle of vehicles) {
          for (const other of otherVehicles) {
            if (vehicle.position.distanceTo(other.position) < radius) {
              return {
                roadId,
                otherRoadId,
                vehicleId: vehicle.id,
                otherVehicleId: other.id
              };
            }
          }
        }
      }
    }
    return null;
  }

  private linkConflict(from: RoadId, to: RoadId): void {
    let set = this.conflicts.get(from);
    if (!set) {
      set = new Set<RoadId>();
      this.conflicts.set(from, set);
    }
    set.add(to);
  }
}
