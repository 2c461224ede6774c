import { Vector2 } from "three";
import type { SignalController } from "./signalController";
import type { PointTuple, RoadId, TrafficVehicle } from "./types";

export interface RoadSignal {
  controller: SignalController;
  group: number;
}

export interface KinematicsModel<V extends TrafficVehicle> {
  createVehicle(id: number, path: readonly RoadId[], time: number): V;
  /** Whether a freshly spawned vehicle fits behind the last vehicle queued on the road. */
  hasEntryClearance(road: Road<V>): boolean;
  /** Moves every queued vehicle forward by dt and refreshes positions. */
  advance(road: Road<V>, dt: number, time: number): void;
}

export class Road<V extends TrafficVehicle = TrafficVehicle> {
  readonly id: RoadId;
  readonly start: Vector2;
  readonly end: Vector2;
  readonly length: number;
  readonly direction: Vector2;
  /** Front (index 0) is the vehicle closest to the exit. */
  readonly vehicles: V[] = [];
  signal: RoadSignal | null = null;

  constructor(id: RoadId, start: PointTuple, end: PointTuple) {
    this.id = id;
    this.start = new Vector2(start[0], start[1]);
    this.end = new Vector2(end[0], end[1]);
    this.length = this.start.distanceTo(this.end);
    this.direction =
      this.length > 0 ? this.end.clone().sub(this.start).divideScalar(this.length) : new Vector2();
  }

  get front(): V | null {
    return this.vehicles[0] ?? null;
  }

  get back(): V | null {
    return this.vehicles[this.vehicles.length - 1] ?? null;
  }

  hasRightOfWay(): boolean {
    if (!this.signal) {
      return true;
    }
    return this.signal.controller.isGreen(this.signal.group);
  }

  pointAt(progress: number, target: Vector2 = new Vector2()): Vector2 {
    return target.copy(this.start).addScaledVector(this.direction, progress);
  }
}
