import { Vector2 } from "three";
import type { KinematicsModel, Road } from "./road";
import type { RoadId, TrafficVehicle } from "./types";

/**
 * Intelligent Driver Model parameters. Lengths in map units, time in seconds.
 *
 *   a = aMax * [1 - (v / vMax)^4 - (s* / s)^2]
 *   s* = minGap + max(0, v * headway + v * Δv / (2 * sqrt(aMax * bMax)))
 */
export interface IdmParams {
  length: number;
  minGap: number;
  headway: number;
  maxSpeed: number;
  maxAcceleration: number;
  maxDeceleration: number;
}

export const DEFAULT_IDM_PARAMS: IdmParams = {
  length: 4,
  minGap: 4,
  headway: 1,
  maxSpeed: 16.6,
  maxAcceleration: 1.44,
  maxDeceleration: 4.61
};

/** Below this speed a vehicle counts as waiting. */
export const WAIT_SPEED_THRESHOLD = 0.1;

export class IdmVehicle implements TrafficVehicle {
  readonly id: number;
  readonly path: readonly RoadId[];
  readonly params: IdmParams;
  readonly spawnTime: number;
  readonly position = new Vector2();
  progress = 0;
  roadIndex = 0;
  speed: number;
  acceleration = 0;
  private speedLimit: number;
  private stopped = false;
  private waited = 0;
  private waitStart: number | null = null;
  private readonly sqrtAb: number;

  constructor(id: number, path: readonly RoadId[], spawnTime: number, params: IdmParams = DEFAULT_IDM_PARAMS) {
    this.id = id;
    this.path = [...path];
    this.spawnTime = spawnTime;
    this.params = params;
    this.speed = params.maxSpeed;
    this.speedLimit = params.maxSpeed;
    this.sqrtAb = 2 * Math.sqrt(params.maxAcceleration * params.maxDeceleration);
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  get currentSpeedLimit(): number {
    return this.speedLimit;
  }

  step(lead: IdmVehicle | null, dt: number, time: number): void {
    if (this.speed + this.acceleration * dt < 0) {
      this.progress -= (0.5 * this.speed * this.speed) / this.acceleration;
      this.speed = 0;
    } else {
      this.speed += this.acceleration * dt;
      this.progress += this.speed * dt + (this.acceleration * dt * dt) / 2;
    }

    let alpha = 0;
    if (lead) {
      const gap = lead.progress - this.progress - lead.params.length;
      const approach = this.speed - lead.speed;
      const desiredGap =
        this.params.minGap + Math.max(0, this.params.headway * this.speed + (approach * this.speed) / this.sqrtAb);
      alpha = gap > 0 ? desiredGap / gap : Number.POSITIVE_INFINITY;
    }
    const limit = this.speedLimit > 0 ? this.speedLimit : this.params.maxSpeed;
    this.acceleration =
      this.params.maxAcceleration * (1 - (this.speed / limit) ** 4 - alpha ** 2);
    if (!Number.isFinite(this.acceleration)) {
      this.acceleration = -this.params.maxDeceleration;
    }
    if (this.stopped) {
      this.acceleration = (-this.params.maxDeceleration * this.speed) / limit;
    }

    this.trackWaiting(time);
  }

  stop(): void {
    this.stopped = true;
  }

  unstop(): void {
    this.stopped = false;
  }

  slow(speedLimit: number): void {
    this.speedLimit = speedLimit;
  }

  unslow(): void {
    this.speedLimit = this.params.maxSpeed;
  }

  getWaitTime(time: number): number {
    return this.waited + (this.waitStart !== null ? Math.max(0, time - this.waitStart) : 0);
  }

  private trackWaiting(time: number): void {
    const waiting = this.speed < WAIT_SPEED_THRESHOLD;
    if (waiting && this.waitStart === null) {
      this.waitStart = time;
    } else if (!waiting && this.waitStart !== null) {
      this.waited += Math.max(0, time - this.waitStart);
      this.waitStart = null;
    }
  }
}

/** Default car-following collaborator: IDM per vehicle plus slow/stop zones ahead of red signals. */
export class IdmKinematics implements KinematicsModel<IdmVehicle> {
  readonly params: IdmParams;

  constructor(params: Partial<IdmParams> = {}) {
    this.params = { ...DEFAULT_IDM_PARAMS, ...params };
  }

  createVehicle(id: number, path: readonly RoadId[], time: number): IdmVehicle {
    return new IdmVehicle(id, path, time, this.params);
  }

  hasEntryClearance(road: Road<IdmVehicle>): boolean {
    const last = road.back;
    if (!last) {
      return true;
    }
    return last.progress > this.params.minGap + this.params.length;
  }

  advance(road: Road<IdmVehicle>, dt: number, time: number): void {
    const vehicles = road.vehicles;
    if (vehicles.length === 0) {
      return;
    }
    for (let i = 0; i < vehicles.length; i += 1) {
      vehicles[i].step(i === 0 ? null : vehicles[i - 1], dt, time);
      road.pointAt(vehicles[i].progress, vehicles[i].position);
    }

    const front = vehicles[0];
    const signal = road.signal;
    if (!signal || road.hasRightOfWay()) {
      front.unstop();
      for (const vehicle of vehicles) {
        vehicle.unslow();
      }
      return;
    }
    const { slowDistance, slowFactor, stopDistance } = signal.controller;
    if (front.progress >= road.length - slowDistance) {
      front.slow(slowFactor * front.params.maxSpeed);
    }
    if (front.progress >= road.length - stopDistance && front.progress <= road.length - stopDistance / 2) {
      front.stop();
    }
  }
}
