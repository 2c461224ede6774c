import { describe, it, expect } from "vitest";
import { DEFAULT_IDM_PARAMS, IdmKinematics, IdmVehicle } from "../traffic/kinematics";
import { Road } from "../traffic/road";
import { SignalController } from "../traffic/signalController";

describe("IdmVehicle", () => {
  it("cruises at the speed limit on a free road", () => {
    const vehicle = new IdmVehicle(0, [0], 0);
    vehicle.step(null, 1, 0);
    expect(vehicle.speed).toBe(16.6);
    expect(vehicle.progress).toBe(16.6);
    expect(vehicle.acceleration).toBe(0);
  });

  it("brakes hard when the gap to the leader is gone", () => {
    const lead = new IdmVehicle(0, [0], 0);
    lead.progress = 20;
    lead.speed = 0;
    const follower = new IdmVehicle(1, [0], 0);
    follower.step(lead, 1, 0);
    expect(follower.progress).toBe(16.6);
    expect(follower.acceleration).toBe(-DEFAULT_IDM_PARAMS.maxDeceleration);
  });

  it("stops exactly instead of reversing", () => {
    const vehicle = new IdmVehicle(0, [0], 0);
    vehicle.speed = 1;
    vehicle.acceleration = -4;
    vehicle.step(null, 1, 0);
    expect(vehicle.speed).toBe(0);
    expect(vehicle.progress).toBe(0.125);
  });

  it("decelerates while stopped", () => {
    const vehicle = new IdmVehicle(0, [0], 0);
    vehicle.stop();
    vehicle.step(null, 1, 0);
    expect(vehicle.acceleration).toBeCloseTo(-4.61);
    vehicle.step(null, 1, 1);
    expect(vehicle.speed).toBeCloseTo(11.99);
    vehicle.unstop();
    expect(vehicle.isStopped).toBe(false);
  });

  it("accumulates wait time while nearly stationary", () => {
    const vehicle = new IdmVehicle(0, [0], 0);
    vehicle.speed = 0;
    vehicle.step(null, 0.5, 10);
    expect(vehicle.getWaitTime(13)).toBe(3);

    vehicle.speed = 5;
    vehicle.step(null, 0.5, 14);
    expect(vehicle.speed).toBeCloseTo(5.72);
    expect(vehicle.getWaitTime(20)).toBe(4);
  });
});

describe("IdmKinematics", () => {
  it("merges parameter overrides", () => {
    const kinematics = new IdmKinematics({ maxSpeed: 10 });
    const vehicle = kinematics.createVehicle(3, [0, 1], 2);
    expect(vehicle.speed).toBe(10);
    expect(vehicle.params.minGap).toBe(4);
    expect(vehicle.spawnTime).toBe(2);
  });

  it("requires room behind the last vehicle before a spawn", () => {
    const kinematics = new IdmKinematics();
    const road = new Road<IdmVehicle>(0, [0, 0], [100, 0]);
    expect(kinematics.hasEntryClearance(road)).toBe(true);
    const queued = kinematics.createVehicle(0, [0], 0);
    queued.progress = 8;
    road.vehicles.push(queued);
    expect(kinematics.hasEntryClearance(road)).toBe(false);
    queued.progress = 8.5;
    expect(kinematics.hasEntryClearance(road)).toBe(true);
  });

  it("slows and stops the front vehicle ahead of a red signal, then releases it on green", () => {
    const kinematics = new IdmKinematics();
    const road = new Road<IdmVehicle>(0, [0, 0], [100, 0]);
    const controller = new SignalController([[5], [0]], [10, 10], {
      slowDistance: 50,
      slowFactor: 0.4,
      stopDistance: 20
    });
    road.signal = { controller, group: 1 };

    const front = kinematics.createVehicle(0, [0], 0);
    front.progress = 85;
    const behind = kinematics.createVehicle(1, [0], 0);
    behind.progress = 70;
    road.vehicles.push(front, behind);

    kinematics.advance(road, 0, 0);
    expect(front.position.x).toBe(85);
    expect(front.position.y).toBe(0);
    expect(front.isStopped).toBe(true);
    expect(front.currentSpeedLimit).toBeCloseTo(6.64);
    expect(behind.isStopped).toBe(false);

    controller.update();
    kinematics.advance(road, 0, 0);
    expect(front.isStopped).toBe(false);
    expect(front.currentSpeedLimit).toBe(16.6);
  });
});
