import { describe, it, expect } from "vitest";
import { Vector2 } from "three";
import { TopologyError } from "../traffic/errors";
import { RoadNetwork } from "../traffic/roadNetwork";
import type { TrafficVehicle } from "../traffic/types";

function parked(id: number, x: number, y: number): TrafficVehicle {
  return {
    id,
    path: [0],
    progress: 0,
    roadIndex: 0,
    position: new Vector2(x, y),
    getWaitTime: () => 0
  };
}

function threeRoads(): RoadNetwork {
  const network = new RoadNetwork();
  network.addRoads([
    [
      [0, 0],
      [10, 0]
    ],
    { start: [0, 1], end: [10, 1] },
    [
      [0, 20],
      [10, 20]
    ]
  ]);
  return network;
}

describe("RoadNetwork topology", () => {
  it("assigns sequential ids and measures roads", () => {
    const network = new RoadNetwork();
    const [first, second] = network.addRoads([
      [
        [0, 0],
        [3, 4]
      ],
      [
        [3, 4],
        [3, 10]
      ]
    ]);
    expect(first.id).toBe(0);
    expect(second.id).toBe(1);
    expect(first.length).toBe(5);
    expect(second.length).toBe(6);
    expect(network.size).toBe(2);

    const point = first.pointAt(2.5);
    expect(point.x).toBeCloseTo(1.5);
    expect(point.y).toBeCloseTo(2);
  });

  it("stores conflicts symmetrically and counts missing reverse edges", () => {
    const network = threeRoads();
    expect(network.addIntersections({ 0: [1] })).toBe(1);
    expect(Array.from(network.conflictsOf(1))).toEqual([0]);
    expect(Array.from(network.conflictsOf(0))).toEqual([1]);

    const symmetric = threeRoads();
    expect(symmetric.addIntersections({ 0: [2], 2: [0] })).toBe(0);
  });

  it("ignores self conflicts", () => {
    const network = threeRoads();
    expect(network.addIntersections({ 1: [1] })).toBe(0);
    expect(network.conflictsOf(1).size).toBe(0);
  });

  it("rejects unknown road ids", () => {
    const network = threeRoads();
    expect(() => network.addIntersections({ 0: [5] })).toThrow(TopologyError);
    let caught: unknown = null;
    try {
      network.addIntersections({ 7: [0] });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(TopologyError);
    expect(caught instanceof TopologyError ? caught.roadId : undefined).toBe(7);
    expect(() => network.getRoad(-1)).toThrow(TopologyError);
  });

  it("restricts the conflict graph to non-empty roads", () => {
    const network = threeRoads();
    network.addIntersections({ 0: [1, 2] });
    const active = network.activeConflicts(new Set([0, 1]));
    expect(Array.from(active.entries())).toEqual([
      [0, [1]],
      [1, [0]]
    ]);
    expect(network.activeConflicts(new Set([1])).size).toBe(0);
  });
});

describe("RoadNetwork collision detection", () => {
  it("reports vehicles on conflicting roads closer than the radius", () => {
    const network = threeRoads();
    network.addIntersections({ 0: [1] });
    network.roads[0].vehicles.push(parked(4, 0, 0));
    network.roads[1].vehicles.push(parked(9, 2, 0));
    expect(network.findCollision(new Set([0, 1]), 3)).toEqual({
      roadId: 0,
      otherRoadId: 1,
      vehicleId: 4,
      otherVehicleId: 9
    });
  });

  it("does not count a distance equal to the radius", () => {
    const network = threeRoads();
    network.addIntersections({ 0: [1] });
    network.roads[0].vehicles.push(parked(0, 0, 0));
    network.roads[1].vehicles.push(parked(1, 3, 0));
    expect(network.findCollision(new Set([0, 1]), 3)).toBeNull();
  });

  it("never compares vehicles of non-conflicting roads or of the same road", () => {
    const network = threeRoads();
    network.addIntersections({ 0: [2] });
    network.roads[0].vehicles.push(parked(0, 0, 0), parked(1, 0.5, 0));
    network.roads[1].vehicles.push(parked(2, 1, 0));
    expect(network.findCollision(new Set([0, 1]), 3)).toBeNull();
  });
});
