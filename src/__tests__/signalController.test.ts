import { describe, it, expect } from "vitest";
import { SignalController } from "../traffic/signalController";
import type { SignalCycle } from "../traffic/types";

const TIMING = { slowDistance: 50, slowFactor: 0.4, stopDistance: 15 };

describe("SignalController duration mode", () => {
  it("advances on accumulated time and carries the remainder", () => {
    const signal = new SignalController([[0], [1]], [10, 20], TIMING);
    expect(signal.mode).toBe("duration");
    expect(signal.currentPhaseMask()).toEqual([true, false]);

    signal.update(4);
    expect(signal.currentPhase).toBe(0);
    expect(signal.elapsedInPhase).toBe(4);

    signal.update(7);
    expect(signal.currentPhase).toBe(1);
    expect(signal.elapsedInPhase).toBe(1);
    expect(signal.currentPhaseMask()).toEqual([false, true]);

    signal.update(25);
    expect(signal.currentPhase).toBe(0);
    expect(signal.elapsedInPhase).toBe(6);
  });

  it("advances exactly one phase when ticks sum to the duration", () => {
    const signal = new SignalController([[0], [1], [2], [3]], [10, 10, 10, 10], TIMING);
    for (let i = 0; i < 4; i += 1) {
      signal.update(2.5);
    }
    expect(signal.currentPhase).toBe(1);
    expect(signal.elapsedInPhase).toBe(0);
  });

  it("skips several phases in one large step", () => {
    const signal = new SignalController([[0], [1], [2]], [5, 5, 5], TIMING);
    signal.update(12);
    expect(signal.currentPhase).toBe(2);
    expect(signal.elapsedInPhase).toBe(2);
  });

  it("forces a switch without a delta and resets elapsed time", () => {
    const signal = new SignalController([[0], [1]], [10, 10], TIMING);
    signal.update(6);
    signal.update();
    expect(signal.currentPhase).toBe(1);
    expect(signal.elapsedInPhase).toBe(0);
    signal.advance();
    expect(signal.currentPhase).toBe(0);
  });

  it("ignores non-positive and non-finite deltas", () => {
    const signal = new SignalController([[0], [1]], [10, 10], TIMING);
    signal.update(0);
    signal.update(-3);
    signal.update(Number.NaN);
    signal.update(Number.POSITIVE_INFINITY);
    expect(signal.currentPhase).toBe(0);
    expect(signal.elapsedInPhase).toBe(0);
  });

  it("pads short duration lists with the last value and truncates long ones", () => {
    expect(new SignalController([[0], [1], [2]], [5], TIMING).phaseDurations).toEqual([5, 5, 5]);
    const truncated = new SignalController([[0], [1]], [5, 6, 7, 8], TIMING);
    expect(truncated.phaseDurations).toEqual([5, 6]);
    expect(truncated.cycleDuration()).toBe(11);
  });

  it("normalizes flat group lists", () => {
    const signal = new SignalController([0, 2], [10, 10], TIMING);
    expect(signal.groups).toEqual([[0], [2]]);
  });

  it("forwards the approach parameters", () => {
    const signal = new SignalController([[0]], [10], TIMING);
    expect(signal.slowDistance).toBe(50);
    expect(signal.slowFactor).toBe(0.4);
    expect(signal.stopDistance).toBe(15);
  });
});

describe("SignalController mask mode", () => {
  it("only moves on request", () => {
    const signal = new SignalController(
      [[0], [1]],
      [
        [true, false],
        [false, true],
        [false, false]
      ],
      TIMING
    );
    expect(signal.mode).toBe("mask");
    expect(signal.phaseCount).toBe(3);
    expect(signal.cycleDuration()).toBeNull();

    signal.update(100);
    expect(signal.currentPhase).toBe(0);

    signal.update();
    expect(signal.isGreen(0)).toBe(false);
    expect(signal.isGreen(1)).toBe(true);

    signal.update();
    expect(signal.currentPhaseMask()).toEqual([false, false]);
    signal.update();
    expect(signal.currentPhase).toBe(0);
  });
});

describe("SignalController fallback", () => {
  const malformed: Array<[string, SignalCycle]> = [
    ["empty cycle", []],
    ["non-positive duration", [10, -1]],
    ["non-finite duration", [10, Number.NaN]],
    ["mixed entries", [10, [true, false]]],
    ["mask width mismatch", [[true]]]
  ];

  it.each(malformed)("uses one-second round robin for %s", (_label, cycle) => {
    const signal = new SignalController([[0], [1]], cycle, TIMING);
    expect(signal.usedFallback).toBe(true);
    expect(signal.mode).toBe("duration");
    expect(signal.phaseDurations).toEqual([1, 1]);
    expect(signal.phaseCount).toBe(2);
    expect(signal.cycleDuration()).toBe(2);
    expect(signal.currentPhaseMask()).toEqual([true, false]);
    signal.update(1);
    expect(signal.currentPhase).toBe(1);
  });

  it("falls back for a missing cycle", () => {
    expect(new SignalController([[0]], null, TIMING).usedFallback).toBe(true);
  });

  it("tolerates a controller without groups", () => {
    const signal = new SignalController([], [10], TIMING);
    expect(signal.phaseCount).toBe(0);
    signal.update();
    signal.update(5);
    expect(signal.currentPhaseMask()).toEqual([]);
    expect(signal.isGreen(0)).toBe(false);
  });
});
