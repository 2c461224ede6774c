import { createDebugLog } from "../debug";
import type { RoadId, SignalCycle, SignalGroupsInput, SignalTiming } from "./types";

const debugLog = createDebugLog("signal");

const FALLBACK_DURATION_S = 1;

export type SignalMode = "duration" | "mask";

/**
 * Phase state machine for one junction.
 *
 * Duration mode gives one phase per group, each green for its own duration, and advances on
 * accumulated time. Mask mode takes explicit per-phase masks and only moves on request.
 */
export class SignalController {
  readonly groups: ReadonlyArray<readonly RoadId[]>;
  readonly mode: SignalMode;
  readonly slowDistance: number;
  readonly slowFactor: number;
  readonly stopDistance: number;
  /** True when the supplied cycle was rejected and the round-robin default is in use. */
  readonly usedFallback: boolean;
  private readonly durations: readonly number[] | null;
  private readonly masks: ReadonlyArray<readonly boolean[]>;
  private phaseIndex = 0;
  private elapsed = 0;

  constructor(groups: SignalGroupsInput, cycle: SignalCycle | null | undefined, timing: SignalTiming) {
    this.groups = normalizeGroups(groups);
    this.slowDistance = Number(timing.slowDistance);
    this.slowFactor = Number(timing.slowFactor);
    this.stopDistance = Number(timing.stopDistance);

    const groupCount = this.groups.length;
    const parsed = parseCycle(cycle, groupCount);
    if (parsed) {
      this.mode = parsed.mode;
      this.durations = parsed.durations;
      this.masks = parsed.masks;
      this.usedFallback = false;
    } else {
      debugLog(`malformed cycle for ${groupCount} groups; using round robin`, cycle);
      this.mode = "duration";
      this.durations = Array.from({ length: groupCount }, () => FALLBACK_DURATION_S);
      this.masks = roundRobinMasks(groupCount);
      this.usedFallback = true;
    }
  }

  get phaseCount(): number {
    return this.masks.length;
  }

  get currentPhase(): number {
    return this.phaseIndex;
  }

  get elapsedInPhase(): number {
    return this.elapsed;
  }

  get phaseDurations(): readonly number[] | null {
    return this.durations;
  }

  /** Sum of the phase durations, or null in mask mode. */
  cycleDuration(): number | null {
    if (!this.durations) {
      return null;
    }
    return this.durations.reduce((sum, value) => sum + value, 0);
  }

  currentPhaseMask(): readonly boolean[] {
    return this.masks[this.phaseIndex] ?? [];
  }

  isGreen(group: number): boolean {
    return this.currentPhaseMask()[group] ?? false;
  }

  /**
   * Called without a delta, forces an immediate phase switch. With a delta, accumulates time in
   * duration mode and ignores it in mask mode.
   */
  update(dt?: number): void {
    if (dt === undefined) {
      this.advance();
      return;
    }
    if (!Number.isFinite(dt) || dt <= 0 || !this.durations || this.phaseCount === 0) {
      return;
    }
    this.elapsed += dt;
    let current = this.durations[this.phaseIndex];
    while (this.elapsed >= current) {
      this.elapsed -= current;
      this.phaseIndex = (this.phaseIndex + 1) % this.phaseCount;
      current = this.durations[this.phaseIndex];
    }
  }

  advance(): void {
    if (this.phaseCount === 0) {
      return;
    }
    this.phaseIndex = (this.phaseIndex + 1) % this.phaseCount;
    this.elapsed = 0;
  }
}

function normalizeGroups(groups: SignalGroupsInput): RoadId[][] {
  return groups.map((group) => (typeof group === "number" ? [group] : [...group]));
}

function roundRobinMasks(groupCount: number): boolean[][] {
  return Array.from({ length: groupCount }, (_, phase) =>
    Array.from({ length: groupCount }, (_, group) => group === phase)
  );
}

interface ParsedCycle {
  mode: SignalMode;
  durations: number[] | null;
  masks: boolean[][];
}

function parseCycle(cycle: SignalCycle | null | undefined, groupCount: number): ParsedCycle | null {
  if (!Array.isArray(cycle) || cycle.length === 0 || groupCount === 0) {
    return null;
  }
  const entries: readonly unknown[] = cycle;

  if (entries.every((entry) => typeof entry === "number")) {
    const durations: number[] = [];
    for (const entry of entries) {
      if (typeof entry !== "number" || !Number.isFinite(entry) || entry <= 0) {
        return null;
      }
      durations.push(entry);
    }
    const fitted =
      durations.length >= groupCount
        ? durations.slice(0, groupCount)
        : [
            ...durations,
            ...Array.from({ length: groupCount - durations.length }, () => durations[durations.length - 1])
          ];
    return { mode: "duration", durations: fitted, masks: roundRobinMasks(groupCount) };
  }

  const masks: boolean[][] = [];
  for (const entry of entries) {
    if (!Array.isArray(entry) || entry.length !== groupCount) {
      return null;
    }
    const mask: boolean[] = [];
    for (const bit of entry) {
      if (typeof bit !== "boolean") {
        return null;
      }
      mask.push(bit);
    }
    masks.push(mask);
  }
  return { mode: "mask", durations: null, masks };
}
