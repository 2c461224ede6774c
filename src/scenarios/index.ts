import { readFileSync } from "node:fs";
import { GENE_MAX_S, GENE_MIN_S, MIN_GENERATED_FOR_SCORING } from "../config";
import { createDebugLog } from "../debug";
import { ConsoleDisplay } from "../display";
import { createIdmEngine, type Engine } from "../traffic/engine";
import type { IdmVehicle } from "../traffic/kinematics";
import { clamp } from "../traffic/rng";
import { parseScenarioDefinition, type ScenarioDefinition, type ScenarioSignal } from "./definition";

export { ScenarioFormatError, parseScenarioDefinition } from "./definition";
export type { ScenarioDefinition, ScenarioGenerator, ScenarioSignal } from "./definition";

const debugLog = createDebugLog("scenario");

const SCENARIO_FILES: Readonly<Record<number, string>> = {
  1: "fourWay",
  2: "tJunction",
  3: "corridor",
  4: "grid2x2",
  5: "arterial"
};

export const SCENARIO_IDS: readonly number[] = Object.keys(SCENARIO_FILES).map(Number);

const cache = new Map<number, ScenarioDefinition>();

export class UnknownScenarioError extends Error {
  readonly scenarioId: number;

  constructor(scenarioId: number) {
    super(`Unknown scenario id=${scenarioId}. Use one of ${SCENARIO_IDS.join(", ")}.`);
    this.name = "UnknownScenarioError";
    this.scenarioId = scenarioId;
  }
}

export function getScenario(id: number): ScenarioDefinition {
  const cached = cache.get(id);
  if (cached) {
    return cached;
  }
  const file = SCENARIO_FILES[id];
  if (!file) {
    throw new UnknownScenarioError(id);
  }
  const source = `scenarios/data/${file}.json`;
  const raw: unknown = JSON.parse(readFileSync(new URL(`./data/${file}.json`, import.meta.url), "utf8"));
  const definition = parseScenarioDefinition(raw, source);
  cache.set(id, definition);
  return definition;
}

/** Scenario id → display name. */
export const SCENARIOS: Readonly<Record<number, string>> = Object.fromEntries(
  SCENARIO_IDS.map((id) => [id, getScenario(id).name])
);

export function getPhasesPerSignal(id: number): number[] {
  return getScenario(id).signals.map((signal) => signal.phases);
}

export function getSolutionLength(id: number): number {
  return getPhasesPerSignal(id).reduce((sum, phases) => sum + phases, 0);
}

/**
 * Earliest simulated time at which the scenario's generators can have placed enough vehicles for
 * a run to be scored, ignoring entry clearance. Infinite when no generator ever fires.
 */
export function getMinimumScoringTime(id: number): number {
  const arrivals: number[] = [];
  for (const generator of getScenario(id).generators) {
    if (!Number.isFinite(generator.rate) || generator.rate <= 0) {
      continue;
    }
    for (let count = 1; count <= MIN_GENERATED_FOR_SCORING; count += 1) {
      arrivals.push((count * 60) / generator.rate);
    }
  }
  arrivals.sort((a, b) => a - b);
  return arrivals.length >= MIN_GENERATED_FOR_SCORING
    ? arrivals[MIN_GENERATED_FOR_SCORING - 1]
    : Number.POSITIVE_INFINITY;
}

/** Default durations for every signal, concatenated in candidate order. */
export function getDefaultConfig(id: number): number[] {
  return getScenario(id).signals.flatMap((signal) => signal.defaultCycle);
}

/**
 * Splits a flat candidate into one cycle per signal. A slice that comes up short, or holds a
 * non-finite gene, is replaced by the signal's default cycle; genes are rounded and clamped.
 */
export function sliceConfig(signals: readonly ScenarioSignal[], config: readonly number[] | null | undefined): number[][] {
  const genes = config ?? [];
  let offset = 0;
  return signals.map((signal, index) => {
    const slice = genes.slice(offset, offset + signal.phases);
    offset += signal.phases;
    if (slice.length < signal.phases || !slice.every((gene) => Number.isFinite(gene))) {
      if (genes.length > 0) {
        debugLog(`signal ${index}: config slice ${JSON.stringify(slice)} unusable; using defaults`);
      }
      return [...signal.defaultCycle];
    }
    return slice.map((gene) => clamp(Math.round(gene), GENE_MIN_S, GENE_MAX_S));
  });
}

export interface BuildScenarioOptions {
  seed?: number;
  render?: boolean;
  maxGenerated?: number | null;
}

export function buildScenario(
  definition: ScenarioDefinition,
  config: readonly number[] | null | undefined,
  options: BuildScenarioOptions = {}
): Engine<IdmVehicle> {
  const engine = createIdmEngine({ seed: options.seed, maxGenerated: options.maxGenerated });
  engine.scenarioName = definition.name;
  engine.addRoads(definition.roads);
  engine.addIntersections(definition.intersections);
  const cycles = sliceConfig(definition.signals, config);
  definition.signals.forEach((signal, index) => {
    engine.addSignal(signal.groups, cycles[index], {
      slowDistance: signal.slowDistance,
      slowFactor: signal.slowFactor,
      stopDistance: signal.stopDistance
    });
  });
  for (const generator of definition.generators) {
    engine.addGenerator(generator.rate, generator.paths);
  }
  if (options.render) {
    engine.attachDisplay(new ConsoleDisplay());
  }
  return engine;
}

export type ScenarioEngineFactory = (
  config: readonly number[] | null | undefined,
  render?: boolean,
  seed?: number
) => Engine<IdmVehicle>;

export function makeEngineFactory(id: number): ScenarioEngineFactory {
  const definition = getScenario(id);
  return (config, render = false, seed) => buildScenario(definition, config, { render, seed });
}
