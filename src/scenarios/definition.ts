import type { PointTuple, RoadId, WeightedPathInput } from "../traffic/types";

export interface ScenarioSignal {
  groups: RoadId[][];
  /** Genes this signal consumes from a candidate. */
  phases: number;
  defaultCycle: number[];
  slowDistance: number;
  slowFactor: number;
  stopDistance: number;
}

export interface ScenarioGenerator {
  /** Vehicles per minute. */
  rate: number;
  paths: WeightedPathInput[];
}

export interface ScenarioDefinition {
  id: number;
  name: string;
  nodes: number;
  roads: Array<readonly [PointTuple, PointTuple]>;
  intersections: Record<string, RoadId[]>;
  signals: ScenarioSignal[];
  generators: ScenarioGenerator[];
}

export class ScenarioFormatError extends Error {
  readonly source: string;

  constructor(source: string, message: string) {
    super(`${source}: ${message}`);
    this.name = "ScenarioFormatError";
    this.source = source;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function readNumber(value: unknown, source: string, path: string): number {
  if (!isFiniteNumber(value)) {
    throw new ScenarioFormatError(source, `${path} must be a finite number`);
  }
  return value;
}

function readIdList(value: unknown, source: string, path: string): RoadId[] {
  if (!Array.isArray(value)) {
    throw new ScenarioFormatError(source, `${path} must be a list of road ids`);
  }
  return value.map((entry, index) => {
    if (!Number.isInteger(entry)) {
      throw new ScenarioFormatError(source, `${path}[${index}] must be an integer`);
    }
    return readNumber(entry, source, `${path}[${index}]`);
  });
}

function readPoint(value: unknown, source: string, path: string): PointTuple {
  if (!Array.isArray(value) || value.length !== 2) {
    throw new ScenarioFormatError(source, `${path} must be an [x, y] pair`);
  }
  return [readNumber(value[0], source, `${path}[0]`), readNumber(value[1], source, `${path}[1]`)];
}

function readRoads(value: unknown, source: string): Array<readonly [PointTuple, PointTuple]> {
  if (!Array.isArray(value)) {
    throw new ScenarioFormatError(source, "roads must be a list");
  }
  return value.map((entry, index) => {
    if (!Array.isArray(entry) || entry.length !== 2) {
      throw new ScenarioFormatError(source, `roads[${index}] must be [start, end]`);
    }
    return [readPoint(entry[0], source, `roads[${index}][0]`), readPoint(entry[1], source, `roads[${index}][1]`)] as const;
  });
}

function readIntersections(value: unknown, source: string): Record<string, RoadId[]> {
  if (!isRecord(value)) {
    throw new ScenarioFormatError(source, "intersections must be an object");
  }
  const table: Record<string, RoadId[]> = {};
  for (const [key, others] of Object.entries(value)) {
    table[key] = readIdList(others, source, `intersections.${key}`);
  }
  return table;
}

function readSignal(value: unknown, source: string, index: number): ScenarioSignal {
  const path = `signals[${index}]`;
  if (!isRecord(value)) {
    throw new ScenarioFormatError(source, `${path} must be an object`);
  }
  if (!Array.isArray(value.groups)) {
    throw new ScenarioFormatError(source, `${path}.groups must be a list`);
  }
  const groups = value.groups.map((group, groupIndex) => readIdList(group, source, `${path}.groups[${groupIndex}]`));
  const phases = readNumber(value.phases, source, `${path}.phases`);
  if (!Array.isArray(value.defaultCycle)) {
    throw new ScenarioFormatError(source, `${path}.defaultCycle must be a list`);
  }
  const defaultCycle = value.defaultCycle.map((entry, cycleIndex) =>
    readNumber(entry, source, `${path}.defaultCycle[${cycleIndex}]`)
  );
  if (!Number.isInteger(phases) || phases < 1 || defaultCycle.length !== phases) {
    throw new ScenarioFormatError(source, `${path}.defaultCycle must hold one duration per phase`);
  }
  return {
    groups,
    phases,
    defaultCycle,
    slowDistance: readNumber(value.slowDistance, source, `${path}.slowDistance`),
    slowFactor: readNumber(value.slowFactor, source, `${path}.slowFactor`),
    stopDistance: readNumber(value.stopDistance, source, `${path}.stopDistance`)
  };
}

function readWeightedPath(value: unknown, source: string, path: string): WeightedPathInput {
  if (!Array.isArray(value) || value.length !== 2 || !Array.isArray(value[1])) {
    throw new ScenarioFormatError(source, `${path} must be [weight, roads]`);
  }
  const weight = readNumber(value[0], source, `${path}[0]`);
  const routes: unknown[] = value[1];
  if (routes.length > 0 && routes.every((route) => Array.isArray(route))) {
    return [weight, routes.map((route, routeIndex) => readIdList(route, source, `${path}[1][${routeIndex}]`))];
  }
  return [weight, readIdList(routes, source, `${path}[1]`)];
}

function readGenerator(value: unknown, source: string, index: number): ScenarioGenerator {
  const path = `generators[${index}]`;
  if (!isRecord(value) || !Array.isArray(value.paths)) {
    throw new ScenarioFormatError(source, `${path} must have a paths list`);
  }
  return {
    rate: readNumber(value.rate, source, `${path}.rate`),
    paths: value.paths.map((entry, pathIndex) => readWeightedPath(entry, source, `${path}.paths[${pathIndex}]`))
  };
}

export function parseScenarioDefinition(raw: unknown, source: string): ScenarioDefinition {
  if (!isRecord(raw)) {
    throw new ScenarioFormatError(source, "scenario must be an object");
  }
  const id = readNumber(raw.id, source, "id");
  if (typeof raw.name !== "string" || raw.name.length === 0) {
    throw new ScenarioFormatError(source, "name must be a non-empty string");
  }
  if (!Array.isArray(raw.signals) || !Array.isArray(raw.generators)) {
    throw new ScenarioFormatError(source, "signals and generators must be lists");
  }
  return {
    id,
    name: raw.name,
    nodes: readNumber(raw.nodes, source, "nodes"),
    roads: readRoads(raw.roads, source),
    intersections: readIntersections(raw.intersections, source),
    signals: raw.signals.map((signal, index) => readSignal(signal, source, index)),
    generators: raw.generators.map((generator, index) => readGenerator(generator, source, index))
  };
}
