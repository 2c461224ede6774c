import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  loadBestConfig,
  loadBestConfigForScenario,
  parseBestConfig,
  saveBestConfig,
  toBestConfigDocument
} from "../optimizer/resultStore";

let dir = "";

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "signal-results-"));
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(dir, { recursive: true, force: true });
});

describe("best configuration document", () => {
  it("uses the persisted field names", () => {
    expect(
      toBestConfigDocument({ bestConfig: [12, 34, 56], bestFitness: 0.75, populationSize: 20, generations: 50 })
    ).toEqual({
      best_config: [12, 34, 56],
      best_fitness: 0.75,
      optimization_params: { population_size: 20, generations: 50, solution_length: 3 }
    });
  });

  it("stores a non-finite fitness as null", () => {
    const document = toBestConfigDocument({
      bestConfig: [10],
      bestFitness: Number.NEGATIVE_INFINITY,
      populationSize: 2,
      generations: 1
    });
    expect(document.best_fitness).toBeNull();
  });

  it("accepts documents and bare lists", () => {
    expect(parseBestConfig({ best_config: [10, 20.4] })).toEqual([10, 20]);
    expect(parseBestConfig([30, 40])).toEqual([30, 40]);
    expect(parseBestConfig({ best_config: [] })).toBeNull();
    expect(parseBestConfig({ best_config: [10, "x"] })).toBeNull();
    expect(parseBestConfig({ other: [1] })).toBeNull();
    expect(parseBestConfig("nope")).toBeNull();
  });
});

describe("result files", () => {
  it("creates missing directories and round-trips the configuration", async () => {
    const file = path.join(dir, "nested", "deeper", "best.json");
    await saveBestConfig(file, { bestConfig: [15, 25, 35, 45], bestFitness: 1.25, populationSize: 8, generations: 3 });

    const stored: unknown = JSON.parse(await fs.readFile(file, "utf8"));
    expect(stored).toEqual({
      best_config: [15, 25, 35, 45],
      best_fitness: 1.25,
      optimization_params: { population_size: 8, generations: 3, solution_length: 4 }
    });
    expect(await loadBestConfig(file)).toEqual([15, 25, 35, 45]);
  });

  it("returns null for a missing file without warning", async () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    expect(await loadBestConfig(path.join(dir, "absent.json"))).toBeNull();
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it("returns null for a corrupt file", async () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const file = path.join(dir, "corrupt.json");
    await fs.writeFile(file, "{ not json", "utf8");
    expect(await loadBestConfig(file)).toBeNull();
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it("prefers the scenario file and falls back to the shared one", async () => {
    await fs.mkdir(path.join(dir, "results"), { recursive: true });
    await fs.writeFile(path.join(dir, "results", "best_config.json"), JSON.stringify([11, 22, 33]), "utf8");

    expect(await loadBestConfigForScenario(2, dir)).toEqual({
      config: [11, 22, 33],
      path: path.join(dir, "results", "best_config.json")
    });

    await saveBestConfig(path.join(dir, "results", "best_config_s2.json"), {
      bestConfig: [44, 55, 66],
      bestFitness: 0,
      populationSize: 2,
      generations: 1
    });
    expect(await loadBestConfigForScenario(2, dir)).toEqual({
      config: [44, 55, 66],
      path: path.join(dir, "results", "best_config_s2.json")
    });
    expect(await loadBestConfigForScenario(3, path.join(dir, "empty"))).toBeNull();
  });
});
