import { promises as fs } from "node:fs";
import path from "node:path";
import { bestConfigPath, LEGACY_BEST_CONFIG_PATH } from "../config";

export interface OptimizationParams {
  population_size: number;
  generations: number;
  solution_length: number;
}

/** On-disk document; field names are part of the file format. */
export interface BestConfigDocument {
  best_config: number[];
  best_fitness: number | null;
  optimization_params: OptimizationParams;
}

export interface SaveBestConfigInput {
  bestConfig: readonly number[];
  bestFitness: number;
  populationSize: number;
  generations: number;
}

export function toBestConfigDocument(input: SaveBestConfigInput): BestConfigDocument {
  return {
    best_config: [...input.bestConfig],
    best_fitness: Number.isFinite(input.bestFitness) ? input.bestFitness : null,
    optimization_params: {
      population_size: input.populationSize,
      generations: input.generations,
      solution_length: input.bestConfig.length
    }
  };
}

async function ensureDir(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
}

export async function saveBestConfig(filePath: string, input: SaveBestConfigInput): Promise<BestConfigDocument> {
  const document = toBestConfigDocument(input);
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, `${JSON.stringify(document, null, 2)}\n`, "utf8");
  return document;
}

function readGeneList(value: unknown): number[] | null {
  if (!Array.isArray(value) || value.length === 0) {
    return null;
  }
  const genes: number[] = [];
  for (const entry of value) {
    if (typeof entry !== "number" || !Number.isFinite(entry)) {
      return null;
    }
    genes.push(Math.round(entry));
  }
  return genes;
}

/** Parses a stored document or a bare list; anything else yields null. */
export function parseBestConfig(raw: unknown): number[] | null {
  if (Array.isArray(raw)) {
    return readGeneList(raw);
  }
  if (typeof raw === "object" && raw !== null && "best_config" in raw) {
    return readGeneList(raw.best_config);
  }
  return null;
}

async function readJsonFile(filePath: string): Promise<unknown> {
  const text = await fs.readFile(filePath, "utf8");
  return JSON.parse(text);
}

/** Returns the stored gene list, or null when the file is missing or unreadable. Never throws. */
export async function loadBestConfig(filePath: string): Promise<number[] | null> {
  let raw: unknown;
  try {
    raw = await readJsonFile(filePath);
  } catch (error) {
    if (!isMissingFile(error)) {
      console.warn(`[results] could not read ${filePath}`, error);
    }
    return null;
  }
  const genes = parseBestConfig(raw);
  if (!genes) {
    console.warn(`[results] ${filePath} does not hold a configuration`);
  }
  return genes;
}

function isMissingFile(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

/** Scenario-specific result first, then the shared legacy file. */
export async function loadBestConfigForScenario(
  scenarioId: number,
  baseDir = "."
): Promise<{ config: number[]; path: string } | null> {
  for (const candidate of [bestConfigPath(scenarioId), LEGACY_BEST_CONFIG_PATH]) {
    const filePath = path.join(baseDir, candidate);
    const config = await loadBestConfig(filePath);
    if (config) {
      return { config, path: filePath };
    }
  }
  return null;
}
