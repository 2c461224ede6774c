import {
  DEFAULT_OPTIMIZER_SETTINGS,
  FAILED_EVALUATION_FITNESS,
  FITNESS_COLLISION_PENALTY,
  FITNESS_WAIT_WEIGHT,
  GENE_MAX_S,
  GENE_MIN_S,
  MIN_GENERATED_FOR_SCORING,
  MUTATION_JITTER_S,
  UNDERFED_FITNESS
} from "../config";
import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import { createDebugLog } from "../debug";
import { DEFAULT_DT_S } from "../traffic/engine";
import { clamp, createRng, normalizeSeed, randomInt, type RandomFn } from "../traffic/rng";
import type { SimulationRun } from "../traffic/types";

const debugLog = createDebugLog("optimizer");

export type Candidate = number[];

/** Builds a fresh simulation for one candidate. `render` is always false during optimization. */
export type EngineFactory = (config: readonly number[], render: boolean, seed: number) => SimulationRun;

export interface ScoredCandidate {
  candidate: Candidate;
  fitness: number;
}

export interface GenerationRecord {
  generation: number;
  bestFitness: number;
  meanFitness: number;
  bestCandidate: Candidate;
}

export interface OptimizerProgress {
  generation: number;
  generations: number;
  generationBest: number;
  bestFitness: number;
  bestCandidate: Candidate | null;
}

export interface OptimizerRunOptions {
  simTime?: number;
  /** Traffic seed source; every candidate sees the same traffic. */
  seed?: number;
  onProgress?: (progress: OptimizerProgress) => void | Promise<void>;
  isCancelled?: () => boolean;
}

export interface OptimizationResult {
  bestCandidate: Candidate | null;
  bestFitness: number;
  history: GenerationRecord[];
  generationsRun: number;
  cancelled: boolean;
}

export interface GeneticOptimizerOptions {
  solutionLength: number;
  populationSize?: number;
  generations?: number;
  mutationRate?: number;
  /** Seed for the search RNG. Ignored when `random` is supplied. */
  seed?: number;
  random?: RandomFn;
}

/** Traffic seed for evaluations; depends on the run seed only. */
export function deriveTrafficSeed(seed: number | null | undefined): number {
  return (normalizeSeed(seed) ^ 0x9e3779b9) | 0;
}

export function scoreRun(run: SimulationRun, simTime: number): number {
  if (run.generatedCount < MIN_GENERATED_FOR_SCORING) {
    return UNDERFED_FITNESS;
  }
  const flow = run.completedCount / Math.max(simTime, 1);
  const collided = run.collisionDetected ? 1 : 0;
  return flow - FITNESS_WAIT_WEIGHT * run.averageWaitTime - FITNESS_COLLISION_PENALTY * collided;
}

function toCount(value: number | undefined, fallback: number, min: number): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.max(min, Math.floor(value));
}

export class GeneticOptimizer {
  readonly solutionLength: number;
  readonly populationSize: number;
  readonly generations: number;
  readonly mutationRate: number;
  private readonly random: RandomFn;
  population: Candidate[] = [];

  constructor(options: GeneticOptimizerOptions) {
    this.solutionLength = toCount(options.solutionLength, 0, 0);
    this.populationSize = toCount(options.populationSize, DEFAULT_OPTIMIZER_SETTINGS.populationSize, 2);
    this.generations = toCount(options.generations, DEFAULT_OPTIMIZER_SETTINGS.generations, 0);
    this.mutationRate =
      typeof options.mutationRate === "number" && Number.isFinite(options.mutationRate)
        ? clamp(options.mutationRate, 0, 1)
        : DEFAULT_OPTIMIZER_SETTINGS.mutationRate;
    this.random = options.random ?? createRng(normalizeSeed(options.seed));
  }

  randomCandidate(): Candidate {
    return Array.from({ length: this.solutionLength }, () => randomInt(this.random, GENE_MIN_S, GENE_MAX_S));
  }

  initializePopulation(): Candidate[] {
    this.population = Array.from({ length: this.populationSize }, () => this.randomCandidate());
    return this.population;
  }

  /** Single-point crossover. Parents of different or sub-2 length yield a copy of `first`. */
  crossover(first: readonly number[], second: readonly number[], point?: number): Candidate {
    if (first.length !== second.length || first.length < 2) {
      return [...first];
    }
    const cut =
      point !== undefined && Number.isInteger(point) && point >= 1 && point <= first.length - 1
        ? point
        : randomInt(this.random, 1, first.length - 1);
    return [...first.slice(0, cut), ...second.slice(cut)];
  }

  mutate(candidate: readonly number[], rate = this.mutationRate): Candidate {
    return candidate.map((gene) => {
      if (this.random() >= rate) {
        return gene;
      }
      const jitter = randomInt(this.random, -MUTATION_JITTER_S, MUTATION_JITTER_S);
      return clamp(gene + jitter, GENE_MIN_S, GENE_MAX_S);
    });
  }

  /**
   * Runs one fresh simulation for `candidate` and scores it. Simulated time is counted here, in
   * steps of the run's `dt` (or the default step when that is not positive). Stops early on
   * collision, on a stop request, or when `isCancelled` reports true. Failures score -1.
   */
  evaluateFitness(
    candidate: readonly number[],
    factory: EngineFactory,
    simTime: number,
    trafficSeed: number,
    isCancelled?: () => boolean
  ): number {
    try {
      const run = factory(candidate, false, trafficSeed);
      const dt = Number.isFinite(run.dt) && run.dt > 0 ? run.dt : DEFAULT_DT_S;
      for (let elapsed = 0; elapsed < simTime; elapsed += dt) {
        if (run.collisionDetected || run.stopRequested || isCancelled?.()) {
          break;
        }
        run.step(dt);
      }
      return scoreRun(run, simTime);
    } catch (error) {
      console.error("[optimizer] evaluation failed", candidate, error);
      return FAILED_EVALUATION_FITNESS;
    }
  }

  /** Evaluations run serially; the event loop gets a turn between them so signals can cancel. */
  async run(factory: EngineFactory, options: OptimizerRunOptions = {}): Promise<OptimizationResult> {
    const simTime =
      typeof options.simTime === "number" && Number.isFinite(options.simTime) && options.simTime > 0
        ? options.simTime
        : DEFAULT_OPTIMIZER_SETTINGS.simTimeS;
    const trafficSeed = deriveTrafficSeed(options.seed ?? DEFAULT_OPTIMIZER_SETTINGS.seed);
    const isCancelled = options.isCancelled ?? (() => false);

    const history: GenerationRecord[] = [];
    let best: ScoredCandidate | null = null;
    let cancelled = false;
    let generationsRun = 0;

    if (this.population.length !== this.populationSize) {
      this.initializePopulation();
    }

    for (let generation = 0; generation < this.generations; generation += 1) {
      if (isCancelled()) {
        cancelled = true;
        break;
      }

      const scored: ScoredCandidate[] = [];
      for (const candidate of this.population) {
        await yieldToEventLoop();
        if (isCancelled()) {
          cancelled = true;
          break;
        }
        const fitness = this.evaluateFitness(candidate, factory, simTime, trafficSeed, isCancelled);
        // A run cut short by cancellation is not a fair score.
        if (isCancelled()) {
          cancelled = true;
          break;
        }
        scored.push({ candidate, fitness });
      }
      if (cancelled) {
        best = pickBetter(best, bestOf(scored));
        break;
      }

      scored.sort((a, b) => b.fitness - a.fitness);
      const leader = scored[0];
      const bestSoFar: ScoredCandidate = pickBetter(best, leader) ?? leader;
      best = bestSoFar;
      const meanFitness = scored.reduce((sum, entry) => sum + entry.fitness, 0) / scored.length;
      history.push({
        generation,
        bestFitness: leader.fitness,
        meanFitness,
        bestCandidate: [...leader.candidate]
      });
      generationsRun += 1;
      debugLog(`generation ${generation + 1}/${this.generations} best=${leader.fitness.toFixed(3)}`);
      this.notify(options.onProgress, {
        generation,
        generations: this.generations,
        generationBest: leader.fitness,
        bestFitness: bestSoFar.fitness,
        bestCandidate: [...bestSoFar.candidate]
      });

      this.population = this.breed(scored.map((entry) => entry.candidate));
    }

    return {
      bestCandidate: best ? [...best.candidate] : null,
      bestFitness: best ? best.fitness : Number.NEGATIVE_INFINITY,
      history,
      generationsRun,
      cancelled
    };
  }

  /** Survivors are the top half (at least two) of a population sorted best first. */
  breed(ranked: readonly Candidate[]): Candidate[] {
    const parentCount = Math.min(ranked.length, Math.max(2, Math.floor(this.populationSize / 2)));
    const parents = ranked.slice(0, parentCount);
    const next = parents.map((parent) => [...parent]);
    if (parents.length === 0) {
      return next;
    }
    while (next.length < this.populationSize) {
      const first = parents[randomInt(this.random, 0, parents.length - 1)];
      const second = parents[randomInt(this.random, 0, parents.length - 1)];
      next.push(this.mutate(this.crossover(first, second)));
    }
    return next;
  }

  private notify(listener: OptimizerRunOptions["onProgress"], progress: OptimizerProgress): void {
    if (!listener) {
      return;
    }
    try {
      const result = listener(progress);
      if (result instanceof Promise) {
        void result.catch((error: unknown) => {
          console.warn("[optimizer] progress listener rejected", error);
        });
      }
    } catch (error) {
      console.warn("[optimizer] progress listener failed", error);
    }
  }
}

function bestOf(scored: readonly ScoredCandidate[]): ScoredCandidate | null {
  let best: ScoredCandidate | null = null;
  for (const entry of scored) {
    if (!best || entry.fitness > best.fitness) {
      best = entry;
    }
  }
  return best;
}

function pickBetter(current: ScoredCandidate | null, challenger: ScoredCandidate | null): ScoredCandidate | null {
  if (!challenger) {
    return current;
  }
  if (!current || challenger.fitness > current.fitness) {
    return { candidate: [...challenger.candidate], fitness: challenger.fitness };
  }
  return current;
}
