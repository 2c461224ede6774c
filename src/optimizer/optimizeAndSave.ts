import {
  bestConfigPath,
  DEFAULT_OPTIMIZER_SETTINGS,
  MIN_GENERATED_FOR_SCORING,
  UNDERFED_FITNESS,
  type OptimizerSettings
} from "../config";
import { getMinimumScoringTime, getScenario, getSolutionLength, makeEngineFactory } from "../scenarios";
import { GeneticOptimizer, type OptimizationResult, type OptimizerProgress } from "./geneticOptimizer";
import { saveBestConfig, type BestConfigDocument } from "./resultStore";

export interface OptimizeAndSaveOptions extends Partial<OptimizerSettings> {
  scenario: number;
  outPath?: string;
  onProgress?: (progress: OptimizerProgress) => void | Promise<void>;
  isCancelled?: () => boolean;
}

export interface OptimizeAndSaveResult {
  result: OptimizationResult;
  document: BestConfigDocument | null;
  outPath: string;
}

export async function optimizeAndSave(options: OptimizeAndSaveOptions): Promise<OptimizeAndSaveResult> {
  const settings: OptimizerSettings = { ...DEFAULT_OPTIMIZER_SETTINGS };
  for (const key of ["populationSize", "generations", "simTimeS", "seed", "mutationRate"] as const) {
    const value = options[key];
    if (typeof value === "number" && Number.isFinite(value)) {
      settings[key] = value;
    }
  }

  const scenario = getScenario(options.scenario);
  const factory = makeEngineFactory(scenario.id);
  const optimizer = new GeneticOptimizer({
    solutionLength: getSolutionLength(scenario.id),
    populationSize: settings.populationSize,
    generations: settings.generations,
    mutationRate: settings.mutationRate,
    seed: settings.seed
  });

  console.info(
    `[optimizer] scenario ${scenario.id} (${scenario.name}): population=${optimizer.populationSize} ` +
      `generations=${optimizer.generations} genes=${optimizer.solutionLength} sim=${settings.simTimeS}s`
  );
  const minimumSimTime = getMinimumScoringTime(scenario.id);
  if (settings.simTimeS < minimumSimTime) {
    console.warn(
      `[optimizer] scenario ${scenario.id} reaches ${MIN_GENERATED_FOR_SCORING} vehicles only after about ` +
        `${Math.round(minimumSimTime)} s of simulated time; ` +
        `at ${settings.simTimeS} s every candidate scores ${UNDERFED_FITNESS}`
    );
  }
  const result = await optimizer.run(factory, {
    simTime: settings.simTimeS,
    seed: settings.seed,
    onProgress: options.onProgress,
    isCancelled: options.isCancelled
  });

  const outPath = options.outPath ?? bestConfigPath(scenario.id);
  if (!result.bestCandidate) {
    console.warn("[optimizer] no generation completed; nothing saved");
    return { result, document: null, outPath };
  }
  const document = await saveBestConfig(outPath, {
    bestConfig: result.bestCandidate,
    bestFitness: result.bestFitness,
    populationSize: optimizer.populationSize,
    generations: optimizer.generations
  });
  console.info(`[optimizer] best fitness ${result.bestFitness.toFixed(3)} saved to ${outPath}`);
  return { result, document, outPath };
}
