export interface OptimizerSettings {
  populationSize: number;
  generations: number;
  /** Simulated seconds per fitness evaluation. */
  simTimeS: number;
  seed: number;
  mutationRate: number;
}

export const DEFAULT_OPTIMIZER_SETTINGS: OptimizerSettings = {
  populationSize: 20,
  generations: 50,
  simTimeS: 60,
  seed: 42,
  mutationRate: 0.1
};

export const GENE_MIN_S = 5;
export const GENE_MAX_S = 90;
export const MUTATION_JITTER_S = 10;

export const FITNESS_WAIT_WEIGHT = 2;
export const FITNESS_COLLISION_PENALTY = 1000;
export const MIN_GENERATED_FOR_SCORING = 3;
export const UNDERFED_FITNESS = -10000;
export const FAILED_EVALUATION_FITNESS = -1;

export const DEFAULT_REPLAY_SIM_TIME_S = 120;
export const RESULTS_DIR = "results";

export function bestConfigPath(scenarioId: number): string {
  return `${RESULTS_DIR}/best_config_s${scenarioId}.json`;
}

export const LEGACY_BEST_CONFIG_PATH = `${RESULTS_DIR}/best_config.json`;
