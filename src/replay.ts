import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import { DEFAULT_REPLAY_SIM_TIME_S } from "./config";
import { ConsoleDisplay } from "./display";
import { loadBestConfig, loadBestConfigForScenario } from "./optimizer/resultStore";
import { buildScenario, getScenario } from "./scenarios";
import type { EngineDisplay } from "./traffic/types";

const YIELD_EVERY_TICKS = 60;

export interface ReplayOptions {
  scenario: number;
  simTime?: number;
  configPath?: string;
  /** Used as-is instead of a stored file. */
  config?: readonly number[];
  render?: boolean;
  display?: EngineDisplay;
  seed?: number;
  isCancelled?: () => boolean;
}

export interface ReplayResult {
  vehiclesDone: number;
  averageWait: number;
  collided: boolean;
  /** True when the display was closed or the run was cancelled before `simTime`. */
  closed: boolean;
  simulatedTime: number;
  config: number[] | null;
}

async function resolveConfig(options: ReplayOptions): Promise<number[] | null> {
  if (options.config) {
    return [...options.config];
  }
  if (options.configPath) {
    const stored = await loadBestConfig(options.configPath);
    if (!stored) {
      console.warn(`[replay] no configuration at ${options.configPath}; using scenario defaults`);
    }
    return stored;
  }
  const found = await loadBestConfigForScenario(options.scenario);
  if (!found) {
    console.warn(`[replay] no stored configuration for scenario ${options.scenario}; using scenario defaults`);
    return null;
  }
  console.info(`[replay] loaded ${found.path}`);
  return found.config;
}

export async function runReplay(options: ReplayOptions): Promise<ReplayResult> {
  const definition = getScenario(options.scenario);
  const simTime =
    typeof options.simTime === "number" && Number.isFinite(options.simTime) && options.simTime > 0
      ? options.simTime
      : DEFAULT_REPLAY_SIM_TIME_S;
  const config = await resolveConfig(options);

  const engine = buildScenario(definition, config, { seed: options.seed });
  const display: EngineDisplay | null = options.display ?? (options.render ? new ConsoleDisplay() : null);
  if (display) {
    engine.attachDisplay(display);
  }

  let closed = false;
  let ticks = 0;
  while (engine.time < simTime) {
    if (ticks % YIELD_EVERY_TICKS === 0) {
      await yieldToEventLoop();
    }
    ticks += 1;
    if (engine.stopRequested || options.isCancelled?.()) {
      closed = true;
      break;
    }
    if (engine.collisionDetected) {
      break;
    }
    engine.step();
  }

  return {
    vehiclesDone: engine.completedCount,
    averageWait: engine.averageWaitTime,
    collided: engine.collisionDetected,
    closed,
    simulatedTime: engine.time,
    config
  };
}
