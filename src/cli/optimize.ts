import { parseArgs } from "node:util";
import { DEFAULT_OPTIMIZER_SETTINGS, UNDERFED_FITNESS } from "../config";
import { ConsoleDisplay } from "../display";
import { optimizeAndSave } from "../optimizer/optimizeAndSave";
import { runReplay } from "../replay";
import { getMinimumScoringTime, SCENARIO_IDS, SCENARIOS } from "../scenarios";
import { readIntegerFlag, readNumberFlag, runMain } from "./args";

const USAGE = `Usage: npm run optimize -- [options]

  --scenario <id>   ${Object.entries(SCENARIOS)
    .map(([id, name]) => `${id}=${name}`)
    .join(", ")} (default 1)
  --pop <n>         population size (default ${DEFAULT_OPTIMIZER_SETTINGS.populationSize})
  --gens <n>        generations (default ${DEFAULT_OPTIMIZER_SETTINGS.generations})
  --sim-time <s>    simulated seconds per evaluation (default ${DEFAULT_OPTIMIZER_SETTINGS.simTimeS});
                    runs shorter than ${SCENARIO_IDS.map((id) => `${id}=${Math.round(getMinimumScoringTime(id))}s`).join(", ")}
                    see too few vehicles and all score ${UNDERFED_FITNESS}
  --seed <n>        run seed (default ${DEFAULT_OPTIMIZER_SETTINGS.seed})
  --render          replay the best configuration with a status display afterwards
  --out <path>      output file (default results/best_config_s<id>.json)`;

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      scenario: { type: "string" },
      pop: { type: "string" },
      gens: { type: "string" },
      "sim-time": { type: "string" },
      seed: { type: "string" },
      render: { type: "boolean", default: false },
      out: { type: "string" },
      help: { type: "boolean", short: "h", default: false }
    }
  });
  if (values.help) {
    console.info(USAGE);
    return;
  }

  let interrupted = false;
  const display = new ConsoleDisplay();
  process.once("SIGINT", () => {
    interrupted = true;
    display.close();
    console.warn("[optimize] interrupt received; finishing with the best result so far");
  });

  const scenario = readIntegerFlag(values.scenario, "scenario", 1);
  const { outPath, document } = await optimizeAndSave({
    scenario,
    populationSize: readIntegerFlag(values.pop, "pop", DEFAULT_OPTIMIZER_SETTINGS.populationSize),
    generations: readIntegerFlag(values.gens, "gens", DEFAULT_OPTIMIZER_SETTINGS.generations),
    simTimeS: readNumberFlag(values["sim-time"], "sim-time", DEFAULT_OPTIMIZER_SETTINGS.simTimeS),
    seed: readIntegerFlag(values.seed, "seed", DEFAULT_OPTIMIZER_SETTINGS.seed),
    outPath: values.out,
    isCancelled: () => interrupted,
    onProgress: ({ generation, generations, generationBest, bestFitness }) => {
      console.info(
        `[optimize] generation ${generation + 1}/${generations}: best ${generationBest.toFixed(3)}, ` +
          `overall ${bestFitness.toFixed(3)}`
      );
    }
  });

  if (values.render && document && !interrupted) {
    const replay = await runReplay({ scenario, configPath: outPath, display });
    console.info(
      `[optimize] replay: ${replay.vehiclesDone} vehicles done, average wait ${replay.averageWait.toFixed(2)}s` +
        (replay.collided ? ", collision" : "")
    );
  }
}

runMain("optimize", main, USAGE);
