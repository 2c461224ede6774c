import { parseArgs } from "node:util";
import { DEFAULT_REPLAY_SIM_TIME_S } from "../config";
import { ConsoleDisplay } from "../display";
import { runReplay } from "../replay";
import { readIntegerFlag, readNumberFlag, runMain } from "./args";

const USAGE = `Usage: npm run replay -- [options]

  --scenario <id>   scenario to rebuild (default 1)
  --sim-time <s>    simulated seconds (default ${DEFAULT_REPLAY_SIM_TIME_S})
  --config <path>   stored configuration (default results/best_config_s<id>.json)`;

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      scenario: { type: "string" },
      "sim-time": { type: "string" },
      config: { type: "string" },
      help: { type: "boolean", short: "h", default: false }
    }
  });
  if (values.help) {
    console.info(USAGE);
    return;
  }

  const display = new ConsoleDisplay();
  process.once("SIGINT", () => display.close());

  const result = await runReplay({
    scenario: readIntegerFlag(values.scenario, "scenario", 1),
    simTime: readNumberFlag(values["sim-time"], "sim-time", DEFAULT_REPLAY_SIM_TIME_S),
    configPath: values.config,
    display
  });
  console.info(
    `[replay] vehicles done ${result.vehiclesDone}, average wait ${result.averageWait.toFixed(2)}s, ` +
      `collision ${result.collided ? "yes" : "no"}${result.closed ? " (stopped early)" : ""}`
  );
}

runMain("replay", main, USAGE);
