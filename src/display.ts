import type { EngineDisplay, SimulationRun } from "./traffic/types";

export interface ConsoleDisplayOptions {
  /** Simulated seconds between status lines. */
  intervalS?: number;
  log?: (line: string) => void;
}

export function formatStatus(run: SimulationRun): string {
  const parts = [
    `t=${run.time.toFixed(1)}s`,
    `generated=${run.generatedCount}`,
    `on-map=${run.onMapCount}`,
    `done=${run.completedCount}`,
    `avg-wait=${run.averageWaitTime.toFixed(2)}s`
  ];
  if (run.collisionDetected) {
    parts.push("COLLISION");
  }
  return parts.join(" ");
}

/** Text stand-in for a viewer window: prints a status line every few simulated seconds. */
export class ConsoleDisplay implements EngineDisplay {
  private readonly intervalS: number;
  private readonly log: (line: string) => void;
  private isClosed = false;
  private lastReport = Number.NEGATIVE_INFINITY;

  constructor(options: ConsoleDisplayOptions = {}) {
    this.intervalS =
      typeof options.intervalS === "number" && Number.isFinite(options.intervalS) && options.intervalS > 0
        ? options.intervalS
        : 5;
    this.log = options.log ?? ((line) => console.info(`[display] ${line}`));
  }

  get closed(): boolean {
    return this.isClosed;
  }

  close(): void {
    this.isClosed = true;
  }

  update(run: SimulationRun): void {
    if (this.isClosed) {
      return;
    }
    if (run.time - this.lastReport >= this.intervalS || run.collisionDetected) {
      this.lastReport = run.time;
      this.log(formatStatus(run));
    }
  }
}
