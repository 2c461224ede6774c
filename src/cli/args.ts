export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function readNumberFlag(value: string | undefined, flag: string, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new UsageError(`--${flag} expects a number, got "${value}"`);
  }
  return parsed;
}

export function readIntegerFlag(value: string | undefined, flag: string, fallback: number): number {
  const parsed = readNumberFlag(value, flag, fallback);
  if (!Number.isInteger(parsed)) {
    throw new UsageError(`--${flag} expects an integer, got "${value}"`);
  }
  return parsed;
}

/** Runs a CLI entry point, mapping failures to an exit code. */
export function runMain(tag: string, main: () => Promise<void>, usage: string): void {
  main().catch((error: unknown) => {
    if (error instanceof UsageError) {
      console.error(`[${tag}] ${error.message}\n\n${usage}`);
      process.exitCode = 2;
      return;
    }
    console.error(`[${tag}] failed`, error);
    process.exitCode = 1;
  });
}
