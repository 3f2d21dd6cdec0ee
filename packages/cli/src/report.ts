import { isPipelineError } from "@promptline/core";

/** Print a pipeline error as one line and fail the process; anything else is a bug and rethrown. */
export function reportError(err: unknown): void {
  if (!isPipelineError(err)) throw err;
  console.error(`[promptline] ${err.name}: ${err.message}`);
  process.exitCode = 1;
}
