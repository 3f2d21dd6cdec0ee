import type { Result } from "@promptline/core";
import type { Observer } from "@promptline/pipeline";

// ─── Console observers ─────────────────────────────────────────────────────────

/** Prints each result to stdout, as plain text or as a JSON record. */
export class StdoutObserver implements Observer<Result> {
  constructor(private json = false) {}

  onEvent(result: Result): void {
    const line = this.json ? JSON.stringify({ text: result.text }) : result.text;
    process.stdout.write(`${line}\n`);
  }
}

/** One summary line per result on stderr. */
export class ResultLogObserver implements Observer<Result> {
  onEvent(result: Result): void {
    process.stderr.write(`[result] ${result.text.length} chars\n`);
  }
}
