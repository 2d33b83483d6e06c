import fs from "node:fs";
import path from "node:path";
import type { RunOutcome, StepRecord } from "../types/run.js";
import type { ResultSink } from "./result-sink.js";

export type RunSummary = {
  run_id: string;
  started_at: string;
  finished_at: string;
  outcome: RunOutcome;
  records_path: string;
};

/**
 * Writes a run to `<runsRoot>/<runId>/`: `steps.jsonl` grows one line per
 * record as the sweep advances, and `outcome.json` is written at finalize.
 */
export class RunDirectorySink implements ResultSink {
  readonly runDir: string;
  readonly recordsPath: string;
  readonly outcomePath: string;
  private readonly startedAt = new Date().toISOString();

  constructor(
    runsRoot: string,
    readonly runId: string,
  ) {
    this.runDir = path.join(runsRoot, runId);
    this.recordsPath = path.join(this.runDir, "steps.jsonl");
    this.outcomePath = path.join(this.runDir, "outcome.json");
  }

  /** Ensure the run directory exists and start an empty record file. */
  init(): void {
    fs.mkdirSync(this.runDir, { recursive: true });
    fs.writeFileSync(this.recordsPath, "", "utf8");
  }

  async append(record: StepRecord): Promise<void> {
    await fs.promises.appendFile(this.recordsPath, JSON.stringify(record) + "\n", "utf8");
  }

  async finalize(outcome: RunOutcome): Promise<void> {
    const summary: RunSummary = {
      run_id: this.runId,
      started_at: this.startedAt,
      finished_at: new Date().toISOString(),
      outcome,
      records_path: path.basename(this.recordsPath),
    };
    await fs.promises.writeFile(this.outcomePath, JSON.stringify(summary, null, 2) + "\n", "utf8");
  }
}

