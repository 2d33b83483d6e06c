import type { RunOutcome, StepRecord } from "../types/run.js";

/**
 * Destination for a run's records. `append` is called once per step in sweep
 * order as each record is produced; `finalize` once, after shutdown, on every
 * outcome.
 */
export interface ResultSink {
  append(record: StepRecord): Promise<void>;
  finalize(outcome: RunOutcome): Promise<void>;
}

export class MemoryResultSink implements ResultSink {
  readonly records: StepRecord[] = [];
  outcome: RunOutcome | null = null;

  async append(record: StepRecord): Promise<void> {
    this.records.push(record);
  }

  async finalize(outcome: RunOutcome): Promise<void> {
    this.outcome = outcome;
  }
}

/**
 * Fan-out to several sinks. Every sink sees every call; the first failure is
 * rethrown after all of them have been tried.
 */
export class CompositeResultSink implements ResultSink {
  constructor(private readonly sinks: ResultSink[]) {}

  async append(record: StepRecord): Promise<void> {
    await this.each((sink) => sink.append(record));
  }

  async finalize(outcome: RunOutcome): Promise<void> {
    await this.each((sink) => sink.finalize(outcome));
  }

  private async each(fn: (sink: ResultSink) => Promise<void>): Promise<void> {
    const results = await Promise.allSettled(this.sinks.map(fn));
    const failed = results.find((r): r is PromiseRejectedResult => r.status === "rejected");
    if (failed) throw failed.reason;
  }
}
