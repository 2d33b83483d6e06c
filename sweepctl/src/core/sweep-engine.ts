import { errorMessage, isBenchError } from "../utils/errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { nowIso, realSleep, type Sleep } from "../utils/time.js";
import { expandRange } from "./ranges.js";
import { nextState, type EngineEvent, type EngineState } from "./state-machine.js";
import type { AbortMonitor } from "../monitor/abort-monitor.js";
import type { ResultSink } from "../sinks/result-sink.js";
import type { LoadReading } from "../instruments/load-controller.js";
import type { SourceReading } from "../instruments/source-controller.js";
import type { SweepPlan } from "../types/plan.js";
import type { OutcomeError, OutcomeKind, RunOutcome, SessionMode, StepRecord, StepStatus } from "../types/run.js";

/** What the engine needs from the source; SourceController is the real one. */
export interface SourceUnit {
  readonly mode: SessionMode;
  bringUp(): Promise<void>;
  setVoltage(voltage: number): Promise<number>;
  measure(): Promise<SourceReading>;
  bringDown(): Promise<void>;
}

/** What the engine needs from the load; LoadController is the real one. */
export interface LoadUnit {
  readonly mode: SessionMode;
  bringUp(): Promise<void>;
  setCurrent(current: number): Promise<number>;
  measure(): Promise<LoadReading>;
  bringDown(): Promise<void>;
}

export type SweepEngineDeps = {
  source: SourceUnit;
  load: LoadUnit;
  monitor: AbortMonitor;
  sink: ResultSink;
  logger?: Logger;
  sleep?: Sleep;
};

export type EngineResult = {
  state: EngineState;
  outcome: RunOutcome;
  records: readonly StepRecord[];
  /** Every state visited, starting with idle. */
  transitions: readonly EngineState[];
};

type Progress = {
  event: EngineEvent;
  kind: OutcomeKind;
  error?: OutcomeError;
};

/**
 * Drives the bench through
 * idle → source_up → load_up → sweeping → shutting_down → done.
 *
 * Every path, including unexpected errors, ends in the shutdown phase: load
 * bring-down, then source bring-down, each attempted regardless of the other.
 */
export class SweepEngine {
  private state_: EngineState = "idle";
  private readonly history: EngineState[] = ["idle"];
  private readonly records: StepRecord[] = [];
  private readonly log: Logger;
  private readonly sleep: Sleep;
  private voltageIndex = -1;
  private currentIndex = -1;
  private started = false;

  constructor(
    private readonly plan: SweepPlan,
    private readonly deps: SweepEngineDeps,
  ) {
    this.log = (deps.logger ?? silentLogger()).child({ component: "engine" });
    this.sleep = deps.sleep ?? realSleep;
  }

  get state(): EngineState {
    return this.state_;
  }

  /** Run the sweep once. Resolves after shutdown; never leaves an instrument energized. */
  async run(): Promise<EngineResult> {
    if (this.started) throw new Error("SweepEngine.run() can only be called once");
    this.started = true;

    const voltages = expandRange(this.plan.voltage, "voltage range");
    const currents = expandRange(this.plan.current, "current range");

    let progress: Progress;
    try {
      this.deps.monitor.start();
      progress = await this.execute(voltages, currents);
    } catch (err) {
      this.log.error("unexpected error during sweep", err, this.position());
      progress = this.failure(err);
    }
    return this.shutdown(progress);
  }

  private async execute(voltages: number[], currents: number[]): Promise<Progress> {
    const { source, load, monitor, sink } = this.deps;
    this.log.info("run starting", {
      voltages: voltages.length,
      currents: currents.length,
      steps: voltages.length * currents.length,
    });

    try {
      await source.bringUp();
    } catch (err) {
      this.log.error("source bring-up failed", err, { instrument: "source" });
      return this.failure(err);
    }
    this.advance("ok");

    try {
      await load.bringUp();
    } catch (err) {
      this.log.error("load bring-up failed", err, { instrument: "load" });
      return this.failure(err);
    }
    this.advance("ok");
    // load_up → sweeping
    this.advance("ok");

    for (let vi = 0; vi < voltages.length; vi++) {
      const voltage = voltages[vi];
      this.voltageIndex = vi;
      this.currentIndex = -1;

      let measured: number;
      try {
        measured = await source.setVoltage(voltage);
      } catch (err) {
        this.log.error("voltage step failed", err, { ...this.position(), instrument: "source", commanded: voltage });
        return this.failure(err);
      }
      this.log.info("voltage set", { ...this.position(), commanded: voltage, measured });

      if (monitor.abortRequested()) return this.aborted();

      for (let ci = 0; ci < currents.length; ci++) {
        this.currentIndex = ci;
        const { record, error } = await this.step(vi, ci, voltage, currents[ci]);
        this.records.push(record);
        await sink.append(record);

        if (error !== undefined) return this.failure(error);
        if (monitor.abortRequested()) return this.aborted();
      }
    }

    this.log.info("sweep completed", { steps: this.records.length });
    return { event: "ok", kind: "completed" };
  }

  /** One inner-loop step: set current, settle, read both instruments. */
  private async step(vi: number, ci: number, voltage: number, current: number): Promise<{ record: StepRecord; error?: unknown }> {
    const { source, load } = this.deps;
    let loadReading: LoadReading = { voltage: Number.NaN, current: Number.NaN, power: Number.NaN };
    let sourceReading: SourceReading = { voltage: Number.NaN, current: Number.NaN };

    try {
      await load.setCurrent(current);
      await this.sleep(this.plan.settleMs);
      loadReading = await load.measure();
      sourceReading = await source.measure();
    } catch (err) {
      this.log.error("step faulted", err, { ...this.position(), commanded_voltage: voltage, commanded_current: current });
      return { record: this.makeRecord(vi, ci, voltage, current, sourceReading, loadReading, "faulted", errorMessage(err)), error: err };
    }

    const readings = [loadReading.voltage, loadReading.current, loadReading.power, sourceReading.voltage, sourceReading.current];
    const status: StepStatus = readings.every(Number.isFinite) ? "ok" : "skipped";
    const record = this.makeRecord(vi, ci, voltage, current, sourceReading, loadReading, status);

    const meta = {
      ...this.position(),
      commanded_voltage: voltage,
      commanded_current: current,
      load_voltage: loadReading.voltage,
      load_current: loadReading.current,
      load_power: loadReading.power,
    };
    if (status === "skipped") {
      this.log.warn("step readback not numeric; recorded as skipped", meta);
    } else if (!record.sinking) {
      this.log.warn("load is not sinking: peak-current trigger did not take", meta);
    } else {
      this.log.info("step", meta);
    }
    return { record };
  }

  private makeRecord(
    vi: number,
    ci: number,
    voltage: number,
    current: number,
    src: SourceReading,
    ld: LoadReading,
    status: StepStatus,
    error?: string,
  ): StepRecord {
    const tolerance = this.plan.confirm.currentTolerance;
    const sinking = current <= tolerance || (Number.isFinite(ld.current) && ld.current > tolerance);
    const record: StepRecord = {
      voltage_index: vi,
      current_index: ci,
      commanded_voltage: voltage,
      commanded_current: current,
      source_voltage: src.voltage,
      source_current: src.current,
      load_voltage: ld.voltage,
      load_current: ld.current,
      load_power: ld.power,
      sinking: status === "faulted" ? false : sinking,
      timestamp: nowIso(),
      status,
      ...(error === undefined ? {} : { error }),
    };
    return Object.freeze(record);
  }

  private async shutdown(progress: Progress): Promise<EngineResult> {
    const { source, load, monitor, sink } = this.deps;
    this.advance(progress.event);
    this.log.info("shutting down", { outcome: progress.kind, ...this.position() });

    // Load first: it must stop sinking before the source ramps down.
    await this.guard("load bring-down", () => load.bringDown());
    await this.guard("source bring-down", () => source.bringDown());
    await this.guard("abort monitor stop", async () => monitor.stop());

    for (const [name, unit] of [["load", load], ["source", source]] as const) {
      if (unit.mode === "energized") {
        this.log.error(`${name} is still energized after bring-down`, undefined, { instrument: name });
      }
    }

    const outcome: RunOutcome = Object.freeze({
      kind: progress.kind,
      voltage_index: this.voltageIndex,
      current_index: this.currentIndex,
      records: this.records.length,
      ...(progress.error ? { error: progress.error } : {}),
    });
    await this.guard("result sink finalize", () => sink.finalize(outcome));

    this.advance("ok");
    this.log.info("run finished", { outcome: outcome.kind, records: outcome.records });
    return {
      state: this.state_,
      outcome,
      records: [...this.records],
      transitions: [...this.history],
    };
  }

  private advance(event: EngineEvent): void {
    const next = nextState(this.state_, event);
    this.log.debug("state", { from: this.state_, to: next, event });
    this.state_ = next;
    this.history.push(next);
  }

  private async guard(action: string, fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (err) {
      this.log.error(`${action} failed`, err, { operation: "shutdown" });
    }
  }

  private aborted(): Progress {
    this.log.warn("abort requested; stopping sweep", { ...this.position(), reason: this.deps.monitor.reason });
    return { event: "abort", kind: "aborted" };
  }

  private failure(err: unknown): Progress {
    return { event: "fault", kind: "failed", error: describeError(err) };
  }

  private position(): { voltageIndex: number; currentIndex: number } {
    return { voltageIndex: this.voltageIndex, currentIndex: this.currentIndex };
  }
}

function describeError(err: unknown): OutcomeError {
  if (isBenchError(err)) {
    return { name: err.name, code: err.code, message: err.message, context: { ...err.context } };
  }
  if (err instanceof Error) {
    return { name: err.name, code: "UNEXPECTED", message: err.message };
  }
  return { name: "Error", code: "UNEXPECTED", message: String(err) };
}
