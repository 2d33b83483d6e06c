import { describe, expect, it, vi } from "vitest";
import { SweepEngine, type LoadUnit, type SourceUnit } from "../src/core/sweep-engine.js";
import { createSimulatedBench, type SimulatedBench } from "../src/simulation/bench.js";
import { SourceController } from "../src/instruments/source-controller.js";
import { LoadController, type LoadReading } from "../src/instruments/load-controller.js";
import { AbortFlag } from "../src/monitor/abort-monitor.js";
import { MemoryResultSink } from "../src/sinks/result-sink.js";
import { noSleep, testPlan } from "./helpers.js";
import type { SourceReading } from "../src/instruments/source-controller.js";
import type { SweepPlan } from "../src/types/plan.js";
import type { SessionMode, StepRecord } from "../src/types/run.js";

const CLEAN_PATH = ["idle", "source_up", "load_up", "sweeping", "shutting_down", "done"];
const SHUTDOWN_TAIL = ["LOAD OFF", "CURR 0", "*RST", "VOLTage 0", "OUTPut OFF"];

function simulatedRun(configure?: (bench: SimulatedBench) => void, plan: SweepPlan = testPlan()) {
  const bench = createSimulatedBench();
  configure?.(bench);
  const source = new SourceController(bench.sourceTransport, plan, { channel: 3, frequencyHz: 60, currentLimit: 20, powerLimit: 2500 }, { sleep: noSleep });
  const load = new LoadController(bench.loadTransport, plan, { sleep: noSleep });
  const monitor = new AbortFlag();
  const sink = new MemoryResultSink();
  const engine = new SweepEngine(plan, { source, load, monitor, sink, sleep: noSleep });
  return { bench, source, load, monitor, sink, engine };
}

function tail(bench: SimulatedBench, n: number): string[] {
  return bench.log.slice(-n).map((e) => e.command);
}

/** Requests an abort once `after` records have been appended. */
class AbortingSink extends MemoryResultSink {
  constructor(
    private readonly flag: AbortFlag,
    private readonly after: number,
  ) {
    super();
  }

  override async append(record: StepRecord): Promise<void> {
    await super.append(record);
    if (this.records.length === this.after) this.flag.requestAbort("test");
  }
}

class FakeSource implements SourceUnit {
  mode: SessionMode = "uninitialized";
  bringUp = vi.fn(async () => {
    this.mode = "energized";
  });
  setVoltage = vi.fn(async (voltage: number) => voltage);
  measure = vi.fn(async (): Promise<SourceReading> => ({ voltage: 100, current: 1 }));
  bringDown = vi.fn(async () => {
    this.mode = "disabled";
  });
}

class FakeLoad implements LoadUnit {
  mode: SessionMode = "uninitialized";
  bringUp = vi.fn(async () => {
    this.mode = "energized";
  });
  setCurrent = vi.fn(async (current: number) => current);
  measure = vi.fn(async (): Promise<LoadReading> => ({ voltage: 100, current: 1, power: 100 }));
  bringDown = vi.fn(async () => {
    this.mode = "disabled";
  });
}

describe("SweepEngine on the simulated bench", () => {
  it("runs the full grid, records every step and shuts down load first", async () => {
    const { bench, source, load, sink, engine } = simulatedRun();
    const result = await engine.run();

    expect(result.state).toBe("done");
    expect(result.transitions).toEqual(CLEAN_PATH);
    expect(result.outcome).toEqual({ kind: "completed", voltage_index: 2, current_index: 2, records: 9 });
    expect(result.records).toHaveLength(9);
    expect(result.records.map((r) => [r.commanded_voltage, r.commanded_current])).toEqual([
      [100, 1], [100, 1.5], [100, 2],
      [110, 1], [110, 1.5], [110, 2],
      [120, 1], [120, 1.5], [120, 2],
    ]);
    expect(result.records.every((r) => r.status === "ok" && r.sinking)).toBe(true);
    expect(result.records[0]).toMatchObject({
      voltage_index: 0,
      current_index: 0,
      source_voltage: 100,
      source_current: 1,
      load_voltage: 100,
      load_current: 1,
      load_power: 100,
    });
    expect(Object.isFrozen(result.records[0])).toBe(true);

    expect(sink.records).toEqual(result.records);
    expect(sink.outcome).toEqual(result.outcome);
    expect(tail(bench, 5)).toEqual(SHUTDOWN_TAIL);
    expect(source.mode).toBe("disabled");
    expect(load.mode).toBe("disabled");
  });

  it("enables the load input only after mode and factors are set", async () => {
    const { bench, engine } = simulatedRun();
    await engine.run();

    const index = (cmd: string) => bench.log.findIndex((e) => e.instrument === "load" && e.command === cmd);
    const loadOn = index("LOAD ON");
    expect(loadOn).toBeGreaterThan(index("MODE ACF"));
    expect(loadOn).toBeGreaterThan(index("CFACTor 1.414"));
    expect(loadOn).toBeGreaterThan(index("PFACtor 1"));
  });

  it("walks descending ranges from start to stop", async () => {
    const plan = testPlan({
      sweep: {
        voltage: { start: 120, stop: 100, step: -10 },
        current: { start: 2, stop: 1, step: -0.5 },
        settle_ms: 0,
      },
    });
    const { bench, sink, engine } = simulatedRun(undefined, plan);
    const result = await engine.run();

    expect(result.transitions).toEqual(CLEAN_PATH);
    expect(result.outcome).toEqual({ kind: "completed", voltage_index: 2, current_index: 2, records: 9 });
    expect(result.records.map((r) => [r.commanded_voltage, r.commanded_current])).toEqual([
      [120, 2], [120, 1.5], [120, 1],
      [110, 2], [110, 1.5], [110, 1],
      [100, 2], [100, 1.5], [100, 1],
    ]);
    expect(result.records.map((r) => [r.voltage_index, r.current_index])).toEqual([
      [0, 0], [0, 1], [0, 2],
      [1, 0], [1, 1], [1, 2],
      [2, 0], [2, 1], [2, 2],
    ]);
    expect(result.records.every((r) => r.status === "ok" && r.sinking)).toBe(true);
    expect(sink.records).toHaveLength(9);
    expect(tail(bench, SHUTDOWN_TAIL.length)).toEqual(SHUTDOWN_TAIL);
  });

  it("runs a single-point plan", async () => {
    const plan = testPlan({
      sweep: {
        voltage: { start: 110, stop: 110, step: 10 },
        current: { start: 1.5, stop: 1.5, step: 0.5 },
        settle_ms: 0,
      },
    });
    const { bench, engine } = simulatedRun(undefined, plan);
    const result = await engine.run();

    expect(result.transitions).toEqual(CLEAN_PATH);
    expect(result.outcome).toEqual({ kind: "completed", voltage_index: 0, current_index: 0, records: 1 });
    expect(result.records).toHaveLength(1);
    expect(result.records[0]).toMatchObject({ commanded_voltage: 110, commanded_current: 1.5, status: "ok" });
    expect(tail(bench, SHUTDOWN_TAIL.length)).toEqual(SHUTDOWN_TAIL);
  });

  it("never selects constant-current mode", async () => {
    const { bench, engine } = simulatedRun();
    await engine.run();
    expect(bench.log.some((e) => e.command.toUpperCase().startsWith("MODE CC"))).toBe(false);
  });

  it("stops after the step during which abort was requested", async () => {
    const plan = testPlan();
    const { bench, source, load } = simulatedRun();
    const monitor = new AbortFlag();
    const sink = new AbortingSink(monitor, 4);
    const engine = new SweepEngine(plan, { source, load, monitor, sink, sleep: noSleep });

    const result = await engine.run();
    expect(result.outcome).toEqual({ kind: "aborted", voltage_index: 1, current_index: 0, records: 4 });
    expect(sink.records).toHaveLength(4);
    expect(result.transitions).toEqual(CLEAN_PATH);
    expect(tail(bench, 5)).toEqual(SHUTDOWN_TAIL);
  });

  it("checks for abort right after a voltage change", async () => {
    const { bench, monitor, engine } = simulatedRun();
    monitor.requestAbort();

    const result = await engine.run();
    expect(result.outcome).toEqual({ kind: "aborted", voltage_index: 0, current_index: -1, records: 0 });
    expect(bench.log.some((e) => e.command.startsWith("CURR 1"))).toBe(false);
  });

  it("records non-sinking steps when the peak-current command never arrives", async () => {
    const { engine } = simulatedRun((bench) => {
      bench.loadTransport.faults = { drop: (cmd) => cmd.startsWith("CURRent:PEAK") };
    });

    const result = await engine.run();
    expect(result.outcome.kind).toBe("completed");
    expect(result.records).toHaveLength(9);
    expect(result.records.every((r) => r.status === "ok" && !r.sinking && r.load_current === 0)).toBe(true);
  });

  it("shuts down and fails when source bring-up faults", async () => {
    const { bench, source, load, sink, engine } = simulatedRun((b) => {
      b.sourceTransport.faults = { failOn: (cmd) => (cmd === "OUTPut ON" ? new Error("link down") : undefined) };
    });

    const result = await engine.run();
    expect(result.transitions).toEqual(["idle", "shutting_down", "done"]);
    expect(result.outcome).toMatchObject({ kind: "failed", voltage_index: -1, current_index: -1, records: 0 });
    expect(result.outcome.error).toMatchObject({ code: "INSTRUMENT_FAULT", message: "[source] link down" });
    expect(sink.outcome).toEqual(result.outcome);
    expect(bench.log.filter((e) => e.instrument === "load")).toEqual([]);
    expect(tail(bench, 2)).toEqual(["VOLTage 0", "OUTPut OFF"]);
    expect(source.mode).toBe("disabled");
    expect(load.mode).toBe("disabled");
  });

  it("brings the source down when load bring-up faults", async () => {
    const { bench, source, load, engine } = simulatedRun((b) => {
      b.loadTransport.faults = { failOn: (cmd) => (cmd === "LOAD ON" ? new Error("bus error") : undefined) };
    });

    const result = await engine.run();
    expect(result.transitions).toEqual(["idle", "source_up", "shutting_down", "done"]);
    expect(result.outcome.error).toMatchObject({ code: "INSTRUMENT_FAULT", message: "[load] bus error" });
    expect(tail(bench, 5)).toEqual(SHUTDOWN_TAIL);
    expect(source.mode).not.toBe("energized");
    expect(load.mode).not.toBe("energized");
  });

  it("records a faulted step and stops when a measurement fails", async () => {
    const { bench, sink, engine } = simulatedRun((b) => {
      b.loadTransport.faults = { failOn: (cmd) => (cmd === "MEASure:POWer?" ? new Error("boom") : undefined) };
    });

    const result = await engine.run();
    expect(result.outcome).toMatchObject({ kind: "failed", voltage_index: 0, current_index: 0, records: 1 });
    expect(sink.records).toHaveLength(1);
    const [record] = sink.records;
    expect(record).toMatchObject({ status: "faulted", sinking: false, error: "[load] boom", commanded_voltage: 100, commanded_current: 1 });
    expect(record.load_voltage).toBeNaN();
    expect(tail(bench, 5)).toEqual(SHUTDOWN_TAIL);
  });
});

describe("SweepEngine shutdown guarantees", () => {
  const plan = testPlan();

  it("runs source bring-down exactly once even when load bring-down throws", async () => {
    const source = new FakeSource();
    const load = new FakeLoad();
    load.bringDown.mockRejectedValue(new Error("gpib gone"));
    const sink = new MemoryResultSink();

    const result = await new SweepEngine(plan, { source, load, monitor: new AbortFlag(), sink, sleep: noSleep }).run();

    expect(load.bringDown).toHaveBeenCalledTimes(1);
    expect(source.bringDown).toHaveBeenCalledTimes(1);
    expect(result.outcome.kind).toBe("completed");
    expect(sink.outcome).toEqual(result.outcome);
  });

  it("brings the load down before the source", async () => {
    const order: string[] = [];
    const source = new FakeSource();
    const load = new FakeLoad();
    source.bringDown.mockImplementation(async () => {
      order.push("source");
    });
    load.bringDown.mockImplementation(async () => {
      order.push("load");
    });

    await new SweepEngine(plan, { source, load, monitor: new AbortFlag(), sink: new MemoryResultSink(), sleep: noSleep }).run();
    expect(order).toEqual(["load", "source"]);
  });

  it("stops the abort monitor and still returns when the sink fails to finalize", async () => {
    const monitor = new AbortFlag();
    const stop = vi.spyOn(monitor, "stop");
    const sink = new MemoryResultSink();
    vi.spyOn(sink, "finalize").mockRejectedValue(new Error("disk full"));

    const result = await new SweepEngine(plan, { source: new FakeSource(), load: new FakeLoad(), monitor, sink, sleep: noSleep }).run();
    expect(stop).toHaveBeenCalledTimes(1);
    expect(result.state).toBe("done");
    expect(result.outcome.kind).toBe("completed");
  });

  it("marks steps with non-numeric readings as skipped and carries on", async () => {
    const load = new FakeLoad();
    load.measure.mockResolvedValue({ voltage: 100, current: Number.NaN, power: 100 });

    const result = await new SweepEngine(plan, { source: new FakeSource(), load, monitor: new AbortFlag(), sink: new MemoryResultSink(), sleep: noSleep }).run();
    expect(result.outcome.kind).toBe("completed");
    expect(result.records).toHaveLength(9);
    expect(result.records.every((r) => r.status === "skipped" && !r.sinking)).toBe(true);
  });

  it("shuts down after an unexpected error outside any instrument", async () => {
    const source = new FakeSource();
    const load = new FakeLoad();
    const monitor = new AbortFlag();
    vi.spyOn(monitor, "start").mockImplementation(() => {
      throw new Error("no terminal");
    });

    const result = await new SweepEngine(plan, { source, load, monitor, sink: new MemoryResultSink(), sleep: noSleep }).run();
    expect(source.bringUp).not.toHaveBeenCalled();
    expect(load.bringDown).toHaveBeenCalledTimes(1);
    expect(source.bringDown).toHaveBeenCalledTimes(1);
    expect(result.outcome).toMatchObject({ kind: "failed", error: { code: "UNEXPECTED", message: "no terminal" } });
  });

  it("can only run once", async () => {
    const engine = new SweepEngine(plan, { source: new FakeSource(), load: new FakeLoad(), monitor: new AbortFlag(), sink: new MemoryResultSink(), sleep: noSleep });
    await engine.run();
    await expect(engine.run()).rejects.toThrow("can only be called once");
  });
});
