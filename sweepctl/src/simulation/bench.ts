import { createLoadSimulator, type LoadSimulator } from "./load-simulator.js";
import { createSourceSimulator, type SourceSimulator } from "./source-simulator.js";
import { SimulatedTransport, type SimulatedTransportOptions } from "./simulated-transport.js";
import type { BenchLogEntry } from "./types.js";

export type SimulatedBench = {
  source: SourceSimulator;
  load: LoadSimulator;
  sourceTransport: SimulatedTransport;
  loadTransport: SimulatedTransport;
  log: BenchLogEntry[];
};

export type SimulatedBenchOptions = {
  maxRmsVoltage?: number;
  source?: SimulatedTransportOptions;
  load?: SimulatedTransportOptions;
};

/**
 * Source and load wired back to back: the load sees the source's output
 * voltage and the source reports the current the load draws.
 */
export function createSimulatedBench(opts: SimulatedBenchOptions = {}): SimulatedBench {
  const log: BenchLogEntry[] = [];
  let loadRef: LoadSimulator | null = null;

  const source = createSourceSimulator({
    maxRmsVoltage: opts.maxRmsVoltage,
    drawnCurrent: () => loadRef?.drawnCurrent() ?? 0,
  });
  const load = createLoadSimulator({ sourceVoltage: () => source.outputVoltage() });
  loadRef = load;

  return {
    source,
    load,
    log,
    sourceTransport: new SimulatedTransport("source", source, log, opts.source),
    loadTransport: new SimulatedTransport("load", load, log, opts.load),
  };
}
