import { GpibGatewayTransport } from "../transport/gpib-gateway-transport.js";
import { SocketTransport } from "../transport/socket-transport.js";
import { createSimulatedBench, type SimulatedBench } from "../simulation/bench.js";
import { LoadController } from "./load-controller.js";
import { SourceController, type SourceSettings } from "./source-controller.js";
import type { ControllerDeps } from "./controller.js";
import type { InstrumentTransport } from "../transport/transport.js";
import type { BenchConfig } from "../types/config.js";
import type { SweepPlan } from "../types/plan.js";

export type BenchControllers = {
  source: SourceController;
  load: LoadController;
  /** Present when the run talks to simulators instead of hardware. */
  simulation: SimulatedBench | null;
};

export function sourceSettings(config: BenchConfig): SourceSettings {
  return {
    channel: config.source.channel,
    frequencyHz: config.source.frequency_hz,
    currentLimit: config.source.current_limit_a,
    powerLimit: config.source.power_limit_w,
  };
}

/**
 * Build transports and controllers for a config. `simulate` forces both
 * instruments onto the in-process simulators; a `simulated` transport in the
 * config does the same for that instrument.
 */
export function createBench(config: BenchConfig, plan: SweepPlan, deps: ControllerDeps, simulate = false): BenchControllers {
  const needsSim = simulate || config.source.transport === "simulated" || config.load.transport === "simulated";
  const simulation = needsSim ? createSimulatedBench({
    source: { timeoutMs: config.source.timeout_ms },
    load: { timeoutMs: config.load.timeout_ms },
  }) : null;

  let sourceTransport: InstrumentTransport;
  if (simulation && (simulate || config.source.transport === "simulated")) {
    sourceTransport = simulation.sourceTransport;
  } else {
    sourceTransport = new SocketTransport({ host: config.source.host, port: config.source.port, timeoutMs: config.source.timeout_ms });
  }

  let loadTransport: InstrumentTransport;
  if (simulation && (simulate || config.load.transport === "simulated")) {
    loadTransport = simulation.loadTransport;
  } else {
    loadTransport = new GpibGatewayTransport({
      resource: config.load.resource,
      host: config.load.gateway_host,
      port: config.load.gateway_port,
      timeoutMs: config.load.timeout_ms,
    });
  }

  return {
    source: new SourceController(sourceTransport, plan, sourceSettings(config), deps),
    load: new LoadController(loadTransport, plan, deps),
    simulation,
  };
}
