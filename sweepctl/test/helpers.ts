import { buildSweepPlan } from "../src/config/plan.js";
import type { BenchConfig } from "../src/types/config.js";
import type { SweepPlan } from "../src/types/plan.js";

/** A complete, valid config for the simulated bench with every wait at zero. */
export function benchConfig(overrides: Partial<BenchConfig> = {}): BenchConfig {
  return {
    schema_version: "1",
    source: {
      transport: "simulated",
      host: "127.0.0.1",
      port: 5025,
      channel: 3,
      timeout_ms: 500,
      frequency_hz: 60,
      current_limit_a: 20,
      power_limit_w: 2500,
    },
    load: {
      transport: "simulated",
      resource: "GPIB0::8::INSTR",
      gateway_host: "127.0.0.1",
      gateway_port: 1234,
      timeout_ms: 500,
    },
    sweep: {
      voltage: { start: 100, stop: 120, step: 10 },
      current: { start: 1, stop: 2, step: 0.5 },
      settle_ms: 0,
    },
    limits: { max_voltage: 150, max_current: 20, crest_factor: 1.414, power_factor: 1 },
    timing: {
      output_on_settle_ms: 0,
      voltage_settle_ms: 0,
      current_settle_ms: 0,
      load_reset_settle_ms: 0,
      ramp_down_ms: 0,
    },
    ...overrides,
  };
}

export function testPlan(overrides: Partial<BenchConfig> = {}): SweepPlan {
  return buildSweepPlan(benchConfig(overrides));
}

export const noSleep = async (): Promise<void> => {};
