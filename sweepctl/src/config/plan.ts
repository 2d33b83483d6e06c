import { ConfigurationError } from "../utils/errors.js";
import { expandRange, rangeProblems } from "../core/ranges.js";
import type { BenchConfig, RangeConfig } from "../types/config.js";
import type { RangeSpec, SweepPlan } from "../types/plan.js";

export const DEFAULT_CONFIRM = {
  attempts: 3,
  voltageTolerance: 0.5,
  currentTolerance: 0.1,
  factorTolerance: 0.01,
} as const;

export const DEFAULT_TIMING = {
  outputOnSettleMs: 2000,
  voltageSettleMs: 1500,
  currentSettleMs: 1000,
  loadResetSettleMs: 2000,
  rampDownMs: 1000,
} as const;

export const DEFAULT_PEAK = {
  ratio: 1.5,
  minimum: 0.1,
} as const;

function toRange(range: RangeConfig, unit: string): RangeSpec {
  return { start: range.start, stop: range.stop, step: range.step, unit: range.unit ?? unit };
}

function deepFreeze<T extends object>(value: T): T {
  for (const inner of Object.values(value)) {
    if (inner !== null && typeof inner === "object") deepFreeze(inner);
  }
  return Object.freeze(value);
}

/**
 * Turn a schema-valid config into an immutable SweepPlan.
 * Throws ConfigurationError listing every semantic problem found.
 */
export function buildSweepPlan(config: BenchConfig): SweepPlan {
  const voltage = toRange(config.sweep.voltage, "V");
  const current = toRange(config.sweep.current, "A");
  const limits = config.limits;

  const problems = [...rangeProblems(voltage, "sweep.voltage"), ...rangeProblems(current, "sweep.current")];

  if (problems.length === 0) {
    const volts = expandRange(voltage, "sweep.voltage");
    const amps = expandRange(current, "sweep.current");
    const vMax = Math.max(...volts.map(Math.abs));
    if (vMax > limits.max_voltage) {
      problems.push(`sweep.voltage: ${vMax} ${voltage.unit} exceeds limits.max_voltage ${limits.max_voltage}`);
    }
    const iMin = Math.min(...amps);
    const iMax = Math.max(...amps);
    if (iMin < 0) {
      problems.push(`sweep.current: ${iMin} ${current.unit} is negative`);
    }
    if (iMax > limits.max_current) {
      problems.push(`sweep.current: ${iMax} ${current.unit} exceeds limits.max_current ${limits.max_current}`);
    }
    if (iMax > config.source.current_limit_a) {
      problems.push(`sweep.current: ${iMax} ${current.unit} exceeds source.current_limit_a ${config.source.current_limit_a}`);
    }
  }

  if (problems.length > 0) {
    throw new ConfigurationError("Invalid sweep plan", problems);
  }

  return deepFreeze({
    voltage,
    current,
    settleMs: config.sweep.settle_ms,
    limits: {
      maxVoltage: limits.max_voltage,
      maxCurrent: limits.max_current,
      crestFactor: limits.crest_factor,
      powerFactor: limits.power_factor,
    },
    confirm: {
      attempts: config.confirm?.attempts ?? DEFAULT_CONFIRM.attempts,
      voltageTolerance: config.confirm?.voltage_tolerance ?? DEFAULT_CONFIRM.voltageTolerance,
      currentTolerance: config.confirm?.current_tolerance ?? DEFAULT_CONFIRM.currentTolerance,
      factorTolerance: config.confirm?.factor_tolerance ?? DEFAULT_CONFIRM.factorTolerance,
    },
    timing: {
      outputOnSettleMs: config.timing?.output_on_settle_ms ?? DEFAULT_TIMING.outputOnSettleMs,
      voltageSettleMs: config.timing?.voltage_settle_ms ?? DEFAULT_TIMING.voltageSettleMs,
      currentSettleMs: config.timing?.current_settle_ms ?? DEFAULT_TIMING.currentSettleMs,
      loadResetSettleMs: config.timing?.load_reset_settle_ms ?? DEFAULT_TIMING.loadResetSettleMs,
      rampDownMs: config.timing?.ramp_down_ms ?? DEFAULT_TIMING.rampDownMs,
    },
    peak: {
      ratio: config.peak?.ratio ?? DEFAULT_PEAK.ratio,
      minimum: config.peak?.minimum ?? DEFAULT_PEAK.minimum,
    },
  });
}

/** Load-side peak-current limit for an RMS setpoint. */
export function peakLimitFor(plan: SweepPlan, current: number): number {
  return current > 0 ? Math.round(current * plan.peak.ratio * 1e6) / 1e6 : plan.peak.minimum;
}
