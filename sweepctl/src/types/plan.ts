/** The immutable description of one run, built from a validated BenchConfig. */

export type RangeSpec = {
  start: number;
  stop: number;
  step: number;
  unit: string;
};

export type SafetyLimits = {
  maxVoltage: number;
  /** RMS current ceiling for the load, and the bound for every commanded current. */
  maxCurrent: number;
  crestFactor: number;
  powerFactor: number;
};

/** Read-back confirmation: bounded retries within a single command, never across steps. */
export type ConfirmPolicy = {
  attempts: number;
  voltageTolerance: number;
  currentTolerance: number;
  factorTolerance: number;
};

export type TimingPlan = {
  outputOnSettleMs: number;
  voltageSettleMs: number;
  currentSettleMs: number;
  loadResetSettleMs: number;
  rampDownMs: number;
};

/** Peak-current limit sent after every RMS setpoint: current × ratio, or `minimum` at 0 A. */
export type PeakPolicy = {
  ratio: number;
  minimum: number;
};

export type SweepPlan = Readonly<{
  voltage: Readonly<RangeSpec>;
  current: Readonly<RangeSpec>;
  settleMs: number;
  limits: Readonly<SafetyLimits>;
  confirm: Readonly<ConfirmPolicy>;
  timing: Readonly<TimingPlan>;
  peak: Readonly<PeakPolicy>;
}>;
