/** Run records: what a sweep produces. */

export type SessionMode = "uninitialized" | "configured" | "energized" | "disabled" | "faulted";

export type StepStatus = "ok" | "skipped" | "faulted";

export type StepRecord = Readonly<{
  voltage_index: number;
  current_index: number;
  commanded_voltage: number;
  commanded_current: number;
  source_voltage: number;
  source_current: number;
  load_voltage: number;
  load_current: number;
  load_power: number;
  /** False when current was commanded but the load reports none flowing. */
  sinking: boolean;
  timestamp: string;
  status: StepStatus;
  error?: string;
}>;

export type OutcomeKind = "completed" | "aborted" | "failed";

export type OutcomeError = {
  name: string;
  code: string;
  message: string;
  context?: Record<string, unknown>;
};

export type RunOutcome = Readonly<{
  kind: OutcomeKind;
  /** Last voltage index reached (-1 when the sweep never started). */
  voltage_index: number;
  /** Last current index reached (-1 when no step at that voltage ran). */
  current_index: number;
  records: number;
  error?: OutcomeError;
}>;
