/** Layered YAML config for the bench. */
import type { LogFormat, LogLevel } from "../utils/logger.js";

export type SourceConfig = {
  transport: "socket" | "simulated";
  host: string;
  port: number;
  /** Output channel selected with INSTrument:NSELect. */
  channel?: number;
  timeout_ms: number;
  frequency_hz: number;
  current_limit_a: number;
  power_limit_w: number;
};

export type LoadConfig = {
  transport: "gpib" | "simulated";
  /** VISA-style bus resource, e.g. GPIB0::8::INSTR. */
  resource: string;
  gateway_host: string;
  gateway_port: number;
  timeout_ms: number;
};

export type RangeConfig = {
  start: number;
  stop: number;
  step: number;
  unit?: string;
};

export type BenchConfig = {
  schema_version: string;
  source: SourceConfig;
  load: LoadConfig;
  sweep: {
    voltage: RangeConfig;
    current: RangeConfig;
    settle_ms: number;
  };
  limits: {
    max_voltage: number;
    max_current: number;
    crest_factor: number;
    power_factor: number;
  };
  confirm?: {
    attempts?: number;
    voltage_tolerance?: number;
    current_tolerance?: number;
    factor_tolerance?: number;
  };
  timing?: {
    output_on_settle_ms?: number;
    voltage_settle_ms?: number;
    current_settle_ms?: number;
    load_reset_settle_ms?: number;
    ramp_down_ms?: number;
  };
  peak?: {
    ratio?: number;
    minimum?: number;
  };
  abort_key?: string;
  log_level?: LogLevel;
  output?: {
    dir?: string;
    format?: LogFormat;
  };
};
