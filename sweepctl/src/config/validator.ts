import { loadAjv, type AjvValidateFn } from "../schema/ajv.js";
import type { BenchConfig } from "../types/config.js";

const RANGE_SCHEMA = {
  type: "object",
  required: ["start", "stop", "step"],
  additionalProperties: false,
  properties: {
    start: { type: "number" },
    stop: { type: "number" },
    step: { type: "number" },
    unit: { type: "string", minLength: 1 },
  },
};

const DELAY = { type: "integer", minimum: 0 };

/** Structural schema for the bench config; semantic checks live in buildSweepPlan. */
const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "source", "load", "sweep", "limits"],
  additionalProperties: false,
  properties: {
    schema_version: { type: "string", minLength: 1 },
    source: {
      type: "object",
      required: ["transport", "host", "port", "timeout_ms", "frequency_hz", "current_limit_a", "power_limit_w"],
      additionalProperties: false,
      properties: {
        transport: { type: "string", enum: ["socket", "simulated"] },
        host: { type: "string", format: "hostname" },
        port: { type: "integer", minimum: 1, maximum: 65535 },
        channel: { type: "integer", minimum: 1 },
        timeout_ms: { type: "integer", minimum: 1 },
        frequency_hz: { type: "number", exclusiveMinimum: 0 },
        current_limit_a: { type: "number", exclusiveMinimum: 0 },
        power_limit_w: { type: "number", exclusiveMinimum: 0 },
      },
    },
    load: {
      type: "object",
      required: ["transport", "resource", "gateway_host", "gateway_port", "timeout_ms"],
      additionalProperties: false,
      properties: {
        transport: { type: "string", enum: ["gpib", "simulated"] },
        resource: { type: "string", pattern: "^GPIB\\d*::\\d+(::\\d+)?::INSTR$" },
        gateway_host: { type: "string", format: "hostname" },
        gateway_port: { type: "integer", minimum: 1, maximum: 65535 },
        timeout_ms: { type: "integer", minimum: 1 },
      },
    },
    sweep: {
      type: "object",
      required: ["voltage", "current", "settle_ms"],
      additionalProperties: false,
      properties: {
        voltage: RANGE_SCHEMA,
        current: RANGE_SCHEMA,
        settle_ms: DELAY,
      },
    },
    limits: {
      type: "object",
      required: ["max_voltage", "max_current", "crest_factor", "power_factor"],
      additionalProperties: false,
      properties: {
        max_voltage: { type: "number", exclusiveMinimum: 0 },
        max_current: { type: "number", exclusiveMinimum: 0 },
        crest_factor: { type: "number", exclusiveMinimum: 0 },
        power_factor: { type: "number", exclusiveMinimum: 0, maximum: 1 },
      },
    },
    confirm: {
      type: "object",
      additionalProperties: false,
      properties: {
        attempts: { type: "integer", minimum: 1, maximum: 10 },
        voltage_tolerance: { type: "number", exclusiveMinimum: 0 },
        current_tolerance: { type: "number", exclusiveMinimum: 0 },
        factor_tolerance: { type: "number", exclusiveMinimum: 0 },
      },
    },
    timing: {
      type: "object",
      additionalProperties: false,
      properties: {
        output_on_settle_ms: DELAY,
        voltage_settle_ms: DELAY,
        current_settle_ms: DELAY,
        load_reset_settle_ms: DELAY,
        ramp_down_ms: DELAY,
      },
    },
    peak: {
      type: "object",
      additionalProperties: false,
      properties: {
        ratio: { type: "number", minimum: 1 },
        minimum: { type: "number", exclusiveMinimum: 0 },
      },
    },
    abort_key: { type: "string", minLength: 1, maxLength: 1 },
    log_level: { type: "string", enum: ["error", "warn", "info", "debug"] },
    output: {
      type: "object",
      additionalProperties: false,
      properties: {
        dir: { type: "string", minLength: 1 },
        format: { type: "string", enum: ["human", "jsonl"] },
      },
    },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: BenchConfig; errors: null }
  | { valid: false; config: null; errors: string };

let compiled: AjvValidateFn<BenchConfig> | null = null;

/** Validate a loaded config against the config schema. */
export function validateConfig(raw: unknown): ConfigValidationResult {
  const ajv = loadAjv();
  const validate = compiled ?? (compiled = ajv.compile<BenchConfig>(CONFIG_SCHEMA));
  if (validate(raw)) {
    return { valid: true, config: raw, errors: null };
  }
  return { valid: false, config: null, errors: ajv.errorsText(validate.errors, { dataVar: "config" }) };
}
