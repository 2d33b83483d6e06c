import { loadConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { buildSweepPlan } from "../config/plan.js";
import { expandRange } from "../core/ranges.js";
import { parseGpibResource } from "../transport/gpib-gateway-transport.js";
import { ConfigurationError, errorMessage } from "../utils/errors.js";
import type { BenchConfig } from "../types/config.js";
import type { SweepPlan } from "../types/plan.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  details?: Record<string, unknown>;
};

export type LoadedBench = {
  config: BenchConfig;
  plan: SweepPlan;
  steps: number;
};

export type ValidateResult = ({ ok: true } & LoadedBench) | { ok: false; errors: Diagnostic[] };

export function diag(level: Diagnostic["level"], code: string, message: string, details?: Record<string, unknown>): Diagnostic {
  return details ? { level, code, message, details } : { level, code, message };
}

/**
 * Load, validate and plan: everything that can be checked before an
 * instrument is contacted.
 */
export function validateBench(opts: { configDir?: string; profile?: string; env?: NodeJS.ProcessEnv }): ValidateResult {
  let raw: Record<string, unknown>;
  try {
    raw = loadConfig(opts.profile, opts.configDir, opts.env);
  } catch (e) {
    const details = e instanceof ConfigurationError ? e.details : [];
    return {
      ok: false,
      errors: [diag("error", "CONFIG_LOAD_FAILED", errorMessage(e)), ...details.map((d) => diag("error", "CONFIG_LOAD_FAILED", d))],
    };
  }

  const checked = validateConfig(raw);
  if (!checked.valid) {
    return {
      ok: false,
      errors: checked.errors.split(", ").map((message) => diag("error", "CONFIG_SCHEMA_INVALID", message)),
    };
  }

  try {
    const plan = buildSweepPlan(checked.config);
    parseGpibResource(checked.config.load.resource);
    const steps = expandRange(plan.voltage).length * expandRange(plan.current).length;
    return { ok: true, config: checked.config, plan, steps };
  } catch (e) {
    if (e instanceof ConfigurationError) {
      return { ok: false, errors: configErrors(e, "PLAN_INVALID") };
    }
    throw e;
  }
}

/** One diagnostic per detail line, or the error's own message when it carries none. */
export function configErrors(e: ConfigurationError, code: string): Diagnostic[] {
  const lines = e.details.length > 0 ? e.details : [e.message];
  return lines.map((line) => diag("error", code, line));
}
