import { configErrors, validateBench, type Diagnostic } from "./validate.js";
import { EXIT, type ExitCode } from "./exit-codes.js";
import { createBench, type BenchControllers } from "../instruments/factory.js";
import { ConfigurationError, errorMessage, isBenchError } from "../utils/errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import type { SafetyTable } from "../instruments/safety-table.js";

export type SafetyResult =
  | { ok: true; exitCode: ExitCode; table: SafetyTable; maxVoltage: number }
  | { ok: false; exitCode: ExitCode; errors: Diagnostic[] };

/** Read the source's protection table without energizing anything. */
export async function safety(opts: {
  configDir?: string;
  profile?: string;
  simulate?: boolean;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}): Promise<SafetyResult> {
  const loaded = validateBench({ configDir: opts.configDir, profile: opts.profile, env: opts.env });
  if (!loaded.ok) return { ok: false, exitCode: EXIT.INVALID_CONFIG, errors: loaded.errors };

  let bench: BenchControllers;
  try {
    bench = createBench(loaded.config, loaded.plan, { logger: opts.logger ?? silentLogger() }, opts.simulate ?? false);
  } catch (e) {
    if (e instanceof ConfigurationError) {
      return { ok: false, exitCode: EXIT.INVALID_CONFIG, errors: configErrors(e, "CONFIG_INVALID") };
    }
    throw e;
  }
  try {
    const table = await bench.source.inspectSafety();
    return { ok: true, exitCode: EXIT.COMPLETED, table, maxVoltage: loaded.plan.limits.maxVoltage };
  } catch (e) {
    return {
      ok: false,
      exitCode: EXIT.FAILED,
      errors: [{ level: "error", code: isBenchError(e) ? e.code : "UNEXPECTED", message: errorMessage(e) }],
    };
  }
}
