import path from "node:path";
import crypto from "node:crypto";
import { configErrors, validateBench, type Diagnostic } from "./validate.js";
import { EXIT, exitCodeFor, type ExitCode } from "./exit-codes.js";
import { createBench, type BenchControllers } from "../instruments/factory.js";
import { SweepEngine } from "../core/sweep-engine.js";
import { KeypressAbortMonitor, type AbortMonitor } from "../monitor/abort-monitor.js";
import { CompositeResultSink, type ResultSink } from "../sinks/result-sink.js";
import { RunDirectorySink } from "../sinks/run-directory-sink.js";
import { TableResultSink } from "../sinks/table-sink.js";
import { createLogger, type LogFormat, type Logger } from "../utils/logger.js";
import { ConfigurationError } from "../utils/errors.js";
import type { Sleep } from "../utils/time.js";
import type { RunOutcome } from "../types/run.js";

export type RunResult =
  | { ok: true; exitCode: ExitCode; runId: string; runDir: string; outcome: RunOutcome }
  | { ok: false; exitCode: ExitCode; errors: Diagnostic[] };

export type RunOptions = {
  configDir?: string;
  profile?: string;
  /** Runs root; defaults to the config's output.dir, then `runs` under cwd. */
  output?: string;
  format?: LogFormat;
  simulate?: boolean;
  runId?: string;
  env?: NodeJS.ProcessEnv;
  /** Progress table destination in human format. */
  stdout?: NodeJS.WritableStream;
  logger?: Logger;
  monitor?: AbortMonitor;
  sleep?: Sleep;
};

function randId(bytes = 8): string {
  return crypto.randomBytes(bytes).toString("hex");
}

export function makeRunId(): string {
  const ts = new Date().toISOString().replace(/[:.]/g, "-");
  return `${ts}-${randId(6)}`;
}

export function defaultRunsRoot(cwd: string): string {
  return path.join(cwd, "runs");
}

export async function run(opts: RunOptions = {}): Promise<RunResult> {
  const loaded = validateBench({ configDir: opts.configDir, profile: opts.profile, env: opts.env });
  if (!loaded.ok) return { ok: false, exitCode: EXIT.INVALID_CONFIG, errors: loaded.errors };

  const { config, plan, steps } = loaded;
  const format = opts.format ?? config.output?.format ?? "human";
  const cwd = process.cwd();
  const runsRoot = path.resolve(cwd, opts.output ?? config.output?.dir ?? defaultRunsRoot(cwd));
  const runId = opts.runId ?? makeRunId();

  const logger = opts.logger ?? createLogger({ level: config.log_level, format }, { run_id: runId });
  const stdout = opts.stdout ?? process.stdout;
  let bench: BenchControllers;
  try {
    bench = createBench(config, plan, { logger, sleep: opts.sleep }, opts.simulate ?? false);
  } catch (e) {
    if (e instanceof ConfigurationError) {
      return { ok: false, exitCode: EXIT.INVALID_CONFIG, errors: configErrors(e, "CONFIG_INVALID") };
    }
    throw e;
  }

  const runDir = new RunDirectorySink(runsRoot, runId);
  runDir.init();
  const sinks: ResultSink[] = [runDir];
  if (format === "human") sinks.push(new TableResultSink(stdout));

  const monitor = opts.monitor ?? new KeypressAbortMonitor({ key: config.abort_key, logger });
  logger.info("sweep planned", {
    steps,
    simulate: bench.simulation !== null,
    runs_dir: runDir.runDir,
    abort_key: config.abort_key ?? "q",
  });

  const engine = new SweepEngine(plan, {
    source: bench.source,
    load: bench.load,
    monitor,
    sink: new CompositeResultSink(sinks),
    logger,
    sleep: opts.sleep,
  });
  const result = await engine.run();

  return {
    ok: true,
    exitCode: exitCodeFor(result.outcome.kind),
    runId,
    runDir: runDir.runDir,
    outcome: result.outcome,
  };
}
