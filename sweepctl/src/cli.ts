#!/usr/bin/env node

import { Command, Option } from "commander";
import { validateBench, type Diagnostic } from "./commands/validate.js";
import { run } from "./commands/run.js";
import { safety } from "./commands/safety.js";
import { EXIT } from "./commands/exit-codes.js";
import { formatSafetyTable } from "./instruments/safety-table.js";
import type { LogFormat } from "./utils/logger.js";

const program = new Command();

program
  .name("sweepctl")
  .description("Voltage/current sweep controller for an AC source and electronic load")
  .version("0.1.0")
  .exitOverride((err) => {
    process.exit(err.exitCode === 0 ? EXIT.COMPLETED : EXIT.INVALID_CONFIG);
  });

const formatOption = () =>
  new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human");

function reportErrors(errors: Diagnostic[], format: LogFormat): void {
  if (format === "jsonl") {
    for (const err of errors) process.stdout.write(JSON.stringify(err) + "\n");
  } else {
    for (const err of errors) console.error(err.message);
  }
}

program
  .command("validate")
  .description("Validate config and sweep plan without contacting instruments")
  .option("--config <path>", "Path to config directory")
  .option("--profile <name>", "Bench profile layered over base.yaml")
  .addOption(formatOption())
  .action((opts: { config?: string; profile?: string; format: LogFormat }) => {
    const res = validateBench({ configDir: opts.config, profile: opts.profile });
    if (!res.ok) {
      reportErrors(res.errors, opts.format);
      process.exit(EXIT.INVALID_CONFIG);
    }

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", message: "OK", steps: res.steps }) + "\n");
    } else {
      console.log(`OK: ${res.steps} step(s) planned`);
    }
  });

program
  .command("run")
  .description("Run the sweep; press the abort key (default q) or Ctrl+C to stop safely")
  .option("--config <path>", "Path to config directory")
  .option("--profile <name>", "Bench profile layered over base.yaml")
  .option("--output <path>", "Runs root directory (default: config output.dir, then ./runs)")
  .option("--simulate", "Use in-process instrument simulators")
  .addOption(formatOption())
  .action(async (opts: { config?: string; profile?: string; output?: string; simulate?: boolean; format: LogFormat }) => {
    const res = await run({
      configDir: opts.config,
      profile: opts.profile,
      output: opts.output,
      simulate: opts.simulate,
      format: opts.format,
    });

    if (!res.ok) {
      reportErrors(res.errors, opts.format);
      process.exit(res.exitCode);
    }

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "RUN_FINISHED", runId: res.runId, runDir: res.runDir, outcome: res.outcome }) + "\n");
    } else {
      console.log(`Run ${res.runId}: ${res.outcome.kind} (${res.runDir})`);
      if (res.outcome.error) console.error(res.outcome.error.message);
    }
    process.exit(res.exitCode);
  });

program
  .command("safety")
  .description("Read and print the source's safety limits")
  .option("--config <path>", "Path to config directory")
  .option("--profile <name>", "Bench profile layered over base.yaml")
  .option("--simulate", "Use the in-process source simulator")
  .addOption(formatOption())
  .action(async (opts: { config?: string; profile?: string; simulate?: boolean; format: LogFormat }) => {
    const res = await safety({ configDir: opts.config, profile: opts.profile, simulate: opts.simulate });
    if (!res.ok) {
      reportErrors(res.errors, opts.format);
      process.exit(res.exitCode);
    }

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "SAFETY", limits: res.table }) + "\n");
    } else {
      for (const line of formatSafetyTable(res.table)) console.log(line);
      if (!Number.isFinite(res.table.maxRmsVoltage)) {
        console.error("Warning: max RMS voltage is unreadable; run will refuse to energize");
      } else if (res.table.maxRmsVoltage < res.maxVoltage) {
        console.error(`Warning: max RMS voltage ${res.table.maxRmsVoltage} V is below the configured ${res.maxVoltage} V`);
      }
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.FAILED);
});
