import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { applyEnvOverrides, deepMerge, loadConfig } from "../src/config/loader.js";
import { validateConfig } from "../src/config/validator.js";
import { buildSweepPlan, peakLimitFor } from "../src/config/plan.js";
import { ConfigurationError } from "../src/utils/errors.js";
import { benchConfig, testPlan } from "./helpers.js";

const CONFIG_DIR = fileURLToPath(new URL("../config", import.meta.url));

describe("config loader", () => {
  it("loads base config with the bench defaults", () => {
    const config = loadConfig(undefined, CONFIG_DIR, {});
    expect(config.schema_version).toBe("1");
    expect(config.source).toMatchObject({ host: "192.168.0.149", port: 5025, channel: 3 });
    expect(config.load).toMatchObject({ resource: "GPIB0::8::INSTR" });
  });

  it("merges a profile over base", () => {
    const config = loadConfig("simulated", CONFIG_DIR, {});
    expect(config.source).toMatchObject({ transport: "simulated", host: "192.168.0.149" });
    expect(config.sweep).toMatchObject({ voltage: { start: 100, stop: 120, step: 10, unit: "V" }, settle_ms: 0 });
  });

  it("applies SWEEP_ environment overrides with nested keys and typed scalars", () => {
    const config = loadConfig("simulated", CONFIG_DIR, {
      SWEEP_SOURCE__HOST: "10.0.0.5",
      SWEEP_SOURCE__PORT: "5026",
      SWEEP_LOG_LEVEL: "debug",
      HOME: "/root",
    });
    expect(config.source).toMatchObject({ host: "10.0.0.5", port: 5026 });
    expect(config.log_level).toBe("debug");
  });

  it("fails on a profile that does not exist", () => {
    expect(() => loadConfig("nonexistent", CONFIG_DIR, {})).toThrow(ConfigurationError);
  });

  describe("with a scratch directory", () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "sweep-config-"));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it("reports unparsable YAML", () => {
      fs.writeFileSync(path.join(tmpDir, "base.yaml"), "source: [unclosed\n");
      expect(() => loadConfig(undefined, tmpDir, {})).toThrow(/Cannot parse/);
    });

    it("rejects a top-level list", () => {
      fs.writeFileSync(path.join(tmpDir, "base.yaml"), "- a\n- b\n");
      expect(() => loadConfig(undefined, tmpDir, {})).toThrow(/must contain a mapping/);
    });
  });
});

describe("deepMerge and env overrides", () => {
  it("replaces arrays and merges objects", () => {
    expect(deepMerge({ a: { b: 1, c: [1, 2] } }, { a: { c: [3] } })).toEqual({ a: { b: 1, c: [3] } });
  });

  it("keeps non-numeric scalars as strings", () => {
    expect(applyEnvOverrides({}, { SWEEP_LOAD__RESOURCE: "GPIB0::9::INSTR" })).toEqual({ load: { resource: "GPIB0::9::INSTR" } });
  });
});

describe("config validator", () => {
  it("accepts the shipped base config and every profile", () => {
    for (const profile of [undefined, "simulated", "smoke"]) {
      const res = validateConfig(loadConfig(profile, CONFIG_DIR, {}));
      expect(res.errors).toBeNull();
      expect(res.valid).toBe(true);
    }
  });

  it("rejects config missing required fields", () => {
    const res = validateConfig({ schema_version: "1" });
    expect(res.valid).toBe(false);
    expect(res.errors).toContain("must have required property 'source'");
  });

  it("rejects unknown keys", () => {
    const res = validateConfig({ ...benchConfig(), extra: true });
    expect(res.valid).toBe(false);
    expect(res.errors).toContain("must NOT have additional properties");
  });

  it("rejects a malformed GPIB resource", () => {
    const config = benchConfig();
    const res = validateConfig({ ...config, load: { ...config.load, resource: "GPIB0::eight::INSTR" } });
    expect(res.valid).toBe(false);
    expect(res.errors).toContain("config/load/resource");
  });

  it("rejects a power factor above one", () => {
    const res = validateConfig({ ...benchConfig(), limits: { max_voltage: 150, max_current: 20, crest_factor: 1.414, power_factor: 1.2 } });
    expect(res.valid).toBe(false);
    expect(res.errors).toContain("config/limits/power_factor must be <= 1");
  });
});

describe("buildSweepPlan", () => {
  it("fills defaults and freezes the plan", () => {
    const plan = buildSweepPlan(benchConfig({ timing: undefined }));
    expect(plan.confirm).toEqual({ attempts: 3, voltageTolerance: 0.5, currentTolerance: 0.1, factorTolerance: 0.01 });
    expect(plan.timing.outputOnSettleMs).toBe(2000);
    expect(plan.voltage.unit).toBe("V");
    expect(Object.isFrozen(plan)).toBe(true);
    expect(Object.isFrozen(plan.limits)).toBe(true);
  });

  it("rejects voltages beyond max_voltage", () => {
    const config = benchConfig({ sweep: { voltage: { start: 100, stop: 200, step: 50 }, current: { start: 0, stop: 1, step: 1 }, settle_ms: 0 } });
    try {
      buildSweepPlan(config);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigurationError);
      if (e instanceof ConfigurationError) {
        expect(e.details).toEqual(["sweep.voltage: 200 V exceeds limits.max_voltage 150"]);
      }
    }
  });

  it("rejects negative currents and currents above the source limit", () => {
    const config = benchConfig({ sweep: { voltage: { start: 100, stop: 100, step: 1 }, current: { start: -1, stop: 25, step: 13 }, settle_ms: 0 } });
    try {
      buildSweepPlan(config);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigurationError);
      if (e instanceof ConfigurationError) {
        expect(e.details).toEqual([
          "sweep.current: -1 A is negative",
          "sweep.current: 25 A exceeds limits.max_current 20",
          "sweep.current: 25 A exceeds source.current_limit_a 20",
        ]);
      }
    }
  });

  it("computes the per-step peak limit", () => {
    const plan = testPlan();
    expect(peakLimitFor(plan, 2)).toBe(3);
    expect(peakLimitFor(plan, 0)).toBe(0.1);
  });
});
