import { InstrumentFault } from "../utils/errors.js";
import { formatScpiNumber, isOnState, parseScpiNumber } from "../transport/scpi.js";
import { InstrumentController, type ControllerDeps } from "./controller.js";
import { parseSafetyTable, type SafetyTable } from "./safety-table.js";
import type { InstrumentTransport } from "../transport/transport.js";
import type { SweepPlan } from "../types/plan.js";

export type SourceSettings = {
  /** Output channel on multi-channel units; omitted for single-channel ones. */
  channel?: number;
  frequencyHz: number;
  currentLimit: number;
  powerLimit: number;
};

export type SourceReading = {
  voltage: number;
  current: number;
};

const FREQUENCY_TOLERANCE_HZ = 0.1;

/**
 * Programmable AC source (grid simulator).
 *
 * Bring-up: channel → protection limits → frequency → safety check →
 * initial voltage → output on. Bring-down: voltage to zero → ramp settle →
 * output off.
 */
export class SourceController extends InstrumentController {
  constructor(
    transport: InstrumentTransport,
    plan: SweepPlan,
    private readonly settings: SourceSettings,
    deps: ControllerDeps = {},
  ) {
    super("source", transport, plan, deps);
  }

  async bringUp(): Promise<void> {
    const { confirm, limits, timing } = this.plan;
    try {
      await this.session.open();
      this.log.info("connected", { operation: "bring_up", address: this.transport.description });

      if (this.settings.channel !== undefined) {
        await this.send(`INSTrument:NSELect ${this.settings.channel}`);
      }

      await this.setAndConfirm("SOURce:CURRent", "SOURce:CURRent?", this.settings.currentLimit, confirm.currentTolerance);
      await this.setAndConfirm("SOURce:POWer", "SOURce:POWer?", this.settings.powerLimit, Math.max(1, this.settings.powerLimit * 0.001));
      await this.setAndConfirm("FREQuency", "FREQuency?", this.settings.frequencyHz, FREQUENCY_TOLERANCE_HZ);

      const safety = await this.readSafetyLimits();
      if (!Number.isFinite(safety.maxRmsVoltage)) {
        throw new InstrumentFault("source", "safety table has no readable max RMS voltage", {
          operation: "bring_up",
          command: "SOURce:SAFety?",
          commanded: limits.maxVoltage,
        });
      }
      if (safety.maxRmsVoltage < limits.maxVoltage) {
        throw new InstrumentFault("source", `instrument safety limit ${safety.maxRmsVoltage} V is below the plan's max voltage ${limits.maxVoltage} V`, {
          operation: "bring_up",
          command: "SOURce:SAFety?",
          commanded: limits.maxVoltage,
          measured: safety.maxRmsVoltage,
        });
      }

      const initial = this.plan.voltage.start;
      await this.setAndConfirm("VOLTage", "VOLTage?", initial, confirm.voltageTolerance);
      this.session.setpoint = initial;
      this.session.transition("configured");

      await this.send("OUTPut ON");
      await this.sleep(timing.outputOnSettleMs);
      const state = await this.query("OUTPut?");
      if (!isOnState(state)) {
        throw new InstrumentFault("source", `output did not turn on (OUTPut? → ${state})`, { operation: "bring_up", command: "OUTPut ON" });
      }
      this.session.transition("energized");
      this.log.info("output on", { operation: "bring_up", voltage: initial });
    } catch (err) {
      this.fail(err, { operation: "bring_up" });
    }
  }

  /** Command a voltage and return the measured output once it is within tolerance. */
  async setVoltage(voltage: number): Promise<number> {
    try {
      const measured = await this.confirm({
        label: "VOLTage",
        apply: async () => {
          await this.send(`VOLTage ${formatScpiNumber(voltage)}`);
          await this.sleep(this.plan.timing.voltageSettleMs);
        },
        query: "MEASure:VOLTage?",
        expected: voltage,
        tolerance: this.plan.confirm.voltageTolerance,
      });
      this.session.setpoint = voltage;
      return measured;
    } catch (err) {
      this.fail(err, { operation: "set_voltage", commanded: voltage });
    }
  }

  async measure(): Promise<SourceReading> {
    try {
      const voltage = parseScpiNumber(await this.query("MEASure:VOLTage?"));
      const current = parseScpiNumber(await this.query("MEASure:CURRent?"));
      return { voltage, current };
    } catch (err) {
      this.fail(err, { operation: "measure" });
    }
  }

  async readSafetyLimits(): Promise<SafetyTable> {
    const response = await this.query("SOURce:SAFety?");
    const table = parseSafetyTable(response);
    if (!table) {
      throw new InstrumentFault("source", `unexpected safety response: ${response}`, { operation: "read_safety", command: "SOURce:SAFety?" });
    }
    return table;
  }

  /** Connect, read the safety table and disconnect without touching the output. */
  async inspectSafety(): Promise<SafetyTable> {
    await this.session.open();
    try {
      if (this.settings.channel !== undefined) {
        await this.send(`INSTrument:NSELect ${this.settings.channel}`);
      }
      return await this.readSafetyLimits();
    } finally {
      await this.session.close();
    }
  }

  async bringDown(): Promise<void> {
    await this.shutdown([
      ["VOLTage 0", () => this.send("VOLTage 0")],
      ["ramp settle", () => this.sleep(this.plan.timing.rampDownMs)],
      ["OUTPut OFF", () => this.send("OUTPut OFF")],
    ]);
    this.session.setpoint = null;
  }
}
