import { InstrumentFault } from "../utils/errors.js";
import { formatScpiNumber, isNoError, isOnState, parseScpiNumber } from "../transport/scpi.js";
import { peakLimitFor } from "../config/plan.js";
import { InstrumentController, type ControllerDeps } from "./controller.js";
import type { InstrumentTransport } from "../transport/transport.js";
import type { SweepPlan } from "../types/plan.js";

export type LoadReading = {
  voltage: number;
  current: number;
  power: number;
};

/**
 * Only AC crest-factor mode sinks stably; constant-current mode oscillates
 * against the grid simulator and is never selected.
 */
export const SINK_MODE = "ACF";

export const PEAK_COMMAND = "CURRent:PEAK:MAXimum:AC";

/**
 * Programmable AC electronic load.
 *
 * Bring-up is two-phase and order-dependent: every mode and limit setting
 * first, then the input enable. Enabling first leaves the load unable to
 * sense the source voltage.
 */
export class LoadController extends InstrumentController {
  constructor(transport: InstrumentTransport, plan: SweepPlan, deps: ControllerDeps = {}) {
    super("load", transport, plan, deps);
  }

  async bringUp(): Promise<void> {
    const { confirm, limits, timing } = this.plan;
    try {
      await this.session.open();
      this.log.info("connected", { operation: "bring_up", address: this.transport.description });

      if (this.transport.clear) await this.transport.clear();
      await this.send("*RST");
      await this.sleep(timing.loadResetSettleMs);
      await this.send("*CLS");

      // Phase (a): mode and limits.
      await this.send(`MODE ${SINK_MODE}`);
      const mode = (await this.query("MODE?")).toUpperCase();
      if (mode !== SINK_MODE) {
        throw new InstrumentFault("load", `mode is ${mode}, expected ${SINK_MODE}`, { operation: "bring_up", command: `MODE ${SINK_MODE}`, commanded: SINK_MODE, measured: mode });
      }
      await this.setAndConfirm("CFACTor", "CFACTor?", limits.crestFactor, confirm.factorTolerance);
      await this.setAndConfirm("PFACtor", "PFACtor?", limits.powerFactor, confirm.factorTolerance);
      await this.setAndConfirm("CURR", "CURRent?", 0, confirm.currentTolerance);
      await this.send(`${PEAK_COMMAND} ${formatScpiNumber(limits.maxCurrent * this.plan.peak.ratio)}`);

      const error = await this.query("SYSTem:ERRor?");
      if (!isNoError(error)) {
        throw new InstrumentFault("load", `reported an error during setup: ${error}`, { operation: "bring_up", command: "SYSTem:ERRor?" });
      }
      this.session.identity = await this.query("*IDN?");
      this.session.setpoint = 0;
      this.session.transition("configured");
      this.log.info("configured", { operation: "bring_up", identity: this.session.identity, mode: SINK_MODE });

      // Phase (b): enable input.
      await this.send("LOAD ON");
      const state = await this.query("LOAD:STATus?");
      if (!isOnState(state)) {
        throw new InstrumentFault("load", `input did not turn on (LOAD:STATus? → ${state})`, { operation: "bring_up", command: "LOAD ON" });
      }
      this.session.transition("energized");
      this.log.info("input on", { operation: "bring_up" });
    } catch (err) {
      this.fail(err, { operation: "bring_up" });
    }
  }

  /**
   * RMS target, then the peak-current limit. The RMS command alone is a
   * no-op on the load; the peak command is what starts it sinking, so both
   * go out on every step and on every retry, in this order.
   */
  async setCurrent(current: number): Promise<number> {
    const peak = peakLimitFor(this.plan, current);
    try {
      const confirmed = await this.confirm({
        label: "CURR",
        apply: async () => {
          await this.send(`CURR ${formatScpiNumber(current)}`);
          await this.send(`${PEAK_COMMAND} ${formatScpiNumber(peak)}`);
          await this.sleep(this.plan.timing.currentSettleMs);
        },
        query: "CURRent?",
        expected: current,
        tolerance: this.plan.confirm.currentTolerance,
      });
      this.session.setpoint = current;
      return confirmed;
    } catch (err) {
      this.fail(err, { operation: "set_current", commanded: current });
    }
  }

  async measure(): Promise<LoadReading> {
    try {
      const voltage = parseScpiNumber(await this.query("MEASure:VOLTage?"));
      const current = parseScpiNumber(await this.query("MEASure:CURRent?"));
      const power = parseScpiNumber(await this.query("MEASure:POWer?"));
      return { voltage, current, power };
    } catch (err) {
      this.fail(err, { operation: "measure" });
    }
  }

  async bringDown(): Promise<void> {
    await this.shutdown([
      ["LOAD OFF", () => this.send("LOAD OFF")],
      ["CURR 0", () => this.send("CURR 0")],
      ["*RST", () => this.send("*RST")],
    ]);
    this.session.setpoint = null;
  }
}
