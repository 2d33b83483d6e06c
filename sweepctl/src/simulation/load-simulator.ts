/**
 * AC electronic load stand-in.
 *
 * Models the behaviour the sweep depends on:
 * - an RMS setpoint (CURR) alone does not start sinking; the peak-current
 *   limit command that follows it does, and only in ACF mode with the input on
 * - enabling the input before the ACF configuration leaves the load unable to
 *   sense source voltage until it is reset
 */

import { parseArg, splitCommand, type ScpiHandler } from "./types.js";

export type LoadSimulatorOptions = {
  /** Voltage presented by the source at the load terminals. */
  sourceVoltage?: () => number;
  identity?: string;
};

export interface LoadSimulator extends ScpiHandler {
  readonly mode: string;
  readonly inputOn: boolean;
  readonly sinking: boolean;
  readonly rmsSetpoint: number;
  readonly peakLimit: number;
  /** Current actually flowing from the source into the load. */
  drawnCurrent(): number;
}

export function createLoadSimulator(opts: LoadSimulatorOptions = {}): LoadSimulator {
  const terminal = opts.sourceVoltage ?? (() => 0);
  const identity = opts.identity ?? "CHROMA,63804,SIM000001,1.00";

  let mode = "CC";
  let crestFactor = 1.414;
  let powerFactor = 1;
  let rms = 0;
  let peak = 0;
  let inputOn = false;
  let sinking = false;
  let sensing = false;
  let errors: string[] = [];

  function reset(): void {
    mode = "CC";
    crestFactor = 1.414;
    powerFactor = 1;
    rms = 0;
    peak = 0;
    inputOn = false;
    sinking = false;
    sensing = false;
  }

  function terminalVoltage(): number {
    return inputOn && sensing ? terminal() : 0;
  }

  function drawnCurrent(): number {
    return sinking && terminalVoltage() !== 0 ? rms : 0;
  }

  function handleCommand(command: string): string | null {
    const { header, arg } = splitCommand(command);
    const value = parseArg(arg);

    switch (header) {
      case "*RST":
        reset();
        return null;
      case "*CLS":
        errors = [];
        return null;
      case "*IDN?":
        return identity;
      case "MODE":
        if (inputOn) {
          errors.push("-221,Settings conflict");
          return null;
        }
        mode = arg.toUpperCase();
        return null;
      case "MODE?":
        return mode;
      case "CFACTOR":
      case "CFAC":
        if (value !== null && value >= 1.414 && value <= 5) crestFactor = value;
        else errors.push("-222,Data out of range");
        return null;
      case "CFACTOR?":
      case "CFAC?":
        return crestFactor.toFixed(3);
      case "PFACTOR":
      case "PFAC":
        if (value !== null && value > 0 && value <= 1) powerFactor = value;
        else errors.push("-222,Data out of range");
        return null;
      case "PFACTOR?":
      case "PFAC?":
        return powerFactor.toFixed(3);
      case "CURR":
      case "CURRENT":
        if (value !== null && value >= 0) {
          rms = value;
          sinking = false;
        } else {
          errors.push("-222,Data out of range");
        }
        return null;
      case "CURR?":
      case "CURRENT?":
        return rms.toFixed(3);
      case "CURRENT:PEAK:MAXIMUM:AC":
      case "CURR:PEAK:MAX:AC":
        if (value !== null && value > 0) {
          peak = value;
          sinking = inputOn && mode === "ACF";
        } else {
          errors.push("-222,Data out of range");
        }
        return null;
      case "CURRENT:PEAK:MAXIMUM:AC?":
      case "CURR:PEAK:MAX:AC?":
        return peak.toFixed(3);
      case "LOAD":
        if (arg.toUpperCase() === "ON" || arg === "1") {
          if (!inputOn) sensing = mode === "ACF";
          inputOn = true;
        } else {
          inputOn = false;
          sinking = false;
        }
        return null;
      case "LOAD?":
      case "LOAD:STATUS?":
      case "LOAD:STAT?":
        return inputOn ? "1" : "0";
      case "MEASURE:VOLTAGE?":
      case "MEAS:VOLT?":
        return terminalVoltage().toFixed(3);
      case "MEASURE:CURRENT?":
      case "MEAS:CURR?":
        return drawnCurrent().toFixed(3);
      case "MEASURE:POWER?":
      case "MEAS:POW?":
        return (terminalVoltage() * drawnCurrent() * powerFactor).toFixed(3);
      case "SYSTEM:ERROR?":
      case "SYST:ERR?":
        return errors.shift() ?? "0,No error";
      default:
        if (header.endsWith("?")) return null;
        errors.push("-113,Undefined header");
        return null;
    }
  }

  return {
    handleCommand,
    drawnCurrent,
    get mode() { return mode; },
    get inputOn() { return inputOn; },
    get sinking() { return sinking; },
    get rmsSetpoint() { return rms; },
    get peakLimit() { return peak; },
  };
}
