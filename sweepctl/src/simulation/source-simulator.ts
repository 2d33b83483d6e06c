/**
 * Grid simulator (AC source) stand-in.
 *
 * Command set:
 * - INSTrument:NSELect <n>        - Output channel
 * - SOURce:CURRent / SOURce:POWer - Protection limits (with ? queries)
 * - FREQuency <Hz> / FREQuency?   - Output frequency
 * - VOLTage <V> / VOLTage?        - Voltage setpoint
 * - OUTPut ON|OFF / OUTPut?       - Output enable
 * - MEASure:VOLTage?              - Output voltage (setpoint while on)
 * - MEASure:CURRent?              - Current drawn by the load
 * - SOURce:SAFety?                - 16-field safety table
 * - SYSTem:ERRor?                 - Error queue
 */

import { parseArg, splitCommand, type ScpiHandler } from "./types.js";

export type SourceSimulatorOptions = {
  /** Max RMS voltage reported in the safety table. */
  maxRmsVoltage?: number;
  /** Current the attached load is drawing right now. */
  drawnCurrent?: () => number;
};

export interface SourceSimulator extends ScpiHandler {
  readonly channel: number;
  readonly voltage: number;
  readonly outputEnabled: boolean;
  outputVoltage(): number;
}

export function createSourceSimulator(opts: SourceSimulatorOptions = {}): SourceSimulator {
  const maxRms = opts.maxRmsVoltage ?? 300;
  const drawn = opts.drawnCurrent ?? (() => 0);

  let channel = 1;
  let currentLimit = 10;
  let powerLimit = 1000;
  let frequency = 50;
  let voltage = 0;
  let outputEnabled = false;
  const errors: string[] = [];

  function outputVoltage(): number {
    return outputEnabled ? voltage : 0;
  }

  function safetyTable(): string {
    const fields = [
      maxRms, maxRms * Math.SQRT2, 40, 70, 40, 120, 10, 5,
      8000, 8000, 6000, 0.5, 5, 50, 120, 0,
    ];
    return fields.map((f) => f.toFixed(3)).join(",");
  }

  function handleCommand(command: string): string | null {
    const { header, arg } = splitCommand(command);
    const value = parseArg(arg);

    switch (header) {
      case "INSTRUMENT:NSELECT":
      case "INST:NSEL":
        if (value !== null) channel = value;
        return null;
      case "SOURCE:CURRENT":
      case "SOUR:CURR":
        if (value !== null && value > 0) currentLimit = value;
        return null;
      case "SOURCE:CURRENT?":
      case "SOUR:CURR?":
        return currentLimit.toFixed(3);
      case "SOURCE:POWER":
      case "SOUR:POW":
        if (value !== null && value > 0) powerLimit = value;
        return null;
      case "SOURCE:POWER?":
      case "SOUR:POW?":
        return powerLimit.toFixed(3);
      case "FREQUENCY":
      case "FREQ":
        if (value !== null && value >= 40 && value <= 70) frequency = value;
        else errors.push("-222,Data out of range");
        return null;
      case "FREQUENCY?":
      case "FREQ?":
        return frequency.toFixed(3);
      case "VOLTAGE":
      case "VOLT":
        if (value !== null && Math.abs(value) <= maxRms) voltage = value;
        else errors.push("-222,Data out of range");
        return null;
      case "VOLTAGE?":
      case "VOLT?":
        return voltage.toFixed(3);
      case "OUTPUT":
      case "OUTP":
        outputEnabled = arg.toUpperCase() === "ON" || arg === "1";
        return null;
      case "OUTPUT?":
      case "OUTP?":
        return outputEnabled ? "1" : "0";
      case "MEASURE:VOLTAGE?":
      case "MEAS:VOLT?":
        return outputVoltage().toFixed(3);
      case "MEASURE:CURRENT?":
      case "MEAS:CURR?":
        return (outputEnabled ? drawn() : 0).toFixed(3);
      case "SOURCE:SAFETY?":
      case "SOUR:SAF?":
        return safetyTable();
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
    outputVoltage,
    get channel() { return channel; },
    get voltage() { return voltage; },
    get outputEnabled() { return outputEnabled; },
  };
}
