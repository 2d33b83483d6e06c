import { parseScpiNumber } from "../transport/scpi.js";

/** Field order of the source's SOURce:SAFety? response. */
export const SAFETY_FIELDS = [
  { key: "maxRmsVoltage", label: "Max RMS Voltage (V)" },
  { key: "maxPeakVoltage", label: "Max Peak Voltage (V)" },
  { key: "minFrequency", label: "Min Frequency (Hz)" },
  { key: "maxFrequency", label: "Max Frequency (Hz)" },
  { key: "maxRmsCurrent", label: "Max RMS Current (A)" },
  { key: "maxPeakCurrent", label: "Max Peak Current (A)" },
  { key: "maxVoltageSlew", label: "Max Voltage Slew Rate (V/us)" },
  { key: "maxCurrentSlew", label: "Max Current Slew Rate (A/us)" },
  { key: "maxPower", label: "Max Power (W)" },
  { key: "maxApparentPower", label: "Max Apparent Power (VA)" },
  { key: "maxReactivePower", label: "Max Reactive Power (VAR)" },
  { key: "powerFactorLimit", label: "Power Factor Limit" },
  { key: "crestFactorLimit", label: "Crest Factor Limit" },
  { key: "maxHarmonicsOrder", label: "Max Harmonics Order" },
  { key: "peakCurrentLimit", label: "Peak Current Limit (A)" },
  { key: "reserved", label: "Reserved" },
] as const;

export type SafetyKey = (typeof SAFETY_FIELDS)[number]["key"];

export type SafetyTable = Record<SafetyKey, number>;

/** Parse the 16-field safety response; null when the field count is wrong. */
export function parseSafetyTable(response: string): SafetyTable | null {
  const parts = response.split(",");
  if (parts.length !== SAFETY_FIELDS.length) return null;
  const table: Partial<SafetyTable> = {};
  SAFETY_FIELDS.forEach((field, i) => {
    table[field.key] = parseScpiNumber(parts[i]);
  });
  return isComplete(table) ? table : null;
}

function isComplete(table: Partial<SafetyTable>): table is SafetyTable {
  return SAFETY_FIELDS.every((f) => typeof table[f.key] === "number");
}

/** Render the table as aligned label/value lines. */
export function formatSafetyTable(table: SafetyTable): string[] {
  return SAFETY_FIELDS.map((f) => {
    const value = table[f.key];
    const text = Number.isFinite(value) ? value.toFixed(3) : "n/a";
    return `${f.label.padEnd(28)}: ${text.padStart(10)}`;
  });
}
