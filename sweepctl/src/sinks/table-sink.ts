import type { RunOutcome, StepRecord } from "../types/run.js";
import type { ResultSink } from "./result-sink.js";

const COLUMNS = ["V Set (V)", "I Set (A)", "V Meas (V)", "I Meas (A)", "P Meas (W)", "Status"];
const WIDTH = 12;
const RULE = "-".repeat(COLUMNS.length * (WIDTH + 3) - 3);

function cell(value: number | string): string {
  const text = typeof value === "number" ? (Number.isFinite(value) ? value.toFixed(2) : "nan") : value;
  return text.padEnd(WIDTH);
}

export function formatRow(values: Array<number | string>): string {
  return values.map(cell).join(" | ").trimEnd();
}

/** Live progress table on a text stream, one row per step. */
export class TableResultSink implements ResultSink {
  private headerWritten = false;
  private lastVoltageIndex: number | null = null;

  constructor(private readonly out: NodeJS.WritableStream) {}

  async append(record: StepRecord): Promise<void> {
    if (!this.headerWritten) {
      this.write(formatRow(COLUMNS));
      this.write(RULE);
      this.headerWritten = true;
    } else if (this.lastVoltageIndex !== record.voltage_index) {
      this.write(RULE);
    }
    this.lastVoltageIndex = record.voltage_index;

    const status = record.status === "ok" && !record.sinking ? "no-sink" : record.status;
    this.write(formatRow([
      record.commanded_voltage,
      record.commanded_current,
      record.load_voltage,
      record.load_current,
      record.load_power,
      status,
    ]));
  }

  async finalize(outcome: RunOutcome): Promise<void> {
    if (this.headerWritten) this.write(RULE);
    this.write(`--- Sweep ${outcome.kind}: ${outcome.records} step(s) recorded ---`);
  }

  private write(line: string): void {
    this.out.write(line + "\n");
  }
}
