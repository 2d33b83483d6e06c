import type { Instrument } from "../utils/errors.js";
import type { InstrumentTransport } from "../transport/transport.js";
import type { SessionMode } from "../types/run.js";

const TRANSITIONS: Record<SessionMode, SessionMode[]> = {
  uninitialized: ["configured", "faulted", "disabled"],
  configured: ["energized", "faulted", "disabled"],
  energized: ["faulted", "disabled"],
  disabled: ["faulted"],
  faulted: ["disabled"],
};

/**
 * One live connection to one instrument, owned by its controller for a single run.
 */
export class InstrumentSession {
  private mode_: SessionMode = "uninitialized";
  private closed_ = false;
  private opened_ = false;
  /** Last value successfully commanded (voltage for the source, RMS current for the load). */
  setpoint: number | null = null;
  identity: string | null = null;

  constructor(
    readonly instrument: Instrument,
    readonly transport: InstrumentTransport,
  ) {}

  get mode(): SessionMode {
    return this.mode_;
  }

  get closed(): boolean {
    return this.closed_;
  }

  /** True once a connection has been established at least once. */
  get opened(): boolean {
    return this.opened_;
  }

  async open(): Promise<void> {
    await this.transport.open();
    this.opened_ = true;
  }

  transition(to: SessionMode): void {
    if (to === this.mode_) return;
    if (!TRANSITIONS[this.mode_].includes(to)) {
      throw new Error(`${this.instrument} session cannot go from ${this.mode_} to ${to}`);
    }
    this.mode_ = to;
  }

  markFaulted(): void {
    if (this.mode_ !== "faulted") this.mode_ = "faulted";
  }

  /** Close the transport; the session cannot be reopened. */
  async close(): Promise<void> {
    this.closed_ = true;
    await this.transport.close();
  }
}
