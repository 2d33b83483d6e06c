import { TransportError, TransportTimeout } from "../utils/errors.js";
import type { InstrumentTransport } from "../transport/transport.js";
import type { BenchLogEntry, ScpiHandler } from "./types.js";

export type FaultInjection = {
  /** Throw the returned error instead of delivering the command. */
  failOn?: (command: string) => Error | undefined;
  /** Swallow matching commands: logged as not delivered, never seen by the instrument. */
  drop?: (command: string) => boolean;
};

export type SimulatedTransportOptions = {
  timeoutMs?: number;
  faults?: FaultInjection;
};

/**
 * In-process transport in front of a simulated instrument. Every command is
 * appended to a log shared by all instruments on the bench, so ordering across
 * source and load can be asserted.
 */
export class SimulatedTransport implements InstrumentTransport {
  readonly description: string;
  faults: FaultInjection;
  private open_ = false;
  private readonly timeoutMs: number;

  constructor(
    readonly instrument: string,
    private readonly handler: ScpiHandler,
    private readonly log: BenchLogEntry[],
    opts: SimulatedTransportOptions = {},
  ) {
    this.description = `sim://${instrument}`;
    this.timeoutMs = opts.timeoutMs ?? 1000;
    this.faults = opts.faults ?? {};
  }

  get isOpen(): boolean {
    return this.open_;
  }

  async open(): Promise<void> {
    this.open_ = true;
  }

  async send(command: string): Promise<void> {
    this.deliver(command);
  }

  async query(command: string, timeoutMs?: number): Promise<string> {
    const response = this.deliver(command);
    if (response === null) {
      throw new TransportTimeout(command, timeoutMs ?? this.timeoutMs, { address: this.description });
    }
    return response;
  }

  async close(): Promise<void> {
    this.open_ = false;
  }

  async clear(): Promise<void> {
    this.deliver("*CLS");
  }

  private deliver(command: string): string | null {
    if (!this.open_) {
      throw new TransportError(`${this.description} is not open`, { operation: "write", command });
    }
    const failure = this.faults.failOn?.(command);
    if (failure) {
      this.log.push({ instrument: this.instrument, command, delivered: false });
      throw failure;
    }
    if (this.faults.drop?.(command)) {
      this.log.push({ instrument: this.instrument, command, delivered: false });
      return null;
    }
    this.log.push({ instrument: this.instrument, command, delivered: true });
    return this.handler.handleCommand(command);
  }
}
