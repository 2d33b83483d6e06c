import {
  InstrumentFault,
  TransportTimeout,
  errorMessage,
  toInstrumentFault,
  type ErrorContext,
  type Instrument,
} from "../utils/errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { realSleep, type Sleep } from "../utils/time.js";
import { formatScpiNumber, parseScpiNumber } from "../transport/scpi.js";
import { InstrumentSession } from "./session.js";
import type { InstrumentTransport } from "../transport/transport.js";
import type { SweepPlan } from "../types/plan.js";
import type { SessionMode } from "../types/run.js";

export type ControllerDeps = {
  logger?: Logger;
  sleep?: Sleep;
};

export type ConfirmRequest = {
  label: string;
  /** Command(s) that establish the value; re-run on every attempt. */
  apply: () => Promise<void>;
  query: string;
  expected: number;
  tolerance: number;
};

/**
 * Shared plumbing for the source and load controllers: session ownership,
 * read-back confirmation with a bounded retry budget, and the guarded
 * shutdown actions used by bring-down.
 */
export abstract class InstrumentController {
  readonly session: InstrumentSession;
  protected readonly log: Logger;
  protected readonly sleep: Sleep;

  constructor(
    readonly instrument: Instrument,
    transport: InstrumentTransport,
    protected readonly plan: SweepPlan,
    deps: ControllerDeps = {},
  ) {
    this.session = new InstrumentSession(instrument, transport);
    this.log = (deps.logger ?? silentLogger()).child({ instrument });
    this.sleep = deps.sleep ?? realSleep;
  }

  get mode(): SessionMode {
    return this.session.mode;
  }

  abstract bringUp(): Promise<void>;

  /** Never throws; safe from any mode and safe to call repeatedly. */
  abstract bringDown(): Promise<void>;

  protected get transport(): InstrumentTransport {
    return this.session.transport;
  }

  protected async send(command: string): Promise<void> {
    this.log.debug("send", { command });
    await this.transport.send(command);
  }

  protected async query(command: string): Promise<string> {
    const response = await this.transport.query(command);
    this.log.debug("query", { command, response });
    return response;
  }

  protected async setAndConfirm(command: string, query: string, expected: number, tolerance: number): Promise<number> {
    return this.confirm({
      label: command,
      apply: () => this.send(`${command} ${formatScpiNumber(expected)}`),
      query,
      expected,
      tolerance,
    });
  }

  /**
   * Apply, read back and compare, up to `confirm.attempts` times. Timeouts
   * count as a failed attempt; any other transport failure ends the loop.
   */
  protected async confirm(req: ConfirmRequest): Promise<number> {
    const attempts = this.plan.confirm.attempts;
    let measured = Number.NaN;
    let lastTimeout: TransportTimeout | null = null;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        await req.apply();
        measured = parseScpiNumber(await this.query(req.query));
      } catch (err) {
        if (!(err instanceof TransportTimeout)) throw err;
        lastTimeout = err;
        this.log.warn("read-back timed out", { operation: req.label, attempt, attempts });
        continue;
      }
      if (Number.isFinite(measured) && Math.abs(measured - req.expected) <= req.tolerance) {
        return measured;
      }
      this.log.warn("read-back mismatch", {
        operation: req.label,
        attempt,
        attempts,
        commanded: req.expected,
        measured,
        tolerance: req.tolerance,
      });
    }

    const reason = lastTimeout && !Number.isFinite(measured)
      ? `no read-back from ${req.query}`
      : `read back ${measured}`;
    throw new InstrumentFault(
      this.instrument,
      `${req.label}: commanded ${req.expected} (±${req.tolerance}), ${reason} after ${attempts} attempts`,
      { operation: "confirm", command: req.label, commanded: req.expected, measured },
      { cause: lastTimeout ?? undefined },
    );
  }

  /** Mark the session faulted and rethrow as an InstrumentFault with context. */
  protected fail(err: unknown, context: Partial<ErrorContext>): never {
    this.session.markFaulted();
    throw toInstrumentFault(this.instrument, err, context);
  }

  /** Run one shutdown action; failures are logged and reported, never thrown. */
  protected async guard(action: string, fn: () => Promise<void>): Promise<boolean> {
    try {
      await fn();
      return true;
    } catch (err) {
      this.log.error(`bring-down: ${action} failed`, err, { operation: "bring_down", action });
      return false;
    }
  }

  /**
   * Shared bring-down skeleton: skip when already down, run each action in its
   * own guard, settle the session mode and close the connection.
   */
  protected async shutdown(actions: Array<[string, () => Promise<void>]>): Promise<void> {
    if (this.session.closed) return;

    if (!this.transport.isOpen) {
      const reconnected = this.session.opened ? await this.reconnect() : false;
      if (!reconnected) {
        this.settle(this.session.opened && this.session.mode !== "uninitialized" ? "faulted" : "disabled");
        this.session.setpoint = null;
        await this.guard("close", () => this.session.close());
        return;
      }
    }

    let clean = true;
    for (const [label, fn] of actions) {
      const ok = await this.guard(label, fn);
      clean = clean && ok;
    }

    this.settle(clean ? "disabled" : "faulted");
    await this.guard("close", () => this.session.close());
    this.log.info(clean ? "bring-down complete" : "bring-down finished with errors", { operation: "bring_down", mode: this.session.mode });
  }

  /** The link dropped after bring-up started; open it once more so the output can be switched off. */
  private async reconnect(): Promise<boolean> {
    this.log.warn("bring-down: connection lost, reconnecting", { operation: "bring_down", mode: this.session.mode });
    return this.guard("reconnect", () => this.session.open());
  }

  private settle(mode: SessionMode): void {
    try {
      this.session.transition(mode);
    } catch (err) {
      this.log.warn(errorMessage(err), { operation: "bring_down" });
      this.session.markFaulted();
    }
  }
}
