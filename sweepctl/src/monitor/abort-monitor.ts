import readline from "node:readline";
import type { Logger } from "../utils/logger.js";
import { silentLogger } from "../utils/logger.js";

/**
 * Operator abort, polled by the engine between steps. Once requested it
 * stays requested for the rest of the run.
 */
export interface AbortMonitor {
  start(): void;
  stop(): void;
  abortRequested(): boolean;
  /** Why the abort was requested, or null while none has been. */
  readonly reason: string | null;
}

/** Sticky flag with no input source of its own; also the base for keyed monitors. */
export class AbortFlag implements AbortMonitor {
  private readonly controller = new AbortController();
  private reason_: string | null = null;

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get reason(): string | null {
    return this.reason_;
  }

  start(): void {}

  stop(): void {}

  abortRequested(): boolean {
    return this.controller.signal.aborted;
  }

  requestAbort(reason = "operator"): void {
    if (this.controller.signal.aborted) return;
    this.reason_ = reason;
    this.controller.abort(reason);
  }
}

type Keypress = { name?: string; ctrl?: boolean; sequence?: string };

type KeyStream = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

export type KeypressAbortOptions = {
  /** Key that requests an abort (case-insensitive). */
  key?: string;
  input?: KeyStream;
  /** Also abort on SIGINT; off for embedded use and tests. */
  handleSigint?: boolean;
  logger?: Logger;
};

/**
 * Watches the terminal for the abort key on the event loop, alongside the
 * instrument I/O, so the command sequence never waits on operator input.
 * Ctrl+C in raw mode counts as the abort key.
 */
export class KeypressAbortMonitor extends AbortFlag {
  private readonly key: string;
  private readonly input: KeyStream;
  private readonly handleSigint: boolean;
  private readonly log: Logger;
  private started = false;
  private rawMode = false;
  private readonly onKeypress = (str: string | undefined, key: Keypress | undefined): void => {
    this.handleKey(str, key);
  };
  private readonly onSigint = (): void => {
    this.trigger("SIGINT");
  };

  constructor(opts: KeypressAbortOptions = {}) {
    super();
    this.key = (opts.key ?? "q").toLowerCase();
    this.input = opts.input ?? process.stdin;
    this.handleSigint = opts.handleSigint ?? true;
    this.log = opts.logger ?? silentLogger();
  }

  override start(): void {
    if (this.started) return;
    this.started = true;

    readline.emitKeypressEvents(this.input);
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(true);
      this.rawMode = true;
    }
    this.input.on("keypress", this.onKeypress);
    this.input.resume();
    if (this.handleSigint) process.on("SIGINT", this.onSigint);
  }

  override stop(): void {
    if (!this.started) return;
    this.started = false;

    this.input.off("keypress", this.onKeypress);
    if (this.rawMode && this.input.setRawMode) {
      this.input.setRawMode(false);
      this.rawMode = false;
    }
    this.input.pause();
    if (this.handleSigint) process.off("SIGINT", this.onSigint);
  }

  handleKey(str: string | undefined, key: Keypress | undefined): void {
    if (key?.ctrl && key.name === "c") {
      this.trigger("ctrl-c");
      return;
    }
    const pressed = (key?.name ?? str ?? "").toLowerCase();
    if (pressed === this.key) this.trigger(`key '${this.key}'`);
  }

  private trigger(source: string): void {
    if (this.abortRequested()) return;
    this.log.warn("abort requested", { source });
    this.requestAbort(source);
  }
}
