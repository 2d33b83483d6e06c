import net from "node:net";
import { TransportError, TransportTimeout } from "../utils/errors.js";
import { cleanResponse } from "./scpi.js";
import type { InstrumentTransport } from "./transport.js";

export type SocketTransportOptions = {
  host: string;
  port: number;
  timeoutMs: number;
};

type PendingResponse = {
  command: string;
  resolve: (line: string) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
};

/**
 * Newline-terminated SCPI over a raw TCP socket (port 5025 on most instruments).
 *
 * One request at a time: a second query while one is in flight is rejected,
 * and lines that arrive with nobody waiting are dropped.
 */
export class SocketTransport implements InstrumentTransport {
  readonly description: string;
  protected readonly timeoutMs: number;
  private socket: net.Socket | null = null;
  private buffer = "";
  private pending: PendingResponse | null = null;

  constructor(protected readonly opts: SocketTransportOptions) {
    this.description = `tcp://${opts.host}:${opts.port}`;
    this.timeoutMs = opts.timeoutMs;
  }

  get isOpen(): boolean {
    return this.socket !== null && !this.socket.destroyed;
  }

  async open(): Promise<void> {
    if (this.isOpen) return;

    const socket = await new Promise<net.Socket>((resolve, reject) => {
      const s = net.createConnection({ host: this.opts.host, port: this.opts.port });
      const timer = setTimeout(() => {
        s.destroy();
        reject(new TransportTimeout("connect", this.timeoutMs, { operation: "open", address: this.description }));
      }, this.timeoutMs);
      s.once("connect", () => {
        clearTimeout(timer);
        s.removeAllListeners("error");
        resolve(s);
      });
      s.once("error", (err) => {
        clearTimeout(timer);
        reject(new TransportError(`Cannot connect to ${this.description}: ${err.message}`, { operation: "open" }, { cause: err }));
      });
    });

    socket.setEncoding("utf8");
    socket.setNoDelay(true);
    socket.on("data", (chunk: string) => this.onData(chunk));
    socket.on("error", (err) => this.failPending(new TransportError(`${this.description}: ${err.message}`, { operation: "io" }, { cause: err })));
    socket.on("close", () => {
      this.socket = null;
      this.failPending(new TransportError(`${this.description}: connection closed`, { operation: "io" }));
    });
    this.socket = socket;
  }

  async send(command: string): Promise<void> {
    await this.write([command]);
  }

  async query(command: string, timeoutMs?: number): Promise<string> {
    return this.request([command], command, timeoutMs ?? this.timeoutMs);
  }

  async close(): Promise<void> {
    const socket = this.socket;
    if (!socket) return;
    this.socket = null;
    await new Promise<void>((resolve) => {
      socket.once("close", () => resolve());
      socket.end();
      socket.destroy();
    });
  }

  /** Write lines, then wait for exactly one response line. */
  protected async request(lines: string[], command: string, timeoutMs: number): Promise<string> {
    if (this.pending) {
      throw new TransportError(`Query "${command}" issued while "${this.pending.command}" is in flight`, { operation: "query", command });
    }

    const response = new Promise<string>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        reject(new TransportTimeout(command, timeoutMs, { address: this.description }));
      }, timeoutMs);
      this.pending = { command, resolve, reject, timer };
    });

    // Both settle under one await so a timeout during the write is never unhandled.
    try {
      const [, line] = await Promise.all([this.write(lines), response]);
      return line;
    } catch (err) {
      this.failPending(err instanceof Error ? err : new TransportError(String(err)));
      throw err;
    }
  }

  protected async write(lines: string[]): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.destroyed) {
      throw new TransportError(`${this.description} is not open`, { operation: "write", command: lines[0] });
    }
    const payload = lines.map((line) => `${line}\n`).join("");
    await new Promise<void>((resolve, reject) => {
      socket.write(payload, (err) => {
        if (err) reject(new TransportError(`Write to ${this.description} failed: ${err.message}`, { operation: "write", command: lines[0] }, { cause: err }));
        else resolve();
      });
    });
  }

  private onData(chunk: string): void {
    this.buffer += chunk;
    let idx = this.buffer.indexOf("\n");
    while (idx !== -1) {
      const line = cleanResponse(this.buffer.slice(0, idx));
      this.buffer = this.buffer.slice(idx + 1);
      if (line.length > 0) this.deliver(line);
      idx = this.buffer.indexOf("\n");
    }
  }

  private deliver(line: string): void {
    const pending = this.pending;
    if (!pending) return;
    clearTimeout(pending.timer);
    this.pending = null;
    pending.resolve(line);
  }

  private failPending(err: Error): void {
    const pending = this.pending;
    if (!pending) return;
    clearTimeout(pending.timer);
    this.pending = null;
    pending.reject(err);
  }
}
