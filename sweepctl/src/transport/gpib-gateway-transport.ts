import { ConfigurationError } from "../utils/errors.js";
import { SocketTransport } from "./socket-transport.js";

export type GpibResource = {
  board: number;
  address: number;
  secondary?: number;
};

const RESOURCE_RE = /^GPIB(\d*)::(\d+)(?:::(\d+))?::INSTR$/i;

/** Parse a VISA-style bus resource such as `GPIB0::8::INSTR`. */
export function parseGpibResource(resource: string): GpibResource {
  const m = RESOURCE_RE.exec(resource.trim());
  if (!m) {
    throw new ConfigurationError(`Not a GPIB resource string: ${resource}`);
  }
  const address = Number(m[2]);
  if (address > 30) {
    throw new ConfigurationError(`GPIB primary address out of range (0-30): ${resource}`);
  }
  const parsed: GpibResource = { board: m[1] ? Number(m[1]) : 0, address };
  if (m[3] !== undefined) {
    const secondary = Number(m[3]);
    if (secondary > 30) {
      throw new ConfigurationError(`GPIB secondary address out of range (0-30): ${resource}`);
    }
    parsed.secondary = secondary;
  }
  return parsed;
}

export type GpibGatewayOptions = {
  resource: string;
  host: string;
  port: number;
  timeoutMs: number;
};

/**
 * GPIB instrument reached through a Prologix-style GPIB-to-Ethernet gateway.
 *
 * The gateway runs in controller mode with read-after-write disabled, so
 * every query is followed by an explicit `++read eoi`.
 */
export class GpibGatewayTransport extends SocketTransport {
  readonly resource: GpibResource;
  override readonly description: string;

  constructor(opts: GpibGatewayOptions) {
    super({ host: opts.host, port: opts.port, timeoutMs: opts.timeoutMs });
    this.resource = parseGpibResource(opts.resource);
    this.description = `gpib://${opts.host}:${opts.port}/${opts.resource}`;
  }

  /** Gateway set-up commands issued right after the TCP connection opens. */
  setupCommands(): string[] {
    const addr = this.resource.secondary === undefined
      ? `++addr ${this.resource.address}`
      : `++addr ${this.resource.address} ${96 + this.resource.secondary}`;
    return ["++mode 1", "++auto 0", "++eoi 1", "++eos 2", `++read_tmo_ms ${Math.min(this.timeoutMs, 3000)}`, addr];
  }

  override async open(): Promise<void> {
    if (this.isOpen) return;
    await super.open();
    await this.write(this.setupCommands());
  }

  override async query(command: string, timeoutMs?: number): Promise<string> {
    return this.request([command, "++read eoi"], command, timeoutMs ?? this.timeoutMs);
  }

  async clear(): Promise<void> {
    await this.write(["++clr"]);
  }
}
