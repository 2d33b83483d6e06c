import { afterEach, describe, expect, it, vi } from "vitest";
import net from "node:net";
import { SocketTransport } from "../src/transport/socket-transport.js";
import { GpibGatewayTransport } from "../src/transport/gpib-gateway-transport.js";
import { TransportError, TransportTimeout } from "../src/utils/errors.js";

type FakeInstrument = {
  port: number;
  lines: string[];
  close(): Promise<void>;
};

/** Loopback server that records every line and answers through `respond`. */
async function startInstrument(respond: (line: string, socket: net.Socket) => void, greeting?: string): Promise<FakeInstrument> {
  const lines: string[] = [];
  const sockets = new Set<net.Socket>();
  const server = net.createServer((socket) => {
    sockets.add(socket);
    socket.setEncoding("utf8");
    let buffer = "";
    socket.on("data", (chunk: string) => {
      buffer += chunk;
      let idx = buffer.indexOf("\n");
      while (idx !== -1) {
        const line = buffer.slice(0, idx);
        buffer = buffer.slice(idx + 1);
        lines.push(line);
        respond(line, socket);
        idx = buffer.indexOf("\n");
      }
    });
    socket.on("close", () => sockets.delete(socket));
    if (greeting) socket.write(greeting);
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : 0;
  return {
    port,
    lines,
    close: () =>
      new Promise<void>((resolve) => {
        for (const s of sockets) s.destroy();
        server.close(() => resolve());
      }),
  };
}

/** Holds every write back for `delayMs` before it reaches the socket. */
class SlowWriteTransport extends SocketTransport {
  constructor(port: number, private readonly delayMs: number) {
    super({ host: "127.0.0.1", port, timeoutMs: 1000 });
  }

  protected override async write(lines: string[]): Promise<void> {
    await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    await super.write(lines);
  }
}

function scpi(line: string, socket: net.Socket): void {
  if (line === "*IDN?") socket.write("\x00ACME,PSU,1 \r\n");
  if (line === "DIE?") socket.destroy();
}

describe("SocketTransport", () => {
  let instrument: FakeInstrument | null = null;
  let transport: SocketTransport | null = null;

  afterEach(async () => {
    await transport?.close();
    await instrument?.close();
    transport = null;
    instrument = null;
  });

  async function connect(respond = scpi, greeting?: string): Promise<SocketTransport> {
    instrument = await startInstrument(respond, greeting);
    transport = new SocketTransport({ host: "127.0.0.1", port: instrument.port, timeoutMs: 1000 });
    await transport.open();
    return transport;
  }

  it("returns the cleaned response line of a query", async () => {
    const t = await connect();
    expect(t.isOpen).toBe(true);
    expect(t.description).toBe(`tcp://127.0.0.1:${instrument?.port}`);
    await expect(t.query("*IDN?")).resolves.toBe("ACME,PSU,1");
  });

  it("writes newline-terminated commands", async () => {
    const t = await connect();
    await t.send("VOLTage 100");
    await t.send("OUTPut ON");
    await vi.waitFor(() => expect(instrument?.lines).toEqual(["VOLTage 100", "OUTPut ON"]));
  });

  it("times out a query that gets no answer", async () => {
    const t = await connect();
    await expect(t.query("SILENT?", 50)).rejects.toBeInstanceOf(TransportTimeout);
    await expect(t.query("*IDN?")).resolves.toBe("ACME,PSU,1");
  });

  it("rejects a second query while one is in flight", async () => {
    const t = await connect();
    const first = t.query("SILENT?", 100);
    await expect(t.query("*IDN?")).rejects.toThrow('Query "*IDN?" issued while "SILENT?" is in flight');
    await expect(first).rejects.toBeInstanceOf(TransportTimeout);
  });

  it("drops lines that arrived before the query was sent", async () => {
    const t = await connect(scpi, "JUNK\n");
    await new Promise((resolve) => setTimeout(resolve, 50));
    await expect(t.query("*IDN?")).resolves.toBe("ACME,PSU,1");
  });

  it("fails the pending query when the connection drops", async () => {
    const t = await connect();
    await expect(t.query("DIE?")).rejects.toBeInstanceOf(TransportError);
    expect(t.isOpen).toBe(false);
  });

  it("times out a query whose write is still in progress", async () => {
    instrument = await startInstrument(scpi);
    transport = new SlowWriteTransport(instrument.port, 80);
    await transport.open();

    await expect(transport.query("*IDN?", 20)).rejects.toBeInstanceOf(TransportTimeout);
    await new Promise((resolve) => setTimeout(resolve, 120));
    await expect(transport.query("*IDN?", 500)).resolves.toBe("ACME,PSU,1");
  });

  it("frees the request slot when a query cannot be written", async () => {
    const t = new SocketTransport({ host: "127.0.0.1", port: 1, timeoutMs: 1000 });
    await expect(t.query("*IDN?")).rejects.toThrow("tcp://127.0.0.1:1 is not open");
    await expect(t.query("*IDN?")).rejects.toThrow("tcp://127.0.0.1:1 is not open");
  });

  it("refuses to write before open", async () => {
    const t = new SocketTransport({ host: "127.0.0.1", port: 1, timeoutMs: 100 });
    await expect(t.send("*RST")).rejects.toBeInstanceOf(TransportError);
  });

  it("reports a refused connection as a transport error", async () => {
    const closed = await startInstrument(() => {});
    const port = closed.port;
    await closed.close();
    const t = new SocketTransport({ host: "127.0.0.1", port, timeoutMs: 1000 });
    await expect(t.open()).rejects.toThrow(`Cannot connect to tcp://127.0.0.1:${port}`);
  });
});

describe("GpibGatewayTransport", () => {
  let gateway: FakeInstrument | null = null;
  let transport: GpibGatewayTransport | null = null;

  afterEach(async () => {
    await transport?.close();
    await gateway?.close();
    transport = null;
    gateway = null;
  });

  it("configures the gateway on open and reads explicitly after each query", async () => {
    let lastQuery = "";
    gateway = await startInstrument((line, socket) => {
      if (line.endsWith("?")) lastQuery = line;
      if (line === "++read eoi") socket.write(lastQuery === "*IDN?" ? "CHROMA,63804,0,1.0\n" : "0\n");
    });
    transport = new GpibGatewayTransport({ resource: "GPIB0::8::INSTR", host: "127.0.0.1", port: gateway.port, timeoutMs: 5000 });

    await transport.open();
    await transport.clear();
    await transport.send("LOAD ON");
    await expect(transport.query("*IDN?")).resolves.toBe("CHROMA,63804,0,1.0");

    expect(gateway.lines).toEqual([
      "++mode 1",
      "++auto 0",
      "++eoi 1",
      "++eos 2",
      "++read_tmo_ms 3000",
      "++addr 8",
      "++clr",
      "LOAD ON",
      "*IDN?",
      "++read eoi",
    ]);
    expect(transport.description).toBe(`gpib://127.0.0.1:${gateway.port}/GPIB0::8::INSTR`);
  });

  it("addresses a secondary address", () => {
    transport = new GpibGatewayTransport({ resource: "GPIB0::5::2::INSTR", host: "127.0.0.1", port: 1234, timeoutMs: 1000 });
    expect(transport.setupCommands()).toEqual(["++mode 1", "++auto 0", "++eoi 1", "++eos 2", "++read_tmo_ms 1000", "++addr 5 98"]);
  });
});
