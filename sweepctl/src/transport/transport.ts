/**
 * Instrument transport contract. The engine and controllers are agnostic
 * to whether an instrument sits on a socket, a bus gateway or a simulator.
 */
export interface InstrumentTransport {
  /** Human-readable address used in logs and error context. */
  readonly description: string;
  readonly isOpen: boolean;
  open(): Promise<void>;
  send(command: string): Promise<void>;
  /** Send a query and resolve with its cleaned response line. Rejects with TransportTimeout. */
  query(command: string, timeoutMs?: number): Promise<string>;
  close(): Promise<void>;
  /** Selected-device clear, where the channel supports one. */
  clear?(): Promise<void>;
}
