/**
 * Error taxonomy for the bench.
 *
 * Every error carries a stable code and enough context (instrument, command,
 * commanded vs. measured value, sweep position) to diagnose a fault from the
 * log alone.
 */

export type Instrument = "source" | "load";

export type ErrorContext = {
  operation: string;
  timestamp: Date;
  instrument?: Instrument;
  command?: string;
  commanded?: number | string;
  measured?: number | string;
  voltageIndex?: number;
  currentIndex?: number;
  [key: string]: unknown;
};

export class BenchError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;

  constructor(message: string, code: string, context?: Partial<ErrorContext>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.context = {
      ...(context ?? {}),
      operation: context?.operation ?? "unknown",
      timestamp: new Date(),
    };
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/** Invalid configuration or sweep plan; raised before any instrument is contacted. */
export class ConfigurationError extends BenchError {
  public readonly details: string[];

  constructor(message: string, details: string[] = [], context?: Partial<ErrorContext>) {
    super(message, "CONFIGURATION_ERROR", { operation: "configure", ...context, details });
    this.details = details;
  }
}

export class TransportError extends BenchError {
  constructor(message: string, context?: Partial<ErrorContext>, options?: { cause?: unknown }) {
    super(message, "TRANSPORT_ERROR", context, options);
  }
}

/** No response within the per-command timeout. */
export class TransportTimeout extends BenchError {
  public readonly timeoutMs: number;

  constructor(command: string, timeoutMs: number, context?: Partial<ErrorContext>) {
    super(`No response to "${command}" within ${timeoutMs} ms`, "TRANSPORT_TIMEOUT", {
      operation: "query",
      ...context,
      command,
      timeoutMs,
    });
    this.timeoutMs = timeoutMs;
  }
}

/** Read-back mismatch, unexpected state or an error reported by the instrument itself. */
export class InstrumentFault extends BenchError {
  public readonly instrument: Instrument;

  constructor(instrument: Instrument, message: string, context?: Partial<ErrorContext>, options?: { cause?: unknown }) {
    super(`[${instrument}] ${message}`, "INSTRUMENT_FAULT", { ...context, instrument }, options);
    this.instrument = instrument;
  }
}

export function isBenchError(err: unknown): err is BenchError {
  return err instanceof BenchError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Normalise anything thrown inside a controller operation into an
 * InstrumentFault, keeping the original error as its cause.
 */
export function toInstrumentFault(instrument: Instrument, err: unknown, context?: Partial<ErrorContext>): InstrumentFault {
  if (err instanceof InstrumentFault) return err;
  const inner = isBenchError(err) ? err.context : {};
  return new InstrumentFault(instrument, errorMessage(err), { ...inner, ...context }, { cause: err });
}
